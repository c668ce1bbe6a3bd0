/**
 * Reconciler Worker
 *
 * Consumes reconcile_document jobs: classifies and extracts each document,
 * merges the result with the store's values, then applies or queues the
 * changes for review.
 */

import {
  logger,
  config,
  validateConfig,
  createWorker,
  loadTemplatesConfig,
  serveMetrics,
  DocumentStoreClient,
  PgReviewRepository,
  ReviewQueue,
  QUEUE_NAMES,
  type ReconcileDocumentJob,
  type ReconcileJobResult,
} from '@docmerge/shared';
import { OpenAiExtractionClient } from './lib/llm';
import { DocumentPipeline } from './lib/pipeline';
import { createReconcileProcessor } from './lib/job';

validateConfig(config);

const templates = loadTemplatesConfig();
const store = new DocumentStoreClient();
const repository = new PgReviewRepository();

const pipeline = new DocumentPipeline({
  store,
  llm: new OpenAiExtractionClient({ templates }),
  templates,
  reviewQueue: new ReviewQueue(store, repository),
});

const worker = createWorker<ReconcileDocumentJob, ReconcileJobResult>(
  QUEUE_NAMES.RECONCILE_DOCUMENT,
  createReconcileProcessor(pipeline)
);

const metricsServer = serveMetrics(config.metricsPort);

logger.info('Reconciler worker started', {
  templates: templates.templates.length,
  dry_run_default: config.dryRun,
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await repository.close();
  metricsServer.close();
  process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      logger.error('Shutdown failed', err);
      process.exit(1);
    });
  });
}
