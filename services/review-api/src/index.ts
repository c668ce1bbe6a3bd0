/**
 * Review API server
 */

import {
  logger,
  config,
  createQueue,
  reportQueueMetrics,
  DocumentStoreClient,
  PgReviewRepository,
  ReviewQueue,
  QUEUE_NAMES,
  type ReconcileDocumentJob,
  type ReconcileJobResult,
} from '@docmerge/shared';
import { createApp } from './app';

const reconcileQueue = createQueue<ReconcileDocumentJob, ReconcileJobResult>(
  QUEUE_NAMES.RECONCILE_DOCUMENT
);
const store = new DocumentStoreClient();
const repository = new PgReviewRepository();

const app = createApp({
  store,
  reviewQueue: new ReviewQueue(store, repository),
  enqueueReconcile: async (job) => {
    await reconcileQueue.add('reconcile_document', job, {
      jobId: `reconcile_${job.doc_id}_${job.correlation_id}`,
    });
  },
  healthCheck: () => repository.ping(),
  collectMetrics: () =>
    reportQueueMetrics([{ name: QUEUE_NAMES.RECONCILE_DOCUMENT, queue: reconcileQueue }]),
});

const server = app.listen(config.port, () => {
  logger.info('Review API started', { port: config.port });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await reconcileQueue.close();
  await repository.close();
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
