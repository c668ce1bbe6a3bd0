/**
 * reconcile_document job handler
 */

import {
  logger,
  withContext,
  jobDurationHistogram,
  jobsProcessedCounter,
  QUEUE_NAMES,
  type ReconcileDocumentJob,
  type ReconcileJobResult,
} from '@docmerge/shared';
import type { DocumentPipeline } from './pipeline';

/** The parts of a BullMQ job the handler reads */
export interface ReconcileJobLike {
  id?: string;
  data: ReconcileDocumentJob;
  attemptsMade: number;
}

/**
 * Run the pipeline for one job inside the job's correlation context.
 * A failed (not skipped) document throws so the queue retries it.
 */
export function createReconcileProcessor(
  pipeline: Pick<DocumentPipeline, 'processDocument'>
): (job: ReconcileJobLike) => Promise<ReconcileJobResult> {
  return async (job) => {
    const { correlation_id, doc_id, dry_run } = job.data;

    return withContext(
      { correlationId: correlation_id, documentId: doc_id, jobId: job.id },
      async () => {
        const startTime = Date.now();
        logger.info('Processing reconcile_document', {
          attempt: job.attemptsMade + 1,
          dry_run,
        });

        const result = await pipeline.processDocument(doc_id, { dryRun: dry_run });
        const status = result.success || result.skippedReason !== null ? 'success' : 'failed';
        const duration = (Date.now() - startTime) / 1000;

        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.RECONCILE_DOCUMENT, status });
        jobDurationHistogram.observe({ queue: QUEUE_NAMES.RECONCILE_DOCUMENT, status }, duration);

        if (status === 'failed') {
          throw new Error(result.errorMessage ?? `Reconciliation failed for document ${doc_id}`);
        }

        return {
          doc_id,
          success: result.success,
          template_id: result.templateId,
          review_required: result.reviewRequired,
          applied_changes: result.appliedChanges.length,
          skipped_reason: result.skippedReason,
        };
      }
    );
  };
}
