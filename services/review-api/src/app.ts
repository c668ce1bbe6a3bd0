/**
 * Review API
 *
 * Enqueues reconciliation jobs and exposes the review queue: list pending
 * reviews, inspect proposed changes, approve or reject them.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  withContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  isReconcileTagBody,
  isRejectReviewBody,
  ReviewNotPendingError,
  type DocumentStore,
  type ErrorEnvelope,
  type ReconcileDocumentJob,
  type ReviewQueue,
  type ReviewRecord,
} from '@docmerge/shared';

export interface ReviewApiDeps {
  reviewQueue: ReviewQueue;
  store: DocumentStore;
  enqueueReconcile: (job: ReconcileDocumentJob) => Promise<void>;
  /** Throws when a backing service is unreachable */
  healthCheck?: () => Promise<void>;
  /** Refreshes gauges before each scrape */
  collectMetrics?: () => Promise<void>;
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const envelope: ErrorEnvelope = {
    error: { code, message, correlation_id: getCorrelationId() },
  };
  res.status(status).json(envelope);
}

function parseDocId(value: string): number | null {
  return /^\d+$/.test(value) && Number(value) > 0 ? Number(value) : null;
}

function isDryRun(req: Request): boolean {
  return req.query.dry_run === 'true';
}

function serializeReview(record: ReviewRecord) {
  return {
    doc_id: record.docId,
    template_id: record.templateId,
    confidence: record.confidence,
    status: record.status,
    changes: record.changes,
    correlation_id: record.correlationId,
    created_at: record.createdAt.toISOString(),
    updated_at: record.updatedAt.toISOString(),
  };
}

function reconcileJob(docId: number, dryRun: boolean): ReconcileDocumentJob {
  return {
    event_type: 'document.reconcile',
    correlation_id: getCorrelationId(),
    doc_id: docId,
    dry_run: dryRun,
    requested_at: new Date().toISOString(),
  };
}

export function createApp(deps: ReviewApiDeps): express.Express {
  const app = express();

  app.use(express.json());

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    withContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;
      const status = res.statusCode.toString();

      httpRequestDurationHistogram.observe({ method: req.method, path, status }, duration);
      httpRequestsCounter.inc({ method: req.method, path, status });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  app.get('/health', async (req: Request, res: Response) => {
    try {
      await deps.healthCheck?.();
      res.json({
        status: 'healthy',
        service: 'review-api',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'review-api',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  app.get('/metrics', async (req: Request, res: Response) => {
    await deps.collectMetrics?.();
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /documents/:id/reconcile
   * Queue one document for reconciliation
   */
  app.post('/documents/:id/reconcile', async (req: Request, res: Response) => {
    const docId = parseDocId(req.params.id);
    if (docId === null) {
      sendError(res, 400, 'invalid_request', 'Document id must be a positive integer');
      return;
    }

    try {
      const job = reconcileJob(docId, isDryRun(req));
      await deps.enqueueReconcile(job);
      logger.info('Reconciliation queued', { documentId: docId, dry_run: job.dry_run });
      res.status(202).json({ status: 'queued', doc_id: docId, correlation_id: job.correlation_id });
    } catch (error) {
      logger.error('Failed to enqueue reconciliation', error, { documentId: docId });
      sendError(res, 500, 'internal_error', 'Failed to queue document');
    }
  });

  /**
   * POST /reconcile/tag
   * Queue every document carrying a tag
   */
  app.post('/reconcile/tag', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isReconcileTagBody(body)) {
      sendError(res, 400, 'invalid_request', 'Body must be {"tag": string, "dry_run"?: boolean}');
      return;
    }

    try {
      const docIds = await deps.store.getDocumentsByTag(body.tag);
      for (const docId of docIds) {
        await deps.enqueueReconcile(reconcileJob(docId, body.dry_run ?? false));
      }
      logger.info('Reconciliation queued by tag', { tag: body.tag, count: docIds.length });
      res.status(202).json({ status: 'queued', tag: body.tag, doc_ids: docIds });
    } catch (error) {
      logger.error('Failed to enqueue documents by tag', error, { tag: body.tag });
      sendError(res, 500, 'internal_error', 'Failed to queue documents');
    }
  });

  /**
   * GET /reviews
   * Documents waiting for a review decision
   */
  app.get('/reviews', async (req: Request, res: Response) => {
    try {
      const records = await deps.reviewQueue.getPendingReviews();
      res.json({ items: records.map(serializeReview) });
    } catch (error) {
      logger.error('Failed to list reviews', error);
      sendError(res, 500, 'internal_error', 'Failed to list reviews');
    }
  });

  app.get('/reviews/:id', async (req: Request, res: Response) => {
    const docId = parseDocId(req.params.id);
    if (docId === null) {
      sendError(res, 400, 'invalid_request', 'Document id must be a positive integer');
      return;
    }

    try {
      const record = await deps.reviewQueue.getPendingReview(docId);
      if (!record) {
        sendError(res, 404, 'not_found', `No pending review for document ${docId}`);
        return;
      }
      res.json(serializeReview(record));
    } catch (error) {
      logger.error('Failed to get review', error, { documentId: docId });
      sendError(res, 500, 'internal_error', 'Failed to retrieve review');
    }
  });

  /**
   * POST /reviews/:id/approve
   * Apply the stored changes; ?dry_run=true reports them without writing
   */
  app.post('/reviews/:id/approve', async (req: Request, res: Response) => {
    const docId = parseDocId(req.params.id);
    if (docId === null) {
      sendError(res, 400, 'invalid_request', 'Document id must be a positive integer');
      return;
    }

    try {
      const outcome = await deps.reviewQueue.approveReview(docId, isDryRun(req));
      res.json({
        doc_id: outcome.docId,
        dry_run: outcome.dryRun,
        applied: outcome.applied,
        skipped: outcome.skipped,
      });
    } catch (error) {
      if (error instanceof ReviewNotPendingError) {
        sendError(res, 409, 'not_pending', error.message);
        return;
      }
      logger.error('Failed to approve review', error, { documentId: docId });
      sendError(res, 502, 'review_failed', 'Failed to approve review');
    }
  });

  /**
   * POST /reviews/:id/reject
   * Discard the stored changes
   */
  app.post('/reviews/:id/reject', async (req: Request, res: Response) => {
    const docId = parseDocId(req.params.id);
    if (docId === null) {
      sendError(res, 400, 'invalid_request', 'Document id must be a positive integer');
      return;
    }

    const body: unknown = req.body ?? {};
    if (!isRejectReviewBody(body)) {
      sendError(res, 400, 'invalid_request', 'Body must be {"reason"?: string}');
      return;
    }

    try {
      const outcome = await deps.reviewQueue.rejectReview(docId, body.reason ?? null);
      res.json({ doc_id: outcome.docId, discarded: outcome.discarded, reason: outcome.reason });
    } catch (error) {
      if (error instanceof ReviewNotPendingError) {
        sendError(res, 409, 'not_pending', error.message);
        return;
      }
      logger.error('Failed to reject review', error, { documentId: docId });
      sendError(res, 502, 'review_failed', 'Failed to reject review');
    }
  });

  // Unknown routes
  app.use((req: Request, res: Response) => {
    sendError(res, 404, 'not_found', `Route ${req.method} ${req.path} not found`);
  });

  return app;
}
