/**
 * Shared Package - Main Export
 */

// Context
export { getContext, getCorrelationId, withContext, type CorrelationContext } from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export {
  config,
  validateConfig,
  DEFAULT_FIELD_MAPPING,
  type Config,
  type ReviewTags,
} from './config';

// Errors
export * from './errors';

// Normalization
export * from './normalization';

// Extraction model
export * from './extraction';

// Confidence scoring
export * from './confidence';

// Merge strategy
export * from './merge';

// Title formatting
export { formatTitle, titleValues, formatExtractionTitle, MISSING_VALUE } from './formatting';

// Templates
export * from './templates';

// Document kinds
export * from './processors';

// Document store
export * from './store/types';
export { DocumentStoreClient, type DocumentStoreClientOptions } from './store/client';

// Review workflow
export * from './review/repository';
export * from './review/queue';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ReconcileDocumentJob,
  type ReconcileJobResult,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  type QueueCounts,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsProcessedCounter,
  processingDurationHistogram,
  confidenceHistogram,
  mergeDecisionsCounter,
  reviewActionsCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  storeRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateTemplatesFile,
  isTemplatesFile,
  isRejectReviewBody,
  isReconcileTagBody,
  schemas,
  type ValidationResult,
  type RejectReviewBody,
  type ReconcileTagBody,
  type RawTemplate,
  type RawTemplateField,
  type RawTemplatesFile,
} from './schemas';
