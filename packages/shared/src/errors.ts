/**
 * Error hierarchy for the collaborators around the reconciliation core.
 *
 * The core (normalization, scoring, merge) never throws; these errors come
 * from configuration, the document store, the LLM client, the review
 * workflow and the orchestrator.
 */

export type ErrorDetails = Record<string, unknown>;

export class DocmergeError extends Error {
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }

  override toString(): string {
    if (Object.keys(this.details).length === 0) {
      return this.message;
    }
    return `${this.message} (${JSON.stringify(this.details)})`;
  }
}

export class ConfigurationError extends DocmergeError {}

// ============================================================================
// Document store
// ============================================================================

export class StoreApiError extends DocmergeError {
  readonly statusCode: number | null;
  readonly responseBody: string | null;

  constructor(
    message: string,
    statusCode: number | null = null,
    responseBody: string | null = null,
    details: ErrorDetails = {}
  ) {
    super(message, { ...details, statusCode, responseBody });
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

export class StoreNotFoundError extends StoreApiError {
  constructor(resource: string, identifier: string | number) {
    super(`${resource} not found: ${identifier}`, 404, null, { resource, identifier });
  }
}

export class StoreAuthError extends StoreApiError {
  constructor(message = 'Authentication failed - check the store API token') {
    super(message, 401);
  }
}

// ============================================================================
// LLM
// ============================================================================

export class LlmApiError extends DocmergeError {
  readonly errorType: string | null;

  constructor(message: string, errorType: string | null = null, details: ErrorDetails = {}) {
    super(message, { ...details, errorType });
    this.errorType = errorType;
  }
}

export class LlmRateLimitError extends LlmApiError {
  /** Seconds to wait before retrying, when the API reported it */
  readonly retryAfter: number | null;

  constructor(retryAfter: number | null = null) {
    const message = retryAfter
      ? `Rate limited by LLM API. Retry after ${retryAfter} seconds`
      : 'Rate limited by LLM API';
    super(message, 'rate_limit', { retryAfter });
    this.retryAfter = retryAfter;
  }
}

export class ExtractionError extends DocmergeError {
  readonly templateId: string | null;
  readonly rawResponse: string | null;

  constructor(
    message: string,
    templateId: string | null = null,
    rawResponse: string | null = null
  ) {
    super(message, {
      templateId,
      rawResponse: rawResponse ? rawResponse.slice(0, 500) : null,
    });
    this.templateId = templateId;
    this.rawResponse = rawResponse;
  }
}

export class ClassificationError extends ExtractionError {}

// ============================================================================
// Workflow
// ============================================================================

export class ValidationError extends DocmergeError {}

export class ReviewWorkflowError extends DocmergeError {
  readonly docId: number;

  constructor(message: string, docId: number) {
    super(message, { docId });
    this.docId = docId;
  }
}

/** Approve or reject on a document that is not waiting for review */
export class ReviewNotPendingError extends ReviewWorkflowError {
  constructor(docId: number) {
    super(`Document ${docId} is not pending review`, docId);
  }
}

export type ProcessingStage =
  | 'fetch'
  | 'classify'
  | 'extract'
  | 'normalize'
  | 'score'
  | 'merge'
  | 'apply'
  | 'review';

export class ProcessingError extends DocmergeError {
  readonly docId: number;
  readonly stage: ProcessingStage | null;

  constructor(message: string, docId: number, stage: ProcessingStage | null = null) {
    super(message, { docId, stage });
    this.docId = docId;
    this.stage = stage;
  }
}

/**
 * Error body returned by the HTTP API
 */
export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
