/**
 * Correlation context for API requests and reconcile jobs.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface CorrelationContext {
  correlationId: string;
  /** Document being reconciled, when there is one */
  documentId?: number;
  jobId?: string;
}

const storage = new AsyncLocalStorage<CorrelationContext>();

export function getContext(): CorrelationContext | undefined {
  return storage.getStore();
}

/**
 * Correlation id of the running request or job. Outside one, a fresh id.
 */
export function getCorrelationId(): string {
  return storage.getStore()?.correlationId ?? ulid();
}

/**
 * Run `fn` with `context` visible to everything it calls, sync or async.
 */
export function withContext<T>(context: CorrelationContext, fn: () => T): T {
  return storage.run(context, fn);
}
