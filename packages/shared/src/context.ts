/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID (and whatever document or expense the request
 * is about) across API handlers and the extraction pipeline.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  filename?: string;
  expenseId?: number;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function within a context that extends the current one.
 * Fields of `extra` override the enclosing context.
 */
export async function runWithContextAsync<T>(
  extra: Partial<RequestContext>,
  fn: () => Promise<T>
): Promise<T> {
  const current = getContext();
  const context: RequestContext = {
    ...current,
    ...extra,
    correlationId: extra.correlationId || current?.correlationId || ulid(),
  };
  return asyncLocalStorage.run(context, fn);
}

export { asyncLocalStorage };
