/**
 * @fileoverview Request context propagation with AsyncLocalStorage.
 * Every log line written while a request is being served picks up its id.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** UUID v4 unless supplied by the caller */
  request_id: string;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string {
  return randomUUID();
}

export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

/**
 * Runs `fn` inside a new request context. The id follows every async
 * continuation started from `fn`.
 *
 * @example
 * ```typescript
 * await withRequestContext(async () => {
 *   logger.info('Fetching quotes'); // carries request_id
 *   await source.getQuotes(params);
 * }, req.headers['x-request-id']);
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string
): Promise<T> {
  const context: RequestContext = { request_id: requestId || generateRequestId() };
  return requestContextStorage.run(context, fn);
}
