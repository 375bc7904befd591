/**
 * @fileoverview Express-compatible middleware binding each HTTP request to a
 * request context.
 *
 * The request/response shapes are structural so this package does not depend
 * on express itself.
 */

import { withRequestContext, generateRequestId } from './request-context.js';

export const REQUEST_ID_HEADER = 'X-Request-ID';

export interface RequestLike {
  headers: Record<string, string | string[] | undefined>;
}

export interface ResponseLike {
  setHeader(name: string, value: string): unknown;
}

export type NextFunction = (error?: unknown) => void;

/**
 * Reads the request id from the `X-Request-ID` header (or generates one),
 * echoes it on the response and runs the rest of the chain inside the
 * request context.
 *
 * @example
 * ```typescript
 * const app = express();
 * app.use(requestIdMiddleware());
 * ```
 */
export function requestIdMiddleware() {
  return (req: RequestLike, res: ResponseLike, next: NextFunction): void => {
    const incoming = req.headers['x-request-id'];
    const requestId =
      typeof incoming === 'string' && incoming.length > 0 ? incoming : generateRequestId();

    res.setHeader(REQUEST_ID_HEADER, requestId);

    withRequestContext(() => next(), requestId).catch((error: unknown) => {
      next(error instanceof Error ? error : new Error(String(error)));
    });
  };
}
