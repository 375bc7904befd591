/**
 * @fileoverview Public API of @kumo/logger.
 */

export { createLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';

export { generateRequestId, getRequestId, withRequestContext } from './request-context.js';

export { startTimer } from './perf-timer.js';

export { redactSecrets, isSensitiveKey } from './formats.js';

export { requestIdMiddleware, REQUEST_ID_HEADER } from './middleware.js';

export type { Logger, LoggerConfig, LogLevel } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
export type { RequestLike, ResponseLike, NextFunction } from './middleware.js';
