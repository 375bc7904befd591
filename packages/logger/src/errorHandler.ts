/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections. The process logs, flushes, and exits with code 1.
 */

import type { Logger } from './types.js';

/** Upper bound on waiting for transports to flush before exiting. */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

function describeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    return { name: reason.name, message: reason.message, stack: reason.stack };
  }
  return { message: String(reason) };
}

/**
 * Registers the handlers once per process; later calls only warn.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('warning', (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: describeError(warning),
      event: 'warning',
    });
  });

  handlersAttached = true;

  logger.info('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });
}

/**
 * Ends the logger and exits once it has flushed, or after
 * FLUSH_TIMEOUT_MS at the latest.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    console.error(`[logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
