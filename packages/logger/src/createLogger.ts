/**
 * @fileoverview Logger factory.
 * Builds winston loggers with redaction, standard fields and either JSON or
 * pretty output.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Server listening', { port: 5000 });
 *
 * const terminalLogger = logger.child({ component: 'metatrader' });
 * terminalLogger.info('Terminal initialized', { login: 5001 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  // Redaction first, so no later format sees a secret
  const baseFormat = format.combine(redactPII(), standardFields);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({ level, format: json ? format.json() : prettyPrint })
    );
  }

  if (filePath) {
    // Files always get JSON lines, regardless of the console format
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.json(),
      })
    );
  }

  return winston.createLogger({
    level,
    format: baseFormat,
    transports,
    silent: config.silent ?? transports.length === 0,
    exitOnError: false,
  });
}
