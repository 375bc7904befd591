/**
 * @fileoverview Type definitions for the Kumo logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that will be written.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Options for {@link createLogger}.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/kumo.log',
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Machine-readable JSON lines instead of the coloured pretty format.
   * @default true when NODE_ENV is 'production'
   */
  json?: boolean;

  /** Also append log lines to this file. */
  filePath?: string;

  /**
   * Write to stdout/stderr.
   * @default true
   */
  console?: boolean;

  /**
   * Drop every entry. Defaults to true only when no transport is configured,
   * so that a logger without outputs does not complain on every write.
   */
  silent?: boolean;
}

export type Logger = WinstonLogger;
