/**
 * @fileoverview Captures JSON log lines in memory.
 */

import { Writable } from 'node:stream';
import winston, { format } from 'winston';
import type { Logger } from '../src/types.js';

export function captureLines(logger: Logger): Array<Record<string, unknown>> {
  const entries: Array<Record<string, unknown>> = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      for (const line of String(chunk).split('\n')) {
        if (line.length > 0) {
          entries.push(JSON.parse(line));
        }
      }
      callback();
    },
  });
  logger.add(new winston.transports.Stream({ stream, format: format.json() }));
  return entries;
}

export const flush = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 20));
