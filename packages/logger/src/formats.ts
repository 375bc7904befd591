/**
 * @fileoverview Custom winston formats: secret redaction, standard fields
 * (timestamp, error stacks, request id) and the pretty console line.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Keys whose values never reach a log line. Matched case-insensitively
 * against every key at any depth.
 */
const SENSITIVE_KEY_PATTERNS: readonly RegExp[] = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/** Winston-owned fields that are never redacted. */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive keys replaced by `[REDACTED]`.
 * Errors, dates and primitives are returned as they are.
 *
 * @example
 * ```typescript
 * redactSecrets({ login: 5001, password: 'test-secret' });
 * // { login: 5001, password: '[REDACTED]' }
 * ```
 */
export function redactSecrets(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (value === null || typeof value !== 'object' || value instanceof Error || value instanceof Date) {
    return value;
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactSecrets(item, seen));
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveKey(key) ? REDACTED : redactSecrets(nested, seen);
  }
  return copy;
}

/**
 * Redaction format. Must run first in the chain so nothing downstream ever
 * sees a secret.
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactSecrets(info[key]);
  }
  return info;
});

/**
 * ISO timestamp, error stacks, and the request id of the active request
 * context (unless the entry already has one).
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const requestId = getRequestId();
    if (requestId && !info['request_id']) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/**
 * Human-readable line for development:
 *
 * `[2025-01-15T12:34:56.789+00:00] info: Retrieved quotes component=metatrader symbol=EURUSD count=200`
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, stack, ...rest } = info;

    const context: string[] = [];
    for (const [key, value] of Object.entries(rest)) {
      if (key === 'splat') {
        continue;
      }
      context.push(`${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const line = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return typeof stack === 'string' ? `${line}\n${stack}` : line;
  })
);
