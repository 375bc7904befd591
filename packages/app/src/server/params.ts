/**
 * Query-string helpers for the HTTP routes
 */

import type { Request } from 'express';

/**
 * First string value of a query parameter. Empty strings count as missing.
 */
export function readQueryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  const first = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' && first.length > 0 ? first : undefined;
}

/**
 * Integer query parameter, or undefined when absent or not an integer.
 *
 * @example
 * ```typescript
 * parseIntegerParam('150')  // 150
 * parseIntegerParam('-5')   // -5
 * parseIntegerParam('1.5')  // undefined
 * parseIntegerParam('abc')  // undefined
 * ```
 */
export function parseIntegerParam(value: string | undefined): number | undefined {
  if (value === undefined || !/^[+-]?\d+$/.test(value.trim())) {
    return undefined;
  }
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}
