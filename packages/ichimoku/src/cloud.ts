/**
 * @fileoverview Price position relative to the cloud.
 *
 * @module @kumo/ichimoku/cloud
 */

import type { CloudStatus } from '@kumo/contracts';
import { isPresent } from './series.js';

/**
 * Classifies `close` against the span A / span B envelope.
 *
 * Returns null when any input is absent. The envelope is inclusive:
 * a close equal to either edge is `inside`.
 *
 * @example
 * ```typescript
 * classifyCloud(1.10, 1.08, 1.09)  // 'above'
 * classifyCloud(1.085, 1.08, 1.09) // 'inside'
 * ```
 */
export function classifyCloud(
  close: number | null | undefined,
  spanA: number | null | undefined,
  spanB: number | null | undefined
): CloudStatus | null {
  if (!isPresent(close) || !isPresent(spanA) || !isPresent(spanB)) {
    return null;
  }

  const top = Math.max(spanA, spanB);
  const bottom = Math.min(spanA, spanB);

  if (close > top) {
    return 'above';
  }
  if (close < bottom) {
    return 'below';
  }
  return 'inside';
}
