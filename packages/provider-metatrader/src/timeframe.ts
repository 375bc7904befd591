/**
 * @fileoverview Mapping from timeframe labels to MetaTrader 5 constants.
 *
 * Minute periods use their minute count; hour periods set bit 14 (0x4000)
 * plus the hour count; W1 and MN1 use the 0x8000 and 0xC000 families.
 *
 * @module @kumo/provider-metatrader/timeframe
 */

import { Timeframe, resolveTimeframe } from '@kumo/contracts';

export const MT5_TIMEFRAME_CODES: Readonly<Record<Timeframe, number>> = {
  [Timeframe.M1]: 1,
  [Timeframe.M2]: 2,
  [Timeframe.M3]: 3,
  [Timeframe.M4]: 4,
  [Timeframe.M5]: 5,
  [Timeframe.M6]: 6,
  [Timeframe.M10]: 10,
  [Timeframe.M12]: 12,
  [Timeframe.M15]: 15,
  [Timeframe.M20]: 20,
  [Timeframe.M30]: 30,
  [Timeframe.H1]: 16385,
  [Timeframe.H2]: 16386,
  [Timeframe.H3]: 16387,
  [Timeframe.H4]: 16388,
  [Timeframe.H6]: 16390,
  [Timeframe.H8]: 16392,
  [Timeframe.H12]: 16396,
  [Timeframe.D1]: 16408,
  [Timeframe.W1]: 32769,
  [Timeframe.MN1]: 49153,
};

/**
 * Terminal constant for a label. Case-insensitive; unknown labels map to H1.
 *
 * @example
 * ```typescript
 * getTimeframeCode('m15')  // 15
 * getTimeframeCode('H4')   // 16388
 * getTimeframeCode('X9')   // 16385 (H1)
 * ```
 */
export function getTimeframeCode(label: string): number {
  return MT5_TIMEFRAME_CODES[resolveTimeframe(label)];
}
