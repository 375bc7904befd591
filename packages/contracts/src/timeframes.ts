/**
 * @fileoverview Terminal timeframe enumeration and utilities.
 *
 * Values are the labels the trading terminal uses for its chart periods
 * (M1 … MN1). Parsing is case-insensitive.
 *
 * @module @kumo/contracts/timeframes
 */

/**
 * Chart periods supported by the trading terminal.
 *
 * @invariant Declaration order is ascending by duration
 */
export enum Timeframe {
  M1 = 'M1',
  M2 = 'M2',
  M3 = 'M3',
  M4 = 'M4',
  M5 = 'M5',
  M6 = 'M6',
  M10 = 'M10',
  M12 = 'M12',
  M15 = 'M15',
  M20 = 'M20',
  M30 = 'M30',
  H1 = 'H1',
  H2 = 'H2',
  H3 = 'H3',
  H4 = 'H4',
  H6 = 'H6',
  H8 = 'H8',
  H12 = 'H12',
  D1 = 'D1',
  W1 = 'W1',
  MN1 = 'MN1',
}

/**
 * Nominal bar duration in minutes. MN1 uses a 30-day month.
 *
 * @internal
 */
const TIMEFRAME_MINUTES: Record<Timeframe, number> = {
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
  [Timeframe.H1]: 60,
  [Timeframe.H2]: 120,
  [Timeframe.H3]: 180,
  [Timeframe.H4]: 240,
  [Timeframe.H6]: 360,
  [Timeframe.H8]: 480,
  [Timeframe.H12]: 720,
  [Timeframe.D1]: 1440,
  [Timeframe.W1]: 10080,
  [Timeframe.MN1]: 43200,
};

const ALL_TIMEFRAMES: readonly Timeframe[] = Object.values(Timeframe);

/**
 * Validates whether a string is an exact Timeframe value.
 *
 * @example
 * ```typescript
 * isValidTimeframe('H1')   // true
 * isValidTimeframe('h1')   // false (use resolveTimeframe for lenient input)
 * isValidTimeframe('H5')   // false
 * ```
 */
export function isValidTimeframe(value: string): value is Timeframe {
  return ALL_TIMEFRAMES.some((timeframe) => timeframe === value);
}

/**
 * Nominal duration of one bar in minutes.
 */
export function timeframeToMinutes(timeframe: Timeframe): number {
  return TIMEFRAME_MINUTES[timeframe];
}

/**
 * Resolves a label case-insensitively. Unknown or missing labels fall back
 * to `fallback` (H1 unless given), the way the terminal treats unrecognised
 * chart periods.
 */
export function resolveTimeframe(
  value: string | undefined,
  fallback: Timeframe = Timeframe.H1
): Timeframe {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toUpperCase();
  return isValidTimeframe(normalized) ? normalized : fallback;
}
