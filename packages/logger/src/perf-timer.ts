/**
 * @fileoverview High-resolution timers for duration_ms log fields.
 */

export interface PerfTimer {
  /** Freezes the timer and returns the final duration in milliseconds. */
  stop(): number;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await source.getQuotes(params);
 * logger.info('Quotes fetched', { count: bars.length, duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },
  };
}
