/**
 * @fileoverview Index-aligned numeric series with absent values.
 *
 * A series has one slot per input bar. `null` marks a value that does not
 * exist (missing input or insufficient history). Every operation here
 * returns a new series of the same length as its input.
 *
 * @module @kumo/ichimoku/series
 */

export type Series = ReadonlyArray<number | null>;

/**
 * True for finite numbers. NaN, infinities, null and undefined are absent.
 */
export function isPresent(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Normalizes a raw field into a series slot.
 */
export function toSlot(value: number | null | undefined): number | null {
  return isPresent(value) ? value : null;
}

/**
 * Moves every value `offset` positions later (positive) or earlier
 * (negative). Vacated slots are absent.
 *
 * @example
 * ```typescript
 * shiftSeries([1, 2, 3], 1)   // [null, 1, 2]
 * shiftSeries([1, 2, 3], -1)  // [2, 3, null]
 * ```
 */
export function shiftSeries(values: Series, offset: number): Array<number | null> {
  const shifted = new Array<number | null>(values.length).fill(null);
  for (let i = 0; i < values.length; i++) {
    const source = i - offset;
    if (source >= 0 && source < values.length) {
      shifted[i] = values[source] ?? null;
    }
  }
  return shifted;
}

/**
 * Element-wise mean of two series; absent wherever either side is absent.
 */
export function averageSeries(a: Series, b: Series): Array<number | null> {
  const result = new Array<number | null>(a.length).fill(null);
  for (let i = 0; i < a.length; i++) {
    const left = a[i];
    const right = b[i];
    if (isPresent(left) && isPresent(right)) {
      result[i] = (left + right) / 2;
    }
  }
  return result;
}
