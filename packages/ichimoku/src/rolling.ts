/**
 * @fileoverview Rolling-window extremes in O(n) using a monotonic deque.
 *
 * A window only yields a value when it is full (`period` slots) and every
 * slot in it is present. There are no partial windows.
 *
 * @module @kumo/ichimoku/rolling
 */

import { isPresent, type Series } from './series.js';

interface DequeEntry {
  index: number;
  value: number;
}

/**
 * Shared sliding-window pass. `dominates(a, b)` is true when `a` makes `b`
 * irrelevant for every later window (a >= b for max, a <= b for min).
 */
function rollingExtreme(
  values: Series,
  period: number,
  dominates: (candidate: number, incumbent: number) => boolean
): Array<number | null> {
  const result = new Array<number | null>(values.length).fill(null);
  if (period <= 0) {
    return result;
  }

  // Array-backed deque; `head` advances instead of shifting
  const deque: DequeEntry[] = [];
  let head = 0;
  let lastAbsent = -1;

  for (let i = 0; i < values.length; i++) {
    const value = values[i];

    if (isPresent(value)) {
      while (deque.length > head) {
        const tail = deque[deque.length - 1];
        if (!tail || !dominates(value, tail.value)) {
          break;
        }
        deque.pop();
      }
      deque.push({ index: i, value });
    } else {
      lastAbsent = i;
    }

    const windowStart = i - period + 1;
    while (head < deque.length) {
      const front = deque[head];
      if (!front || front.index >= windowStart) {
        break;
      }
      head++;
    }

    if (windowStart >= 0 && lastAbsent < windowStart) {
      const front = deque[head];
      if (front) {
        result[i] = front.value;
      }
    }

    // Reclaim consumed slots once they dominate the backing array
    if (head > 1024 && head * 2 > deque.length) {
      deque.splice(0, head);
      head = 0;
    }
  }

  return result;
}

/**
 * Highest value over the trailing `period` slots.
 *
 * @example
 * ```typescript
 * rollingMax([3, 1, 4, 1, 5], 3)  // [null, null, 4, 4, 5]
 * ```
 */
export function rollingMax(values: Series, period: number): Array<number | null> {
  return rollingExtreme(values, period, (candidate, incumbent) => candidate >= incumbent);
}

/**
 * Lowest value over the trailing `period` slots.
 */
export function rollingMin(values: Series, period: number): Array<number | null> {
  return rollingExtreme(values, period, (candidate, incumbent) => candidate <= incumbent);
}

/**
 * Midpoint of the trailing high/low range: (max high + min low) / 2.
 * This is the building block of tenkan-sen, kijun-sen and senkou span B.
 */
export function rollingMidpoint(
  highs: Series,
  lows: Series,
  period: number
): Array<number | null> {
  const upper = rollingMax(highs, period);
  const lower = rollingMin(lows, period);

  return upper.map((high, i) => {
    const low = lower[i];
    return isPresent(high) && isPresent(low) ? (high + low) / 2 : null;
  });
}
