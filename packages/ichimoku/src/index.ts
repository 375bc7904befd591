/**
 * @fileoverview Public API of @kumo/ichimoku.
 *
 * @module @kumo/ichimoku
 */

export { IchimokuCalculator, REQUIRED_COLUMNS } from './calculator.js';
export type { IchimokuSeries, IchimokuCalculatorOptions } from './calculator.js';

export { DEFAULT_ICHIMOKU_CONFIG, resolveIchimokuConfig } from './config.js';

export { classifyCloud } from './cloud.js';

export { evaluateSignal, SIGNAL_REASONS } from './signals.js';
export type { SignalInput } from './signals.js';

export { rollingMax, rollingMin, rollingMidpoint } from './rolling.js';

export { shiftSeries, averageSeries, isPresent, toSlot } from './series.js';
export type { Series } from './series.js';
