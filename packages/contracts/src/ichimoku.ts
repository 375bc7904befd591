/**
 * @fileoverview Ichimoku Cloud output types.
 *
 * Field names are snake_case because they are the JSON wire format served by
 * the HTTP API. Absent values are `null`, never NaN.
 *
 * @module @kumo/contracts/ichimoku
 */

/**
 * Position of the close relative to the span A / span B envelope.
 */
export type CloudStatus = 'above' | 'below' | 'inside';

/**
 * Per-bar trading classification.
 */
export type SignalType = 'buy' | 'sell' | 'neutral';

/**
 * Periods driving the indicator. All must be positive integers.
 */
export interface IchimokuConfig {
  /** Conversion line window (default 9) */
  tenkanPeriod: number;

  /** Base line window (default 26) */
  kijunPeriod: number;

  /** Leading span B window (default 52) */
  senkouBPeriod: number;

  /** Displacement applied to the leading spans and the lagging span (default 26) */
  chikouShift: number;
}

/**
 * Indicator values for one bar.
 */
export interface IchimokuValues {
  tenkan_sen: number | null;
  kijun_sen: number | null;
  senkou_span_a: number | null;
  senkou_span_b: number | null;
  chikou_span: number | null;
  cloud_status: CloudStatus | null;
}

/**
 * The six predicates evaluated once every required value is present.
 */
export interface SignalConditions {
  price_above_cloud: boolean;
  price_below_cloud: boolean;
  kijun_above_tenkan: boolean;
  kijun_below_tenkan: boolean;
  chikou_above_price: boolean;
  chikou_below_price: boolean;
}

/**
 * Signal for one bar. `conditions_met` is empty when a required value is
 * missing.
 */
export interface IchimokuSignal {
  signal: SignalType;
  reason: string;
  conditions_met: SignalConditions | Record<string, never>;
}

/**
 * One input bar plus its indicator values and signal.
 *
 * @invariant Produced frozen by the engine; never mutated afterwards
 */
export interface EnrichedBar {
  time: string | null;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  ichimoku: IchimokuValues;
  signal: IchimokuSignal;
}
