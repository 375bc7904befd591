/**
 * @fileoverview Rule-based buy/sell/neutral classification.
 *
 * Buy needs all three bullish confirmations (price above the cloud, kijun
 * above tenkan, chikou above price); sell needs the three bearish mirrors.
 * Anything else is neutral.
 *
 * @module @kumo/ichimoku/signals
 */

import type { IchimokuSignal, SignalConditions } from '@kumo/contracts';
import { classifyCloud } from './cloud.js';
import { isPresent } from './series.js';

/**
 * Values one signal is derived from.
 */
export interface SignalInput {
  close: number | null | undefined;
  tenkan_sen: number | null | undefined;
  kijun_sen: number | null | undefined;
  chikou_span: number | null | undefined;
  senkou_span_a: number | null | undefined;
  senkou_span_b: number | null | undefined;
}

type CompleteSignalInput = { [K in keyof SignalInput]: number };

export const SIGNAL_REASONS = {
  buy: 'Price above cloud, Kijun above Tenkan, Chikou above price',
  sell: 'Price below cloud, Kijun below Tenkan, Chikou below price',
  neutral: 'Ichimoku conditions not fully met',
} as const;

function missingValueReason(field: keyof SignalInput): string {
  return `Missing or NaN value for ${field}`;
}

/**
 * Returns the row with every value present, or the first absent field in
 * the order close, tenkan, kijun, chikou, span A, span B.
 */
function requireValues(input: SignalInput): CompleteSignalInput | keyof SignalInput {
  const { close, tenkan_sen, kijun_sen, chikou_span, senkou_span_a, senkou_span_b } = input;
  if (!isPresent(close)) return 'close';
  if (!isPresent(tenkan_sen)) return 'tenkan_sen';
  if (!isPresent(kijun_sen)) return 'kijun_sen';
  if (!isPresent(chikou_span)) return 'chikou_span';
  if (!isPresent(senkou_span_a)) return 'senkou_span_a';
  if (!isPresent(senkou_span_b)) return 'senkou_span_b';
  return { close, tenkan_sen, kijun_sen, chikou_span, senkou_span_a, senkou_span_b };
}

/**
 * Evaluates one row.
 *
 * @example
 * ```typescript
 * evaluateSignal({
 *   close: 110, tenkan_sen: 104, kijun_sen: 106,
 *   chikou_span: 120, senkou_span_a: 100, senkou_span_b: 98,
 * }).signal  // 'buy'
 * ```
 */
export function evaluateSignal(input: SignalInput): IchimokuSignal {
  const row = requireValues(input);
  if (typeof row === 'string') {
    return { signal: 'neutral', reason: missingValueReason(row), conditions_met: {} };
  }

  const { close, tenkan_sen: tenkan, kijun_sen: kijun, chikou_span: chikou } = row;
  const cloud = classifyCloud(close, row.senkou_span_a, row.senkou_span_b);

  const conditions: SignalConditions = {
    price_above_cloud: cloud === 'above',
    price_below_cloud: cloud === 'below',
    kijun_above_tenkan: kijun > tenkan,
    kijun_below_tenkan: kijun < tenkan,
    chikou_above_price: chikou > close,
    chikou_below_price: chikou < close,
  };

  if (conditions.price_above_cloud && conditions.kijun_above_tenkan && conditions.chikou_above_price) {
    return { signal: 'buy', reason: SIGNAL_REASONS.buy, conditions_met: conditions };
  }

  if (conditions.price_below_cloud && conditions.kijun_below_tenkan && conditions.chikou_below_price) {
    return { signal: 'sell', reason: SIGNAL_REASONS.sell, conditions_met: conditions };
  }

  return { signal: 'neutral', reason: SIGNAL_REASONS.neutral, conditions_met: conditions };
}
