/**
 * @fileoverview Ichimoku Cloud calculator.
 *
 * Turns an ordered OHLC sequence (oldest first) into per-bar indicator
 * values and signals. The calculator is stateless apart from its periods,
 * so one instance can be shared across concurrent requests.
 *
 * Leading spans are displaced backwards on the output index: the value
 * shown at bar `i` is the midpoint computed at bar `i + chikouShift`.
 * The lagging span is displaced forwards: bar `i` shows `close[i - chikouShift]`.
 *
 * @module @kumo/ichimoku/calculator
 */

import type {
  Bar,
  CloudStatus,
  EnrichedBar,
  IchimokuConfig,
  IchimokuSignal,
  IchimokuValues,
} from '@kumo/contracts';
import { startTimer, type Logger } from '@kumo/logger';
import { classifyCloud } from './cloud.js';
import { resolveIchimokuConfig } from './config.js';
import { rollingMidpoint } from './rolling.js';
import { averageSeries, shiftSeries, toSlot } from './series.js';
import { evaluateSignal, type SignalInput } from './signals.js';

/**
 * Column-wise indicator output, index-aligned with the input bars.
 */
export interface IchimokuSeries {
  tenkan_sen: Array<number | null>;
  kijun_sen: Array<number | null>;
  senkou_span_a: Array<number | null>;
  senkou_span_b: Array<number | null>;
  chikou_span: Array<number | null>;
}

export interface IchimokuCalculatorOptions extends Partial<IchimokuConfig> {
  logger?: Logger;
}

/**
 * Columns that must exist on at least one bar for signals to be computed.
 */
export const REQUIRED_COLUMNS = ['high', 'low', 'close'] as const;

/**
 * Ichimoku Cloud calculator.
 *
 * @example
 * ```typescript
 * const calculator = new IchimokuCalculator({ logger });
 * const enriched = calculator.calculateWithSignals(bars);
 * const latest = enriched.at(-1)?.signal;
 * ```
 */
export class IchimokuCalculator {
  private readonly config: IchimokuConfig;
  private readonly logger?: Logger;

  /**
   * @throws {InvalidConfigurationError} If a period is not a positive integer
   */
  constructor(options: IchimokuCalculatorOptions = {}) {
    const { logger, ...periods } = options;
    this.config = resolveIchimokuConfig(periods);
    this.logger = logger;
  }

  get periods(): Readonly<IchimokuConfig> {
    return { ...this.config };
  }

  /**
   * Bars needed before every indicator of the newest computable bar is
   * present: the span B window plus the displacement.
   */
  get requiredHistory(): number {
    const { tenkanPeriod, kijunPeriod, senkouBPeriod, chikouShift } = this.config;
    return Math.max(tenkanPeriod, kijunPeriod, senkouBPeriod) + chikouShift;
  }

  /**
   * Computes the five indicator columns. Returns null for an empty input.
   */
  calculate(bars: readonly Bar[]): IchimokuSeries | null {
    if (bars.length === 0) {
      return null;
    }

    const { tenkanPeriod, kijunPeriod, senkouBPeriod, chikouShift } = this.config;

    const highs = bars.map((bar) => toSlot(bar.high));
    const lows = bars.map((bar) => toSlot(bar.low));
    const closes = bars.map((bar) => toSlot(bar.close));

    const tenkan = rollingMidpoint(highs, lows, tenkanPeriod);
    const kijun = rollingMidpoint(highs, lows, kijunPeriod);
    const spanARaw = averageSeries(tenkan, kijun);
    const spanBRaw = rollingMidpoint(highs, lows, senkouBPeriod);

    return {
      tenkan_sen: tenkan,
      kijun_sen: kijun,
      senkou_span_a: shiftSeries(spanARaw, -chikouShift),
      senkou_span_b: shiftSeries(spanBRaw, -chikouShift),
      chikou_span: shiftSeries(closes, chikouShift),
    };
  }

  getCloudStatus(values: {
    close: number | null | undefined;
    senkou_span_a: number | null | undefined;
    senkou_span_b: number | null | undefined;
  }): CloudStatus | null {
    return classifyCloud(values.close, values.senkou_span_a, values.senkou_span_b);
  }

  generateSignal(values: SignalInput): IchimokuSignal {
    return evaluateSignal(values);
  }

  /**
   * Computes indicators and signals for every bar.
   *
   * Returns an empty array for empty input, or when `high`, `low` or
   * `close` does not appear on any bar. Output bars are frozen.
   */
  calculateWithSignals(bars: readonly Bar[]): EnrichedBar[] {
    if (bars.length === 0) {
      return [];
    }

    const missing = REQUIRED_COLUMNS.filter(
      (column) => !bars.some((bar) => bar[column] !== undefined)
    );
    if (missing.length > 0) {
      this.logger?.error('Missing required columns for Ichimoku calculation', {
        required: [...REQUIRED_COLUMNS],
        missing,
      });
      return [];
    }

    const timer = startTimer();
    const series = this.calculate(bars);
    if (!series) {
      return [];
    }

    const enriched = bars.map((bar, i): EnrichedBar => {
      const close = toSlot(bar.close);
      const row: SignalInput = {
        close,
        tenkan_sen: series.tenkan_sen[i] ?? null,
        kijun_sen: series.kijun_sen[i] ?? null,
        chikou_span: series.chikou_span[i] ?? null,
        senkou_span_a: series.senkou_span_a[i] ?? null,
        senkou_span_b: series.senkou_span_b[i] ?? null,
      };

      const ichimoku: IchimokuValues = {
        tenkan_sen: row.tenkan_sen ?? null,
        kijun_sen: row.kijun_sen ?? null,
        senkou_span_a: row.senkou_span_a ?? null,
        senkou_span_b: row.senkou_span_b ?? null,
        chikou_span: row.chikou_span ?? null,
        cloud_status: this.getCloudStatus(row),
      };

      const signal = this.generateSignal(row);

      return Object.freeze({
        time: bar.time ?? null,
        open: toSlot(bar.open),
        high: toSlot(bar.high),
        low: toSlot(bar.low),
        close,
        ichimoku: Object.freeze(ichimoku),
        signal: Object.freeze({ ...signal, conditions_met: Object.freeze(signal.conditions_met) }),
      });
    });

    this.logger?.debug('Ichimoku calculated', {
      bars: bars.length,
      duration_ms: timer.stop(),
    });

    return enriched;
  }
}
