/**
 * @fileoverview Tests for IchimokuCalculator.
 */

import { describe, it, expect, vi } from 'vitest';
import type { Bar, SignalConditions } from '@kumo/contracts';
import { InvalidConfigurationError } from '@kumo/contracts';
import { createLogger } from '@kumo/logger';
import { IchimokuCalculator } from '../src/calculator.js';

/** close = base + step * i, high = close + 1, low = close - 1 */
function trendBars(length: number, base: number, step: number): Bar[] {
  return Array.from({ length }, (_, i) => {
    const close = base + step * i;
    return {
      time: `2025-01-01 ${String(i).padStart(2, '0')}:00`,
      open: close,
      high: close + 1,
      low: close - 1,
      close,
    };
  });
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, k) => from + k);
}

describe('IchimokuCalculator', () => {
  const calculator = new IchimokuCalculator();

  describe('configuration', () => {
    it('should use the classic periods by default', () => {
      expect(calculator.periods).toEqual({
        tenkanPeriod: 9,
        kijunPeriod: 26,
        senkouBPeriod: 52,
        chikouShift: 26,
      });
      expect(calculator.requiredHistory).toBe(78);
    });

    it('should accept partial overrides', () => {
      const custom = new IchimokuCalculator({ tenkanPeriod: 7, chikouShift: 22 });
      expect(custom.periods).toEqual({
        tenkanPeriod: 7,
        kijunPeriod: 26,
        senkouBPeriod: 52,
        chikouShift: 22,
      });
    });

    it.each([0, -1, 2.5, Number.NaN])('should reject period %s', (value) => {
      expect(() => new IchimokuCalculator({ kijunPeriod: value })).toThrow(
        InvalidConfigurationError
      );
    });

    it('should report the offending setting', () => {
      try {
        new IchimokuCalculator({ senkouBPeriod: 0 });
        expect.unreachable('constructor should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidConfigurationError);
        if (error instanceof InvalidConfigurationError) {
          expect(error.code).toBe('INVALID_CONFIGURATION');
          expect(error.data).toEqual({ setting: 'senkouBPeriod', value: 0 });
        }
      }
    });
  });

  describe('calculate', () => {
    it('should return null for empty input', () => {
      expect(calculator.calculate([])).toBeNull();
    });

    it('should produce columns aligned with the input', () => {
      const series = calculator.calculate(trendBars(60, 100, 1));
      expect(series?.tenkan_sen).toHaveLength(60);
      expect(series?.chikou_span).toHaveLength(60);
    });
  });

  describe('calculateWithSignals on 60 rising bars', () => {
    const bars = trendBars(60, 100, 1);
    const result = calculator.calculateWithSignals(bars);

    it('should keep one output bar per input bar', () => {
      expect(result).toHaveLength(60);
      expect(result[0]?.time).toBe('2025-01-01 00:00');
      expect(result[59]?.close).toBe(159);
    });

    it('should compute tenkan from the last 9 bars', () => {
      expect(result[7]?.ichimoku.tenkan_sen).toBeNull();
      expect(result[8]?.ichimoku.tenkan_sen).toBe(104);
      expect(result[59]?.ichimoku.tenkan_sen).toBe(155);
    });

    it('should compute kijun from the last 26 bars', () => {
      expect(result[24]?.ichimoku.kijun_sen).toBeNull();
      expect(result[25]?.ichimoku.kijun_sen).toBe(112.5);
      expect(result[59]?.ichimoku.kijun_sen).toBe(146.5);
    });

    it('should pull span A from 26 bars later', () => {
      expect(range(0, 33).map((i) => result[i]?.ichimoku.senkou_span_a)).toEqual(
        range(0, 33).map((i) => 117.75 + i)
      );
      expect(range(34, 59).every((i) => result[i]?.ichimoku.senkou_span_a === null)).toBe(true);
    });

    it('should have span B only where a 52-bar window exists 26 bars later', () => {
      expect(range(0, 24).every((i) => result[i]?.ichimoku.senkou_span_b === null)).toBe(true);
      expect(range(25, 33).map((i) => result[i]?.ichimoku.senkou_span_b)).toEqual(
        range(25, 33).map((i) => 100.5 + i)
      );
      expect(range(34, 59).every((i) => result[i]?.ichimoku.senkou_span_b === null)).toBe(true);
    });

    it('should lag chikou by 26 bars', () => {
      expect(range(0, 25).every((i) => result[i]?.ichimoku.chikou_span === null)).toBe(true);
      expect(result[26]?.ichimoku.chikou_span).toBe(100);
      expect(result[59]?.ichimoku.chikou_span).toBe(133);
    });

    it('should classify the cloud only where both spans exist', () => {
      expect(result[24]?.ichimoku.cloud_status).toBeNull();
      expect(result[25]?.ichimoku.cloud_status).toBe('below');
      expect(result[33]?.ichimoku.cloud_status).toBe('below');
      expect(result[34]?.ichimoku.cloud_status).toBeNull();
    });

    it('should name the first missing field', () => {
      expect(result[0]?.signal.reason).toBe('Missing or NaN value for tenkan_sen');
      expect(result[10]?.signal.reason).toBe('Missing or NaN value for kijun_sen');
      expect(result[25]?.signal.reason).toBe('Missing or NaN value for chikou_span');
      expect(result[40]?.signal.reason).toBe('Missing or NaN value for senkou_span_a');
      expect(result[40]?.signal.conditions_met).toEqual({});
    });

    it('should emit sell where every value is present', () => {
      expect(range(26, 33).map((i) => result[i]?.signal.signal)).toEqual(
        range(26, 33).map(() => 'sell')
      );
      expect(result[30]?.signal).toEqual({
        signal: 'sell',
        reason: 'Price below cloud, Kijun below Tenkan, Chikou below price',
        conditions_met: {
          price_above_cloud: false,
          price_below_cloud: true,
          kijun_above_tenkan: false,
          kijun_below_tenkan: true,
          chikou_above_price: false,
          chikou_below_price: true,
        },
      });
    });
  });

  describe('calculateWithSignals on 60 falling bars', () => {
    const result = calculator.calculateWithSignals(trendBars(60, 200, -1));

    it('should emit buy where every value is present', () => {
      expect(range(26, 33).map((i) => result[i]?.signal.signal)).toEqual(
        range(26, 33).map(() => 'buy')
      );
      expect(result[26]?.ichimoku).toEqual({
        tenkan_sen: 178,
        kijun_sen: 186.5,
        senkou_span_a: 156.25,
        senkou_span_b: 173.5,
        chikou_span: 200,
        cloud_status: 'above',
      });
    });

    it('should never emit buy and sell for the same bar', () => {
      for (const bar of result) {
        const conditions: Partial<SignalConditions> = bar.signal.conditions_met;
        expect(conditions.price_above_cloud === true && conditions.price_below_cloud === true).toBe(
          false
        );
      }
    });
  });

  describe('degraded input', () => {
    it('should return an empty array for empty input', () => {
      expect(calculator.calculateWithSignals([])).toEqual([]);
    });

    it('should keep a single bar with a null close', () => {
      const result = calculator.calculateWithSignals([
        { time: 't0', open: 1, high: 2, low: 0.5, close: null },
      ]);
      expect(result).toEqual([
        {
          time: 't0',
          open: 1,
          high: 2,
          low: 0.5,
          close: null,
          ichimoku: {
            tenkan_sen: null,
            kijun_sen: null,
            senkou_span_a: null,
            senkou_span_b: null,
            chikou_span: null,
            cloud_status: null,
          },
          signal: {
            signal: 'neutral',
            reason: 'Missing or NaN value for close',
            conditions_met: {},
          },
        },
      ]);
    });

    it('should default time and open to null', () => {
      const [bar] = calculator.calculateWithSignals([{ high: 2, low: 1, close: 1.5 }]);
      expect(bar?.time).toBeNull();
      expect(bar?.open).toBeNull();
    });

    it('should blank only the windows touching a missing high', () => {
      const bars = trendBars(60, 100, 1);
      bars[40] = { ...bars[40], high: null };
      const result = calculator.calculateWithSignals(bars);

      expect(result).toHaveLength(60);
      expect(result[39]?.ichimoku.tenkan_sen).toBe(135);
      expect(range(40, 48).every((i) => result[i]?.ichimoku.tenkan_sen === null)).toBe(true);
      expect(result[49]?.ichimoku.tenkan_sen).toBe(145);
      expect(result[39]?.ichimoku.kijun_sen).toBe(126.5);
      expect(result[59]?.ichimoku.kijun_sen).toBeNull();
    });

    it('should return an empty array and log when a column is missing everywhere', () => {
      const logger = createLogger({ level: 'error', console: false });
      const errorSpy = vi.spyOn(logger, 'error');
      const withLogger = new IchimokuCalculator({ logger });

      expect(withLogger.calculateWithSignals([{ high: 2, low: 1 }, { high: 3, low: 2 }])).toEqual(
        []
      );
      expect(errorSpy).toHaveBeenCalledWith('Missing required columns for Ichimoku calculation', {
        required: ['high', 'low', 'close'],
        missing: ['close'],
      });
    });
  });

  describe('output', () => {
    it('should freeze every output bar', () => {
      const [bar] = calculator.calculateWithSignals(trendBars(1, 100, 1));
      expect(Object.isFrozen(bar)).toBe(true);
      expect(Object.isFrozen(bar?.ichimoku)).toBe(true);
      expect(Object.isFrozen(bar?.signal)).toBe(true);
    });

    it('should reproduce tenkan and kijun when fed its own output', () => {
      const first = calculator.calculateWithSignals(trendBars(80, 50, 0.5));
      const second = calculator.calculateWithSignals(first);

      expect(second.map((bar) => bar.ichimoku.tenkan_sen)).toEqual(
        first.map((bar) => bar.ichimoku.tenkan_sen)
      );
      expect(second.map((bar) => bar.ichimoku.kijun_sen)).toEqual(
        first.map((bar) => bar.ichimoku.kijun_sen)
      );
    });

    it('should expose single-row helpers', () => {
      expect(
        calculator.getCloudStatus({ close: 5, senkou_span_a: 4, senkou_span_b: 3 })
      ).toBe('above');
      expect(
        calculator.generateSignal({
          close: 5,
          tenkan_sen: null,
          kijun_sen: 4,
          chikou_span: 6,
          senkou_span_a: 4,
          senkou_span_b: 3,
        }).reason
      ).toBe('Missing or NaN value for tenkan_sen');
    });
  });
});
