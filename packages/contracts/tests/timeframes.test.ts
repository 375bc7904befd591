/**
 * @fileoverview Tests for timeframe utilities.
 */

import { describe, it, expect } from 'vitest';
import {
  Timeframe,
  isValidTimeframe,
  timeframeToMinutes,
  resolveTimeframe,
} from '../src/timeframes.js';

describe('Timeframe', () => {
  it('should use terminal labels as values', () => {
    expect(Timeframe.M1).toBe('M1');
    expect(Timeframe.H1).toBe('H1');
    expect(Timeframe.MN1).toBe('MN1');
  });

  describe('isValidTimeframe', () => {
    it('should accept exact labels only', () => {
      expect(isValidTimeframe('M15')).toBe(true);
      expect(isValidTimeframe('D1')).toBe(true);
      expect(isValidTimeframe('m15')).toBe(false);
      expect(isValidTimeframe('H5')).toBe(false);
      expect(isValidTimeframe('')).toBe(false);
    });
  });

  describe('timeframeToMinutes', () => {
    it('should convert to nominal minutes', () => {
      expect(timeframeToMinutes(Timeframe.M1)).toBe(1);
      expect(timeframeToMinutes(Timeframe.M20)).toBe(20);
      expect(timeframeToMinutes(Timeframe.H4)).toBe(240);
      expect(timeframeToMinutes(Timeframe.D1)).toBe(1440);
      expect(timeframeToMinutes(Timeframe.W1)).toBe(10080);
    });
  });

  describe('resolveTimeframe', () => {
    it('should fall back to H1 for unknown or missing labels', () => {
      expect(resolveTimeframe('bogus')).toBe(Timeframe.H1);
      expect(resolveTimeframe(undefined)).toBe(Timeframe.H1);
      expect(resolveTimeframe('')).toBe(Timeframe.H1);
    });

    it('should honour an explicit fallback', () => {
      expect(resolveTimeframe('bogus', Timeframe.D1)).toBe(Timeframe.D1);
    });

    it('should resolve known labels', () => {
      expect(resolveTimeframe('m5')).toBe(Timeframe.M5);
      expect(resolveTimeframe(' mn1 ')).toBe(Timeframe.MN1);
    });
  });

  it('should declare timeframes in ascending duration', () => {
    const minutes = Object.values(Timeframe).map(timeframeToMinutes);
    expect(minutes).toHaveLength(21);
    expect(minutes).toEqual([...minutes].sort((a, b) => a - b));
  });
});
