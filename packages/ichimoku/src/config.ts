/**
 * @fileoverview Indicator period defaults and validation.
 *
 * @module @kumo/ichimoku/config
 */

import { InvalidConfigurationError, type IchimokuConfig } from '@kumo/contracts';

/**
 * Classic Ichimoku settings (9 / 26 / 52 / 26).
 */
export const DEFAULT_ICHIMOKU_CONFIG: Readonly<IchimokuConfig> = Object.freeze({
  tenkanPeriod: 9,
  kijunPeriod: 26,
  senkouBPeriod: 52,
  chikouShift: 26,
});

const PERIOD_KEYS = ['tenkanPeriod', 'kijunPeriod', 'senkouBPeriod', 'chikouShift'] as const;

/**
 * Merges overrides onto the defaults and validates every period.
 *
 * @throws {InvalidConfigurationError} If a period is not a positive integer
 */
export function resolveIchimokuConfig(overrides: Partial<IchimokuConfig> = {}): IchimokuConfig {
  const config: IchimokuConfig = {
    tenkanPeriod: overrides.tenkanPeriod ?? DEFAULT_ICHIMOKU_CONFIG.tenkanPeriod,
    kijunPeriod: overrides.kijunPeriod ?? DEFAULT_ICHIMOKU_CONFIG.kijunPeriod,
    senkouBPeriod: overrides.senkouBPeriod ?? DEFAULT_ICHIMOKU_CONFIG.senkouBPeriod,
    chikouShift: overrides.chikouShift ?? DEFAULT_ICHIMOKU_CONFIG.chikouShift,
  };

  for (const key of PERIOD_KEYS) {
    const value = config[key];
    if (!Number.isInteger(value) || value <= 0) {
      throw new InvalidConfigurationError(`${key} must be a positive integer, got ${value}`, {
        setting: key,
        value,
      });
    }
  }

  return config;
}
