/**
 * Tests for configuration loading
 */

import { describe, it, expect, vi } from 'vitest';
import { InvalidConfigurationError, Timeframe } from '@kumo/contracts';
import { createLogger } from '@kumo/logger';
import { loadConfig, getConfigSummary } from '../src/config/index.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({ env: {} });

    expect(config.app.env).toBe('development');
    expect(config.server).toEqual({ host: '0.0.0.0', port: 5000 });
    expect(config.terminal).toEqual({
      type: 'bridge',
      bridgeUrl: 'http://127.0.0.1:8228',
      timeout: 10000,
    });
    expect(config.ichimoku).toEqual({
      tenkanPeriod: 9,
      kijunPeriod: 26,
      senkouBPeriod: 52,
      chikouShift: 26,
      minimumCount: 52,
      defaultCount: 200,
    });
    expect(config.quotes).toEqual({ defaultTimeframe: Timeframe.H1, defaultCount: 100 });
    expect(config.logging).toEqual({ level: 'info', format: 'pretty' });
  });

  it('should map environment variables onto nested settings', () => {
    const config = loadConfig({
      env: {
        NODE_ENV: 'production',
        PORT: '8080',
        LOG_FORMAT: 'json',
        TERMINAL_TYPE: 'fixture',
        MT5_LOGIN: '5001',
        MT5_PASSWORD: '12345',
        ICHIMOKU_TENKAN_PERIOD: '7',
        QUOTES_DEFAULT_TIMEFRAME: 'h4',
      },
    });

    expect(config.app.env).toBe('production');
    expect(config.server.port).toBe(8080);
    expect(config.logging.format).toBe('json');
    expect(config.terminal.type).toBe('fixture');
    expect(config.terminal.login).toBe(5001);
    expect(config.terminal.password).toBe('12345');
    expect(config.ichimoku.tenkanPeriod).toBe(7);
    expect(config.quotes.defaultTimeframe).toBe(Timeframe.H4);
  });

  it('should ignore empty variables', () => {
    expect(loadConfig({ env: { PORT: '' } }).server.port).toBe(5000);
  });

  it('should report every invalid setting', () => {
    const load = () =>
      loadConfig({ env: { PORT: 'abc', ICHIMOKU_KIJUN_PERIOD: '0', TERMINAL_TYPE: 'zmq' } });

    expect(load).toThrow(InvalidConfigurationError);
    expect(load).toThrow(/server\.port/);
    expect(load).toThrow(/ichimoku\.kijunPeriod/);
    expect(load).toThrow(/terminal\.type/);
  });

  it('should log a summary without credentials', () => {
    const logger = createLogger({ level: 'info', console: false });
    const infoSpy = vi.spyOn(logger, 'info');

    const config = loadConfig({ env: { MT5_PASSWORD: 'test-secret' }, logger });

    expect(infoSpy).toHaveBeenCalledWith('Configuration loaded', getConfigSummary(config));
    expect(JSON.stringify(getConfigSummary(config))).not.toContain('test-secret');
  });
});
