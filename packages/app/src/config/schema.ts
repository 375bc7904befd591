/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { Timeframe } from '@kumo/contracts';

const positiveInt = z.number().int().positive();

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
      name: z.string().default('Kumo Suite'),
      version: z.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(0).max(65535).default(5000),
    })
    .default({}),

  terminal: z
    .object({
      type: z.enum(['bridge', 'fixture']).default('bridge'),
      bridgeUrl: z.string().url().default('http://127.0.0.1:8228'),
      timeout: positiveInt.default(10000),
      path: z.coerce.string().optional(),
      login: z.number().int().optional(),
      password: z.coerce.string().optional(),
      server: z.coerce.string().optional(),
    })
    .default({}),

  ichimoku: z
    .object({
      tenkanPeriod: positiveInt.default(9),
      kijunPeriod: positiveInt.default(26),
      senkouBPeriod: positiveInt.default(52),
      chikouShift: positiveInt.default(26),
      minimumCount: positiveInt.default(52),
      defaultCount: positiveInt.default(200),
    })
    .default({}),

  quotes: z
    .object({
      defaultTimeframe: z
        .preprocess(
          (value) => (typeof value === 'string' ? value.toUpperCase() : value),
          z.nativeEnum(Timeframe)
        )
        .default(Timeframe.H1),
      defaultCount: positiveInt.default(100),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Readonly<Record<string, string>> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  HOST: 'server.host',
  PORT: 'server.port',
  TERMINAL_TYPE: 'terminal.type',
  MT5_BRIDGE_URL: 'terminal.bridgeUrl',
  MT5_TIMEOUT: 'terminal.timeout',
  MT5_PATH: 'terminal.path',
  MT5_LOGIN: 'terminal.login',
  MT5_PASSWORD: 'terminal.password',
  MT5_SERVER: 'terminal.server',
  ICHIMOKU_TENKAN_PERIOD: 'ichimoku.tenkanPeriod',
  ICHIMOKU_KIJUN_PERIOD: 'ichimoku.kijunPeriod',
  ICHIMOKU_SENKOU_B_PERIOD: 'ichimoku.senkouBPeriod',
  ICHIMOKU_CHIKOU_SHIFT: 'ichimoku.chikouShift',
  ICHIMOKU_MIN_COUNT: 'ichimoku.minimumCount',
  ICHIMOKU_DEFAULT_COUNT: 'ichimoku.defaultCount',
  QUOTES_DEFAULT_TIMEFRAME: 'quotes.defaultTimeframe',
  QUOTES_DEFAULT_COUNT: 'quotes.defaultCount',
};
