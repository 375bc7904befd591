/**
 * Configuration loading and management
 */

import { InvalidConfigurationError } from '@kumo/contracts';
import type { Logger } from '@kumo/logger';
import { configSchema, envMapping, type Config } from './schema.js';

type EnvValue = string | number | boolean;

interface RawConfig {
  [key: string]: EnvValue | RawConfig;
}

export interface LoadConfigOptions {
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

/**
 * Load configuration from environment and defaults
 *
 * @throws {InvalidConfigurationError} With one line per invalid setting
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { env = process.env, logger } = options;
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new InvalidConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, {
      setting: result.error.errors[0]?.path.join('.') ?? '',
      value: issues,
    });
  }

  logger?.info('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

function setNestedProperty(target: RawConfig, path: string, value: EnvValue): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) {
    return;
  }

  let current = target;
  for (const key of keys) {
    const existing = current[key];
    if (typeof existing === 'object') {
      current = existing;
    } else {
      const next: RawConfig = {};
      current[key] = next;
      current = next;
    }
  }

  current[lastKey] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): EnvValue {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Get configuration summary for logging. Credentials are left out.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    server: `${config.server.host}:${config.server.port}`,
    terminal: {
      type: config.terminal.type,
      bridgeUrl: config.terminal.bridgeUrl,
      login: config.terminal.login,
      server: config.terminal.server,
    },
    ichimoku: {
      tenkanPeriod: config.ichimoku.tenkanPeriod,
      kijunPeriod: config.ichimoku.kijunPeriod,
      senkouBPeriod: config.ichimoku.senkouBPeriod,
      chikouShift: config.ichimoku.chikouShift,
    },
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';
