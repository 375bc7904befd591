/**
 * Main exports for @kumo/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config, LoadConfigOptions } from './config/index.js';

// Quote sources
export {
  createQuoteSource,
  FixtureQuoteSource,
  loadFixtureSymbols,
  MAX_FIXTURE_BARS,
} from './services/providers/index.js';
export type { FixtureQuoteSourceConfig, FixtureSymbol } from './services/providers/index.js';

// HTTP server
export { HttpServer } from './server/http-server.js';
export type { HttpServerConfig, ErrorResponse } from './server/http-server.js';
export { parseIntegerParam, readQueryString } from './server/params.js';
