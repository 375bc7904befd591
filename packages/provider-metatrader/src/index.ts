/**
 * @fileoverview Public API of @kumo/provider-metatrader.
 *
 * @module @kumo/provider-metatrader
 */

export {
  MetaTraderConnector,
  DEFAULT_BRIDGE_URL,
  DEFAULT_BRIDGE_TIMEOUT,
} from './connector.js';
export type { TerminalError } from './connector.js';

export { MT5_TIMEFRAME_CODES, getTimeframeCode } from './timeframe.js';

export {
  buildRatesQuery,
  formatRateTime,
  parseDateParam,
  parseRate,
  parseRates,
  DATE_FORMAT,
  QUOTE_TIME_FORMAT,
} from './parser.js';

export type {
  MetaTraderConnectorOptions,
  TerminalCredentials,
  BridgeRate,
  RatesQuery,
} from './types.js';
