/**
 * @fileoverview Main entry point for @kumo/contracts.
 *
 * @module @kumo/contracts
 */

// Timeframes
export {
  Timeframe,
  isValidTimeframe,
  timeframeToMinutes,
  resolveTimeframe,
} from './timeframes.js';

// Market data types
export type { Bar, QuoteBar, GetQuotesParams, QuoteSource, SourceHealth } from './market.js';

// Ichimoku output types
export type {
  CloudStatus,
  SignalType,
  IchimokuConfig,
  IchimokuValues,
  SignalConditions,
  IchimokuSignal,
  EnrichedBar,
} from './ichimoku.js';

// Error classes and guards
export {
  KumoError,
  InvalidConfigurationError,
  InvalidParameterError,
  TerminalConnectionError,
  QuoteRetrievalError,
  isKumoError,
  isInvalidConfigurationError,
  isInvalidParameterError,
  isTerminalConnectionError,
  isQuoteRetrievalError,
} from './errors.js';
