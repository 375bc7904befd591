/**
 * @fileoverview Market data types and the quote-source contract.
 *
 * Pure data structures with no I/O. The indicator engine consumes {@link Bar}
 * sequences; quote sources (the terminal connector, the fixture source)
 * produce {@link QuoteBar} sequences, which are Bars.
 *
 * @module @kumo/contracts/market
 */

import type { Timeframe } from './timeframes.js';

/**
 * A single OHLC record as consumed by the indicator engine.
 *
 * Any numeric field may be absent on an individual bar (`null` or missing).
 * The engine degrades such bars to absent indicator values instead of
 * failing.
 *
 * @invariant high >= low is assumed by the caller, not enforced
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   time: '2025-01-15 14:00:00',
 *   open: 1.0841,
 *   high: 1.0862,
 *   low: 1.0835,
 *   close: 1.0857,
 * };
 * ```
 */
export interface Bar {
  /** Opaque bar timestamp, passed through unchanged */
  time?: string | null;

  /** Opening price */
  open?: number | null;

  /** Highest price during the period */
  high?: number | null;

  /** Lowest price during the period */
  low?: number | null;

  /** Closing price */
  close?: number | null;
}

/**
 * A bar as returned by the trading terminal.
 *
 * @invariant time is formatted 'YYYY-MM-DD HH:mm:ss' in UTC
 */
export interface QuoteBar {
  time: string;
  open: number;
  high: number;
  low: number;
  close: number;

  /** Number of ticks in the period */
  tick_volume: number;

  /** Spread in points, when the terminal reports it */
  spread: number | null;

  /** Exchange volume, when the terminal reports it */
  real_volume: number | null;
}

/**
 * Parameters for requesting quotes from a source.
 *
 * Date handling follows the terminal's three query modes:
 * - startDate and endDate: every bar in the range
 * - startDate only: `count` bars starting at startDate
 * - neither: the latest `count` bars
 *
 * @invariant count > 0
 * @invariant startDate / endDate are 'YYYY-MM-DD' when present
 */
export interface GetQuotesParams {
  /** Instrument name as known to the terminal (e.g. 'EURUSD') */
  symbol: string;

  /** Chart period */
  timeframe: Timeframe;

  /** Number of bars to retrieve */
  count: number;

  /** Range start, 'YYYY-MM-DD' */
  startDate?: string;

  /** Range end, 'YYYY-MM-DD' */
  endDate?: string;
}

/**
 * Health snapshot reported by a quote source.
 */
export interface SourceHealth {
  healthy: boolean;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Anything that can serve quotes and symbol lists to the HTTP layer.
 *
 * Implementations throw typed errors from `@kumo/contracts` on failure
 * (TerminalConnectionError, QuoteRetrievalError, InvalidParameterError).
 */
export interface QuoteSource {
  /** Identifier used in logs (e.g. 'metatrader', 'fixture') */
  readonly id: string;

  /** Opens the session. Resolves false instead of throwing on failure. */
  initialize(): Promise<boolean>;

  /** Closes the session. */
  shutdown(): Promise<void>;

  /** Whether the session is usable right now. */
  isConnected(): Promise<boolean>;

  getQuotes(params: GetQuotesParams): Promise<QuoteBar[]>;

  getSymbols(): Promise<string[]>;

  healthCheck(): Promise<SourceHealth>;
}
