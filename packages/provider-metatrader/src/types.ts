/**
 * @fileoverview Terminal bridge wire types and connector options.
 *
 * The bridge is a small HTTP gateway running next to the MetaTrader 5
 * terminal. It exposes the terminal functions as JSON endpoints and
 * answers `null` where the terminal itself returns nothing.
 *
 * @module @kumo/provider-metatrader/types
 */

import type { AxiosInstance } from 'axios';
import type { Logger } from '@kumo/logger';

/**
 * Login parameters forwarded to the terminal on initialize. All optional:
 * without them the terminal reuses its currently logged-in account.
 */
export interface TerminalCredentials {
  /** Path to terminal64.exe */
  path?: string;
  login?: number;
  password?: string;
  server?: string;
}

export interface MetaTraderConnectorOptions {
  /** Bridge base URL (default http://127.0.0.1:8228) */
  bridgeUrl?: string;

  /** Request timeout in milliseconds (default 10000) */
  timeout?: number;

  /** Used on initialize() when no credentials are passed explicitly */
  credentials?: TerminalCredentials;

  /** Pre-configured client; replaces bridgeUrl/timeout when given */
  httpClient?: AxiosInstance;

  logger?: Logger;
}

/** One row of a copy_rates_* answer. `time` is Unix seconds. */
export interface BridgeRate {
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  tick_volume: number;
  spread?: number;
  real_volume?: number;
}

export interface BridgeInitializeResponse {
  ok: boolean;
}

export interface BridgeTerminalInfoResponse {
  terminal_info: {
    connected?: boolean;
    name?: string;
    build?: number;
    company?: string;
  } | null;
}

export interface BridgeAccountInfoResponse {
  account_info: {
    login: number;
    server: string;
    currency?: string;
  } | null;
}

/** Rows are checked by parseRates before use. */
export interface BridgeRatesResponse {
  rates?: unknown;
}

export interface BridgeSymbolsResponse {
  symbols: Array<{ name: string }> | null;
}

export interface BridgeLastErrorResponse {
  code: number;
  message: string;
}

/**
 * Query for GET /rates, one shape per terminal copy function.
 */
export type RatesQuery =
  | { mode: 'range'; symbol: string; timeframe: number; date_from: number; date_to: number }
  | { mode: 'from'; symbol: string; timeframe: number; date_from: number; count: number }
  | { mode: 'from_pos'; symbol: string; timeframe: number; start_pos: number; count: number };
