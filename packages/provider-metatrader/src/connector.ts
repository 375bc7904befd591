/**
 * @fileoverview MetaTrader 5 quote source.
 *
 * Talks to the terminal through its HTTP bridge. Session state is a single
 * connected flag set by initialize() and cleared by shutdown(); every data
 * call also confirms the terminal still answers before querying it.
 *
 * @module @kumo/provider-metatrader/connector
 */

import axios, { type AxiosInstance } from 'axios';
import {
  QuoteRetrievalError,
  TerminalConnectionError,
  type GetQuotesParams,
  type QuoteBar,
  type QuoteSource,
  type SourceHealth,
} from '@kumo/contracts';
import { startTimer, type Logger } from '@kumo/logger';
import { buildRatesQuery, parseRates } from './parser.js';
import { getTimeframeCode } from './timeframe.js';
import type {
  BridgeAccountInfoResponse,
  BridgeInitializeResponse,
  BridgeLastErrorResponse,
  BridgeRatesResponse,
  BridgeSymbolsResponse,
  BridgeTerminalInfoResponse,
  MetaTraderConnectorOptions,
  TerminalCredentials,
} from './types.js';

export const DEFAULT_BRIDGE_URL = 'http://127.0.0.1:8228';
export const DEFAULT_BRIDGE_TIMEOUT = 10_000;

/**
 * Terminal error as reported by last_error, or a local description when the
 * bridge itself could not be reached.
 */
export interface TerminalError {
  code: number;
  message: string;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class MetaTraderConnector implements QuoteSource {
  readonly id = 'metatrader';

  private readonly http: AxiosInstance;
  private readonly credentials: TerminalCredentials;
  private readonly logger?: Logger;
  private connected = false;

  constructor(options: MetaTraderConnectorOptions = {}) {
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.bridgeUrl ?? DEFAULT_BRIDGE_URL,
        timeout: options.timeout ?? DEFAULT_BRIDGE_TIMEOUT,
      });
    this.credentials = options.credentials ?? {};
    this.logger = options.logger?.child({ component: 'metatrader' });
  }

  /**
   * Opens the terminal session. Resolves false instead of throwing.
   */
  async initialize(credentials: TerminalCredentials = this.credentials): Promise<boolean> {
    try {
      const { data } = await this.http.post<BridgeInitializeResponse>('/initialize', credentials);

      if (!data.ok) {
        const lastError = await this.getLastError();
        this.logger?.error('MetaTrader5 initialization failed', { last_error: lastError });
        this.connected = false;
        return false;
      }

      this.connected = true;
      this.logger?.info('MetaTrader5 initialized successfully');

      const account = await this.http.get<BridgeAccountInfoResponse>('/account_info');
      if (account.data.account_info) {
        this.logger?.info('Connected to account', {
          login: account.data.account_info.login,
          server: account.data.account_info.server,
        });
      }

      return true;
    } catch (error) {
      this.logger?.error('Error initializing MetaTrader5', { error: describeError(error) });
      this.connected = false;
      return false;
    }
  }

  /**
   * True when initialized and the terminal still reports its info.
   */
  async isConnected(): Promise<boolean> {
    if (!this.connected) {
      return false;
    }

    try {
      const { data } = await this.http.get<BridgeTerminalInfoResponse>('/terminal_info');
      return data.terminal_info !== null;
    } catch (error) {
      this.logger?.warn('Terminal info unavailable', { error: describeError(error) });
      return false;
    }
  }

  async shutdown(): Promise<void> {
    try {
      await this.http.post('/shutdown');
    } catch (error) {
      this.logger?.warn('Terminal shutdown request failed', { error: describeError(error) });
    } finally {
      this.connected = false;
    }
    this.logger?.info('MetaTrader5 connection closed');
  }

  /**
   * Retrieves bars for one symbol.
   *
   * @throws {TerminalConnectionError} If the session is not established
   * @throws {InvalidParameterError} If a date is not 'YYYY-MM-DD'
   * @throws {QuoteRetrievalError} If the terminal returns no rates or malformed ones
   */
  async getQuotes(params: GetQuotesParams): Promise<QuoteBar[]> {
    await this.ensureConnected();

    const query = buildRatesQuery(params, getTimeframeCode(params.timeframe));
    const timer = startTimer();

    let rates: BridgeRatesResponse['rates'];
    try {
      const { data } = await this.http.get<BridgeRatesResponse>('/rates', { params: query });
      rates = data.rates;
    } catch (error) {
      this.logger?.error('Error getting quotes', {
        symbol: params.symbol,
        error: describeError(error),
      });
      throw new QuoteRetrievalError(
        `Error getting quotes for ${params.symbol}: ${describeError(error)}`,
        { provider: this.id, symbol: params.symbol }
      );
    }

    if (rates === null || rates === undefined || (Array.isArray(rates) && rates.length === 0)) {
      const lastError = await this.getLastError();
      this.logger?.error('Failed to get rates', { symbol: params.symbol, last_error: lastError });
      throw new QuoteRetrievalError(`Failed to get rates for ${params.symbol}`, {
        provider: this.id,
        symbol: params.symbol,
        lastError,
      });
    }

    let quotes: QuoteBar[];
    try {
      quotes = parseRates(rates, this.id, params.symbol);
    } catch (error) {
      this.logger?.error('Malformed rates', {
        symbol: params.symbol,
        error: describeError(error),
      });
      throw error;
    }

    this.logger?.info('Retrieved quotes', {
      symbol: params.symbol,
      timeframe: params.timeframe,
      mode: query.mode,
      count: quotes.length,
      duration_ms: timer.stop(),
    });

    return quotes;
  }

  /**
   * Lists every symbol the terminal knows.
   *
   * @throws {TerminalConnectionError} If the session is not established
   * @throws {QuoteRetrievalError} If the terminal returns no symbol list
   */
  async getSymbols(): Promise<string[]> {
    await this.ensureConnected();

    let symbols: BridgeSymbolsResponse['symbols'];
    try {
      const { data } = await this.http.get<BridgeSymbolsResponse>('/symbols');
      symbols = data.symbols;
    } catch (error) {
      this.logger?.error('Error getting symbols', { error: describeError(error) });
      throw new QuoteRetrievalError(`Error getting symbols: ${describeError(error)}`, {
        provider: this.id,
      });
    }

    if (!symbols) {
      const lastError = await this.getLastError();
      this.logger?.error('Failed to get symbols', { last_error: lastError });
      throw new QuoteRetrievalError('Failed to get symbols', { provider: this.id, lastError });
    }

    const names = symbols.map((symbol) => symbol.name);
    this.logger?.info('Retrieved symbols', { count: names.length });
    return names;
  }

  async healthCheck(): Promise<SourceHealth> {
    const connected = await this.isConnected();
    return {
      healthy: connected,
      message: connected ? 'Terminal connected' : 'Terminal not connected',
      details: { provider: this.id, baseURL: this.http.defaults.baseURL },
    };
  }

  /**
   * Reads the terminal's last error. Never throws.
   */
  async getLastError(): Promise<TerminalError> {
    try {
      const { data } = await this.http.get<BridgeLastErrorResponse>('/last_error');
      return { code: data.code, message: data.message };
    } catch (error) {
      return { code: -1, message: `Bridge unreachable: ${describeError(error)}` };
    }
  }

  private async ensureConnected(): Promise<void> {
    if (!(await this.isConnected())) {
      this.logger?.error('MetaTrader5 is not connected');
      throw new TerminalConnectionError('MetaTrader5 is not connected', { provider: this.id });
    }
  }
}
