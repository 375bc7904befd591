/**
 * Fixture-based quote source for local development and tests
 */

import {
  QuoteRetrievalError,
  TerminalConnectionError,
  timeframeToMinutes,
  type GetQuotesParams,
  type QuoteBar,
  type QuoteSource,
  type SourceHealth,
} from '@kumo/contracts';
import type { Logger } from '@kumo/logger';
import {
  buildRatesQuery,
  formatRateTime,
  getTimeframeCode,
  type RatesQuery,
} from '@kumo/provider-metatrader';
import { readFileSync } from 'node:fs';
import { z } from 'zod';

const fixtureSymbolSchema = z.object({
  basePrice: z.number().positive(),
  digits: z.number().int().min(0).max(8),
  spread: z.number().int().min(0),
});

export type FixtureSymbol = z.infer<typeof fixtureSymbolSchema>;

/**
 * Loads the bundled symbol table (fixtures/symbols.json).
 */
export function loadFixtureSymbols(): Record<string, FixtureSymbol> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../fixtures/symbols.json', import.meta.url), 'utf8')
  );
  return z.record(fixtureSymbolSchema).parse(raw);
}

export interface FixtureQuoteSourceConfig {
  logger?: Logger;

  /** Clock used for "latest bars" requests, in epoch milliseconds */
  now?: () => number;

  /** Replaces the bundled symbol table */
  symbols?: Record<string, FixtureSymbol>;
}

/** Upper bound on bars generated for a single request */
export const MAX_FIXTURE_BARS = 50_000;

/**
 * Seeded random number generator for deterministic fixtures
 */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return function () {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (hash * 31 + value.charCodeAt(i)) >>> 0;
  }
  return hash;
}

function round(value: number, digits: number): number {
  return parseFloat(value.toFixed(digits));
}

/**
 * Quote source that synthesizes bars instead of asking a terminal.
 *
 * Every bar is a pure function of (symbol, timeframe, bar open time), so
 * overlapping requests agree and test runs are reproducible.
 */
export class FixtureQuoteSource implements QuoteSource {
  readonly id = 'fixture';

  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly symbols: Record<string, FixtureSymbol>;
  private connected = false;

  constructor(config: FixtureQuoteSourceConfig = {}) {
    this.logger = config.logger;
    this.now = config.now ?? Date.now;
    this.symbols = config.symbols ?? loadFixtureSymbols();
  }

  async initialize(): Promise<boolean> {
    this.connected = true;
    this.logger?.info('Fixture quote source initialized', {
      symbols: Object.keys(this.symbols).length,
    });
    return true;
  }

  async shutdown(): Promise<void> {
    this.connected = false;
    this.logger?.info('Fixture quote source shut down');
  }

  async isConnected(): Promise<boolean> {
    return this.connected;
  }

  async healthCheck(): Promise<SourceHealth> {
    return {
      healthy: this.connected,
      message: this.connected ? 'Fixture source ready' : 'Fixture source not initialized',
      details: { provider: this.id, symbols: Object.keys(this.symbols).length },
    };
  }

  async getSymbols(): Promise<string[]> {
    this.ensureConnected();
    return Object.keys(this.symbols);
  }

  /**
   * Same query modes as the terminal: range, count from a start date, or
   * the latest `count` bars. A range containing no bar open time yields [].
   */
  async getQuotes(params: GetQuotesParams): Promise<QuoteBar[]> {
    this.ensureConnected();

    const profile = this.symbols[params.symbol];
    if (!profile) {
      throw new QuoteRetrievalError(`Failed to get rates for ${params.symbol}`, {
        provider: this.id,
        symbol: params.symbol,
        lastError: { code: -4, message: 'Terminal: Not found' },
      });
    }

    const query = buildRatesQuery(params, getTimeframeCode(params.timeframe));
    const interval = timeframeToMinutes(params.timeframe) * 60;

    const { last, ...range } = this.slotRange(query, interval);
    const first = Math.max(range.first, last - MAX_FIXTURE_BARS + 1);

    const seed = hashString(`${params.symbol}:${params.timeframe}`);
    const bars: QuoteBar[] = [];
    for (let slot = first; slot <= last; slot++) {
      bars.push(this.generateBar(profile, seed, slot, interval));
    }

    this.logger?.debug('Fixture source returning quotes', {
      symbol: params.symbol,
      timeframe: params.timeframe,
      mode: query.mode,
      count: bars.length,
    });

    return bars;
  }

  /**
   * First and last bar slot (open time / interval) covered by a query.
   */
  private slotRange(query: RatesQuery, interval: number): { first: number; last: number } {
    switch (query.mode) {
      case 'range':
        return {
          first: Math.ceil(query.date_from / interval),
          last: Math.floor(query.date_to / interval),
        };
      case 'from': {
        const first = Math.ceil(query.date_from / interval);
        return { first, last: first + query.count - 1 };
      }
      case 'from_pos': {
        const last = Math.floor(this.now() / 1000 / interval) - query.start_pos;
        return { first: last - query.count + 1, last };
      }
    }
  }

  private closeAt(profile: FixtureSymbol, seed: number, slot: number): number {
    const random = seededRandom(seed ^ Math.imul(slot, 2654435761));
    const wave = Math.sin(slot / 40) * 0.012 + Math.sin(slot / 9) * 0.004;
    const noise = (random() - 0.5) * 0.002;
    return profile.basePrice * (1 + wave + noise);
  }

  private generateBar(profile: FixtureSymbol, seed: number, slot: number, interval: number): QuoteBar {
    const random = seededRandom(seed + slot * 7919);
    const open = this.closeAt(profile, seed, slot - 1);
    const close = this.closeAt(profile, seed, slot);
    const range = profile.basePrice * 0.0015;
    const high = Math.max(open, close) + random() * range;
    const low = Math.min(open, close) - random() * range;

    return {
      time: formatRateTime(slot * interval),
      open: round(open, profile.digits),
      high: round(high, profile.digits),
      low: round(low, profile.digits),
      close: round(close, profile.digits),
      tick_volume: 100 + Math.floor(random() * 900),
      spread: profile.spread,
      real_volume: 0,
    };
  }

  private ensureConnected(): void {
    if (!this.connected) {
      throw new TerminalConnectionError('Fixture source is not initialized', {
        provider: this.id,
      });
    }
  }
}
