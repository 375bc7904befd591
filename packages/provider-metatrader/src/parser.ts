/**
 * @fileoverview Date parameter parsing and rate normalization.
 *
 * @module @kumo/provider-metatrader/parser
 */

import moment from 'moment-timezone';
import {
  InvalidParameterError,
  QuoteRetrievalError,
  type GetQuotesParams,
  type QuoteBar,
} from '@kumo/contracts';
import type { BridgeRate, RatesQuery } from './types.js';

export const DATE_FORMAT = 'YYYY-MM-DD';
export const QUOTE_TIME_FORMAT = 'YYYY-MM-DD HH:mm:ss';

/**
 * Parses a strict 'YYYY-MM-DD' date as UTC midnight and returns Unix seconds.
 *
 * @throws {InvalidParameterError} If the value is not a real calendar date
 */
export function parseDateParam(value: string, parameter: string): number {
  const parsed = moment.utc(value, DATE_FORMAT, true);
  if (!parsed.isValid()) {
    throw new InvalidParameterError(
      `Invalid ${parameter}: ${value}. Expected format YYYY-MM-DD`,
      { parameter, value }
    );
  }
  return parsed.unix();
}

/**
 * Picks the terminal query mode from the date parameters.
 *
 * Both dates select a range, a start date alone selects `count` bars from
 * that date, otherwise the latest `count` bars. An end date without a start
 * date is validated but otherwise ignored.
 */
export function buildRatesQuery(params: GetQuotesParams, timeframe: number): RatesQuery {
  const { symbol, count, startDate, endDate } = params;

  const dateFrom = startDate ? parseDateParam(startDate, 'start_date') : undefined;
  const dateTo = endDate ? parseDateParam(endDate, 'end_date') : undefined;

  if (dateFrom !== undefined && dateTo !== undefined) {
    return { mode: 'range', symbol, timeframe, date_from: dateFrom, date_to: dateTo };
  }

  if (dateFrom !== undefined) {
    return { mode: 'from', symbol, timeframe, date_from: dateFrom, count };
  }

  return { mode: 'from_pos', symbol, timeframe, start_pos: 0, count };
}

/**
 * Formats terminal Unix seconds as 'YYYY-MM-DD HH:mm:ss' in UTC.
 */
export function formatRateTime(seconds: number): string {
  return moment.unix(seconds).utc().format(QUOTE_TIME_FORMAT);
}

/**
 * Converts one terminal rate into a QuoteBar. Volumes and spread are
 * truncated to integers; spread and real volume are null when the terminal
 * omits them.
 */
export function parseRate(rate: BridgeRate): QuoteBar {
  return {
    time: formatRateTime(rate.time),
    open: rate.open,
    high: rate.high,
    low: rate.low,
    close: rate.close,
    tick_volume: Math.trunc(rate.tick_volume),
    spread: rate.spread === undefined ? null : Math.trunc(rate.spread),
    real_volume: rate.real_volume === undefined ? null : Math.trunc(rate.real_volume),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Validates a /rates answer and converts every row.
 *
 * Each row needs finite numbers for time, OHLC and tick volume; spread and
 * real volume may be omitted or null.
 *
 * @throws {QuoteRetrievalError} If the answer is not an array or a row is malformed
 */
export function parseRates(rates: unknown, provider: string, symbol: string): QuoteBar[] {
  if (!Array.isArray(rates)) {
    throw new QuoteRetrievalError(`Malformed rates for ${symbol}: expected an array`, {
      provider,
      symbol,
      field: 'rates',
      actualType: describeType(rates),
    });
  }

  return rates.map((row: unknown, index) => parseRate(readRate(row, index, provider, symbol)));
}

function readRate(row: unknown, index: number, provider: string, symbol: string): BridgeRate {
  const malformed = (field: string, expected: string, value: unknown): QuoteRetrievalError =>
    new QuoteRetrievalError(
      `Malformed rate at index ${index} for ${symbol}: ${field} must be ${expected}`,
      { provider, symbol, field: `rates[${index}].${field}`, actualType: describeType(value) }
    );

  if (!isRecord(row)) {
    throw malformed('row', 'an object', row);
  }
  const record: Record<string, unknown> = row;

  const required = (field: string): number => {
    const value = record[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw malformed(field, 'a finite number', value);
    }
    return value;
  };

  const optional = (field: string): number | undefined => {
    const value = record[field];
    return value === undefined || value === null ? undefined : required(field);
  };

  const rate: BridgeRate = {
    time: required('time'),
    open: required('open'),
    high: required('high'),
    low: required('low'),
    close: required('close'),
    tick_volume: required('tick_volume'),
  };

  const spread = optional('spread');
  if (spread !== undefined) rate.spread = spread;
  const realVolume = optional('real_volume');
  if (realVolume !== undefined) rate.real_volume = realVolume;

  return rate;
}
