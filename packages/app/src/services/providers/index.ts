/**
 * Quote source selection
 */

import type { QuoteSource } from '@kumo/contracts';
import type { Logger } from '@kumo/logger';
import { MetaTraderConnector } from '@kumo/provider-metatrader';
import type { Config } from '../../config/index.js';
import { FixtureQuoteSource } from './fixture-provider.js';

/**
 * Builds the quote source named by `terminal.type`
 */
export function createQuoteSource(config: Config, logger: Logger): QuoteSource {
  const { terminal } = config;

  if (terminal.type === 'fixture') {
    return new FixtureQuoteSource({ logger: logger.child({ component: 'fixture-source' }) });
  }

  return new MetaTraderConnector({
    bridgeUrl: terminal.bridgeUrl,
    timeout: terminal.timeout,
    credentials: {
      path: terminal.path,
      login: terminal.login,
      password: terminal.password,
      server: terminal.server,
    },
    logger,
  });
}

export { FixtureQuoteSource, loadFixtureSymbols, MAX_FIXTURE_BARS } from './fixture-provider.js';
export type { FixtureQuoteSourceConfig, FixtureSymbol } from './fixture-provider.js';
