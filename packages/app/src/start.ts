#!/usr/bin/env node

/**
 * Main application entry point
 * Loads configuration, connects the quote source and starts the HTTP API
 */

// Load environment variables from .env file
import 'dotenv/config';

import {
  createLogger,
  attachGlobalHandlers,
  withRequestContext,
  startTimer,
  type Logger,
} from '@kumo/logger';
import type { QuoteSource } from '@kumo/contracts';
import { loadConfig, getConfigSummary } from './config/index.js';
import { createQuoteSource } from './services/providers/index.js';
import { HttpServer } from './server/http-server.js';

/**
 * Main startup function
 */
async function start(): Promise<void> {
  let logger: Logger | undefined;
  let source: QuoteSource | undefined;

  try {
    const config = loadConfig();

    logger = createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    });

    attachGlobalHandlers(logger);

    const rootLogger = logger;
    const activeSource = createQuoteSource(config, rootLogger);
    source = activeSource;

    const httpServer = await withRequestContext(async () => {
      const startupTimer = startTimer();

      rootLogger.info('Starting Kumo Suite', {
        ...getConfigSummary(config),
        operation: 'app_startup',
      });

      const connected = await activeSource.initialize();
      if (!connected) {
        rootLogger.warn('Terminal connection failed. Some endpoints may not work.', {
          source: activeSource.id,
        });
      }

      const server = new HttpServer({
        port: config.server.port,
        host: config.server.host,
        logger: rootLogger.child({ component: 'http-server' }),
        source: activeSource,
        quotes: config.quotes,
        ichimoku: config.ichimoku,
      });
      await server.start();

      rootLogger.info('Kumo Suite startup complete', {
        operation: 'app_startup',
        duration_ms: startupTimer.stop(),
        result: 'success',
      });

      return server;
    });

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;

      rootLogger.info('Shutting down...', { signal });
      try {
        await httpServer.stop();
        await activeSource.shutdown();
        process.exitCode = 0;
      } catch (error) {
        rootLogger.error('Error during shutdown', { error });
        process.exitCode = 1;
      }
      rootLogger.end();
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.on(signal, () => {
        void shutdown(signal);
      });
    }
  } catch (error) {
    if (logger) {
      logger.error('Application startup failed', { error });
    } else {
      console.error('Application startup failed:', error);
    }

    if (source) {
      try {
        await source.shutdown();
      } catch (shutdownError) {
        console.error('Error during shutdown:', shutdownError);
      }
    }

    process.exit(1);
  }
}

start().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
