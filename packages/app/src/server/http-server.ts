/**
 * HTTP API server for Kumo Suite
 * Serves terminal quotes, symbols and Ichimoku Cloud signals
 */

import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from 'express';
import type { AddressInfo } from 'node:net';
import {
  Timeframe,
  isInvalidParameterError,
  resolveTimeframe,
  type QuoteBar,
  type QuoteSource,
  type SourceHealth,
} from '@kumo/contracts';
import { IchimokuCalculator } from '@kumo/ichimoku';
import { requestIdMiddleware, startTimer, type Logger } from '@kumo/logger';
import type { Config } from '../config/index.js';
import { parseIntegerParam, readQueryString } from './params.js';

export interface HttpServerConfig {
  port: number;
  host: string;
  logger: Logger;
  source: QuoteSource;
  quotes: Config['quotes'];
  ichimoku: Config['ichimoku'];
}

export interface ErrorResponse {
  error: string;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP server for handling API requests
 */
export class HttpServer {
  private app: Express;
  private logger: Logger;
  private source: QuoteSource;
  private calculator: IchimokuCalculator;
  private server?: ReturnType<Express['listen']>;

  constructor(private config: HttpServerConfig) {
    this.logger = config.logger;
    this.source = config.source;
    this.calculator = new IchimokuCalculator({
      tenkanPeriod: config.ichimoku.tenkanPeriod,
      kijunPeriod: config.ichimoku.kijunPeriod,
      senkouBPeriod: config.ichimoku.senkouBPeriod,
      chikouShift: config.ichimoku.chikouShift,
      logger: this.logger.child({ component: 'ichimoku' }),
    });
    this.app = express();
    this.app.disable('x-powered-by');
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * The Express application, for mounting or in-process testing
   */
  get express(): Express {
    return this.app;
  }

  /**
   * Bound address once listening
   */
  get address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(requestIdMiddleware());

    // Request logging
    this.app.use((req, res, next) => {
      const timer = startTimer();
      res.on('finish', () => {
        this.logger.info('HTTP request', {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration_ms: timer.stop(),
        });
      });
      next();
    });
  }

  /**
   * Setup API routes
   */
  private setupRoutes(): void {
    this.app.get('/health', async (_req: Request, res: Response) => {
      let health: SourceHealth = { healthy: false };
      try {
        health = await this.source.healthCheck();
      } catch (error) {
        this.logger.warn('Health check failed', { error: describeError(error) });
      }
      if (!health.healthy) {
        this.logger.debug('Quote source unhealthy', {
          source: this.source.id,
          message: health.message,
        });
      }
      res.json({ status: 'healthy', mt_connected: health.healthy });
    });

    this.app.get('/quotes', async (req: Request, res: Response) => {
      const symbol = readQueryString(req, 'symbol');
      if (!symbol) {
        res.status(400).json({ error: 'symbol parameter is required' } satisfies ErrorResponse);
        return;
      }

      const timeframe = resolveTimeframe(
        readQueryString(req, 'timeframe'),
        this.config.quotes.defaultTimeframe
      );
      const requested = parseIntegerParam(readQueryString(req, 'count'));
      const count =
        requested !== undefined && requested > 0 ? requested : this.config.quotes.defaultCount;

      try {
        const data = await this.source.getQuotes({
          symbol,
          timeframe,
          count,
          startDate: readQueryString(req, 'start_date'),
          endDate: readQueryString(req, 'end_date'),
        });

        res.json({ symbol, timeframe, count: data.length, data });
      } catch (error) {
        if (isInvalidParameterError(error)) {
          res.status(400).json({ error: error.message } satisfies ErrorResponse);
          return;
        }

        this.logger.error('Error getting quotes', { symbol, error: describeError(error) });
        res.status(500).json({ error: 'Failed to retrieve quotes data' } satisfies ErrorResponse);
      }
    });

    this.app.get('/symbols', async (_req: Request, res: Response) => {
      try {
        const symbols = await this.source.getSymbols();
        res.json({ symbols });
      } catch (error) {
        this.logger.error('Error getting symbols', { error: describeError(error) });
        res.status(500).json({ error: 'Failed to retrieve symbols' } satisfies ErrorResponse);
      }
    });

    this.app.get('/ichimoku', async (req: Request, res: Response) => {
      const symbol = readQueryString(req, 'symbol');
      if (!symbol) {
        res.status(400).json({ error: 'symbol parameter is required' } satisfies ErrorResponse);
        return;
      }

      const { minimumCount, defaultCount } = this.config.ichimoku;
      let count = parseIntegerParam(readQueryString(req, 'count')) ?? defaultCount;
      if (count < minimumCount) {
        this.logger.warn('Count too low for Ichimoku, using default', {
          requested: count,
          minimum: minimumCount,
          count: defaultCount,
        });
        count = defaultCount;
      }

      let quotes: QuoteBar[];
      try {
        quotes = await this.source.getQuotes({
          symbol,
          timeframe: Timeframe.H1,
          count,
          startDate: readQueryString(req, 'start_date'),
          endDate: readQueryString(req, 'end_date'),
        });
      } catch (error) {
        if (isInvalidParameterError(error)) {
          res.status(400).json({ error: error.message } satisfies ErrorResponse);
          return;
        }

        this.logger.error('Error getting Ichimoku data', { symbol, error: describeError(error) });
        res.status(500).json({ error: 'Failed to retrieve quotes data' } satisfies ErrorResponse);
        return;
      }

      if (quotes.length === 0) {
        res.status(404).json({ error: 'No quotes data available' } satisfies ErrorResponse);
        return;
      }

      const data = this.calculator.calculateWithSignals(quotes);
      const latest = data.at(-1);

      res.json({
        symbol,
        timeframe: Timeframe.H1,
        total_candles: data.length,
        latest_signal: latest ? latest.signal : null,
        data,
      });
    });

    // 404 handler
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' } satisfies ErrorResponse);
    });

    // Error handler (express recognises it by arity)
    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      this.logger.error('Unhandled request error', { error: describeError(error) });
      res.status(500).json({ error: describeError(error) } satisfies ErrorResponse);
    });
  }

  /**
   * Start the HTTP server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.server = this.app.listen(this.config.port, this.config.host, () => {
          const bound = this.address;
          this.logger.info('HTTP server started', {
            host: this.config.host,
            port: bound?.port ?? this.config.port,
            url: `http://${this.config.host}:${bound?.port ?? this.config.port}`,
          });
          resolve();
        });

        this.server.on('error', (error) => {
          this.logger.error('HTTP server error', { error });
          reject(error);
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  /**
   * Stop the HTTP server
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }

      this.server.close((error) => {
        if (error) {
          this.logger.error('Error stopping HTTP server', { error });
          reject(error);
        } else {
          this.server = undefined;
          this.logger.info('HTTP server stopped');
          resolve();
        }
      });
    });
  }
}
