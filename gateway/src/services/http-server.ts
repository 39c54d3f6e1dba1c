/**
 * HTTP Server - принимает локальные запросы и отдаёт их в ForwardingEngine
 */

import { Server } from 'http';
import { AddressInfo } from 'net';
import cors from 'cors';
import express, { Express, NextFunction, Request, Response } from 'express';
import { ErrorCode, GatewayError, HttpConfig } from '../types';
import { Logger } from '../utils/logger';
import { createRoutes, RouteDependencies, sendError } from './routes';

export interface AppDependencies extends RouteDependencies {
  corsOrigin: string;
  logger: Logger;
}

function hasHttpStatus(error: unknown): error is { status: number } {
  return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';
}

export function createApp(deps: AppDependencies): Express {
  const { logger } = deps;
  const app = express();

  app.disable('x-powered-by');
  // Тело upstream отдаётся как есть: без ETag и ответов 304 от express
  app.set('etag', false);

  app.use(cors({ origin: deps.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.info('REQUEST_COMPLETED', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - startedAt,
      });
    });
    next();
  });

  app.use(createRoutes(deps));

  app.use((req: Request, res: Response) => {
    sendError(res, new GatewayError(ErrorCode.NOT_FOUND, `Route ${req.method} ${req.path} not found`, 404));
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof GatewayError) {
      sendError(res, error);
      return;
    }

    // Ошибки body-parser (битый JSON, слишком большое тело) приходят со статусом 4xx
    if (hasHttpStatus(error) && error.status >= 400 && error.status < 500) {
      sendError(res, new GatewayError(ErrorCode.INVALID_REQUEST, 'Invalid request body', error.status));
      return;
    }

    logger.error('UNHANDLED_ERROR', error instanceof Error ? error : String(error), {
      method: req.method,
      path: req.path,
    });
    sendError(res, new GatewayError(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', 500));
  });

  return app;
}

export class HttpServer {
  private server: Server | null = null;
  private config: HttpConfig;
  private app: Express;
  private logger: Logger;

  constructor(config: HttpConfig, app: Express, logger: Logger) {
    this.config = config;
    this.app = app;
    this.logger = logger;
  }

  async start(): Promise<AddressInfo> {
    const server = this.app.listen(this.config.port, this.config.host);
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('listening', resolve);
      server.once('error', reject);
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new GatewayError(ErrorCode.INTERNAL_ERROR, 'HTTP server has no TCP address');
    }

    this.logger.info('HTTP_SERVER_STARTED', { host: address.address, port: address.port });
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });

    this.logger.info('HTTP_SERVER_STOPPED');
  }
}

export default HttpServer;
