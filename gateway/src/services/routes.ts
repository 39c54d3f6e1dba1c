/**
 * Routes - HTTP маршруты gateway
 *
 * 1. GET /health - статус и наличие credentials (без ключей)
 * 2. ALL /api/* - универсальный проброс в upstream
 * 3. Короткие маршруты: /balance, /markets, /market/:ticker, /positions, /orders
 */

import { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { ForwardingEngine } from '../core/forwarding-engine';
import {
  ErrorCode,
  ForwardRequest,
  ForwardResult,
  GatewayError,
  HealthStatus,
  HTTP_METHODS,
  HttpMethod,
} from '../types';

export interface RouteDependencies {
  engine: ForwardingEngine;
  health: () => HealthStatus;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function sendError(res: Response, error: GatewayError): void {
  res.status(error.status).json(error.toErrorBody());
}

function sendResult(res: Response, result: ForwardResult): void {
  res.status(result.status);
  // setHeader, а не res.set: express дописал бы charset к Content-Type upstream
  if (result.contentType) {
    res.setHeader('Content-Type', result.contentType);
  }
  res.send(result.body);
}

/**
 * Query как пришёл от клиента, включая повторяющиеся ключи
 */
function rawQuery(req: Request): URLSearchParams {
  const index = req.originalUrl.indexOf('?');
  return new URLSearchParams(index === -1 ? '' : req.originalUrl.slice(index + 1));
}

function hasBody(req: Request): boolean {
  const length = req.headers['content-length'];
  return req.headers['transfer-encoding'] !== undefined || (length !== undefined && length !== '0');
}

function jsonBody(req: Request): unknown {
  if (!hasBody(req)) return undefined;

  if (!req.is('application/json')) {
    throw new GatewayError(ErrorCode.INVALID_REQUEST, 'Request body must be JSON', 415);
  }

  const body: unknown = req.body;
  return body;
}

function isNonEmptyObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
}

function toMethod(method: string): HttpMethod {
  const upper = method.toUpperCase();
  const match = HTTP_METHODS.find((candidate) => candidate === upper);
  if (!match) {
    throw new GatewayError(ErrorCode.INVALID_REQUEST, `Method ${upper} is not supported`, 405);
  }
  return match;
}

/**
 * Пробрасывает запрос и отдаёт ответ. Если клиент отключился раньше,
 * запрос в upstream отменяется, а ответ никуда не пишется.
 */
async function forwardTo(engine: ForwardingEngine, res: Response, request: ForwardRequest): Promise<void> {
  const controller = new AbortController();
  const onClose = (): void => {
    if (!res.writableEnded) controller.abort();
  };
  res.on('close', onClose);

  try {
    const result = await engine.forward(request, { signal: controller.signal });
    if (!controller.signal.aborted) {
      sendResult(res, result);
    }
  } finally {
    res.off('close', onClose);
  }
}

export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();
  const { engine } = deps;

  router.get('/health', (_req: Request, res: Response) => {
    res.json(deps.health());
  });

  // ============================================
  // GENERIC PASSTHROUGH
  // ============================================

  router.use('/api', asyncHandler(async (req, res) => {
    await forwardTo(engine, res, {
      method: toMethod(req.method),
      path: req.path,
      query: rawQuery(req),
      body: jsonBody(req),
    });
  }));

  // ============================================
  // PORTFOLIO
  // ============================================

  router.get('/balance', asyncHandler(async (req, res) => {
    await forwardTo(engine, res, { method: 'GET', path: 'portfolio/balance', query: rawQuery(req) });
  }));

  router.get('/positions', asyncHandler(async (req, res) => {
    await forwardTo(engine, res, { method: 'GET', path: 'portfolio/positions', query: rawQuery(req) });
  }));

  // ============================================
  // MARKETS
  // ============================================

  router.get('/markets', asyncHandler(async (req, res) => {
    const query = rawQuery(req);
    if (!query.has('limit')) query.set('limit', '20');
    if (!query.has('status')) query.set('status', 'open');

    await forwardTo(engine, res, { method: 'GET', path: 'markets', query });
  }));

  router.get('/market/:ticker', asyncHandler(async (req, res) => {
    await forwardTo(engine, res, {
      method: 'GET',
      path: `markets/${encodeURIComponent(req.params.ticker)}`,
      query: rawQuery(req),
    });
  }));

  // ============================================
  // ORDERS
  // ============================================

  router.get('/orders', asyncHandler(async (req, res) => {
    await forwardTo(engine, res, { method: 'GET', path: 'portfolio/orders', query: rawQuery(req) });
  }));

  router.post('/orders', asyncHandler(async (req, res) => {
    const body = jsonBody(req);
    if (!isNonEmptyObject(body)) {
      sendError(res, new GatewayError(ErrorCode.INVALID_REQUEST, 'Order data required', 400));
      return;
    }

    await forwardTo(engine, res, { method: 'POST', path: 'portfolio/orders', body });
  }));

  router.get('/orders/:orderId', asyncHandler(async (req, res) => {
    await forwardTo(engine, res, {
      method: 'GET',
      path: `portfolio/orders/${encodeURIComponent(req.params.orderId)}`,
    });
  }));

  router.delete('/orders/:orderId', asyncHandler(async (req, res) => {
    await forwardTo(engine, res, {
      method: 'DELETE',
      path: `portfolio/orders/${encodeURIComponent(req.params.orderId)}`,
    });
  }));

  return router;
}

export default createRoutes;
