/**
 * End-to-end tests for the HTTP surface: local server on an ephemeral port,
 * upstream replaced by an in-process axios adapter
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HttpServer } from './http-server';
import { createGateway } from '../gateway';
import { verifySignature } from '../adapters/kalshi/signature';
import { GatewayConfig, KeySource } from '../types';
import { Logger } from '../utils/logger';
import { rsaKeys, TEST_API_KEY_ID, TEST_BASE_URL, TEST_PREFIX } from '../__fixtures__/keys';

interface UpstreamReply {
  status: number;
  body: string;
  contentType?: string;
}

function buildConfig(keySource: KeySource | null): GatewayConfig {
  return {
    nodeEnv: 'development',
    upstream: {
      apiKeyId: TEST_API_KEY_ID,
      keySource,
      algorithm: 'rsa-pkcs1v15-sha256',
      baseUrl: TEST_BASE_URL,
      apiPrefix: TEST_PREFIX,
      headerNames: {
        keyId: 'KALSHI-ACCESS-KEY',
        signature: 'KALSHI-ACCESS-SIGNATURE',
        timestamp: 'KALSHI-ACCESS-TIMESTAMP',
      },
      timeoutMs: 5000,
    },
    http: {
      host: '127.0.0.1',
      port: 0,
      corsOrigin: '*',
    },
  };
}

describe('HTTP gateway', () => {
  let reply: UpstreamReply;
  let upstreamCalls: InternalAxiosRequestConfig[];
  let httpServer: HttpServer;
  let client: AxiosInstance;

  const adapter: AxiosAdapter = async (config) => {
    upstreamCalls.push(config);
    const response: AxiosResponse = {
      data: Buffer.from(reply.body, 'utf8'),
      status: reply.status,
      statusText: '',
      headers: reply.contentType ? { 'content-type': reply.contentType } : {},
      config,
    };
    return response;
  };

  async function startGateway(keySource: KeySource | null): Promise<void> {
    const config = buildConfig(keySource);
    const logger = new Logger('test');
    const gateway = createGateway(config, {
      logger,
      httpClient: axios.create({ adapter, responseType: 'arraybuffer', validateStatus: () => true }),
      clock: () => 1700000000000,
    });

    httpServer = new HttpServer(config.http, gateway.app, logger);
    const address = await httpServer.start();

    client = axios.create({
      baseURL: `http://127.0.0.1:${address.port}`,
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [(data: string) => data],
    });
  }

  function lastCall(): InternalAxiosRequestConfig {
    expect(upstreamCalls.length).toBeGreaterThan(0);
    return upstreamCalls[upstreamCalls.length - 1];
  }

  function queryOf(config: InternalAxiosRequestConfig): string {
    return config.params instanceof URLSearchParams ? config.params.toString() : '';
  }

  beforeEach(() => {
    reply = { status: 200, body: '{"ok":true}', contentType: 'application/json' };
    upstreamCalls = [];
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await httpServer.stop();
    vi.restoreAllMocks();
  });

  describe('with credentials', () => {
    beforeEach(async () => {
      await startGateway({ kind: 'pem', pem: rsaKeys.privatePem });
    });

    it('should report health without key material', async () => {
      const response = await client.get('/health');
      const body = JSON.parse(response.data);

      expect(response.status).toBe(200);
      expect(body).toMatchObject({
        status: 'healthy',
        credentials_configured: true,
        algorithm: 'rsa-pkcs1v15-sha256',
      });
      expect(Object.keys(body)).toEqual(['status', 'timestamp', 'credentials_configured', 'algorithm']);
    });

    it('should forward the generic passthrough with its query', async () => {
      reply = { status: 200, body: '{"orders":[]}', contentType: 'application/json' };

      const response = await client.get('/api/portfolio/orders?status=resting&ticker=A&ticker=B');

      expect(response.status).toBe(200);
      expect(response.data).toBe('{"orders":[]}');
      expect(response.headers['content-type']).toBe('application/json');

      const call = lastCall();
      expect(call.method).toBe('get');
      expect(call.url).toBe(`${TEST_BASE_URL}/trade-api/v2/portfolio/orders`);
      expect(queryOf(call)).toBe('status=resting&ticker=A&ticker=B');

      const signature = String(call.headers['KALSHI-ACCESS-SIGNATURE']);
      expect(
        verifySignature('1700000000000GET/trade-api/v2/portfolio/orders', signature, rsaKeys.publicKey, 'rsa-pkcs1v15-sha256')
      ).toBe(true);
    });

    it('should pass an upstream 429 through verbatim', async () => {
      reply = { status: 429, body: '{"error":"rate limited"}', contentType: 'application/json' };

      const response = await client.get('/balance');

      expect(response.status).toBe(429);
      expect(response.data).toBe('{"error":"rate limited"}');
      expect(lastCall().url).toBe(`${TEST_BASE_URL}/trade-api/v2/portfolio/balance`);
    });

    it('should reject an encoded traversal without calling upstream', async () => {
      const response = await client.get('/api/markets/..%2Fadmin');

      expect(response.status).toBe(400);
      expect(JSON.parse(response.data)).toEqual({
        error: 'Invalid path: forbidden character in segment',
        code: 'INVALID_PATH',
      });
      expect(upstreamCalls).toHaveLength(0);
    });

    it('should apply market list defaults', async () => {
      await client.get('/markets');
      expect(queryOf(lastCall())).toBe('limit=20&status=open');

      await client.get('/markets?cursor=abc&limit=5');
      expect(queryOf(lastCall())).toBe('cursor=abc&limit=5&status=open');
    });

    it('should forward a single market by ticker', async () => {
      await client.get('/market/KXBTC-24DEC31');

      expect(lastCall().url).toBe(`${TEST_BASE_URL}/trade-api/v2/markets/KXBTC-24DEC31`);
    });

    it('should create an order with a JSON body', async () => {
      reply = { status: 201, body: '{"order":{"order_id":"ord-1"}}', contentType: 'application/json' };

      const response = await client.post('/orders', { ticker: 'KXBTC-24DEC31', side: 'yes', count: 1 });

      expect(response.status).toBe(201);
      expect(response.data).toBe('{"order":{"order_id":"ord-1"}}');

      const call = lastCall();
      expect(call.method).toBe('post');
      expect(call.url).toBe(`${TEST_BASE_URL}/trade-api/v2/portfolio/orders`);
      expect(call.data).toBe('{"ticker":"KXBTC-24DEC31","side":"yes","count":1}');
    });

    it('should require order data', async () => {
      const response = await client.post('/orders', {});

      expect(response.status).toBe(400);
      expect(JSON.parse(response.data)).toEqual({ error: 'Order data required', code: 'INVALID_REQUEST' });
      expect(upstreamCalls).toHaveLength(0);
    });

    it('should get and cancel an order by id', async () => {
      await client.get('/orders/ord-1');
      expect(lastCall().method).toBe('get');
      expect(lastCall().url).toBe(`${TEST_BASE_URL}/trade-api/v2/portfolio/orders/ord-1`);

      await client.delete('/orders/ord-1');
      expect(lastCall().method).toBe('delete');
      expect(lastCall().url).toBe(`${TEST_BASE_URL}/trade-api/v2/portfolio/orders/ord-1`);
      expect(lastCall().data).toBeUndefined();
    });

    it('should list positions and orders', async () => {
      await client.get('/positions?limit=10');
      expect(lastCall().url).toBe(`${TEST_BASE_URL}/trade-api/v2/portfolio/positions`);
      expect(queryOf(lastCall())).toBe('limit=10');

      await client.get('/orders');
      expect(lastCall().url).toBe(`${TEST_BASE_URL}/trade-api/v2/portfolio/orders`);
    });

    it('should answer unknown routes with 404', async () => {
      const response = await client.get('/nope');

      expect(response.status).toBe(404);
      expect(JSON.parse(response.data)).toEqual({ error: 'Route GET /nope not found', code: 'NOT_FOUND' });
    });

    it('should reject a malformed JSON body', async () => {
      const response = await client.post('/api/portfolio/orders', '{bad', {
        headers: { 'Content-Type': 'application/json' },
        transformRequest: [(data: string) => data],
      });

      expect(response.status).toBe(400);
      expect(JSON.parse(response.data)).toEqual({ error: 'Invalid request body', code: 'INVALID_REQUEST' });
      expect(upstreamCalls).toHaveLength(0);
    });

    it('should reject a non-JSON body', async () => {
      const response = await client.post('/api/portfolio/orders', 'count=1', {
        headers: { 'Content-Type': 'text/plain' },
      });

      expect(response.status).toBe(415);
      expect(JSON.parse(response.data)).toEqual({ error: 'Request body must be JSON', code: 'INVALID_REQUEST' });
    });

    it('should send CORS headers', async () => {
      const response = await client.get('/health', { headers: { Origin: 'http://localhost:3000' } });

      expect(response.headers['access-control-allow-origin']).toBe('*');
    });
  });

  describe('without credentials', () => {
    beforeEach(async () => {
      await startGateway(null);
    });

    it('should report missing credentials in health', async () => {
      const response = await client.get('/health');

      expect(JSON.parse(response.data)).toMatchObject({ credentials_configured: false });
    });

    it('should fail every forwarded request with KEY_NOT_CONFIGURED', async () => {
      const response = await client.get('/balance');

      expect(response.status).toBe(500);
      expect(JSON.parse(response.data)).toEqual({
        error: 'Private key is not configured. Set KALSHI_PRIVATE_KEY or KALSHI_PRIVATE_KEY_PATH',
        code: 'KEY_NOT_CONFIGURED',
      });
      expect(upstreamCalls).toHaveLength(0);
    });
  });
});
