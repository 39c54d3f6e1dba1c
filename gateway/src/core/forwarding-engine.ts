/**
 * Forwarding Engine - проксирование запросов в upstream с подписью
 *
 * Конвейер одного вызова: resolve path -> sign -> call upstream -> map response.
 * Между вызовами общего состояния нет, кроме закэшированного ключа в KeyStore
 * и пула соединений axios.
 */

import * as http from 'http';
import * as https from 'https';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import {
  ErrorCode,
  ForwardOptions,
  ForwardRequest,
  ForwardResult,
  GatewayError,
  QueryParams,
  RequestCancelledError,
  SignedRequest,
  UpstreamApplicationError,
  UpstreamTransportError,
} from '../types';
import { JSON_CONTENT_TYPE, RequestAuthenticator } from '../adapters/kalshi/request-authenticator';
import { resolveUpstreamPath } from '../utils/upstream-path';
import { Logger } from '../utils/logger';

export interface ForwardingEngineConfig {
  authenticator: RequestAuthenticator;
  baseUrl: string;
  apiPrefix: string;
  timeoutMs: number;
  logger: Logger;
  httpClient?: AxiosInstance;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Общий HTTP клиент: keep-alive пул, тело ответа как Buffer, любой статус
 * считается ответом (ошибки upstream не бросаются), без редиректов -
 * редирект поменял бы подписанный путь.
 */
export function createUpstreamClient(): AxiosInstance {
  return axios.create({
    httpAgent: new http.Agent({ keepAlive: true }),
    httpsAgent: new https.Agent({ keepAlive: true }),
    responseType: 'arraybuffer',
    validateStatus: () => true,
    maxRedirects: 0,
  });
}

export function toSearchParams(query: QueryParams | undefined): URLSearchParams {
  if (!query) return new URLSearchParams();
  if (query instanceof URLSearchParams) return new URLSearchParams(query);

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      params.append(key, String(value));
    } else {
      value.forEach((item) => params.append(key, item));
    }
  }
  return params;
}

function toBody(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (data === undefined || data === null) return Buffer.alloc(0);
  if (typeof data === 'string') return Buffer.from(data, 'utf8');
  return Buffer.from(JSON.stringify(data), 'utf8');
}

export function errorResult(error: GatewayError): ForwardResult {
  return {
    status: error.status,
    body: Buffer.from(JSON.stringify(error.toErrorBody()), 'utf8'),
    contentType: `${JSON_CONTENT_TYPE}; charset=utf-8`,
    error,
  };
}

export class ForwardingEngine {
  private authenticator: RequestAuthenticator;
  private baseUrl: string;
  private apiPrefix: string;
  private timeoutMs: number;
  private logger: Logger;
  private http: AxiosInstance;

  constructor(config: ForwardingEngineConfig) {
    this.authenticator = config.authenticator;
    this.baseUrl = config.baseUrl;
    this.apiPrefix = config.apiPrefix;
    this.timeoutMs = config.timeoutMs;
    this.logger = config.logger;
    this.http = config.httpClient || createUpstreamClient();
  }

  /**
   * Собирает подписанный запрос. Заголовки и timestamp создаются заново
   * при каждом вызове.
   */
  async prepare(request: ForwardRequest): Promise<SignedRequest> {
    const upstreamPath = resolveUpstreamPath(this.apiPrefix, request.path);
    const authHeaders = await this.authenticator.buildHeaders(request.method, upstreamPath);

    return {
      method: request.method,
      url: `${this.baseUrl}${upstreamPath}`,
      upstreamPath,
      headers: {
        ...authHeaders,
        'Content-Type': JSON_CONTENT_TYPE,
      },
      query: toSearchParams(request.query),
      ...(request.body !== undefined && { body: JSON.stringify(request.body) }),
    };
  }

  async forward(request: ForwardRequest, options: ForwardOptions = {}): Promise<ForwardResult> {
    const startedAt = Date.now();

    try {
      const signed = await this.prepare(request);
      const response = await this.send(signed, options.signal);
      return this.mapResponse(signed, response, Date.now() - startedAt);
    } catch (error) {
      const gatewayError = error instanceof GatewayError
        ? error
        : new GatewayError(ErrorCode.INTERNAL_ERROR, 'Unexpected gateway error');

      this.logger.error('FORWARD_FAILED', error instanceof Error ? error : String(error), {
        method: request.method,
        path: request.path,
        code: gatewayError.code,
        status: gatewayError.status,
        duration_ms: Date.now() - startedAt,
      });

      return errorResult(gatewayError);
    }
  }

  private async send(signed: SignedRequest, signal?: AbortSignal): Promise<AxiosResponse<unknown>> {
    const context = { method: signed.method, path: signed.upstreamPath };

    if (signal?.aborted) {
      throw new RequestCancelledError(context);
    }

    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    // Клиент отключился - отменяем запрос в upstream
    const onCallerAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      return await this.http.request<unknown>({
        method: signed.method,
        url: signed.url,
        headers: signed.headers,
        params: signed.query,
        data: signed.body,
        signal: controller.signal,
      });
    } catch (error) {
      const code = axios.isAxiosError(error) ? error.code : undefined;

      if (timedOut || (code !== undefined && TIMEOUT_CODES.has(code))) {
        throw new UpstreamTransportError(
          ErrorCode.UPSTREAM_TIMEOUT,
          `Upstream did not respond within ${this.timeoutMs} ms`,
          context
        );
      }

      if (signal?.aborted) {
        throw new RequestCancelledError(context);
      }

      const err = error as Error;
      throw new UpstreamTransportError(
        ErrorCode.UPSTREAM_UNAVAILABLE,
        `Upstream request failed: ${code || err.message}`,
        context
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private mapResponse(signed: SignedRequest, response: AxiosResponse<unknown>, durationMs: number): ForwardResult {
    const rawContentType = response.headers['content-type'];
    const contentType = typeof rawContentType === 'string' ? rawContentType : undefined;

    const result: ForwardResult = {
      status: response.status,
      body: toBody(response.data),
      ...(contentType !== undefined && { contentType }),
    };

    const logData = {
      method: signed.method,
      path: signed.upstreamPath,
      status: response.status,
      duration_ms: durationMs,
    };

    // Ошибки upstream не переписываются: статус и тело уходят клиенту как есть
    if (response.status >= 400) {
      result.error = new UpstreamApplicationError(response.status, logData);
      this.logger.warn('UPSTREAM_ERROR_RESPONSE', logData);
    } else {
      this.logger.info('UPSTREAM_RESPONSE', logData);
    }

    return result;
  }
}

export default ForwardingEngine;
