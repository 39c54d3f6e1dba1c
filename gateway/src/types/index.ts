/**
 * Signing Gateway - TypeScript Types & Interfaces
 */

import type { KeyObject } from 'crypto';

// ============================================
// CONFIG
// ============================================

export type SigningAlgorithm = 'rsa-pkcs1v15-sha256' | 'rsa-pss-sha256' | 'ed25519';

export const SIGNING_ALGORITHMS: readonly SigningAlgorithm[] = [
  'rsa-pkcs1v15-sha256',
  'rsa-pss-sha256',
  'ed25519',
];

export type KeySource =
  | { kind: 'pem'; pem: string }
  | { kind: 'base64'; data: string }
  | { kind: 'file'; path: string };

export interface AuthHeaderNames {
  keyId: string;
  signature: string;
  timestamp: string;
}

export interface UpstreamConfig {
  apiKeyId: string;
  keySource: KeySource | null;
  algorithm: SigningAlgorithm;
  baseUrl: string;
  apiPrefix: string;
  headerNames: AuthHeaderNames;
  timeoutMs: number;
}

export interface HttpConfig {
  host: string;
  port: number;
  corsOrigin: string;
}

export interface GatewayConfig {
  nodeEnv: 'development' | 'production';
  upstream: UpstreamConfig;
  http: HttpConfig;
}

// ============================================
// SIGNING
// ============================================

export interface KeyHandle {
  readonly key: KeyObject;
  readonly algorithm: SigningAlgorithm;
}

// ============================================
// FORWARDING
// ============================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

export type QueryValue = string | number | boolean | readonly string[] | undefined;

export type QueryParams = URLSearchParams | Record<string, QueryValue>;

export interface ForwardRequest {
  method: HttpMethod;
  /** Путь относительно префикса API, например `portfolio/orders/{id}` */
  path: string;
  query?: QueryParams;
  body?: unknown;
}

/** Подписанный запрос к upstream; живёт только в рамках одного вызова */
export interface SignedRequest {
  method: HttpMethod;
  url: string;
  upstreamPath: string;
  headers: Record<string, string>;
  query: URLSearchParams;
  body?: string;
}

export interface ForwardOptions {
  signal?: AbortSignal;
}

export interface ForwardResult {
  status: number;
  body: Buffer;
  contentType?: string;
  error?: GatewayError;
}

export interface ErrorBody {
  error: string;
  code: ErrorCode;
}

export interface HealthStatus {
  status: 'healthy';
  timestamp: string;
  credentials_configured: boolean;
  algorithm: SigningAlgorithm;
}

// ============================================
// ERROR HANDLING
// ============================================

export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  KEY_NOT_CONFIGURED = 'KEY_NOT_CONFIGURED',
  KEY_PARSE_ERROR = 'KEY_PARSE_ERROR',
  KEY_TYPE_MISMATCH = 'KEY_TYPE_MISMATCH',
  SIGNING_FAILED = 'SIGNING_FAILED',
  INVALID_PATH = 'INVALID_PATH',
  INVALID_REQUEST = 'INVALID_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  UPSTREAM_TIMEOUT = 'UPSTREAM_TIMEOUT',
  UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE',
  UPSTREAM_ERROR = 'UPSTREAM_ERROR',
  REQUEST_CANCELLED = 'REQUEST_CANCELLED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class GatewayError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public status: number = 500,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GatewayError';
  }

  toErrorBody(): ErrorBody {
    return { error: this.message, code: this.code };
  }
}

/** Отсутствующие или некорректные настройки (ключ, URL, таймауты) */
export class ConfigError extends GatewayError {
  constructor(code: ErrorCode.CONFIG_INVALID | ErrorCode.KEY_NOT_CONFIGURED, message: string, context?: Record<string, unknown>) {
    super(code, message, 500, context);
    this.name = 'ConfigError';
  }
}

export class KeyLoadError extends GatewayError {
  constructor(code: ErrorCode.KEY_PARSE_ERROR | ErrorCode.KEY_TYPE_MISMATCH, message: string, context?: Record<string, unknown>) {
    super(code, message, 500, context);
    this.name = 'KeyLoadError';
  }
}

export class SigningError extends GatewayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.SIGNING_FAILED, message, 500, context);
    this.name = 'SigningError';
  }
}

export class PathRejectedError extends GatewayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INVALID_PATH, message, 400, context);
    this.name = 'PathRejectedError';
  }
}

/** Сетевая ошибка или таймаут: ответа от upstream нет */
export class UpstreamTransportError extends GatewayError {
  constructor(code: ErrorCode.UPSTREAM_TIMEOUT | ErrorCode.UPSTREAM_UNAVAILABLE, message: string, context?: Record<string, unknown>) {
    super(code, message, code === ErrorCode.UPSTREAM_TIMEOUT ? 504 : 500, context);
    this.name = 'UpstreamTransportError';
  }
}

/** Upstream ответил статусом >= 400; тело отдаётся клиенту как есть */
export class UpstreamApplicationError extends GatewayError {
  constructor(status: number, context?: Record<string, unknown>) {
    super(ErrorCode.UPSTREAM_ERROR, `Upstream responded with status ${status}`, status, context);
    this.name = 'UpstreamApplicationError';
  }
}

export class RequestCancelledError extends GatewayError {
  constructor(context?: Record<string, unknown>) {
    super(ErrorCode.REQUEST_CANCELLED, 'Request cancelled by client', 499, context);
    this.name = 'RequestCancelledError';
  }
}
