/**
 * Gateway Configuration
 */

import * as dotenv from 'dotenv';
import {
  ConfigError,
  ErrorCode,
  GatewayConfig,
  KeySource,
  SIGNING_ALGORITHMS,
  SigningAlgorithm,
} from './types';

dotenv.config();

export const DEFAULT_BASE_URL = 'https://api.elections.kalshi.com';
export const DEFAULT_API_PREFIX = '/trade-api/v2';
export const DEFAULT_TIMEOUT_MS = 30000;

type Env = Record<string, string | undefined>;

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(ErrorCode.CONFIG_INVALID, `❌ ${name} должен быть целым числом от ${min} до ${max}`, {
      variable: name,
    });
  }
  return value;
}

function parseAlgorithm(raw: string | undefined): SigningAlgorithm {
  const value = (raw || 'rsa-pss-sha256').trim().toLowerCase();
  const algorithm = SIGNING_ALGORITHMS.find((candidate) => candidate === value);
  if (!algorithm) {
    throw new ConfigError(
      ErrorCode.CONFIG_INVALID,
      `❌ KALSHI_SIGNING_ALGORITHM должен быть одним из: ${SIGNING_ALGORITHMS.join(', ')}`,
      { variable: 'KALSHI_SIGNING_ALGORITHM' }
    );
  }
  return algorithm;
}

function parseApiPrefix(raw: string | undefined): string {
  const prefix = (raw || DEFAULT_API_PREFIX).trim().replace(/\/+$/, '');
  if (!prefix.startsWith('/') || prefix.includes('..') || prefix.includes('?') || prefix.includes('#')) {
    throw new ConfigError(ErrorCode.CONFIG_INVALID, '❌ KALSHI_API_PREFIX должен быть абсолютным путём, например /trade-api/v2', {
      variable: 'KALSHI_API_PREFIX',
    });
  }
  return prefix;
}

/**
 * Нормализует базовый URL: убирает завершающие `/` и, если URL уже
 * заканчивается префиксом API, сам префикс (он добавляется при каждом запросе).
 */
export function normalizeBaseUrl(raw: string, apiPrefix: string): string {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    throw new ConfigError(ErrorCode.CONFIG_INVALID, '❌ KALSHI_BASE_URL не является корректным URL', {
      variable: 'KALSHI_BASE_URL',
    });
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new ConfigError(ErrorCode.CONFIG_INVALID, '❌ KALSHI_BASE_URL должен использовать http или https', {
      variable: 'KALSHI_BASE_URL',
    });
  }

  let pathname = parsed.pathname.replace(/\/+$/, '');
  if (pathname.endsWith(apiPrefix)) {
    pathname = pathname.slice(0, pathname.length - apiPrefix.length);
  }

  return `${parsed.origin}${pathname}`;
}

/**
 * PEM в одной строке .env часто хранится с экранированными `\n`.
 * Всё, что не начинается с `-----BEGIN`, считаем base64 от PEM.
 */
export function parseKeySource(inline: string | undefined, filePath: string | undefined): KeySource | null {
  const value = inline?.trim();
  if (value) {
    if (value.startsWith('-----BEGIN')) {
      return { kind: 'pem', pem: value.replace(/\\n/g, '\n') };
    }
    return { kind: 'base64', data: value };
  }

  const path = filePath?.trim();
  if (path) {
    return { kind: 'file', path };
  }

  return null;
}

export function loadConfig(env: Env = process.env): GatewayConfig {
  const nodeEnv = env.NODE_ENV === 'production' ? 'production' : 'development';
  const apiPrefix = parseApiPrefix(env.KALSHI_API_PREFIX);

  const config: GatewayConfig = {
    nodeEnv,
    upstream: {
      apiKeyId: (env.KALSHI_API_KEY_ID || '').trim(),
      keySource: parseKeySource(env.KALSHI_PRIVATE_KEY, env.KALSHI_PRIVATE_KEY_PATH),
      algorithm: parseAlgorithm(env.KALSHI_SIGNING_ALGORITHM),
      baseUrl: normalizeBaseUrl(env.KALSHI_BASE_URL || DEFAULT_BASE_URL, apiPrefix),
      apiPrefix,
      headerNames: {
        keyId: env.KALSHI_HEADER_KEY || 'KALSHI-ACCESS-KEY',
        signature: env.KALSHI_HEADER_SIGNATURE || 'KALSHI-ACCESS-SIGNATURE',
        timestamp: env.KALSHI_HEADER_TIMESTAMP || 'KALSHI-ACCESS-TIMESTAMP',
      },
      timeoutMs: parseInteger('REQUEST_TIMEOUT_MS', env.REQUEST_TIMEOUT_MS, DEFAULT_TIMEOUT_MS, 1, 600000),
    },
    http: {
      host: env.HOST || '0.0.0.0',
      port: parseInteger('PORT', env.PORT, 5000, 0, 65535),
      corsOrigin: env.CORS_ORIGIN || '*',
    },
  };

  return config;
}

export default loadConfig;
