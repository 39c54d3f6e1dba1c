/**
 * Сборка gateway: KeyStore -> RequestAuthenticator -> ForwardingEngine -> Express app
 */

import { createPublicKey } from 'crypto';
import { AxiosInstance } from 'axios';
import { Express } from 'express';
import { GatewayConfig, HealthStatus, SigningError } from './types';
import { KeyStore } from './adapters/kalshi/key-store';
import { buildCanonicalMessage, RequestAuthenticator } from './adapters/kalshi/request-authenticator';
import { signMessage, verifySignature } from './adapters/kalshi/signature';
import { ForwardingEngine } from './core/forwarding-engine';
import { createApp } from './services/http-server';
import { Logger } from './utils/logger';

export interface GatewayOptions {
  logger: Logger;
  httpClient?: AxiosInstance;
  clock?: () => number;
}

export interface Gateway {
  keyStore: KeyStore;
  authenticator: RequestAuthenticator;
  engine: ForwardingEngine;
  app: Express;
  health: () => HealthStatus;
}

export function createGateway(config: GatewayConfig, options: GatewayOptions): Gateway {
  const { logger } = options;
  const upstream = config.upstream;

  const keyStore = new KeyStore(upstream.keySource, upstream.algorithm, logger);

  const authenticator = new RequestAuthenticator({
    apiKeyId: upstream.apiKeyId,
    keyStore,
    headerNames: upstream.headerNames,
    clock: options.clock,
  });

  const engine = new ForwardingEngine({
    authenticator,
    baseUrl: upstream.baseUrl,
    apiPrefix: upstream.apiPrefix,
    timeoutMs: upstream.timeoutMs,
    logger,
    httpClient: options.httpClient,
  });

  const health = (): HealthStatus => ({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    credentials_configured: authenticator.isConfigured(),
    algorithm: upstream.algorithm,
  });

  const app = createApp({
    engine,
    health,
    corsOrigin: config.http.corsOrigin,
    logger,
  });

  return { keyStore, authenticator, engine, app, health };
}

/**
 * Загружает ключ и проверяет, что подпись сходится с открытым ключом,
 * выведенным из приватного.
 */
export async function verifySigningKey(keyStore: KeyStore, apiPrefix: string): Promise<void> {
  const handle = await keyStore.load();

  const probe = buildCanonicalMessage(Date.now(), 'GET', `${apiPrefix}/exchange/status`);
  const signature = signMessage(probe, handle);

  if (!verifySignature(probe, signature, createPublicKey(handle.key), handle.algorithm)) {
    throw new SigningError('Signature self-check failed', { algorithm: handle.algorithm });
  }
}
