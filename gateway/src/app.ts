/**
 * Signing Gateway - Entry Point
 *
 * Функции:
 * 1. Загрузить конфигурацию
 * 2. Загрузить приватный ключ и проверить подпись (self-check)
 * 3. Поднять HTTP сервер и проксировать запросы в upstream с подписью
 * 4. Graceful shutdown на SIGINT / SIGTERM
 */

import { loadConfig } from './config';
import { createGateway, Gateway, verifySigningKey } from './gateway';
import { HttpServer } from './services/http-server';
import { GatewayConfig } from './types';
import { Logger } from './utils/logger';

// ============================================
// APP CLASS
// ============================================

class GatewayApp {
  private config: GatewayConfig;
  private logger: Logger;
  private gateway: Gateway;
  private httpServer: HttpServer;
  private isShuttingDown = false;

  constructor(config: GatewayConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
    this.gateway = createGateway(config, { logger });
    this.httpServer = new HttpServer(config.http, this.gateway.app, logger);
  }

  async start(): Promise<void> {
    console.log('╔════════════════════════════════════════════╗');
    console.log('║   🔐 Signing Gateway Started 🔐            ║');
    console.log('╚════════════════════════════════════════════╝');
    console.log('');

    const { upstream } = this.config;

    this.logger.info('CONFIG_LOADED', {
      node_env: this.config.nodeEnv,
      base_url: upstream.baseUrl,
      api_prefix: upstream.apiPrefix,
      algorithm: upstream.algorithm,
      key_source: upstream.keySource?.kind || null,
      timeout_ms: upstream.timeoutMs,
    });

    // 1. Ключ: если задан, но битый - не стартуем
    if (this.gateway.authenticator.isConfigured()) {
      await verifySigningKey(this.gateway.keyStore, upstream.apiPrefix);
      this.logger.info('SIGNING_SELF_CHECK_PASSED', { algorithm: upstream.algorithm });
    } else {
      this.logger.warn('CREDENTIALS_NOT_CONFIGURED', {
        api_key_id_set: upstream.apiKeyId !== '',
        private_key_set: upstream.keySource !== null,
      });
    }

    // 2. HTTP сервер
    await this.httpServer.start();

    console.log('');
    console.log(`✅ Gateway ready | ${upstream.baseUrl}${upstream.apiPrefix}`);
    console.log('');
  }

  async stop(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    this.logger.info('GATEWAY_SHUTTING_DOWN');
    await this.httpServer.stop();
    this.logger.info('GATEWAY_STOPPED');
  }
}

// ============================================
// MAIN
// ============================================

async function main(): Promise<void> {
  const logger = new Logger('gateway');
  const config = loadConfig();
  const app = new GatewayApp(config, logger);

  const shutdown = (exitCode: number): void => {
    app.stop().then(
      () => process.exit(exitCode),
      (error: Error) => {
        logger.error('SHUTDOWN_FAILED', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown(0));
  process.on('SIGTERM', () => shutdown(0));

  process.on('uncaughtException', (error) => {
    logger.error('UNCAUGHT_EXCEPTION', error);
    shutdown(1);
  });

  try {
    await app.start();
  } catch (error) {
    const err = error as Error;
    logger.error('GATEWAY_STARTUP_FAILED', err);
    await app.stop();
    process.exit(1);
  }
}

main().catch((error: Error) => {
  new Logger('gateway').error('GATEWAY_FATAL', error);
  process.exit(1);
});
