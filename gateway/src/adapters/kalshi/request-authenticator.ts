import { AuthHeaderNames, ConfigError, ErrorCode, SigningError } from '../../types';
import { KeyStore } from './key-store';
import { signMessage } from './signature';

export const JSON_CONTENT_TYPE = 'application/json';

export interface RequestAuthenticatorConfig {
  apiKeyId: string;
  keyStore: KeyStore;
  headerNames: AuthHeaderNames;
  clock?: () => number;
}

/**
 * Каноническое сообщение: timestamp + METHOD + path, без разделителей.
 * Пример: 1700000000000GET/trade-api/v2/portfolio/balance
 */
export function buildCanonicalMessage(timestampMs: number | string, method: string, upstreamPath: string): string {
  return `${timestampMs}${method.toUpperCase()}${upstreamPath}`;
}

/**
 * RequestAuthenticator - собирает заголовки аутентификации для upstream.
 * Каждый вызов подписывает заново со свежим timestamp: upstream проверяет
 * окно свежести, поэтому заголовки нельзя кэшировать или переиспользовать.
 */
export class RequestAuthenticator {
  private apiKeyId: string;
  private keyStore: KeyStore;
  private headerNames: AuthHeaderNames;
  private clock: () => number;

  constructor(config: RequestAuthenticatorConfig) {
    this.apiKeyId = config.apiKeyId;
    this.keyStore = config.keyStore;
    this.headerNames = config.headerNames;
    this.clock = config.clock || Date.now;
  }

  isConfigured(): boolean {
    return this.apiKeyId !== '' && this.keyStore.isConfigured();
  }

  async buildHeaders(method: string, upstreamPath: string): Promise<Record<string, string>> {
    if (!this.apiKeyId) {
      throw new ConfigError(ErrorCode.KEY_NOT_CONFIGURED, 'API key id is not configured. Set KALSHI_API_KEY_ID');
    }

    // Подписывается только путь: query и fragment в сообщение не входят
    if (!upstreamPath.startsWith('/') || upstreamPath.includes('?') || upstreamPath.includes('#')) {
      throw new SigningError('Upstream path must be absolute and carry no query string', {
        path: upstreamPath,
      });
    }

    const handle = await this.keyStore.load();

    const timestamp = String(this.clock());
    const message = buildCanonicalMessage(timestamp, method, upstreamPath);
    const signature = signMessage(message, handle);

    return {
      [this.headerNames.keyId]: this.apiKeyId,
      [this.headerNames.signature]: signature,
      [this.headerNames.timestamp]: timestamp,
      'Content-Type': JSON_CONTENT_TYPE,
    };
  }
}

export default RequestAuthenticator;
