import { createPrivateKey, KeyObject } from 'crypto';
import { promises as fs } from 'fs';
import {
  ConfigError,
  ErrorCode,
  KeyHandle,
  KeyLoadError,
  KeySource,
  SigningAlgorithm,
} from '../../types';
import { Logger } from '../../utils/logger';

const PEM_HEADER = '-----BEGIN';

/**
 * Допустимые типы ключа для каждого алгоритма подписи
 */
export const EXPECTED_KEY_TYPES: Record<SigningAlgorithm, readonly string[]> = {
  'rsa-pkcs1v15-sha256': ['rsa'],
  'rsa-pss-sha256': ['rsa', 'rsa-pss'],
  ed25519: ['ed25519'],
};

function decodePem(text: string, origin: KeySource['kind']): string {
  const trimmed = text.trim();
  if (trimmed.startsWith(PEM_HEADER)) {
    return trimmed;
  }

  const decoded = Buffer.from(trimmed, 'base64').toString('utf8').trim();
  if (!decoded.startsWith(PEM_HEADER)) {
    throw new KeyLoadError(ErrorCode.KEY_PARSE_ERROR, 'Private key is neither PEM nor base64-encoded PEM', {
      source: origin,
    });
  }
  return decoded;
}

async function readPem(source: KeySource): Promise<string> {
  switch (source.kind) {
    case 'pem':
      return decodePem(source.pem, source.kind);
    case 'base64':
      return decodePem(source.data, source.kind);
    case 'file': {
      let contents: string;
      try {
        contents = await fs.readFile(source.path, 'utf8');
      } catch (error) {
        const err = error as NodeJS.ErrnoException;
        throw new KeyLoadError(ErrorCode.KEY_PARSE_ERROR, `Cannot read private key file: ${err.code || err.message}`, {
          source: source.kind,
          path: source.path,
        });
      }
      return decodePem(contents, source.kind);
    }
  }
}

/**
 * KeyStore - загрузка, проверка и кэширование приватного ключа
 *
 * Ключ разбирается один раз за время жизни процесса. Параллельные первые
 * запросы получают один и тот же promise, поэтому повторного разбора нет.
 * Неудачная загрузка не кэшируется: исправленный файл ключа подхватится
 * следующим запросом.
 */
export class KeyStore {
  private source: KeySource | null;
  private algorithm: SigningAlgorithm;
  private logger: Logger | null;
  private pending: Promise<KeyHandle> | null = null;
  private generation: number = 0;

  constructor(source: KeySource | null, algorithm: SigningAlgorithm, logger?: Logger) {
    this.source = source;
    this.algorithm = algorithm;
    this.logger = logger || null;
  }

  static async parse(source: KeySource | null, algorithm: SigningAlgorithm): Promise<KeyHandle> {
    if (!source) {
      throw new ConfigError(
        ErrorCode.KEY_NOT_CONFIGURED,
        'Private key is not configured. Set KALSHI_PRIVATE_KEY or KALSHI_PRIVATE_KEY_PATH'
      );
    }

    const pem = await readPem(source);

    let key: KeyObject;
    try {
      key = createPrivateKey({ key: pem, format: 'pem' });
    } catch (error) {
      throw new KeyLoadError(ErrorCode.KEY_PARSE_ERROR, `Cannot parse private key: ${(error as Error).message}`, {
        source: source.kind,
      });
    }

    const keyType = key.asymmetricKeyType || 'unknown';
    if (!EXPECTED_KEY_TYPES[algorithm].includes(keyType)) {
      throw new KeyLoadError(
        ErrorCode.KEY_TYPE_MISMATCH,
        `Private key type ${keyType} cannot be used with ${algorithm}`,
        { source: source.kind, key_type: keyType, algorithm }
      );
    }

    return { key, algorithm };
  }

  isConfigured(): boolean {
    return this.source !== null;
  }

  getAlgorithm(): SigningAlgorithm {
    return this.algorithm;
  }

  load(): Promise<KeyHandle> {
    if (!this.pending) {
      this.pending = this.loadOnce(this.generation);
    }
    return this.pending;
  }

  /**
   * Сбрасывает кэш (нужно только при смене конфигурации)
   */
  invalidate(source: KeySource | null = this.source, algorithm: SigningAlgorithm = this.algorithm): void {
    this.source = source;
    this.algorithm = algorithm;
    this.pending = null;
    this.generation++;
  }

  private async loadOnce(generation: number): Promise<KeyHandle> {
    try {
      const handle = await KeyStore.parse(this.source, this.algorithm);
      this.logger?.info('PRIVATE_KEY_LOADED', {
        algorithm: handle.algorithm,
        key_type: handle.key.asymmetricKeyType,
        source: this.source?.kind,
      });
      return handle;
    } catch (error) {
      if (generation === this.generation) {
        this.pending = null;
      }
      throw error;
    }
  }
}

export default KeyStore;
