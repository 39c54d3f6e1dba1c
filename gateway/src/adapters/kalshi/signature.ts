import { constants, KeyObject, sign, SignKeyObjectInput, verify, VerifyKeyObjectInput } from 'crypto';
import { KeyHandle, SigningAlgorithm, SigningError } from '../../types';

interface AlgorithmParams {
  /** Хэш для RSA; для Ed25519 - null (подписываются сырые байты) */
  digest: string | null;
  padding?: number;
  signSaltLength?: number;
  verifySaltLength?: number;
}

const ALGORITHM_PARAMS: Record<SigningAlgorithm, AlgorithmParams> = {
  'rsa-pkcs1v15-sha256': {
    digest: 'sha256',
    padding: constants.RSA_PKCS1_PADDING,
  },
  'rsa-pss-sha256': {
    digest: 'sha256',
    padding: constants.RSA_PKCS1_PSS_PADDING,
    signSaltLength: constants.RSA_PSS_SALTLEN_MAX_SIGN,
    verifySaltLength: constants.RSA_PSS_SALTLEN_AUTO,
  },
  ed25519: {
    digest: null,
  },
};

function toBuffer(message: string | Buffer): Buffer {
  return typeof message === 'string' ? Buffer.from(message, 'utf8') : message;
}

/**
 * Подписывает сообщение ключом из KeyStore.
 * Результат - стандартный base64 без переносов строк.
 */
export function signMessage(message: string | Buffer, handle: KeyHandle): string {
  const params = ALGORITHM_PARAMS[handle.algorithm];

  const keyInput: SignKeyObjectInput = { key: handle.key };
  if (params.padding !== undefined) keyInput.padding = params.padding;
  if (params.signSaltLength !== undefined) keyInput.saltLength = params.signSaltLength;

  try {
    return sign(params.digest, toBuffer(message), keyInput).toString('base64');
  } catch (error) {
    throw new SigningError(`Failed to sign request: ${(error as Error).message}`, {
      algorithm: handle.algorithm,
    });
  }
}

/**
 * Проверка подписи открытым ключом (self-check при старте и тесты)
 */
export function verifySignature(
  message: string | Buffer,
  signatureBase64: string,
  publicKey: KeyObject,
  algorithm: SigningAlgorithm
): boolean {
  const params = ALGORITHM_PARAMS[algorithm];

  const keyInput: VerifyKeyObjectInput = { key: publicKey };
  if (params.padding !== undefined) keyInput.padding = params.padding;
  if (params.verifySaltLength !== undefined) keyInput.saltLength = params.verifySaltLength;

  try {
    return verify(params.digest, toBuffer(message), keyInput, Buffer.from(signatureBase64, 'base64'));
  } catch {
    return false;
  }
}
