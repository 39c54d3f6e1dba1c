import { generateKeyPairSync, KeyObject } from 'crypto';

export interface TestKeyPair {
  privateKey: KeyObject;
  publicKey: KeyObject;
  privatePem: string;
}

function toPair(pair: { privateKey: KeyObject; publicKey: KeyObject }): TestKeyPair {
  return {
    ...pair,
    privatePem: pair.privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
  };
}

// Ключи генерируются на каждый прогон тестов
export const rsaKeys = toPair(generateKeyPairSync('rsa', { modulusLength: 2048 }));
export const ed25519Keys = toPair(generateKeyPairSync('ed25519'));

export const TEST_API_KEY_ID = 'test-key-id';
export const TEST_BASE_URL = 'https://trading.test';
export const TEST_PREFIX = '/trade-api/v2';
