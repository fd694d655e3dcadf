import crypto from 'crypto';
import { Signer } from '../src/core/signer.js';
import { TokenCodec } from '../src/core/tokenCodec.js';
import { SessionManager, type SessionManagerConfig } from '../src/core/sessionManager.js';
import { MemorySessionStore } from '../src/stores/memoryStore.js';
import type { SessionStore } from '../src/core/sessionStore.js';

export interface TestKeys {
  privateKey: string;
  publicKey: string;
}

export function generateKeys(): TestKeys {
  const { privateKey, publicKey } = crypto.generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'der' },
    privateKeyEncoding: { type: 'pkcs8', format: 'der' }
  });
  return { privateKey: privateKey.toString('base64'), publicKey: publicKey.toString('base64') };
}

let cached: TestKeys | undefined;
export function testKeys() {
  cached ??= generateKeys();
  return cached;
}

export const baseConfig: SessionManagerConfig = {
  keyPrefix: 'auth',
  defaultTimeoutMillis: 30 * 60 * 1000,
  defaultUserType: 'user',
  defaultDeviceType: 'web',
  concurrentLogin: true,
  deviceReject: false,
  refreshOnAccess: true
};

export function buildManager(config: Partial<SessionManagerConfig> = {}, store: SessionStore = new MemorySessionStore()) {
  const codec = new TokenCodec(new Signer(testKeys()));
  const logger = { warn: (..._args: unknown[]) => {} };
  const manager = new SessionManager({ codec, store, config: { ...baseConfig, ...config }, logger });
  return { manager, store, codec, logger };
}
