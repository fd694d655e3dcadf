import crypto, { type KeyObject } from 'crypto';
import { ConfigError, errorMessage } from './errors.js';

export interface SignerKeys {
  /** PKCS#8 en base64 (DER) o PEM. Opcional: sin ella el signer solo verifica */
  privateKey?: string;
  /** SPKI en base64 (DER) o PEM */
  publicKey: string;
}

const ALGORITHM = 'RSA-SHA256';
// Solo minúsculas: una firma tiene una única representación válida
const HEX_REGEX = /^(?:[0-9a-f]{2})+$/;

function isPem(key: string) {
  return key.includes('-----BEGIN');
}

function loadPrivateKey(key: string): KeyObject {
  try {
    if (isPem(key)) return crypto.createPrivateKey(key);
    return crypto.createPrivateKey({ key: Buffer.from(key, 'base64'), format: 'der', type: 'pkcs8' });
  } catch (err) {
    throw new ConfigError(`Clave privada de firma inválida: ${errorMessage(err)}`);
  }
}

function loadPublicKey(key: string): KeyObject {
  try {
    if (isPem(key)) return crypto.createPublicKey(key);
    return crypto.createPublicKey({ key: Buffer.from(key, 'base64'), format: 'der', type: 'spki' });
  } catch (err) {
    throw new ConfigError(`Clave pública de firma inválida: ${errorMessage(err)}`);
  }
}

export class Signer {
  private readonly privateKey?: KeyObject;
  private readonly publicKey: KeyObject;

  constructor(keys: SignerKeys) {
    if (!keys.publicKey?.trim()) {
      throw new ConfigError('Falta la clave pública de firma');
    }
    this.publicKey = loadPublicKey(keys.publicKey.trim());
    if (keys.privateKey?.trim()) {
      this.privateKey = loadPrivateKey(keys.privateKey.trim());
    }
  }

  get canSign() {
    return this.privateKey !== undefined;
  }

  sign(payload: Buffer | string): string {
    if (!this.privateKey) {
      throw new ConfigError('Signer sin clave privada: solo puede verificar');
    }
    return crypto.sign(ALGORITHM, toBuffer(payload), this.privateKey).toString('hex');
  }

  // Nunca lanza: cualquier fallo es simplemente "no válido"
  verify(payload: Buffer | string, signatureHex: string): boolean {
    if (!HEX_REGEX.test(signatureHex)) return false;
    try {
      return crypto.verify(ALGORITHM, toBuffer(payload), this.publicKey, Buffer.from(signatureHex, 'hex'));
    } catch {
      return false;
    }
  }
}

function toBuffer(payload: Buffer | string) {
  return typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
}
