import crypto from 'crypto';
import basex from 'base-x';
import { ConfigError } from './errors.js';
import type { Signer } from './signer.js';

const BASE62 = basex('0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz');
const NONCE_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
const SIGNATURE_SEPARATOR = '&&';
// Un token real con clave de 4096 bits ronda los 1.500 caracteres
export const DEFAULT_MAX_TOKEN_LENGTH = 4096;

export interface TokenKeys {
  userKey: string;
  sessionKey: string;
}

export interface TokenCodecOptions {
  /** Longitud mínima del nonce (incluida) */
  nonceMinLength?: number;
  /** Longitud máxima del nonce (excluida) */
  nonceMaxLength?: number;
  /** Tokens más largos se rechazan sin decodificar */
  maxTokenLength?: number;
}

export function randomString(length: number) {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += NONCE_ALPHABET[crypto.randomInt(NONCE_ALPHABET.length)];
  }
  return out;
}

/**
 * Token = base62( payload + "&&" + firmaHex ), con payload = JSON [userKey, sessionKey, nonce].
 * El array JSON evita ambigüedad aunque userKey contenga separadores.
 */
export class TokenCodec {
  private readonly nonceMin: number;
  private readonly nonceMax: number;
  private readonly maxTokenLength: number;

  constructor(private readonly signer: Signer, options: TokenCodecOptions = {}) {
    this.nonceMin = options.nonceMinLength ?? 10;
    this.nonceMax = options.nonceMaxLength ?? 20;
    if (!Number.isInteger(this.nonceMin) || !Number.isInteger(this.nonceMax) || this.nonceMin < 1 || this.nonceMax <= this.nonceMin) {
      throw new ConfigError(`Rango de nonce inválido: [${this.nonceMin}, ${this.nonceMax})`);
    }
    this.maxTokenLength = options.maxTokenLength ?? DEFAULT_MAX_TOKEN_LENGTH;
    if (!Number.isInteger(this.maxTokenLength) || this.maxTokenLength < 1) {
      throw new ConfigError(`maxTokenLength inválido: ${this.maxTokenLength}`);
    }
  }

  encode(userKey: string, sessionKey: string): string {
    const nonce = randomString(crypto.randomInt(this.nonceMin, this.nonceMax));
    const payload = JSON.stringify([userKey, sessionKey, nonce]);
    const signatureHex = this.signer.sign(payload);
    return BASE62.encode(Buffer.from(payload + SIGNATURE_SEPARATOR + signatureHex, 'utf8'));
  }

  // null para cualquier motivo de fallo: no se expone el porqué
  decode(token: string): TokenKeys | null {
    // la decodificación base62 es cuadrática en la longitud
    if (token.length > this.maxTokenLength) return null;
    let raw: string;
    try {
      raw = Buffer.from(BASE62.decode(token)).toString('utf8');
    } catch {
      return null;
    }

    const cut = raw.lastIndexOf(SIGNATURE_SEPARATOR);
    if (cut <= 0) return null;
    const payload = raw.slice(0, cut);
    const signatureHex = raw.slice(cut + SIGNATURE_SEPARATOR.length);
    if (!this.signer.verify(payload, signatureHex)) return null;

    let fields: unknown;
    try {
      fields = JSON.parse(payload);
    } catch {
      return null;
    }
    if (!Array.isArray(fields) || fields.length !== 3) return null;
    const [userKey, sessionKey, nonce] = fields;
    if (typeof userKey !== 'string' || typeof sessionKey !== 'string' || typeof nonce !== 'string') {
      return null;
    }
    return { userKey, sessionKey };
  }
}
