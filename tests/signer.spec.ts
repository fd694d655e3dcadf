import crypto from 'crypto';
import { describe, it, expect } from 'vitest';
import { Signer } from '../src/core/signer.js';
import { ConfigError } from '../src/core/errors.js';
import { generateKeys, testKeys } from './helpers.js';

describe('Signer', () => {
  const signer = new Signer(testKeys());

  it('firma y verifica con el par de claves', () => {
    const sig = signer.sign('hola');
    expect(sig).toMatch(/^[0-9a-f]+$/);
    expect(signer.verify('hola', sig)).toBe(true);
    expect(signer.verify(Buffer.from('hola', 'utf8'), sig)).toBe(true);
  });

  it('rechaza payload alterado', () => {
    const sig = signer.sign('hola');
    expect(signer.verify('hola!', sig)).toBe(false);
  });

  it('rechaza hex mal formado sin lanzar', () => {
    const sig = signer.sign('hola');
    expect(signer.verify('hola', 'zz')).toBe(false);
    expect(signer.verify('hola', sig.slice(1))).toBe(false);
    expect(signer.verify('hola', sig.toUpperCase())).toBe(false);
    expect(signer.verify('hola', '')).toBe(false);
    expect(signer.verify('hola', 'abcd')).toBe(false);
  });

  it('rechaza firmas de otra clave', () => {
    const other = new Signer(generateKeys());
    expect(signer.verify('hola', other.sign('hola'))).toBe(false);
  });

  it('un signer solo con clave pública verifica pero no firma', () => {
    const verifier = new Signer({ publicKey: testKeys().publicKey });
    expect(verifier.canSign).toBe(false);
    expect(verifier.verify('hola', signer.sign('hola'))).toBe(true);
    expect(() => verifier.sign('hola')).toThrow(ConfigError);
  });

  it('acepta claves PEM', () => {
    const { privateKey, publicKey } = crypto.generateKeyPairSync('rsa', {
      modulusLength: 2048,
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' }
    });
    const pem = new Signer({ privateKey, publicKey });
    expect(pem.verify('x', pem.sign('x'))).toBe(true);
  });

  it('falla al construir con claves ausentes o inválidas', () => {
    expect(() => new Signer({ publicKey: '' })).toThrow(ConfigError);
    expect(() => new Signer({ publicKey: 'no-es-una-clave' })).toThrow(ConfigError);
    expect(() => new Signer({ publicKey: testKeys().publicKey, privateKey: 'basura' })).toThrow(ConfigError);
  });
});
