import { ConfigError } from '../core/errors.js';
import type { SessionManagerConfig } from '../core/sessionManager.js';

export const TOKEN_SOURCES = ['header', 'query', 'cookie'] as const;
export type TokenSource = typeof TOKEN_SOURCES[number];

export interface Env {
  NODE_ENV: string;
  PORT: number;
  CLIENT_ORIGINS: string[];
  MONGO_URI: string;
  SIGN_PRIVATE_KEY: string;
  SIGN_PUBLIC_KEY: string;
  TOKEN_NAME: string;
  TOKEN_SOURCES: TokenSource[];
  NONCE_MIN_LENGTH: number;
  NONCE_MAX_LENGTH: number;
  MAX_TOKEN_LENGTH: number;
  ADMIN_USER_TYPES: string[];
  SWEEP_INTERVAL_MS: number;
  RATE_LIMIT_WINDOW_MIN: number;
  RATE_LIMIT_MAX: number;
  LOGIN_RATE_LIMIT_MAX: number;
  session: SessionManagerConfig;
}

function isTokenSource(value: string): value is TokenSource {
  return (TOKEN_SOURCES as readonly string[]).includes(value);
}

function list(value: string) {
  return value.split(',').map(v => v.trim()).filter(Boolean);
}

/** Lee y valida la configuración; falla al arrancar, no en el primer uso */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  function required(name: string, fallback?: string) {
    const v = source[name] ?? fallback;
    if (v === undefined || v === '') {
      throw new ConfigError(`Missing env var: ${name}`);
    }
    return v;
  }

  function int(name: string, fallback: string, min = 0) {
    const raw = required(name, fallback);
    const n = Number(raw);
    if (!Number.isInteger(n) || n < min) {
      throw new ConfigError(`Env var ${name} debe ser un entero >= ${min} (valor: ${raw})`);
    }
    return n;
  }

  function bool(name: string, fallback: 'true' | 'false') {
    const raw = required(name, fallback).toLowerCase();
    if (raw !== 'true' && raw !== 'false') {
      throw new ConfigError(`Env var ${name} debe ser true o false (valor: ${raw})`);
    }
    return raw === 'true';
  }

  const sources = list(required('TOKEN_SOURCES', 'header,query,cookie'));
  const unknown = sources.filter(s => !isTokenSource(s));
  if (unknown.length > 0 || sources.length === 0) {
    throw new ConfigError(`TOKEN_SOURCES inválido: ${unknown.join(',') || '(vacío)'}`);
  }

  return {
    NODE_ENV: source.NODE_ENV ?? 'development',
    PORT: int('PORT', '4000'),
    CLIENT_ORIGINS: list(required('CLIENT_ORIGINS', 'http://localhost:5173')),
    MONGO_URI: required('MONGO_URI', 'mongodb://127.0.0.1:27017/auth-token'),
    SIGN_PRIVATE_KEY: required('SIGN_PRIVATE_KEY'),
    SIGN_PUBLIC_KEY: required('SIGN_PUBLIC_KEY'),
    TOKEN_NAME: required('TOKEN_NAME', 'authorization'),
    TOKEN_SOURCES: sources.filter(isTokenSource),
    NONCE_MIN_LENGTH: int('NONCE_MIN_LENGTH', '10', 1),
    NONCE_MAX_LENGTH: int('NONCE_MAX_LENGTH', '20', 2),
    MAX_TOKEN_LENGTH: int('MAX_TOKEN_LENGTH', '4096', 1),
    ADMIN_USER_TYPES: list(required('ADMIN_USER_TYPES', 'admin')),
    SWEEP_INTERVAL_MS: int('SWEEP_INTERVAL_MS', '0'),
    RATE_LIMIT_WINDOW_MIN: int('RATE_LIMIT_WINDOW_MIN', '15', 1),
    RATE_LIMIT_MAX: int('RATE_LIMIT_MAX', '100', 1),
    LOGIN_RATE_LIMIT_MAX: int('LOGIN_RATE_LIMIT_MAX', '10', 1),
    session: {
      keyPrefix: required('STORE_KEY_PREFIX', 'auth'),
      defaultTimeoutMillis: int('DEFAULT_TIMEOUT_MS', String(30 * 60 * 1000), 1),
      defaultUserType: required('DEFAULT_USER_TYPE', 'user'),
      defaultDeviceType: required('DEFAULT_DEVICE_TYPE', 'web'),
      defaultDeviceName: source.DEFAULT_DEVICE_NAME ?? '',
      concurrentLogin: bool('CONCURRENT_LOGIN', 'true'),
      deviceReject: bool('DEVICE_REJECT', 'false'),
      refreshOnAccess: bool('REFRESH_ON_ACCESS', 'true')
    }
  };
}
