import crypto from 'crypto';
import { ConfigError, NotAuthenticatedError, errorMessage } from './errors.js';
import { RequestContext } from './requestContext.js';
import { isExpired, type Session } from './session.js';
import type { SessionStore } from './sessionStore.js';
import type { TokenCodec } from './tokenCodec.js';

export interface SessionManagerConfig {
  /** Prefijo de los userKey */
  keyPrefix: string;
  defaultTimeoutMillis: number;
  defaultUserType: string;
  defaultDeviceType: string;
  defaultDeviceName?: string;
  /** false: un solo login activo por usuario */
  concurrentLogin: boolean;
  /** true: un login expulsa a los del mismo deviceType */
  deviceReject: boolean;
  /** Renovar lastAccessTime en cada verificación correcta */
  refreshOnAccess: boolean;
}

export interface LoginParams {
  timeout?: number;
  userType?: string;
  deviceType?: string;
  deviceName?: string;
  loginTime?: number;
}

export type VerifyResult =
  | { valid: true; session: Session }
  | { valid: false };

export interface SessionManagerDeps {
  codec: TokenCodec;
  store: SessionStore;
  config: SessionManagerConfig;
  context?: RequestContext;
  logger?: Pick<Console, 'warn'>;
}

const INVALID: VerifyResult = { valid: false };

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

export function newSessionKey() {
  return crypto.randomUUID().replace(/-/g, '');
}

/**
 * Ciclo de vida de las sesiones: login, verificación, logout, expulsión y limpieza de caducadas.
 *
 * Las secuencias leer-y-borrar no van bajo ningún lock distribuido: con peticiones
 * concurrentes sobre el mismo userKey gana la última escritura / el último borrado.
 */
export class SessionManager {
  readonly context: RequestContext;
  private readonly codec: TokenCodec;
  private readonly store: SessionStore;
  private readonly config: SessionManagerConfig;
  private readonly logger: Pick<Console, 'warn'>;

  constructor(deps: SessionManagerDeps) {
    const { config } = deps;
    if (!config.keyPrefix) throw new ConfigError('keyPrefix requerido');
    if (!isPositiveInteger(config.defaultTimeoutMillis)) {
      throw new ConfigError(`defaultTimeoutMillis inválido: ${config.defaultTimeoutMillis}`);
    }
    this.codec = deps.codec;
    this.store = deps.store;
    this.config = { ...config };
    this.context = deps.context ?? new RequestContext();
    this.logger = deps.logger ?? console;
  }

  buildUserKey(userType: string, id: string) {
    return `${this.config.keyPrefix}_${userType}_${id}`;
  }

  async login(id: string, params: LoginParams = {}): Promise<Session> {
    const timeout = params.timeout ?? this.config.defaultTimeoutMillis;
    if (!isPositiveInteger(timeout)) {
      throw new RangeError(`timeout inválido: ${timeout}`);
    }
    const now = Date.now();
    const userType = params.userType ?? this.config.defaultUserType;
    const userKey = this.buildUserKey(userType, id);
    const sessionKey = newSessionKey();
    const session: Session = {
      id,
      userType,
      userKey,
      sessionKey,
      token: this.codec.encode(userKey, sessionKey),
      timeoutMillis: timeout,
      loginTimeMillis: params.loginTime ?? now,
      lastAccessTimeMillis: now,
      deviceType: params.deviceType ?? this.config.defaultDeviceType,
      deviceName: params.deviceName ?? this.config.defaultDeviceName ?? ''
    };

    if (!this.config.concurrentLogin) {
      await this.store.removeUser(userKey);
    } else if (this.config.deviceReject) {
      const sameDevice = (await this.store.allSessionsForUser(userKey))
        .filter(s => s.deviceType === session.deviceType)
        .map(s => s.sessionKey);
      if (sameDevice.length > 0) {
        await this.store.removeSessions(userKey, sameDevice);
      }
    }

    await this.store.put(userKey, sessionKey, session);
    this.context.set(session);
    await this.sweepUser(userKey);
    return session;
  }

  /** Nunca lanza: token corrupto, firma mala, sesión inexistente o caducada dan { valid: false } */
  async verify(token: string): Promise<VerifyResult> {
    try {
      const keys = this.codec.decode(token);
      if (!keys) return INVALID;

      const session = await this.store.get(keys.userKey, keys.sessionKey);
      if (!session || session.token !== token) return INVALID;

      const now = Date.now();
      if (isExpired(session, now)) {
        await this.store.removeSession(session.userKey, session.sessionKey);
        return INVALID;
      }
      if (this.config.refreshOnAccess && now > session.lastAccessTimeMillis) {
        session.lastAccessTimeMillis = now;
        await this.store.put(session.userKey, session.sessionKey, session);
      }
      this.context.set(session);
      return { valid: true, session };
    } catch {
      return INVALID;
    }
  }

  async verifyToken(token: string) {
    return (await this.verify(token)).valid;
  }

  currentSession(): Session | undefined {
    return this.context.get();
  }

  requireSession(): Session {
    const session = this.context.get();
    if (!session) throw new NotAuthenticatedError();
    return session;
  }

  async logout() {
    const session = this.requireSession();
    await this.store.removeSession(session.userKey, session.sessionKey);
    this.context.clear();
  }

  kickOutUser(userKey: string) {
    return this.store.removeUser(userKey);
  }

  kickOutSession(userKey: string, sessionKey: string) {
    return this.store.removeSession(userKey, sessionKey);
  }

  clearAllUsers() {
    return this.store.clearAll();
  }

  /**
   * Borra las sesiones caducadas del usuario; si caducaron todas, borra también su entrada.
   * Los borrados son best-effort: un fallo se registra y la limpieza sigue.
   */
  async sweepUser(userKey: string): Promise<number> {
    const sessions = await this.store.allSessionsForUser(userKey);
    const now = Date.now();
    let removed = 0;
    for (const session of sessions) {
      if (!isExpired(session, now)) continue;
      try {
        await this.store.removeSession(userKey, session.sessionKey);
        removed++;
      } catch (err) {
        this.logger.warn(`[auth] No se pudo eliminar la sesión caducada ${session.sessionKey}: ${errorMessage(err)}`);
      }
    }
    if (removed === sessions.length) {
      try {
        await this.store.removeUser(userKey);
      } catch (err) {
        this.logger.warn(`[auth] No se pudo eliminar la entrada vacía ${userKey}: ${errorMessage(err)}`);
      }
    }
    return removed;
  }

  async sweepAll(): Promise<number> {
    let removed = 0;
    for (const userKey of await this.store.allUserKeys()) {
      removed += await this.sweepUser(userKey);
    }
    return removed;
  }

  /** Usuarios con al menos una sesión viva */
  async listUserKeys() {
    await this.sweepAll();
    return this.store.allUserKeys();
  }

  async listUserSessions(userKey: string) {
    await this.sweepUser(userKey);
    return this.store.allSessionsForUser(userKey);
  }

  async currentUserSessions() {
    return this.listUserSessions(this.requireSession().userKey);
  }
}
