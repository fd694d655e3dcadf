import type { Session } from './session.js';

/**
 * Persistencia de sesiones indexada por (userKey, sessionKey).
 *
 * Cada llamada se trata como atómica; no se asumen transacciones entre claves.
 * Las sesiones devueltas son copias: modificarlas no cambia el almacén hasta `put`.
 * Los fallos del backend se rechazan como `StoreError`.
 */
export interface SessionStore {
  get(userKey: string, sessionKey: string): Promise<Session | null>;
  /** Upsert */
  put(userKey: string, sessionKey: string, session: Session): Promise<void>;
  removeSession(userKey: string, sessionKey: string): Promise<void>;
  removeSessions(userKey: string, sessionKeys: Iterable<string>): Promise<void>;
  /** Elimina todas las sesiones del usuario y su entrada */
  removeUser(userKey: string): Promise<void>;
  allSessionsForUser(userKey: string): Promise<Session[]>;
  allUserKeys(): Promise<string[]>;
  clearAll(): Promise<void>;
}
