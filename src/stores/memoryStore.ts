import type { Session } from '../core/session.js';
import type { SessionStore } from '../core/sessionStore.js';

/**
 * Almacén en memoria: userKey -> (sessionKey -> Session).
 * Igual que un hash en caché, la entrada del usuario sobrevive vacía hasta `removeUser`.
 */
export class MemorySessionStore implements SessionStore {
  private readonly users = new Map<string, Map<string, Session>>();

  async get(userKey: string, sessionKey: string) {
    const session = this.users.get(userKey)?.get(sessionKey);
    return session ? { ...session } : null;
  }

  async put(userKey: string, sessionKey: string, session: Session) {
    let sessions = this.users.get(userKey);
    if (!sessions) {
      sessions = new Map();
      this.users.set(userKey, sessions);
    }
    sessions.set(sessionKey, { ...session });
  }

  async removeSession(userKey: string, sessionKey: string) {
    this.users.get(userKey)?.delete(sessionKey);
  }

  async removeSessions(userKey: string, sessionKeys: Iterable<string>) {
    const sessions = this.users.get(userKey);
    if (!sessions) return;
    for (const key of sessionKeys) sessions.delete(key);
  }

  async removeUser(userKey: string) {
    this.users.delete(userKey);
  }

  async allSessionsForUser(userKey: string) {
    return [...(this.users.get(userKey)?.values() ?? [])].map(s => ({ ...s }));
  }

  async allUserKeys() {
    return [...this.users.keys()];
  }

  async clearAll() {
    this.users.clear();
  }
}
