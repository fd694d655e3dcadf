import type { Model } from 'mongoose';
import { SessionModel, type ISession } from '../models/Session.js';
import { StoreError } from '../core/errors.js';
import type { Session } from '../core/session.js';
import type { SessionStore } from '../core/sessionStore.js';

function toSession(doc: ISession): Session {
  return {
    id: doc.subjectId,
    userType: doc.userType,
    userKey: doc.userKey,
    sessionKey: doc.sessionKey,
    token: doc.token,
    timeoutMillis: doc.timeoutMillis,
    loginTimeMillis: doc.loginTimeMillis,
    lastAccessTimeMillis: doc.lastAccessTimeMillis,
    deviceType: doc.deviceType,
    deviceName: doc.deviceName
  };
}

function toDocument(session: Session): ISession {
  const { id, ...rest } = session;
  return { subjectId: id, ...rest };
}

/**
 * Sesiones en MongoDB. La "entrada" de un usuario son sus documentos:
 * sin documentos el userKey deja de aparecer en `allUserKeys`.
 */
export class MongoSessionStore implements SessionStore {
  constructor(private readonly model: Model<ISession> = SessionModel) {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreError(operation, err);
    }
  }

  get(userKey: string, sessionKey: string) {
    return this.run('get', async () => {
      const doc = await this.model.findOne({ userKey, sessionKey }).lean<ISession>().exec();
      return doc ? toSession(doc) : null;
    });
  }

  put(userKey: string, sessionKey: string, session: Session) {
    return this.run('put', async () => {
      await this.model.updateOne(
        { userKey, sessionKey },
        { $set: { ...toDocument(session), userKey, sessionKey } },
        { upsert: true }
      ).exec();
    });
  }

  removeSession(userKey: string, sessionKey: string) {
    return this.run('removeSession', async () => {
      await this.model.deleteOne({ userKey, sessionKey }).exec();
    });
  }

  removeSessions(userKey: string, sessionKeys: Iterable<string>) {
    return this.run('removeSessions', async () => {
      const keys = [...sessionKeys];
      if (keys.length === 0) return;
      await this.model.deleteMany({ userKey, sessionKey: { $in: keys } }).exec();
    });
  }

  removeUser(userKey: string) {
    return this.run('removeUser', async () => {
      await this.model.deleteMany({ userKey }).exec();
    });
  }

  allSessionsForUser(userKey: string) {
    return this.run('allSessionsForUser', async () => {
      const docs = await this.model.find({ userKey }).lean<ISession[]>().exec();
      return docs.map(toSession);
    });
  }

  allUserKeys() {
    return this.run('allUserKeys', async () => {
      const keys = await this.model.distinct('userKey').exec();
      return keys.filter((key): key is string => typeof key === 'string');
    });
  }

  clearAll() {
    return this.run('clearAll', async () => {
      await this.model.deleteMany({}).exec();
    });
  }
}
