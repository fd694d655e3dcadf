export interface Session {
  /** Identificador de negocio del usuario */
  id: string;
  userType: string;
  /** prefix + "_" + userType + "_" + id, compartido por todos los dispositivos */
  userKey: string;
  /** Único por login */
  sessionKey: string;
  token: string;
  timeoutMillis: number;
  loginTimeMillis: number;
  lastAccessTimeMillis: number;
  deviceType: string;
  deviceName: string;
}

export type PublicSession = Omit<Session, 'token'>;

export function toPublicSession(session: Session): PublicSession {
  const { token: _token, ...rest } = session;
  return rest;
}

export function isExpired(session: Session, now = Date.now()) {
  return now - session.lastAccessTimeMillis >= session.timeoutMillis;
}
