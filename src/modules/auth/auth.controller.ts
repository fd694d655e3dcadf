import { Request, Response, NextFunction } from 'express';
import { StatusCodes } from 'http-status-codes';
import { ApiError } from '../../middlewares/errorHandler.js';
import { toPublicSession } from '../../core/session.js';
import type { SessionManager } from '../../core/sessionManager.js';
import type { CredentialVerifier } from './credentials.js';
import type { LoginBody } from './auth.schemas.js';

export function createAuthController(manager: SessionManager, verifyCredentials: CredentialVerifier) {
  async function login(req: Request, res: Response, next: NextFunction) {
    try {
      const { username, password, deviceType, deviceName, timeout }: LoginBody = req.body;
      const user = await verifyCredentials(username, password);
      if (!user) throw new ApiError(StatusCodes.UNAUTHORIZED, 'Credenciales inválidas');

      const session = await manager.login(user.id, { userType: user.userType, deviceType, deviceName, timeout });
      res.status(StatusCodes.CREATED).json({ token: session.token, session: toPublicSession(session) });
    } catch (err) { next(err); }
  }

  async function logout(_req: Request, res: Response, next: NextFunction) {
    try {
      await manager.logout();
      res.status(StatusCodes.NO_CONTENT).end();
    } catch (err) { next(err); }
  }

  function me(_req: Request, res: Response, next: NextFunction) {
    try {
      res.json(toPublicSession(manager.requireSession()));
    } catch (err) { next(err); }
  }

  // Todos los dispositivos del usuario actual
  async function devices(_req: Request, res: Response, next: NextFunction) {
    try {
      const current = manager.requireSession();
      const sessions = await manager.currentUserSessions();
      res.json({
        data: sessions.map(s => ({ ...toPublicSession(s), current: s.sessionKey === current.sessionKey }))
      });
    } catch (err) { next(err); }
  }

  return { login, logout, me, devices };
}
