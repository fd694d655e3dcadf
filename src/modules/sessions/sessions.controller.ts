import { Request, Response, NextFunction } from 'express';
import { StatusCodes } from 'http-status-codes';
import { toPublicSession } from '../../core/session.js';
import type { SessionManager } from '../../core/sessionManager.js';

export function createSessionsController(manager: SessionManager) {
  // Limpia caducadas antes de listar
  async function listUsers(_req: Request, res: Response, next: NextFunction) {
    try {
      const userKeys = await manager.listUserKeys();
      res.json({ data: userKeys, meta: { total: userKeys.length } });
    } catch (err) { next(err); }
  }

  async function listUserSessions(req: Request, res: Response, next: NextFunction) {
    try {
      const sessions = await manager.listUserSessions(req.params.userKey);
      res.json({ data: sessions.map(toPublicSession), meta: { total: sessions.length } });
    } catch (err) { next(err); }
  }

  async function kickOutUser(req: Request, res: Response, next: NextFunction) {
    try {
      await manager.kickOutUser(req.params.userKey);
      res.status(StatusCodes.NO_CONTENT).end();
    } catch (err) { next(err); }
  }

  async function kickOutSession(req: Request, res: Response, next: NextFunction) {
    try {
      await manager.kickOutSession(req.params.userKey, req.params.sessionKey);
      res.status(StatusCodes.NO_CONTENT).end();
    } catch (err) { next(err); }
  }

  async function clearAll(_req: Request, res: Response, next: NextFunction) {
    try {
      await manager.clearAllUsers();
      res.status(StatusCodes.NO_CONTENT).end();
    } catch (err) { next(err); }
  }

  async function sweep(_req: Request, res: Response, next: NextFunction) {
    try {
      const removed = await manager.sweepAll();
      res.json({ removed });
    } catch (err) { next(err); }
  }

  return { listUsers, listUserSessions, kickOutUser, kickOutSession, clearAll, sweep };
}
