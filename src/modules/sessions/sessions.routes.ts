import { Router } from 'express';
import { requireUserType } from '../../middlewares/auth.js';
import { validateParams } from '../../middlewares/validate.js';
import { createSessionsController } from './sessions.controller.js';
import { sessionParamsSchema, userKeyParamsSchema } from './sessions.schemas.js';
import type { SessionManager } from '../../core/sessionManager.js';

// Administración de sesiones (solo userType de administración)
export function createSessionsRoutes(manager: SessionManager, adminUserTypes: string[]) {
  const router = Router();
  const c = createSessionsController(manager);

  router.use(requireUserType(manager, ...adminUserTypes));

  router.get('/users', c.listUsers);
  router.get('/users/:userKey', validateParams(userKeyParamsSchema), c.listUserSessions);
  router.delete('/users/:userKey', validateParams(userKeyParamsSchema), c.kickOutUser);
  router.delete('/users/:userKey/:sessionKey', validateParams(sessionParamsSchema), c.kickOutSession);
  router.delete('/', c.clearAll);
  router.post('/sweep', c.sweep);

  return router;
}
