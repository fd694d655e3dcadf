import { Router } from 'express';
import { validateBody } from '../../middlewares/validate.js';
import { createLoginLimiter } from '../../middlewares/rateLimiter.js';
import { requireSession } from '../../middlewares/auth.js';
import { createAuthController } from './auth.controller.js';
import { loginSchema } from './auth.schemas.js';
import type { SessionManager } from '../../core/sessionManager.js';
import type { CredentialVerifier } from './credentials.js';

export function createAuthRoutes(manager: SessionManager, verifyCredentials: CredentialVerifier, loginRateLimit: number) {
  const router = Router();
  const { login, logout, me, devices } = createAuthController(manager, verifyCredentials);

  router.post('/login', createLoginLimiter(loginRateLimit), validateBody(loginSchema), login);
  router.post('/logout', requireSession(manager), logout);
  router.get('/me', requireSession(manager), me);
  router.get('/devices', requireSession(manager), devices);

  return router;
}
