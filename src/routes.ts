import { Router } from 'express';
import healthRoutes from './modules/health/health.routes.js';
import { createAuthRoutes } from './modules/auth/auth.routes.js';
import { createSessionsRoutes } from './modules/sessions/sessions.routes.js';
import type { SessionManager } from './core/sessionManager.js';
import type { CredentialVerifier } from './modules/auth/credentials.js';

export interface RouterDeps {
  manager: SessionManager;
  verifyCredentials: CredentialVerifier;
  adminUserTypes: string[];
  loginRateLimit: number;
}

export function createRouter(deps: RouterDeps) {
  const router = Router();

  router.use(healthRoutes);
  router.use('/auth', createAuthRoutes(deps.manager, deps.verifyCredentials, deps.loginRateLimit));
  router.use('/sessions', createSessionsRoutes(deps.manager, deps.adminUserTypes));

  return router;
}
