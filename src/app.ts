import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import hpp from 'hpp';
import cookieParser from 'cookie-parser';
import mongoSanitize from 'express-mongo-sanitize';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler.js';
import { resolveSession } from './middlewares/auth.js';
import { createRouter } from './routes.js';
import type { Env } from './config/env.js';
import type { SessionManager } from './core/sessionManager.js';
import type { CredentialVerifier } from './modules/auth/credentials.js';

export type AppEnv = Pick<Env,
  'NODE_ENV' | 'CLIENT_ORIGINS' | 'TOKEN_NAME' | 'TOKEN_SOURCES' | 'ADMIN_USER_TYPES' |
  'RATE_LIMIT_WINDOW_MIN' | 'RATE_LIMIT_MAX' | 'LOGIN_RATE_LIMIT_MAX'>;

export interface AppDeps {
  env: AppEnv;
  manager: SessionManager;
  verifyCredentials: CredentialVerifier;
}

export function createApp({ env, manager, verifyCredentials }: AppDeps) {
  const app = express();
  // detrás de un proxy inverso
  app.set('trust proxy', 1);

  // Security & parsing
  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  app.use(cookieParser());
  app.use(hpp());
  app.use(mongoSanitize());

  app.use(cors({
    origin: function (origin, callback) {
      // Permitir peticiones sin origin (Postman, curl)
      if (!origin) return callback(null, true);
      if (env.CLIENT_ORIGINS.includes(origin)) return callback(null, true);
      return callback(new Error('CORS not allowed'), false);
    },
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', env.TOKEN_NAME],
    credentials: true
  }));

  // Logging
  if (env.NODE_ENV !== 'test') {
    app.use(morgan('dev'));
  }

  const apiLimiter = rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MIN * 60 * 1000,
    max: env.RATE_LIMIT_MAX,
    standardHeaders: true,
    legacyHeaders: false
  });
  app.use('/api/v1', apiLimiter);

  // Después de los parsers: cookies y query ya están disponibles
  app.use('/api/v1', resolveSession(manager, { tokenName: env.TOKEN_NAME, sources: env.TOKEN_SOURCES }));
  app.use('/api/v1', createRouter({
    manager,
    verifyCredentials,
    adminUserTypes: env.ADMIN_USER_TYPES,
    loginRateLimit: env.LOGIN_RATE_LIMIT_MAX
  }));

  // 404 & error
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
