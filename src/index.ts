export { Signer, type SignerKeys } from './core/signer.js';
export { TokenCodec, DEFAULT_MAX_TOKEN_LENGTH, type TokenCodecOptions, type TokenKeys } from './core/tokenCodec.js';
export type { SessionStore } from './core/sessionStore.js';
export { type Session, type PublicSession, toPublicSession, isExpired } from './core/session.js';
export { RequestContext, ContextSlot } from './core/requestContext.js';
export {
  SessionManager,
  type SessionManagerConfig,
  type SessionManagerDeps,
  type LoginParams,
  type VerifyResult
} from './core/sessionManager.js';
export { AuthTokenError, NotAuthenticatedError, StoreError, ConfigError } from './core/errors.js';
export { MemorySessionStore } from './stores/memoryStore.js';
export { MongoSessionStore } from './stores/mongoStore.js';
export { resolveSession, requireSession, requireUserType, type TokenLookupOptions } from './middlewares/auth.js';
export { loadEnv, type Env, type TokenSource } from './config/env.js';
export { startSweepScheduler, type SweepLogger } from './utils/sweepScheduler.js';
