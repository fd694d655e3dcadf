import mongoose from 'mongoose';
import { loadEnv } from './config/env.js';
import { createApp } from './app.js';
import { Signer } from './core/signer.js';
import { TokenCodec } from './core/tokenCodec.js';
import { SessionManager } from './core/sessionManager.js';
import { MongoSessionStore } from './stores/mongoStore.js';
import { verifyUserCredentials } from './modules/auth/credentials.js';
import { errorMessage } from './core/errors.js';
import { startSweepScheduler } from './utils/sweepScheduler.js';

async function main() {
  const env = loadEnv();
  const signer = new Signer({ privateKey: env.SIGN_PRIVATE_KEY, publicKey: env.SIGN_PUBLIC_KEY });
  const codec = new TokenCodec(signer, {
    nonceMinLength: env.NONCE_MIN_LENGTH,
    nonceMaxLength: env.NONCE_MAX_LENGTH,
    maxTokenLength: env.MAX_TOKEN_LENGTH
  });

  await mongoose.connect(env.MONGO_URI);
  console.log('✅ MongoDB conectado');

  const manager = new SessionManager({ codec, store: new MongoSessionStore(), config: env.session });
  const app = createApp({ env, manager, verifyCredentials: verifyUserCredentials });

  // Limpieza periódica opcional; el login y los listados ya limpian por tráfico
  if (env.SWEEP_INTERVAL_MS > 0) {
    startSweepScheduler(manager, env.SWEEP_INTERVAL_MS);
  }

  app.listen(env.PORT, () => {
    console.log(`🚀 API escuchando en el puerto ${env.PORT}`);
  });
}

main().catch(err => {
  console.error('❌ No se pudo arrancar:', errorMessage(err));
  process.exit(1);
});
