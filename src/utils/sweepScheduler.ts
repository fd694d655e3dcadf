import { errorMessage } from '../core/errors.js';
import type { SessionManager } from '../core/sessionManager.js';

export type SweepLogger = Pick<Console, 'log' | 'error'>;

/**
 * Lanza sweepAll() cada intervalMs. Si la limpieza anterior sigue en curso, el tick se salta.
 * Devuelve la función que detiene el temporizador.
 */
export function startSweepScheduler(
  manager: Pick<SessionManager, 'sweepAll'>,
  intervalMs: number,
  logger: SweepLogger = console
) {
  let running = false;

  const runSweep = async () => {
    if (running) return;
    running = true;
    try {
      const removed = await manager.sweepAll();
      if (removed > 0) logger.log(`🧹 ${removed} sesiones caducadas eliminadas`);
    } catch (err) {
      logger.error('❌ Error en la limpieza de sesiones:', errorMessage(err));
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void runSweep();
  }, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
