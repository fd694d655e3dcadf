import { AsyncLocalStorage } from 'async_hooks';
import type { Session } from './session.js';

/** Hueco de una petición: como mucho una sesión */
export class ContextSlot {
  private session?: Session;

  get() {
    return this.session ? { ...this.session } : undefined;
  }

  set(session: Session) {
    this.session = { ...session };
  }

  // Idempotente
  clear() {
    this.session = undefined;
  }
}

/**
 * Sesión autenticada de la petición en curso.
 *
 * Cada `run` abre un hueco nuevo, visible desde todas las continuaciones asíncronas
 * de esa petición y de ninguna otra. Las sesiones se copian al entrar y al salir,
 * así nadie comparte una referencia mutable con el hueco.
 */
export class RequestContext {
  private readonly storage = new AsyncLocalStorage<ContextSlot>();

  run<T>(fn: (slot: ContextSlot) => T, initial?: Session): T {
    const slot = new ContextSlot();
    if (initial) slot.set(initial);
    return this.storage.run(slot, () => fn(slot));
  }

  // Trabajo derivado que no debe escribir en el hueco de la petición
  fork<T>(fn: (slot: ContextSlot) => T): T {
    return this.run(fn, this.get());
  }

  get(): Session | undefined {
    return this.storage.getStore()?.get();
  }

  // Fuera de un `run` no hay hueco: no hace nada
  set(session: Session) {
    this.storage.getStore()?.set(session);
  }

  clear() {
    this.storage.getStore()?.clear();
  }

  get active() {
    return this.storage.getStore() !== undefined;
  }
}
