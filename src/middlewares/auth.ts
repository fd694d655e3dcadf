import { NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { ApiError } from './errorHandler.js';
import { NotAuthenticatedError } from '../core/errors.js';
import type { SessionManager } from '../core/sessionManager.js';
import type { TokenSource } from '../config/env.js';

export interface TokenLookupOptions {
  /** Nombre de la cabecera / parámetro / cookie */
  tokenName: string;
  /** Orden de prioridad de las fuentes */
  sources: readonly TokenSource[];
}

function stripBearer(value: string) {
  return value.startsWith('Bearer ') ? value.slice('Bearer '.length).trim() : value.trim();
}

export function extractCandidates(req: Request, options: TokenLookupOptions): string[] {
  const candidates: string[] = [];
  for (const source of options.sources) {
    let value: unknown;
    if (source === 'header') value = req.get(options.tokenName);
    else if (source === 'query') value = req.query[options.tokenName];
    else value = req.cookies?.[options.tokenName];

    if (typeof value === 'string') {
      const token = source === 'header' ? stripBearer(value) : value.trim();
      if (token) candidates.push(token);
    }
  }
  return candidates;
}

/**
 * Abre el contexto de la petición y lo rellena con la primera fuente cuyo token verifique.
 * Nunca rechaza: sin token válido la petición sigue sin autenticar.
 * El contexto se limpia siempre al terminar la respuesta (finish o close).
 */
export function resolveSession(manager: SessionManager, options: TokenLookupOptions) {
  return (req: Request, res: Response, next: NextFunction) => {
    manager.context.run(slot => {
      const clear = () => slot.clear();
      res.once('finish', clear);
      res.once('close', clear);

      const tryCandidates = async () => {
        for (const token of extractCandidates(req, options)) {
          if (await manager.verifyToken(token)) return;
        }
      };
      tryCandidates().then(() => next(), next);
    });
  };
}

export function requireSession(manager: SessionManager) {
  return (_req: Request, _res: Response, next: NextFunction) => {
    if (!manager.currentSession()) return next(new NotAuthenticatedError());
    next();
  };
}

export function requireUserType(manager: SessionManager, ...userTypes: string[]) {
  return (_req: Request, _res: Response, next: NextFunction) => {
    const session = manager.currentSession();
    if (!session) return next(new NotAuthenticatedError());
    if (!userTypes.includes(session.userType)) {
      return next(new ApiError(StatusCodes.FORBIDDEN, 'No autorizado'));
    }
    next();
  };
}
