import { NextFunction, Request, Response } from 'express';
import { StatusCodes, getReasonPhrase } from 'http-status-codes';
import { ConfigError, NotAuthenticatedError, StoreError } from '../core/errors.js';

export class ApiError extends Error {
  statusCode: number;
  details?: unknown;
  constructor(statusCode: number, message?: string, details?: unknown) {
    super(message ?? getReasonPhrase(statusCode));
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

function statusOf(err: Error) {
  if (err instanceof ApiError) return err.statusCode;
  if (err instanceof NotAuthenticatedError) return StatusCodes.UNAUTHORIZED;
  if (err instanceof StoreError) return StatusCodes.SERVICE_UNAVAILABLE;
  if (err instanceof ConfigError) return StatusCodes.INTERNAL_SERVER_ERROR;
  if (err instanceof RangeError) return StatusCodes.BAD_REQUEST;
  // body-parser marca sus errores con status (JSON mal formado, payload enorme...)
  const status = 'status' in err ? err.status : undefined;
  return typeof status === 'number' ? status : StatusCodes.INTERNAL_SERVER_ERROR;
}

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction) {
  next(new ApiError(StatusCodes.NOT_FOUND, 'Recurso no encontrado'));
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const error = err instanceof Error ? err : new Error(String(err));
  const status = statusOf(error);
  const payload: { name: string; message: string; code?: string; details?: unknown; stack?: string } = {
    name: error.name,
    message: error.message || 'Error interno',
  };
  if ('code' in error && typeof error.code === 'string') payload.code = error.code;
  if (error instanceof ApiError && error.details) payload.details = error.details;
  if (process.env.NODE_ENV !== 'production' && error.stack) payload.stack = error.stack;
  res.status(status).json(payload);
}
