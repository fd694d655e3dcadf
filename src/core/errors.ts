export class AuthTokenError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthTokenError';
    this.code = code;
  }
}

// Operación que exige una sesión propagada (logout, getUser...)
export class NotAuthenticatedError extends AuthTokenError {
  constructor(message = 'Usuario no autenticado') {
    super(message, 'NOT_AUTHENTICATED');
    this.name = 'NotAuthenticatedError';
  }
}

export class StoreError extends AuthTokenError {
  constructor(operation: string, cause: unknown) {
    super(`Fallo del almacén de sesiones en ${operation}: ${errorMessage(cause)}`, 'STORE_FAILURE', { cause });
    this.name = 'StoreError';
  }
}

export class ConfigError extends AuthTokenError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
