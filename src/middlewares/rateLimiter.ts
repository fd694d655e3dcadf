import rateLimit from 'express-rate-limit';

export function createLoginLimiter(max: number) {
  return rateLimit({
    windowMs: 60 * 1000,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { message: 'Demasiados intentos de inicio de sesión. Intenta más tarde.' }
  });
}
