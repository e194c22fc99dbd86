import rateLimit from 'express-rate-limit';

/**
 * General API rate limiter (60 requests per minute per IP).
 * Uses in-memory store (resets on server restart).
 */
export function createApiRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: 60,
    message: 'Too many requests, please try again later.',
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter limiter for credential checks (10 attempts per minute per IP).
 */
export function createLoginRateLimiter(limit = 10) {
  return rateLimit({
    windowMs: 60 * 1000,
    limit,
    message: 'Too many login attempts, please try again later.',
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => req.ip || req.socket.remoteAddress || 'unknown',
  });
}
