import rateLimit from 'express-rate-limit';
import { RateLimitConfig } from '../../../config.js';
import { sendError } from '../respond.js';

function limiter(windowMs: number, max: number, message: string) {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      sendError(res, 'TOO_MANY_REQUESTS', message);
    },
  });
}

/**
 * General API limiter. Each call gets its own in-memory store.
 */
export function createApiRateLimiter(config: RateLimitConfig) {
  return limiter(config.windowMs, config.max, 'Too many requests, please try again later.');
}

/**
 * Stricter limiter for the login endpoint, keyed by client IP.
 */
export function createLoginRateLimiter(config: RateLimitConfig) {
  return limiter(
    config.windowMs,
    config.loginMax,
    'Too many login attempts, please try again later.'
  );
}
