/**
 * Rate Limiter Middleware
 * Every /v1 call spends from the per-client budget; pool and ledger writes
 * also spend from a tighter write budget in the same one-minute window.
 */
import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import { env } from '../../../config/env.js';
import type { ApiError } from './error-handler.js';

const WINDOW_MS = 60_000;

export function createRateLimiter(limit: number, message: string): RateLimitRequestHandler {
  return rateLimit({
    windowMs: WINDOW_MS,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: { status: 'error', code: 'RATE_LIMIT_EXCEEDED', message } satisfies ApiError,
  });
}

export const apiLimiter = createRateLimiter(env.RATE_LIMIT_MAX, 'Too many requests, please try again later');

/** createPool, deposit, withdraw, swap and ledger funding */
export const writeLimiter = createRateLimiter(
  Math.max(1, Math.floor(env.RATE_LIMIT_MAX / 5)),
  'Too many pool or ledger writes, please try again later',
);
