export { errorHandler } from './error-handler.js';
export { apiLimiter, writeLimiter, createRateLimiter } from './rate-limiter.js';
export { requestLogger } from './request-logger.js';
