export { createLimiter, createStrictLimiter, type LimiterOptions } from './rateLimiter.js';
export { errorHandler } from './errorHandler.js';
