import rateLimit from 'express-rate-limit';

export interface LimiterOptions {
  windowMs: number;
  max: number;
}

const baseOptions = {
  windowMs: 60_000,
  max: 120,
  validate: { xForwardedForHeader: false },
};

export function createLimiter(options: Partial<LimiterOptions> = {}) {
  return rateLimit({ ...baseOptions, ...options });
}

export function createStrictLimiter(windowMs: number = baseOptions.windowMs) {
  return createLimiter({ windowMs, max: 10 });
}
