import rateLimit from 'express-rate-limit';

/**
 * General API rate limiter, per client IP.
 * Uses in-memory store (resets on server restart).
 */
export function apiRateLimiter(requestsPerMinute: number) {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: requestsPerMinute,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
