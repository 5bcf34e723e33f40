import rateLimit from 'express-rate-limit';
import { AppError, ERROR_CODES } from '../utils/errors';

interface RateLimitOptions {
  windowMs?: number;
  max?: number;
  message?: string;
}

/**
 * Per-IP request ceiling in front of the API. Per-user operation limits
 * live in RateLimitService.
 */
export const rateLimiter = (options: RateLimitOptions = {}) => {
  return rateLimit({
    windowMs: options.windowMs || 15 * 60 * 1000, // 15 minutes
    limit: options.max || 300,
    handler: (req, res, next) => {
      next(new AppError(ERROR_CODES.RATE_LIMIT_EXCEEDED, options.message || 'Too many requests'));
    },
    standardHeaders: true,
    legacyHeaders: false
  });
};

// Webhook senders retry in bursts
export const webhookRateLimiter = rateLimiter({
  windowMs: 60 * 1000,
  max: 120
});
