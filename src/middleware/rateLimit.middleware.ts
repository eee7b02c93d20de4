import rateLimit from 'express-rate-limit';
import { ApiError } from '../utils/ApiError';

const windowMs = parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000');
const maxRequests = parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100');
const skipInTest = () => process.env.NODE_ENV === 'test';

export const generalLimiter = rateLimit({
  windowMs,
  max: maxRequests,
  standardHeaders: true,
  legacyHeaders: false,
  skip: skipInTest,
  handler: (_req, _res, next) => {
    next(new ApiError(429, 'Too many requests from this IP, please try again later'));
  },
});

export const authLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 5,
  skipSuccessfulRequests: true,
  standardHeaders: true,
  legacyHeaders: false,
  skip: skipInTest,
  handler: (_req, _res, next) => {
    next(new ApiError(429, 'Too many authentication attempts, please try again later'));
  },
});
