import rateLimit from 'express-rate-limit';
import { ApiError } from '../utils/ApiError';
import { AppConfig } from '../config/app.config';

export const createGeneralLimiter = (config: AppConfig['rateLimit']) =>
  rateLimit({
    windowMs: config.windowMs,
    max: config.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, _res, next) => {
      next(new ApiError(429, 'Too many requests from this IP, please try again later'));
    },
  });

export const authLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 10,
  skipSuccessfulRequests: true,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (_req, _res, next) => {
    next(new ApiError(429, 'Too many authentication attempts, please try again later'));
  },
});
