import rateLimit from 'express-rate-limit';
import { config } from '../config/env';

const skip = () => config.server.nodeEnv === 'test';

export const generalRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 300,
  message: 'Too many requests from this IP, please try again later.',
  standardHeaders: true,
  legacyHeaders: false,
  skip,
});

export const apiRateLimiter = rateLimit({
  windowMs: 1 * 60 * 1000,
  max: 60,
  message: 'Too many API requests, please slow down.',
  skip,
});
