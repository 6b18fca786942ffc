import rateLimit from 'express-rate-limit';
import { Request, Response } from 'express';
import { createErrorResponse, logger } from '../core/logger';
import { getSessionUser } from '../types/session';

const getClientKey = (req: Request): string => {
  const userId = getSessionUser(req)?.id;
  if (userId) {
    return `user:${userId}`;
  }
  return req.ip || 'unknown';
};

export const globalRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientKey,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Global limit exceeded for ${getClientKey(req)} on ${req.path}`);
    res.status(429).json(createErrorResponse(req, 'Too many requests. Please slow down.', 'RATE_LIMITED'));
  },
  skip: (req) => {
    if (req.path === '/healthz' || req.path === '/api/ready') {
      return true;
    }
    return !req.path.startsWith('/api');
  }
});

// Creation endpoints: device requests, room bookings and leave requests.
export const requestCreationRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 30,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientKey,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Request creation limit exceeded for ${getClientKey(req)} on ${req.path}`);
    res.status(429).json(createErrorResponse(req, 'Too many requests. Please wait a moment.', 'RATE_LIMITED'));
  }
});

export const loginRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 10,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => `login:${req.ip || 'unknown'}`,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Login limit exceeded for ${req.ip || 'unknown'}`);
    res.status(429).json(createErrorResponse(req, 'Too many login attempts. Please try again later.', 'RATE_LIMITED'));
  }
});
