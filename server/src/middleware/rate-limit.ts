/**
 * Rate Limiting Middleware
 * In-process limits per client IP
 */

import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import { structuredLogger } from '../services/logger.js';

function keyGenerator(req: Request): string {
  return `ip:${req.ip || req.socket.remoteAddress || 'unknown'}`;
}

function createLimiter(options: { windowMs: number; max: number; message: string }): ReturnType<typeof rateLimit> {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.max,
    keyGenerator,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      structuredLogger.warning('http', 'Rate limit exceeded', {
        key: keyGenerator(req),
        path: req.path,
        method: req.method,
      });

      res.status(429).json({
        success: false,
        error: options.message,
        timestamp: Date.now(),
        retryAfter: Math.ceil(options.windowMs / 1000),
      });
    },
  });
}

/**
 * Reads: 300 requests per minute
 */
export const standardLimiter = createLimiter({
  windowMs: 60 * 1000,
  max: 300,
  message: 'Too many requests, please try again later',
});

/**
 * Scans and evaluations: 30 requests per minute
 */
export const scanLimiter = createLimiter({
  windowMs: 60 * 1000,
  max: 30,
  message: 'Too many scan requests, please try again later',
});

/**
 * Operator actions: 10 requests per minute
 */
export const operatorLimiter = createLimiter({
  windowMs: 60 * 1000,
  max: 10,
  message: 'Rate limit exceeded for operator action',
});
