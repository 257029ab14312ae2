/**
 * Validation Middleware and Schemas
 * Zod schemas for all API inputs
 */

import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import { addressField } from '../config/venues.js';

const hexPattern = /^0x[a-fA-F0-9]*$/;

export const addressSchema = addressField;

// Inbound engine requests
export const snipeRequestSchema = z.object({
  token: addressSchema,
  amount: z.number().positive('Amount must be positive'),
  slippageBps: z.number().int().min(0).max(10000).optional(),
});

export const tokenParamSchema = z.object({
  token: addressSchema,
});

export const venueParamSchema = z.object({
  venueId: z.string().min(1).max(40),
});

export const idParamSchema = z.object({
  id: z.string().uuid('Invalid ID format'),
});

// Query params schemas
export const opportunityQuerySchema = z.object({
  kind: z.enum(['snipe', 'arbitrage', 'liquidation']).optional(),
  minExpectedValue: z.coerce.number().optional(),
});

export const executionQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).default(100),
  state: z.enum(['Submitted', 'Settled', 'Failed', 'TimedOut']).optional(),
});

// Operator resolution of a timed-out execution
export const manualResolutionSchema = z.object({
  state: z.enum(['Settled', 'Failed']),
  txHash: z
    .custom<`0x${string}`>((value) => typeof value === 'string' && hexPattern.test(value), 'Invalid tx hash')
    .optional(),
  note: z.string().max(500).optional(),
});

export type SnipeRequestInput = z.infer<typeof snipeRequestSchema>;
export type OpportunityQuery = z.infer<typeof opportunityQuerySchema>;
export type ExecutionQuery = z.infer<typeof executionQuerySchema>;
export type ManualResolutionInput = z.infer<typeof manualResolutionSchema>;

/**
 * Validation middleware factory
 * Validates request body against a Zod schema
 */
export function validateBody<T extends z.ZodType>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      return res.status(400).json({
        success: false,
        error: 'Validation failed',
        details: result.error.flatten().fieldErrors,
        timestamp: Date.now(),
      });
    }

    req.body = result.data;
    next();
  };
}

/**
 * Parse query params or answer 400; handlers read the parsed value from res.locals.query
 */
export function validateQuery<T extends z.ZodType>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);

    if (!result.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid query parameters',
        details: result.error.flatten().fieldErrors,
        timestamp: Date.now(),
      });
    }

    res.locals.query = result.data;
    next();
  };
}

/**
 * Validation middleware for route params
 */
export function validateParams<T extends z.ZodType>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.params);

    if (!result.success) {
      return res.status(400).json({
        success: false,
        error: 'Invalid route parameters',
        details: result.error.flatten().fieldErrors,
        timestamp: Date.now(),
      });
    }

    res.locals.params = result.data;
    next();
  };
}
