/**
 * Opportunity Routes
 * Current opportunity book
 */

import { Router } from 'express';
import type { EngineService } from '../services/engine.js';
import {
  idParamSchema,
  opportunityQuerySchema,
  validateParams,
  validateQuery,
  type OpportunityQuery,
} from '../middleware/validation.js';
import { standardLimiter } from '../middleware/rate-limit.js';
import type { z } from 'zod';

export function createOpportunityRoutes(engine: EngineService): Router {
  const router = Router();

  /**
   * GET /api/opportunities
   * Unexpired opportunities, newest first
   */
  router.get('/', standardLimiter, validateQuery(opportunityQuerySchema), (_req, res) => {
    const { kind, minExpectedValue }: OpportunityQuery = res.locals.query;

    let opportunities = engine.getOpportunities();
    if (kind) {
      opportunities = opportunities.filter((opp) => opp.kind === kind);
    }
    if (minExpectedValue !== undefined) {
      opportunities = opportunities.filter((opp) => opp.expectedValue >= minExpectedValue);
    }

    res.json({
      success: true,
      data: { opportunities, count: opportunities.length },
      timestamp: Date.now(),
    });
  });

  /**
   * GET /api/opportunities/:id
   */
  router.get('/:id', standardLimiter, validateParams(idParamSchema), (_req, res) => {
    const { id }: z.infer<typeof idParamSchema> = res.locals.params;
    const opportunity = engine.getOpportunity(id);

    if (!opportunity) {
      return res.status(404).json({
        success: false,
        error: 'Opportunity not found or expired',
        timestamp: Date.now(),
      });
    }

    res.json({ success: true, data: opportunity, timestamp: Date.now() });
  });

  return router;
}
