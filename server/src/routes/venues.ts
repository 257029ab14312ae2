/**
 * Venue Routes
 * Per-venue health and manual recovery of DOWN venues
 */

import { Router } from 'express';
import { structuredLogger } from '../services/logger.js';
import type { EngineService } from '../services/engine.js';
import { toError } from '../utils/errors.js';
import { validateParams, venueParamSchema } from '../middleware/validation.js';
import { operatorLimiter, standardLimiter } from '../middleware/rate-limit.js';
import type { z } from 'zod';

export function createVenueRoutes(engine: EngineService): Router {
  const router = Router();

  /**
   * GET /api/venues
   */
  router.get('/', standardLimiter, (_req, res) => {
    res.json({ success: true, data: engine.getHealth().venues, timestamp: Date.now() });
  });

  /**
   * POST /api/venues/:venueId/recover
   */
  router.post('/:venueId/recover', operatorLimiter, validateParams(venueParamSchema), async (_req, res) => {
    const { venueId }: z.infer<typeof venueParamSchema> = res.locals.params;

    try {
      const result = await engine.recoverVenue(venueId);
      if (!result) {
        return res.status(404).json({ success: false, error: 'Unknown venue', timestamp: Date.now() });
      }

      res.json({ success: true, data: { venueId, ...result }, timestamp: Date.now() });
    } catch (error) {
      structuredLogger.error('http', 'Venue recovery failed', toError(error), { venueId });
      res.status(500).json({ success: false, error: 'Failed to recover venue', timestamp: Date.now() });
    }
  });

  return router;
}
