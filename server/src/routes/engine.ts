/**
 * Engine Routes
 * Inbound snipe, arbitrage-scan and prediction requests. Every response is a
 * read-only view; nothing here submits a trade.
 */

import { Router } from 'express';
import { structuredLogger } from '../services/logger.js';
import type { EngineService } from '../services/engine.js';
import { toError } from '../utils/errors.js';
import {
  snipeRequestSchema,
  tokenParamSchema,
  validateBody,
  validateParams,
  type SnipeRequestInput,
} from '../middleware/validation.js';
import { scanLimiter } from '../middleware/rate-limit.js';
import type { z } from 'zod';

export function createEngineRoutes(engine: EngineService): Router {
  const router = Router();

  /**
   * POST /api/engine/snipe
   * Evaluate a snipe of `amount` quote units into a token
   */
  router.post('/snipe', scanLimiter, validateBody(snipeRequestSchema), async (req, res) => {
    try {
      const { token, amount, slippageBps }: SnipeRequestInput = req.body;
      const result = await engine.requestSnipe(token, amount, slippageBps);

      if (result.status === 'unavailable') {
        return res.status(404).json({ success: false, error: result.reason, timestamp: Date.now() });
      }

      res.json({ success: true, data: result, timestamp: Date.now() });
    } catch (error) {
      structuredLogger.error('http', 'Snipe request failed', toError(error));
      res.status(500).json({ success: false, error: 'Failed to evaluate snipe', timestamp: Date.now() });
    }
  });

  /**
   * POST /api/engine/arb-scan
   * Full arbitrage pass over every known pair
   */
  router.post('/arb-scan', scanLimiter, async (_req, res) => {
    try {
      const opportunities = await engine.requestArbScan();
      res.json({
        success: true,
        data: { found: opportunities.length, opportunities },
        timestamp: Date.now(),
      });
    } catch (error) {
      structuredLogger.error('http', 'Arbitrage scan failed', toError(error));
      res.status(500).json({ success: false, error: 'Failed to scan for opportunities', timestamp: Date.now() });
    }
  });

  /**
   * GET /api/engine/predictions/:token
   */
  router.get('/predictions/:token', scanLimiter, validateParams(tokenParamSchema), (_req, res) => {
    const { token }: z.infer<typeof tokenParamSchema> = res.locals.params;
    const prediction = engine.requestPrediction(token);

    if (!prediction) {
      return res.status(404).json({ success: false, error: 'No market data for token', timestamp: Date.now() });
    }

    res.json({ success: true, data: prediction, timestamp: Date.now() });
  });

  return router;
}
