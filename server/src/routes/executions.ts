/**
 * Execution Routes
 * Execution records and the operator hooks for timed-out submissions
 */

import { Router } from 'express';
import { structuredLogger } from '../services/logger.js';
import type { EngineService } from '../services/engine.js';
import { toError } from '../utils/errors.js';
import {
  executionQuerySchema,
  idParamSchema,
  manualResolutionSchema,
  validateBody,
  validateParams,
  validateQuery,
  type ExecutionQuery,
  type ManualResolutionInput,
} from '../middleware/validation.js';
import { operatorLimiter, standardLimiter } from '../middleware/rate-limit.js';
import type { z } from 'zod';

export function createExecutionRoutes(engine: EngineService): Router {
  const router = Router();

  /**
   * GET /api/executions
   */
  router.get('/', standardLimiter, validateQuery(executionQuerySchema), (_req, res) => {
    const { limit, state }: ExecutionQuery = res.locals.query;
    const records = engine.listExecutions(limit).filter((record) => !state || record.state === state);

    res.json({ success: true, data: { records, count: records.length }, timestamp: Date.now() });
  });

  /**
   * GET /api/executions/:id
   */
  router.get('/:id', standardLimiter, validateParams(idParamSchema), (_req, res) => {
    const { id }: z.infer<typeof idParamSchema> = res.locals.params;
    const record = engine.getExecution(id);

    if (!record) {
      return res.status(404).json({ success: false, error: 'Execution not found', timestamp: Date.now() });
    }

    res.json({ success: true, data: record, timestamp: Date.now() });
  });

  /**
   * POST /api/executions/:id/reconcile
   * Poll the signer now for a timed-out execution
   */
  router.post('/:id/reconcile', operatorLimiter, validateParams(idParamSchema), async (_req, res) => {
    const { id }: z.infer<typeof idParamSchema> = res.locals.params;

    try {
      const record = await engine.reconcile(id);
      if (!record) {
        return res.status(404).json({ success: false, error: 'Execution not found', timestamp: Date.now() });
      }

      res.json({ success: true, data: record, timestamp: Date.now() });
    } catch (error) {
      structuredLogger.error('http', 'Reconcile request failed', toError(error), { recordId: id });
      res.status(500).json({ success: false, error: 'Failed to reconcile execution', timestamp: Date.now() });
    }
  });

  /**
   * POST /api/executions/:id/resolve
   * Operator settles or fails a timed-out execution by hand
   */
  router.post(
    '/:id/resolve',
    operatorLimiter,
    validateParams(idParamSchema),
    validateBody(manualResolutionSchema),
    (req, res) => {
      const { id }: z.infer<typeof idParamSchema> = res.locals.params;
      const resolution: ManualResolutionInput = req.body;
      const record = engine.resolveManually(id, resolution);

      if (!record) {
        return res.status(404).json({ success: false, error: 'Execution not found', timestamp: Date.now() });
      }

      res.json({ success: true, data: record, timestamp: Date.now() });
    }
  );

  return router;
}
