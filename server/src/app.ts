/**
 * HTTP application
 * Express app with security headers, request logging, health probes, metrics and API routes
 */

import express from 'express';
import helmet from 'helmet';
import { randomUUID } from 'crypto';
import { config } from './config/env.js';
import { structuredLogger } from './services/logger.js';
import { metricsService } from './services/metrics.js';
import type { EngineService } from './services/engine.js';
import { bigintReplacer } from './utils/json.js';
import { toError } from './utils/errors.js';
import { createEngineRoutes } from './routes/engine.js';
import { createOpportunityRoutes } from './routes/opportunities.js';
import { createExecutionRoutes } from './routes/executions.js';
import { createVenueRoutes } from './routes/venues.js';

export interface AppOptions {
  /** resolves false when the history database is unreachable */
  checkDatabase?: () => Promise<boolean>;
  getClientCount?: () => number;
}

export function createApp(engine: EngineService, options: AppOptions = {}): express.Express {
  const app = express();

  // bigints in opportunities and intents serialize as decimal strings
  app.set('json replacer', bigintReplacer);

  app.use(
    helmet({
      contentSecurityPolicy: config.server.nodeEnv === 'production' ? undefined : false,
    })
  );
  app.use(express.json({ limit: '100kb' }));

  // Request correlation ID
  app.use((req, res, next) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header.length <= 64 ? header : `req_${randomUUID()}`;

    res.setHeader('x-correlation-id', correlationId);
    res.locals.correlationId = correlationId;
    next();
  });

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      structuredLogger.http(req.method, req.path, res.statusCode, duration, {
        correlationId: res.locals.correlationId,
        ip: req.ip,
      });
      metricsService.recordHttpRequest(req.method, req.path, res.statusCode, duration);
    });

    next();
  });

  app.get('/health', async (_req, res) => {
    const health = engine.getHealth();
    const database = options.checkDatabase ? await options.checkDatabase() : null;
    const venuesUp = health.venues.every((venue) => venue.status === 'UP');
    const status = health.live && venuesUp && database !== false ? 'healthy' : 'degraded';

    res.status(health.live ? 200 : 503).json({
      status,
      timestamp: Date.now(),
      environment: config.server.nodeEnv,
      ...health,
      services: {
        database,
        websocket: { clients: options.getClientCount?.() ?? 0 },
      },
    });
  });

  // Prometheus metrics endpoint
  app.get('/metrics', (_req, res) => {
    res.set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(metricsService.getMetrics());
  });

  app.get('/metrics/json', (_req, res) => {
    res.json({
      success: true,
      data: metricsService.getMetricsJson(),
      timestamp: Date.now(),
    });
  });

  app.get('/ready', async (_req, res) => {
    const venuesReady = engine.isReady();
    const database = options.checkDatabase ? await options.checkDatabase() : true;

    if (venuesReady && database) {
      res.status(200).json({ ready: true });
    } else {
      res.status(503).json({ ready: false, services: { venues: venuesReady, database } });
    }
  });

  app.get('/live', (_req, res) => {
    const live = engine.getHealth().live;
    res.status(live ? 200 : 503).json({ live });
  });

  // API routes
  app.use('/api/engine', createEngineRoutes(engine));
  app.use('/api/opportunities', createOpportunityRoutes(engine));
  app.use('/api/executions', createExecutionRoutes(engine));
  app.use('/api/venues', createVenueRoutes(engine));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      success: false,
      error: 'Not found',
      timestamp: Date.now(),
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const error = toError(err);
    const correlationId = res.locals.correlationId;

    structuredLogger.error('http', 'Unhandled error', error, {
      correlationId,
      path: req.path,
      method: req.method,
    });

    res.status(500).json({
      success: false,
      error: config.server.nodeEnv === 'production' ? 'Internal server error' : error.message,
      correlationId,
      timestamp: Date.now(),
    });
  });

  return app;
}
