/**
 * Opportunity Engine Server Entry Point
 * Starts the engine, the HTTP surface and the WebSocket stream, and shuts them down on signal
 */

import { createServer } from 'http';

// Import config (validates env vars)
import { config } from './config/env.js';

import { createDatabase } from './db/index.js';
import { createApp } from './app.js';
import { createEngine } from './services/engine.js';
import { BatchedHistorySink, MemoryHistorySink, drizzleHistoryWriter } from './services/persistence.js';
import { websocketService } from './services/websocket.js';
import { structuredLogger } from './services/logger.js';
import { metricsService } from './services/metrics.js';
import { gasEstimatorService } from './services/gas-estimator.js';
import { toError } from './utils/errors.js';

const database = config.database.url ? createDatabase(config.database.url) : null;
const history = database ? new BatchedHistorySink(drizzleHistoryWriter(database)) : new MemoryHistorySink();

const engine = createEngine(websocketService, { history });
const app = createApp(engine, {
  checkDatabase: database ? () => database.check() : undefined,
  getClientCount: () => websocketService.getClientCount(),
});
const httpServer = createServer(app);

const startedAt = Date.now();
const gasRefreshInterval = setInterval(() => {
  metricsService.setGauge('uptime_seconds', Math.floor((Date.now() - startedAt) / 1000));
  gasEstimatorService.refresh().catch((error) => {
    structuredLogger.warning('system', 'Gas price refresh failed', { error: toError(error).message });
  });
}, 12000);
gasRefreshInterval.unref();

async function initializeServices(): Promise<void> {
  structuredLogger.info('system', 'Initializing services...');

  websocketService.initialize(httpServer);

  if (database) {
    const healthy = await database.check();
    if (healthy) {
      structuredLogger.success('system', 'Database connected');
    } else {
      structuredLogger.warning('system', 'Database unreachable, history writes will be dropped');
    }
  } else {
    structuredLogger.info('system', 'DATABASE_URL not set, keeping history in memory');
  }
}

// Graceful shutdown
let shuttingDown = false;
const shutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  structuredLogger.info('system', `Received ${signal}, shutting down...`);

  clearInterval(gasRefreshInterval);
  httpServer.close();
  websocketService.shutdown();

  try {
    await engine.stop();
  } catch (error) {
    structuredLogger.error('system', 'Engine shutdown failed', toError(error));
  }

  structuredLogger.info('system', 'Shutdown complete');
  await structuredLogger.shutdown();
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  structuredLogger.error('system', 'Unhandled rejection', toError(reason));
});

process.on('uncaughtException', (error) => {
  structuredLogger.error('system', 'Uncaught exception', error);
  // Give time for logs to flush
  setTimeout(() => process.exit(1), 1000);
});

const PORT = config.server.port;

initializeServices()
  .then(() => {
    httpServer.listen(PORT, () => {
      structuredLogger.success('system', `Server started on port ${PORT}`);
      structuredLogger.info('system', `Environment: ${config.server.nodeEnv}`);
    });
    // feeds may sit in their reconnect loop; probes report it meanwhile
    return engine.start();
  })
  .catch((error) => {
    structuredLogger.error('system', 'Failed to start server', toError(error));
    process.exit(1);
  });
