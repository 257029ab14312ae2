/**
 * Structured Logging Service
 * JSON logging with correlation IDs and external integration support
 */

import { config } from '../config/env.js';
import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'success';
export type LogCategory =
  | 'system'
  | 'feed'
  | 'market'
  | 'opportunity'
  | 'risk'
  | 'execution'
  | 'prediction'
  | 'http'
  | 'websocket'
  | 'database';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  warning: 2,
  error: 3,
};

export interface StructuredLogEntry {
  timestamp: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  correlationId?: string;
  service: string;
  environment: string;
  version: string;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
  http?: {
    method: string;
    path: string;
    statusCode: number;
    duration: number;
  };
}

interface LogTransport {
  name: string;
  write(entry: StructuredLogEntry): void;
  close?(): void;
}

interface EngineCounters {
  opportunitiesFound: number;
  opportunitiesVetoed: number;
  executionsSubmitted: number;
  executionsSettled: number;
  executionsFailed: number;
  uptime: number;
  lastEventTime: Date | null;
}

/**
 * Console transport - outputs to stdout/stderr
 */
class ConsoleTransport implements LogTransport {
  name = 'console';

  write(entry: StructuredLogEntry): void {
    const output = JSON.stringify(entry);

    if (entry.level === 'error') {
      console.error(output);
    } else if (entry.level === 'warning') {
      console.warn(output);
    } else {
      console.log(output);
    }
  }
}

/**
 * File transport - writes to daily log files
 */
class FileTransport implements LogTransport {
  name = 'file';
  private logDir: string;
  private currentDate: string = '';
  private writeStream: fs.WriteStream | null = null;

  constructor(logDir: string = './logs') {
    this.logDir = logDir;
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private getStream(): fs.WriteStream {
    const date = new Date().toISOString().split('T')[0];

    if (this.currentDate !== date || !this.writeStream) {
      this.writeStream?.end();
      this.currentDate = date;
      this.writeStream = fs.createWriteStream(path.join(this.logDir, `engine-${date}.log`), { flags: 'a' });
    }

    return this.writeStream;
  }

  write(entry: StructuredLogEntry): void {
    try {
      this.getStream().write(JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  close(): void {
    this.writeStream?.end();
    this.writeStream = null;
  }
}

/**
 * HTTP transport - ships batches to an external collector
 */
class HttpTransport implements LogTransport {
  name = 'http';
  private buffer: StructuredLogEntry[] = [];
  private flushInterval: NodeJS.Timeout | null = null;
  private readonly BATCH_SIZE = 100;
  private readonly FLUSH_INTERVAL_MS = 5000;

  constructor(
    private readonly endpoint: string,
    private readonly apiKey: string
  ) {
    this.flushInterval = setInterval(() => {
      this.flush().catch(console.error);
    }, this.FLUSH_INTERVAL_MS);
    this.flushInterval.unref();
  }

  write(entry: StructuredLogEntry): void {
    this.buffer.push(entry);

    if (this.buffer.length >= this.BATCH_SIZE) {
      this.flush().catch(console.error);
    }
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const entries = this.buffer.splice(0, this.BATCH_SIZE);

    try {
      await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ logs: entries }),
      });
    } catch (error) {
      console.error('Failed to ship logs:', error);
      if (this.buffer.length < 10000) {
        this.buffer.unshift(...entries);
      }
    }
  }

  close(): void {
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
    this.flush().catch(console.error);
  }
}

/**
 * Structured Logger Service
 */
class StructuredLoggerService {
  private transports: LogTransport[] = [];
  private minLevel: LogLevel = 'info';
  private readonly SERVICE_NAME = 'opportunity-engine';
  private readonly VERSION = '1.0.0';

  private recentLogs: StructuredLogEntry[] = [];
  private maxRecentLogs: number = 1000;

  private counters: EngineCounters = this.emptyCounters();

  constructor() {
    this.transports.push(new ConsoleTransport());

    if (config.server.nodeEnv === 'production') {
      this.transports.push(new FileTransport());
      this.minLevel = 'info';
    } else {
      this.minLevel = config.server.nodeEnv === 'test' ? 'warning' : 'debug';
    }

    if (config.server.logEndpoint && config.server.logApiKey) {
      this.transports.push(new HttpTransport(config.server.logEndpoint, config.server.logApiKey));
    }
  }

  private emptyCounters(): EngineCounters {
    return {
      opportunitiesFound: 0,
      opportunitiesVetoed: 0,
      executionsSubmitted: 0,
      executionsSettled: 0,
      executionsFailed: 0,
      uptime: Date.now(),
      lastEventTime: null,
    };
  }

  debug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', category, message, metadata);
  }

  info(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
    this.log('info', category, message, metadata);
  }

  warning(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
    this.log('warning', category, message, metadata);
  }

  error(
    category: LogCategory,
    message: string,
    error?: Error | null,
    metadata?: Record<string, unknown>
  ): void {
    this.log('error', category, message, metadata, error ?? undefined);
  }

  success(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
    this.log('success', category, message, metadata);
  }

  /**
   * Log HTTP request
   */
  http(
    method: string,
    path: string,
    statusCode: number,
    duration: number,
    metadata?: Record<string, unknown>
  ): void {
    this.log('info', 'http', `${method} ${path} ${statusCode}`, metadata, undefined, {
      method,
      path,
      statusCode,
      duration,
    });
  }

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error,
    http?: StructuredLogEntry['http']
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      service: this.SERVICE_NAME,
      environment: config.server.nodeEnv,
      version: this.VERSION,
    };

    if (metadata) {
      const { correlationId, ...rest } = metadata;
      if (typeof correlationId === 'string') {
        entry.correlationId = correlationId;
      }
      if (Object.keys(rest).length > 0) {
        entry.metadata = rest;
      }
    }

    if (http) {
      entry.http = http;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
      };
    }

    this.recentLogs.unshift(entry);
    if (this.recentLogs.length > this.maxRecentLogs) {
      this.recentLogs = this.recentLogs.slice(0, this.maxRecentLogs);
    }

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        console.error(`Failed to write to ${transport.name} transport:`, err);
      }
    }
  }

  /**
   * Get recent logs (for API)
   */
  getRecentLogs(limit: number = 100, category?: LogCategory, level?: LogLevel): StructuredLogEntry[] {
    let logs = this.recentLogs;

    if (category) {
      logs = logs.filter((log) => log.category === category);
    }

    if (level) {
      logs = logs.filter((log) => log.level === level);
    }

    return logs.slice(0, limit);
  }

  recordOpportunity(vetoed: boolean): void {
    this.counters.opportunitiesFound++;
    if (vetoed) {
      this.counters.opportunitiesVetoed++;
    }
  }

  recordExecution(state: 'Submitted' | 'Settled' | 'Failed'): void {
    if (state === 'Submitted') this.counters.executionsSubmitted++;
    if (state === 'Settled') this.counters.executionsSettled++;
    if (state === 'Failed') this.counters.executionsFailed++;
  }

  updateEventTime(): void {
    this.counters.lastEventTime = new Date();
  }

  getMetrics(): EngineCounters & { settleRate: number } {
    const finished = this.counters.executionsSettled + this.counters.executionsFailed;
    return {
      ...this.counters,
      uptime: Date.now() - this.counters.uptime,
      settleRate: finished > 0 ? (this.counters.executionsSettled / finished) * 100 : 0,
    };
  }

  resetMetrics(): void {
    this.counters = this.emptyCounters();
  }

  /**
   * Shutdown - flush all transports
   */
  async shutdown(): Promise<void> {
    for (const transport of this.transports) {
      transport.close?.();
    }
  }
}

export const structuredLogger = new StructuredLoggerService();
