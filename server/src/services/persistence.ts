/**
 * History persistence
 * Best-effort, append-only record of opportunities and execution transitions.
 * Writes are queued and flushed in batches; failures are logged and never reach the hot path.
 */

import type { Database, ExecutionEventRow, OpportunityHistoryRow } from '../db/index.js';
import { executionEvents, opportunityHistory } from '../db/index.js';
import { structuredLogger } from './logger.js';
import { toError } from '../utils/errors.js';
import { toJsonValue } from '../utils/json.js';
import type { ExecutionRecord, Opportunity } from '../../../shared/schema.js';

export interface HistorySink {
  recordOpportunity(opportunity: Opportunity): void;
  recordExecution(record: ExecutionRecord): void;
  flush(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Storage a batched sink writes through
 */
export interface HistoryWriter {
  writeOpportunities(rows: OpportunityHistoryRow[]): Promise<void>;
  writeExecutionEvents(rows: ExecutionEventRow[]): Promise<void>;
  close(): Promise<void>;
}

export function drizzleHistoryWriter(database: Database): HistoryWriter {
  return {
    async writeOpportunities(rows) {
      await database.db.insert(opportunityHistory).values(rows).onConflictDoNothing();
    },
    async writeExecutionEvents(rows) {
      await database.db.insert(executionEvents).values(rows);
    },
    close: () => database.close(),
  };
}

function opportunityRow(opportunity: Opportunity): OpportunityHistoryRow {
  return {
    id: opportunity.id,
    kind: opportunity.kind,
    resourceKey: opportunity.resourceKey,
    token: opportunity.token,
    expectedValue: opportunity.expectedValue,
    riskScore: opportunity.riskScore,
    confidence: opportunity.confidence,
    detectedAt: new Date(opportunity.detectedAt),
    expiresAt: new Date(opportunity.expiresAt),
    inputs: toJsonValue(opportunity.inputs),
  };
}

function executionRow(record: ExecutionRecord): ExecutionEventRow {
  return {
    recordId: record.id,
    opportunityId: record.opportunityId,
    resourceKey: record.resourceKey,
    kind: record.kind,
    state: record.state,
    txHash: record.outcome?.txHash ?? null,
    outcome: record.outcome,
    recordedAt: new Date(record.updatedAt),
  };
}

export class MemoryHistorySink implements HistorySink {
  readonly opportunities: OpportunityHistoryRow[] = [];
  readonly executions: ExecutionEventRow[] = [];

  constructor(private readonly maxRows = 1000) {}

  recordOpportunity(opportunity: Opportunity): void {
    this.opportunities.push(opportunityRow(opportunity));
    if (this.opportunities.length > this.maxRows) this.opportunities.shift();
  }

  recordExecution(record: ExecutionRecord): void {
    this.executions.push(executionRow(record));
    if (this.executions.length > this.maxRows) this.executions.shift();
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {}
}

export class BatchedHistorySink implements HistorySink {
  private opportunityQueue: OpportunityHistoryRow[] = [];
  private executionQueue: ExecutionEventRow[] = [];
  private flushTimer: NodeJS.Timeout;
  private flushing: Promise<void> | null = null;

  constructor(
    private readonly writer: HistoryWriter,
    private readonly batchSize = 100,
    flushIntervalMs = 1000
  ) {
    this.flushTimer = setInterval(() => {
      void this.flush();
    }, flushIntervalMs);
    this.flushTimer.unref();
  }

  recordOpportunity(opportunity: Opportunity): void {
    this.opportunityQueue.push(opportunityRow(opportunity));
    if (this.opportunityQueue.length >= this.batchSize) void this.flush();
  }

  recordExecution(record: ExecutionRecord): void {
    this.executionQueue.push(executionRow(record));
    if (this.executionQueue.length >= this.batchSize) void this.flush();
  }

  /**
   * Write queued rows; a failed batch is logged and dropped
   */
  flush(): Promise<void> {
    if (this.flushing) return this.flushing;

    const opportunities = this.opportunityQueue;
    const executions = this.executionQueue;
    if (opportunities.length === 0 && executions.length === 0) return Promise.resolve();

    this.opportunityQueue = [];
    this.executionQueue = [];

    this.flushing = this.write(opportunities, executions).finally(() => {
      this.flushing = null;
    });
    return this.flushing;
  }

  async close(): Promise<void> {
    clearInterval(this.flushTimer);
    // rows queued while a batch was in flight need another pass
    while (this.flushing || this.opportunityQueue.length > 0 || this.executionQueue.length > 0) {
      await this.flush();
    }
    await this.writer.close();
  }

  private async write(opportunities: OpportunityHistoryRow[], executions: ExecutionEventRow[]): Promise<void> {
    try {
      if (opportunities.length > 0) {
        await this.writer.writeOpportunities(opportunities);
      }
      if (executions.length > 0) {
        await this.writer.writeExecutionEvents(executions);
      }
    } catch (error) {
      structuredLogger.error('database', 'History batch write failed', toError(error), {
        opportunities: opportunities.length,
        executions: executions.length,
      });
    }
  }
}
