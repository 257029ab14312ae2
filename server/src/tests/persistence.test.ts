/**
 * History Persistence Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { BatchedHistorySink, type HistoryWriter } from '../services/persistence.js';
import { snipeOpportunity } from './helpers/fixtures.js';
import type { ExecutionEventRow, OpportunityHistoryRow } from '../db/index.js';

vi.mock('../services/logger.js', async () => (await import('./helpers/logger-mock.js')).loggerModule());

class FakeWriter implements HistoryWriter {
  opportunityBatches: string[][] = [];
  executionBatches: ExecutionEventRow[][] = [];
  closed = false;
  failWrites = false;
  /** while set, writes wait for release() */
  hold = false;
  private held: Array<() => void> = [];

  async writeOpportunities(rows: OpportunityHistoryRow[]): Promise<void> {
    if (this.hold) {
      await new Promise<void>((resolve) => this.held.push(resolve));
    }
    if (this.failWrites) throw new Error('connection reset');
    this.opportunityBatches.push(rows.map((row) => row.id));
  }

  async writeExecutionEvents(rows: ExecutionEventRow[]): Promise<void> {
    this.executionBatches.push(rows);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  release(): void {
    this.hold = false;
    const held = this.held;
    this.held = [];
    for (const resolve of held) resolve();
  }
}

describe('BatchedHistorySink', () => {
  it('writes queued opportunities in one batch', async () => {
    const writer = new FakeWriter();
    const sink = new BatchedHistorySink(writer, 100, 60_000);

    sink.recordOpportunity(snipeOpportunity({ id: 'opp-1' }));
    sink.recordOpportunity(snipeOpportunity({ id: 'opp-2' }));
    await sink.flush();

    expect(writer.opportunityBatches).toEqual([['opp-1', 'opp-2']]);
    expect(writer.executionBatches).toEqual([]);
    await sink.close();
  });

  it('drains rows queued during an in-flight flush before closing', async () => {
    const writer = new FakeWriter();
    const sink = new BatchedHistorySink(writer, 100, 60_000);

    writer.hold = true;
    sink.recordOpportunity(snipeOpportunity({ id: 'opp-1' }));
    const inFlight = sink.flush();
    sink.recordOpportunity(snipeOpportunity({ id: 'opp-2' }));

    const closing = sink.close();
    writer.release();
    await Promise.all([inFlight, closing]);

    expect(writer.opportunityBatches).toEqual([['opp-1'], ['opp-2']]);
    expect(writer.closed).toBe(true);
  });

  it('drops a failed batch without throwing', async () => {
    const writer = new FakeWriter();
    const sink = new BatchedHistorySink(writer, 100, 60_000);
    writer.failWrites = true;

    sink.recordOpportunity(snipeOpportunity({ id: 'opp-1' }));
    await expect(sink.flush()).resolves.toBeUndefined();

    writer.failWrites = false;
    sink.recordOpportunity(snipeOpportunity({ id: 'opp-2' }));
    await sink.close();

    expect(writer.opportunityBatches).toEqual([['opp-2']]);
    expect(writer.closed).toBe(true);
  });
});
