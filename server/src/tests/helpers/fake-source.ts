/**
 * In-process venue source: hands out a fixed snapshot and lets tests push events
 */

import type { RawSnapshot, RawSourceHandlers, RawVenueSource } from '../../services/venue-feed.js';
import type { PoolStatePayload, VenueId } from '../../../../shared/schema.js';

export class FakeSource implements RawVenueSource {
  handlers: RawSourceHandlers | null = null;
  connectFails = false;
  probeResult = false;
  /** while set, snapshot fetches wait for releaseSnapshots() */
  holdSnapshots = false;
  snapshotCalls = 0;
  connectCalls = 0;
  private held: Array<() => void> = [];

  constructor(
    readonly venueId: VenueId,
    public snapshot: RawSnapshot
  ) {}

  async connect(handlers: RawSourceHandlers): Promise<void> {
    this.connectCalls++;
    if (this.connectFails) throw new Error('connection refused');
    this.handlers = handlers;
  }

  async disconnect(): Promise<void> {
    this.handlers = null;
  }

  async fetchSnapshot(): Promise<RawSnapshot> {
    this.snapshotCalls++;
    if (this.holdSnapshots) {
      await new Promise<void>((resolve) => this.held.push(resolve));
    }
    return this.snapshot;
  }

  releaseSnapshots(): void {
    this.holdSnapshots = false;
    const held = this.held;
    this.held = [];
    for (const release of held) release();
  }

  async probe(): Promise<boolean> {
    return this.probeResult;
  }

  /** Sync event carrying absolute reserves */
  sync(sequenceNo: number, pool: PoolStatePayload): void {
    this.handlers?.onEvent({ name: 'Sync', sequenceNo, args: { ...pool, buysToken0: true, volumeQuote: 5 } });
  }

  heartbeat(): void {
    this.handlers?.onHeartbeat();
  }

  drop(reason = 'socket closed'): void {
    this.handlers?.onDisconnect(new Error(reason));
  }
}
