/**
 * Venue Feed Adapter
 * Normalizes raw per-venue event streams into VenueEvents, detects sequence gaps,
 * resyncs from venue snapshots, and reconnects with backoff until the venue is marked DOWN
 */

import { z } from 'zod';
import { structuredLogger } from './logger.js';
import { metricsService } from './metrics.js';
import { addressField } from '../config/venues.js';
import { backoffDelay, sleep, withTimeout } from '../utils/async.js';
import { toError } from '../utils/errors.js';
import {
  pairKey,
  type ApplyResult,
  type PoolStatePayload,
  type PositionPayload,
  type VenueEvent,
  type VenueHealth,
  type VenueId,
  type VenueStatus,
} from '../../../shared/schema.js';

// Raw source contract

export interface RawVenueEvent {
  name: string;
  /** contiguous per source */
  sequenceNo: number;
  args: Record<string, unknown>;
  observedAt?: number;
}

export interface RawSnapshot {
  sequenceNo: number;
  pools: PoolStatePayload[];
  positions: PositionPayload[];
}

export interface RawSourceHandlers {
  onEvent(event: RawVenueEvent): void;
  /** liveness signal without an event, e.g. a new block */
  onHeartbeat(): void;
  onDisconnect(error: Error): void;
}

export interface RawVenueSource {
  readonly venueId: VenueId;
  connect(handlers: RawSourceHandlers): Promise<void>;
  disconnect(): Promise<void>;
  fetchSnapshot(): Promise<RawSnapshot>;
  probe(): Promise<boolean>;
}

/**
 * The part of the Market State Store the adapter writes to
 */
export interface FeedSink {
  apply(event: VenueEvent): ApplyResult;
  applySnapshot(venueId: VenueId, sequenceNo: number, pools: PoolStatePayload[], positions: PositionPayload[]): number;
  setVenueStatus(venueId: VenueId, status: VenueStatus): void;
}

// Raw payload schemas

const uintField = z
  .union([z.bigint(), z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

const decimalsField = z.number().int().min(0).max(36).default(18);

export const poolStateSchema = z.object({
  poolAddress: addressField,
  token0: addressField,
  token1: addressField,
  decimals0: decimalsField,
  decimals1: decimalsField,
  reserve0: uintField,
  reserve1: uintField,
});

const pairCreatedSchema = poolStateSchema.extend({
  factory: addressField,
});

const swapSchema = poolStateSchema.extend({
  buysToken0: z.boolean().default(false),
  volumeQuote: z.number().nonnegative().default(0),
});

export const positionSchema = z.object({
  positionId: z.string().min(1),
  borrower: addressField,
  collateralToken: addressField,
  debtToken: addressField,
  collateralAmount: uintField,
  debtAmount: uintField,
  collateralDecimals: decimalsField,
  debtDecimals: decimalsField,
  collateralPrice: z.number().positive(),
  healthFactor: z.number().nonnegative(),
  liquidationBonusBps: z.number().int().min(0).max(5000).default(500),
  closeFactorBps: z.number().int().min(1).max(10000).default(5000),
});

export const rawSnapshotSchema = z.object({
  sequenceNo: z.number().int().nonnegative(),
  pools: z.array(poolStateSchema).default([]),
  positions: z.array(positionSchema).default([]),
});

/**
 * Map a venue-native event onto the normalized VenueEvent, or null when the
 * name is unknown or the args do not validate
 */
export function normalizeRawEvent(venueId: VenueId, raw: RawVenueEvent, verified: boolean): VenueEvent | null {
  const base = {
    venueId,
    venueSequenceNo: raw.sequenceNo,
    observedAt: raw.observedAt ?? Date.now(),
    verified,
  };

  switch (raw.name) {
    case 'PairCreated': {
      const parsed = pairCreatedSchema.safeParse(raw.args);
      if (!parsed.success) return null;
      const payload = parsed.data;
      return { ...base, kind: 'PoolCreated', pairId: pairKey(payload.token0, payload.token1), payload };
    }
    case 'Swap':
    case 'Sync': {
      const parsed = swapSchema.safeParse(raw.args);
      if (!parsed.success) return null;
      const payload = parsed.data;
      return { ...base, kind: 'Swap', pairId: pairKey(payload.token0, payload.token1), payload };
    }
    case 'Mint':
    case 'Burn': {
      const parsed = poolStateSchema.safeParse(raw.args);
      if (!parsed.success) return null;
      const payload = parsed.data;
      return {
        ...base,
        kind: 'LiquidityChanged',
        pairId: pairKey(payload.token0, payload.token1),
        payload,
      };
    }
    case 'PositionUpdated': {
      const parsed = positionSchema.safeParse(raw.args);
      if (!parsed.success) return null;
      const payload = parsed.data;
      return {
        ...base,
        kind: 'LiquidationTrigger',
        pairId: pairKey(payload.collateralToken, payload.debtToken),
        payload,
      };
    }
    default:
      return null;
  }
}

export interface VenueFeedOptions {
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  reconnectBudget: number;
  stallTimeoutMs: number;
  connectTimeoutMs: number;
  resyncTimeoutMs: number;
  resyncAttempts: number;
  healthProbeIntervalMs: number;
  random?: () => number;
}

export type FeedEventListener = (event: VenueEvent, result: ApplyResult) => void;
export type FeedStatusListener = (venueId: VenueId, status: VenueStatus) => void;

export class VenueFeedAdapter {
  readonly venueId: VenueId;

  private status: VenueStatus = 'RECONNECTING';
  private lastSequenceNo: number | null = null;
  private verifiedAfter = -1;
  private lastEventAt: number | null = null;
  private reconnectAttempts = 0;
  private reconnecting = false;
  private stopped = true;
  // bumped on every disconnect; a resync from an older generation must not apply
  private generation = 0;

  private resyncInFlight: { generation: number; promise: Promise<boolean> } | null = null;
  private stallTimer: NodeJS.Timeout | null = null;
  private probeTimer: NodeJS.Timeout | null = null;

  private eventListeners: FeedEventListener[] = [];
  private statusListeners: FeedStatusListener[] = [];

  private readonly handlers: RawSourceHandlers = {
    onEvent: (raw) => this.handleRaw(raw),
    onHeartbeat: () => {
      if (this.stopped || this.status === 'DOWN') return;
      this.reconnectAttempts = 0;
      this.armStallTimer();
    },
    onDisconnect: (error) => {
      this.handleDisconnect(error).catch((err) => {
        structuredLogger.error('feed', 'Reconnect loop failed', toError(err), { venueId: this.venueId });
      });
    },
  };

  constructor(
    private readonly source: RawVenueSource,
    private readonly sink: FeedSink,
    private readonly options: VenueFeedOptions
  ) {
    this.venueId = source.venueId;
  }

  /**
   * Connect and run the initial snapshot sync
   */
  async start(): Promise<void> {
    this.stopped = false;
    structuredLogger.info('feed', 'Starting venue feed', { venueId: this.venueId });

    try {
      await withTimeout(this.source.connect(this.handlers), this.options.connectTimeoutMs, `connect ${this.venueId}`);
    } catch (error) {
      structuredLogger.warning('feed', 'Initial connect failed', { venueId: this.venueId, error: toError(error).message });
      await this.handleDisconnect(toError(error));
      return;
    }

    this.armStallTimer();
    await this.resync('initial');
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.clearStallTimer();
    this.clearProbeTimer();
    await this.source.disconnect();
  }

  /**
   * Manual or probe-triggered recovery of a DOWN venue
   */
  async recover(): Promise<boolean> {
    if (this.status !== 'DOWN' || this.stopped) return false;

    this.clearProbeTimer();
    this.reconnectAttempts = 0;
    structuredLogger.info('feed', 'Recovering venue', { venueId: this.venueId });
    this.setStatus('RECONNECTING');

    try {
      await withTimeout(this.source.connect(this.handlers), this.options.connectTimeoutMs, `connect ${this.venueId}`);
    } catch (error) {
      await this.handleDisconnect(toError(error));
      return this.getStatus() === 'UP';
    }

    this.lastSequenceNo = null;
    this.armStallTimer();
    return this.resync('recovery');
  }

  getStatus(): VenueStatus {
    return this.status;
  }

  getHealth(): VenueHealth {
    return {
      venueId: this.venueId,
      status: this.status,
      lastSequenceNo: this.lastSequenceNo ?? 0,
      lastEventAt: this.lastEventAt,
      reconnectAttempts: this.reconnectAttempts,
    };
  }

  onEvent(listener: FeedEventListener): () => void {
    this.eventListeners.push(listener);
    return () => {
      this.eventListeners = this.eventListeners.filter((l) => l !== listener);
    };
  }

  onStatusChange(listener: FeedStatusListener): () => void {
    this.statusListeners.push(listener);
    return () => {
      this.statusListeners = this.statusListeners.filter((l) => l !== listener);
    };
  }

  private handleRaw(raw: RawVenueEvent): void {
    if (this.stopped || this.status === 'DOWN') return;

    this.lastEventAt = Date.now();
    // the connection delivers again, so the reconnect budget starts over
    this.reconnectAttempts = 0;
    this.armStallTimer();
    structuredLogger.updateEventTime();

    const gap = this.lastSequenceNo !== null && raw.sequenceNo > this.lastSequenceNo + 1;
    if (this.lastSequenceNo === null || raw.sequenceNo > this.lastSequenceNo) {
      this.lastSequenceNo = raw.sequenceNo;
    }

    const verified = !gap && this.status === 'UP' && raw.sequenceNo > this.verifiedAfter;
    const event = normalizeRawEvent(this.venueId, raw, verified);

    if (!event) {
      metricsService.incCounter('venue_events_total', { venue: this.venueId, outcome: 'malformed' });
      structuredLogger.warning('feed', 'Dropped malformed venue event', {
        venueId: this.venueId,
        name: raw.name,
        sequenceNo: raw.sequenceNo,
      });
    } else {
      const result = this.sink.apply(event);
      for (const listener of this.eventListeners) {
        listener(event, result);
      }
    }

    if (gap) {
      metricsService.incCounter('venue_gaps_total', { venue: this.venueId });
      structuredLogger.warning('feed', 'Sequence gap detected, resyncing', {
        venueId: this.venueId,
        sequenceNo: raw.sequenceNo,
      });
      this.resync('gap').catch((error) => {
        structuredLogger.error('feed', 'Resync failed', toError(error), { venueId: this.venueId });
      });
    }
  }

  /**
   * Bounded snapshot refetch, single-flight per connection generation.
   * A resync left over from before a disconnect is awaited, then replaced.
   */
  private resync(reason: string): Promise<boolean> {
    const current = this.resyncInFlight;
    if (current && current.generation === this.generation) {
      return current.promise;
    }

    const generation = this.generation;
    const work = current
      ? current.promise.catch(() => false).then(() => this.runResync(reason, generation))
      : this.runResync(reason, generation);
    const promise: Promise<boolean> = work.finally(() => {
      if (this.resyncInFlight?.promise === promise) {
        this.resyncInFlight = null;
      }
    });

    this.resyncInFlight = { generation, promise };
    return promise;
  }

  private isCurrent(generation: number): boolean {
    return generation === this.generation && !this.stopped;
  }

  private async runResync(reason: string, generation: number): Promise<boolean> {
    if (!this.isCurrent(generation)) return false;
    this.setStatus('RESYNCING');

    for (let attempt = 1; attempt <= this.options.resyncAttempts; attempt++) {
      if (!this.isCurrent(generation)) return false;

      try {
        const snapshot = await withTimeout(
          this.source.fetchSnapshot(),
          this.options.resyncTimeoutMs,
          `snapshot ${this.venueId}`
        );

        // a disconnect during the fetch hands control to the reconnect loop
        if (!this.isCurrent(generation) || this.status !== 'RESYNCING') return false;

        const applied = this.sink.applySnapshot(this.venueId, snapshot.sequenceNo, snapshot.pools, snapshot.positions);
        this.verifiedAfter = snapshot.sequenceNo;
        this.lastSequenceNo = Math.max(this.lastSequenceNo ?? 0, snapshot.sequenceNo);
        this.setStatus('UP');

        structuredLogger.info('feed', 'Venue resynced', {
          venueId: this.venueId,
          reason,
          sequenceNo: snapshot.sequenceNo,
          applied,
        });
        return true;
      } catch (error) {
        structuredLogger.warning('feed', 'Snapshot refetch failed', {
          venueId: this.venueId,
          attempt,
          error: toError(error).message,
        });
        if (attempt < this.options.resyncAttempts) {
          await sleep(backoffDelay(attempt, this.backoffOptions()));
        }
      }
    }

    if (!this.isCurrent(generation) || this.status !== 'RESYNCING') return false;
    // not awaited: the reconnect loop starts its own resync once this one settles
    this.handlers.onDisconnect(new Error(`resync exhausted for ${this.venueId}`));
    return false;
  }

  private async handleDisconnect(error: Error): Promise<void> {
    if (this.stopped || this.status === 'DOWN' || this.reconnecting) return;

    this.reconnecting = true;
    this.generation++;
    this.clearStallTimer();
    this.setStatus('RECONNECTING');
    structuredLogger.warning('feed', 'Venue connection lost', { venueId: this.venueId, error: error.message });

    try {
      await this.source.disconnect();
    } catch (err) {
      structuredLogger.debug('feed', 'Disconnect after failure errored', {
        venueId: this.venueId,
        error: toError(err).message,
      });
    }

    while (this.reconnectAttempts < this.options.reconnectBudget && !this.stopped) {
      this.reconnectAttempts++;
      metricsService.incCounter('venue_reconnects_total', { venue: this.venueId });
      await sleep(backoffDelay(this.reconnectAttempts, this.backoffOptions()));

      try {
        await withTimeout(this.source.connect(this.handlers), this.options.connectTimeoutMs, `connect ${this.venueId}`);
      } catch (err) {
        structuredLogger.warning('feed', 'Reconnect attempt failed', {
          venueId: this.venueId,
          attempt: this.reconnectAttempts,
          budget: this.options.reconnectBudget,
          error: toError(err).message,
        });
        continue;
      }

      this.reconnecting = false;
      this.lastSequenceNo = null;
      this.armStallTimer();
      await this.resync('reconnect');
      return;
    }

    this.reconnecting = false;
    if (!this.stopped) {
      this.markDown();
    }
  }

  private markDown(): void {
    this.clearStallTimer();
    this.setStatus('DOWN');
    structuredLogger.error('feed', 'Venue marked DOWN after reconnect budget exhausted', null, {
      venueId: this.venueId,
      attempts: this.reconnectAttempts,
    });

    this.probeTimer = setInterval(() => {
      this.probeOnce().catch((error) => {
        structuredLogger.error('feed', 'Health probe failed', toError(error), { venueId: this.venueId });
      });
    }, this.options.healthProbeIntervalMs);
  }

  private async probeOnce(): Promise<void> {
    if (this.status !== 'DOWN') return;

    let healthy = false;
    try {
      healthy = await withTimeout(this.source.probe(), this.options.connectTimeoutMs, `probe ${this.venueId}`);
    } catch (error) {
      structuredLogger.debug('feed', 'Probe errored', { venueId: this.venueId, error: toError(error).message });
    }

    if (healthy) {
      await this.recover();
    }
  }

  private setStatus(status: VenueStatus): void {
    if (this.status === status) return;

    this.status = status;
    this.sink.setVenueStatus(this.venueId, status);
    metricsService.setGauge('venue_up', status === 'UP' ? 1 : status === 'DOWN' ? 0 : 0.5, { venue: this.venueId });

    for (const listener of this.statusListeners) {
      listener(this.venueId, status);
    }
  }

  private armStallTimer(): void {
    this.clearStallTimer();
    if (this.stopped || this.status === 'DOWN') return;

    this.stallTimer = setTimeout(() => {
      this.stallTimer = null;
      this.handlers.onDisconnect(new Error(`no events for ${this.options.stallTimeoutMs}ms`));
    }, this.options.stallTimeoutMs);
  }

  private clearStallTimer(): void {
    if (this.stallTimer) {
      clearTimeout(this.stallTimer);
      this.stallTimer = null;
    }
  }

  private clearProbeTimer(): void {
    if (this.probeTimer) {
      clearInterval(this.probeTimer);
      this.probeTimer = null;
    }
  }

  private backoffOptions() {
    return {
      baseDelayMs: this.options.reconnectBaseDelayMs,
      maxDelayMs: this.options.reconnectMaxDelayMs,
      random: this.options.random,
    };
  }
}
