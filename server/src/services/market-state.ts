/**
 * Market State Store
 * Copy-on-write snapshots of pool and lending-position state per (venue, pair),
 * applied from venue events in increasing per-venue sequence order
 */

import { formatUnits } from 'viem';
import { structuredLogger } from './logger.js';
import { metricsService } from './metrics.js';
import {
  pairKey,
  type Address,
  type ApplyResult,
  type DeltaSource,
  type MarketSnapshot,
  type PoolStatePayload,
  type PositionPayload,
  type PositionSnapshot,
  type SnapshotDelta,
  type VenueEvent,
  type VenueId,
  type VenueStatus,
} from '../../../shared/schema.js';

export interface MarketStateOptions {
  quoteTokens: Address[];
  minPriceMoveBps: number;
  minLiquidityMoveBps: number;
  priceHistorySize: number;
  swapHistorySize: number;
}

export interface SwapObservation {
  at: number;
  venueId: VenueId;
  buysBase: boolean;
  volumeQuote: number;
  price: number;
}

export type DeltaListener = (delta: SnapshotDelta) => void;

const DEFAULT_OPTIONS: MarketStateOptions = {
  quoteTokens: [],
  minPriceMoveBps: 5,
  minLiquidityMoveBps: 100,
  priceHistorySize: 200,
  swapHistorySize: 500,
};

export function toUnits(value: bigint, decimals: number): number {
  return Number(formatUnits(value, decimals));
}

export class MarketStateStore {
  private readonly options: MarketStateOptions;
  private readonly quoteTokens: Set<string>;

  private readonly pools = new Map<string, MarketSnapshot>();
  private readonly positions = new Map<string, PositionSnapshot>();
  private readonly venuesByPair = new Map<string, Set<VenueId>>();
  private readonly venueFees = new Map<VenueId, number>();
  private readonly venueStatus = new Map<VenueId, VenueStatus>();
  private readonly priceHistory = new Map<string, number[]>();
  private readonly swapHistory = new Map<string, SwapObservation[]>();
  private readonly listeners: DeltaListener[] = [];

  constructor(options: Partial<MarketStateOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.quoteTokens = new Set(this.options.quoteTokens.map((token) => token.toLowerCase()));
  }

  registerVenue(venueId: VenueId, feeBps: number): void {
    this.venueFees.set(venueId, feeBps);
    if (!this.venueStatus.has(venueId)) {
      this.venueStatus.set(venueId, 'UP');
    }
  }

  /**
   * Leaving UP marks the venue's snapshots unverified until a resync confirms them
   */
  setVenueStatus(venueId: VenueId, status: VenueStatus): void {
    this.venueStatus.set(venueId, status);
    if (status === 'UP') return;

    for (const [key, snapshot] of this.pools) {
      if (snapshot.venueId === venueId && snapshot.verified) {
        this.pools.set(key, Object.freeze({ ...snapshot, verified: false }));
      }
    }
    for (const [key, position] of this.positions) {
      if (position.venueId === venueId && position.verified) {
        this.positions.set(key, Object.freeze({ ...position, verified: false }));
      }
    }
  }

  getVenueStatus(venueId: VenueId): VenueStatus {
    return this.venueStatus.get(venueId) ?? 'UP';
  }

  isQuoteToken(token: Address): boolean {
    return this.quoteTokens.has(token.toLowerCase());
  }

  /**
   * Apply one event. Stale, duplicate and DOWN-venue events are rejected as no-ops.
   */
  apply(event: VenueEvent): ApplyResult {
    if (this.getVenueStatus(event.venueId) === 'DOWN') {
      metricsService.incCounter('venue_events_total', { venue: event.venueId, outcome: 'venue-down' });
      return { status: 'rejected', reason: 'venue-down' };
    }

    if (event.kind === 'LiquidationTrigger') {
      return this.applyPosition(
        event.venueId,
        event.pairId,
        event.payload,
        event.venueSequenceNo,
        event.verified,
        'event'
      );
    }

    const key = this.poolKey(event.venueId, event.pairId);
    const previous = this.pools.get(key) ?? null;

    if (previous && event.venueSequenceNo <= previous.venueSequenceNo) {
      metricsService.incCounter('venue_events_total', { venue: event.venueId, outcome: 'stale' });
      return { status: 'rejected', reason: 'stale' };
    }

    const current = this.buildSnapshot(event.venueId, event.payload, event.venueSequenceNo, event.verified, previous);
    this.pools.set(key, current);
    this.indexPair(event.venueId, current.pairId);
    this.pushPrice(current);

    if (event.kind === 'Swap') {
      this.pushSwap(current, event.payload.buysToken0, event.payload.volumeQuote);
    }

    metricsService.incCounter('venue_events_total', { venue: event.venueId, outcome: 'applied' });

    const delta = this.buildDelta(event.kind, 'event', previous, current);
    this.emit(delta);
    return { status: 'applied', delta };
  }

  /**
   * Apply a refetched venue snapshot taken at `sequenceNo`. Newer state already
   * held for a key is kept and marked verified.
   */
  applySnapshot(
    venueId: VenueId,
    sequenceNo: number,
    pools: PoolStatePayload[],
    positions: PositionPayload[] = []
  ): number {
    if (this.getVenueStatus(venueId) === 'DOWN') {
      return 0;
    }

    let applied = 0;

    for (const pool of pools) {
      const pairId = pairKey(pool.token0, pool.token1);
      const key = this.poolKey(venueId, pairId);
      const previous = this.pools.get(key) ?? null;

      if (previous && previous.venueSequenceNo >= sequenceNo) {
        if (!previous.verified) {
          this.pools.set(key, Object.freeze({ ...previous, verified: true }));
        }
        continue;
      }

      const current = this.buildSnapshot(venueId, pool, sequenceNo, true, previous);
      this.pools.set(key, current);
      this.indexPair(venueId, pairId);
      this.pushPrice(current);
      // pools first seen in a snapshot already existed; they are not launches
      this.emit(this.buildDelta('LiquidityChanged', 'snapshot', previous, current));
      applied++;
    }

    for (const position of positions) {
      const result = this.applyPosition(
        venueId,
        pairKey(position.collateralToken, position.debtToken),
        position,
        sequenceNo,
        true,
        'snapshot'
      );
      if (result.status === 'applied') applied++;
    }

    // anything else this venue holds is at least as new as the snapshot
    for (const [key, snapshot] of this.pools) {
      if (snapshot.venueId === venueId && !snapshot.verified && snapshot.venueSequenceNo >= sequenceNo) {
        this.pools.set(key, Object.freeze({ ...snapshot, verified: true }));
      }
    }
    for (const [key, position] of this.positions) {
      if (position.venueId === venueId && !position.verified && position.venueSequenceNo >= sequenceNo) {
        this.positions.set(key, Object.freeze({ ...position, verified: true }));
      }
    }

    return applied;
  }

  /**
   * Point-in-time read of one venue's snapshot for a pair
   */
  read(venueId: VenueId, pairId: string): MarketSnapshot | null {
    if (this.getVenueStatus(venueId) === 'DOWN') return null;
    return this.pools.get(this.poolKey(venueId, pairId)) ?? null;
  }

  /**
   * All readable venue snapshots for a pair
   */
  readPair(pairId: string, options: { verifiedOnly?: boolean } = {}): MarketSnapshot[] {
    const venues = this.venuesByPair.get(pairId);
    if (!venues) return [];

    const snapshots: MarketSnapshot[] = [];
    for (const venueId of venues) {
      const snapshot = this.read(venueId, pairId);
      if (!snapshot) continue;
      if (options.verifiedOnly && !snapshot.verified) continue;
      snapshots.push(snapshot);
    }
    return snapshots;
  }

  readPosition(venueId: VenueId, positionId: string): PositionSnapshot | null {
    if (this.getVenueStatus(venueId) === 'DOWN') return null;
    return this.positions.get(this.positionKey(venueId, positionId)) ?? null;
  }

  listPositions(): PositionSnapshot[] {
    return Array.from(this.positions.values()).filter((p) => this.getVenueStatus(p.venueId) !== 'DOWN');
  }

  listPairs(): string[] {
    return Array.from(this.venuesByPair.keys());
  }

  /**
   * Readable snapshots of every pool that trades the given token
   */
  findPoolsForToken(token: Address): MarketSnapshot[] {
    const needle = token.toLowerCase();
    return this.listPairs()
      .filter((pairId) => pairId.split('/').includes(needle))
      .flatMap((pairId) => this.readPair(pairId));
  }

  getPriceHistory(pairId: string): number[] {
    return [...(this.priceHistory.get(pairId) ?? [])];
  }

  getSwapHistory(pairId: string): SwapObservation[] {
    return [...(this.swapHistory.get(pairId) ?? [])];
  }

  /**
   * Mark that an own execution settled against the pool at its current sequence
   */
  recordExecution(venueId: VenueId, pairId: string): void {
    const key = this.poolKey(venueId, pairId);
    const snapshot = this.pools.get(key);
    if (!snapshot) return;

    this.pools.set(key, Object.freeze({ ...snapshot, ownExecutionSequenceNo: snapshot.venueSequenceNo }));
    structuredLogger.debug('market', 'Own execution recorded on pool', {
      venueId,
      pairId,
      sequenceNo: snapshot.venueSequenceNo,
    });
  }

  onDelta(listener: DeltaListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  getStats(): { pools: number; positions: number; pairs: number } {
    return { pools: this.pools.size, positions: this.positions.size, pairs: this.venuesByPair.size };
  }

  /**
   * Which side of the pool is the configured quote token, if any
   */
  quoteSide(snapshot: Pick<MarketSnapshot, 'token0' | 'token1'>): 0 | 1 | null {
    if (this.isQuoteToken(snapshot.token1)) return 1;
    if (this.isQuoteToken(snapshot.token0)) return 0;
    return null;
  }

  private applyPosition(
    venueId: VenueId,
    pairId: string,
    payload: PositionPayload,
    sequenceNo: number,
    verified: boolean,
    source: DeltaSource
  ): ApplyResult {
    const key = this.positionKey(venueId, payload.positionId);
    const previous = this.positions.get(key);

    if (previous && sequenceNo <= previous.venueSequenceNo) {
      metricsService.incCounter('venue_events_total', { venue: venueId, outcome: 'stale' });
      return { status: 'rejected', reason: 'stale' };
    }

    const position: PositionSnapshot = Object.freeze({
      ...payload,
      venueId,
      pairId,
      venueSequenceNo: sequenceNo,
      updatedAt: Date.now(),
      verified,
    });
    this.positions.set(key, position);
    metricsService.incCounter('venue_events_total', { venue: venueId, outcome: 'applied' });

    const delta: SnapshotDelta = {
      venueId,
      pairId,
      kind: 'LiquidationTrigger',
      source,
      previous: null,
      current: null,
      position,
      isNew: !previous,
      priceChangeBps: 0,
      liquidityChangeBps: 0,
      significant: true,
    };
    this.emit(delta);
    return { status: 'applied', delta };
  }

  private buildSnapshot(
    venueId: VenueId,
    payload: PoolStatePayload,
    sequenceNo: number,
    verified: boolean,
    previous: MarketSnapshot | null
  ): MarketSnapshot {
    const amount0 = toUnits(payload.reserve0, payload.decimals0);
    const amount1 = toUnits(payload.reserve1, payload.decimals1);
    const side = this.quoteSide(payload);

    return Object.freeze({
      venueId,
      pairId: pairKey(payload.token0, payload.token1),
      poolAddress: payload.poolAddress,
      token0: payload.token0,
      token1: payload.token1,
      decimals0: payload.decimals0,
      decimals1: payload.decimals1,
      reserve0: payload.reserve0,
      reserve1: payload.reserve1,
      price: amount0 > 0 ? amount1 / amount0 : 0,
      liquidityDepth: side === 0 ? amount0 : amount1,
      feeBps: this.venueFees.get(venueId) ?? 30,
      venueSequenceNo: sequenceNo,
      updatedAt: Date.now(),
      verified,
      ownExecutionSequenceNo: previous?.ownExecutionSequenceNo ?? null,
    });
  }

  private buildDelta(
    kind: SnapshotDelta['kind'],
    source: DeltaSource,
    previous: MarketSnapshot | null,
    current: MarketSnapshot
  ): SnapshotDelta {
    const priceChangeBps =
      previous && previous.price > 0 ? ((current.price - previous.price) / previous.price) * 10000 : 0;
    const liquidityChangeBps =
      previous && previous.liquidityDepth > 0
        ? ((current.liquidityDepth - previous.liquidityDepth) / previous.liquidityDepth) * 10000
        : 0;
    const isNew = previous === null;

    return {
      venueId: current.venueId,
      pairId: current.pairId,
      kind,
      source,
      previous,
      current,
      position: null,
      isNew,
      priceChangeBps,
      liquidityChangeBps,
      significant:
        isNew ||
        Math.abs(priceChangeBps) >= this.options.minPriceMoveBps ||
        Math.abs(liquidityChangeBps) >= this.options.minLiquidityMoveBps,
    };
  }

  private emit(delta: SnapshotDelta): void {
    for (const listener of this.listeners) {
      try {
        listener(delta);
      } catch (error) {
        structuredLogger.error('market', 'Delta listener failed', error instanceof Error ? error : null, {
          venueId: delta.venueId,
          pairId: delta.pairId,
        });
      }
    }
  }

  private indexPair(venueId: VenueId, pairId: string): void {
    let venues = this.venuesByPair.get(pairId);
    if (!venues) {
      venues = new Set();
      this.venuesByPair.set(pairId, venues);
    }
    venues.add(venueId);
  }

  private pushPrice(snapshot: MarketSnapshot): void {
    const history = this.priceHistory.get(snapshot.pairId) ?? [];
    history.push(this.basePrice(snapshot));
    if (history.length > this.options.priceHistorySize) history.shift();
    this.priceHistory.set(snapshot.pairId, history);
  }

  private pushSwap(snapshot: MarketSnapshot, buysToken0: boolean, volumeQuote: number): void {
    const side = this.quoteSide(snapshot);
    const history = this.swapHistory.get(snapshot.pairId) ?? [];
    history.push({
      at: Date.now(),
      venueId: snapshot.venueId,
      // base is token0 unless token0 is the quote token
      buysBase: side === 0 ? !buysToken0 : buysToken0,
      volumeQuote,
      price: this.basePrice(snapshot),
    });
    if (history.length > this.options.swapHistorySize) history.shift();
    this.swapHistory.set(snapshot.pairId, history);
  }

  /**
   * Price of the non-quote token in quote units
   */
  basePrice(snapshot: MarketSnapshot): number {
    if (this.quoteSide(snapshot) === 0) {
      return snapshot.price > 0 ? 1 / snapshot.price : 0;
    }
    return snapshot.price;
  }

  private poolKey(venueId: VenueId, pairId: string): string {
    return `${venueId}|${pairId}`;
  }

  private positionKey(venueId: VenueId, positionId: string): string {
    return `${venueId}|position|${positionId}`;
  }
}
