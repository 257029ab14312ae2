/**
 * Venue Feed Adapter Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MarketStateStore } from '../services/market-state.js';
import { VenueFeedAdapter, normalizeRawEvent, type VenueFeedOptions } from '../services/venue-feed.js';
import { FakeSource } from './helpers/fake-source.js';
import { PAIR_ID, POOL_A, QUOTE, poolPayload } from './helpers/fixtures.js';
import type { VenueStatus } from '../../../shared/schema.js';

vi.mock('../services/logger.js', async () => (await import('./helpers/logger-mock.js')).loggerModule());

const options: VenueFeedOptions = {
  reconnectBaseDelayMs: 100,
  reconnectMaxDelayMs: 1000,
  reconnectBudget: 2,
  stallTimeoutMs: 10_000,
  connectTimeoutMs: 1000,
  resyncTimeoutMs: 1000,
  resyncAttempts: 2,
  healthProbeIntervalMs: 5000,
  random: () => 0.5,
};

describe('VenueFeedAdapter', () => {
  let source: FakeSource;
  let store: MarketStateStore;
  let feed: VenueFeedAdapter;
  let statuses: VenueStatus[];

  beforeEach(() => {
    source = new FakeSource('venue-a', { sequenceNo: 10, pools: [poolPayload(POOL_A, 1_000_000, 100_000_000)], positions: [] });
    store = new MarketStateStore({ quoteTokens: [QUOTE] });
    store.registerVenue('venue-a', 30);
    feed = new VenueFeedAdapter(source, store, options);
    statuses = [];
    feed.onStatusChange((_venueId, status) => statuses.push(status));
  });

  afterEach(async () => {
    await feed.stop();
    vi.useRealTimers();
  });

  it('syncs from a snapshot on start and goes UP', async () => {
    await feed.start();

    expect(feed.getStatus()).toBe('UP');
    expect(statuses).toEqual(['RESYNCING', 'UP']);
    expect(store.read('venue-a', PAIR_ID)?.verified).toBe(true);
    expect(feed.getHealth().lastSequenceNo).toBe(10);
  });

  it('applies contiguous events as verified', async () => {
    await feed.start();

    source.sync(11, poolPayload(POOL_A, 990_000, 101_000_000));

    const snapshot = store.read('venue-a', PAIR_ID);
    expect(snapshot?.venueSequenceNo).toBe(11);
    expect(snapshot?.verified).toBe(true);
  });

  it('resyncs on a sequence gap and holds events unverified meanwhile', async () => {
    await feed.start();
    source.snapshot = { sequenceNo: 13, pools: [poolPayload(POOL_A, 980_000, 102_000_000)], positions: [] };

    source.sync(13, poolPayload(POOL_A, 980_000, 102_000_000));

    expect(feed.getStatus()).toBe('RESYNCING');
    expect(store.read('venue-a', PAIR_ID)?.verified).toBe(false);

    await vi.waitFor(() => expect(feed.getStatus()).toBe('UP'));
    expect(source.snapshotCalls).toBe(2);
    expect(store.read('venue-a', PAIR_ID)?.verified).toBe(true);
    expect(store.read('venue-a', PAIR_ID)?.venueSequenceNo).toBe(13);
  });

  it('marks the venue DOWN once the reconnect budget is spent', async () => {
    vi.useFakeTimers();
    await feed.start();

    source.connectFails = true;
    source.drop();
    expect(feed.getStatus()).toBe('RECONNECTING');

    await vi.advanceTimersByTimeAsync(1000);
    await vi.waitFor(() => expect(feed.getStatus()).toBe('DOWN'));

    expect(statuses).toEqual(['RESYNCING', 'UP', 'RECONNECTING', 'DOWN']);
    expect(feed.getHealth().reconnectAttempts).toBe(2);
    expect(store.read('venue-a', PAIR_ID)).toBeNull();
  });

  it('recovers from DOWN when the health probe succeeds', async () => {
    vi.useFakeTimers();
    await feed.start();
    source.connectFails = true;
    source.drop();
    await vi.advanceTimersByTimeAsync(1000);
    await vi.waitFor(() => expect(feed.getStatus()).toBe('DOWN'));

    source.connectFails = false;
    source.probeResult = true;
    await vi.advanceTimersByTimeAsync(5000);
    await vi.waitFor(() => expect(feed.getStatus()).toBe('UP'));

    expect(feed.getHealth().reconnectAttempts).toBe(0);
    expect(store.read('venue-a', PAIR_ID)?.verified).toBe(true);
  });

  it('recovers manually only from DOWN', async () => {
    await feed.start();
    expect(await feed.recover()).toBe(false);
  });

  it('reconnects and resyncs after a stall', async () => {
    vi.useFakeTimers();
    await feed.start();

    await vi.advanceTimersByTimeAsync(10_000 + 100);
    await vi.waitFor(() => expect(feed.getStatus()).toBe('UP'));

    expect(source.snapshotCalls).toBe(2);
    expect(statuses).toEqual(['RESYNCING', 'UP', 'RECONNECTING', 'RESYNCING', 'UP']);
  });

  it('marks a connected but silent venue DOWN once the reconnect budget is spent', async () => {
    vi.useFakeTimers();
    await feed.start();

    // stalls at 10s, 20.1s and 30.3s; the first two reconnect, the third finds the budget empty
    await vi.advanceTimersByTimeAsync(35_000);
    await vi.waitFor(() => expect(feed.getStatus()).toBe('DOWN'));

    expect(statuses).toEqual([
      'RESYNCING',
      'UP',
      'RECONNECTING',
      'RESYNCING',
      'UP',
      'RECONNECTING',
      'RESYNCING',
      'UP',
      'RECONNECTING',
      'DOWN',
    ]);
    expect(source.snapshotCalls).toBe(3);
    expect(feed.getHealth().reconnectAttempts).toBe(2);
  });

  it('refills the reconnect budget when the connection delivers again', async () => {
    vi.useFakeTimers();
    await feed.start();
    await vi.advanceTimersByTimeAsync(10_000 + 100);
    await vi.waitFor(() => expect(feed.getStatus()).toBe('UP'));
    expect(feed.getHealth().reconnectAttempts).toBe(1);

    source.sync(11, poolPayload(POOL_A, 990_000, 101_000_000));
    expect(feed.getHealth().reconnectAttempts).toBe(0);

    await vi.advanceTimersByTimeAsync(10_000 + 100);
    await vi.waitFor(() => expect(feed.getStatus()).toBe('UP'));
    expect(feed.getHealth().reconnectAttempts).toBe(1);
    source.heartbeat();
    expect(feed.getHealth().reconnectAttempts).toBe(0);
  });

  it('runs a fresh resync after a disconnect interrupts a gap resync', async () => {
    await feed.start();
    source.holdSnapshots = true;
    source.snapshot = { sequenceNo: 13, pools: [poolPayload(POOL_A, 980_000, 102_000_000)], positions: [] };

    source.sync(13, poolPayload(POOL_A, 980_000, 102_000_000));
    expect(feed.getStatus()).toBe('RESYNCING');

    source.drop();
    expect(feed.getStatus()).toBe('RECONNECTING');
    await vi.waitFor(() => expect(source.connectCalls).toBe(2));

    source.releaseSnapshots();
    await vi.waitFor(() => expect(feed.getStatus()).toBe('UP'));

    expect(statuses).toEqual(['RESYNCING', 'UP', 'RESYNCING', 'RECONNECTING', 'RESYNCING', 'UP']);
    expect(source.snapshotCalls).toBe(3);
    expect(store.read('venue-a', PAIR_ID)?.verified).toBe(true);
    expect(store.read('venue-a', PAIR_ID)?.venueSequenceNo).toBe(13);
  });
});

describe('normalizeRawEvent', () => {
  it('maps Mint to LiquidityChanged with a canonical pair id', () => {
    const event = normalizeRawEvent('venue-a', { name: 'Mint', sequenceNo: 3, args: { ...poolPayload(POOL_A, 1, 100) } }, true);

    expect(event?.kind).toBe('LiquidityChanged');
    expect(event?.pairId).toBe(PAIR_ID);
    expect(event?.venueSequenceNo).toBe(3);
  });

  it('accepts decimal-string reserves', () => {
    const event = normalizeRawEvent(
      'venue-a',
      { name: 'Sync', sequenceNo: 1, args: { ...poolPayload(POOL_A, 1, 100), reserve0: '5', reserve1: '7' } },
      true
    );

    expect(event?.kind === 'Swap' && event.payload.reserve0).toBe(5n);
  });

  it('returns null for unknown or malformed events', () => {
    expect(normalizeRawEvent('venue-a', { name: 'Transfer', sequenceNo: 1, args: {} }, true)).toBeNull();
    expect(normalizeRawEvent('venue-a', { name: 'Sync', sequenceNo: 1, args: { token0: 'nope' } }, true)).toBeNull();
  });
});
