/**
 * Engine Pipeline Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createHarness, type Harness } from './helpers/engine-harness.js';
import { TOKEN, WALLET } from './helpers/fixtures.js';

vi.mock('../services/logger.js', async () => (await import('./helpers/logger-mock.js')).loggerModule());

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('EngineService', () => {
  let harness: Harness;

  afterEach(async () => {
    await harness.engine.stop();
  });

  it('detects a cross-venue spread and executes it once', async () => {
    harness = createHarness({ autoExecute: true });
    await harness.engine.start();

    await vi.waitFor(() => expect(harness.history.executions.map((row) => row.state)).toEqual(['Submitted', 'Settled']));
    await flush();

    expect(harness.signing.signAndSubmit).toHaveBeenCalledTimes(1);
    expect(harness.history.opportunities).toHaveLength(1);
    expect(harness.history.opportunities[0]?.kind).toBe('arbitrage');
    expect(harness.broadcast.mock.calls.map(([type]) => type)).toContain('opportunity:new');
    expect(harness.broadcast.mock.calls.map(([type]) => type)).toContain('execution:update');
    expect(harness.engine.getOpportunities()).toEqual([]);

    // both pools now reflect our own trade until the venues report again
    expect(await harness.engine.requestArbScan()).toEqual([]);
  });

  it('never executes against a honeypot', async () => {
    harness = createHarness({ autoExecute: true });
    harness.inspector.roundTrip = { honeypot: true, loss: 1, reason: 'sell reverted' };

    await harness.engine.start();
    await vi.waitFor(() => expect(harness.risk.isBlocked(TOKEN)).toBe(true));
    await flush();

    expect(harness.signing.signAndSubmit).not.toHaveBeenCalled();
    expect(harness.history.executions).toEqual([]);
    expect(harness.engine.getOpportunities()).toEqual([]);
  });

  it('answers an arbitrage scan without publishing', async () => {
    harness = createHarness();
    await harness.engine.start();
    await vi.waitFor(() => expect(harness.engine.getOpportunities()).toHaveLength(1));
    const published = harness.broadcast.mock.calls.length;
    const [booked] = harness.engine.getOpportunities();

    const found = await harness.engine.requestArbScan();

    expect(found).toHaveLength(1);
    expect(found[0]?.expectedValue).toBeCloseTo(5.969, 3);
    expect(found[0]?.id).not.toBe(booked?.id);
    expect(harness.broadcast.mock.calls.length).toBe(published);
    expect(harness.engine.getOpportunities()).toHaveLength(1);
    expect(harness.signing.signAndSubmit).not.toHaveBeenCalled();
  });

  it('drops opportunities through a venue that goes DOWN', async () => {
    harness = createHarness();
    await harness.engine.start();
    await vi.waitFor(() => expect(harness.engine.getOpportunities()).toHaveLength(1));
    expect(harness.engine.isReady()).toBe(true);

    harness.sources[1]?.drop();

    await vi.waitFor(() => expect(harness.engine.getOpportunities()).toEqual([]));
    expect(harness.broadcast).toHaveBeenCalledWith('venue:status', { venueId: 'venue-b', status: 'DOWN' });
    expect(harness.engine.isReady()).toBe(false);
    expect(harness.engine.getHealth().venues.map((venue) => venue.status)).toEqual(['UP', 'DOWN']);
  });

  it('evaluates explicit snipe requests without publishing', async () => {
    harness = createHarness();
    await harness.engine.start();

    expect(await harness.engine.requestSnipe(TOKEN, 100, 1000)).toEqual({
      status: 'unavailable',
      reason: 'slippage above 500 bps',
    });
    expect(await harness.engine.requestSnipe(WALLET, 100)).toEqual({
      status: 'unavailable',
      reason: 'no tradable pool for token',
    });

    const result = await harness.engine.requestSnipe(TOKEN, 100);
    if (result.status !== 'accepted') throw new Error(`expected acceptance, got ${result.status}`);

    expect(result.opportunity.kind).toBe('snipe');
    expect(result.opportunity.inputs.tradeSize).toBe(100);
    expect(result.opportunity.inputs.legs[0]?.venueId).toBe('venue-b');
    expect(harness.engine.getOpportunities().some((o) => o.kind === 'snipe')).toBe(false);
  });

  it('reads predictions from the deepest pool', async () => {
    harness = createHarness();
    await harness.engine.start();

    const prediction = harness.engine.requestPrediction(TOKEN);

    expect(prediction?.token).toBe(TOKEN);
    expect(prediction?.launchScore?.value).toBe(70);
    expect(prediction?.priceMovement.model).toBe('insufficient_data');
    expect(harness.engine.requestPrediction(WALLET)).toBeNull();
  });

  it('reports health and recovery for known venues only', async () => {
    harness = createHarness();
    await harness.engine.start();

    const health = harness.engine.getHealth();
    expect(health.live).toBe(true);
    expect(health.venues).toHaveLength(2);
    expect(health.locks).toEqual({ held: 0, awaitingReconciliation: 0 });
    expect(health.tradingPaused).toBe(false);

    expect(await harness.engine.recoverVenue('venue-z')).toBeNull();
    expect(await harness.engine.recoverVenue('venue-a')).toEqual({ recovered: false, status: 'UP' });
  });
});
