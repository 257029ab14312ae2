/**
 * Cross-Venue Arbitrage Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Address } from 'viem';
import { MarketStateStore } from '../services/market-state.js';
import {
  applySlippage,
  detectArbitrage,
  findBestPath,
  getAmountOut,
  type ArbitrageParams,
} from '../services/arbitrage.js';
import { OpportunityDetector, type VenueProfile } from '../services/opportunity-detector.js';
import { RiskManagerService } from '../services/risk-manager.js';
import {
  PAIR_ID,
  POOL_A,
  POOL_B,
  QUOTE,
  RESOURCE_KEY,
  StubInspector,
  TOKEN,
  WALLET,
  detectorOptions,
  poolEvent,
  poolPayload,
  riskOptions,
} from './helpers/fixtures.js';
import type { MarketSnapshot, Opportunity } from '../../../shared/schema.js';

vi.mock('../services/logger.js', async () => (await import('./helpers/logger-mock.js')).loggerModule());

const isQuoteToken = (token: Address) => token.toLowerCase() === QUOTE.toLowerCase();

function params(overrides: Partial<ArbitrageParams> = {}): ArbitrageParams {
  return {
    wallet: WALLET,
    minProfitBps: 50,
    maxTradeSize: 1000,
    depthFraction: 0.01,
    slippageBps: 100,
    ttlMs: 3000,
    gasCost: (legCount) => legCount * 3.95,
    venueLatencyMs: () => 100,
    isQuoteToken,
    now: Date.now(),
    ...overrides,
  };
}

const profiles: VenueProfile[] = [
  { venueId: 'venue-a', latencyMs: 100, trackLaunches: false, liquidationTarget: null },
  { venueId: 'venue-b', latencyMs: 100, trackLaunches: false, liquidationTarget: null },
];

function readBoth(store: MarketStateStore): MarketSnapshot[] {
  return store.readPair(PAIR_ID, { verifiedOnly: true });
}

describe('getAmountOut', () => {
  it('takes the fee from the input', () => {
    expect(getAmountOut(1000n, 1_000_000n, 1_000_000n, 30)).toBe(99n);
  });

  it('returns zero for empty reserves or input', () => {
    expect(getAmountOut(0n, 10n, 10n, 30)).toBe(0n);
    expect(getAmountOut(10n, 0n, 10n, 30)).toBe(0n);
  });

  it('applies slippage in basis points', () => {
    expect(applySlippage(10_000n, 100)).toBe(9_900n);
  });
});

describe('cross-venue arbitrage', () => {
  let store: MarketStateStore;

  beforeEach(() => {
    store = new MarketStateStore({ quoteTokens: [QUOTE] });
    store.registerVenue('venue-a', 30);
    store.registerVenue('venue-b', 30);
    store.apply(poolEvent('venue-a', 1, 'Swap', poolPayload(POOL_A, 1_000_000, 100_000_000)));
    store.apply(poolEvent('venue-b', 1, 'Swap', poolPayload(POOL_B, 1_000_000, 102_000_000)));
  });

  it('buys on the cheaper venue and sells on the dearer one', () => {
    const path = findBestPath(readBoth(store), params());

    expect(path?.buy.venueId).toBe('venue-a');
    expect(path?.sell.venueId).toBe('venue-b');
    expect(path?.tradeSize).toBe(1000);
    expect(path?.gasCost).toBeCloseTo(7.9, 9);
    expect(path?.quoteOut).toBeCloseTo(1013.869, 3);
    expect(path?.netProfit).toBeCloseTo(5.969, 3);
    expect(path?.netMarginBps).toBeCloseTo(59.69, 2);
    expect(path?.legs.map((leg) => [leg.tokenIn, leg.tokenOut])).toEqual([
      [QUOTE, TOKEN],
      [TOKEN, QUOTE],
    ]);
  });

  describe('with a third venue', () => {
    const POOL_C: Address = '0x1212121212121212121212121212121212121212';

    beforeEach(() => {
      store.registerVenue('venue-c', 30);
    });

    it('picks the highest-margin path among several profitable ones', () => {
      store.apply(poolEvent('venue-c', 1, 'Swap', poolPayload(POOL_C, 1_000_000, 104_000_000)));
      const snapshots = store.readPair(PAIR_ID, { verifiedOnly: true });

      const path = findBestPath(snapshots, params());

      expect(path?.buy.venueId).toBe('venue-a');
      expect(path?.sell.venueId).toBe('venue-c');
      expect(path?.netMarginBps).toBeGreaterThan(200);
      // b -> c and a -> b clear the threshold too
      const without = (venueId: string) => snapshots.filter((snapshot) => snapshot.venueId !== venueId);
      expect(findBestPath(without('venue-a'), params())?.sell.venueId).toBe('venue-c');
      expect(findBestPath(without('venue-c'), params())?.sell.venueId).toBe('venue-b');
    });

    it('breaks a margin tie on the lower estimated latency', () => {
      store.apply(poolEvent('venue-c', 1, 'Swap', poolPayload(POOL_C, 1_000_000, 102_000_000)));
      const snapshots = store.readPair(PAIR_ID, { verifiedOnly: true });

      const latencyWithC = (cLatencyMs: number) => (venueId: string) => (venueId === 'venue-c' ? cLatencyMs : 100);

      const fasterC = findBestPath(snapshots, params({ venueLatencyMs: latencyWithC(50) }));
      expect(fasterC?.sell.venueId).toBe('venue-c');
      expect(fasterC?.latencyMs).toBe(150);

      const slowerC = findBestPath(snapshots, params({ venueLatencyMs: latencyWithC(150) }));
      expect(slowerC?.sell.venueId).toBe('venue-b');
      expect(slowerC?.latencyMs).toBe(200);
      expect(slowerC?.netMarginBps).toBe(fasterC?.netMarginBps);
    });
  });

  it('bounds each leg by the slippage tolerance', () => {
    const path = findBestPath(readBoth(store), params());
    for (const leg of path?.legs ?? []) {
      expect(leg.minAmountOut).toBe(applySlippage(leg.expectedAmountOut, 100));
    }
  });

  it('finds nothing when margin after gas is under the threshold', () => {
    expect(findBestPath(readBoth(store), params({ minProfitBps: 60 }))).toBeNull();
    expect(findBestPath(readBoth(store), params({ gasCost: () => 20 }))).toBeNull();
  });

  it('ignores unverified snapshots', () => {
    store.apply(poolEvent('venue-b', 2, 'Swap', poolPayload(POOL_B, 1_000_000, 102_000_000), false));

    expect(findBestPath(store.readPair(PAIR_ID), params())).toBeNull();
  });

  it('ignores a pool our own execution moved until the venue reports again', () => {
    store.recordExecution('venue-b', PAIR_ID);
    expect(findBestPath(readBoth(store), params())).toBeNull();

    store.apply(poolEvent('venue-b', 2, 'Swap', poolPayload(POOL_B, 1_000_000, 102_000_000)));
    expect(findBestPath(readBoth(store), params())).not.toBeNull();
  });

  it('builds a draft keyed on wallet and base token', () => {
    const draft = detectArbitrage(readBoth(store), params());

    expect(draft?.kind).toBe('arbitrage');
    expect(draft?.resourceKey).toBe(RESOURCE_KEY);
    expect(draft?.token).toBe(TOKEN);
    expect(draft?.expectedValue).toBeCloseTo(5.969, 3);
    expect(draft?.confidence).toBeCloseTo(79.92, 1);
    expect(draft?.inputs.estimatedLatencyMs).toBe(200);
    expect(draft?.inputs.pairId).toBe(PAIR_ID);
  });
});

describe('OpportunityDetector arbitrage', () => {
  let store: MarketStateStore;
  let detector: OpportunityDetector;

  beforeEach(() => {
    store = new MarketStateStore({ quoteTokens: [QUOTE] });
    store.registerVenue('venue-a', 30);
    store.registerVenue('venue-b', 30);

    const risk = new RiskManagerService(riskOptions);
    risk.setInspector(new StubInspector());
    detector = new OpportunityDetector(
      store,
      risk,
      { estimateCostQuote: (legCount) => legCount * 3.95 },
      profiles,
      detectorOptions
    );
  });

  function seedPools(): void {
    store.apply(poolEvent('venue-a', 1, 'Swap', poolPayload(POOL_A, 1_000_000, 100_000_000)));
    store.apply(poolEvent('venue-b', 1, 'Swap', poolPayload(POOL_B, 1_000_000, 102_000_000)));
  }

  it('publishes an opportunity from a significant delta', async () => {
    const listener = vi.fn<(opportunity: Opportunity) => void>();
    detector.onOpportunity(listener);
    detector.start();

    seedPools();

    await vi.waitFor(() => expect(listener).toHaveBeenCalledTimes(1));
    const opportunity = listener.mock.calls[0]?.[0];
    expect(opportunity?.kind).toBe('arbitrage');
    expect(opportunity?.riskScore).toBe(0);
    expect(opportunity?.expectedValue).toBeCloseTo(5.969, 3);
    expect(detector.getOpportunities()).toHaveLength(1);

    detector.stop();
  });

  it('scans without publishing', async () => {
    seedPools();
    const listener = vi.fn();
    detector.onOpportunity(listener);

    const results = await detector.scanArbitrage();

    expect(results).toHaveLength(1);
    expect(results[0]?.status).toBe('accepted');
    expect(listener).not.toHaveBeenCalled();
    expect(detector.getOpportunities()).toEqual([]);
  });

  it('revalidates against the latest snapshots', async () => {
    seedPools();
    const [result] = await detector.scanArbitrage();
    if (result?.status !== 'accepted') throw new Error('expected an accepted opportunity');

    const fresh = detector.revalidate(result.opportunity);
    expect(fresh.valid).toBe(true);

    store.apply(poolEvent('venue-b', 2, 'Swap', poolPayload(POOL_B, 1_000_000, 100_300_000)));

    expect(detector.revalidate(result.opportunity)).toEqual({
      valid: false,
      reason: 'margin -109.3bps below threshold',
    });
  });

  it('rejects expired opportunities on revalidation', async () => {
    seedPools();
    const [result] = await detector.scanArbitrage();
    if (result?.status !== 'accepted') throw new Error('expected an accepted opportunity');

    const expired = { ...result.opportunity, expiresAt: Date.now() - 1 };
    expect(detector.revalidate(expired)).toEqual({ valid: false, reason: 'expired' });
  });

  it('drops book entries routed through a venue that went down', async () => {
    seedPools();
    const [result] = await detector.scanArbitrage();
    if (result?.status !== 'accepted') throw new Error('expected an accepted opportunity');
    await detector.process(result.opportunity);

    expect(detector.invalidateVenue('venue-b')).toBe(1);
    expect(detector.getOpportunities()).toEqual([]);
  });

  it('drops candidates below the confidence floor', async () => {
    seedPools();
    const draft = detectArbitrage(readBoth(store), params());
    if (!draft) throw new Error('expected a draft');

    expect(await detector.evaluate({ ...draft, confidence: 10 })).toEqual({
      status: 'dropped',
      reason: 'low-confidence',
    });
  });
});
