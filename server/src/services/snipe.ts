/**
 * Launch Sniping
 * Sizes an entry into a freshly created pool from its quote depth and the slippage bound
 */

import type { Address } from 'viem';
import { applySlippage, getAmountOut, toRaw } from './arbitrage.js';
import { scoreLaunch, type LaunchFeatures } from './prediction.js';
import {
  resourceKeyFor,
  type MarketSnapshot,
  type OpportunityDraft,
  type SnapshotDelta,
  type VenueId,
} from '../../../shared/schema.js';

export interface SnipeParams {
  wallet: Address;
  /** max quote units committed to one launch */
  riskBudget: number;
  slippageBps: number;
  minLiquidity: number;
  expectedReturn: number;
  ttlMs: number;
  gasCost: (legCount: number) => number;
  venueLatencyMs: (venueId: VenueId) => number;
  isQuoteToken: (token: Address) => boolean;
  isTrackedVenue: (venueId: VenueId) => boolean;
  now: number;
}

/**
 * Largest buy whose price impact stays within the slippage bound, capped by the budget
 */
export function snipeSize(quoteReserve: number, riskBudget: number, slippageBps: number): number {
  const s = slippageBps / 10000;
  if (s <= 0 || s >= 1) return 0;
  return Math.min(riskBudget, (quoteReserve * s) / (1 - s));
}

/**
 * Snipe draft for a known pool with an explicit size; null when the pool has no quote side
 */
export function buildSnipeDraft(
  snapshot: MarketSnapshot,
  size: number,
  features: LaunchFeatures,
  params: SnipeParams
): OpportunityDraft | null {
  const quoteIsToken1 = params.isQuoteToken(snapshot.token1);
  if (!quoteIsToken1 && !params.isQuoteToken(snapshot.token0)) return null;
  if (size <= 0) return null;

  const quote = quoteIsToken1 ? snapshot.token1 : snapshot.token0;
  const base = quoteIsToken1 ? snapshot.token0 : snapshot.token1;
  const quoteReserve = quoteIsToken1 ? snapshot.reserve1 : snapshot.reserve0;
  const baseReserve = quoteIsToken1 ? snapshot.reserve0 : snapshot.reserve1;
  const quoteDecimals = quoteIsToken1 ? snapshot.decimals1 : snapshot.decimals0;

  const amountIn = toRaw(size, quoteDecimals);
  const amountOut = getAmountOut(amountIn, quoteReserve, baseReserve, snapshot.feeBps);
  if (amountOut === 0n) return null;

  const confidence = scoreLaunch(features);
  const gasCost = params.gasCost(1);

  return {
    kind: 'snipe',
    resourceKey: resourceKeyFor(params.wallet, base),
    token: base,
    expectedValue: size * ((confidence - 50) / 50) * params.expectedReturn - gasCost,
    confidence,
    detectedAt: params.now,
    expiresAt: params.now + params.ttlMs,
    inputs: {
      legs: [
        {
          venueId: snapshot.venueId,
          poolAddress: snapshot.poolAddress,
          tokenIn: quote,
          tokenOut: base,
          amountIn,
          expectedAmountOut: amountOut,
          minAmountOut: applySlippage(amountOut, params.slippageBps),
          priceImpactBps: params.slippageBps,
        },
      ],
      tradeSize: size,
      slippageBps: params.slippageBps,
      costs: { gasCost, venueFees: (size * snapshot.feeBps) / 10000, priceImpactBps: params.slippageBps },
      marginBps: 0,
      pairId: snapshot.pairId,
      estimatedLatencyMs: params.venueLatencyMs(snapshot.venueId),
    },
  };
}

export function detectSnipe(delta: SnapshotDelta, features: LaunchFeatures, params: SnipeParams): OpportunityDraft | null {
  const snapshot = delta.current;
  if (delta.kind !== 'PoolCreated' || delta.source !== 'event' || !delta.isNew || !snapshot) return null;
  if (!params.isTrackedVenue(delta.venueId)) return null;
  if (snapshot.liquidityDepth < params.minLiquidity) return null;

  const size = snipeSize(snapshot.liquidityDepth, params.riskBudget, params.slippageBps);
  return buildSnipeDraft(snapshot, size, features, params);
}
