/**
 * Cross-Venue Arbitrage
 * Simulates buy-on-one-venue, sell-on-another for every ordered venue pair of a token pair,
 * using constant-product math with venue fees and price impact
 */

import { parseUnits, type Address } from 'viem';
import { toUnits } from './market-state.js';
import { scoreArbitrage } from './prediction.js';
import {
  resourceKeyFor,
  type ExecutionLeg,
  type MarketSnapshot,
  type OpportunityDraft,
  type VenueId,
} from '../../../shared/schema.js';

export interface ArbitrageParams {
  wallet: Address;
  minProfitBps: number;
  /** cap on trade size, in quote units */
  maxTradeSize: number;
  /** fraction of the shallower pool's quote depth to trade */
  depthFraction: number;
  slippageBps: number;
  ttlMs: number;
  /** gas cost in quote units for a path with the given number of legs */
  gasCost: (legCount: number) => number;
  venueLatencyMs: (venueId: VenueId) => number;
  isQuoteToken: (token: Address) => boolean;
  now: number;
}

export interface ArbitragePath {
  buy: MarketSnapshot;
  sell: MarketSnapshot;
  base: Address;
  quote: Address;
  legs: ExecutionLeg[];
  tradeSize: number;
  quoteOut: number;
  gasCost: number;
  venueFees: number;
  priceImpactBps: number;
  netProfit: number;
  netMarginBps: number;
  latencyMs: number;
}

interface PoolSides {
  base: Address;
  quote: Address;
  baseReserve: bigint;
  quoteReserve: bigint;
  quoteDecimals: number;
}

/**
 * Uniswap V2 output amount with the fee taken from the input
 */
export function getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint, feeBps: number): bigint {
  if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) return 0n;
  const amountInWithFee = amountIn * BigInt(10000 - Math.round(feeBps));
  return (amountInWithFee * reserveOut) / (reserveIn * 10000n + amountInWithFee);
}

export function applySlippage(amount: bigint, slippageBps: number): bigint {
  return (amount * BigInt(10000 - Math.round(slippageBps))) / 10000n;
}

/**
 * Whole units to raw token units
 */
export function toRaw(value: number, decimals: number): bigint {
  return parseUnits(value.toFixed(Math.min(decimals, 8)), decimals);
}

function sidesOf(snapshot: MarketSnapshot, isQuoteToken: (token: Address) => boolean): PoolSides | null {
  if (isQuoteToken(snapshot.token1)) {
    return {
      base: snapshot.token0,
      quote: snapshot.token1,
      baseReserve: snapshot.reserve0,
      quoteReserve: snapshot.reserve1,
      quoteDecimals: snapshot.decimals1,
    };
  }
  if (isQuoteToken(snapshot.token0)) {
    return {
      base: snapshot.token1,
      quote: snapshot.token0,
      baseReserve: snapshot.reserve1,
      quoteReserve: snapshot.reserve0,
      quoteDecimals: snapshot.decimals0,
    };
  }
  return null;
}

function priceImpactBps(amountIn: bigint, amountOut: bigint, reserveIn: bigint, reserveOut: bigint, feeBps: number): number {
  const ideal = (Number(amountIn) * Number(reserveOut)) / Number(reserveIn) * ((10000 - feeBps) / 10000);
  if (ideal <= 0) return 0;
  return Math.max(0, (1 - Number(amountOut) / ideal) * 10000);
}

/**
 * A pool is usable when verified, funded and not already moved by our own last execution
 */
export function isTradable(snapshot: MarketSnapshot): boolean {
  if (!snapshot.verified) return false;
  if (snapshot.reserve0 <= 0n || snapshot.reserve1 <= 0n) return false;
  return snapshot.ownExecutionSequenceNo === null || snapshot.ownExecutionSequenceNo < snapshot.venueSequenceNo;
}

/**
 * Buy base with `tradeSize` quote on `buy`, sell all of it on `sell`
 */
export function simulatePath(
  buy: MarketSnapshot,
  sell: MarketSnapshot,
  tradeSize: number,
  params: ArbitrageParams
): ArbitragePath | null {
  const buySides = sidesOf(buy, params.isQuoteToken);
  const sellSides = sidesOf(sell, params.isQuoteToken);
  if (!buySides || !sellSides || tradeSize <= 0) return null;
  if (buySides.base.toLowerCase() !== sellSides.base.toLowerCase()) return null;

  const amountIn = toRaw(tradeSize, buySides.quoteDecimals);
  const baseOut = getAmountOut(amountIn, buySides.quoteReserve, buySides.baseReserve, buy.feeBps);
  const quoteOutRaw = getAmountOut(baseOut, sellSides.baseReserve, sellSides.quoteReserve, sell.feeBps);
  if (baseOut === 0n || quoteOutRaw === 0n) return null;

  const buyImpact = priceImpactBps(amountIn, baseOut, buySides.quoteReserve, buySides.baseReserve, buy.feeBps);
  const sellImpact = priceImpactBps(baseOut, quoteOutRaw, sellSides.baseReserve, sellSides.quoteReserve, sell.feeBps);

  const legs: ExecutionLeg[] = [
    {
      venueId: buy.venueId,
      poolAddress: buy.poolAddress,
      tokenIn: buySides.quote,
      tokenOut: buySides.base,
      amountIn,
      expectedAmountOut: baseOut,
      minAmountOut: applySlippage(baseOut, params.slippageBps),
      priceImpactBps: buyImpact,
    },
    {
      venueId: sell.venueId,
      poolAddress: sell.poolAddress,
      tokenIn: sellSides.base,
      tokenOut: sellSides.quote,
      amountIn: baseOut,
      expectedAmountOut: quoteOutRaw,
      minAmountOut: applySlippage(quoteOutRaw, params.slippageBps),
      priceImpactBps: sellImpact,
    },
  ];

  const quoteOut = toUnits(quoteOutRaw, sellSides.quoteDecimals);
  const gasCost = params.gasCost(legs.length);
  const netProfit = quoteOut - tradeSize - gasCost;

  return {
    buy,
    sell,
    base: buySides.base,
    quote: buySides.quote,
    legs,
    tradeSize,
    quoteOut,
    gasCost,
    venueFees: (tradeSize * buy.feeBps) / 10000 + (quoteOut * sell.feeBps) / 10000,
    priceImpactBps: buyImpact + sellImpact,
    netProfit,
    netMarginBps: (netProfit / tradeSize) * 10000,
    latencyMs: params.venueLatencyMs(buy.venueId) + params.venueLatencyMs(sell.venueId),
  };
}

export function tradeSizeFor(buy: MarketSnapshot, sell: MarketSnapshot, params: ArbitrageParams): number {
  const depth = Math.min(buy.liquidityDepth, sell.liquidityDepth);
  return Math.min(params.maxTradeSize, depth * params.depthFraction);
}

/**
 * Best profitable path across the venues quoting one pair, or null
 */
export function findBestPath(snapshots: MarketSnapshot[], params: ArbitrageParams): ArbitragePath | null {
  const candidates = snapshots.filter(isTradable);
  if (candidates.length < 2) return null;

  let best: ArbitragePath | null = null;

  for (const buy of candidates) {
    for (const sell of candidates) {
      if (buy.venueId === sell.venueId) continue;

      const path = simulatePath(buy, sell, tradeSizeFor(buy, sell, params), params);
      if (!path || path.netMarginBps < params.minProfitBps) continue;

      if (
        !best ||
        path.netMarginBps > best.netMarginBps ||
        (path.netMarginBps === best.netMarginBps && path.latencyMs < best.latencyMs)
      ) {
        best = path;
      }
    }
  }

  return best;
}

export function toArbitrageDraft(path: ArbitragePath, params: ArbitrageParams): OpportunityDraft {
  const oldest = Math.min(path.buy.updatedAt, path.sell.updatedAt);

  return {
    kind: 'arbitrage',
    resourceKey: resourceKeyFor(params.wallet, path.base),
    token: path.base,
    expectedValue: path.netProfit,
    confidence: scoreArbitrage({
      netMarginBps: path.netMarginBps,
      tradeSize: path.tradeSize,
      minDepth: Math.min(path.buy.liquidityDepth, path.sell.liquidityDepth),
      snapshotAgeMs: Math.max(0, params.now - oldest),
    }),
    detectedAt: params.now,
    expiresAt: params.now + params.ttlMs,
    inputs: {
      legs: path.legs,
      tradeSize: path.tradeSize,
      slippageBps: params.slippageBps,
      costs: { gasCost: path.gasCost, venueFees: path.venueFees, priceImpactBps: path.priceImpactBps },
      marginBps: path.netMarginBps,
      pairId: path.buy.pairId,
      estimatedLatencyMs: path.latencyMs,
    },
  };
}

export function detectArbitrage(snapshots: MarketSnapshot[], params: ArbitrageParams): OpportunityDraft | null {
  const path = findBestPath(snapshots, params);
  return path ? toArbitrageDraft(path, params) : null;
}
