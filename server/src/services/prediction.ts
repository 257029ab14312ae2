/**
 * Prediction Scorer
 * Heuristic 0-100 confidence scores for launches, arbitrage paths and liquidations,
 * plus trend and pump-signal reads over recent market history
 */

import type { Address } from '../../../shared/schema.js';

export interface LaunchFeatures {
  /** quote-side liquidity in whole quote units */
  liquidity: number;
  /** null until the token has been inspected */
  holderCount: number | null;
  transactionCount24h: number;
  buySellRatio: number;
  /** 0..1, higher is more honeypot-like; null until inspected */
  honeypotScore: number | null;
  socialMentions: number | null;
}

export interface TradeSample {
  buysBase: boolean;
  volumeQuote: number;
  price: number;
}

export type PredictionType = 'launch_score' | 'price_movement' | 'pump_signal';

export interface PredictionResult {
  token: Address;
  predictionType: PredictionType;
  /** 0..1 */
  confidence: number;
  value: number;
  model: string;
  createdAt: number;
}

export interface TokenPrediction {
  token: Address;
  launchScore: PredictionResult | null;
  priceMovement: PredictionResult;
  pumpSignal: PredictionResult;
}

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));

export function scoreLaunch(features: LaunchFeatures): number {
  let score = 50;

  if (features.liquidity > 10) score += 20;
  else if (features.liquidity > 1) score += 10;
  else if (features.liquidity < 0.1) score -= 20;

  // unknown features score nothing either way
  if (features.holderCount !== null) {
    if (features.holderCount > 100) score += 15;
    else if (features.holderCount > 50) score += 10;
    else if (features.holderCount < 10) score -= 10;
  }

  if (features.transactionCount24h > 1000) score += 15;
  else if (features.transactionCount24h > 100) score += 5;

  if (features.buySellRatio > 1.5) score += 10;
  else if (features.buySellRatio < 0.5) score -= 15;

  if (features.honeypotScore !== null) {
    if (features.honeypotScore > 0.7) score -= 30;
    else if (features.honeypotScore > 0.3) score -= 10;
  }

  if (features.socialMentions !== null) {
    if (features.socialMentions > 100) score += 10;
    else if (features.socialMentions > 50) score += 5;
  }

  return clamp(score, 0, 100);
}

export function scoreArbitrage(input: {
  netMarginBps: number;
  tradeSize: number;
  minDepth: number;
  snapshotAgeMs: number;
}): number {
  let score = 50 + Math.min(25, Math.max(0, input.netMarginBps) / 4);

  const depthRatio = input.minDepth > 0 ? input.tradeSize / input.minDepth : 1;
  if (depthRatio < 0.01) score += 15;
  else if (depthRatio < 0.05) score += 5;
  else score -= 10;

  if (input.snapshotAgeMs > 5000) score -= 20;
  else if (input.snapshotAgeMs > 1000) score -= 5;

  return clamp(score, 0, 100);
}

export function scoreLiquidation(input: { healthFactor: number; profit: number; repayValue: number }): number {
  let score = 50;

  if (input.healthFactor < 0.95) score += 20;
  else if (input.healthFactor < 1) score += 10;

  const profitRatio = input.repayValue > 0 ? input.profit / input.repayValue : 0;
  if (profitRatio > 0.03) score += 15;
  else if (profitRatio > 0.01) score += 5;

  return clamp(score, 0, 100);
}

/**
 * MA5 against MA10 gives the direction; stdev of returns scales the move
 */
export function predictPriceMovement(prices: number[]): { confidence: number; value: number; model: string } {
  if (prices.length < 10) {
    return { confidence: 0.2, value: 0, model: 'insufficient_data' };
  }

  const window = prices.slice(-20);
  const mean = (values: number[]) => values.reduce((sum, v) => sum + v, 0) / values.length;

  const shortMa = mean(window.slice(-5));
  const longMa = mean(window.slice(-10));
  const trend = shortMa > longMa ? 1 : shortMa < longMa ? -1 : 0;

  const returns: number[] = [];
  for (let i = 1; i < window.length; i++) {
    if (window[i - 1] > 0) returns.push((window[i] - window[i - 1]) / window[i - 1]);
  }
  const avg = returns.length > 0 ? mean(returns) : 0;
  const volatility =
    returns.length > 0 ? Math.sqrt(returns.reduce((sum, r) => sum + (r - avg) ** 2, 0) / returns.length) : 0;

  return {
    confidence: clamp(1 - volatility, 0.3, 0.8),
    value: trend * volatility * 2 * 100,
    model: 'simple_trend',
  };
}

export function detectPumpSignals(trades: TradeSample[]): { confidence: number; value: number; model: string } {
  if (trades.length === 0) {
    return { confidence: 0.1, value: 0, model: 'no_data' };
  }

  const totalVolume = trades.reduce((sum, t) => sum + t.volumeQuote, 0);
  const buys = trades.filter((t) => t.buysBase).length;
  const sells = trades.length - buys;

  let score = 0;

  if (totalVolume > 10) score += 30;
  else if (totalVolume > 5) score += 15;

  if (buys > sells * 2) score += 25;
  else if (buys > sells) score += 10;

  const prices = trades.map((t) => t.price).filter((p) => p > 0);
  if (prices.length > 5) {
    const change = (prices[prices.length - 1] - prices[0]) / prices[0];
    if (change > 0.5) score += 25;
    else if (change > 0.2) score += 10;
  }

  return {
    confidence: Math.min(0.9, trades.length / 50),
    value: Math.min(100, score),
    model: 'pattern_analysis',
  };
}

export class PredictionService {
  private cache: Map<string, PredictionResult> = new Map();
  private readonly CACHE_TTL_MS = 30 * 60 * 1000;

  /**
   * Cached launch score for a token
   */
  scoreTokenLaunch(token: Address, features: LaunchFeatures): PredictionResult {
    const key = `launch:${token.toLowerCase()}`;
    const cached = this.cache.get(key);
    if (cached && Date.now() - cached.createdAt < this.CACHE_TTL_MS) {
      return cached;
    }

    const result: PredictionResult = {
      token,
      predictionType: 'launch_score',
      confidence: 0.6,
      value: scoreLaunch(features),
      model: 'heuristic',
      createdAt: Date.now(),
    };
    this.cache.set(key, result);
    return result;
  }

  /**
   * Full read for a token from its price and trade history
   */
  predict(
    token: Address,
    prices: number[],
    trades: TradeSample[],
    launchFeatures: LaunchFeatures | null
  ): TokenPrediction {
    const now = Date.now();
    const movement = predictPriceMovement(prices);
    const pump = detectPumpSignals(trades.slice(-100));

    return {
      token,
      launchScore: launchFeatures ? this.scoreTokenLaunch(token, launchFeatures) : null,
      priceMovement: { token, predictionType: 'price_movement', createdAt: now, ...movement },
      pumpSignal: { token, predictionType: 'pump_signal', createdAt: now, ...pump },
    };
  }

  clearCache(): void {
    this.cache.clear();
  }
}

export const predictionService = new PredictionService();
