/**
 * Prediction Scorer Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  detectPumpSignals,
  predictPriceMovement,
  predictionService,
  scoreArbitrage,
  scoreLaunch,
  scoreLiquidation,
  type LaunchFeatures,
  type TradeSample,
} from '../services/prediction.js';
import { TOKEN } from './helpers/fixtures.js';

const features: LaunchFeatures = {
  liquidity: 5,
  holderCount: 60,
  transactionCount24h: 200,
  buySellRatio: 2,
  honeypotScore: 0.5,
  socialMentions: 60,
};

describe('scoreLaunch', () => {
  it('adds and subtracts per feature band', () => {
    expect(scoreLaunch(features)).toBe(80);
  });

  it('scores unknown features as neutral', () => {
    expect(scoreLaunch({ ...features, holderCount: null, honeypotScore: null, socialMentions: null })).toBe(75);
  });

  it('clamps at zero', () => {
    expect(
      scoreLaunch({
        liquidity: 0.05,
        holderCount: 5,
        transactionCount24h: 0,
        buySellRatio: 0.2,
        honeypotScore: 0.9,
        socialMentions: 0,
      })
    ).toBe(0);
  });
});

describe('scoreArbitrage', () => {
  it('rewards margin and depth, penalises stale snapshots', () => {
    expect(scoreArbitrage({ netMarginBps: 100, tradeSize: 20, minDepth: 1000, snapshotAgeMs: 2000 })).toBe(75);
  });

  it('penalises trades large against the shallower pool', () => {
    expect(scoreArbitrage({ netMarginBps: 0, tradeSize: 100, minDepth: 1000, snapshotAgeMs: 0 })).toBe(40);
  });
});

describe('scoreLiquidation', () => {
  it('weighs health factor and profit ratio', () => {
    expect(scoreLiquidation({ healthFactor: 0.97, profit: 10, repayValue: 500 })).toBe(65);
    expect(scoreLiquidation({ healthFactor: 1.2, profit: 0, repayValue: 0 })).toBe(50);
  });
});

describe('predictPriceMovement', () => {
  it('needs ten prices', () => {
    expect(predictPriceMovement([1, 2, 3])).toEqual({ confidence: 0.2, value: 0, model: 'insufficient_data' });
  });

  it('reads a flat series as no move with capped confidence', () => {
    expect(predictPriceMovement(Array.from({ length: 12 }, () => 100))).toEqual({
      confidence: 0.8,
      value: 0,
      model: 'simple_trend',
    });
  });

  it('points up on a rising series', () => {
    const result = predictPriceMovement(Array.from({ length: 12 }, (_, i) => i + 1));

    expect(result.model).toBe('simple_trend');
    expect(result.value).toBeGreaterThan(0);
  });
});

describe('detectPumpSignals', () => {
  it('reports no data without trades', () => {
    expect(detectPumpSignals([])).toEqual({ confidence: 0.1, value: 0, model: 'no_data' });
  });

  it('scores volume, buy pressure and price run-up', () => {
    const trades: TradeSample[] = Array.from({ length: 10 }, (_, i) => ({
      buysBase: true,
      volumeQuote: 2,
      price: 1 + i / 10,
    }));

    expect(detectPumpSignals(trades)).toEqual({ confidence: 0.2, value: 80, model: 'pattern_analysis' });
  });
});

describe('predictionService', () => {
  afterEach(() => {
    predictionService.clearCache();
  });

  it('caches launch scores per token', () => {
    const first = predictionService.scoreTokenLaunch(TOKEN, features);
    const second = predictionService.scoreTokenLaunch(TOKEN, { ...features, liquidity: 100 });

    expect(second).toBe(first);
    expect(first.value).toBe(80);
  });

  it('combines movement, pump and launch reads', () => {
    const prediction = predictionService.predict(TOKEN, [1, 2], [], null);

    expect(prediction.token).toBe(TOKEN);
    expect(prediction.launchScore).toBeNull();
    expect(prediction.priceMovement.predictionType).toBe('price_movement');
    expect(prediction.priceMovement.model).toBe('insufficient_data');
    expect(prediction.pumpSignal.model).toBe('no_data');
  });
});
