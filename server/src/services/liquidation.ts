/**
 * Liquidations
 * Positions under the health threshold are repaid up to the close factor for the bonus
 */

import type { Address } from 'viem';
import { applySlippage, toRaw } from './arbitrage.js';
import { toUnits } from './market-state.js';
import { scoreLiquidation } from './prediction.js';
import {
  resourceKeyFor,
  type OpportunityDraft,
  type PositionSnapshot,
  type VenueId,
} from '../../../shared/schema.js';

export interface LiquidationParams {
  wallet: Address;
  healthThreshold: number;
  slippageBps: number;
  ttlMs: number;
  gasCost: (legCount: number) => number;
  venueLatencyMs: (venueId: VenueId) => number;
  /** lending pool that takes the liquidation call */
  targetFor: (venueId: VenueId) => Address | null;
  /** fee charged swapping seized collateral back to the debt token */
  collateralSwapFeeBps: (collateralToken: Address) => number;
  now: number;
}

export interface LiquidationQuote {
  repay: number;
  seized: number;
  bonus: number;
  swapFee: number;
  gasCost: number;
  profit: number;
}

export function quoteLiquidation(position: PositionSnapshot, params: LiquidationParams): LiquidationQuote | null {
  if (position.collateralPrice <= 0) return null;

  const debt = toUnits(position.debtAmount, position.debtDecimals);
  const collateral = toUnits(position.collateralAmount, position.collateralDecimals);

  const repay = debt * (position.closeFactorBps / 10000);
  const seized = Math.min(collateral, (repay * (1 + position.liquidationBonusBps / 10000)) / position.collateralPrice);
  const seizedValue = seized * position.collateralPrice;

  const bonus = seizedValue - repay;
  const swapFee = (seizedValue * params.collateralSwapFeeBps(position.collateralToken)) / 10000;
  const gasCost = params.gasCost(1);

  return { repay, seized, bonus, swapFee, gasCost, profit: bonus - swapFee - gasCost };
}

export function detectLiquidation(position: PositionSnapshot, params: LiquidationParams): OpportunityDraft | null {
  if (position.healthFactor >= params.healthThreshold) return null;

  const target = params.targetFor(position.venueId);
  if (!target) return null;

  const quote = quoteLiquidation(position, params);
  if (!quote || quote.profit <= 0) return null;

  const amountIn = toRaw(quote.repay, position.debtDecimals);
  const expectedOut = toRaw(quote.seized, position.collateralDecimals);

  return {
    kind: 'liquidation',
    resourceKey: resourceKeyFor(params.wallet, position.collateralToken),
    token: position.collateralToken,
    expectedValue: quote.profit,
    confidence: scoreLiquidation({
      healthFactor: position.healthFactor,
      profit: quote.profit,
      repayValue: quote.repay,
    }),
    detectedAt: params.now,
    expiresAt: params.now + params.ttlMs,
    inputs: {
      legs: [
        {
          venueId: position.venueId,
          poolAddress: target,
          tokenIn: position.debtToken,
          tokenOut: position.collateralToken,
          amountIn,
          expectedAmountOut: expectedOut,
          minAmountOut: applySlippage(expectedOut, params.slippageBps),
          priceImpactBps: 0,
        },
      ],
      tradeSize: quote.repay,
      slippageBps: params.slippageBps,
      costs: { gasCost: quote.gasCost, venueFees: quote.swapFee, priceImpactBps: 0 },
      marginBps: position.liquidationBonusBps,
      pairId: position.pairId,
      positionId: position.positionId,
      positionVenueId: position.venueId,
      estimatedLatencyMs: params.venueLatencyMs(position.venueId),
    },
  };
}
