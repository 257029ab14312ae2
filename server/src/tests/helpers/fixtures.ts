/**
 * Shared test data: addresses, pool and position events, stub collaborators
 */

import { vi } from 'vitest';
import type { Address } from 'viem';
import type { ContractInfo, RoundTripResult, TokenInspector } from '../../services/token-inspector.js';
import type { ExecutionStatusResult, SigningCollaborator, SubmissionResult } from '../../services/signing-client.js';
import type { DetectorOptions } from '../../services/opportunity-detector.js';
import type { RiskOptions } from '../../services/risk-manager.js';
import {
  pairKey,
  resourceKeyFor,
  type Opportunity,
  type PoolStatePayload,
  type PositionPayload,
  type TxIntent,
  type VenueEvent,
  type VenueId,
} from '../../../../shared/schema.js';

export const WALLET: Address = '0x0000000000000000000000000000000000000001';
export const EXECUTOR_CONTRACT: Address = '0x0000000000000000000000000000000000000002';
export const TOKEN: Address = '0x1111111111111111111111111111111111111111';
export const QUOTE: Address = '0x2222222222222222222222222222222222222222';
export const ROUTER: Address = '0x3333333333333333333333333333333333333333';
export const POOL_A: Address = '0x4444444444444444444444444444444444444444';
export const POOL_B: Address = '0x5555555555555555555555555555555555555555';
export const FACTORY: Address = '0x6666666666666666666666666666666666666666';
export const LENDING_POOL: Address = '0x7777777777777777777777777777777777777777';
export const BORROWER: Address = '0x8888888888888888888888888888888888888888';

export const PAIR_ID = pairKey(TOKEN, QUOTE);
export const RESOURCE_KEY = resourceKeyFor(WALLET, TOKEN);

const E18 = 10n ** 18n;

/**
 * TOKEN/QUOTE pool with whole-unit reserves at 18 decimals
 */
export function poolPayload(poolAddress: Address, baseReserve: number, quoteReserve: number): PoolStatePayload {
  return {
    poolAddress,
    token0: TOKEN,
    token1: QUOTE,
    decimals0: 18,
    decimals1: 18,
    reserve0: BigInt(baseReserve) * E18,
    reserve1: BigInt(quoteReserve) * E18,
  };
}

export function poolEvent(
  venueId: VenueId,
  sequenceNo: number,
  kind: 'PoolCreated' | 'Swap' | 'LiquidityChanged',
  payload: PoolStatePayload,
  verified = true
): VenueEvent {
  const base = { venueId, pairId: pairKey(payload.token0, payload.token1), venueSequenceNo: sequenceNo, observedAt: Date.now(), verified };

  switch (kind) {
    case 'PoolCreated':
      return { ...base, kind, payload: { ...payload, factory: FACTORY } };
    case 'Swap':
      return { ...base, kind, payload: { ...payload, buysToken0: true, volumeQuote: 10 } };
    case 'LiquidityChanged':
      return { ...base, kind, payload };
  }
}

/**
 * 1000 QUOTE debt against 1 TOKEN priced at 1100 QUOTE
 */
export function positionPayload(overrides: Partial<PositionPayload> = {}): PositionPayload {
  return {
    positionId: 'position-1',
    borrower: BORROWER,
    collateralToken: TOKEN,
    debtToken: QUOTE,
    collateralAmount: E18,
    debtAmount: 1000n * E18,
    collateralDecimals: 18,
    debtDecimals: 18,
    collateralPrice: 1100,
    healthFactor: 0.9,
    liquidationBonusBps: 500,
    closeFactorBps: 5000,
    ...overrides,
  };
}

export function positionEvent(venueId: VenueId, sequenceNo: number, payload: PositionPayload): VenueEvent {
  return {
    venueId,
    pairId: pairKey(payload.collateralToken, payload.debtToken),
    venueSequenceNo: sequenceNo,
    observedAt: Date.now(),
    verified: true,
    kind: 'LiquidationTrigger',
    payload,
  };
}

/**
 * Inspector with fixed answers; counts calls
 */
export class StubInspector implements TokenInspector {
  roundTrip: RoundTripResult = { honeypot: false, loss: 0.006, reason: 'round trip ok' };
  contract: ContractInfo = { verified: true, topHolderShare: 0.1, holderCount: 40 };
  calls = 0;
  /** when set, inspections never settle */
  hang = false;

  simulateRoundTrip(): Promise<RoundTripResult> {
    this.calls++;
    if (this.hang) return new Promise(() => undefined);
    return Promise.resolve(this.roundTrip);
  }

  getContractInfo(): Promise<ContractInfo> {
    if (this.hang) return new Promise(() => undefined);
    return Promise.resolve(this.contract);
  }
}

export function createSigner() {
  const signAndSubmit = vi.fn<(intent: TxIntent) => Promise<SubmissionResult>>();
  const getExecutionStatus = vi.fn<(intentId: string) => Promise<ExecutionStatusResult>>();
  signAndSubmit.mockResolvedValue({ status: 'settled', txHash: '0xabc' });
  getExecutionStatus.mockResolvedValue({ status: 'pending' });

  const signer: SigningCollaborator = { signAndSubmit, getExecutionStatus };
  return { signer, signAndSubmit, getExecutionStatus };
}

export const riskOptions: RiskOptions = {
  maxRiskScore: 50,
  evaluationTimeoutMs: 1000,
  executionLatencyBudgetMs: 100,
  maxHolderConcentration: 0.5,
  minLiquidity: 1,
  minExpectedValue: 0,
  inspectionTtlMs: 60_000,
};

export const detectorOptions: DetectorOptions = {
  wallet: WALLET,
  minProfitBps: 50,
  minConfidence: 40,
  arbMaxTradeSize: 1000,
  arbDepthFraction: 0.01,
  slippageBps: 100,
  snipeRiskBudget: 0.5,
  snipeExpectedReturn: 0.5,
  minLiquidity: 1,
  liquidationHealthThreshold: 1,
  ttlMs: { arbitrage: 3000, snipe: 10000, liquidation: 6000 },
};

/**
 * Single-leg snipe on POOL_A at venue-a
 */
export function snipeOpportunity(overrides: Partial<Opportunity> = {}): Opportunity {
  const now = Date.now();
  return {
    id: 'opportunity-1',
    kind: 'snipe',
    resourceKey: RESOURCE_KEY,
    token: TOKEN,
    expectedValue: 0.1,
    riskScore: 0,
    confidence: 60,
    detectedAt: now,
    expiresAt: now + 10_000,
    inputs: {
      legs: [
        {
          venueId: 'venue-a',
          poolAddress: POOL_A,
          tokenIn: QUOTE,
          tokenOut: TOKEN,
          amountIn: E18,
          expectedAmountOut: 9n * E18,
          minAmountOut: 8n * E18,
          priceImpactBps: 100,
        },
      ],
      tradeSize: 1,
      slippageBps: 100,
      costs: { gasCost: 0.05, venueFees: 0.003, priceImpactBps: 100 },
      marginBps: 0,
      pairId: PAIR_ID,
      estimatedLatencyMs: 200,
    },
    ...overrides,
  };
}
