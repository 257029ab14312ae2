/**
 * Risk Management Service
 * Token safety evaluation under a deadline, operator block/allow lists,
 * slippage protection and the loss circuit breaker
 */

import type { Address } from 'viem';
import { config } from '../config/env.js';
import { structuredLogger } from './logger.js';
import { metricsService } from './metrics.js';
import type { ContractInfo, RoundTripResult, TokenInspector } from './token-inspector.js';
import { withTimeout } from '../utils/async.js';
import { isDeadlineExceeded, toError } from '../utils/errors.js';
import type { OpportunityDraft, OpportunityKind, RiskAssessment, RiskFlag } from '../../../shared/schema.js';

// Circuit breaker thresholds, in quote units
interface CircuitBreakerConfig {
  maxLossPerHour: number;
  maxLossPerDay: number;
  maxConsecutiveLosses: number;
}

export interface RiskOptions {
  maxRiskScore: number;
  evaluationTimeoutMs: number;
  executionLatencyBudgetMs: number;
  maxHolderConcentration: number;
  minLiquidity: number;
  /** EV at or below this after risk scaling is vetoed */
  minExpectedValue: number;
  inspectionTtlMs: number;
}

export interface EvaluateContext {
  /** epoch ms after which the opportunity is worthless */
  deadline: number;
  liquidityDepth?: number;
}

export interface RiskAdjustment {
  vetoed: boolean;
  reason?: string;
  confidence: number;
  expectedValue: number;
}

export interface Inspection {
  roundTrip: RoundTripResult;
  contract: ContractInfo;
  inspectedAt: number;
}

export const FLAG_WEIGHTS: Record<RiskFlag, number> = {
  honeypot_suspected: 100,
  unverified_contract: 30,
  concentrated_holders: 30,
  low_liquidity: 20,
};

export class RiskManagerService {
  private circuitBreakerConfig: CircuitBreakerConfig = {
    maxLossPerHour: 100,
    maxLossPerDay: 500,
    maxConsecutiveLosses: 3,
  };

  private inspector: TokenInspector | null = null;
  private inspections: Map<string, Inspection> = new Map();
  private inFlight: Map<string, Promise<Inspection>> = new Map();
  private blacklist: Set<string> = new Set();
  private whitelist: Set<string> = new Set();
  private blocked: Set<string> = new Set();

  // Trading state
  private tradingPaused: boolean = false;
  private pauseReason: string | null = null;
  private pausedKinds: Set<OpportunityKind> = new Set();
  private hourlyLoss: number = 0;
  private dailyLoss: number = 0;
  private consecutiveLosses: number = 0;
  private lastHourReset: Date = new Date();
  private lastDayReset: Date = new Date();

  constructor(private readonly options: RiskOptions) {}

  setInspector(inspector: TokenInspector): void {
    this.inspector = inspector;
  }

  /**
   * Score a token against the time left before the opportunity's deadline.
   * Anything that cannot be checked in time is vetoed.
   */
  async evaluate(token: Address, context: EvaluateContext): Promise<RiskAssessment> {
    const key = token.toLowerCase();
    const startedAt = Date.now();

    if (this.blacklist.has(key)) {
      return this.veto(token, 100, [], 'blacklisted');
    }
    if (this.blocked.has(key)) {
      return this.veto(token, 100, ['honeypot_suspected'], 'honeypot');
    }

    const budget = Math.min(
      this.options.evaluationTimeoutMs,
      context.deadline - startedAt - this.options.executionLatencyBudgetMs
    );

    if (budget <= 0) {
      return this.veto(token, 100, [], 'DeadlineExceeded');
    }

    let inspection: Inspection;
    try {
      inspection = await withTimeout(this.inspect(token), budget, 'risk evaluation');
    } catch (error) {
      const deadline = isDeadlineExceeded(error);
      structuredLogger.warning('risk', deadline ? 'Risk evaluation out of time' : 'Risk evaluation failed', {
        token,
        budgetMs: budget,
        error: toError(error).message,
      });
      return this.veto(token, 100, [], deadline ? 'DeadlineExceeded' : 'inspection-failed');
    } finally {
      metricsService.observeHistogram('risk_evaluation_seconds', (Date.now() - startedAt) / 1000);
    }

    const flags: RiskFlag[] = [];
    if (inspection.roundTrip.honeypot) {
      flags.push('honeypot_suspected');
      this.blocked.add(key);
    }

    if (!this.whitelist.has(key)) {
      if (inspection.contract.verified === false) flags.push('unverified_contract');
      if (
        inspection.contract.topHolderShare !== null &&
        inspection.contract.topHolderShare > this.options.maxHolderConcentration
      ) {
        flags.push('concentrated_holders');
      }
      if (context.liquidityDepth !== undefined && context.liquidityDepth < this.options.minLiquidity) {
        flags.push('low_liquidity');
      }
    }

    const riskScore = Math.min(100, flags.reduce((sum, flag) => sum + FLAG_WEIGHTS[flag], 0));

    if (flags.includes('honeypot_suspected')) {
      return this.veto(token, riskScore, flags, 'honeypot');
    }
    if (riskScore >= this.options.maxRiskScore) {
      return this.veto(token, riskScore, flags, `risk score ${riskScore} >= ${this.options.maxRiskScore}`);
    }

    return { token, riskScore, flags, vetoed: false, evaluatedAt: Date.now() };
  }

  /**
   * Scale a candidate's confidence and EV by its risk score
   */
  adjust(draft: OpportunityDraft, assessment: RiskAssessment): RiskAdjustment {
    const factor = 1 - assessment.riskScore / 100;
    const confidence = draft.confidence * factor;
    const expectedValue = draft.expectedValue * factor;

    if (assessment.vetoed) {
      return { vetoed: true, reason: assessment.reason, confidence, expectedValue };
    }
    if (expectedValue <= this.options.minExpectedValue) {
      return { vetoed: true, reason: 'below-threshold', confidence, expectedValue };
    }
    return { vetoed: false, confidence, expectedValue };
  }

  /**
   * Unexpired cached inspection of a token; never starts one
   */
  getInspection(token: Address): Inspection | null {
    const cached = this.inspections.get(token.toLowerCase());
    if (!cached || Date.now() - cached.inspectedAt >= this.options.inspectionTtlMs) return null;
    return cached;
  }

  /**
   * Honeypots found by inspection and operator-blacklisted tokens
   */
  isBlocked(token: Address): boolean {
    const key = token.toLowerCase();
    return this.blocked.has(key) || this.blacklist.has(key);
  }

  addBlacklistedToken(token: Address): void {
    this.blacklist.add(token.toLowerCase());
    structuredLogger.info('risk', 'Token blacklisted', { token });
  }

  removeBlacklistedToken(token: Address): void {
    this.blacklist.delete(token.toLowerCase());
  }

  addWhitelistedToken(token: Address): void {
    this.whitelist.add(token.toLowerCase());
    structuredLogger.info('risk', 'Token whitelisted', { token });
  }

  removeWhitelistedToken(token: Address): void {
    this.whitelist.delete(token.toLowerCase());
  }

  /**
   * Calculate minimum output with slippage protection
   */
  calculateMinOutput(expectedOutput: bigint, slippageBps: number): bigint {
    return (expectedOutput * (10000n - BigInt(Math.floor(slippageBps)))) / 10000n;
  }

  /**
   * Unix-seconds transaction deadline
   */
  getDeadline(expiresAtMs: number): bigint {
    return BigInt(Math.floor(expiresAtMs / 1000));
  }

  /**
   * Record trade result for circuit breaker
   */
  recordTradeResult(profit: number): void {
    this.resetPeriodicalCounters();

    if (profit < 0) {
      this.hourlyLoss += Math.abs(profit);
      this.dailyLoss += Math.abs(profit);
      this.consecutiveLosses++;
    } else {
      this.consecutiveLosses = 0;
    }

    if (this.isCircuitBreakerTriggered() && !this.tradingPaused) {
      this.pauseTrading('Circuit breaker triggered');
    }
  }

  isCircuitBreakerTriggered(): boolean {
    this.resetPeriodicalCounters();

    return (
      this.hourlyLoss >= this.circuitBreakerConfig.maxLossPerHour ||
      this.dailyLoss >= this.circuitBreakerConfig.maxLossPerDay ||
      this.consecutiveLosses >= this.circuitBreakerConfig.maxConsecutiveLosses
    );
  }

  private resetPeriodicalCounters(): void {
    const now = new Date();

    const hourDiff = (now.getTime() - this.lastHourReset.getTime()) / (1000 * 60 * 60);
    if (hourDiff >= 1) {
      this.hourlyLoss = 0;
      this.lastHourReset = now;
    }

    const dayDiff = (now.getTime() - this.lastDayReset.getTime()) / (1000 * 60 * 60 * 24);
    if (dayDiff >= 1) {
      this.dailyLoss = 0;
      this.lastDayReset = now;
    }
  }

  pauseTrading(reason: string): void {
    this.tradingPaused = true;
    this.pauseReason = reason;
    structuredLogger.warning('risk', 'Trading paused', { reason });
  }

  resumeTrading(): void {
    this.tradingPaused = false;
    this.pauseReason = null;
    this.consecutiveLosses = 0;
    structuredLogger.info('risk', 'Trading resumed');
  }

  pauseKind(kind: OpportunityKind): void {
    this.pausedKinds.add(kind);
    structuredLogger.warning('risk', 'Strategy paused', { kind });
  }

  resumeKind(kind: OpportunityKind): void {
    this.pausedKinds.delete(kind);
    structuredLogger.info('risk', 'Strategy resumed', { kind });
  }

  isKindPaused(kind: OpportunityKind): boolean {
    return this.tradingPaused || this.pausedKinds.has(kind);
  }

  getRiskStatus(): {
    tradingPaused: boolean;
    pauseReason: string | null;
    circuitBreakerActive: boolean;
    hourlyLoss: number;
    dailyLoss: number;
    consecutiveLosses: number;
    pausedKinds: OpportunityKind[];
    blockedTokens: number;
  } {
    return {
      tradingPaused: this.tradingPaused,
      pauseReason: this.pauseReason,
      circuitBreakerActive: this.isCircuitBreakerTriggered(),
      hourlyLoss: this.hourlyLoss,
      dailyLoss: this.dailyLoss,
      consecutiveLosses: this.consecutiveLosses,
      pausedKinds: Array.from(this.pausedKinds),
      blockedTokens: this.blocked.size + this.blacklist.size,
    };
  }

  updateCircuitBreakerConfig(update: Partial<CircuitBreakerConfig>): void {
    this.circuitBreakerConfig = { ...this.circuitBreakerConfig, ...update };
  }

  clearCache(): void {
    this.inspections.clear();
  }

  /**
   * Cached, de-duplicated inspection of one token
   */
  private inspect(token: Address): Promise<Inspection> {
    const key = token.toLowerCase();
    const cached = this.inspections.get(key);
    if (cached && Date.now() - cached.inspectedAt < this.options.inspectionTtlMs) {
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const inspector = this.inspector;
    if (!inspector) {
      return Promise.reject(new Error('no token inspector configured'));
    }

    const work = Promise.all([inspector.simulateRoundTrip(token), inspector.getContractInfo(token)])
      .then(([roundTrip, contract]) => {
        const inspection: Inspection = { roundTrip, contract, inspectedAt: Date.now() };
        this.inspections.set(key, inspection);
        return inspection;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, work);
    return work;
  }

  private veto(token: Address, riskScore: number, flags: RiskFlag[], reason: string): RiskAssessment {
    metricsService.incCounter('opportunities_vetoed_total', { reason: reason.split(' ')[0] });
    structuredLogger.info('risk', 'Token vetoed', { token, riskScore, flags, reason });
    return { token, riskScore, flags, vetoed: true, reason, evaluatedAt: Date.now() };
  }
}

export const riskManagerService = new RiskManagerService({
  maxRiskScore: config.risk.maxRiskScore,
  evaluationTimeoutMs: config.risk.evaluationTimeoutMs,
  executionLatencyBudgetMs: config.risk.executionLatencyBudgetMs,
  maxHolderConcentration: config.risk.maxHolderConcentration,
  minLiquidity: config.detection.minLiquidity,
  minExpectedValue: 0,
  inspectionTtlMs: 5 * 60 * 1000,
});
