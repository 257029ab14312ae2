/**
 * Opportunity Detector
 * Runs the snipe, arbitrage and liquidation strategies over significant market deltas,
 * gates candidates on confidence and risk, and keeps the latest opportunity per resource key
 */

import type { Address } from 'viem';
import type { MarketStateStore } from './market-state.js';
import { structuredLogger } from './logger.js';
import { metricsService } from './metrics.js';
import { detectArbitrage, getAmountOut, isTradable, simulatePath, type ArbitrageParams } from './arbitrage.js';
import { buildSnipeDraft, detectSnipe, type SnipeParams } from './snipe.js';
import { detectLiquidation, type LiquidationParams } from './liquidation.js';
import type { LaunchFeatures } from './prediction.js';
import type { EvaluateContext, Inspection, RiskAdjustment } from './risk-manager.js';
import { generateId } from '../utils/ids.js';
import { toError } from '../utils/errors.js';
import type {
  MarketSnapshot,
  Opportunity,
  OpportunityDraft,
  OpportunityKind,
  RiskAssessment,
  SnapshotDelta,
  VenueId,
} from '../../../shared/schema.js';

export interface DetectorOptions {
  wallet: Address;
  minProfitBps: number;
  minConfidence: number;
  arbMaxTradeSize: number;
  arbDepthFraction: number;
  slippageBps: number;
  snipeRiskBudget: number;
  snipeExpectedReturn: number;
  minLiquidity: number;
  liquidationHealthThreshold: number;
  ttlMs: Record<OpportunityKind, number>;
}

export interface VenueProfile {
  venueId: VenueId;
  latencyMs: number;
  trackLaunches: boolean;
  /** contract that takes liquidation calls on lending venues */
  liquidationTarget: Address | null;
}

export interface RiskGate {
  evaluate(token: Address, context: EvaluateContext): Promise<RiskAssessment>;
  adjust(draft: OpportunityDraft, assessment: RiskAssessment): RiskAdjustment;
  getInspection(token: Address): Inspection | null;
}

export interface GasPricer {
  estimateCostQuote(legCount: number): number;
}

export type ProcessResult =
  | { status: 'accepted'; opportunity: Opportunity }
  | { status: 'dropped'; reason: string }
  | { status: 'vetoed'; reason: string; assessment: RiskAssessment };

export type RevalidationResult =
  | { valid: true; expectedValue: number }
  | { valid: false; reason: string };

export type OpportunityListener = (opportunity: Opportunity) => void;

export class OpportunityDetector {
  private readonly book = new Map<string, Opportunity>();
  private readonly listeners: OpportunityListener[] = [];
  private readonly venues = new Map<VenueId, VenueProfile>();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly store: MarketStateStore,
    private readonly risk: RiskGate,
    private readonly gas: GasPricer,
    venues: VenueProfile[],
    private readonly options: DetectorOptions
  ) {
    for (const venue of venues) {
      this.venues.set(venue.venueId, venue);
    }
  }

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.store.onDelta((delta) => this.handleDelta(delta));
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  onOpportunity(listener: OpportunityListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  /**
   * Strategies run only for significant deltas
   */
  handleDelta(delta: SnapshotDelta): void {
    if (!delta.significant) return;

    for (const draft of this.detect(delta)) {
      this.process(draft).catch((error) => {
        structuredLogger.error('opportunity', 'Candidate processing failed', toError(error), {
          kind: draft.kind,
          resourceKey: draft.resourceKey,
        });
      });
    }
  }

  detect(delta: SnapshotDelta): OpportunityDraft[] {
    const now = Date.now();
    const drafts: OpportunityDraft[] = [];

    if (delta.kind === 'LiquidationTrigger') {
      if (delta.position) {
        const draft = detectLiquidation(delta.position, this.liquidationParams(now));
        if (draft) drafts.push(draft);
      }
      return drafts;
    }

    if (delta.kind === 'PoolCreated' && delta.current) {
      const snipe = detectSnipe(
        delta,
        this.launchFeatures(delta.current),
        this.snipeParams(now, this.options.slippageBps)
      );
      if (snipe) drafts.push(snipe);
    }

    const arbitrage = detectArbitrage(
      this.store.readPair(delta.pairId, { verifiedOnly: true }),
      this.arbitrageParams(now)
    );
    if (arbitrage) drafts.push(arbitrage);

    return drafts;
  }

  /**
   * Confidence gate, then risk evaluation. Nothing is published.
   */
  async evaluate(draft: OpportunityDraft): Promise<ProcessResult> {
    if (draft.confidence < this.options.minConfidence) {
      structuredLogger.debug('opportunity', 'Candidate below confidence floor', {
        kind: draft.kind,
        token: draft.token,
        confidence: draft.confidence,
      });
      return { status: 'dropped', reason: 'low-confidence' };
    }

    const assessment = await this.risk.evaluate(draft.token, {
      deadline: draft.expiresAt,
      liquidityDepth: this.liquidityFor(draft),
    });
    const adjustment = this.risk.adjust(draft, assessment);

    if (adjustment.vetoed) {
      structuredLogger.recordOpportunity(true);
      structuredLogger.info('opportunity', 'Candidate vetoed', {
        kind: draft.kind,
        token: draft.token,
        reason: adjustment.reason,
      });
      return { status: 'vetoed', reason: adjustment.reason ?? 'vetoed', assessment };
    }

    const opportunity: Opportunity = Object.freeze({
      ...draft,
      id: generateId(),
      riskScore: assessment.riskScore,
      confidence: adjustment.confidence,
      expectedValue: adjustment.expectedValue,
    });
    return { status: 'accepted', opportunity };
  }

  /**
   * Evaluate, then put accepted candidates in the book and notify listeners
   */
  async process(draft: OpportunityDraft): Promise<ProcessResult> {
    const result = await this.evaluate(draft);
    if (result.status !== 'accepted') return result;

    const { opportunity } = result;
    const current = this.book.get(opportunity.resourceKey);
    if (current && current.detectedAt > opportunity.detectedAt) {
      return { status: 'dropped', reason: 'superseded' };
    }

    this.book.set(opportunity.resourceKey, opportunity);
    metricsService.incCounter('opportunities_detected_total', { kind: opportunity.kind });
    structuredLogger.recordOpportunity(false);
    structuredLogger.info('opportunity', 'Opportunity detected', {
      id: opportunity.id,
      kind: opportunity.kind,
      token: opportunity.token,
      expectedValue: opportunity.expectedValue,
      confidence: opportunity.confidence,
    });

    for (const listener of this.listeners) {
      try {
        listener(opportunity);
      } catch (error) {
        structuredLogger.error('opportunity', 'Opportunity listener failed', toError(error));
      }
    }

    return result;
  }

  /**
   * Ad-hoc arbitrage pass over every known pair; results are evaluated, not published
   */
  async scanArbitrage(): Promise<ProcessResult[]> {
    const now = Date.now();
    const params = this.arbitrageParams(now);
    const drafts: OpportunityDraft[] = [];

    for (const pairId of this.store.listPairs()) {
      const draft = detectArbitrage(this.store.readPair(pairId, { verifiedOnly: true }), params);
      if (draft) drafts.push(draft);
    }

    return Promise.all(drafts.map((draft) => this.evaluate(draft)));
  }

  /**
   * Snipe candidate for an explicit token and size, on its deepest quote pool
   */
  buildSnipe(token: Address, amount: number, slippageBps: number): OpportunityDraft | null {
    const needle = token.toLowerCase();
    const pools = this.store
      .findPoolsForToken(token)
      .filter((pool) => {
        const side = this.store.quoteSide(pool);
        if (side === null) return false;
        const other = side === 1 ? pool.token0 : pool.token1;
        return other.toLowerCase() === needle && pool.liquidityDepth > 0;
      })
      .sort((a, b) => b.liquidityDepth - a.liquidityDepth);

    const pool = pools[0];
    if (!pool) return null;

    return buildSnipeDraft(pool, amount, this.launchFeatures(pool), this.snipeParams(Date.now(), slippageBps));
  }

  /**
   * Recompute the opportunity's path against the freshest snapshots
   */
  revalidate(opportunity: Opportunity): RevalidationResult {
    const now = Date.now();
    if (now >= opportunity.expiresAt) {
      return { valid: false, reason: 'expired' };
    }

    switch (opportunity.kind) {
      case 'arbitrage':
        return this.revalidateArbitrage(opportunity, now);
      case 'snipe':
        return this.revalidateSnipe(opportunity);
      case 'liquidation':
        return this.revalidateLiquidation(opportunity, now);
    }
  }

  getOpportunities(): Opportunity[] {
    const now = Date.now();
    return Array.from(this.book.values())
      .filter((opportunity) => opportunity.expiresAt > now)
      .sort((a, b) => b.detectedAt - a.detectedAt);
  }

  getOpportunity(id: string): Opportunity | null {
    const now = Date.now();
    for (const opportunity of this.book.values()) {
      if (opportunity.id === id) {
        return opportunity.expiresAt > now ? opportunity : null;
      }
    }
    return null;
  }

  /**
   * Drop book entries that route through a venue that went DOWN
   */
  invalidateVenue(venueId: VenueId): number {
    let removed = 0;
    for (const [key, opportunity] of this.book) {
      const touches =
        opportunity.inputs.positionVenueId === venueId ||
        opportunity.inputs.legs.some((leg) => leg.venueId === venueId);
      if (touches) {
        this.book.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      structuredLogger.info('opportunity', 'Opportunities invalidated by venue outage', { venueId, removed });
    }
    return removed;
  }

  /**
   * Remove the book entry once it has been handed to execution
   */
  consume(opportunity: Opportunity): void {
    if (this.book.get(opportunity.resourceKey)?.id === opportunity.id) {
      this.book.delete(opportunity.resourceKey);
    }
  }

  private revalidateArbitrage(opportunity: Opportunity, now: number): RevalidationResult {
    const [buyLeg, sellLeg] = opportunity.inputs.legs;
    if (!buyLeg || !sellLeg) return { valid: false, reason: 'malformed path' };

    const buy = this.store.read(buyLeg.venueId, opportunity.inputs.pairId);
    const sell = this.store.read(sellLeg.venueId, opportunity.inputs.pairId);
    if (!buy || !sell) return { valid: false, reason: 'venue unavailable' };
    if (!isTradable(buy) || !isTradable(sell)) return { valid: false, reason: 'snapshot not tradable' };

    const path = simulatePath(buy, sell, opportunity.inputs.tradeSize, this.arbitrageParams(now));
    if (!path) return { valid: false, reason: 'path no longer simulates' };
    if (path.netMarginBps < this.options.minProfitBps) {
      return { valid: false, reason: `margin ${path.netMarginBps.toFixed(1)}bps below threshold` };
    }
    return { valid: true, expectedValue: path.netProfit };
  }

  private revalidateSnipe(opportunity: Opportunity): RevalidationResult {
    const [leg] = opportunity.inputs.legs;
    if (!leg) return { valid: false, reason: 'malformed path' };

    const pool = this.store.read(leg.venueId, opportunity.inputs.pairId);
    if (!pool) return { valid: false, reason: 'venue unavailable' };

    const quoteIsToken0 = pool.token0.toLowerCase() === leg.tokenIn.toLowerCase();
    const amountOut = getAmountOut(
      leg.amountIn,
      quoteIsToken0 ? pool.reserve0 : pool.reserve1,
      quoteIsToken0 ? pool.reserve1 : pool.reserve0,
      pool.feeBps
    );
    if (amountOut < leg.minAmountOut) {
      return { valid: false, reason: 'price moved past slippage bound' };
    }
    return { valid: true, expectedValue: opportunity.expectedValue };
  }

  private revalidateLiquidation(opportunity: Opportunity, now: number): RevalidationResult {
    const { positionId, positionVenueId } = opportunity.inputs;
    if (!positionId || !positionVenueId) return { valid: false, reason: 'malformed position' };

    const position = this.store.readPosition(positionVenueId, positionId);
    if (!position) return { valid: false, reason: 'venue unavailable' };

    const draft = detectLiquidation(position, this.liquidationParams(now));
    if (!draft) return { valid: false, reason: 'position no longer liquidatable' };
    return { valid: true, expectedValue: draft.expectedValue };
  }

  private liquidityFor(draft: OpportunityDraft): number | undefined {
    if (draft.kind === 'liquidation') return undefined;
    const depths = draft.inputs.legs
      .map((leg) => this.store.read(leg.venueId, draft.inputs.pairId))
      .filter((snapshot): snapshot is MarketSnapshot => snapshot !== null)
      .map((snapshot) => snapshot.liquidityDepth);
    return depths.length > 0 ? Math.min(...depths) : undefined;
  }

  /**
   * What is known about a pool's base token. Holder and honeypot data come from a
   * cached risk inspection and stay unknown until one has run.
   */
  launchFeatures(snapshot: MarketSnapshot): LaunchFeatures {
    const swaps = this.store.getSwapHistory(snapshot.pairId);
    const dayAgo = Date.now() - 24 * 60 * 60 * 1000;
    const recent = swaps.filter((swap) => swap.at >= dayAgo);
    const buys = recent.filter((swap) => swap.buysBase).length;
    const sells = recent.length - buys;

    const base = this.store.quoteSide(snapshot) === 0 ? snapshot.token1 : snapshot.token0;
    const inspection = this.risk.getInspection(base);

    return {
      liquidity: snapshot.liquidityDepth,
      holderCount: inspection?.contract.holderCount ?? null,
      transactionCount24h: recent.length,
      buySellRatio: sells > 0 ? buys / sells : buys > 0 ? 2 : 1,
      honeypotScore: inspection ? honeypotScore(inspection) : null,
      socialMentions: null,
    };
  }

  private latency = (venueId: VenueId): number => this.venues.get(venueId)?.latencyMs ?? 250;

  private gasCost = (legCount: number): number => this.gas.estimateCostQuote(legCount);

  private isQuoteToken = (token: Address): boolean => this.store.isQuoteToken(token);

  private arbitrageParams(now: number): ArbitrageParams {
    return {
      wallet: this.options.wallet,
      minProfitBps: this.options.minProfitBps,
      maxTradeSize: this.options.arbMaxTradeSize,
      depthFraction: this.options.arbDepthFraction,
      slippageBps: this.options.slippageBps,
      ttlMs: this.options.ttlMs.arbitrage,
      gasCost: this.gasCost,
      venueLatencyMs: this.latency,
      isQuoteToken: this.isQuoteToken,
      now,
    };
  }

  private snipeParams(now: number, slippageBps: number): SnipeParams {
    return {
      wallet: this.options.wallet,
      riskBudget: this.options.snipeRiskBudget,
      slippageBps,
      minLiquidity: this.options.minLiquidity,
      expectedReturn: this.options.snipeExpectedReturn,
      ttlMs: this.options.ttlMs.snipe,
      gasCost: this.gasCost,
      venueLatencyMs: this.latency,
      isQuoteToken: this.isQuoteToken,
      isTrackedVenue: (venueId) => this.venues.get(venueId)?.trackLaunches ?? false,
      now,
    };
  }

  private liquidationParams(now: number): LiquidationParams {
    return {
      wallet: this.options.wallet,
      healthThreshold: this.options.liquidationHealthThreshold,
      slippageBps: this.options.slippageBps,
      ttlMs: this.options.ttlMs.liquidation,
      gasCost: this.gasCost,
      venueLatencyMs: this.latency,
      targetFor: (venueId) => this.venues.get(venueId)?.liquidationTarget ?? null,
      collateralSwapFeeBps: (token) => this.store.findPoolsForToken(token)[0]?.feeBps ?? 30,
      now,
    };
  }
}

function honeypotScore(inspection: Inspection): number | null {
  if (inspection.roundTrip.honeypot) return 1;
  const loss = inspection.roundTrip.loss;
  return loss === null ? null : Math.min(1, Math.max(0, loss));
}
