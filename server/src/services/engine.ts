/**
 * Engine Service
 * Wires venue feeds, market state, detection, risk, execution and history together
 * and exposes the inbound operations served over HTTP
 */

import type { Address } from 'viem';
import { config } from '../config/env.js';
import { loadVenuesConfig, type VenuesFile } from '../config/venues.js';
import { structuredLogger } from './logger.js';
import { MarketStateStore } from './market-state.js';
import { VenueFeedAdapter, type RawVenueSource } from './venue-feed.js';
import { ChainVenueSource, RelayVenueSource } from './venue-sources.js';
import { OpportunityDetector, type ProcessResult, type VenueProfile } from './opportunity-detector.js';
import { riskManagerService, type RiskManagerService } from './risk-manager.js';
import { ChainTokenInspector } from './token-inspector.js';
import { gasEstimatorService, type GasEstimatorService } from './gas-estimator.js';
import { predictionService, type PredictionService, type TokenPrediction } from './prediction.js';
import { TradeExecutorService, type ManualResolution } from './trade-executor.js';
import { HttpSigningClient, type SigningCollaborator } from './signing-client.js';
import { MemoryHistorySink, type HistorySink } from './persistence.js';
import { toError } from '../utils/errors.js';
import type {
  EngineHealth,
  ExecutionRecord,
  Opportunity,
  VenueId,
  VenueStatus,
  WSEventType,
} from '../../../shared/schema.js';

export interface EngineNotifier {
  broadcast<T>(type: WSEventType, payload: T): void;
}

export interface EngineComponents {
  store: MarketStateStore;
  feeds: VenueFeedAdapter[];
  detector: OpportunityDetector;
  executor: TradeExecutorService;
  risk: Pick<RiskManagerService, 'getRiskStatus'>;
  predictions: PredictionService;
  history: HistorySink;
  notifier: EngineNotifier;
}

export interface EngineOptions {
  autoExecute: boolean;
  defaultSlippageBps: number;
  maxSlippageBps: number;
}

export type SnipeRequestResult = ProcessResult | { status: 'unavailable'; reason: string };

export class EngineService {
  private readonly feeds = new Map<VenueId, VenueFeedAdapter>();
  private readonly unsubscribers: Array<() => void> = [];
  private startedAt = 0;
  private running = false;

  constructor(
    private readonly components: EngineComponents,
    private readonly options: EngineOptions
  ) {
    for (const feed of components.feeds) {
      this.feeds.set(feed.venueId, feed);
    }
  }

  /**
   * Subscribe the pipeline and start every feed. A feed that fails to start
   * stays in its reconnect loop and does not hold up the others.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.startedAt = Date.now();

    const { detector, executor, history, notifier } = this.components;

    this.unsubscribers.push(
      detector.onOpportunity((opportunity) => this.handleOpportunity(opportunity)),
      executor.onRecord((record) => {
        history.recordExecution(record);
        notifier.broadcast('execution:update', record);
      })
    );

    for (const feed of this.feeds.values()) {
      this.unsubscribers.push(feed.onStatusChange((venueId, status) => this.handleVenueStatus(venueId, status)));
    }

    detector.start();

    await Promise.all(
      Array.from(this.feeds.values()).map((feed) =>
        feed.start().catch((error) => {
          structuredLogger.error('feed', 'Venue feed failed to start', toError(error), { venueId: feed.venueId });
        })
      )
    );

    structuredLogger.success('system', 'Engine started', {
      venues: this.feeds.size,
      autoExecute: this.options.autoExecute,
    });
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }

    this.components.detector.stop();
    this.components.executor.stop();
    await Promise.all(Array.from(this.feeds.values()).map((feed) => feed.stop()));
    await this.components.history.close();

    structuredLogger.info('system', 'Engine stopped');
  }

  /**
   * Evaluate a snipe for a token on its deepest quote pool. Nothing is submitted.
   */
  async requestSnipe(token: Address, amount: number, slippageBps?: number): Promise<SnipeRequestResult> {
    const slippage = slippageBps ?? this.options.defaultSlippageBps;
    if (slippage > this.options.maxSlippageBps) {
      return { status: 'unavailable', reason: `slippage above ${this.options.maxSlippageBps} bps` };
    }

    const draft = this.components.detector.buildSnipe(token, amount, slippage);
    if (!draft) {
      return { status: 'unavailable', reason: 'no tradable pool for token' };
    }

    return this.components.detector.evaluate(draft);
  }

  /**
   * Full arbitrage scan; returns the candidates that passed risk, best first
   */
  async requestArbScan(): Promise<Opportunity[]> {
    const results = await this.components.detector.scanArbitrage();
    return results
      .flatMap((result) => (result.status === 'accepted' ? [result.opportunity] : []))
      .sort((a, b) => b.expectedValue - a.expectedValue);
  }

  /**
   * Price, pump and launch read for a token from the deepest pool that trades it
   */
  requestPrediction(token: Address): TokenPrediction | null {
    const { store, predictions } = this.components;
    const pools = store.findPoolsForToken(token).filter((pool) => store.quoteSide(pool) !== null);
    if (pools.length === 0) return null;

    const deepest = pools.reduce((best, pool) => (pool.liquidityDepth > best.liquidityDepth ? pool : best));
    return predictions.predict(
      token,
      store.getPriceHistory(deepest.pairId),
      store.getSwapHistory(deepest.pairId),
      this.components.detector.launchFeatures(deepest)
    );
  }

  getOpportunities(): Opportunity[] {
    return this.components.detector.getOpportunities();
  }

  getOpportunity(id: string): Opportunity | null {
    return this.components.detector.getOpportunity(id);
  }

  listExecutions(limit?: number): ExecutionRecord[] {
    return this.components.executor.listRecords(limit);
  }

  getExecution(recordId: string): ExecutionRecord | null {
    return this.components.executor.getRecord(recordId);
  }

  reconcile(recordId: string): Promise<ExecutionRecord | null> {
    return this.components.executor.reconcile(recordId);
  }

  resolveManually(recordId: string, resolution: ManualResolution): ExecutionRecord | null {
    return this.components.executor.resolveManually(recordId, resolution);
  }

  /**
   * Returns null for an unknown venue
   */
  async recoverVenue(venueId: VenueId): Promise<{ recovered: boolean; status: VenueStatus } | null> {
    const feed = this.feeds.get(venueId);
    if (!feed) return null;

    const recovered = await feed.recover();
    return { recovered, status: feed.getStatus() };
  }

  getHealth(): EngineHealth {
    const venues = Array.from(this.feeds.values()).map((feed) => feed.getHealth());
    return {
      live: this.running,
      startedAt: this.startedAt,
      venues,
      locks: this.components.executor.getLockCounts(),
      tradingPaused: this.components.risk.getRiskStatus().tradingPaused,
    };
  }

  /**
   * Ready once every venue has come up at least once and none is DOWN
   */
  isReady(): boolean {
    return this.running && Array.from(this.feeds.values()).every((feed) => feed.getStatus() === 'UP');
  }

  private handleOpportunity(opportunity: Opportunity): void {
    const { history, notifier, executor } = this.components;
    history.recordOpportunity(opportunity);
    notifier.broadcast('opportunity:new', opportunity);

    if (!this.options.autoExecute) return;

    executor
      .submit(opportunity)
      .then((result) => {
        if (result.status === 'submitted') {
          this.components.detector.consume(opportunity);
        }
      })
      .catch((error) => {
        structuredLogger.error('execution', 'Auto-execution failed', toError(error), {
          opportunityId: opportunity.id,
        });
      });
  }

  private handleVenueStatus(venueId: VenueId, status: VenueStatus): void {
    this.components.notifier.broadcast('venue:status', { venueId, status });

    if (status === 'DOWN') {
      const dropped = this.components.detector.invalidateVenue(venueId);
      structuredLogger.warning('feed', 'Venue down, opportunities invalidated', { venueId, dropped });
    }
  }
}

function createSource(venues: VenuesFile, venue: VenuesFile['venues'][number]): RawVenueSource {
  if (venue.feed.type === 'relay') {
    return new RelayVenueSource({
      venueId: venue.id,
      wsUrl: venue.feed.wsUrl,
      snapshotUrl: venue.feed.snapshotUrl,
      requestTimeoutMs: config.feed.resyncTimeoutMs,
    });
  }

  return new ChainVenueSource({
    venueId: venue.id,
    wsUrl: venue.feed.wsUrl,
    factory: venue.factory,
    pools: venue.pools,
    quoteTokens: venues.quoteTokens,
  });
}

/**
 * Build an engine from the environment and the venues file
 */
export function createEngine(
  notifier: EngineNotifier,
  overrides: { signer?: SigningCollaborator; history?: HistorySink; venues?: VenuesFile } = {}
): EngineService {
  const venues = overrides.venues ?? loadVenuesConfig(config.venues.configPath);

  const store = new MarketStateStore({
    quoteTokens: venues.quoteTokens,
    minPriceMoveBps: config.detection.minPriceMoveBps,
  });

  const feeds = venues.venues.map((venue) => {
    store.registerVenue(venue.id, venue.feeBps);
    return new VenueFeedAdapter(createSource(venues, venue), store, {
      reconnectBaseDelayMs: config.feed.reconnectBaseDelayMs,
      reconnectMaxDelayMs: config.feed.reconnectMaxDelayMs,
      reconnectBudget: config.feed.reconnectBudget,
      stallTimeoutMs: config.feed.stallTimeoutMs,
      connectTimeoutMs: config.feed.resyncTimeoutMs,
      resyncTimeoutMs: config.feed.resyncTimeoutMs,
      resyncAttempts: 3,
      healthProbeIntervalMs: config.feed.healthProbeIntervalMs,
    });
  });

  const risk: RiskManagerService = riskManagerService;
  const gas: GasEstimatorService = gasEstimatorService;

  const inspectorRouter = venues.venues.find((venue) => venue.kind === 'amm' && venue.router)?.router;
  if (inspectorRouter) {
    risk.setInspector(
      new ChainTokenInspector({
        rpcUrl: config.chain.rpcUrl,
        router: inspectorRouter,
        quoteToken: venues.quoteTokens[0],
        quoteDecimals: 18,
        probeAmount: 0.01,
        maxLoss: config.risk.honeypotMaxLoss,
        explorerApiUrl: config.risk.explorerApiUrl,
        explorerApiKey: config.risk.explorerApiKey,
        requestTimeoutMs: config.risk.evaluationTimeoutMs,
      })
    );
  }

  const profiles: VenueProfile[] = venues.venues.map((venue) => ({
    venueId: venue.id,
    latencyMs: venue.latencyMs,
    trackLaunches: venue.trackLaunches,
    liquidationTarget: venue.kind === 'lending' ? venue.router ?? null : null,
  }));

  const detector = new OpportunityDetector(store, risk, gas, profiles, {
    wallet: config.executor.wallet,
    minProfitBps: config.detection.minProfitBps,
    minConfidence: config.detection.minConfidence,
    arbMaxTradeSize: config.detection.arbMaxTradeSize,
    arbDepthFraction: config.detection.arbDepthFraction,
    slippageBps: config.detection.defaultSlippageBps,
    snipeRiskBudget: config.detection.snipeRiskBudget,
    snipeExpectedReturn: config.detection.snipeExpectedReturn,
    minLiquidity: config.detection.minLiquidity,
    liquidationHealthThreshold: config.detection.liquidationHealthThreshold,
    ttlMs: config.detection.ttlMs,
  });

  const routers = new Map<VenueId, Address>();
  for (const venue of venues.venues) {
    if (venue.kind === 'amm' && venue.router) routers.set(venue.id, venue.router);
  }

  const signer =
    overrides.signer ??
    new HttpSigningClient({
      baseUrl: config.executor.signerUrl,
      apiKey: config.executor.signerApiKey,
      requestTimeoutMs: config.executor.executionTimeoutMs,
    });

  const executor = new TradeExecutorService(
    {
      signer,
      revalidator: detector,
      risk,
      gas,
      market: store,
      routerFor: (venueId) => routers.get(venueId) ?? null,
    },
    {
      wallet: config.executor.wallet,
      executorContract: config.executor.contract,
      chainId: config.chain.id,
      executionTimeoutMs: config.executor.executionTimeoutMs,
      reconcileIntervalMs: config.executor.reconcileIntervalMs,
      maxGasPriceGwei: config.executor.maxGasPriceGwei,
    }
  );

  const history = overrides.history ?? new MemoryHistorySink();

  return new EngineService(
    { store, feeds, detector, executor, risk, predictions: predictionService, history, notifier },
    {
      autoExecute: config.executor.autoExecute,
      defaultSlippageBps: config.detection.defaultSlippageBps,
      maxSlippageBps: config.detection.maxSlippageBps,
    }
  );
}
