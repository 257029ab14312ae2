/**
 * Shared TypeScript types for the opportunity engine
 * Used by the server and by monitoring clients of the HTTP/WebSocket surface
 */

// Ethereum address type
export type Address = `0x${string}`;
export type Hex = `0x${string}`;

// Venue types
export type VenueId = string;
export type VenueKind = 'amm' | 'lending';
export type VenueStatus = 'UP' | 'RESYNCING' | 'RECONNECTING' | 'DOWN';

// Normalized venue events
export type VenueEventKind = 'PoolCreated' | 'Swap' | 'LiquidityChanged' | 'LiquidationTrigger';

export interface PoolStatePayload {
  poolAddress: Address;
  token0: Address;
  token1: Address;
  decimals0: number;
  decimals1: number;
  reserve0: bigint;
  reserve1: bigint;
}

export interface PoolCreatedPayload extends PoolStatePayload {
  factory: Address;
}

export interface SwapPayload extends PoolStatePayload {
  // true when the swap bought token0 with token1
  buysToken0: boolean;
  volumeQuote: number;
}

export type LiquidityChangedPayload = PoolStatePayload;

export interface PositionPayload {
  positionId: string;
  borrower: Address;
  collateralToken: Address;
  debtToken: Address;
  collateralAmount: bigint;
  debtAmount: bigint;
  collateralDecimals: number;
  debtDecimals: number;
  // collateral price in debt-token units
  collateralPrice: number;
  healthFactor: number;
  liquidationBonusBps: number;
  closeFactorBps: number;
}

interface VenueEventBase {
  venueId: VenueId;
  pairId: string;
  venueSequenceNo: number;
  observedAt: number;
  verified: boolean;
}

export type VenueEvent =
  | (VenueEventBase & { kind: 'PoolCreated'; payload: PoolCreatedPayload })
  | (VenueEventBase & { kind: 'Swap'; payload: SwapPayload })
  | (VenueEventBase & { kind: 'LiquidityChanged'; payload: LiquidityChangedPayload })
  | (VenueEventBase & { kind: 'LiquidationTrigger'; payload: PositionPayload });

// Market state
export interface MarketSnapshot {
  venueId: VenueId;
  pairId: string;
  poolAddress: Address;
  token0: Address;
  token1: Address;
  decimals0: number;
  decimals1: number;
  reserve0: bigint;
  reserve1: bigint;
  /** token1 per token0 */
  price: number;
  /** reserve of the quote side, in whole quote-token units */
  liquidityDepth: number;
  feeBps: number;
  venueSequenceNo: number;
  updatedAt: number;
  verified: boolean;
  /** venue sequence at which an own execution last settled against this pool */
  ownExecutionSequenceNo: number | null;
}

export interface PositionSnapshot extends PositionPayload {
  venueId: VenueId;
  pairId: string;
  venueSequenceNo: number;
  updatedAt: number;
  verified: boolean;
}

/** live venue event, or a refetched snapshot during resync */
export type DeltaSource = 'event' | 'snapshot';

export interface SnapshotDelta {
  venueId: VenueId;
  pairId: string;
  kind: VenueEventKind;
  source: DeltaSource;
  previous: MarketSnapshot | null;
  current: MarketSnapshot | null;
  position: PositionSnapshot | null;
  isNew: boolean;
  priceChangeBps: number;
  liquidityChangeBps: number;
  significant: boolean;
}

export type RejectReason = 'stale' | 'venue-down';

export type ApplyResult =
  | { status: 'applied'; delta: SnapshotDelta }
  | { status: 'rejected'; reason: RejectReason };

// Opportunities
export type OpportunityKind = 'snipe' | 'arbitrage' | 'liquidation';

export interface ExecutionLeg {
  venueId: VenueId;
  poolAddress: Address;
  tokenIn: Address;
  tokenOut: Address;
  amountIn: bigint;
  expectedAmountOut: bigint;
  minAmountOut: bigint;
  priceImpactBps: number;
}

export interface CostBreakdown {
  gasCost: number;
  venueFees: number;
  priceImpactBps: number;
}

export interface OpportunityInputs {
  legs: ExecutionLeg[];
  tradeSize: number;
  slippageBps: number;
  costs: CostBreakdown;
  /** net margin in bps for arbitrage, bonus in bps for liquidation */
  marginBps: number;
  pairId: string;
  positionId?: string;
  positionVenueId?: VenueId;
  estimatedLatencyMs: number;
}

export interface Opportunity {
  id: string;
  kind: OpportunityKind;
  resourceKey: string;
  token: Address;
  expectedValue: number;
  riskScore: number;
  confidence: number;
  detectedAt: number;
  expiresAt: number;
  inputs: OpportunityInputs;
}

/**
 * What a strategy produces before identity and risk are attached
 */
export type OpportunityDraft = Omit<Opportunity, 'id' | 'riskScore'>;

// Risk
export type RiskFlag = 'honeypot_suspected' | 'low_liquidity' | 'concentrated_holders' | 'unverified_contract';

export interface RiskAssessment {
  token: Address;
  riskScore: number;
  flags: RiskFlag[];
  vetoed: boolean;
  reason?: string;
  evaluatedAt: number;
}

// Execution
export type ExecutionState = 'Submitted' | 'Settled' | 'Failed' | 'TimedOut';
export type LockState = 'Idle' | 'Locked' | 'Submitted' | 'TimedOut';

export interface ExecutionOutcome {
  txHash?: Hex;
  amountOut?: string;
  gasUsed?: string;
  error?: string;
  errorKind?: 'ExecutionRejected' | 'ReconciliationUnknown' | 'DeadlineExceeded';
}

export interface ExecutionRecord {
  id: string;
  opportunityId: string;
  resourceKey: string;
  kind: OpportunityKind;
  state: ExecutionState;
  submittedAt: number;
  updatedAt: number;
  outcome: ExecutionOutcome | null;
}

export interface TxIntent {
  intentId: string;
  opportunityId: string;
  resourceKey: string;
  chainId: number;
  from: Address;
  to: Address;
  data: Hex;
  value: bigint;
  slippageBps: number;
  minAmountOut: bigint;
  deadline: bigint;
  maxFeePerGas?: bigint;
}

// Health
export interface VenueHealth {
  venueId: VenueId;
  status: VenueStatus;
  lastSequenceNo: number;
  lastEventAt: number | null;
  reconnectAttempts: number;
}

export interface EngineHealth {
  live: boolean;
  startedAt: number;
  venues: VenueHealth[];
  locks: { held: number; awaitingReconciliation: number };
  tradingPaused: boolean;
}

// API response types
export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  timestamp: number;
}

// WebSocket event types
export type WSEventType =
  | 'engine:status'
  | 'subscription'
  | 'opportunity:new'
  | 'execution:update'
  | 'venue:status'
  | 'error'
  | 'pong';

export interface WSEvent<T = unknown> {
  type: WSEventType;
  payload: T;
  timestamp: number;
}

/**
 * Canonical pair key: lower-cased addresses, sorted, joined by '/'
 */
export function pairKey(tokenA: Address, tokenB: Address): string {
  const a = tokenA.toLowerCase();
  const b = tokenB.toLowerCase();
  return a < b ? `${a}/${b}` : `${b}/${a}`;
}

export function resourceKeyFor(wallet: Address, token: Address): string {
  return `${wallet.toLowerCase()}:${token.toLowerCase()}`;
}
