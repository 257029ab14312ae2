/**
 * Trade Execution Service
 * Per-resource-key lock state machine (Idle → Locked → Submitted → Settled | Failed | TimedOut)
 * around revalidation, intent building and the signing collaborator. Nothing is ever retried;
 * timed-out submissions are reconciled against the signer before the key is released.
 */

import type { Address } from 'viem';
import { structuredLogger } from './logger.js';
import { metricsService } from './metrics.js';
import { buildTxIntent } from './tx-intent.js';
import type { SigningCollaborator, SubmissionResult } from './signing-client.js';
import type { RevalidationResult } from './opportunity-detector.js';
import { backoffDelay, withTimeout } from '../utils/async.js';
import { EngineErrorKind, toError } from '../utils/errors.js';
import { generateId } from '../utils/ids.js';
import type {
  ExecutionOutcome,
  ExecutionRecord,
  ExecutionState,
  LockState,
  Opportunity,
  PositionSnapshot,
  VenueId,
} from '../../../shared/schema.js';

export interface ExecutorOptions {
  wallet: Address;
  executorContract: Address;
  chainId: number;
  executionTimeoutMs: number;
  reconcileIntervalMs: number;
  maxGasPriceGwei: number;
}

export interface ExecutorDeps {
  signer: SigningCollaborator;
  revalidator: { revalidate(opportunity: Opportunity): RevalidationResult };
  risk: {
    isBlocked(token: Address): boolean;
    isKindPaused(kind: Opportunity['kind']): boolean;
    recordTradeResult(profit: number): void;
    getDeadline(expiresAtMs: number): bigint;
  };
  gas: {
    isGasFavorable(maxGasGwei: number): boolean;
    getMaxFeePerGas(): bigint;
  };
  market: {
    recordExecution(venueId: VenueId, pairId: string): void;
    readPosition(venueId: VenueId, positionId: string): PositionSnapshot | null;
  };
  routerFor: (venueId: VenueId) => Address | null;
}

export type SubmitResult =
  | { status: 'submitted'; record: ExecutionRecord }
  | { status: 'aborted'; reason: string }
  | { status: 'rejected'; errorKind: EngineErrorKind; reason: string };

export type ManualResolution = { state: 'Settled' | 'Failed'; txHash?: `0x${string}`; note?: string };

export type RecordListener = (record: ExecutionRecord) => void;

interface ExecutionStats {
  submitted: number;
  settled: number;
  failed: number;
  timedOut: number;
  aborted: number;
  busy: number;
  expired: number;
}

const TERMINAL_STATES: ReadonlySet<ExecutionState> = new Set(['Settled', 'Failed']);

export class TradeExecutorService {
  private locks: Map<string, LockState> = new Map();
  private records: Map<string, ExecutionRecord> = new Map();
  private opportunities: Map<string, Opportunity> = new Map();
  private reconcileTimers: Map<string, NodeJS.Timeout> = new Map();
  private reconcileAttempts: Map<string, number> = new Map();
  private reconciling: Set<string> = new Set();
  private listeners: RecordListener[] = [];
  private stats: ExecutionStats = {
    submitted: 0,
    settled: 0,
    failed: 0,
    timedOut: 0,
    aborted: 0,
    busy: 0,
    expired: 0,
  };
  private maxRecords = 1000;

  constructor(
    private readonly deps: ExecutorDeps,
    private readonly options: ExecutorOptions
  ) {}

  /**
   * Drive one opportunity through the lock state machine. Resolves once the
   * signer answers, the submission times out, or the attempt is turned away.
   */
  async submit(opportunity: Opportunity): Promise<SubmitResult> {
    const key = opportunity.resourceKey;

    if (Date.now() >= opportunity.expiresAt) {
      this.stats.expired++;
      return this.reject(opportunity, EngineErrorKind.DeadlineExceeded, 'opportunity expired');
    }
    if (this.deps.risk.isKindPaused(opportunity.kind)) {
      return this.reject(opportunity, EngineErrorKind.RiskVeto, 'trading paused');
    }
    if (this.deps.risk.isBlocked(opportunity.token)) {
      return this.reject(opportunity, EngineErrorKind.RiskVeto, 'token blocked');
    }

    // check-and-set: nothing awaits between the lookup and the write
    if (this.locks.has(key)) {
      this.stats.busy++;
      metricsService.incCounter('submissions_rejected_total', { reason: 'busy' });
      return { status: 'rejected', errorKind: EngineErrorKind.Busy, reason: `${key} is ${this.locks.get(key)}` };
    }
    this.setLock(key, 'Locked');

    const revalidation = this.deps.revalidator.revalidate(opportunity);
    if (!revalidation.valid) {
      return this.abort(opportunity, revalidation.reason);
    }
    if (!this.deps.gas.isGasFavorable(this.options.maxGasPriceGwei)) {
      return this.abort(opportunity, `gas price above ${this.options.maxGasPriceGwei} gwei`);
    }
    if (Date.now() >= opportunity.expiresAt) {
      this.releaseLock(key);
      this.stats.expired++;
      return this.reject(opportunity, EngineErrorKind.DeadlineExceeded, 'expired before dispatch');
    }

    const now = Date.now();
    const record: ExecutionRecord = {
      id: generateId(),
      opportunityId: opportunity.id,
      resourceKey: key,
      kind: opportunity.kind,
      state: 'Submitted',
      submittedAt: now,
      updatedAt: now,
      outcome: null,
    };

    const built = buildTxIntent(opportunity, {
      intentId: record.id,
      chainId: this.options.chainId,
      wallet: this.options.wallet,
      executorContract: this.options.executorContract,
      routerFor: this.deps.routerFor,
      borrowerFor: (o) => this.borrowerFor(o),
      deadline: this.deps.risk.getDeadline(opportunity.expiresAt),
      maxFeePerGas: this.deps.gas.getMaxFeePerGas(),
    });
    if (!built.success) {
      return this.abort(opportunity, built.error);
    }

    this.opportunities.set(record.id, opportunity);
    this.setLock(key, 'Submitted');
    this.stats.submitted++;
    this.store(record);
    structuredLogger.recordExecution('Submitted');
    structuredLogger.info('execution', 'Intent submitted', {
      recordId: record.id,
      opportunityId: opportunity.id,
      kind: opportunity.kind,
      resourceKey: key,
    });

    let result: SubmissionResult;
    try {
      result = await withTimeout(
        this.deps.signer.signAndSubmit(built.intent),
        this.options.executionTimeoutMs,
        'signAndSubmit'
      );
    } catch (error) {
      const current = this.records.get(record.id);
      if (current && current.state !== 'Submitted') return { status: 'submitted', record: current };
      // the signer may or may not have acted; only reconciliation can tell
      return { status: 'submitted', record: this.markTimedOut(record, toError(error).message) };
    }

    // an operator may have resolved the record while the signer was answering
    const current = this.records.get(record.id);
    if (current && current.state !== 'Submitted') {
      return { status: 'submitted', record: current };
    }

    if (result.status === 'settled') {
      return {
        status: 'submitted',
        record: this.finalize(record, 'Settled', {
          txHash: result.txHash,
          amountOut: result.amountOut,
          gasUsed: result.gasUsed,
        }),
      };
    }

    return {
      status: 'submitted',
      record: this.finalize(record, 'Failed', {
        txHash: result.txHash,
        error: result.error ?? `signer reported ${result.status}`,
        errorKind: 'ExecutionRejected',
      }),
    };
  }

  /**
   * Ask the signer what became of a timed-out submission
   */
  async reconcile(recordId: string): Promise<ExecutionRecord | null> {
    const record = this.records.get(recordId);
    if (!record) return null;
    if (record.state !== 'TimedOut' || this.reconciling.has(recordId)) return record;

    this.reconciling.add(recordId);
    try {
      const status = await withTimeout(
        this.deps.signer.getExecutionStatus(recordId),
        this.options.executionTimeoutMs,
        'getExecutionStatus'
      );

      const current = this.records.get(recordId);
      if (!current || current.state !== 'TimedOut') return current ?? null;

      if (status.status === 'settled') {
        return this.finalize(current, 'Settled', {
          txHash: status.txHash,
          amountOut: status.amountOut,
          gasUsed: status.gasUsed,
        });
      }
      if (status.status === 'failed') {
        return this.finalize(current, 'Failed', {
          txHash: status.txHash,
          error: status.error ?? 'signer reported failure',
          errorKind: 'ExecutionRejected',
        });
      }

      this.scheduleReconcile(recordId);
      return current;
    } catch (error) {
      structuredLogger.warning('execution', 'Reconciliation lookup failed', {
        recordId,
        error: toError(error).message,
      });
      this.scheduleReconcile(recordId);
      return this.records.get(recordId) ?? null;
    } finally {
      this.reconciling.delete(recordId);
    }
  }

  /**
   * Operator decision for a submission the signer cannot account for
   */
  resolveManually(recordId: string, resolution: ManualResolution): ExecutionRecord | null {
    const record = this.records.get(recordId);
    if (!record) return null;
    if (TERMINAL_STATES.has(record.state)) return record;

    structuredLogger.warning('execution', 'Execution resolved manually', { recordId, state: resolution.state });

    return this.finalize(
      record,
      resolution.state,
      resolution.state === 'Settled'
        ? { txHash: resolution.txHash }
        : { txHash: resolution.txHash, error: resolution.note ?? 'resolved manually', errorKind: 'ReconciliationUnknown' }
    );
  }

  onRecord(listener: RecordListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  getRecord(recordId: string): ExecutionRecord | null {
    return this.records.get(recordId) ?? null;
  }

  listRecords(limit: number = 100): ExecutionRecord[] {
    return Array.from(this.records.values())
      .sort((a, b) => b.updatedAt - a.updatedAt)
      .slice(0, limit);
  }

  getLockState(resourceKey: string): LockState {
    return this.locks.get(resourceKey) ?? 'Idle';
  }

  getLockCounts(): { held: number; awaitingReconciliation: number } {
    let awaitingReconciliation = 0;
    for (const state of this.locks.values()) {
      if (state === 'TimedOut') awaitingReconciliation++;
    }
    return { held: this.locks.size, awaitingReconciliation };
  }

  getStats(): ExecutionStats {
    return { ...this.stats };
  }

  stop(): void {
    for (const timer of this.reconcileTimers.values()) {
      clearTimeout(timer);
    }
    this.reconcileTimers.clear();
  }

  private borrowerFor(opportunity: Opportunity): Address | null {
    const { positionId, positionVenueId } = opportunity.inputs;
    if (!positionId || !positionVenueId) return null;
    return this.deps.market.readPosition(positionVenueId, positionId)?.borrower ?? null;
  }

  private reject(opportunity: Opportunity, errorKind: EngineErrorKind, reason: string): SubmitResult {
    metricsService.incCounter('submissions_rejected_total', { reason: errorKind });
    structuredLogger.info('execution', 'Submission rejected', {
      opportunityId: opportunity.id,
      resourceKey: opportunity.resourceKey,
      errorKind,
      reason,
    });
    return { status: 'rejected', errorKind, reason };
  }

  private abort(opportunity: Opportunity, reason: string): SubmitResult {
    this.releaseLock(opportunity.resourceKey);
    this.stats.aborted++;
    metricsService.incCounter('submissions_rejected_total', { reason: 'aborted' });
    structuredLogger.info('execution', 'Submission aborted', {
      opportunityId: opportunity.id,
      resourceKey: opportunity.resourceKey,
      reason,
    });
    return { status: 'aborted', reason };
  }

  private markTimedOut(record: ExecutionRecord, error: string): ExecutionRecord {
    const updated: ExecutionRecord = {
      ...record,
      state: 'TimedOut',
      updatedAt: Date.now(),
      outcome: { error, errorKind: 'ReconciliationUnknown' },
    };
    this.setLock(record.resourceKey, 'TimedOut');
    this.stats.timedOut++;
    this.store(updated);
    metricsService.incCounter('executions_total', { kind: record.kind, state: 'TimedOut' });
    structuredLogger.error('execution', 'Submission outcome unknown', null, {
      recordId: record.id,
      resourceKey: record.resourceKey,
      error,
    });
    this.scheduleReconcile(record.id);
    return updated;
  }

  private finalize(record: ExecutionRecord, state: 'Settled' | 'Failed', outcome: ExecutionOutcome): ExecutionRecord {
    const updated: ExecutionRecord = { ...record, state, updatedAt: Date.now(), outcome };
    this.store(updated);

    const timer = this.reconcileTimers.get(record.id);
    if (timer) clearTimeout(timer);
    this.reconcileTimers.delete(record.id);
    this.reconcileAttempts.delete(record.id);

    const opportunity = this.opportunities.get(record.id);
    this.opportunities.delete(record.id);

    if (state === 'Settled') {
      this.stats.settled++;
      if (opportunity) {
        for (const leg of opportunity.inputs.legs) {
          this.deps.market.recordExecution(leg.venueId, opportunity.inputs.pairId);
        }
        this.deps.risk.recordTradeResult(opportunity.expectedValue);
      }
    } else {
      this.stats.failed++;
      if (opportunity) {
        this.deps.risk.recordTradeResult(-opportunity.inputs.costs.gasCost);
      }
    }

    this.releaseLock(record.resourceKey);
    metricsService.incCounter('executions_total', { kind: record.kind, state });
    metricsService.observeHistogram('execution_seconds', (updated.updatedAt - record.submittedAt) / 1000, {
      kind: record.kind,
    });
    structuredLogger.recordExecution(state);

    if (state === 'Settled') {
      structuredLogger.success('execution', 'Execution settled', { recordId: record.id, txHash: outcome.txHash });
    } else {
      structuredLogger.warning('execution', 'Execution failed', { recordId: record.id, error: outcome.error });
    }

    return updated;
  }

  private scheduleReconcile(recordId: string): void {
    if (this.reconcileTimers.has(recordId)) return;
    if (this.records.get(recordId)?.state !== 'TimedOut') return;

    const attempt = (this.reconcileAttempts.get(recordId) ?? 0) + 1;
    this.reconcileAttempts.set(recordId, attempt);

    const delay = backoffDelay(attempt, {
      baseDelayMs: this.options.reconcileIntervalMs,
      maxDelayMs: this.options.reconcileIntervalMs * 12,
    });

    const timer = setTimeout(() => {
      this.reconcileTimers.delete(recordId);
      void this.reconcile(recordId);
    }, delay);
    timer.unref();
    this.reconcileTimers.set(recordId, timer);
  }

  private store(record: ExecutionRecord): void {
    this.records.set(record.id, record);
    if (this.records.size > this.maxRecords) {
      for (const [id, candidate] of this.records) {
        if (TERMINAL_STATES.has(candidate.state)) {
          this.records.delete(id);
          break;
        }
      }
    }

    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (error) {
        structuredLogger.error('execution', 'Record listener failed', toError(error));
      }
    }
  }

  private setLock(resourceKey: string, state: LockState): void {
    this.locks.set(resourceKey, state);
    metricsService.setGauge('locks_held', this.locks.size);
  }

  private releaseLock(resourceKey: string): void {
    this.locks.delete(resourceKey);
    metricsService.setGauge('locks_held', this.locks.size);
  }
}
