/**
 * Engine error kinds
 */

export enum EngineErrorKind {
  StaleEvent = 'StaleEvent',
  VenueDown = 'VenueDown',
  RiskVeto = 'RiskVeto',
  DeadlineExceeded = 'DeadlineExceeded',
  Busy = 'Busy',
  ExecutionRejected = 'ExecutionRejected',
  ReconciliationUnknown = 'ReconciliationUnknown',
}

export class EngineError extends Error {
  constructor(
    readonly kind: EngineErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

export function isDeadlineExceeded(error: unknown): boolean {
  return error instanceof EngineError && error.kind === EngineErrorKind.DeadlineExceeded;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
