import type { VenueName } from './types';

export type ErrorCode =
  | 'Unauthorized'
  | 'NotArmed'
  | 'InvalidArguments'
  | 'InstanceBusy'
  | 'InstanceUnreachable'
  | 'PartialExecution'
  | 'ReconciliationTimeout'
  | 'ConfigInvalid'
  | 'Superseded';

export type OrchestratorErrorOptions = {
  venue?: VenueName;
  detail?: Record<string, unknown>;
  cause?: unknown;
};

export class OrchestratorError extends Error {
  readonly code: ErrorCode;
  readonly venue?: VenueName;
  readonly detail?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: OrchestratorErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'OrchestratorError';
    this.code = code;
    this.venue = options.venue;
    this.detail = options.detail;
  }
}

export function isOrchestratorError(err: unknown, code?: ErrorCode): err is OrchestratorError {
  return err instanceof OrchestratorError && (code === undefined || err.code === code);
}

export function unauthorized(issuerId: number): OrchestratorError {
  return new OrchestratorError('Unauthorized', `user ${issuerId} is not an admin`, { detail: { issuerId } });
}

export function invalidArguments(message: string, detail?: Record<string, unknown>): OrchestratorError {
  return new OrchestratorError('InvalidArguments', message, { detail });
}

export function instanceBusy(venue: VenueName, holder?: string): OrchestratorError {
  return new OrchestratorError('InstanceBusy', `${venue} venue is busy`, {
    venue,
    detail: holder ? { holder } : undefined
  });
}

export function instanceUnreachable(venue: VenueName, cause: unknown): OrchestratorError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new OrchestratorError('InstanceUnreachable', `${venue} venue unreachable: ${reason}`, { venue, cause });
}

export function superseded(venue: VenueName): OrchestratorError {
  return new OrchestratorError('Superseded', `${venue} reconciliation superseded by a newer plan`, { venue });
}

/** Narrows anything thrown into an OrchestratorError, attributing it to a venue when given. */
export function toOrchestratorError(err: unknown, venue?: VenueName): OrchestratorError {
  if (err instanceof OrchestratorError) {
    return err;
  }
  if (venue) {
    return instanceUnreachable(venue, err);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new OrchestratorError('InvalidArguments', message, { cause: err });
}
