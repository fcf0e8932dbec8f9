export type StakingErrorCategory =
  | 'AUTHORIZATION'
  | 'PRECONDITION'
  | 'EXTERNAL'
  | 'CONCURRENCY'
  | 'INPUT';

export type PreconditionCode =
  | 'ALREADY_REGISTERED'
  | 'NOT_REGISTERED'
  | 'INSUFFICIENT_DEPOSIT'
  | 'INSUFFICIENT_STAKE'
  | 'INSUFFICIENT_FUNDS'
  | 'ZERO_AMOUNT'
  | 'COOLDOWN_NOT_ELAPSED';

export type StakingErrorCode =
  | PreconditionCode
  | 'NOT_AUTHORIZED'
  | 'TRANSFER_FAILED'
  | 'REENTRANT_CALL'
  | 'VALIDATION_ERROR';

const RETRYABLE_CODES: ReadonlySet<StakingErrorCode> = new Set<StakingErrorCode>([
  'COOLDOWN_NOT_ELAPSED',
  'TRANSFER_FAILED',
  'REENTRANT_CALL',
]);

export class StakingError extends Error {
  code: StakingErrorCode;
  category: StakingErrorCategory;
  details?: unknown;

  constructor(
    code: StakingErrorCode,
    category: StakingErrorCategory,
    message: string,
    details?: unknown,
  ) {
    super(message);
    this.code = code;
    this.category = category;
    this.details = details;
    this.name = 'StakingError';
  }

  /** True when the same call may succeed later without changing its arguments. */
  get retryable(): boolean {
    return RETRYABLE_CODES.has(this.code);
  }
}

export class ValidationError extends StakingError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', 'INPUT', message, details);
    this.name = 'ValidationError';
  }
}

export class AuthorizationError extends StakingError {
  constructor(message: string, details?: unknown) {
    super('NOT_AUTHORIZED', 'AUTHORIZATION', message, details);
    this.name = 'AuthorizationError';
  }
}

export class PreconditionError extends StakingError {
  constructor(code: PreconditionCode, message: string, details?: unknown) {
    super(code, 'PRECONDITION', message, details);
    this.name = 'PreconditionError';
  }
}

export class TransferFailedError extends StakingError {
  constructor(message: string, details?: unknown) {
    super('TRANSFER_FAILED', 'EXTERNAL', message, details);
    this.name = 'TransferFailedError';
  }
}

export class ReentrancyError extends StakingError {
  constructor(message: string, details?: unknown) {
    super('REENTRANT_CALL', 'CONCURRENCY', message, details);
    this.name = 'ReentrancyError';
  }
}

/**
 * A broken accounting invariant (balance overflow, corrupted record).
 * Not a StakingError: callers are not expected to recover from it.
 */
export class InvariantViolation extends Error {
  details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.details = details;
    this.name = 'InvariantViolation';
  }
}

export function isStakingError(error: unknown, code?: StakingErrorCode): error is StakingError {
  if (!(error instanceof StakingError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
