/**
 * @fileoverview Error hierarchy shared by every engine operation.
 *
 * Each error carries a stable `kind` that callers can switch on without
 * `instanceof` checks, plus the operation that was being performed.
 * Ledger-originated errors live in `contracts/errors.ts` and extend the same base.
 */

export type ErrorKind =
  | 'Validation'
  | 'PhaseGate'
  | 'AlreadyActed'
  | 'LedgerRejected'
  | 'ConfirmationTimeout'
  | 'ConfirmedUnread'
  | 'TransportUnavailable'
  | 'NotFound'
  | 'CacheConflict'
  | 'Configuration';

/**
 * Abstract base class for all engine errors.
 */
export abstract class ElectionEngineError extends Error {
  abstract readonly kind: ErrorKind;

  /**
   * @param message - Human-readable reason, safe to show to the caller
   * @param operation - The operation that was being performed when the error occurred
   */
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Missing or malformed input. Raised before anything reaches the ledger.
 */
export class ValidationError extends ElectionEngineError {
  readonly kind = 'Validation';
}

/**
 * The biometric oracle rejected the fresh sample.
 */
export class BiometricMismatchError extends ElectionEngineError {
  readonly kind = 'Validation';

  constructor(operation: string) {
    super('Face mismatch', operation);
  }
}

/**
 * The operation is not allowed in the election's effective phase.
 * `phase` is null when the phase could not be resolved (fail closed).
 */
export class PhaseGateError extends ElectionEngineError {
  readonly kind = 'PhaseGate';

  constructor(
    message: string,
    operation: string,
    public readonly electionId: number,
    public readonly phase: string | null,
    options?: { cause?: unknown }
  ) {
    super(message, operation, options);
  }
}

/**
 * The entity is absent from both the ledger and the cache.
 */
export class NotFoundError extends ElectionEngineError {
  readonly kind = 'NotFound';
}

/**
 * An immutable cache row was written twice.
 */
export class CacheConflictError extends ElectionEngineError {
  readonly kind = 'CacheConflict';
}

/**
 * Required configuration is missing or invalid.
 */
export class ConfigurationError extends ElectionEngineError {
  readonly kind = 'Configuration';

  constructor(message: string) {
    super(message, 'configure');
  }
}
