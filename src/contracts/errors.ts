/**
 * @fileoverview Standardized error classes for ledger transactions
 *
 * Every failed mutation is normalized into one of these classes. The message is always the
 * extracted revert reason (or the generic sentinel), never a raw transport payload.
 */

import { ElectionEngineError } from '../core/errors';

/**
 * Abstract base class for errors that originate from a ledger interaction.
 */
export abstract class LedgerError extends ElectionEngineError {}

/**
 * The ledger reports a duplicate vote or registration.
 */
export class AlreadyActedError extends LedgerError {
  readonly kind = 'AlreadyActed';

  constructor(
    message: string,
    operation: string,
    public readonly reason: string
  ) {
    super(message, operation);
  }
}

/**
 * Any other revert.
 */
export class LedgerRejectedError extends LedgerError {
  readonly kind = 'LedgerRejected';

  constructor(
    public readonly reason: string,
    operation: string,
    options?: { cause?: unknown }
  ) {
    super(reason, operation, options);
  }
}

/**
 * The confirmation wait elapsed. The transaction may still be mined later,
 * so callers must not read this as "did not happen".
 */
export class ConfirmationTimeoutError extends LedgerError {
  readonly kind = 'ConfirmationTimeout';

  constructor(
    operation: string,
    public readonly txHash: string | null,
    public readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(
      `Transaction ${txHash ?? '(unknown hash)'} was not confirmed within ${timeoutMs}ms`,
      operation,
      options
    );
  }
}

/**
 * The transaction was mined, but the read that completes its result failed
 * (the new election id, the receipt id). The mutation is on the ledger and must not be resubmitted.
 */
export class ConfirmedResultUnreadableError extends LedgerError {
  readonly kind = 'ConfirmedUnread';

  constructor(
    operation: string,
    public readonly txHash: string,
    public readonly blockNumber: number,
    options?: { cause?: unknown }
  ) {
    super(
      `Transaction ${txHash} was confirmed in block ${blockNumber}, but its result could not be read`,
      operation,
      options
    );
  }
}

/**
 * The ledger node could not be reached.
 */
export class TransportUnavailableError extends LedgerError {
  readonly kind = 'TransportUnavailable';

  constructor(operation: string, options?: { cause?: unknown }) {
    super('Ledger node unreachable', operation, options);
  }
}
