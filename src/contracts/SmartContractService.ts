import type { Log, Signer } from 'ethers';
import { ConfirmedResultUnreadableError, LedgerError, LedgerRejectedError } from './errors';
import { GENERIC_LEDGER_ERROR, normalizeLedgerError } from './revert';
import { SerialTaskQueue } from './SerialTaskQueue';
import { logger } from '../utils/logger';

/** Default time to wait for a transaction to be mined. */
export const DEFAULT_CONFIRMATION_TIMEOUT_MS = 60_000;

/**
 * Enum representing the possible states of a transaction during its lifecycle.
 * Used to track and report transaction status in the event stream.
 */
export enum TxStatus {
  /** Transaction has been broadcast and is waiting to be mined */
  Pending = 'pending',
  /** Transaction has been mined, executed and post-processed */
  Completed = 'completed',
  /** Transaction was mined but reverted during execution */
  Reverted = 'reverted',
  /** Transaction failed before, during or after submission */
  Failed = 'failed',
}

/**
 * Union type representing the different events that can occur during a transaction's lifecycle.
 *
 * @template T - The type of the successful response data
 */
export type TxStatusEvent<T> =
  | { status: TxStatus.Pending; hash: string }
  | { status: TxStatus.Completed; response: T }
  | { status: TxStatus.Reverted; reason?: string }
  | { status: TxStatus.Failed; error: LedgerError };

/** Nonce and gas settings applied to a broadcast call. */
export interface TxOverrides {
  nonce: number;
  gasLimit: bigint;
}

/** The parts of a mined receipt the services read. */
export interface MinedReceipt {
  hash: string;
  blockNumber: number;
  status: number | null;
  logs: readonly Log[];
}

/** A broadcast transaction that can be waited on. */
export interface SentTx {
  hash: string;
  wait(confirms?: number, timeout?: number): Promise<MinedReceipt | null>;
}

/**
 * Everything needed to run one mutating call.
 *
 * @template T - Result read after confirmation (e.g. the new election id)
 */
export interface TxRequest<T> {
  /** Ledger method name, used for error context and logging */
  operation: string;
  gasLimit: bigint;
  /** Static call run before broadcasting, so reverts surface with their reason */
  simulate?: () => Promise<unknown>;
  /** Builds, signs and broadcasts the call with the given overrides */
  send: (overrides: TxOverrides) => Promise<SentTx>;
  /** Extracts the result from the confirmed receipt */
  handleReceipt: (receipt: MinedReceipt) => Promise<T>;
}

/** A mined, successful transaction with its post-processed result. */
export interface ConfirmedTx<T> {
  txHash: string;
  blockNumber: number;
  receipt: MinedReceipt;
  result: T;
}

export interface SmartContractServiceOptions {
  /** Confirmation wait in milliseconds (defaults to 60s) */
  confirmationTimeoutMs?: number;
}

/**
 * Abstract base class providing transaction handling for ledger mutations.
 *
 * All mutations issued through one instance share a single-writer queue: the nonce read,
 * the broadcast and the confirmation wait of one transaction complete before the next
 * transaction reads its nonce. Read calls do not go through the queue.
 */
export abstract class SmartContractService {
  private readonly writer = new SerialTaskQueue();
  protected readonly confirmationTimeoutMs: number;

  protected constructor(
    protected readonly signer: Signer,
    options: SmartContractServiceOptions = {}
  ) {
    this.confirmationTimeoutMs = options.confirmationTimeoutMs ?? DEFAULT_CONFIRMATION_TIMEOUT_MS;
  }

  /**
   * Sends a transaction and yields status events during its lifecycle.
   * This method handles the complete transaction flow from simulation to confirmation,
   * normalizing every failure into a {@link LedgerError}.
   *
   * @example
   * ```typescript
   * for await (const event of this.sendTx(request, 60_000)) {
   *   switch (event.status) {
   *     case TxStatus.Pending:
   *       console.log(`Transaction pending: ${event.hash}`);
   *       break;
   *     case TxStatus.Completed:
   *       console.log(`Transaction completed:`, event.response);
   *       break;
   *   }
   * }
   * ```
   */
  protected async *sendTx<T>(
    request: TxRequest<T>,
    timeoutMs: number
  ): AsyncGenerator<TxStatusEvent<ConfirmedTx<T>>, void, unknown> {
    let txHash: string | null = null;
    try {
      if (request.simulate) {
        await request.simulate();
      }

      const nonce = await this.signer.getNonce('pending');
      const tx = await request.send({ nonce, gasLimit: request.gasLimit });
      txHash = tx.hash;
      logger.debug(`${request.operation}: broadcast ${tx.hash} with nonce ${nonce}`);
      yield { status: TxStatus.Pending, hash: tx.hash };

      const receipt = await tx.wait(1, timeoutMs);

      if (!receipt) {
        yield { status: TxStatus.Reverted, reason: 'Transaction was dropped or not mined.' };
      } else if (receipt.status === 0) {
        yield { status: TxStatus.Reverted, reason: 'Transaction reverted.' };
      } else {
        let result: T;
        try {
          result = await request.handleReceipt(receipt);
        } catch (err) {
          yield {
            status: TxStatus.Failed,
            error: new ConfirmedResultUnreadableError(request.operation, receipt.hash, receipt.blockNumber, {
              cause: err,
            }),
          };
          return;
        }
        yield {
          status: TxStatus.Completed,
          response: { txHash: receipt.hash, blockNumber: receipt.blockNumber, receipt, result },
        };
      }
    } catch (err) {
      yield {
        status: TxStatus.Failed,
        error: normalizeLedgerError(err, request.operation, { txHash, timeoutMs }),
      };
    }
  }

  /**
   * Executes a transaction stream and returns the result or throws an error.
   *
   * @throws LedgerError if the transaction fails or reverts
   */
  static async executeTx<T>(
    stream: AsyncGenerator<TxStatusEvent<T>>,
    operation = 'transaction'
  ): Promise<T> {
    for await (const event of stream) {
      switch (event.status) {
        case TxStatus.Completed:
          return event.response;
        case TxStatus.Failed:
          throw event.error;
        case TxStatus.Reverted:
          throw new LedgerRejectedError(event.reason || GENERIC_LEDGER_ERROR, operation);
      }
    }
    throw new LedgerRejectedError('Transaction stream ended unexpectedly', operation);
  }

  /**
   * Runs a mutation through the single-writer queue and waits for its confirmation.
   * Never retried: resubmitting a state-changing call is left to the caller.
   */
  protected submitTx<T>(request: TxRequest<T>, timeoutMs = this.confirmationTimeoutMs): Promise<ConfirmedTx<T>> {
    return this.writer.run(async () => {
      try {
        return await SmartContractService.executeTx(this.sendTx(request, timeoutMs), request.operation);
      } catch (err) {
        logger.warn(`${request.operation} failed: ${err instanceof Error ? err.message : String(err)}`);
        throw err;
      }
    });
  }

  /** Number of mutations queued or in flight. */
  get pendingTransactions(): number {
    return this.writer.size;
  }
}
