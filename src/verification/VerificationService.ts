import { TransportUnavailableError } from '../contracts/errors';
import type { ElectionLedger, LedgerReceipt } from '../contracts/types';
import { enrollmentHash } from '../core/enrollment';
import { NotFoundError } from '../core/errors';
import { requireId, requireText } from '../core/validation';
import type { LedgerCache, VoteReceipt } from '../store';
import { logAnomaly, logError, logger } from '../utils/logger';
import type {
  ReceiptDivergence,
  ReceiptSearchResult,
  ReceiptVerification,
  ReconciliationReport,
} from './types';

/**
 * Answers "did my vote count?" from the ledger, falling back to the local cache when the
 * ledger cannot confirm. Never writes to either side.
 */
export class VerificationService {
  constructor(
    private readonly ledger: ElectionLedger,
    private readonly cache: LedgerCache
  ) {}

  /**
   * @throws TransportUnavailableError when the ledger is unreachable and nothing is cached
   */
  async verify(receiptId: number): Promise<ReceiptVerification> {
    requireId(receiptId, 'receiptId', 'verifyReceipt');
    const cached = this.readCached(receiptId);

    let onLedger: LedgerReceipt;
    try {
      onLedger = await this.ledger.getVoteReceipt(receiptId);
    } catch (err) {
      if (!cached) {
        throw err instanceof TransportUnavailableError
          ? err
          : new TransportUnavailableError('verifyReceipt', { cause: err });
      }
      logger.warn(`Ledger unreachable while verifying receipt ${receiptId}, answering from cache`);
      return {
        receiptId,
        verified: true,
        source: 'cache',
        detail: 'Vote verified from local cache (ledger unavailable)',
        ledger: null,
        cache: cached,
        anomaly: 'ledger-unreachable',
      };
    }

    if (!onLedger.exists) {
      if (!cached) {
        return {
          receiptId,
          verified: false,
          source: null,
          detail: 'Receipt not found',
          ledger: onLedger,
          cache: null,
          anomaly: null,
        };
      }
      logAnomaly('cache-ledger-mismatch', { receiptId, electionId: cached.electionId, txHash: cached.txHash });
      return {
        receiptId,
        verified: true,
        source: 'cache',
        detail: 'Vote record found in local cache only',
        ledger: onLedger,
        cache: cached,
        anomaly: 'cache-ledger-mismatch',
      };
    }

    return {
      receiptId,
      verified: true,
      source: 'ledger',
      detail: 'Vote exists on the ledger and is immutable',
      ledger: onLedger,
      cache: cached,
      anomaly: null,
    };
  }

  /**
   * Cached receipt by id.
   */
  getReceipt(receiptId: number): VoteReceipt {
    requireId(receiptId, 'receiptId', 'getReceipt');
    const receipt = this.cache.receipts.lookupById(receiptId);
    if (!receipt) {
      throw new NotFoundError('Receipt not found', 'getReceipt');
    }
    return receipt;
  }

  /**
   * Finds a voter's receipt from their enrollment, without the enrollment ever being stored.
   */
  searchReceipt(enrollment: string, electionId: number): ReceiptSearchResult {
    const id = requireText(enrollment, 'Enrollment and election id required', 'searchReceipt');
    requireId(electionId, 'electionId', 'searchReceipt');

    const match = this.cache.receipts.lookupByEnrollmentHash(enrollmentHash(id, electionId), electionId);
    if (!match) {
      throw new NotFoundError(
        `No vote found for enrollment '${id}' in this election. Either you haven't voted yet, or wrong election selected.`,
        'searchReceipt'
      );
    }
    return match;
  }

  /**
   * Checks every cached receipt against the ledger and reports divergences. Reads only.
   */
  async reconcile(): Promise<ReconciliationReport> {
    const receipts = this.cache.receipts.list();
    const report: ReconciliationReport = { checked: receipts.length, consistent: 0, divergences: [], unreachable: [] };

    const results = await Promise.allSettled(receipts.map((r) => this.ledger.getVoteReceipt(r.receiptId)));
    results.forEach((result, i) => {
      const cached = receipts[i];
      if (result.status === 'rejected') {
        report.unreachable.push(cached.receiptId);
        return;
      }
      const divergence = compareReceipt(cached, result.value);
      if (divergence) {
        report.divergences.push(divergence);
        logAnomaly(divergence.kind, { receiptId: cached.receiptId, electionId: cached.electionId });
      } else {
        report.consistent++;
      }
    });

    logger.info(
      `Reconciled ${report.checked} receipts: ${report.consistent} consistent, ` +
        `${report.divergences.length} divergent, ${report.unreachable.length} unchecked`
    );
    return report;
  }

  private readCached(receiptId: number): VoteReceipt | null {
    try {
      return this.cache.receipts.lookupById(receiptId);
    } catch (err) {
      logError(err instanceof Error ? err : new Error(String(err)), { operation: 'verifyReceipt', receiptId });
      return null;
    }
  }
}

/**
 * Compares one cached receipt with the ledger's record of it.
 */
export function compareReceipt(cached: VoteReceipt, onLedger: LedgerReceipt): ReceiptDivergence | null {
  if (!onLedger.exists) {
    return { receiptId: cached.receiptId, kind: 'missing-on-ledger', cache: cached, ledger: onLedger };
  }
  if (onLedger.electionId !== cached.electionId) {
    return { receiptId: cached.receiptId, kind: 'election-mismatch', cache: cached, ledger: onLedger };
  }
  if (onLedger.visibleTag !== cached.visibleTag) {
    return { receiptId: cached.receiptId, kind: 'tag-mismatch', cache: cached, ledger: onLedger };
  }
  return null;
}
