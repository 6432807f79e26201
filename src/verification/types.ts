import type { LedgerReceipt } from '../contracts/types';
import type { ReceiptMatchConfidence, VoteReceipt } from '../store';

export type VerificationSource = 'ledger' | 'cache';

/**
 * Why a positive answer did not come from the ledger
 */
export type VerificationAnomaly = 'ledger-unreachable' | 'cache-ledger-mismatch';

export interface ReceiptVerification {
  receiptId: number;
  verified: boolean;
  /** Which side confirmed the receipt; null when nothing did */
  source: VerificationSource | null;
  detail: string;
  ledger: LedgerReceipt | null;
  cache: VoteReceipt | null;
  anomaly: VerificationAnomaly | null;
}

export interface ReceiptSearchResult {
  receipt: VoteReceipt;
  confidence: ReceiptMatchConfidence;
}

export type DivergenceKind = 'missing-on-ledger' | 'election-mismatch' | 'tag-mismatch';

export interface ReceiptDivergence {
  receiptId: number;
  kind: DivergenceKind;
  cache: VoteReceipt;
  ledger: LedgerReceipt | null;
}

export interface ReconciliationReport {
  checked: number;
  consistent: number;
  divergences: ReceiptDivergence[];
  /** Receipts the ledger could not be asked about */
  unreachable: number[];
}
