import type Database from 'better-sqlite3';
import { CacheConflictError } from '../../core/errors';

/**
 * Proof that a vote was cast, and when. It carries no candidate field;
 * nothing here or in the table says who the vote was for.
 */
export interface VoteReceipt {
  receiptId: number;
  electionId: number;
  enrollmentHash: string;
  visibleTag: string;
  txHash: string;
  blockNumber: number;
  issuedAt: string;
}

export type NewVoteReceipt = Omit<VoteReceipt, 'issuedAt'> & { issuedAt?: string };

/**
 * `exact` matched enrollment hash and election id; `hash-only` matched the hash alone
 * and should be treated as lower confidence.
 */
export type ReceiptMatchConfidence = 'exact' | 'hash-only';

export interface ReceiptMatch {
  receipt: VoteReceipt;
  confidence: ReceiptMatchConfidence;
}

interface ReceiptRow {
  receipt_id: number;
  election_id: number;
  enrollment_hash: string;
  visible_tag: string;
  tx_hash: string;
  block_number: number;
  issued_at: string;
}

const COLUMNS = 'receipt_id, election_id, enrollment_hash, visible_tag, tx_hash, block_number, issued_at';

function toReceipt(row: ReceiptRow): VoteReceipt {
  return {
    receiptId: row.receipt_id,
    electionId: row.election_id,
    enrollmentHash: row.enrollment_hash,
    visibleTag: row.visible_tag,
    txHash: row.tx_hash,
    blockNumber: row.block_number,
    issuedAt: row.issued_at,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

export type ReceiptModel = ReturnType<typeof createReceiptModel>;

/**
 * Write-once receipt store. Rows are inserted once and never updated or deleted
 * (the table has triggers rejecting both).
 */
export function createReceiptModel(db: Database.Database) {
  const insert = db.prepare(`
    INSERT INTO vote_receipts (${COLUMNS})
    VALUES (@receipt_id, @election_id, @enrollment_hash, @visible_tag, @tx_hash, @block_number, @issued_at)
  `);
  const byId = db.prepare<[number], ReceiptRow>(`SELECT ${COLUMNS} FROM vote_receipts WHERE receipt_id = ?`);
  const byHashAndElection = db.prepare<[string, number], ReceiptRow>(
    `SELECT ${COLUMNS} FROM vote_receipts WHERE enrollment_hash = ? AND election_id = ? ORDER BY receipt_id LIMIT 1`
  );
  const byHash = db.prepare<[string], ReceiptRow>(
    `SELECT ${COLUMNS} FROM vote_receipts WHERE enrollment_hash = ? ORDER BY receipt_id LIMIT 1`
  );
  const all = db.prepare<[], ReceiptRow>(`SELECT ${COLUMNS} FROM vote_receipts ORDER BY receipt_id`);
  const count = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM vote_receipts');

  return {
    /**
     * @throws CacheConflictError when a receipt with the same id already exists
     */
    record(receipt: NewVoteReceipt): VoteReceipt {
      const row: ReceiptRow = {
        receipt_id: receipt.receiptId,
        election_id: receipt.electionId,
        enrollment_hash: receipt.enrollmentHash,
        visible_tag: receipt.visibleTag,
        tx_hash: receipt.txHash,
        block_number: receipt.blockNumber,
        issued_at: receipt.issuedAt ?? new Date().toISOString(),
      };
      try {
        insert.run(row);
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new CacheConflictError(`Receipt ${receipt.receiptId} is already recorded`, 'recordReceipt');
        }
        throw err;
      }
      return toReceipt(row);
    },

    lookupById(receiptId: number): VoteReceipt | null {
      const row = byId.get(receiptId);
      return row ? toReceipt(row) : null;
    },

    /**
     * Restricts by enrollment hash and election first; falls back to the hash alone to
     * tolerate election-id drift between the ledger and the cache.
     */
    lookupByEnrollmentHash(enrollmentHash: string, electionId: number): ReceiptMatch | null {
      const exact = byHashAndElection.get(enrollmentHash, electionId);
      if (exact) return { receipt: toReceipt(exact), confidence: 'exact' };

      const loose = byHash.get(enrollmentHash);
      if (loose) return { receipt: toReceipt(loose), confidence: 'hash-only' };

      return null;
    },

    list(): VoteReceipt[] {
      return all.all().map(toReceipt);
    },

    count(): number {
      return count.get()?.count ?? 0;
    },
  };
}
