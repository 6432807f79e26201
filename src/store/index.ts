import type Database from 'better-sqlite3';
import { createElectionModel, type ElectionModel } from './models/elections';
import { createReceiptModel, type ReceiptModel } from './models/receipts';
import { createRegistrationModel, type RegistrationModel } from './models/registrations';
import { createVoterModel, type VoterModel } from './models/voters';

export * from './db';
export type { CachedElection, UpsertElectionInput } from './models/elections';
export type { VoteReceipt, NewVoteReceipt, ReceiptMatch, ReceiptMatchConfidence } from './models/receipts';
export type { VoterElectionRegistration, CreateRegistrationInput } from './models/registrations';
export type { Voter, VoterSummary, CreateVoterInput } from './models/voters';

/**
 * The derived, rebuildable projection of ledger state kept next to the engine.
 */
export interface LedgerCache {
  elections: ElectionModel;
  voters: VoterModel;
  registrations: RegistrationModel;
  receipts: ReceiptModel;
  /** Runs `fn` inside one SQLite transaction; a thrown error rolls every write back. */
  transaction<T>(fn: () => T): T;
}

export function createLedgerCache(db: Database.Database): LedgerCache {
  return {
    elections: createElectionModel(db),
    voters: createVoterModel(db),
    registrations: createRegistrationModel(db),
    receipts: createReceiptModel(db),
    transaction: <T>(fn: () => T): T => db.transaction(fn)(),
  };
}
