/**
 * @fileoverview Types for the election ledger contract surface
 *
 * The ledger contract is external: these types describe what this engine reads from it and
 * the mutations it submits. Timestamps are unix seconds as stored on chain.
 */

import type { LedgerPhaseName } from '../core/phase';

export interface LedgerElection {
  id: number;
  name: string;
  description: string;
  phase: LedgerPhaseName;
  candidateCount: number;
  totalVotes: number;
  createdAt: number;
  startedAt: number;
  endedAt: number;
}

export interface LedgerCandidate {
  id: number;
  name: string;
  votes: number;
}

export interface LedgerReceipt {
  receiptId: number;
  electionId: number;
  /** Decoded from the contract's bytes32 field */
  visibleTag: string;
  timestamp: number;
  exists: boolean;
}

// ─── MUTATIONS ─────────────────────────────────────────────────────────────

/**
 * Descriptor of a mutating ledger call and its typed arguments.
 */
export type LedgerOperation =
  | { kind: 'createElection'; name: string; description: string }
  | { kind: 'addCandidate'; electionId: number; name: string }
  | { kind: 'startElection'; electionId: number }
  | { kind: 'endElection'; electionId: number }
  | { kind: 'declareResults'; electionId: number }
  | { kind: 'registerVoter'; electionId: number; enrollment: string; faceHash: string }
  | { kind: 'vote'; electionId: number; enrollment: string; faceHash: string; candidateId: number };

export type LedgerOperationKind = LedgerOperation['kind'];

export interface LedgerSubmitOptions {
  /** Gas limit override; defaults depend on the operation */
  gasLimit?: bigint | number;
  /** Confirmation wait override in milliseconds */
  timeoutMs?: number;
}

export interface LedgerTxResult {
  txHash: string;
  blockNumber: number;
}

export interface ElectionCreatedResult extends LedgerTxResult {
  electionId: number;
}

export interface VoteTxResult extends LedgerTxResult {
  receiptId: number;
}

/**
 * Everything the engine needs from the ledger. Implemented over JSON-RPC by
 * {@link ElectionLedgerService}; tests provide an in-process fake.
 *
 * Reads may run concurrently. Mutations resolve only once confirmed and reject with a
 * `LedgerError` otherwise.
 */
export interface ElectionLedger {
  getElectionCount(): Promise<number>;
  getElection(electionId: number): Promise<LedgerElection>;
  getCandidate(electionId: number, candidateId: number): Promise<LedgerCandidate>;
  getElectionPhase(electionId: number): Promise<LedgerPhaseName>;
  getVoteReceipt(receiptId: number): Promise<LedgerReceipt>;
  getGlobalReceiptCounter(): Promise<number>;

  createElection(name: string, description: string, options?: LedgerSubmitOptions): Promise<ElectionCreatedResult>;
  addCandidate(electionId: number, name: string, options?: LedgerSubmitOptions): Promise<LedgerTxResult>;
  startElection(electionId: number, options?: LedgerSubmitOptions): Promise<LedgerTxResult>;
  endElection(electionId: number, options?: LedgerSubmitOptions): Promise<LedgerTxResult>;
  declareResults(electionId: number, options?: LedgerSubmitOptions): Promise<LedgerTxResult>;
  registerVoter(
    electionId: number,
    enrollment: string,
    faceHash: string,
    options?: LedgerSubmitOptions
  ): Promise<LedgerTxResult>;
  vote(
    electionId: number,
    enrollment: string,
    faceHash: string,
    candidateId: number,
    options?: LedgerSubmitOptions
  ): Promise<VoteTxResult>;

  getBlockNumber(): Promise<number>;
  getChainId(): Promise<string>;
  hasContractCode(): Promise<boolean>;
}
