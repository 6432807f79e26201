import type { LedgerSubmitOptions } from '../contracts/types';
import type { EffectivePhase, LedgerPhaseName } from './phase';

/**
 * Parameters for a new election
 */
export interface CreateElectionParams {
  name: string;
  description?: string;
  /** Whether tallies are visible before results are declared (defaults to true) */
  isLiveResults?: boolean;
  /** Soft deadline after which an ACTIVE election reads as EXPIRED */
  expiresAt?: Date | string | null;
}

export interface CreateElectionResult {
  electionId: number;
  txHash: string;
  blockNumber: number;
}

export interface PhaseChangeResult {
  electionId: number;
  phase: LedgerPhaseName;
  txHash: string;
  blockNumber: number;
}

/**
 * Ledger view of an election merged with the locally held flags
 */
export interface ElectionView {
  id: number;
  name: string;
  description: string;
  /** Effective phase, EXPIRED included */
  phase: EffectivePhase;
  ledgerPhase: LedgerPhaseName;
  candidateCount: number;
  totalVotes: number;
  createdAt: number;
  startedAt: number;
  endedAt: number;
  isLiveResults: boolean;
  expiresAt: Date | null;
}

export interface CandidateView {
  id: number;
  name: string;
  /** Zero while tallies are hidden */
  votes: number;
}

/**
 * Biometric capture as raw bytes or as base64 text (a data URL is accepted)
 */
export type SampleInput = Uint8Array | string;

export interface RegisterVoterParams {
  electionId: number;
  enrollment: string;
  name: string;
  sample: SampleInput;
}

export interface RegistrationResult {
  voterId: number;
  electionId: number;
  enrollmentHash: string;
  /** True when this registration created the voter record */
  newVoter: boolean;
  txHash: string;
  blockNumber: number;
}

export interface CastVoteParams {
  electionId: number;
  enrollment: string;
  candidateId: number;
  sample: SampleInput;
}

export type MutationOptions = LedgerSubmitOptions;
