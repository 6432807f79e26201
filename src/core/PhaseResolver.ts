import { PhaseGateError } from './errors';
import { resolveEffectivePhase, type EffectivePhase, type LedgerPhaseName } from './phase';
import type { ElectionLedger } from '../contracts/types';
import type { CachedElection, LedgerCache } from '../store';
import { logAnomaly } from '../utils/logger';

/**
 * Combines the ledger phase with the cached soft deadline, and gates operations on the result.
 *
 * The ledger is always read first. When it cannot be read the phase is unresolvable and every
 * gate fails closed.
 */
export class PhaseResolver {
  constructor(
    private readonly ledger: ElectionLedger,
    private readonly cache: LedgerCache,
    private readonly now: () => Date = () => new Date()
  ) {}

  getLedgerPhase(electionId: number): Promise<LedgerPhaseName> {
    return this.ledger.getElectionPhase(electionId);
  }

  async effectivePhase(electionId: number): Promise<EffectivePhase> {
    const ledgerPhase = await this.ledger.getElectionPhase(electionId);
    return this.combine(ledgerPhase, this.cache.elections.find(electionId));
  }

  /**
   * Derives the effective phase from an already-read ledger phase and the cache row.
   */
  combine(ledgerPhase: LedgerPhaseName, cached: CachedElection | null): EffectivePhase {
    return resolveEffectivePhase(ledgerPhase, cached?.expiresAt ?? null, this.now());
  }

  /**
   * Tallies are hidden while live results are off and results are not declared yet.
   * Without a cache row live results default to on.
   */
  hidesTallies(ledgerPhase: LedgerPhaseName, cached: CachedElection | null): boolean {
    const isLiveResults = cached?.isLiveResults ?? true;
    return !isLiveResults && ledgerPhase !== 'RESULT_DECLARED';
  }

  /**
   * @throws PhaseGateError unless the effective phase is ACTIVE
   */
  async requireVotingOpen(electionId: number, operation: string): Promise<void> {
    const phase = await this.resolveOrFail(electionId, operation, () => this.effectivePhase(electionId));
    if (phase !== 'ACTIVE') {
      throw new PhaseGateError(`Voting not allowed. Election phase: ${phase}`, operation, electionId, phase);
    }
  }

  /**
   * Administrative gate on the raw ledger phase. An expired election still reads ACTIVE here,
   * so it can be ended.
   *
   * @throws PhaseGateError when the ledger phase is not `expected`
   */
  async requireLedgerPhase(electionId: number, expected: LedgerPhaseName, operation: string): Promise<void> {
    const phase = await this.resolveOrFail(electionId, operation, () => this.getLedgerPhase(electionId));
    if (phase !== expected) {
      throw new PhaseGateError(
        `${operation} requires election phase ${expected}, but election ${electionId} is ${phase}`,
        operation,
        electionId,
        phase
      );
    }
  }

  /**
   * Mirrors a confirmed transition into the cache. A refused move is reported, not thrown:
   * the ledger already holds the new phase.
   */
  recordTransition(electionId: number, phase: LedgerPhaseName): void {
    if (!this.cache.elections.advancePhase(electionId, phase, this.now())) {
      logAnomaly('phase-not-mirrored', { electionId, phase });
    }
  }

  private async resolveOrFail<T>(electionId: number, operation: string, resolve: () => Promise<T>): Promise<T> {
    try {
      return await resolve();
    } catch (err) {
      throw new PhaseGateError('Election phase could not be resolved', operation, electionId, null, { cause: err });
    }
  }
}
