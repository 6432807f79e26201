import type { ElectionLedger, LedgerElection } from '../contracts/types';
import type { CachedElection, LedgerCache } from '../store';
import { logAnomaly, logger } from '../utils/logger';
import { PhaseResolver } from './PhaseResolver';
import { parseDeadline, requireId, requireText } from './validation';
import type {
  CandidateView,
  CreateElectionParams,
  CreateElectionResult,
  ElectionView,
  MutationOptions,
  PhaseChangeResult,
} from './types';
import type { LedgerPhaseName } from './phase';

/**
 * Election lifecycle: creation, candidates, phase transitions and the merged read views.
 */
export class ElectionService {
  constructor(
    private readonly ledger: ElectionLedger,
    private readonly cache: LedgerCache,
    private readonly phases: PhaseResolver
  ) {}

  /**
   * Creates the election on the ledger, then caches its local flags under the id the ledger assigned.
   */
  async createElection(params: CreateElectionParams, options: MutationOptions = {}): Promise<CreateElectionResult> {
    const name = requireText(params.name, 'Election name required', 'createElection');
    const description = params.description?.trim() ?? '';
    const expiresAt = parseDeadline(params.expiresAt, 'createElection');

    const created = await this.ledger.createElection(name, description, options);

    try {
      this.cache.elections.upsert({
        electionId: created.electionId,
        name,
        description,
        isLiveResults: params.isLiveResults ?? true,
        expiresAt,
      });
    } catch (err) {
      logAnomaly('election-not-cached', { electionId: created.electionId, txHash: created.txHash });
      throw err;
    }
    logger.info(`Election ${created.electionId} created`, { txHash: created.txHash });

    return created;
  }

  async addCandidate(electionId: number, name: string, options: MutationOptions = {}) {
    requireId(electionId, 'electionId', 'addCandidate');
    const candidate = requireText(name, 'Candidate name required', 'addCandidate');
    await this.phases.requireLedgerPhase(electionId, 'CREATED', 'addCandidate');
    return this.ledger.addCandidate(electionId, candidate, options);
  }

  startElection(electionId: number, options: MutationOptions = {}): Promise<PhaseChangeResult> {
    return this.transition(electionId, 'CREATED', 'ACTIVE', 'startElection', () =>
      this.ledger.startElection(electionId, options)
    );
  }

  endElection(electionId: number, options: MutationOptions = {}): Promise<PhaseChangeResult> {
    return this.transition(electionId, 'ACTIVE', 'ENDED', 'endElection', () =>
      this.ledger.endElection(electionId, options)
    );
  }

  declareResults(electionId: number, options: MutationOptions = {}): Promise<PhaseChangeResult> {
    return this.transition(electionId, 'ENDED', 'RESULT_DECLARED', 'declareResults', () =>
      this.ledger.declareResults(electionId, options)
    );
  }

  private async transition(
    electionId: number,
    from: LedgerPhaseName,
    to: LedgerPhaseName,
    operation: string,
    submit: () => Promise<{ txHash: string; blockNumber: number }>
  ): Promise<PhaseChangeResult> {
    requireId(electionId, 'electionId', operation);
    await this.phases.requireLedgerPhase(electionId, from, operation);
    const confirmed = await submit();
    this.phases.recordTransition(electionId, to);
    return { electionId, phase: to, txHash: confirmed.txHash, blockNumber: confirmed.blockNumber };
  }

  // ─── QUERIES ───────────────────────────────────────────────────────

  async listElections(): Promise<ElectionView[]> {
    const count = await this.ledger.getElectionCount();
    const ids = Array.from({ length: count }, (_, i) => i + 1);
    const elections = await Promise.all(ids.map((id) => this.ledger.getElection(id)));
    const cached = new Map(this.cache.elections.list().map((row) => [row.electionId, row]));
    return elections.map((election) => this.toView(election, cached.get(election.id) ?? null));
  }

  async getElection(electionId: number): Promise<ElectionView> {
    requireId(electionId, 'electionId', 'getElection');
    const election = await this.ledger.getElection(electionId);
    return this.toView(election, this.cache.elections.find(electionId));
  }

  async getLedgerPhase(electionId: number): Promise<LedgerPhaseName> {
    requireId(electionId, 'electionId', 'getLedgerPhase');
    return this.phases.getLedgerPhase(electionId);
  }

  /**
   * Candidates with live tallies, or with every tally zeroed while results are hidden.
   */
  async listCandidates(electionId: number): Promise<CandidateView[]> {
    requireId(electionId, 'electionId', 'listCandidates');
    const election = await this.ledger.getElection(electionId);
    const hidden = this.phases.hidesTallies(election.phase, this.cache.elections.find(electionId));

    const ids = Array.from({ length: election.candidateCount }, (_, i) => i + 1);
    const candidates = await Promise.all(ids.map((id) => this.ledger.getCandidate(electionId, id)));
    return candidates.map((c) => ({ id: c.id, name: c.name, votes: hidden ? 0 : c.votes }));
  }

  private toView(election: LedgerElection, cached: CachedElection | null): ElectionView {
    return {
      id: election.id,
      name: election.name,
      description: election.description,
      phase: this.phases.combine(election.phase, cached),
      ledgerPhase: election.phase,
      candidateCount: election.candidateCount,
      totalVotes: election.totalVotes,
      createdAt: election.createdAt,
      startedAt: election.startedAt,
      endedAt: election.endedAt,
      isLiveResults: cached?.isLiveResults ?? true,
      expiresAt: cached?.expiresAt ?? null,
    };
  }
}
