import { toSample, type BiometricSample, type BiometricVerifier } from '../biometric/types';
import { AlreadyActedError } from '../contracts/errors';
import { ALREADY_REGISTERED_MESSAGE } from '../contracts/revert';
import type { ElectionLedger } from '../contracts/types';
import type { LedgerCache, VoteReceipt, VoterSummary } from '../store';
import { logAnomaly, logger } from '../utils/logger';
import { enrollmentHash, visibleTag } from './enrollment';
import { BiometricMismatchError, NotFoundError } from './errors';
import { PhaseResolver } from './PhaseResolver';
import { requireId, requireText } from './validation';
import type { CastVoteParams, MutationOptions, RegisterVoterParams, RegistrationResult } from './types';

/**
 * Voter registration and vote casting.
 *
 * Nothing is written to the cache until the ledger has confirmed the matching transaction.
 */
export class VotingService {
  constructor(
    private readonly ledger: ElectionLedger,
    private readonly cache: LedgerCache,
    private readonly biometric: BiometricVerifier,
    private readonly phases: PhaseResolver
  ) {}

  /**
   * Registers a voter for one election. The voter record is created on first registration;
   * a returning voter must match the template stored then, which is never replaced.
   *
   * @throws AlreadyActedError when this voter is already registered for the election
   * @throws BiometricMismatchError when a returning voter's sample does not match
   */
  async registerVoter(params: RegisterVoterParams, options: MutationOptions = {}): Promise<RegistrationResult> {
    const operation = 'registerVoter';
    const electionId = requireId(params.electionId, 'electionId', operation);
    const enrollment = requireText(params.enrollment, 'Enrollment required', operation);
    const name = requireText(params.name, 'Voter name required', operation);
    const sample = toSample(params.sample);

    const existing = this.cache.voters.findByEnrollment(enrollment);
    if (existing && this.cache.registrations.find(existing.id, electionId)) {
      throw new AlreadyActedError(ALREADY_REGISTERED_MESSAGE, operation, 'already registered');
    }
    if (existing) {
      await this.requireMatch(existing.template, sample, operation);
    }

    const template = await this.biometric.encode(sample);
    const faceHash = this.biometric.digest(template);
    const hash = enrollmentHash(enrollment, electionId);

    const confirmed = await this.ledger.registerVoter(electionId, enrollment, faceHash, options);

    let registered: { voterId: number; newVoter: boolean };
    try {
      registered = this.cache.transaction(() => {
        // A concurrent first registration may have created the voter while this one was on the ledger
        const current = this.cache.voters.findByEnrollment(enrollment);
        const voter = current ?? this.cache.voters.create({ enrollment, name, template });
        this.cache.registrations.create({
          voterId: voter.id,
          electionId,
          enrollment,
          enrollmentHash: hash,
          faceHash,
          txHash: confirmed.txHash,
        });
        return { voterId: voter.id, newVoter: current === null };
      });
    } catch (err) {
      logAnomaly('registration-not-cached', { electionId, enrollmentHash: hash, txHash: confirmed.txHash });
      throw err;
    }
    logger.info(`Voter registered for election ${electionId}`, { enrollmentHash: hash });

    return {
      voterId: registered.voterId,
      electionId,
      enrollmentHash: hash,
      newVoter: registered.newVoter,
      txHash: confirmed.txHash,
      blockNumber: confirmed.blockNumber,
    };
  }

  /**
   * Casts one vote and records its receipt. The receipt holds the enrollment hash and
   * never the chosen candidate.
   *
   * @throws PhaseGateError unless the election is ACTIVE and not past its deadline
   * @throws NotFoundError when the enrollment has no voter record
   * @throws BiometricMismatchError when the sample does not match the stored template
   * @throws AlreadyActedError when the ledger reports a previous vote
   */
  async castVote(params: CastVoteParams, options: MutationOptions = {}): Promise<VoteReceipt> {
    const operation = 'vote';
    const electionId = requireId(params.electionId, 'electionId', operation);
    const enrollment = requireText(params.enrollment, 'Enrollment required', operation);
    const candidateId = requireId(params.candidateId, 'candidateId', operation);
    const sample = toSample(params.sample);

    await this.phases.requireVotingOpen(electionId, operation);

    const voter = this.cache.voters.findByEnrollment(enrollment);
    if (!voter) {
      throw new NotFoundError('Voter not found', operation);
    }
    await this.requireMatch(voter.template, sample, operation);

    const faceHash = this.biometric.digest(await this.biometric.encode(sample));
    const confirmed = await this.ledger.vote(electionId, enrollment, faceHash, candidateId, options);

    const hash = enrollmentHash(enrollment, electionId);
    try {
      const receipt = this.cache.transaction(() => {
        const receipt = this.cache.receipts.record({
          receiptId: confirmed.receiptId,
          electionId,
          enrollmentHash: hash,
          visibleTag: visibleTag(hash),
          txHash: confirmed.txHash,
          blockNumber: confirmed.blockNumber,
        });
        if (!this.cache.registrations.markVoted(voter.id, electionId)) {
          logger.debug(`No cached registration to mark for election ${electionId}`, { enrollmentHash: hash });
        }
        return receipt;
      });
      logger.info(`Vote receipt ${receipt.receiptId} issued for election ${electionId}`);
      return receipt;
    } catch (err) {
      // The vote is on the ledger at this point; only the local trace is missing
      logAnomaly('receipt-not-cached', { receiptId: confirmed.receiptId, electionId, txHash: confirmed.txHash });
      throw err;
    }
  }

  listVoters(): VoterSummary[] {
    return this.cache.voters.list();
  }

  private async requireMatch(template: Uint8Array, sample: BiometricSample, operation: string): Promise<void> {
    if (!(await this.biometric.matches(template, sample))) {
      throw new BiometricMismatchError(operation);
    }
  }
}
