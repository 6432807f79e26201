import { PhaseGateError } from '../../../src/core/errors';
import { createTestEngine, seedElection } from '../../helpers/engine';

describe('PhaseResolver', () => {
  const NOW = new Date('2026-03-01T12:00:00Z');

  it('should report EXPIRED for an active election past its deadline', async () => {
    const { engine } = createTestEngine({ now: () => NOW });
    const electionId = await seedElection(engine, { start: true, expiresAt: new Date('2026-03-01T11:00:00Z') });

    expect(await engine.phases.effectivePhase(electionId)).toBe('EXPIRED');
    expect(await engine.phases.getLedgerPhase(electionId)).toBe('ACTIVE');
  });

  it('should keep ACTIVE while the deadline is in the future', async () => {
    const { engine } = createTestEngine({ now: () => NOW });
    const electionId = await seedElection(engine, { start: true, expiresAt: new Date('2026-03-02T00:00:00Z') });

    expect(await engine.phases.effectivePhase(electionId)).toBe('ACTIVE');
  });

  it('should refuse voting once the election has expired', async () => {
    const { engine } = createTestEngine({ now: () => NOW });
    const electionId = await seedElection(engine, { start: true, expiresAt: new Date('2026-03-01T11:00:00Z') });

    await expect(engine.phases.requireVotingOpen(electionId, 'castVote')).rejects.toThrow(
      'Voting not allowed. Election phase: EXPIRED'
    );
  });

  it('should fail closed when the ledger cannot be read', async () => {
    const { engine, ledger } = createTestEngine();
    const electionId = await seedElection(engine, { start: true });
    ledger.unreachable = true;

    const error = await engine.phases.requireVotingOpen(electionId, 'castVote').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PhaseGateError);
    if (error instanceof PhaseGateError) {
      expect(error.message).toBe('Election phase could not be resolved');
      expect(error.phase).toBeNull();
      expect(error.electionId).toBe(electionId);
    }
  });

  it('should gate administrative operations on the raw ledger phase', async () => {
    const { engine } = createTestEngine();
    const electionId = await seedElection(engine);

    await expect(engine.phases.requireLedgerPhase(electionId, 'ENDED', 'declareResults')).rejects.toThrow(
      `declareResults requires election phase ENDED, but election ${electionId} is CREATED`
    );
    await expect(engine.phases.requireLedgerPhase(electionId, 'CREATED', 'addCandidate')).resolves.toBeUndefined();
  });

  it('should hide tallies only while live results are off and results are undeclared', () => {
    const { engine } = createTestEngine();
    const cached = engine.cache.elections.upsert({
      electionId: 9,
      name: 'Hidden',
      description: '',
      isLiveResults: false,
      expiresAt: null,
    });

    expect(engine.phases.hidesTallies('ENDED', cached)).toBe(true);
    expect(engine.phases.hidesTallies('RESULT_DECLARED', cached)).toBe(false);
    expect(engine.phases.hidesTallies('ACTIVE', null)).toBe(false);
  });

  it('should not move the cached phase backwards', async () => {
    const { engine } = createTestEngine();
    const electionId = await seedElection(engine, { start: true });

    engine.phases.recordTransition(electionId, 'CREATED');

    expect(engine.cache.elections.find(electionId)?.phase).toBe('ACTIVE');
  });
});
