import { PhaseGateError, ValidationError } from '../../../src/core/errors';
import type { ElectionEngine } from '../../../src/ElectionEngine';
import { logger } from '../../../src/utils/logger';
import type { FakeLedger } from '../../helpers/FakeLedger';
import { SAMPLE, createTestEngine, seedElection } from '../../helpers/engine';

describe('ElectionService', () => {
  let engine: ElectionEngine;
  let ledger: FakeLedger;

  beforeEach(() => {
    ({ engine, ledger } = createTestEngine());
  });

  afterEach(() => {
    jest.restoreAllMocks();
    engine.close();
  });

  describe('createElection', () => {
    it('should flag an election confirmed on the ledger that could not be cached', async () => {
      const warn = jest.spyOn(logger, 'warn');
      jest.spyOn(engine.cache.elections, 'upsert').mockImplementation(() => {
        throw new Error('disk I/O error');
      });

      await expect(engine.elections.createElection({ name: 'Board' })).rejects.toThrow('disk I/O error');
      expect(ledger.mutations).toEqual(['createElection']);
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({
          type: 'ANOMALY',
          anomaly: 'election-not-cached',
          electionId: 1,
          txHash: '0x' + (101).toString(16).padStart(64, '0'),
        })
      );
    });

    it('should create on the ledger and cache the local flags under the ledger id', async () => {
      const created = await engine.elections.createElection({
        name: '  Board  ',
        description: ' Annual vote ',
        isLiveResults: false,
        expiresAt: '2026-05-01T10:30',
      });

      expect(created).toEqual({
        electionId: 1,
        txHash: '0x' + (101).toString(16).padStart(64, '0'),
        blockNumber: 101,
      });
      expect(engine.cache.elections.find(1)).toMatchObject({
        electionId: 1,
        name: 'Board',
        description: 'Annual vote',
        phase: 'CREATED',
        isLiveResults: false,
        expiresAt: new Date('2026-05-01T10:30:00Z'),
      });
    });

    it('should default to live results and no deadline', async () => {
      await engine.elections.createElection({ name: 'Board' });

      expect(engine.cache.elections.find(1)).toMatchObject({ isLiveResults: true, expiresAt: null });
    });

    it('should assign increasing ids', async () => {
      const ids: number[] = [];
      for (const name of ['One', 'Two', 'Three']) {
        ids.push((await engine.elections.createElection({ name })).electionId);
      }
      expect(ids).toEqual([1, 2, 3]);
    });

    it('should reject a missing name before reaching the ledger', async () => {
      await expect(engine.elections.createElection({ name: '   ' })).rejects.toThrow(
        new ValidationError('Election name required', 'createElection')
      );
      expect(ledger.mutations).toEqual([]);
    });

    it('should reject an unparseable deadline', async () => {
      await expect(engine.elections.createElection({ name: 'Board', expiresAt: 'next week' })).rejects.toThrow(
        "Invalid expiry date 'next week'"
      );
      expect(ledger.mutations).toEqual([]);
    });
  });

  describe('phase transitions', () => {
    it('should walk the full lifecycle and mirror each phase in the cache', async () => {
      const id = await seedElection(engine);

      await expect(engine.elections.startElection(id)).resolves.toMatchObject({ electionId: id, phase: 'ACTIVE' });
      expect(engine.cache.elections.find(id)?.phase).toBe('ACTIVE');
      expect(engine.cache.elections.find(id)?.startedAt).toBeInstanceOf(Date);

      await engine.elections.endElection(id);
      expect(engine.cache.elections.find(id)?.phase).toBe('ENDED');
      expect(engine.cache.elections.find(id)?.endedAt).toBeInstanceOf(Date);

      await engine.elections.declareResults(id);
      expect(engine.cache.elections.find(id)?.phase).toBe('RESULT_DECLARED');
      await expect(engine.elections.getLedgerPhase(id)).resolves.toBe('RESULT_DECLARED');
    });

    it('should refuse to add candidates once the election has started', async () => {
      const id = await seedElection(engine, { start: true });

      const attempt = engine.elections.addCandidate(id, 'Carol');

      await expect(attempt).rejects.toBeInstanceOf(PhaseGateError);
      await expect(attempt).rejects.toThrow('addCandidate requires election phase CREATED, but election 1 is ACTIVE');
      expect(ledger.mutations.filter((m) => m === 'addCandidate')).toHaveLength(2);
    });

    it('should refuse to declare results before the election ends', async () => {
      const id = await seedElection(engine, { start: true });

      await expect(engine.elections.declareResults(id)).rejects.toMatchObject({
        kind: 'PhaseGate',
        phase: 'ACTIVE',
        operation: 'declareResults',
      });
      expect(ledger.mutations).not.toContain('declareResults');
    });

    it('should allow ending an election that is past its deadline', async () => {
      const id = await seedElection(engine, { start: true, expiresAt: new Date('2020-01-01T00:00:00Z') });
      expect((await engine.elections.getElection(id)).phase).toBe('EXPIRED');

      await engine.elections.endElection(id);

      expect(await engine.elections.getLedgerPhase(id)).toBe('ENDED');
    });

    it('should fail closed when the ledger phase cannot be read', async () => {
      const id = await seedElection(engine);
      ledger.unreachable = true;

      await expect(engine.elections.startElection(id)).rejects.toMatchObject({
        kind: 'PhaseGate',
        phase: null,
        message: 'Election phase could not be resolved',
      });
      ledger.unreachable = false;
      expect(await engine.elections.getLedgerPhase(id)).toBe('CREATED');
    });

    it('should still succeed when the cache has no row to mirror into', async () => {
      const { electionId } = await ledger.createElection('Made elsewhere', '');
      await ledger.addCandidate(electionId, 'Alice');

      await expect(engine.elections.startElection(electionId)).resolves.toMatchObject({ phase: 'ACTIVE' });
      expect(engine.cache.elections.find(electionId)).toBeNull();
    });
  });

  describe('queries', () => {
    it('should merge ledger data with the cached flags', async () => {
      await seedElection(engine, { name: 'First' });
      await seedElection(engine, { name: 'Second', start: true, isLiveResults: false });

      const elections = await engine.elections.listElections();

      expect(elections.map((e) => [e.id, e.name, e.phase, e.isLiveResults, e.candidateCount])).toEqual([
        [1, 'First', 'CREATED', true, 2],
        [2, 'Second', 'ACTIVE', false, 2],
      ]);
    });

    it('should report elections missing from the cache with live results and no deadline', async () => {
      await ledger.createElection('Made elsewhere', '');

      await expect(engine.elections.getElection(1)).resolves.toMatchObject({
        name: 'Made elsewhere',
        phase: 'CREATED',
        isLiveResults: true,
        expiresAt: null,
      });
    });

    it('should show live tallies when live results are on', async () => {
      const id = await seedElection(engine, { start: true });
      await engine.voting.registerVoter({ electionId: id, enrollment: 'E100', name: 'Ann', sample: SAMPLE });
      await engine.voting.castVote({ electionId: id, enrollment: 'E100', candidateId: 2, sample: SAMPLE });

      await expect(engine.elections.listCandidates(id)).resolves.toEqual([
        { id: 1, name: 'Alice', votes: 0 },
        { id: 2, name: 'Bob', votes: 1 },
      ]);
    });

    it('should zero every tally until results are declared when live results are off', async () => {
      const id = await seedElection(engine, { start: true, isLiveResults: false });
      await engine.voting.registerVoter({ electionId: id, enrollment: 'E100', name: 'Ann', sample: SAMPLE });
      await engine.voting.castVote({ electionId: id, enrollment: 'E100', candidateId: 2, sample: SAMPLE });

      const hidden = [
        { id: 1, name: 'Alice', votes: 0 },
        { id: 2, name: 'Bob', votes: 0 },
      ];
      expect(await engine.elections.listCandidates(id)).toEqual(hidden);

      await engine.elections.endElection(id);
      expect(await engine.elections.listCandidates(id)).toEqual(hidden);

      await engine.elections.declareResults(id);
      expect(await engine.elections.listCandidates(id)).toEqual([
        { id: 1, name: 'Alice', votes: 0 },
        { id: 2, name: 'Bob', votes: 1 },
      ]);
    });

    it('should reject a non-positive election id', async () => {
      await expect(engine.elections.getElection(0)).rejects.toThrow('electionId must be a positive integer');
    });
  });
});
