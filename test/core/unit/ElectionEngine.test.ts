import { AlreadyActedError } from '../../../src/contracts/errors';
import { IN_MEMORY, openDatabase } from '../../../src/store';
import { StaticBiometricVerifier } from '../../../src/biometric/StaticBiometricVerifier';
import { ElectionEngine } from '../../../src/ElectionEngine';
import { FakeLedger } from '../../helpers/FakeLedger';
import { SAMPLE, createTestEngine } from '../../helpers/engine';

describe('ElectionEngine', () => {
  it('should issue a receipt for election 3 bound to the enrollment, never the candidate', async () => {
    const { engine } = createTestEngine();

    for (const name of ['Council', 'Treasurer', 'Board']) {
      await engine.elections.createElection({ name });
    }
    await engine.elections.addCandidate(3, 'Alice');
    await engine.elections.addCandidate(3, 'Bob');
    await engine.elections.startElection(3);
    await engine.voting.registerVoter({ electionId: 3, enrollment: 'E100', name: 'Ann', sample: SAMPLE });

    const receipt = await engine.voting.castVote({ electionId: 3, enrollment: 'E100', candidateId: 1, sample: SAMPLE });

    expect(receipt).toMatchObject({
      receiptId: 1,
      electionId: 3,
      enrollmentHash: '0xd17023e35115bb25d1ceaccf3813404d525e2ecc32d4643a4a371b26d00ac694',
      visibleTag: '0xd17023e3',
    });
    expect(receipt).not.toHaveProperty('candidateId');

    const verification = await engine.verification.verify(1);
    expect(verification).toMatchObject({ verified: true, source: 'ledger', anomaly: null });
    expect(verification.ledger?.visibleTag).toBe('0xd17023e3');

    await expect(
      engine.voting.castVote({ electionId: 3, enrollment: 'E100', candidateId: 2, sample: SAMPLE })
    ).rejects.toBeInstanceOf(AlreadyActedError);
    expect(engine.cache.receipts.count()).toBe(1);

    expect(engine.verification.searchReceipt('E100', 3)).toMatchObject({ confidence: 'exact', receipt: { receiptId: 1 } });
    engine.close();
  });

  it('should read deadlines against the injected clock', async () => {
    let now = new Date('2026-03-01T12:00:00Z');
    const engine = new ElectionEngine({
      ledger: new FakeLedger(),
      db: openDatabase(IN_MEMORY),
      biometric: new StaticBiometricVerifier(),
      now: () => now,
    });
    const { electionId } = await engine.elections.createElection({ name: 'Board', expiresAt: '2026-03-01T13:00' });
    await engine.elections.addCandidate(electionId, 'Alice');
    await engine.elections.startElection(electionId);

    expect(await engine.phases.effectivePhase(electionId)).toBe('ACTIVE');
    now = new Date('2026-03-01T13:01:00Z');
    expect(await engine.phases.effectivePhase(electionId)).toBe('EXPIRED');
    engine.close();
  });

  describe('getStatus', () => {
    it('should report every part healthy', async () => {
      const { engine } = createTestEngine();
      await engine.elections.createElection({ name: 'Board' });
      await engine.voting.registerVoter({ electionId: 1, enrollment: 'E100', name: 'Ann', sample: SAMPLE });

      await expect(engine.getStatus()).resolves.toEqual({
        ledger: { ok: true, detail: 'Connected at block 102', blockNumber: 102, chainId: '31337' },
        contract: { ok: true, detail: '1 elections on the ledger', hasCode: true, electionCount: 1 },
        cache: { ok: true, detail: '1 voters, 1 elections cached', elections: 1, voters: 1, receipts: 0 },
        overall: true,
      });
      engine.close();
    });

    it('should report an unreachable ledger instead of throwing', async () => {
      const { engine, ledger } = createTestEngine();
      ledger.unreachable = true;

      const status = await engine.getStatus();

      expect(status.overall).toBe(false);
      expect(status.ledger).toEqual({ ok: false, detail: 'Ledger node unreachable', blockNumber: null, chainId: null });
      expect(status.contract).toMatchObject({ ok: false, detail: 'Ledger node unreachable' });
      expect(status.cache.ok).toBe(true);
      engine.close();
    });

    it('should report a closed cache', async () => {
      const { engine } = createTestEngine();
      engine.close();

      const status = await engine.getStatus();

      expect(status.cache).toMatchObject({ ok: false, voters: null });
      expect(status.overall).toBe(false);
    });
  });
});
