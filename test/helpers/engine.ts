import { StaticBiometricVerifier } from '../../src/biometric/StaticBiometricVerifier';
import { ElectionEngine } from '../../src/ElectionEngine';
import { IN_MEMORY, openDatabase } from '../../src/store';
import { FakeLedger } from './FakeLedger';

export const SAMPLE = new Uint8Array([1, 2, 3, 4]);

export interface TestEngine {
  engine: ElectionEngine;
  ledger: FakeLedger;
  biometric: StaticBiometricVerifier;
}

/**
 * Engine over an in-memory cache, a fake ledger and an always-matching biometric double.
 */
export function createTestEngine(options: { now?: () => Date } = {}): TestEngine {
  const ledger = new FakeLedger();
  const biometric = new StaticBiometricVerifier();
  const engine = new ElectionEngine({ ledger, db: openDatabase(IN_MEMORY), biometric, now: options.now });
  return { engine, ledger, biometric };
}

/**
 * Creates an election with the given candidates and, when asked, starts it.
 */
export async function seedElection(
  engine: ElectionEngine,
  options: { name?: string; candidates?: string[]; start?: boolean; isLiveResults?: boolean; expiresAt?: Date } = {}
): Promise<number> {
  const { electionId } = await engine.elections.createElection({
    name: options.name ?? 'Board election',
    isLiveResults: options.isLiveResults,
    expiresAt: options.expiresAt,
  });
  for (const candidate of options.candidates ?? ['Alice', 'Bob']) {
    await engine.elections.addCandidate(electionId, candidate);
  }
  if (options.start) {
    await engine.elections.startElection(electionId);
  }
  return electionId;
}
