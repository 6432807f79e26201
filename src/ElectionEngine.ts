import type Database from 'better-sqlite3';
import { JsonRpcProvider, Wallet } from 'ethers';
import { createBiometricVerifier, type BiometricVerifier } from './biometric';
import { loadConfigFromEnv, type EngineConfig } from './config';
import { ElectionLedgerService } from './contracts/ElectionLedgerService';
import type { ElectionLedger } from './contracts/types';
import { ElectionService } from './core/ElectionService';
import { PhaseResolver } from './core/PhaseResolver';
import { StatusService, type SystemStatus } from './core/StatusService';
import { VotingService } from './core/VotingService';
import { closeDatabase, createLedgerCache, openDatabase, type LedgerCache } from './store';
import { logger } from './utils/logger';
import { VerificationService } from './verification/VerificationService';

/**
 * Collaborators the engine runs on
 */
export interface ElectionEngineComponents {
  ledger: ElectionLedger;
  /** Open handle on the cache database; the engine closes it on {@link ElectionEngine.close} */
  db: Database.Database;
  biometric: BiometricVerifier;
  /** Clock used for soft deadlines (defaults to the system clock) */
  now?: () => Date;
}

/**
 * Entry point wiring the ledger client, the local cache and the biometric verifier
 * into the election, voting and verification services.
 *
 * @example
 * ```typescript
 * const engine = ElectionEngine.fromEnvironment();
 * const { electionId } = await engine.elections.createElection({ name: 'Board 2026' });
 * await engine.elections.addCandidate(electionId, 'Alice');
 * await engine.elections.startElection(electionId);
 * ```
 */
export class ElectionEngine {
  readonly cache: LedgerCache;
  readonly phases: PhaseResolver;
  readonly elections: ElectionService;
  readonly voting: VotingService;
  readonly verification: VerificationService;
  private readonly status: StatusService;
  private readonly db: Database.Database;

  constructor(components: ElectionEngineComponents) {
    this.db = components.db;
    this.cache = createLedgerCache(components.db);
    this.phases = new PhaseResolver(components.ledger, this.cache, components.now);
    this.elections = new ElectionService(components.ledger, this.cache, this.phases);
    this.voting = new VotingService(components.ledger, this.cache, components.biometric, this.phases);
    this.verification = new VerificationService(components.ledger, this.cache);
    this.status = new StatusService(components.ledger, this.cache);
  }

  /**
   * Builds the engine against a JSON-RPC ledger from resolved configuration.
   */
  static fromConfig(config: EngineConfig): ElectionEngine {
    const provider = new JsonRpcProvider(config.ledger.rpcUrl);
    const signer = new Wallet(config.ledger.signerKey, provider);
    const ledger = new ElectionLedgerService(config.ledger.contractAddress, signer, {
      confirmationTimeoutMs: config.ledger.confirmationTimeoutMs,
    });
    logger.info(`Election engine starting in '${config.environment}'`, {
      rpcUrl: config.ledger.rpcUrl,
      contractAddress: config.ledger.contractAddress,
      biometric: config.biometric.mode,
    });
    return new ElectionEngine({
      ledger,
      db: openDatabase(config.cacheDbPath),
      biometric: createBiometricVerifier(config.biometric),
    });
  }

  /**
   * Builds the engine from environment variables (and `.env`).
   */
  static fromEnvironment(env?: NodeJS.ProcessEnv): ElectionEngine {
    return ElectionEngine.fromConfig(loadConfigFromEnv(env));
  }

  getStatus(): Promise<SystemStatus> {
    return this.status.getStatus();
  }

  close(): void {
    closeDatabase(this.db);
  }
}
