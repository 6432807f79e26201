/**
 * Supported environment types
 */
export type Environment = 'dev' | 'stg' | 'prod';

export const ENVIRONMENTS: readonly Environment[] = ['dev', 'stg', 'prod'];

export type BiometricMode = 'remote' | 'static';

/**
 * Biometric verifier selection
 */
export type BiometricConfig =
  | { mode: 'remote'; url: string; timeoutMs?: number }
  | { mode: 'static'; accept: boolean };

/**
 * Ledger connection settings
 */
export interface LedgerConfig {
  /** JSON-RPC endpoint of the ledger node */
  rpcUrl: string;
  /** Address of the deployed election contract */
  contractAddress: string;
  /** Hex private key of the single signing account */
  signerKey: string;
  confirmationTimeoutMs: number;
}

/**
 * Fully resolved engine configuration
 */
export interface EngineConfig {
  environment: Environment;
  ledger: LedgerConfig;
  /** SQLite file path, or `:memory:` */
  cacheDbPath: string;
  biometric: BiometricConfig;
}

/**
 * Per-environment defaults
 */
export interface EnvironmentDefaults {
  rpcUrl: string;
  cacheDbPath: string;
  confirmationTimeoutMs: number;
  biometric: BiometricConfig;
}

/**
 * Configuration options for environment setup
 */
export interface EnvironmentOptions {
  /** Environment to use (defaults to 'dev') */
  environment?: Environment;
  rpcUrl?: string;
  contractAddress?: string;
  signerKey?: string;
  cacheDbPath?: string;
  confirmationTimeoutMs?: number;
  biometric?: BiometricConfig;
}
