import { isAddress, isHexString } from 'ethers';
import { ConfigurationError } from '../core/errors';
import type { EngineConfig, Environment, EnvironmentDefaults, EnvironmentOptions } from './types';

/**
 * Default settings for all environments. Staging and production have no ledger endpoint
 * of their own and must be given one.
 */
export const DEFAULT_ENVIRONMENTS: Record<Environment, EnvironmentDefaults> = {
  dev: {
    rpcUrl: 'http://127.0.0.1:8545',
    cacheDbPath: './data/ledger-cache.db',
    confirmationTimeoutMs: 60_000,
    biometric: { mode: 'static', accept: true },
  },
  stg: {
    rpcUrl: '',
    cacheDbPath: './data/ledger-cache.db',
    confirmationTimeoutMs: 60_000,
    biometric: { mode: 'remote', url: '' },
  },
  prod: {
    rpcUrl: '',
    cacheDbPath: './data/ledger-cache.db',
    confirmationTimeoutMs: 60_000,
    biometric: { mode: 'remote', url: '' },
  },
};

/**
 * Resolve the configuration for an environment, applying overrides and validating the result.
 *
 * @throws ConfigurationError when a required value is missing or malformed
 */
export function resolveConfiguration(options: EnvironmentOptions = {}): EngineConfig {
  const environment = options.environment ?? 'dev';
  const defaults = DEFAULT_ENVIRONMENTS[environment];

  const rpcUrl = options.rpcUrl ?? defaults.rpcUrl;
  if (!rpcUrl) {
    throw new ConfigurationError(`LEDGER_RPC_URL is required in '${environment}'`);
  }

  const contractAddress = options.contractAddress ?? '';
  if (!isAddress(contractAddress)) {
    throw new ConfigurationError('LEDGER_CONTRACT_ADDRESS must be a valid address');
  }

  const signerKey = options.signerKey ?? '';
  if (!isHexString(signerKey, 32)) {
    throw new ConfigurationError('LEDGER_SIGNER_KEY must be a 32-byte hex string');
  }

  const confirmationTimeoutMs = options.confirmationTimeoutMs ?? defaults.confirmationTimeoutMs;
  if (!Number.isInteger(confirmationTimeoutMs) || confirmationTimeoutMs <= 0) {
    throw new ConfigurationError('CONFIRMATION_TIMEOUT_MS must be a positive integer');
  }

  const biometric = options.biometric ?? defaults.biometric;
  if (biometric.mode === 'remote' && !biometric.url) {
    throw new ConfigurationError('BIOMETRIC_URL is required when BIOMETRIC_MODE is remote');
  }

  return {
    environment,
    ledger: { rpcUrl, contractAddress, signerKey, confirmationTimeoutMs },
    cacheDbPath: options.cacheDbPath ?? defaults.cacheDbPath,
    biometric,
  };
}
