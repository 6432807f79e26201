import dotenv from 'dotenv';
import { ConfigurationError } from '../core/errors';
import { resolveConfiguration } from './environments';
import { ENVIRONMENTS, type BiometricConfig, type EngineConfig, type Environment, type EnvironmentOptions } from './types';

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((env) => env === value);
}

function parseEnvironment(value: string | undefined): Environment | undefined {
  if (value === undefined || value === '') return undefined;
  if (!isEnvironment(value)) {
    throw new ConfigurationError(`LEDGER_ENV must be one of ${ENVIRONMENTS.join(', ')}, got '${value}'`);
  }
  return value;
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError('CONFIRMATION_TIMEOUT_MS must be a positive integer');
  }
  return parsed;
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`${name} must be true or false, got '${value}'`);
  }
}

function parseBiometric(env: NodeJS.ProcessEnv): BiometricConfig | undefined {
  const mode = env.BIOMETRIC_MODE;
  if (mode === undefined || mode === '') return undefined;
  if (mode === 'static') {
    return { mode, accept: parseBoolean('BIOMETRIC_ACCEPT', env.BIOMETRIC_ACCEPT, true) };
  }
  if (mode === 'remote') {
    return { mode, url: env.BIOMETRIC_URL ?? '' };
  }
  throw new ConfigurationError(`BIOMETRIC_MODE must be remote or static, got '${mode}'`);
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

/**
 * Translate environment variables into configuration overrides.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv): EnvironmentOptions {
  return {
    environment: parseEnvironment(env.LEDGER_ENV),
    rpcUrl: emptyToUndefined(env.LEDGER_RPC_URL),
    contractAddress: emptyToUndefined(env.LEDGER_CONTRACT_ADDRESS),
    signerKey: emptyToUndefined(env.LEDGER_SIGNER_KEY),
    cacheDbPath: emptyToUndefined(env.CACHE_DB_PATH),
    confirmationTimeoutMs: parseTimeout(env.CONFIRMATION_TIMEOUT_MS),
    biometric: parseBiometric(env),
  };
}

/**
 * Load the engine configuration from the process environment, reading `.env` first
 * when no environment is passed in.
 */
export function loadConfigFromEnv(env?: NodeJS.ProcessEnv): EngineConfig {
  if (env === undefined) {
    dotenv.config();
  }
  return resolveConfiguration(optionsFromEnv(env ?? process.env));
}
