import { RemoteBiometricVerifier } from './RemoteBiometricVerifier';
import { StaticBiometricVerifier } from './StaticBiometricVerifier';
import type { BiometricConfig } from '../config/types';
import type { BiometricVerifier } from './types';

export * from './types';
export { RemoteBiometricVerifier } from './RemoteBiometricVerifier';
export { StaticBiometricVerifier } from './StaticBiometricVerifier';

/**
 * Picks the verifier implementation named by configuration.
 */
export function createBiometricVerifier(config: BiometricConfig): BiometricVerifier {
  switch (config.mode) {
    case 'remote':
      return new RemoteBiometricVerifier(config.url, { timeout: config.timeoutMs });
    case 'static':
      return new StaticBiometricVerifier({ accept: config.accept });
  }
}
