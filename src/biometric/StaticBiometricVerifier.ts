import { getBytes, sha256 } from 'ethers';
import { digestTemplate, type BiometricSample, type BiometricTemplate, type BiometricVerifier } from './types';

export interface StaticBiometricVerifierOptions {
  /** Answer returned by every match (defaults to true) */
  accept?: boolean;
}

/**
 * Deterministic stand-in for a real matcher: templates are the sha256 of the sample and
 * every match returns the configured answer. For development and tests only.
 */
export class StaticBiometricVerifier implements BiometricVerifier {
  private readonly accept: boolean;

  constructor(options: StaticBiometricVerifierOptions = {}) {
    this.accept = options.accept ?? true;
  }

  async matches(_template: BiometricTemplate, _sample: BiometricSample): Promise<boolean> {
    return this.accept;
  }

  async encode(sample: BiometricSample): Promise<BiometricTemplate> {
    return getBytes(sha256(sample));
  }

  digest(template: BiometricTemplate): string {
    return digestTemplate(template);
  }
}
