import { decodeBase64, sha256 } from 'ethers';
import { ValidationError } from '../core/errors';

/** Fresh capture as handed over by the caller. Opaque to the engine. */
export type BiometricSample = Uint8Array;

/** Stored encoding of a sample. Opaque to the engine. */
export type BiometricTemplate = Uint8Array;

/**
 * Trusted boolean oracle for biometric matching.
 */
export interface BiometricVerifier {
  /** Whether the fresh sample belongs to the person the template was made from */
  matches(template: BiometricTemplate, sample: BiometricSample): Promise<boolean>;
  encode(sample: BiometricSample): Promise<BiometricTemplate>;
  /** Stable commitment used on the ledger: 0x-prefixed 32-byte hex */
  digest(template: BiometricTemplate): string;
}

export function digestTemplate(template: BiometricTemplate): string {
  return sha256(template);
}

/**
 * Accepts raw bytes, or base64 text with or without a `data:...;base64,` prefix.
 */
export function toSample(input: BiometricSample | string): BiometricSample {
  if (typeof input !== 'string') {
    if (input.length === 0) {
      throw new ValidationError('Biometric sample is empty', 'decodeSample');
    }
    return input;
  }

  const encoded = input.includes(',') ? input.slice(input.indexOf(',') + 1) : input;
  const trimmed = encoded.trim();
  if (trimmed === '' || !/^[A-Za-z0-9+/]+=*$/.test(trimmed)) {
    throw new ValidationError('Biometric sample is not valid base64', 'decodeSample');
  }
  return decodeBase64(trimmed);
}
