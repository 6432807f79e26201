import type { AxiosRequestConfig } from 'axios';
import { decodeBase64, encodeBase64 } from 'ethers';
import { BaseService, RemoteServiceError } from '../api/BaseService';
import { digestTemplate, type BiometricSample, type BiometricTemplate, type BiometricVerifier } from './types';

interface EncodeResponse {
  template: string;
}

interface MatchResponse {
  match: boolean;
}

/**
 * Client for an external matching service exposing `POST /encode` and `POST /match`.
 * Bytes travel as base64.
 */
export class RemoteBiometricVerifier extends BaseService implements BiometricVerifier {
  constructor(baseURL: string, config: AxiosRequestConfig = {}) {
    super(baseURL, { ...config, timeout: config.timeout ?? 15_000 });
  }

  async matches(template: BiometricTemplate, sample: BiometricSample): Promise<boolean> {
    const response = await this.request<MatchResponse>({
      method: 'POST',
      url: '/match',
      data: { template: encodeBase64(template), sample: encodeBase64(sample) },
    });
    if (typeof response?.match !== 'boolean') {
      throw new RemoteServiceError('Malformed match response from biometric service', 502);
    }
    return response.match;
  }

  async encode(sample: BiometricSample): Promise<BiometricTemplate> {
    const response = await this.request<EncodeResponse>({
      method: 'POST',
      url: '/encode',
      data: { sample: encodeBase64(sample) },
    });
    if (typeof response?.template !== 'string' || response.template === '') {
      throw new RemoteServiceError('Malformed encode response from biometric service', 502);
    }
    return decodeBase64(response.template);
  }

  digest(template: BiometricTemplate): string {
    return digestTemplate(template);
  }
}
