import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { getBytes, sha256 } from 'ethers';
import { RemoteServiceError } from '../../../src/api/BaseService';
import { createBiometricVerifier, toSample } from '../../../src/biometric';
import { RemoteBiometricVerifier } from '../../../src/biometric/RemoteBiometricVerifier';
import { StaticBiometricVerifier } from '../../../src/biometric/StaticBiometricVerifier';
import { ValidationError } from '../../../src/core/errors';

function respond(data: unknown, status = 200) {
  return (config: InternalAxiosRequestConfig) =>
    Promise.resolve({ data, status, statusText: 'OK', headers: {}, config });
}

describe('biometric verifiers', () => {
  describe('toSample', () => {
    it('should pass bytes through', () => {
      const bytes = new Uint8Array([1, 2, 3]);
      expect(toSample(bytes)).toBe(bytes);
    });

    it('should decode plain base64 and data URLs', () => {
      expect(toSample('AQIDBA==')).toEqual(new Uint8Array([1, 2, 3, 4]));
      expect(toSample('data:image/png;base64,AQIDBA==')).toEqual(new Uint8Array([1, 2, 3, 4]));
    });

    it('should reject empty or malformed samples', () => {
      expect(() => toSample(new Uint8Array())).toThrow(ValidationError);
      expect(() => toSample('data:image/png;base64,')).toThrow('Biometric sample is not valid base64');
      expect(() => toSample('not base64!')).toThrow('Biometric sample is not valid base64');
    });
  });

  describe('StaticBiometricVerifier', () => {
    it('should derive the template from the sample hash', async () => {
      const verifier = new StaticBiometricVerifier();
      const sample = new Uint8Array([1, 2, 3, 4]);

      const template = await verifier.encode(sample);

      expect(template).toEqual(getBytes(sha256(sample)));
      expect(verifier.digest(template)).toBe(sha256(template));
      expect(verifier.digest(template)).toMatch(/^0x[0-9a-f]{64}$/);
    });

    it('should answer every match with the configured value', async () => {
      await expect(new StaticBiometricVerifier().matches(new Uint8Array([1]), new Uint8Array([2]))).resolves.toBe(true);
      await expect(
        new StaticBiometricVerifier({ accept: false }).matches(new Uint8Array([1]), new Uint8Array([1]))
      ).resolves.toBe(false);
    });
  });

  describe('RemoteBiometricVerifier', () => {
    it('should send base64 bytes to /encode and decode the template', async () => {
      const adapter = jest.fn<ReturnType<AxiosAdapter>, Parameters<AxiosAdapter>>(respond({ template: 'CQgH' }));
      const verifier = new RemoteBiometricVerifier('http://faces.test', { adapter });

      await expect(verifier.encode(new Uint8Array([1, 2, 3, 4]))).resolves.toEqual(new Uint8Array([9, 8, 7]));

      const [config] = adapter.mock.calls[0];
      expect(config.url).toBe('/encode');
      expect(config.method).toBe('post');
      expect(JSON.parse(String(config.data))).toEqual({ sample: 'AQIDBA==' });
    });

    it('should read the match answer', async () => {
      const adapter = jest.fn<ReturnType<AxiosAdapter>, Parameters<AxiosAdapter>>(respond({ match: false }));
      const verifier = new RemoteBiometricVerifier('http://faces.test', { adapter });

      await expect(verifier.matches(new Uint8Array([9]), new Uint8Array([1]))).resolves.toBe(false);
      expect(JSON.parse(String(adapter.mock.calls[0][0].data))).toEqual({ template: 'CQ==', sample: 'AQ==' });
    });

    it('should reject a malformed answer', async () => {
      const verifier = new RemoteBiometricVerifier('http://faces.test', { adapter: respond({ ok: true }) });

      await expect(verifier.matches(new Uint8Array([9]), new Uint8Array([1]))).rejects.toThrow(
        'Malformed match response from biometric service'
      );
    });

    it('should surface the service error', async () => {
      const adapter: AxiosAdapter = (config) =>
        Promise.reject(
          new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', config, null, {
            data: { error: 'model offline', code: 503 },
            status: 503,
            statusText: 'Service Unavailable',
            headers: {},
            config,
          })
        );
      const verifier = new RemoteBiometricVerifier('http://faces.test', { adapter });

      const attempt = verifier.encode(new Uint8Array([1]));

      await expect(attempt).rejects.toBeInstanceOf(RemoteServiceError);
      await expect(attempt).rejects.toMatchObject({ message: 'model offline', code: 503 });
    });
  });

  describe('createBiometricVerifier', () => {
    it('should build the implementation named by configuration', () => {
      expect(createBiometricVerifier({ mode: 'static', accept: true })).toBeInstanceOf(StaticBiometricVerifier);
      expect(createBiometricVerifier({ mode: 'remote', url: 'http://faces.test' })).toBeInstanceOf(
        RemoteBiometricVerifier
      );
    });
  });
});
