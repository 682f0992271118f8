import { AwsV2Signer } from '../../../src/signing/awsV2Signature';
import { SigningError } from '../../../src/signing/errors';
import { SignatureRequest, keyPair } from '../../../src/signing/interfaces';
import { s3Host, gcsHost } from '../../../src/cache/stores';

describe('AwsV2Signer', () => {
  const signer = new AwsV2Signer();
  const now = new Date('2024-01-02T03:04:05Z');

  const request = (overrides: Partial<SignatureRequest> = {}): SignatureRequest => ({
    keyPair: keyPair('test-key-id', 'test-secret'),
    verb: 'GET',
    location: {
      scheme: 'https',
      region: 'us-east-1',
      bucket: 'test-bucket',
      path: '/12345/main/node-20.tgz',
      hostStrategy: s3Host,
    },
    expiresIn: 600,
    now,
    ...overrides,
  });

  describe('sign', () => {
    it('produces a query signed URI', () => {
      const signed = signer.sign(request());

      expect(signed.uri).toBe(
        'https://test-bucket.s3.amazonaws.com/12345/main/node-20.tgz' +
          '?AWSAccessKeyId=test-key-id&Expires=1704165245&Signature=hdTcd4MYVFYgsCL7Nr%2FBCwx8mcg%3D'
      );
      expect(signed.headers).toBeUndefined();
    });

    it('puts the absolute expiry into the string to sign', () => {
      expect(signer.stringToSign(request(), '1704165245')).toBe(
        'GET\n\n\n1704165245\n/test-bucket/12345/main/node-20.tgz'
      );
    });

    it('uses the location scheme and host strategy', () => {
      const signed = signer.sign(
        request({
          location: {
            scheme: 'http',
            region: 'auto',
            bucket: 'gcs-bucket',
            path: '/1/main.tgz',
            hostStrategy: gcsHost,
          },
        })
      );

      expect(signed.uri.startsWith('http://gcs-bucket.storage.googleapis.com/1/main.tgz?')).toBe(true);
    });

    it('gives different signatures for different verbs', () => {
      const get = new URL(signer.sign(request()).uri).searchParams.get('Signature');
      const put = new URL(signer.sign(request({ verb: 'PUT' })).uri).searchParams.get('Signature');

      expect(get).not.toBe(put);
    });

    it('throws SigningError when the secret is missing', () => {
      expect(() => signer.sign(request({ keyPair: keyPair('test-key-id', '') }))).toThrow(
        SigningError
      );
      expect(() => signer.sign(request({ keyPair: keyPair('test-key-id', '') }))).toThrow(
        'secret access key is missing'
      );
    });

    it('throws SigningError when the access key id is missing', () => {
      expect(() => signer.sign(request({ keyPair: keyPair('', 'test-secret') }))).toThrow(
        'access key id is missing'
      );
    });

    it('throws SigningError for a non-positive expiry', () => {
      expect(() => signer.sign(request({ expiresIn: 0 }))).toThrow('invalid expiry 0');
    });

    it('rejects header mode', () => {
      expect(() => signer.sign(request({ headerMode: true }))).toThrow(
        'Request header signing requires signature version 4'
      );
    });
  });

  describe('verify', () => {
    it('accepts its own signature', () => {
      expect(signer.verify(signer.sign(request()), request())).toBe(true);
    });

    it('rejects a signature made with another secret', () => {
      const signed = signer.sign(request({ keyPair: keyPair('test-key-id', 'other-secret') }));

      expect(signer.verify(signed, request())).toBe(false);
    });

    it('rejects a signature made at another time', () => {
      const signed = signer.sign(request({ now: new Date('2024-01-02T03:05:05Z') }));

      expect(signer.verify(signed, request())).toBe(false);
    });
  });
});
