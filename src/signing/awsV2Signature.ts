import { createHmac } from 'crypto';
import { SigningError } from './errors';
import {
  SigningStrategy,
  SignatureRequest,
  SignedRequest,
  assertSignable,
  buildUri,
  signaturesMatch,
  toQueryString,
} from './interfaces';

/**
 * Legacy query string signing (AWS signature version 2).
 * Also accepted by GCS for HMAC interoperability keys.
 *
 * String to sign:
 *   VERB \n Content-MD5 \n Content-Type \n Expires \n /bucket/path
 */
export class AwsV2Signer implements SigningStrategy {
  readonly version = '2' as const;

  sign(request: SignatureRequest): SignedRequest {
    assertSignable(request);
    if (request.headerMode) {
      throw new SigningError('Request header signing requires signature version 4');
    }

    const expires = this.expiresAt(request);
    const query = toQueryString([
      ['AWSAccessKeyId', request.keyPair.id],
      ['Expires', expires],
      ['Signature', this.signature(request, expires)],
    ]);

    return { uri: buildUri(request.location, query) };
  }

  verify(signed: SignedRequest, request: SignatureRequest): boolean {
    if (request.headerMode) {
      return false;
    }
    const params = new URL(signed.uri).searchParams;
    const expires = params.get('Expires');
    if (expires !== this.expiresAt(request)) {
      return false;
    }
    return signaturesMatch(params.get('Signature'), this.signature(request, expires));
  }

  stringToSign(request: SignatureRequest, expires: string): string {
    const { verb, location } = request;
    return [verb, '', '', expires, `/${location.bucket}${location.path}`].join('\n');
  }

  private expiresAt(request: SignatureRequest): string {
    return String(Math.floor(request.now.getTime() / 1000) + request.expiresIn);
  }

  private signature(request: SignatureRequest, expires: string): string {
    return createHmac('sha1', request.keyPair.secret)
      .update(this.stringToSign(request, expires), 'utf8')
      .digest('base64');
  }
}
