import { createHash, createHmac } from 'crypto';
import { SigningError } from './errors';
import {
  RequestHeader,
  SigningStrategy,
  SignatureRequest,
  SignedRequest,
  assertSignable,
  buildUri,
  hostname,
  signaturesMatch,
  toQueryString,
  uriEncode,
} from './interfaces';

const ALGORITHM = 'AWS4-HMAC-SHA256';
const SERVICE = 's3';
const TERMINATOR = 'aws4_request';
const UNSIGNED_PAYLOAD = 'UNSIGNED-PAYLOAD';

/** Longest X-Amz-Expires a store accepts (7 days) */
export const MAX_PRESIGNED_EXPIRY = 604800;

/** Stores reject header signed requests whose x-amz-date is older than this */
export const HEADER_SIGNATURE_WINDOW = 900;

function hmac(key: string | Buffer, data: string): Buffer {
  return createHmac('sha256', key).update(data, 'utf8').digest();
}

function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

/**
 * Format a date as the basic ISO 8601 timestamp used by SigV4 (20240102T030405Z)
 */
export function amzDate(now: Date): string {
  return now.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

/**
 * Canonical request + credential scope signing (AWS signature version 4).
 *
 * Signs into the query string by default. In header mode the URI stays bare
 * and the signature travels in an Authorization header; such requests are
 * bounded by their x-amz-date, so `expiresIn` may not exceed
 * HEADER_SIGNATURE_WINDOW.
 */
export class AwsV4Signer implements SigningStrategy {
  readonly version = '4' as const;

  sign(request: SignatureRequest): SignedRequest {
    assertSignable(request);

    if (request.headerMode) {
      if (request.expiresIn > HEADER_SIGNATURE_WINDOW) {
        throw new SigningError(
          `Cannot sign request: header signatures expire after ${HEADER_SIGNATURE_WINDOW}s, ` +
            `expiry ${request.expiresIn} requested`
        );
      }
      return this.signHeaders(request);
    }

    if (request.expiresIn > MAX_PRESIGNED_EXPIRY) {
      throw new SigningError(
        `Cannot sign request: expiry ${request.expiresIn} exceeds ${MAX_PRESIGNED_EXPIRY}s`
      );
    }

    const query = this.canonicalQuery(request);
    const signature = this.signature(request, this.canonicalRequest(request, query, [], ['host']));

    return {
      uri: buildUri(request.location, `${query}&${toQueryString([['X-Amz-Signature', signature]])}`),
    };
  }

  verify(signed: SignedRequest, request: SignatureRequest): boolean {
    if (request.headerMode) {
      const authorization = signed.headers?.find(([name]) => name === 'Authorization')?.[1];
      const actual = authorization?.match(/Signature=([0-9a-f]+)$/)?.[1];
      return signaturesMatch(actual, this.headerSignature(request).signature);
    }

    const query = this.canonicalQuery(request);
    const expected = this.signature(request, this.canonicalRequest(request, query, [], ['host']));
    return signaturesMatch(new URL(signed.uri).searchParams.get('X-Amz-Signature'), expected);
  }

  credentialScope(request: SignatureRequest): string {
    return [amzDate(request.now).slice(0, 8), request.location.region, SERVICE, TERMINATOR].join('/');
  }

  private signHeaders(request: SignatureRequest): SignedRequest {
    const { headers, signedHeaders, signature } = this.headerSignature(request);
    const authorization =
      `${ALGORITHM} Credential=${request.keyPair.id}/${this.credentialScope(request)}, ` +
      `SignedHeaders=${signedHeaders.join(';')}, Signature=${signature}`;

    return {
      uri: buildUri(request.location),
      headers: [['Authorization', authorization], ...headers],
    };
  }

  private headerSignature(request: SignatureRequest): {
    headers: RequestHeader[];
    signedHeaders: string[];
    signature: string;
  } {
    const headers: RequestHeader[] = [
      ['x-amz-content-sha256', UNSIGNED_PAYLOAD],
      ['x-amz-date', amzDate(request.now)],
    ];
    const signedHeaders = ['host', ...headers.map(([name]) => name)];
    const signature = this.signature(
      request,
      this.canonicalRequest(request, '', headers, signedHeaders)
    );
    return { headers, signedHeaders, signature };
  }

  private canonicalQuery(request: SignatureRequest): string {
    // Already in lexicographic order
    return toQueryString([
      ['X-Amz-Algorithm', ALGORITHM],
      ['X-Amz-Credential', `${request.keyPair.id}/${this.credentialScope(request)}`],
      ['X-Amz-Date', amzDate(request.now)],
      ['X-Amz-Expires', String(request.expiresIn)],
      ['X-Amz-SignedHeaders', 'host'],
    ]);
  }

  canonicalRequest(
    request: SignatureRequest,
    query: string,
    headers: RequestHeader[],
    signedHeaders: string[]
  ): string {
    const canonicalHeaders = [['host', hostname(request.location)] as const, ...headers]
      .map(([name, value]) => `${name}:${value}\n`)
      .join('');

    return [
      request.verb,
      uriEncode(request.location.path, false),
      query,
      canonicalHeaders,
      signedHeaders.join(';'),
      UNSIGNED_PAYLOAD,
    ].join('\n');
  }

  stringToSign(request: SignatureRequest, canonicalRequest: string): string {
    return [
      ALGORITHM,
      amzDate(request.now),
      this.credentialScope(request),
      sha256Hex(canonicalRequest),
    ].join('\n');
  }

  private signature(request: SignatureRequest, canonicalRequest: string): string {
    const date = amzDate(request.now).slice(0, 8);
    const kDate = hmac(`AWS4${request.keyPair.secret}`, date);
    const kRegion = hmac(kDate, request.location.region);
    const kService = hmac(kRegion, SERVICE);
    const kSigning = hmac(kService, TERMINATOR);

    return createHmac('sha256', kSigning)
      .update(this.stringToSign(request, canonicalRequest), 'utf8')
      .digest('hex');
  }
}
