import { timingSafeEqual } from 'crypto';
import { SigningError } from './errors';

export type Scheme = 'http' | 'https';

export type HttpVerb = 'GET' | 'PUT' | 'HEAD';

/**
 * Access identifier and secret used to sign requests
 */
export interface KeyPair {
  readonly id: string;
  readonly secret: string;
}

/**
 * Derives the provider host (without bucket) from a region
 */
export type HostStrategy = (region: string) => string;

/**
 * One addressable remote object
 */
export interface Location {
  readonly scheme: Scheme;
  readonly region: string;
  readonly bucket: string;
  /** Object path, always starting with '/' */
  readonly path: string;
  readonly hostStrategy: HostStrategy;
}

export type RequestHeader = readonly [name: string, value: string];

/**
 * A signed, time-limited request. There is no renewal: once the
 * signature expires the request has to be signed again.
 */
export interface SignedRequest {
  uri: string;
  headers?: RequestHeader[];
}

export interface SignatureRequest {
  keyPair: KeyPair;
  verb: HttpVerb;
  location: Location;
  /** Seconds the signature stays valid */
  expiresIn: number;
  /** Signing clock */
  now: Date;
  /** Carry the signature in request headers instead of the query string */
  headerMode?: boolean;
}

/**
 * A request signing algorithm
 */
export interface SigningStrategy {
  readonly version: SignatureVersion;
  sign(request: SignatureRequest): SignedRequest;
  /**
   * Recompute the signature for a request and compare it with the one
   * carried by a previously signed request
   */
  verify(signed: SignedRequest, request: SignatureRequest): boolean;
}

export type SignatureVersion = '2' | '4';

export function keyPair(id: string, secret: string): KeyPair {
  return Object.freeze({ id, secret });
}

export function hostname(location: Location): string {
  return `${location.bucket}.${location.hostStrategy(location.region)}`;
}

/**
 * Percent-encode a value following the AWS rules (RFC 3986 unreserved
 * characters are left alone)
 */
export function uriEncode(value: string, encodeSlash = true): string {
  const encoded = encodeURIComponent(value).replace(
    /[!'()*]/g,
    c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
  return encodeSlash ? encoded : encoded.replace(/%2F/g, '/');
}

export function toQueryString(params: Array<[string, string]>): string {
  return params.map(([key, value]) => `${uriEncode(key)}=${uriEncode(value)}`).join('&');
}

export function buildUri(location: Location, query?: string): string {
  const base = `${location.scheme}://${hostname(location)}${uriEncode(location.path, false)}`;
  return query ? `${base}?${query}` : base;
}

export function assertSignable(request: SignatureRequest): void {
  const { keyPair, location, expiresIn, now } = request;

  if (!keyPair.id) {
    throw new SigningError('Cannot sign request: access key id is missing');
  }
  if (!keyPair.secret) {
    throw new SigningError('Cannot sign request: secret access key is missing');
  }
  if (!location.bucket) {
    throw new SigningError('Cannot sign request: bucket is missing');
  }
  if (!location.path.startsWith('/')) {
    throw new SigningError(`Cannot sign request: path '${location.path}' must start with '/'`);
  }
  if (!Number.isInteger(expiresIn) || expiresIn <= 0) {
    throw new SigningError(`Cannot sign request: invalid expiry ${expiresIn}`);
  }
  if (Number.isNaN(now.getTime())) {
    throw new SigningError('Cannot sign request: invalid signing time');
  }
}

export function signaturesMatch(actual: string | null | undefined, expected: string): boolean {
  if (!actual) {
    return false;
  }
  const a = Buffer.from(actual);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}
