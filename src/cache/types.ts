import { Scheme, SignatureVersion } from '../signing/interfaces';

export type DataStore = 's3' | 'gcs';

/**
 * Cache settings for one job. Read-only once built.
 */
export interface CacheConfiguration {
  store: DataStore;
  signatureVersion: SignatureVersion;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  scheme?: Scheme;
  region?: string;
  /** S3-compatible host replacing the provider hostname */
  endpoint?: string;
  /** Seconds a fetch URL stays valid */
  fetchTimeout: number;
  /** Seconds a push URL stays valid */
  pushTimeout: number;
  debug: boolean;
  branchOverride?: string;
  useEdgeClient: boolean;
  directories: string[];
  /** Sign pushes into request headers handed to curl via a header file */
  requestHeaders: boolean;
}

/**
 * Where a job sits in the repository: drives path segments and the
 * fallback cascade
 */
export interface JobIdentity {
  repositoryId: string;
  /** Branch being built; the target branch for pull requests */
  branch: string;
  pullRequest?: string;
  defaultBranch: string;
}
