import { HostStrategy } from '../signing/interfaces';
import { DataStore } from './types';

export const s3Host: HostStrategy = region =>
  region === 'us-east-1' ? 's3.amazonaws.com' : `s3.${region}.amazonaws.com`;

export const gcsHost: HostStrategy = () => 'storage.googleapis.com';

/**
 * Host strategy for a store. A custom endpoint (MinIO, R2, ...) replaces
 * the provider host for every region.
 */
export function hostStrategyFor(store: DataStore, endpoint?: string): HostStrategy {
  if (endpoint) {
    const host = endpoint.replace(/^https?:\/\//, '').replace(/\/+$/, '');
    return () => host;
  }

  switch (store) {
    case 's3':
      return s3Host;
    case 'gcs':
      return gcsHost;
    default:
      throw new Error(`Unknown cache store: ${store}`);
  }
}

/**
 * Check if a store name is supported
 */
export function isValidStore(store: string): store is DataStore {
  return store === 's3' || store === 'gcs';
}
