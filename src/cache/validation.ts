import { CacheConfiguration } from './types';

type RequiredField = 'bucket' | 'accessKeyId' | 'secretAccessKey';

/**
 * Required settings and their labels, in reporting order
 */
export const REQUIRED_FIELDS: ReadonlyArray<readonly [RequiredField, string]> = [
  ['bucket', 'bucket name'],
  ['accessKeyId', 'access key id'],
  ['secretAccessKey', 'secret access key'],
];

/**
 * Check required settings are present
 * @returns labels of the missing settings; empty when valid
 */
export function validateConfiguration(config: Partial<CacheConfiguration>): string[] {
  return REQUIRED_FIELDS.filter(([field]) => !config[field]?.trim()).map(([, label]) => label);
}

export function configMissingMessage(store: string, missing: string[]): string {
  return `${store.toUpperCase()} cache config missing: ${missing.join(', ')}`;
}
