import * as core from '@actions/core';
import { AwsV2Signer } from './awsV2Signature';
import { AwsV4Signer } from './awsV4Signature';
import { SignatureVersion, SigningStrategy } from './interfaces';

/**
 * Resolve a configured signature version. Anything but '2' means version 4.
 */
export function resolveSignatureVersion(value: string | undefined): SignatureVersion {
  return value?.trim() === '2' ? '2' : '4';
}

/**
 * Create the signing strategy for a signature version.
 * Called once per cache instance; the strategy is never swapped afterwards.
 */
export function createSigner(version: SignatureVersion): SigningStrategy {
  core.debug(`Using signature version ${version}`);

  switch (version) {
    case '2':
      return new AwsV2Signer();

    case '4':
    default:
      return new AwsV4Signer();
  }
}
