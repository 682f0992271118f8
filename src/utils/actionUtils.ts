import * as path from 'path';
import * as core from '@actions/core';
import {
  Inputs,
  DEFAULT_BRANCH,
  DEFAULT_FETCH_TIMEOUT,
  DEFAULT_PUSH_TIMEOUT,
  DEFAULT_REGION,
  DEFAULT_SCHEME,
  DEFAULT_STORE,
  getDefaultScriptDir,
} from '../constants';
import { CacheConfiguration, DataStore, JobIdentity } from '../cache/types';
import { isValidStore } from '../cache/stores';
import { Scheme, SignatureVersion } from '../signing/interfaces';
import { resolveSignatureVersion } from '../signing/factory';
import { HEADER_SIGNATURE_WINDOW, MAX_PRESIGNED_EXPIRY } from '../signing/awsV4Signature';

export interface ActionInputs {
  config: CacheConfiguration;
  slug?: string;
  defaultBranch: string;
}

// Regex for strict positive integer validation (digits only)
const STRICT_POSITIVE_INTEGER_REGEX = /^\d+$/;

const PULL_REQUEST_REF_REGEX = /^refs\/pull\/(\d+)\//;

/**
 * Parse the cache store
 */
function parseStore(): DataStore {
  const value = core.getInput(Inputs.Store) || DEFAULT_STORE;
  const normalized = value.toLowerCase().trim();

  if (!isValidStore(normalized)) {
    core.warning(`Invalid store '${value}'. Valid values: s3, gcs. Using '${DEFAULT_STORE}'.`);
    return DEFAULT_STORE;
  }

  return normalized;
}

/**
 * Parse the signature version. Unknown values fall back to version 4.
 */
function parseSignatureVersion(): SignatureVersion {
  const value = core.getInput(Inputs.SignatureVersion);
  const version = resolveSignatureVersion(value);

  if (value && value.trim() !== version) {
    core.warning(`Invalid signature-version '${value}'. Valid values: 2, 4. Using '${version}'.`);
  }

  return version;
}

function isScheme(value: string): value is Scheme {
  return value === 'http' || value === 'https';
}

/**
 * Parse URL scheme
 */
function parseScheme(): Scheme {
  const value = core.getInput(Inputs.Scheme) || DEFAULT_SCHEME;
  const normalized = value.toLowerCase().trim();

  if (!isScheme(normalized)) {
    core.warning(`Invalid scheme '${value}'. Valid values: http, https. Using '${DEFAULT_SCHEME}'.`);
    return DEFAULT_SCHEME;
  }

  return normalized;
}

/**
 * Parse a timeout in seconds
 */
function parseTimeout(input: Inputs, fallback: number): number {
  const value = core.getInput(input);
  if (!value || value.trim() === '') {
    return fallback;
  }

  const trimmed = value.trim();
  if (!STRICT_POSITIVE_INTEGER_REGEX.test(trimmed) || parseInt(trimmed, 10) <= 0) {
    core.warning(`Invalid ${input} '${value}'. Must be a positive number of seconds. Using ${fallback}.`);
    return fallback;
  }

  const seconds = parseInt(trimmed, 10);
  if (seconds > MAX_PRESIGNED_EXPIRY) {
    core.warning(
      `${input} ${seconds} exceeds the ${MAX_PRESIGNED_EXPIRY}s limit of signed URLs. Using ${MAX_PRESIGNED_EXPIRY}.`
    );
    return MAX_PRESIGNED_EXPIRY;
  }

  return seconds;
}

function parseBoolean(input: Inputs): boolean {
  return core.getInput(input).toLowerCase().trim() === 'true';
}

function optionalInput(input: Inputs): string | undefined {
  return core.getInput(input).trim() || undefined;
}

export function getInputs(): ActionInputs {
  const store = parseStore();
  const signatureVersion = parseSignatureVersion();
  const secretAccessKey = core.getInput(Inputs.SecretAccessKey);
  if (secretAccessKey) {
    core.setSecret(secretAccessKey);
  }

  const pushTimeout = parseTimeout(Inputs.PushTimeout, DEFAULT_PUSH_TIMEOUT);
  let requestHeaders = parseBoolean(Inputs.RequestHeaders);
  if (requestHeaders && signatureVersion !== '4') {
    core.warning('request-headers requires signature-version 4. Signing pushes into the URL instead.');
    requestHeaders = false;
  } else if (requestHeaders && pushTimeout > HEADER_SIGNATURE_WINDOW) {
    core.warning(
      `request-headers signatures expire ${HEADER_SIGNATURE_WINDOW}s after the push step, ` +
        `shorter than push-timeout ${pushTimeout}. Signing pushes into the URL instead.`
    );
    requestHeaders = false;
  }

  const config: CacheConfiguration = {
    store,
    signatureVersion,
    bucket: core.getInput(Inputs.Bucket).trim(),
    accessKeyId: core.getInput(Inputs.AccessKeyId).trim(),
    secretAccessKey,
    scheme: parseScheme(),
    region: optionalInput(Inputs.Region) ?? DEFAULT_REGION,
    endpoint: optionalInput(Inputs.Endpoint),
    fetchTimeout: parseTimeout(Inputs.FetchTimeout, DEFAULT_FETCH_TIMEOUT),
    pushTimeout,
    debug: parseBoolean(Inputs.Debug),
    branchOverride: optionalInput(Inputs.ClientBranch),
    useEdgeClient: parseBoolean(Inputs.Edge),
    directories: core.getInput(Inputs.Directories).split('\n').map(dir => dir.trim()).filter(Boolean),
    requestHeaders,
  };

  return {
    config,
    slug: optionalInput(Inputs.Slug),
    defaultBranch: optionalInput(Inputs.DefaultBranch) ?? DEFAULT_BRANCH,
  };
}

/**
 * Read the job identity from the CI environment
 */
export function getJobIdentity(defaultBranch: string = DEFAULT_BRANCH): JobIdentity {
  const repositoryId = process.env.GITHUB_REPOSITORY_ID || process.env.GITHUB_REPOSITORY || '';
  if (!repositoryId) {
    throw new Error(
      'Unable to determine repository. Ensure GITHUB_REPOSITORY_ID or GITHUB_REPOSITORY is set.'
    );
  }

  const pullRequest = process.env.GITHUB_REF?.match(PULL_REQUEST_REF_REGEX)?.[1];
  const branch = pullRequest ? process.env.GITHUB_BASE_REF : process.env.GITHUB_REF_NAME;
  if (!branch) {
    throw new Error(
      pullRequest
        ? `Unable to determine target branch of pull request ${pullRequest}. Ensure GITHUB_BASE_REF is set.`
        : 'Unable to determine branch. Ensure GITHUB_REF_NAME is set.'
    );
  }

  return { repositoryId, branch, pullRequest, defaultBranch };
}

/**
 * Where a step writes its rendered script
 */
export function getScriptPath(step: 'setup' | 'push'): string {
  return path.join(optionalInput(Inputs.ScriptDir) ?? getDefaultScriptDir(), `${step}.sh`);
}
