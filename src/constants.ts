import * as path from 'path';
import * as os from 'os';

export enum Inputs {
  Store = 'store',
  SignatureVersion = 'signature-version',
  Bucket = 'bucket',
  AccessKeyId = 'access-key-id',
  SecretAccessKey = 'secret-access-key',
  Scheme = 'scheme',
  Region = 'region',
  Endpoint = 'endpoint',
  FetchTimeout = 'fetch-timeout',
  PushTimeout = 'push-timeout',
  Debug = 'debug',
  ClientBranch = 'client-branch',
  Edge = 'edge',
  Directories = 'directories',
  Slug = 'slug',
  DefaultBranch = 'default-branch',
  RequestHeaders = 'request-headers',
  ScriptDir = 'script-dir',
}

export enum Outputs {
  ScriptPath = 'script-path',
  CacheAvailable = 'cache-available',
  PushScheduled = 'push-scheduled',
}

/**
 * Directory the rendered scripts are written to.
 * Priority: RUNNER_TEMP > OS temp directory
 */
export function getDefaultScriptDir(): string {
  return path.join(process.env.RUNNER_TEMP || os.tmpdir(), 'dircache');
}

export const DEFAULT_STORE = 's3';
export const DEFAULT_SIGNATURE_VERSION = '4';
export const DEFAULT_SCHEME = 'https';
export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_BRANCH = 'master';

// Seconds a signed URL stays valid
export const DEFAULT_FETCH_TIMEOUT = 600;
export const DEFAULT_PUSH_TIMEOUT = 3600;

// Cache client
export const CLIENT_DIR_VAR = 'CASHER_DIR';
export const CLIENT_DIR = '$HOME/.casher';
export const CLIENT_BIN = '$CASHER_DIR/bin/casher';
export const CLIENT_URL_TEMPLATE = 'https://raw.githubusercontent.com/travis-ci/casher/%s/bin/casher';
export const CLIENT_EDGE_BRANCH = 'master';
export const CLIENT_STABLE_BRANCH = 'production';
export const CURL_HEADER_FILE = '$HOME/curl_headers';

// Maximum number of directories handed to one `add` invocation
export const ADD_DIR_MAX = 100;

export const FETCH_EXTENSIONS = ['.tgz', '.tbz'] as const;
export const PUSH_EXTENSION = '.tgz';

export const CURL_FORMAT = [
  '             time_namelookup:  %{time_namelookup} s',
  '                time_connect:  %{time_connect} s',
  '             time_appconnect:  %{time_appconnect} s',
  '            time_pretransfer:  %{time_pretransfer} s',
  '               time_redirect:  %{time_redirect} s',
  '          time_starttransfer:  %{time_starttransfer} s',
  '              speed_download:  %{speed_download} bytes/s',
  '               url_effective:  %{url_effective}',
  '                             ----------',
  '                  time_total:  %{time_total} s',
  '',
].join('\n');
