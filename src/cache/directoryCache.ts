import * as core from '@actions/core';
import {
  ADD_DIR_MAX,
  CLIENT_BIN,
  CLIENT_DIR,
  CLIENT_DIR_VAR,
  CLIENT_EDGE_BRANCH,
  CLIENT_STABLE_BRANCH,
  CLIENT_URL_TEMPLATE,
  CURL_FORMAT,
  CURL_HEADER_FILE,
  DEFAULT_REGION,
  DEFAULT_SCHEME,
  FETCH_EXTENSIONS,
  PUSH_EXTENSION,
} from '../constants';
import { createSigner } from '../signing/factory';
import {
  HostStrategy,
  HttpVerb,
  KeyPair,
  Location,
  SignedRequest,
  SigningStrategy,
  keyPair,
} from '../signing/interfaces';
import { shellEscape } from '../shell/escape';
import { CmdOptions, ShellEmitter } from '../shell/interfaces';
import { fallbackBranches, group, prefixed } from './paths';
import { hostStrategyFor } from './stores';
import { CacheConfiguration, JobIdentity } from './types';
import { configMissingMessage, validateConfiguration } from './validation';

export interface DirectoryCacheOptions {
  /** Distinguishes caches of different configurations on one branch */
  slug?: string;
  /** Signing clock shared by every URL this instance signs */
  start?: Date;
}

/**
 * Plans build directory cache synchronization for one job.
 *
 * Every operation emits shell instructions to the given emitter; nothing is
 * executed here. Cache problems degrade to an uncached build: a bad
 * configuration or a failed client download disables the cache, it never
 * fails the job. Only a signing error aborts planning.
 */
export class DirectoryCache {
  readonly msgs: string[] = [];
  readonly start: Date;
  readonly slug: string | undefined;

  private readonly signer: SigningStrategy;
  private readonly hostStrategy: HostStrategy;
  private foldCount = 0;
  private available: boolean | undefined;
  private keys: KeyPair | undefined;

  constructor(
    private readonly sh: ShellEmitter,
    readonly config: CacheConfiguration,
    readonly job: JobIdentity,
    options: DirectoryCacheOptions = {}
  ) {
    this.slug = options.slug;
    this.start = options.start ?? new Date();
    this.signer = createSigner(config.signatureVersion);
    this.hostStrategy = hostStrategyFor(config.store, config.endpoint);
  }

  get signatureVersion(): SigningStrategy['version'] {
    return this.signer.version;
  }

  /**
   * Whether cache client invocations are planned at all.
   * Starts as the validation result and is settled by install().
   */
  get cacheAvailable(): boolean {
    if (this.available === undefined) {
      this.available = this.isValid();
    }
    return this.available;
  }

  isValid(): boolean {
    return this.validate().length === 0;
  }

  /**
   * Check the configuration, emitting one warning about every missing setting
   * @returns labels of the missing settings
   */
  validate(): string[] {
    const { store, bucket, region, scheme, accessKeyId, secretAccessKey } = this.config;
    core.debug(
      `Cache store options: store=${store} bucket=${bucket || '(none)'} ` +
        `region=${region ?? DEFAULT_REGION} scheme=${scheme ?? DEFAULT_SCHEME} ` +
        `access key id ${accessKeyId ? 'set' : 'unset'}, secret access key ${secretAccessKey ? 'set' : 'unset'}`
    );

    this.msgs.length = 0;
    this.msgs.push(...validateConfiguration(this.config));

    if (this.msgs.length > 0) {
      const message = configMissingMessage(store, this.msgs);
      this.sh.echo(message, { ansi: 'red' });
    }

    return [...this.msgs];
  }

  /**
   * Install the cache client, restore the closest cache and register the
   * configured directories
   */
  setup(): void {
    this.fold('Setting up build cache', () => {
      this.install();
      this.fetch();
      if (this.config.directories.length > 0) {
        this.add(this.config.directories);
      }
    });
  }

  install(): void {
    if (!this.isValid()) {
      this.available = false;
      core.warning('Build cache disabled: configuration incomplete');
      return;
    }

    this.sh.export(CLIENT_DIR_VAR, CLIENT_DIR);
    this.sh.mkdir(`$${CLIENT_DIR_VAR}/bin`, { echo: false, recursive: true });

    const flags = this.debugFlags();
    this.sh.cmd(
      `curl ${this.clientUrl()}${flags ? ` ${flags}` : ''} -L -o ${CLIENT_BIN} -s --fail`,
      { retry: true, echo: 'Installing caching utilities' }
    );
    // An empty client turns every later invocation into a no-op
    this.sh.raw(
      `[ $? -ne 0 ] && echo 'Failed to fetch the cache client, disabling cache.' && echo > ${CLIENT_BIN}`
    );
    this.sh.if(`-f ${CLIENT_BIN}`, () => {
      this.sh.chmod('+x', CLIENT_BIN, { assert: false, echo: false });
    });

    this.available = true;
  }

  /**
   * Fetch the first cache archive that exists along the fallback cascade
   * @returns true when a fetch was planned
   */
  fetch(): boolean {
    if (!this.cacheAvailable) {
      core.info('Build cache unavailable, skipping fetch');
      return false;
    }

    const urls = this.fetchUrls();
    core.debug(`Planning cache fetch with ${urls.length} candidate URLs`);
    this.run('fetch', urls, { timing: true });
    return true;
  }

  /**
   * Signed, shell-escaped fetch URLs, most specific first. Each branch of
   * the cascade contributes a .tgz and a .tbz candidate.
   */
  fetchUrls(): string[] {
    return fallbackBranches(this.job).flatMap(branch =>
      FETCH_EXTENSIONS.map(ext => shellEscape(this.fetchUrl(branch, ext)))
    );
  }

  fetchUrl(branch: string = group(this.job), ext = '.tbz'): string {
    return this.url('GET', this.prefixed(branch, ext), this.config.fetchTimeout).uri;
  }

  /**
   * Upload the current group's archive. Upload failures never fail the job.
   * @returns true when an upload was planned, false when the cache is unavailable
   */
  push(): boolean {
    if (!this.cacheAvailable) {
      core.info('Build cache unavailable, skipping push');
      return false;
    }

    const signed = this.pushRequest();
    // The push script runs in a fresh shell, without the setup script's environment
    this.sh.export(CLIENT_DIR_VAR, CLIENT_DIR);
    if (signed.headers) {
      this.writeHeaderFile(signed);
    }

    this.run('push', shellEscape(signed.uri), { assert: false, timing: true });
    return true;
  }

  pushUrl(branch: string = group(this.job)): string {
    return this.pushRequest(branch).uri;
  }

  /**
   * Register directories with the cache client, at most ADD_DIR_MAX per invocation
   * @returns number of planned invocations
   */
  add(...paths: Array<string | string[]>): number {
    if (!this.cacheAvailable) {
      core.info('Build cache unavailable, skipping add');
      return 0;
    }

    const dirs = paths.flat();
    let batches = 0;
    for (let i = 0; i < dirs.length; i += ADD_DIR_MAX) {
      this.run('add', dirs.slice(i, i + ADD_DIR_MAX));
      batches++;
    }
    return batches;
  }

  /**
   * Group instructions under the next cache.<n> log section
   */
  fold(message: string | undefined, block: () => void): void {
    this.foldCount++;

    this.sh.fold(`cache.${this.foldCount}`, () => {
      if (message) {
        this.sh.echo(message);
      }
      block();
    });
  }

  prefixed(branch: string | undefined, ext = PUSH_EXTENSION): string {
    return prefixed(this.job.repositoryId, branch, this.slug, ext);
  }

  /**
   * Distribution branch of the cache client: an explicit override, else the
   * edge or stable channel
   */
  clientBranch(): string {
    if (this.config.branchOverride) {
      return this.config.branchOverride;
    }
    return this.config.useEdgeClient ? CLIENT_EDGE_BRANCH : CLIENT_STABLE_BRANCH;
  }

  clientUrl(): string {
    return CLIENT_URL_TEMPLATE.replace('%s', this.clientBranch());
  }

  private debugFlags(): string | undefined {
    return this.config.debug ? `-v -w '${CURL_FORMAT}'` : undefined;
  }

  private pushRequest(branch: string = group(this.job)): SignedRequest {
    return this.url(
      'PUT',
      this.prefixed(branch, PUSH_EXTENSION),
      this.config.pushTimeout,
      this.config.requestHeaders
    );
  }

  private writeHeaderFile(signed: SignedRequest): void {
    this.sh.cmd(`cat /dev/null > ${CURL_HEADER_FILE}`, { echo: false, timing: false });
    for (const [name, value] of signed.headers ?? []) {
      const line = `header = "${name}: ${value}"`;
      this.sh.cmd(`echo ${shellEscape(line)} >> ${CURL_HEADER_FILE}`, {
        echo: false,
        timing: false,
      });
    }
  }

  private run(command: string, args: string | string[], options: CmdOptions = {}): void {
    const argv = Array.isArray(args) ? args : [args];
    this.sh.if(`-f ${CLIENT_BIN}`, () => {
      this.sh.cmd(`${CLIENT_BIN} ${command} ${argv.join(' ')}`, {
        ...options,
        echo: false,
        assert: false,
      });
    });
  }

  private url(verb: HttpVerb, path: string, expiresIn: number, headerMode = false): SignedRequest {
    return this.signer.sign({
      keyPair: this.keyPair(),
      verb,
      location: this.location(path),
      expiresIn,
      now: this.start,
      headerMode,
    });
  }

  private location(path: string): Location {
    return {
      scheme: this.config.scheme ?? DEFAULT_SCHEME,
      region: this.config.region ?? DEFAULT_REGION,
      bucket: this.config.bucket,
      path,
      hostStrategy: this.hostStrategy,
    };
  }

  private keyPair(): KeyPair {
    if (!this.keys) {
      this.keys = keyPair(this.config.accessKeyId, this.config.secretAccessKey);
    }
    return this.keys;
  }
}

/**
 * Create a directory cache planner bound to an emitter
 *
 * @example
 * ```typescript
 * const sh = createInstructionRecorder();
 * const cache = createDirectoryCache(sh, config, job, { slug: 'node-20' });
 * cache.setup();
 * const script = renderScript(sh.instructions);
 * ```
 */
export function createDirectoryCache(
  sh: ShellEmitter,
  config: CacheConfiguration,
  job: JobIdentity,
  options: DirectoryCacheOptions = {}
): DirectoryCache {
  return new DirectoryCache(sh, config, job, options);
}
