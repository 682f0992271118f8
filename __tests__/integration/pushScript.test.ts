import * as core from '@actions/core';
import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runPush } from '../../src/pushImpl';
import { Inputs } from '../../src/constants';

jest.mock('@actions/core');
jest.mock('@actions/io');

describe('push script integration', () => {
  const mockCore = core as jest.Mocked<typeof core>;
  const originalEnv = process.env;
  let tempDir: string;
  let home: string;
  let callLog: string;

  // Stands in for the client the setup script installed in an earlier step
  const installFakeClient = (): void => {
    const bin = path.join(home, '.casher', 'bin');
    fs.mkdirSync(bin, { recursive: true });
    fs.writeFileSync(path.join(bin, 'casher'), '#!/bin/sh\necho "$@" >> "$HOME/calls.log"\n', {
      mode: 0o755,
    });
  };

  // A fresh process, like a new workflow step: nothing exported by earlier scripts
  const runInNewShell = (scriptPath: string): number | null =>
    spawnSync('bash', [scriptPath], {
      env: { HOME: home, PATH: originalEnv.PATH ?? '/usr/bin:/bin' },
      encoding: 'utf8',
    }).status;

  beforeEach(() => {
    jest.clearAllMocks();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'push-integration-'));
    home = path.join(tempDir, 'home');
    callLog = path.join(home, 'calls.log');
    fs.mkdirSync(home, { recursive: true });

    process.env = {
      ...originalEnv,
      GITHUB_REPOSITORY_ID: '12345',
      GITHUB_REF: 'refs/pull/42/merge',
      GITHUB_BASE_REF: 'develop',
    };
    const inputs: Record<string, string> = {
      [Inputs.Bucket]: 'test-bucket',
      [Inputs.AccessKeyId]: 'test-key-id',
      [Inputs.SecretAccessKey]: 'test-secret',
      [Inputs.ScriptDir]: path.join(tempDir, 'scripts'),
    };
    mockCore.getInput.mockImplementation((name: string) => inputs[name] ?? '');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('reaches the installed client from its own shell', async () => {
    installFakeClient();
    fs.mkdirSync(path.join(tempDir, 'scripts'), { recursive: true });

    const { scriptPath } = await runPush(new Date('2024-01-02T03:04:05Z'));

    expect(runInNewShell(scriptPath)).toBe(0);
    const calls = fs.readFileSync(callLog, 'utf8').trimEnd().split('\n');
    expect(calls).toHaveLength(1);
    expect(calls[0]).toMatch(
      /^push https:\/\/test-bucket\.s3\.amazonaws\.com\/12345\/PR\.42\.tgz\?X-Amz-Algorithm=AWS4-HMAC-SHA256&X-Amz-Credential=test-key-id%2F20240102%2Fus-east-1%2Fs3%2Faws4_request&/
    );
  });

  it('skips the upload quietly when no client was installed', async () => {
    fs.mkdirSync(path.join(tempDir, 'scripts'), { recursive: true });

    const { scriptPath } = await runPush(new Date('2024-01-02T03:04:05Z'));

    expect(runInNewShell(scriptPath)).toBe(0);
    expect(fs.existsSync(callLog)).toBe(false);
  });
});
