import * as core from '@actions/core';
import { createDirectoryCache } from './cache/directoryCache';
import { createInstructionRecorder } from './shell/instructionRecorder';
import { renderScript } from './shell/bashRenderer';
import { getInputs, getJobIdentity, getScriptPath } from './utils/actionUtils';
import { writeScript } from './utils/scriptWriter';
import { Outputs } from './constants';

export interface SetupResult {
  scriptPath: string;
  cacheAvailable: boolean;
}

export async function runSetup(start: Date = new Date()): Promise<SetupResult> {
  const inputs = getInputs();
  const job = getJobIdentity(inputs.defaultBranch);

  core.info(`Planning build cache setup for ${job.pullRequest ? `PR.${job.pullRequest}` : job.branch}`);
  core.info(`Cache store: ${inputs.config.store} (signature version ${inputs.config.signatureVersion})`);

  const sh = createInstructionRecorder();
  const cache = createDirectoryCache(sh, inputs.config, job, { slug: inputs.slug, start });
  cache.setup();

  const scriptPath = getScriptPath('setup');
  await writeScript(scriptPath, renderScript(sh.instructions));
  core.info(`Cache setup script written to ${scriptPath}`);

  core.setOutput(Outputs.ScriptPath, scriptPath);
  core.setOutput(Outputs.CacheAvailable, cache.cacheAvailable.toString());

  return { scriptPath, cacheAvailable: cache.cacheAvailable };
}
