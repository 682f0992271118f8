import * as core from '@actions/core';
import { createDirectoryCache } from './cache/directoryCache';
import { createInstructionRecorder } from './shell/instructionRecorder';
import { renderScript } from './shell/bashRenderer';
import { getInputs, getJobIdentity, getScriptPath } from './utils/actionUtils';
import { writeScript } from './utils/scriptWriter';
import { Outputs } from './constants';

export interface PushResult {
  scriptPath: string;
  scheduled: boolean;
}

export async function runPush(start: Date = new Date()): Promise<PushResult> {
  const inputs = getInputs();
  const job = getJobIdentity(inputs.defaultBranch);

  core.info(`Planning build cache push for ${job.pullRequest ? `PR.${job.pullRequest}` : job.branch}`);

  const sh = createInstructionRecorder();
  const cache = createDirectoryCache(sh, inputs.config, job, { slug: inputs.slug, start });
  const scheduled = cache.push();

  const scriptPath = getScriptPath('push');
  await writeScript(scriptPath, renderScript(sh.instructions));
  core.info(
    scheduled
      ? `Cache push script written to ${scriptPath}`
      : `No cache upload planned; script written to ${scriptPath}`
  );

  core.setOutput(Outputs.ScriptPath, scriptPath);
  core.setOutput(Outputs.PushScheduled, scheduled.toString());

  return { scriptPath, scheduled };
}
