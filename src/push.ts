import * as core from '@actions/core';
import { runPush } from './pushImpl';

async function run(): Promise<void> {
  try {
    await runPush();
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    core.setFailed(errorMessage);
  }
}

void run();
