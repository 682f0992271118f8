import * as core from '@actions/core';
import { runSetup } from './setupImpl';

async function run(): Promise<void> {
  try {
    await runSetup();
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    core.setFailed(errorMessage);
  }
}

void run();
