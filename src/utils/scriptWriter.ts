import * as io from '@actions/io';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Write a rendered script, creating its directory first
 */
export async function writeScript(scriptPath: string, script: string): Promise<void> {
  await io.mkdirP(path.dirname(scriptPath));
  fs.writeFileSync(scriptPath, script, { mode: 0o755 });
}
