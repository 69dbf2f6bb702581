import { spawn } from 'child_process';
import { LogType } from './log';
import { Manifest } from './manifest';

/** Runs a shell command and resolves with its exit code */
export type ShellExec = (command: string) => Promise<number>;

export const shellExec: ShellExec = (command) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, { shell: true, stdio: 'inherit' });
    child.on('error', reject);
    child.on('close', (code, signal) => {
      if (code != null) return resolve(code);
      reject(new Error(`Script terminated by ${signal ?? 'unknown signal'}`));
    });
  });
};

/**
 * Run `scripts[name]` from the manifest.
 *
 * An unknown script is not an error, the available names are listed instead.
 */
export async function runScript(
  manifest: Manifest,
  name: string | undefined,
  logger: LogType,
  exec: ShellExec = shellExec,
): Promise<number> {
  const command = name != null && Object.hasOwn(manifest.scripts, name) ? manifest.scripts[name] : undefined;
  if (name == null || command == null) {
    const available = Object.keys(manifest.scripts);
    logger.info({ script: name ?? null, available }, 'Script:NotFound');
    for (const script of available) logger.info({ script }, `zoo run ${script}`);
    return 0;
  }

  logger.info({ script: name, command }, 'Script:Start');
  const exitCode = await exec(command);
  if (exitCode === 0) logger.info({ script: name }, 'Script:Done');
  else logger.error({ script: name, exitCode }, 'Script:Failed');
  return exitCode;
}
