import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import { resolveBinary } from './binary.js';
import { buildLaunchCommand } from './command.js';
import { LaunchError } from './errors.js';
import type { LaunchOptions } from './types.js';

const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/** Shell convention: the exit code, or 128 + n when signal n ended the child. */
export function exitStatus(
  code: number | null,
  signal: NodeJS.Signals | null
): number {
  if (code !== null) return code;
  if (signal !== null) {
    const entry: [string, number] | undefined = Object.entries(
      constants.signals
    ).find(([name]) => name === signal);
    if (entry) return 128 + entry[1];
  }
  return 1;
}

/**
 * Run sandman2ctl against the database described by the environment and
 * wait for it to exit. Output goes straight to this process's stdio, and
 * termination signals are passed on to the child.
 *
 * Resolves to the child's exit status.
 */
export async function launch(options: LaunchOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const { args } = buildLaunchCommand(env);
  const binaryPath = resolveBinary(options.binaryPath);

  const child = spawn(binaryPath, args, { env, stdio: 'inherit' });

  const forward = (signal: NodeJS.Signals) => {
    child.kill(signal);
  };
  for (const signal of FORWARDED_SIGNALS) {
    process.on(signal, forward);
  }
  const detach = () => {
    for (const signal of FORWARDED_SIGNALS) {
      process.off(signal, forward);
    }
  };

  return new Promise<number>((resolve, reject) => {
    let settled = false;

    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      detach();
      reject(
        new LaunchError(`Failed to spawn sandman2ctl: ${err.message}`, binaryPath)
      );
    });

    child.on('exit', (code, signal) => {
      if (settled) return;
      settled = true;
      detach();
      resolve(exitStatus(code, signal));
    });
  });
}
