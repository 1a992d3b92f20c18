import { accessSync, constants } from 'node:fs';
import { resolve, join } from 'node:path';
import { execFileSync } from 'node:child_process';
import { BinaryNotFoundError } from './errors.js';

const BINARY_NAME = 'sandman2ctl';
const VIRTUALENV_DIRS = ['.venv', 'venv'];

interface Source {
  /** Shown in the not-found message. */
  describe: () => string;
  find: () => string | null;
}

function executable(filePath: string): string | null {
  try {
    accessSync(filePath, constants.X_OK);
    return filePath;
  } catch {
    return null;
  }
}

function fromVirtualenvs(startDir: string): string | null {
  for (let dir = startDir; ; ) {
    for (const venv of VIRTUALENV_DIRS) {
      const found = executable(join(dir, venv, 'bin', BINARY_NAME));
      if (found) return found;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

function fromPath(): string | null {
  try {
    const result = execFileSync('which', [BINARY_NAME], {
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();
    return result || null;
  } catch {
    return null;
  }
}

/**
 * Locate sandman2ctl: the explicit path, then SANDMAN2CTL_BINARY, then a
 * virtualenv in the working directory or any parent, then PATH.
 */
export function resolveBinary(explicitPath?: string): string {
  const sources: Source[] = [];

  if (explicitPath) {
    const path = resolve(explicitPath);
    sources.push({ describe: () => `explicit: ${path}`, find: () => executable(path) });
  }

  const envPath = process.env.SANDMAN2CTL_BINARY;
  if (envPath) {
    const path = resolve(envPath);
    sources.push({
      describe: () => `env SANDMAN2CTL_BINARY: ${path}`,
      find: () => executable(path),
    });
  }

  const cwd = process.cwd();
  sources.push(
    { describe: () => `virtualenv walk from: ${cwd}`, find: () => fromVirtualenvs(cwd) },
    { describe: () => `PATH lookup (which ${BINARY_NAME})`, find: fromPath }
  );

  for (const source of sources) {
    const found = source.find();
    if (found) return found;
  }
  throw new BinaryNotFoundError(sources.map((source) => source.describe()));
}
