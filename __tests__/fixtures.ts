import { chmodSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export interface Scratch {
  dir: string;
  path: (name: string) => string;
  /** Write an executable shell script standing in for sandman2ctl. */
  script: (name: string, body: string) => string;
  cleanup: () => void;
}

export function createScratch(): Scratch {
  const dir = mkdtempSync(join(tmpdir(), 'sandman-launcher-'));
  return {
    dir,
    path: (name) => join(dir, name),
    script: (name, body) => {
      const file = join(dir, name);
      writeFileSync(file, `#!/bin/sh\n${body}\n`);
      chmodSync(file, 0o755);
      return file;
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/**
 * Records its arguments, announces itself on the port it was given
 * ($3, after the URI and --port), then idles until SIGTERM.
 */
export function serverScript(argsFile: string, afterBanner = ''): string {
  return [
    `trap 'kill $pid 2>/dev/null; exit 0' TERM`,
    'sleep 60 &',
    'pid=$!',
    `printf '%s\\n' "$@" > '${argsFile}'`,
    `echo " * Running on http://127.0.0.1:$3/ (Press CTRL+C to quit)" >&2`,
    afterBanner,
    'wait $pid',
  ].join('\n');
}
