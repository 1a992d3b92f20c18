import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { chmodSync, readFileSync, writeFileSync } from 'node:fs';
import { main } from '../src/main.js';
import { createScratch, type Scratch } from './fixtures.js';

const env = {
  DB_TYPE: 'sqlite',
  DB_DRIVER: 'pysqlite',
  DATABASE: '/srv/app.db',
};

describe('main', () => {
  let scratch: Scratch;
  let errors: unknown[];

  beforeEach(() => {
    scratch = createScratch();
    errors = [];
    vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
      errors.push(message);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    scratch.cleanup();
  });

  it('should return the exit status of sandman2ctl', async () => {
    const bin = scratch.script('sandman2ctl', 'exit 7');
    await expect(main({ binaryPath: bin, env })).resolves.toBe(7);
    expect(errors).toEqual([]);
  });

  it('should ignore its own command line', async () => {
    const argsFile = scratch.path('args.txt');
    const bin = scratch.script(
      'sandman2ctl',
      `printf '%s\\n' "$@" > '${argsFile}'`
    );
    const argv = process.argv;
    process.argv = [...argv, '--read-only', 'extra'];
    try {
      await main({ binaryPath: bin, env: { ...env, ARGS: '--debug' } });
    } finally {
      process.argv = argv;
    }

    expect(readFileSync(argsFile, 'utf-8')).toBe(
      'sqlite+pysqlite:////srv/app.db\n--debug\n'
    );
  });

  it('should return 127 when sandman2ctl cannot be found', async () => {
    vi.stubEnv('SANDMAN2CTL_BINARY', '');
    vi.stubEnv('PATH', scratch.dir);
    vi.spyOn(process, 'cwd').mockReturnValue(scratch.dir);

    await expect(
      main({ binaryPath: scratch.path('missing'), env })
    ).resolves.toBe(127);
    expect(errors).toHaveLength(1);
    expect(String(errors[0])).toMatch(/^sandman2ctl not found\. Searched:\n/);
  });

  it('should return 1 when sandman2ctl cannot be spawned', async () => {
    const broken = scratch.path('sandman2ctl');
    writeFileSync(broken, '#!/nonexistent/interpreter\n');
    chmodSync(broken, 0o755);

    await expect(main({ binaryPath: broken, env })).resolves.toBe(1);
    expect(errors).toHaveLength(1);
    expect(String(errors[0])).toMatch(/^Failed to spawn sandman2ctl: /);
  });
});
