import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { resolveBinary } from '../src/binary.js';
import { BinaryNotFoundError } from '../src/errors.js';
import { createScratch, type Scratch } from './fixtures.js';

describe('resolveBinary', () => {
  let scratch: Scratch;

  beforeEach(() => {
    scratch = createScratch();
    vi.stubEnv('SANDMAN2CTL_BINARY', '');
    // Keep the PATH lookup away from any real install
    vi.stubEnv('PATH', scratch.dir);
    vi.spyOn(process, 'cwd').mockReturnValue(join(scratch.dir, 'project', 'src'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    scratch.cleanup();
  });

  it('should prefer an explicit executable path', () => {
    const bin = scratch.script('sandman2ctl', 'exit 0');
    expect(resolveBinary(bin)).toBe(bin);
  });

  it('should fall back to SANDMAN2CTL_BINARY', () => {
    const notExecutable = scratch.path('plain');
    writeFileSync(notExecutable, '');
    const bin = scratch.script('from-env', 'exit 0');
    vi.stubEnv('SANDMAN2CTL_BINARY', bin);

    expect(resolveBinary(notExecutable)).toBe(bin);
  });

  it('should find a virtualenv above the working directory', () => {
    mkdirSync(join(scratch.dir, 'project', '.venv', 'bin'), { recursive: true });
    const bin = scratch.script(join('project', '.venv', 'bin', 'sandman2ctl'), 'exit 0');

    expect(resolveBinary()).toBe(bin);
  });

  it('should list every place searched when nothing is found', () => {
    const missing = scratch.path('missing');
    vi.stubEnv('SANDMAN2CTL_BINARY', scratch.path('also-missing'));

    let error: unknown;
    try {
      resolveBinary(missing);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(BinaryNotFoundError);
    expect(error).toHaveProperty('searched', [
      `explicit: ${missing}`,
      `env SANDMAN2CTL_BINARY: ${scratch.path('also-missing')}`,
      `virtualenv walk from: ${join(scratch.dir, 'project', 'src')}`,
      'PATH lookup (which sandman2ctl)',
    ]);
    expect(error).toHaveProperty(
      'message',
      [
        'sandman2ctl not found. Searched:',
        `  - explicit: ${missing}`,
        `  - env SANDMAN2CTL_BINARY: ${scratch.path('also-missing')}`,
        `  - virtualenv walk from: ${join(scratch.dir, 'project', 'src')}`,
        '  - PATH lookup (which sandman2ctl)',
        '',
        'Set SANDMAN2CTL_BINARY env var or pass binaryPath option.',
      ].join('\n')
    );
  });
});
