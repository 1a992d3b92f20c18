import { launch } from './launcher.js';
import { BinaryNotFoundError } from './errors.js';
import type { LaunchOptions } from './types.js';

/**
 * Run the launcher and turn any failure to start into an exit status:
 * 127 when sandman2ctl is missing (as a shell would report it), 1 otherwise.
 */
export async function main(options: LaunchOptions = {}): Promise<number> {
  try {
    return await launch(options);
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    return err instanceof BinaryNotFoundError ? 127 : 1;
  }
}
