import { readDatabaseConfig, readPassThroughArgs } from './env.js';
import { buildDatabaseUri } from './uri.js';
import type { LaunchCommand } from './types.js';

export function buildLaunchCommand(
  env: NodeJS.ProcessEnv = process.env
): LaunchCommand {
  const uri = buildDatabaseUri(readDatabaseConfig(env));
  return { uri, args: [uri, ...readPassThroughArgs(env)] };
}
