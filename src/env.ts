import type { DatabaseConfig } from './types.js';

// Unset variables read as '', the way an unquoted $VAR expands.
function read(env: NodeJS.ProcessEnv, key: string): string {
  return env[key] ?? '';
}

export function readDatabaseConfig(
  env: NodeJS.ProcessEnv = process.env
): DatabaseConfig {
  return {
    type: read(env, 'DB_TYPE'),
    driver: read(env, 'DB_DRIVER'),
    username: read(env, 'USERNAME'),
    password: read(env, 'PASSWORD'),
    host: read(env, 'DB_HOST'),
    port: read(env, 'DB_PORT'),
    database: read(env, 'DATABASE'),
  };
}

/**
 * Field splitting with the default IFS. Quotes and backslashes are ordinary
 * characters here.
 */
export function splitWords(value: string): string[] {
  return value.split(/[ \t\n]+/).filter((word) => word.length > 0);
}

export function readPassThroughArgs(
  env: NodeJS.ProcessEnv = process.env
): string[] {
  return splitWords(read(env, 'ARGS'));
}
