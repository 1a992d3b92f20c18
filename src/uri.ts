import type { DatabaseConfig } from './types.js';

export function isSqlite(type: string): boolean {
  return type === 'sqlite';
}

/**
 * Format a SQLAlchemy-style connection URI. Values are inserted as given:
 * nothing is escaped, checked or defaulted.
 *
 * SQLite URIs carry no host or credentials, and the path after `:////` is
 * always absolute.
 */
export function buildDatabaseUri(config: DatabaseConfig): string {
  const scheme = `${config.type}+${config.driver}`;
  if (isSqlite(config.type)) {
    return `${scheme}:////${config.database.replace(/^\/+/, '')}`;
  }
  return `${scheme}://${config.username}:${config.password}@${config.host}:${config.port}/${config.database}`;
}
