export interface DatabaseConfig {
  /** Engine family, e.g. 'mssql' or 'sqlite' */
  type: string;
  /** Driver suffix appended to the scheme, e.g. 'pymssql' */
  driver: string;
  username: string;
  password: string;
  host: string;
  port: string;
  /** Database name, or a file path for SQLite */
  database: string;
}

export type PrimaryKeyType = 'string' | 'int' | 'float';

export interface ViewSpec {
  name: string;
  primaryKey: string;
  primaryKeyType: PrimaryKeyType;
}

export interface SandmanOptions {
  /** Database URI, or the parts to build one from */
  database?: string | DatabaseConfig;
  /** Address to bind to (default: '127.0.0.1') */
  host?: string;
  /** Port to listen on (default: 0 for auto-assign) */
  port?: number;
  /** Only allow GET on every resource */
  readOnly?: boolean;
  /** Named schema to reflect instead of the default */
  schema?: string;
  /** Views to expose, with their declared primary keys */
  views?: ViewSpec[];
  debug?: boolean;
  /** Appended verbatim after the generated flags */
  extraArgs?: string[];
  /** Explicit path to the sandman2ctl executable */
  binaryPath?: string;
  /** Startup timeout in milliseconds (default: 10000) */
  startupTimeout?: number;
  /** Graceful shutdown timeout in milliseconds (default: 5000) */
  shutdownTimeout?: number;
}

export interface LaunchOptions {
  /** Environment to read configuration from and pass to the child */
  env?: NodeJS.ProcessEnv;
  binaryPath?: string;
}

export interface LaunchCommand {
  uri: string;
  args: string[];
}
