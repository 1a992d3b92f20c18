import { spawn, type ChildProcess } from 'node:child_process';
import { createServer } from 'node:net';
import { EventEmitter } from 'node:events';
import { resolveBinary } from './binary.js';
import { buildServerArgs } from './args.js';
import { buildDatabaseUri } from './uri.js';
import { LauncherError, StartupError } from './errors.js';
import type { SandmanOptions, ViewSpec, DatabaseConfig } from './types.js';

const DEFAULT_DATABASE = 'sqlite+pysqlite:///:memory:';

/** Bind port 0 on `host` and hand back whatever the OS picked. */
async function pickPort(host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = createServer();
    probe.once('error', (err) => {
      reject(new StartupError(`Cannot bind ${host}: ${err.message}`));
    });
    probe.listen(0, host, () => {
      const addr = probe.address();
      probe.close(() => {
        if (addr && typeof addr === 'object') {
          resolve(addr.port);
        } else {
          reject(new StartupError(`No port assigned on ${host}`));
        }
      });
    });
  });
}

function parseAnnouncedUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

interface ResolvedOptions {
  database: string | DatabaseConfig;
  host: string;
  port: number;
  readOnly: boolean;
  schema: string | undefined;
  views: ViewSpec[];
  debug: boolean;
  extraArgs: string[];
  binaryPath: string | undefined;
  startupTimeout: number;
  shutdownTimeout: number;
}

/**
 * A sandman2ctl server owned by this process. The REST API it serves is
 * generated by the tool from the database schema; this class only manages
 * the process.
 */
export class Sandman extends EventEmitter {
  private opts: ResolvedOptions;
  private process: ChildProcess | null = null;
  private starting = false;
  private _port: number | null = null;
  private _url: string | null = null;
  private _started = false;
  private stderrOutput = '';

  constructor(options: SandmanOptions = {}) {
    super();
    this.opts = {
      database: options.database ?? DEFAULT_DATABASE,
      host: options.host ?? '127.0.0.1',
      port: options.port ?? 0,
      readOnly: options.readOnly ?? false,
      schema: options.schema,
      views: options.views ?? [],
      debug: options.debug ?? false,
      extraArgs: options.extraArgs ?? [],
      binaryPath: options.binaryPath,
      startupTimeout: options.startupTimeout ?? 10_000,
      shutdownTimeout: options.shutdownTimeout ?? 5_000,
    };
  }

  get port(): number {
    if (this._port === null) {
      throw new LauncherError('Server not started. Call start() first.');
    }
    return this._port;
  }

  /** Base URL of the generated API, as announced by the server. */
  get url(): string {
    if (this._url === null) {
      throw new LauncherError('Server not started. Call start() first.');
    }
    return this._url;
  }

  get started(): boolean {
    return this._started;
  }

  /** Stderr written before the server announced itself. */
  get startupOutput(): string {
    return this.stderrOutput;
  }

  getUri(): string {
    const { database } = this.opts;
    return typeof database === 'string' ? database : buildDatabaseUri(database);
  }

  async start(): Promise<void> {
    if (this.starting || this._started || this.process) {
      throw new LauncherError('Server already started.');
    }
    this.starting = true;
    try {
      await this.spawnAndWait();
    } finally {
      this.starting = false;
    }
  }

  private async spawnAndWait(): Promise<void> {
    const binaryPath = resolveBinary(this.opts.binaryPath);
    const port =
      this.opts.port === 0 ? await pickPort(this.opts.host) : this.opts.port;
    const args = [
      this.getUri(),
      ...buildServerArgs({
        port,
        host: this.opts.host,
        readOnly: this.opts.readOnly,
        schema: this.opts.schema,
        views: this.opts.views,
        debug: this.opts.debug,
        extraArgs: this.opts.extraArgs,
      }),
    ];

    const child = spawn(binaryPath, args, {
      env: process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    this.process = child;
    this.stderrOutput = '';

    return new Promise<void>((resolve, reject) => {
      let ready = false;
      let failed = false;
      let output = '';

      const fail = (error: StartupError) => {
        if (ready || failed) return;
        failed = true;
        clearTimeout(timeout);
        child.kill('SIGKILL');
        if (this.process === child) this.process = null;
        reject(error);
      };

      // Werkzeug prints its banner on stderr; older releases used stdout.
      const onOutput = (chunk: Buffer) => {
        if (ready || failed) return;
        output += chunk.toString();
        const match = output.match(/Running on (https?:\/\/\S+)/);
        if (!match) return;
        const announced = parseAnnouncedUrl(match[1]);
        if (!announced) {
          fail(
            new StartupError(
              `sandman2ctl announced an invalid address: ${match[1]}`,
              this.stderrOutput
            )
          );
          return;
        }
        clearTimeout(timeout);
        ready = true;
        this._port = announced.port ? parseInt(announced.port, 10) : port;
        this._url = announced.origin;
        this._started = true;
        resolve();
      };

      const timeout = setTimeout(() => {
        fail(
          new StartupError(
            `sandman2ctl failed to start within ${this.opts.startupTimeout}ms`,
            this.stderrOutput
          )
        );
      }, this.opts.startupTimeout);

      child.stdout?.on('data', (chunk: Buffer) => {
        this.emit('stdout', chunk.toString());
        onOutput(chunk);
      });

      child.stderr?.on('data', (chunk: Buffer) => {
        // Only startup output is kept; request logs would grow without bound.
        if (!ready) this.stderrOutput += chunk.toString();
        this.emit('stderr', chunk.toString());
        onOutput(chunk);
      });

      child.on('error', (err) => {
        fail(new StartupError(`Failed to spawn sandman2ctl: ${err.message}`));
      });

      child.on('exit', (code) => {
        if (this.process === child) this.process = null;
        if (!ready) {
          fail(
            new StartupError(
              `sandman2ctl exited with code ${code} during startup`,
              this.stderrOutput
            )
          );
          return;
        }
        this._started = false;
        this._port = null;
        this._url = null;
        this.emit('exit', code);
      });
    });
  }

  /** SIGTERM, then SIGKILL after `shutdownTimeout`; resolves once the process is gone. */
  async stop(): Promise<void> {
    const child = this.process;
    if (!this._started || !child) {
      return;
    }

    return new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        child.kill('SIGKILL');
      }, this.opts.shutdownTimeout);

      child.once('exit', () => {
        clearTimeout(timeout);
        resolve();
      });

      child.kill('SIGTERM');
    });
  }
}
