import { formatViewSpecs } from './views.js';
import type { SandmanOptions } from './types.js';

const LOOPBACK_HOSTS = new Set(['127.0.0.1', 'localhost', '::1']);

export function isLoopbackHost(host: string): boolean {
  return LOOPBACK_HOSTS.has(host);
}

export type ServerArgsOptions = Pick<
  SandmanOptions,
  'host' | 'readOnly' | 'schema' | 'views' | 'debug' | 'extraArgs'
> & { port: number };

/**
 * Translate server options into sandman2ctl flags. The tool only knows
 * "all interfaces" or "localhost only", so any loopback host selects
 * --local-only.
 */
export function buildServerArgs(options: ServerArgsOptions): string[] {
  const args = ['--port', String(options.port)];
  if (options.host !== undefined && isLoopbackHost(options.host)) {
    args.push('--local-only');
  }
  if (options.readOnly) args.push('--read-only');
  if (options.schema) args.push('--schema', options.schema);
  if (options.debug) args.push('--debug');
  if (options.views && options.views.length > 0) {
    args.push('-v', formatViewSpecs(options.views));
  }
  return [...args, ...(options.extraArgs ?? [])];
}
