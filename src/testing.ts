import { Sandman } from './sandman.js';
import type { SandmanOptions } from './types.js';

export interface TestServer {
  server: Sandman;
  url: string;
  uri: string;
  port: number;
  stop: () => Promise<void>;
}

/**
 * Create a test server over an in-memory SQLite database.
 * Returns a started server ready for requests.
 */
export async function createTestServer(
  options?: SandmanOptions
): Promise<TestServer> {
  const server = new Sandman({
    database: 'sqlite+pysqlite:///:memory:',
    ...options,
  });
  await server.start();
  return {
    server,
    url: server.url,
    uri: server.getUri(),
    port: server.port,
    stop: () => server.stop(),
  };
}

export interface TestHelper {
  url: string;
  uri: string;
  port: number;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

/**
 * Create a test helper for use in beforeAll/afterAll hooks.
 */
export function createTestHelper(options?: SandmanOptions): TestHelper {
  const server = new Sandman({
    database: 'sqlite+pysqlite:///:memory:',
    ...options,
  });

  return {
    get url() {
      return server.url;
    },
    get uri() {
      return server.getUri();
    },
    get port() {
      return server.port;
    },
    start: () => server.start(),
    stop: () => server.stop(),
  };
}

type Hook = (fn: () => Promise<void>) => void;

function globalHook(name: 'beforeAll' | 'afterAll'): Hook | undefined {
  const value: unknown = Reflect.get(globalThis, name);
  if (typeof value !== 'function') return undefined;
  return (fn) => {
    Reflect.apply(value, globalThis, [fn]);
  };
}

/**
 * Vitest/Jest-style hook that starts a server before all tests
 * and stops it after all tests.
 *
 * Usage:
 *   const helper = useSandman({ readOnly: true });
 *   test('...', async () => {
 *     const res = await fetch(`${helper.url}/`);
 *   });
 */
export function useSandman(
  options?: SandmanOptions,
  hooks?: {
    beforeAll: Hook;
    afterAll: Hook;
  }
): TestHelper {
  const helper = createTestHelper(options);

  const ba = hooks?.beforeAll ?? globalHook('beforeAll');
  const aa = hooks?.afterAll ?? globalHook('afterAll');

  if (ba && aa) {
    ba(() => helper.start());
    aa(() => helper.stop());
  }

  return helper;
}

export { Sandman } from './sandman.js';
export type { SandmanOptions } from './types.js';
