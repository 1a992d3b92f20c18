export { Sandman } from './sandman.js';
export { launch, exitStatus } from './launcher.js';
export { main } from './main.js';
export { buildLaunchCommand } from './command.js';
export { buildDatabaseUri, isSqlite } from './uri.js';
export { readDatabaseConfig, readPassThroughArgs, splitWords } from './env.js';
export { buildServerArgs, isLoopbackHost } from './args.js';
export { parseViewSpecs, formatViewSpecs } from './views.js';
export { resolveBinary } from './binary.js';
export {
  LauncherError,
  BinaryNotFoundError,
  LaunchError,
  StartupError,
} from './errors.js';
export { createTestServer, createTestHelper, useSandman } from './testing.js';
export type {
  DatabaseConfig,
  SandmanOptions,
  LaunchOptions,
  LaunchCommand,
  ViewSpec,
  PrimaryKeyType,
} from './types.js';
export type { ServerArgsOptions } from './args.js';
export type { TestServer, TestHelper } from './testing.js';
