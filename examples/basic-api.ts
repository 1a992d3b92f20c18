/**
 * Serve a SQLite file over REST and list the generated resources.
 *
 * Requires sandman2 installed in a virtualenv or on PATH.
 * Run: npx tsx examples/basic-api.ts ./chinook.db
 */
import { Sandman } from '../src/index.js';

async function main() {
  const server = new Sandman({
    database: {
      type: 'sqlite',
      driver: 'pysqlite',
      username: '',
      password: '',
      host: '',
      port: '',
      database: process.argv[2] ?? '/tmp/example.db',
    },
    readOnly: true,
  });
  await server.start();
  console.log(`sandman2 started at ${server.url}`);
  console.log(`Database URI: ${server.getUri()}`);

  // The root route maps each resource name to its URL template
  const res = await fetch(`${server.url}/`);
  console.log('Resources:', await res.json());

  await server.stop();
  console.log('Server stopped.');
}

main().catch(console.error);
