/**
 * Expose a database view, which has no primary key of its own, by
 * declaring one.
 *
 * Run: DB_USER=... DB_PASS=... npx tsx examples/views.ts
 */
import { Sandman, parseViewSpecs } from '../src/index.js';

async function main() {
  const server = new Sandman({
    database: {
      type: 'mssql',
      driver: 'pymssql',
      username: process.env.DB_USER ?? '',
      password: process.env.DB_PASS ?? '',
      host: process.env.DB_HOST ?? 'localhost',
      port: process.env.DB_PORT ?? '1433',
      database: process.env.DATABASE ?? 'reporting',
    },
    host: '0.0.0.0',
    views: parseViewSpecs('LatestResults/user_id/int'),
  });
  await server.start();
  console.log(`sandman2 started at ${server.url}`);

  const res = await fetch(`${server.url}/latestresults/`);
  console.log('Rows:', await res.json());

  await server.stop();
}

main().catch(console.error);
