import pg from 'pg';
import { FormsClient, LruCache, PostgresResultCache } from '../../src/index.js';
import type { ResultCache } from '../../src/index.js';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { everythingForm } from './forms.js';
import { buildServer } from './api/server.js';
import { shutdown } from './shutdown.js';

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

let cache: ResultCache;
let pgCache: PostgresResultCache | undefined;
if (config.databaseUrl !== undefined) {
  pgCache = new PostgresResultCache({ pool: new pg.Pool({ connectionString: config.databaseUrl }) });
  await pgCache.initializeSchema();
  cache = pgCache;
} else {
  cache = new LruCache({ maxSize: 500 });
}

const client = new FormsClient({
  cache,
  ...(config.accessToken !== undefined ? { accessToken: config.accessToken } : {}),
});

const app = buildServer(client, { template: everythingForm(config.apiUrl), ref: config.ref });

try {
  await app.listen({ port: config.port, host: '0.0.0.0' });
} catch (err) {
  app.log.error(err);
  await pgCache?.close();
  process.exit(1);
}

process.on('SIGTERM', async () => {
  if (!(await shutdown(app, [pgCache]))) process.exitCode = 1;
});
