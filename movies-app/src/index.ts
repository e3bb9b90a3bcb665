import { buildServer } from './api/server.js';
import { createRegistry } from './schema.js';
import { createStore } from './store.js';

const DATABASE_URL = process.env['DATABASE_URL'];
const PORT = parseInt(process.env['PORT'] ?? '3000', 10);
const QUERY_TIMEOUT_MS = parseInt(process.env['QUERY_TIMEOUT_MS'] ?? '', 10);

const registry = createRegistry();
const store = await createStore(registry, {
  databaseUrl: DATABASE_URL === '' ? undefined : DATABASE_URL,
  timeoutMs: Number.isFinite(QUERY_TIMEOUT_MS) ? QUERY_TIMEOUT_MS : undefined,
  logQueries: process.env['LOG_QUERIES'] === '1',
});

if (DATABASE_URL === undefined || DATABASE_URL === '') {
  console.warn('DATABASE_URL is not set; serving the bundled seed data from memory');
}

const app = buildServer(store.engine);

try {
  await app.listen({ port: PORT, host: '0.0.0.0' });
} catch (err) {
  app.log.error(err);
  await store.close();
  process.exit(1);
}

process.on('SIGTERM', async () => {
  await app.close();
  await store.close();
});
