import { MemorySource, PostgresAdapter, QueryEngine, type DataSource } from 'fluent-query';
import { createRegistry } from '../../src/schema.js';
import { loadSeed } from '../../src/store.js';
import { buildServer } from '../../src/api/server.js';

export const registry = createRegistry();

export async function makeSeedEngine(): Promise<QueryEngine> {
  return new QueryEngine({ registry, source: new MemorySource(await loadSeed()) });
}

export async function makeApp(engine?: QueryEngine) {
  return buildServer(engine ?? (await makeSeedEngine()), { logger: false });
}

/** A postgres-dialect source that fails if anything tries to connect. */
export const offlinePostgres: DataSource = {
  name: 'postgres',
  dialect: 'postgres',
  connect: async () => {
    throw new Error('offline');
  },
};

export function makeSqlEngine(): QueryEngine {
  return new QueryEngine({ registry, source: offlinePostgres, adapter: new PostgresAdapter(registry) });
}
