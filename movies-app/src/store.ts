import { readFile } from 'node:fs/promises';
import pg from 'pg';
import {
  MemorySource,
  PostgresAdapter,
  PostgresSource,
  QueryEngine,
  logQueries,
  type Collections,
  type DataSource,
  type EntityRegistry,
} from 'fluent-query';
import { applySchema } from './db/schema.js';

export interface MoviesConfig {
  /** When unset the bundled seed data is served from memory. */
  databaseUrl?: string | undefined;
  timeoutMs?: number | undefined;
  logQueries?: boolean;
}

const SEED_URL = new URL('./data/seed.json', import.meta.url);

function isRowList(value: unknown): value is Record<string, unknown>[] {
  return Array.isArray(value) && value.every((row) => typeof row === 'object' && row !== null && !Array.isArray(row));
}

function isCollections(value: unknown): value is Collections {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((rows) => isRowList(rows))
  );
}

export async function loadSeed(): Promise<Collections> {
  const parsed: unknown = JSON.parse(await readFile(SEED_URL, 'utf8'));
  if (!isCollections(parsed)) {
    throw new Error(`${SEED_URL.pathname} must map entity names to arrays of rows`);
  }
  return parsed;
}

export interface MoviesStore {
  readonly engine: QueryEngine;
  /** Ends the database pool, if there is one. */
  close(): Promise<void>;
}

export type PoolFactory = (connectionString: string) => pg.Pool;

const defaultPool: PoolFactory = (connectionString) => new pg.Pool({ connectionString });

/**
 * Wires the engine for the app. Without a database URL the seed data is
 * served from memory; with one, the tables are created and queries are
 * compiled to PostgreSQL.
 */
export async function createStore(
  registry: EntityRegistry,
  config: MoviesConfig,
  makePool: PoolFactory = defaultPool,
): Promise<MoviesStore> {
  const timeout = config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {};
  const logged = (source: DataSource): DataSource => (config.logQueries === true ? logQueries(source) : source);

  if (config.databaseUrl === undefined) {
    const source = logged(new MemorySource(await loadSeed()));
    return { engine: new QueryEngine({ registry, source, ...timeout }), close: async () => {} };
  }

  const pool = makePool(config.databaseUrl);
  const postgres = new PostgresSource({ pool });
  try {
    const client = await pool.connect();
    try {
      await applySchema(client);
    } finally {
      client.release();
    }
  } catch (err) {
    await postgres.close();
    throw err;
  }

  const engine = new QueryEngine({
    registry,
    source: logged(postgres),
    adapter: new PostgresAdapter(registry),
    ...timeout,
  });
  return { engine, close: () => postgres.close() };
}
