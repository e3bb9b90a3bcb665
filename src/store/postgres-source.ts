import pg from 'pg';
import { SourceError } from '../errors.js';
import { compileScanQuery } from '../adapters/postgres-adapter.js';
import type { EntityDescriptor } from '../model/types.js';
import type { CompiledQuery, Connection, DataSource } from '../types.js';
import { mapRow } from './row-mapper.js';

export interface PostgresSourceConfig {
  pool: pg.Pool;
}

async function* runQuery(client: pg.PoolClient, compiled: CompiledQuery): AsyncGenerator<Record<string, unknown>> {
  let result: pg.QueryResult<Record<string, unknown>>;
  try {
    result = await client.query<Record<string, unknown>>(compiled.text, compiled.params);
  } catch (err) {
    throw new SourceError(`Query failed: ${String(err)}`, err);
  }
  for (const row of result.rows) {
    yield mapRow(row, compiled.columns);
  }
}

/**
 * Data source over a `pg.Pool`. Each connection checks out one client and
 * runs compiled PostgreSQL on it.
 */
export class PostgresSource implements DataSource {
  readonly name = 'postgres';
  readonly dialect = 'postgres';
  private readonly pool: pg.Pool;

  constructor(config: PostgresSourceConfig) {
    this.pool = config.pool;
  }

  async connect(): Promise<Connection> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new SourceError(`Failed to acquire a connection: ${String(err)}`, err);
    }
    return {
      scan: (entity: EntityDescriptor) => runQuery(client, compileScanQuery(entity)),
      run: (compiled: CompiledQuery) => runQuery(client, compiled),
      async release(error?: Error): Promise<void> {
        // Passing the error makes pg destroy the client instead of pooling it
        client.release(error);
      },
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
