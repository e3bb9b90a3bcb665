import { describe, it, expect, vi } from 'vitest';
import pg from 'pg';
import { PostgresSource } from '../../src/store/postgres-source.js';
import { SourceError } from '../../src/errors.js';
import type { CompiledQuery } from '../../src/types.js';
import { Director } from './helpers.js';

// Helper to create a mock pool whose client answers every query with `rows`
function makeMockPool(rows: object[]) {
  const client = {
    query: vi.fn().mockResolvedValue({ rows, rowCount: rows.length }),
    release: vi.fn(),
  };
  const pool = {
    connect: vi.fn().mockResolvedValue(client),
    end: vi.fn().mockResolvedValue(undefined),
  };
  return { pool, client };
}

async function drain(rows: AsyncIterable<Record<string, unknown>>): Promise<Record<string, unknown>[]> {
  const out: Record<string, unknown>[] = [];
  for await (const row of rows) out.push(row);
  return out;
}

describe('PostgresSource', () => {
  it('advertises the postgres dialect', () => {
    const { pool } = makeMockPool([]);
    const source = new PostgresSource({ pool: pool as unknown as pg.Pool });
    expect(source.name).toBe('postgres');
    expect(source.dialect).toBe('postgres');
  });

  it('does not check out a client before connect()', () => {
    const { pool } = makeMockPool([]);
    new PostgresSource({ pool: pool as unknown as pg.Pool });
    expect(pool.connect).not.toHaveBeenCalled();
  });

  it('run() sends the compiled text and params and maps rows', async () => {
    const { pool, client } = makeMockPool([{ key: 'Heat', n: '2' }]);
    const connection = await new PostgresSource({ pool: pool as unknown as pg.Pool }).connect();
    const compiled: CompiledQuery = {
      text: 'SELECT 1',
      params: [2000],
      columns: [
        { path: 'key', type: 'string' },
        { path: 'n', type: 'number', aggregate: 'count' },
      ],
    };
    expect(connection.run).toBeDefined();
    const rows = await drain(connection.run!(compiled));
    expect(client.query).toHaveBeenCalledWith('SELECT 1', [2000]);
    expect(rows).toEqual([{ key: 'Heat', n: 2 }]);
  });

  it('scan() reads every declared field of the entity table', async () => {
    const { pool, client } = makeMockPool([{ id: 1, Name: 'Dora' }]);
    const connection = await new PostgresSource({ pool: pool as unknown as pg.Pool }).connect();
    const rows = await drain(connection.scan(Director));
    expect(client.query).toHaveBeenCalledWith('SELECT "id" AS "id", "Name" AS "Name"\nFROM "Director"', []);
    expect(rows).toEqual([{ id: 1, Name: 'Dora' }]);
  });

  it('wraps query failures in SourceError with the cause', async () => {
    const { pool, client } = makeMockPool([]);
    const cause = new Error('relation "Director" does not exist');
    client.query.mockRejectedValueOnce(cause);
    const connection = await new PostgresSource({ pool: pool as unknown as pg.Pool }).connect();
    const failure = await drain(connection.scan(Director)).catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(SourceError);
    expect(failure).toMatchObject({ cause });
  });

  it('wraps connect failures in SourceError', async () => {
    const { pool } = makeMockPool([]);
    pool.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const source = new PostgresSource({ pool: pool as unknown as pg.Pool });
    await expect(source.connect()).rejects.toBeInstanceOf(SourceError);
  });

  it('release() hands the error to pg so a failed client is destroyed', async () => {
    const { pool, client } = makeMockPool([]);
    const connection = await new PostgresSource({ pool: pool as unknown as pg.Pool }).connect();
    const error = new Error('boom');
    await connection.release(error);
    expect(client.release).toHaveBeenCalledWith(error);
  });

  it('close() ends the pool', async () => {
    const { pool } = makeMockPool([]);
    await new PostgresSource({ pool: pool as unknown as pg.Pool }).close();
    expect(pool.end).toHaveBeenCalledTimes(1);
  });
});
