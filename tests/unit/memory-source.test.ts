import { describe, it, expect } from 'vitest';
import { MemorySource } from '../../src/store/memory-source.js';
import { SourceError } from '../../src/errors.js';
import type { DataSource } from '../../src/types.js';
import { Director, Movie } from './helpers.js';

async function drain(rows: AsyncIterable<Record<string, unknown>>): Promise<Record<string, unknown>[]> {
  const out: Record<string, unknown>[] = [];
  for await (const row of rows) out.push(row);
  return out;
}

describe('MemorySource', () => {
  it('has no dialect', () => {
    const source: DataSource = new MemorySource({});
    expect(source.name).toBe('memory');
    expect(source.dialect).toBeUndefined();
  });

  it('scans copies of the stored rows', async () => {
    const stored = [{ id: 1, Name: 'Dora' }];
    const connection = await new MemorySource({ Director: stored }).connect();
    const rows = await drain(connection.scan(Director));
    expect(rows).toEqual([{ id: 1, Name: 'Dora' }]);
    rows[0]!['Name'] = 'changed';
    expect(stored[0]!.Name).toBe('Dora');
    await connection.release();
  });

  it('does not offer compiled query execution', async () => {
    const connection = await new MemorySource({}).connect();
    expect(connection.run).toBeUndefined();
  });

  it('throws SourceError for an entity without a collection', async () => {
    const connection = await new MemorySource({}).connect();
    await expect(drain(connection.scan(Movie))).rejects.toBeInstanceOf(SourceError);
  });
});
