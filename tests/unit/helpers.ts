import { vi } from 'vitest';
import { defineEntity, EntityRegistry } from '../../src/model/registry.js';
import type { EntityDescriptor } from '../../src/model/types.js';
import type { Connection, DataSource } from '../../src/types.js';

export const Movie = defineEntity({
  name: 'Movie',
  fields: [
    { name: 'id', type: 'number' },
    { name: 'Title', type: 'string' },
    { name: 'Release', type: 'number' },
    { name: 'Rating', type: 'number', nullable: true },
    { name: 'DirectorId', type: 'number', nullable: true },
  ],
  relations: [
    { name: 'actors', kind: 'toMany', target: 'Actor', foreignKey: 'MovieId' },
    { name: 'director', kind: 'toOne', target: 'Director', foreignKey: 'DirectorId' },
  ],
});

export const Actor = defineEntity({
  name: 'Actor',
  fields: [
    { name: 'id', type: 'number' },
    { name: 'Name', type: 'string' },
    { name: 'MovieId', type: 'number' },
    { name: 'BirthDate', type: 'date' },
  ],
  relations: [{ name: 'movie', kind: 'toOne', target: 'Movie', foreignKey: 'MovieId' }],
});

export const Director = defineEntity({
  name: 'Director',
  fields: [
    { name: 'id', type: 'number' },
    { name: 'Name', type: 'string' },
  ],
});

export function makeRegistry(): EntityRegistry {
  return new EntityRegistry([Movie, Actor, Director]).seal();
}

export const movies = [
  { id: 1, Title: 'A', Release: 1999, Rating: 7.5, DirectorId: 1 },
  { id: 2, Title: 'B', Release: 2005, Rating: null, DirectorId: 1 },
  { id: 3, Title: 'C', Release: 2010, Rating: 8, DirectorId: null },
];

export const actors = [
  { id: 1, Name: 'Ann', MovieId: 1, BirthDate: new Date('1970-01-01T00:00:00Z') },
  { id: 2, Name: 'Bob', MovieId: 1, BirthDate: new Date('1980-05-05T00:00:00Z') },
  { id: 3, Name: 'Cid', MovieId: 2, BirthDate: new Date('1965-03-03T00:00:00Z') },
  { id: 4, Name: 'Dee', MovieId: 99, BirthDate: new Date('1990-09-09T00:00:00Z') },
];

export const directors = [{ id: 1, Name: 'Dora' }];

export const collections = { Movie: movies, Actor: actors, Director: directors };

/**
 * A data source backed by arrays that records every connect, scan and release,
 * for checking when I/O happens.
 */
export function makeRecordingSource(
  data: Record<string, readonly Record<string, unknown>[]> = collections,
  options: { dialect?: string; failScanAfter?: number } = {},
) {
  const release = vi.fn(async (_error?: Error) => {});
  const scan = vi.fn(async function* (entity: EntityDescriptor) {
    let n = 0;
    for (const row of data[entity.name] ?? []) {
      if (options.failScanAfter !== undefined && n === options.failScanAfter) {
        throw new Error('disk on fire');
      }
      n++;
      yield { ...row };
    }
  });
  const connect = vi.fn(async (): Promise<Connection> => ({ scan, release }));
  const source: DataSource = {
    name: 'recording',
    ...(options.dialect !== undefined ? { dialect: options.dialect } : {}),
    connect,
  };
  return { source, connect, scan, release };
}
