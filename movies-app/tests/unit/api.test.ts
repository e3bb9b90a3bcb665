import { describe, it, expect, vi } from 'vitest';
import { MemorySource, QueryEngine, type Connection, type DataSource } from 'fluent-query';
import { makeApp, makeSqlEngine, registry } from './helpers.js';

describe('GET /api/v1/movies', () => {
  it('lists films by release year', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/movies' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toHaveLength(5);
    expect(res.json()[0]).toEqual({ Title: 'The Quiet Harbor', Release: 1998 });
  });

  it('filters by ?after', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/movies?after=2015' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([
      { Title: 'Paper Lanterns', Release: 2016 },
      { Title: 'Salt and Cinder', Release: 2021 },
    ]);
  });

  it('rejects a non-numeric ?after with 400', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/movies?after=soon' });
    expect(res.statusCode).toBe(400);
  });
});

describe('GET /api/v1/movies/:id/cast', () => {
  it('returns the cast in name order', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/movies/1/cast' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([
      { movie: 'The Quiet Harbor', actor: 'Ines Marlowe', birthDate: '1961-04-12T00:00:00.000Z' },
      { movie: 'The Quiet Harbor', actor: 'Tobias Renn', birthDate: '1975-09-30T00:00:00.000Z' },
    ]);
  });

  it('returns an empty cast for a film without actors', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/movies/5/cast' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([]);
  });

  it('returns 404 for an unknown film', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/movies/42/cast' });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe('MovieNotFound');
  });
});

describe('GET /api/v1/stats', () => {
  it('counts actors per movie', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/stats/actors-per-movie' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([
      { movie: 'Glass Meridian', actors: 3 },
      { movie: 'The Quiet Harbor', actors: 2 },
      { movie: 'Northbound Static', actors: 1 },
      { movie: 'Paper Lanterns', actors: 1 },
    ]);
  });

  it('returns the oldest birth date', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/stats/oldest-actor' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ birthDate: '1958-07-07T00:00:00.000Z' });
  });

  it('maps an empty aggregate to 422', async () => {
    const engine = new QueryEngine({ registry, source: new MemorySource({ Actor: [] }) });
    const app = await makeApp(engine);
    const res = await app.inject({ method: 'GET', url: '/api/v1/stats/oldest-actor' });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ error: 'EmptyAggregate', message: 'Cannot compute min of an empty sequence' });
  });
});

describe('GET /api/v1/queries', () => {
  it('lists the named queries', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/queries' });
    expect(res.json().queries).toContain('movies-with-actor-count');
  });

  it('runs a named query', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/queries/first-page' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      name: 'first-page',
      rows: [{ Title: 'Glass Meridian' }, { Title: 'Northbound Static' }],
    });
  });

  it('returns 404 for an unknown name', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/queries/constructor' });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe('QueryNotFound');
  });

  it('shows compiled SQL without touching the database', async () => {
    const app = await makeApp(makeSqlEngine());
    const res = await app.inject({ method: 'GET', url: '/api/v1/queries/oldest-actor/sql' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      name: 'oldest-actor',
      adapter: 'postgres',
      text: 'SELECT MIN(t0."birth_date") AS "oldest"\nFROM "actors" AS t0',
      params: [],
    });
  });

  it('shows the plan text for the in-memory engine', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/v1/queries/oldest-actor/sql' });
    expect(res.json().text).toBe('aggregate min(BirthDate) as oldest\n  scan Actor');
  });
});

describe('error mapping', () => {
  it('maps a data source failure to 500 without internals', async () => {
    const app = await makeApp(makeSqlEngine());
    const res = await app.inject({ method: 'GET', url: '/api/v1/queries/by-release' });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'SourceError', message: 'Data source failure' });
  });

  it('maps a timeout to 504', async () => {
    const hanging: DataSource = {
      name: 'hanging',
      connect: vi.fn(() => new Promise<Connection>(() => {})),
    };
    const engine = new QueryEngine({ registry, source: hanging, timeoutMs: 10 });
    const app = await makeApp(engine);
    const res = await app.inject({ method: 'GET', url: '/api/v1/stats/oldest-actor' });
    expect(res.statusCode).toBe(504);
    expect(res.json()).toMatchObject({ error: 'TimeoutError', retryable: true });
  });
});
