import type pg from 'pg';

export const DDL_CREATE_DIRECTORS = `
CREATE TABLE IF NOT EXISTS directors (
  id    INTEGER PRIMARY KEY,
  name  TEXT    NOT NULL
)
`.trim();

export const DDL_CREATE_MOVIES = `
CREATE TABLE IF NOT EXISTS movies (
  id            INTEGER       PRIMARY KEY,
  title         TEXT          NOT NULL,
  release_year  INTEGER       NOT NULL,
  rating        NUMERIC(3, 1),
  director_id   INTEGER       REFERENCES directors (id)
)
`.trim();

export const DDL_CREATE_ACTORS = `
CREATE TABLE IF NOT EXISTS actors (
  id          INTEGER     PRIMARY KEY,
  name        TEXT        NOT NULL,
  movie_id    INTEGER     NOT NULL,
  birth_date  TIMESTAMPTZ NOT NULL
)
`.trim();

export const DDL_CREATE_ACTORS_MOVIE_INDEX = `
CREATE INDEX IF NOT EXISTS idx_actors_movie_id ON actors (movie_id)
`.trim();

/** Creates the sample tables if they do not exist. Safe to run on every start. */
export async function applySchema(client: pg.PoolClient): Promise<void> {
  await client.query(DDL_CREATE_DIRECTORS);
  await client.query(DDL_CREATE_MOVIES);
  await client.query(DDL_CREATE_ACTORS);
  await client.query(DDL_CREATE_ACTORS_MOVIE_INDEX);
}
