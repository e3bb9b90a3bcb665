import { Query, eq, gt, outer, type EntityRegistry } from 'fluent-query';

export function releasedAfter(registry: EntityRegistry, year: number): Query {
  return Query.from(registry, 'Movie').where(gt('Release', year)).orderBy('Release').select(['Title', 'Release']);
}

export function byRelease(registry: EntityRegistry): Query {
  return Query.from(registry, 'Movie').orderBy('Release').select(['Title', 'Release']);
}

export function movieExists(registry: EntityRegistry, movieId: number): Query {
  return Query.from(registry, 'Movie').where(eq('id', movieId)).count();
}

// Joins on the foreign key: movie.id = actor.MovieId
export function castOf(registry: EntityRegistry, movieId: number): Query {
  return Query.from(registry, 'Movie')
    .where(eq('id', movieId))
    .joinRelation('actors', { left: 'movie', right: 'actor' })
    .select({ movie: 'movie.Title', actor: 'actor.Name', birthDate: 'actor.BirthDate' })
    .orderBy('actor');
}

// Reads the director through Movie.director; films without one never match
export function directedBy(registry: EntityRegistry, director: string): Query {
  return Query.from(registry, 'Movie')
    .where(eq('director.Name', director))
    .orderBy('Release')
    .select(['Title', 'Release']);
}

export function actorsPerMovie(registry: EntityRegistry): Query {
  return Query.from(registry, 'Movie')
    .joinRelation('actors', { left: 'movie', right: 'actor' })
    .groupBy('movie.Title')
    .count(null, { as: 'actors' })
    .orderBy('key')
    .orderByDescending('actors');
}

export function oldestActor(registry: EntityRegistry): Query {
  return Query.from(registry, 'Actor').min('BirthDate', { as: 'oldest' });
}

export function moviesWithActorCount(registry: EntityRegistry): Query {
  const actorCount = Query.from(registry, 'Actor').where(eq('MovieId', outer('id'))).count();
  return Query.from(registry, 'Movie')
    .let('actorCount', actorCount)
    .orderBy('Title')
    .select(['Title', 'actorCount']);
}

/** Pages are 1-based. */
export function titlesPage(registry: EntityRegistry, page: number, size: number): Query {
  return Query.from(registry, 'Movie')
    .orderBy('Title')
    .skip((page - 1) * size)
    .take(size)
    .select(['Title']);
}

export type NamedQuery = (registry: EntityRegistry) => Query;

export const namedQueries: ReadonlyMap<string, NamedQuery> = new Map<string, NamedQuery>([
  ['released-after-2000', (registry) => releasedAfter(registry, 2000)],
  ['by-release', byRelease],
  ['actors-per-movie', actorsPerMovie],
  ['directed-by-petra-lind', (registry) => directedBy(registry, 'Petra Lind')],
  ['oldest-actor', oldestActor],
  ['movies-with-actor-count', moviesWithActorCount],
  ['first-page', (registry) => titlesPage(registry, 1, 2)],
]);
