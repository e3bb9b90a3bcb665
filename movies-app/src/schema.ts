import { defineEntity, EntityRegistry } from 'fluent-query';

export const Movie = defineEntity({
  name: 'Movie',
  table: 'movies',
  fields: [
    { name: 'id', type: 'number' },
    { name: 'Title', type: 'string', column: 'title' },
    { name: 'Release', type: 'number', column: 'release_year' },
    { name: 'Rating', type: 'number', column: 'rating', nullable: true },
    { name: 'DirectorId', type: 'number', column: 'director_id', nullable: true },
  ],
  relations: [
    { name: 'actors', kind: 'toMany', target: 'Actor', foreignKey: 'MovieId' },
    { name: 'director', kind: 'toOne', target: 'Director', foreignKey: 'DirectorId' },
  ],
});

export const Actor = defineEntity({
  name: 'Actor',
  table: 'actors',
  fields: [
    { name: 'id', type: 'number' },
    { name: 'Name', type: 'string', column: 'name' },
    { name: 'MovieId', type: 'number', column: 'movie_id' },
    { name: 'BirthDate', type: 'date', column: 'birth_date' },
  ],
  relations: [{ name: 'movie', kind: 'toOne', target: 'Movie', foreignKey: 'MovieId' }],
});

export const Director = defineEntity({
  name: 'Director',
  table: 'directors',
  fields: [
    { name: 'id', type: 'number' },
    { name: 'Name', type: 'string', column: 'name' },
  ],
});

export function createRegistry(): EntityRegistry {
  return new EntityRegistry([Movie, Actor, Director]).seal();
}
