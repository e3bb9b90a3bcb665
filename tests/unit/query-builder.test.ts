import { describe, it, expect } from 'vitest';
import { Query } from '../../src/query/builder.js';
import { and, client, contains, eq, field, gt, lit, outer } from '../../src/query/expr.js';
import { filter, joinRelation, let_, project, skip, source, take } from '../../src/query/query-object.js';
import { AmbiguousJoinError, TypeMismatchError, UnknownEntityError, UnknownFieldError } from '../../src/errors.js';
import { makeRegistry } from './helpers.js';

const registry = makeRegistry();
const movies = () => Query.from(registry, 'Movie');

describe('Query builder', () => {
  it('starts from a source node', () => {
    expect(movies().node).toEqual({ kind: 'source', entity: 'Movie' });
  });

  it('throws UnknownEntityError for an unregistered entity', () => {
    expect(() => Query.from(registry, 'Film')).toThrow(UnknownEntityError);
  });

  it('never mutates the receiver', () => {
    const base = movies();
    const filtered = base.where(gt('Release', 2000));
    expect(base.node).toEqual({ kind: 'source', entity: 'Movie' });
    expect(filtered).not.toBe(base);
    expect(filtered.node).toEqual({
      kind: 'filter',
      input: { kind: 'source', entity: 'Movie' },
      predicate: { kind: 'compare', op: 'gt', left: { kind: 'field', path: 'Release' }, right: { kind: 'literal', value: 2000 } },
    });
  });

  it('select() with a path list keeps each last segment as the name', () => {
    const q = movies().select(['Title', 'Release']);
    expect(Object.keys(q.shape)).toEqual(['Title', 'Release']);
  });

  it('select() with a record maps names to selectors', () => {
    const q = movies().select({ name: 'Title', late: gt('Release', 2000) });
    expect(q.shape).toEqual({
      name: { kind: 'scalar', type: 'string', nullable: false },
      late: { kind: 'scalar', type: 'boolean', nullable: false },
    });
  });

  it('rejects an unknown field', () => {
    expect(() => movies().where(eq('Titel', 'A'))).toThrow(UnknownFieldError);
  });

  it('rejects comparing a string with a number', () => {
    expect(() => movies().where(gt('Title', 2000))).toThrow(
      'Cannot compare Title (string) with 2000 (number)',
    );
  });

  it('rejects a non-boolean predicate', () => {
    expect(() => movies().where(field('Title'))).toThrow(TypeMismatchError);
  });

  it('allows comparing with null only by = and <>', () => {
    expect(() => movies().where(eq('Rating', null))).not.toThrow();
    expect(() => movies().where(gt('Rating', null))).toThrow('null can only be compared with = or <>');
  });

  it('rejects contains on a number', () => {
    expect(() => movies().where(contains('Release', '19'))).toThrow('contains operand must be string');
  });

  it('types a client expression by its declared type', () => {
    const q = movies().where(client('isEven', 'boolean', (row) => Number(row['id']) % 2 === 0));
    expect(q.node.kind).toBe('filter');
  });

  it('groupBy() yields key and items', () => {
    const q = movies().groupBy('DirectorId');
    expect(q.shape['key']).toEqual({ kind: 'scalar', type: 'number', nullable: true });
    expect(q.shape['items']?.kind).toBe('rows');
  });

  it('aggregate after groupBy keeps the key', () => {
    const q = movies().groupBy('DirectorId').count(null, { as: 'films' });
    expect(Object.keys(q.shape)).toEqual(['key', 'films']);
  });

  it('min keeps the field type and sum needs a number', () => {
    expect(movies().min('Title').shape).toEqual({ min: { kind: 'scalar', type: 'string', nullable: false } });
    expect(() => movies().sum('Title')).toThrow('sum field must be number');
  });

  it('join() nests each side under its alias', () => {
    const q = movies().join(Query.from(registry, 'Actor'), eq('movie.id', field('actor.MovieId')), {
      left: 'movie',
      right: 'actor',
    });
    expect(Object.keys(q.shape)).toEqual(['movie', 'actor']);
    expect(() => q.select({ title: 'movie.Title', name: 'actor.Name' })).not.toThrow();
  });

  it('join() rejects a condition that is not an equality', () => {
    expect(() =>
      movies().join(Query.from(registry, 'Actor'), gt('movie.id', field('actor.MovieId')), {
        left: 'movie',
        right: 'actor',
      }),
    ).toThrow(AmbiguousJoinError);
  });

  it('join() rejects a condition with both operands on one side', () => {
    expect(() =>
      movies().join(Query.from(registry, 'Actor'), eq('movie.id', field('movie.Release')), {
        left: 'movie',
        right: 'actor',
      }),
    ).toThrow(AmbiguousJoinError);
  });

  it('join() rejects keys of different types', () => {
    expect(() =>
      movies().join(Query.from(registry, 'Actor'), eq('movie.Title', field('actor.MovieId')), {
        left: 'movie',
        right: 'actor',
      }),
    ).toThrow(TypeMismatchError);
  });

  it('joinRelation() follows a toMany relation by foreign key', () => {
    const q = movies().joinRelation('actors', { left: 'movie', right: 'actor' });
    expect(q.node).toMatchObject({
      kind: 'join',
      on: { kind: 'compare', op: 'eq', left: { path: 'movie.id' }, right: { path: 'actor.MovieId' } },
    });
  });

  it('joinRelation() follows a toOne relation to the target key', () => {
    const q = Query.from(registry, 'Actor').joinRelation('movie', { left: 'actor', right: 'movie' });
    expect(q.node).toMatchObject({
      kind: 'join',
      on: { left: { path: 'actor.MovieId' }, right: { path: 'movie.id' } },
    });
  });

  it('let() binds an expression', () => {
    const q = movies().let('score', lit(1));
    expect(q.shape['score']).toEqual({ kind: 'scalar', type: 'number', nullable: false });
  });

  it('let() binds a correlated aggregate sub-query', () => {
    const castSize = Query.from(registry, 'Actor').where(eq('MovieId', outer('id'))).count();
    const q = movies().let('castSize', castSize);
    expect(q.shape['castSize']).toEqual({ kind: 'scalar', type: 'number', nullable: false });
  });

  it('let() rejects a sub-query that is not an aggregate', () => {
    expect(() => movies().let('cast', Query.from(registry, 'Actor'))).toThrow(TypeMismatchError);
  });

  it('let() rejects a name already on the row', () => {
    expect(() => movies().let('Title', lit(1))).toThrow('Output field "Title" is defined twice');
  });

  it('resolves a path through a toOne relation to a nullable field', () => {
    const q = Query.from(registry, 'Actor').where(gt('movie.Release', 2000)).select(['Name', 'movie.Title']);
    expect(q.shape).toEqual({
      Name: { kind: 'scalar', type: 'string', nullable: false },
      Title: { kind: 'scalar', type: 'string', nullable: true },
    });
  });

  it('checks the field at the end of a relation path', () => {
    expect(() => Query.from(registry, 'Actor').where(gt('movie.Title', 2000))).toThrow(TypeMismatchError);
    expect(() => Query.from(registry, 'Actor').where(eq('movie.Titel', 'A'))).toThrow(UnknownFieldError);
  });

  it('rejects a path that ends on a relation or crosses a collection', () => {
    expect(() => Query.from(registry, 'Actor').where(eq('movie', 1))).toThrow(
      '"movie" on Actor ends on a relation, not a field',
    );
    expect(() => movies().where(eq('actors.Name', 'Ann'))).toThrow(
      '"actors" on Movie is a collection and cannot be used in a field path',
    );
  });

  it('take() and skip() reject negative or fractional counts', () => {
    expect(() => movies().take(-1)).toThrow(TypeMismatchError);
    expect(() => movies().skip(1.5)).toThrow(TypeMismatchError);
  });

  it('function-style entry points build the same tree as methods', () => {
    const viaFunctions = take(skip(project(filter(source(registry, 'Movie'), and(gt('Release', 2000))), ['Title']), 1), 2);
    const viaMethods = movies().where(and(gt('Release', 2000))).select(['Title']).skip(1).take(2);
    expect(viaFunctions.node).toEqual(viaMethods.node);
    expect(let_(movies(), 'x', lit(true)).node.kind).toBe('let');
    expect(joinRelation(movies(), 'actors', { left: 'movie', right: 'actor' }).node).toEqual(
      movies().joinRelation('actors', { left: 'movie', right: 'actor' }).node,
    );
  });
});
