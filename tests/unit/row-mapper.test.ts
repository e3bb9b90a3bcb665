import { describe, it, expect } from 'vitest';
import { mapEntityRow, mapRow } from '../../src/store/row-mapper.js';
import { EmptyAggregateError } from '../../src/errors.js';
import { Actor } from './helpers.js';

describe('mapRow()', () => {
  it('converts numeric strings for number columns', () => {
    const row = mapRow({ n: '42', avg: '7.7500000000000000' }, [
      { path: 'n', type: 'number', aggregate: 'count' },
      { path: 'avg', type: 'number', aggregate: 'average' },
    ]);
    expect(row).toEqual({ n: 42, avg: 7.75 });
  });

  it('leaves strings alone for string columns', () => {
    expect(mapRow({ code: '007' }, [{ path: 'code', type: 'string' }])).toEqual({ code: '007' });
  });

  it('turns dotted aliases into nested objects', () => {
    const row = mapRow({ 'movie.Title': 'Heat', 'movie.id': 7, 'actor.Name': 'Ann' }, [
      { path: 'movie.Title', type: 'string' },
      { path: 'movie.id', type: 'number' },
      { path: 'actor.Name', type: 'string' },
    ]);
    expect(row).toEqual({ movie: { Title: 'Heat', id: 7 }, actor: { Name: 'Ann' } });
  });

  it('fills missing columns with null', () => {
    expect(mapRow({}, [{ path: 'Rating', type: 'number' }])).toEqual({ Rating: null });
  });

  it('revives ISO date strings', () => {
    const row = mapRow({ oldest: '1965-03-03T00:00:00.000Z' }, [{ path: 'oldest', type: 'date', aggregate: 'min' }]);
    expect(row).toEqual({ oldest: new Date('1965-03-03T00:00:00.000Z') });
  });

  it('throws EmptyAggregateError for a null min, max or average', () => {
    expect(() => mapRow({ min: null }, [{ path: 'min', type: 'number', aggregate: 'min' }])).toThrow(
      EmptyAggregateError,
    );
    expect(() => mapRow({ average: null }, [{ path: 'average', type: 'number', aggregate: 'average' }])).toThrow(
      EmptyAggregateError,
    );
  });

  it('accepts a null count or sum', () => {
    expect(mapRow({ sum: null }, [{ path: 'sum', type: 'number', aggregate: 'sum' }])).toEqual({ sum: null });
  });
});

describe('mapEntityRow()', () => {
  it('copies declared fields only and fills gaps with null', () => {
    const source = { id: 1, Name: 'Ann', extra: true };
    const row = mapEntityRow(Actor, source);
    expect(row).toEqual({ id: 1, Name: 'Ann', MovieId: null, BirthDate: null });
    expect(row).not.toBe(source);
  });

  it('revives date fields stored as strings', () => {
    const row = mapEntityRow(Actor, { id: 1, Name: 'Ann', MovieId: 1, BirthDate: '1970-01-01T00:00:00.000Z' });
    expect(row['BirthDate']).toEqual(new Date('1970-01-01T00:00:00.000Z'));
  });
});
