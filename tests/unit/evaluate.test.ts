import { describe, it, expect } from 'vitest';
import { compareForSort, evaluate, keyOf, readPath } from '../../src/engine/evaluate.js';
import { add, and, client, contains, div, eq, field, gt, lit, ne, not, or, outer, startsWith } from '../../src/query/expr.js';

const row = { Title: 'Heat', Release: 1995, Rating: null, movie: { Title: 'Heat', id: 7 } };

describe('evaluate()', () => {
  it('reads fields and nested paths', () => {
    expect(evaluate(field('Release'), row)).toBe(1995);
    expect(evaluate(field('movie.id'), row)).toBe(7);
    expect(evaluate(field('movie.missing'), row)).toBeNull();
  });

  it('compares values', () => {
    expect(evaluate(gt('Release', 1990), row)).toBe(true);
    expect(evaluate(eq('Title', 'Ronin'), row)).toBe(false);
  });

  it('yields null when comparing with a null value', () => {
    expect(evaluate(gt('Rating', 5), row)).toBeNull();
    expect(evaluate(ne('Rating', 5), row)).toBeNull();
  });

  it('treats comparison with a null literal as IS NULL / IS NOT NULL', () => {
    expect(evaluate(eq('Rating', null), row)).toBe(true);
    expect(evaluate(ne('Rating', null), row)).toBe(false);
    expect(evaluate(eq('Title', null), row)).toBe(false);
  });

  it('uses three-valued AND, OR and NOT', () => {
    const unknown = gt('Rating', 5);
    expect(evaluate(and(unknown, lit(false)), row)).toBe(false);
    expect(evaluate(and(unknown, lit(true)), row)).toBeNull();
    expect(evaluate(or(unknown, lit(true)), row)).toBe(true);
    expect(evaluate(or(unknown, lit(false)), row)).toBeNull();
    expect(evaluate(not(unknown), row)).toBeNull();
    expect(evaluate(not(lit(false)), row)).toBe(true);
  });

  it('matches strings', () => {
    expect(evaluate(contains('Title', 'ea'), row)).toBe(true);
    expect(evaluate(startsWith('Title', 'He'), row)).toBe(true);
    expect(evaluate(startsWith('Rating', 'He'), row)).toBeNull();
  });

  it('does arithmetic and returns null on division by zero', () => {
    expect(evaluate(add('Release', 5), row)).toBe(2000);
    expect(evaluate(div('Release', 0), row)).toBeNull();
    expect(evaluate(add('Rating', 1), row)).toBeNull();
  });

  it('reads the enclosing row through outer()', () => {
    expect(evaluate(eq('Release', outer('year')), row, { year: 1995 })).toBe(true);
    expect(evaluate(outer('year'), row)).toBeNull();
  });

  it('runs client functions on the row', () => {
    expect(evaluate(client('len', 'number', (r) => String(r['Title']).length), row)).toBe(4);
  });
});

describe('readPath()', () => {
  it('does not read inherited properties', () => {
    expect(readPath({}, 'constructor')).toBeNull();
  });
});

describe('compareForSort()', () => {
  it('puts nulls first ascending and last descending', () => {
    expect([3, null, 1].sort((a, b) => compareForSort(a, b, 'asc'))).toEqual([null, 1, 3]);
    expect([3, null, 1].sort((a, b) => compareForSort(a, b, 'desc'))).toEqual([3, 1, null]);
  });

  it('orders dates by time', () => {
    const early = new Date('2000-01-01T00:00:00Z');
    const late = new Date('2010-01-01T00:00:00Z');
    expect(compareForSort(late, early, 'asc')).toBe(1);
  });
});

describe('keyOf()', () => {
  it('keeps values of different types apart', () => {
    expect(keyOf(1)).toBe('n:1');
    expect(keyOf('1')).toBe('s:1');
    expect(keyOf(null)).toBe('null');
    expect(keyOf(new Date(0))).toBe('d:0');
    expect(keyOf(true)).toBe('b:true');
  });
});
