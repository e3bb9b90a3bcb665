import type { Expr } from '../query/types.js';
import type { ResultRow } from '../types.js';

/**
 * Evaluates an expression against a row with SQL semantics: comparisons and
 * arithmetic involving null yield null, and AND/OR/NOT use three-valued logic.
 * A filter keeps a row only when its predicate is exactly `true`.
 */
export function evaluate(expr: Expr, row: ResultRow, outerRow: ResultRow | null = null): unknown {
  switch (expr.kind) {
    case 'field':
      return readPath(row, expr.path);

    case 'outer':
      return outerRow === null ? null : readPath(outerRow, expr.path);

    case 'literal':
      return expr.value;

    case 'compare': {
      const l = evaluate(expr.left, row, outerRow);
      const r = evaluate(expr.right, row, outerRow);
      // `x = null` / `x <> null` are IS NULL / IS NOT NULL checks
      if (isNullLiteral(expr.right) || isNullLiteral(expr.left)) {
        const other = isNullLiteral(expr.right) ? l : r;
        if (expr.op === 'eq') return other === null || other === undefined;
        if (expr.op === 'ne') return other !== null && other !== undefined;
        return null;
      }
      if (isMissing(l) || isMissing(r)) return null;
      const c = compareValues(l, r);
      switch (expr.op) {
        case 'eq':
          return c === 0;
        case 'ne':
          return c !== 0;
        case 'gt':
          return c > 0;
        case 'gte':
          return c >= 0;
        case 'lt':
          return c < 0;
        case 'lte':
          return c <= 0;
      }
      return null;
    }

    case 'match': {
      const l = evaluate(expr.left, row, outerRow);
      const r = evaluate(expr.right, row, outerRow);
      if (typeof l !== 'string' || typeof r !== 'string') return null;
      return expr.op === 'contains' ? l.includes(r) : l.startsWith(r);
    }

    case 'arith': {
      const l = evaluate(expr.left, row, outerRow);
      const r = evaluate(expr.right, row, outerRow);
      if (typeof l !== 'number' || typeof r !== 'number') return null;
      switch (expr.op) {
        case 'add':
          return l + r;
        case 'sub':
          return l - r;
        case 'mul':
          return l * r;
        case 'div':
          return r === 0 ? null : l / r;
      }
      return null;
    }

    case 'and': {
      let sawNull = false;
      for (const operand of expr.operands) {
        const v = evaluate(operand, row, outerRow);
        if (v === false) return false;
        if (v !== true) sawNull = true;
      }
      return sawNull ? null : true;
    }

    case 'or': {
      let sawNull = false;
      for (const operand of expr.operands) {
        const v = evaluate(operand, row, outerRow);
        if (v === true) return true;
        if (v !== false) sawNull = true;
      }
      return sawNull ? null : false;
    }

    case 'not': {
      const v = evaluate(expr.operand, row, outerRow);
      return typeof v === 'boolean' ? !v : null;
    }

    case 'client':
      return expr.fn(row);
  }
}

function isNullLiteral(expr: Expr): boolean {
  return expr.kind === 'literal' && expr.value === null;
}

function isMissing(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !(value instanceof Date) && !Array.isArray(value);
}

/** Reads a dotted path through nested row objects; missing segments read as null. */
export function readPath(row: ResultRow, path: string): unknown {
  let current: unknown = row;
  for (const segment of path.split('.')) {
    if (!isRecord(current) || !Object.hasOwn(current, segment)) return null;
    current = current[segment];
  }
  return current === undefined ? null : current;
}

function rank(value: unknown): number {
  if (value instanceof Date) return 3;
  switch (typeof value) {
    case 'boolean':
      return 0;
    case 'number':
      return 1;
    case 'string':
      return 2;
    default:
      return 4;
  }
}

/** Total order over non-null scalars; values of different kinds order by kind. */
export function compareValues(a: unknown, b: unknown): number {
  if (a instanceof Date && b instanceof Date) return Math.sign(a.getTime() - b.getTime());
  if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return rank(a) - rank(b);
}

/** Ordering for sorts: nulls come first ascending and last descending. */
export function compareForSort(a: unknown, b: unknown, direction: 'asc' | 'desc'): number {
  const an = isMissing(a);
  const bn = isMissing(b);
  let c: number;
  if (an && bn) c = 0;
  else if (an) c = -1;
  else if (bn) c = 1;
  else c = compareValues(a, b);
  return direction === 'asc' ? c : -c;
}

/** Stable string form of a scalar, used as a hash key for grouping and joins. */
export function keyOf(value: unknown): string {
  if (isMissing(value)) return 'null';
  if (value instanceof Date) return `d:${value.getTime()}`;
  switch (typeof value) {
    case 'number':
      return `n:${value}`;
    case 'string':
      return `s:${value}`;
    case 'boolean':
      return `b:${value}`;
    default:
      return `o:${JSON.stringify(value)}`;
  }
}
