import type { FieldType } from '../model/types.js';
import type { ResultRow } from '../types.js';
import type { ArithOp, CompareOp, Expr, LiteralValue, MatchOp } from './types.js';

/** A field path, a literal, or an already-built expression. */
export type Operand = Expr | LiteralValue;

/** Anything that names a value on a row: a dotted field path or an expression. */
export type Selector = string | Expr;

function isExpr(value: Operand): value is Expr {
  return typeof value === 'object' && value !== null && !(value instanceof Date) && 'kind' in value;
}

function toExpr(value: Operand): Expr {
  return isExpr(value) ? value : lit(value);
}

/** Strings become field references; everything else passes through. */
export function toSelectorExpr(selector: Selector): Expr {
  return typeof selector === 'string' ? field(selector) : selector;
}

export function field(path: string): Expr {
  return { kind: 'field', path };
}

/** A field of the enclosing row; only meaningful inside a `let` sub-query. */
export function outer(path: string): Expr {
  return { kind: 'outer', path };
}

export function lit(value: LiteralValue): Expr {
  return { kind: 'literal', value };
}

function compare(op: CompareOp, left: Selector, right: Operand): Expr {
  return { kind: 'compare', op, left: toSelectorExpr(left), right: toExpr(right) };
}

export const eq = (left: Selector, right: Operand): Expr => compare('eq', left, right);
export const ne = (left: Selector, right: Operand): Expr => compare('ne', left, right);
export const gt = (left: Selector, right: Operand): Expr => compare('gt', left, right);
export const gte = (left: Selector, right: Operand): Expr => compare('gte', left, right);
export const lt = (left: Selector, right: Operand): Expr => compare('lt', left, right);
export const lte = (left: Selector, right: Operand): Expr => compare('lte', left, right);

function match(op: MatchOp, left: Selector, right: Operand): Expr {
  return { kind: 'match', op, left: toSelectorExpr(left), right: toExpr(right) };
}

export const contains = (left: Selector, right: Operand): Expr => match('contains', left, right);
export const startsWith = (left: Selector, right: Operand): Expr => match('startsWith', left, right);

function arith(op: ArithOp, left: Selector, right: Operand): Expr {
  return { kind: 'arith', op, left: toSelectorExpr(left), right: toExpr(right) };
}

export const add = (left: Selector, right: Operand): Expr => arith('add', left, right);
export const sub = (left: Selector, right: Operand): Expr => arith('sub', left, right);
export const mul = (left: Selector, right: Operand): Expr => arith('mul', left, right);
export const div = (left: Selector, right: Operand): Expr => arith('div', left, right);

/** Nested ANDs are flattened into one node. */
export function and(...operands: Expr[]): Expr {
  const flat = operands.flatMap((o) => (o.kind === 'and' ? o.operands : [o]));
  return { kind: 'and', operands: flat };
}

/** Nested ORs are flattened into one node. */
export function or(...operands: Expr[]): Expr {
  const flat = operands.flatMap((o) => (o.kind === 'or' ? o.operands : [o]));
  return { kind: 'or', operands: flat };
}

export function not(operand: Expr): Expr {
  return { kind: 'not', operand };
}

/**
 * A predicate or value computed by a JavaScript function. Only the in-memory
 * evaluator can run it; SQL backends reject plans that contain one.
 */
export function client(label: string, type: FieldType, fn: (row: ResultRow) => unknown): Expr {
  return { kind: 'client', label, type, fn };
}

/** Renders an expression as text. Used by explain() and in error messages. */
export function formatExpr(expr: Expr): string {
  switch (expr.kind) {
    case 'field':
      return expr.path;
    case 'outer':
      return `outer.${expr.path}`;
    case 'literal':
      if (expr.value === null) return 'null';
      if (expr.value instanceof Date) return `date(${expr.value.toISOString()})`;
      return typeof expr.value === 'string' ? JSON.stringify(expr.value) : String(expr.value);
    case 'compare':
      return `${formatExpr(expr.left)} ${COMPARE_SYMBOLS[expr.op]} ${formatExpr(expr.right)}`;
    case 'match':
      return `${expr.op}(${formatExpr(expr.left)}, ${formatExpr(expr.right)})`;
    case 'arith':
      return `(${formatExpr(expr.left)} ${ARITH_SYMBOLS[expr.op]} ${formatExpr(expr.right)})`;
    case 'and':
      return `(${expr.operands.map(formatExpr).join(' AND ')})`;
    case 'or':
      return `(${expr.operands.map(formatExpr).join(' OR ')})`;
    case 'not':
      return `NOT ${formatExpr(expr.operand)}`;
    case 'client':
      return `client:${expr.label}`;
  }
}

export const COMPARE_SYMBOLS: Record<CompareOp, string> = {
  eq: '=',
  ne: '<>',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
};

export const ARITH_SYMBOLS: Record<ArithOp, string> = {
  add: '+',
  sub: '-',
  mul: '*',
  div: '/',
};
