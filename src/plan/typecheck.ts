import { AmbiguousJoinError, QueryError, TypeMismatchError, UnknownFieldError } from '../errors.js';
import type { EntityRegistry } from '../model/registry.js';
import type { EntityDescriptor, FieldDescriptor, FieldType } from '../model/types.js';
import { formatExpr } from '../query/expr.js';
import type {
  AggregateFn,
  Expr,
  ProjectedField,
  RelationEntry,
  RowShape,
  ScalarType,
  ShapeEntry,
} from '../query/types.js';
import type { JoinKey } from './types.js';

export interface Scalar {
  type: ScalarType;
  nullable: boolean;
}

/**
 * Shared state of one checking pass. Errors are appended, never thrown, so a
 * caller can either stop at the first one or report them all.
 * `outer` is the enclosing row of a `let` sub-query: `deferred` while a
 * sub-query is built on its own, `null` at the top level.
 * `onRelation` hears of every relation chain a resolved path reads through.
 */
export interface CheckContext {
  readonly registry: EntityRegistry;
  readonly errors: QueryError[];
  readonly outer: RowShape | 'deferred' | null;
  readonly onRelation?: (entry: RelationEntry, chain: string) => void;
}

/** Shape of a row whose fields could not be determined; every path resolves to `unknown`. */
export const OPEN_SHAPE: RowShape = Object.freeze({});

const UNKNOWN: Scalar = { type: 'unknown', nullable: true };
const BOOLEAN: Scalar = { type: 'boolean', nullable: false };

export function scalarEntry(s: Scalar): ShapeEntry {
  return { kind: 'scalar', type: s.type, nullable: s.nullable };
}

export function shapeOfEntity(entity: EntityDescriptor): RowShape {
  const shape: Record<string, ShapeEntry> = {};
  for (const f of entity.fields) {
    shape[f.name] = { kind: 'scalar', type: f.type, nullable: f.nullable };
  }
  for (const r of entity.relations) {
    shape[r.name] = { kind: 'relation', entity: entity.name, relation: r.name };
  }
  return shape;
}

export function isGroupShape(shape: RowShape): boolean {
  const items = shape['items'];
  return items !== undefined && items.kind === 'rows';
}

/** Walks a dotted path through nested row entries. */
export function resolvePath(shape: RowShape, path: string, ctx: CheckContext): ShapeEntry | null {
  let current: RowShape = shape;
  const segments = path.split('.');
  for (let i = 0; i < segments.length; i++) {
    if (current === OPEN_SHAPE) return scalarEntry(UNKNOWN);
    const segment = segments[i] ?? '';
    const entry: ShapeEntry | undefined = Object.hasOwn(current, segment) ? current[segment] : undefined;
    if (entry === undefined) {
      ctx.errors.push(new UnknownFieldError('row', segments.slice(0, i + 1).join('.')));
      return null;
    }
    if (entry.kind === 'relation') return resolveRelation(entry, segments.slice(i).join('.'), ctx);
    if (i === segments.length - 1) return entry;
    if (entry.kind !== 'row') {
      ctx.errors.push(
        new TypeMismatchError(`"${segments.slice(0, i + 1).join('.')}" is not a nested row in "${path}"`),
      );
      return null;
    }
    current = entry.shape;
  }
  return null;
}

/**
 * Resolves the rest of a path that starts at a relation through the
 * registry. The value is nullable: a dangling foreign key reads as no row.
 */
function resolveRelation(entry: RelationEntry, path: string, ctx: CheckContext): ShapeEntry | null {
  let field: FieldDescriptor;
  try {
    field = ctx.registry.resolveField(entry.entity, path);
  } catch (err) {
    if (!(err instanceof QueryError)) throw err;
    ctx.errors.push(err);
    return null;
  }
  ctx.onRelation?.(entry, path.slice(0, path.lastIndexOf('.')));
  return { kind: 'scalar', type: field.type, nullable: true };
}

function resolveScalar(shape: RowShape, path: string, ctx: CheckContext): Scalar {
  const entry = resolvePath(shape, path, ctx);
  if (entry === null) return UNKNOWN;
  if (entry.kind !== 'scalar') {
    ctx.errors.push(
      new TypeMismatchError(`"${path}" is a ${entry.kind === 'row' ? 'row' : 'collection'}, not a value`),
    );
    return UNKNOWN;
  }
  return { type: entry.type, nullable: entry.nullable };
}

function literalType(value: unknown): Scalar {
  if (value === null) return { type: 'null', nullable: true };
  if (value instanceof Date) return { type: 'date', nullable: false };
  switch (typeof value) {
    case 'string':
      return { type: 'string', nullable: false };
    case 'number':
      return { type: 'number', nullable: false };
    case 'boolean':
      return { type: 'boolean', nullable: false };
    default:
      return UNKNOWN;
  }
}

function describe(expr: Expr, s: Scalar): string {
  return `${formatExpr(expr)} (${s.type})`;
}

function expectType(expr: Expr, s: Scalar, allowed: readonly ScalarType[], role: string, ctx: CheckContext): void {
  if (s.type === 'unknown' || allowed.includes(s.type)) return;
  ctx.errors.push(new TypeMismatchError(`${role} must be ${allowed.join(' or ')}, got ${describe(expr, s)}`));
}

/** Infers the scalar type of an expression over `shape`, recording any defect in ctx. */
export function inferExpr(expr: Expr, shape: RowShape, ctx: CheckContext): Scalar {
  switch (expr.kind) {
    case 'field':
      return resolveScalar(shape, expr.path, ctx);

    case 'outer':
      if (ctx.outer === 'deferred') return UNKNOWN;
      if (ctx.outer === null) {
        ctx.errors.push(new TypeMismatchError(`outer.${expr.path} is only valid inside a let sub-query`));
        return UNKNOWN;
      }
      return resolveScalar(ctx.outer, expr.path, ctx);

    case 'literal':
      return literalType(expr.value);

    case 'compare': {
      const l = inferExpr(expr.left, shape, ctx);
      const r = inferExpr(expr.right, shape, ctx);
      const nullable = l.nullable || r.nullable;
      if (l.type === 'unknown' || r.type === 'unknown') return { type: 'boolean', nullable };
      if (l.type === 'null' || r.type === 'null') {
        if (expr.op !== 'eq' && expr.op !== 'ne') {
          ctx.errors.push(new TypeMismatchError(`null can only be compared with = or <>: ${formatExpr(expr)}`));
        }
        return BOOLEAN;
      }
      if (l.type !== r.type) {
        ctx.errors.push(
          new TypeMismatchError(`Cannot compare ${describe(expr.left, l)} with ${describe(expr.right, r)}`),
        );
      } else if (l.type === 'boolean' && expr.op !== 'eq' && expr.op !== 'ne') {
        ctx.errors.push(new TypeMismatchError(`Booleans have no ordering: ${formatExpr(expr)}`));
      }
      return { type: 'boolean', nullable };
    }

    case 'match': {
      const l = inferExpr(expr.left, shape, ctx);
      const r = inferExpr(expr.right, shape, ctx);
      expectType(expr.left, l, ['string'], `${expr.op} operand`, ctx);
      expectType(expr.right, r, ['string'], `${expr.op} operand`, ctx);
      return { type: 'boolean', nullable: l.nullable || r.nullable };
    }

    case 'arith': {
      const l = inferExpr(expr.left, shape, ctx);
      const r = inferExpr(expr.right, shape, ctx);
      expectType(expr.left, l, ['number'], 'Arithmetic operand', ctx);
      expectType(expr.right, r, ['number'], 'Arithmetic operand', ctx);
      return { type: 'number', nullable: l.nullable || r.nullable };
    }

    case 'and':
    case 'or': {
      let nullable = false;
      for (const operand of expr.operands) {
        const s = inferExpr(operand, shape, ctx);
        expectType(operand, s, ['boolean'], `${expr.kind.toUpperCase()} operand`, ctx);
        nullable = nullable || s.nullable;
      }
      return { type: 'boolean', nullable };
    }

    case 'not': {
      const s = inferExpr(expr.operand, shape, ctx);
      expectType(expr.operand, s, ['boolean'], 'NOT operand', ctx);
      return { type: 'boolean', nullable: s.nullable };
    }

    case 'client':
      return { type: expr.type, nullable: true };
  }
}

export function checkPredicate(predicate: Expr, shape: RowShape, ctx: CheckContext): void {
  const s = inferExpr(predicate, shape, ctx);
  expectType(predicate, s, ['boolean'], 'Filter predicate', ctx);
}

export function checkOutputName(name: string, taken: RowShape, ctx: CheckContext): void {
  if (name === '' || name.includes('.')) {
    ctx.errors.push(new TypeMismatchError(`"${name}" is not a valid output field name`));
  } else if (Object.hasOwn(taken, name)) {
    ctx.errors.push(new TypeMismatchError(`Output field "${name}" is defined twice`));
  }
}

export function shapeOfProject(input: RowShape, fields: readonly ProjectedField[], ctx: CheckContext): RowShape {
  if (fields.length === 0) {
    ctx.errors.push(new TypeMismatchError('A projection needs at least one field'));
    return input;
  }
  const shape: Record<string, ShapeEntry> = {};
  for (const f of fields) {
    checkOutputName(f.name, shape, ctx);
    if (f.expr.kind === 'field') {
      // A path may select a whole nested row, not only a value
      shape[f.name] = resolvePath(input, f.expr.path, ctx) ?? scalarEntry(UNKNOWN);
    } else {
      shape[f.name] = scalarEntry(inferExpr(f.expr, input, ctx));
    }
  }
  return shape;
}

type Side = 'left' | 'right' | 'none' | 'mixed';

function sideOf(expr: Expr, leftAs: string, rightAs: string): Side {
  const roots = new Set<string>();
  let opaque = false;
  const walk = (e: Expr): void => {
    switch (e.kind) {
      case 'field':
        roots.add(e.path.split('.')[0] ?? '');
        return;
      case 'literal':
        return;
      case 'outer':
      case 'client':
        opaque = true;
        return;
      case 'compare':
      case 'match':
      case 'arith':
        walk(e.left);
        walk(e.right);
        return;
      case 'and':
      case 'or':
        e.operands.forEach(walk);
        return;
      case 'not':
        walk(e.operand);
        return;
    }
  };
  walk(expr);
  if (opaque) return 'mixed';
  if (roots.size === 0) return 'none';
  if (roots.size > 1) return 'mixed';
  if (roots.has(leftAs)) return 'left';
  if (roots.has(rightAs)) return 'right';
  return 'mixed';
}

/**
 * Checks a join condition and splits it into equality key pairs. The
 * condition must be one equality, or an AND of equalities, each relating a
 * left-only operand to a right-only operand.
 */
export function checkJoin(
  left: RowShape,
  right: RowShape,
  on: Expr,
  leftAs: string,
  rightAs: string,
  ctx: CheckContext,
): { shape: RowShape; keys: JoinKey[] } {
  const shape: RowShape = {
    [leftAs]: { kind: 'row', shape: left },
    [rightAs]: { kind: 'row', shape: right },
  };
  const keys: JoinKey[] = [];

  if (leftAs === rightAs || leftAs === '' || rightAs === '' || leftAs.includes('.') || rightAs.includes('.')) {
    ctx.errors.push(new AmbiguousJoinError(`Join aliases "${leftAs}" and "${rightAs}" must be distinct names`));
    return { shape, keys };
  }

  const conditions = on.kind === 'and' ? on.operands : [on];
  if (conditions.length === 0) {
    ctx.errors.push(new AmbiguousJoinError('Join condition is empty'));
  }

  for (const condition of conditions) {
    if (condition.kind !== 'compare' || condition.op !== 'eq') {
      ctx.errors.push(new AmbiguousJoinError(`Join condition ${formatExpr(condition)} is not an equality`));
      continue;
    }
    const ls = sideOf(condition.left, leftAs, rightAs);
    const rs = sideOf(condition.right, leftAs, rightAs);
    let pair: JoinKey;
    if (ls === 'left' && rs === 'right') {
      pair = { left: condition.left, right: condition.right };
    } else if (ls === 'right' && rs === 'left') {
      pair = { left: condition.right, right: condition.left };
    } else {
      ctx.errors.push(
        new AmbiguousJoinError(
          `Join condition ${formatExpr(condition)} must relate "${leftAs}" on one side to "${rightAs}" on the other`,
        ),
      );
      continue;
    }

    const lt = inferExpr(pair.left, shape, ctx);
    const rt = inferExpr(pair.right, shape, ctx);
    if (lt.type === 'null' || rt.type === 'null') {
      ctx.errors.push(new TypeMismatchError(`Join keys cannot be null literals: ${formatExpr(condition)}`));
    } else if (lt.type !== 'unknown' && rt.type !== 'unknown' && lt.type !== rt.type) {
      ctx.errors.push(
        new TypeMismatchError(
          `Join keys have incompatible types: ${describe(pair.left, lt)} and ${describe(pair.right, rt)}`,
        ),
      );
    }
    keys.push(pair);
  }

  return { shape, keys };
}

export function shapeOfGroupBy(input: RowShape, key: Expr, ctx: CheckContext): RowShape {
  const k = inferExpr(key, input, ctx);
  return {
    key: scalarEntry(k),
    items: { kind: 'rows', shape: input },
  };
}

export function checkOrderKey(input: RowShape, key: Expr, ctx: CheckContext): void {
  inferExpr(key, input, ctx);
}

const AGGREGATE_TYPES: Record<Exclude<AggregateFn, 'count'>, readonly FieldType[]> = {
  sum: ['number'],
  average: ['number'],
  min: ['number', 'string', 'date'],
  max: ['number', 'string', 'date'],
};

export function shapeOfAggregate(
  input: RowShape,
  fn: AggregateFn,
  field: Expr | null,
  as: string,
  ctx: CheckContext,
): RowShape {
  const grouped = isGroupShape(input);
  const items = input['items'];
  const rowShape = grouped && items !== undefined && items.kind === 'rows' ? items.shape : input;

  const out: Record<string, ShapeEntry> = {};
  if (grouped) {
    const key = input['key'];
    if (key !== undefined) out['key'] = key;
  }
  checkOutputName(as, out, ctx);

  let result: Scalar = { type: 'number', nullable: false };
  if (field === null) {
    if (fn !== 'count') {
      ctx.errors.push(new TypeMismatchError(`${fn} needs a field to aggregate`));
      result = UNKNOWN;
    }
  } else {
    const s = inferExpr(field, rowShape, ctx);
    if (fn !== 'count') {
      expectType(field, s, AGGREGATE_TYPES[fn], `${fn} field`, ctx);
      if (fn === 'min' || fn === 'max') result = { type: s.type, nullable: false };
    }
  }

  out[as] = scalarEntry(result);
  return out;
}

export function checkLimit(take: number | null, skip: number, ctx: CheckContext): void {
  const valid = (n: number): boolean => Number.isInteger(n) && n >= 0;
  if (take !== null && !valid(take)) {
    ctx.errors.push(new TypeMismatchError(`take() needs a non-negative integer, got ${take}`));
  }
  if (!valid(skip)) {
    ctx.errors.push(new TypeMismatchError(`skip() needs a non-negative integer, got ${skip}`));
  }
}
