import { TypeMismatchError, type QueryError } from '../errors.js';
import type { EntityRegistry } from '../model/registry.js';
import { findRelation } from '../model/registry.js';
import { lowerWith, scalarSubqueryColumn } from '../plan/lower.js';
import {
  checkJoin,
  checkLimit,
  checkOrderKey,
  checkOutputName,
  checkPredicate,
  inferExpr,
  scalarEntry,
  shapeOfAggregate,
  shapeOfEntity,
  shapeOfGroupBy,
  shapeOfProject,
  type CheckContext,
} from '../plan/typecheck.js';
import { eq, field, toSelectorExpr, type Selector } from './expr.js';
import type {
  AggregateFn,
  Expr,
  ProjectedField,
  QueryNode,
  RowShape,
  ShapeEntry,
  SortDirection,
} from './types.js';

export interface JoinAliases {
  /** Name the left row is reachable under in the joined row. */
  left: string;
  /** Name the right row is reachable under in the joined row. */
  right: string;
}

export interface AggregateOptions {
  /** Output field name; defaults to the function name. */
  as?: string;
}

export type ProjectionSelectors = readonly string[] | Readonly<Record<string, Selector>>;

/**
 * Runs one checking step and throws its first defect. Builder calls stop at
 * the first error; the planner reports every error of a whole tree.
 */
function check<T>(registry: EntityRegistry, run: (ctx: CheckContext) => T): T {
  const errors: QueryError[] = [];
  const result = run({ registry, errors, outer: 'deferred' });
  const first = errors[0];
  if (first !== undefined) throw first;
  return result;
}

function toProjectedFields(selectors: ProjectionSelectors): ProjectedField[] {
  if (isPathList(selectors)) {
    return selectors.map((path) => ({ name: path.split('.').pop() ?? path, expr: field(path) }));
  }
  return Object.entries(selectors).map(([name, selector]) => ({ name, expr: toSelectorExpr(selector) }));
}

function isPathList(selectors: ProjectionSelectors): selectors is readonly string[] {
  return Array.isArray(selectors);
}

/** Follows filter/order/let/limit nodes down to the entity the rows come from. */
function rootEntity(node: QueryNode): string | null {
  switch (node.kind) {
    case 'source':
      return node.entity;
    case 'filter':
    case 'orderBy':
    case 'let':
    case 'limit':
      return rootEntity(node.input);
    default:
      return null;
  }
}

/**
 * Fluent immutable query builder. Every operation type-checks its arguments
 * against the current row shape and returns a new Query wrapping the previous
 * node; existing instances are never mutated and nothing touches a data source.
 */
export class Query {
  constructor(
    readonly node: QueryNode,
    readonly shape: RowShape,
    readonly registry: EntityRegistry,
  ) {}

  /** Starts a query over every row of a registered entity. */
  static from(registry: EntityRegistry, entity: string): Query {
    const descriptor = registry.get(entity);
    return new Query({ kind: 'source', entity }, shapeOfEntity(descriptor), registry);
  }

  where(predicate: Expr): Query {
    check(this.registry, (ctx) => checkPredicate(predicate, this.shape, ctx));
    return this.wrap({ kind: 'filter', input: this.node, predicate }, this.shape);
  }

  /**
   * Projects rows onto a new shape. A list of paths keeps each path's last
   * segment as the output name; a record maps output names to selectors.
   */
  select(selectors: ProjectionSelectors): Query {
    const fields = toProjectedFields(selectors);
    const shape = check(this.registry, (ctx) => shapeOfProject(this.shape, fields, ctx));
    return this.wrap({ kind: 'project', input: this.node, fields }, shape);
  }

  /** Stable sort; a later orderBy takes precedence and earlier orderings break its ties. */
  orderBy(key: Selector, direction: SortDirection = 'asc'): Query {
    const expr = toSelectorExpr(key);
    check(this.registry, (ctx) => checkOrderKey(this.shape, expr, ctx));
    return this.wrap({ kind: 'orderBy', input: this.node, key: expr, direction }, this.shape);
  }

  orderByDescending(key: Selector): Query {
    return this.orderBy(key, 'desc');
  }

  /** Partitions rows into `{ key, items }` groups, in first-appearance order of the key. */
  groupBy(key: Selector): Query {
    const expr = toSelectorExpr(key);
    const shape = check(this.registry, (ctx) => shapeOfGroupBy(this.shape, expr, ctx));
    return this.wrap({ kind: 'groupBy', input: this.node, key: expr }, shape);
  }

  /**
   * Inner equi-join. `on` is written against the joined row, e.g.
   * `eq('movie.id', 'actor.MovieId')` with aliases `{ left: 'movie', right: 'actor' }`.
   */
  join(right: Query, on: Expr, aliases: JoinAliases): Query {
    const { shape } = check(this.registry, (ctx) =>
      checkJoin(this.shape, right.shape, on, aliases.left, aliases.right, ctx),
    );
    return this.wrap(
      { kind: 'join', left: this.node, right: right.node, on, leftAs: aliases.left, rightAs: aliases.right },
      shape,
    );
  }

  /** Joins along a relation registered on the entity this query reads. */
  joinRelation(relation: string, aliases: JoinAliases): Query {
    const entityName = rootEntity(this.node);
    if (entityName === null) {
      throw new TypeMismatchError(`joinRelation("${relation}") needs a query that reads a single entity`);
    }
    const entity = this.registry.get(entityName);
    const rel = findRelation(entity, relation);
    if (rel === undefined) {
      throw new TypeMismatchError(`${entity.name} has no relation "${relation}"`);
    }
    const target = this.registry.get(rel.target);
    const on =
      rel.kind === 'toMany'
        ? eq(`${aliases.left}.${entity.key}`, field(`${aliases.right}.${rel.foreignKey}`))
        : eq(`${aliases.left}.${rel.foreignKey}`, field(`${aliases.right}.${target.key}`));
    return this.join(Query.from(this.registry, target.name), on, aliases);
  }

  /**
   * Aggregates the rows, or each group's items when the query is grouped.
   * min, max and average fail at execution time on empty input.
   */
  aggregate(fn: AggregateFn, selector: Selector | null = null, options: AggregateOptions = {}): Query {
    const expr = selector === null ? null : toSelectorExpr(selector);
    const as = options.as ?? fn;
    const shape = check(this.registry, (ctx) => shapeOfAggregate(this.shape, fn, expr, as, ctx));
    return this.wrap({ kind: 'aggregate', input: this.node, fn, field: expr, as }, shape);
  }

  count(selector: Selector | null = null, options: AggregateOptions = {}): Query {
    return this.aggregate('count', selector, options);
  }

  sum(selector: Selector, options: AggregateOptions = {}): Query {
    return this.aggregate('sum', selector, options);
  }

  min(selector: Selector, options: AggregateOptions = {}): Query {
    return this.aggregate('min', selector, options);
  }

  max(selector: Selector, options: AggregateOptions = {}): Query {
    return this.aggregate('max', selector, options);
  }

  average(selector: Selector, options: AggregateOptions = {}): Query {
    return this.aggregate('average', selector, options);
  }

  /**
   * Binds a value under `name` on every row. `value` is either an expression
   * or a sub-query ending in an ungrouped aggregate, which may read the
   * current row through `outer(path)`.
   */
  let(name: string, value: Expr | Query): Query {
    const entry = check(this.registry, (ctx): ShapeEntry => {
      checkOutputName(name, this.shape, ctx);
      if (value instanceof Query) {
        const sub = lowerWith(value.node, { ...ctx, outer: this.shape });
        return scalarSubqueryColumn(sub, name, ctx).entry;
      }
      return scalarEntry(inferExpr(value, this.shape, ctx));
    });
    const node: QueryNode = {
      kind: 'let',
      input: this.node,
      name,
      value: value instanceof Query ? { kind: 'subquery', query: value.node } : { kind: 'expr', expr: value },
    };
    return this.wrap(node, { ...this.shape, [name]: entry });
  }

  take(count: number): Query {
    check(this.registry, (ctx) => checkLimit(count, 0, ctx));
    return this.wrap({ kind: 'limit', input: this.node, take: count, skip: 0 }, this.shape);
  }

  skip(count: number): Query {
    check(this.registry, (ctx) => checkLimit(null, count, ctx));
    return this.wrap({ kind: 'limit', input: this.node, take: null, skip: count }, this.shape);
  }

  private wrap(node: QueryNode, shape: RowShape): Query {
    return new Query(node, shape, this.registry);
  }
}
