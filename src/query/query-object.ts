import type { EntityRegistry } from '../model/registry.js';
import { Query, type AggregateOptions, type JoinAliases, type ProjectionSelectors } from './builder.js';
import type { Selector } from './expr.js';
import type { AggregateFn, Expr, SortDirection } from './types.js';

/**
 * Function-style entry points for the query DSL. Each one returns a new
 * Query wrapping its argument, exactly like the matching Query method.
 *
 * @example
 * const recent = project(filter(source(registry, 'Movie'), gt('Release', 2000)), ['Title']);
 */
export function source(registry: EntityRegistry, entityName: string): Query {
  return Query.from(registry, entityName);
}

export function filter(query: Query, predicate: Expr): Query {
  return query.where(predicate);
}

export function project(query: Query, selectors: ProjectionSelectors): Query {
  return query.select(selectors);
}

export function orderBy(query: Query, key: Selector, direction: SortDirection = 'asc'): Query {
  return query.orderBy(key, direction);
}

export function groupBy(query: Query, keySelector: Selector): Query {
  return query.groupBy(keySelector);
}

export function join(left: Query, right: Query, predicate: Expr, aliases: JoinAliases): Query {
  return left.join(right, predicate, aliases);
}

export function joinRelation(left: Query, relationName: string, aliases: JoinAliases): Query {
  return left.joinRelation(relationName, aliases);
}

export function aggregate(
  query: Query,
  fn: AggregateFn,
  fieldSelector: Selector | null = null,
  options: AggregateOptions = {},
): Query {
  return query.aggregate(fn, fieldSelector, options);
}

/** `let` is reserved, hence the trailing underscore. */
export function let_(query: Query, name: string, subExpression: Expr | Query): Query {
  return query.let(name, subExpression);
}

export function take(query: Query, count: number): Query {
  return query.take(count);
}

export function skip(query: Query, count: number): Query {
  return query.skip(count);
}
