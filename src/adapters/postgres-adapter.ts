import { UnsupportedOperationError } from '../errors.js';
import { findField, findRelation, type EntityRegistry } from '../model/registry.js';
import type { EntityDescriptor, FieldType } from '../model/types.js';
import { ARITH_SYMBOLS, COMPARE_SYMBOLS } from '../query/expr.js';
import type { AggregateFn, Expr, ShapeEntry, SortDirection } from '../query/types.js';
import type { AggregateStep, JoinStep, LetStep, LogicalPlan, PlanStep, ProjectStep, ScanStep } from '../plan/types.js';
import type { ColumnInfo, CompiledQuery } from '../types.js';
import type { TargetAdapter } from './types.js';

const BACKEND = 'postgres';

interface Column {
  /** Dotted output path; becomes the column alias. */
  path: string;
  sql: string;
  type: FieldType | 'unknown';
  aggregate?: AggregateFn;
  /** Carried through derived tables but left out of the final SELECT list. */
  hidden?: boolean;
}

interface OrderTerm {
  sql: string;
  direction: SortDirection;
  /** Strings sort by code point, as they do in memory. */
  collate: boolean;
}

const COLLATE_C = 'COLLATE "C"';

/** One SELECT under construction. Operations merge into it until one cannot, then it is nested. */
interface SelectState {
  from: string;
  /** True when `from` already contains a join, so it needs parentheses on the right of another. */
  joined: boolean;
  columns: Column[];
  where: string[];
  groupBy: string | null;
  /** Columns of the rows inside each group, kept for a following aggregate. */
  itemColumns: Column[] | null;
  aggregated: boolean;
  orderBy: OrderTerm[];
  limit: number | null;
  offset: number;
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function typeOf(entry: ShapeEntry | undefined): FieldType | 'unknown' {
  if (entry === undefined || entry.kind !== 'scalar') return 'unknown';
  return entry.type === 'null' ? 'unknown' : entry.type;
}

function columnOf(entity: EntityDescriptor, fieldName: string): string {
  const field = findField(entity, fieldName);
  return quoteIdent(field?.column ?? fieldName);
}

function entityColumns(entity: EntityDescriptor, alias: string, prefix: string, hidden: boolean): Column[] {
  return entity.fields.map((f) => ({
    path: `${prefix}${f.name}`,
    sql: `${alias}.${quoteIdent(f.column ?? f.name)}`,
    type: f.type,
    ...(hidden ? { hidden } : {}),
  }));
}

/** The same column under a new name, visible in the output. */
function renamed(c: Column, path: string): Column {
  return c.aggregate !== undefined
    ? { path, sql: c.sql, type: c.type, aggregate: c.aggregate }
    : { path, sql: c.sql, type: c.type };
}

function toColumnInfo(c: Column): ColumnInfo {
  return c.aggregate !== undefined
    ? { path: c.path, type: c.type, aggregate: c.aggregate }
    : { path: c.path, type: c.type };
}

/**
 * Compiles logical plans to PostgreSQL. Literals become `$n` parameters,
 * identifiers are double-quoted, and table aliases are numbered in visit
 * order, so the same plan always yields the same text and parameter list.
 */
export class PostgresAdapter implements TargetAdapter {
  readonly name = BACKEND;

  constructor(private readonly registry: EntityRegistry) {}

  compile(plan: LogicalPlan): CompiledQuery {
    const ctx = new CompileContext(this.registry);
    const state = ctx.step(plan, plan.output, null);
    const text = ctx.render(state, true);
    const columns = state.columns.filter((c) => c.hidden !== true).map(toColumnInfo);
    return { text, params: ctx.params, columns };
  }
}

/** Full-table read used when a plan has to be evaluated in memory. */
export function compileScanQuery(entity: EntityDescriptor): CompiledQuery {
  const select = entity.fields
    .map((f) => `${quoteIdent(f.column ?? f.name)} AS ${quoteIdent(f.name)}`)
    .join(', ');
  return {
    text: [`SELECT ${select}`, `FROM ${quoteIdent(entity.table)}`].join('\n'),
    params: [],
    columns: entity.fields.map((f) => ({ path: f.name, type: f.type })),
  };
}

class CompileContext {
  readonly params: unknown[] = [];
  private tables = 0;
  private derived = 0;
  private sortKeys = 0;

  constructor(private readonly registry: EntityRegistry) {}

  private param(value: unknown): string {
    this.params.push(value);
    return `$${this.params.length}`;
  }

  step(plan: LogicalPlan, id: number, outer: Column[] | null): SelectState {
    const step: PlanStep | undefined = plan.steps[id];
    if (step === undefined) {
      throw new Error(`Plan has no step ${id}`);
    }

    switch (step.op) {
      case 'scan': {
        const { from, columns } = this.scan(step);
        return {
          from,
          joined: step.includes.length > 0,
          columns,
          where: [],
          groupBy: null,
          itemColumns: null,
          aggregated: false,
          orderBy: [],
          limit: null,
          offset: 0,
        };
      }

      case 'filter': {
        let state = this.step(plan, step.input, outer);
        if (state.aggregated || hasLimit(state)) state = this.wrap(state);
        const predicate = this.expr(step.predicate, state.columns, outer);
        return { ...state, where: [...state.where, predicate] };
      }

      case 'project':
        return this.project(step, this.step(plan, step.input, outer), outer);

      case 'join':
        return this.join(plan, step, outer);

      case 'group': {
        let state = this.step(plan, step.input, outer);
        if (state.aggregated || hasLimit(state) || state.groupBy !== null) state = this.wrap(state);
        const key = this.expr(step.key, state.columns, outer);
        return {
          ...state,
          columns: [{ path: 'key', sql: key, type: typeOf(step.shape['key']) }],
          groupBy: key,
          itemColumns: state.columns,
          // Row order is not carried into SQL groups
          orderBy: [],
        };
      }

      case 'sort': {
        let state = this.step(plan, step.input, outer);
        if (hasLimit(state)) state = this.wrap(state);
        const key = this.expr(step.key, state.columns, outer);
        const term: OrderTerm = { sql: key, direction: step.direction, collate: isText(step.key, state.columns, outer) };
        // Stable sort: the new key leads, earlier orderings break ties
        return { ...state, orderBy: [term, ...state.orderBy] };
      }

      case 'aggregate':
        return this.aggregate(step, this.step(plan, step.input, outer), outer);

      case 'let':
        return this.bind(step, this.step(plan, step.input, outer), outer);

      case 'limit': {
        const state = this.step(plan, step.input, outer);
        // A window of a window is still one window
        const offset = state.offset + step.skip;
        const remaining = state.limit === null ? null : Math.max(state.limit - step.skip, 0);
        const limit = remaining === null ? step.take : step.take === null ? remaining : Math.min(remaining, step.take);
        return { ...state, limit, offset };
      }
    }
  }

  /** A table read; each included relation becomes a LEFT JOIN on its foreign key with hidden columns. */
  private scan(step: ScanStep): { from: string; columns: Column[] } {
    const entity = this.registry.get(step.entity);
    const alias = `t${this.tables++}`;
    const lines = [`${quoteIdent(entity.table)} AS ${alias}`];
    const columns = entityColumns(entity, alias, '', false);
    const joined = new Map<string, { entity: EntityDescriptor; alias: string }>([['', { entity, alias }]]);

    // Chains are sorted, so a chain's parent is always joined first
    for (const chain of step.includes) {
      const dot = chain.lastIndexOf('.');
      const parent = joined.get(dot < 0 ? '' : chain.slice(0, dot));
      const relation = parent === undefined ? undefined : findRelation(parent.entity, chain.slice(dot + 1));
      if (parent === undefined || relation === undefined || relation.kind !== 'toOne') {
        throw new Error(`${entity.name} has no toOne relation chain "${chain}" to include`);
      }
      const target = this.registry.get(relation.target);
      const targetAlias = `t${this.tables++}`;
      lines.push(
        `LEFT JOIN ${quoteIdent(target.table)} AS ${targetAlias} ON ` +
          `${parent.alias}.${columnOf(parent.entity, relation.foreignKey)} = ${targetAlias}.${columnOf(target, target.key)}`,
      );
      columns.push(...entityColumns(target, targetAlias, `${chain}.`, true));
      joined.set(chain, { entity: target, alias: targetAlias });
    }
    return { from: lines.join('\n'), columns };
  }

  private project(step: ProjectStep, input: SelectState, outer: Column[] | null): SelectState {
    const columns: Column[] = [];
    for (const f of step.fields) {
      if (f.expr.kind === 'field') {
        const path = f.expr.path;
        if (input.itemColumns !== null && path === 'items') {
          throw new UnsupportedOperationError(BACKEND, 'projecting the rows of a group');
        }
        const exact = input.columns.find((c) => c.path === path);
        if (exact !== undefined) {
          columns.push(renamed(exact, f.name));
          continue;
        }
        const nested = input.columns.filter((c) => c.path.startsWith(`${path}.`));
        if (nested.length > 0) {
          for (const c of nested) columns.push({ ...c, path: `${f.name}${c.path.slice(path.length)}` });
          continue;
        }
      }
      const sql = this.expr(f.expr, input.columns, outer);
      columns.push({ path: f.name, sql, type: typeOf(step.shape[f.name]) });
    }
    return { ...input, columns, itemColumns: input.itemColumns === null ? null : [] };
  }

  private join(plan: LogicalPlan, step: JoinStep, outer: Column[] | null): SelectState {
    let left = this.step(plan, step.left, outer);
    if (needsIsolation(left)) left = this.wrap(left);
    let right = this.step(plan, step.right, outer);
    if (needsIsolation(right)) right = this.wrap(right);

    const prefix = (cols: Column[], alias: string): Column[] =>
      cols.map((c) => ({ ...c, path: `${alias}.${c.path}` }));
    const columns = [...prefix(left.columns, step.leftAs), ...prefix(right.columns, step.rightAs)];

    const on = step.keys
      .map((k) => `${this.expr(k.left, columns, outer)} = ${this.expr(k.right, columns, outer)}`)
      .join(' AND ');
    const rightFrom = right.joined ? `(${right.from})` : right.from;

    return {
      from: `${left.from}\nINNER JOIN ${rightFrom} ON ${on}`,
      joined: true,
      columns,
      where: [...left.where, ...right.where],
      groupBy: null,
      itemColumns: null,
      aggregated: false,
      // Left order first; matches keep the right side's order
      orderBy: [...left.orderBy, ...right.orderBy],
      limit: null,
      offset: 0,
    };
  }

  private aggregate(step: AggregateStep, input: SelectState, outer: Column[] | null): SelectState {
    let state = input;
    if (step.grouped) {
      if (state.itemColumns === null || state.itemColumns.length === 0 || hasLimit(state)) {
        throw new UnsupportedOperationError(BACKEND, `${step.fn} over groups that were reshaped or limited`);
      }
      const items = state.itemColumns;
      const value = this.aggregateSql(step, items, outer);
      const key = state.columns.filter((c) => c.path === 'key');
      return {
        ...state,
        columns: [...key, { path: step.as, sql: value, type: typeOf(step.shape[step.as]), aggregate: step.fn }],
        itemColumns: null,
        aggregated: true,
      };
    }

    if (state.aggregated || state.groupBy !== null || hasLimit(state)) state = this.wrap(state);
    const value = this.aggregateSql(step, state.columns, outer);
    return {
      ...state,
      columns: [{ path: step.as, sql: value, type: typeOf(step.shape[step.as]), aggregate: step.fn }],
      aggregated: true,
      orderBy: [],
    };
  }

  private aggregateSql(step: AggregateStep, columns: Column[], outer: Column[] | null): string {
    const arg = step.field === null ? null : this.expr(step.field, columns, outer);
    switch (step.fn) {
      case 'count':
        return arg === null ? 'COUNT(*)' : `COUNT(${arg})`;
      case 'sum':
        return `COALESCE(SUM(${arg ?? 'NULL'}), 0)`;
      case 'min':
      case 'max': {
        const text = step.field !== null && isText(step.field, columns, outer);
        return `${step.fn.toUpperCase()}(${arg ?? 'NULL'}${text ? ` ${COLLATE_C}` : ''})`;
      }
      case 'average':
        return `AVG(${arg ?? 'NULL'})`;
    }
  }

  private bind(step: LetStep, input: SelectState, outer: Column[] | null): SelectState {
    const type = typeOf(step.shape[step.name]);
    if (step.value.kind === 'expr') {
      const sql = this.expr(step.value.expr, input.columns, outer);
      return { ...input, columns: [...input.columns, { path: step.name, sql, type }] };
    }

    // Correlated scalar sub-query: the sub-plan reads this row's columns as its outer scope
    const { plan: subPlan, column: columnName } = step.value;
    const sub = this.step(subPlan, subPlan.output, input.columns);
    const column = sub.columns.find((c) => c.path === columnName);
    const only = column === undefined ? sub : { ...sub, columns: [column] };
    const sql = `(${this.render(only)})`;
    const bound: Column =
      column?.aggregate !== undefined
        ? { path: step.name, sql, type, aggregate: column.aggregate }
        : { path: step.name, sql, type };
    return { ...input, columns: [...input.columns, bound] };
  }

  /**
   * Nests a SELECT as a derived table so later operations apply to its output
   * rows. A derived table's order does not survive, so every sort key is
   * selected (as a hidden column when it is not one already) and re-applied
   * outside.
   */
  private wrap(state: SelectState): SelectState {
    const alias = `s${this.derived++}`;
    const innerColumns = [...state.columns];
    const orderBy: OrderTerm[] = [];
    for (const term of state.orderBy) {
      let column = innerColumns.find((c) => c.sql === term.sql);
      if (column === undefined) {
        column = { path: `__o${this.sortKeys++}`, sql: term.sql, type: 'unknown', hidden: true };
        innerColumns.push(column);
      }
      orderBy.push({ ...term, sql: `${alias}.${quoteIdent(column.path)}` });
    }
    const inner = this.render({ ...state, columns: innerColumns });
    const columns = innerColumns.map((c) => ({ ...c, sql: `${alias}.${quoteIdent(c.path)}` }));
    return {
      from: `(${inner}) AS ${alias}`,
      joined: false,
      columns,
      where: [],
      groupBy: null,
      itemColumns: null,
      aggregated: false,
      orderBy,
      limit: null,
      offset: 0,
    };
  }

  /** Renders one SELECT; the outermost one (`final`) leaves hidden columns out. */
  render(state: SelectState, final = false): string {
    if (state.itemColumns !== null && state.itemColumns.length > 0 && !state.aggregated) {
      throw new UnsupportedOperationError(BACKEND, 'groupBy without an aggregate');
    }
    const select = state.columns
      .filter((c) => !final || c.hidden !== true)
      .map((c) => `${c.sql} AS ${quoteIdent(c.path)}`)
      .join(', ');
    const lines = [`SELECT ${select}`, `FROM ${state.from}`];
    if (state.where.length > 0) lines.push(`WHERE ${state.where.join(' AND ')}`);
    if (state.groupBy !== null) lines.push(`GROUP BY ${state.groupBy}`);
    if (state.orderBy.length > 0) {
      const terms = state.orderBy.map((t) => {
        const key = t.collate ? `${t.sql} ${COLLATE_C}` : t.sql;
        return t.direction === 'asc' ? `${key} ASC NULLS FIRST` : `${key} DESC NULLS LAST`;
      });
      lines.push(`ORDER BY ${terms.join(', ')}`);
    }
    if (state.limit !== null) lines.push(`LIMIT ${this.param(state.limit)}`);
    if (state.offset > 0) lines.push(`OFFSET ${this.param(state.offset)}`);
    return lines.join('\n');
  }

  expr(expr: Expr, columns: Column[], outer: Column[] | null): string {
    switch (expr.kind) {
      case 'field':
        return lookup(columns, expr.path);

      case 'outer':
        if (outer === null) throw new UnsupportedOperationError(BACKEND, `outer.${expr.path} outside a sub-query`);
        return lookup(outer, expr.path);

      case 'literal':
        return expr.value === null ? 'NULL' : this.param(expr.value);

      case 'compare': {
        const nullSide = isNullLiteral(expr.right) ? expr.left : isNullLiteral(expr.left) ? expr.right : null;
        if (nullSide !== null) {
          const operand = this.expr(nullSide, columns, outer);
          return expr.op === 'eq' ? `${operand} IS NULL` : `${operand} IS NOT NULL`;
        }
        const l = this.expr(expr.left, columns, outer);
        const r = this.expr(expr.right, columns, outer);
        const ordering = expr.op !== 'eq' && expr.op !== 'ne';
        const text = ordering && (isText(expr.left, columns, outer) || isText(expr.right, columns, outer));
        return `${l}${text ? ` ${COLLATE_C}` : ''} ${COMPARE_SYMBOLS[expr.op]} ${r}`;
      }

      case 'match': {
        const l = this.expr(expr.left, columns, outer);
        const r = this.expr(expr.right, columns, outer);
        return expr.op === 'contains' ? `strpos(${l}, ${r}) > 0` : `starts_with(${l}, ${r})`;
      }

      case 'arith': {
        const l = this.expr(expr.left, columns, outer);
        const r = this.expr(expr.right, columns, outer);
        if (expr.op === 'div') return `(${l}::numeric / NULLIF(${r}, 0))`;
        return `(${l} ${ARITH_SYMBOLS[expr.op]} ${r})`;
      }

      case 'and':
        if (expr.operands.length === 0) return 'TRUE';
        return `(${expr.operands.map((o) => this.expr(o, columns, outer)).join(' AND ')})`;

      case 'or':
        if (expr.operands.length === 0) return 'FALSE';
        return `(${expr.operands.map((o) => this.expr(o, columns, outer)).join(' OR ')})`;

      case 'not':
        return `NOT (${this.expr(expr.operand, columns, outer)})`;

      case 'client':
        throw new UnsupportedOperationError(BACKEND, `client-side function "${expr.label}"`);
    }
  }
}

function lookup(columns: Column[], path: string): string {
  const column = columns.find((c) => c.path === path);
  if (column === undefined) {
    throw new UnsupportedOperationError(BACKEND, `a reference to "${path}" that is not a column`);
  }
  return column.sql;
}

/** True when `expr` is a string column or literal, whose ordering depends on collation. */
function isText(expr: Expr, columns: Column[], outer: Column[] | null): boolean {
  switch (expr.kind) {
    case 'field':
      return columns.find((c) => c.path === expr.path)?.type === 'string';
    case 'outer':
      return outer?.find((c) => c.path === expr.path)?.type === 'string';
    case 'literal':
      return typeof expr.value === 'string';
    default:
      return false;
  }
}

function isNullLiteral(expr: Expr): boolean {
  return expr.kind === 'literal' && expr.value === null;
}

function hasLimit(state: SelectState): boolean {
  return state.limit !== null || state.offset > 0;
}

/** A join side that grouped, aggregated or limited its rows must be nested before joining. */
function needsIsolation(state: SelectState): boolean {
  return state.aggregated || state.groupBy !== null || hasLimit(state);
}
