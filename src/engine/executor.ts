import { EmptyAggregateError } from '../errors.js';
import { findRelation, type EntityRegistry } from '../model/registry.js';
import type { EntityDescriptor } from '../model/types.js';
import type {
  AggregateStep,
  JoinStep,
  LetStep,
  LimitStep,
  LogicalPlan,
  PlanStep,
  ProjectStep,
  SortStep,
} from '../plan/types.js';
import type { AggregateFn, Expr } from '../query/types.js';
import type { Connection, ResultRow } from '../types.js';
import { compareForSort, compareValues, evaluate, keyOf, readPath } from './evaluate.js';

type Rows = AsyncGenerator<ResultRow>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !(value instanceof Date) && !Array.isArray(value);
}

function itemsOf(group: ResultRow): ResultRow[] {
  const items = group['items'];
  return Array.isArray(items) ? items.filter(isRecord) : [];
}

async function collect(rows: AsyncIterable<ResultRow>): Promise<ResultRow[]> {
  const out: ResultRow[] = [];
  for await (const row of rows) out.push(row);
  return out;
}

class Accumulator {
  private count = 0;
  private sum = 0;
  private best: unknown = null;

  constructor(
    private readonly fn: AggregateFn,
    private readonly field: Expr | null,
    private readonly outer: ResultRow | null,
  ) {}

  add(row: ResultRow): void {
    if (this.field === null) {
      this.count++;
      return;
    }
    const value = evaluate(this.field, row, this.outer);
    // nulls do not take part in any aggregate
    if (value === null || value === undefined) return;
    this.count++;
    if (typeof value === 'number') this.sum += value;
    if (this.count === 1) {
      this.best = value;
    } else {
      const c = compareValues(value, this.best);
      if ((this.fn === 'min' && c < 0) || (this.fn === 'max' && c > 0)) this.best = value;
    }
  }

  result(): unknown {
    switch (this.fn) {
      case 'count':
        return this.count;
      case 'sum':
        return this.sum;
      case 'average':
        if (this.count === 0) throw new EmptyAggregateError(this.fn);
        return this.sum / this.count;
      case 'min':
      case 'max':
        if (this.count === 0) throw new EmptyAggregateError(this.fn);
        return this.best;
    }
  }
}

/**
 * Evaluates a logical plan over full entity scans. Filter, project, let,
 * limit and the streamed side of a join stream; sort, group, aggregate and the
 * build side of a join read their whole input first.
 */
export class PlanExecutor {
  /** Entity rows read for correlated sub-queries, which run once per outer row. */
  private readonly buffered = new Map<string, Promise<ResultRow[]>>();

  constructor(
    private readonly registry: EntityRegistry,
    private readonly connection: Pick<Connection, 'scan'>,
  ) {}

  execute(plan: LogicalPlan): Rows {
    return this.run(plan, plan.output, null, false);
  }

  private async *run(plan: LogicalPlan, id: number, outer: ResultRow | null, nested: boolean): Rows {
    const step: PlanStep | undefined = plan.steps[id];
    if (step === undefined) {
      throw new Error(`Plan has no step ${id}`);
    }
    const input = (inputId: number): Rows => this.run(plan, inputId, outer, nested);

    switch (step.op) {
      case 'scan': {
        const entity = this.registry.get(step.entity);
        const link = step.includes.length === 0 ? null : await this.linker(entity, step.includes);
        if (nested) {
          for (const row of await this.scanBuffered(step.entity)) yield link === null ? row : link(row);
        } else {
          for await (const row of this.connection.scan(entity)) yield link === null ? row : link(row);
        }
        return;
      }

      case 'filter':
        for await (const row of input(step.input)) {
          if (evaluate(step.predicate, row, outer) === true) yield row;
        }
        return;

      case 'project':
        yield* project(step, input(step.input), outer);
        return;

      case 'join':
        yield* join(step, input(step.left), input(step.right), outer);
        return;

      case 'group': {
        const groups = new Map<string, { key: unknown; items: ResultRow[] }>();
        for await (const row of input(step.input)) {
          const key = evaluate(step.key, row, outer);
          const k = keyOf(key);
          const group = groups.get(k);
          if (group === undefined) groups.set(k, { key, items: [row] });
          else group.items.push(row);
        }
        yield* groups.values();
        return;
      }

      case 'sort':
        yield* sort(step, await collect(input(step.input)), outer);
        return;

      case 'aggregate':
        yield* aggregate(step, input(step.input), outer);
        return;

      case 'let':
        yield* this.bind(step, input(step.input), outer);
        return;

      case 'limit':
        yield* limit(step, input(step.input));
        return;
    }
  }

  private async *bind(step: LetStep, rows: Rows, outer: ResultRow | null): Rows {
    const value = step.value;
    for await (const row of rows) {
      if (value.kind === 'expr') {
        yield extend(row, step.name, evaluate(value.expr, row, outer));
        continue;
      }
      let bound: unknown = null;
      for await (const result of this.run(value.plan, value.plan.output, row, true)) {
        bound = readPath(result, value.column);
      }
      yield extend(row, step.name, bound);
    }
  }

  /**
   * Builds a function that attaches the related row of each included toOne
   * relation to a row of `entity`. Related rows are read once, indexed by key,
   * and attached as non-enumerable properties, so paths such as `movie.Release`
   * resolve while the row's own fields stay as the shape declares them.
   */
  private async linker(entity: EntityDescriptor, includes: readonly string[]): Promise<(row: ResultRow) => ResultRow> {
    const links: Array<{ name: string; foreignKey: string; index: Map<string, ResultRow> }> = [];
    for (const [name, nested] of includeTree(includes)) {
      const relation = findRelation(entity, name);
      if (relation === undefined || relation.kind !== 'toOne') {
        throw new Error(`${entity.name} has no toOne relation "${name}" to include`);
      }
      const target = this.registry.get(relation.target);
      const link = nested.length === 0 ? null : await this.linker(target, nested);
      const index = new Map<string, ResultRow>();
      for (const row of await this.scanBuffered(target.name)) {
        index.set(keyOf(row[target.key]), link === null ? row : link(row));
      }
      links.push({ name, foreignKey: relation.foreignKey, index });
    }

    return (row) => {
      const out: Record<string, unknown> = { ...row };
      for (const { name, foreignKey, index } of links) {
        const fk = row[foreignKey];
        const related = fk === null || fk === undefined ? null : (index.get(keyOf(fk)) ?? null);
        Object.defineProperty(out, name, { value: related, enumerable: false });
      }
      return out;
    };
  }

  private scanBuffered(entity: string): Promise<ResultRow[]> {
    let rows = this.buffered.get(entity);
    if (rows === undefined) {
      rows = collect(this.connection.scan(this.registry.get(entity)));
      this.buffered.set(entity, rows);
    }
    return rows;
  }
}

/** Splits `movie`, `movie.director` into `movie` → [`director`]. */
function includeTree(includes: readonly string[]): Map<string, string[]> {
  const tree = new Map<string, string[]>();
  for (const chain of includes) {
    const dot = chain.indexOf('.');
    const head = dot < 0 ? chain : chain.slice(0, dot);
    const rest = tree.get(head) ?? [];
    if (dot >= 0) rest.push(chain.slice(dot + 1));
    tree.set(head, rest);
  }
  return tree;
}

/** Copies a row with one more field, keeping the related rows attached to it. */
function extend(row: ResultRow, name: string, value: unknown): ResultRow {
  const out: Record<string, unknown> = { ...row, [name]: value };
  for (const key of Object.getOwnPropertyNames(row)) {
    const descriptor = Object.getOwnPropertyDescriptor(row, key);
    if (descriptor !== undefined && descriptor.enumerable !== true) Object.defineProperty(out, key, descriptor);
  }
  return out;
}

async function* project(step: ProjectStep, rows: Rows, outer: ResultRow | null): Rows {
  for await (const row of rows) {
    const out: Record<string, unknown> = {};
    for (const f of step.fields) {
      out[f.name] = evaluate(f.expr, row, outer);
    }
    yield out;
  }
}

function compositeKey(keys: readonly Expr[], row: ResultRow, outer: ResultRow | null): string | null {
  const parts: string[] = [];
  for (const key of keys) {
    const value = evaluate(key, row, outer);
    // null never equals anything, so the row cannot match
    if (value === null || value === undefined) return null;
    parts.push(keyOf(value));
  }
  return parts.join('\u0000');
}

async function* join(step: JoinStep, left: Rows, right: Rows, outer: ResultRow | null): Rows {
  const leftKeys = step.keys.map((k) => k.left);
  const rightKeys = step.keys.map((k) => k.right);

  const table = new Map<string, ResultRow[]>();
  for await (const row of right) {
    const key = compositeKey(rightKeys, { [step.rightAs]: row }, outer);
    if (key === null) continue;
    const bucket = table.get(key);
    if (bucket === undefined) table.set(key, [row]);
    else bucket.push(row);
  }

  for await (const row of left) {
    const key = compositeKey(leftKeys, { [step.leftAs]: row }, outer);
    if (key === null) continue;
    for (const match of table.get(key) ?? []) {
      yield { [step.leftAs]: row, [step.rightAs]: match };
    }
  }
}

function sort(step: SortStep, rows: ResultRow[], outer: ResultRow | null): ResultRow[] {
  return rows
    .map((row, index) => ({ row, index, key: evaluate(step.key, row, outer) }))
    .sort((a, b) => compareForSort(a.key, b.key, step.direction) || a.index - b.index)
    .map((entry) => entry.row);
}

async function* aggregate(step: AggregateStep, rows: Rows, outer: ResultRow | null): Rows {
  if (!step.grouped) {
    const acc = new Accumulator(step.fn, step.field, outer);
    for await (const row of rows) acc.add(row);
    yield { [step.as]: acc.result() };
    return;
  }
  for await (const group of rows) {
    const acc = new Accumulator(step.fn, step.field, outer);
    for (const item of itemsOf(group)) acc.add(item);
    yield { key: group['key'], [step.as]: acc.result() };
  }
}

async function* limit(step: LimitStep, rows: Rows): Rows {
  if (step.take === 0) return;
  let skipped = 0;
  let taken = 0;
  for await (const row of rows) {
    if (skipped < step.skip) {
      skipped++;
      continue;
    }
    yield row;
    taken++;
    if (step.take !== null && taken >= step.take) return;
  }
}
