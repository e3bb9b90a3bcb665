import { PlanValidationError, TypeMismatchError, UnknownEntityError, type QueryError } from '../errors.js';
import type { EntityRegistry } from '../model/registry.js';
import type { QueryNode, RelationEntry, RowShape, ShapeEntry } from '../query/types.js';
import {
  OPEN_SHAPE,
  checkJoin,
  checkLimit,
  checkOrderKey,
  checkOutputName,
  checkPredicate,
  inferExpr,
  isGroupShape,
  scalarEntry,
  shapeOfAggregate,
  shapeOfEntity,
  shapeOfGroupBy,
  shapeOfProject,
  type CheckContext,
} from './typecheck.js';
import type { LetBinding, LogicalPlan, PlanStep, ScanStep } from './types.js';

/**
 * Lowers an expression tree into a LogicalPlan. Every field reference is
 * checked against the registry; all defects are collected and reported
 * together as a PlanValidationError.
 */
export function lower(node: QueryNode, registry: EntityRegistry): LogicalPlan {
  const errors: QueryError[] = [];
  const plan = lowerWith(node, { registry, errors, outer: null });
  if (errors.length > 0) {
    throw new PlanValidationError(errors);
  }
  return plan;
}

/** Every prefix of a relation chain: `movie.director` needs `movie` too. */
function chainPrefixes(chain: string): string[] {
  const segments = chain.split('.');
  return segments.map((_, i) => segments.slice(0, i + 1).join('.'));
}

/** Lowers without throwing; defects are appended to ctx.errors. */
export function lowerWith(node: QueryNode, outerCtx: CheckContext): LogicalPlan {
  const steps: PlanStep[] = [];
  const entities: string[] = [];

  // Relation entries of this plan's scans, and the chains read through each scan
  const scanOf = new Map<RelationEntry, number>();
  const includes = new Map<number, Set<string>>();
  const ctx: CheckContext = {
    ...outerCtx,
    onRelation: (entry, chain) => {
      const scan = scanOf.get(entry);
      if (scan === undefined) {
        // The entry belongs to an enclosing plan's row
        outerCtx.onRelation?.(entry, chain);
        return;
      }
      const chains = includes.get(scan) ?? new Set<string>();
      for (const prefix of chainPrefixes(chain)) chains.add(prefix);
      includes.set(scan, chains);
    },
  };

  // Ids are assigned in emission order, which is post-order
  const emit = (build: (id: number) => PlanStep): PlanStep => {
    const step = build(steps.length);
    steps.push(step);
    return step;
  };

  const visit = (n: QueryNode): PlanStep => {
    switch (n.kind) {
      case 'source': {
        let shape: RowShape = OPEN_SHAPE;
        if (ctx.registry.has(n.entity)) {
          shape = shapeOfEntity(ctx.registry.get(n.entity));
          if (!entities.includes(n.entity)) entities.push(n.entity);
        } else {
          ctx.errors.push(new UnknownEntityError(n.entity));
        }
        const scan = emit((id) => ({ id, op: 'scan', entity: n.entity, includes: [], shape }));
        for (const entry of Object.values(shape)) {
          if (entry.kind === 'relation') scanOf.set(entry, scan.id);
        }
        return scan;
      }

      case 'filter': {
        const input = visit(n.input);
        checkPredicate(n.predicate, input.shape, ctx);
        return emit((id) => ({ id, op: 'filter', input: input.id, predicate: n.predicate, shape: input.shape }));
      }

      case 'project': {
        const input = visit(n.input);
        const shape = shapeOfProject(input.shape, n.fields, ctx);
        return emit((id) => ({ id, op: 'project', input: input.id, fields: n.fields, shape }));
      }

      case 'join': {
        const left = visit(n.left);
        const right = visit(n.right);
        const { shape, keys } = checkJoin(left.shape, right.shape, n.on, n.leftAs, n.rightAs, ctx);
        return emit((id) => ({
          id,
          op: 'join',
          left: left.id,
          right: right.id,
          leftAs: n.leftAs,
          rightAs: n.rightAs,
          keys,
          shape,
        }));
      }

      case 'groupBy': {
        const input = visit(n.input);
        const shape = shapeOfGroupBy(input.shape, n.key, ctx);
        return emit((id) => ({ id, op: 'group', input: input.id, key: n.key, shape }));
      }

      case 'orderBy': {
        const input = visit(n.input);
        checkOrderKey(input.shape, n.key, ctx);
        return emit((id) => ({
          id,
          op: 'sort',
          input: input.id,
          key: n.key,
          direction: n.direction,
          shape: input.shape,
        }));
      }

      case 'aggregate': {
        const input = visit(n.input);
        const shape = shapeOfAggregate(input.shape, n.fn, n.field, n.as, ctx);
        return emit((id) => ({
          id,
          op: 'aggregate',
          input: input.id,
          fn: n.fn,
          field: n.field,
          as: n.as,
          grouped: isGroupShape(input.shape),
          shape,
        }));
      }

      case 'let': {
        const input = visit(n.input);
        checkOutputName(n.name, input.shape, ctx);
        let entry: ShapeEntry;
        let value: LetBinding;
        if (n.value.kind === 'expr') {
          entry = scalarEntry(inferExpr(n.value.expr, input.shape, ctx));
          value = { kind: 'expr', expr: n.value.expr };
        } else {
          const sub = lowerWith(n.value.query, { ...ctx, outer: input.shape });
          const resolved = scalarSubqueryColumn(sub, n.name, ctx);
          for (const e of sub.entities) if (!entities.includes(e)) entities.push(e);
          entry = resolved.entry;
          value = { kind: 'subquery', plan: sub, column: resolved.column };
        }
        const shape: RowShape = { ...input.shape, [n.name]: entry };
        return emit((id) => ({ id, op: 'let', input: input.id, name: n.name, value, shape }));
      }

      case 'limit': {
        const input = visit(n.input);
        checkLimit(n.take, n.skip, ctx);
        return emit((id) => ({ id, op: 'limit', input: input.id, take: n.take, skip: n.skip, shape: input.shape }));
      }
    }
  };

  const out = visit(node);
  for (const [id, chains] of includes) {
    const step = steps[id];
    if (step === undefined || step.op !== 'scan') continue;
    const sorted = [...chains].sort();
    steps[id] = { ...step, includes: sorted };
    for (const chain of sorted) {
      const target = relatedEntity(step, chain, ctx);
      if (target !== null && !entities.includes(target)) entities.push(target);
    }
  }
  return { steps, output: out.id, shape: out.shape, entities };
}

/** Entity a relation chain of a scan ends at. */
function relatedEntity(scan: ScanStep, chain: string, ctx: CheckContext): string | null {
  let entity = ctx.registry.get(scan.entity);
  for (const name of chain.split('.')) {
    const relation = entity.relations.find((r) => r.name === name);
    if (relation === undefined) return null;
    entity = ctx.registry.get(relation.target);
  }
  return entity.name;
}

/** A let sub-query must produce exactly one value: an ungrouped aggregate. */
export function scalarSubqueryColumn(
  sub: LogicalPlan,
  name: string,
  ctx: CheckContext,
): { column: string; entry: ShapeEntry } {
  const last = sub.steps[sub.output];
  if (last === undefined || last.op !== 'aggregate' || last.grouped) {
    ctx.errors.push(
      new TypeMismatchError(`let "${name}" sub-query must end in an aggregate over ungrouped rows`),
    );
    return { column: name, entry: { kind: 'scalar', type: 'unknown', nullable: true } };
  }
  const entry = last.shape[last.as];
  return { column: last.as, entry: entry ?? { kind: 'scalar', type: 'unknown', nullable: true } };
}
