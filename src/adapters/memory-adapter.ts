import { explain } from '../plan/explain.js';
import type { LogicalPlan } from '../plan/types.js';
import type { RowShape } from '../query/types.js';
import type { ColumnInfo, CompiledQuery } from '../types.js';
import type { TargetAdapter } from './types.js';

function leafColumns(shape: RowShape, prefix = ''): ColumnInfo[] {
  const columns: ColumnInfo[] = [];
  for (const [name, entry] of Object.entries(shape)) {
    const path = prefix === '' ? name : `${prefix}.${name}`;
    if (entry.kind === 'scalar') {
      columns.push({ path, type: entry.type === 'null' ? 'unknown' : entry.type });
    } else if (entry.kind === 'row') {
      columns.push(...leafColumns(entry.shape, path));
    }
  }
  return columns;
}

/**
 * Adapter for in-process evaluation. It never rejects a plan; its query
 * string is the plan's explain() text.
 */
export class MemoryAdapter implements TargetAdapter {
  readonly name = 'memory';

  compile(plan: LogicalPlan): CompiledQuery {
    return { text: explain(plan), params: [], columns: leafColumns(plan.shape) };
  }
}
