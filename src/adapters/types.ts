import type { LogicalPlan } from '../plan/types.js';
import type { CompiledQuery } from '../types.js';

/**
 * Translates a logical plan into a backend query. `compile` throws
 * UnsupportedOperationError for plans the backend cannot express; the engine
 * then evaluates the plan in memory instead.
 */
export interface TargetAdapter {
  /** Matched against DataSource.dialect to decide whether a connection can run the output. */
  readonly name: string;
  compile(plan: LogicalPlan): CompiledQuery;
}
