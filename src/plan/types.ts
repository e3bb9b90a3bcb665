import type { AggregateFn, Expr, ProjectedField, RowShape, SortDirection } from '../query/types.js';

/** One equality of an equi-join; `left` reads the left row, `right` the right row. */
export interface JoinKey {
  readonly left: Expr;
  readonly right: Expr;
}

interface StepBase {
  /** Position in LogicalPlan.steps; inputs always have smaller ids. */
  readonly id: number;
  /** Shape of the rows this step produces. */
  readonly shape: RowShape;
}

export interface ScanStep extends StepBase {
  readonly op: 'scan';
  readonly entity: string;
  /**
   * toOne relation chains read through this scan's rows, such as `movie` or
   * `movie.director`, sorted so every chain follows its prefix.
   */
  readonly includes: readonly string[];
}

export interface FilterStep extends StepBase {
  readonly op: 'filter';
  readonly input: number;
  readonly predicate: Expr;
}

export interface ProjectStep extends StepBase {
  readonly op: 'project';
  readonly input: number;
  readonly fields: readonly ProjectedField[];
}

export interface JoinStep extends StepBase {
  readonly op: 'join';
  readonly left: number;
  readonly right: number;
  readonly leftAs: string;
  readonly rightAs: string;
  readonly keys: readonly JoinKey[];
}

export interface GroupStep extends StepBase {
  readonly op: 'group';
  readonly input: number;
  readonly key: Expr;
}

export interface SortStep extends StepBase {
  readonly op: 'sort';
  readonly input: number;
  readonly key: Expr;
  readonly direction: SortDirection;
}

export interface AggregateStep extends StepBase {
  readonly op: 'aggregate';
  readonly input: number;
  readonly fn: AggregateFn;
  readonly field: Expr | null;
  readonly as: string;
  /** True when the input rows are groups and the aggregate runs once per group. */
  readonly grouped: boolean;
}

export type LetBinding =
  | { readonly kind: 'expr'; readonly expr: Expr }
  | { readonly kind: 'subquery'; readonly plan: LogicalPlan; readonly column: string };

export interface LetStep extends StepBase {
  readonly op: 'let';
  readonly input: number;
  readonly name: string;
  readonly value: LetBinding;
}

export interface LimitStep extends StepBase {
  readonly op: 'limit';
  readonly input: number;
  readonly take: number | null;
  readonly skip: number;
}

export type PlanStep =
  | ScanStep
  | FilterStep
  | ProjectStep
  | JoinStep
  | GroupStep
  | SortStep
  | AggregateStep
  | LetStep
  | LimitStep;

export type PlanOp = PlanStep['op'];

/**
 * Validated, ordered operation list lowered from one expression tree.
 * Steps appear in post-order, so every step follows the steps it reads.
 */
export interface LogicalPlan {
  readonly steps: readonly PlanStep[];
  readonly output: number;
  readonly shape: RowShape;
  /** Entities read anywhere in the plan, in first-use order. */
  readonly entities: readonly string[];
}
