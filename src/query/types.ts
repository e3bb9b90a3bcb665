import type { FieldType } from '../model/types.js';
import type { ResultRow } from '../types.js';

/** `null` is the type of a null literal; `unknown` marks a reference that failed to resolve. */
export type ScalarType = FieldType | 'null' | 'unknown';

export type ShapeEntry =
  | { readonly kind: 'scalar'; readonly type: ScalarType; readonly nullable: boolean }
  | { readonly kind: 'row'; readonly shape: RowShape }
  | { readonly kind: 'rows'; readonly shape: RowShape }
  /** A relation of `entity`; paths through it are resolved against the registry. */
  | { readonly kind: 'relation'; readonly entity: string; readonly relation: string };

export type RelationEntry = Extract<ShapeEntry, { kind: 'relation' }>;

/** Field name → entry, in output order. */
export type RowShape = { readonly [name: string]: ShapeEntry };

export type LiteralValue = string | number | boolean | Date | null;

export type CompareOp = 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte';
export type MatchOp = 'contains' | 'startsWith';
export type ArithOp = 'add' | 'sub' | 'mul' | 'div';

export type Expr =
  | { readonly kind: 'field'; readonly path: string }
  | { readonly kind: 'outer'; readonly path: string }
  | { readonly kind: 'literal'; readonly value: LiteralValue }
  | { readonly kind: 'compare'; readonly op: CompareOp; readonly left: Expr; readonly right: Expr }
  | { readonly kind: 'match'; readonly op: MatchOp; readonly left: Expr; readonly right: Expr }
  | { readonly kind: 'arith'; readonly op: ArithOp; readonly left: Expr; readonly right: Expr }
  | { readonly kind: 'and'; readonly operands: readonly Expr[] }
  | { readonly kind: 'or'; readonly operands: readonly Expr[] }
  | { readonly kind: 'not'; readonly operand: Expr }
  | {
      readonly kind: 'client';
      readonly label: string;
      readonly type: FieldType;
      readonly fn: (row: ResultRow) => unknown;
    };

export type SortDirection = 'asc' | 'desc';

export type AggregateFn = 'count' | 'min' | 'max' | 'sum' | 'average';

export interface ProjectedField {
  readonly name: string;
  readonly expr: Expr;
}

export type LetValue =
  | { readonly kind: 'expr'; readonly expr: Expr }
  | { readonly kind: 'subquery'; readonly query: QueryNode };

export type QueryNode =
  | { readonly kind: 'source'; readonly entity: string }
  | { readonly kind: 'filter'; readonly input: QueryNode; readonly predicate: Expr }
  | { readonly kind: 'project'; readonly input: QueryNode; readonly fields: readonly ProjectedField[] }
  | {
      readonly kind: 'join';
      readonly left: QueryNode;
      readonly right: QueryNode;
      readonly on: Expr;
      readonly leftAs: string;
      readonly rightAs: string;
    }
  | { readonly kind: 'groupBy'; readonly input: QueryNode; readonly key: Expr }
  | {
      readonly kind: 'orderBy';
      readonly input: QueryNode;
      readonly key: Expr;
      readonly direction: SortDirection;
    }
  | {
      readonly kind: 'aggregate';
      readonly input: QueryNode;
      readonly fn: AggregateFn;
      readonly field: Expr | null;
      readonly as: string;
    }
  | { readonly kind: 'let'; readonly input: QueryNode; readonly name: string; readonly value: LetValue }
  | { readonly kind: 'limit'; readonly input: QueryNode; readonly take: number | null; readonly skip: number };

export type QueryNodeKind = QueryNode['kind'];
