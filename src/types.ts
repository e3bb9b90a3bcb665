import type { EntityDescriptor, FieldType } from './model/types.js';
import type { AggregateFn } from './query/types.js';

/** One output row; its shape is fixed by the last project/aggregate step. */
export type ResultRow = Readonly<Record<string, unknown>>;

/** Output column of a compiled query: dotted path, declared type, and aggregate it came from. */
export interface ColumnInfo {
  path: string;
  type: FieldType | 'unknown';
  aggregate?: AggregateFn;
}

export interface CompiledQuery {
  /** Backend query text; identical for identical plans. */
  text: string;
  params: unknown[];
  columns: ColumnInfo[];
}

/**
 * One checked-out session against a data source. `run` is present only when
 * the backend executes compiled queries; otherwise the engine falls back to scans.
 */
export interface Connection {
  scan(entity: EntityDescriptor): AsyncIterable<Record<string, unknown>>;
  run?(compiled: CompiledQuery): AsyncIterable<Record<string, unknown>>;
  /** Called exactly once. `error` is set when the session ended in failure. */
  release(error?: Error): Promise<void>;
}

export interface DataSource {
  readonly name: string;
  /** Query language the source's connections run; absent when it can only scan. */
  readonly dialect?: string;
  connect(): Promise<Connection>;
}

export type CursorState = 'NotStarted' | 'Running' | 'Completed' | 'Failed';

export interface ExecuteOptions {
  /** Upper bound for acquiring a connection and for each row pull. */
  timeoutMs?: number;
  signal?: AbortSignal;
}
