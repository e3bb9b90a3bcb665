import { UnsupportedOperationError } from '../errors.js';
import { MemoryAdapter } from '../adapters/memory-adapter.js';
import type { TargetAdapter } from '../adapters/types.js';
import type { EntityRegistry } from '../model/registry.js';
import { lower } from '../plan/lower.js';
import type { LogicalPlan } from '../plan/types.js';
import type { Query } from '../query/builder.js';
import type { CompiledQuery, Connection, DataSource, ExecuteOptions, ResultRow } from '../types.js';
import { QueryCursor } from './cursor.js';
import { PlanExecutor } from './executor.js';

export interface FallbackInfo {
  reason: string;
  plan: LogicalPlan;
  /** Set when the adapter rejected the plan. */
  error?: UnsupportedOperationError;
}

export interface QueryEngineConfig {
  registry: EntityRegistry;
  source: DataSource;
  /** Defaults to MemoryAdapter, which never pushes work down. */
  adapter?: TargetAdapter;
  /** Default per-pull timeout; unset means no timeout. */
  timeoutMs?: number;
  /** Called when a plan the source could run natively is evaluated in memory instead. */
  onFallback?: (info: FallbackInfo) => void;
}

const defaultOnFallback = (info: FallbackInfo): void => {
  console.warn(`[fluent-query] evaluating in memory: ${info.reason}`);
};

/**
 * Plans, compiles and executes queries against one data source. A plan runs
 * on the source as a compiled query when the adapter targets the source's
 * dialect and accepts the plan; otherwise it is evaluated in memory over
 * full entity scans.
 */
export class QueryEngine {
  readonly registry: EntityRegistry;
  readonly source: DataSource;
  readonly adapter: TargetAdapter;
  private readonly timeoutMs: number | undefined;
  private readonly onFallback: (info: FallbackInfo) => void;

  constructor(config: QueryEngineConfig) {
    this.registry = config.registry;
    this.source = config.source;
    this.adapter = config.adapter ?? new MemoryAdapter();
    this.timeoutMs = config.timeoutMs;
    this.onFallback = config.onFallback ?? defaultOnFallback;
  }

  /** Lowers a query to a validated logical plan; throws PlanValidationError listing every defect. */
  plan(query: Query): LogicalPlan {
    return lower(query.node, this.registry);
  }

  /** Compiles with the configured adapter without executing. */
  compile(query: Query): CompiledQuery {
    return this.adapter.compile(this.plan(query));
  }

  /**
   * Returns a lazy cursor. Planning happens now, so build errors throw here;
   * the source is not touched until the first pull.
   */
  iterate(query: Query, options: ExecuteOptions = {}): QueryCursor {
    const plan = this.plan(query);
    const compiled = this.pushdown(plan);
    const open = (connection: Connection): AsyncIterator<ResultRow> => {
      if (compiled !== null) {
        if (connection.run !== undefined) {
          return connection.run(compiled)[Symbol.asyncIterator]();
        }
        this.onFallback({ reason: `${this.source.name} connection cannot run compiled queries`, plan });
      }
      return new PlanExecutor(this.registry, connection).execute(plan);
    };
    return new QueryCursor({
      source: this.source,
      open,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
    });
  }

  /** Pulls every row. The returned array is frozen and detached from the source. */
  async toList(query: Query, options: ExecuteOptions = {}): Promise<readonly ResultRow[]> {
    const rows: ResultRow[] = [];
    for await (const row of this.iterate(query, options)) {
      rows.push(row);
    }
    return Object.freeze(rows);
  }

  private pushdown(plan: LogicalPlan): CompiledQuery | null {
    const dialect = this.source.dialect;
    if (dialect === undefined) return null;
    if (dialect !== this.adapter.name) {
      this.onFallback({ reason: `adapter "${this.adapter.name}" does not target ${dialect}`, plan });
      return null;
    }
    try {
      return this.adapter.compile(plan);
    } catch (err) {
      if (!(err instanceof UnsupportedOperationError)) throw err;
      this.onFallback({ reason: err.message, plan, error: err });
      return null;
    }
  }
}
