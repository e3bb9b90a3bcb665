import { CancelledError, QueryError, SourceError, TimeoutError } from '../errors.js';
import type { Connection, CursorState, DataSource, ResultRow } from '../types.js';

export interface CursorOptions {
  source: DataSource;
  /** Starts producing rows on a freshly acquired connection. */
  open: (connection: Connection) => AsyncIterator<ResultRow>;
  timeoutMs: number | undefined;
  signal: AbortSignal | undefined;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Lazy, single-pass cursor over query results.
 *
 * Nothing is read from the source until the first `next()`. Pulls are
 * serialized. The connection is released exactly once, whether the cursor is
 * exhausted, closed early, times out, is cancelled or fails. After a failure
 * every later pull rejects with the same error.
 */
export class QueryCursor implements AsyncIterableIterator<ResultRow> {
  private current: CursorState = 'NotStarted';
  private connection: Connection | null = null;
  private rows: AsyncIterator<ResultRow> | null = null;
  private failure: QueryError | null = null;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: CursorOptions) {}

  get state(): CursorState {
    return this.current;
  }

  /** The error the cursor failed with, if any. */
  get error(): QueryError | null {
    return this.failure;
  }

  next(): Promise<IteratorResult<ResultRow>> {
    return this.enqueue(() => this.pull());
  }

  return(): Promise<IteratorResult<ResultRow>> {
    return this.enqueue(() => this.stop());
  }

  /** Stops the cursor and releases its connection; rows not yet pulled are discarded. */
  async close(): Promise<void> {
    await this.return();
  }

  [Symbol.asyncIterator](): QueryCursor {
    return this;
  }

  private enqueue(work: () => Promise<IteratorResult<ResultRow>>): Promise<IteratorResult<ResultRow>> {
    const result = this.pending.then(work);
    // keeps the queue moving; the caller still sees the rejection through `result`
    this.pending = result.catch(() => undefined);
    return result;
  }

  private async pull(): Promise<IteratorResult<ResultRow>> {
    if (this.failure !== null) throw this.failure;
    if (this.current === 'Completed') return DONE;

    try {
      if (this.options.signal?.aborted === true) {
        throw new CancelledError(this.options.signal.reason);
      }
      let rows = this.rows;
      if (rows === null) {
        this.current = 'Running';
        const connection = await this.race(this.options.source.connect(), (late) => late.release());
        this.connection = connection;
        rows = this.options.open(connection);
        this.rows = rows;
      }
      const next = await this.race(rows.next());
      if (next.done === true) {
        await this.finish('Completed');
        return DONE;
      }
      return { done: false, value: next.value };
    } catch (err) {
      throw await this.fail(err);
    }
  }

  private async stop(): Promise<IteratorResult<ResultRow>> {
    if (this.current === 'Completed' || this.current === 'Failed') return DONE;
    const rows = this.rows;
    this.rows = null;
    try {
      if (rows !== null && rows.return !== undefined) await rows.return();
    } finally {
      await this.finish('Completed');
    }
    return DONE;
  }

  private async fail(err: unknown): Promise<QueryError> {
    const error = err instanceof QueryError ? err : new SourceError(`Query execution failed: ${describe(err)}`, err);
    this.failure = error;
    this.rows = null;
    try {
      await this.finish('Failed', error);
    } catch (releaseErr) {
      console.warn('[fluent-query] failed to release connection after error', releaseErr);
    }
    return error;
  }

  private async finish(state: 'Completed' | 'Failed', error?: QueryError): Promise<void> {
    this.current = state;
    const connection = this.connection;
    this.connection = null;
    if (connection !== null) await connection.release(error);
  }

  /**
   * Settles with `work` unless the timeout or the abort signal fires first.
   * A value that arrives after that is handed to `onLate`.
   */
  private race<T>(work: Promise<T>, onLate?: (value: T) => Promise<void>): Promise<T> {
    const { timeoutMs, signal } = this.options;
    if (timeoutMs === undefined && signal === undefined) return work;

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (): boolean => {
        if (settled) return false;
        settled = true;
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        return true;
      };
      const onAbort = (): void => {
        if (settle()) reject(new CancelledError(signal?.reason));
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          if (settle()) reject(new TimeoutError(timeoutMs));
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      work.then(
        (value) => {
          if (settle()) {
            resolve(value);
          } else if (onLate !== undefined) {
            onLate(value).catch((err: unknown) =>
              console.warn('[fluent-query] failed to release late connection', err),
            );
          }
        },
        (err: unknown) => {
          if (settle()) reject(err);
        },
      );
    });
  }
}
