import { v4 as uuidv4 } from 'uuid';
import type { EntityDescriptor } from '../model/types.js';
import type { CompiledQuery, Connection, DataSource } from '../types.js';

export type QueryLogEvent =
  | { type: 'connect'; session: string; source: string }
  | { type: 'query'; session: string; text: string; params: readonly unknown[] }
  | { type: 'scan'; session: string; entity: string }
  | { type: 'rows'; session: string; count: number; durationMs: number }
  | { type: 'failed'; session: string; error: string }
  | { type: 'release'; session: string; error: string | null };

export type QueryLogger = (event: QueryLogEvent) => void;

const defaultLogger: QueryLogger = (event) => console.debug('[fluent-query]', event);

async function* observe(
  rows: AsyncIterable<Record<string, unknown>>,
  session: string,
  log: QueryLogger,
): AsyncGenerator<Record<string, unknown>> {
  const started = Date.now();
  let count = 0;
  try {
    for await (const row of rows) {
      count++;
      yield row;
    }
  } catch (err) {
    log({ type: 'failed', session, error: String(err) });
    throw err;
  }
  log({ type: 'rows', session, count, durationMs: Date.now() - started });
}

function wrapConnection(inner: Connection, session: string, log: QueryLogger): Connection {
  const run = inner.run;
  return {
    scan(entity: EntityDescriptor) {
      log({ type: 'scan', session, entity: entity.name });
      return observe(inner.scan(entity), session, log);
    },
    ...(run !== undefined
      ? {
          run(compiled: CompiledQuery) {
            log({ type: 'query', session, text: compiled.text, params: compiled.params });
            return observe(run.call(inner, compiled), session, log);
          },
        }
      : {}),
    async release(error?: Error) {
      log({ type: 'release', session, error: error === undefined ? null : error.message });
      await inner.release(error);
    },
  };
}

/**
 * Wraps a data source so every session logs what it does: checkout, each
 * query with its parameters, fallback scans, row counts with durations, and
 * failures. Sessions are tagged with a random id.
 */
export function logQueries(source: DataSource, log: QueryLogger = defaultLogger): DataSource {
  return {
    name: source.name,
    ...(source.dialect !== undefined ? { dialect: source.dialect } : {}),
    async connect() {
      const session = uuidv4();
      log({ type: 'connect', session, source: source.name });
      try {
        return wrapConnection(await source.connect(), session, log);
      } catch (err) {
        log({ type: 'failed', session, error: String(err) });
        throw err;
      }
    },
  };
}
