import { EmptyAggregateError } from '../errors.js';
import type { EntityDescriptor } from '../model/types.js';
import type { ColumnInfo } from '../types.js';

/** Aggregates that have no value over empty input; the database reports NULL for them. */
const EMPTY_SENSITIVE = new Set(['min', 'max', 'average']);

function coerce(raw: unknown, type: ColumnInfo['type']): unknown {
  if (raw === undefined || raw === null) return null;
  // pg returns BIGINT (COUNT) and NUMERIC (AVG, division) as strings
  if (type === 'number' && typeof raw === 'string') return Number(raw);
  if (type === 'date' && typeof raw === 'string') return new Date(raw);
  return raw;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !(value instanceof Date) && !Array.isArray(value);
}

function assignPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const segments = path.split('.');
  let current = target;
  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i] ?? '';
    const next = current[segment];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[segments[segments.length - 1] ?? path] = value;
}

/**
 * Maps a flat database row onto the result shape: dotted column aliases
 * become nested objects, and numeric strings become numbers.
 */
export function mapRow(row: Record<string, unknown>, columns: readonly ColumnInfo[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const column of columns) {
    const value = coerce(row[column.path], column.type);
    if (value === null && column.aggregate !== undefined && EMPTY_SENSITIVE.has(column.aggregate)) {
      throw new EmptyAggregateError(column.aggregate);
    }
    assignPath(out, column.path, value);
  }
  return out;
}

/** Copies the declared fields of a stored row, filling gaps with null and reviving ISO dates. */
export function mapEntityRow(entity: EntityDescriptor, row: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const f of entity.fields) {
    out[f.name] = coerce(row[f.name], f.type);
  }
  return out;
}
