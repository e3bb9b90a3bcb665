import { SourceError } from '../errors.js';
import type { EntityDescriptor } from '../model/types.js';
import type { Connection, DataSource } from '../types.js';
import { mapEntityRow } from './row-mapper.js';

export type Collections = Readonly<Record<string, readonly Record<string, unknown>[]>>;

/**
 * In-process data source over plain arrays keyed by entity name. It has no
 * dialect, so every plan runs through the in-memory executor.
 */
export class MemorySource implements DataSource {
  readonly name = 'memory';

  constructor(private readonly collections: Collections) {}

  async connect(): Promise<Connection> {
    const collections = this.collections;
    return {
      async *scan(entity: EntityDescriptor): AsyncIterable<Record<string, unknown>> {
        const rows = collections[entity.name];
        if (rows === undefined) {
          throw new SourceError(`No collection for entity "${entity.name}"`);
        }
        for (const row of rows) {
          yield mapEntityRow(entity, row);
        }
      },
      async release(): Promise<void> {},
    };
  }
}
