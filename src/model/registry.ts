import { DuplicateEntityError, TypeMismatchError, UnknownEntityError, UnknownFieldError } from '../errors.js';
import type { EntityDefinition, EntityDescriptor, FieldDescriptor, RelationDescriptor } from './types.js';

/**
 * Validates an entity definition and returns a frozen descriptor.
 * Throws if the field list is empty, a field name repeats, the key field
 * is missing, or a relation shadows a field.
 */
export function defineEntity(def: EntityDefinition): EntityDescriptor {
  if (!def.name || def.name.trim() === '') {
    throw new Error('defineEntity: name must be a non-empty string');
  }
  if (def.fields.length === 0) {
    throw new Error(`defineEntity: "${def.name}" must declare at least one field`);
  }

  const seen = new Set<string>();
  const fields: FieldDescriptor[] = def.fields.map((f) => {
    if (seen.has(f.name)) {
      throw new Error(`defineEntity: "${def.name}" declares field "${f.name}" twice`);
    }
    seen.add(f.name);
    return Object.freeze({
      name: f.name,
      type: f.type,
      nullable: f.nullable ?? false,
      ...(f.column !== undefined ? { column: f.column } : {}),
    });
  });

  const key = def.key ?? 'id';
  if (!seen.has(key)) {
    throw new Error(`defineEntity: "${def.name}" has no key field "${key}"`);
  }

  const relations = (def.relations ?? []).map((r) => {
    if (seen.has(r.name)) {
      throw new Error(`defineEntity: relation "${r.name}" on "${def.name}" shadows a field`);
    }
    seen.add(r.name);
    return Object.freeze({ ...r });
  });

  return Object.freeze({
    name: def.name,
    table: def.table ?? def.name,
    key,
    fields: Object.freeze(fields),
    relations: Object.freeze(relations),
  });
}

export function findField(entity: EntityDescriptor, name: string): FieldDescriptor | undefined {
  return entity.fields.find((f) => f.name === name);
}

export function findRelation(entity: EntityDescriptor, name: string): RelationDescriptor | undefined {
  return entity.relations.find((r) => r.name === name);
}

/**
 * Holds the entity model queries are checked against. Populated once during
 * start-up, then sealed; after that it is only read.
 */
export class EntityRegistry {
  private readonly byName: Map<string, EntityDescriptor> = new Map();
  private sealed = false;

  constructor(entities: EntityDescriptor[] = []) {
    for (const entity of entities) this.register(entity);
  }

  register(entity: EntityDescriptor): this {
    if (this.sealed) {
      throw new Error(`EntityRegistry is sealed; cannot register "${entity.name}"`);
    }
    if (this.byName.has(entity.name)) {
      throw new DuplicateEntityError(entity.name);
    }
    this.byName.set(entity.name, entity);
    return this;
  }

  /** Checks that every relation target exists, then freezes the registry. */
  seal(): this {
    for (const entity of this.byName.values()) {
      for (const relation of entity.relations) {
        if (!this.byName.has(relation.target)) {
          throw new UnknownEntityError(relation.target);
        }
      }
    }
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): EntityDescriptor {
    const entity = this.byName.get(name);
    if (entity === undefined) throw new UnknownEntityError(name);
    return entity;
  }

  entities(): EntityDescriptor[] {
    return [...this.byName.values()];
  }

  /**
   * Resolves a dotted path such as `movie.Title` starting at `entityName`.
   * Every segment but the last must be a toOne relation.
   */
  resolveField(entityName: string, fieldPath: string): FieldDescriptor {
    let entity = this.get(entityName);
    const segments = fieldPath.split('.');

    for (let i = 0; i < segments.length; i++) {
      const segment = segments[i] ?? '';
      const isLast = i === segments.length - 1;
      const field = findField(entity, segment);

      if (field !== undefined) {
        if (!isLast) {
          throw new TypeMismatchError(
            `"${segments.slice(0, i + 1).join('.')}" on ${entityName} is a ${field.type} field, not a relation`,
          );
        }
        return field;
      }

      const relation = findRelation(entity, segment);
      if (relation === undefined) {
        throw new UnknownFieldError(entity.name, segment);
      }
      if (relation.kind === 'toMany') {
        throw new TypeMismatchError(
          `"${segment}" on ${entity.name} is a collection and cannot be used in a field path`,
        );
      }
      if (isLast) {
        throw new TypeMismatchError(`"${fieldPath}" on ${entityName} ends on a relation, not a field`);
      }
      entity = this.get(relation.target);
    }

    // split() always yields at least one segment, so the loop returns or throws
    throw new UnknownFieldError(entityName, fieldPath);
  }
}
