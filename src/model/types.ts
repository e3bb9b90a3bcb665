export type FieldType = 'string' | 'number' | 'boolean' | 'date';

export interface FieldDescriptor {
  readonly name: string;
  readonly type: FieldType;
  readonly nullable: boolean;
  /** Column name in the backing table; defaults to `name`. */
  readonly column?: string;
}

export type RelationKind = 'toOne' | 'toMany';

/**
 * toOne: `foreignKey` is a field of the declaring entity pointing at the target's key.
 * toMany: `foreignKey` is a field of the target pointing back at the declaring entity's key.
 */
export interface RelationDescriptor {
  readonly name: string;
  readonly kind: RelationKind;
  readonly target: string;
  readonly foreignKey: string;
}

export interface EntityDescriptor {
  readonly name: string;
  readonly table: string;
  readonly key: string;
  readonly fields: readonly FieldDescriptor[];
  readonly relations: readonly RelationDescriptor[];
}

/** Input accepted by defineEntity(); omitted parts get defaults. */
export interface EntityDefinition {
  name: string;
  table?: string;
  key?: string;
  fields: Array<{ name: string; type: FieldType; nullable?: boolean; column?: string }>;
  relations?: RelationDescriptor[];
}
