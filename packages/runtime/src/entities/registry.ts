// Entity Registry - canonical entity schemas and their derived ref schemas
//
// State is an immutable snapshot. Every write builds a new snapshot and swaps
// it in with a single assignment, so readers holding the previous one never
// see a partial update.
//
// References between entities are resolved lazily against the current
// snapshot when data is validated, which allows forward and cyclic references.

import type { AnyZodObject, ZodTypeAny } from 'zod';
import type {
  EntityProperties,
  EntitySpec,
  EntityType,
  FieldSchemaView,
  FieldSpec,
  FieldType,
  PrimitiveProps,
} from '@armature/protocol';
import { DataValidationError, MissingPrimaryKeyError, UnknownEntityError } from '../errors.js';
import { isOptionalRef, toEntityRef } from './parser.js';
import { entityRefSchema, entitySchema, issuesByField, type RefResolver } from './schema.js';

/**
 * Anything that names an entity: the type itself or a handle carrying it
 */
export type EntityLike = EntityType | { readonly type: EntityType };

export type FieldEntry = [name: string, field: FieldSpec];

/**
 * Spec as stored by the registry. Frozen at registration; validators are
 * shared with the caller.
 */
export type RegisteredEntitySpec = {
  readonly entity: EntityType;
  readonly properties: Readonly<EntityProperties>;
  readonly fields: readonly Readonly<FieldSpec>[];
};

type RegistryEntry = {
  spec: RegisteredEntitySpec;
  schema: AnyZodObject;
};

export type ValidateOptions = {
  /** Only check the fields present in the data, e.g. for updates */
  partial?: boolean;
};

type Snapshot = {
  readonly entities: ReadonlyMap<EntityType, RegistryEntry>;
  /** Keyed by ref identifier, e.g. "shop/client-ref" */
  readonly refs: ReadonlyMap<EntityType, ZodTypeAny>;
};

function typeOf(entity: EntityLike): EntityType {
  return typeof entity === 'string' ? entity : entity.type;
}

function freezeProps(props: PrimitiveProps): Readonly<PrimitiveProps> {
  const copy: PrimitiveProps = { ...props };
  if (props.values) {
    copy.values = Object.freeze([...props.values]);
  }
  return Object.freeze(copy);
}

function freezeFieldType(type: FieldType): FieldType {
  if (type.kind === 'param-primitive') {
    return Object.freeze({ ...type, props: freezeProps(type.props) });
  }
  return Object.freeze({ ...type });
}

/**
 * Copy a spec into a frozen one the caller holds no reference to.
 */
function freezeSpec(spec: EntitySpec): RegisteredEntitySpec {
  return Object.freeze({
    entity: spec.entity,
    properties: Object.freeze({ ...spec.properties }),
    fields: Object.freeze(
      spec.fields.map((field) =>
        Object.freeze({
          name: field.name,
          properties: Object.freeze({ ...field.properties }),
          type: freezeFieldType(field.type),
        })
      )
    ),
  });
}

/**
 * First field tagged `primary-key?`, in declaration order
 */
export function primaryKeyField(spec: { readonly fields: readonly FieldSpec[] }): FieldSpec | undefined {
  return spec.fields.find((field) => field.properties['primary-key?'] === true);
}

export class EntityRegistry {
  private snapshot: Snapshot = { entities: new Map(), refs: new Map() };

  private readonly resolveRef: RefResolver = (type) => {
    const schema = this.snapshot.refs.get(type.entityRef);
    if (schema) {
      return schema;
    }
    if (this.snapshot.entities.has(type.entity)) {
      throw new MissingPrimaryKeyError(type.entity);
    }
    throw new UnknownEntityError(type.entity);
  };

  /**
   * Register an entity and derive its ref schema.
   * Registering the same type again replaces it.
   */
  register(entityType: EntityType, spec: EntitySpec): void {
    const current = this.snapshot;
    const entities = new Map(current.entities);
    const refs = new Map(current.refs);
    const entityRef = toEntityRef(entityType);
    const stored = freezeSpec(spec);

    entities.set(entityType, { spec: stored, schema: entitySchema(stored, this.resolveRef) });

    const primaryKey = primaryKeyField(stored);
    if (primaryKey) {
      refs.set(entityRef, entityRefSchema(primaryKey, this.resolveRef));
    } else {
      refs.delete(entityRef);
    }

    this.snapshot = { entities, refs };
  }

  /**
   * Get the canonical spec of a registered entity.
   */
  lookup(entityType: EntityType): RegisteredEntitySpec | undefined {
    return this.snapshot.entities.get(entityType)?.spec;
  }

  has(entityType: EntityType): boolean {
    return this.snapshot.entities.has(entityType);
  }

  entityTypes(): EntityType[] {
    return Array.from(this.snapshot.entities.keys());
  }

  /**
   * Ref schema of an entity: its raw primary key or a map containing it.
   *
   * @throws UnknownEntityError if the entity was never registered
   * @throws MissingPrimaryKeyError if it has no primary key
   */
  refSchema(entityType: EntityType): ZodTypeAny {
    return this.resolveRef({ kind: 'ref', entity: entityType, entityRef: toEntityRef(entityType) });
  }

  /**
   * Validate data against an entity schema.
   *
   * @throws DataValidationError with per-field messages
   * @throws UnknownEntityError if the entity (or a referenced one) is not registered
   */
  validate(entity: EntityLike, data: unknown, options: ValidateOptions = {}): true {
    const entityType = typeOf(entity);
    const { schema } = this.entry(entityType);
    const result = (options.partial ? schema.partial() : schema).safeParse(data);
    if (!result.success) {
      throw new DataValidationError(entityType, issuesByField(result.error));
    }
    return true;
  }

  /**
   * Fields in declaration order, without optional relations.
   */
  fields(entity: EntityLike): FieldEntry[] {
    return this.entry(typeOf(entity))
      .spec.fields.filter((field) => !isOptionalRef(field.properties))
      .map((field): FieldEntry => [field.name, field]);
  }

  columns(entity: EntityLike): string[] {
    return this.fields(entity).map(([name]) => name);
  }

  /**
   * Column values in column order, e.g. { id: 1, name: 'Jack' } -> [1, 'Jack']
   */
  values(entity: EntityLike, data: Record<string, unknown>): unknown[] {
    return this.columns(entity).map((column) => data[column]);
  }

  /**
   * The field tagged `identity?`, if any.
   */
  identityField(entity: EntityLike): FieldEntry | undefined {
    const field = this.entry(typeOf(entity)).spec.fields.find(
      (f) => f.properties['identity?'] === true
    );
    return field ? [field.name, field] : undefined;
  }

  /**
   * Entity-level property, e.g. prop(client, 'table')
   */
  prop(entity: EntityLike, key: string): unknown {
    return this.entry(typeOf(entity)).spec.properties[key];
  }

  /**
   * True when `target` has a required foreign key pointing at `dependency`.
   */
  dependsOn(target: EntityLike, dependency: EntityLike): boolean {
    const dependencyType = typeOf(dependency);
    return this.fields(target).some(
      ([, field]) =>
        field.properties['foreign-key?'] === true &&
        field.type.kind === 'ref' &&
        field.type.entity === dependencyType
    );
  }

  /**
   * True when the field references a registered entity.
   */
  isRef(field: FieldSpec): boolean {
    return field.type.kind === 'ref' && this.has(field.type.entity);
  }

  /**
   * Entity-level property of the entity a ref field points at.
   */
  refFieldProp(field: FieldSpec, key: string): unknown {
    if (field.type.kind !== 'ref') {
      return undefined;
    }
    return this.lookup(field.type.entity)?.properties[key];
  }

  clear(): void {
    this.snapshot = { entities: new Map(), refs: new Map() };
  }

  private entry(entityType: EntityType): RegistryEntry {
    const entry = this.snapshot.entities.get(entityType);
    if (!entry) {
      throw new UnknownEntityError(entityType);
    }
    return entry;
  }
}

/**
 * Simplified view of a field's type.
 */
export function fieldSchema(field: FieldSpec): FieldSchemaView {
  return describeType(field.type);
}

function describeType(type: FieldType): FieldSchemaView {
  switch (type.kind) {
    case 'primitive':
      return { type: type.type, props: undefined };
    case 'param-primitive':
      return { type: type.type, props: { ...type.props } };
    case 'validator':
      return { type: 'validator', props: undefined };
    case 'ref':
      return { type: 'entity-ref', props: { entity: type.entity, entityRef: type.entityRef } };
  }
}

/**
 * Create an empty registry.
 */
export function createEntityRegistry(): EntityRegistry {
  return new EntityRegistry();
}
