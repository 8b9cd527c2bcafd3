// Entity handle - runtime wrapper over a registered entity type

import type { EntitySpec, EntityType } from '@armature/protocol';
import { splitEntityType } from '@armature/protocol';
import type { EntityLike, EntityRegistry, FieldEntry, ValidateOptions } from './registry.js';

export class Entity {
  constructor(
    readonly type: EntityType,
    private readonly registry: EntityRegistry
  ) {}

  validate(data: unknown, options?: ValidateOptions): true {
    return this.registry.validate(this, data, options);
  }

  fields(): FieldEntry[] {
    return this.registry.fields(this);
  }

  columns(): string[] {
    return this.registry.columns(this);
  }

  values(data: Record<string, unknown>): unknown[] {
    return this.registry.values(this, data);
  }

  identityField(): FieldEntry | undefined {
    return this.registry.identityField(this);
  }

  prop(key: string): unknown {
    return this.registry.prop(this, key);
  }

  dependsOn(dependency: EntityLike): boolean {
    return this.registry.dependsOn(this, dependency);
  }

  /**
   * Backing table: the `table` property, or the entity name.
   */
  tableName(): string {
    const table = this.prop('table');
    return typeof table === 'string' ? table : splitEntityType(this.type).name;
  }
}

/**
 * Register a canonical spec and return its handle.
 */
export function createEntity(
  registry: EntityRegistry,
  entityType: EntityType,
  spec: EntitySpec
): Entity {
  registry.register(entityType, spec);
  return new Entity(entityType, registry);
}
