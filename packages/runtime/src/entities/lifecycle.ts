// Entity lifecycle hooks
//
// Entities join the component graph like any other node:
// - prep turns a raw spec into { spec, <dep>: ref } so the lifecycle manager
//   initializes referenced entities first
// - init registers the canonical spec and returns the Entity handle

import type { ComponentKey, EntityDescriptor, EntitySpec, EntityType, GraphRef, RawEntitySpec } from '@armature/protocol';
import { AUTOWIRED, ref } from '@armature/protocol';
import { createEntity, type Entity } from './entity.js';
import { prepareSpec } from './parser.js';
import type { EntityRegistry } from './registry.js';

const ENTITY_KEY_PREFIX = 'entity:';

/**
 * Graph key of an entity node, e.g. "entity:shop/client"
 */
export function entityKey(entityType: EntityType): ComponentKey {
  return `${ENTITY_KEY_PREFIX}${entityType}`;
}

export function isEntityKey(key: ComponentKey): boolean {
  return key.startsWith(ENTITY_KEY_PREFIX);
}

/**
 * Inputs of an entity node: the canonical spec plus one reference per
 * required dependency.
 */
export type EntityNodeInputs = {
  spec: EntitySpec;
  [dependency: EntityType]: GraphRef;
};

/**
 * Prepare a raw spec for the graph.
 *
 * @throws SpecGrammarError when the spec violates the DSL grammar
 */
export function prepEntity(raw: unknown): EntityNodeInputs {
  const { spec, deps } = prepareSpec(raw);
  const inputs: EntityNodeInputs = { spec };
  for (const dep of deps) {
    inputs[dep] = ref(entityKey(dep));
  }
  return inputs;
}

/**
 * Register the prepared spec and return the handle.
 */
export function initEntity(registry: EntityRegistry, inputs: { spec: EntitySpec }): Entity {
  return createEntity(registry, inputs.spec.entity, inputs.spec);
}

/**
 * Declare an entity so the autowire scanner picks it up.
 *
 * @example
 * ```typescript
 * export const client = defineEntity([
 *   'shop/client',
 *   { table: 'client' },
 *   ['id', { 'primary-key?': true }, 'uuid'],
 *   ['name', ['string', { max: 250 }]],
 * ]);
 * ```
 */
export function defineEntity(spec: RawEntitySpec): EntityDescriptor {
  return { [AUTOWIRED]: true, kind: 'entity', spec };
}
