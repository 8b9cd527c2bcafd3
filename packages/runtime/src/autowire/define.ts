// Component declarations
//
// A component is an exported value built with defineComponent. Its deps map
// parameter names to injection points; the graph builder turns each one into
// a reference to another node.

import type {
  ComponentDescriptor,
  ContributionDescriptor,
  EntityType,
  Inject,
  InjectMap,
} from '@armature/protocol';
import { AUTOWIRED } from '@armature/protocol';
import type { Entity } from '../entities/entity.js';
import { entityKey } from '../entities/lifecycle.js';

export type ComponentDefinition<D extends InjectMap, T> = Omit<
  ComponentDescriptor<D, T>,
  typeof AUTOWIRED | 'kind'
>;

/**
 * Inject another component by name ("db-connection") or key ("app.db/db-connection").
 */
export function inject<T = unknown>(name: string): Inject<T> {
  return { kind: 'inject', name };
}

/**
 * Inject the handle of a declared entity.
 */
export function injectEntity(entityType: EntityType): Inject<Entity> {
  return inject<Entity>(entityKey(entityType));
}

/**
 * Declare an autowired component.
 *
 * @example
 * ```typescript
 * export const status = defineComponent({
 *   deps: { db: inject<Db>('db-connection') },
 *   init: ({ db }) => () => ({ status: 'ok', connection: db.ping() }),
 * });
 * ```
 */
export function defineComponent<D extends InjectMap, T>(
  definition: ComponentDefinition<D, T>
): ComponentDescriptor<D, T> {
  return { ...definition, [AUTOWIRED]: true, kind: 'component' };
}

/**
 * Declare a value merged into a parent slot instead of a standalone node.
 * Several contributions to the same parent are aggregated per input key.
 */
export function defineContribution(
  parent: string,
  value: Record<string, unknown>,
  options: { name?: string } = {}
): ContributionDescriptor {
  return { [AUTOWIRED]: true, kind: 'contribution', parent, value, name: options.name };
}
