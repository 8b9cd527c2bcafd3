// System lifecycle - starts and stops the nodes of a SystemConfig
//
// Nodes start in dependency order with every { $ref } replaced by the value
// of the node it names:
// - component nodes run their init hook
// - entity nodes register their spec and yield the Entity handle
// - value nodes (no definition) yield their resolved inputs
// Halting runs halt hooks in reverse start order.

import type { ComponentContext, ComponentKey, EntitySpec, GraphNode, SystemConfig } from '@armature/protocol';
import { isEntityType, isPlainRecord, isRef } from '@armature/protocol';
import { initEntity } from '../entities/lifecycle.js';
import { createEntityRegistry, type EntityRegistry } from '../entities/registry.js';
import {
  ComponentHaltError,
  ComponentInitError,
  ValidationError,
  toError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { isPlainObject, resolveInitOrder } from './order.js';

export type InitSystemOptions<S = unknown> = {
  logger?: Logger;
  /** Registry entity nodes register into; a fresh one by default */
  entities?: EntityRegistry;
  /** Handed to every init and halt hook as ctx.services */
  services?: S;
};

export type HaltSystemOptions = {
  logger?: Logger;
};

/**
 * A running system
 */
export type System<S = unknown> = {
  config: SystemConfig;
  /** Keys in start order */
  order: ComponentKey[];
  values: Map<ComponentKey, unknown>;
  entities: EntityRegistry;
  services: S | undefined;
  get(key: ComponentKey): unknown;
  keys(): ComponentKey[];
};

/**
 * Replace every reference inside `value` with the started value it names.
 */
export function substituteRefs(value: unknown, values: ReadonlyMap<ComponentKey, unknown>): unknown {
  if (isRef(value)) {
    return values.get(value.$ref);
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteRefs(item, values));
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteRefs(item, values);
    }
    return result;
  }
  return value;
}

function hasEntitySpec(inputs: Record<string, unknown>): inputs is { spec: EntitySpec } {
  const spec = inputs.spec;
  return (
    isPlainRecord(spec) &&
    typeof spec.entity === 'string' &&
    isEntityType(spec.entity) &&
    isPlainRecord(spec.properties) &&
    Array.isArray(spec.fields)
  );
}

async function startNode<S>(
  node: GraphNode,
  values: ReadonlyMap<ComponentKey, unknown>,
  entities: EntityRegistry,
  ctx: ComponentContext<S | undefined>
): Promise<unknown> {
  const definition = node.definition;

  if (!definition) {
    return substituteRefs(node.inputs, values);
  }

  if (definition.kind === 'entity') {
    if (!hasEntitySpec(node.inputs)) {
      throw new ValidationError(`Entity node ${node.key} has no prepared spec`, { field: 'spec' });
    }
    return initEntity(entities, node.inputs);
  }

  const resolved = substituteRefs(node.inputs, values);
  return definition.init(isPlainObject(resolved) ? resolved : {}, ctx);
}

async function haltNodes<S>(
  system: Pick<System<S>, 'config' | 'values' | 'services'>,
  keys: ComponentKey[],
  logger: Logger
): Promise<Array<{ key: ComponentKey; error: Error }>> {
  const failures: Array<{ key: ComponentKey; error: Error }> = [];

  for (const key of [...keys].reverse()) {
    const definition = system.config[key]?.definition;
    if (!definition || definition.kind !== 'component' || !definition.halt) {
      continue;
    }

    try {
      await definition.halt(system.values.get(key), { key, services: system.services });
      logger.debug('Halted component', { key });
    } catch (error) {
      failures.push({ key, error: toError(error) });
    }
  }

  return failures;
}

/**
 * Start every node of `config`.
 *
 * If a node fails to start, the nodes already started are halted before
 * the error is thrown.
 *
 * @throws MissingDependencyError when a reference has no node
 * @throws CircularDependencyError when references form a cycle
 * @throws ComponentInitError when a node fails to start
 */
export async function initSystem<S = unknown>(
  config: SystemConfig,
  options: InitSystemOptions<S> = {}
): Promise<System<S>> {
  const logger = options.logger ?? silentLogger;
  const entities = options.entities ?? createEntityRegistry();
  const services = options.services;
  const order = resolveInitOrder(config);
  const values = new Map<ComponentKey, unknown>();
  const started: ComponentKey[] = [];

  for (const key of order) {
    const node = config[key];
    if (!node) {
      continue;
    }

    try {
      values.set(key, await startNode(node, values, entities, { key, services }));
      started.push(key);
      logger.debug('Started component', { key });
    } catch (error) {
      const cause = toError(error);
      logger.error('Component failed to start', { key, error: cause.message });

      const failures = await haltNodes({ config, values, services }, started, logger);
      for (const failure of failures) {
        logger.error('Component failed to halt', { key: failure.key, error: failure.error.message });
      }

      throw new ComponentInitError(key, cause);
    }
  }

  logger.info('System started', { components: started.length });

  return {
    config,
    order,
    values,
    entities,
    services,
    get(key: ComponentKey) {
      return values.get(key);
    },
    keys() {
      return [...order];
    },
  };
}

/**
 * Run halt hooks in reverse start order. Every hook runs even when an
 * earlier one fails.
 *
 * @throws ComponentHaltError listing every failed hook
 */
export async function haltSystem<S>(system: System<S>, options: HaltSystemOptions = {}): Promise<void> {
  const logger = options.logger ?? silentLogger;
  const failures = await haltNodes(system, system.order, logger);

  if (failures.length > 0) {
    for (const failure of failures) {
      logger.error('Component failed to halt', { key: failure.key, error: failure.error.message });
    }
    throw new ComponentHaltError(failures);
  }

  logger.info('System halted', { components: system.order.length });
}
