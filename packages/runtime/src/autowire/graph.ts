// Graph builder - turns collected definitions into a declarative SystemConfig
//
// Dependencies become { $ref } placeholders and are never resolved here.
// A placeholder is emitted even when its target is not part of the graph;
// the lifecycle manager reports missing targets when it resolves the graph.

import type { ComponentKey, GraphNode, SystemConfig } from '@armature/protocol';
import { ref } from '@armature/protocol';
import { silentLogger, type Logger } from '../logger.js';
import type { ProjectCatalog } from './catalog.js';
import { findComponents, type CollectedComponent, type CollectedComponents } from './collector.js';
import { findProjectScopes, type ScanOptions } from './scanner.js';

export type BuildGraphOptions = {
  logger?: Logger;
};

export type AutowireOptions = ScanOptions &
  BuildGraphOptions & {
    /** Scan root; omit to scan the whole project */
    root?: unknown;
  };

/**
 * Add the node of one collected definition to `config`.
 * Contributions are merged into their parents by buildGraph instead.
 */
export function prepComponent(config: SystemConfig, component: CollectedComponent): SystemConfig {
  switch (component.kind) {
    case 'component': {
      const inputs: Record<string, unknown> = {};
      for (const dep of component.deps) {
        inputs[dep.param] = ref(dep.key);
      }
      return {
        ...config,
        [component.key]: { key: component.key, definition: component.descriptor, inputs },
      };
    }
    case 'entity':
      return {
        ...config,
        [component.key]: {
          key: component.key,
          definition: component.descriptor,
          inputs: { ...component.inputs },
        },
      };
    case 'contribution':
      return config;
  }
}

/**
 * Merge contributed values into one parent input map.
 *
 * One contribution is used as is. With several, every input key becomes an
 * array of the contributed values, in discovery order.
 */
export function mergeContributions(values: Record<string, unknown>[]): Record<string, unknown> {
  if (values.length === 1) {
    return { ...values[0] };
  }

  const merged: Record<string, unknown[]> = {};
  for (const value of values) {
    for (const [key, item] of Object.entries(value)) {
      const items = merged[key] ?? [];
      items.push(item);
      merged[key] = items;
    }
  }
  return merged;
}

/**
 * Build the declarative graph for a set of collected definitions.
 */
export function buildGraph(
  collected: CollectedComponents,
  options: BuildGraphOptions = {}
): SystemConfig {
  const logger = options.logger ?? silentLogger;
  let config: SystemConfig = {};
  const contributions = new Map<ComponentKey, Record<string, unknown>[]>();

  for (const component of collected.values()) {
    config = prepComponent(config, component);

    if (component.kind === 'contribution') {
      const values = contributions.get(component.parent) ?? [];
      values.push(component.descriptor.value);
      contributions.set(component.parent, values);
    }
  }

  for (const [parent, values] of contributions) {
    const existing: GraphNode = config[parent] ?? { key: parent, inputs: {} };
    config = {
      ...config,
      [parent]: { ...existing, inputs: { ...existing.inputs, ...mergeContributions(values) } },
    };
  }

  logger.debug('Built component graph', {
    nodes: Object.keys(config).length,
    parents: contributions.size,
  });

  return config;
}

/**
 * Scan, collect and build in one step.
 *
 * Leaving `root` out scans every project scope; passing it, even as null,
 * goes through the scanner's root handling.
 */
export function autowireConfig(
  catalog: ProjectCatalog,
  options: AutowireOptions = {}
): SystemConfig {
  const logger = options.logger ?? silentLogger;
  const scanOptions: ScanOptions = { strict: options.strict };
  const scopes =
    'root' in options
      ? findProjectScopes(catalog, scanOptions, options.root)
      : findProjectScopes(catalog, scanOptions);
  const collected = findComponents(catalog, scopes);

  logger.debug('Collected autowired components', {
    scopes: scopes.length,
    components: collected.size,
  });

  return buildGraph(collected, { logger });
}

/**
 * Add autowired nodes to an existing config. Keys already in `base` win.
 */
export function applyAutowire(
  base: SystemConfig,
  catalog: ProjectCatalog,
  options: AutowireOptions = {}
): SystemConfig {
  return { ...autowireConfig(catalog, options), ...base };
}
