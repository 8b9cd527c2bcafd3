// Init order - dependency-first ordering of graph nodes

import type { ComponentKey, SystemConfig } from '@armature/protocol';
import { isRef } from '@armature/protocol';
import { CircularDependencyError, MissingDependencyError } from '../errors.js';

/**
 * Plain objects only; class instances (handles, connections) are opaque.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Keys referenced anywhere inside `value`, in first-seen order.
 * Walks arrays and plain objects.
 */
export function collectRefs(value: unknown): ComponentKey[] {
  const keys: ComponentKey[] = [];

  function walk(current: unknown): void {
    if (isRef(current)) {
      if (!keys.includes(current.$ref)) {
        keys.push(current.$ref);
      }
      return;
    }
    if (Array.isArray(current)) {
      current.forEach(walk);
      return;
    }
    if (isPlainObject(current)) {
      Object.values(current).forEach(walk);
    }
  }

  walk(value);
  return keys;
}

/**
 * Order graph keys so every node comes after the nodes it references.
 * Ties keep config order.
 *
 * @throws MissingDependencyError when a reference has no node
 * @throws CircularDependencyError when references form a cycle
 */
export function resolveInitOrder(config: SystemConfig): ComponentKey[] {
  const sorted: ComponentKey[] = [];
  const visited = new Set<ComponentKey>();
  const visiting = new Set<ComponentKey>();

  function visit(key: ComponentKey, path: ComponentKey[]): void {
    if (visited.has(key)) {
      return;
    }

    if (visiting.has(key)) {
      throw new CircularDependencyError([...path.slice(path.indexOf(key)), key]);
    }

    const node = config[key];
    if (!node) {
      return;
    }

    visiting.add(key);

    for (const dep of collectRefs(node.inputs)) {
      if (!(dep in config)) {
        throw new MissingDependencyError(key, dep);
      }
      visit(dep, [...path, key]);
    }

    visiting.delete(key);
    visited.add(key);
    sorted.push(key);
  }

  for (const key of Object.keys(config)) {
    visit(key, []);
  }

  return sorted;
}
