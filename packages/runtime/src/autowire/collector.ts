// Component collector - finds autowired definitions in scanned scopes
//
// Only values carrying the AUTOWIRED marker are collected; anything else a
// module exports is skipped. Each collected definition gets a scope-qualified
// key and the list of keys it depends on.

import type {
  AutowiredDescriptor,
  ComponentDescriptor,
  ComponentKey,
  InjectMap,
} from '@armature/protocol';
import { AUTOWIRED, componentKey, isPlainRecord, isQualifiedName, isRef } from '@armature/protocol';
import { entityKey, prepEntity, type EntityNodeInputs } from '../entities/lifecycle.js';
import type { ProjectCatalog } from './catalog.js';

/**
 * A dependency edge: the input parameter and the key it points at
 */
export type ComponentDep = {
  param: string;
  key: ComponentKey;
};

export type CollectedComponent =
  | {
      kind: 'component';
      key: ComponentKey;
      scope: string;
      descriptor: ComponentDescriptor;
      deps: ComponentDep[];
    }
  | {
      kind: 'entity';
      key: ComponentKey;
      scope: string;
      descriptor: Extract<AutowiredDescriptor, { kind: 'entity' }>;
      /** Prepared at collection time so grammar errors abort before anything starts */
      inputs: EntityNodeInputs;
      deps: ComponentDep[];
    }
  | {
      kind: 'contribution';
      key: ComponentKey;
      scope: string;
      descriptor: Extract<AutowiredDescriptor, { kind: 'contribution' }>;
      /** Key of the parent slot */
      parent: ComponentKey;
      deps: ComponentDep[];
    };

/**
 * Collected definitions keyed by component key, in discovery order
 */
export type CollectedComponents = ReadonlyMap<ComponentKey, CollectedComponent>;

function hasMarker(value: object): boolean {
  return AUTOWIRED in value && value[AUTOWIRED] === true;
}

/**
 * True for values declared with defineComponent, defineContribution or defineEntity.
 */
export function isAutowired(value: unknown): value is AutowiredDescriptor {
  if (typeof value !== 'object' || value === null || !hasMarker(value) || !('kind' in value)) {
    return false;
  }
  switch (value.kind) {
    case 'component':
      return 'init' in value && typeof value.init === 'function' && 'deps' in value && isPlainRecord(value.deps);
    case 'contribution':
      return 'parent' in value && typeof value.parent === 'string' && 'value' in value && isPlainRecord(value.value);
    case 'entity':
      return 'spec' in value && Array.isArray(value.spec);
    default:
      return false;
  }
}

/**
 * Export name to component name: "dbConnection" -> "db-connection", "test1" -> "test-1"
 */
export function toComponentName(exportName: string): string {
  return exportName
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([a-zA-Z])([0-9])/g, '$1-$2')
    .replace(/_/g, '-')
    .toLowerCase();
}

/**
 * Resolve a dependency name relative to the scope that declares it.
 */
export function resolveName(scope: string, name: string): ComponentKey {
  return isQualifiedName(name) ? name : componentKey(scope, name);
}

/**
 * Dependency edges declared by a component's deps map.
 */
export function getComponentDeps(deps: InjectMap, scope: string): ComponentDep[] {
  return Object.entries(deps).map(([param, injected]) => ({
    param,
    key: resolveName(scope, injected.name),
  }));
}

/**
 * Add one export to the collection.
 * Returns `acc` itself for untagged values, a new map otherwise.
 */
export function collectAutowired(
  scope: string,
  acc: CollectedComponents,
  exportName: string,
  value: unknown
): CollectedComponents {
  if (!isAutowired(value)) {
    return acc;
  }

  const next = new Map(acc);

  switch (value.kind) {
    case 'component': {
      const key = componentKey(scope, value.name ?? toComponentName(exportName));
      next.set(key, {
        kind: 'component',
        key,
        scope,
        descriptor: value,
        deps: getComponentDeps(value.deps, scope),
      });
      break;
    }
    case 'entity': {
      const inputs = prepEntity(value.spec);
      const key = entityKey(inputs.spec.entity);
      next.set(key, {
        kind: 'entity',
        key,
        scope,
        descriptor: value,
        inputs,
        deps: Object.entries(inputs).flatMap(([param, input]) =>
          isRef(input) ? [{ param, key: input.$ref }] : []
        ),
      });
      break;
    }
    case 'contribution': {
      const key = componentKey(scope, value.name ?? toComponentName(exportName));
      next.set(key, {
        kind: 'contribution',
        key,
        scope,
        descriptor: value,
        parent: resolveName(scope, value.parent),
        deps: [],
      });
      break;
    }
  }

  return next;
}

/**
 * Collect every autowired export of the given scopes.
 * Scopes are visited in the order given, exports by name.
 */
export function findComponents(catalog: ProjectCatalog, scopes: string[]): CollectedComponents {
  let collected: CollectedComponents = new Map();
  for (const scope of scopes) {
    const exports = catalog.exports(scope) ?? {};
    for (const exportName of Object.keys(exports).sort()) {
      collected = collectAutowired(scope, collected, exportName, exports[exportName]);
    }
  }
  return collected;
}
