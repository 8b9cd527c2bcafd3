// Component types - autowired factories and the declarative graph
//
// Components are exported values carrying the AUTOWIRED marker. The graph
// builder turns them into a SystemConfig: one node per key, with every
// declared dependency replaced by a GraphRef placeholder. A lifecycle manager
// resolves the placeholders and instantiates nodes in dependency order.

import type { RawEntitySpec } from './entities.js';

/**
 * Marker carried by every autowirable definition.
 * Untagged exports are ignored by the collector.
 */
export const AUTOWIRED: unique symbol = Symbol.for('armature.autowired');

/**
 * Scope-qualified component identifier, e.g. "app.handlers/status"
 */
export type ComponentKey = string;

/**
 * Reference placeholder pointing at another node of the graph
 */
export type GraphRef = {
  readonly $ref: ComponentKey;
};

/**
 * Typed injection point. `name` is a component name in the same scope
 * ("db-connection") or a fully qualified key ("app.db/db-connection").
 */
export type Inject<T = unknown> = {
  readonly kind: 'inject';
  readonly name: string;
  /** Phantom field carrying the injected value type */
  readonly __type?: T;
};

export type InjectMap = Record<string, Inject>;

/**
 * Resolved values for an InjectMap
 */
export type Injected<D extends InjectMap> = {
  [K in keyof D]: D[K] extends Inject<infer T> ? T : never;
};

/**
 * Context handed to init and halt hooks by the lifecycle manager
 */
export type ComponentContext<S = unknown> = {
  key: ComponentKey;
  services: S;
};

/**
 * A factory with declared dependencies and an optional halt hook
 */
export type ComponentDescriptor<D extends InjectMap = InjectMap, T = unknown> = {
  readonly [AUTOWIRED]: true;
  readonly kind: 'component';
  /** Overrides the name derived from the export */
  readonly name?: string;
  readonly deps: D;
  init(inputs: Injected<D> & Record<string, unknown>, ctx: ComponentContext): T | Promise<T>;
  halt?(value: T, ctx: ComponentContext): void | Promise<void>;
};

/**
 * A value merged into a parent slot rather than registered standalone
 */
export type ContributionDescriptor = {
  readonly [AUTOWIRED]: true;
  readonly kind: 'contribution';
  readonly name?: string;
  /** Parent slot name ("parent-component") or fully qualified key */
  readonly parent: string;
  readonly value: Record<string, unknown>;
};

/**
 * An entity declaration taking part in the graph
 */
export type EntityDescriptor = {
  readonly [AUTOWIRED]: true;
  readonly kind: 'entity';
  readonly spec: RawEntitySpec;
};

export type AutowiredDescriptor = ComponentDescriptor | ContributionDescriptor | EntityDescriptor;

/**
 * A node of the declarative graph
 */
export type GraphNode = {
  key: ComponentKey;
  /** Missing for value-only nodes (e.g. a parent slot with no definition) */
  definition?: ComponentDescriptor | EntityDescriptor;
  /** Static config, merged contributions and GraphRef placeholders */
  inputs: Record<string, unknown>;
};

/**
 * Declarative graph consumed by the lifecycle manager
 */
export type SystemConfig = Record<ComponentKey, GraphNode>;

// --- Helpers ---

export function ref(key: ComponentKey): GraphRef {
  return { $ref: key };
}

export function isRef(value: unknown): value is GraphRef {
  return (
    typeof value === 'object' &&
    value !== null &&
    '$ref' in value &&
    typeof value.$ref === 'string'
  );
}

/**
 * Build a key from a scope and a component name
 */
export function componentKey(scope: string, name: string): ComponentKey {
  return `${scope}/${name}`;
}

/**
 * A name is qualified when it already carries a scope
 */
export function isQualifiedName(name: string): boolean {
  return name.includes('/');
}
