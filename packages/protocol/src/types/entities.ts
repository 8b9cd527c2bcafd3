// Entity types - the relationship-aware record DSL
//
// Entities are declared as nested tuples:
//
//   ['shop/client', { table: 'client' },
//     ['id', { 'primary-key?': true }, 'uuid'],
//     ['name', ['string', { max: 250 }]],
//     ['orders', { 'one-to-many?': true }, 'shop/order']]
//
// The raw form is what users write. The canonical form is what the registry
// stores: every relationship field rewritten into an explicit `ref` node.

import type { ZodTypeAny } from 'zod';

/**
 * Namespace-qualified entity identifier, e.g. "shop/client"
 */
export type EntityType = `${string}/${string}`;

/**
 * Built-in type keywords for fields
 */
export type PrimitiveKeyword =
  | 'any'
  | 'string'
  | 'int'
  | 'number'
  | 'boolean'
  | 'uuid'
  | 'email'
  | 'date'
  | 'enum';

/**
 * Properties accepted by parametrized primitives, e.g. ['string', { max: 250 }]
 */
export type PrimitiveProps = {
  min?: number;
  max?: number;
  values?: readonly (string | number)[];
};

/**
 * Custom validator: a predicate or a zod schema
 */
export type Validator = ((value: unknown) => boolean) | ZodTypeAny;

/**
 * Relationship markers that make a field a required foreign key
 */
export const REQUIRED_REL_MARKERS = ['one-to-one?', 'many-to-one?'] as const;

/**
 * Relationship markers for fields that never persist as columns
 */
export const OPTIONAL_REL_MARKERS = ['one-to-many?', 'many-to-many?'] as const;

/**
 * Field properties as written by users.
 * `optional?` is a transient marker; normalization turns it into `optional`.
 */
export type FieldProperties = {
  'primary-key?'?: boolean;
  'identity?'?: boolean;
  'foreign-key?'?: boolean;
  'one-to-one?'?: boolean;
  'many-to-one?'?: boolean;
  'one-to-many?'?: boolean;
  'many-to-many?'?: boolean;
  'optional?'?: boolean;
  optional?: boolean;
  [key: string]: unknown;
};

/**
 * Entity-level properties, e.g. { table: 'client' }
 */
export type EntityProperties = Record<string, unknown>;

// --- Raw DSL ---

export type RawFieldType =
  | Validator
  | PrimitiveKeyword
  | readonly [PrimitiveKeyword, PrimitiveProps]
  | EntityType;

export type RawField =
  | readonly [string, RawFieldType]
  | readonly [string, FieldProperties, RawFieldType];

export type RawEntitySpec =
  | readonly [EntityType, ...RawField[]]
  | readonly [EntityType, EntityProperties, ...RawField[]];

// --- Parsed and canonical forms ---

/**
 * Field type as a closed tagged union.
 * `entity-ref-key` only exists between parsing and normalization.
 */
export type FieldType =
  | { kind: 'primitive'; type: PrimitiveKeyword }
  | { kind: 'param-primitive'; type: PrimitiveKeyword; props: PrimitiveProps }
  | { kind: 'validator'; validate: Validator }
  | { kind: 'ref'; entity: EntityType; entityRef: EntityType };

export type ParsedFieldType =
  | FieldType
  | { kind: 'entity-ref-key'; entity: EntityType };

export type FieldSpec<T extends ParsedFieldType = FieldType> = {
  name: string;
  properties: FieldProperties;
  type: T;
};

export type EntitySpec<T extends ParsedFieldType = FieldType> = {
  entity: EntityType;
  properties: EntityProperties;
  fields: FieldSpec<T>[];
};

/**
 * Output of the parser, before references are resolved into `ref` nodes
 */
export type ParsedEntitySpec = EntitySpec<ParsedFieldType>;

/**
 * Result of normalizing a parsed spec
 */
export type PreparedEntitySpec = {
  spec: EntitySpec;
  /** Entities this one must be initialized after (required references only) */
  deps: EntityType[];
};

/**
 * Simplified view of a field's type, for storage adapters
 */
export type FieldSchemaView = {
  type: string;
  props: Record<string, unknown> | undefined;
};

// --- Helpers ---

export const PRIMITIVE_KEYWORDS: readonly PrimitiveKeyword[] = [
  'any',
  'string',
  'int',
  'number',
  'boolean',
  'uuid',
  'email',
  'date',
  'enum',
];

export function isPrimitiveKeyword(value: unknown): value is PrimitiveKeyword {
  return PRIMITIVE_KEYWORDS.some((keyword) => keyword === value);
}

/**
 * Check for a namespace-qualified identifier: exactly one "/" with text on both sides.
 */
export function isEntityType(value: unknown): value is EntityType {
  return typeof value === 'string' && /^[^/\s]+\/[^/\s]+$/.test(value);
}

/**
 * Split "shop/client" into its namespace and name
 */
export function splitEntityType(entityType: EntityType): { namespace: string; name: string } {
  const index = entityType.indexOf('/');
  return {
    namespace: entityType.slice(0, index),
    name: entityType.slice(index + 1),
  };
}
