// Entity spec parser and normalizer
//
// parseEntitySpec turns the raw tuple DSL into a tagged structure.
// normalizeSpec rewrites relationship fields into explicit `ref` nodes and
// collects the entities this one has to be initialized after.
//
// References are never looked up here: the target may not be declared yet.

import type {
  EntityProperties,
  EntityType,
  FieldProperties,
  FieldSpec,
  FieldType,
  ParsedEntitySpec,
  ParsedFieldType,
  PreparedEntitySpec,
} from '@armature/protocol';
import {
  OPTIONAL_REL_MARKERS,
  humanizeSpecIssues,
  isEntityType,
  isPlainRecord,
  isPrimitiveKeyword,
  splitEntityType,
  validateEntitySpec,
} from '@armature/protocol';
import { ZodType } from 'zod';
import { SpecGrammarError } from '../errors.js';

/**
 * Returns the ref identifier for an entity type, e.g.
 * "shop/client" -> "shop/client-ref"
 */
export function toEntityRef(entityType: EntityType): EntityType {
  const { namespace, name } = splitEntityType(entityType);
  return `${namespace}/${name}-ref`;
}

/**
 * True when a field carries an optional relationship marker
 */
export function isOptionalRef(props: FieldProperties | undefined): boolean {
  return props !== undefined && OPTIONAL_REL_MARKERS.some((marker) => props[marker] === true);
}

/**
 * Parse a raw entity spec.
 *
 * @throws SpecGrammarError with a humanized diff when the grammar is violated
 */
export function parseEntitySpec(raw: unknown): ParsedEntitySpec {
  const result = validateEntitySpec(raw);
  const items: unknown[] = Array.isArray(raw) ? raw : [];
  const [entity, ...rest] = items;

  if (!result.valid || !isEntityType(entity)) {
    throw new SpecGrammarError(
      isEntityType(entity) ? entity : undefined,
      result.errors,
      humanizeSpecIssues(result.errors)
    );
  }

  const head = rest[0];
  const properties: EntityProperties = isPlainRecord(head) ? { ...head } : {};
  const rawFields = isPlainRecord(head) ? rest.slice(1) : rest;

  return {
    entity,
    properties,
    fields: rawFields.map(parseField),
  };
}

function parseField(field: unknown): FieldSpec<ParsedFieldType> {
  // The grammar check has already run; this only narrows.
  if (!Array.isArray(field)) {
    throw new TypeError('Field must be an array');
  }
  const name: unknown = field[0];
  const props: unknown = field.length === 3 ? field[1] : {};
  return {
    name: String(name),
    properties: isPlainRecord(props) ? { ...props } : {},
    type: parseFieldType(field[field.length - 1]),
  };
}

function parseFieldType(type: unknown): ParsedFieldType {
  if (type instanceof ZodType) {
    return { kind: 'validator', validate: type };
  }
  if (typeof type === 'function') {
    return { kind: 'validator', validate: (value: unknown) => Boolean(type(value)) };
  }
  if (isEntityType(type)) {
    return { kind: 'entity-ref-key', entity: type };
  }
  if (isPrimitiveKeyword(type)) {
    return { kind: 'primitive', type };
  }
  if (Array.isArray(type) && isPrimitiveKeyword(type[0]) && isPlainRecord(type[1])) {
    return { kind: 'param-primitive', type: type[0], props: { ...type[1] } };
  }
  throw new TypeError(`Unsupported field type: ${String(type)}`);
}

/**
 * Rewrite relationship fields into `ref` nodes.
 *
 * - a qualified entity type becomes { kind: 'ref', entity, entityRef }
 * - the field is a foreign key unless it carries an optional marker, in which
 *   case any `foreign-key?` written by hand is dropped
 * - `optional?` or an optional marker sets `optional` and drops `optional?`
 *
 * Canonical specs pass through unchanged, so normalizing twice is a no-op.
 */
export function normalizeSpec(parsed: ParsedEntitySpec): PreparedEntitySpec {
  const deps: EntityType[] = [];

  const fields = parsed.fields.map((field): FieldSpec => {
    const optionalRef = isOptionalRef(field.properties);
    const properties: FieldProperties = { ...field.properties };
    let type: FieldType;

    if (field.type.kind === 'entity-ref-key') {
      type = { kind: 'ref', entity: field.type.entity, entityRef: toEntityRef(field.type.entity) };
      if (!optionalRef) {
        properties['foreign-key?'] = true;
      }
    } else {
      type = field.type;
    }

    if (optionalRef) {
      delete properties['foreign-key?'];
    }

    if (properties['optional?'] === true || optionalRef) {
      properties.optional = true;
    }
    delete properties['optional?'];

    if (type.kind === 'ref' && !optionalRef && !deps.includes(type.entity)) {
      deps.push(type.entity);
    }

    return { name: field.name, properties, type };
  });

  return {
    spec: { entity: parsed.entity, properties: { ...parsed.properties }, fields },
    deps,
  };
}

/**
 * Parse and normalize a raw spec in one step.
 */
export function prepareSpec(raw: unknown): PreparedEntitySpec {
  return normalizeSpec(parseEntitySpec(raw));
}
