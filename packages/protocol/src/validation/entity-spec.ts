// Entity DSL grammar validation
//
// Checks a raw entity declaration against the grammar:
//
//   spec  = [entityType, properties?, field*]
//   field = [name, properties?, type]
//   type  = validator | keyword | [keyword, props] | entityType
//
// Returns every issue found instead of stopping at the first one, so the
// caller can report a readable diff.

import { ZodType } from 'zod';
import {
  isEntityType,
  isPrimitiveKeyword,
  OPTIONAL_REL_MARKERS,
  REQUIRED_REL_MARKERS,
} from '../types/entities.js';

/**
 * Result of validating a raw entity spec
 */
export type EntitySpecValidationResult = {
  valid: boolean;
  errors: EntitySpecIssue[];
};

/**
 * A single grammar violation
 */
export type EntitySpecIssue = {
  path: string;
  message: string;
  code: EntitySpecIssueCode;
};

export type EntitySpecIssueCode =
  | 'INVALID_TYPE'
  | 'INVALID_ENTITY_TYPE'
  | 'INVALID_NAME'
  | 'INVALID_PROPERTIES'
  | 'INVALID_VALUE'
  | 'UNKNOWN_TYPE'
  | 'DUPLICATE_FIELD'
  | 'CONFLICTING_MARKERS';

const BOOLEAN_PROPERTIES = [
  'primary-key?',
  'identity?',
  'foreign-key?',
  'optional?',
  'optional',
  ...REQUIRED_REL_MARKERS,
  ...OPTIONAL_REL_MARKERS,
];

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof ZodType);
}

/**
 * Validate a raw entity spec.
 */
export function validateEntitySpec(spec: unknown): EntitySpecValidationResult {
  const errors: EntitySpecIssue[] = [];

  if (!Array.isArray(spec) || spec.length === 0) {
    errors.push({
      path: 'spec',
      message: 'Entity spec must be a non-empty array [entityType, properties?, ...fields]',
      code: 'INVALID_TYPE',
    });
    return { valid: false, errors };
  }

  const [entityType, ...rest] = spec;

  if (!isEntityType(entityType)) {
    errors.push({
      path: 'spec.entity',
      message: 'Entity type must be a qualified name like "namespace/name"',
      code: 'INVALID_ENTITY_TYPE',
    });
  }

  const fields = isPlainRecord(rest[0]) ? rest.slice(1) : rest;
  const seen = new Set<string>();

  fields.forEach((field: unknown, index: number) => {
    const path = `spec.fields[${index}]`;
    errors.push(...validateField(field, path));

    if (Array.isArray(field) && typeof field[0] === 'string') {
      if (seen.has(field[0])) {
        errors.push({
          path: `${path}.name`,
          message: `Duplicate field "${field[0]}"`,
          code: 'DUPLICATE_FIELD',
        });
      }
      seen.add(field[0]);
    }
  });

  return { valid: errors.length === 0, errors };
}

/**
 * Validate a single field tuple.
 */
export function validateField(field: unknown, path = 'field'): EntitySpecIssue[] {
  const errors: EntitySpecIssue[] = [];

  if (!Array.isArray(field) || field.length < 2 || field.length > 3) {
    errors.push({
      path,
      message: 'Field must be an array [name, properties?, type]',
      code: 'INVALID_TYPE',
    });
    return errors;
  }

  const [name] = field;
  if (typeof name !== 'string' || name.trim() === '') {
    errors.push({
      path: `${path}.name`,
      message: 'Field name must be a non-empty string',
      code: 'INVALID_NAME',
    });
  }

  if (field.length === 3) {
    const properties: unknown = field[1];
    if (!isPlainRecord(properties)) {
      errors.push({
        path: `${path}.properties`,
        message: 'Field properties must be a map',
        code: 'INVALID_PROPERTIES',
      });
    } else {
      errors.push(...validateFieldProperties(properties, `${path}.properties`));
    }
  }

  errors.push(...validateFieldType(field[field.length - 1], `${path}.type`));

  return errors;
}

function validateFieldProperties(
  properties: Record<string, unknown>,
  path: string
): EntitySpecIssue[] {
  const errors: EntitySpecIssue[] = [];

  for (const key of BOOLEAN_PROPERTIES) {
    const value = properties[key];
    if (value !== undefined && typeof value !== 'boolean') {
      errors.push({
        path: `${path}.${key}`,
        message: `"${key}" must be a boolean`,
        code: 'INVALID_VALUE',
      });
    }
  }

  const required = REQUIRED_REL_MARKERS.filter((m) => properties[m] === true);
  const optional = OPTIONAL_REL_MARKERS.filter((m) => properties[m] === true);
  if (required.length > 0 && optional.length > 0) {
    errors.push({
      path,
      message: `Field cannot be both ${required.join(', ')} and ${optional.join(', ')}`,
      code: 'CONFLICTING_MARKERS',
    });
  }

  return errors;
}

/**
 * Validate a field type: validator, keyword, [keyword, props] or entity type.
 */
export function validateFieldType(type: unknown, path = 'type'): EntitySpecIssue[] {
  if (typeof type === 'function' || type instanceof ZodType) {
    return [];
  }

  if (typeof type === 'string') {
    if (isEntityType(type)) {
      return [];
    }
    if (type === 'enum') {
      return [
        {
          path,
          message: '"enum" needs its values: ["enum", { values: [...] }]',
          code: 'INVALID_VALUE',
        },
      ];
    }
    if (isPrimitiveKeyword(type)) {
      return [];
    }
    return [{ path, message: `Unknown type "${type}"`, code: 'UNKNOWN_TYPE' }];
  }

  if (Array.isArray(type) && type.length === 2) {
    const [keyword, props] = type;
    if (!isPrimitiveKeyword(keyword)) {
      return [{ path, message: `Unknown type "${String(keyword)}"`, code: 'UNKNOWN_TYPE' }];
    }
    if (!isPlainRecord(props)) {
      return [{ path, message: 'Type properties must be a map', code: 'INVALID_PROPERTIES' }];
    }
    return validatePrimitiveProps(keyword, props, path);
  }

  return [
    {
      path,
      message: 'Type must be a validator, a type keyword, [keyword, props] or an entity type',
      code: 'INVALID_TYPE',
    },
  ];
}

function validatePrimitiveProps(
  keyword: string,
  props: Record<string, unknown>,
  path: string
): EntitySpecIssue[] {
  const errors: EntitySpecIssue[] = [];

  for (const bound of ['min', 'max']) {
    if (props[bound] !== undefined && typeof props[bound] !== 'number') {
      errors.push({
        path: `${path}.${bound}`,
        message: `"${bound}" must be a number`,
        code: 'INVALID_VALUE',
      });
    }
  }

  if (keyword === 'enum') {
    const values = props.values;
    if (!Array.isArray(values) || values.length === 0) {
      errors.push({
        path: `${path}.values`,
        message: '"enum" needs a non-empty values array',
        code: 'INVALID_VALUE',
      });
    }
  }

  return errors;
}

/**
 * Group issues by path into readable messages.
 */
export function humanizeSpecIssues(errors: EntitySpecIssue[]): Record<string, string[]> {
  const humanized: Record<string, string[]> = {};
  for (const error of errors) {
    const messages = humanized[error.path] ?? [];
    messages.push(error.message);
    humanized[error.path] = messages;
  }
  return humanized;
}
