// Zod schemas for canonical entity specs

import { z, type ZodTypeAny } from 'zod';
import type {
  FieldSpec,
  FieldType,
  PrimitiveKeyword,
  PrimitiveProps,
} from '@armature/protocol';

/**
 * Resolves a `ref` field to the target's ref schema at validation time.
 */
export type RefResolver = (type: Extract<FieldType, { kind: 'ref' }>) => ZodTypeAny;

function boundedString(schema: z.ZodString, props?: PrimitiveProps): z.ZodString {
  let bounded = schema;
  if (props?.min !== undefined) bounded = bounded.min(props.min);
  if (props?.max !== undefined) bounded = bounded.max(props.max);
  return bounded;
}

function boundedNumber(schema: z.ZodNumber, props?: PrimitiveProps): z.ZodNumber {
  let bounded = schema;
  if (props?.min !== undefined) bounded = bounded.min(props.min);
  if (props?.max !== undefined) bounded = bounded.max(props.max);
  return bounded;
}

function enumSchema(values: readonly (string | number)[]): ZodTypeAny {
  return z.unknown().refine(
    (value) => (typeof value === 'string' || typeof value === 'number') && values.includes(value),
    { message: `Expected one of: ${values.join(', ')}` }
  );
}

export function primitiveSchema(type: PrimitiveKeyword, props?: PrimitiveProps): ZodTypeAny {
  switch (type) {
    case 'any':
      return z.any();
    case 'string':
      return boundedString(z.string(), props);
    case 'uuid':
      return boundedString(z.string().uuid(), props);
    case 'email':
      return boundedString(z.string().email(), props);
    case 'int':
      return boundedNumber(z.number().int(), props);
    case 'number':
      return boundedNumber(z.number(), props);
    case 'boolean':
      return z.boolean();
    case 'date':
      return z.date();
    case 'enum':
      return enumSchema(props?.values ?? []);
  }
}

/**
 * Schema for a single field type.
 */
export function fieldTypeSchema(type: FieldType, resolveRef: RefResolver): ZodTypeAny {
  switch (type.kind) {
    case 'primitive':
      return primitiveSchema(type.type);
    case 'param-primitive':
      return primitiveSchema(type.type, type.props);
    case 'validator':
      if (typeof type.validate === 'function') {
        return z.unknown().refine(type.validate, { message: 'Failed custom validation' });
      }
      return type.validate;
    case 'ref':
      return z.lazy(() => resolveRef(type));
  }
}

export function fieldSchema(field: FieldSpec, resolveRef: RefResolver): ZodTypeAny {
  const schema = fieldTypeSchema(field.type, resolveRef);
  return field.properties.optional === true ? schema.optional() : schema;
}

/**
 * Object schema for an entity. Extra keys are allowed.
 */
export function entitySchema(
  spec: { readonly fields: readonly FieldSpec[] },
  resolveRef: RefResolver
): z.AnyZodObject {
  const shape: Record<string, ZodTypeAny> = {};
  for (const field of spec.fields) {
    shape[field.name] = fieldSchema(field, resolveRef);
  }
  return z.object(shape).passthrough();
}

/**
 * Schema accepting either the raw primary key value or a map carrying it.
 */
export function entityRefSchema(primaryKey: FieldSpec, resolveRef: RefResolver): ZodTypeAny {
  const keySchema = fieldTypeSchema(primaryKey.type, resolveRef);
  return z.union([keySchema, z.object({ [primaryKey.name]: keySchema }).passthrough()]);
}

/**
 * Group zod issues by field path. Issues on the value itself go under "_errors".
 */
export function issuesByField(error: z.ZodError): Record<string, string[]> {
  const errors: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '_errors';
    const messages = errors[path] ?? [];
    messages.push(issue.message);
    errors[path] = messages;
  }
  return errors;
}
