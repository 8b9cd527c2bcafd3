// Tests for entity DSL grammar validation

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  validateEntitySpec,
  validateFieldType,
  humanizeSpecIssues,
  isPlainRecord,
} from './entity-spec.js';

describe('validateEntitySpec', () => {
  it('should accept a spec with properties and fields', () => {
    const result = validateEntitySpec([
      'shop/client',
      { table: 'client' },
      ['id', { 'primary-key?': true }, 'uuid'],
      ['name', ['string', { max: 250 }]],
      ['orders', { 'one-to-many?': true }, 'shop/order'],
    ]);

    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
  });

  it('should accept a spec without properties', () => {
    const result = validateEntitySpec(['shop/tag', ['label', 'string']]);

    expect(result.valid).toBe(true);
  });

  it('should accept predicate and zod validators', () => {
    const result = validateEntitySpec([
      'shop/item',
      ['qty', (v: unknown) => typeof v === 'number'],
      ['sku', z.string().length(8)],
    ]);

    expect(result.valid).toBe(true);
  });

  it('should reject non-array input', () => {
    const result = validateEntitySpec({ entity: 'shop/client' });

    expect(result.valid).toBe(false);
    expect(result.errors[0]).toEqual({
      path: 'spec',
      message: 'Entity spec must be a non-empty array [entityType, properties?, ...fields]',
      code: 'INVALID_TYPE',
    });
  });

  it('should require a qualified entity type', () => {
    const result = validateEntitySpec(['client', ['id', 'uuid']]);

    expect(result.errors).toContainEqual(
      expect.objectContaining({ path: 'spec.entity', code: 'INVALID_ENTITY_TYPE' })
    );
  });

  it('should report unknown type keywords with their path', () => {
    const result = validateEntitySpec(['shop/client', ['id', 'uuid'], ['name', 'text']]);

    expect(result.errors).toEqual([
      { path: 'spec.fields[1].type', message: 'Unknown type "text"', code: 'UNKNOWN_TYPE' },
    ]);
  });

  it('should reject malformed field tuples', () => {
    const result = validateEntitySpec(['shop/client', ['id']]);

    expect(result.errors[0]).toEqual(
      expect.objectContaining({ path: 'spec.fields[0]', code: 'INVALID_TYPE' })
    );
  });

  it('should reject duplicate field names', () => {
    const result = validateEntitySpec(['shop/client', ['id', 'uuid'], ['id', 'int']]);

    expect(result.errors).toContainEqual(
      expect.objectContaining({ path: 'spec.fields[1].name', code: 'DUPLICATE_FIELD' })
    );
  });

  it('should reject non-boolean markers', () => {
    const result = validateEntitySpec(['shop/client', ['id', { 'primary-key?': 'yes' }, 'uuid']]);

    expect(result.errors).toEqual([
      {
        path: 'spec.fields[0].properties.primary-key?',
        message: '"primary-key?" must be a boolean',
        code: 'INVALID_VALUE',
      },
    ]);
  });

  it('should reject a field that is both a required and an optional relation', () => {
    const result = validateEntitySpec([
      'shop/order',
      ['client', { 'many-to-one?': true, 'one-to-many?': true }, 'shop/client'],
    ]);

    expect(result.errors[0].code).toBe('CONFLICTING_MARKERS');
  });
});

describe('validateFieldType', () => {
  it('should require enum values', () => {
    expect(validateFieldType('enum')[0].code).toBe('INVALID_VALUE');
    expect(validateFieldType(['enum', { values: [] }])[0].path).toBe('type.values');
    expect(validateFieldType(['enum', { values: ['a', 'b'] }])).toEqual([]);
  });

  it('should check numeric bounds', () => {
    expect(validateFieldType(['string', { max: '10' }])).toEqual([
      { path: 'type.max', message: '"max" must be a number', code: 'INVALID_VALUE' },
    ]);
  });

  it('should reject unknown parametrized keywords', () => {
    expect(validateFieldType(['text', {}])[0].code).toBe('UNKNOWN_TYPE');
  });

  it('should reject numbers and objects', () => {
    expect(validateFieldType(42)[0].code).toBe('INVALID_TYPE');
    expect(validateFieldType({ type: 'string' })[0].code).toBe('INVALID_TYPE');
  });
});

describe('humanizeSpecIssues', () => {
  it('should group messages by path', () => {
    const humanized = humanizeSpecIssues([
      { path: 'spec.entity', message: 'a', code: 'INVALID_ENTITY_TYPE' },
      { path: 'spec.fields[0].type', message: 'b', code: 'UNKNOWN_TYPE' },
      { path: 'spec.entity', message: 'c', code: 'INVALID_ENTITY_TYPE' },
    ]);

    expect(humanized).toEqual({
      'spec.entity': ['a', 'c'],
      'spec.fields[0].type': ['b'],
    });
  });
});

describe('isPlainRecord', () => {
  it('should exclude arrays, null and zod schemas', () => {
    expect(isPlainRecord({ table: 'x' })).toBe(true);
    expect(isPlainRecord([])).toBe(false);
    expect(isPlainRecord(null)).toBe(false);
    expect(isPlainRecord(z.string())).toBe(false);
  });
});
