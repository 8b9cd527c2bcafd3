// Tests for entity handles and lifecycle hooks

import { describe, it, expect } from 'vitest';
import { AUTOWIRED } from '@armature/protocol';
import { Entity, createEntity } from './entity.js';
import { defineEntity, entityKey, initEntity, isEntityKey, prepEntity } from './lifecycle.js';
import { prepareSpec } from './parser.js';
import { createEntityRegistry } from './registry.js';
import { SpecGrammarError } from '../errors.js';

const rawClient = [
  'shop/client',
  { table: 'clients' },
  ['id', { 'primary-key?': true }, 'uuid'],
  ['name', 'string'],
] as const;

const rawOrder = [
  'shop/order',
  ['id', { 'primary-key?': true }, 'uuid'],
  ['client', { 'many-to-one?': true }, 'shop/client'],
  ['lines', { 'one-to-many?': true }, 'shop/line'],
] as const;

describe('Entity', () => {
  it('should register the spec and delegate to the registry', () => {
    const registry = createEntityRegistry();
    const client = createEntity(registry, 'shop/client', prepareSpec(rawClient).spec);

    expect(client).toBeInstanceOf(Entity);
    expect(registry.has('shop/client')).toBe(true);
    expect(client.columns()).toEqual(['id', 'name']);
    expect(client.values({ name: 'Jack', id: 'c-1' })).toEqual(['c-1', 'Jack']);
    expect(client.prop('table')).toBe('clients');
  });

  it('should use the table property as table name', () => {
    const registry = createEntityRegistry();
    const client = createEntity(registry, 'shop/client', prepareSpec(rawClient).spec);

    expect(client.tableName()).toBe('clients');
  });

  it('should fall back to the entity name', () => {
    const registry = createEntityRegistry();
    const order = createEntity(registry, 'shop/order', prepareSpec(rawOrder).spec);

    expect(order.tableName()).toBe('order');
  });

  it('should report dependencies on other handles', () => {
    const registry = createEntityRegistry();
    const client = createEntity(registry, 'shop/client', prepareSpec(rawClient).spec);
    const order = createEntity(registry, 'shop/order', prepareSpec(rawOrder).spec);

    expect(order.dependsOn(client)).toBe(true);
    expect(client.dependsOn(order)).toBe(false);
  });
});

describe('entityKey', () => {
  it('should prefix the entity type', () => {
    expect(entityKey('shop/client')).toBe('entity:shop/client');
    expect(isEntityKey('entity:shop/client')).toBe(true);
    expect(isEntityKey('app.db/db-connection')).toBe(false);
  });
});

describe('prepEntity', () => {
  it('should reference every required dependency', () => {
    const inputs = prepEntity(rawOrder);

    expect(inputs.spec.entity).toBe('shop/order');
    expect(Object.keys(inputs)).toEqual(['spec', 'shop/client']);
    expect(inputs['shop/client']).toEqual({ $ref: 'entity:shop/client' });
  });

  it('should not reference optional relations marked as foreign keys', () => {
    const inputs = prepEntity([
      'shop/client',
      ['id', { 'primary-key?': true }, 'uuid'],
      ['orders', { 'one-to-many?': true, 'foreign-key?': true }, 'shop/order'],
    ]);

    expect(Object.keys(inputs)).toEqual(['spec']);
  });

  it('should reject specs that break the grammar', () => {
    expect(() => prepEntity(['shop/order', ['id']])).toThrow(SpecGrammarError);
  });
});

describe('initEntity', () => {
  it('should register the prepared spec and return its handle', () => {
    const registry = createEntityRegistry();
    const client = initEntity(registry, prepEntity(rawClient));

    expect(client.type).toBe('shop/client');
    expect(registry.lookup('shop/client')?.properties).toEqual({ table: 'clients' });
  });
});

describe('defineEntity', () => {
  it('should tag the spec for autowiring', () => {
    const descriptor = defineEntity(rawClient);

    expect(descriptor[AUTOWIRED]).toBe(true);
    expect(descriptor.kind).toBe('entity');
    expect(descriptor.spec).toBe(rawClient);
  });
});
