// Tests for the component collector

import { describe, it, expect } from 'vitest';
import { AUTOWIRED } from '@armature/protocol';
import { createCatalog } from './catalog.js';
import {
  collectAutowired,
  findComponents,
  type CollectedComponents,
  getComponentDeps,
  isAutowired,
  resolveName,
  toComponentName,
} from './collector.js';
import { inject } from './define.js';
import { SpecGrammarError } from '../errors.js';
import * as entities from './__fixtures__/project/entities.js';
import * as stubComponents from './__fixtures__/project/stub-components.js';

const catalog = createCatalog({
  'app.entities': entities,
  'app.stub-components': stubComponents,
});

describe('isAutowired', () => {
  it('should accept tagged definitions', () => {
    expect(isAutowired(stubComponents.dbConnection)).toBe(true);
    expect(isAutowired(stubComponents.test1)).toBe(true);
    expect(isAutowired(entities.client)).toBe(true);
  });

  it('should reject untagged and malformed values', () => {
    expect(isAutowired(stubComponents.helperLabel)).toBe(false);
    expect(isAutowired(null)).toBe(false);
    expect(isAutowired({ [AUTOWIRED]: true, kind: 'component' })).toBe(false);
    expect(isAutowired({ [AUTOWIRED]: true, kind: 'widget' })).toBe(false);
  });
});

describe('toComponentName', () => {
  it('should kebab-case export names', () => {
    expect(toComponentName('dbConnection')).toBe('db-connection');
    expect(toComponentName('test1')).toBe('test-1');
    expect(toComponentName('multiParentTestComponent')).toBe('multi-parent-test-component');
    expect(toComponentName('http_server')).toBe('http-server');
  });
});

describe('resolveName', () => {
  it('should qualify bare names with the declaring scope', () => {
    expect(resolveName('app.status', 'db-connection')).toBe('app.status/db-connection');
    expect(resolveName('app.status', 'app.db/db-connection')).toBe('app.db/db-connection');
  });
});

describe('getComponentDeps', () => {
  it('should return one edge per declared dependency', () => {
    const deps = getComponentDeps(
      { db: inject('db-connection'), cache: inject('app.cache/store') },
      'app.status'
    );

    expect(deps).toEqual([
      { param: 'db', key: 'app.status/db-connection' },
      { param: 'cache', key: 'app.cache/store' },
    ]);
  });
});

describe('collectAutowired', () => {
  it('should return the accumulator itself for untagged values', () => {
    const acc: CollectedComponents = new Map();

    expect(collectAutowired('app.x', acc, 'helper', () => 'helper')).toBe(acc);
  });

  it('should key components by scope and kebab-cased export name', () => {
    const empty: CollectedComponents = new Map();
    const collected = collectAutowired('app.x', empty, 'dbConnection', stubComponents.dbConnection);

    expect([...collected.keys()]).toEqual(['app.x/db-connection']);
  });
});

describe('findComponents', () => {
  it('should collect tagged exports in name order', () => {
    const collected = findComponents(catalog, ['app.stub-components']);

    expect([...collected.keys()]).toEqual([
      'app.stub-components/db-connection',
      'app.stub-components/health-check',
      'app.stub-components/multi-parent-test-component',
      'app.stub-components/parent-test-component',
      'app.stub-components/single-child',
      'app.stub-components/status',
      'app.stub-components/test-1',
      'app.stub-components/test-2',
    ]);
  });

  it('should record dependency edges', () => {
    const collected = findComponents(catalog, ['app.stub-components']);

    expect(collected.get('app.stub-components/status')?.deps).toEqual([
      { param: 'db', key: 'app.stub-components/db-connection' },
    ]);
    expect(collected.get('app.stub-components/db-connection')?.deps).toEqual([]);
  });

  it('should resolve contribution parents in the declaring scope', () => {
    const child = findComponents(catalog, ['app.stub-components']).get(
      'app.stub-components/single-child'
    );

    expect(child?.kind).toBe('contribution');
    if (child?.kind === 'contribution') {
      expect(child.parent).toBe('app.stub-components/parent-test-component');
    }
  });

  it('should key entities by type and depend on required references', () => {
    const collected = findComponents(catalog, ['app.entities']);

    expect([...collected.keys()]).toEqual(['entity:shop/client', 'entity:shop/order']);
    expect(collected.get('entity:shop/client')?.deps).toEqual([]);
    expect(collected.get('entity:shop/order')?.deps).toEqual([
      { param: 'shop/client', key: 'entity:shop/client' },
    ]);
  });

  it('should fail on entity specs that break the grammar', () => {
    const broken = createCatalog({
      'app.bad': { broken: { [AUTOWIRED]: true, kind: 'entity', spec: ['shop/bad', ['id']] } },
    });

    expect(() => findComponents(broken, ['app.bad'])).toThrow(SpecGrammarError);
  });

  it('should skip scopes without exports', () => {
    expect(findComponents(catalog, ['app.missing']).size).toBe(0);
  });
});
