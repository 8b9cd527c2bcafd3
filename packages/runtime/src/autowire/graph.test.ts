// Tests for the component graph builder

import { describe, it, expect } from 'vitest';
import type { GraphNode } from '@armature/protocol';
import { createCatalog } from './catalog.js';
import { findComponents } from './collector.js';
import { defineContribution } from './define.js';
import {
  applyAutowire,
  autowireConfig,
  buildGraph,
  mergeContributions,
  prepComponent,
} from './graph.js';
import { UnsupportedScanInputError } from '../errors.js';
import { createCapturingLogger } from '../logger.js';
import * as entities from './__fixtures__/project/entities.js';
import * as handlers from './__fixtures__/project/handlers/index.js';
import * as routes from './__fixtures__/project/handlers/routes.js';
import * as stubComponents from './__fixtures__/project/stub-components.js';

const catalog = createCatalog({
  'app.entities': entities,
  'app.handlers': handlers,
  'app.handlers.routes': routes,
  'app.stub-components': stubComponents,
});

describe('mergeContributions', () => {
  it('should use a single contribution as is', () => {
    expect(mergeContributions([{ component: 'only' }])).toEqual({ component: 'only' });
  });

  it('should aggregate several contributions per key in order', () => {
    expect(mergeContributions([{ a: 1 }, { a: 2, b: 3 }])).toEqual({ a: [1, 2], b: [3] });
  });
});

describe('prepComponent', () => {
  it('should leave the config alone for contributions', () => {
    const contribution = findComponents(catalog, ['app.stub-components']).get(
      'app.stub-components/test-1'
    );
    const config = {};

    expect(contribution).toBeDefined();
    if (contribution) {
      expect(prepComponent(config, contribution)).toBe(config);
    }
  });
});

describe('buildGraph', () => {
  const config = buildGraph(findComponents(catalog, ['app.stub-components']));

  it('should emit one node per component', () => {
    expect(Object.keys(config)).toEqual([
      'app.stub-components/db-connection',
      'app.stub-components/health-check',
      'app.stub-components/multi-parent-test-component',
      'app.stub-components/parent-test-component',
      'app.stub-components/status',
    ]);
  });

  it('should turn dependencies into references', () => {
    expect(config['app.stub-components/status']).toEqual({
      key: 'app.stub-components/status',
      definition: stubComponents.status,
      inputs: { db: { $ref: 'app.stub-components/db-connection' } },
    });
  });

  it('should merge a single child into its parent', () => {
    expect(config['app.stub-components/parent-test-component']?.inputs).toEqual({
      component: 'single-child',
    });
  });

  it('should aggregate several children in discovery order', () => {
    expect(config['app.stub-components/multi-parent-test-component']?.inputs).toEqual({
      component: ['test-1', 'test-2'],
    });
  });

  it('should create a value node for parents without a definition', () => {
    const plugins = createCatalog({
      'app.plugins': { auditHook: defineContribution('hooks', { on: 'save' }) },
    });
    const graph = buildGraph(findComponents(plugins, ['app.plugins']));

    expect(graph).toEqual({
      'app.plugins/hooks': { key: 'app.plugins/hooks', inputs: { on: 'save' } },
    });
  });

  it('should log the graph size', () => {
    const logger = createCapturingLogger();
    buildGraph(findComponents(catalog, ['app.stub-components']), { logger });

    expect(logger.entries.map((e) => [e.level, e.message, e.data])).toEqual([
      ['debug', 'Built component graph', { nodes: 5, parents: 2 }],
    ]);
  });
});

describe('autowireConfig', () => {
  it('should build the whole project when the root is omitted', () => {
    expect(Object.keys(autowireConfig(catalog))).toHaveLength(9);
  });

  it('should emit references to nodes outside the scanned scopes', () => {
    const config = autowireConfig(catalog, { root: 'app.handlers' });

    expect(Object.keys(config)).toEqual(['app.handlers/ping', 'app.handlers.routes/routes']);
    expect(config['app.handlers/ping']?.inputs).toEqual({
      health: { $ref: 'app.stub-components/health-check' },
    });
  });

  it('should build nothing for an explicit null root', () => {
    expect(autowireConfig(catalog, { root: null })).toEqual({});
  });

  it('should follow the scanner mode for unsupported roots', () => {
    expect(() => autowireConfig(catalog, { root: 42 })).toThrow(UnsupportedScanInputError);
    expect(autowireConfig(catalog, { root: 42, strict: false })).toEqual({});
  });

  it('should include entity nodes', () => {
    const config = autowireConfig(catalog, { root: 'app.entities' });

    expect(config['entity:shop/order']?.inputs['shop/client']).toEqual({
      $ref: 'entity:shop/client',
    });
  });
});

describe('applyAutowire', () => {
  it('should keep nodes already present in the base config', () => {
    const db: GraphNode = {
      key: 'app.stub-components/db-connection',
      inputs: { url: 'postgres://localhost/test' },
    };
    const config = applyAutowire({ [db.key]: db }, catalog, { root: 'app.stub-components' });

    expect(config['app.stub-components/db-connection']).toBe(db);
    expect(config['app.stub-components/health-check']?.definition).toBe(stubComponents.healthCheck);
  });
});
