// Tests for the scope scanner

import { describe, it, expect } from 'vitest';
import { createCatalog } from './catalog.js';
import { createScanner, findProjectScopes } from './scanner.js';
import { UnsupportedScanInputError } from '../errors.js';
import * as entities from './__fixtures__/project/entities.js';
import * as handlers from './__fixtures__/project/handlers/index.js';
import * as routes from './__fixtures__/project/handlers/routes.js';
import * as stubComponents from './__fixtures__/project/stub-components.js';
import * as legacy from './__fixtures__/project/vendor/legacy.js';

const catalog = createCatalog(
  {
    'app.stub-components': stubComponents,
    'app.handlers.routes': routes,
    'app.handlers': handlers,
    'app.entities': entities,
    'vendor.legacy': legacy,
  },
  { vendored: ['vendor'] }
);

describe('Scanner', () => {
  const scanner = createScanner(catalog);

  it('should list every project scope when the root is omitted', () => {
    expect(scanner.scan()).toEqual([
      'app.entities',
      'app.handlers',
      'app.handlers.routes',
      'app.stub-components',
    ]);
  });

  it('should list nothing for an explicit null or undefined root', () => {
    expect(scanner.scan(null)).toEqual([]);
    expect(scanner.scan(undefined)).toEqual([]);
  });

  it('should list the root scope and scopes below it', () => {
    expect(scanner.scan('app.handlers')).toEqual(['app.handlers', 'app.handlers.routes']);
    expect(scanner.scan('app.handler')).toEqual([]);
  });

  it('should accept symbols by description', () => {
    expect(scanner.scan(Symbol('app.handlers'))).toEqual(['app.handlers', 'app.handlers.routes']);
  });

  it('should never list vendored scopes', () => {
    expect(scanner.scan('vendor')).toEqual([]);
  });

  it('should match nothing for an empty root', () => {
    expect(scanner.scan('')).toEqual([]);
  });

  it('should reject unsupported roots in strict mode', () => {
    expect(() => scanner.scan(42)).toThrow(UnsupportedScanInputError);
    expect(() => scanner.scan(42)).toThrow('Scan root must be a string or a symbol, got number');
    expect(() => scanner.scan(['app'])).toThrow('Scan root must be a string or a symbol, got array');
  });

  it('should list nothing for unsupported roots in permissive mode', () => {
    expect(createScanner(catalog, { strict: false }).scan(42)).toEqual([]);
  });
});

describe('findProjectScopes', () => {
  it('should scan once with the given root', () => {
    expect(findProjectScopes(catalog, {}, 'app.entities')).toEqual(['app.entities']);
    expect(findProjectScopes(catalog)).toHaveLength(4);
  });
});
