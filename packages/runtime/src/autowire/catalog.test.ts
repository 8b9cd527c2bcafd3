// Tests for project catalogs

import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { createCatalog, discoverProject, fileToScope, isWithinScope } from './catalog.js';

const fixtureDir = fileURLToPath(new URL('./__fixtures__/project', import.meta.url));

describe('isWithinScope', () => {
  it('should match the root and scopes below it', () => {
    expect(isWithinScope('app.handlers', 'app.handlers')).toBe(true);
    expect(isWithinScope('app.handlers.routes', 'app.handlers')).toBe(true);
  });

  it('should not match scopes sharing a prefix only', () => {
    expect(isWithinScope('app.handlersx', 'app.handlers')).toBe(false);
    expect(isWithinScope('app', 'app.handlers')).toBe(false);
  });
});

describe('fileToScope', () => {
  it('should turn paths into dotted scopes', () => {
    expect(fileToScope('db.ts')).toBe('db');
    expect(fileToScope('handlers/index.ts')).toBe('handlers');
    expect(fileToScope('handlers/routes.ts', 'app')).toBe('app.handlers.routes');
  });
});

describe('createCatalog', () => {
  it('should sort scopes and hide vendored ones', () => {
    const catalog = createCatalog(
      { 'app.z': {}, 'app.a': {}, vendor: {}, 'vendor.lib': { x: 1 } },
      { vendored: ['vendor'] }
    );

    expect(catalog.scopes()).toEqual(['app.a', 'app.z']);
    expect(catalog.exports('vendor.lib')).toBeUndefined();
    expect(catalog.exports('app.a')).toEqual({});
  });
});

describe('discoverProject', () => {
  it('should import project modules and skip vendored directories', async () => {
    const catalog = await discoverProject(fixtureDir, { prefix: 'app' });

    expect(catalog.scopes()).toEqual([
      'app.entities',
      'app.handlers',
      'app.handlers.routes',
      'app.stub-components',
    ]);
    expect(Object.keys(catalog.exports('app.handlers') ?? {})).toContain('ping');
  });
});
