// Project catalog - the code scopes a project owns
//
// A scope is a dot-separated module name ("handlers.status"). The catalog
// maps scopes to their exports and hides vendored code, so the scanner only
// ever sees the project's own modules.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { isPlainRecord } from '@armature/protocol';

export type ModuleExports = Record<string, unknown>;

export interface ProjectCatalog {
  /** Project scopes, sorted, vendored ones excluded */
  scopes(): string[];
  /** Exports of a scope; module namespaces list them by name */
  exports(scope: string): ModuleExports | undefined;
}

export type CatalogOptions = {
  /** Scope prefixes holding dependency code */
  vendored?: string[];
};

export type DiscoverOptions = CatalogOptions & {
  /** File extensions treated as modules */
  extensions?: string[];
  /** Prefix prepended to every discovered scope, e.g. "app" */
  prefix?: string;
};

const DEFAULT_EXTENSIONS = ['.ts', '.js', '.mjs'];
const SKIPPED_DIRECTORIES = new Set(['node_modules', 'vendor', 'dist']);

/**
 * True when `scope` equals `root` or lives below it
 */
export function isWithinScope(scope: string, root: string): boolean {
  return scope === root || scope.startsWith(`${root}.`);
}

/**
 * Create a catalog from an explicit module map.
 *
 * @example
 * ```typescript
 * import * as status from './handlers/status.js';
 * import * as db from './db.js';
 *
 * const catalog = createCatalog({ 'handlers.status': status, db });
 * ```
 */
export function createCatalog(
  modules: Record<string, ModuleExports>,
  options: CatalogOptions = {}
): ProjectCatalog {
  const vendored = options.vendored ?? [];
  const owned = Object.keys(modules)
    .filter((scope) => !vendored.some((prefix) => isWithinScope(scope, prefix)))
    .sort();
  const ownedSet = new Set(owned);

  return {
    scopes() {
      return [...owned];
    },
    exports(scope: string) {
      return ownedSet.has(scope) ? modules[scope] : undefined;
    },
  };
}

/**
 * Scope name for a module file relative to the project root:
 * "handlers/status.ts" -> "handlers.status", "handlers/index.ts" -> "handlers"
 */
export function fileToScope(relativePath: string, prefix?: string): string {
  const parsed = path.parse(relativePath);
  const segments = parsed.dir === '' ? [] : parsed.dir.split(path.sep);
  if (parsed.name !== 'index') {
    segments.push(parsed.name);
  }
  if (prefix) {
    segments.unshift(prefix);
  }
  return segments.join('.');
}

function isModuleFile(fileName: string, extensions: string[]): boolean {
  if (fileName.endsWith('.d.ts') || /\.(test|spec)\.[cm]?[jt]s$/.test(fileName)) {
    return false;
  }
  return extensions.includes(path.extname(fileName));
}

async function listModuleFiles(dir: string, extensions: string[]): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    if (entry.name.startsWith('.')) {
      continue;
    }
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!SKIPPED_DIRECTORIES.has(entry.name)) {
        files.push(...(await listModuleFiles(fullPath, extensions)));
      }
    } else if (entry.isFile() && isModuleFile(entry.name, extensions)) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Discover and import every module under `rootDir`.
 *
 * Dependency directories (node_modules, vendor), build output, hidden
 * directories, tests and declaration files are skipped.
 */
export async function discoverProject(
  rootDir: string,
  options: DiscoverOptions = {}
): Promise<ProjectCatalog> {
  const extensions = options.extensions ?? DEFAULT_EXTENSIONS;
  const files = await listModuleFiles(rootDir, extensions);
  const modules: Record<string, ModuleExports> = {};

  for (const file of files.sort()) {
    const loaded: unknown = await import(pathToFileURL(file).href);
    if (isPlainRecord(loaded)) {
      modules[fileToScope(path.relative(rootDir, file), options.prefix)] = loaded;
    }
  }

  return createCatalog(modules, options);
}
