// Scanner - enumerates project scopes below a root
//
// The root may be a string or a symbol (its description is used). Calling
// scan() with no argument lists the whole project, while an explicit null or
// undefined lists nothing. Any other input is rejected in strict mode and
// yields no scopes in permissive mode.

import { UnsupportedScanInputError } from '../errors.js';
import { isWithinScope, type ProjectCatalog } from './catalog.js';

export type ScanRoot = string | symbol;

export type ScanOptions = {
  /** Throw on unsupported roots (default) instead of returning [] */
  strict?: boolean;
};

export type Scanner = {
  /**
   * List project scopes.
   *
   * @throws UnsupportedScanInputError for roots other than string or symbol in strict mode
   */
  scan(...args: [] | [root: unknown]): string[];
};

function isScanRoot(root: unknown): root is ScanRoot {
  return typeof root === 'string' || typeof root === 'symbol';
}

function rootName(root: ScanRoot): string {
  return typeof root === 'string' ? root : (root.description ?? '');
}

export function createScanner(catalog: ProjectCatalog, options: ScanOptions = {}): Scanner {
  const strict = options.strict ?? true;

  return {
    scan(...args: [] | [root: unknown]): string[] {
      if (args.length === 0) {
        return catalog.scopes();
      }

      const [root] = args;
      if (root === null || root === undefined) {
        return [];
      }

      if (!isScanRoot(root)) {
        if (strict) {
          throw new UnsupportedScanInputError(root);
        }
        return [];
      }

      const name = rootName(root);
      return catalog.scopes().filter((scope) => isWithinScope(scope, name));
    },
  };
}

/**
 * One-shot scan over a catalog.
 */
export function findProjectScopes(
  catalog: ProjectCatalog,
  options: ScanOptions = {},
  ...args: [] | [root: unknown]
): string[] {
  return createScanner(catalog, options).scan(...args);
}
