export {
  createCatalog,
  discoverProject,
  fileToScope,
  isWithinScope,
  type CatalogOptions,
  type DiscoverOptions,
  type ModuleExports,
  type ProjectCatalog,
} from './catalog.js';
export {
  createScanner,
  findProjectScopes,
  type ScanOptions,
  type ScanRoot,
  type Scanner,
} from './scanner.js';
export {
  collectAutowired,
  findComponents,
  getComponentDeps,
  isAutowired,
  resolveName,
  toComponentName,
  type CollectedComponent,
  type CollectedComponents,
  type ComponentDep,
} from './collector.js';
export {
  applyAutowire,
  autowireConfig,
  buildGraph,
  mergeContributions,
  prepComponent,
  type AutowireOptions,
  type BuildGraphOptions,
} from './graph.js';
export {
  defineComponent,
  defineContribution,
  inject,
  injectEntity,
  type ComponentDefinition,
} from './define.js';
