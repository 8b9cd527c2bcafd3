// @armature/runtime
// Entity declarations, autowiring and the component lifecycle

// Error types
export {
  RuntimeError,
  ValidationError,
  SpecGrammarError,
  DataValidationError,
  UnknownEntityError,
  MissingPrimaryKeyError,
  UnsupportedScanInputError,
  MissingDependencyError,
  CircularDependencyError,
  ComponentInitError,
  ComponentHaltError,
  toError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createLevelLogger,
  createCapturingLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger.js';

// Configuration
export {
  loadConfig,
  createConfiguredLogger,
  autowireOptions,
  type RuntimeConfig,
} from './config.js';

// Entities
export * from './entities/index.js';

// Autowiring
export * from './autowire/index.js';

// Lifecycle
export * from './system/index.js';
