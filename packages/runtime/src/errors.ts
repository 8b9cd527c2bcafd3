// Runtime error types

import type { EntitySpecIssue } from '@armature/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown>; code?: string }
  ) {
    super(options?.code ?? 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a raw entity spec does not follow the DSL grammar.
 */
export class SpecGrammarError extends ValidationError {
  readonly entityType?: string;
  readonly issues: EntitySpecIssue[];
  readonly diff: Record<string, string[]>;

  constructor(entityType: string | undefined, issues: EntitySpecIssue[], diff: Record<string, string[]>) {
    super(
      entityType ? `Invalid spec schema for entity ${entityType}` : 'Invalid entity spec schema',
      { details: { diff }, code: 'SPEC_GRAMMAR_ERROR' }
    );
    this.name = 'SpecGrammarError';
    this.entityType = entityType;
    this.issues = issues;
    this.diff = diff;
  }
}

/**
 * Error when data does not match an entity schema.
 * `errors` maps field paths to their messages.
 */
export class DataValidationError extends ValidationError {
  readonly entityType: string;
  readonly errors: Record<string, string[]>;

  constructor(entityType: string, errors: Record<string, string[]>) {
    super(`Invalid data for entity ${entityType}`, {
      details: { errors },
      code: 'DATA_VALIDATION_ERROR',
    });
    this.name = 'DataValidationError';
    this.entityType = entityType;
    this.errors = errors;
  }
}

/**
 * Error when an entity type was never registered.
 */
export class UnknownEntityError extends RuntimeError {
  readonly entityType: string;

  constructor(entityType: string) {
    super('UNKNOWN_ENTITY', `Unknown entity: ${entityType}`);
    this.name = 'UnknownEntityError';
    this.entityType = entityType;
  }
}

/**
 * Error when a reference targets an entity with no primary key field.
 */
export class MissingPrimaryKeyError extends RuntimeError {
  readonly entityType: string;

  constructor(entityType: string) {
    super('MISSING_PRIMARY_KEY', `Entity ${entityType} has no primary-key? field to reference`);
    this.name = 'MissingPrimaryKeyError';
    this.entityType = entityType;
  }
}

/**
 * Error when the scanner gets a root that is not a string or a symbol.
 */
export class UnsupportedScanInputError extends RuntimeError {
  readonly input: unknown;

  constructor(input: unknown) {
    super(
      'UNSUPPORTED_SCAN_INPUT',
      `Scan root must be a string or a symbol, got ${describeInput(input)}`
    );
    this.name = 'UnsupportedScanInputError';
    this.input = input;
  }
}

/**
 * Error when a graph reference points at a key with no node.
 */
export class MissingDependencyError extends RuntimeError {
  readonly key: string;
  readonly dependency: string;

  constructor(key: string, dependency: string) {
    super('MISSING_DEPENDENCY', `Component ${key} depends on missing component ${dependency}`);
    this.name = 'MissingDependencyError';
    this.key = key;
    this.dependency = dependency;
  }
}

/**
 * Error when graph references form a cycle.
 */
export class CircularDependencyError extends RuntimeError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super('CIRCULAR_DEPENDENCY', `Circular dependency detected: ${cycle.join(' -> ')}`);
    this.name = 'CircularDependencyError';
    this.cycle = cycle;
  }
}

/**
 * Error when a component's init hook fails.
 */
export class ComponentInitError extends RuntimeError {
  readonly key: string;

  constructor(key: string, cause: Error) {
    super('COMPONENT_INIT_ERROR', `Component ${key} failed to initialize: ${cause.message}`, {
      cause,
    });
    this.name = 'ComponentInitError';
    this.key = key;
  }
}

/**
 * Error when one or more halt hooks fail. Every hook still runs.
 */
export class ComponentHaltError extends RuntimeError {
  readonly failures: Array<{ key: string; error: Error }>;

  constructor(failures: Array<{ key: string; error: Error }>) {
    super(
      'COMPONENT_HALT_ERROR',
      `Failed to halt: ${failures.map((f) => `${f.key} (${f.error.message})`).join(', ')}`
    );
    this.name = 'ComponentHaltError';
    this.failures = failures;
  }
}

function describeInput(input: unknown): string {
  if (input === null) return 'null';
  if (Array.isArray(input)) return 'array';
  return typeof input;
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
