// @armature/protocol
// Shared types for entity declarations and the component graph

export * from './types/index.js';

export {
  validateEntitySpec,
  validateField,
  validateFieldType,
  humanizeSpecIssues,
  isPlainRecord,
  type EntitySpecValidationResult,
  type EntitySpecIssue,
  type EntitySpecIssueCode,
} from './validation/entity-spec.js';
