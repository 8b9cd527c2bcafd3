// Entity declarations: parsing, registry and lifecycle hooks

export {
  parseEntitySpec,
  normalizeSpec,
  prepareSpec,
  toEntityRef,
  isOptionalRef,
} from './parser.js';

export {
  EntityRegistry,
  createEntityRegistry,
  fieldSchema,
  primaryKeyField,
  type EntityLike,
  type FieldEntry,
  type RegisteredEntitySpec,
  type ValidateOptions,
} from './registry.js';

export { Entity, createEntity } from './entity.js';

export {
  prepEntity,
  initEntity,
  defineEntity,
  entityKey,
  isEntityKey,
  type EntityNodeInputs,
} from './lifecycle.js';

export { primitiveSchema, issuesByField } from './schema.js';
