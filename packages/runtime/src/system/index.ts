export { collectRefs, isPlainObject, resolveInitOrder } from './order.js';
export {
  haltSystem,
  initSystem,
  substituteRefs,
  type HaltSystemOptions,
  type InitSystemOptions,
  type System,
} from './lifecycle.js';
