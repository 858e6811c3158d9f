// src/index.ts
export type {
  ObjectId,
  TypeTag,
  WidgetState,
  WidgetFlag,
  PropertyType,
  PropertyOptions,
  RegistryConfig,
  RegistryLogger,
} from "./objects/interfaces.js";
export { defineObjectType } from "./objects/interfaces.js";
export {
  ObjectError,
  isObjectError,
  LockRecursionError,
  PreconditionError,
  type ObjectErrorKind,
} from "./objects/errors.js";
export {
  packObjectId,
  objectIndex,
  objectGeneration,
  toRawObjectId,
  fromRawObjectId,
  formatObjectId,
  MAX_GENERATION,
} from "./objects/core/objectId.js";
export { SlotArena } from "./objects/core/slotArena.js";
export { ObjectRegistry, type ReadonlyObjectRegistry } from "./objects/core/registry.js";
export { PropertyTypes, describeValue } from "./objects/properties.js";
export { RwLock } from "./objects/shared/rwLock.js";
export { SharedObjectRegistry } from "./objects/shared/sharedRegistry.js";
export { RegistryContext } from "./objects/context.js";
export { ObjectBase, WidgetHandle, withObject } from "./objects/objectBase.js";
