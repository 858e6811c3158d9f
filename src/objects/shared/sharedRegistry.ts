// src/objects/shared/sharedRegistry.ts
import type {
  ObjectId,
  PropertyOptions,
  PropertyType,
  RegistryConfig,
  TypeTag,
  WidgetState,
} from "../interfaces.js";
import { ObjectRegistry, type ReadonlyObjectRegistry } from "../core/registry.js";
import { RwLock } from "./rwLock.js";

/**
 * Lock-guarded façade over one ObjectRegistry. Mutations take the write lock,
 * queries the read lock. Use withRead/withWrite for multi-step logic that must
 * not interleave with other callers.
 */
export class SharedObjectRegistry {
  private readonly lock: RwLock<ObjectRegistry>;

  constructor(cfg: RegistryConfig = {}) {
    this.lock = new RwLock(new ObjectRegistry(cfg));
  }

  /** `fn` sees queries only; mutations need withWrite. */
  withRead<R>(fn: (registry: ReadonlyObjectRegistry) => R): R {
    return this.lock.read(fn);
  }

  withWrite<R>(fn: (registry: ObjectRegistry) => R): R {
    return this.lock.write(fn);
  }

  // lifecycle
  register(type: TypeTag): ObjectId { return this.lock.write((r) => r.register(type)); }
  destroy(id: ObjectId): ObjectId[] { return this.lock.write((r) => r.destroy(id)); }
  contains(id: ObjectId): boolean { return this.lock.read((r) => r.contains(id)); }
  get objectCount(): number { return this.lock.read((r) => r.objectCount); }
  get epoch(): number { return this.lock.read((r) => r.epoch); }

  // tree mutation
  setParent(id: ObjectId, parent: ObjectId | null) { this.lock.write((r) => r.setParent(id, parent)); }
  raise(id: ObjectId) { this.lock.write((r) => r.raise(id)); }
  lower(id: ObjectId) { this.lock.write((r) => r.lower(id)); }
  stackUnder(id: ObjectId, sibling: ObjectId) { this.lock.write((r) => r.stackUnder(id, sibling)); }
  stackAbove(id: ObjectId, sibling: ObjectId) { this.lock.write((r) => r.stackAbove(id, sibling)); }

  // tree queries
  parent(id: ObjectId): ObjectId | null { return this.lock.read((r) => r.parent(id)); }
  children(id: ObjectId): ObjectId[] { return this.lock.read((r) => r.children(id)); }
  childCount(id: ObjectId): number { return this.lock.read((r) => r.childCount(id)); }
  siblings(id: ObjectId): ObjectId[] { return this.lock.read((r) => r.siblings(id)); }
  siblingIndex(id: ObjectId): number | null { return this.lock.read((r) => r.siblingIndex(id)); }
  nextSibling(id: ObjectId): ObjectId | null { return this.lock.read((r) => r.nextSibling(id)); }
  previousSibling(id: ObjectId): ObjectId | null { return this.lock.read((r) => r.previousSibling(id)); }
  ancestors(id: ObjectId): ObjectId[] { return this.lock.read((r) => r.ancestors(id)); }
  depth(id: ObjectId): number { return this.lock.read((r) => r.depth(id)); }
  isAncestorOf(candidate: ObjectId, id: ObjectId): boolean {
    return this.lock.read((r) => r.isAncestorOf(candidate, id));
  }
  depthFirstPreorder(root: ObjectId): ObjectId[] { return this.lock.read((r) => r.depthFirstPreorder(root)); }
  depthFirstPostorder(root: ObjectId): ObjectId[] { return this.lock.read((r) => r.depthFirstPostorder(root)); }
  breadthFirst(root: ObjectId): ObjectId[] { return this.lock.read((r) => r.breadthFirst(root)); }
  rootObjects(): ObjectId[] { return this.lock.read((r) => r.rootObjects()); }

  // naming / lookup
  objectName(id: ObjectId): string { return this.lock.read((r) => r.objectName(id)); }
  setObjectName(id: ObjectId, name: string) { this.lock.write((r) => r.setObjectName(id, name)); }
  findChildByName(id: ObjectId, name: string): ObjectId | undefined {
    return this.lock.read((r) => r.findChildByName(id, name));
  }
  findChild(id: ObjectId, name: string, type: TypeTag): ObjectId | undefined {
    return this.lock.read((r) => r.findChild(id, name, type));
  }
  findChildrenByType(id: ObjectId, type: TypeTag): ObjectId[] {
    return this.lock.read((r) => r.findChildrenByType(id, type));
  }
  findDescendantsByName(id: ObjectId, name: string): ObjectId[] {
    return this.lock.read((r) => r.findDescendantsByName(id, name));
  }
  typeId(id: ObjectId): TypeTag { return this.lock.read((r) => r.typeId(id)); }
  typeName(id: ObjectId): string { return this.lock.read((r) => r.typeName(id)); }

  // dynamic properties
  setDynamicProperty(id: ObjectId, key: string, value: unknown, options?: PropertyOptions) {
    this.lock.write((r) => r.setDynamicProperty(id, key, value, options));
  }
  dynamicProperty<T>(id: ObjectId, key: string, type: PropertyType<T>): T | undefined {
    return this.lock.read((r) => r.dynamicProperty(id, key, type));
  }
  requireDynamicProperty<T>(id: ObjectId, key: string, type: PropertyType<T>): T {
    return this.lock.read((r) => r.requireDynamicProperty(id, key, type));
  }
  removeDynamicProperty(id: ObjectId, key: string): unknown {
    return this.lock.write((r) => r.removeDynamicProperty(id, key));
  }
  dynamicPropertyNames(id: ObjectId): string[] { return this.lock.read((r) => r.dynamicPropertyNames(id)); }

  // widget state
  initWidgetState(id: ObjectId, state: WidgetState) { this.lock.write((r) => r.initWidgetState(id, state)); }
  setWidgetVisible(id: ObjectId, visible: boolean) { this.lock.write((r) => r.setWidgetVisible(id, visible)); }
  setWidgetEnabled(id: ObjectId, enabled: boolean) { this.lock.write((r) => r.setWidgetEnabled(id, enabled)); }
  clearWidgetState(id: ObjectId) { this.lock.write((r) => r.clearWidgetState(id)); }
  widgetState(id: ObjectId): WidgetState | undefined { return this.lock.read((r) => r.widgetState(id)); }
  isEffectivelyVisible(id: ObjectId): boolean | undefined {
    return this.lock.read((r) => r.isEffectivelyVisible(id));
  }
  isEffectivelyEnabled(id: ObjectId): boolean | undefined {
    return this.lock.read((r) => r.isEffectivelyEnabled(id));
  }
  isVisibleTo(id: ObjectId, ancestor: ObjectId | null): boolean | undefined {
    return this.lock.read((r) => r.isVisibleTo(id, ancestor));
  }

  // diagnostics
  dumpObjectTree(id: ObjectId): string { return this.lock.read((r) => r.dumpObjectTree(id)); }
}
