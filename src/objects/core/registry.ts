// src/objects/core/registry.ts
import type {
  ObjectId,
  PropertyOptions,
  PropertyType,
  RegistryConfig,
  RegistryLogger,
  TypeTag,
  WidgetFlag,
  WidgetState,
} from "../interfaces.js";
import { ObjectError } from "../errors.js";
import { SlotArena } from "./slotArena.js";
import { formatObjectId } from "./objectId.js";
import {
  appendChildAtEnd,
  childIds,
  createRecord,
  detachFromParent,
  insertAfter,
  insertBefore,
  isAncestor,
  linkedRecord,
  recordOf,
  type ObjectArena,
  type ObjectRecord,
} from "../tree/tree.js";
import {
  breadthFirst,
  depthFirstPostorder,
  depthFirstPreorder,
  dumpTree,
  findDescendantsByName,
} from "../tree/traversal.js";
import { effectiveFlag } from "../tree/widgetState.js";

/** Queries only; what a caller holding the read lock may use. */
export type ReadonlyObjectRegistry = Pick<
  ObjectRegistry,
  | "contains"
  | "objectCount"
  | "epoch"
  | "parent"
  | "children"
  | "childCount"
  | "siblings"
  | "siblingIndex"
  | "nextSibling"
  | "previousSibling"
  | "ancestors"
  | "depth"
  | "isAncestorOf"
  | "depthFirstPreorder"
  | "depthFirstPostorder"
  | "breadthFirst"
  | "rootObjects"
  | "objectName"
  | "findChildByName"
  | "findChild"
  | "findChildrenByType"
  | "findDescendantsByName"
  | "typeId"
  | "typeName"
  | "dynamicProperty"
  | "requireDynamicProperty"
  | "dynamicPropertyNames"
  | "widgetState"
  | "isEffectivelyVisible"
  | "isEffectivelyEnabled"
  | "isVisibleTo"
  | "dumpObjectTree"
>;

/**
 * Owns every object record. Callers hold ids only; all mutation goes through
 * here. Failures throw ObjectError and leave the registry untouched.
 */
export class ObjectRegistry {
  private readonly arena: ObjectArena;
  private readonly logger: RegistryLogger | undefined;
  private _epoch = 0;

  constructor(cfg: RegistryConfig = {}) {
    this.arena = new SlotArena(cfg.initialCapacity ?? 1024);
    this.logger = cfg.logger;
  }

  /** Bumped by every successful mutation. */
  get epoch(): number { return this._epoch; }

  private bump() {
    this._epoch++;
  }

  private parentRecordOf(id: ObjectId): ObjectRecord | null {
    const rec = recordOf(this.arena, id);
    return rec.parent === null ? null : linkedRecord(this.arena, rec.parent);
  }

  // ---------------------------------------------------------------------------
  // lifecycle
  // ---------------------------------------------------------------------------

  register(type: TypeTag): ObjectId {
    const id = this.arena.insert(createRecord(type));
    this.bump();
    this.logger?.debug("registered object", { id: formatObjectId(id), type: type.name });
    return id;
  }

  /**
   * Destroy `id` and its whole subtree. Returns the removed ids in post-order
   * (descendants first, `id` last).
   */
  destroy(id: ObjectId): ObjectId[] {
    const removed = depthFirstPostorder(this.arena, id);
    this.logger?.debug("destroying object tree", {
      id: formatObjectId(id),
      descendants: removed.length - 1,
    });

    detachFromParent(this.arena, id);
    for (const e of removed) this.arena.remove(e);
    this.bump();
    return removed;
  }

  contains(id: ObjectId): boolean {
    return this.arena.contains(id);
  }

  get objectCount(): number {
    return this.arena.size;
  }

  // ---------------------------------------------------------------------------
  // tree mutation
  // ---------------------------------------------------------------------------

  /** Reparent `id` to the front of `parent`'s children, or make it a root. */
  setParent(id: ObjectId, parent: ObjectId | null) {
    recordOf(this.arena, id);
    if (parent !== null) {
      recordOf(this.arena, parent);
      if (parent === id || isAncestor(this.arena, id, parent)) {
        throw ObjectError.circularParentage(
          `${formatObjectId(parent)} is ${formatObjectId(id)} or one of its descendants`
        );
      }
    }

    detachFromParent(this.arena, id);
    if (parent !== null) appendChildAtEnd(this.arena, parent, id);
    this.bump();
    this.logger?.debug("set parent", {
      id: formatObjectId(id),
      parent: parent === null ? null : formatObjectId(parent),
    });
  }

  /** Move to the front of the sibling stack. No-op for roots. */
  raise(id: ObjectId) {
    const rec = recordOf(this.arena, id);
    if (rec.parent === null) return;
    const parent = rec.parent;
    detachFromParent(this.arena, id);
    appendChildAtEnd(this.arena, parent, id);
    this.bump();
  }

  /** Move to the back of the sibling stack. No-op for roots. */
  lower(id: ObjectId) {
    const rec = recordOf(this.arena, id);
    if (rec.parent === null) return;
    const parent = rec.parent;
    detachFromParent(this.arena, id);
    const head = linkedRecord(this.arena, parent).firstChild;
    if (head === null) appendChildAtEnd(this.arena, parent, id);
    else insertBefore(this.arena, head, id);
    this.bump();
  }

  stackUnder(id: ObjectId, sibling: ObjectId) {
    if (!this.checkSiblings(id, sibling)) return;
    detachFromParent(this.arena, id);
    insertBefore(this.arena, sibling, id);
    this.bump();
  }

  stackAbove(id: ObjectId, sibling: ObjectId) {
    if (!this.checkSiblings(id, sibling)) return;
    detachFromParent(this.arena, id);
    insertAfter(this.arena, sibling, id);
    this.bump();
  }

  /** Throws unless both share a parent; false means there is nothing to move. */
  private checkSiblings(id: ObjectId, sibling: ObjectId): boolean {
    const rec = recordOf(this.arena, id);
    const other = recordOf(this.arena, sibling);
    if (rec.parent === null || rec.parent !== other.parent) {
      throw ObjectError.invalidId(
        `${formatObjectId(id)} and ${formatObjectId(sibling)} are not siblings`
      );
    }
    return id !== sibling;
  }

  // ---------------------------------------------------------------------------
  // tree queries
  // ---------------------------------------------------------------------------

  parent(id: ObjectId): ObjectId | null {
    return recordOf(this.arena, id).parent;
  }

  children(id: ObjectId): ObjectId[] {
    recordOf(this.arena, id);
    return childIds(this.arena, id);
  }

  childCount(id: ObjectId): number {
    return recordOf(this.arena, id).childCount;
  }

  /** The parent's other children, back to front. Empty for roots. */
  siblings(id: ObjectId): ObjectId[] {
    const rec = recordOf(this.arena, id);
    if (rec.parent === null) return [];
    return childIds(this.arena, rec.parent).filter((c) => c !== id);
  }

  siblingIndex(id: ObjectId): number | null {
    const parent = this.parentRecordOf(id);
    if (!parent) return null;
    let i = 0;
    for (let cur = parent.firstChild; cur !== null; cur = linkedRecord(this.arena, cur).nextSibling) {
      if (cur === id) return i;
      i++;
    }
    return null;
  }

  /** Next sibling towards the front, if any. */
  nextSibling(id: ObjectId): ObjectId | null {
    return recordOf(this.arena, id).nextSibling;
  }

  /** Previous sibling towards the back, if any. */
  previousSibling(id: ObjectId): ObjectId | null {
    return recordOf(this.arena, id).prevSibling;
  }

  /** Parent first, root last. */
  ancestors(id: ObjectId): ObjectId[] {
    const out: ObjectId[] = [];
    let cur = recordOf(this.arena, id).parent;
    while (cur !== null) {
      out.push(cur);
      cur = linkedRecord(this.arena, cur).parent;
    }
    return out;
  }

  depth(id: ObjectId): number {
    return this.ancestors(id).length;
  }

  /** True if `candidate` is a proper ancestor of `id`. */
  isAncestorOf(candidate: ObjectId, id: ObjectId): boolean {
    recordOf(this.arena, id);
    return isAncestor(this.arena, candidate, id);
  }

  depthFirstPreorder(root: ObjectId): ObjectId[] {
    return depthFirstPreorder(this.arena, root);
  }

  depthFirstPostorder(root: ObjectId): ObjectId[] {
    return depthFirstPostorder(this.arena, root);
  }

  breadthFirst(root: ObjectId): ObjectId[] {
    return breadthFirst(this.arena, root);
  }

  /** Parentless objects in ascending slot order. */
  rootObjects(): ObjectId[] {
    const out: ObjectId[] = [];
    for (const [id, rec] of this.arena.slotEntries()) {
      if (rec.parent === null) out.push(id);
    }
    return out;
  }

  // ---------------------------------------------------------------------------
  // naming / lookup
  // ---------------------------------------------------------------------------

  objectName(id: ObjectId): string {
    return recordOf(this.arena, id).name;
  }

  setObjectName(id: ObjectId, name: string) {
    recordOf(this.arena, id).name = name;
    this.bump();
  }

  findChildByName(id: ObjectId, name: string): ObjectId | undefined {
    return this.children(id).find((c) => linkedRecord(this.arena, c).name === name);
  }

  findChild(id: ObjectId, name: string, type: TypeTag): ObjectId | undefined {
    return this.children(id).find((c) => {
      const rec = linkedRecord(this.arena, c);
      return rec.name === name && rec.type === type;
    });
  }

  findChildrenByType(id: ObjectId, type: TypeTag): ObjectId[] {
    return this.children(id).filter((c) => linkedRecord(this.arena, c).type === type);
  }

  findDescendantsByName(id: ObjectId, name: string): ObjectId[] {
    return findDescendantsByName(this.arena, id, name);
  }

  typeId(id: ObjectId): TypeTag {
    return recordOf(this.arena, id).type;
  }

  typeName(id: ObjectId): string {
    return recordOf(this.arena, id).type.name;
  }

  // ---------------------------------------------------------------------------
  // dynamic properties
  // ---------------------------------------------------------------------------

  setDynamicProperty(id: ObjectId, key: string, value: unknown, options?: PropertyOptions) {
    recordOf(this.arena, id).properties.set(key, value, options);
    this.bump();
  }

  /** undefined when the key is absent or holds a value of another type. */
  dynamicProperty<T>(id: ObjectId, key: string, type: PropertyType<T>): T | undefined {
    return recordOf(this.arena, id).properties.get(key, type);
  }

  /** Like dynamicProperty, but reports PropertyNotFound / PropertyTypeMismatch. */
  requireDynamicProperty<T>(id: ObjectId, key: string, type: PropertyType<T>): T {
    return recordOf(this.arena, id).properties.require(key, type);
  }

  removeDynamicProperty(id: ObjectId, key: string): unknown {
    const props = recordOf(this.arena, id).properties;
    const removed = props.remove(key);
    if (removed !== undefined) this.bump();
    return removed;
  }

  dynamicPropertyNames(id: ObjectId): string[] {
    return recordOf(this.arena, id).properties.names();
  }

  // ---------------------------------------------------------------------------
  // widget state
  // ---------------------------------------------------------------------------

  initWidgetState(id: ObjectId, state: WidgetState) {
    recordOf(this.arena, id).widget = { visible: state.visible, enabled: state.enabled };
    this.bump();
  }

  setWidgetVisible(id: ObjectId, visible: boolean) {
    this.setWidgetFlag(id, "visible", visible);
  }

  setWidgetEnabled(id: ObjectId, enabled: boolean) {
    this.setWidgetFlag(id, "enabled", enabled);
  }

  private setWidgetFlag(id: ObjectId, flag: WidgetFlag, value: boolean) {
    const rec = recordOf(this.arena, id);
    rec.widget ??= { visible: true, enabled: true };
    rec.widget[flag] = value;
    this.bump();
  }

  /** Drop the own state; the node becomes transparent to propagation. */
  clearWidgetState(id: ObjectId) {
    recordOf(this.arena, id).widget = null;
    this.bump();
  }

  widgetState(id: ObjectId): WidgetState | undefined {
    const w = recordOf(this.arena, id).widget;
    return w ? { visible: w.visible, enabled: w.enabled } : undefined;
  }

  isEffectivelyVisible(id: ObjectId): boolean | undefined {
    return effectiveFlag(this.arena, id, "visible");
  }

  isEffectivelyEnabled(id: ObjectId): boolean | undefined {
    return effectiveFlag(this.arena, id, "enabled");
  }

  /** Visibility considering ancestors below `ancestor` only (all of them when null). */
  isVisibleTo(id: ObjectId, ancestor: ObjectId | null): boolean | undefined {
    if (ancestor !== null) recordOf(this.arena, ancestor);
    return effectiveFlag(this.arena, id, "visible", ancestor);
  }

  // ---------------------------------------------------------------------------
  // diagnostics
  // ---------------------------------------------------------------------------

  dumpObjectTree(id: ObjectId): string {
    return dumpTree(this.arena, id);
  }
}
