// src/objects/tree/tree.ts
import type { ObjectId, TypeTag, WidgetState } from "../interfaces.js";
import { SlotArena } from "../core/slotArena.js";
import { formatObjectId } from "../core/objectId.js";
import { ObjectError } from "../errors.js";
import { PropertyBag } from "../properties.js";

/** Per-object record owned by the registry; callers only ever see ids. */
export interface ObjectRecord {
  name: string;
  readonly type: TypeTag;
  parent: ObjectId | null;      // null if root
  firstChild: ObjectId | null;  // back-most child
  lastChild: ObjectId | null;   // front-most child (O(1) append)
  nextSibling: ObjectId | null; // towards the front
  prevSibling: ObjectId | null; // towards the back (O(1) unlink)
  childCount: number;
  readonly properties: PropertyBag;
  widget: WidgetState | null;
}

export type ObjectArena = SlotArena<ObjectRecord>;

export function createRecord(type: TypeTag): ObjectRecord {
  return {
    name: "",
    type,
    parent: null,
    firstChild: null,
    lastChild: null,
    nextSibling: null,
    prevSibling: null,
    childCount: 0,
    properties: new PropertyBag(),
    widget: null,
  };
}

/** Resolve a caller-supplied id or fail with InvalidObjectId. */
export function recordOf(arena: ObjectArena, id: ObjectId): ObjectRecord {
  const rec = arena.get(id);
  if (!rec) throw ObjectError.invalidId(formatObjectId(id));
  return rec;
}

/** Resolve an id read from a link field; those always point at live records. */
export function linkedRecord(arena: ObjectArena, id: ObjectId): ObjectRecord {
  const rec = arena.get(id);
  if (!rec) throw new Error(`Dangling object link ${formatObjectId(id)}`);
  return rec;
}

/** True if `maybeAncestor` is a proper ancestor of `node`. */
export function isAncestor(arena: ObjectArena, maybeAncestor: ObjectId, node: ObjectId): boolean {
  if (maybeAncestor === node) return false;
  let cur = arena.get(node)?.parent ?? null;
  for (let hops = 0; cur !== null && hops <= arena.size; hops++) {
    if (cur === maybeAncestor) return true;
    cur = linkedRecord(arena, cur).parent;
  }
  return false;
}

export function detachFromParent(arena: ObjectArena, id: ObjectId) {
  const rec = arena.get(id);
  if (!rec || rec.parent === null) return;
  const parent = linkedRecord(arena, rec.parent);

  const prev = rec.prevSibling;
  const next = rec.nextSibling;

  if (prev === null) parent.firstChild = next;
  else linkedRecord(arena, prev).nextSibling = next;

  if (next === null) parent.lastChild = prev;
  else linkedRecord(arena, next).prevSibling = prev;

  parent.childCount--;
  rec.parent = null;
  rec.prevSibling = null;
  rec.nextSibling = null;
}

export function appendChildAtEnd(arena: ObjectArena, parentId: ObjectId, childId: ObjectId) {
  const parent = linkedRecord(arena, parentId);
  const child = linkedRecord(arena, childId);

  const tail = parent.lastChild;
  if (tail === null) {
    parent.firstChild = childId;
  } else {
    linkedRecord(arena, tail).nextSibling = childId;
  }
  child.prevSibling = tail;
  child.nextSibling = null;
  parent.lastChild = childId;
  child.parent = parentId;
  parent.childCount++;
}

/** Link a detached `childId` directly behind `siblingId` (same parent). */
export function insertBefore(arena: ObjectArena, siblingId: ObjectId, childId: ObjectId) {
  const sibling = linkedRecord(arena, siblingId);
  const child = linkedRecord(arena, childId);
  if (sibling.parent === null) throw new Error("insertBefore: sibling has no parent");
  const parent = linkedRecord(arena, sibling.parent);

  const prev = sibling.prevSibling;
  if (prev === null) parent.firstChild = childId;
  else linkedRecord(arena, prev).nextSibling = childId;

  child.prevSibling = prev;
  child.nextSibling = siblingId;
  sibling.prevSibling = childId;
  child.parent = sibling.parent;
  parent.childCount++;
}

/** Link a detached `childId` directly in front of `siblingId` (same parent). */
export function insertAfter(arena: ObjectArena, siblingId: ObjectId, childId: ObjectId) {
  const sibling = linkedRecord(arena, siblingId);
  if (sibling.nextSibling !== null) {
    insertBefore(arena, sibling.nextSibling, childId);
    return;
  }
  if (sibling.parent === null) throw new Error("insertAfter: sibling has no parent");
  appendChildAtEnd(arena, sibling.parent, childId);
}

/** Children in z-order (back to front). */
export function childIds(arena: ObjectArena, id: ObjectId): ObjectId[] {
  const out: ObjectId[] = [];
  let cur = linkedRecord(arena, id).firstChild;
  while (cur !== null) {
    out.push(cur);
    cur = linkedRecord(arena, cur).nextSibling;
  }
  return out;
}
