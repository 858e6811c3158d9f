// src/objects/tree/traversal.ts
//
// Snapshot traversals. Every order is materialized eagerly so callers can mutate
// the tree while iterating the result.

import type { ObjectId } from "../interfaces.js";
import { formatObjectId } from "../core/objectId.js";
import { linkedRecord, recordOf, type ObjectArena } from "./tree.js";

export type WalkVisitor = (id: ObjectId, depth: number, leaving: boolean) => void;

/**
 * Iterative depth-first walk over the sibling links below `root`.
 * Each node is reported once on the way down and once on the way up.
 */
export function walkSubtree(arena: ObjectArena, root: ObjectId, visit: WalkVisitor) {
  recordOf(arena, root);

  const stack: ObjectId[] = [root];
  let isPopping = false;
  const maxSteps = arena.size * 2 + 16;

  for (let steps = 0; stack.length > 0 && steps <= maxSteps; steps++) {
    const top = stack.length - 1;
    const e = stack[top];
    if (e === undefined) break;
    const rec = linkedRecord(arena, e);

    if (!isPopping) {
      visit(e, top, false);
      if (rec.firstChild !== null) {
        stack.push(rec.firstChild);
        continue;
      }
      isPopping = true;
      continue;
    }

    visit(e, top, true);
    // the traversal root's own siblings are outside the subtree
    if (top > 0 && rec.nextSibling !== null) {
      stack[top] = rec.nextSibling;
      isPopping = false;
      continue;
    }
    stack.pop();
  }
}

export function depthFirstPreorder(arena: ObjectArena, root: ObjectId): ObjectId[] {
  const out: ObjectId[] = [];
  walkSubtree(arena, root, (id, _depth, leaving) => {
    if (!leaving) out.push(id);
  });
  return out;
}

export function depthFirstPostorder(arena: ObjectArena, root: ObjectId): ObjectId[] {
  const out: ObjectId[] = [];
  walkSubtree(arena, root, (id, _depth, leaving) => {
    if (leaving) out.push(id);
  });
  return out;
}

export function breadthFirst(arena: ObjectArena, root: ObjectId): ObjectId[] {
  recordOf(arena, root);
  const out: ObjectId[] = [root];
  for (let head = 0; head < out.length; head++) {
    const id = out[head];
    if (id === undefined) break;
    let child = linkedRecord(arena, id).firstChild;
    while (child !== null) {
      out.push(child);
      child = linkedRecord(arena, child).nextSibling;
    }
  }
  return out;
}

/** Every descendant (not `root` itself) whose name matches exactly, in pre-order. */
export function findDescendantsByName(arena: ObjectArena, root: ObjectId, name: string): ObjectId[] {
  const out: ObjectId[] = [];
  walkSubtree(arena, root, (id, depth, leaving) => {
    if (leaving || depth === 0) return;
    if (linkedRecord(arena, id).name === name) out.push(id);
  });
  return out;
}

export function dumpTree(arena: ObjectArena, root: ObjectId): string {
  let out = "";
  walkSubtree(arena, root, (id, depth, leaving) => {
    if (leaving) return;
    const rec = linkedRecord(arena, id);
    const label = rec.name === "" ? "(unnamed)" : rec.name;
    out += `${"  ".repeat(depth)}[${formatObjectId(id)}] ${label} (${rec.type.name})\n`;
  });
  return out;
}
