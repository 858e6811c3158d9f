// src/objects/tree/widgetState.ts
import type { ObjectId, WidgetFlag } from "../interfaces.js";
import { linkedRecord, recordOf, type ObjectArena } from "./tree.js";

/**
 * Combine a node's own flag with every ancestor that carries widget state.
 * Ancestors without widget state are transparent. Walks up to (not including)
 * `stopAt`, or to the root when `stopAt` is null.
 *
 * Returns undefined when the node itself has no widget state.
 */
export function effectiveFlag(
  arena: ObjectArena,
  id: ObjectId,
  flag: WidgetFlag,
  stopAt: ObjectId | null = null
): boolean | undefined {
  const rec = recordOf(arena, id);
  if (!rec.widget) return undefined;
  if (!rec.widget[flag]) return false;

  let cur = rec.parent;
  for (let hops = 0; cur !== null && cur !== stopAt && hops <= arena.size; hops++) {
    const anc = linkedRecord(arena, cur);
    if (anc.widget && !anc.widget[flag]) return false;
    cur = anc.parent;
  }
  return true;
}
