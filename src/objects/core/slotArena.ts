// src/objects/core/slotArena.ts
import type { ObjectId } from "../interfaces.js";
import { MAX_GENERATION, MAX_INDEX, objectGeneration, objectIndex, packObjectId } from "./objectId.js";

const GROW = (n: number) => Math.max(2, n << 1);

/**
 * Generational slot arena. Live slots are kept densely packed (`_dense`) with a
 * sparse slot -> dense map; removal swap-pops the dense array, frees the slot and
 * bumps its generation so every id issued for the old occupant stops resolving.
 */
export class SlotArena<T> {
  private _dense: number[] = [];
  private _sparse: Int32Array;
  private _free: number[] = [];
  private _next = 0;
  private _values: (T | undefined)[] = [];

  // per-slot generation; bumped on every removal
  private _generation: Uint32Array;

  constructor(initialCapacity = 1024) {
    const cap = Math.max(1, initialCapacity | 0);
    this._sparse = new Int32Array(cap).fill(-1);
    this._generation = new Uint32Array(cap);
  }

  get capacity() {
    return this._sparse.length | 0;
  }
  get size() {
    return this._dense.length | 0;
  }

  private growToFit(index: number) {
    if (index < this._sparse.length) return;
    let newCap = this._sparse.length;
    while (newCap <= index) newCap = GROW(newCap);
    const newSparse = new Int32Array(newCap).fill(-1);
    newSparse.set(this._sparse);
    const newGeneration = new Uint32Array(newCap);
    newGeneration.set(this._generation);
    this._sparse = newSparse;
    this._generation = newGeneration;
  }

  insert(value: T): ObjectId {
    let index = this._free.pop();
    if (index === undefined) {
      if (this._next > MAX_INDEX) throw new RangeError("SlotArena exhausted");
      index = this._next++;
      this.growToFit(index);
    }
    this._sparse[index] = this._dense.length;
    this._dense.push(index);
    this._values[index] = value;
    return packObjectId(index, this._generation[index] ?? 0);
  }

  /** Dense index of a live id, or -1 for unknown/stale ids. */
  private denseIndexOf(id: ObjectId): number {
    const index = objectIndex(id);
    if (index >= this._sparse.length) return -1;
    const denseI = this._sparse[index] ?? -1;
    if (denseI < 0) return -1;
    return this._generation[index] === objectGeneration(id) ? denseI : -1;
  }

  contains(id: ObjectId): boolean {
    return this.denseIndexOf(id) >= 0;
  }

  get(id: ObjectId): T | undefined {
    return this.denseIndexOf(id) >= 0 ? this._values[objectIndex(id)] : undefined;
  }

  remove(id: ObjectId): boolean {
    const denseI = this.denseIndexOf(id);
    if (denseI < 0) return false;
    const index = objectIndex(id);

    const last = this._dense.pop();
    if (last !== undefined && last !== index) {
      this._dense[denseI] = last;
      this._sparse[last] = denseI;
    }
    this._sparse[index] = -1;
    this._values[index] = undefined;

    const nextGen = (this._generation[index] ?? 0) + 1;
    this._generation[index] = nextGen;
    // A slot at the last representable generation is retired instead of reused.
    if (nextGen <= MAX_GENERATION) this._free.push(index);
    return true;
  }

  generationOf(index: number): number {
    return this._generation[index] ?? 0;
  }

  /** Live ids in dense order (a snapshot). */
  ids(): ObjectId[] {
    const out: ObjectId[] = new Array(this._dense.length);
    for (let i = 0; i < this._dense.length; i++) {
      const index = this._dense[i] ?? 0;
      out[i] = packObjectId(index, this._generation[index] ?? 0);
    }
    return out;
  }

  /** Live entries in ascending slot order; stable across removals. */
  *slotEntries(): IterableIterator<[ObjectId, T]> {
    for (let index = 0; index < this._next; index++) {
      if ((this._sparse[index] ?? -1) < 0) continue;
      const value = this._values[index];
      if (value !== undefined) yield [packObjectId(index, this._generation[index] ?? 0), value];
    }
  }

  *entries(): IterableIterator<[ObjectId, T]> {
    for (const id of this.ids()) {
      const value = this._values[objectIndex(id)];
      if (value !== undefined) yield [id, value];
    }
  }
}
