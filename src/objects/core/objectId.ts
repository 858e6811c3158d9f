// src/objects/core/objectId.ts
//
// id = generation * 2^32 + index
// index: full u32 slot index; generation: 21 bits so the packed value stays a safe integer.

import type { ObjectId } from "../interfaces.js";

export const INDEX_LIMIT = 0x1_0000_0000; // 2^32
export const MAX_INDEX = INDEX_LIMIT - 1;
export const MAX_GENERATION = 0x1f_ffff; // 2^21 - 1

export function packObjectId(index: number, generation: number): ObjectId {
  if (!Number.isInteger(index) || index < 0 || index > MAX_INDEX)
    throw new RangeError(`Object index ${index} out of range`);
  if (!Number.isInteger(generation) || generation < 0 || generation > MAX_GENERATION)
    throw new RangeError(`Object generation ${generation} out of range`);
  return (generation * INDEX_LIMIT + index) as ObjectId;
}

export function objectIndex(id: ObjectId): number {
  return id % INDEX_LIMIT;
}

export function objectGeneration(id: ObjectId): number {
  return Math.floor(id / INDEX_LIMIT);
}

/** 64-bit interop value: (generation << 32) | index. */
export function toRawObjectId(id: ObjectId): bigint {
  return (BigInt(objectGeneration(id)) << 32n) | BigInt(objectIndex(id));
}

/**
 * Inverse of toRawObjectId. The result is only a candidate handle: it resolves
 * only if the arena still holds that slot at that generation.
 */
export function fromRawObjectId(raw: bigint): ObjectId {
  if (raw < 0n || raw > 0xffff_ffff_ffff_ffffn)
    throw new RangeError(`Raw object id ${raw} is not a u64`);
  const index = Number(raw & 0xffff_ffffn);
  const generation = Number(raw >> 32n);
  return packObjectId(index, generation);
}

export function formatObjectId(id: ObjectId): string {
  return `${objectIndex(id)}v${objectGeneration(id)}`;
}

