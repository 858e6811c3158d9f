// src/objects/properties.ts
import type { PropertyOptions, PropertyType } from "./interfaces.js";
import { ObjectError } from "./errors.js";

type Entry = { value: unknown; readOnly: boolean };

export type PropertyLookup<T> =
  | { found: true; value: T }
  | { found: false; reason: "missing" }
  | { found: false; reason: "mismatch"; got: string };

/** Human-readable name of a runtime value's type, for mismatch reports. */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  const ctor: unknown = Reflect.get(value, "constructor");
  return typeof ctor === "function" && ctor.name ? ctor.name : "object";
}

export const PropertyTypes = {
  string: {
    name: "string",
    is: (v: unknown): v is string => typeof v === "string",
  } satisfies PropertyType<string>,
  number: {
    name: "number",
    is: (v: unknown): v is number => typeof v === "number",
  } satisfies PropertyType<number>,
  boolean: {
    name: "boolean",
    is: (v: unknown): v is boolean => typeof v === "boolean",
  } satisfies PropertyType<boolean>,
  bigint: {
    name: "bigint",
    is: (v: unknown): v is bigint => typeof v === "bigint",
  } satisfies PropertyType<bigint>,
  instanceOf<T>(ctor: abstract new (...args: never[]) => T): PropertyType<T> {
    return { name: ctor.name, is: (v: unknown): v is T => v instanceof ctor };
  },
} as const;

/** Insertion-ordered, type-erased attribute bag attached to one object. */
export class PropertyBag {
  private _entries = new Map<string, Entry>();

  get size() {
    return this._entries.size;
  }

  set(key: string, value: unknown, options: PropertyOptions = {}) {
    const prev = this._entries.get(key);
    if (prev?.readOnly) throw ObjectError.propertyReadOnly(key);
    this._entries.set(key, { value, readOnly: options.readOnly ?? false });
  }

  lookup<T>(key: string, type: PropertyType<T>): PropertyLookup<T> {
    const entry = this._entries.get(key);
    if (!entry) return { found: false, reason: "missing" };
    const value = entry.value;
    if (!type.is(value)) return { found: false, reason: "mismatch", got: describeValue(value) };
    return { found: true, value };
  }

  get<T>(key: string, type: PropertyType<T>): T | undefined {
    const hit = this.lookup(key, type);
    return hit.found ? hit.value : undefined;
  }

  require<T>(key: string, type: PropertyType<T>): T {
    const hit = this.lookup(key, type);
    if (hit.found) return hit.value;
    if (hit.reason === "missing") throw ObjectError.propertyNotFound(key);
    throw ObjectError.propertyTypeMismatch(key, type.name, hit.got);
  }

  isReadOnly(key: string): boolean {
    return this._entries.get(key)?.readOnly ?? false;
  }

  remove(key: string): unknown {
    const entry = this._entries.get(key);
    if (!entry) return undefined;
    if (entry.readOnly) throw ObjectError.propertyReadOnly(key);
    this._entries.delete(key);
    return entry.value;
  }

  names(): string[] {
    return Array.from(this._entries.keys());
  }
}
