// src/objects/errors.ts

export type ObjectErrorKind =
  | "InvalidObjectId"
  | "CircularParentage"
  | "PropertyNotFound"
  | "PropertyTypeMismatch"
  | "PropertyReadOnly"
  | "RegistryNotInitialized";

const MESSAGES: Record<ObjectErrorKind, string> = {
  InvalidObjectId: "Invalid or destroyed object ID",
  CircularParentage: "Cannot set an object as its own parent or ancestor",
  PropertyNotFound: "Property not found",
  PropertyTypeMismatch: "Property type mismatch",
  PropertyReadOnly: "Property is read-only",
  RegistryNotInitialized: "Object registry not initialized",
};

/** Every failure the registry reports. Flat: branch on `kind`. */
export class ObjectError extends Error {
  readonly kind: ObjectErrorKind;
  /** Only set for PropertyTypeMismatch. */
  readonly expected?: string;
  readonly got?: string;

  constructor(
    kind: ObjectErrorKind,
    detail?: string,
    mismatch?: { expected: string; got: string }
  ) {
    const base = mismatch
      ? `${MESSAGES[kind]}: expected ${mismatch.expected}, got ${mismatch.got}`
      : MESSAGES[kind];
    super(detail ? `${base} (${detail})` : base);
    this.name = "ObjectError";
    this.kind = kind;
    if (mismatch) {
      this.expected = mismatch.expected;
      this.got = mismatch.got;
    }
  }

  static invalidId(detail?: string) {
    return new ObjectError("InvalidObjectId", detail);
  }
  static circularParentage(detail?: string) {
    return new ObjectError("CircularParentage", detail);
  }
  static propertyNotFound(key: string) {
    return new ObjectError("PropertyNotFound", `'${key}'`);
  }
  static propertyTypeMismatch(key: string, expected: string, got: string) {
    return new ObjectError("PropertyTypeMismatch", `'${key}'`, { expected, got });
  }
  static propertyReadOnly(key: string) {
    return new ObjectError("PropertyReadOnly", `'${key}'`);
  }
  static notInitialized() {
    return new ObjectError("RegistryNotInitialized");
  }
}

export function isObjectError(value: unknown, kind?: ObjectErrorKind): value is ObjectError {
  return value instanceof ObjectError && (kind === undefined || value.kind === kind);
}

/** Thrown when a lock is re-acquired in a way that would deadlock. */
export class LockRecursionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LockRecursionError";
  }
}

/** A programming error (e.g. using objects before the registry exists). Not meant to be caught. */
export class PreconditionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PreconditionError";
  }
}
