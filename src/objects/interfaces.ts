declare const objectIdBrand: unique symbol;

/** Packed (index, generation) handle into the object arena. */
export type ObjectId = number & { readonly [objectIdBrand]: true };

/**
 * Identifies the concrete kind of an object. Class constructors satisfy this,
 * as do plain tokens from `defineObjectType`. Compared by identity.
 */
export type TypeTag = Readonly<{ name: string }>;

export type WidgetState = {
  visible: boolean;
  enabled: boolean;
};

export type WidgetFlag = keyof WidgetState;

/** Runtime guard used to read type-erased dynamic properties back. */
export type PropertyType<T> = Readonly<{
  name: string;
  is(value: unknown): value is T;
}>;

export type PropertyOptions = {
  readOnly?: boolean;
};

export interface RegistryLogger {
  debug(message: string, ...details: unknown[]): void;
}

export interface RegistryConfig {
  initialCapacity?: number; // default 1024
  logger?: RegistryLogger;
}

export function defineObjectType<const N extends string>(name: N): Readonly<{ name: N }> {
  return Object.freeze({ name });
}
