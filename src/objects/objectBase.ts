// src/objects/objectBase.ts
import type { ObjectId, PropertyOptions, PropertyType, TypeTag, WidgetState } from "./interfaces.js";
import { isObjectError, PreconditionError } from "./errors.js";
import type { RegistryContext } from "./context.js";
import type { SharedObjectRegistry } from "./shared/sharedRegistry.js";
import { formatObjectId } from "./core/objectId.js";

function expectRegistry(context: RegistryContext): SharedObjectRegistry {
  try {
    return context.registry();
  } catch (err) {
    throw new PreconditionError("Object registry not initialized; call RegistryContext.init() first", {
      cause: err,
    });
  }
}

/**
 * Registers one object on construction and destroys it (with its subtree) on
 * dispose(). Accessors are best-effort: registry failures turn into defaults.
 */
export class ObjectBase {
  readonly id: ObjectId;
  protected readonly context: RegistryContext;
  private _disposed = false;

  /** `type` defaults to the constructed class. */
  constructor(context: RegistryContext, type?: TypeTag) {
    this.context = context;
    this.id = expectRegistry(context).register(type ?? new.target);
  }

  /** Register a plain object tagged `type`. Throws PreconditionError before init(). */
  static create(context: RegistryContext, type: TypeTag): ObjectBase {
    return new ObjectBase(context, type);
  }

  protected get registry(): SharedObjectRegistry {
    return this.context.registry();
  }

  /** Run `fn`, mapping ObjectError to `fallback`. Other errors propagate. */
  protected bestEffort<R>(fallback: R, fn: (registry: SharedObjectRegistry) => R): R {
    try {
      return fn(this.registry);
    } catch (err) {
      if (!isObjectError(err)) throw err;
      this.context.logger?.debug("object helper fell back to default", {
        id: formatObjectId(this.id),
        kind: err.kind,
      });
      return fallback;
    }
  }

  get isAlive(): boolean {
    return this.bestEffort(false, (r) => r.contains(this.id));
  }

  get isDisposed(): boolean {
    return this._disposed;
  }

  name(): string {
    return this.bestEffort("", (r) => r.objectName(this.id));
  }

  setName(name: string) {
    this.bestEffort(undefined, (r) => r.setObjectName(this.id, name));
  }

  parent(): ObjectId | null {
    return this.bestEffort(null, (r) => r.parent(this.id));
  }

  setParent(parent: ObjectId | null) {
    this.registry.setParent(this.id, parent);
  }

  children(): ObjectId[] {
    return this.bestEffort([], (r) => r.children(this.id));
  }

  findChildByName(name: string): ObjectId | undefined {
    return this.bestEffort(undefined, (r) => r.findChildByName(this.id, name));
  }

  setProperty(key: string, value: unknown, options?: PropertyOptions) {
    this.registry.setDynamicProperty(this.id, key, value, options);
  }

  property<T>(key: string, type: PropertyType<T>): T | undefined {
    return this.bestEffort(undefined, (r) => r.dynamicProperty(this.id, key, type));
  }

  /** Destroy this object and its subtree. Safe to call more than once. */
  dispose() {
    if (this._disposed) return;
    this._disposed = true;
    // already gone if an ancestor was destroyed first
    this.bestEffort(undefined, (r) => {
      r.destroy(this.id);
    });
  }
}

/** Scope guard: `fn` runs with a fresh object that is disposed afterwards. */
export function withObject<R>(
  context: RegistryContext,
  type: TypeTag,
  fn: (obj: ObjectBase) => R
): R {
  const obj = ObjectBase.create(context, type);
  try {
    return fn(obj);
  } finally {
    obj.dispose();
  }
}

/** Object carrying own visible/enabled flags that propagate to descendants. */
export class WidgetHandle extends ObjectBase {
  // last flags written through this handle; only answered once the record is gone
  private _visible = true;
  private _enabled = true;

  constructor(context: RegistryContext, type?: TypeTag) {
    super(context, type ?? new.target);
    this.registry.initWidgetState(this.id, { visible: true, enabled: true });
  }

  private ownState(): WidgetState {
    const fallback = { visible: this._visible, enabled: this._enabled };
    return this.bestEffort(fallback, (r) => r.widgetState(this.id) ?? fallback);
  }

  get isVisible() { return this.ownState().visible; }
  get isEnabled() { return this.ownState().enabled; }

  setVisible(visible: boolean) {
    this._visible = visible;
    this.bestEffort(undefined, (r) => r.setWidgetVisible(this.id, visible));
  }

  setEnabled(enabled: boolean) {
    this._enabled = enabled;
    this.bestEffort(undefined, (r) => r.setWidgetEnabled(this.id, enabled));
  }

  show() { this.setVisible(true); }
  hide() { this.setVisible(false); }

  isEffectivelyVisible(): boolean {
    return this.bestEffort(this._visible, (r) => r.isEffectivelyVisible(this.id) ?? this._visible);
  }

  isEffectivelyEnabled(): boolean {
    return this.bestEffort(this._enabled, (r) => r.isEffectivelyEnabled(this.id) ?? this._enabled);
  }

  /** Visible considering ancestors below `ancestor` (every ancestor when null). */
  isVisibleTo(ancestor: ObjectId | null): boolean {
    return this.bestEffort(this._visible, (r) => r.isVisibleTo(this.id, ancestor) ?? this._visible);
  }

  raise() { this.registry.raise(this.id); }
  lower() { this.registry.lower(this.id); }
  stackUnder(sibling: ObjectId) { this.registry.stackUnder(this.id, sibling); }
  stackAbove(sibling: ObjectId) { this.registry.stackAbove(this.id, sibling); }

  siblingIndex(): number | null {
    return this.bestEffort(null, (r) => r.siblingIndex(this.id));
  }
  nextSibling(): ObjectId | null {
    return this.bestEffort(null, (r) => r.nextSibling(this.id));
  }
  previousSibling(): ObjectId | null {
    return this.bestEffort(null, (r) => r.previousSibling(this.id));
  }
  siblings(): ObjectId[] {
    return this.bestEffort([], (r) => r.siblings(this.id));
  }
  ancestors(): ObjectId[] {
    return this.bestEffort([], (r) => r.ancestors(this.id));
  }
  depthFirstPreorder(): ObjectId[] {
    return this.bestEffort([], (r) => r.depthFirstPreorder(this.id));
  }
  depthFirstPostorder(): ObjectId[] {
    return this.bestEffort([], (r) => r.depthFirstPostorder(this.id));
  }
  breadthFirst(): ObjectId[] {
    return this.bestEffort([], (r) => r.breadthFirst(this.id));
  }
}
