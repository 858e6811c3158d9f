// src/objects/context.ts
import type { RegistryConfig, RegistryLogger } from "./interfaces.js";
import { ObjectError } from "./errors.js";
import { SharedObjectRegistry } from "./shared/sharedRegistry.js";

/**
 * Process-lifetime handle to the object registry. Build one at startup, call
 * init() once, and hand the context to whatever creates objects. There is no
 * teardown: once initialized the registry lives as long as the process.
 */
export class RegistryContext {
  private _registry: SharedObjectRegistry | null = null;
  private readonly cfg: RegistryConfig;

  constructor(cfg: RegistryConfig = {}) {
    this.cfg = cfg;
  }

  get logger(): RegistryLogger | undefined {
    return this.cfg.logger;
  }

  get isInitialized(): boolean {
    return this._registry !== null;
  }

  /** Create the registry. Later calls are no-ops. */
  init(): SharedObjectRegistry {
    this._registry ??= new SharedObjectRegistry(this.cfg);
    return this._registry;
  }

  /** Throws RegistryNotInitialized before init(). */
  registry(): SharedObjectRegistry {
    if (!this._registry) throw ObjectError.notInitialized();
    return this._registry;
  }
}
