/**
 * Provider registry: the configured providers, their adapters and the
 * selection rules.
 *
 * Selection order for a call: explicit identifier → configured default →
 * highest priority. Priority ties resolve by registration order, so the
 * result is deterministic for a given registry state.
 */

import type { ProviderAdapter } from "./providers/adapter.js";
import type { ProviderDescriptor } from "./types/descriptors.js";
import {
  NoProviderAvailableError,
  ProviderNotConfiguredError,
  ProviderNotFoundError,
} from "./types/errors.js";
import { silentLogger, type Logger } from "./utils/logger.js";

export interface ProviderEntry {
  readonly descriptor: ProviderDescriptor;
  readonly adapter: ProviderAdapter;
  /** False when the dialect needs a credential and none was resolved. */
  readonly hasCredential: boolean;
}

export interface RegisteredProvider extends ProviderEntry {
  readonly priority: number;
}

export class ProviderRegistry {
  private _providers: Map<string, RegisteredProvider> = new Map();
  private _default: string | undefined;
  private readonly logger: Logger;

  constructor(options: { logger?: Logger; defaultProvider?: string } = {}) {
    this.logger = options.logger ?? silentLogger;
    this._default = options.defaultProvider;
  }

  /**
   * Register a provider. Re-registering an identifier replaces the entry
   * but keeps its original position for tie-breaking.
   */
  register(entry: ProviderEntry, priority?: number): void {
    const id = entry.descriptor.identifier;
    this._providers.set(id, { ...entry, priority: priority ?? entry.descriptor.priority });
    this.logger.debug("Provider registered", {
      provider: id,
      priority: priority ?? entry.descriptor.priority,
      active: entry.descriptor.active,
    });
  }

  /** Remove a provider. No-op if it is not registered. */
  unregister(id: string): void {
    this._providers.delete(id);
    if (this._default === id) this._default = undefined;
  }

  has(id: string): boolean {
    return this._providers.has(id);
  }

  get(id: string): RegisteredProvider | undefined {
    return this._providers.get(id);
  }

  /** Every registered provider in registration order. */
  list(): RegisteredProvider[] {
    return Array.from(this._providers.values());
  }

  /** Active and, where the dialect needs one, holding a credential. */
  isAvailable(id: string): boolean {
    const entry = this._providers.get(id);
    return entry !== undefined && unavailableReason(entry) === undefined;
  }

  get defaultProvider(): string | undefined {
    return this._default;
  }

  /** @throws {ProviderNotFoundError} when the identifier is not registered. */
  setDefault(id: string): void {
    if (!this._providers.has(id)) {
      throw new ProviderNotFoundError(id);
    }
    this._default = id;
  }

  // -------------------------------------------------------------------------
  // Selection
  // -------------------------------------------------------------------------

  selectExplicit(id: string): RegisteredProvider {
    const entry = this._providers.get(id);
    if (!entry) {
      throw new ProviderNotFoundError(id);
    }
    const reason = unavailableReason(entry);
    if (reason !== undefined) {
      throw new ProviderNotConfiguredError(id, reason);
    }
    return entry;
  }

  selectDefault(): RegisteredProvider {
    if (this._default === undefined) {
      throw new NoProviderAvailableError("No default provider is configured");
    }
    if (!this.isAvailable(this._default)) {
      throw new NoProviderAvailableError(
        `Default provider "${this._default}" is not available`,
      );
    }
    return this.selectExplicit(this._default);
  }

  /** Available providers by descending priority; ties keep registration order. */
  selectByPriority(): RegisteredProvider[] {
    // Array.prototype.sort is stable
    return this.list()
      .filter((entry) => unavailableReason(entry) === undefined)
      .sort((a, b) => b.priority - a.priority);
  }

  /**
   * The provider for one call.
   *
   * @throws {ProviderNotFoundError | ProviderNotConfiguredError} for a bad explicit id.
   * @throws {NoProviderAvailableError} when nothing can serve the call.
   */
  select(id?: string): RegisteredProvider {
    if (id) return this.selectExplicit(id);

    if (this._default !== undefined && this.isAvailable(this._default)) {
      return this.selectDefault();
    }

    const [first] = this.selectByPriority();
    if (!first) {
      throw new NoProviderAvailableError();
    }
    return first;
  }

  /** What `select` would return, or undefined where it would throw. */
  peek(id?: string): RegisteredProvider | undefined {
    if (id) return this.isAvailable(id) ? this._providers.get(id) : undefined;
    if (this._default !== undefined && this.isAvailable(this._default)) {
      return this._providers.get(this._default);
    }
    return this.selectByPriority()[0];
  }
}

function unavailableReason(entry: ProviderEntry): string | undefined {
  if (!entry.descriptor.active) return "provider is inactive";
  if (!entry.hasCredential) return "credential is missing";
  return undefined;
}
