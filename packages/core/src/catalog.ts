/**
 * Model catalog: model descriptors per provider, lookup, capability
 * filtering, criteria-based selection and cost estimation.
 *
 * The built-in list ships as `data/models.json`; configuration sources may
 * supply their own descriptors instead.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { AdapterType, Capability } from "./types/enums.js";
import {
  createModelDescriptor,
  createModelSelectionCriteria,
  modelDescriptorSchema,
  type ModelDescriptor,
  type ModelDescriptorInit,
  type ModelSelectionCriteria,
  type ModelSelectionCriteriaInit,
} from "./types/descriptors.js";
import type { UsageStatistics } from "./types/response.js";

const BUILTIN_MODELS_URL = new URL("./data/models.json", import.meta.url);

/** Parse and validate the bundled model list. */
export function loadBuiltinModels(): ModelDescriptor[] {
  const raw: unknown = JSON.parse(readFileSync(BUILTIN_MODELS_URL, "utf8"));
  return z
    .array(modelDescriptorSchema)
    .parse(raw)
    .map((model) => createModelDescriptor(model));
}

export interface ModelQuery {
  provider?: string;
  capability?: Capability;
  /** Include inactive models. Defaults to false. */
  includeInactive?: boolean;
}

/** What criteria selection needs to know about a model's provider. */
export interface ProviderTraits {
  readonly adapter_type: AdapterType;
  readonly priority: number;
}

/**
 * Provider traits by identifier. `undefined` means the provider cannot serve
 * calls, and its models are not candidates.
 */
export type ProviderLookup = (provider: string) => ProviderTraits | undefined;

function matchesCriteria(
  model: ModelDescriptor,
  criteria: ModelSelectionCriteria,
  traits: ProviderTraits | undefined,
): boolean {
  if (!criteria.capabilities.every((c) => model.capabilities.includes(c))) return false;
  if (criteria.adapter_types.length > 0) {
    if (!traits || !criteria.adapter_types.includes(traits.adapter_type)) return false;
  }
  if (criteria.min_context_length > 0) {
    if (model.context_length === 0 || model.context_length < criteria.min_context_length) {
      return false;
    }
  }
  if (criteria.max_cost_input > 0 && model.input_cost_per_million > criteria.max_cost_input) {
    return false;
  }
  return true;
}

/** Unpriced models sort last when the cheapest is preferred. */
function totalCost(model: ModelDescriptor): number {
  const cost = model.input_cost_per_million + model.output_cost_per_million;
  return cost === 0 ? Number.POSITIVE_INFINITY : cost;
}

export class ModelCatalog {
  private _models: Map<string, ModelDescriptor> = new Map();

  constructor(models: ReadonlyArray<ModelDescriptor | ModelDescriptorInit> = []) {
    for (const model of models) this.add(model);
  }

  static builtin(): ModelCatalog {
    return new ModelCatalog(loadBuiltinModels());
  }

  /** Add or replace a model by identifier. */
  add(model: ModelDescriptor | ModelDescriptorInit): ModelDescriptor {
    const descriptor = createModelDescriptor(model);
    this._models.set(descriptor.identifier, descriptor);
    return descriptor;
  }

  get(identifier: string): ModelDescriptor | undefined {
    return this._models.get(identifier);
  }

  /** The catalog entry for a vendor model string on one provider. */
  findByModelId(provider: string, modelId: string): ModelDescriptor | undefined {
    for (const model of this._models.values()) {
      if (model.provider === provider && model.model_id === modelId) return model;
    }
    return undefined;
  }

  list(provider?: string): ModelDescriptor[] {
    const all = Array.from(this._models.values());
    return provider === undefined ? all : all.filter((m) => m.provider === provider);
  }

  findModels(query: ModelQuery = {}): ModelDescriptor[] {
    return this.list(query.provider).filter(
      (m) =>
        (query.includeInactive === true || m.active) &&
        (query.capability === undefined || m.capabilities.includes(query.capability)),
    );
  }

  /**
   * Active models meeting the criteria, best first: provider priority
   * descending, then total cost when `prefer_lowest_cost`, then default
   * models, then catalog order.
   *
   * With `providers`, models whose provider it does not know are skipped.
   * Without it, no provider is known, so an `adapter_types` restriction
   * matches nothing.
   */
  matchModels(criteria: ModelSelectionCriteriaInit = {}, providers?: ProviderLookup): ModelDescriptor[] {
    const resolved = createModelSelectionCriteria(criteria);
    const candidates: Array<{ model: ModelDescriptor; priority: number }> = [];
    for (const model of this.findModels()) {
      const traits = providers?.(model.provider);
      if (providers && !traits) continue;
      if (matchesCriteria(model, resolved, traits)) {
        candidates.push({ model, priority: traits?.priority ?? 0 });
      }
    }
    // Array.prototype.sort is stable, so catalog order breaks the last tie
    candidates.sort((a, b) => {
      if (a.priority !== b.priority) return b.priority - a.priority;
      if (resolved.prefer_lowest_cost) {
        const costA = totalCost(a.model);
        const costB = totalCost(b.model);
        if (costA !== costB) return costA < costB ? -1 : 1;
      }
      if (a.model.is_default !== b.model.is_default) return a.model.is_default ? -1 : 1;
      return 0;
    });
    return candidates.map((c) => c.model);
  }

  /** The best model for the criteria, if any matches. */
  selectModel(criteria: ModelSelectionCriteriaInit = {}, providers?: ProviderLookup): ModelDescriptor | undefined {
    return this.matchModels(criteria, providers)[0];
  }

  /**
   * The provider's model for a capability: the one flagged `is_default`,
   * else the first active one that has the capability.
   */
  defaultFor(provider: string, capability: Capability): ModelDescriptor | undefined {
    const candidates = this.findModels({ provider, capability });
    return candidates.find((m) => m.is_default) ?? candidates[0];
  }

  /**
   * Vendor model string for a call. `requested` may be a catalog identifier
   * or a vendor model id; without one the provider default is used.
   * Returns undefined when the catalog knows nothing for the provider.
   */
  resolveModelId(
    provider: string,
    capability: Capability,
    requested?: string,
  ): string | undefined {
    if (requested) {
      const entry = this._models.get(requested);
      return entry && entry.provider === provider ? entry.model_id : requested;
    }
    return this.defaultFor(provider, capability)?.model_id;
  }

  /**
   * Cost in minor currency units, or undefined when the model is unknown or
   * carries no pricing.
   */
  estimateCost(provider: string, modelId: string, usage: UsageStatistics): number | undefined {
    const model = this.findByModelId(provider, modelId) ?? this._models.get(modelId);
    if (!model) return undefined;
    if (model.input_cost_per_million === 0 && model.output_cost_per_million === 0) {
      return undefined;
    }
    return (
      (model.input_cost_per_million * usage.prompt_tokens +
        model.output_cost_per_million * usage.completion_tokens) /
      1_000_000
    );
  }
}
