/**
 * Provider and model descriptors.
 *
 * Descriptors come from a configuration source and are read-only inputs to
 * the core. The zod schemas fill defaults and reject malformed records at
 * the boundary.
 */

import { z } from "zod";
import { AdapterType, Capability } from "./enums.js";

// ---------------------------------------------------------------------------
// ProviderDescriptor
// ---------------------------------------------------------------------------

export const DEFAULT_PROVIDER_TIMEOUT_MS = 30_000;
export const DEFAULT_PROVIDER_MAX_RETRIES = 2;

export const providerDescriptorSchema = z.object({
  identifier: z.string().min(1),
  name: z.string().default(""),
  adapter_type: z.nativeEnum(AdapterType),
  /** Base URL; empty means the dialect's default endpoint. */
  endpoint: z.string().default(""),
  /** Name under which the credential is resolved. Never the secret itself. */
  credential_ref: z.string().default(""),
  timeout_ms: z.number().int().positive().default(DEFAULT_PROVIDER_TIMEOUT_MS),
  max_retries: z.number().int().min(0).default(DEFAULT_PROVIDER_MAX_RETRIES),
  priority: z.number().int().default(0),
  active: z.boolean().default(true),
  /** Dialect extras, e.g. Azure `api_version` or OpenRouter `site_url`. */
  options: z.record(z.string()).default({}),
});

export type ProviderDescriptor = Readonly<z.infer<typeof providerDescriptorSchema>>;
export type ProviderDescriptorInit = z.input<typeof providerDescriptorSchema>;

export function createProviderDescriptor(init: ProviderDescriptorInit): ProviderDescriptor {
  const parsed = providerDescriptorSchema.parse(init);
  return Object.freeze({ ...parsed, name: parsed.name || parsed.identifier });
}

// ---------------------------------------------------------------------------
// ModelDescriptor
// ---------------------------------------------------------------------------

export const modelDescriptorSchema = z.object({
  identifier: z.string().min(1),
  /** Identifier of the provider serving this model. */
  provider: z.string().min(1),
  /** Vendor model string sent on the wire. */
  model_id: z.string().min(1),
  name: z.string().default(""),
  context_length: z.number().int().nonnegative().default(0),
  max_output_tokens: z.number().int().nonnegative().default(0),
  capabilities: z.array(z.nativeEnum(Capability)).default([Capability.CHAT]),
  /** Integer minor currency units per million input tokens. */
  input_cost_per_million: z.number().int().nonnegative().default(0),
  output_cost_per_million: z.number().int().nonnegative().default(0),
  is_default: z.boolean().default(false),
  active: z.boolean().default(true),
});

export type ModelDescriptor = Readonly<z.infer<typeof modelDescriptorSchema>>;
export type ModelDescriptorInit = z.input<typeof modelDescriptorSchema>;

export function createModelDescriptor(init: ModelDescriptorInit): ModelDescriptor {
  const parsed = modelDescriptorSchema.parse(init);
  return Object.freeze({ ...parsed, name: parsed.name || parsed.model_id });
}

// ---------------------------------------------------------------------------
// ModelSelectionCriteria
// ---------------------------------------------------------------------------

export const modelSelectionCriteriaSchema = z.object({
  /** Every listed capability is required. */
  capabilities: z.array(z.nativeEnum(Capability)).default([]),
  /** Empty allows every dialect. */
  adapter_types: z.array(z.nativeEnum(AdapterType)).default([]),
  /** 0 disables the check; a model of unknown length (0) never satisfies a minimum. */
  min_context_length: z.number().int().nonnegative().default(0),
  /** 0 disables the check; a model of unknown input cost (0) always passes. */
  max_cost_input: z.number().int().nonnegative().default(0),
  prefer_lowest_cost: z.boolean().default(false),
});

export type ModelSelectionCriteria = Readonly<z.infer<typeof modelSelectionCriteriaSchema>>;
export type ModelSelectionCriteriaInit = z.input<typeof modelSelectionCriteriaSchema>;

export function createModelSelectionCriteria(
  init: ModelSelectionCriteriaInit = {},
): ModelSelectionCriteria {
  return Object.freeze(modelSelectionCriteriaSchema.parse(init));
}

// ---------------------------------------------------------------------------
// LlmConfiguration
// ---------------------------------------------------------------------------

/**
 * A named call preset: a fixed model (or selection criteria) plus tuning.
 * Unset sampling fields fall back to the manager defaults.
 */
export const llmConfigurationSchema = z.object({
  identifier: z.string().min(1),
  name: z.string().default(""),
  /** Provider identifier; empty means the provider the catalog lists for `model`. */
  provider: z.string().default(""),
  /** Catalog identifier or vendor model id. Ignored when `criteria` is set. */
  model: z.string().default(""),
  criteria: modelSelectionCriteriaSchema.optional(),
  system_prompt: z.string().default(""),
  temperature: z.number().optional(),
  max_tokens: z.number().int().optional(),
  top_p: z.number().optional(),
  frequency_penalty: z.number().optional(),
  presence_penalty: z.number().optional(),
  active: z.boolean().default(true),
});

export type LlmConfiguration = Readonly<z.infer<typeof llmConfigurationSchema>>;
export type LlmConfigurationInit = z.input<typeof llmConfigurationSchema>;

export function createLlmConfiguration(init: LlmConfigurationInit): LlmConfiguration {
  const parsed = llmConfigurationSchema.parse(init);
  return Object.freeze({ ...parsed, name: parsed.name || parsed.identifier });
}
