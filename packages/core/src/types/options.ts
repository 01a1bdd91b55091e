/**
 * Typed, immutable request options.
 *
 * Options are only built through the `create*` factories (or the presets and
 * `with*` helpers layered on them). Numeric fields outside their documented
 * range are clamped, never rejected; NaN counts as unset.
 */

import { DetailLevel, ResponseFormat, isEnumValue } from "./enums.js";
import type { ToolChoice, ToolDefinition } from "./tool.js";
import { toToolChoice } from "./tool.js";

// ---------------------------------------------------------------------------
// Ranges
// ---------------------------------------------------------------------------

export const TEMPERATURE_RANGE = { min: 0, max: 2 } as const;
export const TOP_P_RANGE = { min: 0, max: 1 } as const;
export const PENALTY_RANGE = { min: -2, max: 2 } as const;

/** Embedding cache lifetime when none is given: one day. */
export const DEFAULT_EMBEDDING_CACHE_TTL = 86_400;

/** Clamp a number into [min, max]; `undefined` and NaN stay unset. */
export function clampNumber(
  value: number | undefined,
  min: number,
  max: number,
): number | undefined {
  if (value === undefined || Number.isNaN(value)) return undefined;
  return Math.min(max, Math.max(min, value));
}

/** Floor, then clamp to at least `min` (and at most `max`). */
export function clampInteger(
  value: number | undefined,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number | undefined {
  if (value === undefined || Number.isNaN(value)) return undefined;
  return Math.min(max, Math.max(min, Math.floor(value)));
}

function optionalString(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

// ---------------------------------------------------------------------------
// Shapes
// ---------------------------------------------------------------------------

interface TargetOptions {
  /** Provider identifier; selection falls back to default/priority when absent. */
  readonly provider?: string;
  /** Catalog identifier or vendor model id. */
  readonly model?: string;
}

export interface SamplingOptions {
  readonly temperature?: number;
  readonly max_tokens?: number;
  readonly top_p?: number;
  readonly frequency_penalty?: number;
  readonly presence_penalty?: number;
}

export interface ChatOptions extends TargetOptions, SamplingOptions {
  /** Prepended as a system message when the conversation has none. */
  readonly system_prompt?: string;
  readonly response_format?: ResponseFormat;
  readonly stop_sequences?: readonly string[];
}

export interface ToolOptions extends ChatOptions {
  readonly tools: readonly ToolDefinition[];
  readonly tool_choice?: ToolChoice;
}

export interface VisionOptions extends TargetOptions {
  readonly temperature?: number;
  readonly max_tokens?: number;
  readonly detail_level?: DetailLevel;
  readonly system_prompt?: string;
}

export interface EmbeddingOptions extends TargetOptions {
  readonly dimensions?: number;
  /** Seconds; 0 disables caching. */
  readonly cache_ttl: number;
}

export const Formality = {
  DEFAULT: "default",
  FORMAL: "formal",
  INFORMAL: "informal",
} as const satisfies Record<string, string>;

export type Formality = (typeof Formality)[keyof typeof Formality];

export const TranslationDomain = {
  GENERAL: "general",
  TECHNICAL: "technical",
  MEDICAL: "medical",
  LEGAL: "legal",
  MARKETING: "marketing",
} as const satisfies Record<string, string>;

export type TranslationDomain = (typeof TranslationDomain)[keyof typeof TranslationDomain];

export interface TranslationOptions extends TargetOptions {
  readonly temperature?: number;
  readonly max_tokens?: number;
  readonly formality: Formality;
  readonly domain: TranslationDomain;
  readonly preserve_formatting: boolean;
  /** Source term → required translation. */
  readonly glossary?: Readonly<Record<string, string>>;
  /** Free-text context about where the text appears. */
  readonly context?: string;
}

// ---------------------------------------------------------------------------
// Init types: what callers pass in (enum fields accept any string)
// ---------------------------------------------------------------------------

export type ChatOptionsInit = Omit<Partial<ChatOptions>, "response_format"> & {
  response_format?: string;
};

export type ToolOptionsInit = ChatOptionsInit & {
  tools?: readonly ToolDefinition[];
  tool_choice?: unknown;
};

export type VisionOptionsInit = Omit<Partial<VisionOptions>, "detail_level"> & {
  detail_level?: string;
};

export type EmbeddingOptionsInit = Partial<EmbeddingOptions>;

export type TranslationOptionsInit = Omit<
  Partial<TranslationOptions>,
  "formality" | "domain"
> & {
  formality?: string;
  domain?: string;
};

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function createSamplingOptions(init: SamplingOptions): SamplingOptions {
  return {
    temperature: clampNumber(init.temperature, TEMPERATURE_RANGE.min, TEMPERATURE_RANGE.max),
    max_tokens: clampInteger(init.max_tokens, 1),
    top_p: clampNumber(init.top_p, TOP_P_RANGE.min, TOP_P_RANGE.max),
    frequency_penalty: clampNumber(init.frequency_penalty, PENALTY_RANGE.min, PENALTY_RANGE.max),
    presence_penalty: clampNumber(init.presence_penalty, PENALTY_RANGE.min, PENALTY_RANGE.max),
  };
}

export function createChatOptions(init: ChatOptionsInit = {}): ChatOptions {
  return Object.freeze({
    provider: optionalString(init.provider),
    model: optionalString(init.model),
    ...createSamplingOptions(init),
    system_prompt: optionalString(init.system_prompt),
    response_format:
      init.response_format === undefined
        ? undefined
        : isEnumValue(ResponseFormat, init.response_format)
          ? init.response_format
          : ResponseFormat.TEXT,
    stop_sequences:
      init.stop_sequences && init.stop_sequences.length > 0
        ? [...init.stop_sequences]
        : undefined,
  });
}

export function createToolOptions(init: ToolOptionsInit = {}): ToolOptions {
  return Object.freeze({
    ...createChatOptions(init),
    tools: [...(init.tools ?? [])],
    tool_choice: toToolChoice(init.tool_choice),
  });
}

export function createVisionOptions(init: VisionOptionsInit = {}): VisionOptions {
  return Object.freeze({
    provider: optionalString(init.provider),
    model: optionalString(init.model),
    temperature: clampNumber(init.temperature, TEMPERATURE_RANGE.min, TEMPERATURE_RANGE.max),
    max_tokens: clampInteger(init.max_tokens, 1),
    detail_level:
      init.detail_level === undefined
        ? undefined
        : isEnumValue(DetailLevel, init.detail_level)
          ? init.detail_level
          : DetailLevel.AUTO,
    system_prompt: optionalString(init.system_prompt),
  });
}

export function createEmbeddingOptions(init: EmbeddingOptionsInit = {}): EmbeddingOptions {
  return Object.freeze({
    provider: optionalString(init.provider),
    model: optionalString(init.model),
    dimensions: clampInteger(init.dimensions, 1),
    cache_ttl: clampInteger(init.cache_ttl, 0) ?? DEFAULT_EMBEDDING_CACHE_TTL,
  });
}

export function createTranslationOptions(init: TranslationOptionsInit = {}): TranslationOptions {
  return Object.freeze({
    provider: optionalString(init.provider),
    model: optionalString(init.model),
    temperature: clampNumber(init.temperature, TEMPERATURE_RANGE.min, TEMPERATURE_RANGE.max),
    max_tokens: clampInteger(init.max_tokens, 1),
    formality: isEnumValue(Formality, init.formality) ? init.formality : Formality.DEFAULT,
    domain: isEnumValue(TranslationDomain, init.domain) ? init.domain : TranslationDomain.GENERAL,
    preserve_formatting: init.preserve_formatting ?? true,
    glossary:
      init.glossary && Object.keys(init.glossary).length > 0 ? { ...init.glossary } : undefined,
    context: optionalString(init.context),
  });
}

// ---------------------------------------------------------------------------
// Fluent helpers
// ---------------------------------------------------------------------------

export function withChatOptions(base: ChatOptions, patch: ChatOptionsInit): ChatOptions {
  return createChatOptions({ ...base, ...patch });
}

export function withVisionOptions(base: VisionOptions, patch: VisionOptionsInit): VisionOptions {
  return createVisionOptions({ ...base, ...patch });
}

export function withEmbeddingOptions(
  base: EmbeddingOptions,
  patch: EmbeddingOptionsInit,
): EmbeddingOptions {
  return createEmbeddingOptions({ ...base, ...patch });
}

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

export const ChatPresets = {
  /** Low temperature for grounded, repeatable answers. */
  factual: (init: ChatOptionsInit = {}) =>
    createChatOptions({ temperature: 0.2, top_p: 0.9, ...init }),
  creative: (init: ChatOptionsInit = {}) =>
    createChatOptions({ temperature: 1.2, top_p: 1.0, presence_penalty: 0.6, ...init }),
  balanced: (init: ChatOptionsInit = {}) =>
    createChatOptions({ temperature: 0.7, max_tokens: 4096, ...init }),
  json: (init: ChatOptionsInit = {}) =>
    createChatOptions({ temperature: 0.3, response_format: ResponseFormat.JSON, ...init }),
  code: (init: ChatOptionsInit = {}) =>
    createChatOptions({
      temperature: 0.2,
      max_tokens: 8192,
      top_p: 0.95,
      frequency_penalty: 0,
      ...init,
    }),
} as const;

export const VisionPresets = {
  altText: (init: VisionOptionsInit = {}) =>
    createVisionOptions({ detail_level: DetailLevel.LOW, max_tokens: 100, temperature: 0.5, ...init }),
  detailed: (init: VisionOptionsInit = {}) =>
    createVisionOptions({ detail_level: DetailLevel.HIGH, max_tokens: 500, temperature: 0.7, ...init }),
  quick: (init: VisionOptionsInit = {}) =>
    createVisionOptions({ detail_level: DetailLevel.LOW, max_tokens: 200, temperature: 0.5, ...init }),
  comprehensive: (init: VisionOptionsInit = {}) =>
    createVisionOptions({ detail_level: DetailLevel.HIGH, max_tokens: 1000, temperature: 0.7, ...init }),
} as const;

export const EmbeddingPresets = {
  standard: (init: EmbeddingOptionsInit = {}) => createEmbeddingOptions(init),
  noCache: (init: EmbeddingOptionsInit = {}) => createEmbeddingOptions({ cache_ttl: 0, ...init }),
  compact: (init: EmbeddingOptionsInit = {}) => createEmbeddingOptions({ dimensions: 256, ...init }),
  highPrecision: (init: EmbeddingOptionsInit = {}) =>
    createEmbeddingOptions({ dimensions: 1536, ...init }),
} as const;
