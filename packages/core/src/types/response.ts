/**
 * Immutable response value objects returned to callers.
 */

import { FinishReason } from "./enums.js";
import { DimensionMismatchError } from "./errors.js";
import type { ToolCall } from "./tool.js";
import { tokenCount } from "../utils/json.js";

export type Metadata = Readonly<Record<string, unknown>>;

// ---------------------------------------------------------------------------
// UsageStatistics
// ---------------------------------------------------------------------------

export interface UsageSnapshot {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  estimated_cost?: number;
}

/**
 * Token accounting for one call. `total_tokens` is always the sum of the
 * other two counts.
 */
export class UsageStatistics {
  readonly prompt_tokens: number;
  readonly completion_tokens: number;
  readonly total_tokens: number;
  /** Minor currency units, when the model's pricing is known. */
  readonly estimated_cost?: number;

  private constructor(prompt: number, completion: number, estimatedCost?: number) {
    this.prompt_tokens = tokenCount(prompt);
    this.completion_tokens = tokenCount(completion);
    this.total_tokens = this.prompt_tokens + this.completion_tokens;
    this.estimated_cost =
      estimatedCost !== undefined && Number.isFinite(estimatedCost) && estimatedCost >= 0
        ? estimatedCost
        : undefined;
    Object.freeze(this);
  }

  static fromTokens(prompt: number, completion: number, estimatedCost?: number): UsageStatistics {
    return new UsageStatistics(prompt, completion, estimatedCost);
  }

  static empty(): UsageStatistics {
    return new UsageStatistics(0, 0);
  }

  withCost(estimatedCost: number): UsageStatistics {
    return new UsageStatistics(this.prompt_tokens, this.completion_tokens, estimatedCost);
  }

  add(other: UsageStatistics): UsageStatistics {
    const cost =
      this.estimated_cost !== undefined || other.estimated_cost !== undefined
        ? (this.estimated_cost ?? 0) + (other.estimated_cost ?? 0)
        : undefined;
    return new UsageStatistics(
      this.prompt_tokens + other.prompt_tokens,
      this.completion_tokens + other.completion_tokens,
      cost,
    );
  }

  toJSON(): UsageSnapshot {
    const snapshot: UsageSnapshot = {
      prompt_tokens: this.prompt_tokens,
      completion_tokens: this.completion_tokens,
      total_tokens: this.total_tokens,
    };
    if (this.estimated_cost !== undefined) snapshot.estimated_cost = this.estimated_cost;
    return snapshot;
  }
}

// ---------------------------------------------------------------------------
// CompletionResponse
// ---------------------------------------------------------------------------

export interface CompletionInit {
  content: string;
  model: string;
  usage: UsageStatistics;
  provider: string;
  finish_reason?: FinishReason;
  tool_calls?: readonly ToolCall[];
  metadata?: Metadata;
}

export class CompletionResponse {
  readonly content: string;
  readonly model: string;
  readonly usage: UsageStatistics;
  readonly finish_reason: FinishReason;
  readonly provider: string;
  readonly tool_calls?: readonly ToolCall[];
  readonly metadata?: Metadata;

  constructor(init: CompletionInit) {
    this.content = init.content;
    this.model = init.model;
    this.usage = init.usage;
    this.finish_reason = init.finish_reason ?? FinishReason.STOP;
    this.provider = init.provider;
    this.tool_calls = init.tool_calls && init.tool_calls.length > 0 ? init.tool_calls : undefined;
    this.metadata = init.metadata;
    Object.freeze(this);
  }

  /** Generation ended naturally. */
  isComplete(): boolean {
    return this.finish_reason === FinishReason.STOP;
  }

  wasTruncated(): boolean {
    return this.finish_reason === FinishReason.LENGTH;
  }

  wasFiltered(): boolean {
    return this.finish_reason === FinishReason.CONTENT_FILTER;
  }

  hasToolCalls(): boolean {
    return this.tool_calls !== undefined;
  }

  /** Copy with some fields replaced. */
  with(patch: Partial<CompletionInit>): CompletionResponse {
    return new CompletionResponse({ ...this.toInit(), ...patch });
  }

  private toInit(): CompletionInit {
    return {
      content: this.content,
      model: this.model,
      usage: this.usage,
      provider: this.provider,
      finish_reason: this.finish_reason,
      tool_calls: this.tool_calls,
      metadata: this.metadata,
    };
  }
}

// ---------------------------------------------------------------------------
// EmbeddingResponse
// ---------------------------------------------------------------------------

export interface EmbeddingInit {
  vectors: readonly (readonly number[])[];
  model: string;
  usage: UsageStatistics;
  provider: string;
}

export class EmbeddingResponse {
  /** One vector per input, in input order, all of equal length. */
  readonly vectors: readonly (readonly number[])[];
  readonly model: string;
  readonly usage: UsageStatistics;
  readonly provider: string;

  constructor(init: EmbeddingInit) {
    const first = init.vectors[0];
    if (first !== undefined) {
      for (const vector of init.vectors) {
        if (vector.length !== first.length) {
          throw new DimensionMismatchError(first.length, vector.length);
        }
      }
    }
    this.vectors = init.vectors;
    this.model = init.model;
    this.usage = init.usage;
    this.provider = init.provider;
    Object.freeze(this);
  }

  /** The first vector, or `[]` when the response holds none. */
  vector(): readonly number[] {
    return this.vectors[0] ?? [];
  }

  get dimensions(): number {
    return this.vector().length;
  }

  get count(): number {
    return this.vectors.length;
  }

  /** L2-normalise a vector. A zero vector is returned unchanged. */
  static normalize(vector: readonly number[]): number[] {
    const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    if (magnitude === 0) return [...vector];
    return vector.map((v) => v / magnitude);
  }

  /**
   * Cosine similarity in [-1, 1]. Returns 0 when either vector has zero
   * magnitude.
   *
   * @throws {DimensionMismatchError} when the vectors differ in length.
   */
  static cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
      throw new DimensionMismatchError(a.length, b.length);
    }
    let dot = 0;
    let magA = 0;
    let magB = 0;
    for (let i = 0; i < a.length; i++) {
      const x = a[i] ?? 0;
      const y = b[i] ?? 0;
      dot += x * y;
      magA += x * x;
      magB += y * y;
    }
    if (magA === 0 || magB === 0) return 0;
    return dot / (Math.sqrt(magA) * Math.sqrt(magB));
  }
}

// ---------------------------------------------------------------------------
// VisionResponse
// ---------------------------------------------------------------------------

export interface VisionInit {
  description: string;
  model: string;
  usage: UsageStatistics;
  provider: string;
  confidence?: number;
  metadata?: Metadata;
}

export class VisionResponse {
  readonly description: string;
  readonly model: string;
  readonly usage: UsageStatistics;
  readonly provider: string;
  readonly confidence?: number;
  readonly metadata?: Metadata;

  constructor(init: VisionInit) {
    this.description = init.description;
    this.model = init.model;
    this.usage = init.usage;
    this.provider = init.provider;
    this.confidence = init.confidence;
    this.metadata = init.metadata;
    Object.freeze(this);
  }

  /** False when no confidence was reported. */
  meetsConfidence(threshold: number): boolean {
    return this.confidence !== undefined && this.confidence >= threshold;
  }
}

// ---------------------------------------------------------------------------
// TranslationResult
// ---------------------------------------------------------------------------

export interface TranslationInit {
  translation: string;
  source_language: string;
  target_language: string;
  confidence: number;
  usage: UsageStatistics;
  alternatives?: readonly string[];
  metadata?: Metadata;
}

export class TranslationResult {
  readonly translation: string;
  readonly source_language: string;
  readonly target_language: string;
  readonly confidence: number;
  readonly usage: UsageStatistics;
  readonly alternatives?: readonly string[];
  readonly metadata?: Metadata;

  constructor(init: TranslationInit) {
    this.translation = init.translation;
    this.source_language = init.source_language;
    this.target_language = init.target_language;
    this.confidence = Math.min(1, Math.max(0, init.confidence));
    this.usage = init.usage;
    this.alternatives = init.alternatives;
    this.metadata = init.metadata;
    Object.freeze(this);
  }

  isConfident(threshold = 0.7): boolean {
    return this.confidence >= threshold;
  }
}
