/**
 * Response cache over an injected key/value client.
 *
 * Keys are `<provider>:<model>:<sha256 of the canonical request>`. Values are
 * JSON snapshots, validated with zod on the way back so a corrupted or
 * foreign entry reads as a miss. Cache failures are logged and never fail
 * the call.
 */

import { z } from "zod";
import { FinishReason } from "./types/enums.js";
import type {
  ResolvedChatOptions,
  ResolvedEmbeddingOptions,
  ResolvedVisionOptions,
} from "./types/request.js";
import {
  CompletionResponse,
  EmbeddingResponse,
  UsageStatistics,
  VisionResponse,
} from "./types/response.js";
import { sha256, stableStringify } from "./utils/hash.js";
import { parseJson } from "./utils/json.js";
import { silentLogger, type Logger } from "./utils/logger.js";

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface CacheClient {
  get(key: string): Promise<string | undefined>;
  /** `ttlSeconds` of 0 stores nothing. */
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

/** In-process cache with lazy expiry. */
export class MemoryCacheClient implements CacheClient {
  private _entries: Map<string, { value: string; expiresAt: number }> = new Map();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | undefined> {
    const entry = this._entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this._entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) return;
    this._entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this._entries.delete(key);
  }

  async clear(): Promise<void> {
    this._entries.clear();
  }

  get size(): number {
    return this._entries.size;
  }
}

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

const usageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
  estimated_cost: z.number().optional(),
});

const completionSchema = z.object({
  content: z.string(),
  model: z.string(),
  provider: z.string(),
  finish_reason: z.nativeEnum(FinishReason),
  usage: usageSchema,
  metadata: z.record(z.unknown()).optional(),
});

const embeddingSchema = z.object({
  vectors: z.array(z.array(z.number())),
  model: z.string(),
  provider: z.string(),
  usage: usageSchema,
});

const visionSchema = z.object({
  description: z.string(),
  model: z.string(),
  provider: z.string(),
  usage: usageSchema,
  confidence: z.number().optional(),
  metadata: z.record(z.unknown()).optional(),
});

function restoreUsage(snapshot: z.infer<typeof usageSchema>): UsageStatistics {
  return UsageStatistics.fromTokens(
    snapshot.prompt_tokens,
    snapshot.completion_tokens,
    snapshot.estimated_cost,
  );
}

// ---------------------------------------------------------------------------
// ResponseCache
// ---------------------------------------------------------------------------

export const DEFAULT_COMPLETION_CACHE_TTL = 3600;

export interface ResponseCacheOptions {
  logger?: Logger;
  /** Seconds a cached completion or vision answer lives. */
  completionTtl?: number;
  /** Clock for index expiry; share it with the client in tests. */
  now?: () => number;
}

export class ResponseCache {
  private readonly client: CacheClient;
  private readonly logger: Logger;
  readonly completionTtl: number;
  private readonly now: () => number;
  /** provider → key → expiry in epoch ms. Pruned on read misses and writes. */
  private _keysByProvider: Map<string, Map<string, number>> = new Map();

  constructor(client: CacheClient, options: ResponseCacheOptions = {}) {
    this.client = client;
    this.logger = options.logger ?? silentLogger;
    this.completionTtl = options.completionTtl ?? DEFAULT_COMPLETION_CACHE_TTL;
    this.now = options.now ?? Date.now;
  }

  /** Deterministic key; credentials are never part of `payload`. */
  static key(provider: string, model: string, payload: unknown): string {
    return `${provider}:${model}:${sha256(stableStringify(payload))}`;
  }

  // -------------------------------------------------------------------------
  // Policy
  // -------------------------------------------------------------------------

  /** Only fully deterministic completions are cached. Calls with tools never are. */
  static isCacheableChat(options: ResolvedChatOptions): boolean {
    return options.temperature === 0;
  }

  static isCacheableVision(options: ResolvedVisionOptions): boolean {
    return options.temperature === 0;
  }

  static isCacheableEmbedding(options: ResolvedEmbeddingOptions): boolean {
    return options.cache_ttl > 0;
  }

  // -------------------------------------------------------------------------
  // Typed access
  // -------------------------------------------------------------------------

  async getCompletion(key: string): Promise<CompletionResponse | undefined> {
    const snapshot = await this.read(key, completionSchema);
    return snapshot && new CompletionResponse({ ...snapshot, usage: restoreUsage(snapshot.usage) });
  }

  async setCompletion(key: string, response: CompletionResponse): Promise<void> {
    await this.write(
      key,
      response.provider,
      {
        content: response.content,
        model: response.model,
        provider: response.provider,
        finish_reason: response.finish_reason,
        usage: response.usage.toJSON(),
        metadata: response.metadata,
      },
      this.completionTtl,
    );
  }

  async getEmbedding(key: string): Promise<EmbeddingResponse | undefined> {
    const snapshot = await this.read(key, embeddingSchema);
    return snapshot && new EmbeddingResponse({ ...snapshot, usage: restoreUsage(snapshot.usage) });
  }

  async setEmbedding(key: string, response: EmbeddingResponse, ttlSeconds: number): Promise<void> {
    await this.write(
      key,
      response.provider,
      {
        vectors: response.vectors,
        model: response.model,
        provider: response.provider,
        usage: response.usage.toJSON(),
      },
      ttlSeconds,
    );
  }

  async getVision(key: string): Promise<VisionResponse | undefined> {
    const snapshot = await this.read(key, visionSchema);
    return snapshot && new VisionResponse({ ...snapshot, usage: restoreUsage(snapshot.usage) });
  }

  async setVision(key: string, response: VisionResponse): Promise<void> {
    await this.write(
      key,
      response.provider,
      {
        description: response.description,
        model: response.model,
        provider: response.provider,
        usage: response.usage.toJSON(),
        confidence: response.confidence,
        metadata: response.metadata,
      },
      this.completionTtl,
    );
  }

  // -------------------------------------------------------------------------
  // Invalidation
  // -------------------------------------------------------------------------

  /** Delete every live entry this cache stored for a provider. Returns the count. */
  async flushProvider(provider: string): Promise<number> {
    const keys = this._keysByProvider.get(provider);
    if (!keys) return 0;
    this._keysByProvider.delete(provider);
    const now = this.now();
    let removed = 0;
    for (const [key, expiresAt] of keys) {
      if (expiresAt <= now) continue;
      try {
        await this.client.delete(key);
        removed++;
      } catch (err: unknown) {
        this.logger.warn("Cache delete failed", { key, error: String(err) });
      }
    }
    return removed;
  }

  /** Keys currently indexed for a provider. */
  indexedKeys(provider: string): number {
    return this._keysByProvider.get(provider)?.size ?? 0;
  }

  async clear(): Promise<void> {
    this._keysByProvider.clear();
    try {
      await this.client.clear();
    } catch (err: unknown) {
      this.logger.warn("Cache clear failed", { error: String(err) });
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async read<S>(
    key: string,
    schema: z.ZodType<S, z.ZodTypeDef, unknown>,
  ): Promise<S | undefined> {
    let text: string | undefined;
    try {
      text = await this.client.get(key);
    } catch (err: unknown) {
      this.logger.warn("Cache read failed", { key, error: String(err) });
      return undefined;
    }
    if (text === undefined) {
      this.forget(key);
      return undefined;
    }

    const parsed = schema.safeParse(parseJson(text));
    if (!parsed.success) {
      this.logger.warn("Discarding malformed cache entry", { key });
      this.forget(key);
      return undefined;
    }
    return parsed.data;
  }

  private async write(
    key: string,
    provider: string,
    snapshot: unknown,
    ttlSeconds: number,
  ): Promise<void> {
    if (ttlSeconds <= 0) return;
    try {
      await this.client.set(key, stableStringify(snapshot), ttlSeconds);
    } catch (err: unknown) {
      this.logger.warn("Cache write failed", { key, error: String(err) });
      return;
    }
    const now = this.now();
    let keys = this._keysByProvider.get(provider);
    if (!keys) {
      keys = new Map();
      this._keysByProvider.set(provider, keys);
    }
    for (const [indexed, expiresAt] of keys) {
      if (expiresAt <= now) keys.delete(indexed);
    }
    keys.set(key, now + ttlSeconds * 1000);
  }

  private forget(key: string): void {
    for (const [provider, keys] of this._keysByProvider) {
      if (keys.delete(key) && keys.size === 0) this._keysByProvider.delete(provider);
    }
  }
}
