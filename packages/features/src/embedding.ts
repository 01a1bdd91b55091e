/**
 * Embeddings and vector similarity helpers.
 *
 * Caching is done by the orchestrator (embeddings are cached unless
 * `cache_ttl` is 0).
 */

import {
  EmbeddingResponse,
  createEmbeddingOptions,
  type EmbeddingOptionsInit,
  type LlmServiceManager,
} from "@llm-switchboard/core";
import { InvalidInputError } from "./errors.js";

const FEATURE = "embedding";

export interface SimilarityMatch {
  /** Position in the candidate list. */
  index: number;
  similarity: number;
}

export class EmbeddingService {
  private readonly manager: LlmServiceManager;

  constructor(manager: LlmServiceManager) {
    this.manager = manager;
  }

  /** The embedding vector of one text. */
  async embed(text: string, options?: EmbeddingOptionsInit): Promise<readonly number[]> {
    const response = await this.embedFull(text, options);
    return response.vector();
  }

  async embedFull(text: string, options?: EmbeddingOptionsInit): Promise<EmbeddingResponse> {
    if (text === "") {
      throw new InvalidInputError("Text cannot be empty");
    }
    return this.manager.embed(text, createEmbeddingOptions(options), { feature: FEATURE });
  }

  /** One vector per text, in input order. An empty list yields `[]` without a call. */
  async embedBatch(
    texts: readonly string[],
    options?: EmbeddingOptionsInit,
  ): Promise<ReadonlyArray<readonly number[]>> {
    if (texts.length === 0) return [];
    if (texts.some((text) => text === "")) {
      throw new InvalidInputError("Batch contains an empty text");
    }
    const response = await this.manager.embed(texts, createEmbeddingOptions(options), {
      feature: FEATURE,
    });
    return response.vectors;
  }

  cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    return EmbeddingResponse.cosineSimilarity(a, b);
  }

  /** The `topK` candidates closest to `query`, most similar first. */
  findMostSimilar(
    query: readonly number[],
    candidates: ReadonlyArray<readonly number[]>,
    topK = 5,
  ): SimilarityMatch[] {
    return candidates
      .map((candidate, index) => ({ index, similarity: this.cosineSimilarity(query, candidate) }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, Math.max(0, topK));
  }

  /** Symmetric similarity matrix with 1 on the diagonal. */
  pairwiseSimilarities(vectors: ReadonlyArray<readonly number[]>): number[][] {
    return vectors.map((a, i) =>
      vectors.map((b, j) => (i === j ? 1 : this.cosineSimilarity(a, b))),
    );
  }

  normalize(vector: readonly number[]): number[] {
    return EmbeddingResponse.normalize(vector);
  }
}
