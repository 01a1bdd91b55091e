/**
 * A real orchestrator over one scripted in-process adapter.
 */

import { vi } from "vitest";
import {
  AdapterType,
  CompletionResponse,
  EmbeddingResponse,
  InMemoryUsageRecorder,
  LlmServiceManager,
  ProviderRegistry,
  UsageStatistics,
  VisionResponse,
  createProviderDescriptor,
  type ContentPart,
  type EmbeddingCapable,
  type FinishReason,
  type Message,
  type ProviderAdapter,
  type ResolvedChatOptions,
  type ResolvedEmbeddingOptions,
  type ResolvedVisionOptions,
  type VisionCapable,
} from "@llm-switchboard/core";

export function answer(content: string, finishReason?: FinishReason): CompletionResponse {
  return new CompletionResponse({
    content,
    model: "scripted-chat",
    provider: "scripted",
    finish_reason: finishReason,
    usage: UsageStatistics.fromTokens(12, 4),
  });
}

export class ScriptedAdapter implements ProviderAdapter, EmbeddingCapable, VisionCapable {
  readonly id = "scripted";
  readonly type = AdapterType.CUSTOM;
  readonly name = "Scripted";
  readonly defaultModel = "scripted-chat";
  readonly defaultEmbeddingModel = "scripted-embed";

  readonly complete = vi.fn(
    async (_messages: readonly Message[], _options: ResolvedChatOptions): Promise<CompletionResponse> =>
      answer("ok"),
  );

  readonly embed = vi.fn(
    async (inputs: readonly string[], options: ResolvedEmbeddingOptions): Promise<EmbeddingResponse> =>
      new EmbeddingResponse({
        vectors: inputs.map((text) => [text.length, 1]),
        model: options.model,
        provider: "scripted",
        usage: UsageStatistics.fromTokens(inputs.length, 0),
      }),
  );

  readonly analyzeImage = vi.fn(
    async (_content: readonly ContentPart[], options: ResolvedVisionOptions): Promise<VisionResponse> =>
      new VisionResponse({
        description: "A red bicycle",
        model: options.model,
        provider: "scripted",
        usage: UsageStatistics.fromTokens(30, 6),
      }),
  );

  /** Queue completion texts, answered in order. */
  say(...contents: string[]): this {
    for (const content of contents) {
      this.complete.mockResolvedValueOnce(answer(content));
    }
    return this;
  }

  /** Messages of the nth completion call. */
  messages(index = 0): readonly Message[] {
    const call = this.complete.mock.calls[index];
    if (!call) throw new Error(`complete was not called ${index + 1} time(s)`);
    return call[0];
  }

  options(index = 0): ResolvedChatOptions {
    const call = this.complete.mock.calls[index];
    if (!call) throw new Error(`complete was not called ${index + 1} time(s)`);
    return call[1];
  }
}

export function createManager(adapter = new ScriptedAdapter()) {
  const registry = new ProviderRegistry();
  registry.register({
    descriptor: createProviderDescriptor({ identifier: adapter.id, adapter_type: "custom", max_retries: 0 }),
    adapter,
    hasCredential: true,
  });
  const usage = new InMemoryUsageRecorder();
  const manager = new LlmServiceManager({ registry, usage });
  return { manager, adapter, usage };
}
