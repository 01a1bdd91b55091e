/**
 * Text completion on top of the orchestrator: plain, JSON, Markdown and
 * sampling presets.
 */

import type { z } from "zod";
import {
  ResponseFormat,
  createChatOptions,
  parseJson,
  silentLogger,
  type ChatOptionsInit,
  type CompletionResponse,
  type LlmServiceManager,
  type Logger,
} from "@llm-switchboard/core";
import { ResponseFormatError } from "./errors.js";

const FEATURE = "completion";

const MARKDOWN_INSTRUCTION = "Format your response in clean, well-structured Markdown.";

/** Strip a Markdown code fence some models wrap around JSON. */
function unfence(text: string): string {
  const match = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/.exec(text.trim());
  return match?.[1] ?? text.trim();
}

export class CompletionService {
  private readonly manager: LlmServiceManager;
  private readonly logger: Logger;

  constructor(manager: LlmServiceManager, options: { logger?: Logger } = {}) {
    this.manager = manager;
    this.logger = options.logger ?? silentLogger;
  }

  complete(prompt: string, options: ChatOptionsInit = {}): Promise<CompletionResponse> {
    return this.manager.complete(prompt, createChatOptions(options), { feature: FEATURE });
  }

  /**
   * Ask for JSON and parse the answer. With a schema the parsed value is
   * validated too.
   *
   * @throws {ResponseFormatError} when the answer is not valid JSON or fails the schema.
   */
  completeJson(prompt: string, options?: ChatOptionsInit): Promise<unknown>;
  completeJson<T>(
    prompt: string,
    options: ChatOptionsInit | undefined,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T>;
  async completeJson(
    prompt: string,
    options: ChatOptionsInit = {},
    schema?: z.ZodType<unknown, z.ZodTypeDef, unknown>,
  ): Promise<unknown> {
    const response = await this.complete(prompt, {
      ...options,
      response_format: ResponseFormat.JSON,
    });

    const parsed = parseJson(unfence(response.content));
    if (parsed === undefined) {
      this.logger.warn("Model returned invalid JSON", { provider: response.provider });
      throw new ResponseFormatError("Failed to decode JSON response", response.content, {
        provider: response.provider,
      });
    }
    if (!schema) return parsed;

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new ResponseFormatError(
        `JSON response does not match the expected shape: ${result.error.message}`,
        response.content,
        { provider: response.provider, cause: result.error },
      );
    }
    return result.data;
  }

  /** Markdown-formatted answer text. */
  async completeMarkdown(prompt: string, options: ChatOptionsInit = {}): Promise<string> {
    const systemPrompt = [options.system_prompt ?? "", MARKDOWN_INSTRUCTION].join("\n\n").trim();
    const response = await this.complete(prompt, {
      ...options,
      response_format: ResponseFormat.MARKDOWN,
      system_prompt: systemPrompt,
    });
    return response.content;
  }

  /** Low temperature unless the caller sets one. */
  completeFactual(prompt: string, options: ChatOptionsInit = {}): Promise<CompletionResponse> {
    return this.complete(prompt, {
      ...options,
      temperature: options.temperature ?? 0.2,
      top_p: options.top_p ?? 0.9,
    });
  }

  completeCreative(prompt: string, options: ChatOptionsInit = {}): Promise<CompletionResponse> {
    return this.complete(prompt, {
      ...options,
      temperature: options.temperature ?? 1.2,
      top_p: options.top_p ?? 1.0,
      presence_penalty: options.presence_penalty ?? 0.6,
    });
  }
}
