/**
 * Image analysis: alt text, titles, descriptions and custom prompts, for a
 * single image URL or a batch.
 */

import {
  imagePart,
  textPart,
  createVisionOptions,
  type LlmServiceManager,
  type VisionOptionsInit,
  type VisionResponse,
} from "@llm-switchboard/core";
import { InvalidInputError } from "./errors.js";

const FEATURE = "vision";

export const VisionPrompts = {
  ALT_TEXT:
    "Generate a concise alt text for this image, under 125 characters, focused on essential information for screen readers. Be descriptive but brief.",
  TITLE:
    "Generate an SEO-optimized title for this image, under 60 characters, that is compelling and keyword-rich for search rankings.",
  DESCRIPTION:
    "Provide a comprehensive description of this image including subjects, setting, colors, mood, composition, and notable details.",
} as const;

const DATA_IMAGE = /^data:image\/(png|jpeg|jpg|gif|webp);base64,/;

/** http(s) URLs and base64 image data URLs. */
export function isValidImageUrl(url: string): boolean {
  if (DATA_IMAGE.test(url)) return true;
  if (!URL.canParse(url)) return false;
  const { protocol } = new URL(url);
  return protocol === "http:" || protocol === "https:";
}

export class VisionService {
  private readonly manager: LlmServiceManager;

  constructor(manager: LlmServiceManager) {
    this.manager = manager;
  }

  generateAltText(imageUrl: string, options?: VisionOptionsInit): Promise<string>;
  generateAltText(imageUrls: readonly string[], options?: VisionOptionsInit): Promise<string[]>;
  generateAltText(
    image: string | readonly string[],
    options: VisionOptionsInit = {},
  ): Promise<string | string[]> {
    return this.run(image, VisionPrompts.ALT_TEXT, {
      ...options,
      max_tokens: options.max_tokens ?? 100,
      temperature: options.temperature ?? 0.5,
    });
  }

  generateTitle(imageUrl: string, options?: VisionOptionsInit): Promise<string>;
  generateTitle(imageUrls: readonly string[], options?: VisionOptionsInit): Promise<string[]>;
  generateTitle(
    image: string | readonly string[],
    options: VisionOptionsInit = {},
  ): Promise<string | string[]> {
    return this.run(image, VisionPrompts.TITLE, {
      ...options,
      max_tokens: options.max_tokens ?? 50,
      temperature: options.temperature ?? 0.7,
    });
  }

  generateDescription(imageUrl: string, options?: VisionOptionsInit): Promise<string>;
  generateDescription(imageUrls: readonly string[], options?: VisionOptionsInit): Promise<string[]>;
  generateDescription(
    image: string | readonly string[],
    options: VisionOptionsInit = {},
  ): Promise<string | string[]> {
    return this.run(image, VisionPrompts.DESCRIPTION, {
      ...options,
      max_tokens: options.max_tokens ?? 500,
      temperature: options.temperature ?? 0.7,
    });
  }

  analyzeImage(imageUrl: string, prompt: string, options?: VisionOptionsInit): Promise<string>;
  analyzeImage(
    imageUrls: readonly string[],
    prompt: string,
    options?: VisionOptionsInit,
  ): Promise<string[]>;
  analyzeImage(
    image: string | readonly string[],
    prompt: string,
    options: VisionOptionsInit = {},
  ): Promise<string | string[]> {
    return this.run(image, prompt, options);
  }

  /**
   * Full response for one image.
   *
   * @throws {InvalidInputError} for anything but an http(s) or image data URL.
   */
  async analyzeImageFull(
    imageUrl: string,
    prompt: string,
    options: VisionOptionsInit = {},
  ): Promise<VisionResponse> {
    if (!isValidImageUrl(imageUrl)) {
      throw new InvalidInputError("Invalid image URL or base64 data URI");
    }
    const resolved = createVisionOptions(options);
    const content = [textPart(prompt), imagePart(imageUrl, resolved.detail_level)];
    return this.manager.vision(content, resolved, { feature: FEATURE });
  }

  private async run(
    image: string | readonly string[],
    prompt: string,
    options: VisionOptionsInit,
  ): Promise<string | string[]> {
    if (typeof image === "string") {
      return (await this.analyzeImageFull(image, prompt, options)).description;
    }
    // sequential, in input order
    const results: string[] = [];
    for (const url of image) {
      results.push((await this.analyzeImageFull(url, prompt, options)).description);
    }
    return results;
  }
}
