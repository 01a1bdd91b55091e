/**
 * LLM-backed translation with language detection and quality scoring.
 *
 * Prompts carry the domain, formality, glossary and context from
 * `TranslationOptions`; confidence is derived from the finish reason.
 */

import {
  FinishReason,
  Formality,
  TranslationDomain,
  TranslationResult,
  createChatOptions,
  createTranslationOptions,
  isEnumValue,
  systemMessage,
  userMessage,
  type ChatOptions,
  type LlmServiceManager,
  type TranslationOptions,
  type TranslationOptionsInit,
} from "@llm-switchboard/core";
import { InvalidInputError } from "./errors.js";

const FEATURE = "translation";

const LANGUAGE_CODE = /^[a-z]{2}(-[A-Z]{2})?$/;

const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  en: "English",
  de: "German",
  fr: "French",
  es: "Spanish",
  it: "Italian",
  pt: "Portuguese",
  nl: "Dutch",
  pl: "Polish",
  ru: "Russian",
  ja: "Japanese",
  zh: "Chinese",
  ko: "Korean",
  ar: "Arabic",
};

const DETECT_SYSTEM_PROMPT =
  'You are a language detection expert. Respond with ONLY the ISO 639-1 language code (e.g., "en", "de", "fr"). No explanation.';

const QUALITY_SYSTEM_PROMPT =
  'You are a translation quality expert. Evaluate the translation quality based on accuracy, fluency, and consistency. Respond with ONLY a number between 0.0 and 1.0 (e.g., "0.85"). No explanation.';

/** English name for a language code; unknown codes are returned as is. */
export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}

function validateLanguageCode(code: string): void {
  if (!LANGUAGE_CODE.test(code)) {
    throw new InvalidInputError(
      `Invalid language code "${code}"; expected ISO 639-1, e.g. "en" or "en-US"`,
    );
  }
}

function validateOptions(init: TranslationOptionsInit): void {
  if (init.formality !== undefined && !isEnumValue(Formality, init.formality)) {
    throw new InvalidInputError(
      `Invalid formality "${init.formality}"; expected one of ${Object.values(Formality).join(", ")}`,
    );
  }
  if (init.domain !== undefined && !isEnumValue(TranslationDomain, init.domain)) {
    throw new InvalidInputError(
      `Invalid domain "${init.domain}"; expected one of ${Object.values(TranslationDomain).join(", ")}`,
    );
  }
}

/** System prompt for one translation request. */
export function buildTranslationPrompt(
  source: string,
  target: string,
  options: TranslationOptions,
): string {
  let prompt = `You are a professional ${options.domain} translator. Translate the following text from ${languageName(source)} to ${languageName(target)}.\n`;

  if (options.formality !== Formality.DEFAULT) {
    prompt += `Maintain ${options.formality} tone.\n`;
  }
  if (options.preserve_formatting) {
    prompt += "Preserve all formatting, HTML tags, markdown, and special characters.\n";
  }
  if (options.glossary) {
    prompt += "\nUse these exact term translations:\n";
    for (const [term, translation] of Object.entries(options.glossary)) {
      prompt += `- ${term} → ${translation}\n`;
    }
  }
  if (options.context) {
    prompt += `\nContext (for reference only):\n${options.context}\n`;
  }

  return `${prompt}\nProvide ONLY the translation, no explanations or notes.`;
}

function confidenceFor(finishReason: string): number {
  switch (finishReason) {
    case FinishReason.STOP:
      return 0.9;
    case FinishReason.LENGTH:
      return 0.6;
    default:
      return 0.5;
  }
}

export class TranslationService {
  private readonly manager: LlmServiceManager;

  constructor(manager: LlmServiceManager) {
    this.manager = manager;
  }

  /**
   * Translate `text` into `target`. Without `source` the language is
   * detected first, which costs one extra call.
   *
   * @throws {InvalidInputError} on empty text, a malformed language code or
   *   an unknown formality or domain.
   */
  async translate(
    text: string,
    target: string,
    source?: string,
    init: TranslationOptionsInit = {},
  ): Promise<TranslationResult> {
    if (text === "") {
      throw new InvalidInputError("Text cannot be empty");
    }
    validateLanguageCode(target);
    if (source !== undefined) validateLanguageCode(source);
    validateOptions(init);

    const options = createTranslationOptions(init);
    const sourceLanguage = source ?? (await this.detectLanguage(text, init));

    const response = await this.manager.chat(
      [
        systemMessage(buildTranslationPrompt(sourceLanguage, target, options)),
        userMessage(`Translate this text:\n\n${text}`),
      ],
      createChatOptions({
        provider: options.provider,
        model: options.model,
        temperature: options.temperature ?? 0.3,
        max_tokens: options.max_tokens ?? 2000,
      }),
      { feature: FEATURE, characters: text.length },
    );

    return new TranslationResult({
      translation: response.content,
      source_language: sourceLanguage,
      target_language: target,
      confidence: confidenceFor(response.finish_reason),
      usage: response.usage,
      metadata: { provider: response.provider, model: response.model },
    });
  }

  /** Sequential; results keep the input order. */
  async translateBatch(
    texts: readonly string[],
    target: string,
    source?: string,
    init: TranslationOptionsInit = {},
  ): Promise<TranslationResult[]> {
    const results: TranslationResult[] = [];
    for (const text of texts) {
      results.push(await this.translate(text, target, source, init));
    }
    return results;
  }

  /** ISO 639-1 code of `text`; "en" when the model answers with anything else. */
  async detectLanguage(text: string, init: TranslationOptionsInit = {}): Promise<string> {
    const response = await this.manager.chat(
      [systemMessage(DETECT_SYSTEM_PROMPT), userMessage(`Detect the language of this text:\n\n${text}`)],
      this.shortAnswerOptions(init),
      { feature: FEATURE },
    );

    const detected = response.content.trim().toLowerCase();
    return /^[a-z]{2}$/.test(detected) ? detected : "en";
  }

  /** Model-judged quality in [0, 1]; an unparseable answer scores 0. */
  async scoreTranslationQuality(
    sourceText: string,
    translatedText: string,
    target: string,
    init: TranslationOptionsInit = {},
  ): Promise<number> {
    const response = await this.manager.chat(
      [
        systemMessage(QUALITY_SYSTEM_PROMPT),
        userMessage(
          `Source text:\n${sourceText}\n\nTranslation to ${target}:\n${translatedText}\n\nQuality score:`,
        ),
      ],
      this.shortAnswerOptions(init),
      { feature: FEATURE },
    );

    const score = Number.parseFloat(response.content.trim());
    if (Number.isNaN(score)) return 0;
    return Math.min(1, Math.max(0, score));
  }

  private shortAnswerOptions(init: TranslationOptionsInit): ChatOptions {
    return createChatOptions({
      provider: init.provider,
      model: init.model,
      temperature: 0.1,
      max_tokens: 10,
    });
  }
}
