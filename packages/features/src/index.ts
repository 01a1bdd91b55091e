/**
 * @llm-switchboard/features: task-level services built on the orchestrator.
 */

export { InvalidInputError, ResponseFormatError } from "./errors.js";
export { CompletionService } from "./completion.js";
export { EmbeddingService } from "./embedding.js";
export type { SimilarityMatch } from "./embedding.js";
export { VisionService, VisionPrompts, isValidImageUrl } from "./vision.js";
export { TranslationService, buildTranslationPrompt, languageName } from "./translation.js";
