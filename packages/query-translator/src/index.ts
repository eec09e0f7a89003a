/**
 * CityScope Query Translator Package
 *
 * Natural-language post search: completion backends, the translator and the
 * store-backed search that consumes its filters.
 */

export { SemanticQueryTranslator, DEFAULT_TRANSLATION_TIMEOUT_MS, type TranslatorOptions } from './translator.js';
export { buildTranslationPrompt, KNOWN_POST_TYPES } from './prompt-builder.js';
export { extractFirstJsonObject, parseStructuredFilter } from './parser.js';
export { parseTimeWindow, timeWindowStart } from './time-window.js';
export { readInstitutionPost } from './post-record.js';
export {
    SemanticPostSearch,
    buildPostFilters,
    matchesKeywords,
    fallbackFilter,
    MAX_SEMANTIC_RESULTS,
    DEFAULT_SEMANTIC_RADIUS_M,
    type SemanticSearchRequest,
    type SemanticSearchResponse,
    type SemanticPostSearchOptions,
    type PostSearchResult,
} from './semantic-post-search.js';
export {
    createCompletionBackend,
    GeminiBackend,
    OllamaBackend,
    type CompletionBackendConfig,
    type GeminiBackendOptions,
    type OllamaBackendOptions,
} from './backends/index.js';
