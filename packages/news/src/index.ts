/**
 * CityScope News Package
 *
 * Provider framework, provider implementations and the aggregator.
 */

export {
    NewsAggregator,
    dedupeNewsItems,
    sortByPublishedAt,
    paginate,
    DEFAULT_PROVIDER_TIMEOUT_MS,
    MAX_PAGE_SIZE,
    MAX_FETCH_DEPTH,
    type NewsAggregatorOptions,
} from './aggregator.js';
export { ProviderRegistry, isNewsProviderName } from './registry.js';
export { NewsFeedCache, type CachedFeed, type NewsFeedCacheOptions } from './feed-cache.js';
export { parsePublishedAt, normalizePublishedAt, publishedAtMillis } from './published-at.js';
export {
    createProviderRegistry,
    normalizeResponse,
    NewsApiProvider,
    SerpApiProvider,
    SerperProvider,
    NewsApiResponseSchema,
    SerpApiResponseSchema,
    SerperResponseSchema,
    TITLE_PLACEHOLDER,
    PROVIDER_DISPLAY_NAMES,
    type RawProviderResponse,
    type RegionOptions,
} from './providers/index.js';
