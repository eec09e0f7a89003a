/**
 * Provider Registry Factory
 *
 * Creates a ProviderRegistry with every news provider registered. Providers
 * without a key are still registered so they can be named in a filter; they
 * contribute nothing.
 */

import type { NewsProviderKeys } from '@cityscope/types';
import { ProviderRegistry } from '../registry.js';
import { NewsApiProvider, type RegionOptions } from './newsapi.js';
import { SerpApiProvider } from './serpapi.js';
import { SerperProvider } from './serper.js';

export function createProviderRegistry(keys: NewsProviderKeys, region: RegionOptions): ProviderRegistry {
    const registry = new ProviderRegistry();

    registry.register(new NewsApiProvider(keys.newsapi, region));
    registry.register(new SerpApiProvider(keys.serpapi, region));
    registry.register(new SerperProvider(keys.serper, region));

    return registry;
}

export { NewsApiProvider, NewsApiResponseSchema, type RegionOptions } from './newsapi.js';
export { SerpApiProvider, SerpApiResponseSchema } from './serpapi.js';
export { SerperProvider, SerperResponseSchema } from './serper.js';
export {
    normalizeResponse,
    normalizeNewsApi,
    normalizeSerpApi,
    normalizeSerper,
    type RawProviderResponse,
} from './normalize.js';
export { TITLE_PLACEHOLDER, PROVIDER_DISPLAY_NAMES } from './http.js';
