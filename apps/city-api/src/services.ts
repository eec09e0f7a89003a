/**
 * Service wiring
 *
 * Builds every service the routes need from AppConfig. Tests build the same
 * container by hand around a memory store and fakes.
 */

import { COLLECTIONS, TranslationFailedError } from '@cityscope/types';
import type { DocumentStore, QueryTranslator } from '@cityscope/types';
import { CollectionRepository, GeoTaggedRepository, createDocumentStore } from '@cityscope/store';
import { ProximitySearch } from '@cityscope/proximity';
import { NewsAggregator, NewsFeedCache, ProviderRegistry, createProviderRegistry } from '@cityscope/news';
import { SemanticPostSearch, SemanticQueryTranslator, createCompletionBackend } from '@cityscope/query-translator';
import type { AppConfig } from './config.js';

export interface Repositories {
    users: CollectionRepository;
    pois: GeoTaggedRepository;
    institutions: GeoTaggedRepository;
    posts: GeoTaggedRepository;
    news: CollectionRepository;
}

export interface Services {
    store: DocumentStore;
    repositories: Repositories;
    proximity: ProximitySearch;
    providers: ProviderRegistry;
    news: NewsAggregator;
    postSearch: SemanticPostSearch;
}

export function createRepositories(store: DocumentStore): Repositories {
    return {
        users: new CollectionRepository(store, COLLECTIONS.users),
        pois: new GeoTaggedRepository(store, COLLECTIONS.pois),
        institutions: new GeoTaggedRepository(store, COLLECTIONS.institutions),
        posts: new GeoTaggedRepository(store, COLLECTIONS.posts),
        news: new CollectionRepository(store, COLLECTIONS.news),
    };
}

/**
 * Assemble services around an existing store, provider registry and
 * translator.
 */
export function buildServices(
    store: DocumentStore,
    providers: ProviderRegistry,
    translator: QueryTranslator,
    news: { timeoutMs?: number; defaultQuery?: string } = {}
): Services {
    return {
        store,
        repositories: createRepositories(store),
        proximity: new ProximitySearch(store),
        providers,
        news: new NewsAggregator(providers, {
            timeoutMs: news.timeoutMs,
            defaultQuery: news.defaultQuery,
            cache: new NewsFeedCache(),
        }),
        postSearch: new SemanticPostSearch(store, translator),
    };
}

export function createServices(config: AppConfig): Services {
    const store = createDocumentStore(config.store);
    const providers = createProviderRegistry(config.news.keys, {
        country: config.news.country,
        language: config.news.language,
    });

    return buildServices(store, providers, createTranslator(config.llm), {
        timeoutMs: config.news.timeoutMs,
        defaultQuery: config.news.defaultQuery,
    });
}

/**
 * A translator for the configured backend. Without a usable backend every
 * translation fails, so post search runs on its keyword fallback.
 */
function createTranslator(llm: AppConfig['llm']): QueryTranslator {
    try {
        const backend = createCompletionBackend(llm);
        console.log(`[Translator] Using ${backend.name} completion backend`);
        return new SemanticQueryTranslator(backend, { timeoutMs: llm.timeoutMs });
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[Translator] ✗ No completion backend (${reason}); AI search uses keyword matching`);
        return {
            translate: async () => {
                throw new TranslationFailedError(`No completion backend: ${reason}`);
            },
        };
    }
}
