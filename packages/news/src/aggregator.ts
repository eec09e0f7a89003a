/**
 * News Aggregator
 *
 * Queries every selected provider concurrently, each under its own time
 * budget, then merges, deduplicates, time-sorts and paginates the combined
 * feed. A provider that fails contributes nothing; the search itself only
 * fails on invalid input.
 */

import { InvalidQueryError, ProviderFetchFailedError } from '@cityscope/types';
import type {
    NewsFeed,
    NewsItem,
    NewsProvider,
    NewsProviderName,
    NewsSearchRequest,
} from '@cityscope/types';
import { ProviderRegistry } from './registry.js';
import { NewsFeedCache } from './feed-cache.js';
import { publishedAtMillis } from './published-at.js';

export const DEFAULT_PROVIDER_TIMEOUT_MS = 10_000;
export const MAX_PAGE_SIZE = 50;
/** Upper bound on items requested from a single provider */
export const MAX_FETCH_DEPTH = 100;

export interface NewsAggregatorOptions {
    /** Timeout per provider in ms (default 10000) */
    timeoutMs?: number;
    /** Used when the caller's query is blank */
    defaultQuery?: string;
    cache?: NewsFeedCache;
    /**
     * Items requested from each provider, the same for every page, so all
     * pages of a search are slices of one feed (default and maximum 100)
     */
    feedDepth?: number;
}

export class NewsAggregator {
    private registry: ProviderRegistry;
    private timeoutMs: number;
    private defaultQuery: string;
    private cache?: NewsFeedCache;
    private feedDepth: number;

    constructor(registry: ProviderRegistry, options: NewsAggregatorOptions = {}) {
        this.registry = registry;
        this.timeoutMs = options.timeoutMs || DEFAULT_PROVIDER_TIMEOUT_MS;
        this.defaultQuery = options.defaultQuery || '';
        this.cache = options.cache;
        this.feedDepth = Math.min(options.feedDepth || MAX_FETCH_DEPTH, MAX_FETCH_DEPTH);
    }

    /**
     * One page of the aggregate feed. Throws InvalidQueryError for a bad page
     * or page size and InvalidProviderError for an unknown provider filter,
     * both before any provider is contacted.
     */
    async search(request: NewsSearchRequest, requestId: string = 'news'): Promise<NewsItem[]> {
        validatePaging(request.page, request.pageSize);
        const providers = this.registry.resolve(request.provider);

        const filter = request.provider === undefined ? 'all' : providers[0].name;
        const query = request.query.trim() || this.defaultQuery;
        const depth = this.feedDepth;
        const cacheKey = NewsFeedCache.key(filter, query);

        let feed = this.cache?.get(cacheKey, depth) ?? null;
        if (feed) {
            console.log(`[${requestId}] [NewsAggregator] Cache hit for "${query}" (depth ${feed.depth})`);
        } else {
            feed = await this.collect(query, providers, depth, filter, requestId);
            this.cache?.set(cacheKey, feed);
        }

        return paginate(feed.items, request.page, request.pageSize);
    }

    /**
     * Fetch, merge, deduplicate and sort the feed of the given providers.
     */
    async collect(
        query: string,
        providers: NewsProvider[],
        depth: number,
        filter: NewsProviderName | 'all',
        requestId: string
    ): Promise<NewsFeed> {
        const startTime = Date.now();
        console.log(`[${requestId}] [NewsAggregator] "${query}" across [${providers.map(p => p.name).join(', ')}], depth ${depth}`);

        const settled = await Promise.allSettled(
            providers.map(provider => this.fetchProvider(provider, query, depth, requestId))
        );

        const providerCounts: Partial<Record<NewsProviderName, number>> = {};
        const batches: NewsItem[][] = settled.map((result, index) => {
            const provider = providers[index];
            if (result.status === 'fulfilled') {
                providerCounts[provider.name] = result.value.length;
                return result.value;
            }
            providerCounts[provider.name] = 0;
            const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
            console.warn(`[${requestId}] [NewsAggregator:${provider.name}] ✗ ${reason}`);
            return [];
        });

        const merged = dedupeNewsItems(batches.flat());
        const items = sortByPublishedAt(merged);

        console.log(`[${requestId}] [NewsAggregator] ${items.length} unique items (${Date.now() - startTime}ms)`);

        return { query, provider: filter, depth, items, providerCounts };
    }

    private async fetchProvider(
        provider: NewsProvider,
        query: string,
        limit: number,
        requestId: string
    ): Promise<NewsItem[]> {
        if (!provider.isConfigured()) {
            console.log(`[${requestId}] [NewsAggregator:${provider.name}] No API key configured, skipping`);
            return [];
        }

        const startTime = Date.now();
        const controller = new AbortController();
        let timer: ReturnType<typeof setTimeout> | undefined;

        // The abort covers fetches that honour the signal; the race covers those that don't
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new ProviderFetchFailedError(provider.name, `Timed out after ${this.timeoutMs}ms`));
            }, this.timeoutMs);
        });

        try {
            const items = await Promise.race([
                provider.search({ query, limit, signal: controller.signal, requestId }),
                timeout,
            ]);
            console.log(`[${requestId}] [NewsAggregator:${provider.name}] ✓ ${items.length} items (${Date.now() - startTime}ms)`);
            return items;
        } finally {
            clearTimeout(timer);
        }
    }
}

/**
 * Drop items whose identity was already seen. Stable: the first occurrence
 * wins and relative order is kept.
 */
export function dedupeNewsItems(items: NewsItem[]): NewsItem[] {
    const seen = new Set<string>();
    const unique: NewsItem[] = [];

    for (const item of items) {
        if (seen.has(item.identity)) continue;
        seen.add(item.identity);
        unique.push(item);
    }

    return unique;
}

/**
 * Newest first; items without a parseable timestamp keep their relative
 * order at the end.
 */
export function sortByPublishedAt(items: NewsItem[]): NewsItem[] {
    return items
        .map((item, index) => ({ item, index, time: publishedAtMillis(item.publishedAt) }))
        .sort((a, b) => {
            const aMissing = Number.isNaN(a.time);
            const bMissing = Number.isNaN(b.time);
            if (aMissing || bMissing) {
                if (aMissing && bMissing) return a.index - b.index;
                return aMissing ? 1 : -1;
            }
            return b.time - a.time || a.index - b.index;
        })
        .map(entry => entry.item);
}

export function paginate<T>(items: T[], page: number, pageSize: number): T[] {
    const start = (page - 1) * pageSize;
    return items.slice(start, start + pageSize);
}

function validatePaging(page: number, pageSize: number): void {
    if (!Number.isInteger(page) || page < 1) {
        throw new InvalidQueryError(`page must be an integer ≥ 1, got ${page}`);
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
        throw new InvalidQueryError(`pageSize must be an integer in [1, ${MAX_PAGE_SIZE}], got ${pageSize}`);
    }
}
