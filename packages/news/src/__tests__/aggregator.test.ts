import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InvalidProviderError, InvalidQueryError, ProviderFetchFailedError } from '@cityscope/types';
import type { NewsItem, NewsProvider, NewsProviderName, NewsSearchContext } from '@cityscope/types';
import { NewsAggregator, dedupeNewsItems, sortByPublishedAt, paginate } from '../aggregator.js';
import { ProviderRegistry } from '../registry.js';
import { NewsFeedCache } from '../feed-cache.js';
import { createProviderRegistry } from '../providers/index.js';

function makeItem(provider: NewsProviderName, title: string, url: string | null, publishedAt: string | null): NewsItem {
    return {
        identity: url ?? title,
        title,
        description: null,
        url,
        source: 'Test Wire',
        imageUrl: null,
        publishedAt,
        originProvider: provider,
    };
}

class FakeProvider implements NewsProvider {
    readonly displayName: string;
    readonly calls: NewsSearchContext[] = [];

    constructor(
        readonly name: NewsProviderName,
        private respond: (context: NewsSearchContext) => Promise<NewsItem[]>,
        private configured = true
    ) {
        this.displayName = `Fake ${name}`;
    }

    isConfigured(): boolean {
        return this.configured;
    }

    search(context: NewsSearchContext): Promise<NewsItem[]> {
        this.calls.push(context);
        return this.respond(context);
    }
}

function registryOf(...providers: NewsProvider[]): ProviderRegistry {
    const registry = new ProviderRegistry();
    for (const provider of providers) registry.register(provider);
    return registry;
}

describe('NewsAggregator', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    it('merges duplicate URLs across providers, keeping the first occurrence', async () => {
        const newsapi = new FakeProvider('newsapi', async () => [
            makeItem('newsapi', 'Port expansion approved', 'https://example.com/port', '2025-03-10T10:00:00.000Z'),
        ]);
        const serper = new FakeProvider('serper', async () => [
            makeItem('serper', 'Port expansion gets green light', 'https://example.com/port', '2025-03-10T12:00:00.000Z'),
            makeItem('serper', 'Market reopens', 'https://example.com/market', '2025-03-09T09:00:00.000Z'),
        ]);
        const aggregator = new NewsAggregator(registryOf(newsapi, serper));

        const items = await aggregator.search({ query: 'port', page: 1, pageSize: 10 });

        expect(items.map(i => i.url)).toEqual(['https://example.com/port', 'https://example.com/market']);
        expect(items[0].title).toBe('Port expansion approved');
        expect(items[0].originProvider).toBe('newsapi');
    });

    it('paginates the aggregate into disjoint, order-preserving pages', async () => {
        const newsapi = new FakeProvider('newsapi', async () => [
            makeItem('newsapi', 'Four', 'https://example.com/4', '2025-03-04T00:00:00.000Z'),
            makeItem('newsapi', 'Two', 'https://example.com/2', '2025-03-02T00:00:00.000Z'),
        ]);
        const serpapi = new FakeProvider('serpapi', async () => [
            makeItem('serpapi', 'Three', 'https://example.com/3', '2025-03-03T00:00:00.000Z'),
            makeItem('serpapi', 'One', 'https://example.com/1', '2025-03-01T00:00:00.000Z'),
        ]);
        const aggregator = new NewsAggregator(registryOf(newsapi, serpapi));

        const first = await aggregator.search({ query: 'city', page: 1, pageSize: 2 });
        const second = await aggregator.search({ query: 'city', page: 2, pageSize: 2 });

        expect(first.map(i => i.title)).toEqual(['Four', 'Three']);
        expect(second.map(i => i.title)).toEqual(['Two', 'One']);
        expect(newsapi.calls.map(c => c.limit)).toEqual([100, 100]);
    });

    it('returns [] for a named provider without an API key', async () => {
        const fetchSpy = vi.spyOn(globalThis, 'fetch');
        const registry = createProviderRegistry({}, { country: 'cm', language: 'en' });
        const aggregator = new NewsAggregator(registry);

        const items = await aggregator.search({ query: 'Douala', page: 1, pageSize: 20, provider: 'newsapi' });

        expect(items).toEqual([]);
        expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('rejects an unknown provider before dispatching', async () => {
        const newsapi = new FakeProvider('newsapi', async () => []);
        const aggregator = new NewsAggregator(registryOf(newsapi));

        await expect(aggregator.search({ query: 'x', page: 1, pageSize: 5, provider: 'gazette' }))
            .rejects.toBeInstanceOf(InvalidProviderError);
        expect(newsapi.calls).toHaveLength(0);
    });

    it('rejects invalid paging', async () => {
        const newsapi = new FakeProvider('newsapi', async () => []);
        const aggregator = new NewsAggregator(registryOf(newsapi));

        await expect(aggregator.search({ query: 'x', page: 0, pageSize: 5 })).rejects.toBeInstanceOf(InvalidQueryError);
        await expect(aggregator.search({ query: 'x', page: 1, pageSize: 51 })).rejects.toBeInstanceOf(InvalidQueryError);
        await expect(aggregator.search({ query: 'x', page: 1, pageSize: 0 })).rejects.toBeInstanceOf(InvalidQueryError);
        expect(newsapi.calls).toHaveLength(0);
    });

    it('absorbs a failing provider', async () => {
        const newsapi = new FakeProvider('newsapi', async () => {
            throw new ProviderFetchFailedError('newsapi', 'API error: 500');
        });
        const serper = new FakeProvider('serper', async () => [
            makeItem('serper', 'Still here', 'https://example.com/ok', '2025-03-01T00:00:00.000Z'),
        ]);
        const aggregator = new NewsAggregator(registryOf(newsapi, serper));

        const feed = await aggregator.collect('x', [newsapi, serper], 10, 'all', 'test');

        expect(feed.items.map(i => i.title)).toEqual(['Still here']);
        expect(feed.providerCounts).toEqual({ newsapi: 0, serper: 1 });
    });

    it('aborts and drops a provider that exceeds its timeout', async () => {
        const slow = new FakeProvider('serpapi', () => new Promise<NewsItem[]>(() => undefined));
        const fast = new FakeProvider('serper', async () => [
            makeItem('serper', 'Fast', 'https://example.com/fast', null),
        ]);
        const aggregator = new NewsAggregator(registryOf(slow, fast), { timeoutMs: 20 });

        const items = await aggregator.search({ query: 'x', page: 1, pageSize: 10 });

        expect(items.map(i => i.title)).toEqual(['Fast']);
        expect(slow.calls[0].signal.aborted).toBe(true);
    });

    it('skips unconfigured providers without calling them', async () => {
        const unconfigured = new FakeProvider('newsapi', async () => [], false);
        const aggregator = new NewsAggregator(registryOf(unconfigured));

        expect(await aggregator.search({ query: 'x', page: 1, pageSize: 10 })).toEqual([]);
        expect(unconfigured.calls).toHaveLength(0);
    });

    it('substitutes the default query for a blank one', async () => {
        const newsapi = new FakeProvider('newsapi', async () => []);
        const aggregator = new NewsAggregator(registryOf(newsapi), { defaultQuery: 'Cameroon' });

        await aggregator.search({ query: '   ', page: 1, pageSize: 10 });

        expect(newsapi.calls[0].query).toBe('Cameroon');
    });

    it('serves every page of a search from one cached fetch', async () => {
        const newsapi = new FakeProvider('newsapi', async () => [
            makeItem('newsapi', 'B', 'https://example.com/b', '2025-03-02T00:00:00.000Z'),
            makeItem('newsapi', 'A', 'https://example.com/a', '2025-03-01T00:00:00.000Z'),
        ]);
        const aggregator = new NewsAggregator(registryOf(newsapi), { cache: new NewsFeedCache() });

        const second = await aggregator.search({ query: 'x', page: 2, pageSize: 1 });
        const first = await aggregator.search({ query: 'X ', page: 1, pageSize: 1 });

        expect(second.map(i => i.title)).toEqual(['A']);
        expect(first.map(i => i.title)).toEqual(['B']);
        expect(newsapi.calls).toHaveLength(1);
    });

    it('keeps pages disjoint when providers answer in relevance order', async () => {
        const relevanceOrdered = (name: NewsProviderName, items: NewsItem[]) =>
            new FakeProvider(name, async context => items.slice(0, context.limit));
        const newsapi = relevanceOrdered('newsapi', [
            makeItem('newsapi', 'A-old', 'https://example.com/a-old', '2025-01-15T00:00:00.000Z'),
            makeItem('newsapi', 'A-new', 'https://example.com/a-new', '2025-03-15T00:00:00.000Z'),
        ]);
        const serper = relevanceOrdered('serper', [
            makeItem('serper', 'B-mid', 'https://example.com/b-mid', '2025-02-15T00:00:00.000Z'),
            makeItem('serper', 'B-older', 'https://example.com/b-older', '2024-12-15T00:00:00.000Z'),
        ]);
        const aggregator = new NewsAggregator(registryOf(newsapi, serper), { cache: new NewsFeedCache() });

        const pages: string[] = [];
        for (let page = 1; page <= 4; page++) {
            const items = await aggregator.search({ query: 'city', page, pageSize: 1 });
            pages.push(...items.map(i => i.title));
        }

        expect(pages).toEqual(['A-new', 'B-mid', 'A-old', 'B-older']);
        expect(newsapi.calls.map(c => c.limit)).toEqual([100]);
    });

    it('returns an empty page past the fetched feed', async () => {
        const newsapi = new FakeProvider('newsapi', async context => [
            makeItem('newsapi', 'One', 'https://example.com/1', '2025-03-01T00:00:00.000Z'),
            makeItem('newsapi', 'Two', 'https://example.com/2', '2025-03-02T00:00:00.000Z'),
            makeItem('newsapi', 'Three', 'https://example.com/3', '2025-03-03T00:00:00.000Z'),
        ].slice(0, context.limit));
        const aggregator = new NewsAggregator(registryOf(newsapi), { feedDepth: 2 });

        expect((await aggregator.search({ query: 'x', page: 1, pageSize: 2 })).map(i => i.title)).toEqual(['Two', 'One']);
        expect(await aggregator.search({ query: 'x', page: 2, pageSize: 2 })).toEqual([]);
        expect(newsapi.calls.map(c => c.limit)).toEqual([2, 2]);
    });
});

describe('feed helpers', () => {
    it('dedupes on identity, falling back to title when there is no url', () => {
        const items = [
            makeItem('newsapi', 'Same headline', null, null),
            makeItem('serper', 'Same headline', null, null),
            makeItem('serper', 'Same headline', 'https://example.com/x', null),
        ];

        const unique = dedupeNewsItems(items);

        expect(unique.map(i => i.originProvider)).toEqual(['newsapi', 'serper']);
        expect(unique[1].url).toBe('https://example.com/x');
    });

    it('sorts newest first with unparseable timestamps last in original order', () => {
        const items = [
            makeItem('newsapi', 'raw', 'u1', 'recently'),
            makeItem('newsapi', 'old', 'u2', '2025-01-01T00:00:00.000Z'),
            makeItem('newsapi', 'none', 'u3', null),
            makeItem('newsapi', 'new', 'u4', '2025-02-01T00:00:00.000Z'),
        ];

        expect(sortByPublishedAt(items).map(i => i.title)).toEqual(['new', 'old', 'raw', 'none']);
    });

    it('returns an empty page past the end', () => {
        expect(paginate([1, 2, 3], 2, 2)).toEqual([3]);
        expect(paginate([1, 2, 3], 3, 2)).toEqual([]);
    });
});
