import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MemoryDocumentStore } from '@cityscope/store';
import {
    COLLECTIONS,
    InvalidCoordinateError,
    InvalidQueryError,
    StoreUnavailableError,
    TranslationFailedError,
} from '@cityscope/types';
import type { QueryTranslator, StoredDocument, StructuredFilter } from '@cityscope/types';
import { SemanticPostSearch, fallbackFilter, matchesKeywords } from '../semantic-post-search.js';

// Wednesday, 12 March 2025, local time
const NOW = new Date(2025, 2, 12, 15, 30);
const CENTER = { latitude: 4.05, longitude: 9.70 };

function filterOf(overrides: Partial<StructuredFilter>): StructuredFilter {
    return {
        postTypes: new Set(),
        keywords: [],
        categories: new Set(),
        timeWindow: 'none',
        proximityIntent: false,
        ...overrides,
    };
}

function translatorReturning(filter: StructuredFilter): QueryTranslator {
    return { translate: async () => filter };
}

function failingTranslator(error: Error): QueryTranslator {
    return {
        translate: async () => {
            throw error;
        },
    };
}

class FailingStore extends MemoryDocumentStore {
    async query(): Promise<StoredDocument[]> {
        throw new Error('deadline exceeded');
    }
}

describe('SemanticPostSearch', () => {
    let store: MemoryDocumentStore;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);

        store = new MemoryDocumentStore();
        await store.put(COLLECTIONS.posts, {
            institutionId: 'inst-1',
            title: 'Backend developer',
            content: 'Join our engineering team',
            typeOfPost: 'job',
            tags: ['node', 'remote'],
            categories: ['tech'],
            createdAt: new Date(2025, 2, 11, 9),
            mapLocation: { lat: 4.051, lng: 9.70 },
        }, 'p1');
        await store.put(COLLECTIONS.posts, {
            institutionId: 'inst-2',
            title: 'Data science internship',
            content: 'Six months with the analytics group',
            typeOfPost: 'internship',
            tags: ['python'],
            categories: ['tech'],
            createdAt: new Date(2025, 2, 3),
            mapLocation: { lat: 4.10, lng: 9.75 },
        }, 'p2');
        await store.put(COLLECTIONS.posts, {
            institutionId: 'inst-1',
            title: 'Career fair',
            content: 'Meet employers on campus',
            typeOfPost: 'event',
            tags: [],
            categories: ['careers'],
            createdAt: new Date(2025, 2, 12, 8),
            mapLocation: { lat: 4.0505, lng: 9.7003, label: 'Main hall' },
        }, 'p3');
        await store.put(COLLECTIONS.posts, {
            institutionId: 'inst-3',
            title: 'Nurse position',
            content: 'Hospital hiring',
            typeOfPost: 'job',
            tags: ['health'],
            categories: ['health'],
            createdAt: new Date(2025, 1, 20),
        }, 'p4');
        await store.put(COLLECTIONS.posts, { title: 42, typeOfPost: 'job' }, 'broken');
    });

    function searchWith(translator: QueryTranslator): SemanticPostSearch {
        return new SemanticPostSearch(store, translator, { now: () => NOW });
    }

    it('filters by post type in the store and drops unreadable posts', async () => {
        const search = searchWith(translatorReturning(filterOf({ postTypes: new Set(['job']) })));

        const { results, translated } = await search.search({ query: 'jobs' });

        expect(results.map(r => r.id)).toEqual(['p1', 'p4']);
        expect(translated).toBe(true);
    });

    it('matches any keyword case-insensitively over title, content and tags', async () => {
        const search = searchWith(translatorReturning(filterOf({ keywords: ['ENGINEERING', 'python'] })));

        const { results } = await search.search({ query: 'engineering or python' });

        expect(results.map(r => r.id)).toEqual(['p1', 'p2']);
    });

    it('restricts to categories and the time window', async () => {
        const search = searchWith(translatorReturning(filterOf({
            categories: new Set(['tech', 'careers']),
            timeWindow: 'thisWeek',
        })));

        const { results } = await search.search({ query: 'tech and careers this week' });

        expect(results.map(r => r.id)).toEqual(['p1', 'p3']);
    });

    it('ranks by distance within the radius when proximity is asked for', async () => {
        const search = searchWith(translatorReturning(filterOf({ proximityIntent: true })));

        const { results } = await search.search({ query: 'anything nearby', center: CENTER, radiusMeters: 500 });

        expect(results.map(r => r.id)).toEqual(['p3', 'p1']);
        expect(results[0].distanceMeters).toBeCloseTo(64.79, 1);
        expect(results[0].mapLocation).toEqual({ lat: 4.0505, lng: 9.7003, label: 'Main hall' });
        expect(results[1].distanceMeters).toBeCloseTo(111.19, 1);
    });

    it('ignores proximity intent without a location', async () => {
        const search = searchWith(translatorReturning(filterOf({ proximityIntent: true })));

        const { results } = await search.search({ query: 'anything nearby' });

        expect(results.map(r => r.id)).toEqual(['p1', 'p2', 'p3', 'p4']);
        expect(results[0].distanceMeters).toBeUndefined();
    });

    it('falls back to keyword matching when translation fails', async () => {
        const search = searchWith(failingTranslator(new TranslationFailedError('fake timed out')));

        const response = await search.search({ query: 'Python internship near me' });

        expect(response.translated).toBe(false);
        expect(response.filter.keywords).toEqual(['python', 'internship']);
        expect(response.results.map(r => r.id)).toEqual(['p2']);
    });

    it('propagates other translator errors', async () => {
        const search = searchWith(failingTranslator(new Error('bug')));

        await expect(search.search({ query: 'jobs' })).rejects.toThrow('bug');
    });

    it('validates the request', async () => {
        const search = searchWith(translatorReturning(filterOf({})));

        await expect(search.search({ query: '  ' })).rejects.toBeInstanceOf(InvalidQueryError);
        await expect(search.search({ query: 'jobs', center: { latitude: 0, longitude: 200 } }))
            .rejects.toBeInstanceOf(InvalidCoordinateError);
        await expect(search.search({ query: 'jobs', center: CENTER, radiusMeters: 0 }))
            .rejects.toBeInstanceOf(InvalidQueryError);
    });

    it('reports store failures as StoreUnavailableError', async () => {
        const search = new SemanticPostSearch(new FailingStore(), translatorReturning(filterOf({})));

        await expect(search.search({ query: 'jobs' })).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it('caps the number of results', async () => {
        const search = new SemanticPostSearch(store, translatorReturning(filterOf({})), { maxResults: 2 });

        const { results } = await search.search({ query: 'everything' });

        expect(results.map(r => r.id)).toEqual(['p1', 'p2']);
    });
});

describe('fallbackFilter', () => {
    it('keeps content words and sets proximity from the location', () => {
        expect(fallbackFilter('Find me a café job, near the port!', true)).toEqual({
            postTypes: new Set(),
            keywords: ['café', 'job', 'port'],
            categories: new Set(),
            timeWindow: 'none',
            proximityIntent: true,
        });
    });
});

describe('matchesKeywords', () => {
    it('searches the joined tags', () => {
        const post = {
            id: 'x',
            institutionId: 'i',
            title: 'Title',
            content: 'Body',
            typeOfPost: 'news',
            tags: ['open', 'data'],
            categories: [],
            visibility: 'public',
        };

        expect(matchesKeywords(post, ['open data'])).toBe(true);
        expect(matchesKeywords(post, ['closed'])).toBe(false);
    });
});
