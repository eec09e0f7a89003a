/**
 * Semantic Post Search
 *
 * Natural-language search over institution posts. The translated filter is
 * split between the store (type, category, time window) and memory
 * (keywords, proximity), since the store has no full-text search. When
 * translation fails the search degrades to keyword matching on the raw
 * query instead of erroring.
 */

import {
    COLLECTIONS,
    CityScopeError,
    InvalidQueryError,
    StoreUnavailableError,
    TranslationFailedError,
} from '@cityscope/types';
import type {
    DocumentStore,
    GeoCoordinate,
    InstitutionPost,
    QueryFilter,
    QueryTranslator,
    StoredDocument,
    StructuredFilter,
} from '@cityscope/types';
import { assertValidCoordinate } from '@cityscope/geo-index';
import { rankByDistance } from '@cityscope/proximity';
import { readInstitutionPost } from './post-record.js';
import { timeWindowStart } from './time-window.js';

export const MAX_SEMANTIC_RESULTS = 50;
export const DEFAULT_SEMANTIC_RADIUS_M = 5000;

const STOPWORDS = new Set([
    'a', 'an', 'and', 'any', 'are', 'at', 'for', 'from', 'find', 'get', 'in', 'is', 'me',
    'my', 'near', 'nearby', 'of', 'on', 'or', 'show', 'some', 'the', 'to', 'what', 'with',
]);

export interface SemanticSearchRequest {
    query: string;
    center?: GeoCoordinate;
    radiusMeters?: number;
}

export type PostSearchResult = InstitutionPost & { distanceMeters?: number };

export interface SemanticSearchResponse {
    results: PostSearchResult[];
    filter: StructuredFilter;
    /** False when the fallback filter was used */
    translated: boolean;
}

export interface SemanticPostSearchOptions {
    collection?: string;
    maxResults?: number;
    /** Clock for time-window starts */
    now?: () => Date;
}

export class SemanticPostSearch {
    private store: DocumentStore;
    private translator: QueryTranslator;
    private collection: string;
    private maxResults: number;
    private now: () => Date;

    constructor(store: DocumentStore, translator: QueryTranslator, options: SemanticPostSearchOptions = {}) {
        this.store = store;
        this.translator = translator;
        this.collection = options.collection || COLLECTIONS.posts;
        this.maxResults = options.maxResults || MAX_SEMANTIC_RESULTS;
        this.now = options.now || (() => new Date());
    }

    async search(request: SemanticSearchRequest, requestId: string = 'ai-search'): Promise<SemanticSearchResponse> {
        const query = request.query.trim();
        if (!query) {
            throw new InvalidQueryError('Search query must not be empty');
        }
        if (request.center) {
            assertValidCoordinate(request.center);
        }
        const radiusMeters = request.radiusMeters ?? DEFAULT_SEMANTIC_RADIUS_M;
        if (!Number.isFinite(radiusMeters) || radiusMeters <= 0) {
            throw new InvalidQueryError(`Radius must be a positive number of meters, got ${radiusMeters}`);
        }

        let filter: StructuredFilter;
        let translated = true;
        try {
            filter = await this.translator.translate(query);
        } catch (error) {
            if (!(error instanceof TranslationFailedError)) throw error;
            console.warn(`[${requestId}] [SemanticSearch] Translation failed, falling back: ${error.message}`);
            filter = fallbackFilter(query, request.center !== undefined);
            translated = false;
        }

        const docs = await this.queryStore(buildPostFilters(filter, this.now()), requestId);

        let posts: PostSearchResult[] = [];
        for (const doc of docs) {
            try {
                posts.push(readInstitutionPost(doc));
            } catch (error) {
                console.warn(`[${requestId}] [SemanticSearch] Dropping ${this.collection}/${doc.id}:`, error instanceof Error ? error.message : error);
            }
        }

        if (filter.keywords.length > 0) {
            posts = posts.filter(post => matchesKeywords(post, filter.keywords));
        }

        if (filter.proximityIntent && request.center) {
            posts = rankByDistance(posts, request.center, radiusMeters, post => post.mapLocation);
        }

        const results = posts.slice(0, this.maxResults);
        console.log(`[${requestId}] [SemanticSearch] ${docs.length} store matches → ${results.length} results (translated: ${translated})`);

        return { results, filter, translated };
    }

    private async queryStore(filters: QueryFilter[], requestId: string): Promise<StoredDocument[]> {
        try {
            return await this.store.query(this.collection, filters);
        } catch (error) {
            if (error instanceof CityScopeError) throw error;
            console.error(`[${requestId}] [SemanticSearch] ✗ Store query failed:`, error);
            throw new StoreUnavailableError(`Query on ${this.collection} failed`, error);
        }
    }
}

/**
 * Store-side filters for a structured filter
 */
export function buildPostFilters(filter: StructuredFilter, now: Date): QueryFilter[] {
    const filters: QueryFilter[] = [];

    if (filter.postTypes.size > 0) {
        filters.push({ field: 'typeOfPost', op: 'in', value: [...filter.postTypes] });
    }
    if (filter.categories.size > 0) {
        filters.push({ field: 'categories', op: 'array-contains-any', value: [...filter.categories] });
    }
    const start = timeWindowStart(filter.timeWindow, now);
    if (start) {
        filters.push({ field: 'createdAt', op: '>=', value: start });
    }

    return filters;
}

/**
 * True when any keyword occurs, case-insensitively, in the title, the
 * content or the joined tags.
 */
export function matchesKeywords(post: InstitutionPost, keywords: string[]): boolean {
    const haystacks = [post.title, post.content, post.tags.join(' ')].map(s => s.toLowerCase());
    return keywords.some(keyword => {
        const needle = keyword.toLowerCase();
        return haystacks.some(h => h.includes(needle));
    });
}

/**
 * Filter used when translation fails: the query's content words as
 * keywords, no store-side restriction, proximity whenever a location is given.
 */
export function fallbackFilter(query: string, hasLocation: boolean): StructuredFilter {
    const keywords = query
        .toLowerCase()
        .split(/[^\p{L}\p{N}]+/u)
        .filter(word => word.length > 1 && !STOPWORDS.has(word));

    return {
        postTypes: new Set(),
        keywords: [...new Set(keywords)],
        categories: new Set(),
        timeWindow: 'none',
        proximityIntent: hasLocation,
    };
}
