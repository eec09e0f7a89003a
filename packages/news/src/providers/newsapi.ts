/**
 * NewsAPI Provider
 *
 * Top headlines for a query, restricted to one country and language.
 */

import { z } from 'zod';
import type { NewsItem, NewsProvider, NewsSearchContext } from '@cityscope/types';
import { requestJson, PROVIDER_DISPLAY_NAMES } from './http.js';
import { normalizeResponse } from './normalize.js';

const NewsApiArticleSchema = z.object({
    title: z.string().nullish(),
    description: z.string().nullish(),
    url: z.string().nullish(),
    source: z.object({ name: z.string().nullish() }).nullish(),
    urlToImage: z.string().nullish(),
    publishedAt: z.string().nullish(),
});

export const NewsApiResponseSchema = z.object({
    status: z.string().optional(),
    articles: z.array(NewsApiArticleSchema).default([]),
});

export type NewsApiResponse = z.infer<typeof NewsApiResponseSchema>;

/** NewsAPI rejects larger page sizes */
const MAX_PAGE_SIZE = 100;

export interface RegionOptions {
    country: string;
    language: string;
}

export class NewsApiProvider implements NewsProvider {
    readonly name = 'newsapi';
    readonly displayName = PROVIDER_DISPLAY_NAMES.newsapi;

    private apiKey: string;
    private baseUrl = 'https://newsapi.org/v2';
    private region: RegionOptions;

    constructor(apiKey: string | undefined, region: RegionOptions) {
        this.apiKey = apiKey || '';
        this.region = region;
    }

    isConfigured(): boolean {
        return this.apiKey.length > 0;
    }

    async search(context: NewsSearchContext): Promise<NewsItem[]> {
        const params = new URLSearchParams({
            q: context.query,
            page: '1',
            pageSize: String(Math.min(context.limit, MAX_PAGE_SIZE)),
            language: this.region.language,
            country: this.region.country,
        });

        const body = await requestJson(this.name, `${this.baseUrl}/top-headlines?${params.toString()}`, {
            headers: { Authorization: this.apiKey },
            signal: context.signal,
        }, NewsApiResponseSchema);

        return normalizeResponse({ provider: 'newsapi', body });
    }

    async healthCheck(): Promise<boolean> {
        if (!this.isConfigured()) return false;
        try {
            const params = new URLSearchParams({ country: this.region.country, pageSize: '1' });
            const response = await fetch(`${this.baseUrl}/top-headlines?${params.toString()}`, {
                headers: { Authorization: this.apiKey },
                signal: AbortSignal.timeout(5000),
            });
            return response.ok;
        } catch {
            return false;
        }
    }
}
