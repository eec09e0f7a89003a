/**
 * SerpAPI Google News Provider
 */

import { z } from 'zod';
import type { NewsItem, NewsProvider, NewsSearchContext } from '@cityscope/types';
import { requestJson, PROVIDER_DISPLAY_NAMES } from './http.js';
import { normalizeResponse } from './normalize.js';
import type { RegionOptions } from './newsapi.js';

const SerpApiNewsResultSchema = z.object({
    title: z.string().nullish(),
    snippet: z.string().nullish(),
    link: z.string().nullish(),
    // Older responses use a plain string, newer ones an object
    source: z.union([z.string(), z.object({ name: z.string().nullish() })]).nullish(),
    thumbnail: z.string().nullish(),
    date: z.string().nullish(),
});

export const SerpApiResponseSchema = z.object({
    news_results: z.array(SerpApiNewsResultSchema).default([]),
});

export type SerpApiResponse = z.infer<typeof SerpApiResponseSchema>;

export class SerpApiProvider implements NewsProvider {
    readonly name = 'serpapi';
    readonly displayName = PROVIDER_DISPLAY_NAMES.serpapi;

    private apiKey: string;
    private baseUrl = 'https://serpapi.com/search.json';
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
            engine: 'google_news',
            q: context.query,
            api_key: this.apiKey,
            hl: this.region.language,
            gl: this.region.country,
            num: String(context.limit),
        });

        const body = await requestJson(this.name, `${this.baseUrl}?${params.toString()}`, {
            signal: context.signal,
        }, SerpApiResponseSchema);

        return normalizeResponse({ provider: 'serpapi', body });
    }
}
