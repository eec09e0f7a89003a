/**
 * Serper News Provider
 */

import { z } from 'zod';
import type { NewsItem, NewsProvider, NewsSearchContext } from '@cityscope/types';
import { requestJson, PROVIDER_DISPLAY_NAMES } from './http.js';
import { normalizeResponse } from './normalize.js';
import type { RegionOptions } from './newsapi.js';

const SerperNewsItemSchema = z.object({
    title: z.string().nullish(),
    snippet: z.string().nullish(),
    description: z.string().nullish(),
    link: z.string().nullish(),
    source: z.string().nullish(),
    imageUrl: z.string().nullish(),
    thumbnail: z.string().nullish(),
    date: z.string().nullish(),
});

export const SerperResponseSchema = z.object({
    news: z.array(SerperNewsItemSchema).default([]),
});

export type SerperResponse = z.infer<typeof SerperResponseSchema>;

export class SerperProvider implements NewsProvider {
    readonly name = 'serper';
    readonly displayName = PROVIDER_DISPLAY_NAMES.serper;

    private apiKey: string;
    private baseUrl = 'https://google.serper.dev/news';
    private region: RegionOptions;

    constructor(apiKey: string | undefined, region: RegionOptions) {
        this.apiKey = apiKey || '';
        this.region = region;
    }

    isConfigured(): boolean {
        return this.apiKey.length > 0;
    }

    async search(context: NewsSearchContext): Promise<NewsItem[]> {
        const body = await requestJson(this.name, this.baseUrl, {
            method: 'POST',
            headers: {
                'X-API-KEY': this.apiKey,
                'Content-Type': 'application/json',
            },
            body: JSON.stringify({
                q: context.query,
                hl: this.region.language,
                gl: this.region.country,
                num: context.limit,
            }),
            signal: context.signal,
        }, SerperResponseSchema);

        return normalizeResponse({ provider: 'serper', body });
    }
}
