/**
 * Response normalization
 *
 * Every provider body, once validated, is tagged with its origin and
 * mapped to NewsItems here.
 */

import type { NewsItem } from '@cityscope/types';
import { toNewsItem } from './http.js';
import type { NewsApiResponse } from './newsapi.js';
import type { SerpApiResponse } from './serpapi.js';
import type { SerperResponse } from './serper.js';

/**
 * A provider body after schema validation, tagged with its origin.
 */
export type RawProviderResponse =
    | { provider: 'newsapi'; body: NewsApiResponse }
    | { provider: 'serpapi'; body: SerpApiResponse }
    | { provider: 'serper'; body: SerperResponse };

export function normalizeResponse(raw: RawProviderResponse, now: Date = new Date()): NewsItem[] {
    switch (raw.provider) {
        case 'newsapi':
            return normalizeNewsApi(raw.body, now);
        case 'serpapi':
            return normalizeSerpApi(raw.body, now);
        case 'serper':
            return normalizeSerper(raw.body, now);
    }
}

export function normalizeNewsApi(body: NewsApiResponse, now: Date = new Date()): NewsItem[] {
    return body.articles.map(article => toNewsItem({
        title: article.title,
        description: article.description,
        url: article.url,
        source: article.source?.name,
        imageUrl: article.urlToImage,
        publishedAt: article.publishedAt,
    }, 'newsapi', now));
}

export function normalizeSerpApi(body: SerpApiResponse, now: Date = new Date()): NewsItem[] {
    return body.news_results.map(result => toNewsItem({
        title: result.title,
        description: result.snippet,
        url: result.link,
        source: typeof result.source === 'string' ? result.source : result.source?.name,
        imageUrl: result.thumbnail,
        publishedAt: result.date,
    }, 'serpapi', now));
}

// Serper reports dates as relative phrases ("5 hours ago")
export function normalizeSerper(body: SerperResponse, now: Date = new Date()): NewsItem[] {
    return body.news.map(item => toNewsItem({
        title: item.title,
        description: item.description ?? item.snippet,
        url: item.link,
        source: item.source,
        imageUrl: item.imageUrl ?? item.thumbnail,
        publishedAt: item.date,
    }, 'serper', now));
}
