import type { z } from 'zod';
import { ProviderFetchFailedError } from '@cityscope/types';
import type { NewsItem, NewsProviderName } from '@cityscope/types';
import { normalizePublishedAt } from '../published-at.js';

export const TITLE_PLACEHOLDER = 'Untitled';

/** Source name used when an item carries none */
export const PROVIDER_DISPLAY_NAMES: Record<NewsProviderName, string> = {
    newsapi: 'NewsAPI',
    serpapi: 'Google News (SerpAPI)',
    serper: 'Google News (Serper)',
};

/**
 * Fetch a provider endpoint and validate the body. Transport errors,
 * non-2xx statuses and unexpected shapes all become ProviderFetchFailedError.
 */
export async function requestJson<S extends z.ZodTypeAny>(
    provider: NewsProviderName,
    url: string,
    init: RequestInit,
    schema: S
): Promise<z.infer<S>> {
    let response: Response;
    try {
        response = await fetch(url, init);
    } catch (error) {
        throw new ProviderFetchFailedError(provider, error instanceof Error ? error.message : 'Request failed', error);
    }

    if (!response.ok) {
        throw new ProviderFetchFailedError(provider, `API error: ${response.status}`);
    }

    let body: unknown;
    try {
        body = await response.json();
    } catch (error) {
        throw new ProviderFetchFailedError(provider, 'Response is not JSON', error);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        throw new ProviderFetchFailedError(provider, `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`, parsed.error);
    }
    return parsed.data;
}

export interface RawNewsFields {
    title?: string | null;
    description?: string | null;
    url?: string | null;
    source?: string | null;
    imageUrl?: string | null;
    publishedAt?: string | null;
}

/**
 * Build a NewsItem from loosely-typed provider fields.
 */
export function toNewsItem(
    fields: RawNewsFields,
    provider: NewsProviderName,
    now: Date
): NewsItem {
    const title = nonEmpty(fields.title) ?? TITLE_PLACEHOLDER;
    const url = nonEmpty(fields.url);

    return {
        identity: url ?? title,
        title,
        description: nonEmpty(fields.description),
        url,
        source: nonEmpty(fields.source) ?? PROVIDER_DISPLAY_NAMES[provider],
        imageUrl: nonEmpty(fields.imageUrl),
        publishedAt: normalizePublishedAt(fields.publishedAt, now),
        originProvider: provider,
    };
}

function nonEmpty(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
}
