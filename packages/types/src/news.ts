/**
 * News Types
 *
 * Common item shape for aggregated news and the provider contract.
 */

// ============================================================================
// Providers
// ============================================================================

export const NEWS_PROVIDER_NAMES = ['newsapi', 'serpapi', 'serper'] as const;

export type NewsProviderName = typeof NEWS_PROVIDER_NAMES[number];

/**
 * One optional key per provider. A missing key is a normal state:
 * the provider is skipped and contributes nothing.
 */
export type NewsProviderKeys = Partial<Record<NewsProviderName, string>>;

export interface NewsSearchContext {
    /** Keyword query, already defaulted by the caller */
    query: string;
    /** How many items the provider should try to return */
    limit: number;
    /** Aborted when the provider's time budget runs out */
    signal: AbortSignal;
    /** Request ID for logging */
    requestId: string;
}

export interface NewsProvider {
    /** Unique identifier, also accepted as a provider filter */
    name: NewsProviderName;

    /** Used as the source name when an item carries none */
    displayName: string;

    /** False when required configuration (API key) is missing */
    isConfigured(): boolean;

    /**
     * Fetch and normalize items for a query.
     * Throws ProviderFetchFailedError on HTTP or shape errors.
     */
    search(context: NewsSearchContext): Promise<NewsItem[]>;

    healthCheck?(): Promise<boolean>;
}

// ============================================================================
// Items
// ============================================================================

export interface NewsItem {
    /** Canonical identity for deduplication: url, falling back to title */
    identity: string;
    title: string;
    description: string | null;
    url: string | null;
    source: string;
    imageUrl: string | null;
    /** ISO timestamp when parseable, otherwise the raw provider value or null */
    publishedAt: string | null;
    originProvider: NewsProviderName;
}

export interface NewsSearchRequest {
    query: string;
    /** 1-based */
    page: number;
    /** 1..50 */
    pageSize: number;
    /** Provider filter as received; validated against the registry */
    provider?: string;
}

export interface NewsFeed {
    query: string;
    provider: NewsProviderName | 'all';
    /** Per-provider fetch depth the feed was built with */
    depth: number;
    items: NewsItem[];
    providerCounts: Partial<Record<NewsProviderName, number>>;
}
