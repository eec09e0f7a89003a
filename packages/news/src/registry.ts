/**
 * Provider Registry
 *
 * Registration and lookup of news providers. Adding a provider requires:
 * 1. Implementing NewsProvider under providers/
 * 2. Registering it in createProviderRegistry
 */

import { InvalidProviderError, NEWS_PROVIDER_NAMES } from '@cityscope/types';
import type { NewsProvider, NewsProviderName } from '@cityscope/types';

export function isNewsProviderName(value: string): value is NewsProviderName {
    return NEWS_PROVIDER_NAMES.some(name => name === value);
}

export class ProviderRegistry {
    private providers: Map<NewsProviderName, NewsProvider> = new Map();

    register(provider: NewsProvider): void {
        this.providers.set(provider.name, provider);
        const state = provider.isConfigured() ? 'configured' : 'no API key';
        console.log(`[ProviderRegistry] Registered: ${provider.name} (${state})`);
    }

    all(): NewsProvider[] {
        return Array.from(this.providers.values());
    }

    /**
     * Providers a search should dispatch to: all of them, or the one named
     * by the filter. Throws InvalidProviderError for an unknown name.
     */
    resolve(filter?: string): NewsProvider[] {
        if (filter === undefined) {
            return this.all();
        }
        const provider = isNewsProviderName(filter) ? this.providers.get(filter) : undefined;
        if (!provider) {
            throw new InvalidProviderError(filter);
        }
        return [provider];
    }

    /**
     * Run health checks on all providers
     */
    async healthCheck(): Promise<Record<string, boolean>> {
        const results: Record<string, boolean> = {};

        for (const [name, provider] of this.providers) {
            if (provider.healthCheck) {
                try {
                    results[name] = await provider.healthCheck();
                } catch {
                    results[name] = false;
                }
            } else {
                results[name] = provider.isConfigured();
            }
        }

        return results;
    }
}
