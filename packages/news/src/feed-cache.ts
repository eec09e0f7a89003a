/**
 * News Feed Cache
 *
 * In-memory cache of merged news feeds, keyed by provider filter and query.
 * Each entry remembers the per-provider depth it was fetched to; a lookup
 * asking for a deeper feed misses.
 */

import type { NewsFeed } from '@cityscope/types';

export interface CachedFeed {
    key: string;
    feed: NewsFeed;
    timestamp: number;
    ttlMs: number;
}

export interface NewsFeedCacheOptions {
    maxEntries?: number;
    defaultTtlMs?: number;
}

export class NewsFeedCache {
    private cache: Map<string, CachedFeed> = new Map();
    private insertionOrder: string[] = [];
    private maxEntries: number;
    private defaultTtlMs: number;

    constructor(options: NewsFeedCacheOptions = {}) {
        this.maxEntries = options.maxEntries || 100;
        this.defaultTtlMs = options.defaultTtlMs || 5 * 60 * 1000; // 5 minutes
    }

    static key(provider: string, query: string): string {
        return `${provider}|${query.trim().toLowerCase()}`;
    }

    /**
     * Store a feed, replacing any entry under the same key
     */
    set(key: string, feed: NewsFeed, ttlMs?: number): void {
        if (this.cache.has(key)) {
            this.insertionOrder = this.insertionOrder.filter(k => k !== key);
        } else if (this.cache.size >= this.maxEntries) {
            // Evict oldest if at capacity
            const oldestKey = this.insertionOrder.shift();
            if (oldestKey) {
                this.cache.delete(oldestKey);
            }
        }

        this.cache.set(key, {
            key,
            feed,
            timestamp: Date.now(),
            ttlMs: ttlMs || this.defaultTtlMs,
        });
        this.insertionOrder.push(key);
    }

    /**
     * Get a live feed fetched to at least `minDepth` per provider
     */
    get(key: string, minDepth: number = 0): NewsFeed | null {
        const entry = this.cache.get(key);
        if (!entry) return null;

        if (Date.now() - entry.timestamp > entry.ttlMs) {
            this.delete(key);
            return null;
        }

        return entry.feed.depth >= minDepth ? entry.feed : null;
    }

    /**
     * Clear expired entries
     */
    prune(): number {
        let pruned = 0;
        const now = Date.now();

        for (const [key, entry] of this.cache.entries()) {
            if (now - entry.timestamp > entry.ttlMs) {
                this.delete(key);
                pruned++;
            }
        }

        return pruned;
    }

    stats(): { size: number; oldest: number | null; newest: number | null } {
        if (this.cache.size === 0) {
            return { size: 0, oldest: null, newest: null };
        }

        let oldest = Infinity;
        let newest = 0;

        for (const entry of this.cache.values()) {
            oldest = Math.min(oldest, entry.timestamp);
            newest = Math.max(newest, entry.timestamp);
        }

        return { size: this.cache.size, oldest, newest };
    }

    private delete(key: string): void {
        this.cache.delete(key);
        this.insertionOrder = this.insertionOrder.filter(k => k !== key);
    }
}
