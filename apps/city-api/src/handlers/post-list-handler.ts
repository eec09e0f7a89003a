/**
 * Post Listing Handler
 *
 * GET /api/posts?category&timeWindow&limit&sort, newest first. `category=all`
 * lists every category. `sort=popular` reorders the page by the number of
 * related posts, newest first among equals.
 */

import type { RequestHandler } from 'express';
import type { QueryFilter, StoredDocument } from '@cityscope/types';
import type { CollectionRepository } from '@cityscope/store';
import { parseTimeWindow, timeWindowStart } from '@cityscope/query-translator';
import { asyncHandler } from '../middleware/errors.js';
import { PostListQuerySchema, parseQuery } from '../middleware/validation.js';
import { toDocumentJson } from './serialize.js';

export function postListHandler(posts: CollectionRepository, now: () => Date = () => new Date()): RequestHandler {
    return asyncHandler(async (req, res) => {
        const query = parseQuery(PostListQuerySchema, req);
        const filters: QueryFilter[] = [];

        if (query.category && query.category.toLowerCase() !== 'all') {
            filters.push({ field: 'categories', op: 'array-contains', value: query.category });
        }

        const start = timeWindowStart(parseTimeWindow(query.timeWindow), now());
        if (start) {
            filters.push({ field: 'createdAt', op: '>=', value: start });
        }

        const docs = await posts.list(filters, {
            orderBy: { field: 'createdAt', direction: 'desc' },
            limit: query.limit,
        });

        if (query.sort === 'popular') {
            docs.sort((a, b) => relatedPostCount(b) - relatedPostCount(a));
        }

        res.json(docs.map(toDocumentJson));
    });
}

function relatedPostCount(doc: StoredDocument): number {
    const suggestions = doc.data.smartSuggestions;
    if (typeof suggestions !== 'object' || suggestions === null || Array.isArray(suggestions)) {
        return 0;
    }
    const related = 'relatedPosts' in suggestions ? suggestions.relatedPosts : undefined;
    return Array.isArray(related) ? related.length : 0;
}
