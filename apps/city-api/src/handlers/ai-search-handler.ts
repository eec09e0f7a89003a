/**
 * AI Search Handler
 *
 * GET /api/posts/ai-search?q&lat&lng&radius
 *
 * Translation failures never surface here: SemanticPostSearch falls back to
 * keyword matching and reports `translated: false`.
 */

import type { RequestHandler } from 'express';
import type { SemanticPostSearch } from '@cityscope/query-translator';
import { asyncHandler } from '../middleware/errors.js';
import { createRequestId } from '../middleware/logging.js';
import { AiSearchQuerySchema, parseQuery } from '../middleware/validation.js';

export function aiSearchHandler(postSearch: SemanticPostSearch): RequestHandler {
    return asyncHandler(async (req, res) => {
        const query = parseQuery(AiSearchQuerySchema, req);
        const requestId = createRequestId();
        const startTime = Date.now();

        console.log(`[${requestId}] 🔍 AI search: "${query.q}"`);

        const center = query.lat !== undefined && query.lng !== undefined
            ? { latitude: query.lat, longitude: query.lng }
            : undefined;

        const { results, filter, translated } = await postSearch.search(
            { query: query.q, center, radiusMeters: query.radius },
            requestId
        );

        console.log(`[${requestId}] ✅ AI search complete: ${results.length} results (${Date.now() - startTime}ms total)`);

        res.json({
            results,
            filter: {
                postTypes: [...filter.postTypes],
                keywords: filter.keywords,
                categories: [...filter.categories],
                timeWindow: filter.timeWindow,
                proximityIntent: filter.proximityIntent,
            },
            translated,
        });
    });
}
