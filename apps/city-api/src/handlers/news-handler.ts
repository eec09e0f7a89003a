/**
 * News Search Handler
 *
 * GET /api/news/search?q&page&pageSize&provider
 */

import type { RequestHandler } from 'express';
import type { NewsAggregator } from '@cityscope/news';
import { asyncHandler } from '../middleware/errors.js';
import { createRequestId } from '../middleware/logging.js';
import { NewsSearchQuerySchema, parseQuery } from '../middleware/validation.js';

export function newsSearchHandler(aggregator: NewsAggregator): RequestHandler {
    return asyncHandler(async (req, res) => {
        const query = parseQuery(NewsSearchQuerySchema, req);
        const requestId = createRequestId();

        const items = await aggregator.search(
            { query: query.q, page: query.page, pageSize: query.pageSize, provider: query.provider },
            requestId
        );

        res.json({
            items,
            page: query.page,
            pageSize: query.pageSize,
            provider: query.provider ?? 'all',
        });
    });
}
