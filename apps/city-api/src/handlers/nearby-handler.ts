/**
 * Nearby Handler
 *
 * GET /api/<collection>/nearby?lat&lng&radius&precision
 */

import type { RequestHandler } from 'express';
import type { ProximitySearch } from '@cityscope/proximity';
import { asyncHandler } from '../middleware/errors.js';
import { createRequestId } from '../middleware/logging.js';
import { NearbyQuerySchema, parseQuery } from '../middleware/validation.js';

export function nearbyHandler(proximity: ProximitySearch, collection: string): RequestHandler {
    return asyncHandler(async (req, res) => {
        const query = parseQuery(NearbyQuerySchema, req);
        const requestId = createRequestId();

        console.log(`[${requestId}] 📍 Nearby ${collection}: (${query.lat}, ${query.lng}) r=${query.radius}m p=${query.precision}`);

        const results = await proximity.search(
            collection,
            { latitude: query.lat, longitude: query.lng },
            query.radius,
            query.precision,
            { requestId }
        );

        res.json({
            results: results.map(record => ({
                ...record.data,
                id: record.id,
                mapLocation: record.mapLocation,
                geohash: record.geohash,
                distanceMeters: record.distanceMeters,
            })),
            count: results.length,
        });
    });
}
