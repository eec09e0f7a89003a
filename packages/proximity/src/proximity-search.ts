/**
 * Proximity Search
 *
 * Range-scans the store's geohash index for the box around a centre, then
 * keeps only candidates within the exact haversine radius. The geohash range
 * is a superset of the circle (and at cell edges not even an exact box), so
 * the distance filter is what defines the result set.
 */

import { InvalidQueryError, StoreUnavailableError } from '@cityscope/types';
import type {
    DocumentStore,
    GeoCoordinate,
    GeoTaggedRecord,
    RankedResult,
    StoredDocument,
} from '@cityscope/types';
import { assertValidCoordinate, boundingBox, clampBoundingBox, geohashRange } from '@cityscope/geo-index';
import { readMapLocation, GEOHASH_FIELD } from '@cityscope/store';
import { rankByDistance } from './rank.js';

export const MAX_PROXIMITY_RESULTS = 50;
export const DEFAULT_QUERY_PRECISION = 7;
export const MIN_QUERY_PRECISION = 5;
export const MAX_QUERY_PRECISION = 9;

export interface ProximitySearchStats {
    candidates: number;
    unlocated: number;
    malformed: number;
    returned: number;
    totalTimeMs: number;
}

export interface ProximitySearchOptions {
    /** Result cap (default 50) */
    maxResults?: number;
    /** Request ID for logging */
    requestId?: string;
}

export class ProximitySearch {
    private store: DocumentStore;
    private maxResults: number;

    constructor(store: DocumentStore, options: Pick<ProximitySearchOptions, 'maxResults'> = {}) {
        this.store = store;
        this.maxResults = options.maxResults || MAX_PROXIMITY_RESULTS;
    }

    /**
     * Records of `collection` within `radiusMeters` of `center`, nearest first.
     */
    async search(
        collection: string,
        center: GeoCoordinate,
        radiusMeters: number,
        precision: number = DEFAULT_QUERY_PRECISION,
        options: Pick<ProximitySearchOptions, 'requestId'> = {}
    ): Promise<RankedResult<GeoTaggedRecord>[]> {
        const { results } = await this.searchWithStats(collection, center, radiusMeters, precision, options);
        return results;
    }

    async searchWithStats(
        collection: string,
        center: GeoCoordinate,
        radiusMeters: number,
        precision: number = DEFAULT_QUERY_PRECISION,
        options: Pick<ProximitySearchOptions, 'requestId'> = {}
    ): Promise<{ results: RankedResult<GeoTaggedRecord>[]; stats: ProximitySearchStats }> {
        const startTime = Date.now();
        const tag = options.requestId ? `[${options.requestId}] [ProximitySearch]` : '[ProximitySearch]';

        assertValidCoordinate(center);
        validateRadius(radiusMeters);
        validatePrecision(precision);

        const box = clampBoundingBox(boundingBox(center, radiusMeters));
        const range = geohashRange(box, precision);

        let candidates: StoredDocument[];
        try {
            candidates = await this.store.rangeQuery(collection, GEOHASH_FIELD, range.lowerBound, range.upperBound);
        } catch (error) {
            if (error instanceof StoreUnavailableError) throw error;
            console.error(`${tag} ✗ Range query on ${collection} failed:`, error);
            throw new StoreUnavailableError(`Range query on ${collection} failed`, error);
        }

        const records: GeoTaggedRecord[] = [];
        let unlocated = 0;
        let malformed = 0;

        for (const doc of candidates) {
            try {
                const mapLocation = readMapLocation(doc.data);
                if (!mapLocation) {
                    unlocated++;
                    console.log(`${tag} Skipping ${collection}/${doc.id}: no mapLocation`);
                    continue;
                }
                const geohash = doc.data[GEOHASH_FIELD];
                records.push({
                    id: doc.id,
                    mapLocation,
                    geohash: typeof geohash === 'string' ? geohash : '',
                    data: doc.data,
                });
            } catch (error) {
                malformed++;
                console.warn(`${tag} Dropping ${collection}/${doc.id}:`, error instanceof Error ? error.message : error);
            }
        }

        const results = rankByDistance(records, center, radiusMeters, record => record.mapLocation)
            .slice(0, this.maxResults);

        const stats: ProximitySearchStats = {
            candidates: candidates.length,
            unlocated,
            malformed,
            returned: results.length,
            totalTimeMs: Date.now() - startTime,
        };

        console.log(
            `${tag} ${collection}: ${stats.candidates} candidates in [${range.lowerBound}, ${range.upperBound}] ` +
            `→ ${stats.returned} within ${radiusMeters}m (${stats.totalTimeMs}ms)`
        );

        return { results, stats };
    }
}

function validateRadius(radiusMeters: number): void {
    if (!Number.isFinite(radiusMeters) || radiusMeters <= 0) {
        throw new InvalidQueryError(`Radius must be a positive number of meters, got ${radiusMeters}`);
    }
}

function validatePrecision(precision: number): void {
    if (!Number.isInteger(precision) || precision < MIN_QUERY_PRECISION || precision > MAX_QUERY_PRECISION) {
        throw new InvalidQueryError(
            `Precision must be an integer in [${MIN_QUERY_PRECISION}, ${MAX_QUERY_PRECISION}], got ${precision}`
        );
    }
}
