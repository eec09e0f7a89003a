/**
 * Geohash Backfill
 *
 * Writes the geohash of every document in a collection that has a usable
 * map location and no matching geohash yet. One failing document is counted
 * and logged; the walk continues.
 */

import type { DocumentStore, GeoCoordinate } from '@cityscope/types';
import { encodeGeohash, geohashMatches, toGeoCoordinate, STORED_GEOHASH_PRECISION } from '@cityscope/geo-index';
import { readMapLocation, GEOHASH_FIELD } from './map-location.js';

export interface BackfillReport {
    collection: string;
    updated: number;
    skipped: number;
    errors: number;
}

export async function backfillGeohashes(store: DocumentStore, collection: string): Promise<BackfillReport> {
    const report: BackfillReport = { collection, updated: 0, skipped: 0, errors: 0 };
    const docs = await store.list(collection);

    console.log(`[Backfill] ${collection}: scanning ${docs.length} documents`);

    for (const doc of docs) {
        try {
            const location = readMapLocation(doc.data);
            if (!location) {
                report.skipped++;
                continue;
            }

            const coord = toGeoCoordinate(location);
            const existing = doc.data[GEOHASH_FIELD];
            if (typeof existing === 'string' && isCurrentGeohash(existing, coord)) {
                report.skipped++;
                continue;
            }

            const geohash = encodeGeohash(coord, STORED_GEOHASH_PRECISION);
            await store.update(collection, doc.id, { [GEOHASH_FIELD]: geohash });
            report.updated++;
            console.log(`[Backfill] ✓ ${collection}/${doc.id} → ${geohash}`);
        } catch (error) {
            report.errors++;
            console.warn(`[Backfill] ✗ ${collection}/${doc.id}:`, error instanceof Error ? error.message : error);
        }
    }

    console.log(`[Backfill] ${collection}: updated ${report.updated}, skipped ${report.skipped}, errors ${report.errors}`);
    return report;
}

function isCurrentGeohash(hash: string, coord: GeoCoordinate): boolean {
    if (hash.length !== STORED_GEOHASH_PRECISION) return false;
    try {
        return geohashMatches(hash, coord);
    } catch {
        // Not a geohash at all: rewrite it
        return false;
    }
}
