import type { GeoCoordinate, MapLocation, RankedResult } from '@cityscope/types';
import { distanceMeters, toGeoCoordinate } from '@cityscope/geo-index';

/**
 * Annotate items with their distance from `center`, drop those beyond
 * `radiusMeters` and sort nearest first. Items without a location are dropped.
 */
export function rankByDistance<T extends object>(
    items: T[],
    center: GeoCoordinate,
    radiusMeters: number,
    locate: (item: T) => MapLocation | undefined | null
): RankedResult<T>[] {
    const ranked: RankedResult<T>[] = [];

    for (const item of items) {
        const location = locate(item);
        if (!location) continue;

        const distance = distanceMeters(center, toGeoCoordinate(location));
        if (distance <= radiusMeters) {
            ranked.push({ ...item, distanceMeters: distance });
        }
    }

    return ranked.sort((a, b) => a.distanceMeters - b.distanceMeters);
}
