import type { GeoCoordinate } from '@cityscope/types';

/**
 * Mean Earth radius used by haversine. Deliberately not the bounding-box
 * radius (6378137 m); results differ at the decimetre level and stored
 * distances were computed with this value.
 */
export const HAVERSINE_EARTH_RADIUS_M = 6371000;

/**
 * Great-circle distance in meters (haversine).
 */
export function distanceMeters(a: GeoCoordinate, b: GeoCoordinate): number {
    const phi1 = a.latitude * Math.PI / 180;
    const phi2 = b.latitude * Math.PI / 180;
    const dPhi = (b.latitude - a.latitude) * Math.PI / 180;
    const dLambda = (b.longitude - a.longitude) * Math.PI / 180;

    const h = Math.sin(dPhi / 2) ** 2 +
        Math.cos(phi1) * Math.cos(phi2) *
        Math.sin(dLambda / 2) ** 2;

    return HAVERSINE_EARTH_RADIUS_M * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}
