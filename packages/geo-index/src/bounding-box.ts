/**
 * Bounding Box
 *
 * Equirectangular approximation around the centre latitude. Accurate for
 * radii up to a few tens of kilometres; degenerates towards the poles where
 * cos(lat) → 0 and the longitude span grows without bound.
 */

import type { BoundingBox, GeoCoordinate } from '@cityscope/types';

/** WGS84 equatorial radius. Distances use the mean radius instead, see distance.ts. */
export const BOUNDING_BOX_EARTH_RADIUS_M = 6378137;

const DEGREES_PER_RADIAN = 180 / Math.PI;

export function boundingBox(center: GeoCoordinate, radiusMeters: number): BoundingBox {
    const dLat = radiusMeters / BOUNDING_BOX_EARTH_RADIUS_M;
    const dLng = radiusMeters / (BOUNDING_BOX_EARTH_RADIUS_M * Math.cos(Math.PI * center.latitude / 180));

    return {
        minLat: center.latitude - dLat * DEGREES_PER_RADIAN,
        minLng: center.longitude - dLng * DEGREES_PER_RADIAN,
        maxLat: center.latitude + dLat * DEGREES_PER_RADIAN,
        maxLng: center.longitude + dLng * DEGREES_PER_RADIAN,
    };
}

/**
 * Clamp a box to valid coordinates. Longitude widens to the full range when
 * the box passes over a pole, crosses the antimeridian or spans the globe:
 * a single geohash range cannot cover the wrapped part otherwise.
 */
export function clampBoundingBox(box: BoundingBox): BoundingBox {
    const lngSpan = box.maxLng - box.minLng;
    const fullLongitude = !Number.isFinite(lngSpan)
        || lngSpan >= 360
        || box.minLat < -90 || box.maxLat > 90
        || box.minLng < -180 || box.maxLng > 180;

    return {
        minLat: Math.max(-90, box.minLat),
        maxLat: Math.min(90, box.maxLat),
        minLng: fullLongitude ? -180 : Math.max(-180, box.minLng),
        maxLng: fullLongitude ? 180 : Math.min(180, box.maxLng),
    };
}

export function containsCoordinate(box: BoundingBox, coord: GeoCoordinate): boolean {
    return coord.latitude >= box.minLat && coord.latitude <= box.maxLat
        && coord.longitude >= box.minLng && coord.longitude <= box.maxLng;
}
