/**
 * Geo Types
 *
 * Coordinates, derived boxes and ranked proximity results.
 */

// ============================================================================
// Coordinates
// ============================================================================

export type GeoCoordinate = Readonly<{
    /** Degrees, [-90, 90] */
    latitude: number;
    /** Degrees, [-180, 180] */
    longitude: number;
}>;

/**
 * Location attribute as persisted on geo-tagged documents (`mapLocation`).
 */
export interface MapLocation {
    lat: number;
    lng: number;
    /** Human-readable place label, e.g. "Main campus gate" */
    label?: string;
}

// ============================================================================
// Derived shapes (never persisted)
// ============================================================================

export interface BoundingBox {
    minLat: number;
    minLng: number;
    maxLat: number;
    maxLng: number;
}

/**
 * Lexicographic bounds for a range scan over a geohash-indexed field.
 */
export interface GeohashRange {
    lowerBound: string;
    upperBound: string;
}

export interface GeohashDecodeResult {
    latitude: number;
    longitude: number;
    /** Half-height of the cell in degrees */
    latitudeError: number;
    /** Half-width of the cell in degrees */
    longitudeError: number;
}

// ============================================================================
// Ranked results
// ============================================================================

export type RankedResult<T> = T & {
    distanceMeters: number;
};
