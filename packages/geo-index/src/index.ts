/**
 * CityScope Geo Index
 *
 * Geohash encoding, bounding boxes and great-circle distance.
 */

export {
    encodeGeohash,
    decodeGeohash,
    geohashRange,
    geohashMatches,
    STORED_GEOHASH_PRECISION,
    MIN_GEOHASH_PRECISION,
    MAX_GEOHASH_PRECISION,
    GEOHASH_RANGE_SUFFIX,
} from './geohash.js';
export { boundingBox, clampBoundingBox, containsCoordinate, BOUNDING_BOX_EARTH_RADIUS_M } from './bounding-box.js';
export { distanceMeters, HAVERSINE_EARTH_RADIUS_M } from './distance.js';
export { isValidCoordinate, assertValidCoordinate, toGeoCoordinate } from './coordinates.js';
