/**
 * Geohash
 *
 * Standard base32 geohash encoding. Bits alternate longitude/latitude,
 * starting with longitude; each character carries five bits.
 */

import type { BoundingBox, GeoCoordinate, GeohashDecodeResult, GeohashRange } from '@cityscope/types';

const BASE32 = '0123456789bcdefghjkmnpqrstuvwxyz';

/** Precision written on every geo-tagged document (~5m cells) */
export const STORED_GEOHASH_PRECISION = 9;

export const MIN_GEOHASH_PRECISION = 1;
export const MAX_GEOHASH_PRECISION = 12;

/**
 * Sorts after every base32 character. Appended to the NE corner so that
 * stored hashes longer than the query precision still fall inside the range.
 */
export const GEOHASH_RANGE_SUFFIX = '~';

export function encodeGeohash(coord: GeoCoordinate, precision: number = STORED_GEOHASH_PRECISION): string {
    if (!Number.isInteger(precision) || precision < MIN_GEOHASH_PRECISION || precision > MAX_GEOHASH_PRECISION) {
        throw new RangeError(`Geohash precision must be an integer in [${MIN_GEOHASH_PRECISION}, ${MAX_GEOHASH_PRECISION}], got ${precision}`);
    }

    let minLat = -90;
    let maxLat = 90;
    let minLng = -180;
    let maxLng = 180;

    let hash = '';
    let bits = 0;
    let index = 0;
    let evenBit = true;

    while (hash.length < precision) {
        if (evenBit) {
            const mid = (minLng + maxLng) / 2;
            if (coord.longitude > mid) {
                index = index * 2 + 1;
                minLng = mid;
            } else {
                index = index * 2;
                maxLng = mid;
            }
        } else {
            const mid = (minLat + maxLat) / 2;
            if (coord.latitude > mid) {
                index = index * 2 + 1;
                minLat = mid;
            } else {
                index = index * 2;
                maxLat = mid;
            }
        }
        evenBit = !evenBit;

        if (++bits === 5) {
            hash += BASE32.charAt(index);
            bits = 0;
            index = 0;
        }
    }

    return hash;
}

export function decodeGeohash(hash: string): GeohashDecodeResult {
    if (hash.length === 0) {
        throw new RangeError('Cannot decode an empty geohash');
    }

    let minLat = -90;
    let maxLat = 90;
    let minLng = -180;
    let maxLng = 180;
    let evenBit = true;

    for (const char of hash.toLowerCase()) {
        const index = BASE32.indexOf(char);
        if (index === -1) {
            throw new RangeError(`Invalid geohash character "${char}" in "${hash}"`);
        }

        for (let bit = 4; bit >= 0; bit--) {
            const isSet = ((index >> bit) & 1) === 1;
            if (evenBit) {
                const mid = (minLng + maxLng) / 2;
                if (isSet) minLng = mid; else maxLng = mid;
            } else {
                const mid = (minLat + maxLat) / 2;
                if (isSet) minLat = mid; else maxLat = mid;
            }
            evenBit = !evenBit;
        }
    }

    return {
        latitude: (minLat + maxLat) / 2,
        longitude: (minLng + maxLng) / 2,
        latitudeError: (maxLat - minLat) / 2,
        longitudeError: (maxLng - minLng) / 2,
    };
}

/**
 * Range covering a box: SW corner as lower bound, NE corner as upper bound.
 * Lexicographic geohash order only approximates the box, so results of a
 * scan over this range must still be filtered by exact distance.
 */
export function geohashRange(box: BoundingBox, precision: number): GeohashRange {
    const lowerBound = encodeGeohash({ latitude: box.minLat, longitude: box.minLng }, precision);
    const upperBound = encodeGeohash({ latitude: box.maxLat, longitude: box.maxLng }, precision);

    return {
        lowerBound,
        upperBound: upperBound + GEOHASH_RANGE_SUFFIX,
    };
}

/**
 * True when `hash` decodes to a cell containing `coord`.
 */
export function geohashMatches(hash: string, coord: GeoCoordinate): boolean {
    const cell = decodeGeohash(hash);
    return Math.abs(cell.latitude - coord.latitude) <= cell.latitudeError
        && Math.abs(cell.longitude - coord.longitude) <= cell.longitudeError;
}
