/**
 * Map Location Parsing
 *
 * Stored locations come in two shapes: `{ lat, lng, label? }` written by the
 * API, and `{ latitude, longitude }` geopoints from older documents or
 * store-native point types. Both normalize to MapLocation.
 */

import { z } from 'zod';
import type { DocumentData, MapLocation } from '@cityscope/types';

const Latitude = z.number().finite().min(-90).max(90);
const Longitude = z.number().finite().min(-180).max(180);

export const MapLocationSchema = z.object({
    lat: Latitude,
    lng: Longitude,
    label: z.string().optional(),
});

const GeoPointSchema = z.object({
    latitude: Latitude,
    longitude: Longitude,
}).transform((point): MapLocation => ({ lat: point.latitude, lng: point.longitude }));

const StoredLocationSchema = z.union([MapLocationSchema, GeoPointSchema]);

export const MAP_LOCATION_FIELD = 'mapLocation';
export const GEOHASH_FIELD = 'geohash';

/**
 * Read the location attribute of a document.
 * Returns null when the attribute is absent; throws when it is malformed.
 */
export function readMapLocation(data: DocumentData, field: string = MAP_LOCATION_FIELD): MapLocation | null {
    const raw = data[field];
    if (raw === undefined || raw === null) {
        return null;
    }

    const parsed = StoredLocationSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`Malformed ${field}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }

    const location: MapLocation = { lat: parsed.data.lat, lng: parsed.data.lng };
    if (parsed.data.label !== undefined) {
        location.label = parsed.data.label;
    }
    return location;
}
