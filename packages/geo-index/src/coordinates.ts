import { InvalidCoordinateError } from '@cityscope/types';
import type { GeoCoordinate, MapLocation } from '@cityscope/types';

export function isValidCoordinate(coord: GeoCoordinate): boolean {
    return Number.isFinite(coord.latitude)
        && Number.isFinite(coord.longitude)
        && coord.latitude >= -90 && coord.latitude <= 90
        && coord.longitude >= -180 && coord.longitude <= 180;
}

export function assertValidCoordinate(coord: GeoCoordinate): void {
    if (!isValidCoordinate(coord)) {
        throw new InvalidCoordinateError(coord.latitude, coord.longitude);
    }
}

export function toGeoCoordinate(location: MapLocation): GeoCoordinate {
    return { latitude: location.lat, longitude: location.lng };
}
