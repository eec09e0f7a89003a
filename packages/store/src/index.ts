/**
 * CityScope Store Package
 *
 * DocumentStore implementations, collection repositories and the geohash
 * backfill.
 */

export { MemoryDocumentStore } from './memory-store.js';
export { FirestoreDocumentStore, type FirestoreStoreOptions } from './firestore-store.js';
export { createDocumentStore, type StoreBackend, type StoreConfig } from './factory.js';
export { CollectionRepository, GeoTaggedRepository, withGeohash } from './repository.js';
export { backfillGeohashes, type BackfillReport } from './backfill.js';
export { readMapLocation, MapLocationSchema, MAP_LOCATION_FIELD, GEOHASH_FIELD } from './map-location.js';
