/**
 * Collection Repositories
 *
 * CRUD over one store collection. GeoTaggedRepository additionally owns the
 * `geohash` attribute: it is written in the same call as `mapLocation`, so
 * the two never diverge.
 */

import { NotFoundError } from '@cityscope/types';
import type { DocumentData, DocumentStore, QueryFilter, QueryOptions, StoredDocument } from '@cityscope/types';
import { encodeGeohash, toGeoCoordinate, STORED_GEOHASH_PRECISION } from '@cityscope/geo-index';
import { readMapLocation, MAP_LOCATION_FIELD, GEOHASH_FIELD } from './map-location.js';

export class CollectionRepository {
    constructor(
        protected readonly store: DocumentStore,
        readonly collection: string
    ) { }

    async create(data: DocumentData): Promise<StoredDocument> {
        const prepared = this.prepareCreate({
            ...data,
            createdAt: data.createdAt ?? new Date(),
        });
        const id = await this.store.put(this.collection, prepared);
        return this.get(id);
    }

    async get(id: string): Promise<StoredDocument> {
        const doc = await this.store.get(this.collection, id);
        if (!doc) {
            throw new NotFoundError(this.collection, id);
        }
        return doc;
    }

    async exists(id: string): Promise<boolean> {
        return (await this.store.get(this.collection, id)) !== null;
    }

    async list(filters: QueryFilter[] = [], options?: QueryOptions): Promise<StoredDocument[]> {
        if (filters.length === 0 && !options) {
            return this.store.list(this.collection);
        }
        return this.store.query(this.collection, filters, options);
    }

    async update(id: string, data: DocumentData): Promise<StoredDocument> {
        await this.get(id);
        await this.store.update(this.collection, id, this.prepareUpdate(data));
        return this.get(id);
    }

    async delete(id: string): Promise<void> {
        await this.get(id);
        await this.store.delete(this.collection, id);
    }

    protected prepareCreate(data: DocumentData): DocumentData {
        return data;
    }

    protected prepareUpdate(data: DocumentData): DocumentData {
        return data;
    }
}

export class GeoTaggedRepository extends CollectionRepository {
    protected prepareCreate(data: DocumentData): DocumentData {
        return withGeohash(data);
    }

    protected prepareUpdate(data: DocumentData): DocumentData {
        if (!(MAP_LOCATION_FIELD in data)) {
            return data;
        }
        return withGeohash(data);
    }
}

/**
 * Attach the geohash matching `mapLocation`, or clear it when the location
 * is absent. Throws on a malformed location.
 */
export function withGeohash(data: DocumentData): DocumentData {
    const location = readMapLocation(data);
    return {
        ...data,
        [GEOHASH_FIELD]: location
            ? encodeGeohash(toGeoCoordinate(location), STORED_GEOHASH_PRECISION)
            : null,
    };
}
