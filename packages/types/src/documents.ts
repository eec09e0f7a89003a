/**
 * Document Store Types
 *
 * The persistence layer is reached only through DocumentStore. Documents are
 * free-form attribute maps; typed models are validated on read.
 */

import type { MapLocation } from './geo.js';

// ============================================================================
// Values
// ============================================================================

export interface GeoPointValue {
    latitude: number;
    longitude: number;
}

export type DocumentValue =
    | string
    | number
    | boolean
    | null
    | Date
    | GeoPointValue
    | DocumentValue[]
    | { [key: string]: DocumentValue };

export type DocumentData = { [key: string]: DocumentValue };

export interface StoredDocument {
    id: string;
    data: DocumentData;
}

// ============================================================================
// Queries
// ============================================================================

export type FilterOperator = '==' | 'in' | 'array-contains' | 'array-contains-any' | '>=' | '<=';

export interface QueryFilter {
    field: string;
    op: FilterOperator;
    value: DocumentValue;
}

export interface QueryOptions {
    orderBy?: {
        field: string;
        direction: 'asc' | 'desc';
    };
    limit?: number;
}

// ============================================================================
// Store interface
// ============================================================================

export interface DocumentStore {
    /** Backend name for logging */
    readonly name: string;

    get(collection: string, id: string): Promise<StoredDocument | null>;

    list(collection: string): Promise<StoredDocument[]>;

    /**
     * Create or overwrite a document. An id is generated when omitted.
     * Returns the document id.
     */
    put(collection: string, data: DocumentData, id?: string): Promise<string>;

    /** Merge attributes into an existing document. */
    update(collection: string, id: string, data: DocumentData): Promise<void>;

    delete(collection: string, id: string): Promise<void>;

    /** Inclusive lexicographic range scan on a single string field. */
    rangeQuery(collection: string, field: string, lowerBound: string, upperBound: string): Promise<StoredDocument[]>;

    query(collection: string, filters: QueryFilter[], options?: QueryOptions): Promise<StoredDocument[]>;
}

// ============================================================================
// Geo-tagged records
// ============================================================================

/**
 * Any stored entity indexed by location.
 */
export interface GeoTaggedRecord {
    id: string;
    mapLocation: MapLocation;
    geohash: string;
    data: DocumentData;
}

export const COLLECTIONS = {
    users: 'users',
    pois: 'pois',
    institutions: 'institutions',
    posts: 'institution_posts',
    news: 'news',
} as const;

export type CollectionName = typeof COLLECTIONS[keyof typeof COLLECTIONS];
