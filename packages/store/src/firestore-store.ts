/**
 * Firestore Document Store
 *
 * DocumentStore backed by Cloud Firestore. Firestore-native values are
 * converted at the boundary: Timestamp ⇄ Date, GeoPoint ⇄ { latitude, longitude }.
 * Transport failures surface as StoreUnavailableError.
 */

import { Firestore, GeoPoint, Timestamp, DocumentReference } from '@google-cloud/firestore';
import type { Query, DocumentData as FirestoreData } from '@google-cloud/firestore';
import { NotFoundError, StoreUnavailableError } from '@cityscope/types';
import type {
    DocumentData,
    DocumentStore,
    DocumentValue,
    GeoPointValue,
    QueryFilter,
    QueryOptions,
    StoredDocument,
} from '@cityscope/types';

/** gRPC NOT_FOUND, returned by update() on a missing document */
const GRPC_NOT_FOUND = 5;

export interface FirestoreStoreOptions {
    projectId?: string;
    /** Pre-built client, mainly for emulator setups */
    client?: Firestore;
}

export class FirestoreDocumentStore implements DocumentStore {
    readonly name = 'firestore';

    private db: Firestore;

    constructor(options: FirestoreStoreOptions = {}) {
        this.db = options.client ?? new Firestore(options.projectId ? { projectId: options.projectId } : {});
    }

    async get(collection: string, id: string): Promise<StoredDocument | null> {
        return this.run(`get ${collection}/${id}`, async () => {
            const snapshot = await this.db.collection(collection).doc(id).get();
            const data = snapshot.data();
            return snapshot.exists && data ? { id: snapshot.id, data: fromFirestoreData(data) } : null;
        });
    }

    async list(collection: string): Promise<StoredDocument[]> {
        return this.run(`list ${collection}`, async () => {
            const snapshot = await this.db.collection(collection).get();
            return snapshot.docs.map(doc => ({ id: doc.id, data: fromFirestoreData(doc.data()) }));
        });
    }

    async put(collection: string, data: DocumentData, id?: string): Promise<string> {
        return this.run(`put ${collection}`, async () => {
            const ref = id ? this.db.collection(collection).doc(id) : this.db.collection(collection).doc();
            await ref.set(toFirestoreData(data));
            return ref.id;
        });
    }

    async update(collection: string, id: string, data: DocumentData): Promise<void> {
        await this.run(`update ${collection}/${id}`, async () => {
            try {
                await this.db.collection(collection).doc(id).update(toFirestoreData(data));
            } catch (error) {
                if (hasGrpcCode(error, GRPC_NOT_FOUND)) {
                    throw new NotFoundError(collection, id);
                }
                throw error;
            }
        });
    }

    async delete(collection: string, id: string): Promise<void> {
        await this.run(`delete ${collection}/${id}`, async () => {
            await this.db.collection(collection).doc(id).delete();
        });
    }

    async rangeQuery(collection: string, field: string, lowerBound: string, upperBound: string): Promise<StoredDocument[]> {
        return this.query(collection, [
            { field, op: '>=', value: lowerBound },
            { field, op: '<=', value: upperBound },
        ]);
    }

    async query(collection: string, filters: QueryFilter[], options: QueryOptions = {}): Promise<StoredDocument[]> {
        return this.run(`query ${collection}`, async () => {
            let query: Query = this.db.collection(collection);

            for (const filter of filters) {
                query = query.where(filter.field, filter.op, toFirestoreValue(filter.value));
            }
            if (options.orderBy) {
                query = query.orderBy(options.orderBy.field, options.orderBy.direction);
            }
            if (options.limit !== undefined) {
                query = query.limit(options.limit);
            }

            const snapshot = await query.get();
            return snapshot.docs.map(doc => ({ id: doc.id, data: fromFirestoreData(doc.data()) }));
        });
    }

    private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            if (error instanceof NotFoundError) {
                throw error;
            }
            console.error(`[FirestoreStore] ✗ ${operation} failed:`, error);
            throw new StoreUnavailableError(`Firestore ${operation} failed`, error);
        }
    }
}

// ============================================================================
// Value conversion
// ============================================================================

function hasGrpcCode(error: unknown, code: number): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

function isGeoPointValue(value: object): value is GeoPointValue {
    const keys = Object.keys(value);
    return keys.length === 2
        && 'latitude' in value && typeof value.latitude === 'number'
        && 'longitude' in value && typeof value.longitude === 'number';
}

function toFirestoreData(data: DocumentData): FirestoreData {
    const result: FirestoreData = {};
    for (const [key, value] of Object.entries(data)) {
        result[key] = toFirestoreValue(value);
    }
    return result;
}

function toFirestoreValue(value: DocumentValue): unknown {
    if (value === null || value instanceof Date || typeof value !== 'object') {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map(toFirestoreValue);
    }
    if (isGeoPointValue(value)) {
        return new GeoPoint(value.latitude, value.longitude);
    }
    return toFirestoreData(value);
}

function fromFirestoreData(data: FirestoreData): DocumentData {
    const result: DocumentData = {};
    for (const [key, value] of Object.entries(data)) {
        result[key] = fromFirestoreValue(value);
    }
    return result;
}

function fromFirestoreValue(value: unknown): DocumentValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (value instanceof Timestamp) return value.toDate();
    if (value instanceof Date) return value;
    if (value instanceof GeoPoint) return { latitude: value.latitude, longitude: value.longitude };
    if (value instanceof DocumentReference) return value.path;
    if (Array.isArray(value)) return value.map(fromFirestoreValue);
    if (typeof value === 'object') {
        const nested: DocumentData = {};
        for (const [key, inner] of Object.entries(value)) {
            nested[key] = fromFirestoreValue(inner);
        }
        return nested;
    }
    return String(value);
}
