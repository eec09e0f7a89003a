/**
 * Memory Document Store
 *
 * In-process DocumentStore. Backs the `memory` store backend and every test
 * that needs a store. Documents are cloned on the way in and out so callers
 * never share references with the stored state.
 */

import { randomUUID } from 'node:crypto';
import { NotFoundError } from '@cityscope/types';
import type {
    DocumentData,
    DocumentStore,
    DocumentValue,
    QueryFilter,
    QueryOptions,
    StoredDocument,
} from '@cityscope/types';

export class MemoryDocumentStore implements DocumentStore {
    readonly name = 'memory';

    private collections: Map<string, Map<string, DocumentData>> = new Map();

    async get(collection: string, id: string): Promise<StoredDocument | null> {
        const data = this.collection(collection).get(id);
        return data ? { id, data: structuredClone(data) } : null;
    }

    async list(collection: string): Promise<StoredDocument[]> {
        return Array.from(this.collection(collection).entries())
            .map(([id, data]) => ({ id, data: structuredClone(data) }));
    }

    async put(collection: string, data: DocumentData, id?: string): Promise<string> {
        const docId = id || randomUUID().replace(/-/g, '').substring(0, 20);
        this.collection(collection).set(docId, structuredClone(data));
        return docId;
    }

    async update(collection: string, id: string, data: DocumentData): Promise<void> {
        const docs = this.collection(collection);
        const existing = docs.get(id);
        if (!existing) {
            throw new NotFoundError(collection, id);
        }
        docs.set(id, { ...existing, ...structuredClone(data) });
    }

    async delete(collection: string, id: string): Promise<void> {
        this.collection(collection).delete(id);
    }

    async rangeQuery(collection: string, field: string, lowerBound: string, upperBound: string): Promise<StoredDocument[]> {
        return this.query(collection, [
            { field, op: '>=', value: lowerBound },
            { field, op: '<=', value: upperBound },
        ]);
    }

    async query(collection: string, filters: QueryFilter[], options: QueryOptions = {}): Promise<StoredDocument[]> {
        let results = (await this.list(collection))
            .filter(doc => filters.every(filter => matchesFilter(doc.data[filter.field], filter)));

        if (options.orderBy) {
            const { field, direction } = options.orderBy;
            // Documents without the ordering field are excluded, as in Firestore
            results = results
                .filter(doc => doc.data[field] !== undefined)
                .sort((a, b) => {
                    const order = compareValues(a.data[field], b.data[field]) ?? 0;
                    return direction === 'asc' ? order : -order;
                });
        }

        if (options.limit !== undefined) {
            results = results.slice(0, options.limit);
        }

        return results;
    }

    /**
     * Number of documents in a collection
     */
    size(collection: string): number {
        return this.collection(collection).size;
    }

    private collection(name: string): Map<string, DocumentData> {
        let docs = this.collections.get(name);
        if (!docs) {
            docs = new Map();
            this.collections.set(name, docs);
        }
        return docs;
    }
}

// ============================================================================
// Filter evaluation
// ============================================================================

function matchesFilter(value: DocumentValue | undefined, filter: QueryFilter): boolean {
    if (value === undefined) return false;
    const actual = value;
    const expected = filter.value;

    switch (filter.op) {
        case '==':
            return valuesEqual(actual, expected);
        case 'in':
            return Array.isArray(expected) && expected.some(v => valuesEqual(actual, v));
        case 'array-contains':
            return Array.isArray(actual) && actual.some(v => valuesEqual(v, expected));
        case 'array-contains-any':
            return Array.isArray(actual)
                && Array.isArray(expected)
                && actual.some(v => expected.some(w => valuesEqual(v, w)));
        case '>=': {
            const order = compareValues(actual, expected);
            return order !== null && order >= 0;
        }
        case '<=': {
            const order = compareValues(actual, expected);
            return order !== null && order <= 0;
        }
    }
}

function valuesEqual(a: DocumentValue, b: DocumentValue): boolean {
    if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
    return a === b;
}

/**
 * Orders two values of the same comparable type; null when not comparable.
 * Strings compare by code unit, matching index order.
 */
function compareValues(a: DocumentValue | undefined, b: DocumentValue | undefined): number | null {
    if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
    return null;
}
