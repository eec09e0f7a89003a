import type { DocumentStore } from '@cityscope/types';
import { MemoryDocumentStore } from './memory-store.js';
import { FirestoreDocumentStore } from './firestore-store.js';

export type StoreBackend = 'memory' | 'firestore';

export interface StoreConfig {
    backend: StoreBackend;
    projectId?: string;
}

export function createDocumentStore(config: StoreConfig): DocumentStore {
    const store = config.backend === 'firestore'
        ? new FirestoreDocumentStore({ projectId: config.projectId })
        : new MemoryDocumentStore();

    console.log(`[Store] Using ${store.name} document store${config.projectId ? ` (project: ${config.projectId})` : ''}`);
    return store;
}
