import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MemoryDocumentStore } from '../memory-store.js';
import { CollectionRepository, GeoTaggedRepository } from '../repository.js';
import { backfillGeohashes } from '../backfill.js';
import { readMapLocation } from '../map-location.js';
import { NotFoundError } from '@cityscope/types';

describe('GeoTaggedRepository', () => {
    let store: MemoryDocumentStore;
    let repo: GeoTaggedRepository;

    beforeEach(() => {
        store = new MemoryDocumentStore();
        repo = new GeoTaggedRepository(store, 'pois');
    });

    it('writes the geohash together with the map location on create', async () => {
        const doc = await repo.create({ name: 'Central market', mapLocation: { lat: 4.05, lng: 9.70, label: 'Market' } });

        expect(doc.data.geohash).toBe('s0wzh9r2f');
        expect(doc.data.createdAt).toBeInstanceOf(Date);
    });

    it('stores a null geohash when there is no location', async () => {
        const doc = await repo.create({ name: 'Online only' });
        expect(doc.data.geohash).toBeNull();
    });

    it('recomputes the geohash when the location changes', async () => {
        const created = await repo.create({ name: 'Moving stall', mapLocation: { lat: 4.05, lng: 9.70 } });
        const updated = await repo.update(created.id, { mapLocation: { lat: 4.10, lng: 9.75 } });

        expect(updated.data.geohash).toBe('s0wzmf7sp');
    });

    it('leaves the geohash alone when other fields change', async () => {
        const created = await repo.create({ name: 'Stall', mapLocation: { lat: 4.05, lng: 9.70 } });
        const updated = await repo.update(created.id, { name: 'Renamed stall' });

        expect(updated.data).toMatchObject({ name: 'Renamed stall', geohash: 's0wzh9r2f' });
    });

    it('clears the geohash when the location is removed', async () => {
        const created = await repo.create({ name: 'Stall', mapLocation: { lat: 4.05, lng: 9.70 } });
        const updated = await repo.update(created.id, { mapLocation: null });

        expect(updated.data.geohash).toBeNull();
    });

    it('rejects a malformed location', async () => {
        await expect(repo.create({ name: 'Bad', mapLocation: { lat: 123, lng: 9.70 } })).rejects.toThrow('Malformed mapLocation');
    });
});

describe('CollectionRepository', () => {
    it('raises NotFoundError for missing documents', async () => {
        const repo = new CollectionRepository(new MemoryDocumentStore(), 'users');

        await expect(repo.get('ghost')).rejects.toBeInstanceOf(NotFoundError);
        await expect(repo.update('ghost', { fullName: 'x' })).rejects.toBeInstanceOf(NotFoundError);
        await expect(repo.delete('ghost')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('tells whether a document exists', async () => {
        const repo = new CollectionRepository(new MemoryDocumentStore(), 'institutions');
        const created = await repo.create({ name: 'Polytechnic' });

        expect(await repo.exists(created.id)).toBe(true);
        expect(await repo.exists('ghost')).toBe(false);
    });

    it('keeps a caller-supplied createdAt', async () => {
        const repo = new CollectionRepository(new MemoryDocumentStore(), 'news');
        const createdAt = new Date('2025-01-01T00:00:00Z');
        const doc = await repo.create({ headline: 'Opening day', createdAt });

        expect(doc.data.createdAt).toEqual(createdAt);
    });
});

describe('readMapLocation', () => {
    it('accepts geopoint-shaped values', () => {
        expect(readMapLocation({ mapLocation: { latitude: 4.05, longitude: 9.7 } })).toEqual({ lat: 4.05, lng: 9.7 });
    });

    it('returns null when absent', () => {
        expect(readMapLocation({ title: 'x' })).toBeNull();
    });
});

describe('backfillGeohashes', () => {
    it('writes missing and stale geohashes and skips the rest', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        const store = new MemoryDocumentStore();
        await store.put('posts', { mapLocation: { lat: 4.05, lng: 9.70 } }, 'missing');
        await store.put('posts', { mapLocation: { lat: 4.05, lng: 9.70 }, geohash: 's0wzh9r2f' }, 'current');
        await store.put('posts', { mapLocation: { lat: 4.05, lng: 9.70 }, geohash: 's0wzmf7sp' }, 'stale');
        await store.put('posts', { title: 'no location' }, 'unlocated');
        await store.put('posts', { mapLocation: { lat: 'north', lng: 9.70 } }, 'broken');

        const report = await backfillGeohashes(store, 'posts');

        expect(report).toEqual({ collection: 'posts', updated: 2, skipped: 2, errors: 1 });
        expect((await store.get('posts', 'missing'))?.data.geohash).toBe('s0wzh9r2f');
        expect((await store.get('posts', 'stale'))?.data.geohash).toBe('s0wzh9r2f');
    });
});
