import { describe, it, expect } from 'vitest';
import { normalizePublishedAt, parsePublishedAt } from '../published-at.js';

const NOW = new Date('2025-03-10T12:00:00Z');

describe('normalizePublishedAt', () => {
    it('normalizes ISO timestamps', () => {
        expect(normalizePublishedAt('2025-03-10T08:00:00Z', NOW)).toBe('2025-03-10T08:00:00.000Z');
        expect(normalizePublishedAt('2025-03-10T09:00:00+01:00', NOW)).toBe('2025-03-10T08:00:00.000Z');
    });

    it('resolves relative phrases', () => {
        expect(normalizePublishedAt('3 hours ago', NOW)).toBe('2025-03-10T09:00:00.000Z');
        expect(normalizePublishedAt('an hour ago', NOW)).toBe('2025-03-10T11:00:00.000Z');
        expect(normalizePublishedAt('45 mins ago', NOW)).toBe('2025-03-10T11:15:00.000Z');
        expect(normalizePublishedAt('1 day ago', NOW)).toBe('2025-03-09T12:00:00.000Z');
        expect(normalizePublishedAt('2 weeks ago', NOW)).toBe('2025-02-24T12:00:00.000Z');
        expect(normalizePublishedAt('yesterday', NOW)).toBe('2025-03-09T12:00:00.000Z');
    });

    it('parses the Google News date format with its offset', () => {
        expect(normalizePublishedAt('03/10/2025, 02:30 PM, +0100 UTC', NOW)).toBe('2025-03-10T13:30:00.000Z');
        expect(normalizePublishedAt('01/02/2025, 12:15 AM, +0000 UTC', NOW)).toBe('2025-01-02T00:15:00.000Z');
    });

    it('keeps unparseable values verbatim', () => {
        expect(normalizePublishedAt('recently', NOW)).toBe('recently');
        expect(normalizePublishedAt('3 fortnights ago', NOW)).toBe('3 fortnights ago');
    });

    it('maps absent values to null', () => {
        expect(normalizePublishedAt(null, NOW)).toBeNull();
        expect(normalizePublishedAt(undefined, NOW)).toBeNull();
        expect(normalizePublishedAt('  ', NOW)).toBeNull();
    });
});

describe('parsePublishedAt', () => {
    it('returns null for an empty string', () => {
        expect(parsePublishedAt('', NOW)).toBeNull();
    });
});
