import { describe, it, expect } from 'vitest';
import { TranslationFailedError } from '@cityscope/types';
import { extractFirstJsonObject, parseStructuredFilter } from '../parser.js';

const EMBEDDED =
    'some preamble {"post_types":["job"],"keywords":[],"categories":[],"time_filter":null,"location_type":null} trailing';

describe('extractFirstJsonObject', () => {
    it('extracts an object embedded in prose', () => {
        expect(extractFirstJsonObject(EMBEDDED)).toBe(
            '{"post_types":["job"],"keywords":[],"categories":[],"time_filter":null,"location_type":null}'
        );
    });

    it('stops at the first balanced object', () => {
        expect(extractFirstJsonObject('{"a":{"b":1}} and {"c":2}')).toBe('{"a":{"b":1}}');
    });

    it('ignores braces inside strings', () => {
        expect(extractFirstJsonObject('x {"k":"a}b\\"{"} y')).toBe('{"k":"a}b\\"{"}');
    });

    it('returns null without a complete object', () => {
        expect(extractFirstJsonObject('no json here')).toBeNull();
        expect(extractFirstJsonObject('{"post_types": [')).toBeNull();
    });
});

describe('parseStructuredFilter', () => {
    it('parses the embedded object', () => {
        const filter = parseStructuredFilter(EMBEDDED);

        expect(filter).toEqual({
            postTypes: new Set(['job']),
            keywords: [],
            categories: new Set(),
            timeWindow: 'none',
            proximityIntent: false,
        });
    });

    it('parses fenced output and maps time and location labels', () => {
        const text = [
            '```json',
            '{"post_types":["event"],"keywords":[" hackathon ",""],"categories":["tech"],"time_filter":"This Week","location_type":"nearby"}',
            '```',
        ].join('\n');

        const filter = parseStructuredFilter(text);

        expect(filter.postTypes).toEqual(new Set(['event']));
        expect(filter.keywords).toEqual(['hackathon']);
        expect(filter.categories).toEqual(new Set(['tech']));
        expect(filter.timeWindow).toBe('thisWeek');
        expect(filter.proximityIntent).toBe(true);
    });

    it('treats unknown time labels as no window', () => {
        const filter = parseStructuredFilter(
            '{"post_types":[],"keywords":[],"categories":[],"time_filter":"yesterday","location_type":"city"}'
        );

        expect(filter.timeWindow).toBe('none');
        expect(filter.proximityIntent).toBe(false);
    });

    it('fails on missing or mistyped fields', () => {
        expect(() => parseStructuredFilter('{"post_types":["job"],"keywords":[],"categories":[],"time_filter":null}'))
            .toThrow(TranslationFailedError);
        expect(() => parseStructuredFilter('{"post_types":"job","keywords":[],"categories":[],"time_filter":null,"location_type":null}'))
            .toThrow(TranslationFailedError);
    });

    it('fails on text without JSON and on invalid JSON', () => {
        expect(() => parseStructuredFilter('I could not understand the query.')).toThrow(TranslationFailedError);
        expect(() => parseStructuredFilter("{'post_types': []}")).toThrow(TranslationFailedError);
    });
});
