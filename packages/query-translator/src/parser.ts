/**
 * Translation Parser
 *
 * Completion backends wrap their JSON in prose or code fences. The first
 * balanced {...} substring is taken as the answer; anything that does not
 * parse into the expected shape is a TranslationFailedError.
 */

import { z } from 'zod';
import { TranslationFailedError } from '@cityscope/types';
import type { StructuredFilter } from '@cityscope/types';
import { parseTimeWindow } from './time-window.js';

const TranslationSchema = z.object({
    post_types: z.array(z.string()),
    keywords: z.array(z.string()),
    categories: z.array(z.string()),
    time_filter: z.string().nullable(),
    location_type: z.string().nullable(),
});

/**
 * First balanced {...} substring, ignoring braces inside JSON strings.
 * Null when no object opens or the first one never closes.
 */
export function extractFirstJsonObject(text: string): string | null {
    const start = text.indexOf('{');
    if (start === -1) return null;

    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const char = text[i];

        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (char === '\\') {
                escaped = true;
            } else if (char === '"') {
                inString = false;
            }
            continue;
        }

        if (char === '"') {
            inString = true;
        } else if (char === '{') {
            depth++;
        } else if (char === '}') {
            depth--;
            if (depth === 0) {
                return text.slice(start, i + 1);
            }
        }
    }

    return null;
}

/**
 * Parse a completion into a StructuredFilter
 */
export function parseStructuredFilter(text: string): StructuredFilter {
    const json = extractFirstJsonObject(text);
    if (!json) {
        console.error('[TranslationParser] No JSON object in completion:', text.substring(0, 200));
        throw new TranslationFailedError('No JSON object in completion');
    }

    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        throw new TranslationFailedError('Completion JSON does not parse', error);
    }

    const parsed = TranslationSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new TranslationFailedError(`Malformed translation: ${issues}`, parsed.error);
    }

    return {
        postTypes: new Set(clean(parsed.data.post_types)),
        keywords: clean(parsed.data.keywords),
        categories: new Set(clean(parsed.data.categories)),
        timeWindow: parseTimeWindow(parsed.data.time_filter),
        proximityIntent: parsed.data.location_type?.trim().toLowerCase() === 'nearby',
    };
}

function clean(values: string[]): string[] {
    return values.map(v => v.trim()).filter(v => v.length > 0);
}
