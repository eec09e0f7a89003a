/**
 * Publication Timestamps
 *
 * Providers report dates in different shapes: ISO 8601 (NewsAPI),
 * "MM/DD/YYYY, hh:mm AM, +0000 UTC" (SerpAPI Google News) and relative
 * phrases like "3 hours ago" (Serper). Everything parseable becomes ISO;
 * anything else is kept verbatim and sorts last.
 */

const UNIT_MS: Record<string, number> = {
    second: 1000,
    minute: 60 * 1000,
    hour: 60 * 60 * 1000,
    day: 24 * 60 * 60 * 1000,
    week: 7 * 24 * 60 * 60 * 1000,
    month: 30 * 24 * 60 * 60 * 1000,
    year: 365 * 24 * 60 * 60 * 1000,
};

const UNIT_ALIASES: Record<string, string> = {
    sec: 'second',
    min: 'minute',
    hr: 'hour',
};

const RELATIVE_PATTERN = /^(\d+|an?|one)\s+([a-z]+?)s?\s+ago$/i;
const SERPAPI_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4}),\s*(\d{1,2}):(\d{2})\s*(AM|PM),\s*([+-])(\d{2})(\d{2})(?:\s+UTC)?$/i;

export function parsePublishedAt(raw: string, now: Date = new Date()): Date | null {
    const value = raw.trim();
    if (!value) return null;

    const relative = value.match(RELATIVE_PATTERN);
    if (relative) {
        const amount = /^\d+$/.test(relative[1]) ? Number(relative[1]) : 1;
        const word = relative[2].toLowerCase();
        const unit = UNIT_MS[UNIT_ALIASES[word] ?? word];
        return unit === undefined ? null : new Date(now.getTime() - amount * unit);
    }
    if (value.toLowerCase() === 'yesterday') {
        return new Date(now.getTime() - UNIT_MS.day);
    }

    const serp = value.match(SERPAPI_PATTERN);
    if (serp) {
        const [, month, day, year, hourText, minute, meridiem, sign, offsetHours, offsetMinutes] = serp;
        let hour = Number(hourText) % 12;
        if (meridiem.toUpperCase() === 'PM') hour += 12;
        const iso = `${year}-${month}-${day}T${String(hour).padStart(2, '0')}:${minute}:00${sign}${offsetHours}:${offsetMinutes}`;
        return toDate(Date.parse(iso));
    }

    return toDate(Date.parse(value));
}

/**
 * ISO string when parseable, the raw value otherwise, null when absent.
 */
export function normalizePublishedAt(raw: string | null | undefined, now: Date = new Date()): string | null {
    if (raw === null || raw === undefined || raw.trim() === '') {
        return null;
    }
    const parsed = parsePublishedAt(raw, now);
    return parsed ? parsed.toISOString() : raw;
}

/**
 * Sort key for a normalized `publishedAt`; NaN when absent or unparseable.
 */
export function publishedAtMillis(publishedAt: string | null): number {
    return publishedAt === null ? Number.NaN : Date.parse(publishedAt);
}

function toDate(ms: number): Date | null {
    return Number.isNaN(ms) ? null : new Date(ms);
}
