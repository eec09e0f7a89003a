/**
 * Time Windows
 *
 * Window starts are computed in server-local time: midnight today, Monday
 * midnight of the current week, or midnight on the first of the month.
 */

import type { TimeWindow } from '@cityscope/types';

const ALIASES: Record<string, TimeWindow> = {
    today: 'today',
    'this week': 'thisWeek',
    this_week: 'thisWeek',
    thisweek: 'thisWeek',
    week: 'thisWeek',
    'this month': 'thisMonth',
    this_month: 'thisMonth',
    thismonth: 'thisMonth',
    month: 'thisMonth',
};

/**
 * Map a free-form window label to a TimeWindow. Unknown or absent labels
 * mean no time restriction.
 */
export function parseTimeWindow(value: string | null | undefined): TimeWindow {
    if (!value) return 'none';
    return ALIASES[value.trim().toLowerCase()] ?? 'none';
}

export function timeWindowStart(window: TimeWindow, now: Date = new Date()): Date | null {
    const start = new Date(now.getFullYear(), now.getMonth(), now.getDate());

    switch (window) {
        case 'none':
            return null;
        case 'today':
            return start;
        case 'thisWeek':
            // getDay(): Sunday = 0
            start.setDate(start.getDate() - ((start.getDay() + 6) % 7));
            return start;
        case 'thisMonth':
            start.setDate(1);
            return start;
    }
}
