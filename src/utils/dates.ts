// src/utils/dates.ts

import { format, isValid, parse, startOfDay } from 'date-fns';

export const DAY_KEY_FORMAT = 'yyyy-MM-dd';

/**
 * Format a date as its yyyy-MM-dd key (local time)
 */
export function toDayKey(date: Date): string {
    return format(date, DAY_KEY_FORMAT);
}

/**
 * Parse a strict yyyy-MM-dd string into a local-midnight Date
 *
 * @returns Parsed date, or null if the string is not a real calendar date
 */
export function parseDayKey(value: string): Date | null {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
        return null;
    }

    // parse() rejects overflow such as 2026-02-30, parseISO would not
    const parsed = parse(value, DAY_KEY_FORMAT, new Date(0));
    return isValid(parsed) ? parsed : null;
}

/**
 * Strip the time of day
 */
export function toCalendarDay(date: Date): Date {
    return startOfDay(date);
}
