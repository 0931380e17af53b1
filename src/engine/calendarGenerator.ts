// src/engine/calendarGenerator.ts

import { addDays, getISODay, isAfter } from 'date-fns';
import type { Weekday } from '../models/Settings';
import type { WorkDay } from '../models/WorkDay';
import { toCalendarDay, toDayKey } from '../utils/dates';

export interface CalendarOptions {
    today: Date;
    until: Date;                               // Inclusive
    workWeekdays: ReadonlySet<Weekday>;
    holidays: ReadonlySet<string>;             // yyyy-MM-dd keys
}

/**
 * True if the date falls on a work weekday and is not a holiday
 */
export function isWorkDay(
    date: Date,
    workWeekdays: ReadonlySet<Weekday>,
    holidays: ReadonlySet<string>
): boolean {
    return workWeekdays.has(getISODay(date)) && !holidays.has(toDayKey(date));
}

/**
 * Generate the ordered work days from today through `until`
 *
 * Pure function - no side effects
 *
 * @returns Work days in date order, empty if today is after `until`
 */
export function generateWorkDays(options: CalendarOptions): WorkDay[] {
    const { workWeekdays, holidays } = options;
    const workDays: WorkDay[] = [];

    const last = toCalendarDay(options.until);
    let current = toCalendarDay(options.today);

    // addDays keeps local midnight across DST changes
    while (!isAfter(current, last)) {
        if (isWorkDay(current, workWeekdays, holidays)) {
            workDays.push({
                date: current,
                key: toDayKey(current),
                index: workDays.length
            });
        }
        current = addDays(current, 1);
    }

    return workDays;
}
