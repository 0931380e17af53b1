import { describe, it, expect } from 'vitest';
import { generateWorkDays, isWorkDay } from './calendarGenerator';
import { Weekday } from '../models/Settings';
import { parseDayKey } from '../utils/dates';

const WEEKDAYS = new Set([
    Weekday.MONDAY,
    Weekday.TUESDAY,
    Weekday.WEDNESDAY,
    Weekday.THURSDAY,
    Weekday.FRIDAY
]);

function day(key: string): Date {
    const parsed = parseDayKey(key);
    if (!parsed) {
        throw new Error(`Bad test date ${key}`);
    }
    return parsed;
}

describe('generateWorkDays', () => {
    it('lists weekdays from today through the end date', () => {
        const workDays = generateWorkDays({
            today: day('2026-11-02'),
            until: day('2026-11-08'),
            workWeekdays: WEEKDAYS,
            holidays: new Set()
        });

        expect(workDays.map(d => d.key)).toEqual([
            '2026-11-02',
            '2026-11-03',
            '2026-11-04',
            '2026-11-05',
            '2026-11-06'
        ]);
        expect(workDays.map(d => d.index)).toEqual([0, 1, 2, 3, 4]);
    });

    it('skips holidays', () => {
        const workDays = generateWorkDays({
            today: day('2026-11-02'),
            until: day('2026-11-06'),
            workWeekdays: WEEKDAYS,
            holidays: new Set(['2026-11-04'])
        });

        expect(workDays.map(d => d.key)).toEqual(['2026-11-02', '2026-11-03', '2026-11-05', '2026-11-06']);
        expect(workDays.map(d => d.index)).toEqual([0, 1, 2, 3]);
    });

    it('is empty when today is after the end date', () => {
        const workDays = generateWorkDays({
            today: day('2026-11-10'),
            until: day('2026-11-06'),
            workWeekdays: WEEKDAYS,
            holidays: new Set()
        });

        expect(workDays).toEqual([]);
    });

    it('includes the end date itself', () => {
        const workDays = generateWorkDays({
            today: day('2026-11-06'),
            until: day('2026-11-06'),
            workWeekdays: WEEKDAYS,
            holidays: new Set()
        });

        expect(workDays.map(d => d.key)).toEqual(['2026-11-06']);
    });

    it('honours a custom set of work weekdays', () => {
        const workDays = generateWorkDays({
            today: day('2026-11-02'),
            until: day('2026-11-15'),
            workWeekdays: new Set([Weekday.SATURDAY, Weekday.SUNDAY]),
            holidays: new Set()
        });

        expect(workDays.map(d => d.key)).toEqual(['2026-11-07', '2026-11-08', '2026-11-14', '2026-11-15']);
    });

    it('ignores the time of day of today', () => {
        const workDays = generateWorkDays({
            today: new Date(2026, 10, 2, 15, 30),
            until: day('2026-11-03'),
            workWeekdays: WEEKDAYS,
            holidays: new Set()
        });

        expect(workDays.map(d => d.key)).toEqual(['2026-11-02', '2026-11-03']);
        expect(workDays[0].date.getHours()).toBe(0);
    });

    it('never yields a holiday or a non-work weekday over a full year', () => {
        const holidays = new Set(['2026-01-01', '2026-04-06', '2026-12-25', '2026-12-26']);
        const workWeekdays = new Set([Weekday.MONDAY, Weekday.WEDNESDAY, Weekday.SATURDAY]);

        const workDays = generateWorkDays({
            today: day('2026-01-01'),
            until: day('2026-12-31'),
            workWeekdays,
            holidays
        });

        expect(workDays.length).toBeGreaterThan(150);
        for (const workDay of workDays) {
            expect(holidays.has(workDay.key)).toBe(false);
            expect(isWorkDay(workDay.date, workWeekdays, holidays)).toBe(true);
        }
    });

    it('returns a sequence that can be walked more than once', () => {
        const workDays = generateWorkDays({
            today: day('2026-11-02'),
            until: day('2026-11-20'),
            workWeekdays: WEEKDAYS,
            holidays: new Set()
        });

        const first = [...workDays].map(d => d.key);
        const second = [...workDays].map(d => d.key);
        expect(second).toEqual(first);
        expect(first).toHaveLength(15);
    });
});

describe('isWorkDay', () => {
    it('rejects weekends and holidays', () => {
        const holidays = new Set(['2026-11-04']);

        expect(isWorkDay(day('2026-11-03'), WEEKDAYS, holidays)).toBe(true);
        expect(isWorkDay(day('2026-11-04'), WEEKDAYS, holidays)).toBe(false);
        expect(isWorkDay(day('2026-11-07'), WEEKDAYS, holidays)).toBe(false);
    });
});
