// src/config/schema.ts

import { z } from 'zod';
import { isAfter } from 'date-fns';
import { AllocationPolicy, Weekday } from '../models/Settings';
import { parseDayKey, toDayKey } from '../utils/dates';

const DEFAULT_WORKING_DAYS_PER_WEEK = 5;

const WEEK: readonly Weekday[] = [
    Weekday.MONDAY,
    Weekday.TUESDAY,
    Weekday.WEDNESDAY,
    Weekday.THURSDAY,
    Weekday.FRIDAY,
    Weekday.SATURDAY,
    Weekday.SUNDAY
];

const WEEKDAY_LABELS = new Map<string, Weekday>([
    ['mon', Weekday.MONDAY], ['monday', Weekday.MONDAY],
    ['tue', Weekday.TUESDAY], ['tuesday', Weekday.TUESDAY],
    ['wed', Weekday.WEDNESDAY], ['wednesday', Weekday.WEDNESDAY],
    ['thu', Weekday.THURSDAY], ['thursday', Weekday.THURSDAY],
    ['fri', Weekday.FRIDAY], ['friday', Weekday.FRIDAY],
    ['sat', Weekday.SATURDAY], ['saturday', Weekday.SATURDAY],
    ['sun', Weekday.SUNDAY], ['sunday', Weekday.SUNDAY]
]);

/**
 * A calendar date written as YYYY-MM-DD
 *
 * YAML 1.1 loaders hand back timestamps as Date objects at UTC midnight,
 * so those are accepted too and moved to local midnight.
 */
const calendarDate = z.union([z.string(), z.date()]).transform((value, ctx) => {
    if (value instanceof Date) {
        return new Date(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate());
    }

    const parsed = parseDayKey(value.trim());
    if (!parsed) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Invalid date "${value}", expected YYYY-MM-DD`
        });
        return z.NEVER;
    }
    return parsed;
});

const weekdayLabel = z.string().transform((value, ctx) => {
    const weekday = WEEKDAY_LABELS.get(value.trim().toLowerCase());
    if (weekday === undefined) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown weekday "${value}"`
        });
        return z.NEVER;
    }
    return weekday;
});

/**
 * Either a count (first N weekdays from Monday) or an explicit list of labels
 */
const workingDays = z
    .union([
        z.number().int().min(1).max(7),
        z.array(weekdayLabel).min(1)
    ])
    .transform((value): Set<Weekday> => {
        if (typeof value === 'number') {
            return new Set(WEEK.slice(0, value));
        }
        return new Set(value);
    });

const policy = z
    .string()
    .transform(value => value.trim().toLowerCase())
    .pipe(z.nativeEnum(AllocationPolicy, {
        errorMap: () => ({ message: 'Policy must be one of: mix, block' })
    }));

export const settingsSchema = z.object({
    working_days_per_week: workingDays.default(DEFAULT_WORKING_DAYS_PER_WEEK),
    policy: policy.default(AllocationPolicy.MIX),
    spread_days_evenly: z.boolean().default(false),
    sequential_priorities: z.boolean().default(false)
});

export const projectSchema = z
    .object({
        name: z.union([z.string(), z.number()]).transform(String).pipe(z.string().trim().min(1)),
        start_date: calendarDate,
        end_date: calendarDate,
        quota: z.number().int().positive().optional(),
        required_days: z.number().int().positive().optional(),
        priority: z.number().int().positive()
    })
    .superRefine((project, ctx) => {
        if (project.quota === undefined && project.required_days === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['quota'],
                message: 'Required'
            });
        }
        // Dates that failed to parse leave no Date behind to compare
        const datesParsed = project.start_date instanceof Date && project.end_date instanceof Date;
        if (datesParsed && isAfter(project.start_date, project.end_date)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['end_date'],
                message: `End date ${toDayKey(project.end_date)} is before start date ${toDayKey(project.start_date)}`
            });
        }
    });

export const configFileSchema = z
    .object({
        settings: settingsSchema.nullish().transform(value => value ?? settingsSchema.parse({})),
        projects: z.array(projectSchema).nullable(),
        holidays: z.array(calendarDate).nullish().transform(value => value ?? [])
    })
    .superRefine((config, ctx) => {
        const projects = config.projects ?? [];

        const seen = new Set<string>();
        projects.forEach((project, index) => {
            if (seen.has(project.name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['projects', index, 'name'],
                    message: `Duplicate project name "${project.name}"`
                });
            }
            seen.add(project.name);
        });

        if (config.settings.sequential_priorities) {
            const priorities = projects.map(p => p.priority).sort((a, b) => a - b);
            const sequential = priorities.every((priority, index) => priority === index + 1);
            if (!sequential) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['projects'],
                    message: `Invalid priorities [${priorities.join(', ')}]: expected each of 1..${projects.length} exactly once`
                });
            }
        }
    });

/**
 * Render a zod issue path as projects[0].quota
 */
export function formatIssuePath(path: (string | number)[]): string {
    return path.reduce<string>((acc, segment) => {
        if (typeof segment === 'number') {
            return `${acc}[${segment}]`;
        }
        return acc ? `${acc}.${segment}` : segment;
    }, '');
}
