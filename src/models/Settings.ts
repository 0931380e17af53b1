// src/models/Settings.ts

/**
 * How the allocator hands out days to competing projects
 */
export enum AllocationPolicy {
    MIX = 'mix',      // Any free day in the window, projects may interleave
    BLOCK = 'block'   // One contiguous run of work days per project
}

/**
 * ISO weekday numbers (Monday = 1 ... Sunday = 7), as returned by date-fns getISODay
 */
export enum Weekday {
    MONDAY = 1,
    TUESDAY = 2,
    WEDNESDAY = 3,
    THURSDAY = 4,
    FRIDAY = 5,
    SATURDAY = 6,
    SUNDAY = 7
}

/**
 * Settings model - work-week and allocation policy
 *
 * Invariant: workWeekdays is non-empty
 */
export interface Settings {
    readonly workWeekdays: ReadonlySet<Weekday>;
    readonly policy: AllocationPolicy;
    readonly spreadDaysEvenly: boolean;  // MIX only
}
