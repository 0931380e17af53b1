// src/models/WorkDay.ts

/**
 * A calendar date that is a work weekday and not a holiday
 */
export interface WorkDay {
    readonly date: Date;
    readonly key: string;    // yyyy-MM-dd
    readonly index: number;  // Position in the work day sequence
}
