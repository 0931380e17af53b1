// src/models/Project.ts

/**
 * Project model - a piece of work competing for working days
 *
 * Data only, no methods. Allocation handled by engine.
 *
 * Invariant: startDate <= endDate
 * Invariant: quota >= 1, priority >= 1
 */
export interface Project {
    readonly name: string;
    readonly startDate: Date;   // Inclusive
    readonly endDate: Date;     // Inclusive
    readonly quota: number;     // Working days required
    readonly priority: number;  // Lower = more urgent
    readonly order: number;     // Position in the input file, used as tie-breaker
}
