// src/models/Allocation.ts

import type { WorkDay } from './WorkDay';

/**
 * Outcome of allocation for a single project
 *
 * Invariant: daysAllocated <= quota
 * Invariant: deficit === quota - daysAllocated
 */
export interface ProjectAllocation {
    projectName: string;
    priority: number;
    quota: number;
    daysAllocated: number;
    deficit: number;
    windowCapacity: number;    // Work days in the project window, ignoring other projects
    metByDate: Date | null;    // Last allocated day, only when the quota is met
    assignedDays: WorkDay[];
}

/**
 * Allocation model - which project each work day went to
 *
 * Invariant: a work day key appears at most once in assignments
 */
export interface Allocation {
    assignments: Map<string, string>;  // Work day key -> project name
    projects: ProjectAllocation[];     // In processing (priority) order
}
