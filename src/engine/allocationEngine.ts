// src/engine/allocationEngine.ts

import type { Allocation, ProjectAllocation } from '../models/Allocation';
import type { Project } from '../models/Project';
import { AllocationPolicy } from '../models/Settings';
import type { WorkDay } from '../models/WorkDay';
import { debug } from '../utils/logger';
import { toDayKey } from '../utils/dates';
import { ProjectQueue } from './projectQueue';

export interface AllocationOptions {
    policy: AllocationPolicy;
    spreadDaysEvenly?: boolean;  // MIX only
}

/**
 * Core allocation engine - hands out work days to projects
 *
 * Projects are served strictly in priority order; a project never gives
 * back a day once it has been assigned.
 * Enforces quota invariant: never assign more days than a project needs
 * Enforces exclusivity invariant: a work day belongs to at most one project
 *
 * Stateless between runs: the same inputs always yield the same Allocation
 */
export class AllocationEngine {
    private policy: AllocationPolicy;
    private spreadDaysEvenly: boolean;

    constructor(options: AllocationOptions) {
        this.policy = options.policy;
        this.spreadDaysEvenly = options.spreadDaysEvenly ?? false;
    }

    /**
     * Allocate work days across all projects
     *
     * @param projects Projects in input order
     * @param workDays Ordered work day sequence (the resource pool)
     * @returns Day-to-project assignments and per-project results in processing order
     */
    allocate(projects: readonly Project[], workDays: readonly WorkDay[]): Allocation {
        const queue = new ProjectQueue(projects);
        const assignments = new Map<string, string>();
        const results: ProjectAllocation[] = [];

        for (let project = queue.dequeue(); project !== null; project = queue.dequeue()) {
            results.push(this.allocateProject(project, workDays, assignments));
        }

        return { assignments, projects: results };
    }

    /**
     * Allocate days to a single project, recording them in `assignments`
     *
     * A project whose window holds no work days ends with deficit = quota.
     */
    allocateProject(
        project: Project,
        workDays: readonly WorkDay[],
        assignments: Map<string, string>
    ): ProjectAllocation {
        const window = windowOf(project, workDays);

        const chosen = this.policy === AllocationPolicy.BLOCK
            ? pickBlock(window, assignments, project.quota)
            : pickMix(window, assignments, project.quota, this.spreadDaysEvenly);

        for (const day of chosen) {
            assignments.set(day.key, project.name);
        }

        const deficit = project.quota - chosen.length;
        const metByDate = deficit === 0 && chosen.length > 0
            ? chosen[chosen.length - 1].date
            : null;

        debug(
            `${project.name} (priority ${project.priority}): ` +
            `${chosen.length}/${project.quota} days from a window of ${window.length}`
        );

        return {
            projectName: project.name,
            priority: project.priority,
            quota: project.quota,
            daysAllocated: chosen.length,
            deficit,
            windowCapacity: window.length,
            metByDate,
            assignedDays: chosen
        };
    }
}

/**
 * Work days inside the project's [start, end] window
 *
 * The sequence is date-ordered, so the window is a contiguous slice of it.
 */
export function windowOf(project: Project, workDays: readonly WorkDay[]): WorkDay[] {
    const startKey = toDayKey(project.startDate);
    const endKey = toDayKey(project.endDate);
    // yyyy-MM-dd keys order the same way as the dates they name
    return workDays.filter(day => day.key >= startKey && day.key <= endKey);
}

/**
 * MIX: take the earliest free days, or spread them evenly across the window
 */
export function pickMix(
    window: readonly WorkDay[],
    assignments: ReadonlyMap<string, string>,
    quota: number,
    spreadDaysEvenly: boolean
): WorkDay[] {
    const free = window.filter(day => !assignments.has(day.key));

    if (!spreadDaysEvenly || free.length <= quota) {
        return free.slice(0, quota);
    }

    // interval > 1, so rounded indexes are distinct and stay below free.length
    const interval = free.length / quota;
    const picked: WorkDay[] = [];
    for (let i = 0; i < quota; i++) {
        picked.push(free[roundHalfEven(i * interval)]);
    }
    return picked;
}

/**
 * Round to the nearest integer, ties to even (2.5 -> 2, 3.5 -> 4)
 */
export function roundHalfEven(value: number): number {
    const floor = Math.floor(value);
    const fraction = value - floor;
    if (fraction > 0.5) {
        return floor + 1;
    }
    if (fraction < 0.5) {
        return floor;
    }
    return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * BLOCK: a single run of consecutive free work days
 *
 * Takes the earliest run that holds the whole quota. When no run is long
 * enough, takes the longest one (earliest on ties) and leaves a deficit.
 * Weekends and holidays between two work days do not break a run.
 */
export function pickBlock(
    window: readonly WorkDay[],
    assignments: ReadonlyMap<string, string>,
    quota: number
): WorkDay[] {
    const runs: WorkDay[][] = [];
    let run: WorkDay[] = [];

    for (const day of window) {
        if (assignments.has(day.key)) {
            if (run.length > 0) {
                runs.push(run);
                run = [];
            }
            continue;
        }
        run.push(day);
    }
    if (run.length > 0) {
        runs.push(run);
    }

    const fitting = runs.find(candidate => candidate.length >= quota);
    if (fitting) {
        return fitting.slice(0, quota);
    }

    let longest: WorkDay[] = [];
    for (const candidate of runs) {
        if (candidate.length > longest.length) {
            longest = candidate;
        }
    }
    return longest;
}
