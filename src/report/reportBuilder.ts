// src/report/reportBuilder.ts

import type { Allocation, ProjectAllocation } from '../models/Allocation';
import type { PlannerConfig } from '../models/PlannerConfig';
import type { Project } from '../models/Project';
import type { AllocationPolicy, Weekday } from '../models/Settings';
import type { WorkDay } from '../models/WorkDay';
import { toDayKey } from '../utils/dates';

/**
 * Feasibility of a single project
 */
export enum Verdict {
    FULLY_SCHEDULED = 'FULLY_SCHEDULED',  // Quota met before the end date
    AT_RISK = 'AT_RISK',                  // Window had room, higher priorities took it
    INFEASIBLE = 'INFEASIBLE'             // Window itself holds fewer work days than the quota
}

export interface ProjectReport {
    name: string;
    priority: number;
    startDate: string;
    endDate: string;
    quota: number;
    allocated: number;
    deficit: number;
    windowCapacity: number;
    metByDate: string | null;
    verdict: Verdict;
}

export interface DayAssignment {
    date: string;
    project: string;
}

export interface ReportTotals {
    quota: number;
    allocated: number;
    deficit: number;
    workDays: number;            // Work days in the horizon
    unassignedWorkDays: number;  // Slack
}

/**
 * Everything the printers need, already reduced to plain values
 */
export interface PlanReport {
    today: string;
    horizonEnd: string | null;   // Latest project end date, null without projects
    policy: AllocationPolicy;
    workWeekdays: Weekday[];
    holidayCount: number;
    projects: ProjectReport[];
    assignments: DayAssignment[];
    totals: ReportTotals;
    enoughDays: boolean;
}

/**
 * Decide the verdict for one project allocation
 *
 * Pure function - same input always produces same output
 */
export function verdictFor(result: ProjectAllocation): Verdict {
    if (result.deficit === 0) {
        return Verdict.FULLY_SCHEDULED;
    }
    // Covers windows that ended before today: they hold no work days at all
    if (result.windowCapacity < result.quota) {
        return Verdict.INFEASIBLE;
    }
    return Verdict.AT_RISK;
}

/**
 * Summarize an allocation into a report
 *
 * Projects are listed in processing order (priority, then input order).
 */
export function buildReport(
    config: PlannerConfig,
    workDays: readonly WorkDay[],
    allocation: Allocation,
    today: Date,
    horizonEnd: Date | null
): PlanReport {
    const projectsByName = new Map<string, Project>(config.projects.map(project => [project.name, project]));

    const projects: ProjectReport[] = [];
    for (const result of allocation.projects) {
        const project = projectsByName.get(result.projectName);
        if (!project) {
            throw new Error(`Allocation refers to unknown project ${result.projectName}`);
        }

        projects.push({
            name: result.projectName,
            priority: result.priority,
            startDate: toDayKey(project.startDate),
            endDate: toDayKey(project.endDate),
            quota: result.quota,
            allocated: result.daysAllocated,
            deficit: result.deficit,
            windowCapacity: result.windowCapacity,
            metByDate: result.metByDate ? toDayKey(result.metByDate) : null,
            verdict: verdictFor(result)
        });
    }

    // Work days are already in date order
    const assignments: DayAssignment[] = [];
    for (const day of workDays) {
        const projectName = allocation.assignments.get(day.key);
        if (projectName !== undefined) {
            assignments.push({ date: day.key, project: projectName });
        }
    }

    const totals: ReportTotals = {
        quota: sum(projects, p => p.quota),
        allocated: sum(projects, p => p.allocated),
        deficit: sum(projects, p => p.deficit),
        workDays: workDays.length,
        unassignedWorkDays: workDays.length - assignments.length
    };

    return {
        today: toDayKey(today),
        horizonEnd: horizonEnd ? toDayKey(horizonEnd) : null,
        policy: config.settings.policy,
        workWeekdays: [...config.settings.workWeekdays].sort((a, b) => a - b),
        holidayCount: config.holidays.size,
        projects,
        assignments,
        totals,
        enoughDays: totals.deficit === 0
    };
}

function sum<T>(items: readonly T[], pick: (item: T) => number): number {
    return items.reduce((total, item) => total + pick(item), 0);
}
