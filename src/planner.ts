// src/planner.ts

import { max } from 'date-fns';
import { generateWorkDays } from './engine/calendarGenerator';
import { AllocationEngine } from './engine/allocationEngine';
import type { Allocation } from './models/Allocation';
import type { PlannerConfig } from './models/PlannerConfig';
import { AllocationPolicy } from './models/Settings';
import type { WorkDay } from './models/WorkDay';
import { buildReport } from './report/reportBuilder';
import type { PlanReport } from './report/reportBuilder';
import { toCalendarDay, toDayKey } from './utils/dates';
import { debug, warn } from './utils/logger';

export interface PlanResult {
    workDays: WorkDay[];
    allocation: Allocation;
    report: PlanReport;
}

/**
 * One planning run: calendar -> allocation -> report
 *
 * Pure apart from logging; nothing is kept between runs.
 *
 * @param config Validated configuration
 * @param today First day of the horizon
 */
export function runPlanner(config: PlannerConfig, today: Date): PlanResult {
    const { settings, projects, holidays } = config;
    const start = toCalendarDay(today);

    const horizonEnd = projects.length > 0
        ? max(projects.map(project => project.endDate))
        : null;

    const workDays = horizonEnd
        ? generateWorkDays({ today: start, until: horizonEnd, workWeekdays: settings.workWeekdays, holidays })
        : [];

    debug(
        `Horizon ${toDayKey(start)} to ${horizonEnd ? toDayKey(horizonEnd) : '(none)'}: ` +
        `${workDays.length} work day(s)`
    );

    if (settings.spreadDaysEvenly && settings.policy === AllocationPolicy.BLOCK) {
        warn('spread_days_evenly has no effect under the block policy');
    }

    const engine = new AllocationEngine({
        policy: settings.policy,
        spreadDaysEvenly: settings.spreadDaysEvenly
    });
    const allocation = engine.allocate(projects, workDays);

    return {
        workDays,
        allocation,
        report: buildReport(config, workDays, allocation, start, horizonEnd)
    };
}
