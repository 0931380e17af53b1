// src/report/reportPrinter.ts

import { Weekday } from '../models/Settings';
import type { PlanReport, ProjectReport } from './reportBuilder';
import { Verdict } from './reportBuilder';

const SECTION_WIDTH = 80;
const RULE = '-'.repeat(40);

const WEEKDAY_NAMES: Record<Weekday, string> = {
    [Weekday.MONDAY]: 'Mon',
    [Weekday.TUESDAY]: 'Tue',
    [Weekday.WEDNESDAY]: 'Wed',
    [Weekday.THURSDAY]: 'Thu',
    [Weekday.FRIDAY]: 'Fri',
    [Weekday.SATURDAY]: 'Sat',
    [Weekday.SUNDAY]: 'Sun'
};

function section(title: string): string[] {
    return ['='.repeat(SECTION_WIDTH), title, '='.repeat(SECTION_WIDTH)];
}

function formatVerdict(project: ProjectReport): string {
    switch (project.verdict) {
        case Verdict.FULLY_SCHEDULED:
            return `FULLY SCHEDULED (met by ${project.metByDate ?? project.endDate})`;
        case Verdict.AT_RISK:
            return `AT RISK (${project.deficit} day(s) taken by higher priorities)`;
        case Verdict.INFEASIBLE:
            return `INFEASIBLE (window holds only ${project.windowCapacity} work day(s))`;
    }
}

function formatProject(project: ProjectReport): string[] {
    return [
        `  [${project.priority}] ${project.name}`,
        `      Window: ${project.startDate} to ${project.endDate} (${project.windowCapacity} work days)`,
        `      Quota: ${project.quota}, Allocated: ${project.allocated}, Deficit: ${project.deficit}`,
        `      Verdict: ${formatVerdict(project)}`
    ];
}

/**
 * Render the report as human-readable text
 *
 * @returns Report text, newline-terminated
 */
export function formatTextReport(report: PlanReport): string {
    const horizon = report.horizonEnd
        ? `${report.today} to ${report.horizonEnd}`
        : `from ${report.today}`;
    const weekdays = report.workWeekdays.map(day => WEEKDAY_NAMES[day]).join(', ');

    const lines: string[] = [
        ...section(`WORKDAY PLAN (${horizon})`),
        `Policy: ${report.policy} | Work days: ${weekdays} | Holidays: ${report.holidayCount}`,
        `Work days in horizon: ${report.totals.workDays}`,
        '',
        'Projects (by priority):'
    ];

    if (report.projects.length === 0) {
        lines.push('  (none)');
    }
    for (const project of report.projects) {
        lines.push(...formatProject(project));
    }

    lines.push('', 'Date Assignments:', RULE);
    if (report.assignments.length === 0) {
        lines.push('(none)');
    }
    for (const assignment of report.assignments) {
        lines.push(`${assignment.date}: ${assignment.project}`);
    }

    lines.push(
        '',
        'Summary:',
        RULE,
        `Total quota: ${report.totals.quota}`,
        `Total allocated: ${report.totals.allocated}`,
        `Total deficit: ${report.totals.deficit}`,
        `Unassigned work days: ${report.totals.unassignedWorkDays}`,
        '',
        report.enoughDays
            ? 'Enough days: YES'
            : `Enough days: NO (short by ${report.totals.deficit} day(s))`
    );

    return lines.join('\n') + '\n';
}

/**
 * Render the report as pretty-printed JSON
 */
export function formatJsonReport(report: PlanReport): string {
    return JSON.stringify(report, null, 2) + '\n';
}
