// src/config/loadConfig.ts

import fs from 'fs';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { ConfigFileError, MalformedInputError } from '../errors';
import type { PlannerConfig } from '../models/PlannerConfig';
import type { Project } from '../models/Project';
import { debug, warn } from '../utils/logger';
import { toDayKey } from '../utils/dates';
import { configFileSchema, formatIssuePath } from './schema';

/**
 * Read the raw text of a configuration file
 *
 * @throws ConfigFileError if the path is missing, a directory, or unreadable
 */
export function readConfigFile(path: string): string {
    try {
        return fs.readFileSync(path, 'utf8');
    } catch (err) {
        const code = err instanceof Error && 'code' in err ? String(err.code) : undefined;
        switch (code) {
            case 'ENOENT':
                throw new ConfigFileError(path, 'file not found');
            case 'EISDIR':
                throw new ConfigFileError(path, 'path is a directory');
            case 'EACCES':
                throw new ConfigFileError(path, 'permission denied');
            default:
                throw new ConfigFileError(path, err instanceof Error ? err.message : String(err));
        }
    }
}

/**
 * Parse and validate configuration text into an immutable PlannerConfig
 *
 * An empty project list is allowed and only logged as a warning.
 *
 * @throws MalformedInputError on YAML syntax errors or schema violations
 */
export function parseConfig(text: string): PlannerConfig {
    let document: unknown;
    try {
        document = parseYaml(text);
    } catch (err) {
        // The parser also throws plain errors, e.g. on alias bombs
        if (err instanceof YAMLParseError) {
            throw new MalformedInputError([`YAML syntax error: ${err.message}`]);
        }
        throw new MalformedInputError([`YAML error: ${err instanceof Error ? err.message : String(err)}`]);
    }

    if (document === null || typeof document !== 'object' || Array.isArray(document)) {
        throw new MalformedInputError(['Configuration must be a mapping with settings, projects and holidays']);
    }

    const result = configFileSchema.safeParse(document);
    if (!result.success) {
        throw new MalformedInputError(
            result.error.issues.map(issue => {
                const path = formatIssuePath(issue.path);
                return path ? `${path}: ${issue.message}` : issue.message;
            })
        );
    }

    const { settings, holidays } = result.data;
    const rawProjects = result.data.projects ?? [];

    if (rawProjects.length === 0) {
        warn('Project list is empty, nothing to schedule');
    }

    const projects: Project[] = rawProjects.map((raw, order) => ({
        name: raw.name,
        startDate: raw.start_date,
        endDate: raw.end_date,
        // Schema guarantees one of the two is present
        quota: raw.quota ?? raw.required_days ?? 0,
        priority: raw.priority,
        order
    }));

    const config: PlannerConfig = {
        settings: {
            workWeekdays: settings.working_days_per_week,
            policy: settings.policy,
            spreadDaysEvenly: settings.spread_days_evenly
        },
        projects,
        holidays: new Set(holidays.map(toDayKey))
    };

    debug(`Loaded ${projects.length} project(s), ${config.holidays.size} holiday(s), policy ${settings.policy}`);

    return config;
}

/**
 * Read, parse and validate the configuration file at `path`
 */
export function loadConfig(path: string): PlannerConfig {
    debug(`Reading configuration from ${path}`);
    return parseConfig(readConfigFile(path));
}
