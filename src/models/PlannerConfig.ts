// src/models/PlannerConfig.ts

import type { Project } from './Project';
import type { Settings } from './Settings';

/**
 * Validated, immutable contents of one input file
 */
export interface PlannerConfig {
    readonly settings: Settings;
    readonly projects: readonly Project[];
    readonly holidays: ReadonlySet<string>;  // yyyy-MM-dd keys
}
