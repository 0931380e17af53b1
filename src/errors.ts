// src/errors.ts

/**
 * Base class for every fatal error the planner raises
 *
 * Deficits are never errors: they are reported, not thrown.
 */
export class PlannerError extends Error {
    readonly code: string;
    readonly exitCode: number;

    constructor(code: string, message: string, exitCode = 1) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.exitCode = exitCode;
    }
}

/**
 * No --file option was given
 */
export class MissingFileArgumentError extends PlannerError {
    constructor() {
        super('MISSING_FILE_ARGUMENT', 'A configuration file is required (--file <path>)', 2);
    }
}

/**
 * The configuration file does not exist or cannot be read
 */
export class ConfigFileError extends PlannerError {
    readonly path: string;

    constructor(path: string, reason: string) {
        super('CONFIG_FILE_UNREADABLE', `Cannot read configuration file ${path}: ${reason}`);
        this.path = path;
    }
}

/**
 * The file was read but its contents are not a valid configuration
 */
export class MalformedInputError extends PlannerError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super('MALFORMED_INPUT', `Invalid configuration:\n  - ${issues.join('\n  - ')}`);
        this.issues = issues;
    }
}
