// src/utils/logger.ts

/**
 * Console logging helpers
 *
 * Everything goes to stderr so stdout only ever carries the report.
 * Debug output is off unless enabled by --verbose.
 */

let verbose = false;

export function setVerbose(enabled: boolean): void {
    verbose = enabled;
}

function timestamp(): string {
    return new Date().toISOString();
}

export function log(message: string): void {
    console.error(`[${timestamp()}] ${message}`);
}

export function warn(message: string): void {
    console.error(`[${timestamp()}] WARN ${message}`);
}

export function debug(message: string): void {
    if (!verbose) {
        return;
    }
    console.error(`[${timestamp()}] DEBUG ${message}`);
}
