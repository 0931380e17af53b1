// src/cli.ts

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { loadConfig } from './config/loadConfig';
import { MissingFileArgumentError, PlannerError } from './errors';
import { runPlanner } from './planner';
import { formatJsonReport, formatTextReport } from './report/reportPrinter';
import { parseDayKey } from './utils/dates';
import { setVerbose } from './utils/logger';

interface CliOptions {
    file?: string;
    today?: Date;
    json: boolean;
    verbose: boolean;
}

/**
 * Where the CLI writes and what it considers "now"
 */
export interface CliIo {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
    now: () => Date;
}

const processIo: CliIo = {
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
    now: () => new Date()
};

function parseTodayOption(value: string): Date {
    const parsed = parseDayKey(value);
    if (!parsed) {
        throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
    }
    return parsed;
}

function buildProgram(io: CliIo): Command {
    return new Command()
        .name('workday-planner')
        .description('Check whether your working days cover your project deadlines')
        .option('-f, --file <path>', 'YAML file with settings, projects and holidays')
        .option('--today <date>', 'first day of the plan (YYYY-MM-DD), defaults to today', parseTodayOption)
        .option('--json', 'print the report as JSON', false)
        .option('-v, --verbose', 'log debug output to stderr', false)
        .configureOutput({
            writeOut: io.stdout,
            writeErr: io.stderr
        })
        .exitOverride();
}

/**
 * Run the planner for one command line
 *
 * Only PlannerErrors are turned into exit codes here; anything else is a bug
 * and propagates.
 *
 * @param argv Arguments after the script name
 * @returns Process exit code
 */
export function run(argv: string[], io: CliIo = processIo): number {
    const program = buildProgram(io);

    try {
        program.parse(argv, { from: 'user' });
    } catch (err) {
        // --help, unknown options and bad option values; commander already printed why
        if (err instanceof CommanderError) {
            return err.exitCode;
        }
        throw err;
    }

    const options = program.opts<CliOptions>();
    setVerbose(options.verbose);

    try {
        if (!options.file) {
            throw new MissingFileArgumentError();
        }

        const config = loadConfig(options.file);
        const { report } = runPlanner(config, options.today ?? io.now());

        io.stdout(options.json ? formatJsonReport(report) : formatTextReport(report));
        return 0;
    } catch (err) {
        if (err instanceof PlannerError) {
            io.stderr(`Error: ${err.message}\n`);
            return err.exitCode;
        }
        throw err;
    }
}
