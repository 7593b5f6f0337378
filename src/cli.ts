#!/usr/bin/env node
/**
 * tds-cache <input-db-file> <output-directory> [-v|-vv|-vvv]
 *
 * Decodes every blob column of a cache4.db file, writes one table_<name>.txt
 * dump per table and a timeline.csv into the output directory.
 */
import fs from 'node:fs';
import path from 'node:path';
import { isMainModule } from './entry.js';
import { CacheDatabase } from './projection/cache-database.js';
import type { TdsLogger } from './tds/types.js';

export const USAGE = 'usage: tds-cache <input-db-file> <output-directory> [-v|-vv|-vvv]';

export interface CliArgs {
    input: string;
    output: string;
    verbosity: number;
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

/** `-v`, `-vv`, `-vvv` and repeated `--verbose` add up. */
export function verbosityOf(arg: string): number | null {
    if (arg === '--verbose') return 1;
    if (/^-v+$/.test(arg)) return arg.length - 1;
    return null;
}

export function parseArgs(argv: readonly string[]): CliArgs {
    const positional: string[] = [];
    let verbosity = 0;
    for (const arg of argv) {
        const level = verbosityOf(arg);
        if (level !== null) {
            verbosity += level;
        } else if (arg.startsWith('-')) {
            throw new UsageError(`unknown option ${arg}`);
        } else {
            positional.push(arg);
        }
    }
    if (positional.length !== 2) {
        throw new UsageError(USAGE);
    }
    const [input, output] = positional;
    return { input, output, verbosity };
}

const LEVELS = ['error', 'warn', 'info', 'debug'] as const;
type Level = typeof LEVELS[number];

/**
 * Logger writing `<time> [LEVEL] (module) message` lines. Verbosity 0 shows
 * errors only; each step enables the next level down to debug.
 */
export function createConsoleLogger(
    verbosity: number,
    write: (line: string) => void = (line) => process.stderr.write(`${line}\n`),
    module: string = 'tds-cache',
): TdsLogger {
    const enabled = (level: Level): boolean => LEVELS.indexOf(level) <= verbosity;
    const emit = (level: Level) => (msg: string): void => {
        if (enabled(level)) write(`${new Date().toISOString()} [${level.toUpperCase()}] (${module}) ${msg}`);
    };
    return {
        debug: emit('debug'),
        info: emit('info'),
        warn: emit('warn'),
        error: emit('error'),
    };
}

/** Runs one extraction; returns the process exit code. */
export function run(argv: readonly string[], logger?: TdsLogger): number {
    let args: CliArgs;
    try {
        args = parseArgs(argv);
    } catch (err) {
        if (err instanceof UsageError) {
            process.stderr.write(`${err.message}\n`);
            return 1;
        }
        throw err;
    }

    const log = logger ?? createConsoleLogger(args.verbosity);
    if (!fs.existsSync(args.output) || !fs.statSync(args.output).isDirectory()) {
        log.error?.(`Output directory [${args.output}] does not exist!`);
        return 1;
    }
    if (!fs.existsSync(args.input) || !fs.statSync(args.input).isFile()) {
        log.error?.('The provided input file does not exist!');
        return 1;
    }

    log.info?.(`reading ${path.resolve(args.input)}`);
    const db = CacheDatabase.open(args.input, { logger: log });
    try {
        db.parse();
        db.saveParsedTables(args.output);
        db.createTimeline(args.output);
    } finally {
        db.close();
    }
    log.info?.(`output written to ${path.resolve(args.output)}`);
    return 0;
}

if (isMainModule(import.meta.url)) {
    process.exitCode = run(process.argv.slice(2));
}
