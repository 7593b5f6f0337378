#!/usr/bin/env node
/**
 * tds-blob <blob-file> [-v|-vv|-vvv]
 *
 * Decodes one raw blob, as exported from a cache4.db column, and prints its
 * record tree on stdout.
 */
import fs from 'node:fs';
import { UsageError, createConsoleLogger, verbosityOf } from './cli.js';
import { isMainModule } from './entry.js';
import { renderDecoded } from './projection/dump.js';
import { decodeBlob } from './tds/decode.js';
import type { TdsLogger } from './tds/types.js';

export const BLOB_USAGE = 'usage: tds-blob <blob-file> [-v|-vv|-vvv]';

export interface BlobCliArgs {
    file: string;
    verbosity: number;
}

export function parseBlobArgs(argv: readonly string[]): BlobCliArgs {
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
    if (positional.length !== 1) {
        throw new UsageError(BLOB_USAGE);
    }
    return { file: positional[0], verbosity };
}

/**
 * Decodes and prints one blob. Exit code 1 for bad arguments, a missing
 * file or a blob that did not decode; a partial decode still exits 0.
 */
export function runBlob(
    argv: readonly string[],
    logger?: TdsLogger,
    print: (text: string) => void = (text) => process.stdout.write(text),
): number {
    let args: BlobCliArgs;
    try {
        args = parseBlobArgs(argv);
    } catch (err) {
        if (err instanceof UsageError) {
            process.stderr.write(`${err.message}\n`);
            return 1;
        }
        throw err;
    }

    const log = logger ?? createConsoleLogger(args.verbosity, undefined, 'tds-blob');
    if (!fs.existsSync(args.file) || !fs.statSync(args.file).isFile()) {
        log.error?.(`Blob file [${args.file}] does not exist!`);
        return 1;
    }

    const result = decodeBlob(fs.readFileSync(args.file), { logger: log });
    print(`${renderDecoded(result)}\n`);
    return result.ok ? 0 : 1;
}

if (isMainModule(import.meta.url)) {
    process.exitCode = runBlob(process.argv.slice(2));
}
