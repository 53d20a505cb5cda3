/**
 * synthprint - Command Line
 *
 *   synthprint <records.json> [--rows N] [--threshold T] [--files N] [--no-cache] [--out file]
 *   synthprint --evict [days]
 *
 * Reads a JSON array of records (or a column map), writes the synthetic
 * records as JSON. Logs go to stderr so stdout stays parseable.
 */

import { Console } from 'node:console';
import { promises as fs } from 'node:fs';
import { parseArgs } from 'node:util';
import { FingerprintCache } from './cache.js';
import type { SynthprintConfig } from './config.js';
import { loadConfig } from './config.js';
import { createPipeline } from './pipeline.js';
import type { SynthesisPipeline } from './pipeline.js';
import { detectTable, tableToRecords } from './table.js';
import type { Logger } from './types.js';
import { InvalidInputError, createLogger, errorMessage } from './types.js';

export const USAGE = `Usage:
  synthprint <records.json> [--rows N] [--threshold T] [--files N] [--no-cache] [--out file]
  synthprint --evict [days]`;

export interface CliIO {
    env?: NodeJS.ProcessEnv;
    /** Receives the JSON result when --out is not given */
    stdout?: (text: string) => void;
    logger?: Logger;
    createPipeline?: (config: SynthprintConfig, logger: Logger) => SynthesisPipeline;
}

// ============================================================================
// Argument Parsing
// ============================================================================

function parseNumber(flag: string, raw: string | undefined, integer: boolean): number | undefined {
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value) || (integer && !Number.isInteger(value)) || value < 0) {
        throw new InvalidInputError(`--${flag} expects a non-negative ${integer ? 'integer' : 'number'}, got "${raw}"`);
    }
    return value;
}

function parseCommand(argv: readonly string[]) {
    const { values, positionals } = parseArgs({
        args: [...argv],
        allowPositionals: true,
        options: {
            rows: { type: 'string' },
            threshold: { type: 'string' },
            files: { type: 'string' },
            'no-cache': { type: 'boolean', default: false },
            out: { type: 'string' },
            evict: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    const threshold = parseNumber('threshold', values.threshold, false);
    if (threshold !== undefined && threshold > 1) {
        throw new InvalidInputError(`--threshold must be between 0 and 1, got ${threshold}`);
    }

    return {
        help: values.help === true,
        evict: values.evict === true,
        positionals,
        rows: parseNumber('rows', values.rows, true),
        threshold,
        files: parseNumber('files', values.files, true),
        useCache: values['no-cache'] !== true,
        out: values.out,
    };
}

// ============================================================================
// Commands
// ============================================================================

async function evictCommand(config: SynthprintConfig, days: string | undefined, logger: Logger): Promise<number> {
    const olderThanDays = parseNumber('evict', days, false);
    const cache = new FingerprintCache({
        cacheDir: config.cacheDir,
        version: config.generatorVersion,
        logger,
    });
    await cache.load();
    const removed = await cache.evict(olderThanDays);
    logger.info(`Removed ${removed} cache entries`);
    return 0;
}

async function readInput(file: string): Promise<unknown> {
    let raw: string;
    try {
        raw = await fs.readFile(file, 'utf8');
    } catch (error) {
        throw new InvalidInputError(`Could not read ${file}: ${errorMessage(error)}`);
    }

    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new InvalidInputError(`${file} is not valid JSON: ${errorMessage(error)}`);
    }
}

/**
 * Run the CLI
 *
 * @returns process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = {}): Promise<number> {
    const stdout = io.stdout ?? ((text: string) => process.stdout.write(text));
    let logger = io.logger ?? createLogger('info', new Console(process.stderr));

    try {
        const command = parseCommand(argv);
        if (command.help) {
            stdout(`${USAGE}\n`);
            return 0;
        }

        const config = loadConfig(io.env ?? process.env);
        logger = io.logger ?? createLogger(config.logLevel, new Console(process.stderr));

        if (command.evict) {
            return await evictCommand(config, command.positionals[0], logger);
        }

        const [inputFile] = command.positionals;
        if (inputFile === undefined) {
            throw new InvalidInputError('Missing input file');
        }

        const table = detectTable(await readInput(inputFile));
        const pipeline = (io.createPipeline ?? createPipeline)(config, logger);
        const result = await pipeline.synthesize(table, {
            matchThreshold: command.threshold ?? config.matchThreshold,
            useCache: command.useCache,
            ...(command.rows !== undefined && { numRows: command.rows }),
            ...(command.files !== undefined && { fileCount: command.files }),
        });

        const records = result.tables.map(tableToRecords);
        const json = JSON.stringify(records.length === 1 ? records[0] : records, null, 2);

        if (command.out) {
            await fs.writeFile(command.out, `${json}\n`, 'utf8');
            logger.info(`Wrote ${result.tables.length} table(s) to ${command.out}`);
        } else {
            stdout(`${json}\n`);
        }

        logger.info(
            `Routine source: ${result.provenance.source}` +
            (result.provenance.cacheKey ? ` (${result.provenance.cacheKey})` : '')
        );
        return 0;
    } catch (error) {
        logger.error(errorMessage(error));
        if (error instanceof InvalidInputError || isArgumentError(error)) {
            logger.error(USAGE);
            return 2;
        }
        return 1;
    }
}

function isArgumentError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS');
}
