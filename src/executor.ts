/**
 * synthprint - Sandboxed Executor
 *
 * Runs routine text and turns its output into a table.
 *
 * run():      isolated process first; on any failure other than a timeout,
 *             one in-process retry in a locked-down vm context
 * validate(): structural check only (column count + column-name set)
 * generate(): REQUEST_CODE -> EXECUTE -> VALIDATE -> DONE, or one
 *             RETRY_ONCE at a stricter threshold whose result is returned
 *             as is
 */

import {
    DEFAULT_EXECUTION_TIMEOUT_MS,
    DEFAULT_MATCH_THRESHOLD,
    RETRY_THRESHOLD_STEP,
} from './constants.js';
import type { RoutineAuthor } from './collaborator.js';
import { InProcessRunner, ProcessRunner } from './runner.js';
import type { RoutineRunner } from './runner.js';
import { columnNames, detectTable } from './table.js';
import { TemplateRoutineAuthor } from './template.js';
import type { Logger, MetadataDocument, Table } from './types.js';
import { ExecutionFailure, ExecutionTimeoutError, consoleLogger, errorMessage } from './types.js';
import { validateRoutineOutput } from './validation.js';

// ============================================================================
// Types
// ============================================================================

export interface TableValidation {
    readonly valid: boolean;
    readonly expectedColumns: number;
    readonly actualColumns: number;
    readonly missingColumns: readonly string[];
    readonly unexpectedColumns: readonly string[];
}

export type RoutineSource = 'collaborator' | 'template';

export interface GenerationResult {
    readonly table: Table;
    readonly routineText: string;
    readonly source: RoutineSource;
    /** 1, or 2 when the first table failed validation */
    readonly attempts: 1 | 2;
    /** Validation of the returned table */
    readonly validation: TableValidation;
}

export interface SandboxedExecutorOptions {
    /** Routine author; null or omitted means template routines only */
    author?: RoutineAuthor | null;
    /** Used when the author is missing or fails */
    fallbackAuthor?: RoutineAuthor;
    isolatedRunner?: RoutineRunner;
    fallbackRunner?: RoutineRunner;
    timeoutMs?: number;
    logger?: Logger;
}

interface Attempt {
    readonly table: Table;
    readonly routineText: string;
    readonly source: RoutineSource;
}

// ============================================================================
// Validation
// ============================================================================

export function validateTable(table: Table, metadata: MetadataDocument): TableValidation {
    const expected = metadata.structure.columns.map((c) => c.name);
    const actual = columnNames(table);
    const actualSet = new Set(actual);
    const expectedSet = new Set(expected);

    const missingColumns = expected.filter((name) => !actualSet.has(name));
    const unexpectedColumns = actual.filter((name) => !expectedSet.has(name));

    return {
        valid: actual.length === expected.length && missingColumns.length === 0 && unexpectedColumns.length === 0,
        expectedColumns: expected.length,
        actualColumns: actual.length,
        missingColumns,
        unexpectedColumns,
    };
}

function describeValidation(validation: TableValidation): string {
    const parts = [`expected ${validation.expectedColumns} columns, got ${validation.actualColumns}`];
    if (validation.missingColumns.length > 0) parts.push(`missing: ${validation.missingColumns.join(', ')}`);
    if (validation.unexpectedColumns.length > 0) parts.push(`unexpected: ${validation.unexpectedColumns.join(', ')}`);
    return parts.join('; ');
}

// ============================================================================
// Executor
// ============================================================================

export class SandboxedExecutor {
    private readonly author: RoutineAuthor | null;
    private readonly fallbackAuthor: RoutineAuthor;
    private readonly isolatedRunner: RoutineRunner;
    private readonly fallbackRunner: RoutineRunner;
    private readonly timeoutMs: number;
    private readonly logger: Logger;

    constructor(options: SandboxedExecutorOptions = {}) {
        this.author = options.author ?? null;
        this.fallbackAuthor = options.fallbackAuthor ?? new TemplateRoutineAuthor();
        this.isolatedRunner = options.isolatedRunner ?? new ProcessRunner();
        this.fallbackRunner = options.fallbackRunner ?? new InProcessRunner();
        this.timeoutMs = options.timeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;
        this.logger = options.logger ?? consoleLogger;
    }

    /**
     * Execute routine text and return its table
     *
     * @throws ExecutionTimeoutError when either run exceeds the timeout
     * @throws ExecutionFailure when the in-process fallback also fails
     */
    async run(routineText: string, timeoutMs: number = this.timeoutMs): Promise<Table> {
        try {
            return await this.runWith(this.isolatedRunner, routineText, timeoutMs);
        } catch (error) {
            if (error instanceof ExecutionTimeoutError) throw error;

            this.logger.warn(
                `Isolated execution failed (${errorMessage(error)}); ` +
                'falling back to in-process execution, which is less safe'
            );
        }

        return this.runWith(this.fallbackRunner, routineText, timeoutMs);
    }

    validate(table: Table, metadata: MetadataDocument): TableValidation {
        return validateTable(table, metadata);
    }

    /**
     * Request a routine, run it and validate the table. A table that fails
     * validation triggers exactly one regeneration at a stricter threshold;
     * that second table is returned whatever its validation says.
     */
    async generate(
        metadata: MetadataDocument,
        numRows: number = metadata.structure.shape.rows,
        matchThreshold: number = DEFAULT_MATCH_THRESHOLD
    ): Promise<GenerationResult> {
        this.logger.info(`Generating ${numRows} rows at match threshold ${matchThreshold}`);

        const first = await this.attempt(metadata, numRows, matchThreshold);
        const validation = this.validate(first.table, metadata);

        if (validation.valid) {
            return { ...first, attempts: 1, validation };
        }

        const stricter = Math.min(matchThreshold + RETRY_THRESHOLD_STEP, 1);
        this.logger.warn(`Validation failed (${describeValidation(validation)}); regenerating at threshold ${stricter}`);

        const second = await this.attempt(metadata, numRows, stricter);
        return { ...second, attempts: 2, validation: this.validate(second.table, metadata) };
    }

    // ------------------------------------------------------------------------
    // Internals
    // ------------------------------------------------------------------------

    private async attempt(metadata: MetadataDocument, numRows: number, matchThreshold: number): Promise<Attempt> {
        const { routineText, source } = await this.requestRoutine(metadata, numRows, matchThreshold);
        const table = await this.run(routineText);
        return { table, routineText, source };
    }

    private async requestRoutine(
        metadata: MetadataDocument,
        numRows: number,
        matchThreshold: number
    ): Promise<{ routineText: string; source: RoutineSource }> {
        const request = { metadata, numRows, matchThreshold };

        if (this.author) {
            try {
                return { routineText: await this.author.writeRoutine(request), source: 'collaborator' };
            } catch (error) {
                this.logger.warn(`Collaborator failed (${errorMessage(error)}); using template routine`);
            }
        } else {
            this.logger.debug('No collaborator configured; using template routine');
        }

        return { routineText: await this.fallbackAuthor.writeRoutine(request), source: 'template' };
    }

    private async runWith(runner: RoutineRunner, routineText: string, timeoutMs: number): Promise<Table> {
        const raw = await runner.run(routineText, timeoutMs);

        try {
            return detectTable(validateRoutineOutput(raw));
        } catch (error) {
            throw new ExecutionFailure(
                `Routine output is not a table: ${errorMessage(error)}`,
                runner.mode,
                undefined,
                error
            );
        }
    }
}
