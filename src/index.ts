/**
 * synthprint
 *
 * Profile a table into a privacy-preserving metadata document, fingerprint
 * it, and produce synthetic tables from a generation routine that is reused
 * across similar datasets.
 *
 * @example
 * ```typescript
 * import { synthesize } from 'synthprint';
 *
 * // Array of records or a column map
 * const result = await synthesize([{ age: 30, email: 'a@example.com' }, ...]);
 *
 * // More rows, two independent tables, no cache
 * const result = await synthesize(records, { numRows: 500, fileCount: 2, useCache: false });
 * ```
 */

import { loadConfig } from './config.js';
import type { SynthprintConfig } from './config.js';
import { createPipeline } from './pipeline.js';
import type { SynthesisResult, SynthesizeOptions } from './pipeline.js';
import { detectTable } from './table.js';
import type { Logger, MetadataDocument, Table } from './types.js';
import { validateMetadataValue } from './validation.js';

// ============================================================================
// Convenience Entry Point
// ============================================================================

export interface SynthesizeCallOptions extends SynthesizeOptions {
    /** Overrides values read from the environment */
    config?: Partial<SynthprintConfig>;
    logger?: Logger;
}

function looksLikeMetadataDocument(input: object): boolean {
    return 'structure' in input && 'statistics' in input && 'data_quality' in input;
}

function isTable(input: object): input is Table {
    return 'columns' in input
        && Array.isArray(input.columns)
        && input.columns.every((column: unknown) =>
            typeof column === 'object' && column !== null && 'name' in column && 'values' in column && 'type' in column
        );
}

/**
 * Synthesize from raw records, a column map, a Table or a metadata document,
 * using environment configuration. A metadata document is validated first.
 */
export async function synthesize(input: unknown, options: SynthesizeCallOptions = {}): Promise<SynthesisResult> {
    const { config: overrides, logger, ...synthesizeOptions } = options;

    let source: Table | MetadataDocument;
    if (typeof input === 'object' && input !== null && !Array.isArray(input) && looksLikeMetadataDocument(input)) {
        source = validateMetadataValue(input);
    } else if (typeof input === 'object' && input !== null && !Array.isArray(input) && isTable(input)) {
        source = input;
    } else {
        source = detectTable(input);
    }

    const config: SynthprintConfig = { ...loadConfig(), ...overrides };
    const pipeline = createPipeline(config, logger);
    return pipeline.synthesize(source, {
        matchThreshold: config.matchThreshold,
        ...synthesizeOptions,
    });
}

// ============================================================================
// Re-exports
// ============================================================================

export type {
    CellValue,
    ColumnKind,
    ColumnStatistics,
    ColumnStructure,
    CacheIndex,
    CacheIndexEntry,
    CacheMatch,
    ClinicalContext,
    CorrelationMetadata,
    DataQuality,
    DeclaredType,
    DocumentFingerprint,
    FingerprintEntry,
    Logger,
    LogLevel,
    LogSink,
    MetadataDocument,
    StringPatterns,
    Table,
    TableColumn,
    TableRecord,
} from './types.js';

export {
    CacheIOError,
    CollaboratorError,
    ConfigError,
    DocumentValidationError,
    ExecutionFailure,
    ExecutionTimeoutError,
    InvalidInputError,
    ProfilingStatisticError,
    createLogger,
    consoleLogger,
    silentLogger,
} from './types.js';

export { detectTable, tableFromRecords, tableFromColumns, tableToRecords } from './table.js';
export { profile, toSecureDocument, toSecureJson, type ProfileOptions } from './profile.js';
export { formatHash, fullHash, embedding, similarity } from './fingerprint.js';
export { detectClinicalColumn, loadClinicalVocabulary } from './clinical.js';
export { FingerprintCache, type FingerprintCacheOptions } from './cache.js';
export {
    AnthropicRoutineAuthor,
    extractRoutineCode,
    type RoutineAuthor,
    type RoutineRequest,
    type AnthropicRoutineAuthorOptions,
} from './collaborator.js';
export { TemplateRoutineAuthor, buildTemplateRoutine } from './template.js';
export { ProcessRunner, InProcessRunner, type RoutineRunner } from './runner.js';
export {
    SandboxedExecutor,
    validateTable,
    type GenerationResult,
    type SandboxedExecutorOptions,
    type TableValidation,
} from './executor.js';
export {
    SynthesisPipeline,
    createPipeline,
    type SynthesisProvenance,
    type SynthesisResult,
    type SynthesizeOptions,
} from './pipeline.js';
export { loadConfig, type SynthprintConfig } from './config.js';
export { buildGenerationPrompt, ROUTINE_SYSTEM_PROMPT } from './prompts.js';
