/**
 * synthprint - Profiler
 *
 * Turns a table into a MetadataDocument: structure, per-column statistics,
 * string patterns, correlations and quality metrics. Output holds only
 * aggregates and top-K counts, never rows.
 *
 * Every statistic runs behind a guard. A failure is logged as a
 * ProfilingStatisticError and replaced by a neutral default, so one bad
 * column never fails the whole profile.
 */

import { detectClinicalColumn, withClinicalContext } from './clinical.js';
import { LIMITS, METADATA_VERSION, PROFILE_SEED } from './constants.js';
import { extractCorrelations } from './correlations.js';
import { extractPatterns } from './patterns.js';
import { sampleIndices } from './sample.js';
import { cellToString, datetimeFigures, numericFigures, stringFigures, toNumber } from './stats.js';
import type {
    ColumnKind,
    ColumnStatistics,
    ColumnStructure,
    CorrelationMetadata,
    DataQuality,
    DeclaredType,
    Logger,
    MetadataDocument,
    StringPatterns,
    Table,
    TableColumn,
} from './types.js';
import { ProfilingStatisticError, consoleLogger } from './types.js';
import { assertTable, rowCount } from './table.js';
import { cellKey, countDistinct, isMissing } from './utils.js';

export interface ProfileOptions {
    /** Rows sampled for pattern detection (default 1000) */
    sampleSize?: number;
    seed?: number;
    /** Opaque rules from a data dictionary, passed through untouched */
    generationConstraints?: string;
    /** Attach clinical vocabulary to columns with clinical names (default true) */
    clinicalReference?: boolean;
    logger?: Logger;
    now?: () => Date;
}

// ============================================================================
// Guards
// ============================================================================

/**
 * Run one statistic; on failure log and return the fallback
 */
export function guardStatistic<T>(
    column: string,
    statistic: string,
    compute: () => T,
    fallback: T,
    logger: Logger
): T {
    try {
        return compute();
    } catch (error) {
        const failure = new ProfilingStatisticError(column, statistic, error);
        logger.warn(`${failure.name}: ${failure.message}`);
        return fallback;
    }
}

// ============================================================================
// Structure
// ============================================================================

export function columnKind(type: DeclaredType): ColumnKind {
    switch (type) {
        case 'integer':
        case 'float':
        case 'boolean':
            return 'numeric';
        case 'datetime':
            return 'datetime';
        case 'string':
            return 'string';
    }
}

function nullCount(column: TableColumn): number {
    return column.values.filter((v) => isMissing(v)).length;
}

function columnStructure(column: TableColumn): ColumnStructure {
    const nulls = nullCount(column);
    return {
        name: column.name,
        dtype: column.type,
        kind: columnKind(column.type),
        nullable: nulls > 0,
        unique_count: countDistinct(column.values),
        null_count: nulls,
    };
}

// ============================================================================
// Statistics
// ============================================================================

function neutralStatistics(column: TableColumn, base: StatisticsBase): ColumnStatistics {
    switch (columnKind(column.type)) {
        case 'numeric':
            return {
                ...base,
                type: 'numeric',
                all_null: false,
                mean: 0, median: 0, std: 0, min: 0, max: 0, q25: 0, q75: 0,
                skewness: 0, kurtosis: 0,
                is_integer: column.type !== 'float',
                has_negative: false,
                has_zero: false,
            };
        case 'datetime':
            return {
                ...base,
                type: 'datetime',
                all_null: false,
                min: new Date(0).toISOString(),
                max: new Date(0).toISOString(),
                range_days: 0,
                most_common_hour: 0,
                most_common_dayofweek: 0,
                has_time_component: false,
            };
        case 'string':
            return {
                ...base,
                type: 'string',
                all_null: false,
                unique_values: 0,
                unique_ratio: 0,
                most_common_values: [],
                avg_length: 0,
                min_length: 0,
                max_length: 0,
                is_categorical: false,
                has_numbers: false,
                has_special_chars: false,
                is_email_like: false,
                is_url_like: false,
                is_phone_like: false,
                might_be_boolean: false,
            };
    }
}

type StatisticsBase = Pick<ColumnStatistics, 'name' | 'non_null_count' | 'null_percentage'>;

function computeStatistics(column: TableColumn, base: StatisticsBase): ColumnStatistics {
    const kind = columnKind(column.type);
    const present = column.values.filter((v) => !isMissing(v));
    const allNull: ColumnStatistics = { ...base, type: kind, all_null: true };

    switch (kind) {
        case 'numeric': {
            const numbers = present.map(toNumber).filter((v): v is number => v !== null);
            if (numbers.length === 0) return allNull;
            return { ...base, ...numericFigures(numbers, column.type !== 'float') };
        }
        case 'datetime': {
            const dates = present.filter((v): v is Date => v instanceof Date);
            if (dates.length === 0) return allNull;
            return { ...base, ...datetimeFigures(dates) };
        }
        case 'string':
            if (present.length === 0) return allNull;
            return { ...base, ...stringFigures(present.map(cellToString)) };
    }
}

export function columnStatistics(column: TableColumn, rows: number, logger: Logger = consoleLogger): ColumnStatistics {
    const nulls = nullCount(column);
    const base: StatisticsBase = {
        name: column.name,
        non_null_count: rows - nulls,
        null_percentage: rows === 0 ? 0 : (nulls / rows) * 100,
    };

    return guardStatistic(
        column.name,
        `${columnKind(column.type)} statistics`,
        () => computeStatistics(column, base),
        neutralStatistics(column, base),
        logger
    );
}

// ============================================================================
// Quality
// ============================================================================

function rowKey(table: Table, row: number): string {
    return table.columns.map((c) => cellKey(c.values[row])).join('\u0001');
}

export function dataQuality(table: Table): DataQuality {
    const rows = rowCount(table);
    const columns = table.columns;

    const nullRates = columns.map((c) => (rows === 0 ? 0 : nullCount(c) / rows));
    const completeness = nullRates.length === 0
        ? 1
        : 1 - nullRates.reduce((sum, rate) => sum + rate, 0) / nullRates.length;

    const seen = new Set<string>();
    let duplicates = 0;
    for (let row = 0; row < rows; row++) {
        const key = rowKey(table, row);
        if (seen.has(key)) duplicates++;
        else seen.add(key);
    }

    return {
        completeness,
        duplicate_rows: duplicates,
        duplicate_percentage: rows === 0 ? 0 : (duplicates / rows) * 100,
        columns_with_nulls: columns.filter((c) => nullCount(c) > 0).map((c) => c.name),
        columns_all_null: columns.filter((c) => rows > 0 && nullCount(c) === rows).map((c) => c.name),
        columns_single_value: columns.filter((c) => countDistinct(c.values) === 1).map((c) => c.name),
    };
}

// ============================================================================
// Patterns
// ============================================================================

function stringPatterns(
    table: Table,
    sampleSize: number,
    seed: number,
    logger: Logger
): Record<string, StringPatterns> {
    const rows = sampleIndices(rowCount(table), sampleSize, seed);
    const patterns: Record<string, StringPatterns> = {};

    for (const column of table.columns) {
        if (column.type !== 'string') continue;

        const values = rows
            .map((row) => column.values[row])
            .filter((v) => !isMissing(v))
            .map(cellToString);

        const result = guardStatistic(
            column.name,
            'patterns',
            () => extractPatterns(values, seed),
            { common_patterns: [], detected_format: null },
            logger
        );

        if (result) patterns[column.name] = result;
    }

    return patterns;
}

// ============================================================================
// Main Export
// ============================================================================

const EMPTY_CORRELATIONS: CorrelationMetadata = {
    numeric_correlations: { strong_correlations: [], correlation_matrix: {} },
    categorical_associations: [],
    temporal_relationships: [],
};

/**
 * Profile a table into a metadata document
 *
 * @example
 * const doc = profile(tableFromRecords([{ age: 30 }, { age: 25 }, { age: 35 }]));
 * doc.statistics.age  // { type: 'numeric', mean: 30, is_integer: true, ... }
 */
export function profile(table: Table, options: ProfileOptions = {}): MetadataDocument {
    const logger = options.logger ?? consoleLogger;
    const sampleSize = options.sampleSize ?? LIMITS.sampleSize;
    const seed = options.seed ?? PROFILE_SEED;
    const now = options.now ?? (() => new Date());

    assertTable(table);
    const rows = rowCount(table);
    logger.debug(`Profiling table with ${rows} rows and ${table.columns.length} columns`);

    const clinicalReference = options.clinicalReference ?? true;
    const statistics: Record<string, ColumnStatistics> = {};
    for (const column of table.columns) {
        const stats = columnStatistics(column, rows, logger);
        const context = clinicalReference
            ? guardStatistic(column.name, 'clinical context', () => detectClinicalColumn(column.name, seed), null, logger)
            : null;
        statistics[column.name] = context ? withClinicalContext(stats, context) : stats;
    }

    const document: MetadataDocument = {
        structure: {
            shape: { rows, columns: table.columns.length },
            columns: table.columns.map(columnStructure),
        },
        statistics,
        patterns: stringPatterns(table, sampleSize, seed, logger),
        correlations: guardStatistic('*', 'correlations', () => extractCorrelations(table), EMPTY_CORRELATIONS, logger),
        data_quality: dataQuality(table),
        metadata_version: METADATA_VERSION,
        extraction_timestamp: now().toISOString(),
        ...(options.generationConstraints !== undefined && {
            generation_constraints: options.generationConstraints,
        }),
    };

    logger.debug('Profiling complete');
    return document;
}

// ============================================================================
// Secure Serialization
// ============================================================================

/**
 * Copy of the document with every top-K value replaced by a positional
 * placeholder. Counts are kept.
 *
 * @example
 * // most_common_values: [{ value: 'NY', count: 3 }, { value: 'LA', count: 1 }]
 * // becomes             [{ value: 'value_0', count: 3 }, { value: 'value_1', count: 1 }]
 */
export function toSecureDocument(document: MetadataDocument): MetadataDocument {
    const statistics: Record<string, ColumnStatistics> = {};

    for (const [name, stats] of Object.entries(document.statistics)) {
        statistics[name] = stats.all_null === false && stats.type === 'string'
            ? {
                ...stats,
                most_common_values: stats.most_common_values.map(({ count }, i) => ({
                    value: `value_${i}`,
                    count,
                })),
            }
            : stats;
    }

    return { ...document, statistics };
}

export function toSecureJson(document: MetadataDocument): string {
    return JSON.stringify(toSecureDocument(document), null, 2);
}
