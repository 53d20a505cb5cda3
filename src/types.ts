/**
 * synthprint - Type Definitions
 *
 * Tables, the metadata document that fingerprints them, cache entries,
 * and the error taxonomy shared by every stage of the pipeline.
 */

// ============================================================================
// Tables
// ============================================================================

/** Declared storage type of a column */
export type DeclaredType = 'integer' | 'float' | 'boolean' | 'datetime' | 'string';

/** Statistical family a column is profiled as */
export type ColumnKind = 'numeric' | 'datetime' | 'string';

/** A single cell. `null` is the explicit missing-value marker. */
export type CellValue = string | number | boolean | Date | null;

export interface TableColumn {
    readonly name: string;
    readonly type: DeclaredType;
    readonly values: readonly CellValue[];
}

export interface Table {
    readonly columns: readonly TableColumn[];
}

export type TableRecord = Record<string, CellValue>;

// ============================================================================
// Metadata Document
// ============================================================================

export interface MetadataDocument {
    readonly structure: StructureMetadata;
    readonly statistics: Record<string, ColumnStatistics>;
    readonly patterns: Record<string, StringPatterns>;
    readonly correlations: CorrelationMetadata;
    readonly data_quality: DataQuality;
    readonly metadata_version: string;
    readonly extraction_timestamp: string;
    /** Opaque rules produced by a data dictionary; they override statistics */
    readonly generation_constraints?: string;
    /** Attached by the fingerprint cache before storage */
    readonly fingerprint?: DocumentFingerprint;
}

export interface DocumentFingerprint {
    readonly format_hash: string;
    readonly full_hash: string;
    readonly cached_at: string;
}

export interface StructureMetadata {
    readonly shape: { readonly rows: number; readonly columns: number };
    readonly columns: readonly ColumnStructure[];
}

export interface ColumnStructure {
    readonly name: string;
    readonly dtype: DeclaredType;
    readonly kind: ColumnKind;
    readonly nullable: boolean;
    readonly unique_count: number;
    readonly null_count: number;
}

/** Clinical family inferred from a column name */
export interface ClinicalContext {
    readonly type: string;
    readonly category: 'clinical';
    readonly suggested_values: readonly string[];
}

interface BaseStatistics {
    readonly name: string;
    readonly non_null_count: number;
    readonly null_percentage: number;
    readonly clinical_context?: ClinicalContext;
    /** String columns only: vocabulary the generator should draw from */
    readonly suggested_values?: readonly string[];
    readonly is_clinical?: boolean;
}

export interface AllNullStatistics extends BaseStatistics {
    readonly type: ColumnKind;
    readonly all_null: true;
}

export type PercentageHint = 'decimal' | 'whole';

export interface NumericStatistics extends BaseStatistics {
    readonly type: 'numeric';
    readonly all_null: false;
    readonly mean: number;
    readonly median: number;
    readonly std: number;
    readonly min: number;
    readonly max: number;
    readonly q25: number;
    readonly q75: number;
    readonly skewness: number;
    readonly kurtosis: number;
    readonly is_integer: boolean;
    readonly has_negative: boolean;
    readonly has_zero: boolean;
    readonly might_be_percentage?: PercentageHint;
}

export interface DatetimeStatistics extends BaseStatistics {
    readonly type: 'datetime';
    readonly all_null: false;
    readonly min: string;
    readonly max: string;
    readonly range_days: number;
    readonly most_common_hour: number;
    /** Monday = 0 ... Sunday = 6 */
    readonly most_common_dayofweek: number;
    readonly has_time_component: boolean;
}

export interface ValueCount {
    readonly value: string;
    readonly count: number;
}

export interface StringStatistics extends BaseStatistics {
    readonly type: 'string';
    readonly all_null: false;
    readonly unique_values: number;
    readonly unique_ratio: number;
    readonly most_common_values: readonly ValueCount[];
    readonly avg_length: number;
    readonly min_length: number;
    readonly max_length: number;
    readonly is_categorical: boolean;
    readonly has_numbers: boolean;
    readonly has_special_chars: boolean;
    readonly is_email_like: boolean;
    readonly is_url_like: boolean;
    readonly is_phone_like: boolean;
    readonly might_be_boolean: boolean;
}

export type ColumnStatistics =
    | NumericStatistics
    | DatetimeStatistics
    | StringStatistics
    | AllNullStatistics;

export type FormatName =
    | 'email'
    | 'phone_us'
    | 'ssn'
    | 'zip_code'
    | 'ipv4'
    | 'uuid'
    | 'date_iso'
    | 'time_24h'
    | 'alphanumeric_id'
    | 'numeric_id';

export interface StringPatterns {
    readonly common_patterns: readonly string[];
    readonly detected_format: FormatName | null;
    readonly format_confidence?: number;
    readonly common_prefix?: string;
    readonly common_suffix?: string;
}

export interface NumericCorrelation {
    readonly column1: string;
    readonly column2: string;
    readonly correlation: number;
}

export interface CategoricalAssociation {
    readonly column1: string;
    readonly column2: string;
    readonly association_strength: number;
}

export interface CorrelationMetadata {
    readonly numeric_correlations: {
        readonly strong_correlations: readonly NumericCorrelation[];
        readonly correlation_matrix: Record<string, Record<string, number | null>>;
    };
    readonly categorical_associations: readonly CategoricalAssociation[];
    readonly temporal_relationships: readonly string[];
}

export interface DataQuality {
    readonly completeness: number;
    readonly duplicate_rows: number;
    readonly duplicate_percentage: number;
    readonly columns_with_nulls: readonly string[];
    readonly columns_all_null: readonly string[];
    readonly columns_single_value: readonly string[];
}

// ============================================================================
// Fingerprint Cache
// ============================================================================

/** One routine reference inside a format-hash bucket of the index file */
export interface CacheIndexEntry {
    readonly cache_key: string;
    readonly full_hash: string;
    readonly routine_file: string;
    readonly metadata_file: string;
    readonly embedding_file: string;
    readonly data_file: string | null;
    readonly timestamp: string;
    readonly version: string;
}

export type CacheIndex = Record<string, CacheIndexEntry[]>;

/** A cached routine, loaded back from its artifacts */
export interface FingerprintEntry {
    readonly cache_key: string;
    readonly format_hash: string;
    readonly full_hash: string;
    readonly embedding: readonly number[];
    readonly routine_text: string;
    readonly created_at: string;
    readonly schema_version: string;
    readonly metadata: MetadataDocument | null;
}

export interface CacheMatch {
    readonly entry: FingerprintEntry;
    /** 1 for an exact full-hash hit */
    readonly similarity: number;
    readonly exact: boolean;
}

// ============================================================================
// Logging
// ============================================================================

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

const LOG_PREFIX = 'synthprint:';

/** Console-like target a logger writes to */
export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

export function createLogger(level: LogLevel = 'info', sink: LogSink = console): Logger {
    const threshold = LOG_LEVEL_ORDER[level];
    const enabled = (candidate: LogLevel): boolean => LOG_LEVEL_ORDER[candidate] >= threshold;

    return {
        debug: (message) => {
            if (enabled('debug')) sink.debug(`${LOG_PREFIX} ${message}`);
        },
        info: (message) => {
            if (enabled('info')) sink.log(`${LOG_PREFIX} ${message}`);
        },
        warn: (message) => {
            if (enabled('warn')) sink.warn(`${LOG_PREFIX} ${message}`);
        },
        error: (message) => {
            if (enabled('error')) sink.error(`${LOG_PREFIX} ${message}`);
        },
    };
}

export const consoleLogger: Logger = createLogger('info');

export const silentLogger: Logger = createLogger('silent');

// ============================================================================
// Errors
// ============================================================================

/** Also reads errors thrown from another realm, such as a vm context */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}

export class InvalidInputError extends Error {
    public readonly name = 'InvalidInputError' as const;
}

export class ConfigError extends Error {
    public readonly name = 'ConfigError' as const;

    constructor(message: string, public readonly issues: readonly string[]) {
        super(message);
    }
}

/** A single statistic could not be computed; recovered with a neutral default */
export class ProfilingStatisticError extends Error {
    public readonly name = 'ProfilingStatisticError' as const;

    constructor(
        public readonly column: string,
        public readonly statistic: string,
        cause: unknown
    ) {
        super(`Could not compute ${statistic} for column "${column}": ${errorMessage(cause)}`, { cause });
    }
}

/** Index or artifact I/O failed; callers treat it as a cache miss */
export class CacheIOError extends Error {
    public readonly name = 'CacheIOError' as const;

    constructor(message: string, public readonly path: string, cause?: unknown) {
        super(message, { cause });
    }
}

/** The code-writing collaborator failed or returned unusable text */
export class CollaboratorError extends Error {
    public readonly name = 'CollaboratorError' as const;

    constructor(message: string, public readonly raw?: string, cause?: unknown) {
        super(message, { cause });
    }
}

/** A JSON document (tool input, cache file, routine output) did not match its schema */
export class DocumentValidationError extends Error {
    public readonly name = 'DocumentValidationError' as const;

    constructor(
        message: string,
        public readonly raw: string,
        public readonly issues: readonly string[]
    ) {
        super(message);
    }
}

/** The routine ran past its wall-clock budget. Never retried. */
export class ExecutionTimeoutError extends Error {
    public readonly name = 'ExecutionTimeoutError' as const;

    constructor(public readonly timeoutMs: number, public readonly mode: ExecutionMode) {
        super(`Routine execution exceeded ${timeoutMs}ms (${mode})`);
    }
}

/** The routine crashed or produced no usable table */
export class ExecutionFailure extends Error {
    public readonly name = 'ExecutionFailure' as const;

    constructor(
        message: string,
        public readonly mode: ExecutionMode,
        public readonly stderr?: string,
        cause?: unknown
    ) {
        super(message, { cause });
    }
}

export type ExecutionMode = 'isolated' | 'in-process';
