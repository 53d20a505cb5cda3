/**
 * synthprint - Constants & Patterns
 *
 * Thresholds, the ordered format table used for pattern detection,
 * and the versioned contracts that cached fingerprints depend on.
 */

import type { FormatName } from './types.js';

// ============================================================================
// Versions
// ============================================================================

/** Written into every metadata document */
export const METADATA_VERSION = '1.0';

/** Default generator version folded into both hashes */
export const DEFAULT_GENERATOR_VERSION = '1.0';

/**
 * Feature layout of the heuristic embedding. Similarity between two
 * entries is only meaningful when both were built with the same layout:
 * [rows, columns, ...per column (numeric: mean, std, min, max |
 * string: unique_values, avg_length, is_categorical | other: 0, 0, 0)]
 */
export const EMBEDDING_SCHEMA_VERSION = 'v1';

export const EMBEDDING_SIZE = 128;

// ============================================================================
// Profiling
// ============================================================================

export const PROFILE_SEED = 42;

export const LIMITS = {
    /** Rows sampled before pattern detection */
    sampleSize: 1000,
    /** Non-null values sampled per string column for format matching */
    patternSampleSize: 100,
    /** Top-K entries kept per string column */
    topValues: 10,
    /** Categorical association is quadratic; only the first N string columns take part */
    maxAssociationColumns: 10,
    /** Minimum rows before Pearson correlation is computed */
    minCorrelationRows: 3,
    /** Prefix/suffix detection only runs above this many sampled values */
    minAffixSamples: 10,
    affixLength: 3,
} as const;

export const THRESHOLDS = {
    formatMatch: 0.8,
    affixCoverage: 0.3,
    strongCorrelation: 0.5,
    categoricalAssociation: 0.3,
    categoricalUniqueRatio: 0.5,
    categoricalUniqueCount: 100,
} as const;

export const BOOLEAN_TOKENS = new Set(['true', 'false', 'yes', 'no', '1', '0', 't', 'f', 'y', 'n']);

// ============================================================================
// String Shape Flags (any-match over non-null values)
// ============================================================================

export const SHAPE_PATTERNS = {
    hasNumbers: /\d/,
    hasSpecialChars: /[^a-zA-Z0-9\s]/,
    emailLike: /@.*\./,
    urlLike: /^https?:\/\//,
    phoneLike: /^\+?\d{10,}$|^\d{3}-\d{3}-\d{4}$/,
} as const;

// ============================================================================
// Format Table (first match in this order wins)
// ============================================================================

export interface FormatPattern {
    readonly name: FormatName;
    readonly pattern: RegExp;
}

export const FORMAT_PATTERNS: readonly FormatPattern[] = [
    { name: 'email', pattern: /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/ },
    { name: 'phone_us', pattern: /^\+?1?\d{10}$|^\d{3}-\d{3}-\d{4}$/ },
    { name: 'ssn', pattern: /^\d{3}-\d{2}-\d{4}$/ },
    { name: 'zip_code', pattern: /^\d{5}(-\d{4})?$/ },
    { name: 'ipv4', pattern: /^(?:[0-9]{1,3}\.){3}[0-9]{1,3}$/ },
    { name: 'uuid', pattern: /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/ },
    { name: 'date_iso', pattern: /^\d{4}-\d{2}-\d{2}$/ },
    { name: 'time_24h', pattern: /^([01]?[0-9]|2[0-3]):[0-5][0-9](:[0-5][0-9])?$/ },
    { name: 'alphanumeric_id', pattern: /^[A-Z0-9]{6,}$/ },
    { name: 'numeric_id', pattern: /^\d+$/ },
];

// ============================================================================
// Table Type Inference
// ============================================================================

/** Share of checked string values that must look like dates before promotion */
export const DATE_PROMOTION_RATIO = 0.8;

/** Non-null values checked per string column when promoting to datetime */
export const DATE_CHECK_SIZE = 10;

// ============================================================================
// Fingerprint Cache
// ============================================================================

export const CACHE_INDEX_FILE = 'cache_index.json';

/** At or above this threshold an exact full-hash match is attempted first */
export const EXACT_MATCH_THRESHOLD = 0.95;

export const DEFAULT_MATCH_THRESHOLD = 0.8;

export const DEFAULT_MAX_BUCKET_SIZE = 50;

export const ARTIFACT_SUFFIXES = {
    routine: '_routine.js',
    metadata: '_metadata.json',
    embedding: '_embedding.json',
    data: '_data.json',
} as const;

export const LOCK_OPTIONS = {
    stale: 10_000,
    retries: { retries: 40, factor: 1.5, minTimeout: 25, maxTimeout: 2_000, randomize: true },
} as const;

// ============================================================================
// Execution
// ============================================================================

/** Zero-argument function every routine must define */
export const ROUTINE_ENTRY_POINT = 'generateSyntheticData';

export const DEFAULT_EXECUTION_TIMEOUT_MS = 30_000;

export const DEFAULT_EXECUTION_MEMORY_MB = 512;

/** Marks the line on stdout that carries the routine's JSON result */
export const OUTPUT_MARKER = '__SYNTHPRINT_RESULT__';

export const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/** Threshold bump applied to the single regeneration attempt */
export const RETRY_THRESHOLD_STEP = 0.1;

// ============================================================================
// Collaborator (AI routine author)
// ============================================================================

export const AI_DEFAULT_MODEL = 'claude-sonnet-4-20250514';

export const AI_MAX_RETRIES = 3;

export const AI_MAX_TOKENS = 4000;

export const AI_TEMPERATURE = 0.3;

export const ROUTINE_TOOL_NAME = 'submit_generation_routine';

// ============================================================================
// Template Routines
// ============================================================================

export const DATE_NAME_KEYWORDS: readonly string[] = [
    'date', 'time', 'created', 'updated', 'modified', 'dob',
    'timestamp', 'expires', 'started', 'ended', 'completed',
];

export const MAX_TEMPLATE_CATEGORIES = 20;

export const TEMPLATE_DATE_SPAN_DAYS = 365;

// ============================================================================
// Clinical Reference
// ============================================================================

export type ClinicalColumnType = 'medication' | 'lab_test' | 'unit' | 'diagnosis' | 'procedure' | 'body_site';

export interface ClinicalKeywords {
    readonly type: ClinicalColumnType;
    readonly keywords: readonly string[];
}

/**
 * Column-name keywords per clinical family, checked in order. A keyword
 * matches a whole name token, optionally followed by `s` or digits.
 * Term families from the vocabulary file are checked after these.
 */
export const CLINICAL_KEYWORDS: readonly ClinicalKeywords[] = [
    { type: 'medication', keywords: ['medication', 'drug', 'medicine', 'rx', 'prescription', 'med'] },
    { type: 'lab_test', keywords: ['lab', 'test', 'wbc', 'rbc', 'glucose', 'creatinine', 'hemoglobin'] },
    { type: 'unit', keywords: ['unit', 'dose', 'dosage', 'amount', 'concentration'] },
    { type: 'diagnosis', keywords: ['diagnosis', 'diagnoses', 'disease', 'condition', 'disorder', 'icd'] },
    { type: 'procedure', keywords: ['procedure', 'surgery', 'operation', 'treatment'] },
    { type: 'body_site', keywords: ['site', 'location', 'anatomy', 'body_part'] },
];

/** Suggestions kept on the clinical context */
export const CLINICAL_SUGGESTION_LIMIT = 20;

/** Suggestions copied onto string statistics */
export const CLINICAL_STATISTICS_LIMIT = 10;
