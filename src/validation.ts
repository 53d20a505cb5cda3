import { z } from 'zod';
import type { CacheIndex, MetadataDocument } from './types.js';
import { DocumentValidationError } from './types.js';

const DECLARED_TYPES = ['integer', 'float', 'boolean', 'datetime', 'string'] as const;

const COLUMN_KINDS = ['numeric', 'datetime', 'string'] as const;

const FORMAT_NAMES = [
    'email',
    'phone_us',
    'ssn',
    'zip_code',
    'ipv4',
    'uuid',
    'date_iso',
    'time_24h',
    'alphanumeric_id',
    'numeric_id',
] as const;

const DeclaredTypeSchema = z.enum(DECLARED_TYPES);
const ColumnKindSchema = z.enum(COLUMN_KINDS);

// ============================================================================
// Routine Output
// ============================================================================

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const RecordsSchema = z.array(z.record(z.string(), CellSchema));

const ColumnMapSchema = z.record(z.string(), z.array(CellSchema));

const RoutineOutputSchema = z.union([RecordsSchema, ColumnMapSchema]);

// ============================================================================
// Collaborator Tool Input
// ============================================================================

const RoutineToolInputSchema = z.object({
    code: z.string().min(1),
    notes: z.string().optional(),
});

// ============================================================================
// Cache Files
// ============================================================================

const CacheIndexEntrySchema = z.object({
    cache_key: z.string().min(1),
    full_hash: z.string().min(1),
    routine_file: z.string().min(1),
    metadata_file: z.string().min(1),
    embedding_file: z.string().min(1),
    data_file: z.string().nullable(),
    timestamp: z.string().min(1),
    version: z.string(),
});

const CacheIndexSchema: z.ZodType<CacheIndex> = z.record(z.string(), z.array(CacheIndexEntrySchema));

const EmbeddingFileSchema = z.object({
    schema_version: z.string(),
    vector: z.array(z.number()),
});

// ============================================================================
// Metadata Document
// ============================================================================

const ClinicalContextSchema = z.object({
    type: z.string(),
    category: z.literal('clinical'),
    suggested_values: z.array(z.string()),
});

const statisticsBase = {
    name: z.string(),
    non_null_count: z.number(),
    null_percentage: z.number(),
    clinical_context: ClinicalContextSchema.optional(),
    suggested_values: z.array(z.string()).optional(),
    is_clinical: z.boolean().optional(),
};

const ColumnStatisticsSchema = z.union([
    z.object({ ...statisticsBase, type: ColumnKindSchema, all_null: z.literal(true) }),
    z.object({
        ...statisticsBase,
        type: z.literal('numeric'),
        all_null: z.literal(false),
        mean: z.number(),
        median: z.number(),
        std: z.number(),
        min: z.number(),
        max: z.number(),
        q25: z.number(),
        q75: z.number(),
        skewness: z.number(),
        kurtosis: z.number(),
        is_integer: z.boolean(),
        has_negative: z.boolean(),
        has_zero: z.boolean(),
        might_be_percentage: z.enum(['decimal', 'whole']).optional(),
    }),
    z.object({
        ...statisticsBase,
        type: z.literal('datetime'),
        all_null: z.literal(false),
        min: z.string(),
        max: z.string(),
        range_days: z.number(),
        most_common_hour: z.number(),
        most_common_dayofweek: z.number(),
        has_time_component: z.boolean(),
    }),
    z.object({
        ...statisticsBase,
        type: z.literal('string'),
        all_null: z.literal(false),
        unique_values: z.number(),
        unique_ratio: z.number(),
        most_common_values: z.array(z.object({ value: z.string(), count: z.number() })),
        avg_length: z.number(),
        min_length: z.number(),
        max_length: z.number(),
        is_categorical: z.boolean(),
        has_numbers: z.boolean(),
        has_special_chars: z.boolean(),
        is_email_like: z.boolean(),
        is_url_like: z.boolean(),
        is_phone_like: z.boolean(),
        might_be_boolean: z.boolean(),
    }),
]);

const StringPatternsSchema = z.object({
    common_patterns: z.array(z.string()),
    detected_format: z.enum(FORMAT_NAMES).nullable(),
    format_confidence: z.number().optional(),
    common_prefix: z.string().optional(),
    common_suffix: z.string().optional(),
});

const PairSchema = { column1: z.string(), column2: z.string() };

const MetadataDocumentSchema: z.ZodType<MetadataDocument> = z.object({
    structure: z.object({
        shape: z.object({ rows: z.number().int().min(0), columns: z.number().int().min(0) }),
        columns: z.array(
            z.object({
                name: z.string(),
                dtype: DeclaredTypeSchema,
                kind: ColumnKindSchema,
                nullable: z.boolean(),
                unique_count: z.number(),
                null_count: z.number(),
            })
        ),
    }),
    statistics: z.record(z.string(), ColumnStatisticsSchema),
    patterns: z.record(z.string(), StringPatternsSchema),
    correlations: z.object({
        numeric_correlations: z.object({
            strong_correlations: z.array(z.object({ ...PairSchema, correlation: z.number() })),
            correlation_matrix: z.record(z.string(), z.record(z.string(), z.number().nullable())),
        }),
        categorical_associations: z.array(z.object({ ...PairSchema, association_strength: z.number() })),
        temporal_relationships: z.array(z.string()),
    }),
    data_quality: z.object({
        completeness: z.number(),
        duplicate_rows: z.number(),
        duplicate_percentage: z.number(),
        columns_with_nulls: z.array(z.string()),
        columns_all_null: z.array(z.string()),
        columns_single_value: z.array(z.string()),
    }),
    metadata_version: z.string(),
    extraction_timestamp: z.string(),
    generation_constraints: z.string().optional(),
    fingerprint: z
        .object({ format_hash: z.string(), full_hash: z.string(), cached_at: z.string() })
        .optional(),
});

// ============================================================================
// Clinical Vocabulary
// ============================================================================

const TermListSchema = z.array(z.string().min(1)).min(1);

const ClinicalVocabularySchema = z.object({
    medication: TermListSchema,
    lab_test: TermListSchema,
    unit: z.record(z.string(), TermListSchema),
    diagnosis: TermListSchema,
    procedure: TermListSchema,
    body_site: TermListSchema,
    terms: z.record(z.string(), TermListSchema),
});

export type RoutineOutput = z.infer<typeof RoutineOutputSchema>;
export type RoutineToolInput = z.infer<typeof RoutineToolInputSchema>;
export type EmbeddingFile = z.infer<typeof EmbeddingFileSchema>;
export type ClinicalVocabulary = z.infer<typeof ClinicalVocabularySchema>;

// ============================================================================
// Helpers
// ============================================================================

export function formatZodErrors(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

function validate<T>(value: unknown, schema: z.ZodType<T>, raw: string, errorContext: string): T {
    const result = schema.safeParse(value);

    if (!result.success) {
        throw new DocumentValidationError(
            `${errorContext} validation failed`,
            raw,
            formatZodErrors(result.error)
        );
    }

    return result.data;
}

function parseAndValidate<T>(raw: string, schema: z.ZodType<T>, errorContext: string): T {
    let parsed: unknown;

    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new DocumentValidationError(`Invalid JSON in ${errorContext}`, raw, [
            'Failed to parse JSON',
        ]);
    }

    return validate(parsed, schema, raw, errorContext);
}

function preview(value: unknown): string {
    try {
        return JSON.stringify(value)?.slice(0, 2_000) ?? String(value);
    } catch {
        return String(value);
    }
}

// ============================================================================
// Exports
// ============================================================================

export function validateRoutineOutput(raw: string): RoutineOutput {
    return parseAndValidate(raw, RoutineOutputSchema, 'Routine output');
}

export function validateRoutineToolInput(input: unknown): RoutineToolInput {
    return validate(input, RoutineToolInputSchema, preview(input), 'Routine tool input');
}

export function validateCacheIndex(raw: string): CacheIndex {
    return parseAndValidate(raw, CacheIndexSchema, 'Cache index');
}

export function validateEmbeddingFile(raw: string): EmbeddingFile {
    return parseAndValidate(raw, EmbeddingFileSchema, 'Embedding file');
}

export function validateMetadataDocument(raw: string): MetadataDocument {
    return parseAndValidate(raw, MetadataDocumentSchema, 'Metadata document');
}

export function validateMetadataValue(value: unknown): MetadataDocument {
    return validate(value, MetadataDocumentSchema, preview(value), 'Metadata document');
}

export function validateClinicalVocabulary(raw: string): ClinicalVocabulary {
    return parseAndValidate(raw, ClinicalVocabularySchema, 'Clinical vocabulary');
}
