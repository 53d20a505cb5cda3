/**
 * synthprint - Pipeline
 *
 * profile -> cache lookup -> cached routine or fresh generation -> register
 *
 * A cached routine is replayed as stored, so its tables keep the row count
 * it was written for.
 */

import { FingerprintCache } from './cache.js';
import { AnthropicRoutineAuthor } from './collaborator.js';
import type { SynthprintConfig } from './config.js';
import { DEFAULT_MATCH_THRESHOLD } from './constants.js';
import { SandboxedExecutor } from './executor.js';
import type { RoutineSource, TableValidation } from './executor.js';
import { profile } from './profile.js';
import { ProcessRunner } from './runner.js';
import type { Logger, MetadataDocument, Table } from './types.js';
import { ExecutionFailure, consoleLogger, createLogger, errorMessage } from './types.js';

export interface SynthesizeOptions {
    /** Rows per table; defaults to the source row count */
    numRows?: number;
    matchThreshold?: number;
    /** Look up and register routines in the cache (default true) */
    useCache?: boolean;
    /** Number of independent tables to produce (default 1) */
    fileCount?: number;
    /** Opaque data-dictionary rules attached to a freshly profiled document */
    generationConstraints?: string;
}

export interface SynthesisProvenance {
    readonly source: 'cache' | RoutineSource;
    /** Key of the cache entry used or created */
    readonly cacheKey: string | null;
    /** Embedding similarity of the cache hit */
    readonly similarity?: number;
    readonly attempts: number;
    readonly validation: TableValidation;
}

export interface SynthesisResult {
    readonly metadata: MetadataDocument;
    readonly tables: readonly Table[];
    readonly routineText: string;
    readonly provenance: SynthesisProvenance;
}

export interface SynthesisPipelineOptions {
    executor: SandboxedExecutor;
    cache?: FingerprintCache | null;
    sampleSize?: number;
    /** Passed to the profiler (default true) */
    clinicalReference?: boolean;
    logger?: Logger;
}

interface Produced {
    readonly table: Table;
    readonly routineText: string;
    readonly provenance: SynthesisProvenance;
}

function isMetadataDocument(input: Table | MetadataDocument): input is MetadataDocument {
    return 'structure' in input;
}

// ============================================================================
// Pipeline
// ============================================================================

export class SynthesisPipeline {
    private readonly executor: SandboxedExecutor;
    private readonly cache: FingerprintCache | null;
    private readonly sampleSize: number | undefined;
    private readonly clinicalReference: boolean;
    private readonly logger: Logger;

    constructor(options: SynthesisPipelineOptions) {
        this.executor = options.executor;
        this.cache = options.cache ?? null;
        this.sampleSize = options.sampleSize;
        this.clinicalReference = options.clinicalReference ?? true;
        this.logger = options.logger ?? consoleLogger;
    }

    async synthesize(input: Table | MetadataDocument, options: SynthesizeOptions = {}): Promise<SynthesisResult> {
        const metadata = isMetadataDocument(input)
            ? input
            : profile(input, {
                logger: this.logger,
                clinicalReference: this.clinicalReference,
                ...(this.sampleSize !== undefined && { sampleSize: this.sampleSize }),
                ...(options.generationConstraints !== undefined && {
                    generationConstraints: options.generationConstraints,
                }),
            });

        const matchThreshold = options.matchThreshold ?? DEFAULT_MATCH_THRESHOLD;
        const numRows = options.numRows ?? metadata.structure.shape.rows;
        const useCache = (options.useCache ?? true) && this.cache !== null;
        const fileCount = Math.max(1, Math.trunc(options.fileCount ?? 1));

        const produced = (useCache ? await this.fromCache(metadata, matchThreshold) : null)
            ?? (await this.fromGenerator(metadata, numRows, matchThreshold, useCache));

        const tables: Table[] = [produced.table];
        for (let i = 1; i < fileCount; i++) {
            this.logger.info(`Generating table ${i + 1}/${fileCount}`);
            tables.push(await this.executor.run(produced.routineText));
        }

        return {
            metadata,
            tables,
            routineText: produced.routineText,
            provenance: produced.provenance,
        };
    }

    // ------------------------------------------------------------------------
    // Sources
    // ------------------------------------------------------------------------

    private async fromCache(metadata: MetadataDocument, matchThreshold: number): Promise<Produced | null> {
        if (!this.cache) return null;

        const match = await this.cache.findSimilar(metadata, matchThreshold);
        if (!match) return null;

        let table: Table;
        try {
            table = await this.executor.run(match.entry.routine_text);
        } catch (error) {
            if (!(error instanceof ExecutionFailure)) throw error;
            this.logger.warn(`Cached routine ${match.entry.cache_key} failed (${errorMessage(error)}); generating a new one`);
            return null;
        }

        const validation = this.executor.validate(table, metadata);
        if (!validation.valid) {
            this.logger.warn(`Cached routine ${match.entry.cache_key} produced the wrong columns; generating a new one`);
            return null;
        }

        this.logger.info(`Using cached routine ${match.entry.cache_key}`);
        return {
            table,
            routineText: match.entry.routine_text,
            provenance: {
                source: 'cache',
                cacheKey: match.entry.cache_key,
                similarity: match.similarity,
                attempts: 1,
                validation,
            },
        };
    }

    private async fromGenerator(
        metadata: MetadataDocument,
        numRows: number,
        matchThreshold: number,
        register: boolean
    ): Promise<Produced> {
        const result = await this.executor.generate(metadata, numRows, matchThreshold);

        let cacheKey: string | null = null;
        if (register && this.cache && result.validation.valid) {
            cacheKey = await this.cache.register(metadata, result.routineText, result.table);
        }

        return {
            table: result.table,
            routineText: result.routineText,
            provenance: {
                source: result.source,
                cacheKey,
                attempts: result.attempts,
                validation: result.validation,
            },
        };
    }
}

// ============================================================================
// Wiring
// ============================================================================

/**
 * Build a pipeline from configuration: Anthropic collaborator when an API
 * key is set, template routines otherwise
 */
export function createPipeline(config: SynthprintConfig, logger: Logger = createLogger(config.logLevel)): SynthesisPipeline {
    const author = config.anthropicApiKey
        ? new AnthropicRoutineAuthor({ apiKey: config.anthropicApiKey, model: config.anthropicModel, logger })
        : null;

    if (!author) logger.info('ANTHROPIC_API_KEY not set; using template routines');

    const executor = new SandboxedExecutor({
        author,
        isolatedRunner: new ProcessRunner({ memoryMb: config.executionMemoryMb }),
        timeoutMs: config.executionTimeoutMs,
        logger,
    });

    const cache = new FingerprintCache({
        cacheDir: config.cacheDir,
        version: config.generatorVersion,
        maxBucketSize: config.maxBucketSize,
        logger,
    });

    return new SynthesisPipeline({
        executor,
        cache,
        sampleSize: config.profileSampleSize,
        clinicalReference: config.clinicalReference,
        logger,
    });
}
