/**
 * synthprint - Fingerprint Cache
 *
 * File-backed store of generation routines keyed by fingerprint. The index
 * (`cache_index.json`) maps a format hash to a bucket of entries; each
 * entry points at routine, metadata, embedding and optional data artifacts
 * stored beside it.
 *
 * Every mutation runs under a file lock, re-reads the index from disk,
 * writes it back through a temp file + rename and only then replaces the
 * in-memory copy. A failed mutation is logged as a CacheIOError and leaves
 * both copies as they were. Read failures count as cache misses.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import lockfile from 'proper-lockfile';
import {
    ARTIFACT_SUFFIXES,
    CACHE_INDEX_FILE,
    DEFAULT_GENERATOR_VERSION,
    DEFAULT_MAX_BUCKET_SIZE,
    EMBEDDING_SCHEMA_VERSION,
    EXACT_MATCH_THRESHOLD,
    LOCK_OPTIONS,
} from './constants.js';
import { embedding, formatHash, fullHash, similarity } from './fingerprint.js';
import { toSecureDocument } from './profile.js';
import { tableToRecords } from './table.js';
import type {
    CacheIndex,
    CacheIndexEntry,
    CacheMatch,
    FingerprintEntry,
    Logger,
    MetadataDocument,
    Table,
} from './types.js';
import { CacheIOError, consoleLogger, errorMessage } from './types.js';
import { validateCacheIndex, validateEmbeddingFile, validateMetadataDocument } from './validation.js';

export interface FingerprintCacheOptions {
    cacheDir: string;
    /** Generator version folded into both hashes */
    version?: string;
    /** Oldest entries beyond this bucket size are dropped on register */
    maxBucketSize?: number;
    logger?: Logger;
    now?: () => Date;
}

interface Mutation<T> {
    readonly index: CacheIndex;
    /** Entries whose artifacts are deleted once the new index is on disk */
    readonly removed: readonly CacheIndexEntry[];
    readonly result: T;
    /** Runs after the new index is on disk */
    readonly afterWrite?: () => Promise<void>;
    /** Runs when the new index could not be written */
    readonly onAbort?: () => Promise<void>;
}

const MS_PER_DAY = 86_400_000;

const ARTIFACT_FIELDS = ['routine_file', 'metadata_file', 'embedding_file', 'data_file'] as const;

// ============================================================================
// Cache
// ============================================================================

export class FingerprintCache {
    readonly cacheDir: string;
    readonly version: string;
    private readonly indexPath: string;
    private readonly maxBucketSize: number;
    private readonly logger: Logger;
    private readonly now: () => Date;

    private index: CacheIndex = {};
    private loaded = false;
    private readonly embeddings = new Map<string, readonly number[]>();
    private tempCounter = 0;

    constructor(options: FingerprintCacheOptions) {
        this.cacheDir = path.resolve(options.cacheDir);
        this.version = options.version ?? DEFAULT_GENERATOR_VERSION;
        this.indexPath = path.join(this.cacheDir, CACHE_INDEX_FILE);
        this.maxBucketSize = options.maxBucketSize ?? DEFAULT_MAX_BUCKET_SIZE;
        this.logger = options.logger ?? consoleLogger;
        this.now = options.now ?? (() => new Date());
    }

    // ------------------------------------------------------------------------
    // Lifecycle
    // ------------------------------------------------------------------------

    /** Read the index from disk. A missing or unreadable index loads as empty. */
    async load(): Promise<void> {
        try {
            await fs.mkdir(this.cacheDir, { recursive: true });
            this.index = await this.readIndex();
        } catch (error) {
            this.reportFailure('load cache index', error);
            this.index = {};
        }
        this.embeddings.clear();
        this.loaded = true;
    }

    /** Persist the in-memory index */
    async flush(): Promise<boolean> {
        const snapshot = this.index;
        const flushed = await this.mutate(
            'flush cache index',
            () => ({ index: snapshot, removed: [], result: true }),
            false
        );
        return flushed === true;
    }

    /** Snapshot of the in-memory index */
    entries(): CacheIndex {
        return structuredClone(this.index);
    }

    // ------------------------------------------------------------------------
    // Lookup
    // ------------------------------------------------------------------------

    /**
     * Find a reusable routine for the document
     *
     * At or above the exact-match threshold an identical full hash wins
     * immediately. Otherwise the bucket entry with the highest embedding
     * similarity at or above the threshold is returned; ties keep the first.
     */
    async findSimilar(document: MetadataDocument, threshold: number): Promise<CacheMatch | null> {
        await this.ensureLoaded();

        const bucketKey = formatHash(document, this.version);
        const bucket = this.index[bucketKey];

        if (!bucket || bucket.length === 0) {
            this.logger.info('No cache bucket for this table shape');
            return null;
        }

        if (threshold >= EXACT_MATCH_THRESHOLD) {
            const target = fullHash(document, this.version);
            for (const entry of bucket) {
                if (entry.full_hash !== target) continue;
                const loaded = await this.loadEntry(bucketKey, entry);
                if (loaded) {
                    this.logger.info(`Exact cache match: ${target}`);
                    return { entry: loaded, similarity: 1, exact: true };
                }
            }
        }

        const query = embedding(document);
        let best: { entry: CacheIndexEntry; score: number } | null = null;
        let bestScore = -Infinity;

        for (const entry of bucket) {
            const vector = await this.loadEmbedding(entry);
            if (!vector) continue;

            const score = similarity(query, vector);
            if (score >= threshold && score > bestScore) {
                bestScore = score;
                best = { entry, score };
            }
        }

        if (best) {
            const loaded = await this.loadEntry(bucketKey, best.entry, this.embeddings.get(best.entry.cache_key));
            if (loaded) {
                this.logger.info(`Similar cache match (similarity ${best.score.toFixed(2)})`);
                return { entry: loaded, similarity: best.score, exact: false };
            }
        }

        this.logger.info('No suitable cache match found');
        return null;
    }

    // ------------------------------------------------------------------------
    // Mutations
    // ------------------------------------------------------------------------

    /**
     * Store a routine for the document
     *
     * @returns the cache key, or null when nothing could be persisted
     */
    async register(document: MetadataDocument, routineText: string, syntheticTable?: Table): Promise<string | null> {
        await this.ensureLoaded();

        const bucketKey = formatHash(document, this.version);
        const full = fullHash(document, this.version);
        const vector = embedding(document);
        const timestamp = this.now().toISOString();

        const stored: MetadataDocument = {
            ...toSecureDocument(document),
            fingerprint: { format_hash: bucketKey, full_hash: full, cached_at: timestamp },
        };

        const cacheKey = await this.mutate('register routine', async (current) => {
            const key = this.uniqueKey(current, `${bucketKey}_${full}_${timestamp.replace(/:/g, '-')}`);
            const entry: CacheIndexEntry = {
                cache_key: key,
                full_hash: full,
                routine_file: `${key}${ARTIFACT_SUFFIXES.routine}`,
                metadata_file: `${key}${ARTIFACT_SUFFIXES.metadata}`,
                embedding_file: `${key}${ARTIFACT_SUFFIXES.embedding}`,
                data_file: syntheticTable ? `${key}${ARTIFACT_SUFFIXES.data}` : null,
                timestamp,
                version: this.version,
            };

            try {
                await this.writeArtifacts(entry, routineText, stored, vector, syntheticTable);
            } catch (error) {
                await this.deleteArtifacts([entry]);
                throw error;
            }

            const bucket = [...(current[bucketKey] ?? []), entry];
            const overflow = Math.max(0, bucket.length - this.maxBucketSize);
            if (overflow > 0) {
                this.logger.warn(`Cache bucket ${bucketKey} exceeds ${this.maxBucketSize} entries, dropping ${overflow} oldest`);
            }

            return {
                index: { ...current, [bucketKey]: bucket.slice(overflow) },
                removed: bucket.slice(0, overflow),
                result: key,
                onAbort: () => this.deleteArtifacts([entry]),
            };
        });

        if (cacheKey === undefined) return null;

        this.embeddings.set(cacheKey, vector);
        this.logger.info(`Cached routine under ${cacheKey}`);
        return cacheKey;
    }

    /**
     * Without an argument, delete every artifact and reset the index.
     * With one, delete entries older than now minus that many days and
     * drop buckets left empty.
     *
     * @returns number of entries removed
     */
    async evict(olderThanDays?: number): Promise<number> {
        await this.ensureLoaded();

        if (olderThanDays === undefined) {
            const cleared = await this.mutate('clear cache', (current) => ({
                index: {},
                removed: [],
                result: Object.values(current).reduce((sum, bucket) => sum + bucket.length, 0),
                afterWrite: () => this.deleteAllArtifacts(),
            }));
            if (cleared === undefined) return 0;

            this.embeddings.clear();
            this.logger.info('Cleared all cache entries');
            return cleared;
        }

        const cutoff = this.now().getTime() - olderThanDays * MS_PER_DAY;

        const evicted = await this.mutate('evict cache entries', (current) => {
            const index: CacheIndex = {};
            const removed: CacheIndexEntry[] = [];

            for (const [bucketKey, bucket] of Object.entries(current)) {
                const kept = bucket.filter((entry) => Date.parse(entry.timestamp) > cutoff);
                removed.push(...bucket.filter((entry) => !kept.includes(entry)));
                if (kept.length > 0) index[bucketKey] = kept;
            }

            return { index, removed, result: removed.length };
        });

        if (evicted === undefined) return 0;

        this.logger.info(`Evicted ${evicted} cache entries older than ${olderThanDays} days`);
        return evicted;
    }

    // ------------------------------------------------------------------------
    // Index I/O
    // ------------------------------------------------------------------------

    private async ensureLoaded(): Promise<void> {
        if (!this.loaded) await this.load();
    }

    private async readIndex(): Promise<CacheIndex> {
        let raw: string;
        try {
            raw = await fs.readFile(this.indexPath, 'utf8');
        } catch (error) {
            if (isNotFound(error)) return {};
            throw new CacheIOError('Could not read cache index', this.indexPath, error);
        }

        try {
            return validateCacheIndex(raw);
        } catch (error) {
            throw new CacheIOError('Cache index is corrupt', this.indexPath, error);
        }
    }

    private async writeIndex(index: CacheIndex): Promise<void> {
        const temp = `${this.indexPath}.${process.pid}.${++this.tempCounter}.tmp`;
        try {
            await fs.writeFile(temp, JSON.stringify(index, null, 2), 'utf8');
            await fs.rename(temp, this.indexPath);
        } catch (error) {
            await fs.rm(temp, { force: true });
            throw new CacheIOError('Could not write cache index', this.indexPath, error);
        }
    }

    /**
     * Lock, re-read, apply, write, swap. Resolves to undefined when the
     * mutation was abandoned.
     */
    private async mutate<T>(
        action: string,
        apply: (current: CacheIndex) => Mutation<T> | Promise<Mutation<T>>,
        reread: boolean = true
    ): Promise<T | undefined> {
        let release: (() => Promise<void>) | undefined;

        try {
            await fs.mkdir(this.cacheDir, { recursive: true });
            release = await lockfile.lock(this.indexPath, {
                ...LOCK_OPTIONS,
                realpath: false,
                lockfilePath: `${this.indexPath}.lock`,
                onCompromised: (error) => {
                    this.logger.error(`Cache lock compromised: ${error.message}`);
                },
            });

            const current = reread ? await this.readIndex() : this.index;
            const { index, removed, result, afterWrite, onAbort } = await apply(current);
            try {
                await this.writeIndex(index);
            } catch (error) {
                if (onAbort) await this.runCleanup(action, onAbort);
                throw error;
            }
            this.index = index;

            for (const entry of removed) this.embeddings.delete(entry.cache_key);
            await this.deleteArtifacts(removed);
            if (afterWrite) await this.runCleanup(action, afterWrite);
            return result;
        } catch (error) {
            this.reportFailure(action, error);
            return undefined;
        } finally {
            if (release) {
                await release().catch((error: unknown) => {
                    this.logger.warn(`Could not release cache lock: ${errorMessage(error)}`);
                });
            }
        }
    }

    /** Cleanup after a committed write; failures no longer affect the index */
    private async runCleanup(action: string, cleanup: () => Promise<void>): Promise<void> {
        try {
            await cleanup();
        } catch (error) {
            this.logger.warn(`Cleanup after ${action} failed: ${errorMessage(error)}`);
        }
    }

    private uniqueKey(index: CacheIndex, base: string): string {
        const taken = new Set(Object.values(index).flatMap((bucket) => bucket.map((e) => e.cache_key)));
        let key = base;
        for (let n = 1; taken.has(key); n++) {
            key = `${base}_${n}`;
        }
        return key;
    }

    // ------------------------------------------------------------------------
    // Artifacts
    // ------------------------------------------------------------------------

    /** Artifact names are resolved inside the cache directory only */
    private artifactPath(file: string): string {
        return path.join(this.cacheDir, path.basename(file));
    }

    private async writeArtifacts(
        entry: CacheIndexEntry,
        routineText: string,
        metadata: MetadataDocument,
        vector: readonly number[],
        syntheticTable?: Table
    ): Promise<void> {
        await fs.writeFile(this.artifactPath(entry.routine_file), routineText, 'utf8');
        await fs.writeFile(this.artifactPath(entry.metadata_file), JSON.stringify(metadata, null, 2), 'utf8');
        await fs.writeFile(
            this.artifactPath(entry.embedding_file),
            JSON.stringify({ schema_version: EMBEDDING_SCHEMA_VERSION, vector }),
            'utf8'
        );
        if (entry.data_file && syntheticTable) {
            await fs.writeFile(
                this.artifactPath(entry.data_file),
                JSON.stringify(tableToRecords(syntheticTable)),
                'utf8'
            );
        }
    }

    private async deleteArtifacts(entries: readonly CacheIndexEntry[]): Promise<void> {
        for (const entry of entries) {
            for (const field of ARTIFACT_FIELDS) {
                const file = entry[field];
                if (!file) continue;
                try {
                    await fs.rm(this.artifactPath(file), { force: true });
                } catch (error) {
                    this.logger.warn(`Could not delete cache artifact ${file}: ${errorMessage(error)}`);
                }
            }
        }
    }

    /** Every regular file in the cache directory except the index */
    private async deleteAllArtifacts(): Promise<void> {
        const listing = await fs.readdir(this.cacheDir, { withFileTypes: true });
        for (const item of listing) {
            if (!item.isFile() || item.name === CACHE_INDEX_FILE) continue;
            await fs.rm(path.join(this.cacheDir, item.name), { force: true });
        }
    }

    private async loadEmbedding(entry: CacheIndexEntry): Promise<readonly number[] | null> {
        const cached = this.embeddings.get(entry.cache_key);
        if (cached) return cached;

        const file = this.artifactPath(entry.embedding_file);
        try {
            const parsed = validateEmbeddingFile(await fs.readFile(file, 'utf8'));
            if (parsed.schema_version !== EMBEDDING_SCHEMA_VERSION) {
                this.logger.debug(`Skipping ${entry.cache_key}: embedding schema ${parsed.schema_version}`);
                return null;
            }
            this.embeddings.set(entry.cache_key, parsed.vector);
            return parsed.vector;
        } catch (error) {
            this.reportFailure(`read embedding for ${entry.cache_key}`, new CacheIOError('Could not read embedding', file, error));
            return null;
        }
    }

    private async loadEntry(
        bucketKey: string,
        entry: CacheIndexEntry,
        vector?: readonly number[]
    ): Promise<FingerprintEntry | null> {
        try {
            const routineText = await fs.readFile(this.artifactPath(entry.routine_file), 'utf8');
            const metadata = await this.readMetadata(entry);
            const embeddingVector = vector ?? (await this.loadEmbedding(entry)) ?? [];

            return {
                cache_key: entry.cache_key,
                format_hash: bucketKey,
                full_hash: entry.full_hash,
                embedding: embeddingVector,
                routine_text: routineText,
                created_at: entry.timestamp,
                schema_version: entry.version,
                metadata,
            };
        } catch (error) {
            this.reportFailure(
                `load cache entry ${entry.cache_key}`,
                new CacheIOError('Could not read routine', this.artifactPath(entry.routine_file), error)
            );
            return null;
        }
    }

    private async readMetadata(entry: CacheIndexEntry): Promise<MetadataDocument | null> {
        const file = this.artifactPath(entry.metadata_file);
        try {
            return validateMetadataDocument(await fs.readFile(file, 'utf8'));
        } catch (error) {
            this.logger.debug(`Metadata for ${entry.cache_key} unavailable: ${errorMessage(error)}`);
            return null;
        }
    }

    private reportFailure(action: string, error: unknown): void {
        const failure = error instanceof CacheIOError
            ? error
            : new CacheIOError(errorMessage(error), this.indexPath, error);
        const cause = failure.cause === undefined ? '' : ` (${errorMessage(failure.cause)})`;
        this.logger.error(`${failure.name}: could not ${action}: ${failure.message}${cause}`);
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
