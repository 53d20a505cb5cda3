import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { FingerprintCache } from '../src/cache.js';
import { loadConfig } from '../src/config.js';
import { SandboxedExecutor } from '../src/executor.js';
import { SynthesisPipeline, createPipeline } from '../src/pipeline.js';
import { profile } from '../src/profile.js';
import { InProcessRunner } from '../src/runner.js';
import { detectTable, rowCount } from '../src/table.js';
import { silentLogger } from '../src/types.js';
import { recordingLogger, tempDir } from './helpers.js';

const SOURCE = detectTable([
    { age: 30, city: 'NY', score: 1.5 },
    { age: 25, city: 'LA', score: 2.5 },
    { age: 35, city: 'SF', score: 3.5 },
]);

describe('SynthesisPipeline', () => {
    let dir: string;
    let cleanup: () => Promise<void>;
    let cache: FingerprintCache;
    let pipeline: SynthesisPipeline;

    beforeEach(async () => {
        ({ dir, cleanup } = await tempDir());
        cache = new FingerprintCache({ cacheDir: dir, logger: silentLogger });
        pipeline = new SynthesisPipeline({
            executor: new SandboxedExecutor({ isolatedRunner: new InProcessRunner(), logger: silentLogger }),
            cache,
            logger: silentLogger,
        });
    });

    afterEach(async () => {
        await cleanup();
    });

    it('generates, registers, then replays from the cache', async () => {
        const first = await pipeline.synthesize(SOURCE, { numRows: 5 });

        expect(first.provenance.source).toBe('template');
        expect(first.provenance.cacheKey).not.toBeNull();
        expect(rowCount(first.tables[0])).toBe(5);

        const second = await pipeline.synthesize(SOURCE, { numRows: 50 });

        expect(second.provenance.source).toBe('cache');
        expect(second.provenance.cacheKey).toBe(first.provenance.cacheKey);
        expect(second.provenance.similarity).toBe(1);
        expect(second.routineText).toBe(first.routineText);
        expect(rowCount(second.tables[0])).toBe(5);
    });

    it('neither reads nor writes the cache when disabled', async () => {
        const result = await pipeline.synthesize(SOURCE, { useCache: false });

        expect(result.provenance.cacheKey).toBeNull();
        expect(rowCount(result.tables[0])).toBe(3);
        expect(cache.entries()).toEqual({});
    });

    it('produces one table per requested file', async () => {
        const result = await pipeline.synthesize(SOURCE, { numRows: 2, fileCount: 3, useCache: false });

        expect(result.tables).toHaveLength(3);
        expect(result.tables.every((table) => rowCount(table) === 2)).toBe(true);
    });

    it('accepts a metadata document', async () => {
        const metadata = profile(SOURCE, { logger: silentLogger });

        const result = await pipeline.synthesize(metadata, { useCache: false });

        expect(result.metadata).toBe(metadata);
        expect(result.tables[0].columns.map((c) => c.name)).toEqual(['age', 'city', 'score']);
    });

    it('regenerates when the cached routine fails', async () => {
        const broken = 'function generateSyntheticData() { throw new Error("broken"); }';
        const brokenKey = await cache.register(profile(SOURCE, { logger: silentLogger }), broken);

        const result = await pipeline.synthesize(SOURCE);

        expect(result.provenance.source).toBe('template');
        expect(result.provenance.cacheKey).not.toBe(brokenKey);
        expect(result.routineText).not.toBe(broken);
    });
});

describe('createPipeline', () => {
    it('uses template routines without an API key', () => {
        const logger = recordingLogger();

        const pipeline = createPipeline(loadConfig({}), logger);

        expect(pipeline).toBeInstanceOf(SynthesisPipeline);
        expect(logger.messages('info')).toEqual(['ANTHROPIC_API_KEY not set; using template routines']);
    });
});
