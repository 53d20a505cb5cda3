import { promises as fs } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { FingerprintCache } from '../src/cache.js';
import { formatHash, fullHash } from '../src/fingerprint.js';
import { profile } from '../src/profile.js';
import { detectTable } from '../src/table.js';
import { silentLogger } from '../src/types.js';
import { fixedClock, recordingLogger, tempDir } from './helpers.js';

const ROUTINE = 'function generateSyntheticData() { return { age: [1, 2, 3] }; }';

function profileOf(input: unknown) {
    return profile(detectTable(input), { now: () => new Date('2024-06-01T12:00:00Z'), logger: silentLogger });
}

describe('FingerprintCache', () => {
    let dir: string;
    let cleanup: () => Promise<void>;

    beforeEach(async () => {
        ({ dir, cleanup } = await tempDir());
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await cleanup();
    });

    it('registers a routine and finds it by exact hash', async () => {
        const clock = fixedClock('2024-01-01T00:00:00Z');
        const cache = new FingerprintCache({ cacheDir: dir, now: clock.now, logger: silentLogger });
        const doc = profileOf({ age: [30, 25, 35] });

        const key = await cache.register(doc, ROUTINE);

        expect(key).toBe(`${formatHash(doc)}_${fullHash(doc)}_2024-01-01T00-00-00.000Z`);

        const match = await cache.findSimilar(doc, 0.95);
        expect(match?.exact).toBe(true);
        expect(match?.similarity).toBe(1);
        expect(match?.entry.routine_text).toBe(ROUTINE);
        expect(match?.entry.metadata?.fingerprint).toEqual({
            format_hash: formatHash(doc),
            full_hash: fullHash(doc),
            cached_at: '2024-01-01T00:00:00.000Z',
        });
    });

    it('writes every artifact beside the index', async () => {
        const cache = new FingerprintCache({ cacheDir: dir, logger: silentLogger });
        const doc = profileOf({ age: [30, 25, 35] });

        const key = await cache.register(doc, ROUTINE, detectTable({ age: [1, 2] }));

        const files = (await fs.readdir(dir)).sort();
        expect(files).toEqual([
            `${key}_data.json`,
            `${key}_embedding.json`,
            `${key}_metadata.json`,
            `${key}_routine.js`,
            'cache_index.json',
        ].sort());

        const data: unknown = JSON.parse(await fs.readFile(path.join(dir, `${key}_data.json`), 'utf8'));
        expect(data).toEqual([{ age: 1 }, { age: 2 }]);
    });

    it('stores metadata in secure form', async () => {
        const cache = new FingerprintCache({ cacheDir: dir, logger: silentLogger });
        const doc = profileOf({ city: ['NY', 'NY', 'LA'] });

        const key = await cache.register(doc, ROUTINE);
        const stored = await fs.readFile(path.join(dir, `${key}_metadata.json`), 'utf8');

        expect(stored).toContain('"value": "value_0"');
        expect(stored).not.toContain('"NY"');
    });

    it('suffixes keys that would collide', async () => {
        const clock = fixedClock('2024-01-01T00:00:00Z');
        const cache = new FingerprintCache({ cacheDir: dir, now: clock.now, logger: silentLogger });
        const doc = profileOf({ age: [30, 25, 35] });

        const first = await cache.register(doc, ROUTINE);
        const second = await cache.register(doc, ROUTINE);

        expect(second).toBe(`${first}_1`);
    });

    it('finds a similar document in the same bucket', async () => {
        const cache = new FingerprintCache({ cacheDir: dir, logger: silentLogger });
        await cache.register(profileOf({ age: [30, 25, 35] }), ROUTINE);

        const match = await cache.findSimilar(profileOf({ age: [31, 26, 36] }), 0.8);

        expect(match?.exact).toBe(false);
        expect(match?.similarity).toBeGreaterThan(0.99);
    });

    it('misses documents of another shape', async () => {
        const cache = new FingerprintCache({ cacheDir: dir, logger: silentLogger });
        await cache.register(profileOf({ age: [30, 25, 35] }), ROUTINE);

        expect(await cache.findSimilar(profileOf({ height: [170, 180, 190] }), 0.5)).toBeNull();
    });

    it('reloads its index from disk', async () => {
        const doc = profileOf({ age: [30, 25, 35] });
        await new FingerprintCache({ cacheDir: dir, logger: silentLogger }).register(doc, ROUTINE);

        const reopened = new FingerprintCache({ cacheDir: dir, logger: silentLogger });
        const match = await reopened.findSimilar(doc, 0.8);

        expect(match?.entry.routine_text).toBe(ROUTINE);
    });

    it('skips entries built with another embedding layout', async () => {
        const doc = profileOf({ age: [30, 25, 35] });
        const key = await new FingerprintCache({ cacheDir: dir, logger: silentLogger }).register(doc, ROUTINE);
        await fs.writeFile(
            path.join(dir, `${key}_embedding.json`),
            JSON.stringify({ schema_version: 'v0', vector: [1, 2, 3] }),
            'utf8'
        );

        const reopened = new FingerprintCache({ cacheDir: dir, logger: silentLogger });

        expect(await reopened.findSimilar(doc, 0.5)).toBeNull();
    });

    it('treats a corrupt index as empty', async () => {
        await fs.writeFile(path.join(dir, 'cache_index.json'), '{not json', 'utf8');
        const logger = recordingLogger();
        const cache = new FingerprintCache({ cacheDir: dir, logger });

        await cache.load();

        expect(cache.entries()).toEqual({});
        expect(logger.messages('error')).toHaveLength(1);
        expect(logger.messages('error')[0]).toContain('CacheIOError: could not load cache index: Cache index is corrupt');
    });

    it('evicts everything when no age is given', async () => {
        const cache = new FingerprintCache({ cacheDir: dir, logger: silentLogger });
        await cache.register(profileOf({ age: [30, 25, 35] }), ROUTINE);
        await cache.register(profileOf({ name: ['a', 'b'] }), ROUTINE);

        expect(await cache.evict()).toBe(2);
        expect(await fs.readdir(dir)).toEqual(['cache_index.json']);
        expect(JSON.parse(await fs.readFile(path.join(dir, 'cache_index.json'), 'utf8'))).toEqual({});
    });

    it('evicts entries older than the cutoff', async () => {
        const clock = fixedClock('2024-01-01T00:00:00Z');
        const cache = new FingerprintCache({ cacheDir: dir, now: clock.now, logger: silentLogger });
        const old = await cache.register(profileOf({ age: [30, 25, 35] }), ROUTINE);

        clock.set('2024-03-01T00:00:00Z');
        const fresh = await cache.register(profileOf({ age: [31, 26, 36] }), ROUTINE);

        expect(await cache.evict(30)).toBe(1);

        const keys = Object.values(cache.entries()).flat().map((entry) => entry.cache_key);
        expect(keys).toEqual([fresh]);
        await expect(fs.access(path.join(dir, `${old}_routine.js`))).rejects.toThrow();
    });

    it('drops the oldest entries beyond the bucket size', async () => {
        const clock = fixedClock('2024-01-01T00:00:00Z');
        const logger = recordingLogger();
        const cache = new FingerprintCache({ cacheDir: dir, now: clock.now, maxBucketSize: 2, logger });
        const doc = profileOf({ age: [30, 25, 35] });

        const keys: (string | null)[] = [];
        for (const day of ['01', '02', '03']) {
            clock.set(`2024-01-${day}T00:00:00Z`);
            keys.push(await cache.register(doc, ROUTINE));
        }

        const bucket = cache.entries()[formatHash(doc)];
        expect(bucket.map((entry) => entry.cache_key)).toEqual([keys[1], keys[2]]);
        expect(logger.messages('warn')).toHaveLength(1);
    });

    it('keeps every concurrent registration from two instances', async () => {
        const first = new FingerprintCache({ cacheDir: dir, logger: silentLogger });
        const second = new FingerprintCache({ cacheDir: dir, logger: silentLogger });

        const keys = await Promise.all(
            Array.from({ length: 12 }, (_, i) =>
                (i % 2 === 0 ? first : second).register(profileOf({ age: [i, i + 1, i + 2] }), ROUTINE)
            )
        );

        expect(keys.filter((key) => key === null)).toEqual([]);
        expect(new Set(keys).size).toBe(12);

        const reader = new FingerprintCache({ cacheDir: dir, logger: silentLogger });
        await reader.load();
        expect(Object.values(reader.entries()).flat()).toHaveLength(12);
    });

    it('removes fresh artifacts when the index cannot be written', async () => {
        const logger = recordingLogger();
        const cache = new FingerprintCache({ cacheDir: dir, logger });
        vi.spyOn(fs, 'rename').mockRejectedValueOnce(new Error('disk full'));

        const key = await cache.register(profileOf({ age: [30, 25, 35] }), ROUTINE);

        expect(key).toBeNull();
        expect(await fs.readdir(dir)).toEqual([]);
        expect(cache.entries()).toEqual({});
        expect(logger.messages('error')).toHaveLength(1);
    });
});
