import { promises as fs } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { USAGE, runCli } from '../src/cli.js';
import type { CliIO } from '../src/cli.js';
import { SandboxedExecutor } from '../src/executor.js';
import { SynthesisPipeline } from '../src/pipeline.js';
import { InProcessRunner } from '../src/runner.js';
import { recordingLogger, tempDir } from './helpers.js';

describe('runCli', () => {
    let dir: string;
    let cleanup: () => Promise<void>;
    let output: string[];
    let logger: ReturnType<typeof recordingLogger>;
    let io: CliIO;

    beforeEach(async () => {
        ({ dir, cleanup } = await tempDir());
        output = [];
        logger = recordingLogger();
        io = {
            env: { CACHE_DIR: path.join(dir, 'cache') },
            stdout: (text) => output.push(text),
            logger,
            createPipeline: (_config, pipelineLogger) =>
                new SynthesisPipeline({
                    executor: new SandboxedExecutor({ isolatedRunner: new InProcessRunner(), logger: pipelineLogger }),
                    logger: pipelineLogger,
                }),
        };
    });

    afterEach(async () => {
        await cleanup();
    });

    async function writeRecords(): Promise<string> {
        const file = path.join(dir, 'people.json');
        await fs.writeFile(file, JSON.stringify([{ age: 30, city: 'NY' }, { age: 25, city: 'LA' }]), 'utf8');
        return file;
    }

    it('prints usage', async () => {
        expect(await runCli(['--help'], io)).toBe(0);
        expect(output).toEqual([`${USAGE}\n`]);
    });

    it('writes synthetic records to stdout', async () => {
        const file = await writeRecords();

        expect(await runCli([file, '--rows', '4'], io)).toBe(0);

        const records: unknown = JSON.parse(output.join(''));
        expect(Array.isArray(records) && records.length).toBe(4);
        expect(Array.isArray(records) && Object.keys(records[0]).sort()).toEqual(['age', 'city']);
    });

    it('writes several tables to a file', async () => {
        const file = await writeRecords();
        const out = path.join(dir, 'out.json');

        expect(await runCli([file, '--files', '2', '--rows', '3', '--out', out], io)).toBe(0);

        const tables: unknown = JSON.parse(await fs.readFile(out, 'utf8'));
        expect(Array.isArray(tables) && tables.length).toBe(2);
        expect(output).toEqual([]);
    });

    it('exits with 2 on bad arguments', async () => {
        const file = await writeRecords();

        expect(await runCli([file, '--rows', 'many'], io)).toBe(2);
        expect(logger.messages('error')[0]).toBe('--rows expects a non-negative integer, got "many"');

        expect(await runCli([file, '--threshold', '1.5'], io)).toBe(2);
        expect(await runCli(['--bogus'], io)).toBe(2);
        expect(await runCli([], io)).toBe(2);
    });

    it('exits with 2 on unreadable input', async () => {
        expect(await runCli([path.join(dir, 'missing.json')], io)).toBe(2);
    });

    it('evicts the cache', async () => {
        expect(await runCli(['--evict', '30'], io)).toBe(0);
        expect(logger.messages('info')).toContain('Removed 0 cache entries');
    });
});
