import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/types.js';

describe('loadConfig', () => {
    it('applies defaults', () => {
        expect(loadConfig({})).toEqual({
            anthropicModel: 'claude-sonnet-4-20250514',
            cacheDir: './data/cache',
            generatorVersion: '1.0',
            logLevel: 'info',
            executionTimeoutMs: 30_000,
            executionMemoryMb: 512,
            profileSampleSize: 1000,
            matchThreshold: 0.8,
            maxBucketSize: 50,
            clinicalReference: true,
        });
    });

    it('treats blank values as unset', () => {
        const config = loadConfig({ ANTHROPIC_API_KEY: '   ', MATCH_THRESHOLD: '' });

        expect('anthropicApiKey' in config).toBe(false);
        expect(config.matchThreshold).toBe(0.8);
    });

    it('coerces numbers and keeps the key', () => {
        const config = loadConfig({
            ANTHROPIC_API_KEY: 'test-secret',
            MATCH_THRESHOLD: '0.9',
            EXECUTION_TIMEOUT_MS: '5000',
            LOG_LEVEL: 'debug',
        });

        expect(config.anthropicApiKey).toBe('test-secret');
        expect(config.matchThreshold).toBe(0.9);
        expect(config.executionTimeoutMs).toBe(5000);
        expect(config.logLevel).toBe('debug');
    });

    it('turns the clinical reference off', () => {
        expect(loadConfig({ CLINICAL_REFERENCE: 'false' }).clinicalReference).toBe(false);
        expect(loadConfig({ CLINICAL_REFERENCE: '0' }).clinicalReference).toBe(false);
    });

    it('lists every invalid variable', () => {
        let error: unknown;
        try {
            loadConfig({ MATCH_THRESHOLD: '2', LOG_LEVEL: 'loud' });
        } catch (caught) {
            error = caught;
        }

        expect(error).toBeInstanceOf(ConfigError);
        const issues = error instanceof ConfigError ? error.issues : [];
        expect(issues).toHaveLength(2);
        expect(issues.some((issue) => issue.startsWith('LOG_LEVEL'))).toBe(true);
        expect(issues.some((issue) => issue.startsWith('MATCH_THRESHOLD'))).toBe(true);
    });
});
