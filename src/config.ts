/**
 * synthprint - Configuration
 *
 * Environment variables parsed into a typed config. `.env` files are
 * loaded by the CLI through dotenv before this runs.
 */

import { z } from 'zod';
import {
    AI_DEFAULT_MODEL,
    DEFAULT_EXECUTION_MEMORY_MB,
    DEFAULT_EXECUTION_TIMEOUT_MS,
    DEFAULT_GENERATOR_VERSION,
    DEFAULT_MATCH_THRESHOLD,
    DEFAULT_MAX_BUCKET_SIZE,
    LIMITS,
} from './constants.js';
import type { LogLevel } from './types.js';
import { ConfigError } from './types.js';
import { formatZodErrors } from './validation.js';

export interface SynthprintConfig {
    readonly anthropicApiKey?: string;
    readonly anthropicModel: string;
    readonly cacheDir: string;
    readonly generatorVersion: string;
    readonly logLevel: LogLevel;
    readonly executionTimeoutMs: number;
    readonly executionMemoryMb: number;
    readonly profileSampleSize: number;
    readonly matchThreshold: number;
    readonly maxBucketSize: number;
    readonly clinicalReference: boolean;
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

/** Empty strings count as unset */
const optionalText = z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const EnvSchema = z.object({
    ANTHROPIC_API_KEY: optionalText,
    ANTHROPIC_MODEL: optionalText.transform((value) => value ?? AI_DEFAULT_MODEL),
    CACHE_DIR: optionalText.transform((value) => value ?? './data/cache'),
    GENERATOR_VERSION: optionalText.transform((value) => value ?? DEFAULT_GENERATOR_VERSION),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    EXECUTION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_EXECUTION_TIMEOUT_MS),
    EXECUTION_MEMORY_MB: z.coerce.number().int().min(16).default(DEFAULT_EXECUTION_MEMORY_MB),
    PROFILE_SAMPLE_SIZE: z.coerce.number().int().positive().default(LIMITS.sampleSize),
    MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_MATCH_THRESHOLD),
    MAX_BUCKET_SIZE: z.coerce.number().int().positive().default(DEFAULT_MAX_BUCKET_SIZE),
    CLINICAL_REFERENCE: z.enum(['true', 'false', '1', '0']).default('true'),
});

/**
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SynthprintConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );
    const result = EnvSchema.safeParse(present);

    if (!result.success) {
        const issues = formatZodErrors(result.error);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }

    const parsed = result.data;
    return {
        ...(parsed.ANTHROPIC_API_KEY !== undefined && { anthropicApiKey: parsed.ANTHROPIC_API_KEY }),
        anthropicModel: parsed.ANTHROPIC_MODEL,
        cacheDir: parsed.CACHE_DIR,
        generatorVersion: parsed.GENERATOR_VERSION,
        logLevel: parsed.LOG_LEVEL,
        executionTimeoutMs: parsed.EXECUTION_TIMEOUT_MS,
        executionMemoryMb: parsed.EXECUTION_MEMORY_MB,
        profileSampleSize: parsed.PROFILE_SAMPLE_SIZE,
        matchThreshold: parsed.MATCH_THRESHOLD,
        maxBucketSize: parsed.MAX_BUCKET_SIZE,
        clinicalReference: parsed.CLINICAL_REFERENCE === 'true' || parsed.CLINICAL_REFERENCE === '1',
    };
}
