/**
 * synthprint - Sampling
 *
 * Deterministic reservoir sampling. Identical input and seed always yield
 * the same sample, so profiling the same table twice is reproducible.
 */

import { PROFILE_SEED } from './constants.js';

export interface SampleResult<T> {
    readonly items: readonly T[];
    readonly total: number;
    readonly sampled: boolean;
}

/**
 * mulberry32: small 32-bit PRNG, returns floats in [0, 1)
 */
export function createRandom(seed: number = PROFILE_SEED): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Pick `maxItems` positions out of `total`, returned in ascending order
 */
export function sampleIndices(total: number, maxItems: number, seed: number = PROFILE_SEED): number[] {
    if (total <= maxItems) {
        return Array.from({ length: total }, (_, i) => i);
    }

    const random = createRandom(seed);
    const reservoir: number[] = [];

    for (let i = 0; i < total; i++) {
        if (i < maxItems) {
            reservoir.push(i);
        } else {
            const j = Math.floor(random() * (i + 1));
            if (j < maxItems) {
                reservoir[j] = i;
            }
        }
    }

    return reservoir.sort((a, b) => a - b);
}

export function sampleItems<T>(
    items: readonly T[],
    maxItems: number,
    seed: number = PROFILE_SEED
): SampleResult<T> {
    if (items.length <= maxItems) {
        return { items, total: items.length, sampled: false };
    }

    return {
        items: sampleIndices(items.length, maxItems, seed).map((i) => items[i]),
        total: items.length,
        sampled: true,
    };
}
