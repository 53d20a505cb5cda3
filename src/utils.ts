/**
 * synthprint - Utilities
 *
 * Shared helpers: canonical JSON, hashing, value counting.
 */

import { createHash } from 'node:crypto';
import _ from 'lodash';
import type { CellValue } from './types.js';

// ============================================================================
// Canonical JSON
// ============================================================================

/**
 * JSON with object keys sorted at every depth, so equal documents
 * always serialize to the same string.
 *
 * @example
 * stableStringify({ b: 1, a: [{ d: 2, c: 3 }] })  // '{"a":[{"c":3,"d":2}],"b":1}'
 */
export function stableStringify(value: unknown): string {
    return JSON.stringify(sortKeysDeep(value));
}

function sortKeysDeep(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(sortKeysDeep);
    }

    if (_.isPlainObject(value) && typeof value === 'object' && value !== null) {
        const sorted: Record<string, unknown> = {};
        for (const key of Object.keys(value).sort()) {
            const child: unknown = Reflect.get(value, key);
            if (child !== undefined) {
                sorted[key] = sortKeysDeep(child);
            }
        }
        return sorted;
    }

    return value;
}

/**
 * SHA-256 of the input, truncated to `length` hex characters
 */
export function shortHash(input: string, length: number = 16): string {
    return createHash('sha256').update(input).digest('hex').slice(0, length);
}

// ============================================================================
// Cells
// ============================================================================

export function isMissing(value: CellValue | undefined): value is null | undefined {
    return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

/**
 * Stable key for equality and distinct counting; keeps 1 and "1" apart
 */
export function cellKey(value: CellValue | undefined): string {
    if (isMissing(value)) return 'null:';
    if (value instanceof Date) return `date:${value.getTime()}`;
    return `${typeof value}:${String(value)}`;
}

/** Length in code points, not UTF-16 units */
export function codePointLength(value: string): number {
    return [...value].length;
}

// ============================================================================
// Counting
// ============================================================================

export interface Counted<T> {
    readonly value: T;
    readonly count: number;
}

/**
 * Count occurrences, most frequent first. Ties keep first-seen order.
 *
 * @example
 * countValues(['b', 'a', 'b', 'a', 'c'])
 * // [{ value: 'b', count: 2 }, { value: 'a', count: 2 }, { value: 'c', count: 1 }]
 */
export function countValues<T>(values: readonly T[], keyOf: (value: T) => string = String): Counted<T>[] {
    const counts = new Map<string, { value: T; count: number; order: number }>();

    values.forEach((value, order) => {
        const key = keyOf(value);
        const existing = counts.get(key);
        if (existing) {
            existing.count++;
        } else {
            counts.set(key, { value, count: 1, order });
        }
    });

    return [...counts.values()]
        .sort((a, b) => b.count - a.count || a.order - b.order)
        .map(({ value, count }) => ({ value, count }));
}

/**
 * Most frequent value; ties go to the value seen first
 */
export function mode<T>(values: readonly T[], keyOf: (value: T) => string = String): T | undefined {
    return countValues(values, keyOf)[0]?.value;
}

export function countDistinct(values: readonly CellValue[]): number {
    return new Set(values.filter((v) => !isMissing(v)).map(cellKey)).size;
}
