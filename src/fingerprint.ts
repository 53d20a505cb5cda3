/**
 * synthprint - Fingerprints
 *
 * Two deterministic hashes and one heuristic feature vector per metadata
 * document:
 * - format hash: column names, declared types and kinds, column count
 * - full hash: the whole document minus its timestamp and fingerprint
 * - embedding: a fixed-layout feature vector (see EMBEDDING_SCHEMA_VERSION),
 *   not a learned representation
 */

import { DEFAULT_GENERATOR_VERSION, EMBEDDING_SIZE } from './constants.js';
import type { MetadataDocument } from './types.js';
import { shortHash, stableStringify } from './utils.js';

// ============================================================================
// Hashes
// ============================================================================

export function formatHash(document: MetadataDocument, version: string = DEFAULT_GENERATOR_VERSION): string {
    const shape = {
        columns: document.structure.columns.map(({ name, dtype, kind }) => ({ name, dtype, kind })),
        shape: document.structure.shape.columns,
        version,
    };
    return `format_${shortHash(stableStringify(shape))}`;
}

export function fullHash(document: MetadataDocument, version: string = DEFAULT_GENERATOR_VERSION): string {
    const { extraction_timestamp: _timestamp, fingerprint: _fingerprint, ...content } = document;
    return `full_${shortHash(stableStringify({ ...content, version }))}`;
}

// ============================================================================
// Embedding
// ============================================================================

/**
 * @example
 * // 3 rows, one numeric column with mean 30, std 4.08, min 25, max 35
 * embedding(doc).slice(0, 6)  // [3, 1, 30, 4.08, 25, 35]
 */
export function embedding(document: MetadataDocument): number[] {
    const features: number[] = [document.structure.shape.rows, document.structure.shape.columns];

    for (const column of document.structure.columns) {
        const stats = document.statistics[column.name];

        if (stats === undefined || stats.all_null === true) {
            features.push(...(column.kind === 'numeric' ? [0, 0, 0, 0] : [0, 0, 0]));
            continue;
        }

        switch (stats.type) {
            case 'numeric':
                features.push(stats.mean, stats.std, stats.min, stats.max);
                break;
            case 'string':
                features.push(stats.unique_values, stats.avg_length, stats.is_categorical ? 1 : 0);
                break;
            default:
                features.push(0, 0, 0);
        }
    }

    const vector = features.slice(0, EMBEDDING_SIZE).map((v) => (Number.isFinite(v) ? v : 0));
    while (vector.length < EMBEDDING_SIZE) vector.push(0);
    return vector;
}

/**
 * Cosine similarity rescaled from [-1, 1] to [0, 1]; 0 when either vector is zero
 */
export function similarity(a: readonly number[], b: readonly number[]): number {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    const length = Math.min(a.length, b.length);

    for (let i = 0; i < length; i++) {
        dot += a[i] * b[i];
    }
    for (const v of a) normA += v * v;
    for (const v of b) normB += v * v;

    if (normA === 0 || normB === 0) return 0;

    const cosine = dot / Math.sqrt(normA * normB);
    return (Math.min(1, Math.max(-1, cosine)) + 1) / 2;
}
