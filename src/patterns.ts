/**
 * synthprint - Pattern Detection
 *
 * Named-format detection and common prefix/suffix discovery for string
 * columns. Works on a seeded sample so results are reproducible.
 */

import { FORMAT_PATTERNS, LIMITS, PROFILE_SEED, THRESHOLDS } from './constants.js';
import { sampleItems } from './sample.js';
import type { FormatName, StringPatterns } from './types.js';
import { countValues } from './utils.js';

interface FormatMatch {
    readonly name: FormatName;
    readonly confidence: number;
}

// ============================================================================
// Formats
// ============================================================================

/**
 * First format in table order whose match rate exceeds the threshold
 *
 * @example
 * detectFormat(['a@b.com', 'c@d.com'])  // { name: 'email', confidence: 1 }
 */
export function detectFormat(values: readonly string[]): FormatMatch | null {
    if (values.length === 0) return null;

    for (const { name, pattern } of FORMAT_PATTERNS) {
        const matches = values.filter((v) => pattern.test(v)).length;
        if (matches > values.length * THRESHOLDS.formatMatch) {
            return { name, confidence: matches / values.length };
        }
    }

    return null;
}

// ============================================================================
// Affixes
// ============================================================================

function dominantAffix(affixes: readonly string[]): string | undefined {
    const top = countValues(affixes)[0];
    if (!top) return undefined;
    return top.count > affixes.length * THRESHOLDS.affixCoverage ? top.value : undefined;
}

export function commonAffixes(values: readonly string[]): { prefix?: string; suffix?: string } {
    const size = LIMITS.affixLength;
    const longEnough = values.map((v) => [...v]).filter((chars) => chars.length >= size);

    const prefix = dominantAffix(longEnough.map((chars) => chars.slice(0, size).join('')));
    const suffix = dominantAffix(longEnough.map((chars) => chars.slice(-size).join('')));

    return {
        ...(prefix !== undefined && { prefix }),
        ...(suffix !== undefined && { suffix }),
    };
}

// ============================================================================
// Column Patterns
// ============================================================================

/**
 * @param values non-null values of one string column
 * @returns null when the column has no values
 */
export function extractPatterns(values: readonly string[], seed: number = PROFILE_SEED): StringPatterns | null {
    if (values.length === 0) return null;

    const sample = sampleItems(values, LIMITS.patternSampleSize, seed).items;
    const format = detectFormat(sample);
    const affixes = sample.length > LIMITS.minAffixSamples ? commonAffixes(sample) : {};

    return {
        common_patterns: [],
        detected_format: format?.name ?? null,
        ...(format && { format_confidence: format.confidence }),
        ...(affixes.prefix !== undefined && { common_prefix: affixes.prefix }),
        ...(affixes.suffix !== undefined && { common_suffix: affixes.suffix }),
    };
}
