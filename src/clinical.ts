/**
 * synthprint - Clinical Reference
 *
 * Recognizes clinical columns (medications, lab tests, units, diagnoses,
 * procedures, body sites and a few coded terms) by name and attaches a
 * vocabulary the generator can draw from. Suggestions are a seeded sample,
 * so profiling the same table twice yields the same document.
 */

import { readFileSync } from 'node:fs';
import _ from 'lodash';
import {
    CLINICAL_KEYWORDS,
    CLINICAL_STATISTICS_LIMIT,
    CLINICAL_SUGGESTION_LIMIT,
    PROFILE_SEED,
} from './constants.js';
import type { ClinicalColumnType } from './constants.js';
import { sampleItems } from './sample.js';
import type { ClinicalContext, ColumnStatistics } from './types.js';
import type { ClinicalVocabulary } from './validation.js';
import { validateClinicalVocabulary } from './validation.js';

const VOCABULARY_URL = new URL('../resources/clinical-vocabulary.json', import.meta.url);

let vocabulary: ClinicalVocabulary | null = null;

/** Read and validate the bundled vocabulary once */
export function loadClinicalVocabulary(): ClinicalVocabulary {
    vocabulary ??= validateClinicalVocabulary(readFileSync(VOCABULARY_URL, 'utf8'));
    return vocabulary;
}

// ============================================================================
// Name Matching
// ============================================================================

/**
 * `drugName`, `Drug-Name` and `drug_name` all become `_drug_name_`
 */
function normalizeName(name: string): string {
    const tokens = name
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .filter(Boolean);
    return `_${tokens.join('_')}_`;
}

function hasKeyword(normalized: string, keyword: string): boolean {
    return new RegExp(`_${_.escapeRegExp(keyword)}(?:s|\\d+)?_`).test(normalized);
}

function familyTerms(source: ClinicalVocabulary, type: ClinicalColumnType): readonly string[] {
    switch (type) {
        case 'unit':
            return _.uniq(Object.values(source.unit).flat());
        default:
            return source[type];
    }
}

function suggestions(terms: readonly string[], seed: number): string[] {
    return [...sampleItems(_.uniq(terms), CLINICAL_SUGGESTION_LIMIT, seed).items];
}

// ============================================================================
// Detection
// ============================================================================

/**
 * Clinical family of a column, or null when the name carries no clinical
 * keyword
 *
 * @example
 * detectClinicalColumn('primary_diagnosis')  // { type: 'diagnosis', category: 'clinical', suggested_values: [...] }
 * detectClinicalColumn('website')            // null
 */
export function detectClinicalColumn(
    name: string,
    seed: number = PROFILE_SEED,
    source: ClinicalVocabulary = loadClinicalVocabulary()
): ClinicalContext | null {
    const normalized = normalizeName(name);

    for (const { type, keywords } of CLINICAL_KEYWORDS) {
        if (keywords.some((keyword) => hasKeyword(normalized, keyword))) {
            return { type, category: 'clinical', suggested_values: suggestions(familyTerms(source, type), seed) };
        }
    }

    for (const [term, values] of Object.entries(source.terms)) {
        if (hasKeyword(normalized, term)) {
            return { type: term, category: 'clinical', suggested_values: suggestions(values, seed) };
        }
    }

    return null;
}

/**
 * Attach the context; string columns also get the top suggestions and the
 * `is_clinical` flag
 */
export function withClinicalContext(stats: ColumnStatistics, context: ClinicalContext): ColumnStatistics {
    if (stats.type !== 'string' || context.suggested_values.length === 0) {
        return { ...stats, clinical_context: context };
    }

    return {
        ...stats,
        clinical_context: context,
        suggested_values: context.suggested_values.slice(0, CLINICAL_STATISTICS_LIMIT),
        is_clinical: true,
    };
}
