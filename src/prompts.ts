/**
 * synthprint - Routine Prompts
 *
 * Builds the prompts sent to the routine-writing model. Only the secure
 * form of the metadata document is ever embedded: top-K values are
 * replaced by positional placeholders before they leave the process.
 */

import { ROUTINE_ENTRY_POINT } from './constants.js';
import { toSecureDocument } from './profile.js';
import type { MetadataDocument } from './types.js';

export interface GenerationPromptInput {
    readonly metadata: MetadataDocument;
    readonly numRows: number;
    readonly matchThreshold: number;
}

// ============================================================================
// System Prompt
// ============================================================================

export const ROUTINE_SYSTEM_PROMPT = `You write JavaScript that generates synthetic tabular data.

The code you submit must:
1. Define a zero-argument function named ${ROUTINE_ENTRY_POINT}() that returns the table
2. Return either an array of row objects or an object mapping each column name to an array of values
3. Use only built-in JavaScript (Math, Date, Array, String, JSON). No require, no import, no I/O
4. Run synchronously and finish well within a few seconds
5. Match the statistical properties and patterns described in the metadata
6. Use suitable distributions for numeric columns and keep the listed correlations
7. Emit datetime columns as ISO 8601 strings
8. Treat columns whose names contain 'date', 'time', 'created' or 'updated' as dates, not random text
9. Where a column's statistics have is_clinical set, draw its values from suggested_values; clinical_context names the kind of clinical term

Submit the code through the provided tool. No explanations.`;

// ============================================================================
// Prompt Building
// ============================================================================

function section(title: string, value: unknown): string {
    return `## ${title}

\`\`\`json
${JSON.stringify(value, null, 2)}
\`\`\``;
}

/** Allowed deviation from the source statistics, as a percentage */
export function tolerancePercent(matchThreshold: number): number {
    return Math.round((1 - matchThreshold) * 20 * 100) / 100;
}

export function buildGenerationPrompt(input: GenerationPromptInput): string {
    const secure = toSecureDocument(input.metadata);
    const constraints = secure.generation_constraints
        ? `

## Data Dictionary Constraints (MUST be followed)

${secure.generation_constraints}`
        : '';

    return `Write a routine that generates a synthetic dataset with ${input.numRows} rows.

${section('Columns', secure.structure.columns)}

${section('Statistical Properties', secure.statistics)}

${section('Patterns', secure.patterns)}

${section('Correlations', secure.correlations)}${constraints}

## Your Task

Match threshold: ${input.matchThreshold} (0 = loose match, 1 = exact match)

1. Define ${ROUTINE_ENTRY_POINT}() returning exactly these columns: ${secure.structure.columns.map((c) => c.name).join(', ')}
2. Stay within ${tolerancePercent(input.matchThreshold)}% of the statistical properties
3. Keep declared types and detected formats
4. Keep the listed correlations between columns
5. Values listed as value_0, value_1, ... are placeholders; invent realistic values with the same frequencies
6. If data dictionary constraints are given above, they override the statistical properties`;
}
