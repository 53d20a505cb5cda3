/**
 * synthprint - Template Routines
 *
 * Writes a generation routine straight from a metadata document, with no
 * external collaborator. Used when no model is configured or the model
 * call fails. Values follow the declared types and summary statistics;
 * clinical columns draw from their suggested vocabulary.
 */

import {
    DATE_NAME_KEYWORDS,
    MAX_TEMPLATE_CATEGORIES,
    ROUTINE_ENTRY_POINT,
    TEMPLATE_DATE_SPAN_DAYS,
} from './constants.js';
import type { RoutineAuthor, RoutineRequest } from './collaborator.js';
import type { ColumnStatistics, ColumnStructure, MetadataDocument } from './types.js';

// ============================================================================
// Helpers emitted into every routine
// ============================================================================

const RUNTIME_HELPERS = `    const DAY_MS = 86400000;
    const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
    const column = (make) => Array.from({ length: numRows }, make);
    const randomInt = (min, max) => min + Math.floor(Math.random() * (max - min + 1));
    const normal = (mean, std) => {
        const u = 1 - Math.random();
        const v = Math.random();
        return mean + std * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
    };
    const clip = (value, min, max) => Math.min(max, Math.max(min, value));
    const pick = (values) => values[randomInt(0, values.length - 1)];
    const randomString = (length) =>
        Array.from({ length }, () => ALPHANUMERIC[randomInt(0, ALPHANUMERIC.length - 1)]).join('');
    const daysAgo = (days) => new Date(Date.now() - days * DAY_MS);
    const withNulls = (values, rate) => values.map((v) => (Math.random() < rate ? null : v));`;

// ============================================================================
// Column Expressions
// ============================================================================

function literal(value: number): string {
    return Number.isFinite(value) ? String(value) : '0';
}

export function isDateLikeName(name: string): boolean {
    const lower = name.toLowerCase();
    return DATE_NAME_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * JavaScript expression producing one column's values
 *
 * @example
 * columnExpression(ageStructure, { type: 'numeric', is_integer: true, min: 25, max: 35, ... })
 * // 'column(() => randomInt(25, 35))'
 */
export function columnExpression(structure: ColumnStructure, stats: ColumnStatistics | undefined): string {
    if (stats === undefined || stats.all_null === true) {
        return 'column(() => null)';
    }

    switch (stats.type) {
        case 'numeric':
            if (structure.dtype === 'boolean') {
                return `column(() => Math.random() < ${literal(stats.mean)})`;
            }
            if (stats.is_integer) {
                return `column(() => randomInt(${literal(Math.trunc(stats.min))}, ${literal(Math.trunc(stats.max))}))`;
            }
            return `column(() => clip(normal(${literal(stats.mean)}, ${literal(stats.std)}), ${literal(stats.min)}, ${literal(stats.max)}))`;

        case 'datetime':
            return `column(() => daysAgo(randomInt(0, ${TEMPLATE_DATE_SPAN_DAYS})).toISOString())`;

        case 'string': {
            if (isDateLikeName(structure.name)) {
                return `column(() => daysAgo(randomInt(0, ${TEMPLATE_DATE_SPAN_DAYS})).toISOString().slice(0, 10))`;
            }
            if (stats.is_clinical && stats.suggested_values && stats.suggested_values.length > 0) {
                return `column(() => pick(${JSON.stringify(stats.suggested_values)}))`;
            }
            if (stats.is_categorical) {
                const count = Math.max(1, Math.min(stats.unique_values, MAX_TEMPLATE_CATEGORIES));
                return `column(() => 'Category_' + randomInt(0, ${count - 1}))`;
            }
            return `column(() => randomString(${Math.max(0, Math.trunc(stats.avg_length))}))`;
        }
    }
}

function nullRate(structure: ColumnStructure, rows: number): number {
    if (!structure.nullable || structure.null_count === 0 || rows === 0) return 0;
    return structure.null_count / rows;
}

// ============================================================================
// Main Export
// ============================================================================

export function buildTemplateRoutine(metadata: MetadataDocument, numRows: number): string {
    const rows = metadata.structure.shape.rows;
    const lines: string[] = [
        `function ${ROUTINE_ENTRY_POINT}() {`,
        `    const numRows = ${Math.max(0, Math.trunc(numRows))};`,
        RUNTIME_HELPERS,
        '    const data = {};',
        '',
    ];

    for (const structure of metadata.structure.columns) {
        const key = JSON.stringify(structure.name);
        const expression = columnExpression(structure, metadata.statistics[structure.name]);
        const rate = nullRate(structure, rows);

        lines.push(`    data[${key}] = ${expression};`);
        if (rate > 0) {
            lines.push(`    data[${key}] = withNulls(data[${key}], ${literal(rate)});`);
        }
    }

    lines.push('', '    return data;', '}', '');
    return lines.join('\n');
}

/** RoutineAuthor that never leaves the process */
export class TemplateRoutineAuthor implements RoutineAuthor {
    async writeRoutine(request: RoutineRequest): Promise<string> {
        return buildTemplateRoutine(request.metadata, request.numRows);
    }
}
