/**
 * synthprint - Correlations
 *
 * Pairwise Pearson correlation between numeric columns and a cardinality
 * collapse score between string columns.
 */

import { LIMITS, THRESHOLDS } from './constants.js';
import { pearson, toNumber } from './stats.js';
import type {
    CategoricalAssociation,
    CorrelationMetadata,
    NumericCorrelation,
    Table,
    TableColumn,
} from './types.js';
import { rowCount } from './table.js';
import { cellKey, countDistinct, isMissing } from './utils.js';

type Matrix = Record<string, Record<string, number | null>>;

// ============================================================================
// Numeric
// ============================================================================

function isNumericColumn(column: TableColumn): boolean {
    return column.type === 'integer' || column.type === 'float';
}

/** Pearson over the rows where both cells are present */
export function pairwiseCorrelation(a: TableColumn, b: TableColumn): number {
    const xs: number[] = [];
    const ys: number[] = [];

    for (let i = 0; i < a.values.length; i++) {
        const x = toNumber(a.values[i]);
        const y = toNumber(b.values[i]);
        if (x !== null && y !== null) {
            xs.push(x);
            ys.push(y);
        }
    }

    return pearson(xs, ys);
}

function numericCorrelations(table: Table): CorrelationMetadata['numeric_correlations'] {
    const columns = table.columns.filter(isNumericColumn);
    const strong: NumericCorrelation[] = [];
    const matrix: Matrix = {};

    if (columns.length < 2 || rowCount(table) < LIMITS.minCorrelationRows) {
        return { strong_correlations: strong, correlation_matrix: matrix };
    }

    for (const column of columns) {
        matrix[column.name] = {};
    }

    for (let i = 0; i < columns.length; i++) {
        for (let j = i; j < columns.length; j++) {
            const r = pairwiseCorrelation(columns[i], columns[j]);
            const cell = Number.isNaN(r) ? null : r;
            matrix[columns[i].name][columns[j].name] = cell;
            matrix[columns[j].name][columns[i].name] = cell;

            if (i !== j && cell !== null && Math.abs(cell) > THRESHOLDS.strongCorrelation) {
                strong.push({ column1: columns[i].name, column2: columns[j].name, correlation: cell });
            }
        }
    }

    return { strong_correlations: strong, correlation_matrix: matrix };
}

// ============================================================================
// Categorical
// ============================================================================

/**
 * 1 - observed pairs / possible pairs; null when either column has no values
 *
 * @example
 * // country fully determines currency: 2 observed pairs out of 4 possible
 * associationStrength(country, currency)  // 0.5
 */
export function associationStrength(a: TableColumn, b: TableColumn): number | null {
    const distinctA = countDistinct(a.values);
    const distinctB = countDistinct(b.values);
    if (distinctA * distinctB === 0) return null;

    const pairs = new Set<string>();
    for (let i = 0; i < a.values.length; i++) {
        const x = a.values[i];
        const y = b.values[i];
        if (!isMissing(x) && !isMissing(y)) {
            pairs.add(`${cellKey(x)}\u0000${cellKey(y)}`);
        }
    }

    return 1 - pairs.size / (distinctA * distinctB);
}

function categoricalAssociations(table: Table): CategoricalAssociation[] {
    const columns = table.columns
        .filter((c) => c.type === 'string')
        .slice(0, LIMITS.maxAssociationColumns);
    const associations: CategoricalAssociation[] = [];

    for (let i = 0; i < columns.length; i++) {
        for (let j = i + 1; j < columns.length; j++) {
            const strength = associationStrength(columns[i], columns[j]);
            if (strength !== null && strength > THRESHOLDS.categoricalAssociation) {
                associations.push({
                    column1: columns[i].name,
                    column2: columns[j].name,
                    association_strength: strength,
                });
            }
        }
    }

    return associations;
}

// ============================================================================
// Main Export
// ============================================================================

export function extractCorrelations(table: Table): CorrelationMetadata {
    return {
        numeric_correlations: numericCorrelations(table),
        categorical_associations: categoricalAssociations(table),
        temporal_relationships: [],
    };
}
