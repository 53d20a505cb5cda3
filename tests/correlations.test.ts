import { describe, it, expect } from 'vitest';
import { associationStrength, extractCorrelations } from '../src/correlations.js';
import { tableFromColumns } from '../src/table.js';

describe('extractCorrelations', () => {
    it('reports strong numeric correlations and a symmetric matrix', () => {
        const table = tableFromColumns({ x: [1, 2, 3, 4], y: [2, 4, 6, 8], c: [5, 5, 5, 5] });
        const { numeric_correlations } = extractCorrelations(table);

        expect(numeric_correlations.strong_correlations).toEqual([{ column1: 'x', column2: 'y', correlation: 1 }]);
        expect(numeric_correlations.correlation_matrix.x.y).toBe(1);
        expect(numeric_correlations.correlation_matrix.y.x).toBe(1);
        expect(numeric_correlations.correlation_matrix.x.c).toBeNull();
    });

    it('skips numeric correlation below three rows', () => {
        const table = tableFromColumns({ x: [1, 2], y: [2, 4] });

        expect(extractCorrelations(table).numeric_correlations).toEqual({
            strong_correlations: [],
            correlation_matrix: {},
        });
    });

    it('reports categorical associations above 0.3', () => {
        const table = tableFromColumns({
            country: ['US', 'FR', 'US', 'FR'],
            currency: ['USD', 'EUR', 'USD', 'EUR'],
        });
        const correlations = extractCorrelations(table);

        expect(correlations.categorical_associations).toEqual([
            { column1: 'country', column2: 'currency', association_strength: 0.5 },
        ]);
        expect(correlations.temporal_relationships).toEqual([]);
    });
});

describe('associationStrength', () => {
    it('is null when a column has no values', () => {
        const table = tableFromColumns({ a: ['x', 'y'], b: [null, null] });

        expect(associationStrength(table.columns[0], table.columns[1])).toBeNull();
    });
});
