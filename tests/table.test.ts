import { describe, it, expect } from 'vitest';
import {
    createColumn,
    detectTable,
    inferDeclaredType,
    tableFromColumns,
    tableToRecords,
} from '../src/table.js';
import { InvalidInputError } from '../src/types.js';

describe('detectTable', () => {
    it('builds columns from records in first-seen key order', () => {
        const table = detectTable([{ a: 1, b: 'x' }, { a: 2 }]);

        expect(table.columns).toEqual([
            { name: 'a', type: 'integer', values: [1, 2] },
            { name: 'b', type: 'string', values: ['x', null] },
        ]);
    });

    it('accepts a column map', () => {
        const table = detectTable({ x: [1.5, 2], y: [true, false] });

        expect(table.columns.map((c) => c.type)).toEqual(['float', 'boolean']);
    });

    it('rejects anything else', () => {
        expect(() => detectTable('nope')).toThrow(InvalidInputError);
        expect(() => detectTable([1, 2])).toThrow(InvalidInputError);
        expect(() => detectTable({})).toThrow(InvalidInputError);
    });

    it('rejects a __proto__ column parsed from JSON', () => {
        const records: unknown = JSON.parse('[{"__proto__": 1, "a": 2}]');

        expect(() => detectTable(records)).toThrow('Column name "__proto__" is reserved');
    });

    it('rejects ragged column maps', () => {
        expect(() => tableFromColumns({ a: [1, 2], b: [1] })).toThrow('Column "b" has 1 values, expected 2');
    });
});

describe('inferDeclaredType', () => {
    it('infers from non-null cells', () => {
        expect(inferDeclaredType([1, 2, null])).toBe('integer');
        expect(inferDeclaredType([1.5, 2])).toBe('float');
        expect(inferDeclaredType(['a', 1])).toBe('string');
        expect(inferDeclaredType([null, null])).toBe('string');
    });

    it('promotes date strings to datetime', () => {
        const column = createColumn('ts', ['2024-01-15T10:30:00Z', '2024-02-01T08:00:00Z']);

        expect(column.type).toBe('datetime');
        expect(column.values[0]).toEqual(new Date('2024-01-15T10:30:00Z'));
    });
});

describe('createColumn', () => {
    it('turns NaN into null and nested values into JSON text', () => {
        expect(createColumn('n', [1, Number.NaN]).values).toEqual([1, null]);
        expect(createColumn('meta', [{ k: 1 }]).values).toEqual(['{"k":1}']);
    });
});

describe('tableToRecords', () => {
    it('writes one record per row', () => {
        const table = tableFromColumns({ a: [1, null], b: ['x', 'y'] });

        expect(tableToRecords(table)).toEqual([
            { a: 1, b: 'x' },
            { a: null, b: 'y' },
        ]);
    });
});
