/**
 * synthprint - Tables
 *
 * Builds column-oriented tables from records or column maps, inferring a
 * declared type per column. Strings that read as dates are promoted to
 * datetime columns.
 */

import _ from 'lodash';
import { inferType } from '@jsonhero/json-infer-types';
import { DATE_CHECK_SIZE, DATE_PROMOTION_RATIO } from './constants.js';
import type { CellValue, DeclaredType, Table, TableColumn, TableRecord } from './types.js';
import { InvalidInputError } from './types.js';
import { isMissing } from './utils.js';

type PlainObject = Record<string, unknown>;

// ============================================================================
// Shape
// ============================================================================

export function rowCount(table: Table): number {
    return table.columns[0]?.values.length ?? 0;
}

export function columnNames(table: Table): string[] {
    return table.columns.map((c) => c.name);
}

/** Names that cannot be used as plain object keys */
const RESERVED_COLUMN_NAMES: ReadonlySet<string> = new Set(['__proto__']);

/**
 * Reject ragged columns, duplicate names and reserved names
 */
export function assertTable(table: Table): Table {
    const rows = rowCount(table);
    const seen = new Set<string>();

    for (const column of table.columns) {
        if (RESERVED_COLUMN_NAMES.has(column.name)) {
            throw new InvalidInputError(`Column name "${column.name}" is reserved`);
        }
        if (seen.has(column.name)) {
            throw new InvalidInputError(`Duplicate column name "${column.name}"`);
        }
        seen.add(column.name);

        if (column.values.length !== rows) {
            throw new InvalidInputError(
                `Column "${column.name}" has ${column.values.length} values, expected ${rows}`
            );
        }
    }

    return table;
}

// ============================================================================
// Type Inference
// ============================================================================

function toCell(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'number') return Number.isNaN(value) ? null : value;
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
    if (typeof value === 'bigint') return Number(value);
    return JSON.stringify(value);
}

function looksLikeDate(value: string): boolean {
    const inferred = inferType(value);
    return inferred.name === 'string' && inferred.format?.name === 'datetime';
}

function parseDate(value: string): Date | null {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function shouldPromoteToDate(strings: readonly string[]): boolean {
    const checked = strings.slice(0, DATE_CHECK_SIZE);
    if (checked.length === 0) return false;

    const dateLike = checked.filter(looksLikeDate).length;
    if (dateLike / checked.length < DATE_PROMOTION_RATIO) return false;

    const parsed = strings.filter((s) => parseDate(s) !== null).length;
    return parsed / strings.length >= DATE_PROMOTION_RATIO;
}

/**
 * Infer the declared type of a column from its non-null cells
 *
 * @example
 * inferDeclaredType([1, 2, null])          // 'integer'
 * inferDeclaredType([1.5, 2])              // 'float'
 * inferDeclaredType(['2024-01-01'])        // 'datetime'
 * inferDeclaredType(['a', 1])              // 'string'
 */
export function inferDeclaredType(values: readonly CellValue[]): DeclaredType {
    const present = values.filter((v): v is Exclude<CellValue, null> => !isMissing(v));

    if (present.length === 0) return 'string';

    if (_.every(present, (v) => typeof v === 'boolean')) return 'boolean';

    if (_.every(present, (v) => typeof v === 'number')) {
        return _.every(present, (v) => Number.isInteger(v)) ? 'integer' : 'float';
    }

    if (_.every(present, (v) => v instanceof Date)) return 'datetime';

    const strings = present.filter((v): v is string => typeof v === 'string');
    if (strings.length === present.length && shouldPromoteToDate(strings)) {
        return 'datetime';
    }

    return 'string';
}

/**
 * Convert cells to the column's declared type; unconvertible cells become null
 */
export function coerceValues(values: readonly CellValue[], type: DeclaredType): CellValue[] {
    return values.map((value): CellValue => {
        if (isMissing(value)) return null;

        switch (type) {
            case 'integer':
            case 'float':
                return typeof value === 'number' ? value : null;
            case 'boolean':
                return typeof value === 'boolean' ? value : null;
            case 'datetime':
                if (value instanceof Date) return value;
                return typeof value === 'string' ? parseDate(value) : null;
            case 'string':
                return value instanceof Date ? value.toISOString() : String(value);
        }
    });
}

export function createColumn(name: string, rawValues: readonly unknown[], type?: DeclaredType): TableColumn {
    const cells = rawValues.map(toCell);
    const declared = type ?? inferDeclaredType(cells);
    return { name, type: declared, values: coerceValues(cells, declared) };
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Build a table from row records. Columns follow first-seen key order;
 * keys missing from a record become nulls.
 */
export function tableFromRecords(records: readonly PlainObject[]): Table {
    const names: string[] = [];
    const known = new Set<string>();

    for (const record of records) {
        for (const key of Object.keys(record)) {
            if (!known.has(key)) {
                known.add(key);
                names.push(key);
            }
        }
    }

    return assertTable({
        columns: names.map((name) => createColumn(name, records.map((r) => r[name]))),
    });
}

/**
 * Build a table from a `{ column: values[] }` map
 */
export function tableFromColumns(
    columns: Readonly<Record<string, readonly unknown[]>>,
    types: Readonly<Record<string, DeclaredType>> = {}
): Table {
    const table: Table = {
        columns: Object.entries(columns).map(([name, values]) => createColumn(name, values, types[name])),
    };
    return assertTable(table);
}

export function tableToRecords(table: Table): TableRecord[] {
    const rows = rowCount(table);
    const records: TableRecord[] = [];

    for (let i = 0; i < rows; i++) {
        const record: TableRecord = {};
        for (const column of table.columns) {
            record[column.name] = column.values[i] ?? null;
        }
        records.push(record);
    }

    return records;
}

/**
 * Accept an array of records or a column map and return a table
 */
export function detectTable(input: unknown): Table {
    if (Array.isArray(input)) {
        if (!_.every(input, _.isPlainObject)) {
            throw new InvalidInputError('Expected every row to be a plain object');
        }
        return tableFromRecords(input.filter(isPlainObject));
    }

    if (isPlainObject(input)) {
        const entries = Object.entries(input);
        if (entries.length > 0 && entries.every(([, value]) => Array.isArray(value))) {
            const columns: Record<string, unknown[]> = {};
            for (const [name, value] of entries) {
                if (Array.isArray(value)) columns[name] = value;
            }
            return tableFromColumns(columns);
        }
    }

    throw new InvalidInputError('Expected an array of records or a map of column arrays');
}

function isPlainObject(value: unknown): value is PlainObject {
    return _.isPlainObject(value);
}
