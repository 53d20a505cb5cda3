import { describe, it, expect } from 'vitest';
import { embedding, formatHash, fullHash, similarity } from '../src/fingerprint.js';
import { profile } from '../src/profile.js';
import { detectTable } from '../src/table.js';
import { silentLogger } from '../src/types.js';

function profileAt(input: unknown, iso: string = '2024-06-01T12:00:00Z') {
    return profile(detectTable(input), { now: () => new Date(iso), logger: silentLogger });
}

describe('hashes', () => {
    it('are deterministic and prefixed', () => {
        const doc = profileAt({ age: [30, 25, 35] });

        expect(formatHash(doc)).toBe(formatHash(profileAt({ age: [30, 25, 35] })));
        expect(formatHash(doc)).toMatch(/^format_[0-9a-f]{16}$/);
        expect(fullHash(doc)).toMatch(/^full_[0-9a-f]{16}$/);
    });

    it('keep the format hash when only values change', () => {
        const a = profileAt({ age: [30, 25, 35] });
        const b = profileAt({ age: [40, 45, 50] });

        expect(formatHash(a)).toBe(formatHash(b));
        expect(fullHash(a)).not.toBe(fullHash(b));
    });

    it('change the format hash with a declared type or the column count', () => {
        const integers = profileAt({ a: [1, 2, 3] });
        const floats = profileAt({ a: [1.5, 2, 3] });
        const wider = profileAt({ a: [1, 2, 3], b: [1, 2, 3] });

        expect(integers.structure.columns[0].dtype).toBe('integer');
        expect(floats.structure.columns[0].dtype).toBe('float');
        expect(formatHash(floats)).not.toBe(formatHash(integers));
        expect(formatHash(wider)).not.toBe(formatHash(integers));
    });

    it('ignore the extraction timestamp', () => {
        const a = profileAt({ age: [30, 25, 35] }, '2024-06-01T12:00:00Z');
        const b = profileAt({ age: [30, 25, 35] }, '2025-01-01T00:00:00Z');

        expect(fullHash(a)).toBe(fullHash(b));
    });

    it('fold in the generator version', () => {
        const doc = profileAt({ age: [30, 25, 35] });

        expect(formatHash(doc, '2.0')).not.toBe(formatHash(doc, '1.0'));
        expect(fullHash(doc, '2.0')).not.toBe(fullHash(doc, '1.0'));
    });
});

describe('embedding', () => {
    it('lays out shape then numeric figures, padded to 128', () => {
        const vector = embedding(profileAt({ age: [30, 25, 35] }));

        expect(vector).toHaveLength(128);
        expect(vector.slice(0, 3)).toEqual([3, 1, 30]);
        expect(vector[3]).toBeCloseTo(4.0825, 4);
        expect(vector.slice(4, 6)).toEqual([25, 35]);
        expect(vector.slice(6).every((v) => v === 0)).toBe(true);
    });

    it('encodes string and all-null columns', () => {
        const vector = embedding(profileAt([{ s: 'a', n: null }, { s: 'bb', n: null }, { s: 'a', n: null }]));

        expect(vector.slice(0, 2)).toEqual([3, 2]);
        expect(vector[2]).toBe(2);
        expect(vector[3]).toBeCloseTo(4 / 3, 10);
        expect(vector.slice(4, 8)).toEqual([0, 0, 0, 0]);
    });
});

describe('similarity', () => {
    const v = [3, 1, 30, 4, 25, 35];

    it('is 1 for identical vectors', () => {
        expect(similarity(v, v)).toBe(1);
    });

    it('is 0 against a zero vector or an opposite vector', () => {
        expect(similarity(v, [0, 0, 0, 0, 0, 0])).toBe(0);
        expect(similarity(v, v.map((x) => -x))).toBe(0);
    });

    it('is 0.5 for orthogonal vectors', () => {
        expect(similarity([1, 0], [0, 1])).toBe(0.5);
    });
});
