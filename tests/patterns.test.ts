import { describe, it, expect } from 'vitest';
import { commonAffixes, detectFormat, extractPatterns } from '../src/patterns.js';

describe('detectFormat', () => {
    it('returns the first format above the match rate', () => {
        expect(detectFormat(['12345', '67890', '11111'])).toEqual({ name: 'zip_code', confidence: 1 });
        expect(detectFormat(['5551234567', '5559876543'])).toEqual({ name: 'phone_us', confidence: 1 });
    });

    it('returns null when no format covers enough values', () => {
        expect(detectFormat(['a@b.com', 'x', 'y'])).toBeNull();
        expect(detectFormat([])).toBeNull();
    });
});

describe('commonAffixes', () => {
    it('keeps an affix shared by more than 30% of values', () => {
        expect(commonAffixes(['ORD-001', 'ORD-002', 'ORD-003', 'XYZ'])).toEqual({ prefix: 'ORD' });
    });

    it('ignores values shorter than the affix', () => {
        expect(commonAffixes(['ab', 'cd'])).toEqual({});
    });
});

describe('extractPatterns', () => {
    it('looks for affixes only above ten sampled values', () => {
        const ids = Array.from({ length: 12 }, (_, i) => `ORD-${String(i + 1).padStart(4, '0')}`);

        expect(extractPatterns(ids)).toEqual({
            common_patterns: [],
            detected_format: null,
            common_prefix: 'ORD',
        });
        expect(extractPatterns(ids.slice(0, 5))).toEqual({
            common_patterns: [],
            detected_format: null,
        });
    });

    it('reports format confidence', () => {
        expect(extractPatterns(['alice@example.com', 'bob@example.org'])).toEqual({
            common_patterns: [],
            detected_format: 'email',
            format_confidence: 1,
        });
    });

    it('returns null for an empty column', () => {
        expect(extractPatterns([])).toBeNull();
    });
});
