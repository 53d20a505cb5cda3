/**
 * synthprint - Statistics
 *
 * Per-column statistics for numeric, datetime and string columns.
 * Moment-based figures fall back to 0 when the sample is too small
 * to define them.
 */

import _ from 'lodash';
import { BOOLEAN_TOKENS, LIMITS, SHAPE_PATTERNS, THRESHOLDS } from './constants.js';
import type {
    CellValue,
    DatetimeStatistics,
    NumericStatistics,
    PercentageHint,
    StringStatistics,
} from './types.js';
import { codePointLength, countValues, mode } from './utils.js';

// ============================================================================
// Types
// ============================================================================

type Common = 'name' | 'non_null_count' | 'null_percentage';

export type NumericFigures = Omit<NumericStatistics, Common>;
export type DatetimeFigures = Omit<DatetimeStatistics, Common>;
export type StringFigures = Omit<StringStatistics, Common>;

const MS_PER_DAY = 86_400_000;

// ============================================================================
// Moments
// ============================================================================

export function mean(values: readonly number[]): number {
    return values.length === 0 ? 0 : _.sum(values) / values.length;
}

/**
 * Quantile with linear interpolation between closest ranks
 *
 * @example
 * quantile([1, 2, 3, 4], 0.25)  // 1.75
 */
export function quantile(sorted: readonly number[], q: number): number {
    if (sorted.length === 0) return 0;
    const position = (sorted.length - 1) * q;
    const lower = Math.floor(position);
    const upper = Math.ceil(position);
    return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

/** Population standard deviation; 0 for fewer than two values */
export function populationStd(values: readonly number[]): number {
    if (values.length <= 1) return 0;
    const m = mean(values);
    return Math.sqrt(_.sumBy(values, (v) => (v - m) ** 2) / values.length);
}

/** Adjusted Fisher-Pearson skewness; 0 below three values or without spread */
export function skewness(values: readonly number[]): number {
    const n = values.length;
    if (n <= 2) return 0;

    const m = mean(values);
    const m2 = _.sumBy(values, (v) => (v - m) ** 2) / n;
    const m3 = _.sumBy(values, (v) => (v - m) ** 3) / n;
    if (m2 === 0) return 0;

    const g1 = m3 / m2 ** 1.5;
    return (g1 * Math.sqrt(n * (n - 1))) / (n - 2);
}

/** Bias-corrected excess kurtosis; 0 below four values or without spread */
export function kurtosis(values: readonly number[]): number {
    const n = values.length;
    if (n <= 3) return 0;

    const m = mean(values);
    const s2 = _.sumBy(values, (v) => (v - m) ** 2);
    const s4 = _.sumBy(values, (v) => (v - m) ** 4);
    const denominator = (n - 2) * (n - 3) * s2 ** 2;
    if (denominator === 0) return 0;

    const numerator = n * (n + 1) * (n - 1) * s4;
    const adjustment = (3 * (n - 1) ** 2) / ((n - 2) * (n - 3));
    return numerator / denominator - adjustment;
}

/**
 * Pearson correlation; NaN when either side has no variance
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
    const mx = mean(xs);
    const my = mean(ys);
    let covariance = 0;
    let varianceX = 0;
    let varianceY = 0;

    for (let i = 0; i < xs.length; i++) {
        const dx = xs[i] - mx;
        const dy = ys[i] - my;
        covariance += dx * dy;
        varianceX += dx * dx;
        varianceY += dy * dy;
    }

    const denominator = Math.sqrt(varianceX * varianceY);
    return denominator === 0 ? Number.NaN : covariance / denominator;
}

// ============================================================================
// Numeric
// ============================================================================

export function toNumber(value: CellValue): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'boolean') return value ? 1 : 0;
    return null;
}

function percentageHint(min: number, max: number): PercentageHint | undefined {
    if (min < 0) return undefined;
    if (max <= 1) return 'decimal';
    if (max <= 100) return 'whole';
    return undefined;
}

/**
 * @param values non-null numbers, at least one
 */
export function numericFigures(values: readonly number[], declaredInteger: boolean): NumericFigures {
    const sorted = [...values].sort((a, b) => a - b);
    const min = sorted[0];
    const max = sorted[sorted.length - 1];
    const hint = percentageHint(min, max);

    return {
        type: 'numeric',
        all_null: false,
        mean: mean(values),
        median: quantile(sorted, 0.5),
        std: populationStd(values),
        min,
        max,
        q25: quantile(sorted, 0.25),
        q75: quantile(sorted, 0.75),
        skewness: skewness(values),
        kurtosis: kurtosis(values),
        is_integer: declaredInteger || values.every((v) => Math.trunc(v) === v),
        has_negative: values.some((v) => v < 0),
        has_zero: values.some((v) => v === 0),
        ...(hint && { might_be_percentage: hint }),
    };
}

// ============================================================================
// Datetime
// ============================================================================

/** Monday = 0 ... Sunday = 6 */
function dayOfWeek(date: Date): number {
    return (date.getUTCDay() + 6) % 7;
}

function hasTime(date: Date): boolean {
    return (
        date.getUTCHours() !== 0 ||
        date.getUTCMinutes() !== 0 ||
        date.getUTCSeconds() !== 0 ||
        date.getUTCMilliseconds() !== 0
    );
}

/**
 * @param dates non-null dates, at least one
 */
export function datetimeFigures(dates: readonly Date[]): DatetimeFigures {
    const times = dates.map((d) => d.getTime());
    const min = _.min(times) ?? 0;
    const max = _.max(times) ?? 0;

    return {
        type: 'datetime',
        all_null: false,
        min: new Date(min).toISOString(),
        max: new Date(max).toISOString(),
        range_days: Math.floor((max - min) / MS_PER_DAY),
        most_common_hour: mode(dates.map((d) => d.getUTCHours())) ?? 0,
        most_common_dayofweek: mode(dates.map(dayOfWeek)) ?? 0,
        has_time_component: dates.some(hasTime),
    };
}

// ============================================================================
// String
// ============================================================================

/**
 * @param strings non-null values rendered as strings, at least one
 */
export function stringFigures(strings: readonly string[]): StringFigures {
    const counts = countValues(strings);
    const uniqueValues = counts.length;
    const uniqueRatio = uniqueValues / strings.length;
    const lengths = strings.map(codePointLength);
    const anyMatch = (pattern: RegExp): boolean => strings.some((s) => pattern.test(s));

    return {
        type: 'string',
        all_null: false,
        unique_values: uniqueValues,
        unique_ratio: uniqueRatio,
        most_common_values: counts
            .slice(0, LIMITS.topValues)
            .map(({ value, count }) => ({ value, count })),
        avg_length: mean(lengths),
        min_length: _.min(lengths) ?? 0,
        max_length: _.max(lengths) ?? 0,
        is_categorical:
            uniqueRatio < THRESHOLDS.categoricalUniqueRatio &&
            uniqueValues < THRESHOLDS.categoricalUniqueCount,
        has_numbers: anyMatch(SHAPE_PATTERNS.hasNumbers),
        has_special_chars: anyMatch(SHAPE_PATTERNS.hasSpecialChars),
        is_email_like: anyMatch(SHAPE_PATTERNS.emailLike),
        is_url_like: anyMatch(SHAPE_PATTERNS.urlLike),
        is_phone_like: anyMatch(SHAPE_PATTERNS.phoneLike),
        might_be_boolean: counts.every(({ value }) => BOOLEAN_TOKENS.has(value.toLowerCase())),
    };
}

export function cellToString(value: CellValue): string {
    return value instanceof Date ? value.toISOString() : String(value);
}
