/**
 * Residual Statistics
 *
 * Robust summaries of per-reference-point residuals. A reference pair whose
 * residual sits far above the rest usually means two different markers were
 * matched; flagging it lets the caller drop or re-match it.
 *
 * - MAD (Median Absolute Deviation): robust measure of spread
 * - Normalized MAD: MAD × 1.4826, comparable to a standard deviation
 */

import type { ReferenceResidual, ResidualSummary } from '@/types';

export const NORMALIZED_MAD_FACTOR = 1.4826;

/** Number of normalized MADs above the median at which a residual is an outlier. */
export const DEFAULT_OUTLIER_MAD_THRESHOLD = 3.0;

/** Residuals at or below this are numerical noise and never flagged. */
export const RESIDUAL_NOISE_FLOOR = 1e-6;

/**
 * @example
 * computeMedian([1, 2, 3]) // 2
 * computeMedian([1, 2, 3, 4]) // 2.5
 * computeMedian([]) // 0
 */
export function computeMedian(values: readonly number[]): number {
    if (values.length === 0) {
        return 0;
    }
    const sorted = [...values].sort((a, b) => a - b);
    const middle = Math.floor(sorted.length / 2);
    if (sorted.length % 2 === 0) {
        return (sorted[middle - 1] + sorted[middle]) / 2;
    }
    return sorted[middle];
}

/** MAD = median(|xi - center|); 0 for empty input. */
export function computeMAD(values: readonly number[], center: number): number {
    if (values.length === 0) {
        return 0;
    }
    return computeMedian(values.map((v) => Math.abs(v - center)));
}

export interface OutlierDetectionResult {
    outlierIndices: number[];
    median: number;
    mad: number;
    nMad: number;
    /** median + madThreshold * nMad; Infinity when no threshold applies */
    upperThreshold: number;
}

/**
 * High-side MAD outlier detection. Residuals are non-negative distances, so only
 * unusually large values are interesting.
 */
export function detectOutliers(
    values: readonly number[],
    madThreshold: number = DEFAULT_OUTLIER_MAD_THRESHOLD,
): OutlierDetectionResult {
    const result: OutlierDetectionResult = {
        outlierIndices: [],
        median: computeMedian(values),
        mad: 0,
        nMad: 0,
        upperThreshold: Infinity,
    };
    if (values.length < 2) {
        return result;
    }

    result.mad = computeMAD(values, result.median);
    result.nMad = result.mad * NORMALIZED_MAD_FACTOR;
    // All residuals (nearly) identical, e.g. an exact TPS fit: nothing stands out
    if (result.mad === 0) {
        return result;
    }

    result.upperThreshold = result.median + madThreshold * result.nMad;
    values.forEach((value, index) => {
        if (value > result.upperThreshold) {
            result.outlierIndices.push(index);
        }
    });
    return result;
}

export function summarizeResiduals(
    residuals: readonly ReferenceResidual[],
    madThreshold: number = DEFAULT_OUTLIER_MAD_THRESHOLD,
): ResidualSummary {
    if (residuals.length === 0) {
        return { mean: 0, max: 0, median: 0, outlierIndices: [] };
    }
    const errors = residuals.map((r) => r.error);
    const outliers = detectOutliers(errors, madThreshold);
    return {
        mean: errors.reduce((sum, e) => sum + e, 0) / errors.length,
        max: Math.max(...errors),
        median: outliers.median,
        outlierIndices: outliers.outlierIndices
            .filter((i) => errors[i] > RESIDUAL_NOISE_FLOOR)
            .map((i) => residuals[i].index),
    };
}
