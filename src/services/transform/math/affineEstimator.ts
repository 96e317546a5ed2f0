/**
 * Affine Estimator
 *
 * Least-squares fit of a 2D affine map from reference pairs:
 *
 *   targetX = a·sx + b·sy + e
 *   targetY = c·sx + d·sy + f
 *
 * The normal equations are built on mean-centred source coordinates, which
 * decouples the translation from the 2x2 linear part and keeps the system
 * well conditioned for SVG coordinates in the thousands.
 */

import { DEGENERATE_DETERMINANT_EPSILON, MIN_REFERENCE_POINTS } from '@/constants/transform';
import { asTarget, isFiniteReferencePoint, type TargetCoord } from '@/coords';
import type { AffineParameters, ReferencePoint, ReferenceResidual } from '@/types';

interface CentredMoments {
    meanX: number;
    meanY: number;
    sxx: number;
    syy: number;
    sxy: number;
}

const computeCentredMoments = (points: readonly ReferencePoint[]): CentredMoments => {
    const n = points.length;
    let meanX = 0;
    let meanY = 0;
    for (const p of points) {
        meanX += p.sourceX;
        meanY += p.sourceY;
    }
    meanX /= n;
    meanY /= n;

    let sxx = 0;
    let syy = 0;
    let sxy = 0;
    for (const p of points) {
        const dx = p.sourceX - meanX;
        const dy = p.sourceY - meanY;
        sxx += dx * dx;
        syy += dy * dy;
        sxy += dx * dy;
    }
    return { meanX, meanY, sxx, syy, sxy };
};

const isSingular = ({ sxx, syy, sxy }: CentredMoments, epsilon: number): boolean => {
    const scale = (sxx + syy) * (sxx + syy);
    if (!(scale > 0)) {
        return true;
    }
    const det = sxx * syy - sxy * sxy;
    return Math.abs(det) < epsilon * scale;
};

/**
 * True when the source coordinates span a plane, i.e. they are neither all
 * coincident nor all on one line (within a relative tolerance).
 */
export function hasNonCollinearSpread(
    points: readonly ReferencePoint[],
    epsilon: number = DEGENERATE_DETERMINANT_EPSILON,
): boolean {
    if (points.length < MIN_REFERENCE_POINTS) {
        return false;
    }
    return !isSingular(computeCentredMoments(points), epsilon);
}

/**
 * Estimate the affine map that minimises the summed squared residual.
 *
 * Exact for 3 non-collinear points. Returns null for fewer than 3 points,
 * non-finite input, or collinear/coincident sources.
 */
export function estimateAffine(
    points: readonly ReferencePoint[],
    epsilon: number = DEGENERATE_DETERMINANT_EPSILON,
): AffineParameters | null {
    if (points.length < MIN_REFERENCE_POINTS || !points.every(isFiniteReferencePoint)) {
        return null;
    }

    const moments = computeCentredMoments(points);
    if (isSingular(moments, epsilon)) {
        return null;
    }
    const { meanX, meanY, sxx, syy, sxy } = moments;

    let meanU = 0;
    let meanV = 0;
    for (const p of points) {
        meanU += p.targetX;
        meanV += p.targetY;
    }
    meanU /= points.length;
    meanV /= points.length;

    let sxu = 0;
    let syu = 0;
    let sxv = 0;
    let syv = 0;
    for (const p of points) {
        const dx = p.sourceX - meanX;
        const dy = p.sourceY - meanY;
        const du = p.targetX - meanU;
        const dv = p.targetY - meanV;
        sxu += dx * du;
        syu += dy * du;
        sxv += dx * dv;
        syv += dy * dv;
    }

    const det = sxx * syy - sxy * sxy;
    const a = (syy * sxu - sxy * syu) / det;
    const b = (sxx * syu - sxy * sxu) / det;
    const c = (syy * sxv - sxy * syv) / det;
    const d = (sxx * syv - sxy * sxv) / det;
    const e = meanU - a * meanX - b * meanY;
    const f = meanV - c * meanX - d * meanY;

    const params = { a, b, c, d, e, f };
    return Object.values(params).every(Number.isFinite) ? params : null;
}

export const applyAffine = (params: AffineParameters, x: number, y: number): TargetCoord =>
    asTarget(params.a * x + params.b * y + params.e, params.c * x + params.d * y + params.f);

export function computeAffineResiduals(
    points: readonly ReferencePoint[],
    params: AffineParameters,
): ReferenceResidual[] {
    return points.map((p, index) => {
        const predicted = applyAffine(params, p.sourceX, p.sourceY);
        return {
            index,
            predictedX: predicted.x,
            predictedY: predicted.y,
            error: Math.hypot(predicted.x - p.targetX, predicted.y - p.targetY),
        };
    });
}

/**
 * Mean Euclidean residual of the affine map over the reference points.
 * Infinity when there is nothing to measure.
 */
export function computeAffineMeanError(
    points: readonly ReferencePoint[],
    params: AffineParameters,
): number {
    if (points.length === 0) {
        return Number.POSITIVE_INFINITY;
    }
    const residuals = computeAffineResiduals(points, params);
    return residuals.reduce((sum, r) => sum + r.error, 0) / residuals.length;
}
