import {
    DEFAULT_TRANSFORM_SETTINGS,
    MIN_REFERENCE_POINTS,
    type TransformSettings,
} from '@/constants/transform';
import { asTarget, isFiniteReferencePoint, type TargetCoord } from '@/coords';
import { createLogger, type Logger } from '@/services/logStore';
import type {
    AffineParameters,
    ReferencePoint,
    ReferenceResidual,
    ResidualSummary,
    TransformError,
    TransformMethod,
    Triangle,
} from '@/types';

import { applyAffine, computeAffineResiduals, estimateAffine } from './math/affineEstimator';
import { applyWeights, locateTriangle } from './math/barycentric';
import { triangulate } from './math/delaunay';
import { summarizeResiduals } from './math/residualStatistics';
import { ThinPlateSplineModel } from './math/thinPlateSpline';

export interface TransformModel {
    readonly method: TransformMethod;
    readonly referencePointCount: number;
    /** Mean / max residual of the underlying method at the reference points (before snapping) */
    readonly meanError: number;
    readonly maxError: number;
    readonly residuals: readonly ReferenceResidual[];
    readonly summary: ResidualSummary;
    /** Set on the affine-delaunay path */
    readonly affine: AffineParameters | null;
    readonly triangles: readonly Triangle[];
    /** Set on the thin-plate-spline path */
    readonly spline: ThinPlateSplineModel | null;
    transform(x: number, y: number): TargetCoord;
    transformBatch(points: readonly { x: number; y: number }[]): TargetCoord[];
}

export type TransformResult =
    | { kind: 'success'; model: TransformModel }
    | { kind: 'failure'; error: TransformError };

export interface TransformOptions
    extends Partial<Pick<TransformSettings, 'lambda' | 'useThinPlateSpline' | 'snapTolerance'>> {
    logger?: Logger;
}

const failure = (error: TransformError): TransformResult => ({ kind: 'failure', error });

/**
 * Target of the first reference point whose source lies within `tolerance` of (x, y).
 */
export function findSnapTarget(
    points: readonly ReferencePoint[],
    x: number,
    y: number,
    tolerance: number,
): TargetCoord | null {
    for (const p of points) {
        if (Math.hypot(p.sourceX - x, p.sourceY - y) <= tolerance) {
            return asTarget(p.targetX, p.targetY);
        }
    }
    return null;
}

/**
 * Build one source → target transform from the reference pairs.
 *
 * Order of preference:
 * 1. Thin-plate spline (exact at references when lambda = 0).
 * 2. Affine least squares + Delaunay: barycentric interpolation inside the
 *    triangulated hull, the plain affine map outside it.
 *
 * Whichever path wins, a query that lands on a reference source returns that
 * reference's target verbatim.
 */
export function computeTransform(
    points: readonly ReferencePoint[],
    options: TransformOptions = {},
): TransformResult {
    const log = options.logger ?? createLogger('Transform');
    const lambda = options.lambda ?? DEFAULT_TRANSFORM_SETTINGS.lambda;
    const useThinPlateSpline = options.useThinPlateSpline ?? DEFAULT_TRANSFORM_SETTINGS.useThinPlateSpline;
    const snapTolerance = options.snapTolerance ?? DEFAULT_TRANSFORM_SETTINGS.snapTolerance;
    const count = points.length;

    if (count < MIN_REFERENCE_POINTS) {
        log.warning(`Insufficient reference points: ${count}`);
        return failure({
            kind: 'insufficient-reference-points',
            message: `At least ${MIN_REFERENCE_POINTS} reference points are required, got ${count}.`,
            referencePointCount: count,
        });
    }
    if (!points.every(isFiniteReferencePoint)) {
        log.warning('Reference points contain non-finite coordinates');
        return failure({
            kind: 'degenerate-geometry',
            message: 'Reference points contain non-finite coordinates.',
            referencePointCount: count,
        });
    }

    const reference: readonly ReferencePoint[] = points.map((p) => ({ ...p }));
    const snap = (x: number, y: number) => findSnapTarget(reference, x, y, snapTolerance);

    const buildModel = (
        model: Omit<TransformModel, 'summary' | 'transformBatch' | 'meanError' | 'maxError'>,
    ): TransformModel => {
        const summary = summarizeResiduals(model.residuals);
        return {
            ...model,
            summary,
            meanError: summary.mean,
            maxError: summary.max,
            transformBatch: (queries) => queries.map((q) => model.transform(q.x, q.y)),
        };
    };

    if (useThinPlateSpline) {
        const spline = ThinPlateSplineModel.fit(reference, { lambda, logger: log });
        if (spline) {
            log.debug(
                `TPS active: ${count} points, mean error=${spline.meanError.toFixed(4)}, max error=${spline.maxError.toFixed(4)}`,
            );
            return {
                kind: 'success',
                model: buildModel({
                    method: 'thin-plate-spline',
                    referencePointCount: count,
                    residuals: spline.residuals,
                    affine: null,
                    triangles: [],
                    spline,
                    transform: (x, y) => snap(x, y) ?? spline.transform(x, y),
                }),
            };
        }
        log.debug('TPS computation failed, falling back to affine + Delaunay');
    }

    const affine = estimateAffine(reference);
    if (!affine) {
        log.warning('Affine estimation failed; reference points are collinear or coincident');
        return failure({
            kind: 'degenerate-geometry',
            message: 'Reference points are collinear or coincident; no transform can be fitted.',
            referencePointCount: count,
        });
    }

    const triangles = triangulate(reference);
    const residuals = computeAffineResiduals(reference, affine);
    log.debug(`Affine+Delaunay active: ${triangles.length} triangles from ${count} reference points`);

    return {
        kind: 'success',
        model: buildModel({
            method: 'affine-delaunay',
            referencePointCount: count,
            residuals,
            affine,
            triangles,
            spline: null,
            transform: (x, y) => {
                const snapped = snap(x, y);
                if (snapped) {
                    return snapped;
                }
                const location = locateTriangle(x, y, triangles, reference);
                if (location?.inside) {
                    return applyWeights(location, reference);
                }
                return applyAffine(affine, x, y);
            },
        }),
    };
}
