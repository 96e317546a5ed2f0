/**
 * Thin-Plate Spline (TPS) warp from source (SVG) to target (world) space.
 *
 *   f(x, y) = a0 + a1·x + a2·y + Σᵢ wᵢ · U(‖(x, y) − pᵢ‖),   U(r) = r² ln r
 *
 * One spline per target axis. With lambda = 0 the spline interpolates every
 * reference pair exactly; lambda > 0 trades exactness for smoothness, which
 * helps when reference markers are noisy.
 *
 * The (n+3)x(n+3) system
 *
 *   | K + λI  P | |w|   |v|
 *   | Pᵀ      0 | |a| = |0|
 *
 * is solved once per axis, over source coordinates centred on their mean and
 * divided by their extent. Lambda acts on that normalized kernel.
 *
 * Any degeneracy (too few points, collinear or duplicate sources, singular
 * matrix) yields null; nothing here throws.
 */

import {
    DUPLICATE_POINT_EPSILON,
    MIN_REFERENCE_POINTS,
    TPS_BASIS_EPSILON,
} from '@/constants/transform';
import { asTarget, isFiniteReferencePoint, type TargetCoord } from '@/coords';
import { createLogger, type Logger } from '@/services/logStore';
import type { ReferencePoint, ReferenceResidual } from '@/types';

import { hasNonCollinearSpread } from './affineEstimator';
import { dedupeReferencePoints } from './delaunay';
import { solveLinearSystem } from './linearSystem';

export const tpsBasis = (r: number): number => (r < TPS_BASIS_EPSILON ? 0 : r * r * Math.log(r));

interface AxisCoefficients {
    weights: number[];
    /** [a0, a1, a2] over normalized coordinates */
    affine: [number, number, number];
}

/** Maps source coordinates to (x - centreX) / scale, (y - centreY) / scale. */
interface SourceFrame {
    centreX: number;
    centreY: number;
    scale: number;
}

const buildSourceFrame = (points: readonly ReferencePoint[]): SourceFrame => {
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    let sumX = 0;
    let sumY = 0;
    for (const p of points) {
        minX = Math.min(minX, p.sourceX);
        minY = Math.min(minY, p.sourceY);
        maxX = Math.max(maxX, p.sourceX);
        maxY = Math.max(maxY, p.sourceY);
        sumX += p.sourceX;
        sumY += p.sourceY;
    }
    return {
        centreX: sumX / points.length,
        centreY: sumY / points.length,
        scale: Math.max(maxX - minX, maxY - minY),
    };
};

const toFrame = (frame: SourceFrame, x: number, y: number): { x: number; y: number } => ({
    x: (x - frame.centreX) / frame.scale,
    y: (y - frame.centreY) / frame.scale,
});

export interface ThinPlateSplineOptions {
    lambda?: number;
    logger?: Logger;
}

const defaultLogger = (): Logger => createLogger('TPS');

export class ThinPlateSplineModel {
    readonly lambda: number;

    readonly meanError: number;

    readonly maxError: number;

    readonly residuals: readonly ReferenceResidual[];

    private readonly points: readonly ReferencePoint[];

    private readonly frame: SourceFrame;

    /** Reference sources in the normalized frame */
    private readonly nodes: readonly { x: number; y: number }[];

    private readonly x: AxisCoefficients;

    private readonly y: AxisCoefficients;

    private constructor(
        points: readonly ReferencePoint[],
        frame: SourceFrame,
        lambda: number,
        x: AxisCoefficients,
        y: AxisCoefficients,
    ) {
        this.points = points;
        this.frame = frame;
        this.nodes = points.map((p) => toFrame(frame, p.sourceX, p.sourceY));
        this.lambda = lambda;
        this.x = x;
        this.y = y;

        this.residuals = points.map((p, index) => {
            const predicted = this.transform(p.sourceX, p.sourceY);
            return {
                index,
                predictedX: predicted.x,
                predictedY: predicted.y,
                error: Math.hypot(predicted.x - p.targetX, predicted.y - p.targetY),
            };
        });
        this.meanError = this.residuals.reduce((sum, r) => sum + r.error, 0) / points.length;
        this.maxError = this.residuals.reduce((max, r) => Math.max(max, r.error), 0);
    }

    /**
     * Fit a spline through the reference points. Returns null when the points
     * cannot support one.
     */
    static fit(
        points: readonly ReferencePoint[],
        options: ThinPlateSplineOptions = {},
    ): ThinPlateSplineModel | null {
        const log = options.logger ?? defaultLogger();
        const lambda = Math.max(0, options.lambda ?? 0);
        const n = points.length;

        if (n < MIN_REFERENCE_POINTS) {
            log.debug(`Need at least ${MIN_REFERENCE_POINTS} reference points, got ${n}`);
            return null;
        }
        if (!points.every(isFiniteReferencePoint)) {
            log.debug('Reference points contain non-finite coordinates');
            return null;
        }
        if (!hasNonCollinearSpread(points)) {
            log.debug('Reference points are collinear');
            return null;
        }
        if (dedupeReferencePoints(points, DUPLICATE_POINT_EPSILON).length !== n) {
            log.debug('Duplicate source points make the kernel singular');
            return null;
        }

        const frame = buildSourceFrame(points);
        const nodes = points.map((p) => toFrame(frame, p.sourceX, p.sourceY));

        const size = n + 3;
        const matrix: number[][] = Array.from({ length: size }, () => new Array<number>(size).fill(0));
        const rhsX = new Array<number>(size).fill(0);
        const rhsY = new Array<number>(size).fill(0);

        for (let i = 0; i < n; i += 1) {
            const ni = nodes[i];
            for (let j = 0; j < n; j += 1) {
                matrix[i][j] =
                    i === j ? lambda : tpsBasis(Math.hypot(ni.x - nodes[j].x, ni.y - nodes[j].y));
            }
            matrix[i][n] = 1;
            matrix[i][n + 1] = ni.x;
            matrix[i][n + 2] = ni.y;
            matrix[n][i] = 1;
            matrix[n + 1][i] = ni.x;
            matrix[n + 2][i] = ni.y;

            rhsX[i] = points[i].targetX;
            rhsY[i] = points[i].targetY;
        }

        const solutionX = solveLinearSystem(matrix, rhsX);
        const solutionY = solutionX ? solveLinearSystem(matrix, rhsY) : null;
        if (!solutionX || !solutionY) {
            log.debug('Failed to solve linear system');
            return null;
        }

        const split = (solution: number[]): AxisCoefficients => ({
            weights: solution.slice(0, n),
            affine: [solution[n], solution[n + 1], solution[n + 2]],
        });

        const model = new ThinPlateSplineModel(
            points.map((p) => ({ ...p })),
            frame,
            lambda,
            split(solutionX),
            split(solutionY),
        );
        if (!Number.isFinite(model.meanError) || !Number.isFinite(model.maxError)) {
            log.debug('Fitted spline produces non-finite values at the reference points');
            return null;
        }

        log.debug(
            `Computed: ${n} points, mean error=${model.meanError.toFixed(4)}, max error=${model.maxError.toFixed(4)}`,
        );
        return model;
    }

    get referencePointCount(): number {
        return this.points.length;
    }

    transform(x: number, y: number): TargetCoord {
        const q = toFrame(this.frame, x, y);
        let resultX = this.x.affine[0] + this.x.affine[1] * q.x + this.x.affine[2] * q.y;
        let resultY = this.y.affine[0] + this.y.affine[1] * q.x + this.y.affine[2] * q.y;

        for (let i = 0; i < this.nodes.length; i += 1) {
            const node = this.nodes[i];
            const u = tpsBasis(Math.hypot(q.x - node.x, q.y - node.y));
            if (u !== 0) {
                resultX += this.x.weights[i] * u;
                resultY += this.y.weights[i] * u;
            }
        }
        return asTarget(resultX, resultY);
    }

    transformBatch(points: readonly { x: number; y: number }[]): TargetCoord[] {
        return points.map((p) => this.transform(p.x, p.y));
    }

    /** Affine part as [a0, a1, a2] over raw source coordinates. */
    affineCoefficients(axis: 'x' | 'y'): [number, number, number] {
        const [a0, a1, a2] = this[axis].affine;
        const { centreX, centreY, scale } = this.frame;
        return [a0 - (a1 * centreX + a2 * centreY) / scale, a1 / scale, a2 / scale];
    }

    describe(): string {
        const fmt = (values: readonly number[]) => values.map((v) => v.toFixed(4)).join(', ');
        return [
            'TPS Transform:',
            `  Reference Points: ${this.referencePointCount}`,
            `  Lambda: ${this.lambda.toExponential(2)}`,
            `  Mean Error: ${this.meanError.toFixed(4)}`,
            `  Max Error: ${this.maxError.toFixed(4)}`,
            `  Affine X: [${fmt(this.affineCoefficients('x'))}]`,
            `  Affine Y: [${fmt(this.affineCoefficients('y'))}]`,
        ].join('\n');
    }
}

export const fitThinPlateSpline = (
    points: readonly ReferencePoint[],
    lambda: number = 0,
    logger?: Logger,
): ThinPlateSplineModel | null => ThinPlateSplineModel.fit(points, { lambda, logger });
