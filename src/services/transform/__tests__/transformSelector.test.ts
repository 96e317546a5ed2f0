// @vitest-environment node
import { describe, it, expect } from 'vitest';

import { LogStore, createLogger, silentLogger } from '@/services/logStore';
import type { ReferencePoint } from '@/types';

import { applyAffine } from '../math/affineEstimator';
import { computeTransform, findSnapTarget, type TransformModel, type TransformResult } from '../transformSelector';

const ref = (sourceX: number, sourceY: number, targetX: number, targetY: number): ReferencePoint => ({
    sourceX,
    sourceY,
    targetX,
    targetY,
});

const bilinearSquare = [ref(0, 0, 0, 0), ref(1, 0, 1, 0), ref(1, 1, 1.5, 1.25), ref(0, 1, 0, 1)];

// 5x4 jittered grid over [0, 5000]², mapped to world coordinates in the hundreds
const svgMapReferences = (): ReferencePoint[] => {
    const points: ReferencePoint[] = [];
    for (let i = 0; i < 5; i += 1) {
        for (let j = 0; j < 4; j += 1) {
            const x = (i + 0.5 + (((i * 7 + j * 3) % 5) - 2) * 0.05) * 1000;
            const y = (j + 0.5 + (((i * 3 + j * 5) % 7) - 3) * 0.04) * 1250;
            points.push(
                ref(x, y, 0.12 * x - 300 + 25 * Math.sin(y / 800), -0.09 * y + 420 + 15 * Math.cos(x / 1000)),
            );
        }
    }
    return points;
};

const expectModel = (result: TransformResult): TransformModel => {
    if (result.kind !== 'success') {
        throw new Error(`expected a model, got ${result.error.kind}`);
    }
    return result.model;
};

describe('transformSelector', () => {
    describe('findSnapTarget', () => {
        it('returns the first reference within tolerance', () => {
            const points = [ref(0, 0, 1, 1), ref(0, 0.5, 2, 2)];
            expect(findSnapTarget(points, 0, 0.4, 0.5)).toEqual({ x: 1, y: 1 });
            expect(findSnapTarget(points, 0, 0.6, 0.05)).toBeNull();
        });
    });

    describe('computeTransform', () => {
        it('fails with fewer than three reference points', () => {
            const result = computeTransform([ref(0, 0, 0, 0), ref(1, 1, 1, 1)], { logger: silentLogger });
            expect(result).toEqual({
                kind: 'failure',
                error: {
                    kind: 'insufficient-reference-points',
                    message: 'At least 3 reference points are required, got 2.',
                    referencePointCount: 2,
                },
            });
        });

        it('fails on collinear reference points', () => {
            const result = computeTransform(
                [ref(0, 0, 0, 0), ref(1, 1, 5, 5), ref(2, 2, 10, 10), ref(3, 3, 15, 15)],
                { logger: silentLogger },
            );
            expect(result.kind).toBe('failure');
            if (result.kind === 'failure') {
                expect(result.error.kind).toBe('degenerate-geometry');
                expect(result.error.referencePointCount).toBe(4);
            }
        });

        it('fails on non-finite coordinates', () => {
            const result = computeTransform(
                [ref(0, 0, 0, 0), ref(10, 0, 10, Number.POSITIVE_INFINITY), ref(0, 10, 0, 10)],
                { logger: silentLogger },
            );
            expect(result.kind === 'failure' && result.error.kind).toBe('degenerate-geometry');
        });

        it('maps the interior of three scaled references through the spline', () => {
            const model = expectModel(
                computeTransform([ref(0, 0, 0, 0), ref(10, 0, 100, 0), ref(0, 10, 0, 50)], {
                    logger: silentLogger,
                }),
            );
            expect(model.method).toBe('thin-plate-spline');
            expect(model.referencePointCount).toBe(3);
            const result = model.transform(5, 5);
            expect(result.x).toBeCloseTo(50, 9);
            expect(result.y).toBeCloseTo(25, 9);
        });

        it('keeps the spline for maps thousands of pixels wide', () => {
            const points = svgMapReferences();
            const model = expectModel(computeTransform(points, { logger: silentLogger }));
            expect(model.method).toBe('thin-plate-spline');
            expect(model.referencePointCount).toBe(20);
            expect(model.maxError).toBeLessThan(1e-6);
            expect(model.summary.outlierIndices).toEqual([]);

            // off-reference queries go through the spline, not the snap
            const { spline } = model;
            if (!spline) throw new Error('spline missing');
            expect(model.transform(2480.5, 1733.25)).toEqual(spline.transform(2480.5, 1733.25));
        });

        it('reports spline residuals and passes lambda through', () => {
            const exact = expectModel(computeTransform(bilinearSquare, { logger: silentLogger }));
            expect(exact.residuals).toHaveLength(4);
            expect(exact.maxError).toBeLessThan(1e-9);
            expect(exact.summary.outlierIndices).toEqual([]);

            const smoothed = expectModel(computeTransform(bilinearSquare, { lambda: 2, logger: silentLogger }));
            expect(smoothed.spline?.lambda).toBe(2);
            expect(smoothed.meanError).toBeGreaterThan(0);
        });

        it('returns reference targets exactly within the snap tolerance', () => {
            const model = expectModel(
                computeTransform(bilinearSquare, { snapTolerance: 0.2, logger: silentLogger }),
            );
            expect(model.transform(0.1, 0.1)).toEqual({ x: 0, y: 0 });
            expect(model.transform(0.95, 1)).toEqual({ x: 1.5, y: 1.25 });

            const strict = expectModel(computeTransform(bilinearSquare, { logger: silentLogger }));
            expect(strict.transform(0.1, 0.1)).not.toEqual({ x: 0, y: 0 });
        });

        it('falls back to affine + Delaunay when the spline cannot be fitted', () => {
            const store = new LogStore();
            // (0,0) appears twice with different targets: the kernel is singular
            const points = [
                ref(0, 0, 0, 0),
                ref(10, 0, 20, 0),
                ref(10, 10, 20, 10),
                ref(0, 10, 0, 10),
                ref(0, 0, 0.5, 0.5),
            ];
            const model = expectModel(
                computeTransform(points, { logger: createLogger('Transform', { store, console: false }) }),
            );

            expect(model.method).toBe('affine-delaunay');
            expect(model.spline).toBeNull();
            expect(model.affine).not.toBeNull();
            expect(model.triangles).toHaveLength(2);
            expect(model.residuals).toHaveLength(5);
            expect(store.entries.map((e) => e.message)).toContain(
                'TPS computation failed, falling back to affine + Delaunay',
            );

            // snaps to the first occurrence of a duplicated source
            expect(model.transform(0, 0)).toEqual({ x: 0, y: 0 });

            const inside = model.transform(5, 5);
            expect(inside.x).toBeCloseTo(10, 9);
            expect(inside.y).toBeCloseTo(5, 9);

            const { affine } = model;
            if (!affine) throw new Error('affine parameters missing');
            const outside = model.transform(20, 5);
            const expected = applyAffine(affine, 20, 5);
            expect(outside.x).toBeCloseTo(expected.x, 12);
            expect(outside.y).toBeCloseTo(expected.y, 12);
        });

        it('interpolates inside the hull and uses the affine map outside it', () => {
            const points = [ref(0, 0, 0, 0), ref(10, 0, 10, 0), ref(0, 10, 0, 10), ref(11, 11, 30, 30)];
            const model = expectModel(
                computeTransform(points, { useThinPlateSpline: false, logger: silentLogger }),
            );
            expect(model.method).toBe('affine-delaunay');

            // inside triangle (0,0)-(10,0)-(0,10), whose targets are the identity
            const inside = model.transform(2, 2);
            expect(inside.x).toBeCloseTo(2, 12);
            expect(inside.y).toBeCloseTo(2, 12);

            const { affine } = model;
            if (!affine) throw new Error('affine parameters missing');
            const outside = model.transform(-5, 5);
            expect(outside).toEqual(applyAffine(affine, -5, 5));
            expect(model.transform(11, 11)).toEqual({ x: 30, y: 30 });
        });

        it('reports affine residuals on the fallback path', () => {
            const model = expectModel(
                computeTransform(bilinearSquare, { useThinPlateSpline: false, logger: silentLogger }),
            );
            const expected = Math.hypot(0.125, 0.0625);
            model.residuals.forEach((r) => expect(r.error).toBeCloseTo(expected, 12));
            expect(model.meanError).toBeCloseTo(expected, 12);
            expect(model.maxError).toBeCloseTo(expected, 12);
            // snapping still makes the references exact
            expect(model.transform(1, 1)).toEqual({ x: 1.5, y: 1.25 });
        });

        it('maps batches like single queries', () => {
            const model = expectModel(computeTransform(bilinearSquare, { logger: silentLogger }));
            const queries = [
                { x: 0.25, y: 0.25 },
                { x: 0.75, y: 0.4 },
            ];
            expect(model.transformBatch(queries)).toEqual(queries.map((q) => model.transform(q.x, q.y)));
        });

        it('is not affected by later changes to the caller-owned list', () => {
            const points = [ref(0, 0, 0, 0), ref(10, 0, 100, 0), ref(0, 10, 0, 50)];
            const model = expectModel(computeTransform(points, { logger: silentLogger }));
            points[0] = ref(0, 0, 7, 7);
            expect(model.transform(0, 0)).toEqual({ x: 0, y: 0 });
        });
    });
});
