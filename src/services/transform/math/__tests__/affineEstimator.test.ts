// @vitest-environment node
import { describe, it, expect } from 'vitest';

import type { ReferencePoint } from '@/types';

import {
    applyAffine,
    computeAffineMeanError,
    computeAffineResiduals,
    estimateAffine,
    hasNonCollinearSpread,
} from '../affineEstimator';

const ref = (sourceX: number, sourceY: number, targetX: number, targetY: number): ReferencePoint => ({
    sourceX,
    sourceY,
    targetX,
    targetY,
});

describe('affineEstimator', () => {
    describe('estimateAffine', () => {
        it('fits three non-collinear points exactly', () => {
            const params = estimateAffine([ref(0, 0, 0, 0), ref(10, 0, 100, 0), ref(0, 10, 0, 50)]);
            expect(params).not.toBeNull();
            if (!params) return;
            expect(params.a).toBeCloseTo(10, 9);
            expect(params.b).toBeCloseTo(0, 9);
            expect(params.c).toBeCloseTo(0, 9);
            expect(params.d).toBeCloseTo(5, 9);
            expect(params.e).toBeCloseTo(0, 9);
            expect(params.f).toBeCloseTo(0, 9);

            const mapped = applyAffine(params, 5, 5);
            expect(mapped.x).toBeCloseTo(50, 9);
            expect(mapped.y).toBeCloseTo(25, 9);
        });

        it('recovers a rotated, scaled and translated map far from the origin', () => {
            // target = R(90°)·2·source + (5000, -3000)
            const forward = (x: number, y: number) => ref(x, y, -2 * y + 5000, 2 * x - 3000);
            const params = estimateAffine([
                forward(1200, 800),
                forward(1500, 820),
                forward(1320, 1100),
                forward(1710, 1040),
            ]);
            expect(params).not.toBeNull();
            if (!params) return;
            expect(params.a).toBeCloseTo(0, 9);
            expect(params.b).toBeCloseTo(-2, 9);
            expect(params.c).toBeCloseTo(2, 9);
            expect(params.d).toBeCloseTo(0, 9);
            expect(params.e).toBeCloseTo(5000, 6);
            expect(params.f).toBeCloseTo(-3000, 6);
        });

        it('minimises squared residuals when the data is not affine', () => {
            // Unit square with a bilinear warp: (x + 0.5xy, y + 0.25xy)
            const points = [ref(0, 0, 0, 0), ref(1, 0, 1, 0), ref(0, 1, 0, 1), ref(1, 1, 1.5, 1.25)];
            const params = estimateAffine(points);
            expect(params).not.toBeNull();
            if (!params) return;
            // xy ≈ -0.25 + 0.5x + 0.5y in the least-squares sense on the corners
            expect(params.a).toBeCloseTo(1.25, 12);
            expect(params.b).toBeCloseTo(0.25, 12);
            expect(params.e).toBeCloseTo(-0.125, 12);
            expect(params.c).toBeCloseTo(0.125, 12);
            expect(params.d).toBeCloseTo(1.125, 12);
            expect(params.f).toBeCloseTo(-0.0625, 12);

            // every corner is off by (±0.125, ±0.0625)
            const expectedError = Math.hypot(0.125, 0.0625);
            computeAffineResiduals(points, params).forEach((r) => {
                expect(r.error).toBeCloseTo(expectedError, 12);
            });
            expect(computeAffineMeanError(points, params)).toBeCloseTo(expectedError, 12);
        });

        it('returns null for fewer than three points', () => {
            expect(estimateAffine([])).toBeNull();
            expect(estimateAffine([ref(0, 0, 0, 0), ref(1, 1, 1, 1)])).toBeNull();
        });

        it('returns null for collinear points', () => {
            expect(estimateAffine([ref(0, 0, 0, 0), ref(1, 1, 5, 5), ref(2, 2, 9, 9)])).toBeNull();
            expect(
                estimateAffine([ref(0.1, 0.2, 0, 0), ref(0.3, 0.6, 1, 0), ref(0.7, 1.4, 0, 1), ref(1.3, 2.6, 2, 2)]),
            ).toBeNull();
        });

        it('returns null for coincident points', () => {
            expect(estimateAffine([ref(3, 3, 0, 0), ref(3, 3, 1, 0), ref(3, 3, 0, 1)])).toBeNull();
        });

        it('returns null for non-finite input', () => {
            expect(estimateAffine([ref(0, 0, 0, 0), ref(1, 0, Number.NaN, 0), ref(0, 1, 0, 1)])).toBeNull();
        });
    });

    describe('computeAffineMeanError', () => {
        it('is infinite with no points', () => {
            expect(computeAffineMeanError([], { a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 })).toBe(
                Number.POSITIVE_INFINITY,
            );
        });
    });

    describe('hasNonCollinearSpread', () => {
        it('distinguishes a triangle from a line', () => {
            expect(hasNonCollinearSpread([ref(0, 0, 0, 0), ref(1, 0, 0, 0), ref(0, 1, 0, 0)])).toBe(true);
            expect(hasNonCollinearSpread([ref(0, 0, 0, 0), ref(1, 0, 0, 0), ref(2, 0, 0, 0)])).toBe(false);
            expect(hasNonCollinearSpread([ref(0, 0, 0, 0), ref(1, 0, 0, 0)])).toBe(false);
        });
    });
});
