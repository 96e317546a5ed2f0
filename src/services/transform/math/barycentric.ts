/**
 * Piecewise-linear interpolation over a source-space triangulation.
 *
 * Inside the hull the containing triangle's barycentric weights are applied to
 * its target vertices, which reproduces reference targets exactly at vertices.
 * Outside the hull the triangle with the nearest centroid is used and its
 * weights are allowed to go negative (linear extrapolation). That error grows
 * with the distance from the hull and is accepted as-is.
 */

import { BARYCENTRIC_EPSILON } from '@/constants/transform';
import { asTarget, type TargetCoord } from '@/coords';
import type { ReferencePoint, Triangle } from '@/types';

export type BarycentricWeights = [number, number, number];

export interface TriangleLocation {
    triangle: Triangle;
    weights: BarycentricWeights;
    /** false when the query is outside every triangle and the nearest one was used */
    inside: boolean;
}

/**
 * Barycentric weights of (x, y) with respect to source-space triangle (p1, p2, p3).
 * Null for a zero-area triangle.
 */
export function computeBarycentricWeights(
    x: number,
    y: number,
    p1: ReferencePoint,
    p2: ReferencePoint,
    p3: ReferencePoint,
): BarycentricWeights | null {
    const denom =
        (p2.sourceY - p3.sourceY) * (p1.sourceX - p3.sourceX) +
        (p3.sourceX - p2.sourceX) * (p1.sourceY - p3.sourceY);
    if (denom === 0 || !Number.isFinite(denom)) {
        return null;
    }
    const w1 = ((p2.sourceY - p3.sourceY) * (x - p3.sourceX) + (p3.sourceX - p2.sourceX) * (y - p3.sourceY)) / denom;
    const w2 = ((p3.sourceY - p1.sourceY) * (x - p3.sourceX) + (p1.sourceX - p3.sourceX) * (y - p3.sourceY)) / denom;
    return [w1, w2, 1 - w1 - w2];
}

export const isInsideWeights = (
    weights: BarycentricWeights,
    epsilon: number = BARYCENTRIC_EPSILON,
): boolean => weights.every((w) => w >= -epsilon);

const vertexPoints = (
    triangle: Triangle,
    points: readonly ReferencePoint[],
): [ReferencePoint, ReferencePoint, ReferencePoint] => {
    const [i, j, k] = triangle.indices;
    return [points[i], points[j], points[k]];
};

/**
 * Find the triangle that contains (x, y), or the one whose centroid is nearest
 * when the point lies outside the hull. Null only for an empty triangulation.
 */
export function locateTriangle(
    x: number,
    y: number,
    triangles: readonly Triangle[],
    points: readonly ReferencePoint[],
): TriangleLocation | null {
    let nearest: { triangle: Triangle; weights: BarycentricWeights; distance: number } | null = null;

    for (const triangle of triangles) {
        const [p1, p2, p3] = vertexPoints(triangle, points);
        const weights = computeBarycentricWeights(x, y, p1, p2, p3);
        if (!weights) {
            continue;
        }
        if (isInsideWeights(weights)) {
            return { triangle, weights, inside: true };
        }
        const cx = (p1.sourceX + p2.sourceX + p3.sourceX) / 3;
        const cy = (p1.sourceY + p2.sourceY + p3.sourceY) / 3;
        const distance = Math.hypot(x - cx, y - cy);
        if (!nearest || distance < nearest.distance) {
            nearest = { triangle, weights, distance };
        }
    }

    return nearest ? { triangle: nearest.triangle, weights: nearest.weights, inside: false } : null;
}

export const applyWeights = (
    location: TriangleLocation,
    points: readonly ReferencePoint[],
): TargetCoord => {
    const [p1, p2, p3] = vertexPoints(location.triangle, points);
    const [w1, w2, w3] = location.weights;
    return asTarget(
        w1 * p1.targetX + w2 * p2.targetX + w3 * p3.targetX,
        w1 * p1.targetY + w2 * p2.targetY + w3 * p3.targetY,
    );
};

/**
 * Interpolate the target coordinate of (queryX, queryY) over the triangulation.
 */
export function interpolate(
    queryX: number,
    queryY: number,
    triangles: readonly Triangle[],
    points: readonly ReferencePoint[],
): TargetCoord | null {
    const location = locateTriangle(queryX, queryY, triangles, points);
    return location ? applyWeights(location, points) : null;
}
