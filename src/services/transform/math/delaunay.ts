/**
 * Delaunay triangulation (Bowyer-Watson).
 *
 * Points are inserted one at a time into a triangulation seeded with a large
 * enclosing super-triangle. Each insertion removes every triangle whose
 * circumcircle contains the new point and re-fans the resulting cavity from it.
 * Triangles that still touch a super-triangle vertex are dropped at the end.
 * A finite super-triangle can sit inside the huge circumcircle of a sliver along
 * a nearly flat stretch of the hull, which takes that sliver out too, so the
 * remaining concave pockets are closed with ears and the result is brought back
 * to Delaunay by edge flips.
 *
 * Works on source-space coordinates only; targets ride along through indices.
 */

import {
    DUPLICATE_POINT_EPSILON,
    MIN_REFERENCE_POINTS,
    SUPER_TRIANGLE_SCALE,
} from '@/constants/transform';
import { isFiniteReferencePoint, orient2d } from '@/coords';
import type { ReferencePoint, Triangle } from '@/types';

import { hasNonCollinearSpread } from './affineEstimator';

interface Vertex {
    x: number;
    y: number;
}

interface WorkingTriangle {
    a: number;
    b: number;
    c: number;
}

/**
 * Indices of the first occurrence of every distinct, finite source point.
 * Later points within `epsilon` of an earlier one are dropped.
 */
export function dedupeReferencePoints(
    points: readonly ReferencePoint[],
    epsilon: number = DUPLICATE_POINT_EPSILON,
): number[] {
    const kept: number[] = [];
    points.forEach((point, index) => {
        if (!isFiniteReferencePoint(point)) {
            return;
        }
        const duplicate = kept.some((k) => {
            const other = points[k];
            return Math.hypot(other.sourceX - point.sourceX, other.sourceY - point.sourceY) <= epsilon;
        });
        if (!duplicate) {
            kept.push(index);
        }
    });
    return kept;
}

/**
 * True when `p` lies strictly inside the circumcircle of the counter-clockwise triangle (a, b, c).
 */
export function inCircumcircle(a: Vertex, b: Vertex, c: Vertex, p: Vertex): boolean {
    const adx = a.x - p.x;
    const ady = a.y - p.y;
    const bdx = b.x - p.x;
    const bdy = b.y - p.y;
    const cdx = c.x - p.x;
    const cdy = c.y - p.y;

    const det =
        (adx * adx + ady * ady) * (bdx * cdy - cdx * bdy) -
        (bdx * bdx + bdy * bdy) * (adx * cdy - cdx * ady) +
        (cdx * cdx + cdy * cdy) * (adx * bdy - bdx * ady);
    return det > 0;
}

const makeCcw = (vertices: readonly Vertex[], a: number, b: number, c: number): WorkingTriangle =>
    orient2d(vertices[a], vertices[b], vertices[c]) >= 0 ? { a, b, c } : { a, b: c, c: b };

const edgeKey = (u: number, v: number): string => (u < v ? `${u}-${v}` : `${v}-${u}`);

const buildSuperTriangle = (vertices: readonly Vertex[]): [Vertex, Vertex, Vertex] => {
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const v of vertices) {
        minX = Math.min(minX, v.x);
        minY = Math.min(minY, v.y);
        maxX = Math.max(maxX, v.x);
        maxY = Math.max(maxY, v.y);
    }
    const deltaMax = Math.max(maxX - minX, maxY - minY);
    const midX = (minX + maxX) / 2;
    const midY = (minY + maxY) / 2;
    const size = SUPER_TRIANGLE_SCALE * deltaMax;
    return [
        { x: midX - size, y: midY - deltaMax },
        { x: midX + size, y: midY - deltaMax },
        { x: midX, y: midY + size },
    ];
};

/**
 * Triangulate the reference points in source space.
 *
 * Duplicates are collapsed onto their first occurrence. Fewer than 3 distinct
 * points, or only collinear ones, give an empty list. Triangle indices refer to
 * the `points` array as passed in.
 */
export function triangulate(points: readonly ReferencePoint[]): Triangle[] {
    const distinct = dedupeReferencePoints(points);
    if (distinct.length < MIN_REFERENCE_POINTS) {
        return [];
    }
    const distinctPoints = distinct.map((i) => points[i]);
    if (!hasNonCollinearSpread(distinctPoints)) {
        return [];
    }

    const vertices: Vertex[] = distinctPoints.map((p) => ({ x: p.sourceX, y: p.sourceY }));
    const superStart = vertices.length;
    vertices.push(...buildSuperTriangle(vertices));

    let triangles: WorkingTriangle[] = [
        makeCcw(vertices, superStart, superStart + 1, superStart + 2),
    ];

    for (let k = 0; k < superStart; k += 1) {
        const p = vertices[k];
        const bad: WorkingTriangle[] = [];
        const kept: WorkingTriangle[] = [];
        for (const t of triangles) {
            if (inCircumcircle(vertices[t.a], vertices[t.b], vertices[t.c], p)) {
                bad.push(t);
            } else {
                kept.push(t);
            }
        }

        // Cavity boundary = edges that belong to exactly one removed triangle
        const edgeCounts = new Map<string, { u: number; v: number; count: number }>();
        for (const t of bad) {
            for (const [u, v] of [
                [t.a, t.b],
                [t.b, t.c],
                [t.c, t.a],
            ] as const) {
                const key = edgeKey(u, v);
                const existing = edgeCounts.get(key);
                if (existing) {
                    existing.count += 1;
                } else {
                    edgeCounts.set(key, { u, v, count: 1 });
                }
            }
        }

        for (const edge of edgeCounts.values()) {
            if (edge.count === 1) {
                kept.push(makeCcw(vertices, edge.u, edge.v, k));
            }
        }
        triangles = kept;
    }

    let minX = Infinity;
    let maxX = -Infinity;
    let minY = Infinity;
    let maxY = -Infinity;
    for (let i = 0; i < superStart; i += 1) {
        minX = Math.min(minX, vertices[i].x);
        maxX = Math.max(maxX, vertices[i].x);
        minY = Math.min(minY, vertices[i].y);
        maxY = Math.max(maxY, vertices[i].y);
    }
    const extent = Math.max(maxX - minX, maxY - minY);
    const minDoubleArea = DUPLICATE_POINT_EPSILON * extent * extent;

    const real = vertices.slice(0, superStart);
    const inner = triangles.filter((t) => t.a < superStart && t.b < superStart && t.c < superStart);
    const closed = closeHullPockets(inner, real, minDoubleArea);

    return legalize(closed, real)
        .filter((t) => Math.abs(orient2d(real[t.a], real[t.b], real[t.c])) > minDoubleArea)
        .map((t) => ({ indices: [distinct[t.a], distinct[t.b], distinct[t.c]] as const }));
}

// =============================================================================
// HULL CLOSING
// =============================================================================

const triangleEdges = (t: WorkingTriangle): [number, number][] => [
    [t.a, t.b],
    [t.b, t.c],
    [t.c, t.a],
];

const segmentsCross = (p1: Vertex, p2: Vertex, q1: Vertex, q2: Vertex): boolean =>
    orient2d(p1, p2, q1) * orient2d(p1, p2, q2) < 0 && orient2d(q1, q2, p1) * orient2d(q1, q2, p2) < 0;

const strictlyInside = (t: WorkingTriangle, vertices: readonly Vertex[], p: Vertex): boolean =>
    orient2d(vertices[t.a], vertices[t.b], p) > 0 &&
    orient2d(vertices[t.b], vertices[t.c], p) > 0 &&
    orient2d(vertices[t.c], vertices[t.a], p) > 0;

/**
 * Whether the counter-clockwise ear (a, c, b) can be added next to the existing
 * triangles: no vertex inside it or on its new edge a-c, no edge crossing a-c,
 * and not lying on top of an existing triangle.
 */
const isFreeEar = (
    a: number,
    b: number,
    c: number,
    triangles: readonly WorkingTriangle[],
    vertices: readonly Vertex[],
): boolean => {
    const ear: WorkingTriangle = { a, b: c, c: b };
    for (let k = 0; k < vertices.length; k += 1) {
        if (k === a || k === b || k === c) {
            continue;
        }
        const p = vertices[k];
        const onNewEdge =
            orient2d(vertices[a], vertices[c], p) === 0 &&
            Math.min(vertices[a].x, vertices[c].x) <= p.x &&
            p.x <= Math.max(vertices[a].x, vertices[c].x) &&
            Math.min(vertices[a].y, vertices[c].y) <= p.y &&
            p.y <= Math.max(vertices[a].y, vertices[c].y);
        if (onNewEdge || strictlyInside(ear, vertices, p)) {
            return false;
        }
    }

    for (const t of triangles) {
        for (const [u, v] of triangleEdges(t)) {
            if (u === a || u === c || v === a || v === c) {
                continue;
            }
            if (segmentsCross(vertices[a], vertices[c], vertices[u], vertices[v])) {
                return false;
            }
        }
    }

    const centroid = {
        x: (vertices[a].x + vertices[b].x + vertices[c].x) / 3,
        y: (vertices[a].y + vertices[b].y + vertices[c].y) / 3,
    };
    return !triangles.some((t) => strictlyInside(t, vertices, centroid));
};

/**
 * Fill concave pockets between the triangulated region and the convex hull.
 * The region's boundary runs counter-clockwise; a right turn a -> b -> c on it
 * is a pocket corner, and the ear (a, c, b) fills it.
 */
function closeHullPockets(
    triangles: readonly WorkingTriangle[],
    vertices: readonly Vertex[],
    minDoubleArea: number,
): WorkingTriangle[] {
    const result = [...triangles];
    if (result.length === 0) {
        return result;
    }

    let added = true;
    while (added) {
        added = false;
        const directed = new Set<string>();
        for (const t of result) {
            for (const [u, v] of triangleEdges(t)) {
                directed.add(`${u}>${v}`);
            }
        }
        const outgoing = new Map<number, number[]>();
        const incoming: [number, number][] = [];
        for (const t of result) {
            for (const [u, v] of triangleEdges(t)) {
                if (directed.has(`${v}>${u}`)) {
                    continue;
                }
                incoming.push([u, v]);
                const next = outgoing.get(u);
                if (next) {
                    next.push(v);
                } else {
                    outgoing.set(u, [v]);
                }
            }
        }

        for (const [a, b] of incoming) {
            for (const c of outgoing.get(b) ?? []) {
                if (c === a || orient2d(vertices[a], vertices[b], vertices[c]) >= -minDoubleArea) {
                    continue;
                }
                if (isFreeEar(a, b, c, result, vertices)) {
                    result.push({ a, b: c, c: b });
                    added = true;
                    break;
                }
            }
            if (added) {
                break;
            }
        }
    }
    return result;
}

// =============================================================================
// EDGE FLIPS
// =============================================================================

const oppositeVertex = (t: WorkingTriangle, u: number, v: number): number =>
    t.a !== u && t.a !== v ? t.a : t.b !== u && t.b !== v ? t.b : t.c;

/**
 * Lawson flips: swap the diagonal of every pair of triangles whose shared edge
 * has the far vertex inside a circumcircle, until no edge is illegal.
 */
function legalize(triangles: readonly WorkingTriangle[], vertices: readonly Vertex[]): WorkingTriangle[] {
    let current = [...triangles];
    const maxPasses = 4 * vertices.length + 16;

    for (let pass = 0; pass < maxPasses; pass += 1) {
        const owners = new Map<string, { u: number; v: number; triangles: number[] }>();
        current.forEach((t, index) => {
            for (const [u, v] of triangleEdges(t)) {
                const key = edgeKey(u, v);
                const entry = owners.get(key);
                if (entry) {
                    entry.triangles.push(index);
                } else {
                    owners.set(key, { u, v, triangles: [index] });
                }
            }
        });

        const flipped = new Set<number>();
        const replacements: WorkingTriangle[] = [];
        for (const { u, v, triangles: shared } of owners.values()) {
            if (shared.length !== 2) {
                continue;
            }
            const [i, j] = shared;
            if (flipped.has(i) || flipped.has(j)) {
                continue;
            }
            const t1 = current[i];
            const c = oppositeVertex(t1, u, v);
            const d = oppositeVertex(current[j], u, v);
            if (!inCircumcircle(vertices[t1.a], vertices[t1.b], vertices[t1.c], vertices[d])) {
                continue;
            }
            // new diagonal c-d must separate u and v
            const sideU = orient2d(vertices[c], vertices[d], vertices[u]);
            const sideV = orient2d(vertices[c], vertices[d], vertices[v]);
            if (sideU * sideV >= 0) {
                continue;
            }
            flipped.add(i);
            flipped.add(j);
            replacements.push(makeCcw(vertices, c, d, u), makeCcw(vertices, c, d, v));
        }

        if (flipped.size === 0) {
            break;
        }
        current = [...current.filter((_, index) => !flipped.has(index)), ...replacements];
    }
    return current;
}
