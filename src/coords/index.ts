import type { ReferencePoint } from '@/types';

// =============================================================================
// TYPES
// =============================================================================

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type CoordSpace = 'source' | 'target';

/** SVG pixel coordinates of the external map API */
export type SourceCoord = Brand<{ x: number; y: number }, 'SourceCoord'>;
/** Game world coordinates (x, z plane exposed as x, y) */
export type TargetCoord = Brand<{ x: number; y: number }, 'TargetCoord'>;

export type CoordOf<T extends CoordSpace> = T extends 'source' ? SourceCoord : TargetCoord;

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export const asSource = (x: number, y: number): SourceCoord => ({ x, y }) as SourceCoord;
export const asTarget = (x: number, y: number): TargetCoord => ({ x, y }) as TargetCoord;

export const sourceOf = (point: ReferencePoint): SourceCoord => asSource(point.sourceX, point.sourceY);
export const targetOf = (point: ReferencePoint): TargetCoord => asTarget(point.targetX, point.targetY);

// =============================================================================
// HELPERS
// =============================================================================

export const distance = <T extends SourceCoord | TargetCoord>(a: T, b: T): number =>
    Math.hypot(a.x - b.x, a.y - b.y);

export const isFiniteCoord = (coord: { x: number; y: number }): boolean =>
    Number.isFinite(coord.x) && Number.isFinite(coord.y);

export const isFiniteReferencePoint = (point: ReferencePoint): boolean =>
    Number.isFinite(point.sourceX) &&
    Number.isFinite(point.sourceY) &&
    Number.isFinite(point.targetX) &&
    Number.isFinite(point.targetY);

/**
 * Twice the signed area of triangle (a, b, c). Positive when counter-clockwise.
 */
export const orient2d = (
    a: { x: number; y: number },
    b: { x: number; y: number },
    c: { x: number; y: number },
): number => (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);
