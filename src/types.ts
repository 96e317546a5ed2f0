/**
 * A matched observation: where a marker sits on the API's SVG map (source)
 * and where the same marker sits in game world coordinates (target).
 */
export interface ReferencePoint {
    readonly sourceX: number;
    readonly sourceY: number;
    readonly targetX: number;
    readonly targetY: number;
}

/**
 * 2D affine map:
 * targetX = a * sourceX + b * sourceY + e
 * targetY = c * sourceX + d * sourceY + f
 */
export interface AffineParameters {
    a: number;
    b: number;
    c: number;
    d: number;
    e: number;
    f: number;
}

/** Triangulation cell. Indices point into the reference list that was triangulated; winding is CCW in source space. */
export interface Triangle {
    readonly indices: readonly [number, number, number];
}

export type TransformMethod = 'thin-plate-spline' | 'affine-delaunay';

export type TransformErrorKind = 'insufficient-reference-points' | 'degenerate-geometry';

export interface TransformError {
    kind: TransformErrorKind;
    message: string;
    referencePointCount: number;
}

export interface ReferenceResidual {
    index: number;
    /** Where the active method (before snapping) sends the reference source */
    predictedX: number;
    predictedY: number;
    /** Euclidean distance to the known target */
    error: number;
}

export interface ResidualSummary {
    mean: number;
    max: number;
    median: number;
    /** Reference indices whose residual is a high-side MAD outlier (likely mismatched markers) */
    outlierIndices: number[];
}

// =============================================================================
// MARKERS
// =============================================================================

export type MarkerType =
    | 'pmc-extraction'
    | 'scav-extraction'
    | 'shared-extraction'
    | 'transit'
    | 'spawn'
    | 'lever'
    | 'keys'
    | 'quest'
    | 'other';

/** Marker as delivered by the external map API, positioned in SVG space. */
export interface ApiMarker {
    uid: string;
    name: string;
    markerType: MarkerType | null;
    position: { x: number; y: number } | null;
    /** API floor level (1 = ground floor); null when the API does not say */
    level: number | null;
}

/** Curated marker from the local database, positioned in world space (X/Z plane). */
export interface LocalMarker {
    id: string;
    name: string;
    markerType: MarkerType;
    x: number;
    z: number;
    floorId: string | null;
}

export interface FloorConfig {
    layerId: string;
    /** 0 = main floor, negative = basements, positive = upper levels */
    order: number;
    isDefault: boolean;
}

export interface MarkerMatch {
    local: LocalMarker;
    api: ApiMarker;
    nameSimilarity: number;
    /** World-space distance under the provisional transform, when one was available */
    distanceError: number | null;
    isReferencePoint: boolean;
    isManualMatch: boolean;
}
