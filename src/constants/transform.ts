/** Minimum number of reference pairs any transform method can be fitted from. */
export const MIN_REFERENCE_POINTS = 3;

/**
 * Relative determinant below which the centred normal matrix is treated as singular
 * (collinear or coincident source points).
 */
export const DEGENERATE_DETERMINANT_EPSILON = 1e-9;

/** Pivot magnitude (relative to the largest matrix entry) below which a linear solve is singular. */
export const PIVOT_EPSILON = 1e-12;

/** Radial basis U(r) = r² ln r is taken as 0 below this distance. */
export const TPS_BASIS_EPSILON = 1e-10;

/** Source points closer than this are the same point for triangulation and TPS. */
export const DUPLICATE_POINT_EPSILON = 1e-9;

/** Slack on barycentric weights for the point-in-triangle test (points on edges count as inside). */
export const BARYCENTRIC_EPSILON = 1e-9;

/** Super-triangle size as a multiple of the point cloud's extent. */
export const SUPER_TRIANGLE_SCALE = 1000;

export interface TransformSettings {
    /** TPS regularization; 0 = exact interpolation */
    lambda: number;
    /** Try the thin-plate spline before the affine + Delaunay fallback */
    useThinPlateSpline: boolean;
    /** Queries within this source distance of a reference point snap to its target */
    snapTolerance: number;
    /** Name similarity a candidate needs to count toward a unique match */
    uniqueMatchThreshold: number;
    /** Name similarity a pair needs to be considered when resolving repeated names */
    candidateMatchThreshold: number;
    /** Best candidate similarity that wins over other candidates... */
    dominantMatchThreshold: number;
    /** ...provided it leads the runner-up by more than this */
    dominantMatchMargin: number;
}

export const DEFAULT_TRANSFORM_SETTINGS: TransformSettings = {
    lambda: 0,
    useThinPlateSpline: true,
    snapTolerance: 1e-9,
    uniqueMatchThreshold: 0.5,
    candidateMatchThreshold: 0.3,
    dominantMatchThreshold: 0.9,
    dominantMatchMargin: 0.2,
};
