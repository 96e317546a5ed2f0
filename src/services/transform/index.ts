/**
 * Transform engine re-exports
 */

export {
    // Functions
    estimateAffine,
    applyAffine,
    computeAffineResiduals,
    computeAffineMeanError,
    hasNonCollinearSpread,
} from './math/affineEstimator';

export {
    // Types
    type BarycentricWeights,
    type TriangleLocation,
    // Functions
    computeBarycentricWeights,
    isInsideWeights,
    locateTriangle,
    applyWeights,
    interpolate,
} from './math/barycentric';

export { triangulate, dedupeReferencePoints, inCircumcircle } from './math/delaunay';

export { solveLinearSystem } from './math/linearSystem';

export {
    NORMALIZED_MAD_FACTOR,
    DEFAULT_OUTLIER_MAD_THRESHOLD,
    RESIDUAL_NOISE_FLOOR,
    computeMedian,
    computeMAD,
    detectOutliers,
    summarizeResiduals,
} from './math/residualStatistics';

export {
    type ThinPlateSplineOptions,
    ThinPlateSplineModel,
    fitThinPlateSpline,
    tpsBasis,
} from './math/thinPlateSpline';

export {
    type TransformModel,
    type TransformOptions,
    type TransformResult,
    computeTransform,
    findSnapTarget,
} from './transformSelector';
