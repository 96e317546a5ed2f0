import type { TransformError } from '@/types';

export interface NormalizedTransformError {
    message: string;
    code?: string;
}

const isTransformError = (error: unknown): error is TransformError => {
    if (!error || typeof error !== 'object') {
        return false;
    }
    const candidate = error as Partial<TransformError>;
    return (
        (candidate.kind === 'insufficient-reference-points' || candidate.kind === 'degenerate-geometry') &&
        typeof candidate.message === 'string'
    );
};

/**
 * User-facing text for a failed transform. Both kinds mean the caller has to
 * supply more or better reference points; retrying with the same input is pointless.
 */
export const describeTransformError = (error: TransformError): string => {
    switch (error.kind) {
        case 'insufficient-reference-points':
            return `At least 3 reference points are required to calculate the transform (have ${error.referencePointCount}).`;
        case 'degenerate-geometry':
            return 'Failed to calculate the transform. Reference points may be collinear or duplicated.';
        default:
            return 'Could not compute transform.';
    }
};

/**
 * Flatten whatever a caller-side collaborator threw (marker API, storage...) into
 * a message + optional code.
 */
export const normalizeTransformError = (error: unknown): NormalizedTransformError => {
    if (isTransformError(error)) {
        return { message: describeTransformError(error), code: error.kind };
    }
    if (error instanceof Error) {
        return { message: error.message };
    }
    if (typeof error === 'string' && error.length > 0) {
        return { message: error };
    }
    return { message: 'Could not compute transform' };
};
