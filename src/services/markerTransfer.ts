import { MIN_REFERENCE_POINTS } from '@/constants/transform';
import { createLogger } from '@/services/logStore';
import { mapLevelToFloorId } from '@/services/markerMatching';
import {
    applyAffine,
    computeTransform,
    type TransformModel,
    type TransformOptions,
} from '@/services/transform';
import type { ApiMarker, FloorConfig, MarkerMatch, ReferencePoint, TransformError } from '@/types';

export interface WorldPosition {
    x: number;
    z: number;
}

export interface PlacedMarker {
    uid: string;
    name: string;
    x: number;
    z: number;
    floorId: string | null;
    /** snapped = copied from the matched local marker; transformed = mapped from SVG space */
    placement: 'snapped' | 'transformed';
    matchedLocalId: string | null;
}

export interface MatchTransformError {
    localId: string;
    name: string;
    /** World distance between the unsnapped transform output and the local position */
    error: number;
}

export interface TransferOptions extends TransformOptions {
    floors?: readonly FloorConfig[];
    /** Local positions edited by the user, keyed by local marker id; win over the stored ones */
    positionOverrides?: ReadonlyMap<string, WorldPosition>;
}

export type TransferResult =
    | {
          kind: 'success';
          model: TransformModel;
          placed: PlacedMarker[];
          /** uids of API markers without a position */
          skipped: string[];
          matchErrors: MatchTransformError[];
      }
    | { kind: 'failure'; error: TransformError };

const resolveLocalPosition = (
    match: MarkerMatch,
    overrides: ReadonlyMap<string, WorldPosition> | undefined,
): WorldPosition => overrides?.get(match.local.id) ?? { x: match.local.x, z: match.local.z };

/**
 * Reference pairs from the matches flagged as reference points that have an SVG position.
 */
export function buildReferencePoints(
    matches: readonly MarkerMatch[],
    overrides?: ReadonlyMap<string, WorldPosition>,
): ReferencePoint[] {
    const points: ReferencePoint[] = [];
    for (const match of matches) {
        if (!match.isReferencePoint || !match.api.position) {
            continue;
        }
        const target = resolveLocalPosition(match, overrides);
        points.push({
            sourceX: match.api.position.x,
            sourceY: match.api.position.y,
            targetX: target.x,
            targetY: target.z,
        });
    }
    return points;
}

/** The active method's raw output, ignoring reference snapping. */
const predictUnsnapped = (model: TransformModel, x: number, y: number): { x: number; y: number } | null => {
    if (model.spline) {
        return model.spline.transform(x, y);
    }
    if (model.affine) {
        return applyAffine(model.affine, x, y);
    }
    return null;
};

/**
 * Fit a transform from the reference matches and place every API marker in world space.
 *
 * Matched markers take their local position (or override) and floor verbatim;
 * everything else is transformed and given a floor from its API level.
 */
export function transferMarkers(
    apiMarkers: readonly ApiMarker[],
    matches: readonly MarkerMatch[],
    options: TransferOptions = {},
): TransferResult {
    const log = options.logger ?? createLogger('MarkerTransfer');
    const referencePoints = buildReferencePoints(matches, options.positionOverrides);

    if (referencePoints.length < MIN_REFERENCE_POINTS) {
        log.warning(`Need ${MIN_REFERENCE_POINTS}+ reference points, have ${referencePoints.length}`);
        return {
            kind: 'failure',
            error: {
                kind: 'insufficient-reference-points',
                message: `At least ${MIN_REFERENCE_POINTS} reference points are required, got ${referencePoints.length}.`,
                referencePointCount: referencePoints.length,
            },
        };
    }

    const result = computeTransform(referencePoints, options);
    if (result.kind === 'failure') {
        return result;
    }
    const { model } = result;

    const matchByApiUid = new Map<string, MarkerMatch>();
    for (const match of matches) {
        if (!matchByApiUid.has(match.api.uid)) {
            matchByApiUid.set(match.api.uid, match);
        }
    }

    const placed: PlacedMarker[] = [];
    const skipped: string[] = [];
    for (const marker of apiMarkers) {
        if (!marker.position) {
            skipped.push(marker.uid);
            continue;
        }
        const match = matchByApiUid.get(marker.uid);
        if (match) {
            const position = resolveLocalPosition(match, options.positionOverrides);
            placed.push({
                uid: marker.uid,
                name: marker.name,
                x: position.x,
                z: position.z,
                floorId: match.local.floorId,
                placement: 'snapped',
                matchedLocalId: match.local.id,
            });
            continue;
        }
        const world = model.transform(marker.position.x, marker.position.y);
        placed.push({
            uid: marker.uid,
            name: marker.name,
            x: world.x,
            z: world.y,
            floorId: mapLevelToFloorId(marker.level, options.floors),
            placement: 'transformed',
            matchedLocalId: null,
        });
    }

    const matchErrors: MatchTransformError[] = [];
    for (const match of matches) {
        if (!match.api.position) {
            continue;
        }
        const predicted = predictUnsnapped(model, match.api.position.x, match.api.position.y);
        if (!predicted) {
            continue;
        }
        const target = resolveLocalPosition(match, options.positionOverrides);
        const error = Math.hypot(predicted.x - target.x, predicted.y - target.z);
        matchErrors.push({ localId: match.local.id, name: match.local.name, error });
        log.debug(`${match.local.name}: ${model.method} error=${error.toFixed(2)}, applied error=0 (snapped)`);
    }

    log.info(
        `Placed ${placed.length} markers (${model.method}, mean error ${model.meanError.toFixed(2)}), skipped ${skipped.length}`,
    );
    return { kind: 'success', model, placed, skipped, matchErrors };
}
