/**
 * Marker Matching
 *
 * Pairs markers from the external map API (SVG space) with curated local
 * markers (world space). Matched pairs become the reference points the
 * transform engine is fitted from.
 *
 * Two phases:
 * 1. Unique matches: within each marker type, a local marker whose name has a
 *    single convincing API counterpart.
 * 2. Repeated names (several "Exfil", "Lever"...): pairs above a looser
 *    similarity bar are assigned greedily, nearest-first under a provisional
 *    affine map fitted from phase 1 when it produced at least 3 matches,
 *    otherwise most-similar-first.
 */

import {
    DEFAULT_TRANSFORM_SETTINGS,
    MIN_REFERENCE_POINTS,
    type TransformSettings,
} from '@/constants/transform';
import { createLogger, type Logger } from '@/services/logStore';
import { applyAffine, estimateAffine } from '@/services/transform';
import type {
    AffineParameters,
    ApiMarker,
    FloorConfig,
    LocalMarker,
    MarkerMatch,
    MarkerType,
    ReferencePoint,
} from '@/types';

export type MatchingThresholds = Pick<
    TransformSettings,
    'uniqueMatchThreshold' | 'candidateMatchThreshold' | 'dominantMatchThreshold' | 'dominantMatchMargin'
>;

export interface AutoMatchOptions extends Partial<MatchingThresholds> {
    logger?: Logger;
}

type PositionedApiMarker = ApiMarker & { position: { x: number; y: number } };

interface CandidatePair {
    local: LocalMarker;
    api: PositionedApiMarker;
    similarity: number;
}

const hasPosition = (marker: ApiMarker): marker is PositionedApiMarker => marker.position !== null;

// =============================================================================
// NAME SIMILARITY
// =============================================================================

export const normalizeMarkerName = (name: string): string =>
    name.toLowerCase().replace(/[ \-_'"]/g, '');

export function levenshteinDistance(a: string, b: string): number {
    const m = a.length;
    const n = b.length;
    let previous = Array.from({ length: n + 1 }, (_, j) => j);
    for (let i = 1; i <= m; i += 1) {
        const current = [i];
        for (let j = 1; j <= n; j += 1) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
        }
        previous = current;
    }
    return previous[n];
}

/**
 * Similarity in [0, 1]:
 * - 1 for identical normalized names
 * - 0.8 when one contains the other
 * - 1 - levenshtein / longer length otherwise
 */
export function calculateNameSimilarity(name1: string, name2: string): number {
    if (!name1 || !name2) {
        return 0;
    }
    const n1 = normalizeMarkerName(name1);
    const n2 = normalizeMarkerName(name2);
    if (n1 === n2) {
        return 1;
    }
    if (n1.length === 0 || n2.length === 0) {
        return 0;
    }
    if (n1.includes(n2) || n2.includes(n1)) {
        return 0.8;
    }
    return 1 - levenshteinDistance(n1, n2) / Math.max(n1.length, n2.length);
}

// =============================================================================
// AUTO MATCH
// =============================================================================

const groupByType = <T>(items: readonly T[], typeOf: (item: T) => MarkerType | null): Map<MarkerType, T[]> => {
    const groups = new Map<MarkerType, T[]>();
    for (const item of items) {
        const type = typeOf(item);
        if (type === null) {
            continue;
        }
        const group = groups.get(type);
        if (group) {
            group.push(item);
        } else {
            groups.set(type, [item]);
        }
    }
    return groups;
};

const createMatch = (
    pair: CandidatePair,
    distanceError: number | null = null,
): MarkerMatch => ({
    local: pair.local,
    api: pair.api,
    nameSimilarity: pair.similarity,
    distanceError,
    isReferencePoint: false,
    isManualMatch: false,
});

function findUniqueMatches(
    localMarkers: readonly LocalMarker[],
    apiMarkers: readonly PositionedApiMarker[],
    thresholds: MatchingThresholds,
): MarkerMatch[] {
    const results: MarkerMatch[] = [];
    const usedApi = new Set<string>();
    const apiByType = groupByType(apiMarkers, (m) => m.markerType);

    for (const [markerType, localGroup] of groupByType(localMarkers, (m) => m.markerType)) {
        const apiGroup = apiByType.get(markerType);
        if (!apiGroup) {
            continue;
        }
        for (const local of localGroup) {
            const candidates = apiGroup
                .filter((api) => !usedApi.has(api.uid))
                .map((api) => ({ local, api, similarity: calculateNameSimilarity(local.name, api.name) }))
                .filter((c) => c.similarity > thresholds.uniqueMatchThreshold)
                .sort((a, b) => b.similarity - a.similarity);

            const [best, runnerUp] = candidates;
            const isUnique =
                candidates.length === 1 ||
                (candidates.length > 1 &&
                    best.similarity > thresholds.dominantMatchThreshold &&
                    best.similarity - runnerUp.similarity > thresholds.dominantMatchMargin);
            if (isUnique) {
                results.push(createMatch(best));
                usedApi.add(best.api.uid);
            }
        }
    }
    return results;
}

function matchByDistance(pairs: readonly CandidatePair[], transform: AffineParameters): MarkerMatch[] {
    const withDistance = pairs
        .map((pair) => {
            const predicted = applyAffine(transform, pair.api.position.x, pair.api.position.y);
            return { pair, distance: Math.hypot(predicted.x - pair.local.x, predicted.y - pair.local.z) };
        })
        .sort((a, b) => a.distance - b.distance);

    const usedApi = new Set<string>();
    const usedLocal = new Set<string>();
    const results: MarkerMatch[] = [];
    for (const { pair, distance } of withDistance) {
        if (usedApi.has(pair.api.uid) || usedLocal.has(pair.local.id)) {
            continue;
        }
        results.push(createMatch(pair, distance));
        usedApi.add(pair.api.uid);
        usedLocal.add(pair.local.id);
    }
    return results;
}

function matchBySimilarity(pairs: readonly CandidatePair[]): MarkerMatch[] {
    const ordered = [...pairs].sort((a, b) => b.similarity - a.similarity);
    const usedApi = new Set<string>();
    const usedLocal = new Set<string>();
    const results: MarkerMatch[] = [];
    for (const pair of ordered) {
        if (usedApi.has(pair.api.uid) || usedLocal.has(pair.local.id)) {
            continue;
        }
        results.push(createMatch(pair));
        usedApi.add(pair.api.uid);
        usedLocal.add(pair.local.id);
    }
    return results;
}

export const matchToReferencePoint = (match: MarkerMatch): ReferencePoint | null =>
    match.api.position
        ? {
              sourceX: match.api.position.x,
              sourceY: match.api.position.y,
              targetX: match.local.x,
              targetY: match.local.z,
          }
        : null;

/**
 * Automatically pair local and API markers. API markers without a position or
 * marker type are never matched. Returned matches are not yet reference points;
 * the caller decides which ones to use.
 */
export function autoMatch(
    localMarkers: readonly LocalMarker[],
    apiMarkers: readonly ApiMarker[],
    options: AutoMatchOptions = {},
): MarkerMatch[] {
    const log = options.logger ?? createLogger('MarkerMatching');
    const thresholds: MatchingThresholds = {
        uniqueMatchThreshold: options.uniqueMatchThreshold ?? DEFAULT_TRANSFORM_SETTINGS.uniqueMatchThreshold,
        candidateMatchThreshold:
            options.candidateMatchThreshold ?? DEFAULT_TRANSFORM_SETTINGS.candidateMatchThreshold,
        dominantMatchThreshold:
            options.dominantMatchThreshold ?? DEFAULT_TRANSFORM_SETTINGS.dominantMatchThreshold,
        dominantMatchMargin: options.dominantMatchMargin ?? DEFAULT_TRANSFORM_SETTINGS.dominantMatchMargin,
    };
    const positioned = apiMarkers.filter(hasPosition);

    const results = findUniqueMatches(localMarkers, positioned, thresholds);
    const usedApi = new Set(results.map((m) => m.api.uid));
    const usedLocal = new Set(results.map((m) => m.local.id));

    let provisional: AffineParameters | null = null;
    if (results.length >= MIN_REFERENCE_POINTS) {
        const referencePoints = results
            .map(matchToReferencePoint)
            .filter((p): p is ReferencePoint => p !== null);
        provisional = estimateAffine(referencePoints);
    }
    log.debug(
        `Unique matches: ${results.length}, provisional transform ${provisional ? 'available' : 'unavailable'}`,
    );

    const remainingLocal = localMarkers.filter((m) => !usedLocal.has(m.id));
    const remainingApi = positioned.filter((m) => !usedApi.has(m.uid));
    const apiByType = groupByType(remainingApi, (m) => m.markerType);

    for (const [markerType, localGroup] of groupByType(remainingLocal, (m) => m.markerType)) {
        const apiGroup = apiByType.get(markerType);
        if (!apiGroup) {
            continue;
        }

        const pairs: CandidatePair[] = [];
        for (const local of localGroup) {
            for (const api of apiGroup) {
                const similarity = calculateNameSimilarity(local.name, api.name);
                if (similarity > thresholds.candidateMatchThreshold) {
                    pairs.push({ local, api, similarity });
                }
            }
        }
        if (pairs.length === 0) {
            continue;
        }

        const matches = provisional ? matchByDistance(pairs, provisional) : matchBySimilarity(pairs);
        for (const match of matches) {
            results.push(match);
            usedApi.add(match.api.uid);
            usedLocal.add(match.local.id);
        }
    }

    log.info(`Auto-matched ${results.length} markers`);
    return results;
}

// =============================================================================
// FLOORS
// =============================================================================

/**
 * Resolve an API floor level to a local floor layer id.
 *
 * Level 1 is the main floor (order 0); level <= 0 maps to the first basement,
 * level n > 1 to the floor with order n - 1. Falls back to the nearest end of
 * the floor list when no floor has the wanted order.
 */
export function mapLevelToFloorId(
    level: number | null | undefined,
    floors: readonly FloorConfig[] | null | undefined,
): string | null {
    if (!floors || floors.length === 0) {
        return null;
    }
    if (level === null || level === undefined) {
        return floors.find((f) => f.isDefault)?.layerId ?? 'main';
    }

    const sorted = [...floors].sort((a, b) => a.order - b.order);
    if (level <= 0) {
        return (sorted.find((f) => f.order < 0) ?? sorted[0]).layerId;
    }
    if (level === 1) {
        return sorted.find((f) => f.order === 0)?.layerId ?? 'main';
    }
    return (sorted.find((f) => f.order === level - 1) ?? sorted[sorted.length - 1]).layerId;
}
