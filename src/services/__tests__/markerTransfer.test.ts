// @vitest-environment node
import { describe, it, expect } from 'vitest';

import { silentLogger } from '@/services/logStore';
import type { ApiMarker, FloorConfig, LocalMarker, MarkerMatch } from '@/types';

import { buildReferencePoints, transferMarkers, type WorldPosition } from '../markerTransfer';

const local = (id: string, name: string, x: number, z: number): LocalMarker => ({
    id,
    name,
    markerType: 'pmc-extraction',
    x,
    z,
    floorId: 'ground',
});

const api = (
    uid: string,
    name: string,
    position: { x: number; y: number } | null,
    level: number | null = null,
): ApiMarker => ({ uid, name, markerType: 'pmc-extraction', position, level });

const match = (l: LocalMarker, a: ApiMarker, isReferencePoint = true): MarkerMatch => ({
    local: l,
    api: a,
    nameSimilarity: 1,
    distanceError: null,
    isReferencePoint,
    isManualMatch: false,
});

const floors: FloorConfig[] = [
    { layerId: 'basement', order: -1, isDefault: false },
    { layerId: 'ground', order: 0, isDefault: true },
    { layerId: 'second', order: 1, isDefault: false },
];

// world = 2 * (svg - 10)
const crossroads = api('A1', 'Crossroads', { x: 10, y: 10 });
const trailerPark = api('A2', 'Trailer Park', { x: 60, y: 10 });
const outskirts = api('A3', 'Outskirts', { x: 10, y: 60 });
const lever = api('A6', 'Lever', { x: 35, y: 35 }, 2);
const hidden = api('A7', 'Hidden Stash', null, 1);

const matches = [
    match(local('L1', 'Crossroads', 0, 0), crossroads),
    match(local('L2', 'Trailer Park', 100, 0), trailerPark),
    match(local('L3', 'Outskirts', 0, 100), outskirts),
];

describe('markerTransfer', () => {
    describe('buildReferencePoints', () => {
        it('uses reference matches with a position and applies overrides', () => {
            const overrides = new Map<string, WorldPosition>([['L2', { x: 101, z: 2 }]]);
            const points = buildReferencePoints(
                [
                    ...matches,
                    match(local('L8', 'Unused', 5, 5), api('A8', 'Unused', { x: 1, y: 1 }), false),
                    match(local('L9', 'Nowhere', 5, 5), api('A9', 'Nowhere', null)),
                ],
                overrides,
            );
            expect(points).toEqual([
                { sourceX: 10, sourceY: 10, targetX: 0, targetY: 0 },
                { sourceX: 60, sourceY: 10, targetX: 101, targetY: 2 },
                { sourceX: 10, sourceY: 60, targetX: 0, targetY: 100 },
            ]);
        });
    });

    describe('transferMarkers', () => {
        it('snaps matched markers and transforms the rest', () => {
            const result = transferMarkers([crossroads, lever, trailerPark, hidden, outskirts], matches, {
                floors,
                logger: silentLogger,
            });
            expect(result.kind).toBe('success');
            if (result.kind !== 'success') return;

            expect(result.model.method).toBe('thin-plate-spline');
            expect(result.skipped).toEqual(['A7']);
            expect(result.placed.map((p) => p.uid)).toEqual(['A1', 'A6', 'A2', 'A3']);

            expect(result.placed[0]).toEqual({
                uid: 'A1',
                name: 'Crossroads',
                x: 0,
                z: 0,
                floorId: 'ground',
                placement: 'snapped',
                matchedLocalId: 'L1',
            });

            const placedLever = result.placed[1];
            expect(placedLever.placement).toBe('transformed');
            expect(placedLever.matchedLocalId).toBeNull();
            expect(placedLever.floorId).toBe('second');
            expect(placedLever.x).toBeCloseTo(50, 9);
            expect(placedLever.z).toBeCloseTo(50, 9);
        });

        it('reports the unsnapped error of every match', () => {
            const result = transferMarkers([crossroads], matches, { logger: silentLogger });
            if (result.kind !== 'success') throw new Error('transfer failed');
            expect(result.matchErrors.map((e) => e.localId)).toEqual(['L1', 'L2', 'L3']);
            result.matchErrors.forEach((e) => expect(e.error).toBeLessThan(1e-9));
        });

        it('places matched markers at overridden positions', () => {
            const result = transferMarkers([crossroads, trailerPark], matches, {
                positionOverrides: new Map([['L1', { x: 2, z: 4 }]]),
                logger: silentLogger,
            });
            if (result.kind !== 'success') throw new Error('transfer failed');
            expect(result.placed[0]).toMatchObject({ uid: 'A1', x: 2, z: 4, placement: 'snapped' });
            expect(result.placed[1]).toMatchObject({ uid: 'A2', x: 100, z: 0, placement: 'snapped' });
        });

        it('leaves the floor unset without a floor list', () => {
            const result = transferMarkers([lever], matches, { logger: silentLogger });
            if (result.kind !== 'success') throw new Error('transfer failed');
            expect(result.placed[0].floorId).toBeNull();
        });

        it('fails with fewer than three usable reference points', () => {
            const result = transferMarkers(
                [crossroads, lever],
                [matches[0], matches[1], match(local('L3', 'Outskirts', 0, 100), outskirts, false)],
                { logger: silentLogger },
            );
            expect(result).toEqual({
                kind: 'failure',
                error: {
                    kind: 'insufficient-reference-points',
                    message: 'At least 3 reference points are required, got 2.',
                    referencePointCount: 2,
                },
            });
        });

        it('passes transform failures through', () => {
            const result = transferMarkers(
                [crossroads],
                [
                    match(local('L1', 'A', 0, 0), api('A1', 'A', { x: 0, y: 0 })),
                    match(local('L2', 'B', 10, 10), api('A2', 'B', { x: 1, y: 1 })),
                    match(local('L3', 'C', 20, 20), api('A3', 'C', { x: 2, y: 2 })),
                ],
                { logger: silentLogger },
            );
            expect(result.kind === 'failure' && result.error.kind).toBe('degenerate-geometry');
        });
    });
});
