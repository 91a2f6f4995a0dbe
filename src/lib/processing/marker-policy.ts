/**
 * Marker Policy
 *
 * Per tag position, a problem marker is either absent (unmarked) or present
 * (flagged). Unresolved tags get one marker, resolved tags lose theirs, and
 * repeated passes over the same geometry change nothing.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Marker, MarkerMutation, Point, Tag } from '@/types';
import { distance } from './geometry-extents';

export type MarkerState = 'unmarked' | 'flagged';

export type MarkerTransition = 'flag' | 'clear' | 'keep-flagged' | 'keep-clear';

export interface MarkerOptions {
    layer: string;
    size: number; // side of the square
    locationTolerance: number; // marker center to tag position, exclusive
}

export interface MarkerDecision {
    state: MarkerState;
    transition: MarkerTransition;
    mutation?: MarkerMutation;
}

export const DEFAULT_MARKER_OPTIONS: MarkerOptions = {
    layer: 'DEVICE_MARKER',
    size: 7,
    locationTolerance: 1
};

export function findMarkerNear(markers: Marker[], position: Point, tolerance: number): Marker | undefined {
    return markers.find(m => m.kind === 'problem-marker' && distance(m.center, position) < tolerance);
}

export function createMarker(tag: Tag, options: MarkerOptions): Marker {
    return {
        id: uuidv4(),
        kind: 'problem-marker',
        center: { ...tag.position },
        size: options.size,
        layer: options.layer,
        tagValue: tag.value
    };
}

/**
 * Corners of the marker square, counter-clockwise from the lower left.
 */
export function markerOutline(marker: Marker): Point[] {
    const half = marker.size / 2;
    const { x, y } = marker.center;
    return [
        { x: x - half, y: y - half },
        { x: x + half, y: y - half },
        { x: x + half, y: y + half },
        { x: x - half, y: y + half }
    ];
}

export function planMarkerUpdate(tag: Tag, resolved: boolean, markers: Marker[], options: MarkerOptions): MarkerDecision {
    const existing = findMarkerNear(markers, tag.position, options.locationTolerance);

    if (resolved) {
        if (!existing) return { state: 'unmarked', transition: 'keep-clear' };
        return {
            state: 'unmarked',
            transition: 'clear',
            mutation: { type: 'remove-marker', markerId: existing.id }
        };
    }

    if (existing) return { state: 'flagged', transition: 'keep-flagged' };
    return {
        state: 'flagged',
        transition: 'flag',
        mutation: { type: 'add-marker', marker: createMarker(tag, options) }
    };
}

/**
 * Marker list as it will look once the mutations are applied.
 */
export function applyMarkerMutations(markers: Marker[], mutations: MarkerMutation[]): Marker[] {
    let next = [...markers];
    for (const mutation of mutations) {
        if (mutation.type === 'add-marker') {
            next.push(mutation.marker);
        } else {
            next = next.filter(m => m.id !== mutation.markerId);
        }
    }
    return next;
}
