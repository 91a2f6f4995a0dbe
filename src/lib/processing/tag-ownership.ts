/**
 * Tag Ownership
 *
 * Decides which cluster, if any, a tag owns. A cluster belongs to the tag whose
 * position is nearest its centroid across the whole drawing, not merely to the
 * tag that found it; near-ties within the ambiguity tolerance still count.
 */

import type { BoundingBox, Cluster, Primitive, SymbolPrimitive, Tag } from '@/types';
import { boxCenter, distance, isValidBox } from './geometry-extents';
import { logger } from '../logger';

export interface CandidateOptions {
    allowedLayers: ReadonlySet<string>; // normalized with normalizeLayer
    proximityRadius: number;
}

export interface OwnershipOptions {
    ambiguityTolerance: number;
    ledger?: OwnershipLedger;
}

export interface OwnedCluster {
    cluster: Cluster;
    distance: number; // originating tag to centroid
}

export function normalizeLayer(layer: string): string {
    return layer.trim().toUpperCase();
}

export function isSymbolPrimitive(primitive: Primitive): primitive is SymbolPrimitive {
    return primitive.kind !== 'text';
}

/**
 * Symbol primitives on an allowed layer whose box center lies within the
 * proximity radius of the tag. Primitives without valid extents cannot be
 * measured and are left out.
 */
export function collectCandidates(primitives: Primitive[], tag: Tag, options: CandidateOptions): SymbolPrimitive[] {
    const candidates: SymbolPrimitive[] = [];

    for (const primitive of primitives) {
        if (!isSymbolPrimitive(primitive)) continue;
        const bbox: BoundingBox | null = primitive.bbox;
        if (!isValidBox(bbox)) continue;
        if (!options.allowedLayers.has(normalizeLayer(primitive.layer))) continue;

        if (distance(boxCenter(bbox), tag.position) <= options.proximityRadius) {
            candidates.push(primitive);
        }
    }

    return candidates;
}

/**
 * The originating tag owns the cluster when its distance to the centroid is
 * within the ambiguity tolerance of the nearest tag's distance.
 * No tags in the drawing means nobody owns anything.
 */
export function assignOwner(cluster: Cluster, originTag: Tag, allTags: Tag[], ambiguityTolerance: number): Tag | null {
    if (allTags.length === 0) return null;

    let minDist = Infinity;
    for (const tag of allTags) {
        const d = distance(tag.position, cluster.centroid);
        if (d < minDist) minDist = d;
    }

    const myDist = distance(originTag.position, cluster.centroid);
    return Math.abs(myDist - minDist) < ambiguityTolerance ? originTag : null;
}

/**
 * Records which primitives have been claimed during one pass so that no
 * cluster is handed to two tags.
 */
export class OwnershipLedger {
    private claimedBy = new Map<string, Tag>();

    isAvailable(cluster: Cluster): boolean {
        return cluster.primitives.every(p => !this.claimedBy.has(p.id));
    }

    claim(tag: Tag, cluster: Cluster): void {
        for (const primitive of cluster.primitives) {
            this.claimedBy.set(primitive.id, tag);
        }
    }

    ownerOf(primitiveId: string): Tag | undefined {
        return this.claimedBy.get(primitiveId);
    }

    get size(): number {
        return this.claimedBy.size;
    }
}

/**
 * Among the clusters the originating tag owns, keep the closest one.
 * With a ledger, clusters overlapping an earlier claim are not eligible and the
 * winner is claimed for this tag.
 */
export function resolveOwnedCluster(
    originTag: Tag,
    clusters: Cluster[],
    allTags: Tag[],
    options: OwnershipOptions
): OwnedCluster | null {
    let owned: OwnedCluster | null = null;

    for (const cluster of clusters) {
        if (options.ledger && !options.ledger.isAvailable(cluster)) {
            logger.debug(`[Ownership] ${cluster.id} already claimed, skipping for ${originTag.value}`);
            continue;
        }

        if (!assignOwner(cluster, originTag, allTags, options.ambiguityTolerance)) continue;

        const myDist = distance(originTag.position, cluster.centroid);
        if (!owned || myDist < owned.distance) {
            owned = { cluster, distance: myDist };
        }
    }

    if (owned && options.ledger) {
        options.ledger.claim(originTag, owned.cluster);
    }

    return owned;
}
