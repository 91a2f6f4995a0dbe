/**
 * Spatial Clustering
 *
 * Groups symbol primitives into connected components: two primitives are linked
 * when the gap between their bounding boxes is within the link tolerance.
 * The partition depends only on the candidate set, never on its order.
 */

import type { BoundingBox, Cluster, KindCounts, Point, SymbolPrimitive } from '@/types';
import { boxCenter, boxGap, isValidBox } from './geometry-extents';
import { logger } from '../logger';

type BoxedPrimitive = SymbolPrimitive & { bbox: BoundingBox };

export interface ClusteringResult {
    clusters: Cluster[];
    skipped: SymbolPrimitive[];
}

export function emptyKindCounts(): KindCounts {
    return { line: 0, circle: 0, arc: 0, polyline: 0, filledShape: 0, hatch: 0 };
}

function hasValidBox(primitive: SymbolPrimitive): primitive is BoxedPrimitive {
    return isValidBox(primitive.bbox);
}

function compareIds(a: { id: string }, b: { id: string }): number {
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Mean of the member box centers.
 */
export function clusterCentroid(primitives: SymbolPrimitive[]): Point {
    let sx = 0, sy = 0, n = 0;
    for (const primitive of primitives) {
        if (!isValidBox(primitive.bbox)) continue;
        const c = boxCenter(primitive.bbox);
        sx += c.x;
        sy += c.y;
        n++;
    }
    return n === 0 ? { x: 0, y: 0 } : { x: sx / n, y: sy / n };
}

export function kindSignature(primitives: SymbolPrimitive[]): KindCounts {
    const counts = emptyKindCounts();
    for (const primitive of primitives) {
        counts[primitive.kind]++;
    }
    return counts;
}

function toCluster(members: BoxedPrimitive[]): Cluster {
    const primitives = [...members].sort(compareIds);
    return {
        id: `cluster:${primitives[0].id}`,
        primitives,
        centroid: clusterCentroid(primitives),
        signature: kindSignature(primitives)
    };
}

/**
 * Breadth-first connected components over the proximity graph.
 * Members are sorted by id and clusters by their first member, so equal
 * candidate sets always produce identical output.
 */
export function buildClusters(candidates: SymbolPrimitive[], linkTolerance: number): ClusteringResult {
    const skipped: SymbolPrimitive[] = [];
    const nodes: BoxedPrimitive[] = [];

    for (const candidate of candidates) {
        if (hasValidBox(candidate)) {
            nodes.push(candidate);
        } else {
            skipped.push(candidate);
            logger.warn('[Clustering] Skipped primitive without valid extents', { id: candidate.id, kind: candidate.kind, layer: candidate.layer });
        }
    }

    const visited = new Set<number>();
    const clusters: Cluster[] = [];

    for (let start = 0; start < nodes.length; start++) {
        if (visited.has(start)) continue;

        const queue: number[] = [start];
        const members: BoxedPrimitive[] = [];
        visited.add(start);

        while (queue.length > 0) {
            const current = queue.shift();
            if (current === undefined) break;
            members.push(nodes[current]);

            for (let other = 0; other < nodes.length; other++) {
                if (visited.has(other)) continue;
                if (boxGap(nodes[current].bbox, nodes[other].bbox) <= linkTolerance) {
                    visited.add(other);
                    queue.push(other);
                }
            }
        }

        clusters.push(toCluster(members));
    }

    clusters.sort(compareIds);

    logger.debug(`[Clustering] ${nodes.length} primitives -> ${clusters.length} cluster(s)`, {
        linkTolerance,
        skipped: skipped.length
    });

    return { clusters, skipped };
}
