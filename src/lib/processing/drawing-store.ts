/**
 * In-memory drawing. The matching pass only ever sees snapshots; marker
 * mutations come back as one batch and are applied all-or-nothing.
 */

import type { DrawingSnapshot, Marker, MarkerMutation, Primitive, Zone } from '@/types';
import { ErrorCode, failWith } from '../errors/types';
import { logger } from '../logger';

export interface MutationSummary {
    added: number;
    removed: number;
}

export class InMemoryDrawing {
    private primitives: Primitive[];
    private zones: Zone[];
    private markers: Marker[];

    constructor(initial: DrawingSnapshot) {
        this.primitives = structuredClone(initial.primitives);
        this.zones = structuredClone(initial.zones);
        this.markers = structuredClone(initial.markers);
    }

    snapshot(): DrawingSnapshot {
        return {
            primitives: structuredClone(this.primitives),
            zones: structuredClone(this.zones),
            markers: structuredClone(this.markers)
        };
    }

    get markerCount(): number {
        return this.markers.length;
    }

    /**
     * Every removal must name a marker that exists at that point in the batch,
     * and an addition must not reuse a live marker id. A rejected batch leaves
     * the drawing untouched.
     */
    applyMutations(batch: MarkerMutation[]): MutationSummary {
        const working = new Map(this.markers.map(m => [m.id, m]));
        const summary: MutationSummary = { added: 0, removed: 0 };

        batch.forEach((mutation, index) => {
            if (mutation.type === 'add-marker') {
                if (working.has(mutation.marker.id)) {
                    throw failWith(ErrorCode.DRAWING_MUTATION_REJECTED, `Marker ${mutation.marker.id} already exists`, { index });
                }
                working.set(mutation.marker.id, structuredClone(mutation.marker));
                summary.added++;
            } else {
                if (!working.delete(mutation.markerId)) {
                    throw failWith(ErrorCode.DRAWING_MUTATION_REJECTED, `Marker ${mutation.markerId} does not exist`, { index });
                }
                summary.removed++;
            }
        });

        this.markers = [...working.values()];
        logger.info(`[Drawing] Applied ${batch.length} mutation(s)`, { ...summary });
        return summary;
    }
}
