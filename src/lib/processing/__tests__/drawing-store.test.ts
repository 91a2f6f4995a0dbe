import type { Marker } from '@/types';
import { ErrorCode, isMatcherError } from '../../errors/types';
import { InMemoryDrawing } from '../drawing-store';
import { triangle } from './helpers';

function markerAt(id: string, x: number, y: number): Marker {
    return { id, kind: 'problem-marker', center: { x, y }, size: 7, layer: 'DEVICE_MARKER' };
}

describe('InMemoryDrawing', () => {
    it('should hand out copies, not live state', () => {
        const drawing = new InMemoryDrawing({ primitives: [triangle('p1', 0, 0)], zones: [], markers: [markerAt('m1', 0, 0)] });

        const snapshot = drawing.snapshot();
        snapshot.markers.pop();
        snapshot.primitives[0].layer = 'CHANGED';

        expect(drawing.snapshot().markers).toHaveLength(1);
        expect(drawing.snapshot().primitives[0].layer).toBe('VALVES');
    });

    it('should apply a valid batch', () => {
        const drawing = new InMemoryDrawing({ primitives: [], zones: [], markers: [markerAt('m1', 0, 0)] });

        const summary = drawing.applyMutations([
            { type: 'remove-marker', markerId: 'm1' },
            { type: 'add-marker', marker: markerAt('m2', 5, 5) }
        ]);

        expect(summary).toEqual({ added: 1, removed: 1 });
        expect(drawing.snapshot().markers.map(m => m.id)).toEqual(['m2']);
    });

    it('should reject the whole batch when one removal is unknown', () => {
        const drawing = new InMemoryDrawing({ primitives: [], zones: [], markers: [markerAt('m1', 0, 0)] });

        let caught: unknown;
        try {
            drawing.applyMutations([
                { type: 'add-marker', marker: markerAt('m2', 5, 5) },
                { type: 'remove-marker', markerId: 'missing' }
            ]);
        } catch (e) {
            caught = e;
        }

        expect(isMatcherError(caught, ErrorCode.DRAWING_MUTATION_REJECTED)).toBe(true);
        expect(drawing.snapshot().markers.map(m => m.id)).toEqual(['m1']);
    });

    it('should reject an addition that reuses a live id', () => {
        const drawing = new InMemoryDrawing({ primitives: [], zones: [], markers: [markerAt('m1', 0, 0)] });

        expect(() => drawing.applyMutations([{ type: 'add-marker', marker: markerAt('m1', 9, 9) }])).toThrow('Marker m1 already exists');
        expect(drawing.markerCount).toBe(1);
    });
});
