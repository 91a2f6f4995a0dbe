// Primitive builders shared by the processing tests

import type {
    BoundingBox,
    CirclePrimitive,
    FilledShapePrimitive,
    LinePrimitive,
    PolylinePrimitive,
    Tag,
    TextPrimitive,
    Zone
} from '@/types';

export const DEVICE_LAYER = 'VALVES';

export function box(x1: number, y1: number, x2: number, y2: number): BoundingBox {
    return {
        min: { x: Math.min(x1, x2), y: Math.min(y1, y2) },
        max: { x: Math.max(x1, x2), y: Math.max(y1, y2) }
    };
}

export function line(id: string, x1: number, y1: number, x2: number, y2: number, layer = DEVICE_LAYER): LinePrimitive {
    return { id, kind: 'line', layer, length: Math.hypot(x2 - x1, y2 - y1), bbox: box(x1, y1, x2, y2) };
}

export function circle(id: string, cx: number, cy: number, radius: number, layer = DEVICE_LAYER): CirclePrimitive {
    return { id, kind: 'circle', layer, radius, bbox: box(cx - radius, cy - radius, cx + radius, cy + radius) };
}

// Closed triangle inscribed in a square of side 2 * half around (cx, cy)
export function triangle(id: string, cx: number, cy: number, half = 2, layer = DEVICE_LAYER): PolylinePrimitive {
    return { id, kind: 'polyline', layer, closed: true, vertexCount: 3, bbox: box(cx - half, cy - half, cx + half, cy + half) };
}

export function solid(id: string, cx: number, cy: number, half = 1, layer = DEVICE_LAYER): FilledShapePrimitive {
    return { id, kind: 'filledShape', layer, bbox: box(cx - half, cy - half, cx + half, cy + half) };
}

export function text(id: string, value: string, x: number, y: number, layer = 'TAGS'): TextPrimitive {
    return { id, kind: 'text', layer, value, position: { x, y }, bbox: box(x, y, x, y) };
}

export function tag(value: string, x: number, y: number): Tag {
    return { value, position: { x, y } };
}

export function zone(id: string, x1: number, y1: number, x2: number, y2: number, facility = 'PLANT-A', subFacility = 'UNIT-100'): Zone {
    return { id, bbox: box(x1, y1, x2, y2), metadata: { facility, subFacility } };
}
