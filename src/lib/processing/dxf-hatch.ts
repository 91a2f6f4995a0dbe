/**
 * HATCH reader
 *
 * dxf-parser skips HATCH entities, so their boundary outlines are read here
 * straight from the group codes of the ENTITIES section. The result has the
 * raw entity shape `toPrimitive` expects.
 */

import type { Point } from '@/types';

export interface RawHatchEntity {
    type: 'HATCH';
    handle?: string;
    layer?: string;
    boundaries: Array<{ vertices: Point[] }>;
}

interface GroupPair {
    code: number;
    value: string;
}

const EDGE_ARC = 2;
const EDGE_ELLIPSE = 3;
const PATH_POLYLINE = 2; // bit of code 92

function readGroupPairs(content: string): GroupPair[] {
    const lines = content.split('\n');
    const pairs: GroupPair[] = [];

    for (let i = 0; i + 1 < lines.length; i += 2) {
        const code = parseInt(lines[i].trim(), 10);
        if (isNaN(code)) break;
        pairs.push({ code, value: lines[i + 1].trim() });
    }
    return pairs;
}

/**
 * Boundary points of one HATCH: polyline path vertices, line edge ends, and
 * the extents of arc and ellipse edges. The elevation point before the paths
 * and the seed points after them are not part of the outline.
 */
function parseHatch(pairs: GroupPair[]): RawHatchEntity {
    const hatch: RawHatchEntity = { type: 'HATCH', boundaries: [] };

    let inBoundary = false;
    let done = false;
    let path: Point[] = [];
    let isPolylinePath = false;
    let edgeType = 0;
    let x10 = NaN;
    let x11 = NaN;
    let center: Point | null = null;

    const pushExtents = (c: Point, r: number) => {
        path.push({ x: c.x - r, y: c.y - r }, { x: c.x + r, y: c.y + r });
    };

    for (const { code, value } of pairs) {
        if (!inBoundary) {
            if (code === 5) hatch.handle = value;
            else if (code === 8) hatch.layer = value;
            else if (code === 91 && !done) inBoundary = true;
            continue;
        }

        const num = parseFloat(value);
        switch (code) {
            case 92:
                path = [];
                hatch.boundaries.push({ vertices: path });
                isPolylinePath = (parseInt(value, 10) & PATH_POLYLINE) !== 0;
                edgeType = 0;
                break;
            case 72:
                // On polyline paths this is the bulge flag
                if (!isPolylinePath) edgeType = parseInt(value, 10);
                break;
            case 10:
                x10 = num;
                break;
            case 20:
                if (!isNaN(x10) && !isNaN(num)) {
                    center = { x: x10, y: num };
                    path.push(center);
                }
                x10 = NaN;
                break;
            case 11:
                x11 = num;
                break;
            case 21:
                if (!isNaN(x11) && !isNaN(num)) {
                    // Ellipse major axis end is relative to the center
                    if (edgeType === EDGE_ELLIPSE && center) pushExtents(center, Math.hypot(x11, num));
                    else path.push({ x: x11, y: num });
                }
                x11 = NaN;
                break;
            case 40:
                if (!isPolylinePath && edgeType === EDGE_ARC && center && !isNaN(num)) pushExtents(center, num);
                break;
            case 75:
                inBoundary = false;
                done = true;
                break;
        }
    }

    return hatch;
}

/**
 * Every HATCH of the ENTITIES section, in drawing order.
 */
export function extractHatchEntities(content: string): RawHatchEntity[] {
    const hatches: RawHatchEntity[] = [];
    let section = '';
    let expectSectionName = false;
    let current: GroupPair[] | null = null;

    const flush = () => {
        if (current) hatches.push(parseHatch(current));
        current = null;
    };

    for (const pair of readGroupPairs(content)) {
        if (pair.code === 0) {
            flush();
            if (pair.value === 'SECTION') expectSectionName = true;
            else if (pair.value === 'ENDSEC') section = '';
            else if (section === 'ENTITIES' && pair.value === 'HATCH') current = [];
            continue;
        }
        if (expectSectionName && pair.code === 2) {
            section = pair.value;
            expectSectionName = false;
            continue;
        }
        if (current) current.push(pair);
    }
    flush();

    return hatches;
}
