/**
 * Geometry Extents
 *
 * Axis-aligned bounding boxes, centers and box-to-box gaps for drawing
 * primitives. Every distance test in clustering and ownership goes through here.
 */

import type { BoundingBox, Point } from '@/types';

const TWO_PI = Math.PI * 2;

export function distance(p1: Point, p2: Point): number {
    const dx = p1.x - p2.x;
    const dy = p1.y - p2.y;
    return Math.sqrt(dx * dx + dy * dy);
}

export function isValidBox(bbox: BoundingBox | null | undefined): bbox is BoundingBox {
    if (!bbox) return false;
    const { min, max } = bbox;
    return isFinite(min.x) && isFinite(min.y) && isFinite(max.x) && isFinite(max.y) &&
        min.x <= max.x && min.y <= max.y;
}

export function boxCenter(bbox: BoundingBox): Point {
    return {
        x: (bbox.min.x + bbox.max.x) / 2,
        y: (bbox.min.y + bbox.max.y) / 2
    };
}

/**
 * Minimum gap between two boxes. Per-axis separation is clamped to zero when the
 * boxes overlap on that axis, then both axes are combined with the Euclidean norm.
 */
export function boxGap(a: BoundingBox, b: BoundingBox): number {
    const dx = Math.max(0, Math.max(a.min.x - b.max.x, b.min.x - a.max.x));
    const dy = Math.max(0, Math.max(a.min.y - b.max.y, b.min.y - a.max.y));
    return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Inclusive on every edge.
 */
export function containsPoint(bbox: BoundingBox, p: Point): boolean {
    return p.x >= bbox.min.x && p.x <= bbox.max.x &&
        p.y >= bbox.min.y && p.y <= bbox.max.y;
}

export function extentsOfPoints(points: Point[]): BoundingBox | null {
    let minX = Infinity, minY = Infinity;
    let maxX = -Infinity, maxY = -Infinity;
    let validPoints = 0;

    for (const point of points) {
        if (!isFinite(point.x) || !isFinite(point.y)) continue;
        minX = Math.min(minX, point.x);
        maxX = Math.max(maxX, point.x);
        minY = Math.min(minY, point.y);
        maxY = Math.max(maxY, point.y);
        validPoints++;
    }

    if (validPoints === 0) return null;

    return {
        min: { x: minX, y: minY },
        max: { x: maxX, y: maxY }
    };
}

export function circleExtents(center: Point, radius: number): BoundingBox {
    return {
        min: { x: center.x - radius, y: center.y - radius },
        max: { x: center.x + radius, y: center.y + radius }
    };
}

function normalizeAngle(angle: number): number {
    const a = angle % TWO_PI;
    return a < 0 ? a + TWO_PI : a;
}

/**
 * Exact extents of a counter-clockwise arc: both endpoints plus every axis
 * crossing (0, 90, 180, 270 degrees) that falls inside the sweep.
 * Equal start and end angles describe a full circle.
 */
export function arcExtents(center: Point, radius: number, startAngle: number, endAngle: number): BoundingBox {
    const start = normalizeAngle(startAngle);
    const sweep = normalizeAngle(endAngle - startAngle);

    if (sweep === 0) return circleExtents(center, radius);

    const pointAt = (angle: number): Point => ({
        x: center.x + radius * Math.cos(angle),
        y: center.y + radius * Math.sin(angle)
    });

    const points: Point[] = [pointAt(startAngle), pointAt(endAngle)];

    for (let quadrant = 0; quadrant < 4; quadrant++) {
        const axisAngle = quadrant * (Math.PI / 2);
        if (normalizeAngle(axisAngle - start) <= sweep) {
            points.push(pointAt(axisAngle));
        }
    }

    // Two endpoints are always finite when center and radius are
    return extentsOfPoints(points) ?? circleExtents(center, radius);
}

/**
 * Get bounding box info for logging
 */
export function getBoundingBoxInfo(bbox: BoundingBox): {
    width: number;
    height: number;
    diagonal: number;
    center: Point;
} {
    const width = bbox.max.x - bbox.min.x;
    const height = bbox.max.y - bbox.min.y;

    return {
        width,
        height,
        diagonal: Math.sqrt(width * width + height * height),
        center: boxCenter(bbox)
    };
}
