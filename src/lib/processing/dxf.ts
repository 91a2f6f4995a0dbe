/**
 * DXF Drawing Reader
 *
 * Turns a DXF file into a value snapshot: symbol primitives, text, zones and
 * existing problem markers. Raw entities are validated one by one; a malformed
 * entity becomes a primitive without extents instead of failing the read.
 */

import DxfParser from 'dxf-parser';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { BoundingBox, DrawingSnapshot, Marker, Point, Primitive, PrimitiveKind, Zone } from '@/types';
import { arcExtents, boxCenter, circleExtents, extentsOfPoints, getBoundingBoxInfo, isValidBox } from './geometry-extents';
import { extractHatchEntities } from './dxf-hatch';
import { normalizeLayer } from './tag-ownership';
import { parseZoneMetadata } from '../spatial/zone-index';
import { ErrorCode, failWith } from '../errors/types';
import { logger } from '../logger';

export interface DrawingReadOptions {
    zoneLayer: string;
    zoneMetadataApp: string;
    markerLayer: string;
}

export interface DrawingReadStats {
    entities: number;
    primitives: number;
    texts: number;
    zones: number;
    markers: number;
    ignored: number;
    malformed: number;
}

export interface DrawingReadResult {
    snapshot: DrawingSnapshot;
    stats: DrawingReadStats;
}

// ============================================================================
// RAW ENTITY SCHEMAS
// ============================================================================

const PointSchema = z.object({ x: z.number(), y: z.number() }).passthrough();

const BaseEntitySchema = z.object({
    type: z.string(),
    layer: z.string().optional(),
    handle: z.union([z.string(), z.number()]).optional(),
    colorIndex: z.number().optional(),
    extendedData: z.object({
        applicationName: z.string().optional(),
        customStrings: z.array(z.string()).optional()
    }).passthrough().optional()
}).passthrough();

const LineSchema = z.object({ vertices: z.array(PointSchema).min(2) }).passthrough();
const CircleSchema = z.object({ center: PointSchema, radius: z.number().positive() }).passthrough();
const ArcSchema = CircleSchema.extend({ startAngle: z.number(), endAngle: z.number() });
const PolylineSchema = z.object({ vertices: z.array(PointSchema).min(1), shape: z.boolean().optional() }).passthrough();
const SolidSchema = z.object({ points: z.array(PointSchema).min(3) }).passthrough();
const HatchSchema = z.object({
    boundaries: z.array(z.object({ vertices: z.array(PointSchema) }).passthrough()).min(1)
}).passthrough();
const TextSchema = z.object({
    text: z.string(),
    startPoint: PointSchema.optional(),
    position: PointSchema.optional()
}).passthrough();

type BaseEntity = z.infer<typeof BaseEntitySchema>;

const ENTITY_KINDS: Record<string, PrimitiveKind> = {
    LINE: 'line',
    CIRCLE: 'circle',
    ARC: 'arc',
    LWPOLYLINE: 'polyline',
    POLYLINE: 'polyline',
    SOLID: 'filledShape',
    HATCH: 'hatch',
    TEXT: 'text',
    MTEXT: 'text'
};

// ============================================================================
// ENTITY CONVERSION
// ============================================================================

function toPoint(p: { x: number; y: number }): Point {
    return { x: p.x, y: p.y };
}

function cleanMText(text: string): string {
    return text
        .replace(/\\P/g, ' ')              // Paragraph breaks
        .replace(/\\[A-Za-z][^;\\{}]*;/g, '') // Format codes
        .replace(/[{}]/g, '')
        .trim();
}

/**
 * Convert one validated base entity. Returns null for entity types the matcher
 * has no use for (dimensions, inserts, points...).
 */
export function toPrimitive(entity: BaseEntity): Primitive | null {
    const kind = ENTITY_KINDS[entity.type];
    if (!kind) return null;

    const base = {
        id: entity.handle !== undefined ? String(entity.handle) : uuidv4(),
        layer: entity.layer ?? '0'
    };

    switch (kind) {
        case 'line': {
            const parsed = LineSchema.safeParse(entity);
            if (!parsed.success) return { ...base, kind, length: 0, bbox: null };
            const [a, b] = parsed.data.vertices;
            return {
                ...base,
                kind,
                length: Math.hypot(b.x - a.x, b.y - a.y),
                bbox: extentsOfPoints([toPoint(a), toPoint(b)])
            };
        }
        case 'circle': {
            const parsed = CircleSchema.safeParse(entity);
            if (!parsed.success) return { ...base, kind, radius: 0, bbox: null };
            return { ...base, kind, radius: parsed.data.radius, bbox: circleExtents(toPoint(parsed.data.center), parsed.data.radius) };
        }
        case 'arc': {
            const parsed = ArcSchema.safeParse(entity);
            if (!parsed.success) return { ...base, kind, radius: 0, startAngle: 0, endAngle: 0, bbox: null };
            const { center, radius, startAngle, endAngle } = parsed.data;
            return { ...base, kind, radius, startAngle, endAngle, bbox: arcExtents(toPoint(center), radius, startAngle, endAngle) };
        }
        case 'polyline': {
            const parsed = PolylineSchema.safeParse(entity);
            if (!parsed.success) return { ...base, kind, closed: false, vertexCount: 0, bbox: null, colorIndex: entity.colorIndex };
            return {
                ...base,
                kind,
                closed: parsed.data.shape ?? false,
                vertexCount: parsed.data.vertices.length,
                colorIndex: entity.colorIndex,
                bbox: extentsOfPoints(parsed.data.vertices.map(toPoint))
            };
        }
        case 'filledShape': {
            const parsed = SolidSchema.safeParse(entity);
            return { ...base, kind, bbox: parsed.success ? extentsOfPoints(parsed.data.points.map(toPoint)) : null };
        }
        case 'hatch': {
            const parsed = HatchSchema.safeParse(entity);
            const points = parsed.success ? parsed.data.boundaries.flatMap(b => b.vertices.map(toPoint)) : [];
            return { ...base, kind, bbox: extentsOfPoints(points) };
        }
        case 'text': {
            const parsed = TextSchema.safeParse(entity);
            if (!parsed.success) return null;
            const anchor = parsed.data.startPoint ?? parsed.data.position;
            if (!anchor) return null;
            const position = toPoint(anchor);
            const value = entity.type === 'MTEXT' ? cleanMText(parsed.data.text) : parsed.data.text;
            return { ...base, kind, value, position, bbox: { min: position, max: { ...position } } };
        }
    }
}

function toMarker(id: string, layer: string, bbox: BoundingBox): Marker {
    const info = getBoundingBoxInfo(bbox);
    return {
        id,
        kind: 'problem-marker',
        center: boxCenter(bbox),
        size: Math.max(info.width, info.height),
        layer
    };
}

// ============================================================================
// DRAWING
// ============================================================================

export function parseDxfEntities(fileContent: string): unknown[] {
    let cleanContent = fileContent;

    // Remove BOM if present
    if (cleanContent.charCodeAt(0) === 0xFEFF) {
        cleanContent = cleanContent.slice(1);
    }
    cleanContent = cleanContent.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

    const parser = new DxfParser();
    let dxf: ReturnType<DxfParser['parseSync']>;
    try {
        dxf = parser.parseSync(cleanContent);
    } catch (error) {
        throw failWith(
            ErrorCode.DXF_PARSE_FAILED,
            `Failed to parse DXF: ${error instanceof Error ? error.message : String(error)}`,
            {},
            error
        );
    }

    if (!dxf) {
        throw failWith(ErrorCode.DXF_EMPTY_FILE, 'DXF file produced no drawing');
    }

    // HATCH comes from our own reader; the parser drops it
    const entities = (dxf.entities ?? []).filter(entity => entity.type !== 'HATCH');
    return [...entities, ...extractHatchEntities(cleanContent)];
}

export function readDrawing(fileContent: string, options: DrawingReadOptions): DrawingReadResult {
    const entities = parseDxfEntities(fileContent);
    const zoneLayer = normalizeLayer(options.zoneLayer);
    const markerLayer = normalizeLayer(options.markerLayer);

    const snapshot: DrawingSnapshot = { primitives: [], zones: [], markers: [] };
    const stats: DrawingReadStats = { entities: entities.length, primitives: 0, texts: 0, zones: 0, markers: 0, ignored: 0, malformed: 0 };

    for (const raw of entities) {
        const base = BaseEntitySchema.safeParse(raw);
        if (!base.success) {
            stats.ignored++;
            continue;
        }

        const primitive = toPrimitive(base.data);
        if (!primitive) {
            stats.ignored++;
            continue;
        }

        if (!isValidBox(primitive.bbox)) stats.malformed++;

        const layer = normalizeLayer(primitive.layer);
        if (primitive.kind === 'polyline' && primitive.closed && isValidBox(primitive.bbox)) {
            if (layer === markerLayer && primitive.vertexCount === 4) {
                snapshot.markers.push(toMarker(primitive.id, primitive.layer, primitive.bbox));
                stats.markers++;
                continue;
            }
            if (layer === zoneLayer) {
                const zone: Zone = {
                    id: primitive.id,
                    bbox: primitive.bbox,
                    metadata: parseZoneMetadata(base.data.extendedData, options.zoneMetadataApp)
                };
                snapshot.zones.push(zone);
                stats.zones++;
            }
        }

        snapshot.primitives.push(primitive);
        if (primitive.kind === 'text') stats.texts++;
        else stats.primitives++;
    }

    logger.info(`[DXF] Read ${stats.entities} entities`, { ...stats });
    return { snapshot, stats };
}
