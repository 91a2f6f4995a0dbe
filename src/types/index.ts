// Shared domain types for the device tag matcher.
// Everything here is a value snapshot: the core never holds references into
// host-owned drawing objects.

export interface Point {
  x: number;
  y: number;
}

export interface BoundingBox {
  min: Point;
  max: Point;
}

// === PRIMITIVES ===

export type SymbolKind = 'line' | 'circle' | 'arc' | 'polyline' | 'filledShape' | 'hatch';
export type PrimitiveKind = SymbolKind | 'text';

export const SYMBOL_KINDS: readonly SymbolKind[] = ['line', 'circle', 'arc', 'polyline', 'filledShape', 'hatch'];

interface PrimitiveBase {
  id: string; // DXF handle when the drawing has one
  layer: string;
  bbox: BoundingBox | null; // null = missing/degenerate extents, skipped by clustering
}

export interface LinePrimitive extends PrimitiveBase {
  kind: 'line';
  length: number;
}

export interface CirclePrimitive extends PrimitiveBase {
  kind: 'circle';
  radius: number;
}

export interface ArcPrimitive extends PrimitiveBase {
  kind: 'arc';
  radius: number;
  startAngle: number; // radians, counter-clockwise
  endAngle: number;
}

export interface PolylinePrimitive extends PrimitiveBase {
  kind: 'polyline';
  closed: boolean;
  vertexCount: number;
  colorIndex?: number;
}

export interface FilledShapePrimitive extends PrimitiveBase {
  kind: 'filledShape';
}

export interface HatchPrimitive extends PrimitiveBase {
  kind: 'hatch';
}

export interface TextPrimitive extends PrimitiveBase {
  kind: 'text';
  value: string;
  position: Point;
}

export type SymbolPrimitive =
  | LinePrimitive
  | CirclePrimitive
  | ArcPrimitive
  | PolylinePrimitive
  | FilledShapePrimitive
  | HatchPrimitive;

export type Primitive = SymbolPrimitive | TextPrimitive;

// === TAGS, ZONES, MARKERS ===

export interface Tag {
  value: string; // trimmed, upper-cased
  position: Point; // identity for ownership purposes
  sourceId?: string;
}

export interface ZoneMetadata {
  facility: string;
  subFacility: string;
}

export interface Zone {
  id: string;
  bbox: BoundingBox; // containment surrogate, not a true polygon test
  metadata: ZoneMetadata;
}

export interface Marker {
  id: string;
  kind: 'problem-marker';
  center: Point;
  size: number;
  layer: string;
  tagValue?: string;
}

// === CLUSTERS ===

export type KindCounts = Record<SymbolKind, number>;

export interface Cluster {
  id: string;
  primitives: SymbolPrimitive[];
  centroid: Point;
  signature: KindCounts;
}

// === PATTERNS ===

export type CountRule = number | { min?: number; max?: number };

export type PatternPredicate =
  | { kind: 'line'; minLength?: number; maxLength?: number; count: CountRule }
  | { kind: 'circle' | 'arc'; minRadius?: number; maxRadius?: number; count: CountRule }
  | { kind: 'polyline'; closed?: boolean; vertexCount?: number; count: CountRule };

export interface Pattern {
  name: string;
  description?: string;
  counts: Partial<Record<SymbolKind, CountRule>>;
  allowOtherKinds?: boolean;
  predicates?: PatternPredicate[];
}

// === OUTPUT ===

export type AttributeMap = Record<string, string>;

export interface MatchRecord {
  id: string;
  tag: string;
  tagPosition: Point;
  patternName: string;
  attributes: AttributeMap;
  clusterId: string;
  primitiveIds: string[];
}

export type MarkerMutation =
  | { type: 'add-marker'; marker: Marker }
  | { type: 'remove-marker'; markerId: string };

export type TagOutcomeStatus = 'matched' | 'unowned' | 'unmatched';

export interface TagOutcome {
  tag: string;
  position: Point;
  status: TagOutcomeStatus;
  patternName?: string;
  clusterId?: string;
  markerState: 'unmarked' | 'flagged';
}

export interface PassStats {
  tagsFound: number;
  matched: number;
  flagged: number;
  cleared: number;
  skippedPrimitives: number;
}

export interface DrawingSnapshot {
  primitives: Primitive[];
  zones: Zone[];
  markers: Marker[];
}

export interface PassResult {
  records: MatchRecord[];
  mutations: MarkerMutation[];
  outcomes: TagOutcome[];
  stats: PassStats;
}
