/**
 * Shape Pattern Matcher
 *
 * Classifies a cluster by the kinds and counts of its primitives. Patterns are
 * tried in declaration order and the first one fully satisfied wins, so a
 * library must list its most specific patterns first.
 */

import type { Cluster, CountRule, KindCounts, Pattern, PatternPredicate, SymbolKind, SymbolPrimitive } from '@/types';
import { SYMBOL_KINDS } from '../../types';
import { emptyKindCounts } from './clustering';
import { normalizeLayer } from './tag-ownership';

export interface CompositionFilters {
    maxSymbolLineLength: number;
    zoneLayer: string;
}

export interface ClusterComposition {
    primitives: SymbolPrimitive[];
    counts: KindCounts;
    total: number;
}

/**
 * Drops what is not part of a device symbol: lines as long as a process line
 * segment, and polylines drawn on the zone boundary layer.
 */
export function composeCluster(cluster: Cluster, filters: CompositionFilters): ClusterComposition {
    const zoneLayer = normalizeLayer(filters.zoneLayer);
    const primitives = cluster.primitives.filter(p => {
        if (p.kind === 'line') return p.length < filters.maxSymbolLineLength;
        if (p.kind === 'polyline') return normalizeLayer(p.layer) !== zoneLayer;
        return true;
    });

    const counts = emptyKindCounts();
    for (const p of primitives) counts[p.kind]++;

    return { primitives, counts, total: primitives.length };
}

export function satisfiesCount(actual: number, rule: CountRule): boolean {
    if (typeof rule === 'number') return actual === rule;
    if (rule.min !== undefined && actual < rule.min) return false;
    if (rule.max !== undefined && actual > rule.max) return false;
    return true;
}

export function satisfiesPredicate(primitive: SymbolPrimitive, predicate: PatternPredicate): boolean {
    switch (predicate.kind) {
        case 'line':
            if (primitive.kind !== 'line') return false;
            if (predicate.minLength !== undefined && primitive.length < predicate.minLength) return false;
            if (predicate.maxLength !== undefined && primitive.length >= predicate.maxLength) return false;
            return true;
        case 'circle':
        case 'arc':
            if (primitive.kind !== 'circle' && primitive.kind !== 'arc') return false;
            if (primitive.kind !== predicate.kind) return false;
            if (predicate.minRadius !== undefined && primitive.radius < predicate.minRadius) return false;
            if (predicate.maxRadius !== undefined && primitive.radius > predicate.maxRadius) return false;
            return true;
        case 'polyline':
            if (primitive.kind !== 'polyline') return false;
            if (predicate.closed !== undefined && primitive.closed !== predicate.closed) return false;
            if (predicate.vertexCount !== undefined && primitive.vertexCount !== predicate.vertexCount) return false;
            return true;
    }
}

export function patternMatches(composition: ClusterComposition, pattern: Pattern): boolean {
    for (const kind of SYMBOL_KINDS) {
        const rule: CountRule | undefined = pattern.counts[kind];
        const actual = composition.counts[kind];

        if (rule === undefined) {
            if (!pattern.allowOtherKinds && actual > 0) return false;
            continue;
        }
        if (!satisfiesCount(actual, rule)) return false;
    }

    for (const predicate of pattern.predicates ?? []) {
        const hits = composition.primitives.filter(p => satisfiesPredicate(p, predicate)).length;
        if (!satisfiesCount(hits, predicate.count)) return false;
    }

    return true;
}

/**
 * Name of the first satisfied pattern, or null for an unrecognized device.
 * An empty composition never matches.
 */
export function matchPattern(cluster: Cluster, patterns: Pattern[], filters: CompositionFilters): string | null {
    const composition = composeCluster(cluster, filters);
    if (composition.total === 0) return null;

    for (const pattern of patterns) {
        if (patternMatches(composition, pattern)) return pattern.name;
    }
    return null;
}

export function describeComposition(counts: KindCounts): string {
    return SYMBOL_KINDS
        .filter((kind: SymbolKind) => counts[kind] > 0)
        .map(kind => `${kind}=${counts[kind]}`)
        .join(', ') || 'empty';
}
