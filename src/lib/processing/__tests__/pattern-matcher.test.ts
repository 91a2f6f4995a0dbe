import type { Cluster, Pattern, SymbolPrimitive } from '@/types';
import { buildClusters } from '../clustering';
import { composeCluster, describeComposition, matchPattern, satisfiesCount, satisfiesPredicate } from '../pattern-matcher';
import { circle, line, triangle } from './helpers';

const filters = { maxSymbolLineLength: 30, zoneLayer: 'AREA_ZONE' };

function clusterOf(...primitives: SymbolPrimitive[]): Cluster {
    return buildClusters(primitives, 1000).clusters[0];
}

const gate: Pattern = { name: 'GATE', counts: { polyline: 2 }, allowOtherKinds: true };
const globe: Pattern = { name: 'GLOBE', counts: { polyline: 2, circle: 1 } };

describe('Shape Pattern Matcher', () => {
    describe('matchPattern', () => {
        it('should return the first satisfied pattern in declaration order', () => {
            const cluster = clusterOf(triangle('p1', 0, 0), triangle('p2', 4, 0), circle('c1', 2, 0, 1));

            expect(matchPattern(cluster, [gate, globe], filters)).toBe('GATE');
            expect(matchPattern(cluster, [globe, gate], filters)).toBe('GLOBE');
        });

        it('should tell a gate from a globe valve by its circle count', () => {
            const gateValve: Pattern = { name: 'GATE_VALVE', counts: { line: 2, circle: 1 } };
            const globeValve: Pattern = { name: 'GLOBE_VALVE', counts: { line: 2, circle: 2 } };
            const patterns = [gateValve, globeValve];

            const oneCircle = clusterOf(line('l1', 0, 0, 4, 0), line('l2', 0, 2, 4, 2), circle('c1', 2, 1, 1));
            const twoCircles = clusterOf(
                line('l1', 0, 0, 4, 0),
                line('l2', 0, 2, 4, 2),
                circle('c1', 1, 1, 1),
                circle('c2', 3, 1, 1)
            );

            expect(matchPattern(oneCircle, patterns, filters)).toBe('GATE_VALVE');
            expect(matchPattern(twoCircles, patterns, filters)).toBe('GLOBE_VALVE');
        });

        it('should require unlisted kinds to be absent', () => {
            const strictGate: Pattern = { name: 'GATE', counts: { polyline: 2 } };
            const cluster = clusterOf(triangle('p1', 0, 0), triangle('p2', 4, 0), circle('c1', 2, 0, 1));

            expect(matchPattern(cluster, [strictGate], filters)).toBeNull();
        });

        it('should ignore process lines and zone boundaries', () => {
            const strictGate: Pattern = { name: 'GATE', counts: { polyline: 2 } };
            const cluster = clusterOf(
                triangle('p1', 0, 0),
                triangle('p2', 4, 0),
                line('pipe', -20, 0, 20, 0),
                triangle('boundary', 2, 0, 50, 'AREA_ZONE')
            );

            expect(matchPattern(cluster, [strictGate], filters)).toBe('GATE');
        });

        it('should never match an empty composition', () => {
            const anything: Pattern = { name: 'ANY', counts: {}, allowOtherKinds: true };
            const cluster = clusterOf(line('pipe', 0, 0, 100, 0));

            expect(matchPattern(cluster, [anything], filters)).toBeNull();
        });

        it('should return null when nothing fits', () => {
            const cluster = clusterOf(circle('c1', 0, 0, 1));
            expect(matchPattern(cluster, [globe], filters)).toBeNull();
        });

        it('should apply predicates on top of counts', () => {
            const check: Pattern = {
                name: 'CHECK',
                counts: { polyline: 1, line: 1 },
                predicates: [{ kind: 'line', maxLength: 10, count: 1 }]
            };

            expect(matchPattern(clusterOf(triangle('p1', 0, 0), line('bar', 3, -4, 3, 4)), [check], filters)).toBe('CHECK');
            expect(matchPattern(clusterOf(triangle('p1', 0, 0), line('bar', 3, -5, 3, 5)), [check], filters)).toBeNull();
        });
    });

    describe('counts and predicates', () => {
        it('should treat a number as an exact count and an object as a range', () => {
            expect(satisfiesCount(2, 2)).toBe(true);
            expect(satisfiesCount(3, 2)).toBe(false);
            expect(satisfiesCount(3, { min: 1, max: 3 })).toBe(true);
            expect(satisfiesCount(0, { min: 1 })).toBe(false);
            expect(satisfiesCount(5, {})).toBe(true);
        });

        it('should keep circle and arc predicates apart', () => {
            const c = circle('c1', 0, 0, 2);
            expect(satisfiesPredicate(c, { kind: 'circle', minRadius: 2, maxRadius: 2, count: 1 })).toBe(true);
            expect(satisfiesPredicate(c, { kind: 'arc', count: 1 })).toBe(false);
        });

        it('should check polyline closure and vertex count', () => {
            const p = triangle('p1', 0, 0);
            expect(satisfiesPredicate(p, { kind: 'polyline', closed: true, vertexCount: 3, count: 1 })).toBe(true);
            expect(satisfiesPredicate(p, { kind: 'polyline', vertexCount: 4, count: 1 })).toBe(false);
        });
    });

    describe('composeCluster', () => {
        it('should count only the kept primitives', () => {
            const cluster = clusterOf(triangle('p1', 0, 0), line('short', 0, 0, 5, 0), line('long', 0, 0, 30, 0));
            const composition = composeCluster(cluster, filters);

            expect(composition.total).toBe(2);
            expect(describeComposition(composition.counts)).toBe('line=1, polyline=1');
        });

        it('should describe an empty composition', () => {
            expect(describeComposition({ line: 0, circle: 0, arc: 0, polyline: 0, filledShape: 0, hatch: 0 })).toBe('empty');
        });
    });
});
