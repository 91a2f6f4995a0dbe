import {
    DeviceAttributeCatalogSchema,
    PatternLibrarySchema,
    PatternSchema,
    ZoneAttributeCatalogSchema,
    formatZodIssues
} from '../validation';

describe('Validation Utility', () => {
    describe('PatternSchema', () => {
        it('should accept counts, ranges and predicates', () => {
            const result = PatternSchema.safeParse({
                name: 'CHECK_VALVE',
                counts: { polyline: 1, line: { min: 1, max: 2 } },
                predicates: [{ kind: 'line', maxLength: 10, count: 1 }]
            });
            expect(result.success).toBe(true);
        });

        it('should reject unknown primitive kinds', () => {
            const result = PatternSchema.safeParse({ name: 'X', counts: { spline: 1 } });
            expect(result.success).toBe(false);
        });

        it('should reject an inverted range', () => {
            const result = PatternSchema.safeParse({ name: 'X', counts: { line: { min: 3, max: 1 } } });
            expect(result.success).toBe(false);
        });

        it('should reject negative counts', () => {
            expect(PatternSchema.safeParse({ name: 'X', counts: { circle: -1 } }).success).toBe(false);
        });
    });

    describe('PatternLibrarySchema', () => {
        it('should accept a bare array and a wrapped one alike', () => {
            const patterns = [{ name: 'GATE', counts: { polyline: 2 } }];

            const bare = PatternLibrarySchema.parse(patterns);
            const wrapped = PatternLibrarySchema.parse({ patterns });
            expect(wrapped).toEqual(bare);
            expect(bare[0].name).toBe('GATE');
        });

        it('should keep declaration order', () => {
            const result = PatternLibrarySchema.parse([
                { name: 'GATE', counts: { polyline: 2 } },
                { name: 'GLOBE', counts: { polyline: 2, circle: 1 } }
            ]);
            expect(result.map(p => p.name)).toEqual(['GATE', 'GLOBE']);
        });

        it('should reject duplicate names and empty libraries', () => {
            expect(PatternLibrarySchema.safeParse([
                { name: 'GATE', counts: {} },
                { name: 'GATE', counts: {} }
            ]).success).toBe(false);
            expect(PatternLibrarySchema.safeParse([]).success).toBe(false);
        });
    });

    describe('attribute catalogs', () => {
        it('should accept string attribute maps', () => {
            expect(DeviceAttributeCatalogSchema.safeParse({ GATE: { VALVE_TYPE: 'GATE' } }).success).toBe(true);
            expect(ZoneAttributeCatalogSchema.safeParse([
                { facility: 'PLANT-A', subFacility: 'UNIT-100', attributes: { AREA_CODE: 'A100' } }
            ]).success).toBe(true);
        });

        it('should reject non-string attribute values', () => {
            expect(DeviceAttributeCatalogSchema.safeParse({ GATE: { SIZE: 2 } }).success).toBe(false);
        });
    });

    describe('formatZodIssues', () => {
        it('should join issue paths and messages', () => {
            const result = ZoneAttributeCatalogSchema.safeParse([{ facility: '', subFacility: 'U', attributes: {} }]);
            if (result.success) throw new Error('expected failure');
            expect(formatZodIssues(result.error)).toBe('0.facility: String must contain at least 1 character(s)');
        });
    });
});
