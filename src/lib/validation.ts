// Zod schemas for configuration files
// Every JSON file the matcher reads is validated here before it reaches the core.

import { z } from 'zod';

const CountRuleSchema = z.union([
    z.number().int().nonnegative(),
    z.object({
        min: z.number().int().nonnegative().optional(),
        max: z.number().int().nonnegative().optional()
    }).strict().refine(r => r.min === undefined || r.max === undefined || r.min <= r.max, {
        message: 'min must not exceed max'
    })
]);

const PatternPredicateSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('line'),
        minLength: z.number().nonnegative().optional(),
        maxLength: z.number().positive().optional(),
        count: CountRuleSchema
    }).strict(),
    z.object({
        kind: z.literal('circle'),
        minRadius: z.number().nonnegative().optional(),
        maxRadius: z.number().positive().optional(),
        count: CountRuleSchema
    }).strict(),
    z.object({
        kind: z.literal('arc'),
        minRadius: z.number().nonnegative().optional(),
        maxRadius: z.number().positive().optional(),
        count: CountRuleSchema
    }).strict(),
    z.object({
        kind: z.literal('polyline'),
        closed: z.boolean().optional(),
        vertexCount: z.number().int().positive().optional(),
        count: CountRuleSchema
    }).strict()
]);

export const PatternSchema = z.object({
    name: z.string().trim().min(1),
    description: z.string().optional(),
    counts: z.object({
        line: CountRuleSchema.optional(),
        circle: CountRuleSchema.optional(),
        arc: CountRuleSchema.optional(),
        polyline: CountRuleSchema.optional(),
        filledShape: CountRuleSchema.optional(),
        hatch: CountRuleSchema.optional()
    }).strict(),
    allowOtherKinds: z.boolean().optional(),
    predicates: z.array(PatternPredicateSchema).optional()
});

const PatternListSchema = z.array(PatternSchema).min(1).superRefine((patterns, ctx) => {
    const seen = new Set<string>();
    patterns.forEach((pattern, index) => {
        if (seen.has(pattern.name)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [index, 'name'],
                message: `Duplicate pattern name "${pattern.name}"`
            });
        }
        seen.add(pattern.name);
    });
});

// A bare array, or an object wrapping it under "patterns"
export const PatternLibrarySchema = z.union([
    PatternListSchema,
    z.object({ patterns: PatternListSchema }).transform(lib => lib.patterns)
]);

const AttributeMapSchema = z.record(z.string(), z.string());

export const DeviceAttributeCatalogSchema = z.record(z.string(), AttributeMapSchema);

export const ZoneAttributeCatalogSchema = z.array(z.object({
    facility: z.string().min(1),
    subFacility: z.string().min(1),
    attributes: AttributeMapSchema
}));

// Marker layer committed by an earlier pass, stored beside the drawing
export const MarkerStateSchema = z.array(z.object({
    id: z.string().min(1),
    kind: z.literal('problem-marker'),
    center: z.object({ x: z.number(), y: z.number() }),
    size: z.number().positive(),
    layer: z.string(),
    tagValue: z.string().optional()
}));

export function formatZodIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}
