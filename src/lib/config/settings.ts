import { z } from 'zod';
import { ErrorCode, failWith } from '../errors/types';
import { formatZodIssues } from '../validation';
import type { MarkerOptions } from '../processing/marker-policy';

// The tolerances below are empirically tuned drawing-unit values. They are
// settings so they can be calibrated per drawing standard.
const SettingsSchema = z.object({
    PROXIMITY_RADIUS: z.coerce.number().positive().default(25),
    LINK_TOLERANCE: z.coerce.number().nonnegative().default(2),
    AMBIGUITY_TOLERANCE: z.coerce.number().positive().default(10),
    MAX_SYMBOL_LINE_LENGTH: z.coerce.number().positive().default(30),
    ZONE_LAYER: z.string().default('AREA_ZONE'),
    ZONE_METADATA_APP: z.string().default('AREA_META'),

    MARKER_LAYER: z.string().default('DEVICE_MARKER'),
    MARKER_SIZE: z.coerce.number().positive().default(7),
    MARKER_TOLERANCE: z.coerce.number().positive().default(1),

    PATTERN_LIBRARY_PATH: z.string().default('config/patterns.json'),
    TAG_PREFIX_LIST_PATH: z.string().default('config/tag-prefixes.csv'),
    DEVICE_LAYER_LIST_PATH: z.string().default('config/device-layers.csv'),
    DEVICE_ATTRIBUTES_PATH: z.string().optional(),
    ZONE_ATTRIBUTES_PATH: z.string().optional(),
    LIST_HAS_HEADER: z.enum(['true', 'false']).default('false').transform(v => v === 'true'),

    EXPORT_BASE_URL: z.string().url().optional(),
    EXPORT_RESOURCE: z.string().default('Instrumentation Files'),
    EXPORT_TOKEN: z.string().optional(),
    EXPORT_OUTPUT_FIELD: z.string().default('device_output_data'),
    EXPORT_JOB_STATUS: z.string().default('IN_PROCESS'),
    EXPORT_SETTLE_MS: z.coerce.number().int().nonnegative().default(3000),
    EXPORT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
});

export interface MatchingSettings {
    proximityRadius: number;
    linkTolerance: number;
    ambiguityTolerance: number;
    maxSymbolLineLength: number;
    zoneLayer: string;
    zoneMetadataApp: string;
}

export interface PathSettings {
    patternLibrary: string;
    tagPrefixList: string;
    deviceLayerList: string;
    deviceAttributes?: string;
    zoneAttributes?: string;
    listHasHeader: boolean;
}

export interface ExportSettings {
    baseUrl?: string;
    resource: string;
    token?: string;
    outputField: string;
    jobStatus: string;
    settleMs: number;
    timeoutMs: number;
}

export interface MatcherSettings {
    matching: MatchingSettings;
    marker: MarkerOptions;
    paths: PathSettings;
    export: ExportSettings;
}

export const DEFAULT_MATCHING_SETTINGS: MatchingSettings = {
    proximityRadius: 25,
    linkTolerance: 2,
    ambiguityTolerance: 10,
    maxSymbolLineLength: 30,
    zoneLayer: 'AREA_ZONE',
    zoneMetadataApp: 'AREA_META'
};

/**
 * Read settings from the environment. Empty variables count as unset.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): MatcherSettings {
    const present: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') present[key] = value.trim();
    }

    const result = SettingsSchema.safeParse(present);
    if (!result.success) {
        throw failWith(ErrorCode.CONFIG_SETTINGS_INVALID, `Invalid settings: ${formatZodIssues(result.error)}`);
    }

    const s = result.data;
    return {
        matching: {
            proximityRadius: s.PROXIMITY_RADIUS,
            linkTolerance: s.LINK_TOLERANCE,
            ambiguityTolerance: s.AMBIGUITY_TOLERANCE,
            maxSymbolLineLength: s.MAX_SYMBOL_LINE_LENGTH,
            zoneLayer: s.ZONE_LAYER,
            zoneMetadataApp: s.ZONE_METADATA_APP
        },
        marker: {
            layer: s.MARKER_LAYER,
            size: s.MARKER_SIZE,
            locationTolerance: s.MARKER_TOLERANCE
        },
        paths: {
            patternLibrary: s.PATTERN_LIBRARY_PATH,
            tagPrefixList: s.TAG_PREFIX_LIST_PATH,
            deviceLayerList: s.DEVICE_LAYER_LIST_PATH,
            deviceAttributes: s.DEVICE_ATTRIBUTES_PATH,
            zoneAttributes: s.ZONE_ATTRIBUTES_PATH,
            listHasHeader: s.LIST_HAS_HEADER
        },
        export: {
            baseUrl: s.EXPORT_BASE_URL,
            resource: s.EXPORT_RESOURCE,
            token: s.EXPORT_TOKEN,
            outputField: s.EXPORT_OUTPUT_FIELD,
            jobStatus: s.EXPORT_JOB_STATUS,
            settleMs: s.EXPORT_SETTLE_MS,
            timeoutMs: s.EXPORT_TIMEOUT_MS
        }
    };
}
