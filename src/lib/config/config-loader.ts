import fs from 'fs';
import type { z } from 'zod';
import type { AttributeMap, Pattern } from '@/types';
import {
    DeviceAttributeCatalogSchema,
    PatternLibrarySchema,
    ZoneAttributeCatalogSchema,
    formatZodIssues
} from '../validation';
import { ErrorCode, failWith } from '../errors/types';
import { zoneCatalogKey, type DeviceAttributeCatalog, type ZoneAttributeCatalog } from '../processing/attribute-merge';
import { buildTagPattern } from '../processing/tag-detection';
import { normalizeLayer } from '../processing/tag-ownership';
import { loadListFile } from './list-loader';
import type { PathSettings } from './settings';
import { logger } from '../logger';

/**
 * Everything a matching pass needs besides the drawing. Loaded once per run.
 */
export interface MatcherLibrary {
    patterns: Pattern[];
    tagPattern: RegExp;
    allowedLayers: ReadonlySet<string>;
    deviceAttributes: DeviceAttributeCatalog;
    zoneAttributes: ZoneAttributeCatalog;
}

function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S, code: ErrorCode, label: string): z.output<S> {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw failWith(code, `Failed to read ${label} ${filePath}: ${error instanceof Error ? error.message : String(error)}`, { path: filePath }, error);
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
        throw failWith(code, `Invalid ${label} ${filePath}: ${formatZodIssues(result.error)}`, { path: filePath });
    }
    return result.data;
}

export function loadPatternLibrary(filePath: string): Pattern[] {
    const patterns: Pattern[] = readJsonFile(filePath, PatternLibrarySchema, ErrorCode.CONFIG_PATTERNS_INVALID, 'pattern library');
    logger.info(`[Config] Loaded ${patterns.length} pattern(s)`, { order: patterns.map(p => p.name) });
    return patterns;
}

export function loadDeviceAttributes(filePath?: string): DeviceAttributeCatalog {
    if (!filePath) return new Map();

    const catalog = readJsonFile(filePath, DeviceAttributeCatalogSchema, ErrorCode.CONFIG_ATTRIBUTES_INVALID, 'device attribute catalog');
    return new Map<string, AttributeMap>(Object.entries(catalog));
}

export function loadZoneAttributes(filePath?: string): ZoneAttributeCatalog {
    if (!filePath) return new Map();

    const entries = readJsonFile(filePath, ZoneAttributeCatalogSchema, ErrorCode.CONFIG_ATTRIBUTES_INVALID, 'zone attribute catalog');
    const catalog: ZoneAttributeCatalog = new Map();
    for (const entry of entries) {
        catalog.set(zoneCatalogKey({ facility: entry.facility, subFacility: entry.subFacility }), entry.attributes);
    }
    return catalog;
}

/**
 * Load the whole library. Any failure here is fatal to the pass and happens
 * before the drawing is touched.
 */
export async function loadMatcherLibrary(paths: PathSettings): Promise<MatcherLibrary> {
    const patterns = loadPatternLibrary(paths.patternLibrary);

    const prefixes = await loadListFile(paths.tagPrefixList, { hasHeader: paths.listHasHeader, label: 'tag prefix' });
    const layers = await loadListFile(paths.deviceLayerList, { hasHeader: paths.listHasHeader, label: 'device layer' });

    return {
        patterns,
        tagPattern: buildTagPattern(prefixes),
        allowedLayers: new Set(layers.map(normalizeLayer)),
        deviceAttributes: loadDeviceAttributes(paths.deviceAttributes),
        zoneAttributes: loadZoneAttributes(paths.zoneAttributes)
    };
}
