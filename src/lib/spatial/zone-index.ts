import type { Point, Zone, ZoneMetadata } from '@/types';
import { containsPoint } from '../processing/geometry-extents';
import { UNKNOWN_ZONE } from '../processing/attribute-merge';
import { logger } from '../logger';

export interface ExtendedData {
    applicationName?: string;
    customStrings?: string[];
}

/**
 * Facility and sub-facility from a zone's extended data: the first two strings
 * registered under the metadata application. Anything else degrades to UNKNOWN.
 */
export function parseZoneMetadata(data: ExtendedData | undefined, applicationName: string): ZoneMetadata {
    if (!data || data.applicationName?.trim().toUpperCase() !== applicationName.trim().toUpperCase()) {
        return { ...UNKNOWN_ZONE };
    }

    const [facility, subFacility] = data.customStrings ?? [];
    return {
        facility: facility?.trim() || UNKNOWN_ZONE.facility,
        subFacility: subFacility?.trim() || UNKNOWN_ZONE.subFacility
    };
}

/**
 * Bounding-box lookup of the zones in a drawing. Zones are tried in drawing
 * order; the first one containing the point wins.
 */
export class ZoneIndex {
    private zones: Zone[];

    constructor(zones: Zone[]) {
        this.zones = [...zones];
        logger.debug(`[ZoneIndex] Indexed ${this.zones.length} zone(s)`);
    }

    findZone(p: Point): Zone | undefined {
        return findZoneForPoint(this.zones, p);
    }

    contains(p: Point): boolean {
        return this.findZone(p) !== undefined;
    }

    get size(): number {
        return this.zones.length;
    }
}

export function findZoneForPoint(zones: Zone[], p: Point): Zone | undefined {
    return zones.find(zone => containsPoint(zone.bbox, p));
}
