import type { AttributeMap, Zone, ZoneMetadata } from '@/types';

export const UNKNOWN_ZONE: ZoneMetadata = { facility: 'UNKNOWN', subFacility: 'UNKNOWN' };

// Facility/sub-facility pair -> extra attributes
export type ZoneAttributeCatalog = Map<string, AttributeMap>;

// Pattern name -> static attributes
export type DeviceAttributeCatalog = Map<string, AttributeMap>;

export function zoneCatalogKey(metadata: ZoneMetadata): string {
    return `${metadata.facility.trim().toUpperCase()}::${metadata.subFacility.trim().toUpperCase()}`;
}

/**
 * Static attributes first, zone attributes overlaid; the zone wins on collision.
 */
export function mergeAttributes(staticAttrs: AttributeMap, zoneAttrs: AttributeMap): AttributeMap {
    const merged: AttributeMap = { ...staticAttrs };
    for (const [key, value] of Object.entries(zoneAttrs)) {
        merged[key] = value;
    }
    return merged;
}

export function resolveZoneAttributes(zone: Zone | undefined, catalog: ZoneAttributeCatalog): AttributeMap {
    const metadata = zone?.metadata ?? UNKNOWN_ZONE;
    return {
        FACILITY: metadata.facility,
        SUB_FACILITY: metadata.subFacility,
        ...(catalog.get(zoneCatalogKey(metadata)) ?? {})
    };
}
