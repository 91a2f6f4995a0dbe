/**
 * Tag Detection
 *
 * Device tags are text labels made of a configured prefix followed by digits
 * (FV101, hv2001). Only labels inside a zone count.
 */

import type { Tag, TextPrimitive } from '@/types';
import { ZoneIndex } from '../spatial/zone-index';
import { ErrorCode, failWith } from '../errors/types';
import { logger } from '../logger';

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function normalizeTagText(text: string): string {
    return text.trim().toUpperCase();
}

/**
 * `^(P1|P2|...)\d+$`, case-insensitive, every prefix escaped.
 */
export function buildTagPattern(prefixes: string[]): RegExp {
    const cleaned = prefixes.map(p => p.trim()).filter(p => p.length > 0);
    if (cleaned.length === 0) {
        throw failWith(ErrorCode.CONFIG_LIST_EMPTY, 'Tag prefix list is empty', { prefixes: prefixes.length });
    }
    return new RegExp(`^(${cleaned.map(escapeRegExp).join('|')})\\d+$`, 'i');
}

export function detectTags(texts: TextPrimitive[], zones: ZoneIndex, pattern: RegExp): Tag[] {
    const tags: Tag[] = [];

    for (const text of texts) {
        const value = normalizeTagText(text.value);
        if (!value) continue;
        if (!pattern.test(value)) continue;
        if (!zones.contains(text.position)) continue;

        tags.push({ value, position: { ...text.position }, sourceId: text.id });
    }

    logger.info(`[Tags] Found ${tags.length} device tag(s) in ${texts.length} text entities`);
    return tags;
}
