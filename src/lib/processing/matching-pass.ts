/**
 * Matching Pass
 *
 * One run over a drawing snapshot: detect tags, cluster the symbol geometry
 * around each one, decide ownership, classify the owned cluster and plan the
 * problem markers. Nothing is written to the drawing here; the result carries
 * the mutation batch for the caller to apply.
 */

import { v4 as uuidv4 } from 'uuid';
import type { DrawingSnapshot, MarkerMutation, MatchRecord, PassResult, PassStats, Primitive, TagOutcome, TextPrimitive } from '@/types';
import type { MatcherLibrary } from '../config/config-loader';
import type { MatchingSettings } from '../config/settings';
import { buildClusters } from './clustering';
import { isValidBox } from './geometry-extents';
import { mergeAttributes, resolveZoneAttributes } from './attribute-merge';
import { applyMarkerMutations, planMarkerUpdate, type MarkerOptions } from './marker-policy';
import { describeComposition, matchPattern } from './pattern-matcher';
import { detectTags } from './tag-detection';
import { OwnershipLedger, collectCandidates, isSymbolPrimitive, resolveOwnedCluster } from './tag-ownership';
import { ZoneIndex } from '../spatial/zone-index';
import { logger } from '../logger';

export interface PassSettings {
    matching: MatchingSettings;
    marker: MarkerOptions;
}

function isTextPrimitive(p: Primitive): p is TextPrimitive {
    return p.kind === 'text';
}

export function runMatchingPass(snapshot: DrawingSnapshot, library: MatcherLibrary, settings: PassSettings): PassResult {
    const { matching, marker } = settings;
    const zones = new ZoneIndex(snapshot.zones);

    const texts = snapshot.primitives.filter(isTextPrimitive);
    const symbols = snapshot.primitives.filter(isSymbolPrimitive);
    const tags = detectTags(texts, zones, library.tagPattern);

    // Candidate collection drops these before clustering
    const skipped = symbols.filter(p => !isValidBox(p.bbox));
    if (skipped.length > 0) {
        logger.warn(`[Pass] Skipped ${skipped.length} primitive(s) without valid extents`, {
            primitives: skipped.map(p => `${p.kind}:${p.id}@${p.layer}`)
        });
    }

    const stats: PassStats = {
        tagsFound: tags.length,
        matched: 0,
        flagged: 0,
        cleared: 0,
        skippedPrimitives: skipped.length
    };

    const records: MatchRecord[] = [];
    const mutations: MarkerMutation[] = [];
    const outcomes: TagOutcome[] = [];
    const ledger = new OwnershipLedger();
    let markers = snapshot.markers;

    for (const tag of tags) {
        const candidates = collectCandidates(symbols, tag, {
            allowedLayers: library.allowedLayers,
            proximityRadius: matching.proximityRadius
        });
        const { clusters } = buildClusters(candidates, matching.linkTolerance);
        const owned = resolveOwnedCluster(tag, clusters, tags, {
            ambiguityTolerance: matching.ambiguityTolerance,
            ledger
        });

        const patternName = owned
            ? matchPattern(owned.cluster, library.patterns, {
                maxSymbolLineLength: matching.maxSymbolLineLength,
                zoneLayer: matching.zoneLayer
            })
            : null;

        // Later tags must see markers planned for earlier ones
        const decision = planMarkerUpdate(tag, patternName !== null, markers, marker);
        if (decision.mutation) {
            mutations.push(decision.mutation);
            markers = applyMarkerMutations(markers, [decision.mutation]);
        }
        if (decision.transition === 'flag') stats.flagged++;
        if (decision.transition === 'clear') stats.cleared++;

        if (owned && patternName !== null) {
            const attributes = mergeAttributes(
                library.deviceAttributes.get(patternName) ?? {},
                resolveZoneAttributes(zones.findZone(tag.position), library.zoneAttributes)
            );
            records.push({
                id: uuidv4(),
                tag: tag.value,
                tagPosition: { ...tag.position },
                patternName,
                attributes,
                clusterId: owned.cluster.id,
                primitiveIds: owned.cluster.primitives.map(p => p.id)
            });
            stats.matched++;
            logger.debug(`[Pass] ${tag.value} -> ${patternName}`, { cluster: owned.cluster.id, distance: owned.distance });
        } else {
            logger.debug(`[Pass] ${tag.value} unresolved`, {
                cluster: owned?.cluster.id,
                composition: owned ? describeComposition(owned.cluster.signature) : undefined
            });
        }

        outcomes.push({
            tag: tag.value,
            position: { ...tag.position },
            status: patternName !== null ? 'matched' : owned ? 'unmatched' : 'unowned',
            patternName: patternName ?? undefined,
            clusterId: owned?.cluster.id,
            markerState: decision.state
        });
    }

    logger.info('[Pass] Matching pass complete', { ...stats, mutations: mutations.length });
    return { records, mutations, outcomes, stats };
}
