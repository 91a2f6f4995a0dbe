import fs from 'fs';
import path from 'path';
import type { Marker, PassResult } from '../src/types';
import { loadSettings } from '../src/lib/config/settings';
import { loadMatcherLibrary } from '../src/lib/config/config-loader';
import { readDrawing } from '../src/lib/processing/dxf';
import { InMemoryDrawing, type MutationSummary } from '../src/lib/processing/drawing-store';
import { markerOutline } from '../src/lib/processing/marker-policy';
import { runMatchingPass } from '../src/lib/processing/matching-pass';
import { writeMatchReport } from '../src/lib/processing/writer';
import { ExportSinkClient, serializeBatch, type ExportResult } from '../src/lib/services/export-sink';
import { ErrorCode, failWith, sleep } from '../src/lib/errors/types';
import { MarkerStateSchema, formatZodIssues } from '../src/lib/validation';
import { logger } from '../src/lib/logger';

export interface MatchJobOptions {
    dxfPath: string;
    outputDir?: string; // defaults to the folder of the drawing
    export?: boolean;
    env?: NodeJS.ProcessEnv;
    fetchImpl?: typeof fetch;
}

export interface MatchJobOutputs {
    devices: string;
    markers: string;
    report: string;
    drawing: string;
}

export interface MatchJobResult {
    pass: PassResult;
    applied: MutationSummary;
    outputs: MatchJobOutputs;
    exportResult: ExportResult | null;
}

function readDxfFile(dxfPath: string): string {
    try {
        return fs.readFileSync(dxfPath, 'utf-8');
    } catch (error) {
        throw failWith(ErrorCode.DXF_PARSE_FAILED, `Cannot read ${dxfPath}`, { path: dxfPath }, error);
    }
}

/**
 * Markers committed by an earlier pass over the same drawing, or null when
 * there has been none.
 */
export function readCommittedMarkers(filePath: string): Marker[] | null {
    if (!fs.existsSync(filePath)) return null;

    let json: unknown;
    try {
        json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw failWith(ErrorCode.DRAWING_STATE_INVALID, `Cannot read ${filePath}`, { path: filePath }, error);
    }

    const parsed = MarkerStateSchema.safeParse(json);
    if (!parsed.success) {
        throw failWith(
            ErrorCode.DRAWING_STATE_INVALID,
            `Invalid marker state in ${filePath}: ${formatZodIssues(parsed.error)}`,
            { path: filePath }
        );
    }
    return parsed.data;
}

/**
 * Load configuration, match the drawing, apply the marker batch, write the
 * outputs and export. Configuration failures abort before anything is written.
 * An export failure is reported in the result and does not undo the markers.
 *
 * The marker layer lives in `<name>.drawing.json`: when an earlier pass left
 * one, its markers replace those read from the DXF.
 */
export async function executeMatchAndExport(options: MatchJobOptions): Promise<MatchJobResult> {
    const settings = loadSettings(options.env);
    const library = await loadMatcherLibrary(settings.paths);

    const outputDir = options.outputDir ?? path.dirname(options.dxfPath);
    const base = path.join(outputDir, path.basename(options.dxfPath, path.extname(options.dxfPath)));
    const outputs: MatchJobOutputs = {
        devices: `${base}.devices.json`,
        markers: `${base}.markers.json`,
        report: `${base}.report.xlsx`,
        drawing: `${base}.drawing.json`
    };

    // 1. Read drawing and the committed marker layer
    const { snapshot } = readDrawing(readDxfFile(options.dxfPath), {
        zoneLayer: settings.matching.zoneLayer,
        zoneMetadataApp: settings.matching.zoneMetadataApp,
        markerLayer: settings.marker.layer
    });
    const committed = readCommittedMarkers(outputs.drawing);
    if (committed) {
        logger.info(`[Pipeline] Loaded ${committed.length} marker(s) from ${outputs.drawing}`);
    }
    const drawing = new InMemoryDrawing({ ...snapshot, markers: committed ?? snapshot.markers });

    // 2. Match
    const pass = runMatchingPass(drawing.snapshot(), library, settings);

    // 3. Apply markers in one transaction
    const applied = drawing.applyMutations(pass.mutations);

    // 4. Outputs
    fs.mkdirSync(outputDir, { recursive: true });

    const batch = serializeBatch(pass.records);
    fs.writeFileSync(outputs.devices, JSON.stringify(batch, null, 2));
    fs.writeFileSync(outputs.markers, JSON.stringify(pass.mutations, null, 2));
    fs.writeFileSync(outputs.report, await writeMatchReport(pass.records, pass.outcomes));
    const markers = drawing.snapshot().markers.map(marker => ({ ...marker, outline: markerOutline(marker) }));
    fs.writeFileSync(outputs.drawing, JSON.stringify(markers, null, 2));

    logger.info(`[Pipeline] ${pass.stats.matched}/${pass.stats.tagsFound} tag(s) matched`, {
        flagged: pass.stats.flagged,
        cleared: pass.stats.cleared,
        output: outputDir
    });

    // 5. Export
    if (options.export === false) {
        logger.info('[Pipeline] Export disabled');
        return { pass, applied, outputs, exportResult: null };
    }
    if (!settings.export.baseUrl) {
        logger.warn('[Pipeline] EXPORT_BASE_URL not set, skipping export');
        return { pass, applied, outputs, exportResult: null };
    }

    // Settle delay before the job lookup
    await sleep(settings.export.settleMs);

    const client = new ExportSinkClient({
        baseUrl: settings.export.baseUrl,
        resource: settings.export.resource,
        token: settings.export.token,
        outputField: settings.export.outputField,
        jobStatus: settings.export.jobStatus,
        timeoutMs: settings.export.timeoutMs,
        fetchImpl: options.fetchImpl
    });
    const exportResult = await client.pushBatch(batch);

    return { pass, applied, outputs, exportResult };
}
