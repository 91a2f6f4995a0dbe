import fs from 'fs';
import os from 'os';
import path from 'path';
import { ErrorCode, isMatcherError } from '../../src/lib/errors/types';
import { executeMatchAndExport } from '../pipeline';

function polyline(handle: string, layer: string, points: Array<[number, number]>): string[] {
    return [
        '0', 'LWPOLYLINE', '5', handle, '8', layer, '90', String(points.length), '70', '1',
        ...points.flatMap(([x, y]) => ['10', String(x), '20', String(y)])
    ];
}

function label(handle: string, value: string, x: number, y: number): string[] {
    return ['0', 'TEXT', '5', handle, '8', 'TAGS', '10', String(x), '20', String(y), '40', '2.5', '1', value];
}

function drawingWith(...entities: string[][]): string {
    return [
        '0', 'SECTION', '2', 'ENTITIES',
        ...polyline('Z1', 'AREA_ZONE', [[0, 0], [100, 0], [100, 100], [0, 100]]),
        ...polyline('V1', 'VALVES', [[51, 48], [55, 50], [51, 52]]),
        ...polyline('V2', 'VALVES', [[59, 48], [55, 50], [59, 52]]),
        ...label('T1', 'FV101', 50, 50),
        ...label('T2', 'FV102', 80, 80),
        ...entities.flat(),
        '0', 'ENDSEC', '0', 'EOF'
    ].join('\n');
}

const DRAWING = drawingWith();

// The same drawing once a gate valve has been drawn next to FV102
const REDRAWN = drawingWith(
    polyline('V3', 'VALVES', [[81, 78], [85, 80], [81, 82]]),
    polyline('V4', 'VALVES', [[89, 78], [85, 80], [89, 82]])
);

type StoredMarker = { id: string; center: { x: number; y: number } };

describe('Match and export pipeline', () => {
    let dir: string;
    let env: NodeJS.ProcessEnv;
    let consoleLogSpy: jest.SpyInstance;
    let consoleWarnSpy: jest.SpyInstance;

    const write = (name: string, content: string): string => {
        const file = path.join(dir, name);
        fs.writeFileSync(file, content);
        return file;
    };

    beforeEach(() => {
        consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
        consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-'));

        env = {
            PATTERN_LIBRARY_PATH: write('patterns.json', JSON.stringify([{
                name: 'GATE_VALVE',
                counts: { polyline: 2 },
                predicates: [{ kind: 'polyline', closed: true, vertexCount: 3, count: 2 }]
            }])),
            TAG_PREFIX_LIST_PATH: write('prefixes.csv', 'FV\n'),
            DEVICE_LAYER_LIST_PATH: write('layers.csv', 'VALVES\n'),
            DEVICE_ATTRIBUTES_PATH: write('devices.json', JSON.stringify({ GATE_VALVE: { VALVE_TYPE: 'GATE' } })),
            EXPORT_SETTLE_MS: '0'
        };
    });

    afterEach(() => {
        consoleLogSpy.mockRestore();
        consoleWarnSpy.mockRestore();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should match, mark and write outputs beside the drawing', async () => {
        const dxfPath = write('plant.dxf', DRAWING);

        const result = await executeMatchAndExport({ dxfPath, env, export: false });

        expect(result.pass.stats).toEqual({ tagsFound: 2, matched: 1, flagged: 1, cleared: 0, skippedPrimitives: 0 });
        expect(result.applied).toEqual({ added: 1, removed: 0 });
        expect(result.exportResult).toBeNull();

        expect(JSON.parse(fs.readFileSync(path.join(dir, 'plant.devices.json'), 'utf-8'))).toEqual([{
            BlockName: 'GATE_VALVE',
            DEVICE_TAG: 'FV101',
            VALVE_TYPE: 'GATE',
            FACILITY: 'UNKNOWN',
            SUB_FACILITY: 'UNKNOWN'
        }]);

        const markers: StoredMarker[] = JSON.parse(fs.readFileSync(result.outputs.drawing, 'utf-8'));
        expect(markers.map(m => m.center)).toEqual([{ x: 80, y: 80 }]);
        expect(fs.existsSync(result.outputs.report)).toBe(true);
    });

    it('should keep the committed markers across runs and clear them once resolved', async () => {
        const dxfPath = write('plant.dxf', DRAWING);
        const readMarkers = (file: string): StoredMarker[] => JSON.parse(fs.readFileSync(file, 'utf-8'));

        const first = await executeMatchAndExport({ dxfPath, env, export: false });
        const [flagged] = readMarkers(first.outputs.drawing);

        const second = await executeMatchAndExport({ dxfPath, env, export: false });
        expect(second.pass.mutations).toEqual([]);
        expect(second.applied).toEqual({ added: 0, removed: 0 });
        expect(readMarkers(second.outputs.drawing)).toEqual([flagged]);

        fs.writeFileSync(dxfPath, REDRAWN);
        const third = await executeMatchAndExport({ dxfPath, env, export: false });
        expect(third.pass.mutations).toEqual([{ type: 'remove-marker', markerId: flagged.id }]);
        expect(third.applied).toEqual({ added: 0, removed: 1 });
        expect(third.pass.records.map(r => r.tag)).toEqual(['FV101', 'FV102']);
        expect(readMarkers(third.outputs.drawing)).toEqual([]);
    });

    it('should refuse a corrupt marker state file', async () => {
        const dxfPath = write('plant.dxf', DRAWING);
        write('plant.drawing.json', JSON.stringify([{ id: 'm1', kind: 'circle' }]));

        let caught: unknown;
        try {
            await executeMatchAndExport({ dxfPath, env, export: false });
        } catch (e) {
            caught = e;
        }

        expect(isMatcherError(caught, ErrorCode.DRAWING_STATE_INVALID)).toBe(true);
        expect(fs.existsSync(path.join(dir, 'plant.devices.json'))).toBe(false);
    });

    it('should skip the export when no service is configured', async () => {
        const dxfPath = write('plant.dxf', DRAWING);

        const result = await executeMatchAndExport({ dxfPath, env });
        expect(result.exportResult).toBeNull();
    });

    it('should export the batch to the current job', async () => {
        const dxfPath = write('plant.dxf', DRAWING);
        const fetchMock = jest.fn<ReturnType<typeof fetch>, Parameters<typeof fetch>>()
            .mockResolvedValueOnce(new Response(JSON.stringify({ data: [{ name: 'JOB-1' }] }), { status: 200 }))
            .mockResolvedValueOnce(new Response('{}', { status: 200 }));

        const result = await executeMatchAndExport({
            dxfPath,
            outputDir: path.join(dir, 'out'),
            env: { ...env, EXPORT_BASE_URL: 'https://docs.example.com/api/v2/document', EXPORT_TOKEN: 'test-secret' },
            fetchImpl: fetchMock
        });

        expect(result.exportResult).toEqual({ ok: true, status: 200, body: '{}', jobId: 'JOB-1' });
        expect(fs.existsSync(path.join(dir, 'out', 'plant.devices.json'))).toBe(true);
    });

    it('should stop before touching anything when configuration is broken', async () => {
        const dxfPath = write('plant.dxf', DRAWING);

        let caught: unknown;
        try {
            await executeMatchAndExport({ dxfPath, env: { ...env, PATTERN_LIBRARY_PATH: path.join(dir, 'missing.json') } });
        } catch (e) {
            caught = e;
        }

        expect(isMatcherError(caught, ErrorCode.CONFIG_PATTERNS_INVALID)).toBe(true);
        expect(fs.existsSync(path.join(dir, 'plant.devices.json'))).toBe(false);
    });
});
