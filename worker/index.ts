#!/usr/bin/env node
import dotenv from 'dotenv';
import { executeMatchAndExport } from './pipeline';
import { isMatcherError } from '../src/lib/errors/types';
import { logger } from '../src/lib/logger';

dotenv.config({ path: '.env' });

const USAGE = 'Usage: device-tag-matcher <file.dxf> [--no-export] [--out <dir>] [--log <file>]';

async function main(argv: string[]): Promise<number> {
    const args = argv.slice(2);
    const noExport = args.includes('--no-export');
    const outIndex = args.indexOf('--out');
    const logIndex = args.indexOf('--log');
    const outputDir = outIndex >= 0 ? args[outIndex + 1] : undefined;
    const logFile = logIndex >= 0 ? args[logIndex + 1] : undefined;
    const optionValues = new Set([outIndex + 1, logIndex + 1].filter(i => i > 0));
    const dxfPath = args.find((arg, i) => !arg.startsWith('--') && !optionValues.has(i));

    if (!dxfPath || (outIndex >= 0 && !outputDir) || (logIndex >= 0 && !logFile)) {
        console.error(USAGE);
        return 2;
    }

    try {
        return await run(dxfPath, outputDir, !noExport);
    } finally {
        if (logFile) console.log(`Log: ${logger.exportLogs(logFile)}`);
    }
}

async function run(dxfPath: string, outputDir: string | undefined, exportEnabled: boolean): Promise<number> {
    try {
        const result = await executeMatchAndExport({ dxfPath, outputDir, export: exportEnabled });

        console.log(`Matched ${result.pass.stats.matched} of ${result.pass.stats.tagsFound} tag(s)`);
        console.log(`Markers: +${result.applied.added} -${result.applied.removed}`);
        console.log(`Report: ${result.outputs.report}`);

        if (result.exportResult && !result.exportResult.ok) {
            console.error(`Export failed (${result.exportResult.status}): ${result.exportResult.body}`);
            return 1;
        }
        return 0;
    } catch (e) {
        if (isMatcherError(e)) {
            console.error(`[${e.code}] ${e.message}`);
            if (e.appError.suggestedAction) console.error(e.appError.suggestedAction);
        } else {
            console.error('Match failed:', e);
        }
        return 1;
    }
}

main(process.argv).then(code => {
    process.exitCode = code;
}, (e: unknown) => {
    console.error('Fatal', e);
    process.exitCode = 1;
});
