import ExcelJS from 'exceljs';
import type { MatchRecord, TagOutcome } from '@/types';

const FIXED_COLUMNS = ['DEVICE_TAG', 'BlockName', 'X', 'Y'];

/**
 * Attribute columns in first-seen order across all records.
 */
export function attributeColumns(records: MatchRecord[]): string[] {
    const seen = new Set<string>();
    for (const record of records) {
        for (const key of Object.keys(record.attributes)) seen.add(key);
    }
    return [...seen];
}

/**
 * Two sheets: one row per matched device, one row per tag outcome.
 */
export async function writeMatchReport(records: MatchRecord[], outcomes: TagOutcome[]): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook();

    const devices = workbook.addWorksheet('Devices');
    const attrs = attributeColumns(records);
    devices.addRow([...FIXED_COLUMNS, ...attrs]);
    for (const record of records) {
        devices.addRow([
            record.tag,
            record.patternName,
            record.tagPosition.x,
            record.tagPosition.y,
            ...attrs.map(key => record.attributes[key] ?? '')
        ]);
    }
    devices.getRow(1).font = { bold: true };

    const tags = workbook.addWorksheet('Tags');
    tags.addRow(['DEVICE_TAG', 'Status', 'BlockName', 'Marker', 'X', 'Y']);
    for (const outcome of outcomes) {
        tags.addRow([
            outcome.tag,
            outcome.status,
            outcome.patternName ?? '',
            outcome.markerState,
            outcome.position.x,
            outcome.position.y
        ]);
    }
    tags.getRow(1).font = { bold: true };

    const buffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
}
