/**
 * Single-column lists (tag prefixes, device layers) from spreadsheets.
 * .xlsx is read with exceljs (first worksheet), .csv with csv-parse.
 * Only the first column is used; blanks are dropped, values are trimmed,
 * upper-cased and de-duplicated in file order.
 */

import fs from 'fs';
import path from 'path';
import ExcelJS from 'exceljs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ErrorCode, failWith, isMatcherError } from '../errors/types';
import { logger } from '../logger';

export interface ListLoadOptions {
    hasHeader?: boolean;
    label?: string; // for messages: "tag prefix", "device layer"
}

const CsvRowsSchema = z.array(z.array(z.string()));

export function normalizeListValues(values: string[]): string[] {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const raw of values) {
        const value = raw.trim().toUpperCase();
        if (!value || seen.has(value)) continue;
        seen.add(value);
        result.push(value);
    }
    return result;
}

export function parseCsvColumn(content: string, hasHeader = false): string[] {
    const records: unknown = parse(content, {
        bom: true,
        delimiter: [',', ';'],
        relax_column_count: true,
        skip_empty_lines: true,
        trim: true
    });

    const rows = CsvRowsSchema.parse(records);
    const firstColumn = rows.map(row => row[0] ?? '');
    return hasHeader ? firstColumn.slice(1) : firstColumn;
}

export async function readXlsxColumn(filePath: string, hasHeader = false): Promise<string[]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);

    const worksheet = workbook.worksheets[0];
    if (!worksheet) return [];

    const values: string[] = [];
    worksheet.eachRow((row, rowNumber) => {
        if (hasHeader && rowNumber === 1) return;
        values.push(row.getCell(1).text ?? '');
    });
    return values;
}

export async function loadListFile(filePath: string, options: ListLoadOptions = {}): Promise<string[]> {
    const label = options.label ?? 'list';
    const ext = path.extname(filePath).toLowerCase();

    let rawValues: string[];
    try {
        if (ext === '.xlsx' || ext === '.xlsm') {
            rawValues = await readXlsxColumn(filePath, options.hasHeader);
        } else if (ext === '.csv' || ext === '.txt') {
            rawValues = parseCsvColumn(fs.readFileSync(filePath, 'utf-8'), options.hasHeader);
        } else {
            throw failWith(ErrorCode.CONFIG_LIST_UNREADABLE, `Unsupported ${label} file type "${ext}"`, { path: filePath });
        }
    } catch (error) {
        if (isMatcherError(error)) throw error;
        throw failWith(
            ErrorCode.CONFIG_LIST_UNREADABLE,
            `Failed to read ${label} file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
            { path: filePath },
            error
        );
    }

    const values = normalizeListValues(rawValues);
    if (values.length === 0) {
        throw failWith(ErrorCode.CONFIG_LIST_EMPTY, `No ${label} values in ${filePath}`, { path: filePath });
    }

    logger.info(`[Config] Loaded ${values.length} ${label} value(s) from ${path.basename(filePath)}`);
    return values;
}
