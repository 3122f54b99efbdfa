/**
 * Tabular parsing utilities.
 */

import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';

/**
 * One row keyed by header. Values are strings for CSV input and raw cell
 * values (string, number, Date) for workbooks.
 */
export type TableRow = Record<string, unknown>;

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

/**
 * Rows of a table plus its header, in column order.
 */
export interface ParsedTable {
    header: string[];
    rows: TableRow[];
}

/**
 * Parse CSV text with a header row. Every row carries every header key;
 * empty and missing trailing cells are empty strings.
 */
export function readCsvTable(text: string): ParsedTable {
    if (text.trim() === '') {
        return { header: [], rows: [] };
    }

    let header: string[] = [];
    const parsed: unknown = parse(stripBom(text), {
        columns: (raw: string[]) => {
            header = raw.map((h) => stripBom(h).trim());
            return header;
        },
        skip_empty_lines: true,
        trim: true,
        relax_quotes: true,
        relax_column_count: true,
    });

    const rows = toRows(parsed).map((row) => {
        const full: TableRow = {};
        for (const key of header) {
            full[key] = row[key] ?? '';
        }
        return Object.assign(full, row);
    });
    return { header, rows };
}

export function readCsvRows(text: string): TableRow[] {
    return readCsvTable(text).rows;
}

/**
 * Read the first sheet of a workbook (xlsx, or an HTML table saved as .xls).
 */
export function readWorkbookTable(data: ArrayBuffer): ParsedTable {
    const workbook = XLSX.read(new Uint8Array(data), { type: 'array', raw: true });
    const firstSheet = workbook.SheetNames[0];
    if (firstSheet === undefined) {
        return { header: [], rows: [] };
    }
    const sheet = workbook.Sheets[firstSheet];

    const [firstLine] = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1 });
    const header = Array.from(firstLine ?? [], (cell) => stripBom(cell === undefined ? '' : String(cell)).trim());

    const rows = XLSX.utils.sheet_to_json<TableRow>(sheet, { defval: '' }).map((row) => {
        const clean: TableRow = {};
        for (const [k, v] of Object.entries(row)) {
            clean[stripBom(k).trim()] = v;
        }
        return clean;
    });
    return { header, rows };
}

export function readWorkbookRows(data: ArrayBuffer): TableRow[] {
    return readWorkbookTable(data).rows;
}

function toRows(value: unknown): TableRow[] {
    if (!Array.isArray(value)) {
        return [];
    }
    return value.filter(isRow);
}

function isRow(value: unknown): value is TableRow {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
