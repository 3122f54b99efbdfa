/**
 * Shared table reading for adapters.
 */

import { MissingColumnsError } from '../errors.js';
import { readCsvTable, readWorkbookTable, type TableRow } from '../utils/csv.js';
import { decodeText } from '../utils/decode.js';
import { cleanText } from '../utils/normalize.js';
import type { AdapterContext } from './types.js';

const WORKBOOK_FILE = /\.(xlsx|xls)$/i;

export interface SourceTable {
    header: string[];
    rows: TableRow[];
    /** Encoding the text decoded with, or "binary" for workbooks. */
    encoding: string;
}

/**
 * Read a source file into header-keyed rows.
 *
 * Workbooks (including HTML tables saved as .xls) go through xlsx; anything
 * else is decoded as text and parsed as CSV.
 *
 * @throws DecodingError when no configured encoding decodes the file
 */
export function readSourceTable(data: ArrayBuffer, context: AdapterContext): SourceTable {
    if (WORKBOOK_FILE.test(context.sourceFile)) {
        return { ...readWorkbookTable(data), encoding: 'binary' };
    }

    const { text, encoding } = decodeText(data, context.encodings, context.sourceFile);
    return { ...readCsvTable(text), encoding };
}

/**
 * An empty file has no header and passes; its adapter returns no records.
 *
 * @throws MissingColumnsError when the header lacks any required column
 */
export function requireColumns(
    header: readonly string[],
    required: readonly string[],
    adapter: string,
    sourceFile: string
): void {
    if (header.length === 0) {
        return;
    }

    const missing = required.filter((col) => !header.includes(col));
    if (missing.length > 0) {
        throw new MissingColumnsError(sourceFile, adapter, missing);
    }
}

/**
 * Source category, or null when the cell is empty.
 */
export function categoryOrNull(value: unknown): string | null {
    const text = cleanText(value);
    return text === '' ? null : text;
}

