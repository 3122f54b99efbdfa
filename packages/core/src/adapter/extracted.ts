/**
 * Adapter for the CSV the extraction stage writes.
 *
 * Rows may carry their own origin_tag and source_file (one extracted file
 * can hold several statements). Older files name those columns card and
 * source.
 */

import type { NormalizeResult, RawRecord } from '../types/index.js';
import type { TableRow } from '../utils/csv.js';
import { normalizeDate } from '../utils/date-parse.js';
import { cleanText, formatAmount, parseAmount } from '../utils/normalize.js';
import { categoryOrNull, readSourceTable, requireColumns } from './table.js';
import type { AdapterContext } from './types.js';

const REQUIRED_COLUMNS = ['date', 'description', 'amount'];

export function normalizeExtracted(data: ArrayBuffer, context: AdapterContext): NormalizeResult {
    const { header, rows, encoding } = readSourceTable(data, context);
    requireColumns(header, REQUIRED_COLUMNS, 'extracted', context.sourceFile);

    const warnings: string[] = [];
    const records: RawRecord[] = [];
    let skippedAmounts = 0;
    let excludedRows = 0;

    for (const row of rows) {
        const amount = parseAmount(row['amount']);
        if (!amount) {
            warnings.push(`Invalid amount "${cleanText(row['amount'])}" in row, skipping`);
            skippedAmounts++;
            continue;
        }
        if (amount.isNegative()) {
            excludedRows++;
            continue;
        }

        records.push({
            date: normalizeDate(row['date']),
            description: cleanText(row['description']),
            amount: formatAmount(amount),
            category: categoryOrNull(row['category']),
            origin_tag: firstFilled(row, ['origin_tag', 'card']) ?? context.originTag,
            source_file: firstFilled(row, ['source_file', 'source']) ?? context.sourceFile,
        });
    }

    if (skippedAmounts) {
        warnings.push(`Skipped ${skippedAmounts} rows with invalid amounts`);
    }

    return { records, warnings, skippedRows: skippedAmounts, excludedRows, encoding };
}

function firstFilled(row: TableRow, columns: string[]): string | null {
    for (const col of columns) {
        const value = cleanText(row[col]);
        if (value !== '') {
            return value;
        }
    }
    return null;
}
