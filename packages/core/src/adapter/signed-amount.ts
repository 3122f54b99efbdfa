/**
 * Signed-amount adapter (Discover style exports).
 *
 * Format:
 * - CSV (or the .xls HTML table Discover also offers)
 * - Single Amount column, positive = purchase
 * - Has category column; payments and rebates are recognised by category
 */

import { DEFAULT_EXCLUDED_CATEGORIES } from '../types/index.js';
import type { NormalizeResult, RawRecord } from '../types/index.js';
import { normalizeDate } from '../utils/date-parse.js';
import { cleanText, formatAmount, parseAmount } from '../utils/normalize.js';
import { categoryOrNull, readSourceTable, requireColumns } from './table.js';
import type { AdapterContext } from './types.js';

const REQUIRED_COLUMNS = ['Trans. Date', 'Description', 'Amount'];

export function normalizeSignedAmount(data: ArrayBuffer, context: AdapterContext): NormalizeResult {
    const { header, rows, encoding } = readSourceTable(data, context);
    requireColumns(header, REQUIRED_COLUMNS, 'signed_amount', context.sourceFile);

    const excluded = new Set<string>(context.excludedCategories ?? DEFAULT_EXCLUDED_CATEGORIES);
    const warnings: string[] = [];
    const records: RawRecord[] = [];
    let skippedAmounts = 0;
    let excludedRows = 0;

    for (const row of rows) {
        const category = categoryOrNull(row['Category']);
        if (category !== null && excluded.has(category)) {
            excludedRows++;
            continue;
        }

        const amount = parseAmount(row['Amount']);
        if (!amount) {
            warnings.push(`Invalid amount "${cleanText(row['Amount'])}" in row, skipping`);
            skippedAmounts++;
            continue;
        }

        // Zero and negative amounts are credits
        if (amount.lte(0)) {
            excludedRows++;
            continue;
        }

        records.push({
            date: normalizeDate(row['Trans. Date']),
            description: cleanText(row['Description']),
            amount: formatAmount(amount),
            category,
            origin_tag: context.originTag,
            source_file: context.sourceFile,
        });
    }

    if (skippedAmounts) {
        warnings.push(`Skipped ${skippedAmounts} rows with invalid amounts`);
    }

    return { records, warnings, skippedRows: skippedAmounts, excludedRows, encoding };
}
