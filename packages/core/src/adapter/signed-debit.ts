/**
 * Signed-debit adapter (Capital One style exports).
 *
 * Format:
 * - CSV with separate Debit and Credit columns
 * - Purchases fill Debit; payments and credits leave it empty
 */

import type { NormalizeResult, RawRecord } from '../types/index.js';
import { normalizeDate } from '../utils/date-parse.js';
import { cleanText, formatAmount, parseAmount } from '../utils/normalize.js';
import { categoryOrNull, readSourceTable, requireColumns } from './table.js';
import type { AdapterContext } from './types.js';

const REQUIRED_COLUMNS = ['Transaction Date', 'Description', 'Debit'];

export function normalizeSignedDebit(data: ArrayBuffer, context: AdapterContext): NormalizeResult {
    const { header, rows, encoding } = readSourceTable(data, context);
    requireColumns(header, REQUIRED_COLUMNS, 'signed_debit', context.sourceFile);

    const warnings: string[] = [];
    const records: RawRecord[] = [];
    let skippedAmounts = 0;
    let excludedRows = 0;

    for (const row of rows) {
        const debit = cleanText(row['Debit']);
        if (debit === '') {
            excludedRows++;
            continue;
        }

        const amount = parseAmount(debit);
        if (!amount) {
            warnings.push(`Invalid amount "${debit}" in row, skipping`);
            skippedAmounts++;
            continue;
        }
        if (amount.isNegative()) {
            excludedRows++;
            continue;
        }

        records.push({
            date: normalizeDate(row['Transaction Date']),
            description: cleanText(row['Description']),
            amount: formatAmount(amount),
            category: categoryOrNull(row['Category']),
            origin_tag: context.originTag,
            source_file: context.sourceFile,
        });
    }

    if (skippedAmounts) {
        warnings.push(`Skipped ${skippedAmounts} rows with invalid amounts`);
    }

    return { records, warnings, skippedRows: skippedAmounts, excludedRows, encoding };
}
