/**
 * Canonical CSV output and read-back.
 */

import { Decimal } from 'decimal.js';
import * as XLSX from 'xlsx';
import { CANONICAL_COLUMNS, TransactionSchema } from '../types/index.js';
import type { RawRecord, Transaction } from '../types/index.js';
import { readCsvRows } from '../utils/csv.js';

export interface CanonicalReadResult {
    transactions: Transaction[];
    warnings: string[];
    skippedRows: number;
}

/**
 * Render transactions as canonical CSV, in the order given.
 *
 * Amounts are written with at least two decimals and never rounded.
 * Fields containing a comma, a quote or a line break are quoted. No
 * trailing newline.
 */
export function toCanonicalCsv(transactions: readonly Transaction[]): string {
    const rows: string[][] = [[...CANONICAL_COLUMNS]];

    for (const txn of transactions) {
        rows.push([
            txn.date,
            txn.description,
            formatCsvAmount(txn.amount),
            txn.category,
            txn.origin_tag,
            txn.source_file,
            txn.label,
        ]);
    }

    const sheet = XLSX.utils.aoa_to_sheet(rows);
    return XLSX.utils.sheet_to_csv(sheet);
}

/**
 * Render extracted records in the layout the extracted adapter reads:
 * the canonical columns without `label`. A missing category is empty.
 */
export function toExtractedCsv(records: readonly RawRecord[]): string {
    const rows: string[][] = [CANONICAL_COLUMNS.filter((c) => c !== 'label')];

    for (const record of records) {
        rows.push([
            record.date,
            record.description,
            formatCsvAmount(record.amount),
            record.category ?? '',
            record.origin_tag,
            record.source_file,
        ]);
    }

    return XLSX.utils.sheet_to_csv(XLSX.utils.aoa_to_sheet(rows));
}

function formatCsvAmount(amount: string): string {
    const value = new Decimal(amount);
    return value.toFixed(Math.max(2, value.decimalPlaces()));
}

/**
 * Read a canonical CSV back into transactions.
 * Rows that do not fit the transaction schema are skipped with a warning.
 */
export function readCanonicalCsv(text: string): CanonicalReadResult {
    const warnings: string[] = [];
    const transactions: Transaction[] = [];
    let skippedRows = 0;

    const rows = readCsvRows(text);
    rows.forEach((row, index) => {
        const result = TransactionSchema.safeParse(row);
        if (result.success) {
            transactions.push(result.data);
        } else {
            skippedRows++;
            // +2: header line, 1-based
            warnings.push(`Row ${index + 2}: ${result.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`);
        }
    });

    return { transactions, warnings, skippedRows };
}
