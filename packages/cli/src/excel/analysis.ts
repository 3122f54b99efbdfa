import type { Workbook, Worksheet } from 'exceljs';
import { Decimal } from 'decimal.js';
import { summarize } from '@card-ledger/core';
import type { SummaryBucket, TransactionSummary } from '@card-ledger/core';
import type { Transaction } from '@card-ledger/shared';
import { CURRENCY_FORMAT, createWorkbook, formatHeaderRow, autoFitColumns, formatCurrencyColumn } from './utils.js';

/**
 * Generates the analysis Excel report with one sheet per summary view.
 */
export async function generateAnalysisExcel(transactions: Transaction[]): Promise<Workbook> {
    const workbook = createWorkbook();
    const summary = summarize(transactions);

    addBucketSheet(workbook, 'By Label', 'label', summary.byLabel);
    addBucketSheet(workbook, 'By Origin', 'origin_tag', summary.byOrigin);
    addBucketSheet(workbook, 'By Month', 'month', summary.byMonth);
    addSummarySheet(workbook, summary);

    return workbook;
}

/**
 * Columns: <key>, total_amount, transaction_count
 */
function addBucketSheet(workbook: Workbook, name: string, keyHeader: string, buckets: SummaryBucket[]): void {
    const sheet = workbook.addWorksheet(name);
    sheet.columns = [
        { header: keyHeader, key: 'key' },
        { header: 'total_amount', key: 'total_amount' },
        { header: 'transaction_count', key: 'transaction_count' },
    ];

    for (const bucket of buckets) {
        sheet.addRow({
            key: bucket.key,
            total_amount: new Decimal(bucket.total).toNumber(),
            transaction_count: bucket.count,
        });
    }

    finish(sheet, 'total_amount');
}

/**
 * Sheet: Summary
 * Rows: Transaction count, Total spend, First date, Last date
 */
function addSummarySheet(workbook: Workbook, summary: TransactionSummary): void {
    const sheet = workbook.addWorksheet('Summary');
    sheet.columns = [
        { header: 'Metric', key: 'metric' },
        { header: 'Value', key: 'value' },
    ];

    sheet.addRow({ metric: 'Transaction count', value: summary.count });
    sheet.addRow({ metric: 'Total spend', value: new Decimal(summary.total).toNumber() });
    sheet.addRow({ metric: 'First date', value: summary.dateRange?.first ?? '' });
    sheet.addRow({ metric: 'Last date', value: summary.dateRange?.last ?? '' });

    formatHeaderRow(sheet);
    sheet.getCell('B3').numFmt = CURRENCY_FORMAT;
    autoFitColumns(sheet);
}

function finish(sheet: Worksheet, currencyColumn: string): void {
    formatHeaderRow(sheet);
    formatCurrencyColumn(sheet, currencyColumn);
    autoFitColumns(sheet);
}
