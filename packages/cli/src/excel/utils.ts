import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

/** Two decimals, negatives in red. */
export const CURRENCY_FORMAT = '#,##0.00;[Red]-#,##0.00';

const HEADER_FILL = 'FF2F5597';
const MIN_WIDTH = 10;
const MAX_WIDTH = 60;

export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Card Ledger';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white header on a dark fill, frozen above the data.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true, color: { argb: 'FFFFFFFF' } };
    headerRow.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL } };
    worksheet.views = [{ state: 'frozen', xSplit: 0, ySplit: 1 }];
}

/**
 * Sizes each column to its longest value, within fixed bounds.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach((column) => {
        let longest = MIN_WIDTH;
        column.eachCell?.({ includeEmpty: false }, (cell) => {
            longest = Math.max(longest, String(cell.value ?? '').length);
        });
        column.width = Math.min(longest + 2, MAX_WIDTH);
    });
}

export function formatCurrencyColumn(worksheet: Worksheet, key: string): void {
    const column = worksheet.getColumn(key);
    column.numFmt = CURRENCY_FORMAT;
    column.alignment = { horizontal: 'right' };
}
