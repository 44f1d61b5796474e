import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(created: Date = new Date()): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'GL Deductions Report';
    workbook.created = created;
    return workbook;
}

/**
 * External column name to sheet header: 'GL_Account' -> 'GL Account'.
 */
export function toHeader(column: string): string {
    return column.replace(/_/g, ' ');
}

/**
 * Bold header row on a blue fill, frozen above the data.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Column width = longest header or value + 2, capped at 100.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 8;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value !== null && cell.value !== undefined) {
                const len = cell.value.toString().length;
                if (len > maxLen) maxLen = len;
            }
        });
        column.width = Math.min(maxLen + 2, 100);
    });
}

/**
 * Two-decimal number format for money columns; negatives in red.
 */
export function formatMoneyColumn(worksheet: Worksheet, key: string): void {
    const column = worksheet.getColumn(key);
    column.numFmt = '#,##0.00;[Red]-#,##0.00';
    column.alignment = { horizontal: 'right' };
}
