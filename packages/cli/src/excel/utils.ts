import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'framecheck';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen.
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
 * Sizes each column to its longest line of content, capped at 100.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value) {
                const longest = Math.max(...cell.value.toString().split('\n').map((line) => line.length));
                if (longest > maxLen) maxLen = longest;
            }
        });
        column.width = Math.min(maxLen + 2, 100);
    });
}

/**
 * Fills the rows whose `severity` cell is "error" with a light red background.
 */
export function highlightErrors(worksheet: Worksheet, severityKey: string): void {
    const column = worksheet.getColumn(severityKey);
    column.eachCell({ includeEmpty: false }, (cell, rowNumber) => {
        if (rowNumber > 1 && cell.value === 'error') {
            worksheet.getRow(rowNumber).fill = {
                type: 'pattern',
                pattern: 'solid',
                fgColor: { argb: 'FFF8D7DA' }
            };
        }
    });
}
