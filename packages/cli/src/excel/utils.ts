import type { Worksheet, Workbook } from 'exceljs';

/**
 * Raised when the spreadsheet library cannot be loaded.
 */
export class ReportCapabilityError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ReportCapabilityError';
    }
}

/**
 * Creates a new workbook with standard metadata.
 * exceljs is loaded on first use so the menu keeps working without it.
 */
export async function createWorkbook(created: Date): Promise<Workbook> {
    let exceljs: typeof import('exceljs');
    try {
        exceljs = (await import('exceljs')).default;
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new ReportCapabilityError(`The 'exceljs' library could not be loaded (${detail})`);
    }

    const workbook = new exceljs.Workbook();
    workbook.creator = 'Library Circulation';
    workbook.created = created;
    return workbook;
}

/**
 * Applies professional styling to the header row.
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
        fgColor: { argb: 'FF4472C4' } // Professional Blue
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    // Freeze the top row for better navigation
    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Attempts to auto-fit column widths based on cell content.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value !== null && cell.value !== undefined) {
                const len = cell.value.toString().length;
                if (len > maxLen) maxLen = len;
            }
        });
        // Add a bit of padding and cap at 100
        column.width = Math.min(maxLen + 2, 100);
    });
}

/**
 * Right-aligned whole-number format for fine columns.
 */
export function formatAmountColumn(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '#,##0';
    column.alignment = { horizontal: 'right' };
}

/**
 * Print layout: fit to page width, header row repeated on every page,
 * title and generation date in the page header, page numbers in the footer.
 */
export function setupPrintLayout(worksheet: Worksheet, title: string, generatedOn: string): void {
    worksheet.pageSetup.orientation = 'portrait';
    worksheet.pageSetup.fitToPage = true;
    worksheet.pageSetup.fitToWidth = 1;
    worksheet.pageSetup.fitToHeight = 0;
    worksheet.pageSetup.printTitlesRow = '1:1';
    worksheet.headerFooter.oddHeader = `&L&B${title}&R Generated on: ${generatedOn}`;
    worksheet.headerFooter.oddFooter = '&CPage &P of &N';
}
