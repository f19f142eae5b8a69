import ExcelJS from 'exceljs';

export interface SpreadsheetColumn<T> {
  header: string;
  value: (row: T) => string | number;
}

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const MAX_COLUMN_WIDTH = 50;

/**
 * Single-sheet workbook: styled header row, one row per item, column widths
 * fitted to the longest cell.
 */
export async function renderSpreadsheet<T>(
  rows: T[],
  columns: SpreadsheetColumn<T>[],
  sheetName: string
): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(sheetName);

  const header = worksheet.addRow(columns.map((column) => column.header));
  header.eachCell((cell) => {
    cell.font = { bold: true, color: { argb: 'FFFFFFFF' } };
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF366092' } };
  });

  const widths = columns.map((column) => column.header.length);

  for (const row of rows) {
    const values = columns.map((column) => column.value(row));
    values.forEach((value, index) => {
      widths[index] = Math.max(widths[index] ?? 0, String(value).length);
    });
    worksheet.addRow(values);
  }

  widths.forEach((width, index) => {
    worksheet.getColumn(index + 1).width = Math.min(width + 2, MAX_COLUMN_WIDTH);
  });

  return Buffer.from(await workbook.xlsx.writeBuffer());
}

export function exportFileName(prefix: string, generatedAt: Date = new Date()): string {
  const stamp = generatedAt.toISOString().slice(0, 19).replace(/[-:T]/g, '');
  return `${prefix}_${stamp}.xlsx`;
}
