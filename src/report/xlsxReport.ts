import { promises as fs } from 'node:fs';
import path from 'node:path';
import ExcelJS from 'exceljs';
import type { Fill, Workbook, Worksheet } from 'exceljs';
import { CONFIDENCE_LABELS, CONFIDENCE_LEGEND, REPORT_COLUMNS, STATUS_LEGEND, type ReportRow } from './rows.js';

export const RESULTS_SHEET = 'Airline status';
export const INFO_SHEET = 'Info';

const HEADER_FILL = solidFill('FF4472C4');

const CONFIDENCE_FILLS: Record<string, Fill> = {
  [CONFIDENCE_LABELS.high]: solidFill('FFC6EFCE'),
  [CONFIDENCE_LABELS.medium]: solidFill('FFFFEB9C'),
  [CONFIDENCE_LABELS.low]: solidFill('FFFFC7CE'),
};

/** Two sheets: the results table and a legend with the run's metadata. */
export function buildWorkbook(rows: ReportRow[], generatedAt: Date): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = generatedAt;

  const results = workbook.addWorksheet(RESULTS_SHEET, {
    views: [{ state: 'frozen', xSplit: 0, ySplit: 1 }],
  });
  writeResults(results, rows);

  const info = workbook.addWorksheet(INFO_SHEET);
  const lines: ReadonlyArray<ReadonlyArray<string | number>> = [
    ['Airline status report'],
    ['Generated at (UTC):', formatTimestamp(generatedAt)],
    ['Airlines checked:', rows.length],
    [],
    ['Confidence tiers:'],
    ...CONFIDENCE_LEGEND,
    [],
    ['Statuses:'],
    ...STATUS_LEGEND,
  ];
  lines.forEach((line, rowIndex) => {
    line.forEach((value, columnIndex) => {
      info.getCell(rowIndex + 1, columnIndex + 1).value = value;
    });
  });
  info.getColumn(1).width = 30;
  info.getColumn(2).width = 80;

  return workbook;
}

export async function writeXlsxReport(rows: ReportRow[], destination: string, generatedAt: Date): Promise<string> {
  const workbook = buildWorkbook(rows, generatedAt);
  await fs.mkdir(path.dirname(destination), { recursive: true });
  await workbook.xlsx.writeFile(destination);
  return destination;
}

function writeResults(sheet: Worksheet, rows: ReportRow[]) {
  REPORT_COLUMNS.forEach((column, columnIndex) => {
    sheet.getColumn(columnIndex + 1).width = column.width;
    const cell = sheet.getCell(1, columnIndex + 1);
    cell.value = column.header;
    cell.fill = HEADER_FILL;
    cell.font = { bold: true, size: 11, color: { argb: 'FFFFFFFF' } };
    cell.alignment = { horizontal: 'center', vertical: 'middle', wrapText: true };
  });

  rows.forEach((row, rowIndex) => {
    REPORT_COLUMNS.forEach((column, columnIndex) => {
      const cell = sheet.getCell(rowIndex + 2, columnIndex + 1);
      cell.value = row[column.key];
      cell.alignment = { vertical: 'middle', wrapText: true };
      if (column.key === 'confidence') {
        const fill = CONFIDENCE_FILLS[row.confidence];
        if (fill) {
          cell.fill = fill;
        }
        cell.alignment = { horizontal: 'center', vertical: 'middle' };
      }
    });
  });

  sheet.autoFilter = {
    from: { row: 1, column: 1 },
    to: { row: rows.length + 1, column: REPORT_COLUMNS.length },
  };
}

function solidFill(argb: string): Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb } };
}

function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}
