import path from 'node:path';
import type { AirlineCheckRecord, ReportFormat } from '../types/index.js';
import { writeCsvReport } from './csvWriter.js';
import { recordsToRows } from './rows.js';
import { writeXlsxReport } from './xlsxReport.js';

export interface WriteReportOptions {
  format: ReportFormat;
  path: string;
  generatedAt?: Date;
}

export const REPORT_FORMATS: readonly ReportFormat[] = ['xlsx', 'csv'];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export async function writeReport(records: AirlineCheckRecord[], options: WriteReportOptions): Promise<string> {
  const rows = recordsToRows(records);
  const destination = path.resolve(options.path);
  switch (options.format) {
    case 'xlsx':
      return writeXlsxReport(rows, destination, options.generatedAt ?? new Date());
    case 'csv':
      return writeCsvReport(rows, destination);
  }
}

export function defaultReportPath(format: ReportFormat): string {
  return path.join('output', `airline_status_report_final.${format}`);
}

/** Intermediate reports sit next to the final one: `airline_status_report_temp_{count}.{ext}`. */
export function checkpointReportPath(finalPath: string, format: ReportFormat, count: number): string {
  return path.join(path.dirname(finalPath), `airline_status_report_temp_${count}.${format}`);
}
