import { createWriteStream, type WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import { once } from 'node:events';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import { REPORT_COLUMNS, type ReportRow } from './rows.js';

const HEADER = REPORT_COLUMNS.map((column) => column.header);

export class CsvStreamWriter {
  private failure: Error | undefined;

  private constructor(private readonly destination: string, private readonly stream: WriteStream) {
    stream.on('error', (error) => {
      this.failure = error;
    });
  }

  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    // Rejects with the open error (EISDIR, EACCES, ...).
    await once(stream, 'open');
    const writer = new CsvStreamWriter(destination, stream);
    await writer.writeLine(HEADER.map(csvEscape).join(','));
    return writer;
  }

  async writeRow(row: ReportRow): Promise<void> {
    await this.writeLine(REPORT_COLUMNS.map((column) => csvEscape(String(row[column.key]))).join(','));
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }

  get path(): string {
    return this.destination;
  }

  private async writeLine(line: string): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (!this.stream.write(`${line}\n`)) {
      await once(this.stream, 'drain');
    }
  }
}

export async function writeCsvReport(rows: ReportRow[], destination: string): Promise<string> {
  const writer = await CsvStreamWriter.create(destination);
  for (const row of rows) {
    await writer.writeRow(row);
  }
  await writer.close();
  return writer.path;
}

export function csvEscape(value: string): string {
  const needsQuotes = value.includes(',') || value.includes('\n') || value.includes('"');
  const sanitized = value.replace(/\r?\n/g, ' ').replace(/"/g, '""');
  return needsQuotes ? `"${sanitized}"` : sanitized;
}
