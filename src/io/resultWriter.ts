/**
 * Pass/fail CSV output.
 * pass.csv: Email,Web Address
 * fail.csv: Email,Web Address,Reason
 * Fields are quoted per RFC 4180 and rows end in CRLF.
 */

import { once } from 'events';
import { WriteStream, createWriteStream } from 'fs';
import { OutcomeSink } from '../services/bulkRunner';
import { ValidationOutcome, ValidationRecord } from '../types/email';

export const PASS_HEADERS = ['Email', 'Web Address'];
export const FAIL_HEADERS = ['Email', 'Web Address', 'Reason'];

const LINE_END = '\r\n';

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(fields: string[]): string {
  return fields.map(escapeCsvField).join(',');
}

export function passRow(record: ValidationRecord): string[] {
  return [record.email, record.website ?? ''];
}

export function failRow(record: ValidationRecord, outcome: ValidationOutcome): string[] {
  return [record.email, record.website ?? '', outcome.reason ?? ''];
}

/**
 * Whole CSV document as a string (HTTP responses)
 */
export function buildCsv(headers: string[], rows: string[][]): string {
  return [headers, ...rows].map(row => formatCsvRow(row) + LINE_END).join('');
}

/**
 * Streams outcomes into pass and fail files as they arrive
 */
export class CsvResultSink implements OutcomeSink {
  private passed = 0;
  private failed = 0;
  private streamError: Error | null = null;

  private constructor(
    private readonly passStream: WriteStream,
    private readonly failStream: WriteStream
  ) {
    const onError = (error: Error) => {
      if (!this.streamError) {
        this.streamError = error;
      }
    };
    passStream.on('error', onError);
    failStream.on('error', onError);
  }

  /**
   * Create (or truncate) both files and write their header rows
   */
  static async open(passPath: string, failPath: string): Promise<CsvResultSink> {
    const sink = new CsvResultSink(createWriteStream(passPath), createWriteStream(failPath));
    await sink.writeLine(sink.passStream, PASS_HEADERS);
    await sink.writeLine(sink.failStream, FAIL_HEADERS);
    return sink;
  }

  get passedCount(): number {
    return this.passed;
  }

  get failedCount(): number {
    return this.failed;
  }

  async accept(record: ValidationRecord): Promise<void> {
    this.passed++;
    await this.writeLine(this.passStream, passRow(record));
  }

  async reject(record: ValidationRecord, outcome: ValidationOutcome): Promise<void> {
    this.failed++;
    await this.writeLine(this.failStream, failRow(record, outcome));
  }

  /**
   * Flush and close both files
   * @throws the first write error either stream hit
   */
  async close(): Promise<void> {
    await Promise.all([this.finish(this.passStream), this.finish(this.failStream)]);
    if (this.streamError) {
      throw this.streamError;
    }
  }

  private async writeLine(stream: WriteStream, fields: string[]): Promise<void> {
    if (this.streamError) {
      throw this.streamError;
    }
    if (!stream.write(formatCsvRow(fields) + LINE_END)) {
      await once(stream, 'drain');
    }
  }

  private async finish(stream: WriteStream): Promise<void> {
    if (stream.closed || this.streamError) {
      return;
    }
    stream.end();
    await once(stream, 'close');
  }
}
