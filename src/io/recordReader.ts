/**
 * Input readers for bulk validation.
 * CSV is streamed through csv-parser; Excel workbooks (.xlsx/.xls) are read
 * whole with xlsx and use the first sheet. Both expect a header row with an
 * `Email` column and optionally a `Web Address` column.
 */

import csvParser from 'csv-parser';
import { createReadStream } from 'fs';
import { readFile, stat } from 'fs/promises';
import { extname } from 'path';
import { Readable } from 'stream';
import * as XLSX from 'xlsx';
import { RecordSource } from '../services/bulkRunner';
import { ValidationRecord } from '../types/email';
import { InputFormatError } from '../types/errors';

/** Accepted header names, compared after trimming and lower-casing */
export const EMAIL_HEADERS = ['email', 'email address'];
export const WEBSITE_HEADERS = ['web address', 'website', 'web'];

const SPREADSHEET_EXTENSIONS = ['.xlsx', '.xls'];

export interface RecordColumns {
  email: string;
  website: string | null;
}

export function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim().toLowerCase();
}

export function isSpreadsheet(fileName: string): boolean {
  return SPREADSHEET_EXTENSIONS.includes(extname(fileName).toLowerCase());
}

/**
 * Pick the email and website columns out of a (normalized) header row
 * @throws InputFormatError when there is no email column
 */
export function resolveColumns(headers: string[]): RecordColumns {
  const email = EMAIL_HEADERS.find(name => headers.includes(name));
  if (!email) {
    throw new InputFormatError(
      `Missing email column. Expected one of: ${EMAIL_HEADERS.join(', ')} (found: ${headers.join(', ') || 'none'})`
    );
  }
  return {
    email,
    website: WEBSITE_HEADERS.find(name => headers.includes(name)) ?? null,
  };
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cellText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

function isBlankRow(row: Record<string, unknown>): boolean {
  return Object.values(row).every(value => cellText(value) === '');
}

function toRecord(row: Record<string, unknown>, columns: RecordColumns): ValidationRecord {
  const email = cellText(row[columns.email]);
  if (columns.website === null) {
    return { email };
  }
  return { email, website: cellText(row[columns.website]) };
}

/**
 * Stream records out of CSV text. Blank lines are skipped; every other row
 * becomes a record, even one with an empty email cell.
 * @throws InputFormatError when the header row has no email column
 */
export async function* parseCsvRecords(input: Readable): AsyncGenerator<ValidationRecord, void, undefined> {
  const parser = input.pipe(csvParser({ mapHeaders: ({ header }) => normalizeHeader(header) }));
  input.on('error', error => parser.destroy(error));

  let columns: RecordColumns | null = null;

  try {
    for await (const row of parser) {
      if (!isRow(row) || isBlankRow(row)) continue;
      if (!columns) {
        columns = resolveColumns(Object.keys(row));
      }
      yield toRecord(row, columns);
    }
  } finally {
    input.destroy();
  }
}

/**
 * Read records from the first sheet of an Excel workbook
 * @throws InputFormatError when the workbook is empty or has no email column
 */
export function parseSpreadsheetRecords(buffer: Buffer): ValidationRecord[] {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const sheetName = workbook.SheetNames[0];
  if (sheetName === undefined) {
    throw new InputFormatError('Workbook has no sheets');
  }

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    defval: '',
    raw: false,
  });

  const records: ValidationRecord[] = [];
  let columns: RecordColumns | null = null;

  for (const raw of rows) {
    const row: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
      row[normalizeHeader(key)] = value;
    }
    if (isBlankRow(row)) continue;
    if (!columns) {
      columns = resolveColumns(Object.keys(row));
    }
    records.push(toRecord(row, columns));
  }

  return records;
}

/**
 * Parse an uploaded file held in memory
 */
export async function readRecordsFromBuffer(buffer: Buffer, fileName: string): Promise<ValidationRecord[]> {
  if (isSpreadsheet(fileName)) {
    return parseSpreadsheetRecords(buffer);
  }

  const records: ValidationRecord[] = [];
  for await (const record of parseCsvRecords(Readable.from([buffer]))) {
    records.push(record);
  }
  return records;
}

/**
 * Open a CSV or Excel file for a bulk run. CSV files are streamed, so a
 * missing email column only surfaces once iteration starts.
 * @throws when the file does not exist or is not a regular file
 */
export async function openRecordFile(filePath: string): Promise<RecordSource> {
  const info = await stat(filePath);
  if (!info.isFile()) {
    throw new InputFormatError(`Not a file: ${filePath}`);
  }

  if (isSpreadsheet(filePath)) {
    return parseSpreadsheetRecords(await readFile(filePath));
  }

  return parseCsvRecords(createReadStream(filePath));
}
