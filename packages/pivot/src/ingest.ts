import * as XLSX from 'xlsx';

import { fromExcelSerial, fromJsDate, parseDateText, type CalendarDate } from './dates';
import { PivotValidationError, fail, ok, type Result, describeCause } from './errors';
import type { Dataset, Reading } from './types';

export const REQUIRED_COLUMNS = ['Station_ID', 'PCode', 'Date_Time', 'Result'] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export type CellValue = string | number | boolean | Date | null;

export type RawSheet = {
  sheetName: string;
  headers: string[];
  rows: CellValue[][];
  date1904: boolean;
};

const normalizeCell = (value: unknown): CellValue => {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  return String(value);
};

const headerLabel = (value: CellValue): string => {
  if (value === null) {
    return '';
  }
  return String(value).trim();
};

/**
 * Reads the first worksheet of an xlsx/xls buffer. The first non-blank row is
 * taken as the header.
 */
export function readFirstSheet(buffer: Buffer): Result<RawSheet, PivotValidationError> {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer', cellDates: false });
  } catch (error) {
    return fail(
      new PivotValidationError('UNREADABLE_FILE', `Unable to read spreadsheet: ${describeCause(error)}`)
    );
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheetName || !sheet) {
    return fail(new PivotValidationError('UNREADABLE_FILE', 'Spreadsheet does not contain any worksheets'));
  }

  const table = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: false,
    raw: true,
    defval: null
  });

  const [headerRow = [], ...bodyRows] = table;
  return ok({
    sheetName,
    headers: headerRow.map((cell) => headerLabel(normalizeCell(cell))),
    rows: bodyRows.map((row) => row.map(normalizeCell)),
    date1904: workbook.Workbook?.WBProps?.date1904 === true
  });
}

export function findMissingColumns(headers: readonly string[], required: readonly string[]): string[] {
  const present = new Set(headers);
  return required.filter((column) => !present.has(column));
}

export function missingColumnsError(missing: string[]): PivotValidationError {
  return new PivotValidationError('MISSING_COLUMNS', `Missing required columns: ${missing.join(', ')}`, {
    missingColumns: missing
  });
}

export function columnIndex(headers: readonly string[], column: string): number {
  return headers.indexOf(column);
}

export function toLabel(value: CellValue): string {
  if (value === null) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value).trim();
}

function toCalendarDate(value: CellValue, date1904: boolean): CalendarDate | null {
  if (value === null || typeof value === 'boolean') {
    return null;
  }
  if (typeof value === 'number') {
    return fromExcelSerial(value, date1904);
  }
  if (value instanceof Date) {
    return fromJsDate(value);
  }
  return parseDateText(value);
}

type NumericCell = { valid: true; value: number | null } | { valid: false };

function toNumeric(value: CellValue): NumericCell {
  if (value === null) {
    return { valid: true, value: null };
  }
  if (typeof value === 'number') {
    return { valid: true, value: Number.isNaN(value) ? null : value };
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed || trimmed.toLowerCase() === 'nan') {
      return { valid: true, value: null };
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? { valid: true, value: parsed } : { valid: false };
  }
  return { valid: false };
}

const isBlankRow = (row: readonly CellValue[]) =>
  row.every((cell) => cell === null || (typeof cell === 'string' && cell.trim() === ''));

/**
 * Turns a raw sheet into typed readings. Row numbers in error messages are the
 * 1-based spreadsheet rows, counting the header as row 1.
 */
export function parseReadings(sheet: RawSheet): Result<Dataset, PivotValidationError> {
  const missing = findMissingColumns(sheet.headers, REQUIRED_COLUMNS);
  if (missing.length > 0) {
    return fail(missingColumnsError(missing));
  }

  const stationIndex = columnIndex(sheet.headers, 'Station_ID');
  const codeIndex = columnIndex(sheet.headers, 'PCode');
  const dateIndex = columnIndex(sheet.headers, 'Date_Time');
  const resultIndex = columnIndex(sheet.headers, 'Result');

  const readings: Reading[] = [];
  for (const [offset, row] of sheet.rows.entries()) {
    if (isBlankRow(row)) {
      continue;
    }
    const rowNumber = offset + 2;
    const invalid = (column: RequiredColumn, reason: string) =>
      fail(
        new PivotValidationError('INVALID_VALUE', `Row ${rowNumber}: ${column} ${reason}`, {
          row: rowNumber,
          column
        })
      );

    const stationId = toLabel(row[stationIndex] ?? null);
    if (!stationId) {
      return invalid('Station_ID', 'is empty');
    }
    const code = toLabel(row[codeIndex] ?? null);
    if (!code) {
      return invalid('PCode', 'is empty');
    }
    const date = toCalendarDate(row[dateIndex] ?? null, sheet.date1904);
    if (!date) {
      return invalid('Date_Time', 'is not a recognizable date');
    }
    const numeric = toNumeric(row[resultIndex] ?? null);
    if (!numeric.valid) {
      return invalid('Result', 'must be numeric');
    }

    readings.push({ stationId, code, date, value: numeric.value });
  }

  return ok(readings);
}

export function ingestWorkbook(buffer: Buffer): Result<Dataset, PivotValidationError> {
  const sheet = readFirstSheet(buffer);
  if (!sheet.ok) {
    return sheet;
  }
  return parseReadings(sheet.value);
}
