import { columnIndex, findMissingColumns, readFirstSheet, toLabel, type RawSheet } from './ingest';
import { sortedDistinct } from './pivot';

function distinctColumn(sheet: RawSheet, column: string, filter?: { column: string; equals: string }): string[] {
  const required = filter ? [column, filter.column] : [column];
  if (findMissingColumns(sheet.headers, required).length > 0) {
    return [];
  }

  const valueIndex = columnIndex(sheet.headers, column);
  const filterIndex = filter ? columnIndex(sheet.headers, filter.column) : -1;
  const values: string[] = [];
  for (const row of sheet.rows) {
    if (filter && toLabel(row[filterIndex] ?? null) !== filter.equals) {
      continue;
    }
    const value = toLabel(row[valueIndex] ?? null);
    if (value) {
      values.push(value);
    }
  }
  return sortedDistinct(values);
}

/**
 * Lists the stations in an upload, or the codes recorded for one station.
 * Only feeds selection lists, so anything unreadable yields `[]`.
 */
export function listCodes(source: Buffer | RawSheet, stationId?: string): string[] {
  try {
    let sheet: RawSheet;
    if (Buffer.isBuffer(source)) {
      const read = readFirstSheet(source);
      if (!read.ok) {
        return [];
      }
      sheet = read.value;
    } else {
      sheet = source;
    }

    if (stationId === undefined) {
      return distinctColumn(sheet, 'Station_ID');
    }
    return distinctColumn(sheet, 'PCode', { column: 'Station_ID', equals: stationId.trim() });
  } catch {
    return [];
  }
}

export const listStations = (source: Buffer | RawSheet): string[] => listCodes(source);
