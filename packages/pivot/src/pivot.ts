import { compareDates, dateKey, formatDate, type CalendarDate } from './dates';
import { PivotValidationError, fail, ok, type Result } from './errors';
import { STATION_IDS, isStationId, type StationId } from './stations';
import type { Dataset, Reading, ReshapeOptions, WideMatrix, WideRow } from './types';

const NUMERIC_CODE = /^-?\d+(\.\d+)?$/;

/**
 * Orders codes ascending. Plain numbers come first, by value; every other
 * code follows by code unit.
 */
export function compareCodes(a: string, b: string): number {
  const aNumeric = NUMERIC_CODE.test(a);
  const bNumeric = NUMERIC_CODE.test(b);
  if (aNumeric !== bNumeric) {
    return aNumeric ? -1 : 1;
  }
  if (aNumeric) {
    const difference = Number(a) - Number(b);
    if (difference !== 0) {
      return difference;
    }
  }
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

export function sortedDistinct(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort(compareCodes);
}

/**
 * Position encoded in the last two characters of a code, e.g. `P07` -> 7.
 */
export function positionOf(code: string): number | null {
  const suffix = code.slice(-2);
  if (!/^\d{1,2}$/.test(suffix)) {
    return null;
  }
  const position = Number.parseInt(suffix, 10);
  return position >= 1 ? position : null;
}

type ColumnLayout = {
  columns: string[];
  slotOf: (reading: Reading) => number;
  sortKey: (reading: Reading) => string | number;
};

function codeLayout(readings: readonly Reading[]): ColumnLayout {
  const columns = sortedDistinct(readings.map((reading) => reading.code));
  const slots = new Map(columns.map((code, index) => [code, index]));
  return {
    columns,
    slotOf: (reading) => slots.get(reading.code) ?? -1,
    sortKey: (reading) => reading.code
  };
}

function positionLayout(readings: readonly Reading[]): Result<ColumnLayout, PivotValidationError> {
  let maxPosition = 0;
  const positions = new Map<string, number>();
  for (const reading of readings) {
    const position = positionOf(reading.code);
    if (position === null) {
      return fail(
        new PivotValidationError(
          'INVALID_POSITION_CODE',
          `Code '${reading.code}' does not end in a two-digit position`,
          { code: reading.code }
        )
      );
    }
    positions.set(reading.code, position);
    maxPosition = Math.max(maxPosition, position);
  }

  const columns = Array.from({ length: maxPosition }, (_, index) => `Data ${index + 1}`);
  const lookup = (reading: Reading) => positions.get(reading.code) ?? 0;
  return ok({
    columns,
    slotOf: (reading) => lookup(reading) - 1,
    sortKey: lookup
  });
}

function compareSortKeys(a: string | number, b: string | number): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  return compareCodes(String(a), String(b));
}

export function validateStation(
  dataset: Dataset,
  stationId: string
): Result<{ stationId: StationId; readings: Reading[] }, PivotValidationError> {
  if (!isStationId(stationId)) {
    return fail(
      new PivotValidationError(
        'INVALID_STATION',
        `Invalid Station ID: '${stationId}'. Must be either ${STATION_IDS.map((id) => `'${id}'`).join(' or ')}`,
        { stationId, allowedStations: [...STATION_IDS] }
      )
    );
  }

  const readings = dataset.filter((reading) => reading.stationId === stationId);
  if (readings.length === 0) {
    const availableStations = sortedDistinct(dataset.map((reading) => reading.stationId));
    return fail(
      new PivotValidationError(
        'STATION_NOT_FOUND',
        `Station ID '${stationId}' not found in the uploaded file. Available stations in file: ${
          availableStations.length > 0 ? availableStations.join(', ') : 'none'
        }`,
        { stationId, availableStations }
      )
    );
  }

  return ok({ stationId, readings });
}

/**
 * Pivots long-format readings for one station into one row per date and one
 * column per code. Dates keep their first-occurrence order unless
 * `rowOrder: 'chronological'` is requested. Where several readings share a
 * date and column, the last one in input order wins.
 */
export function reshape(
  dataset: Dataset,
  stationId: string,
  options: ReshapeOptions = {}
): Result<WideMatrix, PivotValidationError> {
  const station = validateStation(dataset, stationId);
  if (!station.ok) {
    return station;
  }
  const { readings } = station.value;

  let layout: ColumnLayout;
  if (options.columnMode === 'position') {
    const resolved = positionLayout(readings);
    if (!resolved.ok) {
      return resolved;
    }
    layout = resolved.value;
  } else {
    layout = codeLayout(readings);
  }

  const groups = new Map<string, { date: CalendarDate; readings: Reading[] }>();
  for (const reading of readings) {
    const key = dateKey(reading.date);
    const group = groups.get(key);
    if (group) {
      group.readings.push(reading);
    } else {
      groups.set(key, { date: reading.date, readings: [reading] });
    }
  }

  const ordered = Array.from(groups.values());
  if (options.rowOrder === 'chronological') {
    ordered.sort((a, b) => compareDates(a.date, b.date));
  }

  const rows = ordered.map<WideRow>((group) => {
    const values: Array<number | null> = layout.columns.map(() => null);
    const sorted = [...group.readings].sort((a, b) => compareSortKeys(layout.sortKey(a), layout.sortKey(b)));
    for (const reading of sorted) {
      const slot = layout.slotOf(reading);
      if (slot >= 0) {
        values[slot] = reading.value;
      }
    }
    return {
      stationId: station.value.stationId,
      date: formatDate(group.date),
      values
    };
  });

  return ok({
    stationId: station.value.stationId,
    columns: layout.columns,
    rows
  });
}

export function columnValues(matrix: WideMatrix, column: string): Array<number | null> | null {
  const index = matrix.columns.indexOf(column);
  if (index < 0) {
    return null;
  }
  return matrix.rows.map((row) => row.values[index] ?? null);
}
