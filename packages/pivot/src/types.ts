import type { CalendarDate } from './dates';
import type { StationId } from './stations';

export type Reading = {
  stationId: string;
  code: string;
  date: CalendarDate;
  value: number | null;
};

export type Dataset = readonly Reading[];

export type WideRow = {
  stationId: StationId;
  /** dd-mm-yyyy */
  date: string;
  values: Array<number | null>;
};

export type WideMatrix = {
  stationId: StationId;
  columns: string[];
  rows: WideRow[];
};

/**
 * `first-seen` keeps dates in the order they first appear in the upload.
 */
export type RowOrder = 'first-seen' | 'chronological';

/**
 * `position` derives `Data <n>` columns from the last two characters of each code.
 */
export type ColumnMode = 'code' | 'position';

export type ReshapeOptions = {
  rowOrder?: RowOrder;
  columnMode?: ColumnMode;
};
