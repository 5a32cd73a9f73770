export type CalendarDate = {
  year: number;
  month: number;
  day: number;
};

const MS_PER_DAY = 86_400_000;
const EXCEL_1900_EPOCH = Date.UTC(1899, 11, 30);
const EXCEL_1904_EPOCH = Date.UTC(1904, 0, 1);

const ISO_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:$|[T\s])/;
const NUMERIC_DATE_PATTERN = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})(?:$|\s)/;

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

export function dateKey(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

export function formatDate(date: CalendarDate): string {
  return `${pad(date.day)}-${pad(date.month)}-${pad(date.year, 4)}`;
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

function fromParts(year: number, month: number, day: number): CalendarDate | null {
  return isValidDate(year, month, day) ? { year, month, day } : null;
}

/**
 * Converts an Excel serial day number into a calendar date. The fractional
 * part (time of day) is dropped. Serials before 1900-03-01 are shifted to undo
 * Excel's phantom 1900-02-29.
 */
export function fromExcelSerial(serial: number, date1904 = false): CalendarDate | null {
  if (!Number.isFinite(serial) || serial < (date1904 ? 0 : 1)) {
    return null;
  }
  const days = Math.floor(serial);
  const epoch = date1904 ? EXCEL_1904_EPOCH : EXCEL_1900_EPOCH;
  const offset = !date1904 && days < 60 ? days + 1 : days;
  const instant = new Date(epoch + offset * MS_PER_DAY);
  return {
    year: instant.getUTCFullYear(),
    month: instant.getUTCMonth() + 1,
    day: instant.getUTCDate()
  };
}

export function fromJsDate(value: Date): CalendarDate | null {
  if (Number.isNaN(value.getTime())) {
    return null;
  }
  return { year: value.getFullYear(), month: value.getMonth() + 1, day: value.getDate() };
}

export function parseDateText(text: string): CalendarDate | null {
  const trimmed = text.trim();
  if (!trimmed) {
    return null;
  }

  const iso = ISO_DATE_PATTERN.exec(trimmed);
  if (iso) {
    return fromParts(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  // Month first; day first only when the leading number cannot be a month.
  const numeric = NUMERIC_DATE_PATTERN.exec(trimmed);
  if (numeric) {
    const [first, second, year] = [Number(numeric[1]), Number(numeric[2]), Number(numeric[3])];
    return fromParts(year, first, second) ?? (first > 12 ? fromParts(year, second, first) : null);
  }

  return fromJsDate(new Date(trimmed));
}
