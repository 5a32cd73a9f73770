import ExcelJS from 'exceljs';

import { renderChart, type ChartOptions } from './chart';
import { PivotProcessingError, PivotValidationError, describeCause, fail, ok, type Result } from './errors';
import type { WideMatrix } from './types';

export const ANALYSIS_SHEET = 'Analysis';
export const MAX_CHART_CODES = 2;
export const COLUMN_WIDTH = 15;

const HEADER_FONT: Partial<ExcelJS.Font> = { name: 'Calibri', size: 12, bold: true, color: { argb: 'FFFFFFFF' } };
const HEADER_FILL: ExcelJS.Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF1F4E78' } };
const BODY_FONT: Partial<ExcelJS.Font> = { name: 'Arial', size: 10 };
const THIN_BORDER: Partial<ExcelJS.Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' }
};

const INVALID_SHEET_CHARS = /[\\/?*[\]:]/g;
const MAX_SHEET_NAME = 31;

export type WorkbookOptions = {
  chart?: ChartOptions;
};

/**
 * Maps a code onto a legal, unused worksheet name.
 */
export function chartSheetName(code: string, taken: ReadonlySet<string>): string {
  const cleaned = code.replace(INVALID_SHEET_CHARS, '_').replace(/^'+|'+$/g, '').trim() || 'Chart';
  let candidate = cleaned.slice(0, MAX_SHEET_NAME);
  let attempt = 2;
  while (taken.has(candidate.toLowerCase())) {
    const suffix = ` (${attempt})`;
    candidate = `${cleaned.slice(0, MAX_SHEET_NAME - suffix.length)}${suffix}`;
    attempt += 1;
  }
  return candidate;
}

export function normalizeSelectedCodes(codes: ReadonlyArray<string | null | undefined>): Result<string[], PivotValidationError> {
  const selected: string[] = [];
  for (const code of codes) {
    const trimmed = code?.trim();
    if (trimmed && !selected.includes(trimmed)) {
      selected.push(trimmed);
    }
  }
  if (selected.length > MAX_CHART_CODES) {
    return fail(
      new PivotValidationError('TOO_MANY_CODES', `At most ${MAX_CHART_CODES} codes can be charted`, {
        codes: selected
      })
    );
  }
  return ok(selected);
}

function writeAnalysisSheet(workbook: ExcelJS.Workbook, matrix: WideMatrix): void {
  const sheet = workbook.addWorksheet(ANALYSIS_SHEET, {
    views: [{ state: 'frozen', ySplit: 1 }]
  });
  const headers = ['Station', 'Dates', ...matrix.columns];
  sheet.columns = headers.map((header) => ({ header, width: COLUMN_WIDTH }));

  const headerRow = sheet.getRow(1);
  headerRow.eachCell((cell) => {
    cell.font = HEADER_FONT;
    cell.fill = HEADER_FILL;
    cell.alignment = { horizontal: 'center', vertical: 'middle' };
    cell.border = THIN_BORDER;
  });

  for (const row of matrix.rows) {
    const added = sheet.addRow([row.stationId, row.date, ...row.values]);
    for (let column = 1; column <= headers.length; column += 1) {
      const cell = added.getCell(column);
      cell.font = BODY_FONT;
      cell.border = THIN_BORDER;
      cell.alignment = { horizontal: column <= 2 ? 'center' : 'right' };
    }
  }
}

/**
 * Assembles the analysis workbook in memory: the matrix on one sheet and a
 * chart sheet for each selected code that is a column of the matrix.
 */
export async function createWorkbook(
  matrix: WideMatrix,
  selectedCodes: ReadonlyArray<string | null | undefined>,
  options: WorkbookOptions = {}
): Promise<Result<ExcelJS.Workbook>> {
  const selection = normalizeSelectedCodes(selectedCodes);
  if (!selection.ok) {
    return selection;
  }

  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'station-analyzer';
  writeAnalysisSheet(workbook, matrix);

  const taken = new Set([ANALYSIS_SHEET.toLowerCase()]);
  for (const code of selection.value) {
    if (!matrix.columns.includes(code)) {
      continue;
    }
    const chart = await renderChart(matrix, code, options.chart);
    if (!chart.ok) {
      return chart;
    }

    const name = chartSheetName(code, taken);
    taken.add(name.toLowerCase());
    const sheet = workbook.addWorksheet(name);
    const imageId = workbook.addImage({
      base64: `data:image/png;base64,${chart.value.toString('base64')}`,
      extension: 'png'
    });
    sheet.addImage(imageId, {
      tl: { col: 0, row: 0 },
      ext: { width: options.chart?.width ?? 960, height: options.chart?.height ?? 480 }
    });
  }

  return ok(workbook);
}

export async function buildWorkbook(
  matrix: WideMatrix,
  selectedCodes: ReadonlyArray<string | null | undefined>,
  options: WorkbookOptions = {}
): Promise<Result<Buffer>> {
  const created = await createWorkbook(matrix, selectedCodes, options);
  if (!created.ok) {
    return created;
  }

  try {
    const output = await created.value.xlsx.writeBuffer();
    return ok(Buffer.from(output));
  } catch (error) {
    return fail(new PivotProcessingError(`Failed to write workbook: ${describeCause(error)}`, error));
  }
}
