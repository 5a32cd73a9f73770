import { PivotProcessingError, describeCause, fail, ok, type Result } from './errors';
import { ingestWorkbook } from './ingest';
import { reshape } from './pivot';
import type { ColumnMode, RowOrder, WideMatrix } from './types';
import { buildWorkbook, type WorkbookOptions } from './workbook';

export type AnalysisRequest = {
  stationId: string;
  codes?: ReadonlyArray<string | null | undefined>;
  rowOrder?: RowOrder;
  columnMode?: ColumnMode;
  workbook?: WorkbookOptions;
};

export type AnalysisOutput = {
  matrix: WideMatrix;
  workbook: Buffer;
  fileName: string;
};

export const analysisFileName = (stationId: string) => `${stationId}_analysis.xlsx`;

async function runAnalysis(buffer: Buffer, request: AnalysisRequest): Promise<Result<AnalysisOutput>> {
  const dataset = ingestWorkbook(buffer);
  if (!dataset.ok) {
    return dataset;
  }

  const matrix = reshape(dataset.value, request.stationId, {
    rowOrder: request.rowOrder,
    columnMode: request.columnMode
  });
  if (!matrix.ok) {
    return matrix;
  }

  const workbook = await buildWorkbook(matrix.value, request.codes ?? [], request.workbook);
  if (!workbook.ok) {
    return workbook;
  }

  return ok({
    matrix: matrix.value,
    workbook: workbook.value,
    fileName: analysisFileName(matrix.value.stationId)
  });
}

/**
 * Upload buffer in, analysis workbook out. Validation failures are returned
 * as they are; anything thrown along the way becomes a processing error.
 */
export async function analyzeSpreadsheet(buffer: Buffer, request: AnalysisRequest): Promise<Result<AnalysisOutput>> {
  try {
    return await runAnalysis(buffer, request);
  } catch (error) {
    return fail(new PivotProcessingError(`Error processing Excel file: ${describeCause(error)}`, error));
  }
}
