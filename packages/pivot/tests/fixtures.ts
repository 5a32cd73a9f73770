import ExcelJS from 'exceljs';

import type { CalendarDate, Reading } from '../src';

export type SheetCell = string | number | null;

export const READING_HEADERS = ['Station_ID', 'PCode', 'Date_Time', 'Result'];

export async function buildSpreadsheet(rows: SheetCell[][], headers: string[] = READING_HEADERS): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Readings');
  sheet.addRow(headers);
  for (const row of rows) {
    sheet.addRow(row);
  }
  const output = await workbook.xlsx.writeBuffer();
  return Buffer.from(output);
}

export const scenarioRows: SheetCell[][] = [
  ['TUS', 'P01', '2024-01-01', 10.5],
  ['TUS', 'P02', '2024-01-01', 20.3],
  ['TUS', 'P03', '2024-01-01', 15.7],
  ['CT', 'P01', '2024-01-01', 12.1],
  ['CT', 'P02', '2024-01-01', 18.9],
  ['CT', 'P03', '2024-01-01', 22.4]
];

const parseKey = (key: string): CalendarDate => {
  const [year, month, day] = key.split('-').map(Number);
  return { year, month, day };
};

export const reading = (stationId: string, code: string, date: string, value: number | null): Reading => ({
  stationId,
  code,
  date: parseKey(date),
  value
});

export const scenarioReadings: Reading[] = [
  reading('TUS', 'P01', '2024-01-01', 10.5),
  reading('TUS', 'P02', '2024-01-01', 20.3),
  reading('TUS', 'P03', '2024-01-01', 15.7),
  reading('CT', 'P01', '2024-01-01', 12.1),
  reading('CT', 'P02', '2024-01-01', 18.9),
  reading('CT', 'P03', '2024-01-01', 22.4)
];
