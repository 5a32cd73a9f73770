import assert from 'node:assert/strict';
import { test } from 'node:test';

import { formatDate, fromExcelSerial, ingestWorkbook, parseDateText, readFirstSheet } from '../src';
import { buildSpreadsheet, scenarioRows } from './fixtures';

test('ingests typed readings from an uploaded workbook', async () => {
  const buffer = await buildSpreadsheet(scenarioRows);
  const result = ingestWorkbook(buffer);
  assert.ok(result.ok);

  assert.equal(result.value.length, 6);
  assert.deepEqual(result.value[0], {
    stationId: 'TUS',
    code: 'P01',
    date: { year: 2024, month: 1, day: 1 },
    value: 10.5
  });
  assert.deepEqual(result.value[5], {
    stationId: 'CT',
    code: 'P03',
    date: { year: 2024, month: 1, day: 1 },
    value: 22.4
  });
});

test('accepts serial dates, text timestamps, numeric text and blank results', async () => {
  const buffer = await buildSpreadsheet([
    ['TUS', 'P01', 45292.75, '20.3'],
    ['TUS', 'P02', '2024-01-05 13:45:00', null],
    ['TUS', 101, '05/02/2024', 4]
  ]);

  const result = ingestWorkbook(buffer);
  assert.ok(result.ok);
  assert.deepEqual(
    result.value.map((entry) => [entry.code, formatDate(entry.date), entry.value]),
    [
      ['P01', '01-01-2024', 20.3],
      ['P02', '05-01-2024', null],
      ['101', '02-05-2024', 4]
    ]
  );
});

test('reads slashed text dates month first', async () => {
  const buffer = await buildSpreadsheet([
    ['TUS', 'P01', '1/13/2024', 1],
    ['TUS', 'P01', '01/02/2024', 2],
    ['TUS', 'P01', '25/12/2024', 3]
  ]);

  const result = ingestWorkbook(buffer);
  assert.ok(result.ok);
  assert.deepEqual(
    result.value.map((entry) => formatDate(entry.date)),
    ['13-01-2024', '02-01-2024', '25-12-2024']
  );
});

test('names exactly the missing required columns', async () => {
  const buffer = await buildSpreadsheet(
    [['TUS', 'P01', '2024-01-01']],
    ['Station_ID', 'PCode', 'Date_Time']
  );

  const result = ingestWorkbook(buffer);
  assert.equal(result.ok, false);
  if (result.ok) {
    return;
  }
  assert.equal(result.error.code, 'MISSING_COLUMNS');
  assert.equal(result.error.message, 'Missing required columns: Result');
  assert.deepEqual(result.error.details?.missingColumns, ['Result']);
});

test('rejects non-numeric results with the spreadsheet row number', async () => {
  const buffer = await buildSpreadsheet([
    ['TUS', 'P01', '2024-01-01', 1],
    ['TUS', 'P02', '2024-01-01', 'high']
  ]);

  const result = ingestWorkbook(buffer);
  assert.equal(result.ok, false);
  if (result.ok) {
    return;
  }
  assert.equal(result.error.code, 'INVALID_VALUE');
  assert.equal(result.error.message, 'Row 3: Result must be numeric');
});

test('rejects unparseable timestamps', async () => {
  const buffer = await buildSpreadsheet([['TUS', 'P01', 'someday', 1]]);
  const result = ingestWorkbook(buffer);
  assert.equal(result.ok, false);
  if (result.ok) {
    return;
  }
  assert.equal(result.error.message, 'Row 2: Date_Time is not a recognizable date');
});

test('reads the header row of the first worksheet', async () => {
  const buffer = await buildSpreadsheet(scenarioRows);
  const sheet = readFirstSheet(buffer);
  assert.ok(sheet.ok);
  assert.equal(sheet.value.sheetName, 'Readings');
  assert.deepEqual(sheet.value.headers, ['Station_ID', 'PCode', 'Date_Time', 'Result']);
  assert.equal(sheet.value.rows.length, 6);
});

test('converts Excel serial days and text dates to calendar dates', () => {
  assert.deepEqual(fromExcelSerial(1), { year: 1900, month: 1, day: 1 });
  assert.deepEqual(fromExcelSerial(59), { year: 1900, month: 2, day: 28 });
  assert.deepEqual(fromExcelSerial(61), { year: 1900, month: 3, day: 1 });
  assert.deepEqual(fromExcelSerial(45292), { year: 2024, month: 1, day: 1 });
  assert.deepEqual(fromExcelSerial(0, true), { year: 1904, month: 1, day: 1 });
  assert.equal(fromExcelSerial(0), null);

  assert.deepEqual(parseDateText('2024-03-09T08:00:00Z'), { year: 2024, month: 3, day: 9 });
  assert.deepEqual(parseDateText('01/02/2024'), { year: 2024, month: 1, day: 2 });
  assert.deepEqual(parseDateText('1/13/2024'), { year: 2024, month: 1, day: 13 });
  assert.deepEqual(parseDateText('09-03-2024 08:30'), { year: 2024, month: 9, day: 3 });
  assert.deepEqual(parseDateText('13.03.2024'), { year: 2024, month: 3, day: 13 });
  assert.equal(parseDateText('13/13/2024'), null);
  assert.equal(parseDateText('2024-02-30'), null);
  assert.equal(parseDateText(''), null);
});
