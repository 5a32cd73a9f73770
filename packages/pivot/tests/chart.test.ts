import assert from 'node:assert/strict';
import { test } from 'node:test';

import sharp from 'sharp';

import { buildChartSvg, chartTitle, escapeXml, renderChart, selectTickIndices, type WideMatrix } from '../src';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const matrix: WideMatrix = {
  stationId: 'TUS',
  columns: ['P01', 'P&2'],
  rows: [
    { stationId: 'TUS', date: '01-01-2024', values: [10.5, 1] },
    { stationId: 'TUS', date: '02-01-2024', values: [null, 2] },
    { stationId: 'TUS', date: '03-01-2024', values: [12.25, 3] }
  ]
};

const count = (haystack: string, needle: string) => haystack.split(needle).length - 1;

test('spreads at most ten ticks across the rows including both ends', () => {
  assert.deepEqual(selectTickIndices(0), []);
  assert.deepEqual(selectTickIndices(4), [0, 1, 2, 3]);
  assert.deepEqual(selectTickIndices(10), [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  assert.deepEqual(selectTickIndices(25), [0, 3, 5, 8, 11, 13, 16, 19, 21, 24]);
  assert.deepEqual(selectTickIndices(11), [0, 1, 2, 3, 4, 6, 7, 8, 9, 10]);
});

test('draws one marker per value and labels ticks with row dates', () => {
  const svg = buildChartSvg(matrix, 'P01');
  assert.ok(svg);

  assert.equal(count(svg, 'class="marker"'), 2);
  assert.equal(count(svg, 'class="x-tick"'), 3);
  assert.equal(count(svg, 'class="series"'), 1);
  assert.ok(svg.includes('>02-01-2024</text>'));
  assert.ok(svg.includes('>TUS Station - P01</text>'));
  assert.ok(svg.includes('>Date</text>'));
  assert.ok(svg.includes('>Value</text>'));
});

test('escapes codes in the chart title', () => {
  assert.equal(chartTitle(matrix, 'P&2'), 'TUS Station - P&2');
  const svg = buildChartSvg(matrix, 'P&2');
  assert.ok(svg?.includes('>TUS Station - P&amp;2</text>'));
  assert.equal(escapeXml(`<a href="x">'</a>`), '&lt;a href=&quot;x&quot;&gt;&apos;&lt;/a&gt;');
});

test('returns no drawing for a code that is not a column', () => {
  assert.equal(buildChartSvg(matrix, 'P99'), null);
});

test('renders a PNG image of the requested size', async () => {
  const result = await renderChart(matrix, 'P01', { width: 640, height: 320 });
  assert.ok(result.ok);
  assert.deepEqual(result.value.subarray(0, 8), PNG_SIGNATURE);

  const metadata = await sharp(result.value).metadata();
  assert.equal(metadata.format, 'png');
  assert.equal(metadata.width, 640);
  assert.equal(metadata.height, 320);
});

test('reports unknown codes as validation failures', async () => {
  const result = await renderChart(matrix, 'P99');
  assert.equal(result.ok, false);
  if (result.ok) {
    return;
  }
  assert.equal(result.error.kind, 'validation');
});
