import { extent } from 'd3-array';
import { scaleLinear } from 'd3-scale';
import { line as d3Line } from 'd3-shape';
import sharp from 'sharp';

import { PivotProcessingError, PivotValidationError, describeCause, fail, ok, type Result } from './errors';
import { columnValues } from './pivot';
import { stationName } from './stations';
import type { WideMatrix } from './types';

export const MAX_X_TICKS = 10;

export type ChartOptions = {
  width?: number;
  height?: number;
};

type ChartPoint = {
  index: number;
  value: number | null;
};

const DEFAULT_WIDTH = 960;
const DEFAULT_HEIGHT = 480;
const MARGIN = { top: 56, right: 32, bottom: 104, left: 80 };
const STROKE = '#1f77b4';
const GRID = '#d9d9d9';
const FONT = 'font-family="DejaVu Sans, Arial, sans-serif"';

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Row indices that get an x-axis label: every row when there are at most
 * `maxTicks`, otherwise `maxTicks` indices spread evenly from the first row to
 * the last.
 */
export function selectTickIndices(count: number, maxTicks = MAX_X_TICKS): number[] {
  if (count <= 0) {
    return [];
  }
  if (count <= maxTicks) {
    return Array.from({ length: count }, (_, index) => index);
  }
  if (maxTicks <= 1) {
    return [0];
  }
  const indices = new Set<number>();
  for (let step = 0; step < maxTicks; step += 1) {
    indices.add(Math.round((step * (count - 1)) / (maxTicks - 1)));
  }
  return Array.from(indices);
}

export function chartTitle(matrix: WideMatrix, code: string): string {
  return `${stationName(matrix.stationId)} - ${code}`;
}

export function buildChartSvg(matrix: WideMatrix, code: string, options: ChartOptions = {}): string | null {
  const values = columnValues(matrix, code);
  if (!values) {
    return null;
  }

  const width = options.width ?? DEFAULT_WIDTH;
  const height = options.height ?? DEFAULT_HEIGHT;
  const plotBottom = height - MARGIN.bottom;
  const plotRight = width - MARGIN.right;

  const points: ChartPoint[] = values.map((value, index) => ({ index, value }));
  const defined = points.filter((point): point is { index: number; value: number } => point.value !== null);

  const xScale = scaleLinear()
    .domain([0, Math.max(points.length - 1, 1)])
    .range([MARGIN.left, plotRight]);

  const [min, max] = extent(defined, (point) => point.value);
  const yDomain =
    min === undefined || max === undefined ? [0, 1] : min === max ? [min - 1, max + 1] : [min, max];
  const yScale = scaleLinear().domain(yDomain).range([plotBottom, MARGIN.top]).nice();

  const lineGenerator = d3Line<ChartPoint>()
    .defined((point) => point.value !== null)
    .x((point) => xScale(point.index))
    .y((point) => yScale(point.value ?? 0));

  const yTicks = yScale.ticks(6);
  const formatY = yScale.tickFormat(6);
  const xTicks = selectTickIndices(points.length);

  const parts: string[] = [];
  parts.push(`<?xml version="1.0" encoding="UTF-8"?>`);
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`
  );
  parts.push(`<rect width="${width}" height="${height}" fill="#ffffff" />`);

  for (const tick of yTicks) {
    const y = yScale(tick).toFixed(2);
    parts.push(`<line class="grid" x1="${MARGIN.left}" x2="${plotRight}" y1="${y}" y2="${y}" stroke="${GRID}" stroke-dasharray="4 4" />`);
    parts.push(
      `<text class="y-tick" x="${MARGIN.left - 8}" y="${y}" text-anchor="end" dominant-baseline="middle" ${FONT} font-size="12">${escapeXml(formatY(tick))}</text>`
    );
  }

  for (const index of xTicks) {
    const x = xScale(index).toFixed(2);
    const label = matrix.rows[index]?.date ?? '';
    parts.push(`<line class="grid" x1="${x}" x2="${x}" y1="${MARGIN.top}" y2="${plotBottom}" stroke="${GRID}" stroke-dasharray="4 4" />`);
    parts.push(
      `<text class="x-tick" transform="translate(${x},${plotBottom + 12}) rotate(-45)" text-anchor="end" ${FONT} font-size="12">${escapeXml(label)}</text>`
    );
  }

  parts.push(
    `<line x1="${MARGIN.left}" x2="${plotRight}" y1="${plotBottom}" y2="${plotBottom}" stroke="#333333" />`,
    `<line x1="${MARGIN.left}" x2="${MARGIN.left}" y1="${MARGIN.top}" y2="${plotBottom}" stroke="#333333" />`
  );

  const path = lineGenerator(points);
  if (path) {
    parts.push(`<path class="series" d="${path}" fill="none" stroke="${STROKE}" stroke-width="2" stroke-linejoin="round" />`);
  }
  for (const point of defined) {
    parts.push(
      `<circle class="marker" cx="${xScale(point.index).toFixed(2)}" cy="${yScale(point.value).toFixed(2)}" r="4" fill="${STROKE}" />`
    );
  }

  parts.push(
    `<text class="title" x="${width / 2}" y="32" text-anchor="middle" ${FONT} font-size="18" font-weight="bold">${escapeXml(chartTitle(matrix, code))}</text>`,
    `<text class="x-label" x="${(MARGIN.left + plotRight) / 2}" y="${height - 12}" text-anchor="middle" ${FONT} font-size="14">Date</text>`,
    `<text class="y-label" transform="translate(20,${(MARGIN.top + plotBottom) / 2}) rotate(-90)" text-anchor="middle" ${FONT} font-size="14">Value</text>`
  );
  parts.push('</svg>');

  return parts.join('\n');
}

/**
 * Renders one column of the matrix as a PNG line chart.
 */
export async function renderChart(
  matrix: WideMatrix,
  code: string,
  options: ChartOptions = {}
): Promise<Result<Buffer>> {
  const svg = buildChartSvg(matrix, code, options);
  if (svg === null) {
    return fail(
      new PivotValidationError('UNKNOWN_CODE', `Code '${code}' is not a column of the analysis`, { code })
    );
  }

  try {
    const png = await sharp(Buffer.from(svg, 'utf8')).png().toBuffer();
    return ok(png);
  } catch (error) {
    return fail(new PivotProcessingError(`Failed to render chart for code '${code}': ${describeCause(error)}`, error));
  }
}
