/**
 * Bar chart planning and HTML output.
 *
 * The HTML page embeds the chart configuration and draws it with Chart.js
 * loaded from a CDN, so the file can be opened directly in a browser.
 */

import type { ResultSet, Row } from '../db/types.js';
import { writeFileAtomic } from '../util/fs.js';
import { formatValue } from './table.js';
import type { BarChartSpec, ChartBackend } from './types.js';

const CHART_JS_URL = 'https://cdn.jsdelivr.net/npm/chart.js@4.4.3/dist/chart.umd.min.js';

export function isNumericColumn(rows: Row[], column: string): boolean {
  let seen = false;
  for (const row of rows) {
    const value = row[column];
    if (value === null || value === undefined) continue;
    if (typeof value !== 'number') return false;
    seen = true;
  }
  return seen;
}

/**
 * Pick axes for a bar chart: the first column is the category, the value is
 * the first numeric column other than the category (or the category itself
 * when it is the only numeric one). Returns null when nothing can be plotted.
 */
export function planChart(result: ResultSet): BarChartSpec | null {
  const xKey = result.columns[0];
  if (xKey === undefined || result.rows.length === 0) return null;

  const numeric = result.columns.filter((col) => isNumericColumn(result.rows, col));
  const yKey = numeric.find((col) => col !== xKey) ?? numeric[0];
  if (yKey === undefined) return null;

  return {
    title: yKey === xKey ? yKey : `${yKey} por ${xKey}`,
    xKey,
    yKey,
    labels: result.rows.map((row) => formatValue(row[xKey])),
    values: result.rows.map((row) => {
      const value = row[yKey];
      return typeof value === 'number' ? value : null;
    }),
  };
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

// JSON inside <script> must not be able to close the tag
function scriptSafeJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

export function buildChartHtml(spec: BarChartSpec): string {
  const config = {
    type: 'bar',
    data: {
      labels: spec.labels,
      datasets: [{ label: spec.yKey, data: spec.values, backgroundColor: '#4e79a7' }],
    },
    options: {
      responsive: true,
      plugins: { title: { display: true, text: spec.title } },
      scales: {
        x: { title: { display: true, text: spec.xKey } },
        y: { title: { display: true, text: spec.yKey }, beginAtZero: true },
      },
    },
  };

  return [
    '<!DOCTYPE html>',
    '<html lang="es">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(spec.title)}</title>`,
    `<script src="${CHART_JS_URL}"></script>`,
    '</head>',
    '<body>',
    '<canvas id="chart"></canvas>',
    '<script>',
    `new Chart(document.getElementById('chart'), ${scriptSafeJson(config)});`,
    '</script>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

export class HtmlChartBackend implements ChartBackend {
  readonly extension = '.html';

  async renderBar(spec: BarChartSpec, path: string): Promise<void> {
    await writeFileAtomic(path, buildChartHtml(spec));
  }
}
