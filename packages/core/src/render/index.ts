export { ResultRenderer, DEFAULT_EXPORT_FILE } from './renderer.js';
export type { ResultRendererOptions } from './renderer.js';
export { formatTable, renderTable } from './table.js';
export { HtmlChartBackend, planChart, buildChartHtml, isNumericColumn } from './chart.js';
export { CsvFileBackend, toCsv, escapeCsvField } from './csv.js';
export type { BarChartSpec, ChartBackend, FileBackend, RenderedArtifact } from './types.js';
