/**
 * Dispatches a result set to the output matching the route decision.
 */

import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { ResultSet } from '../db/types.js';
import { NotPlottableError } from '../errors.js';
import type { RouteDecision } from '../route/router.js';
import { HtmlChartBackend, planChart } from './chart.js';
import { CsvFileBackend } from './csv.js';
import { renderTable } from './table.js';
import type { ChartBackend, FileBackend, RenderedArtifact } from './types.js';

export const DEFAULT_EXPORT_FILE = 'ventas.csv';

export interface ResultRendererOptions {
  /** Directory for chart and file artifacts */
  outputDir: string;
  chartBackend?: ChartBackend;
  fileBackend?: FileBackend;
  /** Rows shown for the table route. Default: 10 */
  maxTableRows?: number;
  /** Export file name inside outputDir. Default: ventas.csv */
  exportFileName?: string;
}

export class ResultRenderer {
  private readonly outputDir: string;
  private readonly chartBackend: ChartBackend;
  private readonly fileBackend: FileBackend;
  private readonly maxTableRows: number;
  private readonly exportFileName: string;

  constructor(options: ResultRendererOptions) {
    this.outputDir = options.outputDir;
    this.chartBackend = options.chartBackend ?? new HtmlChartBackend();
    this.fileBackend = options.fileBackend ?? new CsvFileBackend();
    this.maxTableRows = options.maxTableRows ?? SAFE_DEFAULTS.tableDisplayRows;
    this.exportFileName = options.exportFileName ?? DEFAULT_EXPORT_FILE;
  }

  /** Fixed export location; every file request overwrites it. */
  get exportPath(): string {
    return join(this.outputDir, this.exportFileName);
  }

  async render(route: RouteDecision, result: ResultSet): Promise<RenderedArtifact> {
    switch (route) {
      case 'table':
        return renderTable(result, this.maxTableRows);
      case 'chart':
        return this.renderChart(result);
      case 'file':
        await this.fileBackend.write(result, this.exportPath);
        return { kind: 'file', path: this.exportPath, rowCount: result.rows.length };
    }
  }

  private async renderChart(result: ResultSet): Promise<RenderedArtifact> {
    if (result.rows.length === 0) {
      throw new NotPlottableError('The query returned no rows; there is nothing to plot.');
    }
    const spec = planChart(result);
    if (!spec) {
      throw new NotPlottableError('The result has no numeric column to plot.');
    }
    const path = join(this.outputDir, 'charts', `grafico-${randomUUID()}${this.chartBackend.extension}`);
    await this.chartBackend.renderBar(spec, path);
    return { kind: 'chart', path };
  }
}
