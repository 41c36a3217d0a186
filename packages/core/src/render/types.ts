/**
 * Renderer contracts.
 *
 * Chart and file output go through backend interfaces so the orchestrator
 * and its tests never depend on a particular chart runtime or file format.
 */

import type { ResultSet } from '../db/types.js';

export type RenderedArtifact =
  | { kind: 'table'; text: string; rowCount: number; shownRows: number }
  | { kind: 'chart'; path: string }
  | { kind: 'file'; path: string; rowCount: number }
  | { kind: 'empty' };

export interface BarChartSpec {
  title: string;
  /** Category axis column */
  xKey: string;
  /** Value axis column */
  yKey: string;
  labels: string[];
  values: Array<number | null>;
}

export interface ChartBackend {
  /** File extension for chart artifacts, including the dot */
  readonly extension: string;
  renderBar(spec: BarChartSpec, path: string): Promise<void>;
}

export interface FileBackend {
  write(result: ResultSet, path: string): Promise<void>;
}
