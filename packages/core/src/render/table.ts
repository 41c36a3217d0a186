/**
 * Plain-text table rendering for the table route.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { ResultSet, Row } from '../db/types.js';
import type { RenderedArtifact } from './types.js';

const MAX_CELL_WIDTH = 60;

export function formatTable(columns: string[], rows: Row[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => Math.min(col.length, MAX_CELL_WIDTH));
  for (const row of rows) {
    for (let i = 0; i < columns.length; i++) {
      const val = formatValue(row[columns[i]]);
      widths[i] = Math.min(Math.max(widths[i], val.length), MAX_CELL_WIDTH);
    }
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => fit(col, widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const row of rows) {
    const line = columns
      .map((col, i) => fit(formatValue(row[col]), widths[i]))
      .join(' | ');
    lines.push(line);
  }

  return lines.join('\n');
}

function fit(text: string, width: number): string {
  return text.length > width ? text.slice(0, width - 1) + '…' : text.padEnd(width);
}

export function formatValue(val: string | number | null | undefined): string {
  if (val === null || val === undefined) return 'NULL';
  return String(val);
}

/**
 * Render the first `maxRows` rows. An empty result is an `empty` artifact,
 * not an empty table.
 */
export function renderTable(result: ResultSet, maxRows: number = SAFE_DEFAULTS.tableDisplayRows): RenderedArtifact {
  if (result.rows.length === 0) {
    return { kind: 'empty' };
  }
  const shown = result.rows.slice(0, maxRows);
  return {
    kind: 'table',
    text: formatTable(result.columns, shown),
    rowCount: result.rows.length,
    shownRows: shown.length,
  };
}
