/**
 * CSV export: header row, every data row, no index column.
 */

import type { ResultSet } from '../db/types.js';
import { writeFileAtomic } from '../util/fs.js';
import type { FileBackend } from './types.js';

export function escapeCsvField(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(result: ResultSet): string {
  const lines = [result.columns.map(escapeCsvField).join(',')];
  for (const row of result.rows) {
    lines.push(result.columns.map((col) => escapeCsvField(String(row[col] ?? ''))).join(','));
  }
  return lines.join('\n') + '\n';
}

export class CsvFileBackend implements FileBackend {
  async write(result: ResultSet, path: string): Promise<void> {
    await writeFileAtomic(path, toCsv(result));
  }
}
