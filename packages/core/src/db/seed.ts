/**
 * Demo dataset loader: creates the `ventas` table in a SQLite file.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { createAjv } from '../util/ajv.js';
import { openDatabase } from './adapters/sqlite.js';

export interface VentaRecord {
  fecha: string;
  ciudad: string;
  vendedor: string;
  producto: string;
  cantidad: number;
  total: number;
}

const ventaRecordsSchema = {
  type: 'array' as const,
  items: {
    type: 'object' as const,
    properties: {
      fecha: { type: 'string' as const, pattern: '^\\d{4}-\\d{2}-\\d{2}$' },
      ciudad: { type: 'string' as const, minLength: 1 },
      vendedor: { type: 'string' as const, minLength: 1 },
      producto: { type: 'string' as const, minLength: 1 },
      cantidad: { type: 'integer' as const, minimum: 0 },
      total: { type: 'number' as const, minimum: 0 },
    },
    required: ['fecha', 'ciudad', 'vendedor', 'producto', 'cantidad', 'total'],
    additionalProperties: false,
  },
};

const validateRecords = createAjv({ allErrors: false }).compile<VentaRecord[]>(ventaRecordsSchema);

/** Parse and validate a JSON array of sales records. */
export function parseVentaRecords(text: string): VentaRecord[] {
  const data: unknown = JSON.parse(text);
  if (!validateRecords(data)) {
    const first = validateRecords.errors?.[0];
    const where = first?.instancePath || '(root)';
    throw new Error(`Invalid sales records at ${where}: ${first?.message ?? 'unknown error'}`);
  }
  return data;
}

const CREATE_VENTAS = `
  CREATE TABLE IF NOT EXISTS ventas (
    id INTEGER PRIMARY KEY,
    fecha TEXT NOT NULL,
    ciudad TEXT NOT NULL,
    vendedor TEXT NOT NULL,
    producto TEXT NOT NULL,
    cantidad INTEGER NOT NULL,
    total REAL NOT NULL
  )
`;

/**
 * Create (or replace the contents of) the `ventas` table.
 * Returns the number of rows inserted.
 */
export function seedDemoDatabase(path: string, records: VentaRecord[]): number {
  mkdirSync(dirname(path), { recursive: true });
  const db = openDatabase(path, false);
  try {
    db.exec(CREATE_VENTAS);
    const insert = db.prepare<[string, string, string, string, number, number]>(
      'INSERT INTO ventas (fecha, ciudad, vendedor, producto, cantidad, total) VALUES (?, ?, ?, ?, ?, ?)',
    );
    const load = db.transaction((items: VentaRecord[]) => {
      db.exec('DELETE FROM ventas');
      for (const r of items) {
        insert.run(r.fecha, r.ciudad, r.vendedor, r.producto, r.cantidad, r.total);
      }
    });
    load(records);
    return records.length;
  } finally {
    db.close();
  }
}
