import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CsvFileBackend, escapeCsvField, toCsv } from '../csv.js';

describe('escapeCsvField', () => {
  it('quotes fields with delimiters, quotes or line breaks', () => {
    assert.equal(escapeCsvField('Café'), 'Café');
    assert.equal(escapeCsvField('dulce, suave'), '"dulce, suave"');
    assert.equal(escapeCsvField('Té "verde"'), '"Té ""verde"""');
    assert.equal(escapeCsvField('a\nb'), '"a\nb"');
  });
});

describe('toCsv', () => {
  it('writes a header row and every data row without an index column', () => {
    const csv = toCsv({
      columns: ['producto', 'nota', 'total'],
      rows: [
        { producto: 'Café', nota: 'dulce, suave', total: 30.5 },
        { producto: 'Té "verde"', nota: null, total: 8 },
      ],
    });
    assert.equal(csv, 'producto,nota,total\nCafé,"dulce, suave",30.5\n"Té ""verde""",,8\n');
  });

  it('writes only the header for an empty result', () => {
    assert.equal(toCsv({ columns: ['a', 'b'], rows: [] }), 'a,b\n');
  });
});

describe('CsvFileBackend', () => {
  const dir = mkdtempSync(join(tmpdir(), 'ventasql-csv-test-'));
  after(() => rmSync(dir, { recursive: true, force: true }));

  it('overwrites the target and leaves no temporary files behind', async () => {
    const backend = new CsvFileBackend();
    const path = join(dir, 'ventas.csv');
    await backend.write({ columns: ['n'], rows: [{ n: 1 }, { n: 2 }] }, path);
    await backend.write({ columns: ['n'], rows: [{ n: 3 }] }, path);
    assert.equal(readFileSync(path, 'utf-8'), 'n\n3\n');
    assert.deepEqual(readdirSync(dir), ['ventas.csv']);
  });
});
