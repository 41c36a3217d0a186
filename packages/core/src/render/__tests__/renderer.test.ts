import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ResultRenderer } from '../renderer.js';
import { NotPlottableError } from '../../errors.js';
import type { ResultSet } from '../../db/types.js';
import type { BarChartSpec, ChartBackend } from '../types.js';

const SALES: ResultSet = {
  columns: ['producto', 'total'],
  rows: [
    { producto: 'Café', total: 30.5 },
    { producto: 'Té', total: 8 },
    { producto: 'Pan', total: 4 },
  ],
};

describe('ResultRenderer', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), 'ventasql-render-test-'));
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  it('renders the table route as text', async () => {
    const artifact = await new ResultRenderer({ outputDir }).render('table', SALES);
    assert.equal(artifact.kind, 'table');
    if (artifact.kind === 'table') {
      assert.equal(artifact.text.split('\n')[0], 'producto | total');
      assert.equal(artifact.shownRows, 3);
    }
  });

  it('marks an empty table result as empty', async () => {
    const artifact = await new ResultRenderer({ outputDir }).render('table', { columns: ['producto'], rows: [] });
    assert.deepEqual(artifact, { kind: 'empty' });
  });

  it('writes each chart to a new unique path', async () => {
    const renderer = new ResultRenderer({ outputDir });
    const first = await renderer.render('chart', SALES);
    const second = await renderer.render('chart', SALES);
    assert.equal(first.kind, 'chart');
    assert.equal(second.kind, 'chart');
    if (first.kind === 'chart' && second.kind === 'chart') {
      assert.notEqual(first.path, second.path);
      assert.ok(first.path.startsWith(join(outputDir, 'charts', 'grafico-')));
      assert.ok(first.path.endsWith('.html'));
      assert.ok(readFileSync(first.path, 'utf-8').includes('"labels":["Café","Té","Pan"]'));
    }
  });

  it('refuses to chart an empty result and writes nothing', async () => {
    const renderer = new ResultRenderer({ outputDir });
    await assert.rejects(renderer.render('chart', { columns: ['producto', 'total'], rows: [] }), NotPlottableError);
    assert.equal(existsSync(join(outputDir, 'charts')), false);
  });

  it('refuses to chart a result without numeric columns', async () => {
    const renderer = new ResultRenderer({ outputDir });
    await assert.rejects(
      renderer.render('chart', { columns: ['producto'], rows: [{ producto: 'Café' }] }),
      /no numeric column/,
    );
    assert.equal(existsSync(join(outputDir, 'charts')), false);
  });

  it('exports the full result to the fixed CSV path, overwriting earlier exports', async () => {
    const renderer = new ResultRenderer({ outputDir, maxTableRows: 1 });
    const first = await renderer.render('file', SALES);
    assert.deepEqual(first, { kind: 'file', path: join(outputDir, 'ventas.csv'), rowCount: 3 });
    assert.equal(readFileSync(join(outputDir, 'ventas.csv'), 'utf-8'), 'producto,total\nCafé,30.5\nTé,8\nPan,4\n');

    const second = await renderer.render('file', { columns: ['n'], rows: [{ n: 1 }] });
    assert.equal(second.kind === 'file' ? second.path : '', first.kind === 'file' ? first.path : 'x');
    assert.equal(readFileSync(join(outputDir, 'ventas.csv'), 'utf-8'), 'n\n1\n');
  });

  it('hands the planned chart to a custom backend', async () => {
    const seen: Array<{ spec: BarChartSpec; path: string }> = [];
    const chartBackend: ChartBackend = {
      extension: '.json',
      async renderBar(spec, path) {
        seen.push({ spec, path });
      },
    };
    const artifact = await new ResultRenderer({ outputDir, chartBackend }).render('chart', SALES);
    assert.equal(seen.length, 1);
    assert.equal(seen[0].spec.yKey, 'total');
    assert.ok(seen[0].path.endsWith('.json'));
    assert.deepEqual(artifact, { kind: 'chart', path: seen[0].path });
  });
});
