import assert from 'node:assert';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, before, describe, test } from 'node:test';
import ExcelJS from 'exceljs';
import { InputUnavailableError } from '../errors.js';
import { detectFormat, loadInput, loadRawRows } from './index.js';

const testDir = join(tmpdir(), 'planner-gantt-loader-test');

async function writeWorkbook(path: string, sheetName: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);
  sheet.addRow(['Task ID', 'Task Name', 'Start date', 'Due date', 'Late']);
  sheet.addRow(['T1', 'Kickoff', '01/10/2024', null, false]);
  sheet.addRow([]);
  const review = sheet.addRow([42, 'Review', null, new Date(Date.UTC(2024, 2, 1)), true]);
  review.getCell(4).numFmt = 'mm/dd/yyyy';
  await workbook.xlsx.writeFile(path);
}

describe('loadRawRows', () => {
  before(() => {
    rmSync(testDir, { recursive: true, force: true });
    mkdirSync(testDir, { recursive: true });
  });

  after(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  test('reads CSV cells as raw text keyed by trimmed header', async () => {
    const path = join(testDir, 'plan.csv');
    writeFileSync(
      path,
      [
        'Task ID, Task Name ,Start date,Due date,Description',
        '00123,"Plan, then build",01/10/2024,,first',
        ',,,,',
        '00124,Ship,,03/01/2024,',
        '',
      ].join('\n')
    );

    const rows = await loadRawRows(path);

    assert.strictEqual(rows.length, 2);
    assert.strictEqual(rows[0]['Task ID'], '00123');
    assert.strictEqual(rows[0]['Task Name'], 'Plan, then build');
    assert.strictEqual(rows[0]['Start date'], '01/10/2024');
    assert.strictEqual(rows[0]['Due date'], undefined);
    assert.strictEqual(rows[0]['Description'], 'first');
    assert.strictEqual(rows[1]['Task ID'], '00124');
    assert.strictEqual(rows[1]['Due date'], '03/01/2024');
  });

  test('reads the Tasks worksheet of a workbook', async () => {
    const path = join(testDir, 'plan.xlsx');
    await writeWorkbook(path, 'Tasks');

    const loaded = await loadInput(path);

    assert.strictEqual(loaded.format, 'xlsx');
    assert.deepStrictEqual(loaded.columns, ['Task ID', 'Task Name', 'Start date', 'Due date', 'Late']);
    assert.strictEqual(loaded.rows.length, 2);
    assert.strictEqual(loaded.rows[0]['Start date'], '01/10/2024');
    assert.strictEqual(loaded.rows[0]['Late'], 'false');
    assert.strictEqual(loaded.rows[1]['Task ID'], '42');
    assert.strictEqual(loaded.rows[1]['Due date'], '03/01/2024');
    assert.strictEqual(loaded.rows[1]['Late'], 'true');
  });

  test('reads a differently named worksheet on request', async () => {
    const path = join(testDir, 'custom-sheet.xlsx');
    await writeWorkbook(path, 'Export');

    const rows = await loadRawRows(path, { sheet: 'Export' });
    assert.strictEqual(rows.length, 2);
  });

  test('fails when the worksheet is missing', async () => {
    const path = join(testDir, 'wrong-sheet.xlsx');
    await writeWorkbook(path, 'Sheet1');

    await assert.rejects(() => loadRawRows(path), {
      name: 'InputUnavailableError',
      message: "Worksheet 'Tasks' not found in wrong-sheet.xlsx",
    });
  });

  test('fails when the file does not exist', async () => {
    const path = join(testDir, 'missing.csv');
    await assert.rejects(
      () => loadRawRows(path),
      (err: unknown) =>
        err instanceof InputUnavailableError &&
        err.path === path &&
        err.message === `Input not found: ${path}`
    );
  });

  test('fails when the path is a directory', async () => {
    const path = join(testDir, 'folder.csv');
    mkdirSync(path, { recursive: true });
    await assert.rejects(() => loadRawRows(path), {
      message: `Input is not a file: ${path}`,
    });
  });
});

describe('detectFormat', () => {
  test('recognizes csv and xlsx case-insensitively', () => {
    assert.strictEqual(detectFormat('plan.CSV'), 'csv');
    assert.strictEqual(detectFormat('/exports/Plan.Xlsx'), 'xlsx');
  });

  test('rejects other extensions', () => {
    assert.throws(() => detectFormat('plan.txt'), {
      name: 'InputUnavailableError',
      message: 'Unsupported file type: .txt',
    });
    assert.throws(() => detectFormat('plan'), { message: 'Unsupported file type: unknown' });
  });
});
