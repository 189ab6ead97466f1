import assert from 'node:assert';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, before, describe, test } from 'node:test';
import { InvalidOptionsError } from '../errors.js';
import { defaultTitle, loadConfigFile, resolveRunOptions } from './index.js';
import type { CliOptions } from './index.js';

const baseCli: CliOptions = { stateDir: '.planner-gantt', dryRun: false, debug: false };

describe('resolveRunOptions', () => {
  test('falls back to built-in defaults', () => {
    assert.deepStrictEqual(resolveRunOptions(baseCli), {
      input: 'input.csv',
      output: 'gantt.html',
      title: 'input',
      sheet: 'Tasks',
      defaultDurationDays: 7,
      stateDir: '.planner-gantt',
      dryRun: false,
      debug: false,
    });
  });

  test('prefers flags over the config file over defaults', () => {
    const options = resolveRunOptions(
      { ...baseCli, input: 'plan.xlsx', duration: 3 },
      { defaultDurationDays: 10, sheet: 'Export', title: 'From config' }
    );
    assert.strictEqual(options.defaultDurationDays, 3);
    assert.strictEqual(options.sheet, 'Export');
    assert.strictEqual(options.title, 'From config');
    assert.strictEqual(options.output, 'gantt.html');
  });

  test('uses --csv when --input is absent', () => {
    assert.strictEqual(resolveRunOptions({ ...baseCli, csv: 'legacy.csv' }).input, 'legacy.csv');
    assert.strictEqual(
      resolveRunOptions({ ...baseCli, input: 'a.csv', csv: 'b.csv' }).input,
      'a.csv'
    );
  });
});

describe('defaultTitle', () => {
  test('uses the input file stem', () => {
    assert.strictEqual(defaultTitle('exports/Q3 plan.xlsx'), 'Q3 plan');
  });

  test('falls back when there is no stem', () => {
    assert.strictEqual(defaultTitle(''), 'Planner Tasks Timeline');
  });
});

describe('loadConfigFile', () => {
  const testDir = join(tmpdir(), 'planner-gantt-config-test');

  before(() => {
    rmSync(testDir, { recursive: true, force: true });
    mkdirSync(testDir, { recursive: true });
  });

  after(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  test('reads a YAML config', async () => {
    const path = join(testDir, 'gantt.yaml');
    writeFileSync(path, 'defaultDurationDays: 5\nsheet: Export\ntitle: Roadmap\noutput: out/plan.html\n');

    assert.deepStrictEqual(await loadConfigFile(path), {
      defaultDurationDays: 5,
      sheet: 'Export',
      title: 'Roadmap',
      output: 'out/plan.html',
    });
  });

  test('treats an empty file as an empty config', async () => {
    const path = join(testDir, 'empty.yaml');
    writeFileSync(path, '');
    assert.deepStrictEqual(await loadConfigFile(path), {});
  });

  test('rejects unknown keys and invalid values', async () => {
    const path = join(testDir, 'bad.yaml');
    writeFileSync(path, 'defaultDurationDays: -2\ncolour: red\n');

    await assert.rejects(
      () => loadConfigFile(path),
      (err: unknown) =>
        err instanceof InvalidOptionsError &&
        err.issues.length === 2 &&
        err.issues[0].startsWith('defaultDurationDays: ') &&
        err.issues[1].includes("'colour'")
    );
  });

  test('reports a missing file', async () => {
    const path = join(testDir, 'absent.yaml');
    await assert.rejects(() => loadConfigFile(path), {
      name: 'InvalidOptionsError',
      message: `Config file not found: ${path}`,
    });
  });

  test('reports YAML syntax errors', async () => {
    const path = join(testDir, 'broken.yaml');
    writeFileSync(path, 'sheet: [unclosed\n');
    await assert.rejects(() => loadConfigFile(path), InvalidOptionsError);
  });
});
