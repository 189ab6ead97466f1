import assert from 'node:assert';
import { describe, test } from 'node:test';
import {
  addDaysUTC,
  daysBetweenUTC,
  formatIsoDate,
  formatPlannerDate,
  parsePlannerDate,
} from './dates.js';

function iso(value: string): string | null {
  const date = parsePlannerDate(value);
  return date ? formatIsoDate(date) : null;
}

describe('parsePlannerDate', () => {
  test('parses month/day/year with one or two digit parts', () => {
    assert.strictEqual(iso('01/10/2024'), '2024-01-10');
    assert.strictEqual(iso('1/9/2024'), '2024-01-09');
    assert.strictEqual(iso(' 12/31/2023 '), '2023-12-31');
  });

  test('returns midnight UTC', () => {
    assert.strictEqual(parsePlannerDate('02/29/2024')?.toISOString(), '2024-02-29T00:00:00.000Z');
  });

  test('rejects days that do not exist', () => {
    assert.strictEqual(iso('02/30/2024'), null);
    assert.strictEqual(iso('02/29/2023'), null);
    assert.strictEqual(iso('13/01/2024'), null);
    assert.strictEqual(iso('00/10/2024'), null);
  });

  test('rejects other formats', () => {
    assert.strictEqual(iso('2024-01-10'), null);
    assert.strictEqual(iso('01/10/24'), null);
    assert.strictEqual(iso('Jan 10 2024'), null);
    assert.strictEqual(iso(''), null);
  });
});

describe('date arithmetic', () => {
  test('adds and subtracts whole days across month and year ends', () => {
    const start = new Date(Date.UTC(2024, 11, 28));
    assert.strictEqual(formatIsoDate(addDaysUTC(start, 7)), '2025-01-04');
    assert.strictEqual(formatIsoDate(addDaysUTC(start, -28)), '2024-11-30');
  });

  test('counts days between dates', () => {
    const a = new Date(Date.UTC(2024, 0, 10));
    const b = new Date(Date.UTC(2024, 0, 17));
    assert.strictEqual(daysBetweenUTC(a, b), 7);
    assert.strictEqual(daysBetweenUTC(b, a), -7);
  });

  test('formats dates the way Planner writes them', () => {
    assert.strictEqual(formatPlannerDate(new Date(Date.UTC(2024, 2, 5))), '03/05/2024');
  });
});
