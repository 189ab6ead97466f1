import assert from 'node:assert';
import { describe, test } from 'node:test';
import ExcelJS from 'exceljs';
import { cellText } from './cells.js';

function sheet() {
  return new ExcelJS.Workbook().addWorksheet('Tasks');
}

describe('cellText', () => {
  test('writes date cells as MM/DD/YYYY', () => {
    const cell = sheet().getCell('A1');
    cell.value = new Date(Date.UTC(2024, 0, 10));
    assert.strictEqual(cellText(cell), '01/10/2024');
  });

  test('writes dates computed by a formula as MM/DD/YYYY', () => {
    const cell = sheet().getCell('A1');
    cell.value = { formula: 'DATE(2024,1,10)', result: new Date(Date.UTC(2024, 0, 10)), date1904: false };
    assert.strictEqual(cellText(cell), '01/10/2024');
  });

  test('uses the display text of formulas with other results', () => {
    const cell = sheet().getCell('A1');
    cell.value = { formula: 'UPPER("late")', result: 'LATE', date1904: false };
    assert.strictEqual(cellText(cell), 'LATE');
  });

  test('stringifies numbers and booleans and blanks empty cells', () => {
    const ws = sheet();
    ws.getCell('A1').value = 42;
    ws.getCell('A2').value = true;
    ws.getCell('A3').value = '   ';
    assert.strictEqual(cellText(ws.getCell('A1')), '42');
    assert.strictEqual(cellText(ws.getCell('A2')), 'true');
    assert.strictEqual(cellText(ws.getCell('A3')), undefined);
    assert.strictEqual(cellText(ws.getCell('A4')), undefined);
  });
});
