import type { Cell, CellValue } from 'exceljs';
import { formatPlannerDate } from '../resolver/index.js';

function isBlank(value: CellValue): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Text form of a worksheet cell, or undefined when the cell is blank.
 * Real date cells are written back as MM/DD/YYYY so workbook and CSV inputs
 * reach the resolver in the same shape.
 */
export function cellText(cell: Cell): string | undefined {
  const value = cell.value;
  if (isBlank(value)) return undefined;

  if (value instanceof Date) {
    return formatPlannerDate(value);
  }
  // Formula cells (DATE(), EDATE() ...) carry their computed value in `result`
  if (typeof value === 'object' && value !== null && 'result' in value && value.result instanceof Date) {
    return formatPlannerDate(value.result);
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  // Rich text, hyperlinks, formulas, shared strings
  const text = cell.text;
  return text.trim() === '' ? undefined : text;
}
