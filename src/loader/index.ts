import { stat } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';
import type { DebugTracer } from '../debug/index.js';
import { InputUnavailableError } from '../errors.js';
import type { RawRow } from '../types/index.js';
import { cellText } from './cells.js';

export const DEFAULT_SHEET = 'Tasks';

export type InputFormat = 'csv' | 'xlsx';

export interface LoadOptions {
  sheet?: string;
  tracer?: DebugTracer;
}

export interface LoadedInput {
  format: InputFormat;
  columns: string[];
  rows: RawRow[];
}

const FORMATS: Record<string, InputFormat> = {
  '.csv': 'csv',
  '.xlsx': 'xlsx',
};

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function detectFormat(path: string): InputFormat {
  const ext = extname(path).toLowerCase();
  const format = FORMATS[ext];
  if (!format) {
    throw new InputUnavailableError(`Unsupported file type: ${ext || 'unknown'}`, path);
  }
  return format;
}

async function assertReadableFile(path: string): Promise<void> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new InputUnavailableError(`Input is not a file: ${path}`, path);
    }
  } catch (e) {
    if (e instanceof InputUnavailableError) throw e;
    throw new InputUnavailableError(`Input not found: ${path}`, path, toError(e));
  }
}

async function readWorksheet(path: string, format: InputFormat, sheet: string): Promise<Worksheet> {
  const workbook = new ExcelJS.Workbook();

  try {
    if (format === 'csv') {
      // Keep every cell as raw text; the resolver owns date and label parsing
      return await workbook.csv.readFile(path, { map: (value: string) => value });
    }
    await workbook.xlsx.readFile(path);
  } catch (e) {
    throw new InputUnavailableError(`Could not read ${basename(path)}: ${toError(e).message}`, path, toError(e));
  }

  const worksheet = workbook.getWorksheet(sheet);
  if (!worksheet) {
    throw new InputUnavailableError(`Worksheet '${sheet}' not found in ${basename(path)}`, path);
  }
  return worksheet;
}

function readHeader(worksheet: Worksheet): string[] {
  const header = worksheet.getRow(1);
  const columns: string[] = [];
  for (let col = 1; col <= worksheet.columnCount; col++) {
    columns.push((cellText(header.getCell(col)) ?? '').trim());
  }
  return columns;
}

function readRows(worksheet: Worksheet, columns: string[]): RawRow[] {
  const rows: RawRow[] = [];

  for (let r = 2; r <= worksheet.rowCount; r++) {
    const excelRow = worksheet.getRow(r);
    const row: Record<string, string | undefined> = {};
    let hasValue = false;

    columns.forEach((column, index) => {
      if (!column) return;
      const text = cellText(excelRow.getCell(index + 1));
      if (text !== undefined) hasValue = true;
      row[column] = text;
    });

    if (hasValue) rows.push(row);
  }

  return rows;
}

/**
 * Reads a Planner export into raw rows keyed by (trimmed) header.
 * CSV files are read whole; workbooks contribute the named worksheet only.
 */
export async function loadInput(path: string, options: LoadOptions = {}): Promise<LoadedInput> {
  const format = detectFormat(path);
  await assertReadableFile(path);

  const worksheet = await readWorksheet(path, format, options.sheet ?? DEFAULT_SHEET);
  const columns = readHeader(worksheet);
  const rows = readRows(worksheet, columns);

  options.tracer?.logInputLoaded(path, format, rows.length, columns.filter(Boolean));
  return { format, columns, rows };
}

export async function loadRawRows(path: string, options: LoadOptions = {}): Promise<RawRow[]> {
  const { rows } = await loadInput(path, options);
  return rows;
}
