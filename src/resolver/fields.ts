import type { PlannerColumn, ProgressPct, RawRow } from '../types/index.js';

const PROGRESS_TO_PERCENT: ReadonlyMap<string, ProgressPct> = new Map([
  ['not started', 0],
  ['in progress', 50],
  ['complete', 100],
  ['completed', 100],
]);

function normalizeLabel(value: string | undefined): string {
  return (value ?? '').trim().toLowerCase();
}

/** Blank (absent or whitespace-only) cells read as "". */
export function readText(row: RawRow, column: PlannerColumn): string {
  return (row[column] ?? '').trim();
}

export function normalizeProgress(label: string | undefined): ProgressPct {
  return PROGRESS_TO_PERCENT.get(normalizeLabel(label)) ?? 0;
}

export function parseLateFlag(value: string | undefined): boolean {
  return normalizeLabel(value) === 'true';
}
