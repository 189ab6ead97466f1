import { daysBetweenUTC, formatIsoDate } from '../resolver/index.js';
import type { ChartRow, TaskRecord } from '../types/index.js';
import { bucketLabel } from './palette.js';

export const UNTITLED_LABEL = '(Untitled)';

function compareRows(a: ChartRow, b: ChartRow): number {
  const byStart = a.start.getTime() - b.start.getTime();
  if (byStart !== 0) return byStart;
  const byFinish = a.finish.getTime() - b.finish.getTime();
  if (byFinish !== 0) return byFinish;
  if (a.label < b.label) return -1;
  if (a.label > b.label) return 1;
  return 0;
}

export function toChartRow(task: TaskRecord): ChartRow {
  // The resolver keeps end < start as parsed; the chart draws it as a single day
  const finish = task.end.getTime() < task.start.getTime() ? task.start : task.end;
  return {
    task,
    label: task.name || UNTITLED_LABEL,
    bucketLabel: bucketLabel(task.bucket),
    start: task.start,
    finish,
    durationDays: daysBetweenUTC(task.start, finish) + 1,
    startIso: formatIsoDate(task.start),
    finishIso: formatIsoDate(finish),
  };
}

function countLabels(rows: readonly ChartRow[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const row of rows) {
    counts.set(row.label, (counts.get(row.label) ?? 0) + 1);
  }
  return counts;
}

/**
 * Labels are the y categories, so repeated ones would stack bars on one line.
 * Repeats get the task id appended, then an ordinal if they still collide.
 */
export function disambiguateLabels(rows: readonly ChartRow[]): ChartRow[] {
  const nameCounts = countLabels(rows);
  const withIds = rows.map((row) =>
    nameCounts.get(row.label) === 1 || !row.task.id
      ? row
      : { ...row, label: `${row.label} [${row.task.id}]` }
  );

  const labelCounts = countLabels(withIds);
  const seen = new Map<string, number>();
  return withIds.map((row) => {
    if (labelCounts.get(row.label) === 1) return row;
    const ordinal = (seen.get(row.label) ?? 0) + 1;
    seen.set(row.label, ordinal);
    return { ...row, label: `${row.label} (${ordinal})` };
  });
}

/** Chart rows sorted by start, then finish, then label, each with a distinct label. */
export function prepareChartRows(tasks: readonly TaskRecord[]): ChartRow[] {
  return disambiguateLabels(tasks.map(toChartRow).sort(compareRows));
}
