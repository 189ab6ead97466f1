import type { ChartRow, ResolutionReport } from '../types/index.js';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function formatResolutionSummary(report: ResolutionReport): string {
  return [
    `Read ${plural(report.totalRows, 'row')}`,
    `charted ${plural(report.emitted, 'task')}`,
    `dropped ${plural(report.dropped.length, 'row')} without dates`,
    `${plural(report.malformedDates.length, 'malformed date')}`,
  ].join(', ');
}

/**
 * Lines of the dry-run report: the schedule as it would be charted, then
 * anything dropped or repaired.
 */
export function formatDryRunSummary(rows: readonly ChartRow[], report: ResolutionReport): string[] {
  const lines = ['', '=== DRY RUN SUMMARY ===', '', `Tasks (${rows.length}):`];

  for (const row of rows) {
    const id = row.task.id || '-';
    const late = row.task.isLate ? ' LATE' : '';
    lines.push(
      `  [${id}] ${row.label} (${row.bucketLabel}) ${row.startIso} -> ${row.finishIso}, ` +
        `${plural(row.durationDays, 'day')}, ${row.task.progressPct}%${late}`
    );
  }

  if (report.dropped.length > 0) {
    lines.push('', `Dropped (${report.dropped.length}):`);
    for (const dropped of report.dropped) {
      lines.push(`  row ${dropped.rowNumber}: [${dropped.taskId || '-'}] ${dropped.taskName || '(Untitled)'}`);
    }
  }

  if (report.malformedDates.length > 0) {
    lines.push('', `Malformed dates (${report.malformedDates.length}):`);
    for (const bad of report.malformedDates) {
      lines.push(`  row ${bad.rowNumber}: ${bad.column} = "${bad.value}"`);
    }
  }

  lines.push('', formatResolutionSummary(report), '');
  return lines;
}

export function printDryRunSummary(rows: readonly ChartRow[], report: ResolutionReport): void {
  for (const line of formatDryRunSummary(rows, report)) {
    console.log(line);
  }
}
