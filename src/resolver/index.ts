import { createNoopTracer } from '../debug/index.js';
import type { ResolutionTracer } from '../debug/index.js';
import type {
  DateColumn,
  MalformedDate,
  RawRow,
  ResolutionReport,
  TaskRecord,
} from '../types/index.js';
import { addDaysUTC, formatIsoDate, parsePlannerDate } from './dates.js';
import { normalizeProgress, parseLateFlag, readText } from './fields.js';

export { addDaysUTC, daysBetweenUTC, formatIsoDate, formatPlannerDate, parsePlannerDate } from './dates.js';
export { normalizeProgress, parseLateFlag } from './fields.js';

export const DEFAULT_DURATION_DAYS = 7;
// A century either side of a four-digit-year date stays well inside the Date range
export const MAX_DURATION_DAYS = 36_500;

// Fallback chains, most authoritative source first
export const START_SOURCES: readonly DateColumn[] = ['Start date', 'Created Date'];
export const END_SOURCES: readonly DateColumn[] = ['Due date', 'Completed Date'];

// Header is row 1, so the first data row is row 2 as a spreadsheet user sees it
const FIRST_DATA_ROW = 2;

export interface ResolveOptions {
  defaultDurationDays?: number;
  tracer?: ResolutionTracer;
}

export interface ResolveResult {
  tasks: TaskRecord[];
  report: ResolutionReport;
}

interface ResolvedDate {
  date: Date;
  column: DateColumn;
}

type RowOutcome =
  | { kind: 'resolved'; task: TaskRecord; synthesized: 'start' | 'end' | null }
  | { kind: 'dropped' };

function assertDuration(days: number): void {
  if (!Number.isInteger(days) || days <= 0 || days > MAX_DURATION_DAYS) {
    throw new RangeError(
      `defaultDurationDays must be an integer from 1 to ${MAX_DURATION_DAYS}, got ${days}`
    );
  }
}

/**
 * Walks the sources in order and returns the first non-blank value that parses.
 * Non-blank values that fail to parse are reported and skipped.
 */
function firstDate(
  row: RawRow,
  sources: readonly DateColumn[],
  onMalformed: (column: DateColumn, value: string) => void
): ResolvedDate | null {
  for (const column of sources) {
    const raw = readText(row, column);
    if (!raw) continue;

    const date = parsePlannerDate(raw);
    if (date) return { date, column };
    onMalformed(column, raw);
  }
  return null;
}

function resolveRow(
  row: RawRow,
  rowNumber: number,
  days: number,
  tracer: ResolutionTracer,
  malformed: MalformedDate[]
): RowOutcome {
  const id = readText(row, 'Task ID');
  const onMalformed = (column: DateColumn, value: string) => {
    malformed.push({ rowNumber, taskId: id, column, value });
    tracer.logMalformedDate(rowNumber, id, column, value);
  };

  const start = firstDate(row, START_SOURCES, onMalformed);
  const end = firstDate(row, END_SOURCES, onMalformed);

  let startDate: Date;
  let endDate: Date;
  let synthesized: 'start' | 'end' | null = null;

  if (start && end) {
    startDate = start.date;
    endDate = end.date;
  } else if (start) {
    startDate = start.date;
    endDate = addDaysUTC(start.date, days);
    synthesized = 'end';
    tracer.logEndpointSynthesized(rowNumber, id, 'end', start.column, formatIsoDate(endDate));
  } else if (end) {
    endDate = end.date;
    startDate = addDaysUTC(end.date, -days);
    synthesized = 'start';
    tracer.logEndpointSynthesized(rowNumber, id, 'start', end.column, formatIsoDate(startDate));
  } else {
    tracer.logRowDropped(rowNumber, id, 'no usable start or end date');
    return { kind: 'dropped' };
  }

  return {
    kind: 'resolved',
    synthesized,
    task: {
      id,
      name: readText(row, 'Task Name'),
      bucket: readText(row, 'Bucket Name'),
      progressPct: normalizeProgress(row['Progress']),
      priority: readText(row, 'Priority'),
      assignee: readText(row, 'Assigned To'),
      creator: readText(row, 'Created By'),
      isLate: parseLateFlag(row['Late']),
      description: readText(row, 'Description'),
      start: startDate,
      end: endDate,
    },
  };
}

/**
 * Resolves raw Planner rows into schedulable tasks and reports what was
 * recovered or dropped along the way. Output keeps the input order.
 */
export function resolveWithReport(rows: readonly RawRow[], options: ResolveOptions = {}): ResolveResult {
  const days = options.defaultDurationDays ?? DEFAULT_DURATION_DAYS;
  assertDuration(days);
  const tracer = options.tracer ?? createNoopTracer();

  const tasks: TaskRecord[] = [];
  const report: ResolutionReport = {
    totalRows: rows.length,
    emitted: 0,
    dropped: [],
    malformedDates: [],
    synthesized: { start: 0, end: 0 },
  };

  rows.forEach((row, index) => {
    const rowNumber = index + FIRST_DATA_ROW;
    const outcome = resolveRow(row, rowNumber, days, tracer, report.malformedDates);

    if (outcome.kind === 'dropped') {
      report.dropped.push({
        rowNumber,
        taskId: readText(row, 'Task ID'),
        taskName: readText(row, 'Task Name'),
      });
      return;
    }

    tasks.push(outcome.task);
    if (outcome.synthesized) {
      report.synthesized[outcome.synthesized]++;
    }
  });

  report.emitted = tasks.length;
  return { tasks, report };
}

export function resolve(
  rows: readonly RawRow[],
  defaultDurationDays: number = DEFAULT_DURATION_DAYS
): TaskRecord[] {
  return resolveWithReport(rows, { defaultDurationDays }).tasks;
}
