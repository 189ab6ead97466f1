/**
 * Column headers of a Microsoft Planner task export.
 */
export const PLANNER_COLUMNS = [
  'Task ID',
  'Task Name',
  'Bucket Name',
  'Progress',
  'Priority',
  'Assigned To',
  'Created By',
  'Created Date',
  'Start date',
  'Due date',
  'Completed Date',
  'Late',
  'Description',
] as const;

export type PlannerColumn = (typeof PLANNER_COLUMNS)[number];

export type DateColumn = Extract<
  PlannerColumn,
  'Created Date' | 'Start date' | 'Due date' | 'Completed Date'
>;

// One input row: header -> raw cell text. Extra columns are carried but ignored.
export type RawRow = Readonly<Record<string, string | undefined>>;

export type ProgressPct = 0 | 50 | 100;

export interface TaskRecord {
  readonly id: string;
  readonly name: string;
  readonly bucket: string;
  readonly progressPct: ProgressPct;
  readonly priority: string;
  readonly assignee: string;
  readonly creator: string;
  readonly isLate: boolean;
  readonly description: string;
  readonly start: Date; // UTC midnight
  readonly end: Date; // UTC midnight, not guaranteed >= start
}

export interface MalformedDate {
  rowNumber: number;
  taskId: string;
  column: DateColumn;
  value: string;
}

export interface DroppedRow {
  rowNumber: number;
  taskId: string;
  taskName: string;
}

export interface ResolutionReport {
  totalRows: number;
  emitted: number;
  dropped: DroppedRow[];
  malformedDates: MalformedDate[];
  synthesized: { start: number; end: number };
}
