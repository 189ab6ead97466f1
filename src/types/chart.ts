import type { TaskRecord } from './task.js';

export interface ChartRow {
  task: TaskRecord;
  label: string;
  bucketLabel: string;
  start: Date;
  finish: Date; // end, clamped to start
  durationDays: number; // inclusive
  startIso: string;
  finishIso: string;
}

export type BucketColors = ReadonlyMap<string, string>;
