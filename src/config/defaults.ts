import { basename, extname } from 'node:path';

export const DEFAULTS = {
  input: 'input.csv',
  output: 'gantt.html',
  sheet: 'Tasks',
  defaultDurationDays: 7,
  stateDir: '.planner-gantt',
} as const;

export const FALLBACK_TITLE = 'Planner Tasks Timeline';

/** Chart title derived from the input file name, e.g. `exports/Q3 plan.xlsx` -> `Q3 plan`. */
export function defaultTitle(inputPath: string): string {
  const stem = basename(inputPath, extname(inputPath));
  return stem || FALLBACK_TITLE;
}
