const DAY_MS = 86_400_000;

// M/D/YYYY as Planner exports it; one or two digit month and day.
const PLANNER_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Parses a Planner date into a `Date` at UTC midnight.
 * Returns null for anything that is not a real calendar day in M/D/YYYY form.
 */
export function parsePlannerDate(value: string): Date | null {
  const match = PLANNER_DATE.exec(value.trim());
  if (!match) return null;

  const month = Number(match[1]);
  const day = Number(match[2]);
  const year = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  // Date.UTC rolls 02/30 over into March; reject instead
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

export function addDaysUTC(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function daysBetweenUTC(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / DAY_MS);
}

/** YYYY-MM-DD */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** MM/DD/YYYY, the text form Planner writes into CSV exports. */
export function formatPlannerDate(date: Date): string {
  return `${pad2(date.getUTCMonth() + 1)}/${pad2(date.getUTCDate())}/${date.getUTCFullYear()}`;
}
