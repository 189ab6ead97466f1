/**
 * Fatal errors of a run. Data problems inside a single row never raise;
 * they are reported and the row is recovered or dropped.
 */

export class InputUnavailableError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'InputUnavailableError';
  }
}

export class EmptyScheduleError extends Error {
  constructor(
    message = 'No tasks with schedule info found in Planner export',
    public readonly droppedRows = 0
  ) {
    super(message);
    this.name = 'EmptyScheduleError';
  }
}

export class InvalidOptionsError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'InvalidOptionsError';
  }
}
