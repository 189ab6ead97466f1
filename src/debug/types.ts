import type { DateColumn } from '../types/index.js';

export interface TraceEvent {
  type: string;
  timestamp: string;
}

export interface InputLoadedEvent extends TraceEvent {
  type: 'input_loaded';
  path: string;
  format: 'csv' | 'xlsx';
  rowCount: number;
  columns: string[];
}

export interface MalformedDateEvent extends TraceEvent {
  type: 'malformed_date';
  rowNumber: number;
  taskId: string;
  column: DateColumn;
  value: string;
}

export interface EndpointSynthesizedEvent extends TraceEvent {
  type: 'endpoint_synthesized';
  rowNumber: number;
  taskId: string;
  endpoint: 'start' | 'end';
  from: string;
  value: string;
}

export interface RowDroppedEvent extends TraceEvent {
  type: 'row_dropped';
  rowNumber: number;
  taskId: string;
  reason: string;
}

export interface ChartWrittenEvent extends TraceEvent {
  type: 'chart_written';
  outputPath: string;
  taskCount: number;
  bucketCount: number;
}

export interface ErrorEvent extends TraceEvent {
  type: 'error';
  error: string;
  context?: Record<string, unknown>;
}

export type DebugEvent =
  | InputLoadedEvent
  | MalformedDateEvent
  | EndpointSynthesizedEvent
  | RowDroppedEvent
  | ChartWrittenEvent
  | ErrorEvent;

export interface TraceFile {
  runId: string;
  inputPath: string;
  defaultDurationDays: number;
  startedAt: string;
  completedAt: string | null;
  events: DebugEvent[];
}

/** Per-row hooks the resolver calls. Kept separate so pure callers can pass a bare object. */
export interface ResolutionTracer {
  logMalformedDate(rowNumber: number, taskId: string, column: DateColumn, value: string): void;
  logEndpointSynthesized(
    rowNumber: number,
    taskId: string,
    endpoint: 'start' | 'end',
    from: string,
    value: string
  ): void;
  logRowDropped(rowNumber: number, taskId: string, reason: string): void;
}

export interface DebugTracer extends ResolutionTracer {
  init(runId: string, inputPath: string, defaultDurationDays: number): Promise<void>;
  /** Flushes the trace; rejects if any earlier write failed. */
  finalize(): Promise<void>;
  logInputLoaded(path: string, format: 'csv' | 'xlsx', rowCount: number, columns: string[]): void;
  logChartWritten(outputPath: string, taskCount: number, bucketCount: number): void;
  logError(error: string, context?: Record<string, unknown>): void;
}
