import type { DateColumn } from '../types/index.js';
import type { DebugTracer } from './types.js';

class NoopTracer implements DebugTracer {
  async init(_runId: string, _inputPath: string, _defaultDurationDays: number): Promise<void> {}
  async finalize(): Promise<void> {}
  logInputLoaded(
    _path: string,
    _format: 'csv' | 'xlsx',
    _rowCount: number,
    _columns: string[]
  ): void {}
  logMalformedDate(_rowNumber: number, _taskId: string, _column: DateColumn, _value: string): void {}
  logEndpointSynthesized(
    _rowNumber: number,
    _taskId: string,
    _endpoint: 'start' | 'end',
    _from: string,
    _value: string
  ): void {}
  logRowDropped(_rowNumber: number, _taskId: string, _reason: string): void {}
  logChartWritten(_outputPath: string, _taskCount: number, _bucketCount: number): void {}
  logError(_error: string, _context?: Record<string, unknown>): void {}
}

export function createNoopTracer(): DebugTracer {
  return new NoopTracer();
}
