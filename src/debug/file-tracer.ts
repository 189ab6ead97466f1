import { mkdirSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { DateColumn } from '../types/index.js';
import type { DebugEvent, DebugTracer, TraceFile } from './types.js';

class FileTracer implements DebugTracer {
  private stateDir: string;
  private debugDir = '';
  private trace: TraceFile | null = null;
  private writePromise: Promise<void> = Promise.resolve();
  private writeError: Error | null = null;

  constructor(stateDir: string) {
    this.stateDir = stateDir;
  }

  get tracePath(): string {
    return join(this.debugDir, 'trace.json');
  }

  async init(runId: string, inputPath: string, defaultDurationDays: number): Promise<void> {
    this.debugDir = join(this.stateDir, 'debug', runId);
    mkdirSync(this.debugDir, { recursive: true });

    this.trace = {
      runId,
      inputPath,
      defaultDurationDays,
      startedAt: new Date().toISOString(),
      completedAt: null,
      events: [],
    };

    await this.saveTrace();
  }

  async finalize(): Promise<void> {
    if (this.trace) {
      this.trace.completedAt = new Date().toISOString();
      await this.saveTrace();
    }
    if (this.writeError) {
      throw this.writeError;
    }
  }

  logInputLoaded(path: string, format: 'csv' | 'xlsx', rowCount: number, columns: string[]): void {
    this.addEvent({
      type: 'input_loaded',
      timestamp: new Date().toISOString(),
      path,
      format,
      rowCount,
      columns,
    });
  }

  logMalformedDate(rowNumber: number, taskId: string, column: DateColumn, value: string): void {
    this.addEvent({
      type: 'malformed_date',
      timestamp: new Date().toISOString(),
      rowNumber,
      taskId,
      column,
      value,
    });
  }

  logEndpointSynthesized(
    rowNumber: number,
    taskId: string,
    endpoint: 'start' | 'end',
    from: string,
    value: string
  ): void {
    this.addEvent({
      type: 'endpoint_synthesized',
      timestamp: new Date().toISOString(),
      rowNumber,
      taskId,
      endpoint,
      from,
      value,
    });
  }

  logRowDropped(rowNumber: number, taskId: string, reason: string): void {
    this.addEvent({
      type: 'row_dropped',
      timestamp: new Date().toISOString(),
      rowNumber,
      taskId,
      reason,
    });
  }

  logChartWritten(outputPath: string, taskCount: number, bucketCount: number): void {
    this.addEvent({
      type: 'chart_written',
      timestamp: new Date().toISOString(),
      outputPath,
      taskCount,
      bucketCount,
    });
  }

  logError(error: string, context?: Record<string, unknown>): void {
    this.addEvent({
      type: 'error',
      timestamp: new Date().toISOString(),
      error,
      context,
    });
  }

  private addEvent(event: DebugEvent): void {
    if (this.trace) {
      this.trace.events.push(event);
      // Serialized so concurrent saves never interleave; the first failure is kept for finalize()
      this.writePromise = this.writePromise
        .then(() => this.doSaveTrace())
        .catch((err: unknown) => {
          if (!this.writeError) {
            this.writeError = err instanceof Error ? err : new Error(String(err));
          }
        });
    }
  }

  private async saveTrace(): Promise<void> {
    await this.writePromise;
    await this.doSaveTrace();
  }

  private async doSaveTrace(): Promise<void> {
    if (this.trace) {
      await writeFile(this.tracePath, JSON.stringify(this.trace, null, 2));
    }
  }
}

export function createFileTracer(stateDir: string): DebugTracer {
  return new FileTracer(stateDir);
}
