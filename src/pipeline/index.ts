import { randomUUID } from 'node:crypto';
import { resolve as resolvePath } from 'node:path';
import { assignBucketColors, buildFigure, prepareChartRows, renderHtml, writeChart } from '../chart/index.js';
import type { RunOptions } from '../config/index.js';
import { createTracer } from '../debug/index.js';
import type { DebugTracer } from '../debug/index.js';
import { EmptyScheduleError } from '../errors.js';
import { loadInput } from '../loader/index.js';
import { resolveWithReport } from '../resolver/index.js';
import type { ChartRow, ResolutionReport } from '../types/index.js';

export interface PipelineResult {
  runId: string;
  rows: ChartRow[];
  report: ResolutionReport;
  /** Absolute path of the written chart, or null on a dry run */
  outputPath: string | null;
  bucketCount: number;
}

export interface PipelineHooks {
  tracer?: DebugTracer;
  today?: Date;
  runId?: string;
}

async function execute(
  options: RunOptions,
  tracer: DebugTracer,
  runId: string,
  today: Date | undefined
): Promise<PipelineResult> {
  const inputPath = resolvePath(options.input);
  const loaded = await loadInput(inputPath, { sheet: options.sheet, tracer });

  const { tasks, report } = resolveWithReport(loaded.rows, {
    defaultDurationDays: options.defaultDurationDays,
    tracer,
  });
  if (tasks.length === 0) {
    throw new EmptyScheduleError(undefined, report.dropped.length);
  }

  const rows = prepareChartRows(tasks);
  const colors = assignBucketColors(tasks);

  if (options.dryRun) {
    return { runId, rows, report, outputPath: null, bucketCount: colors.size };
  }

  const outputPath = resolvePath(options.output);
  const figure = buildFigure(rows, { title: options.title, colors, today });
  await writeChart(outputPath, renderHtml(figure));
  tracer.logChartWritten(outputPath, rows.length, colors.size);

  return { runId, rows, report, outputPath, bucketCount: colors.size };
}

/**
 * Load -> resolve -> render. Data problems in single rows are recovered and
 * reported; a missing input or an empty schedule fails the run.
 */
export async function runPipeline(options: RunOptions, hooks: PipelineHooks = {}): Promise<PipelineResult> {
  const runId = hooks.runId ?? randomUUID();
  const tracer = hooks.tracer ?? createTracer(options.debug, options.stateDir);
  await tracer.init(runId, options.input, options.defaultDurationDays);

  let result: PipelineResult;
  try {
    result = await execute(options, tracer, runId, hooks.today);
  } catch (err) {
    tracer.logError(err instanceof Error ? err.message : String(err), { input: options.input });
    await tracer.finalize();
    throw err;
  }

  await tracer.finalize();
  return result;
}
