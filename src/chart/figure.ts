import { addDaysUTC } from '../resolver/index.js';
import type { BucketColors, ChartRow } from '../types/index.js';
import { QUALITATIVE_PALETTE } from './palette.js';

export interface BarTrace {
  type: 'bar';
  orientation: 'h';
  name: string;
  legendgroup: string;
  marker: { color: string };
  base: string[];
  x: number[];
  y: string[];
  customdata: Array<Array<string | number>>;
  hovertemplate: string;
}

export interface FigureLayout extends Record<string, unknown> {
  title: { text: string };
  height: number;
}

export interface Figure {
  data: BarTrace[];
  layout: FigureLayout;
}

export interface FigureOptions {
  title: string;
  colors: BucketColors;
  today?: Date;
}

export const HOVER_TEMPLATE = [
  '<b>%{y}</b>',
  'ID: %{customdata[0]}',
  'Bucket: %{customdata[1]}',
  'Progress: %{customdata[2]}%',
  'Priority: %{customdata[3]}',
  'Assigned to: %{customdata[4]}',
  'Created by: %{customdata[5]}',
  'Late: %{customdata[6]}',
  'Start: %{customdata[7]}',
  'Finish: %{customdata[8]}',
  'Duration: %{customdata[9]} days',
].join('<br>') + '<extra></extra>';

export function chartHeight(rowCount: number): number {
  return Math.max(600, 40 * rowCount + 200);
}

function hoverData(row: ChartRow): Array<string | number> {
  const { task } = row;
  return [
    task.id,
    row.bucketLabel,
    task.progressPct,
    task.priority,
    task.assignee,
    task.creator,
    task.isLate ? 'Yes' : 'No',
    row.startIso,
    row.finishIso,
    row.durationDays,
  ];
}

/**
 * One horizontal bar trace per bucket, in order of first appearance.
 * Each bar covers its start day through its finish day inclusive.
 */
export function buildTraces(rows: readonly ChartRow[], colors: BucketColors): BarTrace[] {
  const traces = new Map<string, BarTrace>();

  for (const row of rows) {
    let trace = traces.get(row.bucketLabel);
    if (!trace) {
      trace = {
        type: 'bar',
        orientation: 'h',
        name: row.bucketLabel,
        legendgroup: row.bucketLabel,
        marker: { color: colors.get(row.bucketLabel) ?? QUALITATIVE_PALETTE[0] },
        base: [],
        x: [],
        y: [],
        customdata: [],
        hovertemplate: HOVER_TEMPLATE,
      };
      traces.set(row.bucketLabel, trace);
    }

    trace.base.push(row.startIso);
    trace.x.push(addDaysUTC(row.finish, 1).getTime() - row.start.getTime());
    trace.y.push(row.label);
    trace.customdata.push(hoverData(row));
  }

  return [...traces.values()];
}

export function buildFigure(rows: readonly ChartRow[], options: FigureOptions): Figure {
  const today = (options.today ?? new Date()).toISOString();

  return {
    data: buildTraces(rows, options.colors),
    layout: {
      title: { text: options.title },
      barmode: 'overlay',
      bargap: 0.2,
      height: chartHeight(rows.length),
      margin: { l: 240, r: 80, t: 80, b: 40 },
      hoverlabel: { align: 'left' },
      legend: { title: { text: 'Bucket' } },
      plot_bgcolor: 'white',
      xaxis: { title: { text: 'Schedule' }, type: 'date', gridcolor: '#EBF0F8' },
      yaxis: {
        title: { text: 'Tasks' },
        autorange: 'reversed',
        categoryorder: 'array',
        categoryarray: rows.map((row) => row.label),
      },
      shapes: [
        {
          type: 'line',
          x0: today,
          x1: today,
          yref: 'paper',
          y0: 0,
          y1: 1,
          line: { color: 'red', dash: 'dot', width: 2 },
        },
      ],
      annotations: [
        {
          x: today,
          y: 1,
          yref: 'paper',
          text: 'Today',
          showarrow: false,
          font: { color: 'red' },
          xanchor: 'left',
          yanchor: 'bottom',
        },
      ],
    },
  };
}
