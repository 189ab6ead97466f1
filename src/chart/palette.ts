import type { BucketColors, TaskRecord } from '../types/index.js';

// Plotly's default qualitative sequence
export const QUALITATIVE_PALETTE = [
  '#636EFA',
  '#EF553B',
  '#00CC96',
  '#AB63FA',
  '#FFA15A',
  '#19D3F3',
  '#FF6692',
  '#B6E880',
  '#FF97FF',
  '#FECB52',
] as const;

export const NO_BUCKET_LABEL = '(No bucket)';

export function bucketLabel(bucket: string): string {
  return bucket || NO_BUCKET_LABEL;
}

/**
 * Assigns palette colours to buckets in order of first appearance, wrapping
 * when there are more buckets than colours.
 */
export function assignBucketColors(tasks: readonly Pick<TaskRecord, 'bucket'>[]): BucketColors {
  const colors = new Map<string, string>();
  for (const task of tasks) {
    const label = bucketLabel(task.bucket);
    if (!colors.has(label)) {
      colors.set(label, QUALITATIVE_PALETTE[colors.size % QUALITATIVE_PALETTE.length]);
    }
  }
  return colors;
}
