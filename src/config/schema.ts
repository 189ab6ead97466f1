import { z } from 'zod';
import { InvalidOptionsError } from '../errors.js';
import { MAX_DURATION_DAYS } from '../resolver/index.js';

const durationDays = z.number().int().positive().max(MAX_DURATION_DAYS);

export const ConfigFileSchema = z
  .object({
    defaultDurationDays: durationDays.optional(),
    sheet: z.string().min(1).optional(),
    title: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
  })
  .strict();

export const CliOptionsSchema = z.object({
  input: z.string().min(1).optional(),
  csv: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  title: z.string().min(1).optional(),
  sheet: z.string().min(1).optional(),
  duration: z.coerce.number().pipe(durationDays).optional(),
  config: z.string().min(1).optional(),
  stateDir: z.string().min(1),
  dryRun: z.boolean(),
  debug: z.boolean(),
});

export const RunOptionsSchema = z.object({
  input: z.string().min(1),
  output: z.string().min(1),
  title: z.string().min(1),
  sheet: z.string().min(1),
  defaultDurationDays: durationDays,
  stateDir: z.string().min(1),
  dryRun: z.boolean(),
  debug: z.boolean(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type CliOptions = z.infer<typeof CliOptionsSchema>;
export type RunOptions = z.infer<typeof RunOptionsSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/** Parses `value` with `schema`, turning validation failures into an InvalidOptionsError. */
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, source: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new InvalidOptionsError(`Invalid ${source}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
