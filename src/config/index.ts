import { DEFAULTS, defaultTitle } from './defaults.js';
import { RunOptionsSchema, validate } from './schema.js';
import type { CliOptions, ConfigFile, RunOptions } from './schema.js';

export { DEFAULTS, defaultTitle, FALLBACK_TITLE } from './defaults.js';
export { loadConfigFile } from './file.js';
export { CliOptionsSchema, ConfigFileSchema, RunOptionsSchema, validate } from './schema.js';
export type { CliOptions, ConfigFile, RunOptions } from './schema.js';

/**
 * Merges flags over the config file over built-in defaults.
 */
export function resolveRunOptions(cli: CliOptions, file: ConfigFile = {}): RunOptions {
  const input = cli.input ?? cli.csv ?? DEFAULTS.input;

  return validate(
    RunOptionsSchema,
    {
      input,
      output: cli.output ?? file.output ?? DEFAULTS.output,
      title: cli.title ?? file.title ?? defaultTitle(input),
      sheet: cli.sheet ?? file.sheet ?? DEFAULTS.sheet,
      defaultDurationDays: cli.duration ?? file.defaultDurationDays ?? DEFAULTS.defaultDurationDays,
      stateDir: cli.stateDir,
      dryRun: cli.dryRun,
      debug: cli.debug,
    },
    'options'
  );
}
