import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { CliOptionsSchema, DEFAULTS, validate } from './config/index.js';
import type { CliOptions } from './config/index.js';

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(__dirname, '..', 'package.json');
  if (!existsSync(pkgPath)) return 'unknown';

  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('planner-gantt')
    .version(getVersion(), '-v, --version', 'Show version number')
    .description('Render a Gantt chart from a Microsoft Planner export (CSV or XLSX)')
    .option('-i, --input <path>', `Path to the Planner export (default: "${DEFAULTS.input}")`)
    .option('--csv <path>', 'Alias for --input')
    .option('-o, --output <path>', `Destination HTML file (default: "${DEFAULTS.output}")`)
    .option('-t, --title <title>', 'Chart title (defaults to the input file name)')
    .option('--sheet <name>', `Worksheet to read from XLSX inputs (default: "${DEFAULTS.sheet}")`)
    .option(
      '-d, --duration <days>',
      `Days to assume when a task has only a start or only an end (default: ${DEFAULTS.defaultDurationDays})`
    )
    .option('-c, --config <path>', 'YAML config file')
    .option('--state-dir <path>', 'State directory for debug traces', DEFAULTS.stateDir)
    .option('--dry-run', 'Print the resolved schedule without writing the chart', false)
    .option('--debug', 'Write a diagnostics trace to <state-dir>/debug/<runId>/', false);

  return program;
}

/**
 * Parses user arguments (without the node and script entries) into validated options.
 */
export function parseArgs(argv: string[], program: Command = createCLI()): CliOptions {
  program.parse(argv, { from: 'user' });
  return validate(CliOptionsSchema, program.opts(), 'arguments');
}
