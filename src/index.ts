#!/usr/bin/env node
import { createCLI, parseArgs } from './cli.js';
import { loadConfigFile, resolveRunOptions } from './config/index.js';
import type { ConfigFile } from './config/index.js';
import { runPipeline } from './pipeline/index.js';
import { formatResolutionSummary, printDryRunSummary } from './pipeline/summary.js';

async function main() {
  const cli = parseArgs(process.argv.slice(2), createCLI());
  const fileConfig: ConfigFile = cli.config ? await loadConfigFile(cli.config) : {};
  const options = resolveRunOptions(cli, fileConfig);

  const result = await runPipeline(options);

  if (options.debug) {
    console.log(`Debug trace: ${options.stateDir}/debug/${result.runId}/trace.json`);
  }

  if (options.dryRun) {
    printDryRunSummary(result.rows, result.report);
    return;
  }

  console.log(formatResolutionSummary(result.report));
  console.log(`Wrote Gantt chart to ${result.outputPath}`);
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
