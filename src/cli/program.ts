import chalk from "chalk";
import { Command } from "commander";
import { CollectContext } from "../core/context.js";
import { SystemInfoCollector } from "../core/collector.js";
import { ExportError } from "../core/errors.js";
import { renderTerminal } from "../report/terminal.js";
import { exportSnapshot } from "../report/export.js";

export interface CliOptions {
  percent?: boolean;
  disk?: boolean;
  temp?: boolean;
  export?: string;
}

/** Prints the report, then writes the export if one was requested. */
export function run(opts: CliOptions, collector = new SystemInfoCollector()): void {
  const ctx = new CollectContext({
    ramPercent: opts.percent === true,
    includeDisk: opts.disk === true,
    includeTemp: opts.temp === true,
  });

  const snapshot = collector.collect(ctx);
  console.log(renderTerminal(snapshot));

  if (opts.export === undefined) return;

  try {
    exportSnapshot(snapshot, opts.export);
    console.log(chalk.green(`Data exported to ${opts.export}`));
  } catch (err) {
    if (!(err instanceof ExportError)) throw err;
    console.error(chalk.red(`Export failed: ${err.message}`));
    process.exitCode = 1;
  }
}

export function createProgram(collector?: SystemInfoCollector): Command {
  return new Command()
    .name("peakfetch")
    .description("Show system information beside a mountain banner")
    .version("0.1.0")
    .allowExcessArguments(false)
    .option("-p, --percent", "Show RAM usage as a percentage")
    .option("-d, --disk", "Include root filesystem usage")
    .option("-t, --temp", "Include CPU temperature")
    .option("-e, --export <file>", "Export the collected data to a JSON file")
    .action((opts: CliOptions) => {
      run(opts, collector);
    });
}
