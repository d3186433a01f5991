/**
 * Analyze CLI command
 */

import { Command } from "commander";
import { runAnalysis } from "../../lib/analyzer/index.js";
import type { AnalyzeCommandOptions } from "../config/types.js";
import type { ReporterOptions } from "../../lib/reporter/types.js";
import {
  handleCommandError,
  printSuccess,
  resolveCommandConfig,
} from "./shared.js";

/**
 * Create the analyze command (the default command)
 */
export function createAnalyzeCommand(
  reporterOptions: ReporterOptions = {},
): Command {
  return new Command("analyze")
    .description(
      "Build the per-URL timing report for the most recent access log",
    )
    .option("--config <path>", "Path to configuration file (INI/JSON/YAML)")
    .option("--log-dir <dir>", "Directory scanned for access logs")
    .option("--report-dir <dir>", "Directory the report is written to")
    .option("--report-size <number>", "Number of URLs kept in the report")
    .option(
      "--allowed-invalid-part <fraction>",
      "Largest tolerated share of unparsable lines (0..1)",
    )
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(async (options: AnalyzeCommandOptions) => {
      try {
        const config = resolveCommandConfig(options);
        const result = await runAnalysis(config, reporterOptions);
        printSuccess("analysis", { result });
      } catch (error) {
        handleCommandError("analysis", error);
      }
    });
}
