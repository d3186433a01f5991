import { Command } from "commander";
import { findMostRecentLog } from "../../lib/scanner/index.js";
import type { LatestCommandOptions } from "../config/types.js";
import {
  handleCommandError,
  printSuccess,
  resolveCommandConfig,
} from "./shared.js";

/**
 * Create the latest command: show which log the next analysis would read
 */
export function createLatestCommand(): Command {
  return new Command("latest")
    .description("Print the most recent access log without analyzing it")
    .option("--config <path>", "Path to configuration file (INI/JSON/YAML)")
    .option("--log-dir <dir>", "Directory scanned for access logs")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(async (options: LatestCommandOptions) => {
      try {
        const config = resolveCommandConfig(options);
        const log = await findMostRecentLog(config.logDir);
        printSuccess("scan", { log });
      } catch (error) {
        handleCommandError("scan", error);
      }
    });
}
