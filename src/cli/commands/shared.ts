/**
 * Helpers shared by CLI commands
 */

import { exitCodeFor, toLogAnalyzerError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { resolveConfigSection } from "../config/parser.js";
import { loadAnalyzerConfig } from "../../utils/config-loader.js";
import type { AnalyzerConfig } from "../../types/config.js";
import type { AnalyzeCommandOptions } from "../config/types.js";

/**
 * Resolve configuration for a command and apply its log level
 */
export function resolveCommandConfig(
  options: AnalyzeCommandOptions,
): AnalyzerConfig {
  const section = resolveConfigSection(options.config);
  const config = loadAnalyzerConfig(options, section);
  logger.setLevel(config.logging);
  return config;
}

/**
 * Print a success payload to stdout
 */
export function printSuccess(phase: string, payload: object): void {
  console.log(JSON.stringify({ status: "success", phase, ...payload }, null, 2));
}

/**
 * Report a failure on stderr and set the process exit code
 */
export function handleCommandError(phase: string, error: unknown): void {
  const analyzerError = toLogAnalyzerError(error);
  logger.error(analyzerError.message, { code: analyzerError.code });
  console.error(JSON.stringify(analyzerError.toResponse(phase), null, 2));
  process.exitCode = exitCodeFor(analyzerError);
}
