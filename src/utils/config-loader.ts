/**
 * Configuration loader: merges CLI options, config file and defaults
 */

import AjvModule, { type ErrorObject, type JSONSchemaType } from "ajv";
import {
  CONFIG_KEYS,
  type AnalyzeCommandOptions,
  type ConfigSection,
} from "../cli/config/types.js";
import {
  DEFAULT_ANALYZER_CONFIG,
  type AnalyzerConfig,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger, type LogLevel } from "./logger.js";

const LEVEL_ALIASES: Record<string, LogLevel> = {
  error: "error",
  critical: "error",
  fatal: "error",
  warn: "warn",
  warning: "warn",
  info: "info",
  debug: "debug",
};

const analyzerConfigSchema: JSONSchemaType<AnalyzerConfig> = {
  type: "object",
  properties: {
    reportSize: { type: "integer", minimum: 0 },
    reportDir: { type: "string", minLength: 1 },
    logDir: { type: "string", minLength: 1 },
    allowedInvalidRecordsPart: { type: "number", minimum: 0, maximum: 1 },
    logging: { type: "string", enum: ["error", "warn", "info", "debug"] },
  },
  required: [
    "reportSize",
    "reportDir",
    "logDir",
    "allowedInvalidRecordsPart",
    "logging",
  ],
  additionalProperties: false,
};

// ajv is CommonJS; under Node ESM the class sits on the default export
const Ajv = AjvModule.default;

// INI values arrive as strings, so coercion is part of validation
const ajv = new Ajv({ allErrors: true, coerceTypes: true });
const validateAnalyzerConfig = ajv.compile(analyzerConfigSchema);

/**
 * Map a level name, including WARNING and CRITICAL, to a logger level.
 * Unknown values are returned unchanged for the schema to reject.
 */
export function normalizeLogLevel(value: unknown): unknown {
  if (typeof value !== "string") return value;
  return LEVEL_ALIASES[value.trim().toLowerCase()] ?? value;
}

function formatSchemaError(error: ErrorObject): string {
  const field = error.instancePath.replace(/^\//, "") || "config";
  return `${field} ${error.message ?? "is invalid"}`;
}

/**
 * Load analyzer configuration with precedence CLI > config file > defaults
 *
 * @param cliOptions - Flags given on the command line
 * @param fileSection - Settings section of the config file, keys upper-cased
 * @throws ConfigError listing every invalid value
 *
 * @example
 * loadAnalyzerConfig({ reportSize: "50" }, { REPORT_SIZE: "10", LOG_DIR: "/var/log/nginx" });
 * // => { reportSize: 50, logDir: "/var/log/nginx", reportDir: "./reports", ... }
 */
export function loadAnalyzerConfig(
  cliOptions: AnalyzeCommandOptions = {},
  fileSection: ConfigSection = {},
): AnalyzerConfig {
  const candidate: Record<string, unknown> = {
    reportSize:
      cliOptions.reportSize ??
      fileSection[CONFIG_KEYS.reportSize] ??
      DEFAULT_ANALYZER_CONFIG.reportSize,
    reportDir:
      cliOptions.reportDir ??
      fileSection[CONFIG_KEYS.reportDir] ??
      DEFAULT_ANALYZER_CONFIG.reportDir,
    logDir:
      cliOptions.logDir ??
      fileSection[CONFIG_KEYS.logDir] ??
      DEFAULT_ANALYZER_CONFIG.logDir,
    allowedInvalidRecordsPart:
      cliOptions.allowedInvalidPart ??
      fileSection[CONFIG_KEYS.allowedInvalidRecordsPart] ??
      DEFAULT_ANALYZER_CONFIG.allowedInvalidRecordsPart,
    logging: normalizeLogLevel(
      cliOptions.logLevel ??
        fileSection[CONFIG_KEYS.logging] ??
        DEFAULT_ANALYZER_CONFIG.logging,
    ),
  };

  if (!validateAnalyzerConfig(candidate)) {
    const errors = (validateAnalyzerConfig.errors ?? []).map(formatSchemaError);
    throw new ConfigError(`Invalid configuration: ${errors.join("; ")}`, {
      errors,
    });
  }

  logger.debug("Analyzer config loaded", { ...candidate });
  return candidate;
}
