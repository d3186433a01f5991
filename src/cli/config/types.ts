/**
 * CLI configuration types
 */

/**
 * Settings section of a config file, keys upper-cased
 */
export type ConfigSection = Record<string, unknown>;

/**
 * Config file keys recognised in the settings section
 */
export const CONFIG_KEYS = {
  reportSize: "REPORT_SIZE",
  reportDir: "REPORT_DIR",
  logDir: "LOG_DIR",
  allowedInvalidRecordsPart: "ALLOWED_INVALID_RECORDS_PART",
  logging: "LOGGING",
} as const;

/**
 * Options shared by every command (from commander)
 */
export interface CommonCommandOptions {
  config?: string;
  logDir?: string;
  logLevel?: string;
}

export interface AnalyzeCommandOptions extends CommonCommandOptions {
  reportDir?: string;
  reportSize?: string;
  allowedInvalidPart?: string;
}

export type LatestCommandOptions = CommonCommandOptions;
