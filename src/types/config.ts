/**
 * Configuration types for the log analyzer
 */

import type { LogLevel } from "../utils/logger.js";

/**
 * Fully resolved analyzer configuration
 */
export interface AnalyzerConfig {
  /** Number of URLs kept in the report */
  reportSize: number;
  reportDir: string;
  logDir: string;
  /** Largest tolerated share of unparsable lines, 0..1 */
  allowedInvalidRecordsPart: number;
  logging: LogLevel;
}

export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
  reportSize: 1000,
  reportDir: "./reports",
  logDir: "./log",
  allowedInvalidRecordsPart: 0.2,
  logging: "info",
};

/**
 * Name of the config file section holding analyzer settings
 */
export const CONFIG_SECTION = "main";
