/**
 * Core data model for log analysis
 */

/**
 * Extensions a log file may carry
 */
export type LogExtension = "log" | "gz";

/**
 * The log file selected for analysis
 */
export interface LogFile {
  /** Absolute path */
  path: string;
  /** Date encoded in the file name, at UTC midnight */
  date: Date;
  extension: string;
}

/**
 * A single successfully parsed request line
 */
export interface LogRequest {
  url: string;
  time: number;
}

/**
 * Timing statistics for one requested URL
 */
export interface UrlStat {
  url: string;
  count: number;
  countPerc: number;
  timeSum: number;
  timePerc: number;
  timeAvg: number;
  timeMax: number;
  timeMed: number;
}

/**
 * Raw per-URL accumulation of a single log
 */
export interface RequestAggregation {
  countValid: number;
  countInvalid: number;
  timeTotal: number;
  /** Response times per URL, in first-seen URL order */
  times: Map<string, number[]>;
}

/**
 * Outcome of a single analysis run
 */
export type AnalysisResult =
  | { status: "no-logs"; logDir: string }
  | { status: "report-exists"; log: LogFile; reportPath: string }
  | { status: "no-records"; log: LogFile }
  | { status: "written"; log: LogFile; reportPath: string; urls: number };
