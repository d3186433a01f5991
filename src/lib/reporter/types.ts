/**
 * Reporter module types
 */

/**
 * One row of the rendered report table
 */
export interface ReportRecord {
  url: string;
  count: number;
  count_perc: number;
  time_sum: number;
  time_perc: number;
  time_avg: number;
  time_max: number;
  time_med: number;
}

export interface ReporterOptions {
  /** HTML template with a $table_json placeholder */
  templatePath?: string;
  /** Decimal places kept for timings and percentages */
  precision?: number;
}
