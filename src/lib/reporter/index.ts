/**
 * Reporter module - renders URL statistics into the static HTML report
 */

import { readFile, rename, rm, writeFile } from "fs/promises";
import { fileURLToPath } from "url";
import type { UrlStat } from "../../types/data-model.js";
import { ReportWriteError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { ReportRecord, ReporterOptions } from "./types.js";

export type { ReportRecord, ReporterOptions } from "./types.js";

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(
  new URL("../../../templates/report.html", import.meta.url),
);

export const DEFAULT_PRECISION = 3;

// $$ is an escaped dollar; $table_json and ${table_json} are the placeholder
const PLACEHOLDER_PATTERN = /\$(?:(\$)|\{table_json\}|table_json(?![A-Za-z0-9_]))/g;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Log date as YYYY.MM.DD
 */
export function formatReportDate(date: Date): string {
  return `${date.getUTCFullYear()}.${pad(date.getUTCMonth() + 1)}.${pad(date.getUTCDate())}`;
}

/**
 * Report file name for a log date, e.g. report-2017.06.30.html
 */
export function reportFileName(date: Date): string {
  return `report-${formatReportDate(date)}.html`;
}

function round(value: number, precision: number): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

export function toReportRecord(
  stat: UrlStat,
  precision: number = DEFAULT_PRECISION,
): ReportRecord {
  return {
    url: stat.url,
    count: stat.count,
    count_perc: round(stat.countPerc, precision),
    time_sum: round(stat.timeSum, precision),
    time_perc: round(stat.timePerc, precision),
    time_avg: round(stat.timeAvg, precision),
    time_max: round(stat.timeMax, precision),
    time_med: round(stat.timeMed, precision),
  };
}

/**
 * Serialize stats for embedding inside a <script> element
 */
export function serializeStats(
  stats: readonly UrlStat[],
  precision: number = DEFAULT_PRECISION,
): string {
  return JSON.stringify(
    stats.map((stat) => toReportRecord(stat, precision)),
  ).replace(/</g, "\\u003c");
}

/**
 * Substitute the stats table into a report template
 */
export function renderReport(
  stats: readonly UrlStat[],
  template: string,
  precision: number = DEFAULT_PRECISION,
): string {
  const tableJson = serializeStats(stats, precision);
  return template.replace(PLACEHOLDER_PATTERN, (_match, dollar?: string) =>
    dollar ? "$" : tableJson,
  );
}

/**
 * Render stats and write the report; the file appears only once complete
 *
 * @throws ReportWriteError when the template cannot be read or the report cannot be written
 */
export async function writeReport(
  stats: readonly UrlStat[],
  destination: string,
  options: ReporterOptions = {},
): Promise<void> {
  const templatePath = options.templatePath ?? DEFAULT_TEMPLATE_PATH;

  let template: string;
  try {
    template = await readFile(templatePath, "utf8");
  } catch (error) {
    throw new ReportWriteError(
      `Failed to load report template from ${templatePath}`,
      { templatePath },
      { cause: error },
    );
  }

  const rendered = renderReport(stats, template, options.precision);
  const tmpPath = `${destination}.tmp`;

  try {
    await writeFile(tmpPath, rendered, "utf8");
    await rename(tmpPath, destination);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw new ReportWriteError(
      `Failed to write report to ${destination}`,
      { destination },
      { cause: error },
    );
  }

  logger.debug("Report written", { path: destination, urls: stats.length });
}
