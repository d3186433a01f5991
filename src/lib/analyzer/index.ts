/**
 * Analyzer - one end-to-end run: newest log in, HTML report out
 */

import { access, mkdir } from "fs/promises";
import path from "path";
import type { AnalyzerConfig } from "../../types/config.js";
import type { AnalysisResult } from "../../types/data-model.js";
import { FileIOError, hasErrorCode } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { getRequestStats } from "../aggregator/index.js";
import { formatReportDate, reportFileName, writeReport } from "../reporter/index.js";
import type { ReporterOptions } from "../reporter/types.js";
import { findMostRecentLog } from "../scanner/index.js";

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) return false;
    throw new FileIOError(`Cannot access ${filePath}`, { path: filePath }, {
      cause: error,
    });
  }
}

async function ensureDirectory(directory: string): Promise<void> {
  try {
    await mkdir(directory, { recursive: true });
  } catch (error) {
    throw new FileIOError(
      `Failed to create report directory ${directory}`,
      { directory },
      { cause: error },
    );
  }
}

/**
 * Analyze the most recent log in config.logDir and write its report
 * into config.reportDir, unless that report already exists
 */
export async function runAnalysis(
  config: AnalyzerConfig,
  reporterOptions: ReporterOptions = {},
): Promise<AnalysisResult> {
  await ensureDirectory(config.reportDir);

  const log = await findMostRecentLog(config.logDir);
  if (!log) {
    logger.info("There are no valid logs in the directory.", {
      logDir: config.logDir,
    });
    return { status: "no-logs", logDir: config.logDir };
  }
  logger.debug(`Found the most recent log-file ${log.path}.`);

  const reportPath = path.join(config.reportDir, reportFileName(log.date));
  if (await exists(reportPath)) {
    logger.info(`Report for ${formatReportDate(log.date)} already exists.`, {
      reportPath,
    });
    return { status: "report-exists", log, reportPath };
  }

  const stats = await getRequestStats(log, {
    reportSize: config.reportSize,
    allowedInvalidPart: config.allowedInvalidRecordsPart,
  });

  if (stats.length === 0) {
    logger.info(`The most recent log file (${log.path}) has no valid records.`);
    return { status: "no-records", log };
  }

  await writeReport(stats, reportPath, reporterOptions);
  logger.debug("Report has been successfully generated.", { reportPath });

  return { status: "written", log, reportPath, urls: stats.length };
}
