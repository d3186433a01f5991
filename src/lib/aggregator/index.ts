/**
 * Request aggregation - per-URL response time statistics
 */

import type {
  LogFile,
  LogRequest,
  RequestAggregation,
  UrlStat,
} from "../../types/data-model.js";
import { InvalidRecordsThresholdError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { iterateRequests } from "../parser/index.js";

export const DEFAULT_REPORT_SIZE = 1000;
export const DEFAULT_ALLOWED_INVALID_PART = 0.2;

export interface RequestStatsOptions {
  /** Number of URLs to keep, by descending total time */
  reportSize?: number;
  /** Largest tolerated share of unparsable lines, 0..1 */
  allowedInvalidPart?: number;
}

/**
 * Median of an ascending list
 */
export function median(sorted: readonly number[]): number {
  const n = sorted.length;
  const lower = sorted[(n - 1) >> 1];
  const upper = sorted[n >> 1];
  if (lower === undefined || upper === undefined) {
    throw new RangeError("Cannot take the median of an empty list");
  }
  return 0.5 * (lower + upper);
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

/**
 * Count valid and invalid records and collect response times per URL
 *
 * @throws InvalidRecordsThresholdError when invalid / total exceeds allowedInvalidPart
 */
export async function aggregateRequests(
  requests: AsyncIterable<LogRequest | null> | Iterable<LogRequest | null>,
  allowedInvalidPart: number = DEFAULT_ALLOWED_INVALID_PART,
): Promise<RequestAggregation> {
  const aggregation: RequestAggregation = {
    countValid: 0,
    countInvalid: 0,
    timeTotal: 0,
    times: new Map(),
  };

  for await (const request of requests) {
    if (request === null) {
      aggregation.countInvalid++;
      continue;
    }

    aggregation.countValid++;
    aggregation.timeTotal += request.time;

    const times = aggregation.times.get(request.url);
    if (times) {
      times.push(request.time);
    } else {
      aggregation.times.set(request.url, [request.time]);
    }
  }

  const countAll = aggregation.countValid + aggregation.countInvalid || 1;
  const invalidPart = aggregation.countInvalid / countAll;
  if (invalidPart > allowedInvalidPart) {
    throw new InvalidRecordsThresholdError(
      "Too many invalid rows in the log-file.",
      {
        countValid: aggregation.countValid,
        countInvalid: aggregation.countInvalid,
        invalidPart,
        allowedInvalidPart,
      },
    );
  }

  logger.debug("Requests aggregated", {
    countValid: aggregation.countValid,
    countInvalid: aggregation.countInvalid,
    urls: aggregation.times.size,
  });

  return aggregation;
}

/**
 * Build per-URL statistics, sorted by total time descending and cut to reportSize
 */
export function computeUrlStats(
  aggregation: RequestAggregation,
  reportSize: number = DEFAULT_REPORT_SIZE,
): UrlStat[] {
  const { countValid, timeTotal } = aggregation;
  const stats: UrlStat[] = [];

  for (const [url, times] of aggregation.times) {
    const sorted = [...times].sort((a, b) => a - b);
    const count = times.length;
    const timeSum = sum(times);

    stats.push({
      url,
      count,
      countPerc: (100 * count) / countValid,
      timeSum,
      timePerc: timeTotal > 0 ? (100 * timeSum) / timeTotal : 0,
      timeAvg: timeSum / count,
      timeMax: sorted[sorted.length - 1] ?? 0,
      timeMed: median(sorted),
    });
  }

  // Array.prototype.sort is stable, so equal sums keep first-seen order
  stats.sort((a, b) => b.timeSum - a.timeSum);
  return stats.slice(0, Math.max(0, reportSize));
}

/**
 * Statistics for every requested URL in a log-file
 */
export async function getRequestStats(
  log: LogFile,
  options: RequestStatsOptions = {},
): Promise<UrlStat[]> {
  const aggregation = await aggregateRequests(
    iterateRequests(log),
    options.allowedInvalidPart ?? DEFAULT_ALLOWED_INVALID_PART,
  );
  return computeUrlStats(aggregation, options.reportSize ?? DEFAULT_REPORT_SIZE);
}
