/**
 * Log scanner - locates the most recent nginx UI access log in a directory
 */

import { readdir, stat } from "fs/promises";
import path from "path";
import type { LogFile } from "../../types/data-model.js";
import { LogDirectoryError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Accepted log names, e.g. nginx-access-ui.log-20170630.gz
 */
export const LOG_FILENAME_PATTERN = /^nginx-access-ui\.log-(\d{8})\.(gz|log)$/;

interface LogNameMatch {
  name: string;
  rawDate: string;
  date: Date;
  extension: string;
}

/**
 * Parse a YYYYMMDD string into a UTC date, or null if it is not a real day
 */
export function parseLogDate(rawDate: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(rawDate);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1) return null;

  // setUTCFullYear, unlike Date.UTC, keeps years 0..99 as given
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

export function isValidDate(rawDate: string): boolean {
  return parseLogDate(rawDate) !== null;
}

function matchLogName(name: string): LogNameMatch | null {
  const match = LOG_FILENAME_PATTERN.exec(name);
  if (!match || match[1] === undefined || match[2] === undefined) return null;
  const date = parseLogDate(match[1]);
  if (!date) return null;
  return { name, rawDate: match[1], date, extension: match[2] };
}

function selectMostRecent(names: Iterable<string>): LogNameMatch | null {
  let best: LogNameMatch | null = null;

  for (const name of names) {
    const candidate = matchLogName(name);
    if (!candidate) continue;

    if (
      best === null ||
      candidate.rawDate > best.rawDate ||
      (candidate.rawDate === best.rawDate && candidate.name > best.name)
    ) {
      best = candidate;
    }
  }

  return best;
}

/**
 * Pick the newest log name. Names sharing a date are ordered
 * lexicographically, so a .log wins over a .gz of the same day.
 */
export function mostRecentLogName(names: Iterable<string>): string | null {
  return selectMostRecent(names)?.name ?? null;
}

/**
 * Find the most recent log in a directory
 *
 * @returns The newest log, or null when the directory has none
 * @throws LogDirectoryError when the path is not a readable directory
 */
export async function findMostRecentLog(
  directory: string,
): Promise<LogFile | null> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(directory)).isDirectory();
  } catch (error) {
    throw new LogDirectoryError(
      `Can't find ${directory} directory with logs`,
      { directory },
      { cause: error },
    );
  }
  if (!isDirectory) {
    throw new LogDirectoryError(`${directory} is not a directory`, {
      directory,
    });
  }

  let names: string[];
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    names = entries
      .filter((entry) => entry.isFile() || entry.isSymbolicLink())
      .map((entry) => entry.name);
  } catch (error) {
    throw new LogDirectoryError(
      `Failed to list ${directory}`,
      { directory },
      { cause: error },
    );
  }

  const latest = selectMostRecent(names);
  if (!latest) {
    logger.debug("No log files matched in directory", { directory });
    return null;
  }

  return {
    path: path.resolve(directory, latest.name),
    date: latest.date,
    extension: latest.extension,
  };
}
