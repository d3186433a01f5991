/**
 * Access log parser - extracts the requested URL and response time per line
 *
 * Expected nginx log_format:
 *   $remote_addr $remote_user $http_x_real_ip [$time_local] "$request"
 *   $status $body_bytes_sent "$http_referer" "$http_user_agent"
 *   "$http_x_forwarded_for" "$http_X_REQUEST_ID" "$http_X_RB_USER"
 *   $request_time
 */

import { createReadStream } from "fs";
import { pipeline, type Readable } from "stream";
import { createGunzip } from "zlib";
import type {
  LogExtension,
  LogFile,
  LogRequest,
} from "../../types/data-model.js";
import {
  FileIOError,
  LogAnalyzerError,
  UnsupportedLogFormatError,
} from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { createLineDecoder } from "./line-decoder.js";

export { LineDecoder, createLineDecoder } from "./line-decoder.js";

// dotAll: quoted fields may carry \r or U+2028 once the line is split on \n
export const LOG_REQUEST_PATTERN = /^.+\[.+\] "(.+)" \d{3}.+ (\d+\.\d+)$/s;

const SUPPORTED_EXTENSIONS: readonly LogExtension[] = ["log", "gz"];

export function isSupportedExtension(
  extension: string,
): extension is LogExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

/**
 * Parse one log line
 *
 * @returns The request, or null when the line does not follow the log format
 *
 * @example
 * parseLogLine('1.1.1.1 -  - [29/Jun/2017:03:50:22 +0300] "GET /api/1 HTTP/1.1" 200 12 "-" "-" "-" "-" "-" 0.390');
 * // Returns: { url: "/api/1", time: 0.39 }
 */
export function parseLogLine(line: string): LogRequest | null {
  const match = LOG_REQUEST_PATTERN.exec(line);
  if (!match || match[1] === undefined || match[2] === undefined) {
    return null;
  }

  // $request must be exactly "METHOD URL PROTOCOL"
  const parts = match[1].trim().split(/\s+/);
  const url = parts[1];
  if (parts.length !== 3 || url === undefined) {
    return null;
  }

  return { url, time: Number(match[2]) };
}

function openLines(log: LogFile & { extension: LogExtension }): Readable {
  const onClose = (error: NodeJS.ErrnoException | null): void => {
    // The error itself reaches the consumer through the line stream
    if (error) {
      logger.debug("Log stream closed with error", {
        path: log.path,
        error: error.message,
      });
    }
  };

  const source = createReadStream(log.path);
  if (log.extension === "gz") {
    return pipeline(source, createGunzip(), createLineDecoder(), onClose);
  }
  return pipeline(source, createLineDecoder(), onClose);
}

/**
 * Yield one entry per line of a log: the parsed request, or null for a
 * line that does not follow the log format
 *
 * @throws UnsupportedLogFormatError for extensions other than log and gz
 * @throws LogEncodingError when the file is not valid UTF-8
 * @throws FileIOError when the file cannot be read or decompressed
 */
export async function* iterateRequests(
  log: LogFile,
): AsyncGenerator<LogRequest | null> {
  const { extension } = log;
  if (!isSupportedExtension(extension)) {
    throw new UnsupportedLogFormatError(
      `Invalid extension of the log-file: ${extension}`,
      { path: log.path, extension },
    );
  }

  const lines = openLines({ ...log, extension });
  try {
    for await (const line of lines) {
      yield typeof line === "string" ? parseLogLine(line) : null;
    }
  } catch (error) {
    if (error instanceof LogAnalyzerError) throw error;
    throw new FileIOError(
      `Failed to read log-file ${log.path}`,
      { path: log.path },
      { cause: error },
    );
  } finally {
    lines.destroy();
  }
}
