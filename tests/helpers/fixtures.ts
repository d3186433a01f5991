/**
 * Shared test fixtures: temporary directories and access log lines
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';

export async function createTempDir(prefix = 'log-analyzer-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * One line in the nginx UI access log format
 */
export function accessLogLine(url: string, time: number, method = 'GET'): string {
  return (
    `1.196.116.32 -  - [29/Jun/2017:03:50:22 +0300] "${method} ${url} HTTP/1.1" 200 927 ` +
    `"-" "Lynx/2.8.8dev.9 libwww-FM/2.14" "-" "1498697422-2190034393-4708-9752759" "dc7161be3" ` +
    time.toFixed(3)
  );
}

/**
 * 12 lines: 8 valid (/api/bbb x6 summing to 3.0, /api/aaa 0.3, /api/ccc 0.1)
 * and 4 that do not follow the log format
 */
export const SAMPLE_LOG_LINES: readonly string[] = [
  accessLogLine('/api/bbb', 0.2),
  accessLogLine('/api/aaa', 0.3),
  accessLogLine('/api/bbb', 0.5),
  '1.196.116.32 -  - [29/Jun/2017:03:50:22 +0300] "GET /api/bbb HTTP/1.1" 200 927 "-" "-" "-" "-" "-" -',
  accessLogLine('/api/bbb', 0.8),
  accessLogLine('/api/ccc', 0.1),
  '1.196.116.32 -  - [29/Jun/2017:03:50:22 +0300] "GET /api/bbb" 200 927 "-" "-" "-" "-" "-" 0.100',
  accessLogLine('/api/bbb', 0.5),
  'this is not an access log line',
  accessLogLine('/api/bbb', 0.5),
  accessLogLine('/api/bbb', 0.5),
  '1.196.116.32 -  - [29/Jun/2017:03:50:22 +0300] "GET /api/bbb HTTP/1.1 extra" 200 927 "-" "-" "-" "-" "-" 0.100',
];

export const SAMPLE_LOG = SAMPLE_LOG_LINES.join('\n') + '\n';

export const SAMPLE_LOG_NAME = 'nginx-access-ui.log-20190102.log';
