import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import path from 'path';
import {
  aggregateRequests,
  computeUrlStats,
  getRequestStats,
  median,
} from '../../src/lib/aggregator/index.js';
import type { LogFile, LogRequest } from '../../src/types/data-model.js';
import { InvalidRecordsThresholdError } from '../../src/utils/errors.js';
import {
  SAMPLE_LOG,
  SAMPLE_LOG_NAME,
  createTempDir,
  removeTempDir,
} from '../helpers/fixtures.js';

const req = (url: string, time: number): LogRequest => ({ url, time });

describe('median', () => {
  it('should take the middle of a sorted list', () => {
    expect(median([1])).toBe(1);
    expect(median([1, 1, 1])).toBe(1);
    expect(median([1, 1, 4, 4, 4])).toBe(4);
    expect(median([1, 2, 3, 4, 5, 6])).toBe(3.5);
  });

  it('should throw on an empty list', () => {
    expect(() => median([])).toThrow(RangeError);
  });
});

describe('aggregateRequests', () => {
  it('should group times by url and count records', async () => {
    const aggregation = await aggregateRequests(
      [req('/a', 1), null, req('/b', 2), req('/a', 3)],
      0.5,
    );

    expect(aggregation.countValid).toBe(3);
    expect(aggregation.countInvalid).toBe(1);
    expect(aggregation.timeTotal).toBe(6);
    expect([...aggregation.times.entries()]).toEqual([
      ['/a', [1, 3]],
      ['/b', [2]],
    ]);
  });

  it('should accept async iterables', async () => {
    async function* requests() {
      yield req('/a', 1);
      yield null;
    }

    const aggregation = await aggregateRequests(requests(), 0.5);

    expect(aggregation.countValid).toBe(1);
    expect(aggregation.countInvalid).toBe(1);
  });

  it('should allow an invalid share equal to the limit', async () => {
    await expect(aggregateRequests([req('/a', 1), null], 0.5)).resolves.toMatchObject({
      countValid: 1,
      countInvalid: 1,
    });
  });

  it('should fail when the invalid share exceeds the limit', async () => {
    await expect(aggregateRequests([req('/a', 1), null], 0.4)).rejects.toMatchObject({
      name: 'InvalidRecordsThresholdError',
      message: 'Too many invalid rows in the log-file.',
      details: {
        countValid: 1,
        countInvalid: 1,
        invalidPart: 0.5,
        allowedInvalidPart: 0.4,
      },
    });
  });

  it('should treat an empty input as fully valid', async () => {
    const aggregation = await aggregateRequests([], 0);

    expect(aggregation.countValid).toBe(0);
    expect(aggregation.times.size).toBe(0);
  });

  it('should use the default limit of 0.2', async () => {
    const requests = [req('/a', 1), req('/a', 1), req('/a', 1), req('/a', 1), null, null];

    await expect(aggregateRequests(requests)).rejects.toBeInstanceOf(InvalidRecordsThresholdError);
  });
});

describe('computeUrlStats', () => {
  it('should compute per-url statistics', async () => {
    const aggregation = await aggregateRequests([req('/a', 1), req('/b', 5), req('/a', 3)]);

    expect(computeUrlStats(aggregation)).toEqual([
      {
        url: '/b',
        count: 1,
        countPerc: 100 / 3,
        timeSum: 5,
        timePerc: 500 / 9,
        timeAvg: 5,
        timeMax: 5,
        timeMed: 5,
      },
      {
        url: '/a',
        count: 2,
        countPerc: 200 / 3,
        timeSum: 4,
        timePerc: 400 / 9,
        timeAvg: 2,
        timeMax: 3,
        timeMed: 2,
      },
    ]);
  });

  it('should keep first-seen order for equal total times', async () => {
    const aggregation = await aggregateRequests([req('/x', 1), req('/y', 1), req('/z', 2)]);

    expect(computeUrlStats(aggregation).map((stat) => stat.url)).toEqual(['/z', '/x', '/y']);
  });

  it('should truncate to the report size', async () => {
    const aggregation = await aggregateRequests([req('/x', 1), req('/y', 2), req('/z', 3)]);

    expect(computeUrlStats(aggregation, 0)).toEqual([]);
    expect(computeUrlStats(aggregation, 2).map((stat) => stat.url)).toEqual(['/z', '/y']);
  });

  it('should report zero time share when all times are zero', async () => {
    const aggregation = await aggregateRequests([req('/x', 0), req('/y', 0)]);

    expect(computeUrlStats(aggregation).map((stat) => stat.timePerc)).toEqual([0, 0]);
  });
});

describe('getRequestStats', () => {
  let dir: string;
  let log: LogFile;

  beforeEach(async () => {
    dir = await createTempDir();
    const logPath = path.join(dir, SAMPLE_LOG_NAME);
    await writeFile(logPath, SAMPLE_LOG);
    log = { path: logPath, date: new Date(Date.UTC(2019, 0, 2)), extension: 'log' };
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should fail with the default invalid-records limit', async () => {
    await expect(getRequestStats(log)).rejects.toBeInstanceOf(InvalidRecordsThresholdError);
  });

  it('should aggregate the sample log', async () => {
    const stats = await getRequestStats(log, { allowedInvalidPart: 0.5 });

    expect(stats.map((stat) => stat.url)).toEqual(['/api/bbb', '/api/aaa', '/api/ccc']);

    const [top] = stats;
    expect(top?.count).toBe(6);
    expect(top?.timeMed).toBeCloseTo(0.5);
    expect(top?.timeMax).toBeCloseTo(0.8);
    expect(top?.timeAvg).toBeCloseTo(0.5);
    expect(top?.timeSum).toBeCloseTo(3.0);
    expect(top?.timePerc).toBeCloseTo(100 * (3.0 / 3.4));
    expect(top?.countPerc).toBeCloseTo(75);
  });

  it('should honour the report size', async () => {
    for (const reportSize of [0, 1, 2, 3]) {
      const stats = await getRequestStats(log, { reportSize, allowedInvalidPart: 0.5 });
      expect(stats).toHaveLength(reportSize);
    }
  });

  it('should return no stats for an empty log', async () => {
    await writeFile(log.path, '');

    await expect(getRequestStats(log, { allowedInvalidPart: 0.5 })).resolves.toEqual([]);
  });
});
