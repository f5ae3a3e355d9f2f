/**
 * Hansen baseline and annual loss extraction tests
 */

import { describe, it, expect, vi } from 'vitest';

import { InvalidRequestError, RasterServiceError, YearOutOfRangeError } from '../../../core/errors.js';
import { Logger, silentLogger } from '../../../core/utils/logger.js';
import {
  BaselineLossExtractor,
  createExtractionRequest,
  toLossYearCode,
} from '../../../ingestion/hansen-baseline.js';
import { InMemoryRasterSession } from '../../utils/in-memory-raster-session.js';
import { TEST_SQUARE, noSleep, testConfig, testContext } from '../../utils/fixtures.js';

const config = testConfig();

/**
 * Three pixels:
 * - 1.5 km², 50% cover, lost in 2023
 * - 2.3 km², 20% cover, lost in 2024
 * - 98.5 km², 80% cover, never lost
 */
function hansenSession(): InMemoryRasterSession {
  return new InMemoryRasterSession({
    pixelAreasM2: [1.5e6, 2.3e6, 98.5e6],
    assets: {
      [config.hansen.assetId]: {
        treecover2000: [50, 20, 80],
        lossyear: [23, 24, 0],
      },
    },
  });
}

function request(startYear: number, endYear: number, treeCoverThreshold = 30) {
  return createExtractionRequest(
    {
      regionId: 'region-1',
      regionName: 'Test Forest',
      geometry: TEST_SQUARE,
      startYear,
      endYear,
      treeCoverThreshold,
    },
    config
  );
}

describe('createExtractionRequest', () => {
  it('falls back to the configured threshold', () => {
    const req = createExtractionRequest(
      {
        regionId: 'region-1',
        regionName: 'Test Forest',
        geometry: TEST_SQUARE,
        startYear: 2001,
        endYear: 2001,
        treeCoverThreshold: null,
      },
      config
    );

    expect(req.treeCoverThreshold).toBe(30);
    expect(Object.isFrozen(req)).toBe(true);
  });

  it('accepts a single-year range starting at the baseline year', () => {
    expect(request(2000, 2000).startYear).toBe(2000);
  });

  it.each([
    [1999, 2000],
    [2024, 2023],
    [2020.5, 2021],
  ])('rejects year range %s-%s', (startYear, endYear) => {
    expect(() => request(startYear, endYear)).toThrow(InvalidRequestError);
  });

  it.each([-1, 101, 12.5])('rejects threshold %s', (threshold) => {
    expect(() => request(2020, 2021, threshold)).toThrow(InvalidRequestError);
  });

  it('rejects an empty region id', () => {
    expect(() =>
      createExtractionRequest(
        { regionId: '', regionName: 'x', geometry: TEST_SQUARE, startYear: 2020, endYear: 2020 },
        config
      )
    ).toThrow('Region id is required');
  });
});

describe('toLossYearCode', () => {
  const supported = { first: 2001, last: 2024 };

  it('maps calendar years to year codes', () => {
    expect(toLossYearCode(2001, supported)).toBe(1);
    expect(toLossYearCode(2023, supported)).toBe(23);
    expect(toLossYearCode(2024, supported)).toBe(24);
  });

  it.each([2000, 2025])('rejects %s', (year) => {
    expect(() => toLossYearCode(year, supported)).toThrow(YearOutOfRangeError);
  });
});

describe('BaselineLossExtractor', () => {
  it('extracts baseline and per-year loss in ascending order', async () => {
    const session = hansenSession();
    const extractor = new BaselineLossExtractor(testContext(session, config), {
      sleep: noSleep,
      logger: silentLogger,
    });

    const records = await extractor.extractRegion(request(2023, 2024));

    expect(records.map((r) => r.year)).toEqual([2023, 2024]);
    expect(records[0]?.lossAreaKm2).toBeCloseTo(1.5, 9);
    expect(records[1]?.lossAreaKm2).toBeCloseTo(2.3, 9);
    for (const record of records) {
      expect(record.baselineAreaKm2).toBeCloseTo(100, 9);
      expect(record).toMatchObject({
        regionId: 'region-1',
        regionName: 'Test Forest',
        treeCoverThreshold: 30,
        datasetVersion: 'v1.12',
      });
    }

    // One baseline reduction plus one per year
    expect(session.reduceCalls).toHaveLength(3);
    expect(session.reduceCalls.map((call) => call.scale)).toEqual([30, 30, 30]);
  });

  it('applies the threshold to the baseline', async () => {
    const extractor = new BaselineLossExtractor(testContext(hansenSession(), config), {
      sleep: noSleep,
      logger: silentLogger,
    });

    const [record] = await extractor.extractRegion(request(2023, 2023, 60));

    expect(record?.baselineAreaKm2).toBeCloseTo(98.5, 9);
    expect(record?.lossAreaKm2).toBeCloseTo(1.5, 9);
  });

  it('reports zero loss for a year with no lost pixels', async () => {
    const extractor = new BaselineLossExtractor(testContext(hansenSession(), config), {
      sleep: noSleep,
      logger: silentLogger,
    });

    const [record] = await extractor.extractRegion(request(2010, 2010));

    expect(record?.lossAreaKm2).toBe(0);
  });

  it('rejects an out-of-range year before issuing any reduction', async () => {
    const session = hansenSession();
    const extractor = new BaselineLossExtractor(testContext(session, config), {
      sleep: noSleep,
      logger: silentLogger,
    });

    await expect(extractor.extractRegion(request(2023, 2025))).rejects.toMatchObject({
      name: 'YearOutOfRangeError',
      year: 2025,
      yearCode: 25,
    });
    expect(session.reduceCalls).toHaveLength(0);
  });

  it('aborts the whole extraction when a reduction fails', async () => {
    const session = hansenSession();
    const extractor = new BaselineLossExtractor(testContext(session, config), {
      sleep: noSleep,
      logger: silentLogger,
    });
    session.failNext(1, new RasterServiceError('HTTP 401', 'fatal', { statusCode: 401 }));

    await expect(extractor.extractRegion(request(2023, 2024))).rejects.toThrow('HTTP 401');
    expect(session.reduceCalls).toHaveLength(1);
  });

  it('logs the region and failing year when a year exhausts its retries', async () => {
    const session = hansenSession();
    const logger = new Logger({ level: 'error', service: 'test', pretty: true });
    const errorLog = vi.spyOn(logger, 'error').mockImplementation(() => {});
    const extractor = new BaselineLossExtractor(testContext(session, config), {
      sleep: noSleep,
      logger,
    });

    // baseline and 2023 succeed, every 2024 attempt fails
    const realReduce = session.reduceRegion.bind(session);
    vi.spyOn(session, 'reduceRegion')
      .mockImplementationOnce(realReduce)
      .mockImplementationOnce(realReduce)
      .mockRejectedValue(new RasterServiceError('HTTP 503', 'transient', { statusCode: 503 }));

    await expect(extractor.extractRegion(request(2023, 2024))).rejects.toMatchObject({
      name: 'ReductionExhaustedError',
      bandName: 'lossyear',
      attempts: 3,
    });
    expect(errorLog).toHaveBeenCalledWith('Hansen extraction failed', {
      regionId: 'region-1',
      regionName: 'Test Forest',
      year: 2024,
      band: 'lossyear',
      attempts: 3,
      error: 'Failed to compute lossyear after 3 attempts: HTTP 503',
    });
  });

  it('labels a baseline failure as the baseline step', async () => {
    const session = hansenSession();
    const logger = new Logger({ level: 'error', service: 'test', pretty: true });
    const errorLog = vi.spyOn(logger, 'error').mockImplementation(() => {});
    const extractor = new BaselineLossExtractor(testContext(session, config), {
      sleep: noSleep,
      logger,
    });
    session.failNext(1, new RasterServiceError('HTTP 401', 'fatal', { statusCode: 401 }));

    await expect(extractor.extractRegion(request(2023, 2023))).rejects.toThrow('HTTP 401');
    expect(errorLog).toHaveBeenCalledWith(
      'Hansen extraction failed',
      expect.objectContaining({ regionId: 'region-1', year: 'baseline', band: 'treecover2000' })
    );
  });
});
