/**
 * RetryingReducer Tests
 *
 * Attempt bound, backoff schedule, fatal pass-through and missing-band defaults.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';

import { RasterServiceError, ReductionExhaustedError } from '../../../core/errors.js';
import { silentLogger } from '../../../core/utils/logger.js';
import { Image } from '../../../raster/image.js';
import {
  IMAGE_COUNT_LABEL,
  RetryingReducer,
  type ReduceRequest,
} from '../../../resilience/retrying-reducer.js';
import { InMemoryRasterSession } from '../../utils/in-memory-raster-session.js';
import { TEST_SQUARE } from '../../utils/fixtures.js';

function areaRequest(bandName = 'area'): ReduceRequest {
  return {
    image: Image.pixelArea(),
    region: TEST_SQUARE,
    reducer: 'sum',
    scale: 10,
    maxPixels: 1e10,
    bandName,
  };
}

describe('RetryingReducer', () => {
  let session: InMemoryRasterSession;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let reducer: RetryingReducer;

  beforeEach(() => {
    session = new InMemoryRasterSession({ pixelAreasM2: [100, 200] });
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
    reducer = new RetryingReducer({
      session,
      policy: { maxAttempts: 3, backoffBase: 2 },
      sleep,
      logger: silentLogger,
    });
  });

  it('returns the band value on first success without sleeping', async () => {
    await expect(reducer.reduce(areaRequest())).resolves.toBe(300);
    expect(session.reduceCalls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('succeeds on the third attempt after two transient failures', async () => {
    session.failNext(2, new RasterServiceError('HTTP 503', 'transient', { statusCode: 503 }));

    await expect(reducer.reduce(areaRequest())).resolves.toBe(300);
    expect(session.reduceCalls).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('raises ReductionExhaustedError after maxAttempts failures with no trailing sleep', async () => {
    const cause = new RasterServiceError('HTTP 429', 'transient', { statusCode: 429 });
    session.failNext(3, cause);

    const error = await reducer.reduce(areaRequest()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReductionExhaustedError);
    if (error instanceof ReductionExhaustedError) {
      expect(error.bandName).toBe('area');
      expect(error.attempts).toBe(3);
      expect(error.lastError).toBe(cause);
    }
    expect(session.reduceCalls).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('treats unclassified errors as transient', async () => {
    session.failNext(1, new Error('socket hang up'));

    await expect(reducer.reduce(areaRequest())).resolves.toBe(300);
    expect(session.reduceCalls).toHaveLength(2);
  });

  it('propagates fatal errors on the first attempt, unwrapped', async () => {
    const fatal = new RasterServiceError('HTTP 403', 'fatal', { statusCode: 403 });
    session.failNext(1, fatal);

    await expect(reducer.reduce(areaRequest())).rejects.toBe(fatal);
    expect(session.reduceCalls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reads a band missing from the result as 0', async () => {
    await expect(reducer.reduce(areaRequest('not_there'))).resolves.toBe(0);
  });

  it('reads a band with no valid pixels as 0', async () => {
    await expect(
      reducer.reduce({ ...areaRequest('empty'), image: Image.empty('empty') })
    ).resolves.toBe(0);
  });

  it('uses backoffBase as the exponent base', async () => {
    const slow = new RetryingReducer({
      session,
      policy: { maxAttempts: 4, backoffBase: 3 },
      sleep,
      logger: silentLogger,
    });
    session.failNext(3, new Error('timeout'));

    await expect(slow.reduce(areaRequest())).resolves.toBe(300);
    expect(sleep.mock.calls).toEqual([[1000], [3000], [9000]]);
  });

  describe('count', () => {
    it('returns the collection size', async () => {
      const collected = new InMemoryRasterSession({
        pixelAreasM2: [1],
        collections: {
          dw: [
            { date: '2024-01-05', bands: { label: [1] } },
            { date: '2024-01-20', bands: { label: [1] } },
            { date: '2024-02-02', bands: { label: [1] } },
          ],
        },
      });
      const counter = new RetryingReducer({
        session: collected,
        policy: { maxAttempts: 1, backoffBase: 2 },
        logger: silentLogger,
      });

      const collection = collected.queryCollection({
        collectionId: 'dw',
        region: TEST_SQUARE,
        startDate: '2024-01-01',
        endDate: '2024-02-01',
        bands: ['label'],
      });

      await expect(counter.count(collection)).resolves.toBe(2);
    });

    it('retries and labels exhaustion as image_count', async () => {
      session.failNext(3, new Error('connection reset'));
      const collection = session.queryCollection({
        collectionId: 'dw',
        region: TEST_SQUARE,
        startDate: '2024-01-01',
        endDate: '2024-02-01',
        bands: ['label'],
      });

      await expect(reducer.count(collection)).rejects.toMatchObject({
        name: 'ReductionExhaustedError',
        bandName: IMAGE_COUNT_LABEL,
        attempts: 3,
      });
      expect(session.sizeCalls).toHaveLength(3);
    });
  });
});
