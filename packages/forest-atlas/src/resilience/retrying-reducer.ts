/**
 * Region reduction with bounded exponential backoff
 *
 * Wraps RasterSession.reduceRegion() and RasterSession.size(). Failure
 * handling:
 *
 * - RasterServiceError with kind 'fatal' propagates on the first attempt, unwrapped
 * - Anything else counts as transient and is retried
 * - Wait after failed attempt k (0-indexed) is backoffBase ** k seconds, no
 *   jitter, no cap; no wait after the final attempt
 * - After maxAttempts failures: ReductionExhaustedError
 *
 * A band missing from the result (or a null result, or a null band value)
 * reads as 0.
 */

import {
  RasterServiceError,
  ReductionExhaustedError,
  toError,
} from '../core/errors.js';
import type { RetryPolicy } from '../core/types.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { ImageCollection } from '../raster/image.js';
import type { RasterSession, ReduceRegionRequest } from '../raster/session.js';

export type SleepFn = (ms: number) => Promise<void>;

export interface ReduceRequest extends ReduceRegionRequest {
  /** Band to read from the reduction result */
  readonly bandName: string;
}

export interface RetryingReducerOptions {
  readonly session: RasterSession;
  readonly policy: RetryPolicy;
  readonly sleep?: SleepFn;
  readonly logger?: Logger;
}

/** Label used in logs and errors for collection-size requests */
export const IMAGE_COUNT_LABEL = 'image_count';

const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryingReducer {
  private readonly session: RasterSession;
  private readonly policy: RetryPolicy;
  private readonly sleep: SleepFn;
  private readonly log: Logger;

  constructor(options: RetryingReducerOptions) {
    this.session = options.session;
    this.policy = options.policy;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? createLogger({ module: 'retrying-reducer' });
  }

  /**
   * Reduce an image over a region and return one band's value
   *
   * @throws ReductionExhaustedError after maxAttempts transient failures
   * @throws RasterServiceError for fatal failures
   */
  async reduce(request: ReduceRequest): Promise<number> {
    const { bandName, ...reduceRequest } = request;
    const values = await this.withRetry(bandName, () => this.session.reduceRegion(reduceRequest));

    const value = values?.[bandName];
    if (typeof value !== 'number') {
      this.log.debug('Band missing from reduction result, using 0', { band: bandName });
      return 0;
    }
    return value;
  }

  /**
   * Number of images in a collection, under the same retry policy
   */
  async count(collection: ImageCollection): Promise<number> {
    return this.withRetry(IMAGE_COUNT_LABEL, () => this.session.size(collection));
  }

  private async withRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    const { maxAttempts, backoffBase } = this.policy;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (error instanceof RasterServiceError && error.kind === 'fatal') {
          this.log.error('Non-retryable raster service failure', {
            band: label,
            attempt: attempt + 1,
            statusCode: error.statusCode,
            error: error.message,
          });
          throw error;
        }

        lastError = toError(error);

        if (attempt + 1 < maxAttempts) {
          const delayMs = Math.pow(backoffBase, attempt) * 1000;
          this.log.warn('Reduction attempt failed, retrying', {
            band: label,
            attempt: attempt + 1,
            maxAttempts,
            delayMs,
            error: lastError.message,
          });
          await this.sleep(delayMs);
        }
      }
    }

    const finalError = lastError ?? new Error('No attempts were made');
    this.log.error('Reduction failed after all attempts', {
      band: label,
      attempts: maxAttempts,
      error: finalError.message,
    });
    throw new ReductionExhaustedError(label, maxAttempts, finalError);
  }
}
