/**
 * Forest Atlas Error Types
 *
 * Structured errors for request validation, dataset range checks and remote
 * raster service failures. Callers branch on the class (or on
 * `RasterServiceError.kind`), never on message text.
 */

/**
 * Base class for every error raised by Forest Atlas
 */
export class ForestAtlasError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = 'ForestAtlasError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Bad year range, threshold, dates or geometry. Raised at construction, never retried.
 */
export class InvalidRequestError extends ForestAtlasError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

/**
 * Requested year has no corresponding dataset year-code
 */
export class YearOutOfRangeError extends ForestAtlasError {
  constructor(
    public readonly year: number,
    public readonly yearCode: number,
    public readonly supported: { readonly first: number; readonly last: number }
  ) {
    super(
      `Year ${year} out of dataset range (${supported.first}-${supported.last})`
    );
    this.name = 'YearOutOfRangeError';
  }
}

/**
 * Failure classes reported by the raster service layer
 *
 * - transient: network, timeout, rate limit, 5xx; retried
 * - fatal: authentication, permission, malformed request; surfaced immediately
 */
export type RasterFailureKind = 'transient' | 'fatal';

export class RasterServiceError extends ForestAtlasError {
  constructor(
    message: string,
    public readonly kind: RasterFailureKind,
    options?: { readonly statusCode?: number; readonly cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'RasterServiceError';
    this.statusCode = options?.statusCode;
  }

  readonly statusCode: number | undefined;
}

/**
 * All retry attempts for a reduction failed
 */
export class ReductionExhaustedError extends ForestAtlasError {
  constructor(
    public readonly bandName: string,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(
      `Failed to compute ${bandName} after ${attempts} attempts: ${lastError.message}`,
      { cause: lastError }
    );
    this.name = 'ReductionExhaustedError';
  }
}

/**
 * Invalid or incomplete configuration
 */
export class ConfigurationError extends ForestAtlasError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Region id not present in the region store
 */
export class RegionNotFoundError extends ForestAtlasError {
  constructor(public readonly regionId: string) {
    super(`Region ${regionId} not found in forest_regions table`);
    this.name = 'RegionNotFoundError';
  }
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
