/**
 * Hansen/UMD Global Forest Change baseline and annual loss
 *
 * One extraction = one baseline reduction (year-2000 forest area) plus one
 * loss reduction per requested year, issued in ascending year order. Any
 * failure aborts the extraction; no partial record set is returned.
 */

import type { ForestAtlasConfig } from '../core/config.js';
import {
  HANSEN_BANDS,
  HANSEN_BASELINE_YEAR,
  HANSEN_YEAR_OFFSET,
  M2_PER_KM2,
} from '../core/constants.js';
import {
  InvalidRequestError,
  ReductionExhaustedError,
  YearOutOfRangeError,
  toError,
} from '../core/errors.js';
import { validateRegionGeometry } from '../core/geometry.js';
import type { AnnualLossRecord, ExtractionRequest, RegionGeometry } from '../core/types.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { Image } from '../raster/image.js';
import type { EarthEngineContext } from '../raster/earth-engine/initialize.js';
import { RetryingReducer, type SleepFn } from '../resilience/retrying-reducer.js';

export interface ExtractionRequestInput {
  readonly regionId: string;
  readonly regionName: string;
  readonly geometry: RegionGeometry;
  readonly startYear: number;
  readonly endYear: number;
  /** Defaults to hansen.treeCoverThreshold from configuration */
  readonly treeCoverThreshold?: number | null;
}

/**
 * Validate and freeze an extraction request
 *
 * @throws InvalidRequestError
 */
export function createExtractionRequest(
  input: ExtractionRequestInput,
  config: Pick<ForestAtlasConfig, 'hansen'>
): ExtractionRequest {
  const { startYear, endYear } = input;
  const treeCoverThreshold = input.treeCoverThreshold ?? config.hansen.treeCoverThreshold;

  if (!input.regionId) {
    throw new InvalidRequestError('Region id is required', 'regionId');
  }

  if (
    !Number.isInteger(startYear) ||
    !Number.isInteger(endYear) ||
    startYear < HANSEN_BASELINE_YEAR ||
    startYear > endYear
  ) {
    throw new InvalidRequestError(`Invalid year range: ${startYear}-${endYear}`, 'startYear');
  }

  if (!Number.isInteger(treeCoverThreshold) || treeCoverThreshold < 0 || treeCoverThreshold > 100) {
    throw new InvalidRequestError(
      `Tree cover threshold must be an integer 0-100%, got ${treeCoverThreshold}`,
      'treeCoverThreshold'
    );
  }

  validateRegionGeometry(input.geometry);

  return Object.freeze({
    regionId: input.regionId,
    regionName: input.regionName,
    geometry: input.geometry,
    startYear,
    endYear,
    treeCoverThreshold,
  });
}

/**
 * Map a calendar year to the loss band's year code
 *
 * @throws YearOutOfRangeError when the code falls outside the dataset's range
 */
export function toLossYearCode(
  year: number,
  supported: { readonly first: number; readonly last: number }
): number {
  const yearCode = year - HANSEN_YEAR_OFFSET;
  if (yearCode < supported.first - HANSEN_YEAR_OFFSET || yearCode > supported.last - HANSEN_YEAR_OFFSET) {
    throw new YearOutOfRangeError(year, yearCode, supported);
  }
  return yearCode;
}

export interface BaselineLossExtractorOptions {
  readonly sleep?: SleepFn;
  readonly logger?: Logger;
}

export class BaselineLossExtractor {
  private readonly reducer: RetryingReducer;
  private readonly log: Logger;

  constructor(
    private readonly context: EarthEngineContext,
    options: BaselineLossExtractorOptions = {}
  ) {
    this.log = options.logger ?? createLogger({ module: 'hansen-baseline' });
    this.reducer = new RetryingReducer({
      session: context.session,
      policy: context.config.retry,
      sleep: options.sleep,
      logger: this.log,
    });
  }

  async extractRegion(request: ExtractionRequest): Promise<AnnualLossRecord[]> {
    const { hansen: hansenConfig } = this.context.config;
    const supported = { first: hansenConfig.firstLossYear, last: hansenConfig.lastLossYear };

    // Reject the whole range before spending any reductions on it
    const years: Array<{ year: number; yearCode: number }> = [];
    for (let year = request.startYear; year <= request.endYear; year++) {
      years.push({ year, yearCode: toLossYearCode(year, supported) });
    }

    this.log.info('Extracting Hansen baseline', {
      regionId: request.regionId,
      regionName: request.regionName,
      startYear: request.startYear,
      endYear: request.endYear,
      threshold: request.treeCoverThreshold,
    });

    const baselineAreaKm2 = await this.withFailureContext(
      request,
      'baseline',
      HANSEN_BANDS.treeCover,
      () => this.calculateBaseline(request)
    );
    this.log.info('Year 2000 baseline computed', {
      regionId: request.regionId,
      baselineAreaKm2,
      threshold: request.treeCoverThreshold,
    });

    const records: AnnualLossRecord[] = [];
    for (const { year, yearCode } of years) {
      const lossAreaKm2 = await this.withFailureContext(request, year, HANSEN_BANDS.lossYear, () =>
        this.calculateLoss(request, yearCode)
      );
      this.log.debug('Annual loss computed', { regionId: request.regionId, year, lossAreaKm2 });

      records.push({
        regionId: request.regionId,
        regionName: request.regionName,
        year,
        lossAreaKm2,
        baselineAreaKm2,
        treeCoverThreshold: request.treeCoverThreshold,
        datasetVersion: hansenConfig.datasetVersion,
      });
    }

    const totalLossKm2 = records.reduce((sum, record) => sum + record.lossAreaKm2, 0);
    this.log.info('Extraction complete', {
      regionId: request.regionId,
      years: records.length,
      totalLossKm2,
      pctOfBaseline: baselineAreaKm2 > 0 ? (totalLossKm2 / baselineAreaKm2) * 100 : 0,
    });

    return records;
  }

  /**
   * Log the failing step with its region and year, then rethrow unchanged
   */
  private async withFailureContext<T>(
    request: ExtractionRequest,
    year: number | 'baseline',
    band: string,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.log.error('Hansen extraction failed', {
        regionId: request.regionId,
        regionName: request.regionName,
        year,
        band,
        ...(error instanceof ReductionExhaustedError ? { attempts: error.attempts } : {}),
        error: toError(error).message,
      });
      throw error;
    }
  }

  private calculateBaseline(request: ExtractionRequest): Promise<number> {
    const forestKm2 = this.context.hansen
      .select(HANSEN_BANDS.treeCover)
      .gte(request.treeCoverThreshold)
      .multiply(Image.pixelArea())
      .divide(M2_PER_KM2);

    return this.reduceSum(forestKm2, request.geometry, HANSEN_BANDS.treeCover);
  }

  private calculateLoss(request: ExtractionRequest, yearCode: number): Promise<number> {
    const lossKm2 = this.context.hansen
      .select(HANSEN_BANDS.lossYear)
      .eq(yearCode)
      .multiply(Image.pixelArea())
      .divide(M2_PER_KM2);

    return this.reduceSum(lossKm2, request.geometry, HANSEN_BANDS.lossYear);
  }

  private reduceSum(image: Image, region: RegionGeometry, bandName: string): Promise<number> {
    const { scaleMeters, maxPixels } = this.context.config.hansen;
    return this.reducer.reduce({
      image,
      region,
      reducer: 'sum',
      scale: scaleMeters,
      maxPixels,
      bandName,
    });
  }
}
