/**
 * Forest-area time series
 *
 * Splits the analysis range into windows, composites each one in order and
 * derives summary and data-quality statistics. A failing window aborts the
 * run; no partial series is returned.
 */

import {
  LOW_DATA_IMAGE_COUNT,
  M2_PER_HA,
  PARTIAL_COVERAGE_PCT,
  PIXEL_AREA_BAND,
} from '../core/constants.js';
import type {
  PeriodMetric,
  RegionGeometry,
  TimeSeriesResult,
  TimeSeriesSummary,
} from '../core/types.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { Image } from '../raster/image.js';
import type { EarthEngineContext } from '../raster/earth-engine/initialize.js';
import { RetryingReducer, type SleepFn } from '../resilience/retrying-reducer.js';
import {
  GapFillingCompositor,
  percentOf,
  type CompositorSettings,
} from './gap-filling-compositor.js';
import { generateWindows } from './temporal-windows.js';

export interface TimeSeriesRequest {
  readonly region: RegionGeometry;
  /** Inclusive, YYYY-MM-DD */
  readonly analysisStart: string;
  /** Exclusive, YYYY-MM-DD */
  readonly analysisEnd: string;
  /** Defaults to dynamicWorld.windowDays */
  readonly windowDays?: number;
  /** Tree probability 0-1; defaults to dynamicWorld.forestThreshold */
  readonly threshold?: number;
  /** Defaults to dynamicWorld.lookbackDays */
  readonly lookbackDays?: number;
}

export interface TimeSeriesAssemblerOptions {
  readonly compositorSettings?: Partial<CompositorSettings>;
  readonly sleep?: SleepFn;
  readonly logger?: Logger;
  /** Called after each window completes */
  readonly onPeriod?: (metric: PeriodMetric, index: number) => void;
}

export class TimeSeriesAssembler {
  private readonly reducer: RetryingReducer;
  private readonly compositor: GapFillingCompositor;
  private readonly log: Logger;

  constructor(
    private readonly context: EarthEngineContext,
    private readonly options: TimeSeriesAssemblerOptions = {}
  ) {
    this.log = options.logger ?? createLogger({ module: 'time-series' });
    this.reducer = new RetryingReducer({
      session: context.session,
      policy: context.config.retry,
      sleep: options.sleep,
      logger: this.log,
    });
    this.compositor = new GapFillingCompositor(context, {
      settings: options.compositorSettings,
      reducer: this.reducer,
      logger: this.log,
    });
  }

  async run(request: TimeSeriesRequest): Promise<TimeSeriesResult> {
    const defaults = this.context.config.dynamicWorld;
    const windowDays = request.windowDays ?? defaults.windowDays;
    const threshold = request.threshold ?? defaults.forestThreshold;
    const lookbackDays = request.lookbackDays ?? defaults.lookbackDays;

    // Validates dates and window size before any request goes out
    const windows = generateWindows(request.analysisStart, request.analysisEnd, windowDays);
    let next = windows.next();

    const totalRegionAreaHa = await this.totalRegionAreaHa(request.region);
    this.log.info('Time series started', {
      analysisStart: request.analysisStart,
      analysisEnd: request.analysisEnd,
      windowDays,
      threshold,
      lookbackDays,
      gapFilling: this.compositor.settings.gapFilling,
      totalRegionAreaHa,
    });

    const periods: PeriodMetric[] = [];
    while (!next.done) {
      const metric = await this.compositor.composite({
        region: request.region,
        window: next.value,
        threshold,
        lookbackDays,
        totalRegionAreaHa,
        windowDays,
      });
      periods.push(metric);
      this.options.onPeriod?.(metric, periods.length - 1);
      next = windows.next();
    }

    return {
      periods,
      totalRegionAreaHa,
      summary: summarizeTimeSeries(periods, totalRegionAreaHa),
    };
  }

  private async totalRegionAreaHa(region: RegionGeometry): Promise<number> {
    const { scaleMeters, maxPixels } = this.compositor.settings;
    const m2 = await this.reducer.reduce({
      image: Image.pixelArea(),
      region,
      reducer: 'sum',
      scale: scaleMeters,
      maxPixels,
      bandName: PIXEL_AREA_BAND,
    });
    return m2 / M2_PER_HA;
  }
}

/**
 * Summary and data-quality statistics; null for an empty series
 */
export function summarizeTimeSeries(
  periods: readonly PeriodMetric[],
  totalRegionAreaHa: number
): TimeSeriesSummary | null {
  const first = periods[0];
  const last = periods[periods.length - 1];
  if (!first || !last) {
    return null;
  }

  const count = periods.length;
  const areas = periods.map((p) => p.forestAreaHa);
  const sum = (values: readonly number[]): number => values.reduce((acc, v) => acc + v, 0);

  const totalChangeHa = last.forestAreaHa - first.forestAreaHa;
  const minAreaHa = Math.min(...areas);
  const maxAreaHa = Math.max(...areas);
  const averageAreaHa = sum(areas) / count;
  const volatilityHa = maxAreaHa - minAreaHa;

  const totalImages = sum(periods.map((p) => p.imageCount));
  const averageCurrentCoverageHa = sum(periods.map((p) => p.currentCoverageHa)) / count;
  const averageFinalCoverageHa = sum(periods.map((p) => p.finalCoverageHa)) / count;
  const averageCurrentCoveragePct = percentOf(averageCurrentCoverageHa, totalRegionAreaHa);
  const averageFinalCoveragePct = percentOf(averageFinalCoverageHa, totalRegionAreaHa);

  return {
    periodCount: count,
    totalRegionAreaHa,
    totalChangeHa,
    totalChangePct: percentOf(totalChangeHa, first.forestAreaHa),
    minAreaHa,
    maxAreaHa,
    averageAreaHa,
    volatilityHa,
    volatilityPct: percentOf(volatilityHa, averageAreaHa),
    totalImages,
    averageImageCount: totalImages / count,
    lowDataPeriods: periods.filter((p) => p.imageCount < LOW_DATA_IMAGE_COUNT).length,
    averageCurrentCoverageHa,
    averageFinalCoverageHa,
    averageCurrentCoveragePct,
    averageFinalCoveragePct,
    gapFilledPct: averageFinalCoveragePct - averageCurrentCoveragePct,
    partialCoveragePeriods: periods.filter(
      (p) => percentOf(p.currentCoverageHa, totalRegionAreaHa) < PARTIAL_COVERAGE_PCT
    ).length,
  };
}
