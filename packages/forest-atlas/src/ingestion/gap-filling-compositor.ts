/**
 * Gap-filling compositor
 *
 * Builds the forest composite for one aggregation window from Dynamic World
 * land cover. Pixels with no observation in the window are filled from the
 * most recent historical window that observed them:
 *
 * 1. Current composite: per-pixel label mode and tree-probability mean
 * 2. Backward walk of floor(lookbackDays / windowDays) steps from the window
 *    start; each non-empty step becomes a composite carrying a `timestamp`
 *    band (step end, epoch ms) masked to the pixels its label observed
 * 3. qualityMosaic on `timestamp` picks the latest observation per pixel;
 *    the current composite keeps precedence
 * 4. Coverage still under target and history exists: one further walk back
 *    to extendedLookbackDays, filling only what is still empty
 *
 * Only `count`, coverage and forest-area reductions reach the service; image
 * construction is lazy.
 */

import type { DynamicWorldConfig } from '../core/config.js';
import {
  DYNAMIC_WORLD_BANDS,
  DYNAMIC_WORLD_TREE_CLASS,
  M2_PER_HA,
  TIMESTAMP_BAND,
} from '../core/constants.js';
import { InvalidRequestError, toError } from '../core/errors.js';
import type { AggregationWindow, PeriodMetric, RegionGeometry } from '../core/types.js';
import { addDays, formatIsoDate, parseIsoDate } from '../core/utils/dates.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { Image } from '../raster/image.js';
import type { EarthEngineContext } from '../raster/earth-engine/initialize.js';
import type { RasterSession } from '../raster/session.js';
import { RetryingReducer, type SleepFn } from '../resilience/retrying-reducer.js';

export interface CompositorSettings {
  readonly collectionId: string;
  /** Historical step size in days */
  readonly windowDays: number;
  readonly gapFilling: boolean;
  readonly extendedLookbackDays: number;
  /** % of region area below which the lookback is extended */
  readonly coverageTargetPct: number;
  readonly scaleMeters: number;
  readonly maxPixels: number;
  /** Label class counted as forest */
  readonly treeClass: number;
}

export interface CompositeRequest {
  readonly region: RegionGeometry;
  readonly window: AggregationWindow;
  /** Minimum tree probability (0-1) */
  readonly threshold: number;
  readonly lookbackDays: number;
  readonly totalRegionAreaHa: number;
  /** Overrides settings.windowDays for the historical walk */
  readonly windowDays?: number;
}

export interface GapFillingCompositorOptions {
  readonly settings?: Partial<CompositorSettings>;
  readonly reducer?: RetryingReducer;
  readonly sleep?: SleepFn;
  readonly logger?: Logger;
}

/**
 * Label and tree-probability composite for one date range
 */
interface LandCoverComposite {
  readonly label: Image;
  readonly trees: Image;
  readonly imageCount: number;
}

export function compositorSettingsFromConfig(config: DynamicWorldConfig): CompositorSettings {
  return {
    collectionId: config.collectionId,
    windowDays: config.windowDays,
    gapFilling: config.gapFilling,
    extendedLookbackDays: config.extendedLookbackDays,
    coverageTargetPct: config.coverageTargetPct,
    scaleMeters: config.scaleMeters,
    maxPixels: config.maxPixels,
    treeClass: DYNAMIC_WORLD_TREE_CLASS,
  };
}

export class GapFillingCompositor {
  readonly settings: CompositorSettings;
  private readonly session: RasterSession;
  private readonly reducer: RetryingReducer;
  private readonly log: Logger;

  constructor(context: EarthEngineContext, options: GapFillingCompositorOptions = {}) {
    this.session = context.session;
    this.settings = {
      ...compositorSettingsFromConfig(context.config.dynamicWorld),
      ...options.settings,
    };
    this.log = options.logger ?? createLogger({ module: 'gap-filling' });
    this.reducer =
      options.reducer ??
      new RetryingReducer({
        session: context.session,
        policy: context.config.retry,
        sleep: options.sleep,
        logger: this.log,
      });
  }

  async composite(request: CompositeRequest): Promise<PeriodMetric> {
    const windowDays = request.windowDays ?? this.settings.windowDays;
    if (!Number.isInteger(windowDays) || windowDays <= 0) {
      throw new InvalidRequestError(
        `windowDays must be a positive integer, got ${windowDays}`,
        'windowDays'
      );
    }
    if (!Number.isInteger(request.lookbackDays) || request.lookbackDays < 0) {
      throw new InvalidRequestError(
        `lookbackDays must be a non-negative integer, got ${request.lookbackDays}`,
        'lookbackDays'
      );
    }

    try {
      return await this.compositeWindow(request);
    } catch (error) {
      this.log.error('Window composite failed', {
        window: `${request.window.startDate}/${request.window.endDate}`,
        error: toError(error).message,
      });
      throw error;
    }
  }

  private async compositeWindow(request: CompositeRequest): Promise<PeriodMetric> {
    const { region, window } = request;
    const windowDays = request.windowDays ?? this.settings.windowDays;

    const current = await this.buildComposite(region, window.startDate, window.endDate);
    const currentCoverageHa = await this.coverageHa(current.label, region);

    let label = current.label;
    let trees = current.trees;
    let finalCoverageHa = currentCoverageHa;

    if (this.settings.gapFilling) {
      const windowStart = parseIsoDate(window.startDate, 'window.startDate');
      const steps = Math.floor(request.lookbackDays / windowDays);

      const history = await this.collectHistory(
        region,
        windowStart,
        windowDays,
        (_stepEnd, index) => index < steps
      );

      if (history.length > 0) {
        const mosaic = Image.qualityMosaic(history, TIMESTAMP_BAND);
        label = label.unmask(mosaic.select(DYNAMIC_WORLD_BANDS.label));
        trees = trees.unmask(mosaic.select(DYNAMIC_WORLD_BANDS.trees));
        finalCoverageHa = await this.coverageHa(label, region);
      }

      const coveragePct = percentOf(finalCoverageHa, request.totalRegionAreaHa);

      if (coveragePct < this.settings.coverageTargetPct && history.length > 0) {
        const horizon = addDays(windowStart, -this.settings.extendedLookbackDays);
        const extended = await this.collectHistory(
          region,
          addDays(windowStart, -request.lookbackDays),
          windowDays,
          (stepEnd) => stepEnd.getTime() > horizon.getTime()
        );

        this.log.debug('Coverage below target, extended lookback', {
          window: `${window.startDate}/${window.endDate}`,
          coveragePct,
          extendedComposites: extended.length,
        });

        if (extended.length > 0) {
          const extendedMosaic = Image.qualityMosaic(extended, TIMESTAMP_BAND);
          label = label.unmask(extendedMosaic.select(DYNAMIC_WORLD_BANDS.label));
          trees = trees.unmask(extendedMosaic.select(DYNAMIC_WORLD_BANDS.trees));
          finalCoverageHa = await this.coverageHa(label, region);
        }
      }
    }

    const forestMask = label
      .eq(this.settings.treeClass)
      .and(trees.gte(request.threshold));
    const forestAreaHa = await this.areaHa(forestMask, region, DYNAMIC_WORLD_BANDS.label);

    const metric: PeriodMetric = {
      window,
      forestAreaHa,
      imageCount: current.imageCount,
      currentCoverageHa,
      finalCoverageHa: Math.max(finalCoverageHa, currentCoverageHa),
    };

    this.log.info('Window composited', {
      window: `${window.startDate}/${window.endDate}`,
      forestAreaHa: metric.forestAreaHa,
      imageCount: metric.imageCount,
      currentCoverageHa: metric.currentCoverageHa,
      finalCoverageHa: metric.finalCoverageHa,
    });

    return metric;
  }

  /**
   * Walk backwards in windowDays steps from `from`; keep timestamped
   * composites for the steps that have images
   */
  private async collectHistory(
    region: RegionGeometry,
    from: Date,
    windowDays: number,
    shouldContinue: (stepEnd: Date, index: number) => boolean
  ): Promise<Image[]> {
    const composites: Image[] = [];
    let stepEnd = from;

    for (let index = 0; shouldContinue(stepEnd, index); index++) {
      const stepStart = addDays(stepEnd, -windowDays);
      const step = await this.buildComposite(region, formatIsoDate(stepStart), formatIsoDate(stepEnd));

      if (step.imageCount > 0) {
        const timestamp = Image.constant(stepEnd.getTime())
          .rename(TIMESTAMP_BAND)
          .updateMask(step.label.mask());
        composites.push(step.label.addBands(step.trees).addBands(timestamp));
      }

      stepEnd = stepStart;
    }

    return composites;
  }

  private async buildComposite(
    region: RegionGeometry,
    startDate: string,
    endDate: string
  ): Promise<LandCoverComposite> {
    const collection = this.session.queryCollection({
      collectionId: this.settings.collectionId,
      region,
      startDate,
      endDate,
      bands: [DYNAMIC_WORLD_BANDS.label, DYNAMIC_WORLD_BANDS.trees],
    });

    const imageCount = await this.reducer.count(collection);
    if (imageCount === 0) {
      return {
        label: Image.empty(DYNAMIC_WORLD_BANDS.label),
        trees: Image.empty(DYNAMIC_WORLD_BANDS.trees),
        imageCount,
      };
    }

    return {
      label: collection.select(DYNAMIC_WORLD_BANDS.label).mode(),
      trees: collection.select(DYNAMIC_WORLD_BANDS.trees).mean(),
      imageCount,
    };
  }

  /** Area of pixels where the label is defined */
  private coverageHa(label: Image, region: RegionGeometry): Promise<number> {
    return this.areaHa(label.mask(), region, DYNAMIC_WORLD_BANDS.label);
  }

  private async areaHa(mask: Image, region: RegionGeometry, bandName: string): Promise<number> {
    const m2 = await this.reducer.reduce({
      image: mask.multiply(Image.pixelArea()),
      region,
      reducer: 'sum',
      scale: this.settings.scaleMeters,
      maxPixels: this.settings.maxPixels,
      bandName,
    });
    return m2 / M2_PER_HA;
  }
}

/**
 * part as % of whole; 0 when whole is 0
 */
export function percentOf(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}
