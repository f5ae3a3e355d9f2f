/**
 * Forest metrics time-series command
 *
 * Usage:
 *   forest-atlas metrics series (--region-id <id> | --geometry <file>)
 *                               --start <YYYY-MM-DD> --end <YYYY-MM-DD>
 *                               [--window-days <n>] [--lookback-days <n>]
 *                               [--threshold <p>] [--no-gap-filling] [--store]
 *
 * @module cli/commands/metrics
 */

import { InvalidRequestError } from '../../core/errors.js';
import type { RegionGeometry, TimeSeriesResult } from '../../core/types.js';
import { TimeSeriesAssembler } from '../../ingestion/time-series.js';
import type { SleepFn } from '../../resilience/retrying-reducer.js';
import { formatTimeSeriesReport } from '../../reporting/time-series-report.js';
import type { CommandContext, RepositoryHandle } from '../context.js';
import { readGeometryFile } from './regions.js';

export interface MetricsSeriesOptions {
  readonly regionId?: string;
  readonly geometry?: string;
  readonly start: string;
  readonly end: string;
  readonly windowDays?: number;
  readonly lookbackDays?: number;
  readonly threshold?: number;
  /** commander sets false for --no-gap-filling */
  readonly gapFilling?: boolean;
  readonly store?: boolean;
  /** Injected for tests */
  readonly sleep?: SleepFn;
}

interface ResolvedRegion {
  readonly regionId: string | null;
  readonly regionName: string;
  readonly geometry: RegionGeometry;
}

export async function metricsSeriesCommand(
  options: MetricsSeriesOptions,
  ctx: CommandContext
): Promise<TimeSeriesResult> {
  if ((options.regionId === undefined) === (options.geometry === undefined)) {
    throw new InvalidRequestError('Specify exactly one of --region-id or --geometry', 'region');
  }
  if (options.store && !options.regionId) {
    throw new InvalidRequestError('--store requires --region-id', 'store');
  }
  if (options.threshold !== undefined && !(options.threshold >= 0 && options.threshold <= 1)) {
    throw new InvalidRequestError(
      `Tree probability threshold must be between 0 and 1, got ${options.threshold}`,
      'threshold'
    );
  }

  const defaults = ctx.config.dynamicWorld;
  const windowDays = options.windowDays ?? defaults.windowDays;
  const lookbackDays = options.lookbackDays ?? defaults.lookbackDays;
  const threshold = options.threshold ?? defaults.forestThreshold;
  const gapFilling = options.gapFilling ?? defaults.gapFilling;

  const handle = options.regionId ? await ctx.openRepository() : null;
  try {
    const region = await resolveRegion(options, handle);

    const assembler = new TimeSeriesAssembler(ctx.earthEngine(), {
      compositorSettings: { gapFilling },
      sleep: options.sleep,
      logger: ctx.logger.child('time-series'),
      onPeriod: (metric, index) =>
        ctx.logger.debug('Period processed', {
          period: index + 1,
          window: `${metric.window.startDate}/${metric.window.endDate}`,
          forestAreaHa: metric.forestAreaHa,
        }),
    });

    const result = await assembler.run({
      region: region.geometry,
      analysisStart: options.start,
      analysisEnd: options.end,
      windowDays,
      threshold,
      lookbackDays,
    });

    if (options.store && handle && region.regionId) {
      const written = await handle.repository.savePeriodMetrics(
        region.regionId,
        result.periods,
        threshold
      );
      ctx.logger.info('Period metrics stored', { regionId: region.regionId, rows: written });
    }

    ctx.print(
      ctx.config.logging.json
        ? JSON.stringify(result, null, 2)
        : formatTimeSeriesReport(result, {
            regionName: region.regionName,
            threshold,
            windowDays,
            analysisStart: options.start,
            analysisEnd: options.end,
            gapFilling,
            lookbackDays,
          })
    );

    return result;
  } finally {
    await handle?.close();
  }
}

async function resolveRegion(
  options: MetricsSeriesOptions,
  handle: RepositoryHandle | null
): Promise<ResolvedRegion> {
  if (options.regionId && handle) {
    const region = await handle.repository.getRegion(options.regionId);
    return { regionId: region.regionId, regionName: region.regionName, geometry: region.geometry };
  }

  if (options.geometry) {
    return {
      regionId: null,
      regionName: options.geometry,
      geometry: await readGeometryFile(options.geometry),
    };
  }

  throw new InvalidRequestError('Specify exactly one of --region-id or --geometry', 'region');
}
