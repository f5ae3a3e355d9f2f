/**
 * Baseline extraction command
 *
 * Usage:
 *   forest-atlas baseline extract --region-id <id> [--start-year 2023] [--end-year 2024]
 *                                 [--threshold <n>] [--dry-run] [--output <csv>]
 *
 * Loads the region, extracts the year-2000 baseline and annual loss, stores
 * the records (unless --dry-run) and prints the summary.
 *
 * @module cli/commands/baseline
 */

import { writeFile } from 'node:fs/promises';

import type { AnnualLossRecord } from '../../core/types.js';
import {
  BaselineLossExtractor,
  createExtractionRequest,
} from '../../ingestion/hansen-baseline.js';
import type { SleepFn } from '../../resilience/retrying-reducer.js';
import { formatAnnualLossCsv, formatAnnualLossReport } from '../../reporting/annual-loss-report.js';
import type { CommandContext } from '../context.js';

export interface BaselineExtractOptions {
  readonly regionId: string;
  readonly startYear: number;
  readonly endYear: number;
  readonly threshold?: number;
  readonly dryRun?: boolean;
  readonly output?: string;
  /** Injected for tests */
  readonly sleep?: SleepFn;
}

export async function baselineExtractCommand(
  options: BaselineExtractOptions,
  ctx: CommandContext
): Promise<AnnualLossRecord[]> {
  const handle = await ctx.openRepository();
  try {
    const region = await handle.repository.getRegion(options.regionId);
    ctx.logger.info('Found region', {
      regionId: region.regionId,
      regionName: region.regionName,
      regionType: region.regionType,
    });

    const request = createExtractionRequest(
      {
        regionId: region.regionId,
        regionName: region.regionName,
        geometry: region.geometry,
        startYear: options.startYear,
        endYear: options.endYear,
        treeCoverThreshold: options.threshold ?? region.treeCoverThreshold,
      },
      ctx.config
    );

    const earthEngine = ctx.earthEngine();
    ctx.logger.info('Connected to Earth Engine project', { projectId: earthEngine.projectId });

    const extractor = new BaselineLossExtractor(earthEngine, {
      sleep: options.sleep,
      logger: ctx.logger.child('hansen-baseline'),
    });
    const records = await extractor.extractRegion(request);

    if (options.output) {
      await writeFile(options.output, formatAnnualLossCsv(records), 'utf-8');
      ctx.logger.info('Results saved', { path: options.output });
    }

    if (options.dryRun) {
      ctx.logger.info('Dry run: skipping database storage', { records: records.length });
    } else {
      const written = await handle.repository.saveAnnualLoss(records);
      ctx.logger.info('Annual loss stored', { regionId: region.regionId, rows: written });
    }

    ctx.print(
      ctx.config.logging.json ? JSON.stringify(records, null, 2) : formatAnnualLossReport(records)
    );
    return records;
  } finally {
    await handle.close();
  }
}
