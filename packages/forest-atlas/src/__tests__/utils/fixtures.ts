/**
 * Shared test fixtures
 */

import { DEFAULT_CONFIG, type ForestAtlasConfig } from '../../core/config.js';
import type { AnnualLossRecord, PeriodMetric, RegionGeometry } from '../../core/types.js';
import { EarthEngineContext } from '../../raster/earth-engine/initialize.js';
import type { RasterSession } from '../../raster/session.js';
import type { SleepFn } from '../../resilience/retrying-reducer.js';

/** ~1.1 km square near the equator */
export const TEST_SQUARE: RegionGeometry = {
  type: 'Polygon',
  coordinates: [
    [
      [10, 0],
      [10.01, 0],
      [10.01, 0.01],
      [10, 0.01],
      [10, 0],
    ],
  ],
};

export const noSleep: SleepFn = async () => {};

export function testConfig(
  overrides: {
    readonly dynamicWorld?: Partial<ForestAtlasConfig['dynamicWorld']>;
    readonly hansen?: Partial<ForestAtlasConfig['hansen']>;
    readonly retry?: Partial<ForestAtlasConfig['retry']>;
    readonly earthEngine?: Partial<ForestAtlasConfig['earthEngine']>;
  } = {}
): ForestAtlasConfig {
  return {
    ...DEFAULT_CONFIG,
    earthEngine: { ...DEFAULT_CONFIG.earthEngine, ...overrides.earthEngine },
    hansen: { ...DEFAULT_CONFIG.hansen, ...overrides.hansen },
    dynamicWorld: { ...DEFAULT_CONFIG.dynamicWorld, ...overrides.dynamicWorld },
    retry: { ...DEFAULT_CONFIG.retry, ...overrides.retry },
    configPath: null,
  };
}

export function testContext(
  session: RasterSession,
  config: ForestAtlasConfig = testConfig()
): EarthEngineContext {
  return new EarthEngineContext(session, config);
}

export function lossRecord(overrides: Partial<AnnualLossRecord> = {}): AnnualLossRecord {
  return {
    regionId: 'region-1',
    regionName: 'Test Forest',
    year: 2023,
    lossAreaKm2: 1.5,
    baselineAreaKm2: 100,
    treeCoverThreshold: 30,
    datasetVersion: 'v1.12',
    ...overrides,
  };
}

export function periodMetric(overrides: Partial<PeriodMetric> = {}): PeriodMetric {
  return {
    window: { startDate: '2024-01-01', endDate: '2024-01-31' },
    forestAreaHa: 50,
    imageCount: 5,
    currentCoverageHa: 90,
    finalCoverageHa: 100,
    ...overrides,
  };
}
