/**
 * Forest Atlas domain types
 *
 * All values are immutable once produced.
 */

import type { MultiPolygon, Polygon } from 'geojson';

/**
 * Region geometry: WGS84 polygon or multipolygon
 */
export type RegionGeometry = Polygon | MultiPolygon;

/**
 * Parameters for a baseline + annual loss extraction
 */
export interface ExtractionRequest {
  readonly regionId: string;
  readonly regionName: string;
  readonly geometry: RegionGeometry;
  /** First year (inclusive) */
  readonly startYear: number;
  /** Last year (inclusive) */
  readonly endYear: number;
  /** Minimum % canopy cover (0-100) for a pixel to count as forest */
  readonly treeCoverThreshold: number;
}

/**
 * One row per (region, year)
 */
export interface AnnualLossRecord {
  readonly regionId: string;
  readonly regionName: string;
  readonly year: number;
  readonly lossAreaKm2: number;
  /** Year-2000 forest area; identical across a single extraction */
  readonly baselineAreaKm2: number;
  readonly treeCoverThreshold: number;
  readonly datasetVersion: string;
}

/**
 * Half-open date window [startDate, endDate), dates as YYYY-MM-DD (UTC)
 */
export interface AggregationWindow {
  readonly startDate: string;
  readonly endDate: string;
}

/**
 * Forest area and coverage for one aggregation window
 */
export interface PeriodMetric {
  readonly window: AggregationWindow;
  readonly forestAreaHa: number;
  readonly imageCount: number;
  /** Area with data in the window itself */
  readonly currentCoverageHa: number;
  /** Area with data after gap-filling; never below currentCoverageHa */
  readonly finalCoverageHa: number;
}

/**
 * Retry behaviour for remote reductions
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  /** Seconds; wait after failed attempt k (0-indexed) is backoffBase ** k */
  readonly backoffBase: number;
}

/**
 * Derived statistics over a PeriodMetric series
 */
export interface TimeSeriesSummary {
  readonly periodCount: number;
  readonly totalRegionAreaHa: number;

  readonly totalChangeHa: number;
  readonly totalChangePct: number;
  readonly minAreaHa: number;
  readonly maxAreaHa: number;
  readonly averageAreaHa: number;
  readonly volatilityHa: number;
  readonly volatilityPct: number;

  readonly totalImages: number;
  readonly averageImageCount: number;
  /** Periods with fewer than LOW_DATA_IMAGE_COUNT images */
  readonly lowDataPeriods: number;

  readonly averageCurrentCoverageHa: number;
  readonly averageFinalCoverageHa: number;
  readonly averageCurrentCoveragePct: number;
  readonly averageFinalCoveragePct: number;
  /** Average percentage points added by gap-filling */
  readonly gapFilledPct: number;
  /** Periods whose current coverage is below PARTIAL_COVERAGE_PCT of the region */
  readonly partialCoveragePeriods: number;
}

export interface TimeSeriesResult {
  readonly periods: readonly PeriodMetric[];
  readonly totalRegionAreaHa: number;
  readonly summary: TimeSeriesSummary | null;
}

/**
 * Stored region (persistence collaborator)
 */
export type RegionType = 'country' | 'state' | 'protected_area' | 'custom';

export interface RegionRecord {
  readonly regionId: string;
  readonly regionName: string;
  readonly regionType: RegionType | null;
  readonly geometry: RegionGeometry;
  /** Per-region override; null means use the configured default */
  readonly treeCoverThreshold: number | null;
  readonly baselineYear: number;
}
