/**
 * Forest Atlas Repository
 *
 * Regions, annual loss and period metrics over a DatabaseAdapter. Works with
 * both SQLite (better-sqlite3) and PostgreSQL (pg); queries use `?`
 * placeholders and the PostgreSQL adapter rewrites them.
 *
 * Each save runs in one transaction and upserts on the primary key, so
 * re-running an extraction replaces its rows rather than duplicating them.
 */

import { randomUUID } from 'node:crypto';

import { RegionNotFoundError } from '../core/errors.js';
import { parseRegionGeometry } from '../core/geometry.js';
import type {
  AnnualLossRecord,
  PeriodMetric,
  RegionGeometry,
  RegionRecord,
  RegionType,
} from '../core/types.js';

// ============================================================================
// Database Adapter Interface - Supports SQLite and PostgreSQL
// ============================================================================

export interface DatabaseAdapter {
  /** Single row or null */
  queryOne<T>(sql: string, params?: ReadonlyArray<unknown>): Promise<T | null>;

  queryMany<T>(sql: string, params?: ReadonlyArray<unknown>): Promise<ReadonlyArray<T>>;

  /** INSERT, UPDATE, DELETE; returns affected row count */
  execute(sql: string, params?: ReadonlyArray<unknown>): Promise<number>;

  /** Rolls back when fn throws */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /** Run a multi-statement DDL script */
  initializeSchema(schemaSQL: string): Promise<void>;

  close(): Promise<void>;
}

// ============================================================================
// Row Types
// ============================================================================

interface RegionRow {
  readonly region_id: string;
  readonly region_name: string;
  readonly region_type: string | null;
  readonly geometry: string;
  readonly tree_cover_threshold: number | null;
  readonly baseline_year: number;
}

interface AnnualLossRow {
  readonly region_id: string;
  readonly region_name: string;
  readonly year: number;
  readonly loss_km2: number;
  readonly baseline_cover_km2: number;
  readonly tree_cover_threshold: number;
  readonly dataset_version: string;
}

interface PeriodMetricRow {
  readonly window_start: string;
  readonly window_end: string;
  readonly forest_area_ha: number;
  readonly image_count: number;
  readonly current_coverage_ha: number;
  readonly final_coverage_ha: number;
}

const REGION_TYPES: readonly RegionType[] = ['country', 'state', 'protected_area', 'custom'];

export function isRegionType(value: string): value is RegionType {
  return REGION_TYPES.some((type) => type === value);
}

export interface RegionInsert {
  /** Generated when omitted */
  readonly regionId?: string;
  readonly regionName: string;
  readonly regionType?: RegionType | null;
  readonly geometry: RegionGeometry;
  readonly treeCoverThreshold?: number | null;
  readonly baselineYear?: number;
}

// ============================================================================
// Repository Implementation
// ============================================================================

export class ForestRepository {
  constructor(
    private readonly db: DatabaseAdapter,
    private readonly now: () => Date = () => new Date()
  ) {}

  // ==========================================================================
  // Regions
  // ==========================================================================

  async addRegion(insert: RegionInsert): Promise<RegionRecord> {
    const regionId = insert.regionId ?? randomUUID();
    const timestamp = this.now().toISOString();

    await this.db.execute(
      `INSERT INTO forest_regions (
        region_id, region_name, region_type, geometry,
        tree_cover_threshold, baseline_year, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        regionId,
        insert.regionName,
        insert.regionType ?? null,
        JSON.stringify(insert.geometry),
        insert.treeCoverThreshold ?? null,
        insert.baselineYear ?? 2000,
        timestamp,
        timestamp,
      ]
    );

    return this.getRegion(regionId);
  }

  /**
   * @throws RegionNotFoundError
   */
  async getRegion(regionId: string): Promise<RegionRecord> {
    const row = await this.db.queryOne<RegionRow>(
      `SELECT region_id, region_name, region_type, geometry, tree_cover_threshold, baseline_year
       FROM forest_regions WHERE region_id = ?`,
      [regionId]
    );

    if (!row) {
      throw new RegionNotFoundError(regionId);
    }

    return toRegionRecord(row);
  }

  async listRegions(): Promise<RegionRecord[]> {
    const rows = await this.db.queryMany<RegionRow>(
      `SELECT region_id, region_name, region_type, geometry, tree_cover_threshold, baseline_year
       FROM forest_regions ORDER BY region_name, region_id`
    );
    return rows.map(toRegionRecord);
  }

  // ==========================================================================
  // Annual loss
  // ==========================================================================

  /**
   * Upsert one extraction's records atomically
   *
   * @returns number of rows written
   */
  async saveAnnualLoss(records: readonly AnnualLossRecord[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    const extractedAt = this.now().toISOString();

    return this.db.transaction(async () => {
      let written = 0;
      for (const record of records) {
        written += await this.db.execute(
          `INSERT INTO forest_annual_loss (
            region_id, year, loss_km2, baseline_cover_km2,
            tree_cover_threshold, dataset_version, extracted_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT (region_id, year) DO UPDATE SET
            loss_km2 = excluded.loss_km2,
            baseline_cover_km2 = excluded.baseline_cover_km2,
            tree_cover_threshold = excluded.tree_cover_threshold,
            dataset_version = excluded.dataset_version,
            extracted_at = excluded.extracted_at`,
          [
            record.regionId,
            record.year,
            record.lossAreaKm2,
            record.baselineAreaKm2,
            record.treeCoverThreshold,
            record.datasetVersion,
            extractedAt,
          ]
        );
      }
      return written;
    });
  }

  async getAnnualLoss(regionId: string): Promise<AnnualLossRecord[]> {
    const rows = await this.db.queryMany<AnnualLossRow>(
      `SELECT l.region_id, r.region_name, l.year, l.loss_km2, l.baseline_cover_km2,
              l.tree_cover_threshold, l.dataset_version
       FROM forest_annual_loss l
       JOIN forest_regions r ON r.region_id = l.region_id
       WHERE l.region_id = ?
       ORDER BY l.year`,
      [regionId]
    );

    return rows.map((row) => ({
      regionId: row.region_id,
      regionName: row.region_name,
      year: row.year,
      lossAreaKm2: row.loss_km2,
      baselineAreaKm2: row.baseline_cover_km2,
      treeCoverThreshold: row.tree_cover_threshold,
      datasetVersion: row.dataset_version,
    }));
  }

  // ==========================================================================
  // Period metrics
  // ==========================================================================

  async savePeriodMetrics(
    regionId: string,
    metrics: readonly PeriodMetric[],
    forestThreshold: number
  ): Promise<number> {
    if (metrics.length === 0) {
      return 0;
    }

    const extractedAt = this.now().toISOString();

    return this.db.transaction(async () => {
      let written = 0;
      for (const metric of metrics) {
        written += await this.db.execute(
          `INSERT INTO forest_period_metrics (
            region_id, window_start, window_end, forest_area_ha, image_count,
            current_coverage_ha, final_coverage_ha, forest_threshold, extracted_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT (region_id, window_start) DO UPDATE SET
            window_end = excluded.window_end,
            forest_area_ha = excluded.forest_area_ha,
            image_count = excluded.image_count,
            current_coverage_ha = excluded.current_coverage_ha,
            final_coverage_ha = excluded.final_coverage_ha,
            forest_threshold = excluded.forest_threshold,
            extracted_at = excluded.extracted_at`,
          [
            regionId,
            metric.window.startDate,
            metric.window.endDate,
            metric.forestAreaHa,
            metric.imageCount,
            metric.currentCoverageHa,
            metric.finalCoverageHa,
            forestThreshold,
            extractedAt,
          ]
        );
      }
      return written;
    });
  }

  async getPeriodMetrics(regionId: string): Promise<PeriodMetric[]> {
    const rows = await this.db.queryMany<PeriodMetricRow>(
      `SELECT window_start, window_end, forest_area_ha, image_count,
              current_coverage_ha, final_coverage_ha
       FROM forest_period_metrics
       WHERE region_id = ?
       ORDER BY window_start`,
      [regionId]
    );

    return rows.map((row) => ({
      window: { startDate: row.window_start, endDate: row.window_end },
      forestAreaHa: row.forest_area_ha,
      imageCount: row.image_count,
      currentCoverageHa: row.current_coverage_ha,
      finalCoverageHa: row.final_coverage_ha,
    }));
  }
}

function toRegionRecord(row: RegionRow): RegionRecord {
  const regionType = row.region_type;
  return {
    regionId: row.region_id,
    regionName: row.region_name,
    regionType: regionType !== null && isRegionType(regionType) ? regionType : null,
    geometry: parseRegionGeometry(JSON.parse(row.geometry)),
    treeCoverThreshold: row.tree_cover_threshold,
    baselineYear: row.baseline_year,
  };
}
