/**
 * ForestRepository tests against in-memory SQLite
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ConfigurationError, RegionNotFoundError } from '../../../core/errors.js';
import {
  createDatabaseAdapter,
  parseDatabaseUrl,
} from '../../../persistence/adapters/factory.js';
import { parameterize } from '../../../persistence/adapters/postgresql.js';
import { SQLiteAdapter } from '../../../persistence/adapters/sqlite.js';
import { ForestRepository, type DatabaseAdapter } from '../../../persistence/repository.js';
import { TEST_SQUARE, lossRecord, periodMetric } from '../../utils/fixtures.js';

describe('ForestRepository', () => {
  let adapter: DatabaseAdapter;
  let repository: ForestRepository;

  beforeEach(async () => {
    adapter = await createDatabaseAdapter('sqlite::memory:');
    repository = new ForestRepository(adapter, () => new Date('2024-05-01T00:00:00Z'));
  });

  afterEach(async () => {
    await adapter.close();
  });

  describe('regions', () => {
    it('stores and reads back a region', async () => {
      const region = await repository.addRegion({
        regionId: 'region-1',
        regionName: 'Test Forest',
        regionType: 'protected_area',
        geometry: TEST_SQUARE,
        treeCoverThreshold: 25,
      });

      expect(region).toEqual({
        regionId: 'region-1',
        regionName: 'Test Forest',
        regionType: 'protected_area',
        geometry: TEST_SQUARE,
        treeCoverThreshold: 25,
        baselineYear: 2000,
      });
      await expect(repository.getRegion('region-1')).resolves.toEqual(region);
    });

    it('generates an id when none is given', async () => {
      const region = await repository.addRegion({ regionName: 'Anon', geometry: TEST_SQUARE });

      expect(region.regionId).toMatch(/^[0-9a-f-]{36}$/);
      expect(region.regionType).toBeNull();
      expect(region.treeCoverThreshold).toBeNull();
    });

    it('lists regions by name', async () => {
      await repository.addRegion({ regionId: 'b', regionName: 'Zambezi', geometry: TEST_SQUARE });
      await repository.addRegion({ regionId: 'a', regionName: 'Amazon', geometry: TEST_SQUARE });

      const regions = await repository.listRegions();

      expect(regions.map((r) => r.regionName)).toEqual(['Amazon', 'Zambezi']);
    });

    it('raises RegionNotFoundError for an unknown id', async () => {
      await expect(repository.getRegion('missing')).rejects.toBeInstanceOf(RegionNotFoundError);
    });
  });

  describe('annual loss', () => {
    beforeEach(async () => {
      await repository.addRegion({ regionId: 'region-1', regionName: 'Test Forest', geometry: TEST_SQUARE });
    });

    it('saves records and reads them back in year order', async () => {
      const records = [
        lossRecord({ year: 2024, lossAreaKm2: 2.3 }),
        lossRecord({ year: 2023, lossAreaKm2: 1.5 }),
      ];

      await expect(repository.saveAnnualLoss(records)).resolves.toBe(2);

      const stored = await repository.getAnnualLoss('region-1');
      expect(stored).toEqual([
        lossRecord({ year: 2023, lossAreaKm2: 1.5 }),
        lossRecord({ year: 2024, lossAreaKm2: 2.3 }),
      ]);
    });

    it('replaces rows on re-extraction instead of duplicating them', async () => {
      await repository.saveAnnualLoss([lossRecord({ year: 2023, lossAreaKm2: 1.5 })]);
      await repository.saveAnnualLoss([
        lossRecord({ year: 2023, lossAreaKm2: 1.7, treeCoverThreshold: 50 }),
      ]);

      const stored = await repository.getAnnualLoss('region-1');
      expect(stored).toHaveLength(1);
      expect(stored[0]).toMatchObject({ lossAreaKm2: 1.7, treeCoverThreshold: 50 });
    });

    it('writes nothing for an empty batch', async () => {
      await expect(repository.saveAnnualLoss([])).resolves.toBe(0);
    });

    it('rolls back the whole batch when one row fails', async () => {
      const records = [
        lossRecord({ year: 2023 }),
        // violates CHECK (loss_km2 >= 0)
        lossRecord({ year: 2024, lossAreaKm2: -1 }),
      ];

      await expect(repository.saveAnnualLoss(records)).rejects.toThrow();
      await expect(repository.getAnnualLoss('region-1')).resolves.toEqual([]);
    });
  });

  describe('period metrics', () => {
    beforeEach(async () => {
      await repository.addRegion({ regionId: 'region-1', regionName: 'Test Forest', geometry: TEST_SQUARE });
    });

    it('upserts on window start', async () => {
      const january = periodMetric();
      const february = periodMetric({
        window: { startDate: '2024-01-31', endDate: '2024-03-01' },
        forestAreaHa: 48,
      });

      await repository.savePeriodMetrics('region-1', [february, january], 0.15);
      await repository.savePeriodMetrics('region-1', [{ ...january, forestAreaHa: 51 }], 0.15);

      await expect(repository.getPeriodMetrics('region-1')).resolves.toEqual([
        { ...january, forestAreaHa: 51 },
        february,
      ]);
    });

    it('rejects metrics for an unknown region', async () => {
      await expect(
        repository.savePeriodMetrics('missing', [periodMetric()], 0.15)
      ).rejects.toThrow();
    });
  });
});

describe('parseDatabaseUrl', () => {
  it.each([
    ['sqlite::memory:', ':memory:'],
    ['sqlite://:memory:', ':memory:'],
    ['sqlite:///var/lib/forest.db', '/var/lib/forest.db'],
    ['sqlite://data/forest.db', 'data/forest.db'],
  ])('maps %s to SQLite at %s', (url, filepath) => {
    expect(parseDatabaseUrl(url)).toEqual({ type: 'sqlite', filepath });
  });

  it('accepts both PostgreSQL schemes', () => {
    expect(parseDatabaseUrl('postgres://u:p@db:5432/forest')).toEqual({
      type: 'postgresql',
      url: 'postgres://u:p@db:5432/forest',
    });
    expect(parseDatabaseUrl('postgresql://db/forest').type).toBe('postgresql');
  });

  it('rejects other protocols', () => {
    expect(() => parseDatabaseUrl('mysql://db/forest')).toThrow(ConfigurationError);
    expect(() => parseDatabaseUrl('not a url')).toThrow('Invalid DATABASE_URL: not a url');
  });
});

describe('createDatabaseAdapter', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'forest-atlas-schema-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('closes the adapter when the schema fails to apply', async () => {
    const schemaPath = join(dir, 'broken.sql');
    writeFileSync(schemaPath, 'CREATE TABLE (;');
    const close = vi.spyOn(SQLiteAdapter.prototype, 'close');

    await expect(createDatabaseAdapter('sqlite::memory:', schemaPath)).rejects.toThrow();
    expect(close).toHaveBeenCalledTimes(1);
  });
});

describe('parameterize', () => {
  it('numbers placeholders in order', () => {
    expect(parameterize('SELECT * FROM t WHERE a = ? AND b = ?')).toBe(
      'SELECT * FROM t WHERE a = $1 AND b = $2'
    );
  });
});
