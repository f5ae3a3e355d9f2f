/**
 * Region commands
 *
 * Usage:
 *   forest-atlas regions add --name <name> --geometry <file> [--type <type>] [--threshold <n>]
 *   forest-atlas regions list
 *
 * @module cli/commands/regions
 */

import { readFile } from 'node:fs/promises';

import { InvalidRequestError } from '../../core/errors.js';
import { geometryAreaHa, parseRegionGeometry } from '../../core/geometry.js';
import type { RegionGeometry, RegionRecord } from '../../core/types.js';
import { isRegionType } from '../../persistence/repository.js';
import { formatNumber } from '../../reporting/format.js';
import type { CommandContext } from '../context.js';

export interface AddRegionOptions {
  readonly name: string;
  readonly geometry: string;
  readonly type?: string;
  readonly threshold?: number;
  readonly id?: string;
}

/**
 * Read a GeoJSON file as a region geometry
 *
 * @throws InvalidRequestError
 */
export async function readGeometryFile(path: string): Promise<RegionGeometry> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InvalidRequestError(
      `Cannot read geometry file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      'geometry'
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new InvalidRequestError(
      `Geometry file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'geometry'
    );
  }

  return parseRegionGeometry(raw);
}

export async function addRegionCommand(
  options: AddRegionOptions,
  ctx: CommandContext
): Promise<RegionRecord> {
  const regionType = options.type ?? 'custom';
  if (!isRegionType(regionType)) {
    throw new InvalidRequestError(
      `Region type must be one of country, state, protected_area, custom; got "${regionType}"`,
      'type'
    );
  }

  if (
    options.threshold !== undefined &&
    (!Number.isInteger(options.threshold) || options.threshold < 0 || options.threshold > 100)
  ) {
    throw new InvalidRequestError(
      `Tree cover threshold must be an integer 0-100, got ${options.threshold}`,
      'threshold'
    );
  }

  const geometry = await readGeometryFile(options.geometry);

  const handle = await ctx.openRepository();
  try {
    const region = await handle.repository.addRegion({
      regionId: options.id,
      regionName: options.name,
      regionType,
      geometry,
      treeCoverThreshold: options.threshold ?? null,
    });

    ctx.logger.info('Region added', { regionId: region.regionId, regionName: region.regionName });
    if (ctx.config.logging.json) {
      ctx.print(JSON.stringify(region, null, 2));
    } else {
      ctx.print(`Added region ${region.regionName} (${region.regionId})`);
    }
    return region;
  } finally {
    await handle.close();
  }
}

export async function listRegionsCommand(ctx: CommandContext): Promise<RegionRecord[]> {
  const handle = await ctx.openRepository();
  try {
    const regions = await handle.repository.listRegions();

    if (ctx.config.logging.json) {
      ctx.print(
        JSON.stringify(
          regions.map(({ geometry: _geometry, ...rest }) => rest),
          null,
          2
        )
      );
    } else if (regions.length === 0) {
      ctx.print('No regions found.');
    } else {
      ctx.print(formatRegionTable(regions));
    }

    return regions;
  } finally {
    await handle.close();
  }
}

export function formatRegionTable(regions: readonly RegionRecord[]): string {
  const header = `${'ID'.padEnd(38)}${'Name'.padEnd(30)}${'Type'.padEnd(16)}${'Threshold'.padEnd(11)}Area (ha)`;
  const rows = regions.map(
    (region) =>
      `${region.regionId.padEnd(38)}` +
      `${truncate(region.regionName, 29).padEnd(30)}` +
      `${(region.regionType ?? '-').padEnd(16)}` +
      `${(region.treeCoverThreshold === null ? 'default' : `${region.treeCoverThreshold}%`).padEnd(11)}` +
      formatNumber(geometryAreaHa(region.geometry))
  );
  return [header, '-'.repeat(header.length), ...rows].join('\n');
}

function truncate(value: string, width: number): string {
  return value.length > width ? `${value.slice(0, width - 1)}~` : value;
}
