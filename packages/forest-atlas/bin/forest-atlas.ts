#!/usr/bin/env tsx
/**
 * Forest Atlas CLI Entry Point
 *
 * Region management, Hansen baseline extraction and Dynamic World forest
 * time series.
 *
 * Exit codes: 0 success, 1 runtime error, 2 configuration error.
 *
 * @module forest-atlas-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  EXIT_CODES,
  createCommandContext,
  exitCodeFor,
  type CommandContext,
  type GlobalOptions,
} from '../src/cli/context.js';
import { addRegionCommand, listRegionsCommand } from '../src/cli/commands/regions.js';
import { baselineExtractCommand } from '../src/cli/commands/baseline.js';
import { metricsSeriesCommand } from '../src/cli/commands/metrics.js';
import { ReductionExhaustedError, YearOutOfRangeError, toError } from '../src/core/errors.js';

// ============================================================================
// Helpers
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    console.error(`Cannot read package version: ${toError(error).message}`);
  }
  return '0.0.0';
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}

function parseDecimal(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}".`);
  }
  return parsed;
}

/**
 * Diagnostic context for a failed command
 */
function describeFailure(error: Error): Record<string, unknown> {
  if (error instanceof ReductionExhaustedError) {
    return { error: error.message, band: error.bandName, attempts: error.attempts };
  }
  if (error instanceof YearOutOfRangeError) {
    return { error: error.message, year: error.year, yearCode: error.yearCode };
  }
  return { error: error.message, type: error.name };
}

/**
 * Build the command context, run the action and set the exit code
 */
async function run(
  command: Command,
  action: (ctx: CommandContext) => Promise<unknown>
): Promise<void> {
  const globals: GlobalOptions = command.optsWithGlobals();

  let ctx: CommandContext;
  try {
    ctx = await createCommandContext(globals);
  } catch (error) {
    console.error(`Configuration error: ${toError(error).message}`);
    process.exitCode = exitCodeFor(error);
    return;
  }

  const startTime = Date.now();
  try {
    await action(ctx);
  } catch (error) {
    ctx.logger.error('Command failed', {
      command: command.name(),
      ...describeFailure(toError(error)),
      duration_ms: Date.now() - startTime,
    });
    process.exitCode = exitCodeFor(error);
  }
}

// ============================================================================
// CLI Setup
// ============================================================================

function createProgram(): Command {
  const program = new Command();

  program
    .name('forest-atlas')
    .description('Forest cover and forest loss metrics from Earth Engine raster data')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .forest-atlasrc)');

  // ==========================================================================
  // Region Commands
  // ==========================================================================

  const regions = program.command('regions').description('Manage monitored regions');

  regions
    .command('add')
    .description('Register a region from a GeoJSON file')
    .requiredOption('--name <name>', 'Region name')
    .requiredOption('--geometry <file>', 'GeoJSON Polygon/MultiPolygon, Feature or FeatureCollection')
    .option('--type <type>', 'country|state|protected_area|custom', 'custom')
    .option('--threshold <n>', 'Tree cover threshold override (0-100)', parseInteger)
    .option('--id <id>', 'Region id (default: generated UUID)')
    .action(async (options, command: Command) => {
      await run(command, (ctx) =>
        addRegionCommand(
          {
            name: options.name,
            geometry: options.geometry,
            type: options.type,
            threshold: options.threshold,
            id: options.id,
          },
          ctx
        )
      );
    });

  regions
    .command('list')
    .description('List registered regions')
    .action(async (_options, command: Command) => {
      await run(command, (ctx) => listRegionsCommand(ctx));
    });

  // ==========================================================================
  // Baseline Commands
  // ==========================================================================

  const baseline = program.command('baseline').description('Hansen Global Forest Change baseline');

  baseline
    .command('extract')
    .description('Extract year-2000 forest baseline and annual loss for a region')
    .requiredOption('--region-id <id>', 'Region id (from forest_regions)')
    .option('--start-year <year>', 'First year to extract (inclusive)', parseInteger, 2023)
    .option('--end-year <year>', 'Last year to extract (inclusive)', parseInteger, 2024)
    .option('--threshold <n>', 'Tree cover threshold % (default: region override or config)', parseInteger)
    .option('--dry-run', "Extract data but don't store it")
    .option('--output <file>', 'Also write results to a CSV file')
    .action(async (options, command: Command) => {
      await run(command, (ctx) =>
        baselineExtractCommand(
          {
            regionId: options.regionId,
            startYear: options.startYear,
            endYear: options.endYear,
            threshold: options.threshold,
            dryRun: options.dryRun,
            output: options.output,
          },
          ctx
        )
      );
    });

  // ==========================================================================
  // Metrics Commands
  // ==========================================================================

  const metrics = program.command('metrics').description('Dynamic World forest metrics');

  metrics
    .command('series')
    .description('Forest area time series with gap-filling')
    .option('--region-id <id>', 'Region id (from forest_regions)')
    .option('--geometry <file>', 'GeoJSON file (instead of --region-id)')
    .requiredOption('--start <date>', 'Analysis start (YYYY-MM-DD, inclusive)')
    .requiredOption('--end <date>', 'Analysis end (YYYY-MM-DD, exclusive)')
    .option('--window-days <n>', 'Aggregation window in days', parseInteger)
    .option('--lookback-days <n>', 'Gap-filling lookback in days', parseInteger)
    .option('--threshold <p>', 'Tree probability threshold (0-1)', parseDecimal)
    .option('--no-gap-filling', 'Only use pixels observed in each window')
    .option('--store', 'Store period metrics (requires --region-id)')
    .action(async (options, command: Command) => {
      await run(command, (ctx) =>
        metricsSeriesCommand(
          {
            regionId: options.regionId,
            geometry: options.geometry,
            start: options.start,
            end: options.end,
            windowDays: options.windowDays,
            lookbackDays: options.lookbackDays,
            threshold: options.threshold,
            gapFilling: options.gapFilling,
            store: options.store,
          },
          ctx
        )
      );
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.RUNTIME_ERROR);
});
