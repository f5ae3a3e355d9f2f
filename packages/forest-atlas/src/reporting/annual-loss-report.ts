/**
 * Console and CSV output for annual loss extractions
 */

import type { AnnualLossRecord } from '../core/types.js';
import { percentOf } from '../ingestion/gap-filling-compositor.js';
import { RULE, formatNumber, padLeft } from './format.js';

export function formatAnnualLossReport(records: readonly AnnualLossRecord[]): string {
  const first = records[0];
  const last = records[records.length - 1];
  if (!first || !last) {
    return 'No annual loss records.';
  }

  const baseline = first.baselineAreaKm2;
  const totalLoss = records.reduce((sum, record) => sum + record.lossAreaKm2, 0);

  const lines: string[] = [];
  lines.push(RULE);
  lines.push(`Extraction Summary for ${first.regionName}`);
  lines.push(RULE);
  lines.push(`Years extracted: ${first.year}-${last.year}`);
  lines.push(`Baseline (2000): ${formatNumber(baseline)} km²`);
  lines.push(`Tree cover threshold: ${first.treeCoverThreshold}%`);
  lines.push(`Dataset version: ${first.datasetVersion}`);
  lines.push('');
  lines.push(`${'Year'.padEnd(8)}${padLeft('Loss (km²)', 14)}${padLeft('% of baseline', 16)}`);
  lines.push('-'.repeat(38));
  for (const record of records) {
    lines.push(
      `${String(record.year).padEnd(8)}` +
        `${padLeft(formatNumber(record.lossAreaKm2, 3), 14)}` +
        `${padLeft(`${percentOf(record.lossAreaKm2, baseline).toFixed(2)}%`, 16)}`
    );
  }
  lines.push('-'.repeat(38));
  lines.push(`Total loss: ${formatNumber(totalLoss)} km²`);
  lines.push(`Loss rate: ${percentOf(totalLoss, baseline).toFixed(2)}%`);
  lines.push(RULE);

  return lines.join('\n');
}

function csvCell(value: string | number): string {
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatAnnualLossCsv(records: readonly AnnualLossRecord[]): string {
  const header = [
    'region_id',
    'region_name',
    'year',
    'loss_km2',
    'baseline_cover_km2',
    'tree_cover_threshold',
    'dataset_version',
  ];

  const rows = records.map((record) =>
    [
      record.regionId,
      record.regionName,
      record.year,
      record.lossAreaKm2,
      record.baselineAreaKm2,
      record.treeCoverThreshold,
      record.datasetVersion,
    ]
      .map(csvCell)
      .join(',')
  );

  return [header.join(','), ...rows].join('\n') + '\n';
}
