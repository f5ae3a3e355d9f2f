/**
 * Console report for a forest-area time series
 *
 * @module reporting/time-series-report
 */

import { LOW_DATA_IMAGE_COUNT, PARTIAL_COVERAGE_PCT } from '../core/constants.js';
import type { TimeSeriesResult } from '../core/types.js';
import { percentOf } from '../ingestion/gap-filling-compositor.js';
import { RULE, formatNumber, formatSigned, formatTimestamp, padLeft } from './format.js';

export interface TimeSeriesReportOptions {
  readonly regionName: string;
  /** Tree probability 0-1 */
  readonly threshold: number;
  readonly windowDays: number;
  readonly analysisStart: string;
  readonly analysisEnd: string;
  readonly gapFilling: boolean;
  readonly lookbackDays: number;
  readonly generatedAt?: Date;
}

/** Gap-filled coverage is only shown when it adds more than this many points */
const GAP_FILL_DISPLAY_PCT = 1;

const INDENT = ' '.repeat(13);

export function formatTimeSeriesReport(
  result: TimeSeriesResult,
  options: TimeSeriesReportOptions
): string {
  const lines: string[] = [];
  const { totalRegionAreaHa, periods, summary } = result;

  lines.push(RULE);
  lines.push('FOREST COVER TIME SERIES ANALYSIS');
  lines.push(RULE);
  lines.push('');
  lines.push(`Region: ${options.regionName}`);
  lines.push(`Threshold: ${options.threshold} (tree probability)`);
  lines.push(`Aggregation Window: ${options.windowDays} days`);
  lines.push(`Analysis Period: ${options.analysisStart} to ${options.analysisEnd}`);
  lines.push('');
  lines.push(RULE);
  lines.push('FOREST AREA MEASUREMENTS');
  lines.push(RULE);
  lines.push('');

  periods.forEach((period, i) => {
    const currentPct = percentOf(period.currentCoverageHa, totalRegionAreaHa);
    const finalPct = percentOf(period.finalCoverageHa, totalRegionAreaHa);
    const gapFilledPct = finalPct - currentPct;

    lines.push(`${`Period ${i + 1}`.padEnd(12)} (${period.window.startDate} to ${period.window.endDate})`);
    lines.push(`${INDENT}Forest Area: ${padLeft(formatNumber(period.forestAreaHa), 12)} ha`);
    lines.push(
      `${INDENT}Images Used: ${padLeft(String(period.imageCount), 12)} images` +
        (period.imageCount < LOW_DATA_IMAGE_COUNT ? ' [LOW DATA]' : '')
    );
    lines.push(
      `${INDENT}Current Cov.:${padLeft(formatNumber(period.currentCoverageHa), 12)} ha (${padLeft(currentPct.toFixed(1), 5)}%)`
    );
    if (options.gapFilling && gapFilledPct > GAP_FILL_DISPLAY_PCT) {
      lines.push(
        `${INDENT}Gap-Filled:  ${padLeft(formatNumber(period.finalCoverageHa), 12)} ha (${padLeft(finalPct.toFixed(1), 5)}%) [+${gapFilledPct.toFixed(1)}% from history]`
      );
    }

    const previous = i > 0 ? periods[i - 1] : undefined;
    if (previous) {
      const changeHa = period.forestAreaHa - previous.forestAreaHa;
      const changePct = percentOf(changeHa, previous.forestAreaHa);
      const status = changeHa > 0 ? 'Growth' : changeHa < 0 ? 'Loss' : 'Stable';
      lines.push(
        `${INDENT}Change:      ${padLeft(formatSigned(changeHa), 12)} ha (${padLeft(formatSigned(changePct), 6)}%) ${status}`
      );
    }

    lines.push('');
  });

  if (summary) {
    lines.push(RULE);
    lines.push('SUMMARY STATISTICS');
    lines.push(RULE);
    lines.push('');
    lines.push(`Total Change:        ${padLeft(formatNumber(summary.totalChangeHa), 12)} ha (${padLeft(formatSigned(summary.totalChangePct), 6)}%)`);
    lines.push(`Minimum Area:        ${padLeft(formatNumber(summary.minAreaHa), 12)} ha`);
    lines.push(`Maximum Area:        ${padLeft(formatNumber(summary.maxAreaHa), 12)} ha`);
    lines.push(`Average Area:        ${padLeft(formatNumber(summary.averageAreaHa), 12)} ha`);
    lines.push(`Volatility:          ${padLeft(formatNumber(summary.volatilityHa), 12)} ha (${summary.volatilityPct.toFixed(1)}% of avg)`);
    lines.push('');
    lines.push(RULE);
    lines.push('DATA QUALITY ASSESSMENT');
    lines.push(RULE);
    lines.push('');
    lines.push(`Region Total Area:   ${padLeft(formatNumber(totalRegionAreaHa), 12)} ha`);
    lines.push('');
    lines.push('IMAGE AVAILABILITY:');
    lines.push(`Total Images:        ${padLeft(String(summary.totalImages), 12)} images across all periods`);
    lines.push(`Average per Period:  ${padLeft(summary.averageImageCount.toFixed(1), 12)} images`);
    lines.push(`Low Data Periods:    ${padLeft(String(summary.lowDataPeriods), 12)} periods (< ${LOW_DATA_IMAGE_COUNT} images)`);
    lines.push('');
    lines.push('COVERAGE COMPLETENESS:');
    lines.push(`Current Period Avg:  ${padLeft(formatNumber(summary.averageCurrentCoverageHa), 12)} ha (${padLeft(summary.averageCurrentCoveragePct.toFixed(1), 5)}% of region)`);
    lines.push(`After Gap-Filling:   ${padLeft(formatNumber(summary.averageFinalCoverageHa), 12)} ha (${padLeft(summary.averageFinalCoveragePct.toFixed(1), 5)}% of region)`);
    lines.push(`Gap-Filled Avg:      ${padLeft(summary.gapFilledPct.toFixed(1), 12)}% from historical data`);
    lines.push(`Partial Coverage:    ${padLeft(String(summary.partialCoveragePeriods), 12)} periods (< ${PARTIAL_COVERAGE_PCT}% current coverage)`);
    lines.push('');

    const hasIssues = summary.lowDataPeriods > 0 || summary.partialCoveragePeriods > 0;
    lines.push(hasIssues ? 'WARNING: Cloud coverage issues detected!' : 'OK: Good data quality across all periods.');
    if (summary.lowDataPeriods > 0) {
      lines.push(`   - ${summary.lowDataPeriods} periods with < ${LOW_DATA_IMAGE_COUNT} images (unreliable)`);
    }
    if (summary.partialCoveragePeriods > 0) {
      lines.push(`   - ${summary.partialCoveragePeriods} periods with < ${PARTIAL_COVERAGE_PCT}% current coverage`);
    }
    if (options.gapFilling && summary.gapFilledPct >= GAP_FILL_DISPLAY_PCT) {
      lines.push(`   - Gap-filling added ${summary.gapFilledPct.toFixed(1)}% coverage on average`);
    }
    lines.push('');
  }

  lines.push(
    options.gapFilling
      ? `Gap-filling: ENABLED (lookback: ${options.lookbackDays} days)`
      : 'Gap-filling: DISABLED'
  );
  lines.push(
    options.gapFilling
      ? '     Missing pixels filled with most recent historical observations (within lookback window).'
      : '     Results only account for pixels with data in current period.'
  );
  lines.push('');
  lines.push(RULE);
  lines.push(`Timestamp: ${formatTimestamp(options.generatedAt ?? new Date())}`);
  lines.push(RULE);

  return lines.join('\n');
}
