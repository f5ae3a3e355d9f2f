/**
 * Number formatting shared by the text reports
 */

export const RULE = '='.repeat(80);

/** Fixed decimals with thousands separators, e.g. 12,345.68 */
export function formatNumber(value: number, digits = 2): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  });
}

/** formatNumber with an explicit sign; zero is "+0.00" */
export function formatSigned(value: number, digits = 2): string {
  return `${value >= 0 ? '+' : ''}${formatNumber(value, digits)}`;
}

export function padLeft(value: string, width: number): string {
  return value.padStart(width);
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}
