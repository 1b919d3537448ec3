/**
 * Bar series and security info formatters
 * Output is deterministic: same series, same bytes
 */

import type { Bar, HistoricalSeries, SecurityInfo } from '@chartfeed/contracts';

export type OutputFormat = 'csv' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['csv', 'json'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

const BASE_COLUMNS = ['datetime', 'symbol', 'open', 'high', 'low', 'close', 'volume'] as const;

/**
 * Formatter for downloaded series
 */
export class SeriesFormatter {
  format(series: HistoricalSeries, format: OutputFormat = 'csv'): string {
    switch (format) {
      case 'json':
        return this.formatAsJSON(series);
      case 'csv':
        return this.formatAsCSV(series);
    }
  }

  /**
   * One row per bar; `open_interest` only when the series carries it.
   * Times are ISO 8601 UTC. Missing open interest is an empty cell.
   */
  formatAsCSV(series: HistoricalSeries): string {
    const header: string[] = [...BASE_COLUMNS];
    if (series.hasOpenInterest) {
      header.push('open_interest');
    }

    const lines = [header.join(',')];
    for (const bar of series.bars) {
      const row = [
        new Date(bar.timestamp).toISOString(),
        csvCell(series.symbol),
        String(bar.open),
        String(bar.high),
        String(bar.low),
        String(bar.close),
        String(bar.volume),
      ];
      if (series.hasOpenInterest) {
        row.push(bar.openInterest === null || bar.openInterest === undefined ? '' : String(bar.openInterest));
      }
      lines.push(row.join(','));
    }

    return `${lines.join('\n')}\n`;
  }

  formatAsJSON(series: HistoricalSeries): string {
    const output = {
      symbol: series.symbol,
      interval: series.interval,
      hasOpenInterest: series.hasOpenInterest,
      count: series.bars.length,
      bars: series.bars.map((bar) => toJsonBar(bar)),
    };
    return `${JSON.stringify(output, null, 2)}\n`;
  }
}

/**
 * Security info as `field,value` rows, or JSON.
 */
export function formatSecurityInfo(info: SecurityInfo, format: OutputFormat): string {
  if (format === 'json') {
    return `${JSON.stringify(info, null, 2)}\n`;
  }

  const lines = ['field,value'];
  for (const [key, value] of Object.entries(info)) {
    if (value === undefined) continue;
    lines.push(`${key},${csvCell(Array.isArray(value) ? value.join(' ') : String(value))}`);
  }
  return `${lines.join('\n')}\n`;
}

function toJsonBar(bar: Bar): Record<string, unknown> {
  return { datetime: new Date(bar.timestamp).toISOString(), ...bar };
}

/**
 * Quotes a cell containing a comma, quote or newline.
 */
function csvCell(value: string): string {
  if (!/[",\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}
