/**
 * Export readings in a fixed record schema for external persistence,
 * optionally with a CSV rendering.
 */

import { formatReadingTime, normalizeReadings } from './readings.js';
import { trendArrow } from './constants.js';
import { type AnalysisResult, type Reading, type TrendDirection, noData, report } from './types.js';

export type ExportFormat = 'json' | 'csv';

export interface ExportRecord {
  timestamp: string;
  glucoseMgDl: number;
  glucoseMmolL: number;
  trend: TrendDirection | null;
  trendArrow: string | null;
}

export interface DataExport {
  exportTimestamp: string;
  readingsCount: number;
  periodMinutes: number | null;
  oldestReading: string;
  newestReading: string;
  format: ExportFormat;
  readings: ExportRecord[];
  csv?: string;
}

export interface ExportOptions {
  format: ExportFormat;
  /** Null when the caller supplied the batch. */
  periodMinutes: number | null;
  exportedAt: Date;
}

export const CSV_HEADERS = ['timestamp', 'glucose_mg_dl', 'glucose_mmol_l', 'trend', 'trend_arrow'];

export function toExportRecord(reading: Reading): ExportRecord {
  return {
    timestamp: formatReadingTime(reading),
    glucoseMgDl: reading.value,
    glucoseMmolL: reading.mmol,
    trend: reading.trend,
    trendArrow: trendArrow(reading.trend)
  };
}

export function toCsv(records: ExportRecord[]): string {
  const rows = records.map(r =>
    [r.timestamp, r.glucoseMgDl, r.glucoseMmolL, r.trend ?? '', r.trendArrow ?? ''].join(',')
  );
  return [CSV_HEADERS.join(','), ...rows].join('\n');
}

export function exportReadings(readings: Reading[], options: ExportOptions): AnalysisResult<DataExport> {
  if (readings.length === 0) {
    return noData('No readings to export');
  }

  const records = normalizeReadings(readings, { order: 'desc' }).map(toExportRecord);
  const result: DataExport = {
    exportTimestamp: options.exportedAt.toISOString(),
    readingsCount: records.length,
    periodMinutes: options.periodMinutes,
    oldestReading: records[records.length - 1].timestamp,
    newestReading: records[0].timestamp,
    format: options.format,
    readings: records
  };

  if (options.format === 'csv') {
    result.csv = toCsv(records);
  }

  return report(result);
}
