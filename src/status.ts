/**
 * "How am I doing?" summary: current reading, recent period stats,
 * alert flags and a plain-language sentence.
 */

import { countWhere, maxOf, mean, minOf, percentOf, round1 } from './glucose-analytics.js';
import { formatReadingTime } from './readings.js';
import { trendArrow, trendDescription } from './constants.js';
import {
  type AnalysisResult,
  DEFAULT_THRESHOLDS,
  type Reading,
  type TrendDirection,
  noData,
  report
} from './types.js';

export type GlucoseLevel = 'very low' | 'low' | 'in range' | 'high' | 'very high';
export type Urgency = 'urgent' | 'attention' | 'normal';

export interface CurrentGlucose {
  value: number;
  mmol: number;
  trend: TrendDirection | null;
  trendArrow: string | null;
  trendDescription: string | null;
  timestamp: string;
}

export interface PeriodStats {
  average: number;
  averageMmol: number;
  min: number;
  max: number;
  readingsCount: number;
  timeInRange: number;
  timeBelowRange: number;
  timeAboveRange: number;
}

export interface PeriodAlerts {
  hasRecentLows: boolean;
  hasRecentHighs: boolean;
  hasUrgentLow: boolean;
  hasUrgentHigh: boolean;
  lowCount: number;
  highCount: number;
}

export interface StatusSummary {
  periodMinutes: number;
  current: CurrentGlucose | null;
  periodStats: PeriodStats | null;
  alerts: PeriodAlerts | null;
  summary: { text: string; glucoseLevel: GlucoseLevel; urgency: Urgency } | null;
}

export function describeCurrent(reading: Reading): CurrentGlucose {
  return {
    value: reading.value,
    mmol: reading.mmol,
    trend: reading.trend,
    trendArrow: trendArrow(reading.trend),
    trendDescription: trendDescription(reading.trend),
    timestamp: formatReadingTime(reading)
  };
}

export function classifyLevel(value: number): { level: GlucoseLevel; urgency: Urgency } {
  const { urgentLow, low, high, urgentHigh } = DEFAULT_THRESHOLDS;
  if (value < urgentLow) return { level: 'very low', urgency: 'urgent' };
  if (value < low) return { level: 'low', urgency: 'attention' };
  if (value <= high) return { level: 'in range', urgency: 'normal' };
  if (value <= urgentHigh) return { level: 'high', urgency: 'attention' };
  return { level: 'very high', urgency: 'urgent' };
}

function periodStats(values: number[]): PeriodStats {
  const { low, high } = DEFAULT_THRESHOLDS;
  const avg = mean(values);
  const total = values.length;

  return {
    average: round1(avg),
    averageMmol: round1(avg / 18),
    min: minOf(values),
    max: maxOf(values),
    readingsCount: total,
    timeInRange: percentOf(countWhere(values, v => v >= low && v <= high), total),
    timeBelowRange: percentOf(countWhere(values, v => v < low), total),
    timeAboveRange: percentOf(countWhere(values, v => v > high), total)
  };
}

function periodAlerts(values: number[]): PeriodAlerts {
  const { low, high, urgentLow, urgentHigh } = DEFAULT_THRESHOLDS;
  const lowCount = countWhere(values, v => v < low);
  const highCount = countWhere(values, v => v > high);

  return {
    hasRecentLows: lowCount > 0,
    hasRecentHighs: highCount > 0,
    hasUrgentLow: values.some(v => v < urgentLow),
    hasUrgentHigh: values.some(v => v > urgentHigh),
    lowCount,
    highCount
  };
}

export function summarizeStatus(
  current: Reading | null,
  readings: Reading[],
  periodMinutes: number
): AnalysisResult<StatusSummary> {
  if (current === null && readings.length === 0) {
    return noData('No glucose data available');
  }

  const values = readings.map(r => r.value);
  const stats = values.length > 0 ? periodStats(values) : null;

  let summary: StatusSummary['summary'] = null;
  if (current) {
    const { level, urgency } = classifyLevel(current.value);
    const trendText = trendDescription(current.trend) || current.trend || 'unknown';
    let text = `Currently ${current.value} mg/dL (${level}), trending ${trendText}.`;
    if (stats) {
      text += ` Over the last ${(periodMinutes / 60).toFixed(1)}h: ${stats.timeInRange.toFixed(1)}% in range.`;
    }
    summary = { text, glucoseLevel: level, urgency };
  }

  return report({
    periodMinutes,
    current: current ? describeCurrent(current) : null,
    periodStats: stats,
    alerts: values.length > 0 ? periodAlerts(values) : null,
    summary
  });
}
