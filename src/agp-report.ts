/**
 * Ambulatory Glucose Profile (AGP) report.
 *
 * Readings are grouped by local hour of day across the whole span, so
 * several days merge into one 24-hour profile.
 */

import {
  calculateStatistics,
  coefficientOfVariation,
  glucoseManagementIndicator,
  mean,
  round1,
  sampleStdDev
} from './glucose-analytics.js';
import { localHour } from './readings.js';
import {
  type AgpReport,
  type AnalysisResult,
  DEFAULT_THRESHOLDS,
  type HourlyPercentiles,
  type Reading,
  noData,
  report
} from './types.js';

/**
 * Nearest-rank percentile: index `floor(count * p / 100)`, clamped to the last element.
 */
export function percentile(values: number[], p: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.min(Math.floor((sorted.length * p) / 100), sorted.length - 1);
  return sorted[index];
}

export function groupByHour(readings: Reading[]): number[][] {
  const byHour: number[][] = Array.from({ length: 24 }, () => []);
  for (const reading of readings) {
    byHour[localHour(reading)].push(reading.value);
  }
  return byHour;
}

export function hourlyProfile(readings: Reading[]): HourlyPercentiles[] {
  return groupByHour(readings).map((values, hour) => ({
    hour,
    p5: percentile(values, 5),
    p25: percentile(values, 25),
    p50: percentile(values, 50),
    p75: percentile(values, 75),
    p95: percentile(values, 95),
    readingsCount: values.length
  }));
}

/**
 * Generate an AGP report. Range boundaries are the fixed clinical
 * 70/180/54/250 mg/dL and cannot be configured per call.
 */
export function generateAgpReport(readings: Reading[], periodMinutes: number | null): AnalysisResult<AgpReport> {
  if (readings.length === 0) {
    return noData('No readings available');
  }

  const values = readings.map(r => r.value);
  const avg = mean(values);
  const sd = sampleStdDev(values);
  const cv = round1(coefficientOfVariation(sd, avg));

  const stats = calculateStatistics(values, DEFAULT_THRESHOLDS);
  if (stats.status === 'no_data') {
    return stats;
  }
  const { distribution, timeInRange, timeBelowRange } = stats.report;

  return report({
    reportType: 'ambulatory_glucose_profile',
    periodMinutes,
    readingsAnalyzed: values.length,
    metrics: {
      mean: round1(avg),
      gmi: round1(glucoseManagementIndicator(avg)),
      coefficientOfVariation: cv,
      standardDeviation: round1(sd)
    },
    timeInRanges: distribution,
    clinicalTargets: {
      tirTarget: '>70%',
      tirActual: timeInRange,
      tirMet: timeInRange > 70,
      tbrTarget: '<4%',
      tbrActual: timeBelowRange,
      tbrMet: timeBelowRange < 4,
      cvTarget: '<36%',
      cvActual: cv,
      cvMet: cv < 36
    },
    hourlyProfile: hourlyProfile(readings)
  });
}
