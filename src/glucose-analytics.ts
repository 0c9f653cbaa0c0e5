/**
 * Glucose Analytics Module
 *
 * Mean, variability and time-in-range over a set of glucose values.
 */

import {
  type AnalysisResult,
  DEFAULT_THRESHOLDS,
  type GlucoseStatistics,
  type RangeDistribution,
  type ThresholdSet,
  noData,
  report
} from './types.js';

/**
 * Round to one decimal from the exact binary value; exact ties go to the
 * even neighbour. Only odd multiples of 0.25 are exact ties at one decimal.
 */
export function round1(value: number): number {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && !Number.isInteger(value * 2)) {
    const floor = Math.floor(value * 10);
    return (floor % 2 === 0 ? floor : floor + 1) / 10;
  }
  return Number(value.toFixed(1));
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Sample standard deviation; 0 for fewer than two values. */
export function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squaredDiffs = values.map(v => Math.pow(v - avg, 2));
  return Math.sqrt(squaredDiffs.reduce((a, b) => a + b, 0) / (values.length - 1));
}

export function coefficientOfVariation(stdDev: number, avg: number): number {
  return avg > 0 ? (stdDev / avg) * 100 : 0;
}

/** `count / total * 100` to one decimal, 0 for an empty total. */
export function percentOf(count: number, total: number): number {
  return total > 0 ? round1((count / total) * 100) : 0;
}

export function minOf(values: number[]): number {
  return values.reduce((min, v) => (v < min ? v : min), Infinity);
}

export function maxOf(values: number[]): number {
  return values.reduce((max, v) => (v > max ? v : max), -Infinity);
}

export function countWhere(values: number[], predicate: (v: number) => boolean): number {
  return values.reduce((n, v) => (predicate(v) ? n + 1 : n), 0);
}

/**
 * GMI (Glucose Management Indicator) = 3.31 + 0.02392 × mean mg/dL
 */
export function glucoseManagementIndicator(avg: number): number {
  return 3.31 + 0.02392 * avg;
}

/**
 * Five-band distribution. Bands follow the comparisons literally, so
 * inconsistent thresholds are not corrected here.
 */
export function rangeDistribution(values: number[], thresholds: ThresholdSet): RangeDistribution {
  const { low, high, urgentLow, urgentHigh } = thresholds;
  const total = values.length;

  return {
    veryLow: percentOf(countWhere(values, v => v < urgentLow), total),
    low: percentOf(countWhere(values, v => v >= urgentLow && v < low), total),
    inRange: percentOf(countWhere(values, v => v >= low && v <= high), total),
    high: percentOf(countWhere(values, v => v > high && v <= urgentHigh), total),
    veryHigh: percentOf(countWhere(values, v => v > urgentHigh), total)
  };
}

/**
 * Calculate comprehensive glucose statistics
 */
export function calculateStatistics(
  values: number[],
  thresholds: ThresholdSet = DEFAULT_THRESHOLDS
): AnalysisResult<GlucoseStatistics> {
  if (values.length === 0) {
    return noData('No readings found');
  }

  const total = values.length;
  const avg = mean(values);
  const sd = sampleStdDev(values);
  const cv = coefficientOfVariation(sd, avg);

  return report({
    readingCount: total,
    mean: round1(avg),
    meanMmol: round1(avg / 18),
    standardDeviation: round1(sd),
    coefficientOfVariation: round1(cv),
    min: minOf(values),
    max: maxOf(values),
    timeInRange: percentOf(countWhere(values, v => v >= thresholds.low && v <= thresholds.high), total),
    timeBelowRange: percentOf(countWhere(values, v => v < thresholds.low), total),
    timeAboveRange: percentOf(countWhere(values, v => v > thresholds.high), total),
    distribution: rangeDistribution(values, thresholds),
    thresholds: { ...thresholds }
  });
}
