/**
 * Fixtures shared by the unit tests.
 */

import { createReading } from './readings.js';
import type { AnalysisResult, Reading, TrendDirection } from './types.js';

/** 2024-03-01T08:00:00Z */
export const BASE_TIME = Date.UTC(2024, 2, 1, 8, 0, 0);

export const MINUTE = 60_000;

export interface SeriesOptions {
  start?: number;
  intervalMinutes?: number;
  utcOffsetMinutes?: number;
  trend?: TrendDirection | null;
}

/** Ascending readings at a fixed cadence (5 minutes by default). */
export function series(values: number[], options: SeriesOptions = {}): Reading[] {
  const start = options.start ?? BASE_TIME;
  const interval = options.intervalMinutes ?? 5;
  return values.map((value, i) =>
    createReading(value, start + i * interval * MINUTE, options.utcOffsetMinutes ?? 0, options.trend ?? null)
  );
}

/** A day from local midnight at 5-minute cadence, with values crossing every band. */
export function variedDay(utcOffsetMinutes = 0): Reading[] {
  const values = Array.from({ length: 288 }, (_, i) => 40 + ((i * 37) % 280));
  return series(values, { start: Date.UTC(2024, 2, 1) - utcOffsetMinutes * MINUTE, utcOffsetMinutes });
}

/** Reading at a given UTC hour on the base day. */
export function atHour(value: number, hour: number, minute = 0): Reading {
  return createReading(value, Date.UTC(2024, 2, 1, hour, minute, 0));
}

export function unwrap<T>(result: AnalysisResult<T>): T {
  if (result.status !== 'ok') {
    throw new Error(`Expected a report, got no_data: ${result.message}`);
  }
  return result.report;
}
