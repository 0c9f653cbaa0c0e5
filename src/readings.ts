/**
 * Reading Normalizer
 *
 * Turns caller-supplied records or acquisition-client readings into the
 * canonical, timestamp-sorted Reading sequence the analyses consume.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import { round1 } from './glucose-analytics.js';
import type { Reading, TrendDirection } from './types.js';

export type ReadingOrder = 'asc' | 'desc';

export interface NormalizeOptions {
  order: ReadingOrder;
  /** Keep only the most recent entries. */
  maxCount?: number;
}

const zExternalRecord = z.object({
  glucose_mg_dl: z.number().int().positive(),
  timestamp: z.string().min(1)
});

const OFFSET_REGEX = /(Z|[+-]\d{2}(?::?\d{2})?)$/i;
const DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_REGEX = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,6})?)?$/;

export function toMmol(value: number): number {
  return round1(value / 18);
}

export function createReading(
  value: number,
  timestamp: number,
  utcOffsetMinutes = 0,
  trend: TrendDirection | null = null
): Reading {
  return Object.freeze({
    value,
    mmol: toMmol(value),
    timestamp,
    utcOffsetMinutes,
    trend
  });
}

function parseOffset(designator: string): number | null {
  if (designator.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = designator.startsWith('-') ? -1 : 1;
  const digits = designator.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return sign * (hours * 60 + minutes);
}

function formatOffset(utcOffsetMinutes: number): string {
  const sign = utcOffsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(utcOffsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/**
 * Parse an ISO-8601 timestamp, keeping the offset it was written in.
 * Returns null when the string is not a valid instant.
 */
export function parseIsoTimestamp(value: string): { timestamp: number; utcOffsetMinutes: number } | null {
  let text = value.trim();
  if (DATE_REGEX.test(text)) {
    text += 'T00:00:00';
  }
  const separator = text.search(/[T ]/);
  if (separator < 0) {
    return null;
  }

  const date = DATE_REGEX.exec(text.slice(0, separator));
  let time = text.slice(separator + 1);
  let utcOffsetMinutes = 0;
  // Only the time part can carry an offset; "-" inside the date is a separator
  const match = OFFSET_REGEX.exec(time);
  if (match) {
    const offset = parseOffset(match[1]);
    if (offset === null) {
      return null;
    }
    utcOffsetMinutes = offset;
    time = time.slice(0, match.index);
  }

  const clock = TIME_REGEX.exec(time);
  if (!date || !clock) {
    return null;
  }

  const timestamp = Date.parse(`${date[0]}T${time}${formatOffset(utcOffsetMinutes)}`);
  if (Number.isNaN(timestamp)) {
    return null;
  }

  // Date.parse rolls out-of-range fields over (Feb 30 to Mar 1, 24:00 to the next day)
  const wall = new Date(timestamp + utcOffsetMinutes * 60_000);
  const actual = [
    wall.getUTCFullYear(),
    wall.getUTCMonth() + 1,
    wall.getUTCDate(),
    wall.getUTCHours(),
    wall.getUTCMinutes(),
    wall.getUTCSeconds()
  ];
  const written = [date[1], date[2], date[3], clock[1], clock[2], clock[3] ?? '0'].map(Number);
  if (actual.some((field, i) => field !== written[i])) {
    return null;
  }

  return { timestamp, utcOffsetMinutes };
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Render an instant in its own offset, e.g. `2024-03-01T08:05:00-05:00`.
 */
export function formatTimestamp(timestamp: number, utcOffsetMinutes: number): string {
  const shifted = new Date(timestamp + utcOffsetMinutes * 60_000);
  const iso = shifted.toISOString();
  const base = shifted.getUTCMilliseconds() === 0 ? iso.slice(0, 19) : iso.slice(0, 23);
  return `${base}${formatOffset(utcOffsetMinutes)}`;
}

export function formatReadingTime(reading: Reading): string {
  return formatTimestamp(reading.timestamp, reading.utcOffsetMinutes);
}

/** Hour of day (0-23) in the reading's own offset. */
export function localHour(reading: Reading): number {
  const shifted = new Date(reading.timestamp + reading.utcOffsetMinutes * 60_000);
  return shifted.getUTCHours();
}

export function minutesBetween(from: number, to: number): number {
  return (to - from) / 60_000;
}

// Stable in both directions: equal timestamps keep their input order
function order(readings: Reading[], options: NormalizeOptions): Reading[] {
  const { maxCount } = options;
  if (options.order === 'desc') {
    const newestFirst = [...readings].sort((a, b) => b.timestamp - a.timestamp);
    return maxCount === undefined ? newestFirst : newestFirst.slice(0, maxCount);
  }
  const oldestFirst = [...readings].sort((a, b) => a.timestamp - b.timestamp);
  return maxCount === undefined ? oldestFirst : oldestFirst.slice(Math.max(oldestFirst.length - maxCount, 0));
}

/**
 * Validate and convert caller-supplied `{ glucose_mg_dl, timestamp }` records.
 * Any malformed record fails the whole batch.
 */
export function normalizeRecords(records: unknown, options: NormalizeOptions): Reading[] {
  if (!Array.isArray(records)) {
    throw new ValidationError('Readings must be an array of { glucose_mg_dl, timestamp } records');
  }

  const readings = records.map((record, index) => {
    const parsed = zExternalRecord.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue.path.length > 0 ? issue.path.join('.') : 'record';
      throw new ValidationError(`Invalid reading at index ${index}: ${field}: ${issue.message}`, index);
    }

    const time = parseIsoTimestamp(parsed.data.timestamp);
    if (time === null) {
      throw new ValidationError(
        `Invalid reading at index ${index}: unparseable timestamp "${parsed.data.timestamp}"`,
        index
      );
    }
    return createReading(parsed.data.glucose_mg_dl, time.timestamp, time.utcOffsetMinutes);
  });

  return order(readings, options);
}

/** Order and cap readings returned by the acquisition client. */
export function normalizeReadings(readings: Reading[], options: NormalizeOptions): Reading[] {
  return order(readings, options);
}
