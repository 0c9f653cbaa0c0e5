import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors.js';
import {
  createReading,
  formatTimestamp,
  localHour,
  normalizeReadings,
  normalizeRecords,
  parseIsoTimestamp,
  toMmol
} from './readings.js';
import { BASE_TIME, MINUTE, series } from './test-helpers.js';

describe('parseIsoTimestamp', () => {
  it('parses a UTC timestamp', () => {
    expect(parseIsoTimestamp('2024-03-01T08:00:00Z')).toEqual({
      timestamp: Date.UTC(2024, 2, 1, 8, 0, 0),
      utcOffsetMinutes: 0
    });
  });

  it('keeps a negative offset', () => {
    expect(parseIsoTimestamp('2024-03-01T08:00:00-05:00')).toEqual({
      timestamp: Date.UTC(2024, 2, 1, 13, 0, 0),
      utcOffsetMinutes: -300
    });
  });

  it('accepts an offset without a colon', () => {
    expect(parseIsoTimestamp('2024-03-01T08:00:00+0530')).toEqual({
      timestamp: Date.UTC(2024, 2, 1, 2, 30, 0),
      utcOffsetMinutes: 330
    });
  });

  it('treats a timestamp without offset as UTC', () => {
    expect(parseIsoTimestamp('2024-03-01T08:00:00')).toEqual({
      timestamp: Date.UTC(2024, 2, 1, 8, 0, 0),
      utcOffsetMinutes: 0
    });
  });

  it('accepts a space separator and fractional seconds', () => {
    expect(parseIsoTimestamp('2024-03-01 08:00:00.250Z')?.timestamp).toBe(Date.UTC(2024, 2, 1, 8, 0, 0, 250));
  });

  it('reads a date-only value as midnight UTC', () => {
    expect(parseIsoTimestamp('2024-03-01')).toEqual({
      timestamp: Date.UTC(2024, 2, 1),
      utcOffsetMinutes: 0
    });
  });

  it('returns null for garbage', () => {
    expect(parseIsoTimestamp('garbage')).toBeNull();
  });

  it('accepts a leap day', () => {
    expect(parseIsoTimestamp('2024-02-29T08:00:00Z')?.timestamp).toBe(Date.UTC(2024, 1, 29, 8, 0, 0));
  });

  it('rejects days past the end of the month', () => {
    expect(parseIsoTimestamp('2024-02-30T08:00:00Z')).toBeNull();
    expect(parseIsoTimestamp('2023-02-29T08:00:00Z')).toBeNull();
    expect(parseIsoTimestamp('2024-04-31T08:00:00Z')).toBeNull();
  });

  it('rejects out-of-range clock fields', () => {
    expect(parseIsoTimestamp('2024-03-01T24:00:00Z')).toBeNull();
    expect(parseIsoTimestamp('2024-03-01T08:60:00Z')).toBeNull();
    expect(parseIsoTimestamp('2024-03-01T08:00:60Z')).toBeNull();
  });

  it('checks fields in the written offset', () => {
    expect(parseIsoTimestamp('2024-02-30T22:00:00-05:00')).toBeNull();
    expect(parseIsoTimestamp('2024-03-01T08:00:00+24:00')).toBeNull();
  });
});

describe('formatTimestamp', () => {
  it('renders the instant in its own offset', () => {
    expect(formatTimestamp(Date.UTC(2024, 2, 1, 13, 0, 0), -300)).toBe('2024-03-01T08:00:00-05:00');
  });

  it('renders UTC with +00:00', () => {
    expect(formatTimestamp(BASE_TIME, 0)).toBe('2024-03-01T08:00:00+00:00');
  });

  it('keeps milliseconds when present', () => {
    expect(formatTimestamp(BASE_TIME + 250, 330)).toBe('2024-03-01T13:30:00.250+05:30');
  });
});

describe('createReading', () => {
  it('derives mmol/L to one decimal', () => {
    expect(toMmol(100)).toBe(5.6);
    expect(createReading(180, BASE_TIME).mmol).toBe(10);
  });

  it('is immutable', () => {
    expect(Object.isFrozen(createReading(100, BASE_TIME))).toBe(true);
  });

  it('computes the local hour from its offset', () => {
    expect(localHour(createReading(100, Date.UTC(2024, 2, 1, 13, 0, 0), -300))).toBe(8);
    expect(localHour(createReading(100, Date.UTC(2024, 2, 1, 3, 0, 0), -300))).toBe(22);
  });
});

describe('normalizeRecords', () => {
  const records = [
    { glucose_mg_dl: 100, timestamp: '2024-03-01T08:10:00Z' },
    { glucose_mg_dl: 110, timestamp: '2024-03-01T08:00:00Z' },
    { glucose_mg_dl: 120, timestamp: '2024-03-01T08:05:00Z' }
  ];

  it('sorts ascending', () => {
    expect(normalizeRecords(records, { order: 'asc' }).map(r => r.value)).toEqual([110, 120, 100]);
  });

  it('keeps the most recent entries when capped', () => {
    expect(normalizeRecords(records, { order: 'desc', maxCount: 2 }).map(r => r.value)).toEqual([100, 120]);
    expect(normalizeRecords(records, { order: 'asc', maxCount: 2 }).map(r => r.value)).toEqual([120, 100]);
  });

  it('sets no trend on external records', () => {
    const [reading] = normalizeRecords([records[0]], { order: 'asc' });
    expect(reading.trend).toBeNull();
    expect(reading.mmol).toBe(5.6);
  });

  it('accepts an empty batch', () => {
    expect(normalizeRecords([], { order: 'asc' })).toEqual([]);
  });

  it('rejects a non-array', () => {
    expect(() => normalizeRecords({ glucose_mg_dl: 100 }, { order: 'asc' })).toThrow(ValidationError);
  });

  it('rejects a record missing its value', () => {
    const bad = [records[0], { timestamp: '2024-03-01T08:00:00Z' }];
    expect(() => normalizeRecords(bad, { order: 'asc' })).toThrow(/^Invalid reading at index 1: glucose_mg_dl/);
  });

  it('rejects a non-integer value', () => {
    const bad = [{ glucose_mg_dl: 100.5, timestamp: '2024-03-01T08:00:00Z' }];
    expect(() => normalizeRecords(bad, { order: 'asc' })).toThrow(/^Invalid reading at index 0: glucose_mg_dl/);
  });

  it('keeps input order for equal timestamps', () => {
    const tied = [
      { glucose_mg_dl: 100, timestamp: '2024-03-01T08:00:00Z' },
      { glucose_mg_dl: 110, timestamp: '2024-03-01T08:00:00Z' },
      { glucose_mg_dl: 90, timestamp: '2024-03-01T07:55:00Z' }
    ];
    expect(normalizeRecords(tied, { order: 'asc' }).map(r => r.value)).toEqual([90, 100, 110]);
    expect(normalizeRecords(tied, { order: 'desc' }).map(r => r.value)).toEqual([100, 110, 90]);
    expect(normalizeRecords(tied, { order: 'asc', maxCount: 2 }).map(r => r.value)).toEqual([100, 110]);
  });

  it('rejects a rolled-over date', () => {
    const bad = [{ glucose_mg_dl: 100, timestamp: '2024-02-30T08:00:00Z' }];
    expect(() => normalizeRecords(bad, { order: 'asc' })).toThrow(
      'Invalid reading at index 0: unparseable timestamp "2024-02-30T08:00:00Z"'
    );
  });

  it('rejects an unparseable timestamp', () => {
    const bad = [{ glucose_mg_dl: 100, timestamp: 'garbage' }];
    expect(() => normalizeRecords(bad, { order: 'asc' })).toThrow(
      'Invalid reading at index 0: unparseable timestamp "garbage"'
    );
  });

  it('reports the failing index', () => {
    try {
      normalizeRecords([records[0], records[1], { glucose_mg_dl: -5, timestamp: 'x' }], { order: 'asc' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.index).toBe(2);
    }
  });
});

describe('normalizeReadings', () => {
  it('orders client readings newest first', () => {
    const readings = series([100, 110, 120]);
    const result = normalizeReadings(readings, { order: 'desc' });
    expect(result.map(r => r.value)).toEqual([120, 110, 100]);
    expect(result[0].timestamp).toBe(BASE_TIME + 10 * MINUTE);
  });
});
