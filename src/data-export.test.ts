import { describe, expect, it } from 'vitest';
import { exportReadings, toCsv } from './data-export.js';
import { createReading } from './readings.js';
import { BASE_TIME, MINUTE, unwrap } from './test-helpers.js';

const exportedAt = new Date('2024-03-02T00:00:00.000Z');

describe('exportReadings', () => {
  const older = createReading(100, BASE_TIME, 0, 'Flat');
  const newer = createReading(110, BASE_TIME + 5 * MINUTE, 0, null);

  it('returns no_data for no readings', () => {
    expect(exportReadings([], { format: 'json', periodMinutes: 60, exportedAt })).toEqual({
      status: 'no_data',
      message: 'No readings to export'
    });
  });

  it('exports newest first', () => {
    const data = unwrap(exportReadings([older, newer], { format: 'json', periodMinutes: 1440, exportedAt }));

    expect(data.exportTimestamp).toBe('2024-03-02T00:00:00.000Z');
    expect(data.readingsCount).toBe(2);
    expect(data.periodMinutes).toBe(1440);
    expect(data.newestReading).toBe('2024-03-01T08:05:00+00:00');
    expect(data.oldestReading).toBe('2024-03-01T08:00:00+00:00');
    expect(data.format).toBe('json');
    expect(data.readings[1]).toEqual({
      timestamp: '2024-03-01T08:00:00+00:00',
      glucoseMgDl: 100,
      glucoseMmolL: 5.6,
      trend: 'Flat',
      trendArrow: '→'
    });
    expect(data.csv).toBeUndefined();
  });

  it('adds a CSV rendering', () => {
    const data = unwrap(exportReadings([older, newer], { format: 'csv', periodMinutes: null, exportedAt }));

    expect(data.periodMinutes).toBeNull();
    expect(data.csv).toBe(
      [
        'timestamp,glucose_mg_dl,glucose_mmol_l,trend,trend_arrow',
        '2024-03-01T08:05:00+00:00,110,6.1,,',
        '2024-03-01T08:00:00+00:00,100,5.6,Flat,→'
      ].join('\n')
    );
  });
});

describe('toCsv', () => {
  it('writes only the header for no records', () => {
    expect(toCsv([])).toBe('timestamp,glucose_mg_dl,glucose_mmol_l,trend,trend_arrow');
  });
});
