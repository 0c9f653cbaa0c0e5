/**
 * Threshold and trend alert computation for the current reading.
 * Nothing is delivered from here; callers decide what to do with the result.
 */

import { formatReadingTime } from './readings.js';
import { trendArrow } from './constants.js';
import type { Reading, ThresholdSet, TrendDirection } from './types.js';

export type AlertLevel = 'urgent' | 'warning';
export type AlertType = 'very_low' | 'low' | 'very_high' | 'high' | 'falling_fast' | 'rising_fast';

export interface GlucoseAlert {
  level: AlertLevel;
  type: AlertType;
  message: string;
}

export interface AlertCheck {
  currentGlucose: number;
  trend: TrendDirection | null;
  trendArrow: string | null;
  timestamp: string;
  hasAlerts: boolean;
  alertCount: number;
  alerts: GlucoseAlert[];
  status: 'alert' | 'ok';
}

const FALLING: TrendDirection[] = ['SingleDown', 'DoubleDown'];
const RISING: TrendDirection[] = ['SingleUp', 'DoubleUp'];

function thresholdAlert(value: number, thresholds: ThresholdSet): GlucoseAlert | null {
  if (value < thresholds.urgentLow) {
    return { level: 'urgent', type: 'very_low', message: `Urgent low: ${value} mg/dL` };
  }
  if (value < thresholds.low) {
    return { level: 'warning', type: 'low', message: `Low: ${value} mg/dL` };
  }
  if (value > thresholds.urgentHigh) {
    return { level: 'urgent', type: 'very_high', message: `Urgent high: ${value} mg/dL` };
  }
  if (value > thresholds.high) {
    return { level: 'warning', type: 'high', message: `High: ${value} mg/dL` };
  }
  return null;
}

function trendAlert(value: number, trend: TrendDirection | null): GlucoseAlert | null {
  if (trend === null) return null;
  if (FALLING.includes(trend) && value < 100) {
    return { level: 'warning', type: 'falling_fast', message: `Falling fast at ${value} mg/dL` };
  }
  if (RISING.includes(trend) && value > 150) {
    return { level: 'warning', type: 'rising_fast', message: `Rising fast at ${value} mg/dL` };
  }
  return null;
}

export function checkAlerts(reading: Reading, thresholds: ThresholdSet): AlertCheck {
  const alerts = [thresholdAlert(reading.value, thresholds), trendAlert(reading.value, reading.trend)].filter(
    (alert): alert is GlucoseAlert => alert !== null
  );

  return {
    currentGlucose: reading.value,
    trend: reading.trend,
    trendArrow: trendArrow(reading.trend),
    timestamp: formatReadingTime(reading),
    hasAlerts: alerts.length > 0,
    alertCount: alerts.length,
    alerts,
    status: alerts.length > 0 ? 'alert' : 'ok'
  };
}
