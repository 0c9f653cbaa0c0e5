/**
 * Wire rendering: analysis results to the snake_case JSON the tools return.
 */

import type { AlertCheck } from './alerts.js';
import { trendArrow } from './constants.js';
import type { DataExport } from './data-export.js';
import { formatReadingTime } from './readings.js';
import type { CurrentGlucose, StatusSummary } from './status.js';
import type {
  AgpReport,
  BlockResult,
  EpisodeDetails,
  EpisodeSummary,
  GlucoseStatistics,
  Reading,
  TimeBlockAnalysis
} from './types.js';

export type Payload = Record<string, unknown>;

export function renderReading(reading: Reading): Payload {
  return {
    glucose_mg_dl: reading.value,
    glucose_mmol_l: reading.mmol,
    trend: reading.trend,
    trend_arrow: trendArrow(reading.trend),
    timestamp: formatReadingTime(reading)
  };
}

export function renderCurrent(current: CurrentGlucose): Payload {
  return {
    glucose_mg_dl: current.value,
    glucose_mmol_l: current.mmol,
    trend: current.trend,
    trend_arrow: current.trendArrow,
    trend_description: current.trendDescription,
    timestamp: current.timestamp
  };
}

export function renderStatistics(stats: GlucoseStatistics): Payload {
  const { distribution, thresholds } = stats;
  return {
    reading_count: stats.readingCount,
    mean_mg_dl: stats.mean,
    mean_mmol_l: stats.meanMmol,
    std_dev: stats.standardDeviation,
    cv_percent: stats.coefficientOfVariation,
    min_mg_dl: stats.min,
    max_mg_dl: stats.max,
    time_in_range_percent: stats.timeInRange,
    time_below_percent: stats.timeBelowRange,
    time_above_percent: stats.timeAboveRange,
    time_very_low_percent: distribution.veryLow,
    time_low_percent: distribution.low,
    time_high_percent: distribution.high,
    time_very_high_percent: distribution.veryHigh,
    thresholds: {
      low: thresholds.low,
      high: thresholds.high,
      urgent_low: thresholds.urgentLow,
      urgent_high: thresholds.urgentHigh
    }
  };
}

export function renderStatus(status: StatusSummary): Payload {
  const result: Payload = { period_minutes: status.periodMinutes };

  if (status.current) {
    result.current = renderCurrent(status.current);
  }
  if (status.periodStats) {
    const s = status.periodStats;
    result.period_stats = {
      average_mg_dl: s.average,
      average_mmol_l: s.averageMmol,
      min_mg_dl: s.min,
      max_mg_dl: s.max,
      readings_count: s.readingsCount,
      time_in_range_percent: s.timeInRange,
      time_below_percent: s.timeBelowRange,
      time_above_percent: s.timeAboveRange
    };
  }
  if (status.alerts) {
    const a = status.alerts;
    result.alerts = {
      has_recent_lows: a.hasRecentLows,
      has_recent_highs: a.hasRecentHighs,
      has_urgent_low: a.hasUrgentLow,
      has_urgent_high: a.hasUrgentHigh,
      low_count: a.lowCount,
      high_count: a.highCount
    };
  }
  if (status.summary) {
    result.summary = {
      text: status.summary.text,
      glucose_level: status.summary.glucoseLevel,
      urgency: status.summary.urgency
    };
  }
  return result;
}

export function renderEpisodeSummary(summary: EpisodeSummary): Payload {
  const t = summary.totals;
  return {
    readings_analyzed: summary.readingsAnalyzed,
    episodes: summary.episodes.map(e => ({
      type: e.type,
      start: e.start,
      end: e.end,
      duration_minutes: e.durationMinutes,
      extreme_value: e.extremeValue,
      mean_value: e.meanValue,
      ongoing: e.ongoing
    })),
    summary: {
      total_episodes: t.totalEpisodes,
      low_episodes: t.lowEpisodes,
      high_episodes: t.highEpisodes,
      total_low_minutes: t.totalLowMinutes,
      total_high_minutes: t.totalHighMinutes,
      severe_lows: t.severeLows,
      severe_highs: t.severeHighs
    }
  };
}

export function renderEpisodeDetails(details: EpisodeDetails): Payload {
  return {
    readings_analyzed: details.readingsAnalyzed,
    episodes_analyzed: details.episodesAnalyzed,
    episodes: details.episodes.map(e => ({
      type: e.type,
      start: e.start,
      end: e.end,
      duration_minutes: e.durationMinutes,
      extreme_value: e.extremeValue,
      extreme_time: e.extremeTime,
      rate_to_extreme_per_5min: e.rateToExtreme,
      rate_from_extreme_per_5min: e.rateFromExtreme,
      recovery_minutes: e.recoveryMinutes,
      recovery_rate_per_5min: e.recoveryRate,
      overcorrection: e.overcorrection,
      leadup_values: e.leadupValues,
      recovery_values: e.recoveryValues,
      ongoing: e.ongoing
    }))
  };
}

function renderBlock(block: BlockResult): Payload {
  if (block.status === 'no_data') {
    return { time_range: block.timeRange, status: 'no_data', readings_count: 0 };
  }
  return {
    time_range: block.timeRange,
    readings_count: block.readingsCount,
    average_mg_dl: block.average,
    min_mg_dl: block.min,
    max_mg_dl: block.max,
    time_in_range_percent: block.timeInRange,
    time_below_percent: block.timeBelowRange,
    time_above_percent: block.timeAboveRange,
    assessment: block.assessment
  };
}

export function renderTimeBlocks(analysis: TimeBlockAnalysis): Payload {
  return {
    readings_analyzed: analysis.readingsAnalyzed,
    blocks: {
      overnight: renderBlock(analysis.blocks.overnight),
      morning: renderBlock(analysis.blocks.morning),
      afternoon: renderBlock(analysis.blocks.afternoon),
      evening: renderBlock(analysis.blocks.evening)
    },
    best_block: analysis.bestBlock,
    worst_block: analysis.worstBlock,
    insight: analysis.insight
  };
}

export function renderAlertCheck(check: AlertCheck): Payload {
  return {
    current_glucose: check.currentGlucose,
    trend: check.trend,
    trend_arrow: check.trendArrow,
    timestamp: check.timestamp,
    has_alerts: check.hasAlerts,
    alert_count: check.alertCount,
    alerts: check.alerts,
    status: check.status
  };
}

export function renderExport(data: DataExport): Payload {
  const result: Payload = {
    export_timestamp: data.exportTimestamp,
    readings_count: data.readingsCount,
    period_minutes: data.periodMinutes,
    oldest_reading: data.oldestReading,
    newest_reading: data.newestReading,
    format: data.format,
    readings: data.readings.map(r => ({
      glucose_mg_dl: r.glucoseMgDl,
      glucose_mmol_l: r.glucoseMmolL,
      trend: r.trend,
      trend_arrow: r.trendArrow,
      timestamp: r.timestamp
    }))
  };
  if (data.csv !== undefined) {
    result.csv = data.csv;
  }
  return result;
}

export function renderAgpReport(agp: AgpReport): Payload {
  const ranges = agp.timeInRanges;
  const targets = agp.clinicalTargets;
  return {
    report_type: agp.reportType,
    period_minutes: agp.periodMinutes,
    readings_analyzed: agp.readingsAnalyzed,
    glucose_metrics: {
      mean_mg_dl: agp.metrics.mean,
      gmi_percent: agp.metrics.gmi,
      cv_percent: agp.metrics.coefficientOfVariation,
      std_dev: agp.metrics.standardDeviation
    },
    time_in_ranges: {
      very_low_below_54: ranges.veryLow,
      low_54_70: ranges.low,
      target_70_180: ranges.inRange,
      high_180_250: ranges.high,
      very_high_above_250: ranges.veryHigh
    },
    clinical_targets: {
      tir_target: targets.tirTarget,
      tir_actual: targets.tirActual,
      tir_met: targets.tirMet,
      tbr_target: targets.tbrTarget,
      tbr_actual: targets.tbrActual,
      tbr_met: targets.tbrMet,
      cv_target: targets.cvTarget,
      cv_actual: targets.cvActual,
      cv_met: targets.cvMet
    },
    hourly_profile: agp.hourlyProfile.map(h => ({
      hour: h.hour,
      p5: h.p5,
      p25: h.p25,
      p50: h.p50,
      p75: h.p75,
      p95: h.p95,
      readings_count: h.readingsCount
    }))
  };
}
