/**
 * Episode detection and per-episode recovery analysis.
 *
 * Episodes are maximal runs of consecutive out-of-range readings on the same
 * side of the target range. Severity escalates within a run but never
 * de-escalates, and a change of side always starts a new episode.
 */

import { maxOf, mean, minOf, round1 } from './glucose-analytics.js';
import { formatReadingTime, minutesBetween, normalizeReadings } from './readings.js';
import {
  type AnalysisResult,
  type Episode,
  type EpisodeDetail,
  type EpisodeDetails,
  type EpisodeDirection,
  type EpisodeRecord,
  type EpisodeSummary,
  type EpisodeType,
  type Overcorrection,
  type Reading,
  SAMPLE_INTERVAL_MINUTES,
  SEVERE_HIGH,
  SEVERE_LOW,
  type ThresholdSet,
  noData,
  report
} from './types.js';

// ~30 minutes at the native 5-minute cadence
const CONTEXT_WINDOW = 6;

export function classifyReading(value: number, thresholds: ThresholdSet): EpisodeType | null {
  if (value < SEVERE_LOW) return 'very_low';
  if (value < thresholds.low) return 'low';
  if (value > SEVERE_HIGH) return 'very_high';
  if (value > thresholds.high) return 'high';
  return null;
}

export function directionOf(type: EpisodeType): EpisodeDirection {
  return type === 'low' || type === 'very_low' ? 'low' : 'high';
}

function isSevere(type: EpisodeType): boolean {
  return type === 'very_low' || type === 'very_high';
}

/** Duration in whole minutes, floored at one sample interval. */
export function episodeDuration(episode: Pick<Episode, 'start' | 'end'>): number {
  return Math.max(Math.trunc(minutesBetween(episode.start, episode.end)), SAMPLE_INTERVAL_MINUTES);
}

export function extremeValue(episode: Episode): number {
  const values = episode.readings.map(r => r.value);
  return episode.direction === 'low' ? minOf(values) : maxOf(values);
}

/**
 * Single pass over an ascending sequence. The caller guarantees the order.
 */
export function detectEpisodes(sorted: Reading[], thresholds: ThresholdSet): Episode[] {
  const episodes: Episode[] = [];
  let current: Episode | null = null;

  for (let index = 0; index < sorted.length; index++) {
    const reading = sorted[index];
    const type = classifyReading(reading.value, thresholds);

    if (type === null) {
      if (current) {
        episodes.push(current);
        current = null;
      }
      continue;
    }

    const direction = directionOf(type);
    if (current && current.direction === direction) {
      current.end = reading.timestamp;
      current.endIndex = index;
      current.readings.push(reading);
      if (isSevere(type)) {
        current.type = type;
      }
      continue;
    }

    if (current) {
      episodes.push(current);
    }
    current = {
      type,
      direction,
      start: reading.timestamp,
      end: reading.timestamp,
      readings: [reading],
      startIndex: index,
      endIndex: index,
      ongoing: false
    };
  }

  if (current) {
    episodes.push({ ...current, ongoing: true });
  }

  return episodes;
}

function toRecord(episode: Episode): EpisodeRecord {
  const first = episode.readings[0];
  const last = episode.readings[episode.readings.length - 1];

  return {
    type: episode.type,
    start: formatReadingTime(first),
    end: formatReadingTime(last),
    durationMinutes: episodeDuration(episode),
    extremeValue: extremeValue(episode),
    meanValue: round1(mean(episode.readings.map(r => r.value))),
    ongoing: episode.ongoing
  };
}

/**
 * Detect hypoglycemic and hyperglycemic episodes with per-direction totals.
 */
export function summarizeEpisodes(readings: Reading[], thresholds: ThresholdSet): AnalysisResult<EpisodeSummary> {
  if (readings.length === 0) {
    return noData('No readings available');
  }

  const sorted = normalizeReadings(readings, { order: 'asc' });
  const episodes = detectEpisodes(sorted, thresholds).map(toRecord);
  const lows = episodes.filter(e => directionOf(e.type) === 'low');
  const highs = episodes.filter(e => directionOf(e.type) === 'high');

  return report({
    readingsAnalyzed: sorted.length,
    episodes,
    totals: {
      totalEpisodes: episodes.length,
      lowEpisodes: lows.length,
      highEpisodes: highs.length,
      totalLowMinutes: lows.reduce((sum, e) => sum + e.durationMinutes, 0),
      totalHighMinutes: highs.reduce((sum, e) => sum + e.durationMinutes, 0),
      severeLows: lows.filter(e => e.type === 'very_low').length,
      severeHighs: highs.filter(e => e.type === 'very_high').length
    }
  });
}

/** Change in mg/dL per 5 minutes; null when no time has passed. */
function ratePer5Min(fromValue: number, toValue: number, fromTime: number, toTime: number): number | null {
  const minutes = minutesBetween(fromTime, toTime);
  if (minutes <= 0) return null;
  return round1(((toValue - fromValue) / minutes) * SAMPLE_INTERVAL_MINUTES);
}

function findOvercorrection(
  direction: EpisodeDirection,
  after: Reading[],
  thresholds: ThresholdSet
): Overcorrection | null {
  if (after.length === 0) return null;
  const values = after.map(r => r.value);

  if (direction === 'low') {
    const peak = maxOf(values);
    return peak > thresholds.high ? { type: 'rebound_high', value: peak } : null;
  }
  const nadir = minOf(values);
  return nadir < thresholds.low ? { type: 'overcorrect_low', value: nadir } : null;
}

/**
 * Enrich one episode with its extremum, rates and the readings around it.
 * `sorted` is the full ascending sequence the episode indices point into.
 */
export function analyzeEpisode(episode: Episode, sorted: Reading[], thresholds: ThresholdSet): EpisodeDetail {
  const members = episode.readings;
  const first = members[0];
  const last = members[members.length - 1];

  const extreme = extremeValue(episode);
  const extremeIndex = members.findIndex(r => r.value === extreme);
  const extremeReading = members[extremeIndex];

  const rateToExtreme =
    extremeIndex > 0 ? ratePer5Min(first.value, extreme, first.timestamp, extremeReading.timestamp) : null;
  const rateFromExtreme =
    extremeIndex < members.length - 1
      ? ratePer5Min(extreme, last.value, extremeReading.timestamp, last.timestamp)
      : null;

  const leadup = sorted.slice(Math.max(0, episode.startIndex - CONTEXT_WINDOW), episode.startIndex);
  const after = sorted.slice(episode.endIndex + 1, episode.endIndex + 1 + CONTEXT_WINDOW);

  let recoveryMinutes: number | null = null;
  let recoveryRate: number | null = null;

  if (after.length > 0) {
    const backInRange = after.find(r => r.value >= thresholds.low && r.value <= thresholds.high);
    if (backInRange) {
      recoveryMinutes = Math.trunc(minutesBetween(last.timestamp, backInRange.timestamp));
    }
    const tail = after[after.length - 1];
    recoveryRate = ratePer5Min(last.value, tail.value, last.timestamp, tail.timestamp);
  }

  return {
    type: episode.type,
    start: formatReadingTime(first),
    end: formatReadingTime(last),
    durationMinutes: episodeDuration(episode),
    extremeValue: extreme,
    extremeTime: formatReadingTime(extremeReading),
    rateToExtreme,
    rateFromExtreme,
    recoveryMinutes,
    recoveryRate,
    overcorrection: findOvercorrection(episode.direction, after, thresholds),
    leadupValues: leadup.map(r => r.value),
    recoveryValues: after.map(r => r.value),
    ongoing: episode.ongoing
  };
}

/**
 * Detailed context for each episode: what led to it, how severe it was,
 * and how recovery went.
 */
export function analyzeEpisodes(readings: Reading[], thresholds: ThresholdSet): AnalysisResult<EpisodeDetails> {
  if (readings.length === 0) {
    return noData('No readings available');
  }

  const sorted = normalizeReadings(readings, { order: 'asc' });
  const episodes = detectEpisodes(sorted, thresholds).map(e => analyzeEpisode(e, sorted, thresholds));

  return report({
    readingsAnalyzed: sorted.length,
    episodesAnalyzed: episodes.length,
    episodes
  });
}
