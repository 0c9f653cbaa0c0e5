/**
 * Time-of-day breakdown: overnight (00-06), morning (06-12),
 * afternoon (12-18) and evening (18-24), by each reading's local hour.
 */

import { countWhere, maxOf, mean, minOf, percentOf, round1 } from './glucose-analytics.js';
import { localHour } from './readings.js';
import {
  type AnalysisResult,
  type BlockAssessment,
  type BlockResult,
  type Reading,
  type ThresholdSet,
  type TimeBlockAnalysis,
  type TimeBlockName,
  noData,
  report
} from './types.js';

interface BlockDefinition {
  range: string;
  fromHour: number;
  toHour: number;
}

export const TIME_BLOCKS: Record<TimeBlockName, BlockDefinition> = {
  overnight: { range: '00:00-06:00', fromHour: 0, toHour: 6 },
  morning: { range: '06:00-12:00', fromHour: 6, toHour: 12 },
  afternoon: { range: '12:00-18:00', fromHour: 12, toHour: 18 },
  evening: { range: '18:00-24:00', fromHour: 18, toHour: 24 }
};

// Iteration order decides ties for best/worst
export const BLOCK_ORDER: TimeBlockName[] = ['overnight', 'morning', 'afternoon', 'evening'];

export function blockForHour(hour: number): TimeBlockName {
  const name = BLOCK_ORDER.find(n => hour >= TIME_BLOCKS[n].fromHour && hour < TIME_BLOCKS[n].toHour);
  return name ?? 'evening';
}

export function assessTimeInRange(tir: number): BlockAssessment {
  if (tir >= 80) return 'excellent';
  if (tir >= 70) return 'good';
  if (tir >= 50) return 'needs attention';
  return 'problematic';
}

function analyzeBlock(definition: BlockDefinition, values: number[], thresholds: ThresholdSet): BlockResult {
  if (values.length === 0) {
    return { status: 'no_data', timeRange: definition.range, readingsCount: 0 };
  }

  const total = values.length;
  const tir = percentOf(countWhere(values, v => v >= thresholds.low && v <= thresholds.high), total);

  return {
    status: 'ok',
    timeRange: definition.range,
    readingsCount: total,
    average: round1(mean(values)),
    min: minOf(values),
    max: maxOf(values),
    timeInRange: tir,
    timeBelowRange: percentOf(countWhere(values, v => v < thresholds.low), total),
    timeAboveRange: percentOf(countWhere(values, v => v > thresholds.high), total),
    assessment: assessTimeInRange(tir)
  };
}

/**
 * Analyze glucose by time of day to find when problems happen.
 * Input order does not matter; days are merged by hour of day.
 */
export function analyzeTimeBlocks(readings: Reading[], thresholds: ThresholdSet): AnalysisResult<TimeBlockAnalysis> {
  if (readings.length === 0) {
    return noData('No readings available');
  }

  const grouped: Record<TimeBlockName, number[]> = {
    overnight: [],
    morning: [],
    afternoon: [],
    evening: []
  };
  for (const reading of readings) {
    grouped[blockForHour(localHour(reading))].push(reading.value);
  }

  const blocks: Record<TimeBlockName, BlockResult> = {
    overnight: analyzeBlock(TIME_BLOCKS.overnight, grouped.overnight, thresholds),
    morning: analyzeBlock(TIME_BLOCKS.morning, grouped.morning, thresholds),
    afternoon: analyzeBlock(TIME_BLOCKS.afternoon, grouped.afternoon, thresholds),
    evening: analyzeBlock(TIME_BLOCKS.evening, grouped.evening, thresholds)
  };
  let bestBlock: TimeBlockName | null = null;
  let worstBlock: TimeBlockName | null = null;
  let bestTir = -1;
  let worstTir = 101;

  for (const name of BLOCK_ORDER) {
    const result = blocks[name];
    if (result.status === 'no_data') continue;

    if (result.timeInRange > bestTir) {
      bestTir = result.timeInRange;
      bestBlock = name;
    }
    if (result.timeInRange < worstTir) {
      worstTir = result.timeInRange;
      worstBlock = name;
    }
  }

  const insight =
    bestBlock && worstBlock
      ? `Best control during ${bestBlock} (${bestTir.toFixed(1)}% TIR), worst during ${worstBlock} (${worstTir.toFixed(1)}% TIR)`
      : null;

  return report({
    readingsAnalyzed: readings.length,
    blocks,
    bestBlock,
    worstBlock,
    insight
  });
}
