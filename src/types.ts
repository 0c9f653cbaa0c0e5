// Types for the Dexcom Glucose MCP Server

export type DexcomRegion = 'us' | 'ous' | 'jp';

export interface DexcomConfig {
  username: string;
  password: string;
  region: DexcomRegion;
}

export type TrendDirection =
  | 'None'
  | 'DoubleUp'
  | 'SingleUp'
  | 'FortyFiveUp'
  | 'Flat'
  | 'FortyFiveDown'
  | 'SingleDown'
  | 'DoubleDown'
  | 'NotComputable'
  | 'RateOutOfRange';

/**
 * Canonical glucose reading. Every analysis consumes only this shape.
 *
 * `timestamp` is the instant in epoch milliseconds; `utcOffsetMinutes` is the
 * offset the source timestamp was expressed in and decides the local hour.
 */
export interface Reading {
  readonly value: number;
  readonly mmol: number;
  readonly timestamp: number;
  readonly utcOffsetMinutes: number;
  readonly trend: TrendDirection | null;
}

export interface ThresholdSet {
  low: number;
  high: number;
  urgentLow: number;
  urgentHigh: number;
}

export const DEFAULT_THRESHOLDS: Readonly<ThresholdSet> = Object.freeze({
  low: 70,
  high: 180,
  urgentLow: 54,
  urgentHigh: 250
});

// Severity cut-offs used by episode classification, independent of the caller's thresholds
export const SEVERE_LOW = 54;
export const SEVERE_HIGH = 250;

export const MAX_MINUTES = 1440;
export const MAX_COUNT = 288;
export const SAMPLE_INTERVAL_MINUTES = 5;

/** Record shape accepted from callers that persist readings themselves. */
export interface ExternalReadingRecord {
  glucose_mg_dl: number;
  timestamp: string;
}

/**
 * The acquisition collaborator. `getReadings` returns newest first.
 */
export interface GlucoseSource {
  getCurrentReading(): Promise<Reading | null>;
  getReadings(minutes: number, maxCount: number): Promise<Reading[]>;
}

// Result variants

export interface NoData {
  status: 'no_data';
  message: string;
}

export interface Report<T> {
  status: 'ok';
  report: T;
}

export type AnalysisResult<T> = NoData | Report<T>;

export function noData(message: string): NoData {
  return { status: 'no_data', message };
}

export function report<T>(value: T): Report<T> {
  return { status: 'ok', report: value };
}

// Statistics

export interface RangeDistribution {
  veryLow: number;
  low: number;
  inRange: number;
  high: number;
  veryHigh: number;
}

export interface GlucoseStatistics {
  readingCount: number;
  mean: number;
  meanMmol: number;
  standardDeviation: number;
  coefficientOfVariation: number;
  min: number;
  max: number;
  timeInRange: number;
  timeBelowRange: number;
  timeAboveRange: number;
  distribution: RangeDistribution;
  thresholds: ThresholdSet;
}

// Episodes

export type EpisodeType = 'low' | 'very_low' | 'high' | 'very_high';
export type EpisodeDirection = 'low' | 'high';

export interface Episode {
  type: EpisodeType;
  direction: EpisodeDirection;
  start: number;
  end: number;
  readings: Reading[];
  /** Positions of the first and last member in the ascending sequence. */
  startIndex: number;
  endIndex: number;
  ongoing: boolean;
}

export interface EpisodeRecord {
  type: EpisodeType;
  start: string;
  end: string;
  durationMinutes: number;
  extremeValue: number;
  meanValue: number;
  ongoing: boolean;
}

export interface EpisodeSummary {
  readingsAnalyzed: number;
  episodes: EpisodeRecord[];
  totals: {
    totalEpisodes: number;
    lowEpisodes: number;
    highEpisodes: number;
    totalLowMinutes: number;
    totalHighMinutes: number;
    severeLows: number;
    severeHighs: number;
  };
}

export type OvercorrectionType = 'rebound_high' | 'overcorrect_low';

export interface Overcorrection {
  type: OvercorrectionType;
  value: number;
}

export interface EpisodeDetail {
  type: EpisodeType;
  start: string;
  end: string;
  durationMinutes: number;
  extremeValue: number;
  extremeTime: string;
  rateToExtreme: number | null;
  rateFromExtreme: number | null;
  recoveryMinutes: number | null;
  recoveryRate: number | null;
  overcorrection: Overcorrection | null;
  leadupValues: number[];
  recoveryValues: number[];
  ongoing: boolean;
}

export interface EpisodeDetails {
  readingsAnalyzed: number;
  episodesAnalyzed: number;
  episodes: EpisodeDetail[];
}

// Time blocks

export type TimeBlockName = 'overnight' | 'morning' | 'afternoon' | 'evening';

export type BlockAssessment = 'excellent' | 'good' | 'needs attention' | 'problematic';

export interface EmptyBlock {
  status: 'no_data';
  timeRange: string;
  readingsCount: 0;
}

export interface BlockStats {
  status: 'ok';
  timeRange: string;
  readingsCount: number;
  average: number;
  min: number;
  max: number;
  timeInRange: number;
  timeBelowRange: number;
  timeAboveRange: number;
  assessment: BlockAssessment;
}

export type BlockResult = EmptyBlock | BlockStats;

export interface TimeBlockAnalysis {
  readingsAnalyzed: number;
  blocks: Record<TimeBlockName, BlockResult>;
  bestBlock: TimeBlockName | null;
  worstBlock: TimeBlockName | null;
  insight: string | null;
}

// AGP

export interface HourlyPercentiles {
  hour: number;
  p5: number | null;
  p25: number | null;
  p50: number | null;
  p75: number | null;
  p95: number | null;
  readingsCount: number;
}

export interface AgpReport {
  reportType: 'ambulatory_glucose_profile';
  periodMinutes: number | null;
  readingsAnalyzed: number;
  metrics: {
    mean: number;
    gmi: number;
    coefficientOfVariation: number;
    standardDeviation: number;
  };
  timeInRanges: RangeDistribution;
  clinicalTargets: {
    tirTarget: '>70%';
    tirActual: number;
    tirMet: boolean;
    tbrTarget: '<4%';
    tbrActual: number;
    tbrMet: boolean;
    cvTarget: '<36%';
    cvActual: number;
    cvMet: boolean;
  };
  hourlyProfile: HourlyPercentiles[];
}
