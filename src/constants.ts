/**
 * Dexcom Share endpoints, application ids and trend tables.
 */

import type { DexcomRegion, TrendDirection } from './types.js';

export const DEXCOM_APPLICATION_IDS: Record<DexcomRegion, string> = {
  us: 'd89443d2-327c-4a6f-89e5-496bbb0317db',
  ous: 'd89443d2-327c-4a6f-89e5-496bbb0317db',
  jp: 'd8665ade-9673-4e27-9ff6-92db4ce13d13'
};

export const DEXCOM_BASE_URLS: Record<DexcomRegion, string> = {
  us: 'https://share2.dexcom.com/ShareWebServices/Services/',
  ous: 'https://shareous1.dexcom.com/ShareWebServices/Services/',
  jp: 'https://share.dexcom.jp/ShareWebServices/Services/'
};

export const VALID_REGIONS: DexcomRegion[] = ['us', 'ous', 'jp'];

export const ENDPOINTS = {
  authenticate: 'General/AuthenticatePublisherAccount',
  login: 'General/LoginPublisherAccountById',
  readings: 'Publisher/ReadPublisherLatestGlucoseValues'
};

export const DEFAULT_UUID = '00000000-0000-0000-0000-000000000000';

export const TREND_DIRECTIONS: TrendDirection[] = [
  'None',
  'DoubleUp',
  'SingleUp',
  'FortyFiveUp',
  'Flat',
  'FortyFiveDown',
  'SingleDown',
  'DoubleDown',
  'NotComputable',
  'RateOutOfRange'
];

const TREND_DESCRIPTIONS: Record<TrendDirection, string> = {
  None: '',
  DoubleUp: 'rising quickly',
  SingleUp: 'rising',
  FortyFiveUp: 'rising slightly',
  Flat: 'steady',
  FortyFiveDown: 'falling slightly',
  SingleDown: 'falling',
  DoubleDown: 'falling quickly',
  NotComputable: 'unable to determine trend',
  RateOutOfRange: 'trend unavailable'
};

const TREND_ARROWS: Record<TrendDirection, string> = {
  None: '',
  DoubleUp: '↑↑',
  SingleUp: '↑',
  FortyFiveUp: '↗',
  Flat: '→',
  FortyFiveDown: '↘',
  SingleDown: '↓',
  DoubleDown: '↓↓',
  NotComputable: '?',
  RateOutOfRange: '-'
};

export function isTrendDirection(value: string): value is TrendDirection {
  return TREND_DIRECTIONS.some(trend => trend === value);
}

export function trendArrow(trend: TrendDirection | null): string | null {
  return trend === null ? null : TREND_ARROWS[trend];
}

export function trendDescription(trend: TrendDirection | null): string | null {
  return trend === null ? null : TREND_DESCRIPTIONS[trend];
}
