import type { AssetRecord, CandleRecord, IndicatorSnapshot } from '@trading-analytics/db-client';
import { isoDaysBefore } from '@trading-analytics/shared-utils';
import { INDICATOR_CATALOG, type IndicatorName } from '@trading-analytics/trading-utils';

export function asset(id: string, symbol = id.toUpperCase(), overrides: Partial<AssetRecord> = {}): AssetRecord {
  return {
    id,
    symbol,
    name: `${symbol} Inc.`,
    asset_type: 'stock',
    sector: 'Technology',
    industry: null,
    is_active: true,
    ...overrides,
  };
}

export function candle(assetId: string, ts: string, close: number, volume = 100): CandleRecord {
  return {
    asset_id: assetId,
    interval: '1d',
    ts,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume,
    trades: null,
    vwap: null,
  };
}

/**
 * anchor 에서 끝나는 연속 일봉 (closes[마지막] 이 anchor 시점)
 */
export function dailyCandles(assetId: string, anchor: string, closes: number[]): CandleRecord[] {
  return closes.map((close, i) => candle(assetId, isoDaysBefore(anchor, closes.length - 1 - i), close));
}

let snapshotSeq = 0;

export function snapshot(
  assetId: string,
  name: IndicatorName,
  ts: string,
  primary: number,
  secondary: number | null = null,
): IndicatorSnapshot {
  const definition = INDICATOR_CATALOG[name];
  snapshotSeq++;
  return {
    id: `seed-${snapshotSeq}`,
    asset_id: assetId,
    ts,
    indicator_type: definition.type,
    name,
    primary_value: primary,
    secondary_value: secondary,
    tertiary_value: null,
    parameters: { ...definition.parameters },
    timeframe: '1d',
    computed_at: ts,
  };
}
