import type { IndicatorSnapshot, MarketDataStore } from '@trading-analytics/db-client';
import { isoDaysBefore, keepLatestByKey, NotFoundError, toMillis } from '@trading-analytics/shared-utils';
import { summarizeSignals, type SummarySignal } from '@trading-analytics/trading-utils';
import { toReadings } from '../jobs/compute-signals.js';

export interface AnalysisIndicators {
  rsi: number | null;
  macd: number | null;
  macd_signal: number | null;
  sma_20: number | null;
  ema_20: number | null;
  bb_upper: number | null;
  bb_middle: number | null;
  bb_lower: number | null;
}

export interface AnalysisSummary {
  asset_id: string;
  symbol: string;
  latest_close: number;
  /** 최신 일봉 시각 */
  date: string;
  indicators: AnalysisIndicators;
  signals: SummarySignal[];
}

/**
 * 자산 하나의 기술적 분석 요약
 * - 최신 일봉과, 그 시각 기준 maxAgeDays 이내의 이름별 최신 지표 스냅샷 사용
 * - 자산이나 일봉이 없으면 NotFoundError
 */
export async function getAnalysisSummary(
  store: MarketDataStore,
  assetId: string,
  options: { maxAgeDays: number },
): Promise<AnalysisSummary> {
  const asset = await store.assets.getAsset(assetId);
  if (!asset) throw new NotFoundError('Asset', assetId);

  const [latest] = await store.candles.getCandles(assetId, '1d', { limit: 1 });
  if (!latest) throw new NotFoundError('Candles for asset', assetId);

  const snapshots = await store.indicators.getIndicatorsSince(assetId, isoDaysBefore(latest.ts, options.maxAgeDays));
  const byName = keepLatestByKey(snapshots, (s) => s.name, (s) => toMillis(s.ts));

  const pick = (name: string, field: 'primary_value' | 'secondary_value' | 'tertiary_value'): number | null => {
    const snapshot: IndicatorSnapshot | undefined = byName.get(name);
    return snapshot ? snapshot[field] : null;
  };

  return {
    asset_id: asset.id,
    symbol: asset.symbol,
    latest_close: latest.close,
    date: latest.ts,
    indicators: {
      rsi: pick('RSI_14', 'primary_value'),
      macd: pick('MACD_12_26_9', 'primary_value'),
      macd_signal: pick('MACD_12_26_9', 'secondary_value'),
      sma_20: pick('SMA_20', 'primary_value'),
      ema_20: pick('EMA_20', 'primary_value'),
      bb_upper: pick('BBANDS_20_2', 'secondary_value'),
      bb_middle: pick('BBANDS_20_2', 'primary_value'),
      bb_lower: pick('BBANDS_20_2', 'tertiary_value'),
    },
    signals: summarizeSignals(latest.close, toReadings(byName.values())),
  };
}
